import type { AttributeList, Comment } from '../syntax/model';
import { indentationAt } from '../syntax/positions';
import type { NewLine } from './edits';

export function attributeLine(name: string, args?: string): NewLine {
  return { depth: 0, text: args === undefined ? `[${name}]` : `[${name}(${args})]` };
}

export function nameofArg(name: string): string {
  return `nameof(${name})`;
}

/**
 * Lines of a comment or attribute list as written, continuation lines
 * stripped of the indentation the node originally started at.
 */
export function verbatimLines(node: Comment | AttributeList, source: string): NewLine[] {
  const indent = indentationAt(source, node.span.start);
  return node.text.split(/\r?\n/).map((line, i) => ({
    depth: 0,
    text: i > 0 && line.startsWith(indent) ? line.slice(indent.length) : line.trimStart(),
  }));
}

/**
 * Lines of a block (`{ ... }`) relative to the indentation of its closing brace,
 * so the block can be re-indented under a new anchor.
 */
export function blockLines(blockText: string): NewLine[] {
  const lines = blockText.split(/\r?\n/);
  const last = lines[lines.length - 1] ?? '';
  const m = /^[ \t]*/.exec(last);
  const base = m ? m[0] : '';
  return lines.map((line, i) => ({
    depth: 0,
    text: i > 0 && line.startsWith(base) ? line.slice(base.length) : line.trim() === '' ? '' : line,
  }));
}
