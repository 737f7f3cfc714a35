import type { SyntaxTree } from '../syntax/model';
import { indentationAt, isBlankLine, lineEndOf, lineStartOf } from '../syntax/positions';
import type { Edit, NewNode, NodeRef } from './edits';

/** Two edits of one plan touch the same text; the planner issued an inconsistent set. */
export class EditConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EditConflictError';
  }
}

export type MaterializeResult =
  | { kind: 'applied'; text: string }
  /** `node` no longer matches the snapshot text. */
  | { kind: 'stale'; node: NodeRef };

type Splice = {
  start: number;
  end: number;
  text: string;
  /** Whole-line member removal; may take one neighbouring blank line with it. */
  collapsible: boolean;
  /** Member removal inside a line; may take the spaces around it. */
  inline?: boolean;
};

const TRAILING_TRIVIA = /^[ \t]*(\/\/[^\n]*)?(\r?\n|$)/;

function intersects(a: Splice, b: Splice): boolean {
  if (b.start === b.end) return b.start > a.start && b.start < a.end;
  if (a.start === a.end) return a.start > b.start && a.start < b.end;
  return a.start < b.end && b.start < a.end;
}

function describe(s: Splice): string {
  return `[${s.start}, ${s.end})`;
}

/**
 * Applies an edit set to the snapshot it was planned against.
 *
 * Untouched text is copied as is. Synthesized nodes are printed line by line
 * with the indentation of their anchor.
 */
export class TreeEditor {
  private readonly edits: Edit[] = [];
  private readonly text: string;
  private readonly eol: string;

  constructor(private readonly tree: SyntaxTree) {
    this.text = tree.text;
    this.eol = tree.text.includes('\r\n') ? '\r\n' : '\n';
  }

  insertBefore(anchor: NodeRef, node: NewNode): this {
    this.edits.push({ kind: 'insertBefore', anchor, node });
    return this;
  }

  remove(node: NodeRef): this {
    this.edits.push({ kind: 'remove', node });
    return this;
  }

  replace(node: NodeRef, newNode: NewNode): this {
    this.edits.push({ kind: 'replace', node, with: newNode });
    return this;
  }

  ensureImport(namespace: string): this {
    this.edits.push({ kind: 'ensureImport', namespace });
    return this;
  }

  apply(edits: Iterable<Edit>): this {
    for (const e of edits) this.edits.push(e);
    return this;
  }

  materialize(): MaterializeResult {
    for (const e of this.edits) {
      const ref = refOf(e);
      if (ref && !this.isCurrent(ref)) return { kind: 'stale', node: ref };
    }

    const splices: Splice[] = [];
    const imported = new Set<string>();
    for (const e of this.edits) {
      if (e.kind === 'ensureImport') {
        if (imported.has(e.namespace)) continue;
        imported.add(e.namespace);
        const s = this.importSplice(e.namespace);
        if (s) splices.push(s);
        continue;
      }
      splices.push(this.splice(e));
    }

    // Sequential, so two removals never claim the same blank line.
    for (let i = 0; i < splices.length; i++) {
      if (splices[i].collapsible) splices[i] = this.collapseBlankLines(splices[i], splices);
      else if (splices[i].inline) splices[i] = this.absorbSpaces(splices[i], splices);
    }
    return { kind: 'applied', text: this.compose(splices) };
  }

  private isCurrent(ref: NodeRef): boolean {
    const { start, end } = ref.span;
    if (start < 0 || end > this.text.length || start > end || ref.fullStart > start) return false;
    return this.text.slice(start, end) === ref.text;
  }

  private splice(e: Exclude<Edit, { kind: 'ensureImport' }>): Splice {
    switch (e.kind) {
      case 'insertBefore': {
        const at = e.anchor.fullStart;
        if (this.atLineHead(at)) {
          const lineStart = lineStartOf(this.text, at);
          return { start: lineStart, end: lineStart, text: this.renderBlock(e.node, at), collapsible: false };
        }
        return { start: at, end: at, text: this.renderInline(e.node) + ' ', collapsible: false };
      }
      case 'remove':
        return this.removal(e.node);
      case 'replace': {
        const range = this.removal(e.node);
        const text = range.collapsible ? this.renderBlock(e.with, e.node.fullStart) : this.renderInline(e.with);
        return { ...range, text, collapsible: false, inline: false };
      }
    }
  }

  private removal(node: NodeRef): Splice {
    const { start, end } = node.span;
    if (node.layout === 'declarator') return this.declaratorRemoval(start, end);
    if (node.layout === 'member' && this.atLineHead(node.fullStart)) {
      const rest = this.text.slice(end, lineEndOf(this.text, end));
      if (TRAILING_TRIVIA.test(rest)) {
        return { start: lineStartOf(this.text, node.fullStart), end: lineEndOf(this.text, end), text: '', collapsible: true };
      }
    }
    return { start: node.fullStart, end, text: '', collapsible: false, inline: node.layout === 'member' };
  }

  /** One variable of `T a, b;`, with the comma that separates it from its neighbour. */
  private declaratorRemoval(start: number, end: number): Splice {
    let before = start;
    while (before > 0 && /\s/.test(this.text[before - 1])) before--;
    if (this.text[before - 1] === ',') return { start: before - 1, end, text: '', collapsible: false };

    let after = end;
    while (after < this.text.length && /\s/.test(this.text[after])) after++;
    if (this.text[after] === ',') {
      after++;
      while (after < this.text.length && /[ \t]/.test(this.text[after])) after++;
    }
    return { start, end: after, text: '', collapsible: false };
  }

  private importSplice(namespace: string): Splice | undefined {
    const root = this.tree.root;
    const present = [...root.usings, ...root.nestedUsings].some(
      (u) => !u.isStatic && u.alias === undefined && u.namespace === namespace,
    );
    if (present) return undefined;

    const line = `using ${namespace};`;
    const last = root.usings[root.usings.length - 1];
    if (last) {
      const at = lineEndOf(this.text, last.span.end);
      const lead = at === this.text.length && !this.text.endsWith('\n') ? this.eol : '';
      return { start: at, end: at, text: lead + line + this.eol, collapsible: false };
    }
    const at = lineStartOf(this.text, root.firstItemStart);
    return { start: at, end: at, text: line + this.eol + this.eol, collapsible: false };
  }

  /**
   * Lets a whole-line removal take a blank line with it so that removing a
   * member between blank lines, or first/last in its body, leaves one separator.
   */
  private collapseBlankLines(s: Splice, all: Splice[]): Splice {
    const t = this.text;
    if (all.some((o) => o.start === o.end && o.start === s.start)) return s;

    const prevLineStart = s.start > 0 ? lineStartOf(t, s.start - 1) : -1;
    const prevBlank = prevLineStart >= 0 && isBlankLine(t, prevLineStart);
    const prevOpens = prevLineStart >= 0 && t.slice(prevLineStart, s.start).trim().endsWith('{');
    const nextBlank = isBlankLine(t, s.end);
    const nextCloses = t.slice(s.end, lineEndOf(t, s.end)).trim().startsWith('}');

    let candidate: Splice;
    if (nextBlank && (prevBlank || prevOpens)) candidate = { ...s, end: lineEndOf(t, s.end) };
    else if (prevBlank && nextCloses) candidate = { ...s, start: prevLineStart };
    else return s;

    return all.some((o) => o !== s && intersects(candidate, o)) ? s : candidate;
  }

  /**
   * Takes the spaces after an in-line removal, and the spaces before it
   * when nothing else is left on the line.
   */
  private absorbSpaces(s: Splice, all: Splice[]): Splice {
    const t = this.text;
    let end = s.end;
    while (end < t.length && (t[end] === ' ' || t[end] === '\t')) end++;
    let start = s.start;
    if (end === t.length || t[end] === '\n' || t[end] === '\r') {
      while (start > 0 && (t[start - 1] === ' ' || t[start - 1] === '\t')) start--;
    }
    const candidate = { ...s, start, end };
    return all.some((o) => o !== s && intersects(candidate, o)) ? s : candidate;
  }

  private compose(splices: Splice[]): string {
    const ordered = splices
      .map((s, i) => ({ s, i }))
      .sort((a, b) => a.s.start - b.s.start || a.s.end - b.s.end || a.i - b.i)
      .map((x) => x.s);

    let out = '';
    let cursor = 0;
    for (const s of ordered) {
      if (s.start < cursor) throw new EditConflictError(`Edit at ${describe(s)} overlaps an earlier edit ending at ${cursor}`);
      out += this.text.slice(cursor, s.start) + s.text;
      cursor = s.end;
    }
    return out + this.text.slice(cursor);
  }

  private atLineHead(offset: number): boolean {
    return this.text.slice(lineStartOf(this.text, offset), offset).trim() === '';
  }

  private renderBlock(node: NewNode, anchor: number): string {
    const indent = indentationAt(this.text, anchor);
    const unit = indent.includes('\t') ? '\t' : '    ';
    return node.lines
      .map((l) => (l.text === '' ? '' : indent + unit.repeat(l.depth) + l.text) + this.eol)
      .join('');
  }

  private renderInline(node: NewNode): string {
    return node.lines.map((l) => l.text.trim()).join(' ');
  }
}

function refOf(e: Edit): NodeRef | undefined {
  switch (e.kind) {
    case 'insertBefore':
      return e.anchor;
    case 'remove':
    case 'replace':
      return e.node;
    case 'ensureImport':
      return undefined;
  }
}

/** Applies `edits` to `tree` in one step. */
export function applyEdits(tree: SyntaxTree, edits: Iterable<Edit>): MaterializeResult {
  return new TreeEditor(tree).apply(edits).materialize();
}
