import type { FieldDecl, Member, Span, Token, VariableDeclarator } from '../syntax/model';
import type { FieldMatch } from '../syntax/query';

/**
 * How the editor lays out text around a referenced node:
 * - `member`: whole lines, including the member's leading comments;
 * - `declarator`: one variable of a multi-variable field, with its separating comma;
 * - `inline`: the exact span.
 */
export type NodeLayout = 'member' | 'declarator' | 'inline';

export type NodeRef = {
  kind: string;
  span: Span;
  /** Start of the node's leading trivia (equals `span.start` when it has none). */
  fullStart: number;
  /** Source text of `span`, re-checked against the snapshot before applying. */
  text: string;
  layout: NodeLayout;
};

export type NewLine = {
  /** Nesting below the anchor's indentation, in indent units. */
  depth: number;
  text: string;
};

export type NewNode = {
  kind: 'property' | 'method' | 'attribute' | 'identifier';
  lines: NewLine[];
};

export type Edit =
  | { kind: 'insertBefore'; anchor: NodeRef; node: NewNode }
  | { kind: 'remove'; node: NodeRef }
  | { kind: 'replace'; node: NodeRef; with: NewNode }
  | { kind: 'ensureImport'; namespace: string };

export function memberRef(member: Member): NodeRef {
  const first = member.leadingComments[0];
  return {
    kind: member.kind,
    span: member.span,
    fullStart: first ? first.span.start : member.span.start,
    text: member.text,
    layout: 'member',
  };
}

export function tokenRef(token: Token): NodeRef {
  return { kind: token.kind, span: token.span, fullStart: token.span.start, text: token.text, layout: 'inline' };
}

/** Zero-width position in front of a member's modifiers, after its attribute lists. */
export function memberHeadRef(member: Member): NodeRef {
  const at = member.headStart;
  return { kind: 'memberHead', span: { start: at, end: at }, fullStart: at, text: '', layout: 'inline' };
}

function declaratorRef(declarator: VariableDeclarator): NodeRef {
  return {
    kind: declarator.kind,
    span: declarator.span,
    fullStart: declarator.span.start,
    text: declarator.text,
    layout: 'declarator',
  };
}

/** Removes a backing field, or only its variable when the declaration holds several. */
export function removeFieldEdit(match: FieldMatch): Edit {
  const field: FieldDecl = match.field;
  if (field.declarators.length > 1) return { kind: 'remove', node: declaratorRef(match.declarator) };
  return { kind: 'remove', node: memberRef(field) };
}

export function singleLine(kind: NewNode['kind'], text: string): NewNode {
  return { kind, lines: [{ depth: 0, text }] };
}
