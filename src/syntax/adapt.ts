import type Parser from 'web-tree-sitter';
import type {
  Accessor,
  AccessorKind,
  Argument,
  ArgumentModifier,
  ArrowBody,
  AttributeList,
  Block,
  Body,
  Comment,
  CompilationUnit,
  Expression,
  FieldDecl,
  LambdaBody,
  Member,
  MethodDecl,
  Parameter,
  PropertyDecl,
  Span,
  Statement,
  Token,
  TypeDecl,
  TypeDeclKind,
  TypeRef,
  UsingDirective,
  VariableDeclarator,
} from './model';
import { parseTypeText } from './typeName';

type Node = Parser.SyntaxNode;

const TYPE_DECLS: Record<string, TypeDeclKind> = {
  class_declaration: 'class',
  struct_declaration: 'struct',
  record_declaration: 'record',
  record_struct_declaration: 'record',
  interface_declaration: 'interface',
};

const NAMESPACE_NODES = new Set(['namespace_declaration', 'file_scoped_namespace_declaration', 'declaration_list']);

const ACCESSOR_KEYWORD = /^(get|set|init|add|remove)\b/;

const ARGUMENT_MODIFIERS: ReadonlySet<string> = new Set(['ref', 'out', 'in']);

const USING_TEXT = /^(global\s+)?using\s+(static\s+)?(?:([A-Za-z_]\w*)\s*=\s*)?([^;]+);?/;

const ACCESSOR_KINDS: ReadonlySet<string> = new Set(['get', 'set', 'init', 'add', 'remove']);

function isAccessorKind(v: string): v is AccessorKind {
  return ACCESSOR_KINDS.has(v);
}

function isArgumentModifier(v: string): v is ArgumentModifier {
  return ARGUMENT_MODIFIERS.has(v);
}

/**
 * Converts a tree-sitter C# concrete syntax tree into the engine's syntax model.
 *
 * Lookups go through node types and child order rather than grammar field
 * names wherever possible, so minor grammar revisions keep adapting.
 */
export class CstAdapter {
  private readonly types: TypeDecl[] = [];

  constructor(private readonly src: string) {}

  compilationUnit(root: Node): CompilationUnit {
    const usings: UsingDirective[] = [];
    const nestedUsings: UsingDirective[] = [];
    for (const child of this.named(root)) {
      if (child.type === 'using_directive') usings.push(this.using(child));
    }
    this.collect(root, nestedUsings);
    const first = this.named(root)[0];
    return {
      kind: 'compilationUnit',
      span: this.span(root),
      text: this.src,
      usings,
      nestedUsings,
      types: this.types,
      firstItemStart: first ? first.startIndex : 0,
    };
  }

  private collect(n: Node, nestedUsings: UsingDirective[]): void {
    for (const child of this.named(n)) {
      const declKind = TYPE_DECLS[child.type];
      if (declKind) {
        this.typeDecl(child, declKind, []);
      } else if (NAMESPACE_NODES.has(child.type)) {
        for (const inner of this.named(child)) {
          if (inner.type === 'using_directive') nestedUsings.push(this.using(inner));
        }
        this.collect(child, nestedUsings);
      }
    }
  }

  private using(n: Node): UsingDirective {
    const text = this.text(n);
    const m = USING_TEXT.exec(text);
    return {
      kind: 'using',
      span: this.span(n),
      text,
      namespace: m ? m[4].replace(/\s+/g, '') : '',
      alias: m?.[3],
      isGlobal: Boolean(m?.[1]),
      isStatic: Boolean(m?.[2]),
    };
  }

  // -------------------------------------------------------------------------
  // Members

  private typeDecl(n: Node, declKind: TypeDeclKind, leadingComments: Comment[]): TypeDecl {
    const decl: TypeDecl = {
      ...this.memberBase(n, leadingComments),
      kind: 'typeDecl',
      declKind,
      name: this.text(n.childForFieldName('name') ?? this.firstOfType(n, 'identifier') ?? n),
      members: [],
    };
    // Register before the members so nested types follow their container.
    this.types.push(decl);
    const body = n.childForFieldName('body') ?? this.firstOfType(n, 'declaration_list');
    if (body) decl.members.push(...this.members(body));
    return decl;
  }

  private members(body: Node): Member[] {
    const out: Member[] = [];
    let pending: Comment[] = [];
    let lastRow = body.startPosition.row;
    for (const child of body.children) {
      if (child.type === 'comment') {
        if (child.startPosition.row > lastRow) pending.push(this.comment(child));
        continue;
      }
      if (child.type === '{' || child.type === '}' || child.type === ';') {
        lastRow = child.endPosition.row;
        continue;
      }
      out.push(this.member(child, pending));
      pending = [];
      lastRow = child.endPosition.row;
    }
    return out;
  }

  private member(n: Node, leadingComments: Comment[]): Member {
    const declKind = TYPE_DECLS[n.type];
    if (declKind) return this.typeDecl(n, declKind, leadingComments);
    switch (n.type) {
      case 'property_declaration':
        return this.property(n, leadingComments);
      case 'field_declaration':
        return this.field(n, leadingComments);
      case 'method_declaration':
        return this.method(n, leadingComments);
      default:
        return { ...this.memberBase(n, leadingComments), kind: 'otherMember' };
    }
  }

  private memberBase(n: Node, leadingComments: Comment[]) {
    const attributes: AttributeList[] = [];
    const modifiers: string[] = [];
    let headStart: number | undefined;
    for (const child of n.children) {
      if (child.type === 'comment') continue;
      if (child.type === 'attribute_list') {
        attributes.push({ kind: 'attributeList', span: this.span(child), text: this.text(child) });
        continue;
      }
      if (headStart === undefined) headStart = child.startIndex;
      if (child.type === 'modifier') modifiers.push(this.text(child));
    }
    return {
      span: this.span(n),
      text: this.text(n),
      leadingComments,
      attributes,
      modifiers,
      headStart: headStart ?? n.startIndex,
    };
  }

  private property(n: Node, leadingComments: Comment[]): PropertyDecl {
    const typeNode = n.childForFieldName('type') ?? this.firstHeadNode(n);
    const nameNode = n.childForFieldName('name') ?? this.identifierAfter(n, typeNode);
    const accessorList = this.firstOfType(n, 'accessor_list');
    const arrow = this.firstOfType(n, 'arrow_expression_clause');
    return {
      ...this.memberBase(n, leadingComments),
      kind: 'property',
      name: nameNode ? this.text(nameNode) : '',
      nameToken: this.token(nameNode ?? n),
      type: this.typeRef(typeNode ?? n),
      accessors: accessorList ? this.ofType(accessorList, 'accessor_declaration').map((a) => this.accessor(a)) : [],
      expressionBody: arrow ? this.arrowBody(arrow) : undefined,
      initializer: this.initializerOf(n),
    };
  }

  private accessor(n: Node): Accessor {
    const head = this.firstHeadNode(n, true);
    const m = head ? ACCESSOR_KEYWORD.exec(this.src.slice(head.startIndex, n.endIndex)) : null;
    const keyword = m?.[1];
    const accessorKind: AccessorKind = keyword !== undefined && isAccessorKind(keyword) ? keyword : 'get';
    return {
      kind: 'accessor',
      span: this.span(n),
      text: this.text(n),
      accessorKind,
      body: this.bodyOf(n),
    };
  }

  private field(n: Node, leadingComments: Comment[]): FieldDecl {
    const declaration = this.firstOfType(n, 'variable_declaration') ?? n;
    const typeNode = declaration.childForFieldName('type') ?? this.named(declaration)[0];
    return {
      ...this.memberBase(n, leadingComments),
      kind: 'field',
      type: this.typeRef(typeNode ?? declaration),
      declarators: this.ofType(declaration, 'variable_declarator').map((d) => this.declarator(d)),
    };
  }

  private declarator(n: Node): VariableDeclarator {
    const nameNode = n.childForFieldName('name') ?? this.firstOfType(n, 'identifier');
    return {
      kind: 'variableDeclarator',
      span: this.span(n),
      text: this.text(n),
      name: nameNode ? this.text(nameNode) : this.text(n),
      initializer: this.initializerOf(n),
    };
  }

  private method(n: Node, leadingComments: Comment[]): MethodDecl {
    const params = this.firstOfType(n, 'parameter_list');
    const nameNode = n.childForFieldName('name') ?? this.lastIdentifierBefore(n, params);
    const returnNode =
      n.childForFieldName('returns') ?? n.childForFieldName('type') ?? this.firstHeadNode(n);
    return {
      ...this.memberBase(n, leadingComments),
      kind: 'method',
      name: nameNode ? this.text(nameNode) : '',
      nameToken: this.token(nameNode ?? n),
      returnType: returnNode && !(nameNode && sameNode(returnNode, nameNode)) ? this.text(returnNode) : 'void',
      parameters: params ? this.ofType(params, 'parameter').map((p) => this.parameter(p)) : [],
      body: this.bodyOf(n),
    };
  }

  // -------------------------------------------------------------------------
  // Bodies and statements

  private bodyOf(n: Node): Body | undefined {
    for (const child of n.children) {
      if (child.type === 'block') return this.block(child);
      if (child.type === 'arrow_expression_clause') return this.arrowBody(child);
    }
    return undefined;
  }

  private arrowBody(n: Node): ArrowBody {
    const expr = this.named(n)[0];
    return { kind: 'arrowBody', span: this.span(n), text: this.text(n), expression: this.expression(expr ?? n) };
  }

  private block(n: Node): Block {
    return {
      kind: 'block',
      span: this.span(n),
      text: this.text(n),
      statements: this.named(n).map((s) => this.statement(s)),
    };
  }

  private statement(n: Node): Statement {
    const base = { span: this.span(n), text: this.text(n) };
    const first = this.named(n)[0];
    switch (n.type) {
      case 'expression_statement':
        return { ...base, kind: 'expressionStatement', expression: this.expression(first ?? n) };
      case 'return_statement':
        return { ...base, kind: 'returnStatement', expression: first ? this.expression(first) : undefined };
      default:
        return { ...base, kind: 'otherStatement', expressions: this.named(n).map((c) => this.expression(c)) };
    }
  }

  // -------------------------------------------------------------------------
  // Expressions

  expression(n: Node): Expression {
    const base = { span: this.span(n), text: this.text(n) };
    const named = this.named(n);
    switch (n.type) {
      case 'identifier':
        return { ...base, kind: 'identifier', name: base.text };
      case 'string_literal':
      case 'verbatim_string_literal':
      case 'raw_string_literal':
        return { ...base, kind: 'stringLiteral', value: unquote(base.text) };
      case 'invocation_expression': {
        const callee = n.childForFieldName('function') ?? named[0];
        return {
          ...base,
          kind: 'invocation',
          callee: this.expression(callee ?? n),
          args: this.argumentsOf(n),
        };
      }
      case 'assignment_expression':
      case 'binary_expression': {
        const left = n.childForFieldName('left') ?? named[0];
        const right = n.childForFieldName('right') ?? named[named.length - 1];
        if (!left || !right || sameNode(left, right)) break;
        return {
          ...base,
          kind: n.type === 'assignment_expression' ? 'assignment' : 'binary',
          operator: this.src.slice(left.endIndex, right.startIndex).trim(),
          left: this.expression(left),
          right: this.expression(right),
        };
      }
      case 'lambda_expression':
        return this.lambda(n);
      case 'object_creation_expression': {
        const typeNode = n.childForFieldName('type') ?? named[0];
        return {
          ...base,
          kind: 'objectCreation',
          type: this.typeRef(typeNode ?? n),
          args: this.argumentsOf(n),
        };
      }
      case 'parenthesized_expression':
        if (named[0]) return { ...base, kind: 'parenthesized', inner: this.expression(named[0]) };
        break;
      case 'ref_expression':
        if (named[0]) return { ...base, kind: 'ref', inner: this.expression(named[0]) };
        break;
      case 'member_access_expression': {
        const target = n.childForFieldName('expression') ?? named[0];
        const member = n.childForFieldName('name') ?? named[named.length - 1];
        if (target && member && !sameNode(target, member)) {
          return { ...base, kind: 'memberAccess', target: this.expression(target), member: this.text(member) };
        }
        break;
      }
      default:
        break;
    }
    return { ...base, kind: 'otherExpression', children: named.map((c) => this.expression(c)) };
  }

  private argumentsOf(n: Node): Argument[] {
    const list = this.firstOfType(n, 'argument_list');
    if (!list) return [];
    return this.ofType(list, 'argument').map((a) => this.argument(a));
  }

  private argument(n: Node): Argument {
    const token = n.children.find((c) => isArgumentModifier(c.type));
    const exprNode = this.named(n).filter((c) => c.type !== 'name_colon').pop() ?? n;
    const expression = this.expression(exprNode);
    let modifier: ArgumentModifier | undefined;
    if (token && isArgumentModifier(token.type)) modifier = token.type;
    else if (expression.kind === 'ref') modifier = 'ref';
    return { kind: 'argument', span: this.span(n), text: this.text(n), modifier, expression };
  }

  private lambda(n: Node): Expression {
    const arrowAt = n.children.findIndex((c) => c.type === '=>');
    const head = arrowAt >= 0 ? n.children.slice(0, arrowAt) : [];
    const headNamed = head.filter((c) => c.type !== 'comment' && c.type !== 'attribute_list' && c.type !== 'modifier');
    const paramsNode = n.childForFieldName('parameters') ?? headNamed[headNamed.length - 1];
    const isAsync = head.some((c) => !(paramsNode && sameNode(c, paramsNode)) && /\basync\b/.test(this.text(c)));

    let parameters: Parameter[] = [];
    if (paramsNode?.type === 'parameter_list') {
      parameters = this.ofType(paramsNode, 'parameter').map((p) => this.parameter(p));
    } else if (paramsNode && /^[A-Za-z_@]\w*$/.test(this.text(paramsNode))) {
      parameters = [{ kind: 'parameter', span: this.span(paramsNode), text: this.text(paramsNode), name: this.text(paramsNode) }];
    }

    const bodyNode =
      n.childForFieldName('body') ??
      (arrowAt >= 0 ? n.children.slice(arrowAt + 1).find((c) => c.type !== 'comment' && c.type !== '=>') : undefined);
    let body: LambdaBody;
    if (bodyNode?.type === 'block') body = { kind: 'block', block: this.block(bodyNode) };
    else body = { kind: 'expression', expression: this.expression(bodyNode ?? n) };

    return { kind: 'lambda', span: this.span(n), text: this.text(n), isAsync, parameters, body };
  }

  private parameter(n: Node): Parameter {
    const parts = this.named(n).filter(
      (c) => c.type !== 'attribute_list' && c.type !== 'modifier' && c.type !== 'parameter_modifier',
    );
    const nameNode =
      n.childForFieldName('name') ?? [...parts].reverse().find((c) => c.type === 'identifier') ?? parts[0];
    const at = nameNode ? parts.findIndex((c) => sameNode(c, nameNode)) : -1;
    const typeNode = n.childForFieldName('type') ?? (at > 0 ? parts[at - 1] : undefined);
    return {
      kind: 'parameter',
      span: this.span(n),
      text: this.text(n),
      name: nameNode ? this.text(nameNode) : this.text(n),
      type: typeNode ? this.text(typeNode) : undefined,
    };
  }

  private initializerOf(n: Node): Expression | undefined {
    const clause = this.firstOfType(n, 'equals_value_clause');
    if (clause) {
      const value = this.named(clause)[0];
      return value ? this.expression(value) : undefined;
    }
    const eq = n.children.findIndex((c) => c.type === '=');
    if (eq < 0) return undefined;
    const value = n.children.slice(eq + 1).find((c) => c.type !== 'comment' && c.type !== ';');
    return value ? this.expression(value) : undefined;
  }

  // -------------------------------------------------------------------------
  // Helpers

  private typeRef(n: Node): TypeRef {
    const text = this.text(n);
    return { kind: 'typeRef', span: this.span(n), text, ...parseTypeText(text) };
  }

  private comment(n: Node): Comment {
    return { kind: 'comment', span: this.span(n), text: this.text(n) };
  }

  private token(n: Node): Token {
    return { kind: 'token', span: this.span(n), text: this.text(n) };
  }

  private span(n: Node): Span {
    return { start: n.startIndex, end: n.endIndex };
  }

  private text(n: Node): string {
    return this.src.slice(n.startIndex, n.endIndex);
  }

  private named(n: Node): Node[] {
    return n.namedChildren.filter((c) => c.type !== 'comment');
  }

  private ofType(n: Node, type: string): Node[] {
    return n.namedChildren.filter((c) => c.type === type);
  }

  private firstOfType(n: Node, type: string): Node | undefined {
    return n.namedChildren.find((c) => c.type === type);
  }

  /** First named child after attribute lists and modifiers (the type of a member, or an accessor keyword). */
  private firstHeadNode(n: Node, includeAnonymous = false): Node | undefined {
    const pool = includeAnonymous ? n.children : n.namedChildren;
    return pool.find((c) => c.type !== 'comment' && c.type !== 'attribute_list' && c.type !== 'modifier');
  }

  private identifierAfter(n: Node, after: Node | undefined): Node | undefined {
    const named = this.named(n);
    const from = after ? named.findIndex((c) => sameNode(c, after)) + 1 : 0;
    return named.slice(from).find((c) => c.type === 'identifier');
  }

  private lastIdentifierBefore(n: Node, before: Node | undefined): Node | undefined {
    const named = this.named(n);
    const upTo = before ? named.findIndex((c) => sameNode(c, before)) : named.length;
    return named
      .slice(0, upTo < 0 ? named.length : upTo)
      .reverse()
      .find((c) => c.type === 'identifier');
  }
}

/** web-tree-sitter hands out a fresh wrapper per access, so nodes compare by position. */
function sameNode(a: Node, b: Node): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

function unquote(text: string): string {
  let t = text;
  if (t.startsWith('$')) t = t.slice(1);
  if (t.startsWith('@')) t = t.slice(1);
  const q = /^"+/.exec(t);
  const width = q ? q[0].length : 0;
  if (width === 0) return t;
  return t.slice(width, t.length - width);
}
