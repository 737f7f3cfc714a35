import type {
  Body,
  Expression,
  FieldDecl,
  LambdaExpr,
  MethodDecl,
  ObjectCreationExpr,
  PropertyDecl,
  Statement,
  SyntaxTree,
  TypeDecl,
  VariableDeclarator,
} from './model';

export type PropertyContext = {
  tree: SyntaxTree;
  property: PropertyDecl;
  /** Type declaration that directly declares the property. */
  container: TypeDecl;
};

/** Every property of every type declaration, in source order of their containers. */
export function* propertiesOf(tree: SyntaxTree): Generator<PropertyContext> {
  for (const container of tree.root.types) {
    for (const member of container.members) {
      if (member.kind === 'property') yield { tree, property: member, container };
    }
  }
}

/** Finds the property whose name token starts at `offset`. */
export function findPropertyAt(tree: SyntaxTree, offset: number): PropertyContext | undefined {
  for (const ctx of propertiesOf(tree)) {
    if (ctx.property.nameToken.span.start === offset) return ctx;
  }
  return undefined;
}

export type FieldMatch = { field: FieldDecl; declarator: VariableDeclarator };

export function findField(container: TypeDecl, name: string): FieldMatch | undefined {
  for (const member of container.members) {
    if (member.kind !== 'field') continue;
    const declarator = member.declarators.find((d) => d.name === name);
    if (declarator) return { field: member, declarator };
  }
  return undefined;
}

export function findMethod(container: TypeDecl, name: string): MethodDecl | undefined {
  for (const member of container.members) {
    if (member.kind === 'method' && member.name === name) return member;
  }
  return undefined;
}

export function unwrapParentheses(expr: Expression): Expression {
  let e = expr;
  while (e.kind === 'parenthesized') e = e.inner;
  return e;
}

/** Callee name of `Name(...)`; member-access calls (`this.Name(...)`) do not count. */
export function invokedName(expr: Expression): string | undefined {
  if (expr.kind !== 'invocation' || expr.callee.kind !== 'identifier') return undefined;
  return expr.callee.name;
}

function childExpressions(expr: Expression): Expression[] {
  switch (expr.kind) {
    case 'identifier':
    case 'stringLiteral':
      return [];
    case 'invocation':
      return [expr.callee, ...expr.args.map((a) => a.expression)];
    case 'assignment':
    case 'binary':
      return [expr.left, expr.right];
    case 'lambda':
      return expr.body.kind === 'expression'
        ? [expr.body.expression]
        : expr.body.block.statements.flatMap(statementExpressions);
    case 'objectCreation':
      return expr.args.map((a) => a.expression);
    case 'parenthesized':
    case 'ref':
      return [expr.inner];
    case 'memberAccess':
      return [expr.target];
    case 'otherExpression':
      return expr.children;
  }
}

function statementExpressions(stmt: Statement): Expression[] {
  switch (stmt.kind) {
    case 'expressionStatement':
      return [stmt.expression];
    case 'returnStatement':
      return stmt.expression ? [stmt.expression] : [];
    case 'otherStatement':
      return stmt.expressions;
  }
}

function bodyExpressions(body: Body | undefined): Expression[] {
  if (!body) return [];
  return body.kind === 'arrowBody' ? [body.expression] : body.statements.flatMap(statementExpressions);
}

/** Top-level expressions of a property: expression body, accessor bodies, initializer. */
export function propertyExpressions(property: PropertyDecl): Expression[] {
  const out: Expression[] = [];
  if (property.expressionBody) out.push(property.expressionBody.expression);
  for (const accessor of property.accessors) out.push(...bodyExpressions(accessor.body));
  if (property.initializer) out.push(property.initializer);
  return out;
}

/** Depth-first, pre-order walk in source order. */
export function* descendants(roots: Expression[]): Generator<Expression> {
  for (const root of roots) {
    yield root;
    yield* descendants(childExpressions(root));
  }
}

export function firstLambda(property: PropertyDecl): LambdaExpr | undefined {
  for (const e of descendants(propertyExpressions(property))) {
    if (e.kind === 'lambda') return e;
  }
  return undefined;
}

export function firstObjectCreationOf(property: PropertyDecl, typeName: string): ObjectCreationExpr | undefined {
  for (const e of descendants(propertyExpressions(property))) {
    if (e.kind === 'objectCreation' && e.type.name === typeName) return e;
  }
  return undefined;
}
