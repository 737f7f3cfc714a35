/**
 * Read-only C# syntax model consumed by the rules and planners.
 *
 * Only the shapes the migration rules look at are modelled precisely; anything
 * else collapses into an `other` node that still carries its span and text.
 */

export type Span = {
  /** Offset of the first character (UTF-16 code units). */
  start: number;
  /** Offset just past the last character. */
  end: number;
};

export type SyntaxBase = {
  span: Span;
  text: string;
};

export type Comment = SyntaxBase & { kind: 'comment' };

// ---------------------------------------------------------------------------
// Expressions

export type IdentifierExpr = SyntaxBase & { kind: 'identifier'; name: string };

export type StringLiteralExpr = SyntaxBase & { kind: 'stringLiteral'; value: string };

export type ArgumentModifier = 'ref' | 'out' | 'in';

export type Argument = SyntaxBase & {
  kind: 'argument';
  modifier?: ArgumentModifier;
  expression: Expression;
};

export type InvocationExpr = SyntaxBase & {
  kind: 'invocation';
  callee: Expression;
  args: Argument[];
};

export type AssignmentExpr = SyntaxBase & {
  kind: 'assignment';
  /** `=`, `??=`, `+=`, ... */
  operator: string;
  left: Expression;
  right: Expression;
};

export type BinaryExpr = SyntaxBase & {
  kind: 'binary';
  operator: string;
  left: Expression;
  right: Expression;
};

export type Parameter = SyntaxBase & {
  kind: 'parameter';
  name: string;
  /** Declared type text; absent for implicitly typed lambda parameters. */
  type?: string;
};

export type LambdaBody =
  | { kind: 'expression'; expression: Expression }
  | { kind: 'block'; block: Block };

export type LambdaExpr = SyntaxBase & {
  kind: 'lambda';
  isAsync: boolean;
  parameters: Parameter[];
  body: LambdaBody;
};

export type ObjectCreationExpr = SyntaxBase & {
  kind: 'objectCreation';
  type: TypeRef;
  args: Argument[];
};

export type ParenthesizedExpr = SyntaxBase & { kind: 'parenthesized'; inner: Expression };

export type RefExpr = SyntaxBase & { kind: 'ref'; inner: Expression };

export type MemberAccessExpr = SyntaxBase & { kind: 'memberAccess'; target: Expression; member: string };

export type OtherExpr = SyntaxBase & { kind: 'otherExpression'; children: Expression[] };

export type Expression =
  | IdentifierExpr
  | StringLiteralExpr
  | InvocationExpr
  | AssignmentExpr
  | BinaryExpr
  | LambdaExpr
  | ObjectCreationExpr
  | ParenthesizedExpr
  | RefExpr
  | MemberAccessExpr
  | OtherExpr;

// ---------------------------------------------------------------------------
// Statements

export type ExpressionStatement = SyntaxBase & { kind: 'expressionStatement'; expression: Expression };

export type ReturnStatement = SyntaxBase & { kind: 'returnStatement'; expression?: Expression };

export type OtherStatement = SyntaxBase & { kind: 'otherStatement'; expressions: Expression[] };

export type Statement = ExpressionStatement | ReturnStatement | OtherStatement;

export type Block = SyntaxBase & { kind: 'block'; statements: Statement[] };

/** `=> expr` body of a property, accessor or method. */
export type ArrowBody = SyntaxBase & { kind: 'arrowBody'; expression: Expression };

export type Body = Block | ArrowBody;

// ---------------------------------------------------------------------------
// Declarations

/** Declared type as written; `name` is the simple name without qualification or type arguments. */
export type TypeRef = SyntaxBase & {
  kind: 'typeRef';
  name: string;
  typeArguments: string[];
  nullable: boolean;
};

export type AttributeList = SyntaxBase & { kind: 'attributeList' };

export type Token = SyntaxBase & { kind: 'token' };

export type AccessorKind = 'get' | 'set' | 'init' | 'add' | 'remove';

export type Accessor = SyntaxBase & {
  kind: 'accessor';
  accessorKind: AccessorKind;
  body?: Body;
};

type MemberBase = SyntaxBase & {
  /** Comment trivia above the member that belongs to it (previous token's line excluded). */
  leadingComments: Comment[];
  attributes: AttributeList[];
  modifiers: string[];
  /** First token after the attribute lists: where a new attribute line goes. */
  headStart: number;
};

export type PropertyDecl = MemberBase & {
  kind: 'property';
  name: string;
  nameToken: Token;
  type: TypeRef;
  accessors: Accessor[];
  expressionBody?: ArrowBody;
  initializer?: Expression;
};

export type VariableDeclarator = SyntaxBase & {
  kind: 'variableDeclarator';
  name: string;
  initializer?: Expression;
};

export type FieldDecl = MemberBase & {
  kind: 'field';
  type: TypeRef;
  declarators: VariableDeclarator[];
};

export type MethodDecl = MemberBase & {
  kind: 'method';
  name: string;
  nameToken: Token;
  returnType: string;
  parameters: Parameter[];
  body?: Body;
};

export type OtherMember = MemberBase & { kind: 'otherMember' };

export type TypeDeclKind = 'class' | 'struct' | 'record' | 'interface';

export type TypeDecl = MemberBase & {
  kind: 'typeDecl';
  declKind: TypeDeclKind;
  name: string;
  members: Member[];
};

export type Member = PropertyDecl | FieldDecl | MethodDecl | TypeDecl | OtherMember;

export type UsingDirective = SyntaxBase & {
  kind: 'using';
  /** Imported namespace (alias target for `using X = Y;`). */
  namespace: string;
  /** `X` in `using X = Y;`. */
  alias?: string;
  isGlobal: boolean;
  isStatic: boolean;
};

export type CompilationUnit = SyntaxBase & {
  kind: 'compilationUnit';
  /** Using directives at the top of the file, in source order. */
  usings: UsingDirective[];
  /** Using directives declared inside namespace blocks. */
  nestedUsings: UsingDirective[];
  /** Every type declaration in the file, nested ones included, in source order. */
  types: TypeDecl[];
  /** Start offset of the first top-level item after the header comments. */
  firstItemStart: number;
};

export type SyntaxTree = {
  text: string;
  /** SHA-256 of `text`; identifies the snapshot. */
  checksum: string;
  root: CompilationUnit;
};
