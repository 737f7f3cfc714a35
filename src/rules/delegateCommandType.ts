import { planRelayCommand } from '../rewrite/planRelayCommand';
import type { Expression, LambdaExpr, MethodDecl, PropertyDecl, TypeDecl } from '../syntax/model';
import {
  findField,
  findMethod,
  firstLambda,
  firstObjectCreationOf,
  unwrapParentheses,
  type PropertyContext,
} from '../syntax/query';
import { resolvedTypeName } from '../syntax/typeName';
import { lowerFirst } from '../util/casing';
import { DELEGATE_COMMAND_TYPE } from './descriptors';
import { commandStem } from './commandNames';
import {
  CAN_EXECUTE_PREFIX,
  COMMAND_SUFFIX,
  DELEGATE_COMMAND_TYPE as DELEGATE_COMMAND_TYPE_NAME,
  EXECUTE_PREFIX,
} from './reservedNames';
import type { CommandBody, CommandParameter, DelegateCommandMatch, Rule } from './types';

/** Expression body, getter expression body, or the getter's first `return`. */
export function commandValueExpression(property: PropertyDecl): Expression | undefined {
  if (property.expressionBody) return property.expressionBody.expression;
  const getter = property.accessors.find((a) => a.accessorKind === 'get');
  const body = getter?.body;
  if (!body) return undefined;
  if (body.kind === 'arrowBody') return body.expression;
  for (const stmt of body.statements) {
    if (stmt.kind === 'returnStatement') return stmt.expression;
  }
  return undefined;
}

function backingFieldOf(property: PropertyDecl, container: TypeDecl, stem: string): string | undefined {
  const value = commandValueExpression(property);
  if (value) {
    const e = unwrapParentheses(value);
    if ((e.kind === 'binary' && e.operator === '??') || (e.kind === 'assignment' && e.operator === '??=')) {
      const left = unwrapParentheses(e.left);
      if (left.kind === 'identifier') return left.name;
    }
  }
  const conventional = `_${lowerFirst(stem)}${COMMAND_SUFFIX}`;
  return findField(container, conventional) ? conventional : undefined;
}

function commandTypeArguments(property: PropertyDecl): string[] {
  if (property.type.typeArguments.length > 0) return property.type.typeArguments;
  return firstObjectCreationOf(property, DELEGATE_COMMAND_TYPE_NAME)?.type.typeArguments ?? [];
}

function lambdaParameters(lambda: LambdaExpr, typeArguments: string[]): CommandParameter[] {
  return lambda.parameters.map((p, i) => ({ name: p.name, type: p.type ?? typeArguments[i] ?? 'object' }));
}

function lambdaBody(lambda: LambdaExpr): CommandBody {
  if (lambda.body.kind === 'expression') return { kind: 'expression', text: lambda.body.expression.text };
  const statements = lambda.body.block.statements;
  const only = statements.length === 1 ? statements[0] : undefined;
  if (only?.kind === 'expressionStatement') return { kind: 'expression', text: only.expression.text };
  return { kind: 'block', text: lambda.body.block.text };
}

/** `return x;` or `=> x` with a plain identifier. */
function returnedIdentifier(method: MethodDecl): string | undefined {
  const body = method.body;
  if (!body) return undefined;
  let value: Expression | undefined;
  if (body.kind === 'arrowBody') value = body.expression;
  else {
    const only = body.statements.length === 1 ? body.statements[0] : undefined;
    if (only?.kind === 'returnStatement') value = only.expression;
  }
  if (!value) return undefined;
  const e = unwrapParentheses(value);
  return e.kind === 'identifier' ? e.name : undefined;
}

function conventionalMethod(container: TypeDecl, prefix: string, stem: string, propertyName: string): MethodDecl | undefined {
  return findMethod(container, prefix + stem) ?? findMethod(container, prefix + propertyName);
}

export function extractDelegateCommand(ctx: PropertyContext): DelegateCommandMatch {
  const { property, container } = ctx;
  const stem = commandStem(property.name);
  const lambda = firstLambda(property);
  const executeMethod = conventionalMethod(container, EXECUTE_PREFIX, stem, property.name);
  const canExecuteMethod = conventionalMethod(container, CAN_EXECUTE_PREFIX, stem, property.name);
  const wrapped = canExecuteMethod ? returnedIdentifier(canExecuteMethod) : undefined;

  return {
    kind: 'delegateCommandProperty',
    propertyName: property.name,
    backingFieldName: backingFieldOf(property, container, stem),
    executeMethod,
    canExecuteMethod,
    commandBody: lambda ? lambdaBody(lambda) : undefined,
    parameters: lambda ? lambdaParameters(lambda, commandTypeArguments(property)) : [],
    isAsync: lambda?.isAsync ?? false,
    canExecuteTargetName: wrapped ?? canExecuteMethod?.name,
    canExecuteMethodRemovable: wrapped !== undefined,
  };
}

export const delegateCommandTypeRule: Rule = {
  descriptor: DELEGATE_COMMAND_TYPE,
  detect: (ctx) => resolvedTypeName(ctx.property.type) === DELEGATE_COMMAND_TYPE_NAME,
  plan(ctx, checkpoint) {
    const match = extractDelegateCommand(ctx);
    checkpoint();
    return planRelayCommand(ctx, match);
  },
};
