import { planObservableProperty } from '../rewrite/planObservableProperty';
import type { Accessor, Expression, PropertyDecl } from '../syntax/model';
import { findField, invokedName, unwrapParentheses, type PropertyContext } from '../syntax/query';
import { NOTIFIED_SETTER } from './descriptors';
import { ANNOUNCE_CHANGE, COMPARE_AND_ASSIGN, NAMEOF } from './reservedNames';
import type { NotifiedPropertyMatch, Rule } from './types';

function setterOf(property: PropertyDecl): Accessor | undefined {
  return property.accessors.find((a) => a.accessorKind === 'set' && a.body !== undefined);
}

/** Top-level statement expressions of a setter; `set => expr;` counts as one statement. */
export function setterStatements(setter: Accessor): Expression[] {
  const body = setter.body;
  if (!body) return [];
  if (body.kind === 'arrowBody') return [body.expression];
  const out: Expression[] = [];
  for (const stmt of body.statements) {
    if (stmt.kind === 'expressionStatement') out.push(stmt.expression);
  }
  return out;
}

function isAnnounceChange(expr: Expression): boolean {
  return expr.kind === 'invocation' && invokedName(expr) === ANNOUNCE_CHANGE && expr.args.length <= 1;
}

function isCompareAndAssign(expr: Expression): boolean {
  return (
    expr.kind === 'invocation' &&
    invokedName(expr) === COMPARE_AND_ASSIGN &&
    expr.args.length >= 2 &&
    expr.args[0].modifier === 'ref'
  );
}

/** `field`, or `this.field`. */
function assignedFieldName(target: Expression): string | undefined {
  const e = unwrapParentheses(target);
  if (e.kind === 'identifier') return e.name;
  if (e.kind === 'memberAccess' && e.target.kind === 'otherExpression' && e.target.text === 'this') return e.member;
  return undefined;
}

/** Member named by `nameof(X)`, `nameof(this.X)` or `"X"`. */
function announcedName(arg: Expression): string | undefined {
  const e = unwrapParentheses(arg);
  if (e.kind === 'stringLiteral') return e.value;
  if (e.kind !== 'invocation' || invokedName(e) !== NAMEOF || e.args.length !== 1) return undefined;
  const named = unwrapParentheses(e.args[0].expression);
  if (named.kind === 'identifier') return named.name;
  if (named.kind === 'memberAccess') return named.member;
  return undefined;
}

type SetterFacts = { backingFieldName?: string; notifyTargets: string[] };

function foldStatement(propertyName: string, acc: SetterFacts, expr: Expression): SetterFacts {
  if (expr.kind === 'assignment' && expr.operator === '=') {
    const field = assignedFieldName(expr.left);
    return field === undefined ? acc : { ...acc, backingFieldName: field };
  }
  if (expr.kind !== 'invocation') return acc;

  const name = invokedName(expr);
  if (name === COMPARE_AND_ASSIGN && expr.args.length > 0) {
    const first = unwrapParentheses(expr.args[0].expression);
    const field = assignedFieldName(first.kind === 'ref' ? first.inner : first);
    return field === undefined ? acc : { ...acc, backingFieldName: field };
  }
  if (name === ANNOUNCE_CHANGE && expr.args.length === 1) {
    const target = announcedName(expr.args[0].expression);
    if (target === undefined || target === propertyName || acc.notifyTargets.includes(target)) return acc;
    return { ...acc, notifyTargets: [...acc.notifyTargets, target] };
  }
  return acc;
}

export function detectNotifiedSetter(property: PropertyDecl): boolean {
  const setter = setterOf(property);
  if (!setter) return false;
  return setterStatements(setter).some((e) => isAnnounceChange(e) || isCompareAndAssign(e));
}

/**
 * Folds the setter in source order: the last assignment or compare-and-assign
 * call names the backing field, announce calls collect the notify targets.
 */
export function extractNotifiedProperty(ctx: PropertyContext): NotifiedPropertyMatch | undefined {
  const { property, container } = ctx;
  const setter = setterOf(property);
  if (!setter) return undefined;

  const facts = setterStatements(setter).reduce<SetterFacts>(
    (acc, expr) => foldStatement(property.name, acc, expr),
    { notifyTargets: [] },
  );
  const field = facts.backingFieldName === undefined ? undefined : findField(container, facts.backingFieldName);
  return {
    kind: 'notifiedProperty',
    propertyName: property.name,
    propertyType: property.type,
    backingFieldName: facts.backingFieldName,
    fieldInitializer: field?.declarator.initializer,
    notifyTargets: facts.notifyTargets,
  };
}

export const notifiedSetterRule: Rule = {
  descriptor: NOTIFIED_SETTER,
  detect: (ctx) => detectNotifiedSetter(ctx.property),
  plan(ctx, checkpoint) {
    const match = extractNotifiedProperty(ctx);
    if (!match) return undefined;
    checkpoint();
    return planObservableProperty(ctx, match);
  },
};
