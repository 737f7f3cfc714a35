import { resolvedTypeName } from '../syntax/typeName';
import type { PropertyContext } from '../syntax/query';
import { SIMPLE_COMMAND_TYPE } from './descriptors';
import { COMMAND_TYPE } from './reservedNames';
import type { Rule, SimpleCommandMatch } from './types';

export function matchSimpleCommand(ctx: PropertyContext): SimpleCommandMatch | undefined {
  const typeName = resolvedTypeName(ctx.property.type);
  if (typeName !== COMMAND_TYPE) return undefined;
  return { kind: 'simpleCommandProperty', propertyName: ctx.property.name, commandTypeName: typeName };
}

/** Flags `Command` properties for manual migration; there is nothing to derive a method from. */
export const simpleCommandTypeRule: Rule = {
  descriptor: SIMPLE_COMMAND_TYPE,
  detect: (ctx) => matchSimpleCommand(ctx) !== undefined,
};
