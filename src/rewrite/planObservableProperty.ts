import {
  ACCESSIBILITY_MODIFIERS,
  COMPONENT_MODEL_NAMESPACE,
  NOTIFY_PROPERTY_CHANGED_FOR,
  OBSERVABLE_PROPERTY,
} from '../rules/reservedNames';
import type { NotifiedPropertyMatch } from '../rules/types';
import { findField, type PropertyContext } from '../syntax/query';
import { upperFirst } from '../util/casing';
import { attributeLine, verbatimLines, nameofArg } from './csharpEmit';
import { memberRef, removeFieldEdit, type Edit, type NewLine, type NewNode } from './edits';

function modifiersFor(modifiers: string[]): string[] {
  const access = modifiers.filter((m) => ACCESSIBILITY_MODIFIERS.has(m));
  return [...(access.length > 0 ? access : ['public']), 'partial'];
}

export function observablePropertyNode(ctx: PropertyContext, match: NotifiedPropertyMatch): NewNode {
  const { property, tree } = ctx;
  const initializer = property.initializer ?? match.fieldInitializer;
  const declaration =
    `${modifiersFor(property.modifiers).join(' ')} ${property.type.text} ${upperFirst(match.propertyName)} { get; set; }` +
    (initializer ? ` = ${initializer.text};` : '');

  const lines: NewLine[] = [
    ...property.leadingComments.flatMap((c) => verbatimLines(c, tree.text)),
    attributeLine(OBSERVABLE_PROPERTY),
    ...match.notifyTargets.map((t) => attributeLine(NOTIFY_PROPERTY_CHANGED_FOR, nameofArg(t))),
    ...property.attributes.flatMap((a) => verbatimLines(a, tree.text)),
    { depth: 0, text: declaration },
  ];
  return { kind: 'property', lines };
}

/**
 * Replaces a manually notified property with an `[ObservableProperty]` partial
 * auto-property and drops its backing field.
 */
export function planObservableProperty(ctx: PropertyContext, match: NotifiedPropertyMatch): Edit[] {
  const anchor = memberRef(ctx.property);
  const edits: Edit[] = [
    { kind: 'insertBefore', anchor, node: observablePropertyNode(ctx, match) },
    { kind: 'remove', node: anchor },
  ];
  if (match.backingFieldName !== undefined) {
    const field = findField(ctx.container, match.backingFieldName);
    if (field) edits.push(removeFieldEdit(field));
  }
  edits.push({ kind: 'ensureImport', namespace: COMPONENT_MODEL_NAMESPACE });
  return edits;
}
