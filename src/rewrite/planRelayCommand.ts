import { commandStem, relayMethodName } from '../rules/commandNames';
import { ASYNC_RETURN_TYPE, INPUT_NAMESPACE, RELAY_COMMAND } from '../rules/reservedNames';
import type { DelegateCommandMatch } from '../rules/types';
import { findField, type PropertyContext } from '../syntax/query';
import { attributeLine, blockLines, verbatimLines, nameofArg } from './csharpEmit';
import { memberHeadRef, memberRef, removeFieldEdit, singleLine, tokenRef, type Edit, type NewLine, type NewNode } from './edits';

function relayAttribute(match: DelegateCommandMatch): NewLine {
  if (match.canExecuteTargetName === undefined) return attributeLine(RELAY_COMMAND);
  return attributeLine(RELAY_COMMAND, `CanExecute = ${nameofArg(match.canExecuteTargetName)}`);
}

/** Method built around the lambda body (the command-object shape). */
export function relayMethodNode(ctx: PropertyContext, match: DelegateCommandMatch, name: string): NewNode | undefined {
  const body = match.commandBody;
  if (!body) return undefined;
  const returnType = match.isAsync ? `async ${ASYNC_RETURN_TYPE}` : 'void';
  const params = match.parameters.map((p) => `${p.type} ${p.name}`).join(', ');
  const bodyLines: NewLine[] =
    body.kind === 'expression'
      ? [
          { depth: 0, text: '{' },
          { depth: 1, text: `${body.text};` },
          { depth: 0, text: '}' },
        ]
      : blockLines(body.text);
  return {
    kind: 'method',
    lines: [
      ...ctx.property.leadingComments.flatMap((c) => verbatimLines(c, ctx.tree.text)),
      relayAttribute(match),
      { depth: 0, text: `private ${returnType} ${name}(${params})` },
      ...bodyLines,
    ],
  };
}

function cleanupEdits(ctx: PropertyContext, match: DelegateCommandMatch): Edit[] {
  const edits: Edit[] = [{ kind: 'remove', node: memberRef(ctx.property) }];
  if (match.backingFieldName !== undefined) {
    const field = findField(ctx.container, match.backingFieldName);
    if (field) edits.push(removeFieldEdit(field));
  }
  if (match.canExecuteMethod && match.canExecuteMethodRemovable) {
    edits.push({ kind: 'remove', node: memberRef(match.canExecuteMethod) });
  }
  edits.push({ kind: 'ensureImport', namespace: INPUT_NAMESPACE });
  return edits;
}

/**
 * Turns a `DelegateCommand` property into a `[RelayCommand]` method.
 *
 * An existing `Execute<Stem>` method is renamed and annotated in place;
 * otherwise a method is synthesized from the command lambda. Returns
 * `undefined` when neither is available.
 */
export function planRelayCommand(ctx: PropertyContext, match: DelegateCommandMatch): Edit[] | undefined {
  const stem = commandStem(match.propertyName);
  const execute = match.executeMethod;

  if (execute) {
    const name = relayMethodName(stem, execute.modifiers.includes('async'));
    const edits: Edit[] = [
      { kind: 'insertBefore', anchor: memberHeadRef(execute), node: { kind: 'attribute', lines: [relayAttribute(match)] } },
    ];
    if (execute.name !== name) {
      edits.push({ kind: 'replace', node: tokenRef(execute.nameToken), with: singleLine('identifier', name) });
    }
    return [...edits, ...cleanupEdits(ctx, match)];
  }

  const method = relayMethodNode(ctx, match, relayMethodName(stem, match.isAsync));
  if (!method) return undefined;
  return [{ kind: 'insertBefore', anchor: memberRef(ctx.property), node: method }, ...cleanupEdits(ctx, match)];
}
