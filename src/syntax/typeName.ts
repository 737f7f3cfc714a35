import type { TypeRef } from './model';

export type ParsedTypeText = {
  name: string;
  typeArguments: string[];
  nullable: boolean;
};

function splitTopLevel(s: string): string[] {
  const out: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of s) {
    if (ch === '<' || ch === '(' || ch === '[') depth++;
    else if (ch === '>' || ch === ')' || ch === ']') depth--;
    if (ch === ',' && depth === 0) {
      out.push(current.trim());
      current = '';
      continue;
    }
    current += ch;
  }
  if (current.trim() !== '') out.push(current.trim());
  return out;
}

/**
 * Splits a written type (`Ns.DelegateCommand<string>?`) into its simple name,
 * type arguments and nullable marker.
 */
export function parseTypeText(text: string): ParsedTypeText {
  let t = text.replace(/\s+/g, ' ').trim();
  const nullable = t.endsWith('?');
  if (nullable) t = t.slice(0, -1).trim();

  let base = t;
  let typeArguments: string[] = [];
  const lt = t.indexOf('<');
  if (lt > 0 && t.endsWith('>')) {
    base = t.slice(0, lt).trim();
    typeArguments = splitTopLevel(t.slice(lt + 1, -1));
  }

  const segments = base.split(/::|\./);
  const name = (segments[segments.length - 1] ?? base).trim().replace(/^@/, '');
  return { name, typeArguments, nullable };
}

/**
 * Name the rules compare against reserved command type names.
 *
 * There is no semantic model behind the tree: the declared type's simple name
 * stands in for the resolved type, so `Mvvm.DelegateCommand<int>` resolves to
 * `DelegateCommand`.
 */
export function resolvedTypeName(type: TypeRef): string {
  return type.name;
}
