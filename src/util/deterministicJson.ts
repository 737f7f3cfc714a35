/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order (sort arrays before serializing)
 *
 * Reports and inventories diff cleanly in version control.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  const normalized = sortKeysDeep(value);
  return JSON.stringify(normalized, null, space) + '\n';
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function sortKeysDeep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (!isPlainObject(v)) return v;

  const out: Record<string, unknown> = {};
  for (const k of Object.keys(v).sort()) {
    const child = v[k];
    if (child !== undefined) out[k] = sortKeysDeep(child);
  }
  return out;
}
