/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order
 *
 * Reports written twice from the same run are byte-identical.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  const normalized = sortKeysDeep(value);
  return JSON.stringify(normalized, null, space) + '\n';
}

function sortKeysDeep(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (typeof v !== 'object') return v;

  const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const out: Record<string, unknown> = {};
  for (const [k, child] of entries) {
    out[k] = sortKeysDeep(child);
  }
  return out;
}
