/** JSON with object keys sorted, so equal values always print the same. */
export function stableStringify(value: unknown, indent?: number): string {
  return JSON.stringify(value, (_key, val: unknown) => {
    if (typeof val === 'object' && val !== null && !Array.isArray(val)) {
      const sorted: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(val).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[key] = entry;
      }
      return sorted;
    }
    return val;
  }, indent);
}
