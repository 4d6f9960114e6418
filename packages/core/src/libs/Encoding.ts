/**
 * Canonical JSON: object keys sorted, undefined members dropped, no
 * whitespace. Equal documents always encode to the same string.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(
        Object.entries(value)
          .filter(([, member]) => member !== undefined)
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return value;
  });
}
