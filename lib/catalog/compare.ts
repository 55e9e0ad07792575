function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/**
 * JSON with object keys sorted and `skipKeys` left out at every depth, so
 * rows built in a different key order compare equal.
 */
export function stableJson(value: unknown, skipKeys: ReadonlySet<string> = new Set()): string {
  return JSON.stringify(value, (key, v: unknown) => {
    if (skipKeys.has(key)) return undefined;
    if (!isRecord(v)) return v;
    return Object.fromEntries(Object.keys(v).sort().map((k) => [k, v[k]]));
  });
}
