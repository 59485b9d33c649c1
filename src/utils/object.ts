/**
 * Utility helpers operating on plain JavaScript objects. Every function stays
 * pure and returns a fresh object.
 */

/** Returns a shallow copy of {@link record} without the listed keys. */
export function omitKeys<V>(record: Record<string, V>, keys: readonly string[]): Record<string, V> {
  const excluded = new Set(keys);
  const result: Record<string, V> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!excluded.has(key)) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Returns a shallow copy of the provided record without any `undefined` values.
 * Used when optional CLI flags or schema outputs surface `undefined` explicitly.
 */
export function omitUndefinedEntries<T extends Record<string, unknown>>(
  entries: T,
): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      (result as Record<keyof T, unknown>)[key] = value;
    }
  }
  return result;
}
