/**
 * Object Utilities
 *
 * Narrowing helpers for loosely-shaped JSON documents (architecture,
 * codebase insight) where any field may be missing or of the wrong type.
 */

export type JsonObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * The nested object at `key`, or an empty one
 */
export function objectAt(source: JsonObject | null | undefined, key: string): JsonObject {
  const value = source?.[key];
  return isPlainObject(value) ? value : {};
}

/**
 * Non-empty string at `key`, or the fallback
 */
export function stringAt(source: JsonObject | null | undefined, key: string, fallback = ''): string {
  const value = source?.[key];
  return typeof value === 'string' && value ? value : fallback;
}

/**
 * Array at `key` rendered as strings, or an empty list
 */
export function listAt(source: JsonObject | null | undefined, key: string): string[] {
  const value = source?.[key];
  return Array.isArray(value) ? value.map((item) => (typeof item === 'string' ? item : JSON.stringify(item))) : [];
}
