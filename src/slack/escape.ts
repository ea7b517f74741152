import { isJsonObject, type JsonObject, type JsonValue } from './json.js';

/**
 * Backslash-escape single and double quotes. Slack markup metacharacters
 * (`&`, `<`, `>`) are left alone; callers entity-encode those themselves.
 */
export function escapeQuotes(text: string): string {
  return text.replace(/['"]/g, (quote) => `\\${quote}`);
}

/**
 * Walk a JSON tree and escape quotes in string values stored under one of
 * `keys`. Returns a new tree; the input is left untouched.
 */
export function escapeTree(value: JsonValue, keys: readonly string[]): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => escapeTree(item, keys));
  }
  if (isJsonObject(value)) {
    return escapeObject(value, keys);
  }
  return value;
}

export function escapeObject(obj: JsonObject, keys: readonly string[]): JsonObject {
  const escaped: JsonObject = {};
  for (const [key, value] of Object.entries(obj)) {
    escaped[key] = typeof value === 'string' && keys.includes(key)
      ? escapeQuotes(value)
      : escapeTree(value, keys);
  }
  return escaped;
}
