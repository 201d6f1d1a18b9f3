/**
 * JSON values carried in token claims and account API payloads.
 *
 * Claim values arrive untyped; every accessor narrows them through the
 * converters below instead of casting.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Narrow an `unknown` (e.g. a decoded JWT payload entry) to a JsonValue.
 * Returns undefined for values JSON cannot represent.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object': {
      if (Array.isArray(value)) {
        const items: JsonValue[] = [];
        for (const item of value) {
          const converted = toJsonValue(item);
          if (converted === undefined) return undefined;
          items.push(converted);
        }
        return items;
      }
      const result: JsonObject = {};
      for (const [key, entry] of Object.entries(value)) {
        const converted = toJsonValue(entry);
        if (converted !== undefined) {
          result[key] = converted;
        }
      }
      return result;
    }
    default:
      return undefined;
  }
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asJsonObject(value: JsonValue | undefined): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

export function asString(value: JsonValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function asBoolean(value: JsonValue | undefined): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

export function asInteger(value: JsonValue | undefined): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

/** An array whose every element is a string; anything else is undefined. */
export function asStringArray(value: JsonValue | undefined): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return undefined;
    strings.push(item);
  }
  return strings;
}

/** Accepts a boolean, or exactly "true"/"false". */
export function toLooseBoolean(value: JsonValue | undefined): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

/** Accepts an integer, or a string holding only an optionally signed integer. */
export function toLooseInteger(value: JsonValue | undefined): number | undefined {
  const integer = asInteger(value);
  if (integer !== undefined) return integer;
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Any value as text: strings as-is, everything else as its JSON form. */
export function toDisplayString(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
