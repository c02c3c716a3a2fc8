export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue | undefined };

/**
 * Source of creation-time markers. Returns an ISO 8601 string.
 */
export type Clock = () => string;

/**
 * Source of unique identifiers for pending entries.
 */
export type IdGenerator = () => string;

export const systemClock: Clock = () => new Date().toISOString();

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
