/**
 * JSON variant tree used for embedded page payloads.
 * Values come straight out of JSON.parse and are narrowed at each access.
 */
export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}
