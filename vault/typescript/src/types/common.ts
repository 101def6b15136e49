/**
 * Shared value types.
 * @module types
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * A secret: field names mapped to arbitrary JSON values. Field names are
 * stored and returned exactly as given.
 */
export type Secret = JsonObject;

/**
 * A normalized response envelope. Recognized top-level members are `auth`,
 * `data`, `lease-duration`, `lease-id`, `renewable`, `wrap-info` and
 * `warnings`; every member except `data` has hyphenated keys.
 */
export type ResponseEnvelope = JsonObject;
