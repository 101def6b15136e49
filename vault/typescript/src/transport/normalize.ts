/**
 * Key-case normalization between the wire format (`lease_duration`) and the
 * client's envelope format (`lease-duration`).
 *
 * The `data` member of an envelope holds caller-defined secret field names
 * and is never rewritten.
 *
 * @module transport/normalize
 */

import { DeserializationError } from '../errors/categories.js';
import type { JsonObject, JsonValue, ResponseEnvelope } from '../types/common.js';

/**
 * Rewrites every mapping key in `value`, replacing each occurrence of `find`
 * with `replace`. Walks into nested objects and arrays; scalars are returned
 * as they are.
 */
export function swapKeyChars(value: JsonValue, find: string, replace: string): JsonValue {
  if (Array.isArray(value)) {
    return value.map((item) => swapKeyChars(item, find, replace));
  }
  if (isJsonObject(value)) {
    const result: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
      setMember(result, key.split(find).join(replace), swapKeyChars(child, find, replace));
    }
    return result;
  }
  return value;
}

/** `lease_id` → `lease-id` */
export function kebabifyKeys(value: JsonValue): JsonValue {
  return swapKeyChars(value, '_', '-');
}

/** `lease-id` → `lease_id` */
export function snakeifyKeys(value: JsonValue): JsonValue {
  return swapKeyChars(value, '-', '_');
}

/**
 * Defines `key` as an own data property; plain assignment would treat a
 * `__proto__` key as a prototype change.
 */
function setMember(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Applies `rewrite` to every top-level member except `data`, which is
 * re-attached untouched, then drops top-level members that are null.
 */
function rewriteEnvelope(envelope: JsonObject, rewrite: (value: JsonValue) => JsonValue): JsonObject {
  const { data, ...rest } = envelope;
  const rewritten = rewrite(rest);
  const result: JsonObject = {};

  if (isJsonObject(rewritten)) {
    for (const [key, value] of Object.entries(rewritten)) {
      if (value !== null && value !== undefined) {
        setMember(result, key, value);
      }
    }
  }
  if (data !== null && data !== undefined) {
    result.data = data;
  }
  return result;
}

/**
 * Converts a parsed wire envelope into the client's envelope format.
 */
export function normalizeEnvelope(envelope: JsonObject): ResponseEnvelope {
  return rewriteEnvelope(envelope, kebabifyKeys);
}

/**
 * Converts a client envelope back into wire format.
 */
export function denormalizeEnvelope(envelope: ResponseEnvelope): JsonObject {
  return rewriteEnvelope(envelope, snakeifyKeys);
}

/**
 * Parses a raw response body. An empty body (e.g. a 204) yields `undefined`.
 *
 * @throws {DeserializationError} If the body is not a JSON object
 */
export function cleanBody(body: string): ResponseEnvelope | undefined {
  if (body.trim() === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new DeserializationError('Failed to parse JSON response', error);
  }

  if (!isJsonObject(parsed)) {
    throw new DeserializationError(`Expected a JSON object response, got: ${body.slice(0, 100)}`);
  }
  return normalizeEnvelope(parsed);
}
