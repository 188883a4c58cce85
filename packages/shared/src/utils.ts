/**
 * Tidewater - Wire Helpers
 * Encoders for the gateway's form bodies, signed JSON and nonces
 */

import type { JsonObject, JsonValue, QueryParams, QueryValue } from './types/json.types.js';

/**
 * Percent-encodes a form component. Only `A-Z a-z 0-9 - _ .` stay literal
 * and spaces become `+`.
 */
export function encodeQueryComponent(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*~]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, '+');
}

/**
 * Builds a form body. Nested values become `key[sub]=value`, booleans
 * become 1/0 and null or undefined values are left out.
 */
export function buildQueryString(data: QueryParams): string {
  const pairs: string[] = [];

  const append = (key: string, value: QueryValue): void => {
    if (value === null || value === undefined) {
      return;
    }

    if (Array.isArray(value)) {
      value.forEach((item, index) => append(`${key}[${index}]`, item));
      return;
    }

    if (typeof value === 'object') {
      for (const [subKey, item] of Object.entries(value)) {
        append(`${key}[${subKey}]`, item);
      }
      return;
    }

    const scalar = typeof value === 'boolean' ? (value ? '1' : '0') : String(value);
    pairs.push(`${encodeQueryComponent(key)}=${encodeQueryComponent(scalar)}`);
  };

  for (const [key, value] of Object.entries(data)) {
    append(key, value);
  }

  return pairs.join('&');
}

function encodeJsonString(text: string): string {
  return JSON.stringify(text)
    .replace(/\//g, '\\/')
    .replace(/[\u0080-\uffff]/g, (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

function isListShaped(keys: string[]): boolean {
  return keys.every((key, index) => key === String(index));
}

/**
 * Encodes a value in the canonical JSON form the gateway signs: escaped
 * slashes, `\uXXXX` for anything outside ASCII, and objects keyed `0..n-1`
 * (the empty object included) written as arrays.
 */
export function encodeGatewayJson(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }

  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  if (typeof value === 'number') {
    return JSON.stringify(value);
  }

  if (typeof value === 'string') {
    return encodeJsonString(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => encodeGatewayJson(item)).join(',')}]`;
  }

  const object: JsonObject = value;
  const keys = Object.keys(object);
  if (isListShaped(keys)) {
    return `[${keys.map((key) => encodeGatewayJson(object[key])).join(',')}]`;
  }

  const members = keys.map((key) => `${encodeJsonString(key)}:${encodeGatewayJson(object[key])}`);
  return `{${members.join(',')}}`;
}

/**
 * Base64 of the canonical JSON encoding
 */
export function encodeBase64Json(value: JsonValue): string {
  return Buffer.from(encodeGatewayJson(value), 'utf8').toString('base64');
}

/**
 * Current wall-clock time in microseconds
 */
export function currentMicros(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * Creates a request nonce: Unix seconds followed by six microsecond digits
 */
export function createNonce(nowMicros: number = currentMicros()): string {
  const seconds = Math.floor(nowMicros / 1_000_000);
  const micros = nowMicros % 1_000_000;
  return `${seconds}${String(micros).padStart(6, '0')}`;
}

/**
 * Narrows a decoded JSON value to a plain object
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses JSON text; throws `SyntaxError` on malformed input
 */
export function decodeJson(text: string): JsonValue {
  const value: JsonValue = JSON.parse(text);
  return value;
}
