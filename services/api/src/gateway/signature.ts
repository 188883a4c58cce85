/**
 * Signature codec for the update gateway.
 *
 * Requests are authenticated with an HMAC-SHA512 over the form body, keyed
 * with the base64-decoded API secret. Responses carry an RSA signature made
 * by the gateway over the base64 of its canonical JSON encoding.
 */
import * as crypto from 'crypto';
import {
  buildQueryString,
  encodeBase64Json,
  GATEWAY,
  type JsonValue,
  type QueryParams,
} from '@tidewater/shared';

/**
 * Signs an outbound payload. Identical input always yields the same MAC.
 */
export function sign(payload: QueryParams, secret: string): string {
  return crypto
    .createHmac('sha512', Buffer.from(secret, 'base64'))
    .update(buildQueryString(payload))
    .digest('base64');
}

/**
 * The exact bytes the gateway signs for a decoded response body.
 */
export function canonicalizeResponse(payload: JsonValue): Buffer {
  return Buffer.from(encodeBase64Json(payload), 'utf8');
}

/**
 * Verifies a gateway response signature. An empty or malformed signature,
 * or an unusable key, yields `false`.
 */
export function verify(
  payload: JsonValue,
  signature: string,
  publicKey: string,
  algorithm: string = GATEWAY.DEFAULT_SIGNATURE_ALGORITHM,
): boolean {
  if (!signature) {
    return false;
  }

  const decoded = Buffer.from(signature, 'base64');
  if (decoded.length === 0) {
    return false;
  }

  try {
    return crypto.verify(algorithm, canonicalizeResponse(payload), publicKey, decoded);
  } catch {
    return false;
  }
}
