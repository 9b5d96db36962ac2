import crypto from 'crypto';

/**
 * HMAC-SHA256 signatures in the `sha256=<hex>` header form.
 *
 * Used in both directions: inbound webhooks are verified with it and
 * outbound callbacks are signed with it, so a callback receiver can run the
 * same `verify` over the bytes it was sent.
 *
 * Always pass the exact bytes that travel on the wire. Re-serialising a
 * parsed body changes whitespace or key order and breaks the signature.
 */

export const SIGNATURE_HEADER = 'X-Webhook-Signature';
export const SIGNATURE_PREFIX = 'sha256=';

const DIGEST_BYTES = 32;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;

export type SignablePayload = Buffer | string;

function toBytes(payload: SignablePayload): Buffer {
  return typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
}

/** Lowercase hex HMAC-SHA256 of `payload` keyed with `secret`. */
export function sign(secret: string, payload: SignablePayload): string {
  return crypto.createHmac('sha256', secret).update(toBytes(payload)).digest('hex');
}

export function formatSignatureHeader(digest: string): string {
  return `${SIGNATURE_PREFIX}${digest}`;
}

export function signatureHeader(secret: string, payload: SignablePayload): string {
  return formatSignatureHeader(sign(secret, payload));
}

/**
 * Checks a presented header value against the payload.
 * Returns false for anything malformed; never throws.
 */
export function verify(
  secret: string,
  payload: SignablePayload,
  presentedHeaderValue: string | undefined | null
): boolean {
  if (typeof presentedHeaderValue !== 'string' || !presentedHeaderValue.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const presentedHex = presentedHeaderValue.slice(SIGNATURE_PREFIX.length);
  if (presentedHex.length !== DIGEST_BYTES * 2 || !HEX_PATTERN.test(presentedHex)) {
    return false;
  }

  const presented = Buffer.from(presentedHex, 'hex');
  const expected = crypto.createHmac('sha256', secret).update(toBytes(payload)).digest();

  // Both sides are exactly 32 bytes here, which timingSafeEqual requires
  return crypto.timingSafeEqual(presented, expected);
}
