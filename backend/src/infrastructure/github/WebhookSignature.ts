import { createHmac, timingSafeEqual } from 'crypto';

const SIGNATURE_PATTERN = /^sha256=([0-9a-f]{64})$/i;

/**
 * Checks an X-Hub-Signature-256 header against the HMAC-SHA256 of the raw
 * request body. Only sha256 signatures are accepted.
 */
export function validateWebhookSignature(
  rawBody: Buffer | string,
  signatureHeader: string | null | undefined,
  secret: string,
): boolean {
  if (!signatureHeader || !secret) {
    return false;
  }
  const match = signatureHeader.trim().match(SIGNATURE_PATTERN);
  if (!match) {
    return false;
  }

  const provided = Buffer.from(match[1].toLowerCase(), 'hex');
  const computed = createHmac('sha256', secret).update(rawBody).digest();
  if (provided.length !== computed.length) {
    return false;
  }
  return timingSafeEqual(provided, computed);
}

export function signWebhookPayload(rawBody: Buffer | string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(rawBody).digest('hex')}`;
}
