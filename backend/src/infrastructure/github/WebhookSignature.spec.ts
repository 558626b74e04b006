import { createHmac } from 'crypto';
import { signWebhookPayload, validateWebhookSignature } from './WebhookSignature';

describe('validateWebhookSignature', () => {
  const secret = 'test-secret';
  const body = Buffer.from('{"action":"opened","number":7}');
  const signature = `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;

  it('should accept a matching signature', () => {
    expect(validateWebhookSignature(body, signature, secret)).toBe(true);
  });

  it('should accept a string body and an upper-case digest', () => {
    const upper = `sha256=${signature.slice('sha256='.length).toUpperCase()}`;

    expect(validateWebhookSignature(body.toString('utf8'), upper, secret)).toBe(true);
  });

  it('should reject a missing header', () => {
    expect(validateWebhookSignature(body, undefined, secret)).toBe(false);
    expect(validateWebhookSignature(body, '', secret)).toBe(false);
  });

  it('should reject a malformed header', () => {
    expect(validateWebhookSignature(body, 'sha1=abc', secret)).toBe(false);
    expect(validateWebhookSignature(body, signature.slice(0, -2), secret)).toBe(false);
    expect(validateWebhookSignature(body, signature.replace('sha256=', ''), secret)).toBe(false);
  });

  it('should reject a signature made with another secret', () => {
    const forged = `sha256=${createHmac('sha256', 'other-secret').update(body).digest('hex')}`;

    expect(validateWebhookSignature(body, forged, secret)).toBe(false);
  });

  it('should reject a tampered body', () => {
    expect(validateWebhookSignature(Buffer.from('{"action":"closed","number":7}'), signature, secret)).toBe(false);
  });

  it('should reject when no secret is configured', () => {
    expect(validateWebhookSignature(body, signature, '')).toBe(false);
  });

  it('should produce signatures it accepts', () => {
    expect(signWebhookPayload(body, secret)).toBe(signature);
  });
});
