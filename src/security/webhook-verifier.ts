import crypto from 'crypto';
import { logger } from '../observability/logger';

const log = logger.child({ component: 'webhook-verifier' });

/** Hex digest carried by X-Hub-Signature-256, without its `sha256=` scheme */
function digestFrom(header: string | undefined): string | undefined {
  const match = header?.match(/^sha256=([0-9a-f]+)$/i);
  return match?.[1].toLowerCase();
}

/**
 * HMAC-SHA256 check of a WhatsApp Cloud API delivery against the app
 * secret. With no secret configured the request passes only when
 * `allowUnsigned` is set (development and test).
 */
export function verifyWebhookSignature(
  rawBody: string | Buffer,
  signature: string | undefined,
  secret: string,
  allowUnsigned: boolean,
): boolean {
  if (!secret) {
    if (!allowUnsigned) log.error('No webhook secret configured; rejecting delivery');
    return allowUnsigned;
  }

  const provided = digestFrom(signature);
  if (!provided) {
    log.warn('Missing or malformed signature header');
    return false;
  }

  const expected = crypto.createHmac('sha256', secret).update(rawBody).digest();
  const actual = Buffer.from(provided, 'hex');
  const valid = actual.length === expected.length && crypto.timingSafeEqual(actual, expected);
  if (!valid) log.warn('Webhook signature mismatch');
  return valid;
}
