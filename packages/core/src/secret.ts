import crypto from 'crypto';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID.test(value);
}

/**
 * Per-subscription webhook secret: HMAC-SHA256 keyed with the process-wide
 * root secret over the subscription's UUID bytes and owner id. Never stored.
 */
export function deriveWebhookSecret(rootSecret: string, subscriptionId: string, userId: string): string {
  if (!isUuid(subscriptionId)) {
    throw new Error(`Subscription id "${subscriptionId}" is not a UUID`);
  }
  return crypto
    .createHmac('sha256', rootSecret)
    .update(Buffer.from(subscriptionId.replace(/-/g, ''), 'hex'))
    .update(userId, 'utf8')
    .digest('hex');
}
