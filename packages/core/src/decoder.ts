import { decodeEventPayload, isEventKind } from '@hubrelay/types';
import type { HubEvent, Subscription } from '@hubrelay/types';
import {
  InvalidSignatureError,
  MalformedBodyError,
  MalformedRequestError,
  PayloadSchemaMismatchError,
  SubscriptionNotFoundError,
  UnsupportedEventKindError,
} from './errors';
import { verifySignature } from './signature';

export const HEADERS = {
  SIGNATURE_256: 'x-hub-signature-256',
  SIGNATURE: 'x-hub-signature',
  EVENT: 'x-github-event',
  DELIVERY: 'x-github-delivery',
} as const;

const MAX_REPORTED_ISSUES = 5;

export type RequestHeaders = Record<string, string | string[] | undefined>;

export interface WebhookRequest {
  /** From the path or the `id` query parameter; null when absent. */
  subscriptionId: string | null;

  /** Lower-cased header names, as Node's http module delivers them. */
  headers: RequestHeaders;

  rawBody: Buffer;
}

export interface DecodedWebhook {
  event: HubEvent;
  deliveryId: string;
  subscription: Subscription;
}

/** What the decoder needs to resolve and authenticate a subscription. */
export interface SubscriptionDirectory {
  get(id: string): Promise<Subscription | null>;
  secretFor(subscription: Subscription): string;
}

function header(headers: RequestHeaders, name: string): string | undefined {
  const value = headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first ? first : undefined;
}

function parseBody(rawBody: Buffer): object {
  if (rawBody.length === 0) {
    throw new MalformedBodyError('Empty request body');
  }

  let data: unknown;
  try {
    data = JSON.parse(rawBody.toString('utf8'));
  } catch (err) {
    throw new MalformedBodyError(`Invalid JSON body: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data) || Object.keys(data).length === 0) {
    throw new MalformedBodyError('Request body must be a non-empty JSON object');
  }
  return data;
}

/**
 * Classify one inbound webhook request.
 *
 * Checks run in a fixed order and the first failure wins: subscription,
 * required headers, event kind, signature, body, payload schema.
 *
 * @throws {IntakeError} One of its subclasses describing the failure
 */
export async function decodeWebhook(
  request: WebhookRequest,
  directory: SubscriptionDirectory,
): Promise<DecodedWebhook> {
  const { subscriptionId, headers, rawBody } = request;

  if (!subscriptionId) throw new SubscriptionNotFoundError(null);
  const subscription = await directory.get(subscriptionId);
  if (!subscription) throw new SubscriptionNotFoundError(subscriptionId);

  const signature = header(headers, HEADERS.SIGNATURE_256) ?? header(headers, HEADERS.SIGNATURE);
  if (!signature) throw new MalformedRequestError('X-Hub-Signature');

  const kind = header(headers, HEADERS.EVENT);
  if (!kind) throw new MalformedRequestError('X-GitHub-Event');

  const deliveryId = header(headers, HEADERS.DELIVERY);
  if (!deliveryId) throw new MalformedRequestError('X-GitHub-Delivery');

  if (!isEventKind(kind)) throw new UnsupportedEventKindError(kind);

  if (!verifySignature(rawBody, signature, directory.secretFor(subscription))) {
    throw new InvalidSignatureError();
  }

  const decoded = decodeEventPayload(kind, parseBody(rawBody));
  if (!decoded.success) {
    const issues = decoded.error.issues
      .slice(0, MAX_REPORTED_ISSUES)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new PayloadSchemaMismatchError(kind, issues);
  }

  return { event: decoded.event, deliveryId, subscription };
}
