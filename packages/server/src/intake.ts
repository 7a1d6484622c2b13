import http from 'http';
import { HEADERS, IntakeError, decodeWebhook } from '@hubrelay/core';
import type { Dispatcher, IntakeErrorCode, SubscriptionDirectory } from '@hubrelay/core';
import type { Logger } from './logger';
import { describeError } from './logger';

const DEFAULT_MAX_BODY_BYTES = 5 * 1024 * 1024;

const WEBHOOK_PATH = /^\/webhook(?:\/([^/]+))?\/?$/;

const STATUS_BY_CODE: Record<IntakeErrorCode, number> = {
  SUBSCRIPTION_NOT_FOUND: 404,
  MALFORMED_REQUEST: 400,
  UNSUPPORTED_EVENT_KIND: 202,
  INVALID_SIGNATURE: 401,
  MALFORMED_BODY: 400,
  PAYLOAD_SCHEMA_MISMATCH: 400,
};

export type IntakeLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

export interface WebhookServerOptions {
  /** Resolves subscriptions and their secrets. */
  registry: SubscriptionDirectory;
  dispatcher: Pick<Dispatcher, 'handle'>;
  logger: IntakeLogger;
  /** Larger bodies are refused with 413. Default: 5 MiB. */
  maxBodyBytes?: number;
}

class BodyTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

function readBody(req: http.IncomingMessage, limit: number): Promise<Buffer> {
  const declared = Number(req.headers['content-length']);
  if (Number.isFinite(declared) && declared > limit) {
    req.resume();
    return Promise.reject(new BodyTooLargeError(limit));
  }

  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const onData = (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        req.off('data', onData);
        req.resume();
        reject(new BodyTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    };

    req.on('data', onData);
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function send(res: http.ServerResponse, status: number, body: Record<string, unknown>, headers: http.OutgoingHttpHeaders = {}): void {
  res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

function headerValue(req: http.IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * HTTP intake for upstream webhooks.
 *
 * `POST /webhook/{id}` or `POST /webhook?id={id}`. A 200 means the event was
 * accepted into the pipeline, not that a notification went out.
 */
export function createWebhookServer(options: WebhookServerOptions): http.Server {
  const { registry, dispatcher, logger } = options;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;

  async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const match = WEBHOOK_PATH.exec(url.pathname);
    if (!match) {
      send(res, 404, { error: 'NOT_FOUND', message: `No route for ${url.pathname}` });
      return;
    }
    if (req.method !== 'POST') {
      send(res, 405, { error: 'METHOD_NOT_ALLOWED', message: 'Use POST' }, { Allow: 'POST' });
      return;
    }

    const subscriptionId = match[1] ?? url.searchParams.get('id');
    const context = {
      subscriptionId,
      eventKind: headerValue(req, HEADERS.EVENT),
      deliveryId: headerValue(req, HEADERS.DELIVERY),
    };

    try {
      const rawBody = await readBody(req, maxBodyBytes);
      const decoded = await decodeWebhook({ subscriptionId, headers: req.headers, rawBody }, registry);
      const outcome = await dispatcher.handle(decoded.event, decoded.deliveryId, decoded.subscription);

      logger.debug('Webhook accepted', { ...context, outcome });
      send(res, 200, { status: 'accepted', outcome });
    } catch (err) {
      if (err instanceof IntakeError) {
        const status = STATUS_BY_CODE[err.code];
        if (status === 202) {
          logger.info('Ignoring unsupported event kind', { ...context, status });
          send(res, status, { status: 'ignored', error: err.code, message: err.message });
        } else {
          logger.warn('Webhook rejected', { ...context, status, code: err.code, reason: err.message });
          send(res, status, { error: err.code, message: err.message });
        }
        return;
      }
      if (err instanceof BodyTooLargeError) {
        logger.warn('Webhook rejected', { ...context, status: 413, reason: err.message });
        send(res, 413, { error: 'PAYLOAD_TOO_LARGE', message: err.message }, { Connection: 'close' });
        return;
      }
      throw err;
    }
  }

  return http.createServer((req, res) => {
    handleRequest(req, res).catch((err: unknown) => {
      logger.error('Webhook handling failed', { url: req.url, ...describeError(err) });
      if (!res.headersSent) {
        send(res, 500, { error: 'INTERNAL_ERROR', message: 'Internal server error' });
      } else {
        res.end();
      }
    });
  });
}
