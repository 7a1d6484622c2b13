import type { Dispatcher, EngineErrorContext, MutationFailureContext, Notification } from '@hubrelay/core';
import type { Logger } from './logger';
import { describeError } from './logger';

type EventLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;

function summary(notification: Notification): Record<string, unknown> {
  return {
    subscriptionId: notification.subscriptionId,
    channelId: notification.channelId,
    kind: notification.kind,
    action: notification.action,
    deliveries: notification.deliveryIds.length,
  };
}

/** Route dispatcher events to log lines. */
export function wireDispatcherLogging(dispatcher: Dispatcher, logger: EventLogger): void {
  dispatcher.on('started', (data: Record<string, unknown>) => logger.debug('Aggregation started', data));
  dispatcher.on('merged', (data: Record<string, unknown>) => logger.debug('Event merged', data));
  dispatcher.on('flush', ({ notification }: { notification: Notification }) => {
    logger.info('Notification delivered', summary(notification));
  });
  dispatcher.on('skipped', ({ notification, reason }: { notification: Notification; reason: string }) => {
    logger.info('Notification skipped', { ...summary(notification), reason });
  });
  dispatcher.on('lifecycle', (data: Record<string, unknown>) => logger.info('Subscription updated', data));
  dispatcher.on('warn', (err: unknown, context: MutationFailureContext) => {
    logger.warn('Subscription update failed', { ...context, ...describeError(err) });
  });
  dispatcher.on('error', (err: unknown, context: EngineErrorContext) => {
    logger.error('Aggregation failed', { ...context, ...describeError(err) });
  });
  dispatcher.on('stopped', () => logger.info('Dispatcher stopped'));
}
