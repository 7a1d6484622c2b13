import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Dispatcher, SubscriptionRegistry } from '@hubrelay/core';
import {
  InMemorySubscriptionStore,
  RecordingSink,
  SUBSCRIPTION_ID,
  issuesEvent,
  makeLabel,
  makeSubscription,
  starEvent,
} from '@hubrelay/core/testing';
import { wireDispatcherLogging } from './events';

describe('wireDispatcherLogging', () => {
  let sink: RecordingSink;
  let dispatcher: Dispatcher;
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

  beforeEach(() => {
    vi.clearAllMocks();
    const store = new InMemorySubscriptionStore([makeSubscription()]);
    sink = new RecordingSink();
    dispatcher = new Dispatcher({
      sink,
      registry: new SubscriptionRegistry(store, 'test-secret-0123456789'),
      aggregation: { timeoutMs: -1 },
    });
    wireDispatcherLogging(dispatcher, logger);
  });

  it('should log delivered notifications', async () => {
    await dispatcher.handle(starEvent(), 'delivery-1', makeSubscription());
    await dispatcher.stop();

    expect(logger.info).toHaveBeenCalledWith('Notification delivered', {
      subscriptionId: SUBSCRIPTION_ID,
      channelId: '!room:example.org',
      kind: 'star',
      action: 'created',
      deliveries: 1,
    });
    expect(logger.info).toHaveBeenCalledWith('Dispatcher stopped');
  });

  it('should log skipped notifications with the reason', async () => {
    sink.reply = async () => ({ published: false, reason: 'duplicate' });

    await dispatcher.handle(starEvent(), 'delivery-1', makeSubscription());
    await dispatcher.stop();

    expect(logger.info).toHaveBeenCalledWith('Notification skipped', {
      subscriptionId: SUBSCRIPTION_ID,
      channelId: '!room:example.org',
      kind: 'star',
      action: 'created',
      deliveries: 1,
      reason: 'duplicate',
    });
  });

  it('should log aggregation failures as errors', async () => {
    dispatcher.setTimeoutMs(1000);

    // A labeled event without a label cannot start an aggregation
    await dispatcher.handle(issuesEvent('labeled'), 'delivery-2', makeSubscription());

    expect(logger.error).toHaveBeenCalledWith(
      'Aggregation failed',
      expect.objectContaining({ stage: 'start', subscriptionId: SUBSCRIPTION_ID, kind: 'issues', action: 'labeled' }),
    );
    await dispatcher.stop();
  });

  it('should log started aggregations at debug level', async () => {
    dispatcher.setTimeoutMs(1000);

    await dispatcher.handle(issuesEvent('labeled', { label: makeLabel(1, 'bug') }), 'delivery-3', makeSubscription());

    expect(logger.debug).toHaveBeenCalledWith(
      'Aggregation started',
      expect.objectContaining({ subscriptionId: SUBSCRIPTION_ID, kind: 'issues', deliveryId: 'delivery-3' }),
    );
    await dispatcher.stop();
  });
});
