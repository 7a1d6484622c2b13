import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LABELS_CHANGED, MILESTONE_CHANGED } from '@hubrelay/types';
import { AggregationEngine } from './engine';
import {
  OTHER_SUBSCRIPTION_ID,
  RecordingSink,
  issueCommentEvent,
  issuesEvent,
  makeLabel,
  makeMilestone,
  makeSubscription,
  makeUser,
  starEvent,
} from './testing';

const T = 1000;
const bug = makeLabel(1, 'bug');
const docs = makeLabel(2, 'docs');
const alice = makeUser(1, 'alice');

describe('AggregationEngine', () => {
  let sink: RecordingSink;
  let engine: AggregationEngine;
  const subscription = makeSubscription();

  beforeEach(() => {
    vi.useFakeTimers();
    sink = new RecordingSink();
    engine = new AggregationEngine({ sink, timeoutMs: T });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  /** Move the clock and wait for the deliveries it triggered. */
  async function advance(ms: number): Promise<void> {
    await vi.advanceTimersByTimeAsync(ms);
    await engine.drain();
  }

  describe('deadline', () => {
    it('should flush a lone aggregation at T with only its own delivery id', async () => {
      expect(engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1')).toBe('started');

      await advance(T - 1);
      expect(sink.delivered).toHaveLength(0);
      expect(engine.pendingCount()).toBe(1);

      await advance(1);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0].deliveryIds).toEqual(['d1']);
      expect(engine.pendingCount()).toBe(0);
    });

    it('should restart the deadline on a resetting merge', async () => {
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      await advance(T / 2);
      expect(engine.submit(subscription, issuesEvent('labeled', { label: docs }), 'd2')).toBe('merged');

      await advance(T / 2);
      expect(sink.delivered).toHaveLength(0);
      await advance(T / 2 - 1);
      expect(sink.delivered).toHaveLength(0);

      await advance(1);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0].deliveryIds).toEqual(['d1', 'd2']);
    });

    it('should keep the deadline on a non-resetting milestone merge', async () => {
      const v1 = makeMilestone(10, 'v1');
      const v2 = makeMilestone(11, 'v2');
      engine.submit(subscription, issuesEvent('demilestoned', { milestone: v1 }), 'd1');
      await advance(600);
      expect(engine.submit(subscription, issuesEvent('milestoned', { milestone: v2 }), 'd2')).toBe('merged');

      await advance(400);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0]).toMatchObject({
        action: MILESTONE_CHANGED,
        aggregation: { type: 'milestone', from: v1, to: v2 },
        deliveryIds: ['d1', 'd2'],
      });
    });

    it('should use a changed timeout for aggregations started afterwards', async () => {
      engine.setTimeoutMs(200);
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      await advance(200);
      expect(sink.delivered).toHaveLength(1);
    });
  });

  describe('flush once', () => {
    it('should start a new aggregation for an event arriving after the flush', async () => {
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      await advance(T);
      expect(engine.submit(subscription, issuesEvent('unlabeled', { label: bug }), 'd2')).toBe('started');

      await advance(T);
      expect(sink.delivered.map((n) => n.deliveryIds)).toEqual([['d1'], ['d2']]);
      expect(sink.delivered[0].aggregation).toEqual({ type: 'labels', added: [bug], removed: [] });
    });

    it('should not flush again after flushAll', async () => {
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      engine.submit(subscription, issuesEvent('closed', { subjectId: 9 }), 'd2');
      engine.flushAll();
      await engine.drain();
      expect(sink.delivered).toHaveLength(2);
      expect(engine.pendingCount()).toBe(0);

      await advance(2 * T);
      expect(sink.delivered).toHaveLength(2);
    });
  });

  describe('acceptance order', () => {
    it('should merge into the oldest aggregation that accepts the event', async () => {
      const closedA = issuesEvent('closed', { subjectId: 9, sender: alice });
      const closedB = issuesEvent('closed', { subjectId: 9, sender: alice });
      expect(engine.submit(subscription, closedA, 'a')).toBe('started');
      expect(engine.submit(subscription, closedB, 'b')).toBe('started');

      await advance(100);
      const comment = issueCommentEvent('created', { subjectId: 9, sender: alice });
      expect(engine.submit(subscription, comment, 'e')).toBe('merged');

      await advance(T - 100);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0]).toMatchObject({ event: closedB, deliveryIds: ['b'], aggregation: null });

      await advance(100);
      expect(sink.delivered[1]).toMatchObject({ event: comment, deliveryIds: ['a', 'e'] });
    });

    it('should never merge across subscriptions', async () => {
      const other = makeSubscription({ id: OTHER_SUBSCRIPTION_ID });
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'x1');
      await advance(T / 2);
      expect(engine.submit(other, issuesEvent('labeled', { label: docs }), 'y1')).toBe('started');
      expect(engine.pendingCount(subscription.id)).toBe(1);
      expect(engine.pendingCount(other.id)).toBe(1);

      await advance(T / 2);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0]).toMatchObject({ subscriptionId: subscription.id, deliveryIds: ['x1'] });

      await advance(T / 2);
      expect(sink.delivered[1]).toMatchObject({ subscriptionId: other.id, deliveryIds: ['y1'] });
    });
  });

  describe('scenarios', () => {
    it('should report a label added then removed as removed only', async () => {
      engine.submit(subscription, issuesEvent('labeled', { subjectId: 5, label: bug }), 'd1');
      await advance(300);
      engine.submit(subscription, issuesEvent('unlabeled', { subjectId: 5, label: bug }), 'd2');

      await advance(T - 1);
      expect(sink.delivered).toHaveLength(0);
      await advance(1);
      expect(sink.delivered[0]).toMatchObject({
        kind: 'issues',
        action: LABELS_CHANGED,
        aggregation: { type: 'labels', added: [], removed: [bug] },
        deliveryIds: ['d1', 'd2'],
      });
    });

    it('should swallow a label already shown in the opened notice', async () => {
      const opened = issuesEvent('opened', { subjectId: 7, labels: [bug] });
      engine.submit(subscription, opened, 'd1');
      await advance(100);
      expect(engine.submit(subscription, issuesEvent('labeled', { subjectId: 7, label: bug }), 'd2')).toBe('merged');

      await advance(T);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0]).toMatchObject({ event: opened, action: 'opened', aggregation: null });
    });

    it('should collapse a close followed by a comment into one comment notice', async () => {
      engine.submit(subscription, issuesEvent('closed', { subjectId: 9, sender: alice }), 'd1');
      await advance(T / 2);
      engine.submit(subscription, issueCommentEvent('created', { subjectId: 9, sender: alice }), 'd2');

      await advance(T);
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0]).toMatchObject({
        kind: 'issue_comment',
        action: 'created',
        aggregation: { type: 'state-change', closed: true, reopened: false },
        deliveryIds: ['d1', 'd2'],
      });
    });
  });

  describe('solo delivery', () => {
    it('should deliver events outside the policy table immediately', async () => {
      expect(engine.submit(subscription, starEvent(), 'd1')).toBe('solo');
      await engine.drain();
      expect(sink.delivered).toHaveLength(1);
      expect(sink.delivered[0]).toMatchObject({
        kind: 'star',
        action: 'created',
        channelId: subscription.channelId,
        deliveryIds: ['d1'],
      });
      expect(engine.pendingCount()).toBe(0);
    });

    it('should deliver through deliverSolo without touching pending aggregations', async () => {
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      engine.deliverSolo(subscription, issuesEvent('labeled', { label: docs }), 'd2');
      await engine.drain();
      expect(sink.delivered.map((n) => n.deliveryIds)).toEqual([['d2']]);
      expect(engine.pendingCount()).toBe(1);
    });
  });

  describe('channel resolution', () => {
    it('should deliver to the channel current at flush time', async () => {
      engine = new AggregationEngine({ sink, timeoutMs: T, resolveChannel: () => '!moved:example.org' });
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      await advance(T);
      expect(sink.delivered[0].channelId).toBe('!moved:example.org');
    });
  });

  describe('failures', () => {
    it('should abandon an aggregation whose starter fails', async () => {
      const onError = vi.fn();
      engine.on('error', onError);

      expect(engine.submit(subscription, issuesEvent('labeled'), 'd1')).toBe('abandoned');
      expect(engine.pendingCount()).toBe(0);
      expect(onError).toHaveBeenCalledWith(expect.any(Error), {
        stage: 'start',
        subscriptionId: subscription.id,
        kind: 'issues',
        action: 'labeled',
        deliveryIds: ['d1'],
      });

      await advance(T);
      expect(sink.delivered).toHaveLength(0);
      expect(engine.getStats().errorCount).toBe(1);
    });

    it('should not throw without an error listener', () => {
      expect(() => engine.submit(subscription, issuesEvent('labeled'), 'd1')).not.toThrow();
    });

    it('should keep aggregating after a delivery fails', async () => {
      const onError = vi.fn();
      engine.on('error', onError);
      sink.reply = async () => {
        throw new Error('sink down');
      };

      engine.submit(subscription, starEvent(), 'd1');
      await engine.drain();
      expect(onError).toHaveBeenCalledWith(expect.objectContaining({ message: 'sink down' }), expect.objectContaining({ stage: 'deliver' }));

      sink.reply = async () => ({ published: true });
      engine.submit(subscription, starEvent(), 'd2');
      await engine.drain();
      expect(engine.getStats()).toMatchObject({ flushes: 1, errorCount: 1 });
    });

    it('should report duplicates as skipped rather than flushed', async () => {
      const onSkipped = vi.fn();
      engine.on('skipped', onSkipped);
      sink.reply = async () => ({ published: false, reason: 'duplicate' });

      engine.submit(subscription, starEvent(), 'd1');
      await engine.drain();
      expect(onSkipped).toHaveBeenCalledWith(expect.objectContaining({ reason: 'duplicate' }));
      expect(engine.getStats().flushes).toBe(0);
    });
  });

  describe('events and stats', () => {
    it('should emit started and merged with the representative action', () => {
      const onStarted = vi.fn();
      const onMerged = vi.fn();
      engine.on('started', onStarted);
      engine.on('merged', onMerged);

      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      engine.submit(subscription, issuesEvent('unlabeled', { label: bug }), 'd2');

      expect(onStarted).toHaveBeenCalledWith({
        subscriptionId: subscription.id,
        kind: 'issues',
        action: LABELS_CHANGED,
        deliveryId: 'd1',
        timeoutMs: T,
      });
      expect(onMerged).toHaveBeenCalledWith({
        subscriptionId: subscription.id,
        kind: 'issues',
        action: LABELS_CHANGED,
        deliveryId: 'd2',
        resetDeadline: true,
      });
    });

    it('should count starts, merges and flushes', async () => {
      engine.submit(subscription, issuesEvent('labeled', { label: bug }), 'd1');
      engine.submit(subscription, issuesEvent('unlabeled', { label: bug }), 'd2');
      expect(engine.getStats()).toMatchObject({ aggregationsStarted: 1, merges: 1, pendingAggregations: 1 });

      await advance(T);
      const stats = engine.getStats();
      expect(stats).toMatchObject({ flushes: 1, pendingAggregations: 0, errorCount: 0 });
      expect(stats.lastFlushAt).toBeInstanceOf(Date);
    });
  });
});
