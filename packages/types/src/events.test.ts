import { describe, it, expect } from 'vitest';
import { actionOf, actorOf, decodeEventPayload, isEventKind, subjectOf } from './events';
import type { HubEvent } from './events';

const repository = { id: 100, name: 'widgets', full_name: 'octo-org/widgets' };
const sender = { id: 7, login: 'alice' };

function decoded(kind: Parameters<typeof decodeEventPayload>[0], data: unknown): HubEvent {
  const result = decodeEventPayload(kind, data);
  if (!result.success) throw result.error;
  return result.event;
}

describe('isEventKind', () => {
  it('should accept supported kinds only', () => {
    expect(isEventKind('issues')).toBe(true);
    expect(isEventKind('pull_request_review_comment')).toBe(true);
    expect(isEventKind('sponsorship')).toBe(false);
    expect(isEventKind('toString')).toBe(false);
  });
});

describe('decodeEventPayload', () => {
  it('should tag the payload with its kind and keep unknown fields', () => {
    const event = decoded('star', { action: 'created', repository, sender, extra: 1 });
    expect(event.kind).toBe('star');
    expect(event.payload).toEqual({ action: 'created', repository, sender, extra: 1 });
  });

  it('should report schema mismatches without throwing', () => {
    const result = decodeEventPayload('issues', { action: 'opened', repository, sender });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.path.join('.'))).toEqual(['issue']);
    }
  });

  it('should require the milestone on milestone actions', () => {
    const result = decodeEventPayload('pull_request', {
      action: 'demilestoned',
      number: 8,
      pull_request: { id: 8, number: 8, title: 'Fix flaky test', labels: [] },
      repository,
      sender,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => [issue.path.join('.'), issue.message])).toEqual([
        ['milestone', 'Required for demilestoned events'],
      ]);
    }
  });

  it('should reject actions outside the known set', () => {
    const result = decodeEventPayload('star', { action: 'exploded', repository, sender });
    expect(result.success).toBe(false);
  });
});

describe('event accessors', () => {
  const issue = { id: 55, number: 3, title: 'Broken build', labels: [] };

  it('should read the action when present', () => {
    expect(actionOf(decoded('star', { action: 'deleted', repository, sender }))).toBe('deleted');
    expect(actionOf(decoded('ping', { zen: 'Speak like a human.', hook_id: 1 }))).toBeNull();
  });

  it('should resolve comments on issues to the issue', () => {
    const event = decoded('issue_comment', {
      action: 'created',
      issue,
      comment: { id: 900, body: 'Fixed.' },
      repository,
      sender,
    });
    expect(subjectOf(event)).toBe(55);
    expect(actorOf(event)).toBe(7);
  });

  it('should have no subject for repository-wide kinds', () => {
    const event = decoded('star', { action: 'created', repository, sender });
    expect(subjectOf(event)).toBeNull();
  });

  it('should have no actor when the sender is missing', () => {
    expect(actorOf(decoded('ping', { zen: 'Design for failure.', hook_id: 1 }))).toBeNull();
  });
});
