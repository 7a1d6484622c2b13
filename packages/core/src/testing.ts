import type {
  DeliveryResult,
  EventOfKind,
  INotificationSink,
  ISubscriptionStore,
  Label,
  Milestone,
  Notification,
  Subscription,
  SubscriptionChanges,
  User,
} from '@hubrelay/types';
import { DuplicateSubscriptionError } from './errors';

/**
 * Builders and in-memory collaborators for tests. Exported as
 * `@hubrelay/core/testing` so other packages can reuse them.
 */

export const SUBSCRIPTION_ID = '0b0f7a52-3c1e-4f53-9a57-1c8a2f64d001';
export const OTHER_SUBSCRIPTION_ID = '0b0f7a52-3c1e-4f53-9a57-1c8a2f64d002';

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: SUBSCRIPTION_ID,
    repo: 'octo-org/widgets',
    userId: '@alice:example.org',
    channelId: '!room:example.org',
    upstreamId: null,
    ...overrides,
  };
}

export function makeUser(id = 1, login = 'alice'): User {
  return { id, login };
}

export function makeLabel(id: number, name: string): Label {
  return { id, name };
}

export function makeMilestone(id: number, title: string): Milestone {
  return { id, number: id, title };
}

const REPOSITORY = { id: 100, name: 'widgets', full_name: 'octo-org/widgets' };

interface SubjectOptions {
  /** Issue or pull request id; `number` mirrors it. */
  subjectId?: number;
  sender?: User;
  label?: Label;
  milestone?: Milestone;
  labels?: Label[];
}

export function issuesEvent(
  action: EventOfKind<'issues'>['payload']['action'],
  options: SubjectOptions = {},
): EventOfKind<'issues'> {
  const id = options.subjectId ?? 5;
  return {
    kind: 'issues',
    payload: {
      action,
      issue: { id, number: id, title: `Issue ${id}`, labels: options.labels ?? [] },
      label: options.label,
      milestone: options.milestone,
      repository: REPOSITORY,
      sender: options.sender ?? makeUser(),
    },
  };
}

export function pullRequestEvent(
  action: EventOfKind<'pull_request'>['payload']['action'],
  options: SubjectOptions = {},
): EventOfKind<'pull_request'> {
  const id = options.subjectId ?? 5;
  return {
    kind: 'pull_request',
    payload: {
      action,
      number: id,
      pull_request: { id, number: id, title: `Pull request ${id}`, labels: options.labels ?? [] },
      label: options.label,
      milestone: options.milestone,
      repository: REPOSITORY,
      sender: options.sender ?? makeUser(),
    },
  };
}

export function issueCommentEvent(
  action: EventOfKind<'issue_comment'>['payload']['action'],
  options: SubjectOptions & { body?: string } = {},
): EventOfKind<'issue_comment'> {
  const id = options.subjectId ?? 5;
  return {
    kind: 'issue_comment',
    payload: {
      action,
      issue: { id, number: id, title: `Issue ${id}`, labels: options.labels ?? [] },
      comment: { id: 9000 + id, body: options.body ?? 'Done.' },
      repository: REPOSITORY,
      sender: options.sender ?? makeUser(),
    },
  };
}

export function pushEvent(
  commits: Array<{ id: string; distinct: boolean }>,
  counts: { size?: number; distinct_size?: number } = {},
): EventOfKind<'push'> {
  return {
    kind: 'push',
    payload: {
      ref: 'refs/heads/main',
      before: 'a'.repeat(40),
      after: 'b'.repeat(40),
      created: false,
      deleted: false,
      forced: false,
      compare: 'https://example.org/compare',
      commits: commits.map((commit) => ({ ...commit, message: `Commit ${commit.id}` })),
      pusher: { name: 'alice' },
      repository: REPOSITORY,
      sender: makeUser(),
      ...counts,
    },
  };
}

export function pingEvent(hookId: number): EventOfKind<'ping'> {
  return { kind: 'ping', payload: { zen: 'Keep it logically awesome.', hook_id: hookId, sender: makeUser() } };
}

export function metaDeletedEvent(hookId: number): EventOfKind<'meta'> {
  return { kind: 'meta', payload: { action: 'deleted', hook_id: hookId, sender: makeUser() } };
}

export function repositoryEvent(
  action: EventOfKind<'repository'>['payload']['action'],
  fullName = REPOSITORY.full_name,
): EventOfKind<'repository'> {
  const name = fullName.split('/').pop() ?? fullName;
  return {
    kind: 'repository',
    payload: { action, repository: { ...REPOSITORY, name, full_name: fullName }, sender: makeUser() },
  };
}

export function starEvent(): EventOfKind<'star'> {
  return { kind: 'star', payload: { action: 'created', repository: REPOSITORY, sender: makeUser() } };
}

/** Records every notification; the reply can be swapped per test. */
export class RecordingSink implements INotificationSink {
  readonly delivered: Notification[] = [];
  reply: (notification: Notification) => Promise<DeliveryResult | void> = async () => ({ published: true });

  async deliver(notification: Notification): Promise<DeliveryResult | void> {
    this.delivered.push(notification);
    return this.reply(notification);
  }
}

/** ISubscriptionStore backed by a Map. */
export class InMemorySubscriptionStore implements ISubscriptionStore {
  readonly rows = new Map<string, Subscription>();

  constructor(initial: Subscription[] = []) {
    for (const subscription of initial) this.rows.set(subscription.id, subscription);
  }

  async get(id: string): Promise<Subscription | null> {
    return this.rows.get(id) ?? null;
  }

  async findByRepoAndChannel(repo: string, channelId: string): Promise<Subscription | null> {
    return this.lookup(repo, channelId);
  }

  async listByChannel(channelId: string): Promise<Subscription[]> {
    return [...this.rows.values()].filter((row) => row.channelId === channelId);
  }

  async insert(subscription: Subscription): Promise<void> {
    // Checked and written in one step, like a unique index
    if (this.lookup(subscription.repo, subscription.channelId)) {
      throw new DuplicateSubscriptionError(subscription.repo, subscription.channelId);
    }
    this.rows.set(subscription.id, subscription);
  }

  async update(id: string, changes: SubscriptionChanges): Promise<void> {
    const row = this.rows.get(id);
    if (row) this.rows.set(id, { ...row, ...changes });
  }

  async delete(id: string): Promise<void> {
    this.rows.delete(id);
  }

  async replaceChannel(oldChannelId: string, newChannelId: string): Promise<number> {
    let moved = 0;
    for (const [id, row] of this.rows) {
      if (row.channelId === oldChannelId) {
        this.rows.set(id, { ...row, channelId: newChannelId });
        moved++;
      }
    }
    return moved;
  }

  private lookup(repo: string, channelId: string): Subscription | null {
    for (const row of this.rows.values()) {
      if (row.repo === repo && row.channelId === channelId) return row;
    }
    return null;
  }
}
