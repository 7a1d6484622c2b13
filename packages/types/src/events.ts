import { z } from 'zod';

/**
 * Upstream webhook event model.
 *
 * Every kind the intake understands is a key of {@link EVENT_SCHEMAS}; the
 * schemas validate the fields the aggregation engine and the renderer rely on
 * and pass everything else through untouched.
 */

const entity = <T extends z.ZodRawShape>(shape: T) => z.object(shape).passthrough();

// ─── Shared entities ─────────────────────────────────────────────────────────

export const userSchema = entity({
  id: z.number().int(),
  login: z.string(),
  html_url: z.string().optional(),
  name: z.string().nullish(),
});

export const gitUserSchema = entity({
  name: z.string(),
  email: z.string().nullish(),
  username: z.string().nullish(),
});

export const repositorySchema = entity({
  id: z.number().int(),
  name: z.string(),
  full_name: z.string(),
  html_url: z.string().optional(),
  private: z.boolean().optional(),
});

export const labelSchema = entity({
  id: z.number().int(),
  name: z.string(),
  color: z.string().optional(),
  description: z.string().nullish(),
});

export const milestoneSchema = entity({
  id: z.number().int(),
  number: z.number().int(),
  title: z.string(),
  html_url: z.string().optional(),
  state: z.enum(['open', 'closed']).optional(),
});

export const issueSchema = entity({
  id: z.number().int(),
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullish(),
  html_url: z.string().optional(),
  state: z.enum(['open', 'closed']).optional(),
  user: userSchema.optional(),
  labels: z.array(labelSchema).default([]),
  milestone: milestoneSchema.nullish(),
});

export const pullRequestSchema = entity({
  id: z.number().int(),
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullish(),
  html_url: z.string().optional(),
  state: z.enum(['open', 'closed']).optional(),
  draft: z.boolean().optional(),
  merged_at: z.string().nullish(),
  merge_commit_sha: z.string().nullish(),
  user: userSchema.optional(),
  labels: z.array(labelSchema).default([]),
  milestone: milestoneSchema.nullish(),
});

export const commentSchema = entity({
  id: z.number().int(),
  body: z.string(),
  html_url: z.string().optional(),
  user: userSchema.optional(),
});

export const commitSchema = entity({
  id: z.string(),
  message: z.string(),
  url: z.string().optional(),
  distinct: z.boolean(),
  author: gitUserSchema.optional(),
});

export const hookSchema = entity({
  id: z.number().int(),
  type: z.string().optional(),
  active: z.boolean().optional(),
  events: z.array(z.string()).optional(),
});

export type User = z.infer<typeof userSchema>;
export type Repository = z.infer<typeof repositorySchema>;
export type Label = z.infer<typeof labelSchema>;
export type Milestone = z.infer<typeof milestoneSchema>;
export type Issue = z.infer<typeof issueSchema>;
export type PullRequest = z.infer<typeof pullRequestSchema>;
export type Comment = z.infer<typeof commentSchema>;
export type Commit = z.infer<typeof commitSchema>;

// ─── Actions ─────────────────────────────────────────────────────────────────

export const IssueAction = z.enum([
  'opened', 'edited', 'deleted', 'pinned', 'unpinned', 'closed', 'reopened',
  'assigned', 'unassigned', 'labeled', 'unlabeled', 'locked', 'unlocked',
  'transferred', 'milestoned', 'demilestoned',
]);

export const PullRequestAction = z.enum([
  'opened', 'edited', 'closed', 'reopened', 'assigned', 'unassigned',
  'review_requested', 'review_request_removed', 'ready_for_review',
  'converted_to_draft', 'labeled', 'unlabeled', 'synchronize', 'locked',
  'unlocked', 'milestoned', 'demilestoned', 'auto_merge_enabled',
  'auto_merge_disabled', 'enqueued', 'dequeued',
]);

export const CommentAction = z.enum(['created', 'edited', 'deleted']);
export const ReviewAction = z.enum(['submitted', 'edited', 'dismissed']);
export const ReleaseAction = z.enum([
  'published', 'unpublished', 'created', 'edited', 'deleted', 'prereleased', 'released',
]);
export const StarAction = z.enum(['created', 'deleted']);
export const WatchAction = z.enum(['started']);
export const MilestoneAction = z.enum(['created', 'closed', 'opened', 'edited', 'deleted']);
export const LabelAction = z.enum(['created', 'edited', 'deleted']);
export const RepositoryAction = z.enum([
  'created', 'deleted', 'archived', 'unarchived', 'edited', 'renamed',
  'transferred', 'publicized', 'privatized',
]);
export const MetaAction = z.enum(['deleted']);

/** Actions that exist only on aggregated notifications, never upstream. */
export const LABELS_CHANGED = 'x_labels_changed';
export const MILESTONE_CHANGED = 'x_milestone_changed';
export type AggregateAction = typeof LABELS_CHANGED | typeof MILESTONE_CHANGED;

// ─── Payloads ────────────────────────────────────────────────────────────────

const changeSchema = entity({ from: z.string() });

export const pingEventSchema = entity({
  zen: z.string(),
  hook_id: z.number().int(),
  hook: hookSchema.optional(),
  repository: repositorySchema.optional(),
  sender: userSchema.optional(),
});

export const metaEventSchema = entity({
  action: MetaAction,
  hook_id: z.number().int(),
  hook: hookSchema.optional(),
  repository: repositorySchema.optional(),
  sender: userSchema,
});

interface ChangeCarrier {
  action: string;
  label?: unknown;
  milestone?: unknown;
}

/** Label and milestone actions must name the label or milestone they changed. */
function requireChangedEntity(payload: ChangeCarrier, ctx: z.RefinementCtx): void {
  const { action } = payload;
  if ((action === 'labeled' || action === 'unlabeled') && !payload.label) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['label'], message: `Required for ${action} events` });
  }
  if ((action === 'milestoned' || action === 'demilestoned') && !payload.milestone) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['milestone'], message: `Required for ${action} events` });
  }
}

export const issuesEventSchema = entity({
  action: IssueAction,
  issue: issueSchema,
  label: labelSchema.optional(),
  milestone: milestoneSchema.optional(),
  assignee: userSchema.nullish(),
  changes: entity({ title: changeSchema.optional(), body: changeSchema.optional() }).optional(),
  repository: repositorySchema,
  sender: userSchema,
}).superRefine(requireChangedEntity);

export const issueCommentEventSchema = entity({
  action: CommentAction,
  issue: issueSchema,
  comment: commentSchema,
  changes: entity({ body: changeSchema.optional() }).optional(),
  repository: repositorySchema,
  sender: userSchema,
});

export const pullRequestEventSchema = entity({
  action: PullRequestAction,
  number: z.number().int(),
  pull_request: pullRequestSchema,
  label: labelSchema.optional(),
  milestone: milestoneSchema.optional(),
  assignee: userSchema.nullish(),
  requested_reviewer: userSchema.optional(),
  changes: entity({ title: changeSchema.optional(), body: changeSchema.optional() }).optional(),
  repository: repositorySchema,
  sender: userSchema,
}).superRefine(requireChangedEntity);

export const pullRequestReviewEventSchema = entity({
  action: ReviewAction,
  pull_request: pullRequestSchema,
  review: entity({
    id: z.number().int(),
    state: z.string(),
    body: z.string().nullish(),
    html_url: z.string().optional(),
    user: userSchema.optional(),
  }),
  repository: repositorySchema,
  sender: userSchema,
});

export const pullRequestReviewCommentEventSchema = entity({
  action: CommentAction,
  pull_request: pullRequestSchema,
  comment: commentSchema,
  repository: repositorySchema,
  sender: userSchema,
});

export const commitCommentEventSchema = entity({
  action: z.enum(['created']),
  comment: commentSchema.extend({ commit_id: z.string().optional() }),
  repository: repositorySchema,
  sender: userSchema,
});

export const pushEventSchema = entity({
  ref: z.string(),
  before: z.string(),
  after: z.string(),
  created: z.boolean(),
  deleted: z.boolean(),
  forced: z.boolean(),
  base_ref: z.string().nullish(),
  compare: z.string(),
  commits: z.array(commitSchema).default([]),
  head_commit: commitSchema.nullish(),
  size: z.number().int().nonnegative().optional(),
  distinct_size: z.number().int().nonnegative().optional(),
  pusher: gitUserSchema,
  repository: repositorySchema,
  sender: userSchema,
});

const refEventShape = {
  ref: z.string(),
  ref_type: z.enum(['branch', 'tag']),
  pusher_type: z.string().optional(),
  repository: repositorySchema,
  sender: userSchema,
};

export const createEventSchema = entity({
  ...refEventShape,
  master_branch: z.string().optional(),
  description: z.string().nullish(),
});

export const deleteEventSchema = entity(refEventShape);

export const releaseEventSchema = entity({
  action: ReleaseAction,
  release: entity({
    id: z.number().int(),
    tag_name: z.string(),
    name: z.string().nullish(),
    body: z.string().nullish(),
    draft: z.boolean().optional(),
    prerelease: z.boolean().optional(),
    html_url: z.string().optional(),
  }),
  repository: repositorySchema,
  sender: userSchema,
});

export const starEventSchema = entity({
  action: StarAction,
  starred_at: z.string().nullish(),
  repository: repositorySchema,
  sender: userSchema,
});

export const watchEventSchema = entity({
  action: WatchAction,
  repository: repositorySchema,
  sender: userSchema,
});

export const forkEventSchema = entity({
  forkee: repositorySchema,
  repository: repositorySchema,
  sender: userSchema,
});

export const milestoneEventSchema = entity({
  action: MilestoneAction,
  milestone: milestoneSchema,
  changes: entity({
    title: changeSchema.optional(),
    description: changeSchema.optional(),
    due_on: changeSchema.optional(),
  }).optional(),
  repository: repositorySchema,
  sender: userSchema,
});

export const labelEventSchema = entity({
  action: LabelAction,
  label: labelSchema,
  changes: entity({ name: changeSchema.optional(), color: changeSchema.optional() }).optional(),
  repository: repositorySchema,
  sender: userSchema,
});

export const gollumEventSchema = entity({
  pages: z.array(entity({
    page_name: z.string(),
    title: z.string(),
    action: z.enum(['created', 'edited']),
    sha: z.string(),
    html_url: z.string().optional(),
  })),
  repository: repositorySchema,
  sender: userSchema,
});

export const repositoryEventSchema = entity({
  action: RepositoryAction,
  changes: z.record(z.unknown()).optional(),
  repository: repositorySchema,
  sender: userSchema,
});

export const publicEventSchema = entity({
  repository: repositorySchema,
  sender: userSchema,
});

/** Kind → payload schema. The key set is the closed set of supported kinds. */
export const EVENT_SCHEMAS = {
  ping: pingEventSchema,
  meta: metaEventSchema,
  issues: issuesEventSchema,
  issue_comment: issueCommentEventSchema,
  pull_request: pullRequestEventSchema,
  pull_request_review: pullRequestReviewEventSchema,
  pull_request_review_comment: pullRequestReviewCommentEventSchema,
  commit_comment: commitCommentEventSchema,
  push: pushEventSchema,
  create: createEventSchema,
  delete: deleteEventSchema,
  release: releaseEventSchema,
  star: starEventSchema,
  watch: watchEventSchema,
  fork: forkEventSchema,
  milestone: milestoneEventSchema,
  label: labelEventSchema,
  gollum: gollumEventSchema,
  repository: repositoryEventSchema,
  public: publicEventSchema,
} as const;

export type EventKind = keyof typeof EVENT_SCHEMAS;

export type EventPayload<K extends EventKind> = z.infer<(typeof EVENT_SCHEMAS)[K]>;

export type HubEvent = { [K in EventKind]: { kind: K; payload: EventPayload<K> } }[EventKind];

export type EventOfKind<K extends EventKind> = Extract<HubEvent, { kind: K }>;

/** Commit counts derived for push events and carried beside the payload. */
export interface PushMetrics {
  size: number;
  distinctSize: number;
}

export const EVENT_KINDS: readonly string[] = Object.keys(EVENT_SCHEMAS);

export function isEventKind(value: string): value is EventKind {
  return Object.prototype.hasOwnProperty.call(EVENT_SCHEMAS, value);
}

export type DecodeResult =
  | { success: true; event: HubEvent }
  | { success: false; error: z.ZodError };

function decodeWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  build: (payload: T) => HubEvent,
): DecodeResult {
  const parsed = schema.safeParse(data);
  return parsed.success
    ? { success: true, event: build(parsed.data) }
    : { success: false, error: parsed.error };
}

/** Validate `data` against the schema of `kind`. Never throws. */
export function decodeEventPayload(kind: EventKind, data: unknown): DecodeResult {
  switch (kind) {
    case 'ping': return decodeWith(pingEventSchema, data, (payload) => ({ kind: 'ping', payload }));
    case 'meta': return decodeWith(metaEventSchema, data, (payload) => ({ kind: 'meta', payload }));
    case 'issues': return decodeWith(issuesEventSchema, data, (payload) => ({ kind: 'issues', payload }));
    case 'issue_comment':
      return decodeWith(issueCommentEventSchema, data, (payload) => ({ kind: 'issue_comment', payload }));
    case 'pull_request':
      return decodeWith(pullRequestEventSchema, data, (payload) => ({ kind: 'pull_request', payload }));
    case 'pull_request_review':
      return decodeWith(pullRequestReviewEventSchema, data, (payload) => ({ kind: 'pull_request_review', payload }));
    case 'pull_request_review_comment':
      return decodeWith(
        pullRequestReviewCommentEventSchema,
        data,
        (payload) => ({ kind: 'pull_request_review_comment', payload }),
      );
    case 'commit_comment':
      return decodeWith(commitCommentEventSchema, data, (payload) => ({ kind: 'commit_comment', payload }));
    case 'push': return decodeWith(pushEventSchema, data, (payload) => ({ kind: 'push', payload }));
    case 'create': return decodeWith(createEventSchema, data, (payload) => ({ kind: 'create', payload }));
    case 'delete': return decodeWith(deleteEventSchema, data, (payload) => ({ kind: 'delete', payload }));
    case 'release': return decodeWith(releaseEventSchema, data, (payload) => ({ kind: 'release', payload }));
    case 'star': return decodeWith(starEventSchema, data, (payload) => ({ kind: 'star', payload }));
    case 'watch': return decodeWith(watchEventSchema, data, (payload) => ({ kind: 'watch', payload }));
    case 'fork': return decodeWith(forkEventSchema, data, (payload) => ({ kind: 'fork', payload }));
    case 'milestone': return decodeWith(milestoneEventSchema, data, (payload) => ({ kind: 'milestone', payload }));
    case 'label': return decodeWith(labelEventSchema, data, (payload) => ({ kind: 'label', payload }));
    case 'gollum': return decodeWith(gollumEventSchema, data, (payload) => ({ kind: 'gollum', payload }));
    case 'repository':
      return decodeWith(repositoryEventSchema, data, (payload) => ({ kind: 'repository', payload }));
    case 'public': return decodeWith(publicEventSchema, data, (payload) => ({ kind: 'public', payload }));
  }
}

/** The action sub-tag of an event, or null for kinds that have none. */
export function actionOf(event: HubEvent): string | null {
  const action: unknown = event.payload.action;
  return typeof action === 'string' ? action : null;
}

/**
 * Identifier of the issue or pull request an event is about.
 * Comments on issues resolve to the issue; other kinds have no subject.
 */
export function subjectOf(event: HubEvent): number | null {
  switch (event.kind) {
    case 'issues':
    case 'issue_comment':
      return event.payload.issue.id;
    case 'pull_request':
    case 'pull_request_review':
    case 'pull_request_review_comment':
      return event.payload.pull_request.id;
    default:
      return null;
  }
}

/** Id of the user who triggered the event. */
export function actorOf(event: HubEvent): number | null {
  return event.payload.sender?.id ?? null;
}
