import {
  LABELS_CHANGED,
  MILESTONE_CHANGED,
  actionOf,
  actorOf,
  subjectOf,
} from '@hubrelay/types';
import type { AggregationSummary, HubEvent, Label, Milestone, PushMetrics } from '@hubrelay/types';

/**
 * Merge state carried by a pending aggregation. The accumulator type decides
 * which merger a candidate event is offered to, so two mergers never compete
 * for the same aggregation.
 */
export type Accumulator =
  | { type: 'open-labels'; labelIds: ReadonlySet<number> }
  | { type: 'labels'; added: Label[]; removed: Label[] }
  | { type: 'milestone'; from: Milestone | null; to: Milestone | null }
  | { type: 'state-change'; closed: boolean; reopened: boolean };

/** The representative of an aggregation, mutated in place by merges. */
export interface AggregationDraft {
  event: HubEvent;
  action: string | null;
  metrics: PushMetrics | null;
  accumulator: Accumulator;
}

/**
 * - `rejected`: the candidate is unrelated, offer it elsewhere
 * - `merged`: folded in, the deadline restarts
 * - `merged-final`: folded in, the deadline is left alone
 */
export type MergeOutcome = 'rejected' | 'merged' | 'merged-final';

/** Builds the initial accumulator for an event that starts an aggregation. */
export type Starter = (draft: Omit<AggregationDraft, 'accumulator'>) => Accumulator;

// ─── Field access ────────────────────────────────────────────────────────────

function labelOf(event: HubEvent): Label | undefined {
  return event.kind === 'issues' || event.kind === 'pull_request' ? event.payload.label : undefined;
}

function milestoneOf(event: HubEvent): Milestone | undefined {
  return event.kind === 'issues' || event.kind === 'pull_request' ? event.payload.milestone : undefined;
}

function openedLabelsOf(event: HubEvent): Label[] {
  switch (event.kind) {
    case 'issues': return event.payload.issue.labels;
    case 'pull_request': return event.payload.pull_request.labels;
    default: return [];
  }
}

function requireLabel(event: HubEvent): Label {
  const label = labelOf(event);
  if (!label) {
    throw new Error(`${event.kind} ${actionOf(event)} event has no label`);
  }
  return label;
}

function requireMilestone(event: HubEvent): Milestone {
  const milestone = milestoneOf(event);
  if (!milestone) {
    throw new Error(`${event.kind} ${actionOf(event)} event has no milestone`);
  }
  return milestone;
}

function sameSubject(a: HubEvent, b: HubEvent): boolean {
  const subject = subjectOf(a);
  return subject !== null && a.kind === b.kind && subject === subjectOf(b);
}

function sameIssueAndActor(a: HubEvent, b: HubEvent): boolean {
  const subject = subjectOf(a);
  const actor = actorOf(a);
  return subject !== null && actor !== null && subject === subjectOf(b) && actor === actorOf(b);
}

function withoutLabel(labels: Label[], id: number): Label[] {
  return labels.filter((label) => label.id !== id);
}

// ─── Starters ────────────────────────────────────────────────────────────────

const startOpenLabelDropping: Starter = ({ event }) => ({
  type: 'open-labels',
  labelIds: new Set(openedLabelsOf(event).map((label) => label.id)),
});

const startLabelAggregation: Starter = (draft) => {
  const label = requireLabel(draft.event);
  const labeled = draft.action === 'labeled';
  draft.action = LABELS_CHANGED;
  return {
    type: 'labels',
    added: labeled ? [label] : [],
    removed: labeled ? [] : [label],
  };
};

const startMilestoneAggregation: Starter = ({ event, action }) => {
  const milestone = requireMilestone(event);
  return action === 'milestoned'
    ? { type: 'milestone', from: null, to: milestone }
    : { type: 'milestone', from: milestone, to: null };
};

// Comment and close/reopen only track delivery ids until their counterpart arrives.
const startStateChange: Starter = () => ({ type: 'state-change', closed: false, reopened: false });

/** (kind:action) → starter. Anything absent flushes on its own. */
const STARTERS = new Map<string, Starter>([
  ['issues:opened', startOpenLabelDropping],
  ['issues:labeled', startLabelAggregation],
  ['issues:unlabeled', startLabelAggregation],
  ['issues:milestoned', startMilestoneAggregation],
  ['issues:demilestoned', startMilestoneAggregation],
  ['issues:closed', startStateChange],
  ['issues:reopened', startStateChange],
  ['issue_comment:created', startStateChange],
  ['pull_request:opened', startOpenLabelDropping],
  ['pull_request:labeled', startLabelAggregation],
  ['pull_request:unlabeled', startLabelAggregation],
  ['pull_request:milestoned', startMilestoneAggregation],
  ['pull_request:demilestoned', startMilestoneAggregation],
]);

export function starterFor(event: HubEvent): Starter | undefined {
  return STARTERS.get(`${event.kind}:${actionOf(event)}`);
}

// ─── Mergers ─────────────────────────────────────────────────────────────────

function mergeOpenLabels(
  draft: AggregationDraft,
  acc: Extract<Accumulator, { type: 'open-labels' }>,
  candidate: HubEvent,
): MergeOutcome {
  if (!sameSubject(draft.event, candidate) || actionOf(candidate) !== 'labeled') return 'rejected';
  const label = labelOf(candidate);
  // Already shown as part of the "opened" notice.
  return label && acc.labelIds.has(label.id) ? 'merged' : 'rejected';
}

function mergeLabels(
  draft: AggregationDraft,
  acc: Extract<Accumulator, { type: 'labels' }>,
  candidate: HubEvent,
): MergeOutcome {
  if (!sameSubject(draft.event, candidate)) return 'rejected';
  const action = actionOf(candidate);
  if (action !== 'labeled' && action !== 'unlabeled') return 'rejected';

  const label = labelOf(candidate);
  if (!label) return 'rejected';

  if (action === 'labeled') {
    acc.removed = withoutLabel(acc.removed, label.id);
    acc.added = [...withoutLabel(acc.added, label.id), label];
  } else {
    acc.added = withoutLabel(acc.added, label.id);
    acc.removed = [...withoutLabel(acc.removed, label.id), label];
  }
  return 'merged';
}

function mergeMilestone(
  draft: AggregationDraft,
  acc: Extract<Accumulator, { type: 'milestone' }>,
  candidate: HubEvent,
): MergeOutcome {
  if (draft.action === MILESTONE_CHANGED || !sameSubject(draft.event, candidate)) return 'rejected';
  const milestone = milestoneOf(candidate);
  if (!milestone) return 'rejected';

  const action = actionOf(candidate);
  if (action === 'milestoned' && acc.to === null) {
    acc.to = milestone;
  } else if (action === 'demilestoned' && acc.from === null) {
    acc.from = milestone;
  } else {
    return 'rejected';
  }
  draft.action = MILESTONE_CHANGED;
  return 'merged-final';
}

function mergeStateChange(
  draft: AggregationDraft,
  acc: Extract<Accumulator, { type: 'state-change' }>,
  candidate: HubEvent,
): MergeOutcome {
  const current = draft.event;
  if (!sameIssueAndActor(current, candidate)) return 'rejected';

  const candidateAction = actionOf(candidate);

  // Comment first, then the issue gets closed or reopened by the commenter.
  if (current.kind === 'issue_comment' && candidate.kind === 'issues') {
    if (candidateAction === 'closed') acc.closed = true;
    else if (candidateAction === 'reopened') acc.reopened = true;
    else return 'rejected';
    return 'merged';
  }

  // Closed or reopened first, then the same user comments: anchor on the comment.
  if (current.kind === 'issues' && candidate.kind === 'issue_comment' && candidateAction === 'created') {
    if (draft.action === 'closed') acc.closed = true;
    else if (draft.action === 'reopened') acc.reopened = true;
    else return 'rejected';
    draft.event = candidate;
    draft.action = candidateAction;
    draft.metrics = null;
    return 'merged';
  }

  return 'rejected';
}

/** Offer `candidate` to an aggregation; mutates `draft` when it merges. */
export function mergeInto(draft: AggregationDraft, candidate: HubEvent): MergeOutcome {
  const acc = draft.accumulator;
  switch (acc.type) {
    case 'open-labels': return mergeOpenLabels(draft, acc, candidate);
    case 'labels': return mergeLabels(draft, acc, candidate);
    case 'milestone': return mergeMilestone(draft, acc, candidate);
    case 'state-change': return mergeStateChange(draft, acc, candidate);
  }
}

/** Accumulator data the renderer sees; null when there is nothing to show. */
export function summarize(acc: Accumulator): AggregationSummary | null {
  switch (acc.type) {
    case 'open-labels':
      return null;
    case 'labels':
      return { type: 'labels', added: [...acc.added], removed: [...acc.removed] };
    case 'milestone':
      return { type: 'milestone', from: acc.from, to: acc.to };
    case 'state-change':
      return acc.closed || acc.reopened
        ? { type: 'state-change', closed: acc.closed, reopened: acc.reopened }
        : null;
  }
}
