export type ISO8601 = string;  // normalized with Date#toISOString, e.g. "2025-09-08T12:34:56.000Z"
export type IssueId = string;

/** Enums / literal unions */
export type IssueState = 'open' | 'closed';

/**
 * Webhook `action` values for the `issues` event. Unknown values are kept as
 * plain strings so a new GitHub action still flows through the update path.
 */
export type IssueAction =
  | 'opened'
  | 'edited'
  | 'deleted'
  | 'closed'
  | 'reopened'
  | 'labeled'
  | 'unlabeled'
  | 'assigned'
  | 'unassigned'
  | 'locked'
  | 'unlocked'
  | 'transferred'
  | 'pinned'
  | 'unpinned'
  | 'milestoned'
  | 'demilestoned'
  | 'unknown'
  | (string & {});

export interface LabelDescriptor {
  name: string;
  id?: string | null;
  color?: string | null;
  description?: string | null;
}

export interface UserDescriptor {
  login: string;
  id?: string | null;
}

/** Canonical issue record, as stored and compared */
export interface Issue {
  issueId: IssueId;               // GitHub issue id as string
  issueNumber: number;
  repositoryName: string;         // "owner/name"
  title: string;
  body: string | null;
  authorLogin: string | null;
  state: IssueState;
  stateReason: string | null;     // "completed" | "not_planned" | "reopened"
  locked: boolean;
  htmlUrl: string | null;
  labels: LabelDescriptor[];      // order as received; a set for reply decisions
  assignees: UserDescriptor[];
  createdAt: ISO8601 | null;
  updatedAt: ISO8601 | null;
  closedAt: ISO8601 | null;
}

export type IssueField = keyof Issue;

/** Fields the update path never writes, whatever the incoming payload says. */
export const PROTECTED_FIELDS: readonly IssueField[] = [
  'issueId',
  'issueNumber',
  'repositoryName',
  'createdAt',
] as const;

export const ISSUE_FIELDS: readonly IssueField[] = [
  'issueId',
  'issueNumber',
  'repositoryName',
  'title',
  'body',
  'authorLogin',
  'state',
  'stateReason',
  'locked',
  'htmlUrl',
  'labels',
  'assignees',
  'createdAt',
  'updatedAt',
  'closedAt',
] as const;

/** Field-name map of changed values, keyed like Issue */
export type IssuePatch = Partial<Issue>;

export interface IssueKey {
  issueId: IssueId;
}

export interface MappedIssueEvent {
  action: IssueAction;
  issue: Issue;
}

/** Result of a similarity search, one per matching issue */
export interface SimilarIssue {
  issueNumber: number;
  title: string;
  htmlUrl: string | null;
  state: IssueState;
  matchedFields: SimilarityField[];
}

export type SimilarityField = 'title' | 'body';
