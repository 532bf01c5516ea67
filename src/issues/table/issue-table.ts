import type { Issue, IssueId, IssueKey, IssuePatch } from '../types.js';

export const ISSUE_TABLE_FACTORY = Symbol('ISSUE_TABLE_FACTORY');

/** Name of the one table IssueEntity maps to */
export const POSTGRES_ISSUE_TABLE = 'issues';

/** Lookup result; both branches must be handled by callers. */
export type IssueLookup =
  | { kind: 'found'; issue: Issue }
  | { kind: 'missing' };

/**
 * Keyed issue table. Implementations throw DuplicateIssueError from `insert`
 * when the id already exists, and apply `update` as one atomic write.
 */
export interface IssueTable {
  readonly name: string;
  get(issueId: IssueId): Promise<IssueLookup>;
  insert(issue: Issue): Promise<void>;
  /** Returns the number of rows written (0 when the key is unknown). */
  update(patch: IssuePatch, key: IssueKey): Promise<number>;
}

export interface IssueTableFactory {
  open(name: string): IssueTable;
}
