import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { KeyedSerialQueue } from '../common/keyed-serial-queue.js';
import type { HoldKey } from '../common/keyed-serial-queue.js';
import { withTimeout } from '../common/timeout.js';
import { changedFieldNames, diffIssue } from './diff.js';
import { DuplicateIssueError, errorMessage, PersistenceError } from './errors.js';
import { labelSetOf, ReplyDecisionService } from './reply-decision.js';
import type { LabelSet } from './reply-decision.js';
import type { IssueTable } from './table/issue-table.js';
import type { Issue, IssueAction, IssueField } from './types.js';

export type WriteKind = 'inserted' | 'updated' | 'unchanged';

export interface ReconcileResult {
  shouldReply: boolean;
  write: WriteKind;
  changedFields: IssueField[];
}

type StoredState =
  | { kind: 'inserted' }
  | { kind: 'existing'; issue: Issue };

@Injectable()
export class ReconciliationService {
  private readonly log = new Logger(ReconciliationService.name);
  private readonly queue = new KeyedSerialQueue();

  constructor(
    @Inject(ReplyDecisionService) private readonly decisions: ReplyDecisionService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * lookup -> diff -> write -> reply decision, for one event.
   * Events for the same issue are applied in arrival order; a table call that
   * timed out keeps the issue's slot until it settles.
   * Throws PersistenceError when the table fails; no decision is made then.
   */
  reconcile(table: IssueTable, issue: Issue, action: IssueAction): Promise<ReconcileResult> {
    return this.queue.run(`${table.name}:${issue.issueId}`, (hold) =>
      this.reconcileNow(table, issue, action, hold),
    );
  }

  private async reconcileNow(
    table: IssueTable,
    issue: Issue,
    action: IssueAction,
    hold: HoldKey,
  ): Promise<ReconcileResult> {
    this.log.log(`Saving issue ${issue.issueId} (#${issue.issueNumber}, action: ${action})`);

    let stored: StoredState;
    if (action === 'opened') {
      stored = await this.insertOrAdopt(table, issue, hold);
    } else {
      const lookup = await this.io('get', issue, hold, () => table.get(issue.issueId));
      stored =
        lookup.kind === 'found'
          ? { kind: 'existing', issue: lookup.issue }
          : await this.insertOrAdopt(table, issue, hold); // late creation / backfill
    }

    let previousLabels: LabelSet | null = null;
    let write: WriteKind = 'inserted';
    let changedFields: IssueField[] = [];

    if (stored.kind === 'inserted') {
      this.log.log(`Inserted new issue #${issue.issueNumber} (action: ${action})`);
    } else {
      previousLabels = labelSetOf(stored.issue);
      changedFields = await this.patch(table, stored.issue, issue, hold);
      write = changedFields.length ? 'updated' : 'unchanged';
    }

    return {
      shouldReply: this.decisions.decide(action, previousLabels, issue),
      write,
      changedFields,
    };
  }

  /** Insert, or hand back the stored row when the id is already taken. */
  private async insertOrAdopt(table: IssueTable, issue: Issue, hold: HoldKey): Promise<StoredState> {
    try {
      await this.io('insert', issue, hold, () => table.insert(issue));
      return { kind: 'inserted' };
    } catch (error) {
      if (!(error instanceof DuplicateIssueError)) throw error;
    }

    const lookup = await this.io('get', issue, hold, () => table.get(issue.issueId));
    if (lookup.kind === 'missing') {
      throw new PersistenceError(
        `Issue ${issue.issueId} reported as duplicate but could not be read back`,
      );
    }
    this.log.warn(`Issue #${issue.issueNumber} is already stored, updating in place`);
    return { kind: 'existing', issue: lookup.issue };
  }

  private async patch(
    table: IssueTable,
    existing: Issue,
    incoming: Issue,
    hold: HoldKey,
  ): Promise<IssueField[]> {
    this.log.log(`Checking for changes in issue #${incoming.issueNumber}`);
    const changes = diffIssue(existing, incoming);
    const fields = changedFieldNames(changes);

    if (fields.length === 0) {
      this.log.log(`No changes detected for issue #${incoming.issueNumber}, skipping update`);
      return fields;
    }

    this.log.log(`Updating ${fields.length} changed fields for issue #${incoming.issueNumber}`);
    this.log.debug(`Changed fields: ${fields.join(', ')}`);
    await this.io('update', incoming, hold, () => table.update(changes, { issueId: incoming.issueId }));
    return fields;
  }

  private async io<T>(op: string, issue: Issue, hold: HoldKey, work: () => Promise<T>): Promise<T> {
    try {
      const call = work();
      hold(call);
      return await withTimeout(call, this.config.tableTimeoutMs, `table ${op}`);
    } catch (error) {
      if (error instanceof DuplicateIssueError) throw error;
      this.log.error(`Error saving issue #${issue.issueNumber} (${op}): ${errorMessage(error)}`);
      throw new PersistenceError(`Table ${op} failed for issue ${issue.issueId}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
