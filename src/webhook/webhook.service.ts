import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { IssueError, errorMessage } from '../issues/errors.js';
import type { IssueErrorCode } from '../issues/errors.js';
import { labelNamesOf, mapIssueEvent } from '../issues/mappers.js';
import { ReconciliationService } from '../issues/reconciliation.service.js';
import { ISSUE_TABLE_FACTORY } from '../issues/table/issue-table.js';
import type { IssueTableFactory } from '../issues/table/issue-table.js';
import type { Issue, IssueAction, SimilarIssue } from '../issues/types.js';
import { CommentNotifier } from '../notifications/comment-notifier.service.js';
import { logSimilarIssues, SimilarityService } from '../similarity/similarity.service.js';

export type OutcomeStatus = 'success' | 'skipped' | 'error';

export interface WebhookOutcome {
  status: OutcomeStatus;
  message: string;
  errorCode?: IssueErrorCode | 'INTERNAL';
}

@Injectable()
export class IssueWebhookService {
  private readonly logger = new Logger(IssueWebhookService.name);

  constructor(
    @Inject(ISSUE_TABLE_FACTORY) private readonly tables: IssueTableFactory,
    @Inject(ReconciliationService) private readonly reconciliation: ReconciliationService,
    @Inject(SimilarityService) private readonly similarity: SimilarityService,
    @Inject(CommentNotifier) private readonly notifier: CommentNotifier,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * One `issues` event: map -> reconcile -> (reply) search -> comment.
   * Only mapping and persistence can turn the outcome into an error.
   */
  async handle(payload: unknown): Promise<WebhookOutcome> {
    let action: IssueAction;
    let issue: Issue;
    let shouldReply: boolean;

    try {
      ({ action, issue } = mapIssueEvent(payload));
      this.logEvent(action, issue);

      const table = this.tables.open(this.config.issueTableName);
      ({ shouldReply } = await this.reconciliation.reconcile(table, issue, action));
    } catch (error) {
      this.logger.error(`Error processing issues webhook: ${errorMessage(error)}`);
      return {
        status: 'error',
        message: errorMessage(error),
        errorCode: error instanceof IssueError ? error.code : 'INTERNAL',
      };
    }

    if (!shouldReply) {
      this.logger.log(`Skipping reply for issue #${issue.issueNumber}`);
      return { status: 'skipped', message: 'Issue skipped (not marked for reply)' };
    }

    const similar = await this.searchSimilar(issue);
    this.logger.log(`Successfully processed ${action} event for issue #${issue.issueNumber}`);

    await this.notify(action, issue, similar);
    return { status: 'success', message: 'Issues webhook processed' };
  }

  /** Best effort; an empty list when the search fails. */
  private async searchSimilar(issue: Issue): Promise<SimilarIssue[]> {
    try {
      this.logger.log(`Searching for similar issues to #${issue.issueNumber}`);
      const similar = await this.similarity.findSimilar(issue, this.config.similarityLimitPerField);
      logSimilarIssues(this.logger, similar, issue);
      return similar;
    } catch (error) {
      this.logger.error(
        `Error during similarity search for issue #${issue.issueNumber}: ${errorMessage(error)}`,
      );
      return [];
    }
  }

  private async notify(action: IssueAction, issue: Issue, similar: SimilarIssue[]): Promise<void> {
    try {
      if (!this.notifier.shouldSendComment(action, issue, similar)) {
        this.logger.log(`No comment for issue #${issue.issueNumber}`);
        return;
      }
      await this.notifier.sendComment(issue, similar);
    } catch (error) {
      this.logger.error(`Error sending comment for issue #${issue.issueNumber}: ${errorMessage(error)}`);
    }
  }

  private logEvent(action: IssueAction, issue: Issue): void {
    this.logger.log(`Issue ${action}: #${issue.issueNumber} - ${issue.title}`);
    this.logger.log(`Repository: ${issue.repositoryName}`);
    this.logger.log(`Author: ${issue.authorLogin ?? 'unknown'}`);
    this.logger.log(`State: ${issue.state}`);
    if (issue.labels.length) this.logger.log(`Labels: ${labelNamesOf(issue).join(', ')}`);
    if (issue.assignees.length) {
      this.logger.log(`Assignees: ${issue.assignees.map((a) => a.login).join(', ')}`);
    }
  }
}
