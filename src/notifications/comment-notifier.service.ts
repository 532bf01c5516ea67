import { Inject, Injectable, Logger } from '@nestjs/common';
import { RequestError } from '@octokit/request-error';
import { withTimeout } from '../common/timeout.js';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { GITHUB_CLIENT, splitRepositoryName } from '../github/github-client-interface.js';
import type { GithubClient } from '../github/github-client-interface.js';
import { errorMessage, NotificationFailure } from '../issues/errors.js';
import type { Issue, IssueAction, SimilarIssue } from '../issues/types.js';
import { renderSimilarIssuesComment } from './comment-template.js';

const NO_COMMENT_ACTIONS: ReadonlySet<IssueAction> = new Set(['closed', 'deleted']);

@Injectable()
export class CommentNotifier {
  private readonly log = new Logger(CommentNotifier.name);

  constructor(
    @Inject(GITHUB_CLIENT) private readonly github: GithubClient,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  shouldSendComment(action: IssueAction, issue: Issue, similar: SimilarIssue[]): boolean {
    if (issue.state === 'closed' || NO_COMMENT_ACTIONS.has(action)) return false;
    if (issue.locked) return false;
    return similar.length > 0 || this.config.commentWhenNoMatches;
  }

  /** Throws NotificationFailure, also when GitHub does not answer within ENRICHMENT_TIMEOUT_MS. */
  async sendComment(issue: Issue, similar: SimilarIssue[]): Promise<void> {
    const body = renderSimilarIssuesComment(issue, similar);

    try {
      const { owner, repo } = splitRepositoryName(issue.repositoryName);
      const comment = await withTimeout(
        this.github.createIssueComment({ owner, repo, issueNumber: issue.issueNumber, body }),
        this.config.enrichmentTimeoutMs,
        'comment create',
      );
      this.log.log(`Commented on #${issue.issueNumber}: ${comment.htmlUrl ?? comment.id}`);
    } catch (error) {
      const status = error instanceof RequestError ? ` (HTTP ${error.status})` : '';
      throw new NotificationFailure(
        `Could not comment on #${issue.issueNumber}${status}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
