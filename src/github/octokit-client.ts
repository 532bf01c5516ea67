import { Inject, Injectable, Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import type {
  GithubClient,
  GithubCommentDTO,
  GithubSearchIssueDTO,
} from './github-client-interface.js';

// ---------- PARAM TYPES ----------
type SearchIssueParams =
  RestEndpointMethodTypes['search']['issuesAndPullRequests']['parameters'];

type SearchIssueItem =
  RestEndpointMethodTypes['search']['issuesAndPullRequests']['response']['data']['items'][number];

type CreateCommentParams =
  RestEndpointMethodTypes['issues']['createComment']['parameters'];

@Injectable()
export class OctokitClient implements GithubClient {
  private readonly logger = new Logger(OctokitClient.name);
  private readonly octokit: Octokit;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    if (!config.githubToken) {
      throw new Error('GITHUB_TOKEN environment variable is required');
    }
    this.octokit = new Octokit({
      auth: config.githubToken,
      userAgent: 'issue-reply-backend/1.0',
      request: { headers: { accept: 'application/vnd.github+json' } },
    });
  }

  // ---------- SEARCH: ISSUES ----------
  async searchIssues(params: { q: string; perPage: number }): Promise<GithubSearchIssueDTO[]> {
    const { data } = await this.octokit.search.issuesAndPullRequests({
      q: params.q,
      per_page: params.perPage,
    } satisfies SearchIssueParams);

    const items: SearchIssueItem[] = Array.isArray(data.items) ? data.items : [];
    this.logger.debug(`search "${params.q}" -> ${items.length} of ${data.total_count}`);

    return items.map(
      (it): GithubSearchIssueDTO => ({
        number: Number(it.number),
        title: it.title ?? '',
        state: it.state === 'closed' ? 'closed' : 'open',
        htmlUrl: it.html_url ?? null,
        isPR: it.pull_request != null,
        raw: it,
      }),
    );
  }

  // ---------- ISSUE COMMENTS ----------
  async createIssueComment(params: {
    owner: string;
    repo: string;
    issueNumber: number;
    body: string;
  }): Promise<GithubCommentDTO> {
    const { data } = await this.octokit.issues.createComment({
      owner: params.owner,
      repo: params.repo,
      issue_number: params.issueNumber,
      body: params.body,
    } satisfies CreateCommentParams);

    return { id: String(data.id), htmlUrl: data.html_url ?? null, raw: data };
  }
}
