import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import { TimeoutElapsedError, withTimeout } from '../common/timeout.js';
import { GITHUB_CLIENT } from '../github/github-client-interface.js';
import type { GithubClient, GithubSearchIssueDTO } from '../github/github-client-interface.js';
import { EnrichmentFailure, EnrichmentTimeout, errorMessage } from '../issues/errors.js';
import type { Issue, SimilarIssue, SimilarityField } from '../issues/types.js';

// GitHub search allows at most five boolean operators per query
const MAX_KEYWORDS = 5;
const MIN_KEYWORD_LENGTH = 3;

const STOP_WORDS = new Set([
  'the', 'and', 'for', 'with', 'that', 'this', 'from', 'have', 'has', 'but',
  'not', 'are', 'was', 'were', 'when', 'what', 'which', 'will', 'would', 'should',
  'can', 'could', 'does', 'did', 'into', 'there', 'then', 'than', 'also', 'any',
  'all', 'use', 'using', 'used', 'how', 'why', 'get', 'issue', 'bug', 'please',
]);

const SEARCH_FIELDS: readonly SimilarityField[] = ['title', 'body'];

/** Distinctive lower-cased words of `text`, in order of first appearance. */
export function extractKeywords(text: string | null | undefined, max = MAX_KEYWORDS): string[] {
  if (!text) return [];

  const words = text
    .toLowerCase()
    .replace(/```[\s\S]*?```/g, ' ')
    .replace(/https?:\/\/\S+/g, ' ')
    .replace(/[^a-z0-9_\s-]/g, ' ')
    .split(/\s+/)
    .map((w) => w.replace(/^-+|-+$/g, ''))
    .filter((w) => w.length >= MIN_KEYWORD_LENGTH && !/^\d+$/.test(w) && !STOP_WORDS.has(w));

  return [...new Set(words)].slice(0, max);
}

export function buildSearchQuery(
  repositoryName: string,
  field: SimilarityField,
  keywords: string[],
): string {
  return `repo:${repositoryName} is:issue in:${field} ${keywords.join(' OR ')}`;
}

/**
 * Merge per-field hits by issue number. Issues found through more fields rank
 * first, newer (higher number) issues break ties.
 */
export function mergeResults(
  self: Pick<Issue, 'issueNumber'>,
  hits: Array<{ field: SimilarityField; items: GithubSearchIssueDTO[] }>,
): SimilarIssue[] {
  const byNumber = new Map<number, SimilarIssue>();

  for (const { field, items } of hits) {
    for (const item of items) {
      if (item.isPR || item.number === self.issueNumber) continue;

      const prev = byNumber.get(item.number);
      if (prev) {
        if (!prev.matchedFields.includes(field)) prev.matchedFields.push(field);
      } else {
        byNumber.set(item.number, {
          issueNumber: item.number,
          title: item.title,
          htmlUrl: item.htmlUrl,
          state: item.state,
          matchedFields: [field],
        });
      }
    }
  }

  return [...byNumber.values()].sort(
    (a, b) => b.matchedFields.length - a.matchedFields.length || b.issueNumber - a.issueNumber,
  );
}

export function logSimilarIssues(logger: Logger, similar: SimilarIssue[], issue: Issue): void {
  if (similar.length === 0) {
    logger.log(`No similar issues found for #${issue.issueNumber}`);
    return;
  }

  logger.log(`Found ${similar.length} similar issues for #${issue.issueNumber}`);
  for (const s of similar) {
    logger.log(`  #${s.issueNumber} [${s.state}] ${s.title} (matched: ${s.matchedFields.join(', ')})`);
  }
}

@Injectable()
export class SimilarityService {
  private readonly log = new Logger(SimilarityService.name);

  constructor(
    @Inject(GITHUB_CLIENT) private readonly github: GithubClient,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /**
   * Issues in the same repository resembling `issue`, searched per field.
   * Throws EnrichmentFailure (EnrichmentTimeout when the deadline passes).
   */
  async findSimilar(issue: Issue, limitPerField: number): Promise<SimilarIssue[]> {
    try {
      return await withTimeout(
        this.search(issue, limitPerField),
        this.config.enrichmentTimeoutMs,
        'similarity search',
      );
    } catch (error) {
      if (error instanceof TimeoutElapsedError) {
        throw new EnrichmentTimeout(error.message, { cause: error });
      }
      throw new EnrichmentFailure(`Similarity search failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async search(issue: Issue, limitPerField: number): Promise<SimilarIssue[]> {
    const hits: Array<{ field: SimilarityField; items: GithubSearchIssueDTO[] }> = [];

    for (const field of SEARCH_FIELDS) {
      const keywords = extractKeywords(field === 'title' ? issue.title : issue.body);
      if (keywords.length === 0) {
        this.log.debug(`No ${field} keywords for #${issue.issueNumber}, skipping`);
        continue;
      }

      const q = buildSearchQuery(issue.repositoryName, field, keywords);
      // one extra, since the issue itself is usually among the hits
      const items = await this.github.searchIssues({ q, perPage: limitPerField + 1 });
      hits.push({
        field,
        items: items
          .filter((it) => !it.isPR && it.number !== issue.issueNumber)
          .slice(0, limitPerField),
      });
    }

    return mergeResults(issue, hits);
  }
}
