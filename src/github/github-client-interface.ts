// Abstraction over the GitHub API used by similarity search and notifications

export const GITHUB_CLIENT = Symbol('GITHUB_CLIENT');

export interface GithubSearchIssueDTO {
  number: number;
  title: string;
  state: 'open' | 'closed';
  htmlUrl: string | null;
  isPR: boolean;
  raw: unknown;
}

export interface GithubCommentDTO {
  id: string;
  htmlUrl: string | null;
  raw: unknown;
}

// The interface consumed by SimilarityService and CommentNotifier
export interface GithubClient {
  // Search
  searchIssues(params: { q: string; perPage: number }): Promise<GithubSearchIssueDTO[]>;

  // Comments
  createIssueComment(params: {
    owner: string;
    repo: string;
    issueNumber: number;
    body: string;
  }): Promise<GithubCommentDTO>;
}

/** "owner/name" -> { owner, repo } */
export function splitRepositoryName(fullName: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = fullName.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new Error(`Repository name must be "owner/name", got "${fullName}"`);
  }
  return { owner, repo };
}
