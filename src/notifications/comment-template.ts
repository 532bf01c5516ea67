import type { Issue, SimilarIssue } from '../issues/types.js';

/** Hidden HTML comment at the top of every reply. */
export const COMMENT_MARKER = '<!-- issue-reply-bot:similar-issues -->';

function escapeMarkdown(text: string): string {
  return text.replace(/([\\`*_[\]<>|])/g, '\\$1');
}

function renderLine(s: SimilarIssue): string {
  const title = escapeMarkdown(s.title.trim() || 'Untitled');
  const ref = s.htmlUrl ? `[#${s.issueNumber}](${s.htmlUrl})` : `#${s.issueNumber}`;
  return `- ${ref} ${title} (${s.state})`;
}

export function renderSimilarIssuesComment(issue: Issue, similar: SimilarIssue[]): string {
  const greeting = issue.authorLogin ? `Hi @${issue.authorLogin}, thanks for the report.` : 'Thanks for the report.';

  const lines = [COMMENT_MARKER, greeting, ''];
  if (similar.length === 0) {
    lines.push('I could not find any similar issues in this repository. A maintainer will take a look.');
  } else {
    lines.push('These existing issues look related and may already answer your question:', '');
    lines.push(...similar.map(renderLine));
  }
  return lines.join('\n');
}
