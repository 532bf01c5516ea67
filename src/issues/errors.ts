export type IssueErrorCode =
  | 'MALFORMED_PAYLOAD'
  | 'PERSISTENCE'
  | 'DUPLICATE_ISSUE'
  | 'UNKNOWN_TABLE'
  | 'ENRICHMENT'
  | 'ENRICHMENT_TIMEOUT'
  | 'NOTIFICATION';

export abstract class IssueError extends Error {
  abstract readonly code: IssueErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The inbound payload cannot become an Issue. Not retried. */
export class MalformedPayloadError extends IssueError {
  readonly code = 'MALFORMED_PAYLOAD';

  constructor(message: string, readonly problems: string[] = []) {
    super(problems.length ? `${message}: ${problems.join('; ')}` : message);
  }
}

/** Table I/O failed or timed out. Retry is up to the caller. */
export class PersistenceError extends IssueError {
  readonly code = 'PERSISTENCE';
}

export class DuplicateIssueError extends IssueError {
  readonly code = 'DUPLICATE_ISSUE';

  constructor(readonly issueId: string) {
    super(`Issue ${issueId} already exists`);
  }
}

export class UnknownTableError extends IssueError {
  readonly code = 'UNKNOWN_TABLE';

  constructor(readonly tableName: string) {
    super(`Unknown table "${tableName}"`);
  }
}

/** Similarity search failed; the event continues without results. */
export class EnrichmentFailure extends IssueError {
  readonly code: IssueErrorCode = 'ENRICHMENT';
}

export class EnrichmentTimeout extends EnrichmentFailure {
  override readonly code: IssueErrorCode = 'ENRICHMENT_TIMEOUT';
}

/** Posting the reply failed after persistence succeeded. */
export class NotificationFailure extends IssueError {
  readonly code = 'NOTIFICATION';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
