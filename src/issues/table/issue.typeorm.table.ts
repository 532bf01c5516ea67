import { Inject, Injectable } from '@nestjs/common';
import { DataSource, QueryFailedError, Repository } from 'typeorm';
import { isProtectedField } from '../diff.js';
import { DuplicateIssueError, UnknownTableError } from '../errors.js';
import type { Issue, IssueId, IssueKey, IssuePatch } from '../types.js';
import { ISSUE_FIELDS } from '../types.js';
import { IssueEntity } from './issue.entity.js';
import type { IssueLookup, IssueTable, IssueTableFactory } from './issue-table.js';

type IssueColumns = Parameters<Repository<IssueEntity>['update']>[1];

const PG_UNIQUE_VIOLATION = '23505';

function toDate(iso: string | null | undefined): Date | null {
  return iso ? new Date(iso) : null;
}

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function entityToIssue(row: IssueEntity): Issue {
  return {
    issueId: row.issueId,
    issueNumber: row.issueNumber,
    repositoryName: row.repositoryName,
    title: row.title,
    body: row.body,
    authorLogin: row.authorLogin,
    state: row.state,
    stateReason: row.stateReason,
    locked: row.locked,
    htmlUrl: row.htmlUrl,
    labels: row.labels ?? [],
    assignees: row.assignees ?? [],
    createdAt: toIso(row.createdAt),
    updatedAt: toIso(row.updatedAt),
    closedAt: toIso(row.closedAt),
  };
}

export function issueToEntity(issue: Issue): IssueEntity {
  const row = new IssueEntity();
  row.issueId = issue.issueId;
  row.issueNumber = issue.issueNumber;
  row.repositoryName = issue.repositoryName;
  row.title = issue.title;
  row.body = issue.body;
  row.authorLogin = issue.authorLogin;
  row.state = issue.state;
  row.stateReason = issue.stateReason;
  row.locked = issue.locked;
  row.htmlUrl = issue.htmlUrl;
  row.labels = issue.labels;
  row.assignees = issue.assignees;
  row.createdAt = toDate(issue.createdAt);
  row.updatedAt = toDate(issue.updatedAt);
  row.closedAt = toDate(issue.closedAt);
  return row;
}

/** Column map for an UPDATE; protected fields never make it into the SET clause. */
export function patchToColumns(patch: IssuePatch): IssueColumns {
  const columns: IssueColumns = {};

  for (const field of ISSUE_FIELDS) {
    if (isProtectedField(field) || !(field in patch)) continue;
    switch (field) {
      case 'updatedAt':
      case 'closedAt':
        columns[field] = toDate(patch[field]);
        break;
      case 'title':
        if (patch.title !== undefined) columns.title = patch.title;
        break;
      case 'body':
        if (patch.body !== undefined) columns.body = patch.body;
        break;
      case 'authorLogin':
        if (patch.authorLogin !== undefined) columns.authorLogin = patch.authorLogin;
        break;
      case 'state':
        if (patch.state !== undefined) columns.state = patch.state;
        break;
      case 'stateReason':
        if (patch.stateReason !== undefined) columns.stateReason = patch.stateReason;
        break;
      case 'locked':
        if (patch.locked !== undefined) columns.locked = patch.locked;
        break;
      case 'htmlUrl':
        if (patch.htmlUrl !== undefined) columns.htmlUrl = patch.htmlUrl;
        break;
      case 'labels':
        if (patch.labels !== undefined) columns.labels = patch.labels;
        break;
      case 'assignees':
        if (patch.assignees !== undefined) columns.assignees = patch.assignees;
        break;
    }
  }

  return columns;
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === PG_UNIQUE_VIOLATION
  );
}

export class TypeOrmIssueTable implements IssueTable {
  constructor(
    readonly name: string,
    private readonly repo: Repository<IssueEntity>,
  ) {}

  async get(issueId: IssueId): Promise<IssueLookup> {
    const row = await this.repo.findOne({ where: { issueId } });
    return row ? { kind: 'found', issue: entityToIssue(row) } : { kind: 'missing' };
  }

  async insert(issue: Issue): Promise<void> {
    try {
      await this.repo.insert(issueToEntity(issue));
    } catch (error) {
      if (isUniqueViolation(error)) throw new DuplicateIssueError(issue.issueId);
      throw error;
    }
  }

  async update(patch: IssuePatch, key: IssueKey): Promise<number> {
    const columns = patchToColumns(patch);
    if (Object.keys(columns).length === 0) return 0;

    // single UPDATE ... WHERE issue_id = $1
    const result = await this.repo.update({ issueId: key.issueId }, columns);
    return result.affected ?? 0;
  }
}

@Injectable()
export class TypeOrmIssueTableFactory implements IssueTableFactory {
  constructor(@Inject(DataSource) private readonly ds: DataSource) {}

  open(name: string): TypeOrmIssueTable {
    const metadata = this.ds.entityMetadatas.find(
      (m) => m.target === IssueEntity && m.tableName === name,
    );
    if (!metadata) throw new UnknownTableError(name);

    return new TypeOrmIssueTable(name, this.ds.getRepository(IssueEntity));
  }
}
