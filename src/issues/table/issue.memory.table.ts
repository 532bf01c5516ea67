import { Injectable } from '@nestjs/common';
import { applyIssuePatch, copyIssue, copyPatch } from '../diff.js';
import { DuplicateIssueError } from '../errors.js';
import type { Issue, IssueId, IssueKey, IssuePatch } from '../types.js';
import type { IssueLookup, IssueTable, IssueTableFactory } from './issue-table.js';

/** Mirror of TypeOrmIssueTable kept in process memory. */
export class MemoryIssueTable implements IssueTable {
  private readonly rows = new Map<IssueId, Issue>();

  constructor(readonly name: string) {}

  async get(issueId: IssueId): Promise<IssueLookup> {
    const row = this.rows.get(issueId);
    return row ? { kind: 'found', issue: copyIssue(row) } : { kind: 'missing' };
  }

  async insert(issue: Issue): Promise<void> {
    if (this.rows.has(issue.issueId)) throw new DuplicateIssueError(issue.issueId);
    this.rows.set(issue.issueId, copyIssue(issue));
  }

  async update(patch: IssuePatch, key: IssueKey): Promise<number> {
    const row = this.rows.get(key.issueId);
    if (!row) return 0;
    this.rows.set(key.issueId, applyIssuePatch(row, copyPatch(patch)));
    return 1;
  }

  /** Snapshot of all rows, for inspection */
  all(): Issue[] {
    return [...this.rows.values()].map(copyIssue);
  }

  clear(): void {
    this.rows.clear();
  }
}

@Injectable()
export class MemoryIssueTableFactory implements IssueTableFactory {
  private readonly tables = new Map<string, MemoryIssueTable>();

  open(name: string): MemoryIssueTable {
    let table = this.tables.get(name);
    if (!table) {
      table = new MemoryIssueTable(name);
      this.tables.set(name, table);
    }
    return table;
  }
}
