import { DuplicateIssueError, PersistenceError } from '../errors.js';
import { mapIssueEvent } from '../mappers.js';
import { ReconciliationService } from '../reconciliation.service.js';
import { ReplyDecisionService } from '../reply-decision.js';
import type { IssueLookup, IssueTable } from '../table/issue-table.js';
import { MemoryIssueTable } from '../table/issue.memory.table.js';
import type { Issue, IssueKey, IssuePatch } from '../types.js';
import { ghLabel, issuePayload, issueRecord, labelRecord, REPLY_LABEL, testConfig } from '../../testing/fixtures.js';
import type { AppConfig } from '../../config/app.config.js';

const buildService = (config: AppConfig = testConfig()) =>
  new ReconciliationService(new ReplyDecisionService(config), config);

const event = (action: string, issue: Record<string, unknown> = {}) =>
  mapIssueEvent(issuePayload({ action, issue }));

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delegates to a memory table, optionally slowing lookups and writes down */
class SlowTable implements IssueTable {
  readonly name = 'issues';
  readonly inner = new MemoryIssueTable('issues');
  updates: IssuePatch[] = [];
  /** Delay per update call, consumed in call order */
  updateDelaysMs: number[] = [];

  constructor(private readonly getDelayMs = 0) {}

  async get(issueId: string): Promise<IssueLookup> {
    if (this.getDelayMs) await sleep(this.getDelayMs);
    return this.inner.get(issueId);
  }

  insert(issue: Issue): Promise<void> {
    return this.inner.insert(issue);
  }

  async update(patch: IssuePatch, key: IssueKey): Promise<number> {
    this.updates.push(patch);
    const delay = this.updateDelaysMs.shift();
    if (delay) await sleep(delay);
    return this.inner.update(patch, key);
  }
}

describe('ReconciliationService', () => {
  it('stores a first-seen opened issue as mapped and replies only with the label', async () => {
    const service = buildService();

    const plain = new MemoryIssueTable('issues');
    const opened = event('opened');
    await expect(service.reconcile(plain, opened.issue, opened.action)).resolves.toEqual({
      shouldReply: false,
      write: 'inserted',
      changedFields: [],
    });
    expect(await plain.get('1001')).toEqual({ kind: 'found', issue: opened.issue });

    const labelled = new MemoryIssueTable('issues');
    const withLabel = event('opened', { labels: [ghLabel(REPLY_LABEL)] });
    const result = await service.reconcile(labelled, withLabel.issue, withLabel.action);
    expect(result.shouldReply).toBe(true);
  });

  it('follows opened -> labeled -> edited for issue #42', async () => {
    const service = buildService();
    const table = new SlowTable();

    const opened = event('opened');
    expect(await service.reconcile(table, opened.issue, opened.action)).toEqual({
      shouldReply: false,
      write: 'inserted',
      changedFields: [],
    });

    const labeled = event('labeled', { labels: [ghLabel(REPLY_LABEL)] });
    expect(await service.reconcile(table, labeled.issue, labeled.action)).toEqual({
      shouldReply: true,
      write: 'updated',
      changedFields: ['labels'],
    });

    const edited = event('edited', { labels: [ghLabel(REPLY_LABEL)], title: 'Crash when saving settings on macOS' });
    expect(await service.reconcile(table, edited.issue, edited.action)).toEqual({
      shouldReply: false,
      write: 'updated',
      changedFields: ['title'],
    });

    expect(table.updates).toEqual([
      { labels: [labelRecord(REPLY_LABEL)] },
      { title: 'Crash when saving settings on macOS' },
    ]);
    expect(await table.get('1001')).toEqual({
      kind: 'found',
      issue: issueRecord({ labels: [labelRecord(REPLY_LABEL)], title: 'Crash when saving settings on macOS' }),
    });
  });

  it('skips the write and does not retrigger on a re-delivered update', async () => {
    const service = buildService();
    const table = new SlowTable();
    await table.insert(issueRecord());

    const labeled = event('labeled', { labels: [ghLabel(REPLY_LABEL)] });
    const first = await service.reconcile(table, labeled.issue, labeled.action);
    const stored = await table.get('1001');
    const second = await service.reconcile(table, labeled.issue, labeled.action);

    expect(first.shouldReply).toBe(true);
    expect(second).toEqual({ shouldReply: false, write: 'unchanged', changedFields: [] });
    expect(table.updates).toHaveLength(1);
    expect(await table.get('1001')).toEqual(stored);
  });

  it('keeps protected fields when an update carries different values', async () => {
    const service = buildService();
    const table = new MemoryIssueTable('issues');
    await table.insert(issueRecord());

    const edited = event('edited', { number: 99, created_at: '2030-01-01T00:00:00Z' });
    const result = await service.reconcile(table, edited.issue, edited.action);

    expect(result).toEqual({ shouldReply: false, write: 'unchanged', changedFields: [] });
    expect(await table.get('1001')).toEqual({ kind: 'found', issue: issueRecord() });
  });

  it('inserts an unknown issue seen on an update action (backfill)', async () => {
    const service = buildService();
    const table = new MemoryIssueTable('issues');

    const labeled = event('labeled', { labels: [ghLabel(REPLY_LABEL)] });
    const result = await service.reconcile(table, labeled.issue, labeled.action);

    expect(result).toEqual({ shouldReply: true, write: 'inserted', changedFields: [] });
    expect(table.all()).toEqual([labeled.issue]);
  });

  it('updates in place when "opened" arrives for a stored issue', async () => {
    const service = buildService();
    const table = new MemoryIssueTable('issues');
    await table.insert(issueRecord({ labels: [labelRecord(REPLY_LABEL)] }));

    const opened = event('opened', { labels: [ghLabel(REPLY_LABEL)], title: 'Retitled' });
    const result = await service.reconcile(table, opened.issue, opened.action);

    expect(result).toEqual({ shouldReply: false, write: 'updated', changedFields: ['title'] });
    expect(table.all()).toHaveLength(1);
    expect(table.all()[0].title).toBe('Retitled');
  });

  it('replies when a duplicate "opened" adds the label', async () => {
    const service = buildService();
    const table = new MemoryIssueTable('issues');
    await table.insert(issueRecord());

    const opened = event('opened', { labels: [ghLabel(REPLY_LABEL)] });
    const result = await service.reconcile(table, opened.issue, opened.action);

    expect(result).toEqual({ shouldReply: true, write: 'updated', changedFields: ['labels'] });
  });

  it('wraps table failures in PersistenceError', async () => {
    const service = buildService();
    const failing: IssueTable = {
      name: 'issues',
      get: () => Promise.reject(new Error('connection reset')),
      insert: () => Promise.reject(new Error('connection reset')),
      update: () => Promise.reject(new Error('connection reset')),
    };

    const edited = event('edited');
    await expect(service.reconcile(failing, edited.issue, edited.action)).rejects.toThrow(
      'Table get failed for issue 1001: connection reset',
    );

    const opened = event('opened');
    const error = await service.reconcile(failing, opened.issue, opened.action).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toMatchObject({ code: 'PERSISTENCE' });
  });

  it('fails with PersistenceError when an update write fails', async () => {
    const service = buildService();
    const table = new MemoryIssueTable('issues');
    await table.insert(issueRecord());
    table.update = () => Promise.reject(new Error('disk full'));

    const edited = event('edited', { title: 'Changed' });
    await expect(service.reconcile(table, edited.issue, edited.action)).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });

  it('surfaces a table timeout as PersistenceError', async () => {
    const service = buildService(testConfig({ tableTimeoutMs: 20 }));
    const hanging: IssueTable = {
      name: 'issues',
      get: () => new Promise<IssueLookup>(() => undefined),
      insert: () => Promise.resolve(),
      update: () => Promise.resolve(1),
    };

    const edited = event('edited');
    await expect(service.reconcile(hanging, edited.issue, edited.action)).rejects.toThrow(
      'Table get failed for issue 1001: table get timed out after 20ms',
    );
  });

  it('fails when a duplicate insert cannot be read back', async () => {
    const service = buildService();
    const broken: IssueTable = {
      name: 'issues',
      get: () => Promise.resolve({ kind: 'missing' }),
      insert: (issue) => Promise.reject(new DuplicateIssueError(issue.issueId)),
      update: () => Promise.resolve(0),
    };

    const opened = event('opened');
    await expect(service.reconcile(broken, opened.issue, opened.action)).rejects.toThrow(
      'Issue 1001 reported as duplicate but could not be read back',
    );
  });

  it('applies events for the same issue in arrival order', async () => {
    const service = buildService();
    const table = new SlowTable(10);
    await table.insert(issueRecord());

    const labeled = event('labeled', { labels: [ghLabel(REPLY_LABEL)] });
    const unlabeled = event('unlabeled', { labels: [] });

    const [first, second] = await Promise.all([
      service.reconcile(table, labeled.issue, labeled.action),
      service.reconcile(table, unlabeled.issue, unlabeled.action),
    ]);

    expect(first).toEqual({ shouldReply: true, write: 'updated', changedFields: ['labels'] });
    expect(second).toEqual({ shouldReply: false, write: 'updated', changedFields: ['labels'] });
    expect(table.inner.all()[0].labels).toEqual([]);
  });

  it('lets a timed-out write land before the next event for the issue runs', async () => {
    const service = buildService(testConfig({ tableTimeoutMs: 20 }));
    const table = new SlowTable();
    await table.insert(issueRecord());
    table.updateDelaysMs = [80];

    const labeled = event('labeled', { labels: [ghLabel(REPLY_LABEL)] });
    const unlabeled = event('unlabeled', { labels: [] });

    const [first, second] = await Promise.allSettled([
      service.reconcile(table, labeled.issue, labeled.action),
      service.reconcile(table, unlabeled.issue, unlabeled.action),
    ]);

    expect(first).toMatchObject({
      status: 'rejected',
      reason: { message: 'Table update failed for issue 1001: table update timed out after 20ms' },
    });
    expect(second).toEqual({
      status: 'fulfilled',
      value: { shouldReply: false, write: 'updated', changedFields: ['labels'] },
    });
    expect(table.updates).toEqual([{ labels: [labelRecord(REPLY_LABEL)] }, { labels: [] }]);
    expect(table.inner.all()[0].labels).toEqual([]);
  });
});
