import { loadAppConfig } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import type { Issue } from '../issues/types.js';

export const REPLY_LABEL = 'needs-reply';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadAppConfig({}),
    storageDriver: 'memory',
    replyLabel: REPLY_LABEL,
    githubToken: 'test-token',
    tableTimeoutMs: 1000,
    enrichmentTimeoutMs: 1000,
    ...overrides,
  };
}

export function ghLabel(name: string, id = 1): Record<string, unknown> {
  return { id, name, color: 'ededed', description: null, default: false };
}

export interface PayloadOverrides {
  action?: string;
  issue?: Record<string, unknown>;
  repository?: Record<string, unknown> | null;
}

/** An `issues` webhook body for acme/widgets#42 */
export function issuePayload(overrides: PayloadOverrides = {}): Record<string, unknown> {
  return {
    action: overrides.action ?? 'opened',
    issue: {
      id: 1001,
      number: 42,
      title: 'Crash when saving settings',
      body: 'The app crashes when I save settings twice.',
      state: 'open',
      state_reason: null,
      locked: false,
      html_url: 'https://github.com/acme/widgets/issues/42',
      repository_url: 'https://api.github.com/repos/acme/widgets',
      user: { login: 'octo-user', id: 7 },
      labels: [],
      assignees: [],
      created_at: '2025-01-01T10:00:00Z',
      updated_at: '2025-01-01T10:00:00Z',
      closed_at: null,
      ...overrides.issue,
    },
    repository:
      overrides.repository === undefined ? { full_name: 'acme/widgets', id: 55 } : overrides.repository,
    sender: { login: 'octo-user', id: 7 },
  };
}

/** The record issuePayload() maps to */
export function issueRecord(overrides: Partial<Issue> = {}): Issue {
  return {
    issueId: '1001',
    issueNumber: 42,
    repositoryName: 'acme/widgets',
    title: 'Crash when saving settings',
    body: 'The app crashes when I save settings twice.',
    authorLogin: 'octo-user',
    state: 'open',
    stateReason: null,
    locked: false,
    htmlUrl: 'https://github.com/acme/widgets/issues/42',
    labels: [],
    assignees: [],
    createdAt: '2025-01-01T10:00:00.000Z',
    updatedAt: '2025-01-01T10:00:00.000Z',
    closedAt: null,
    ...overrides,
  };
}

export function labelRecord(name: string, id = '1') {
  return { name, id, color: 'ededed', description: null };
}
