import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { IssueEventDto } from './dto/issue-event.dto.js';
import { errorMessage, MalformedPayloadError } from './errors.js';
import type {
  ISO8601,
  Issue,
  IssueAction,
  LabelDescriptor,
  MappedIssueEvent,
  UserDescriptor,
} from './types.js';

const logger = new Logger('IssueMapper');

const REPO_URL_RE = /\/repos\/([^/]+\/[^/]+)\/?$/;

/**
 * Outcome of decoding a sub-structure. A failed decode still carries a usable
 * (empty) value so the event keeps going.
 */
export type Decoded<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; reason: string };

type ItemDecoder<T> = (item: unknown) => T | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function optionalId(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/* ---------- Labels / assignees ---------- */

function decodeList<T>(raw: unknown, decodeItem: ItemDecoder<T>, allowString = true): Decoded<T[]> {
  if (raw == null) return { ok: true, value: [] };

  if (typeof raw === 'string') {
    if (!allowString) return { ok: false, value: [], reason: 'nested JSON string' };
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      return { ok: false, value: [], reason: `invalid JSON (${errorMessage(error)})` };
    }
    return decodeList(parsed, decodeItem, false);
  }

  if (!Array.isArray(raw)) {
    return { ok: false, value: [], reason: `expected a list, got ${typeof raw}` };
  }

  const out: T[] = [];
  for (const [index, item] of raw.entries()) {
    const decoded = decodeItem(item);
    if (decoded === null) {
      return { ok: false, value: [], reason: `unreadable item at index ${index}` };
    }
    out.push(decoded);
  }
  return { ok: true, value: out };
}

const decodeLabel: ItemDecoder<LabelDescriptor> = (item) => {
  if (typeof item === 'string') {
    return item.length > 0 ? { name: item, id: null, color: null, description: null } : null;
  }
  if (!isRecord(item) || typeof item.name !== 'string' || item.name.length === 0) return null;

  return {
    name: item.name,
    id: optionalId(item.id),
    color: optionalString(item.color),
    description: optionalString(item.description),
  };
};

const decodeUser: ItemDecoder<UserDescriptor> = (item) => {
  if (typeof item === 'string') return item.length > 0 ? { login: item, id: null } : null;
  if (!isRecord(item) || typeof item.login !== 'string' || item.login.length === 0) return null;

  return { login: item.login, id: optionalId(item.id) };
};

/** Labels as an array of objects, an array of names, or either one JSON-encoded. */
export function decodeLabels(raw: unknown): Decoded<LabelDescriptor[]> {
  return decodeList(raw, decodeLabel);
}

export function decodeAssignees(raw: unknown): Decoded<UserDescriptor[]> {
  return decodeList(raw, decodeUser);
}

/* ---------- Scalars ---------- */

export function normalizeTimestamp(value: string | null | undefined): ISO8601 | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((e) => {
    const path = parent ? `${parent}.${e.property}` : e.property;
    const own = Object.values(e.constraints ?? {}).map((msg) =>
      msg.startsWith(e.property) ? `${path}${msg.slice(e.property.length)}` : `${path}: ${msg}`,
    );
    return [...own, ...flattenErrors(e.children ?? [], path)];
  });
}

function repositoryName(dto: IssueEventDto): string | null {
  if (dto.repository?.full_name) return dto.repository.full_name;
  const match = dto.issue.repository_url ? REPO_URL_RE.exec(dto.issue.repository_url) : null;
  return match ? match[1] : null;
}

/* ---------- Issues ---------- */

/** Map ONE `issues` webhook payload -> canonical Issue. Throws MalformedPayloadError. */
export function mapIssueEvent(payload: unknown): MappedIssueEvent {
  if (!isRecord(payload)) {
    throw new MalformedPayloadError('Webhook payload must be a JSON object');
  }

  const dto = plainToInstance(IssueEventDto, payload);
  const problems = flattenErrors(validateSync(dto));
  if (problems.length > 0) {
    throw new MalformedPayloadError('Invalid issues payload', problems);
  }

  const repo = repositoryName(dto);
  if (!repo) {
    throw new MalformedPayloadError('Invalid issues payload', [
      'repository.full_name is required',
    ]);
  }

  const raw = dto.issue;
  const issueId = String(raw.id);

  const labels = decodeLabels(raw.labels);
  if (!labels.ok) {
    logger.warn(`Could not decode labels for issue ${issueId}: ${labels.reason}; treating as none`);
  }
  const assignees = decodeAssignees(raw.assignees);
  if (!assignees.ok) {
    logger.warn(`Could not decode assignees for issue ${issueId}: ${assignees.reason}; treating as none`);
  }

  const action: IssueAction = dto.action && dto.action.length > 0 ? dto.action : 'unknown';

  return {
    action,
    issue: {
      issueId,
      issueNumber: raw.number,
      repositoryName: repo,
      title: raw.title ?? '',
      body: raw.body ?? null,
      authorLogin: raw.user?.login ?? null,
      state: raw.state,
      stateReason: raw.state_reason ?? null,
      locked: raw.locked ?? false,
      htmlUrl: raw.html_url ?? null,
      labels: labels.value,
      assignees: assignees.value,
      createdAt: normalizeTimestamp(raw.created_at),
      updatedAt: normalizeTimestamp(raw.updated_at),
      closedAt: normalizeTimestamp(raw.closed_at),
    },
  };
}

export function labelNamesOf(issue: Pick<Issue, 'labels'>): string[] {
  return issue.labels.map((l) => l.name);
}
