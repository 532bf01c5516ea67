import { ISSUE_FIELDS, PROTECTED_FIELDS } from './types.js';
import type { Issue, IssueField, IssuePatch } from './types.js';

const protectedSet: ReadonlySet<IssueField> = new Set(PROTECTED_FIELDS);

export function isProtectedField(field: IssueField): boolean {
  return protectedSet.has(field);
}

function setField<K extends IssueField>(target: IssuePatch, source: Issue, field: K): void {
  target[field] = source[field];
}

/**
 * Value equality over the shapes an Issue holds: primitives, arrays and plain
 * records. Prototypes are not compared, so rows decoded from JSON or copied in
 * another realm still match a freshly mapped issue.
 */
export function sameValue(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => sameValue(item, b[i]));
  }

  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

  const aKeys = Object.keys(a).filter((k) => Reflect.get(a, k) !== undefined);
  const bKeys = Object.keys(b).filter((k) => Reflect.get(b, k) !== undefined);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((k) => Object.hasOwn(b, k) && sameValue(Reflect.get(a, k), Reflect.get(b, k)));
}

/**
 * Minimal field map that turns `previous` into `incoming`.
 * Protected fields are never part of the result; list fields are compared
 * by value, not by reference.
 */
export function diffIssue(previous: Issue, incoming: Issue): IssuePatch {
  const changed: IssuePatch = {};

  for (const field of ISSUE_FIELDS) {
    if (isProtectedField(field)) continue;
    if (!sameValue(previous[field], incoming[field])) {
      setField(changed, incoming, field);
    }
  }

  return changed;
}

/** Copy of `previous` with `patch` applied; protected fields in the patch are ignored. */
export function applyIssuePatch(previous: Issue, patch: IssuePatch): Issue {
  const next: Issue = { ...previous };

  for (const field of ISSUE_FIELDS) {
    if (isProtectedField(field) || !(field in patch)) continue;
    const value = patch[field];
    if (value !== undefined) assign(next, field, value);
  }

  return next;
}

function assign<K extends IssueField>(target: Issue, field: K, value: Issue[K]): void {
  target[field] = value;
}

/** Deep copy; label and assignee entries are rebuilt as fresh literals. */
export function copyIssue(issue: Issue): Issue {
  return {
    ...issue,
    labels: issue.labels.map((label) => ({ ...label })),
    assignees: issue.assignees.map((user) => ({ ...user })),
  };
}

export function copyPatch(patch: IssuePatch): IssuePatch {
  const copy: IssuePatch = { ...patch };
  if (patch.labels) copy.labels = patch.labels.map((label) => ({ ...label }));
  if (patch.assignees) copy.assignees = patch.assignees.map((user) => ({ ...user }));
  return copy;
}

export function changedFieldNames(patch: IssuePatch): IssueField[] {
  return ISSUE_FIELDS.filter((field) => field in patch);
}
