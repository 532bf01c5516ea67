import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG } from '../config/app.config.js';
import type { AppConfig } from '../config/app.config.js';
import type { Issue, IssueAction } from './types.js';

export type LabelSet = ReadonlySet<string>;

export function labelSetOf(issue: Pick<Issue, 'labels'>): LabelSet {
  return new Set(issue.labels.map((l) => l.name));
}

/**
 * Whether the reply label just appeared.
 * - no previous record (creation): the label is present now
 * - update: the label is present now and was absent before
 *
 * The action does not change the rule; it is passed for callers that log it.
 */
export function shouldReply(
  _action: IssueAction,
  previousLabels: LabelSet | null,
  incomingLabels: LabelSet,
  replyLabel: string,
): boolean {
  if (!incomingLabels.has(replyLabel)) return false;
  if (previousLabels === null) return true;
  return !previousLabels.has(replyLabel);
}

@Injectable()
export class ReplyDecisionService {
  private readonly log = new Logger(ReplyDecisionService.name);

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  get replyLabel(): string {
    return this.config.replyLabel;
  }

  decide(action: IssueAction, previousLabels: LabelSet | null, incoming: Issue): boolean {
    const incomingLabels = labelSetOf(incoming);
    const reply = shouldReply(action, previousLabels, incomingLabels, this.config.replyLabel);

    const path = previousLabels === null ? 'creation' : 'update';
    this.log.debug(
      `reply decision for #${incoming.issueNumber} (${action}, ${path}): ` +
        `"${this.config.replyLabel}" ${incomingLabels.has(this.config.replyLabel) ? 'present' : 'absent'} -> ${reply}`,
    );
    return reply;
  }
}
