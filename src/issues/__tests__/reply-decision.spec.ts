import { labelSetOf, ReplyDecisionService, shouldReply } from '../reply-decision.js';
import { issueRecord, labelRecord, REPLY_LABEL, testConfig } from '../../testing/fixtures.js';

const set = (...names: string[]) => new Set(names);

describe('shouldReply', () => {
  describe('creation (no previous record)', () => {
    it('replies when the label is present', () => {
      expect(shouldReply('opened', null, set('bug', REPLY_LABEL), REPLY_LABEL)).toBe(true);
    });

    it('does not reply without the label', () => {
      expect(shouldReply('opened', null, set('bug'), REPLY_LABEL)).toBe(false);
      expect(shouldReply('opened', null, set(), REPLY_LABEL)).toBe(false);
    });
  });

  describe('update', () => {
    it('replies on an absent -> present transition', () => {
      expect(shouldReply('labeled', set(), set(REPLY_LABEL), REPLY_LABEL)).toBe(true);
    });

    it('does not retrigger when the label stays', () => {
      expect(shouldReply('edited', set(REPLY_LABEL), set(REPLY_LABEL), REPLY_LABEL)).toBe(false);
    });

    it('does not reply when the label is removed', () => {
      expect(shouldReply('unlabeled', set(REPLY_LABEL), set(), REPLY_LABEL)).toBe(false);
    });

    it('ignores other labels', () => {
      expect(shouldReply('labeled', set('bug'), set('bug', 'docs'), REPLY_LABEL)).toBe(false);
    });

    it('evaluates each transition on its own', () => {
      const steps = [set(), set(REPLY_LABEL), set(REPLY_LABEL), set(), set(REPLY_LABEL)];
      const decisions = steps
        .slice(1)
        .map((incoming, i) => shouldReply('labeled', steps[i], incoming, REPLY_LABEL));
      expect(decisions).toEqual([true, false, false, true]);
    });
  });
});

describe('ReplyDecisionService', () => {
  it('uses the configured label', () => {
    const service = new ReplyDecisionService(testConfig({ replyLabel: 'triage' }));
    const incoming = issueRecord({ labels: [labelRecord('triage')] });

    expect(service.replyLabel).toBe('triage');
    expect(service.decide('labeled', set(REPLY_LABEL), incoming)).toBe(true);
    expect(service.decide('labeled', labelSetOf(incoming), incoming)).toBe(false);
  });

  it('reads label names into a set', () => {
    const issue = issueRecord({ labels: [labelRecord('a'), labelRecord('b'), labelRecord('a')] });
    expect([...labelSetOf(issue)]).toEqual(['a', 'b']);
  });
});
