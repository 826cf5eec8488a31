import { describe, it, expect } from 'vitest';
import { checkCompletion, containsSignal, createSignalMatcher } from './completion.js';

describe('containsSignal', () => {
  const signal = 'TASK_COMPLETE';

  it('matches the phrase as a standalone word', () => {
    expect(containsSignal('All done. TASK_COMPLETE', signal)).toBe(true);
    expect(containsSignal('TASK_COMPLETE', signal)).toBe(true);
  });

  it('matches next to punctuation and quotes', () => {
    expect(containsSignal('TASK_COMPLETE.', signal)).toBe(true);
    expect(containsSignal('"TASK_COMPLETE"', signal)).toBe(true);
    expect(containsSignal('pre-TASK_COMPLETE', signal)).toBe(true);
    expect(containsSignal('line one\nTASK_COMPLETE\nline three', signal)).toBe(true);
  });

  it('does not match inside a longer word', () => {
    expect(containsSignal('NOT_TASK_COMPLETE_YET', signal)).toBe(false);
    expect(containsSignal('TASK_COMPLETED', signal)).toBe(false);
    expect(containsSignal('XTASK_COMPLETE', signal)).toBe(false);
    expect(containsSignal('TASK_COMPLETE2', signal)).toBe(false);
  });

  it('is case-sensitive', () => {
    expect(containsSignal('task_complete', signal)).toBe(false);
  });

  it('finds a valid occurrence after an invalid one', () => {
    expect(containsSignal('NOT_TASK_COMPLETE, then TASK_COMPLETE', signal)).toBe(true);
  });

  it('treats regex characters in the phrase literally', () => {
    expect(containsSignal('status: DONE (v2)? yes', 'DONE (v2)?')).toBe(true);
    expect(containsSignal('status: DONE v2 yes', 'DONE (v2)?')).toBe(false);
  });

  it('never matches an empty phrase', () => {
    expect(containsSignal('anything', '')).toBe(false);
  });
});

describe('createSignalMatcher', () => {
  it('builds a non-global matcher', () => {
    const matcher = createSignalMatcher('DONE');
    expect(matcher.flags).toBe('');
    expect(matcher.test('DONE')).toBe(true);
    expect(matcher.test('DONE')).toBe(true);
  });
});

describe('checkCompletion', () => {
  it('starts a streak on the first match', () => {
    expect(checkCompletion('TASK_COMPLETE', 'TASK_COMPLETE', 2, 0)).toEqual({
      matched: true,
      count: 1,
      detected: false,
    });
  });

  it('detects completion when the streak reaches the threshold', () => {
    expect(checkCompletion('TASK_COMPLETE', 'TASK_COMPLETE', 2, 1)).toEqual({
      matched: true,
      count: 2,
      detected: true,
    });
  });

  it('resets the streak on a miss', () => {
    expect(checkCompletion('still working', 'TASK_COMPLETE', 2, 1)).toEqual({
      matched: false,
      count: 0,
      detected: false,
    });
  });

  it('completes on the first match with a threshold of 1', () => {
    expect(checkCompletion('TASK_COMPLETE', 'TASK_COMPLETE', 1, 0).detected).toBe(true);
  });

  it('counts one iteration once however many times the phrase appears', () => {
    const result = checkCompletion('TASK_COMPLETE TASK_COMPLETE TASK_COMPLETE', 'TASK_COMPLETE', 3, 0);
    expect(result.count).toBe(1);
    expect(result.detected).toBe(false);
  });
});
