/**
 * Completion Detection: decides when the agent's claim of being done
 * can be trusted.
 *
 * The agent is told to print an exact phrase when it believes the task is
 * finished. A claim only counts when the phrase stands as a whole word
 * (neither neighbour is a word character), and the loop only trusts it once
 * the phrase has appeared in `threshold` consecutive iterations.
 */

export const DEFAULT_COMPLETION_SIGNAL = 'TASK_COMPLETE';
export const DEFAULT_COMPLETION_THRESHOLD = 2;

export interface CompletionCheckResult {
  /** The phrase appeared in this output */
  matched: boolean;
  /** Consecutive matches including this one (0 after a miss) */
  count: number;
  /** count reached the threshold */
  detected: boolean;
}

const WORD_CHAR = '[A-Za-z0-9_]';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the whole-word matcher for a phrase. Lookarounds keep the
 * boundary test independent of whether the phrase itself starts or ends
 * with a word character.
 */
export function createSignalMatcher(signal: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(signal)}(?!${WORD_CHAR})`);
}

/**
 * True when `signal` occurs in `output` as a delimited token.
 */
export function containsSignal(output: string, signal: string): boolean {
  if (!signal) return false;
  return createSignalMatcher(signal).test(output);
}

/**
 * Run one step of the consecutive-match counter.
 */
export function checkCompletion(
  output: string,
  signal: string,
  threshold: number,
  previousCount: number,
): CompletionCheckResult {
  if (!containsSignal(output, signal)) {
    return { matched: false, count: 0, detected: false };
  }

  const count = previousCount + 1;
  return { matched: true, count, detected: count >= threshold };
}
