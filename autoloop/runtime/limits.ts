/**
 * Limit Evaluator: decides whether the loop may start another iteration.
 *
 * Three independent budgets, ANDed together:
 *   - iterations:  continue while iteration < maxIterations
 *   - duration:    continue while elapsed < maxDuration (optional)
 *   - cost:        continue while totalCost < maxCost (optional, and only
 *                  once some cost has been observed)
 *
 * The evaluator reports; it never decides success or failure.
 */

import type { Limits, LimitViolation, Session } from '../types/index.js';

export type LimitState = Pick<Session, 'iteration' | 'totalCost' | 'startedAt'>;

export interface LimitEvaluation {
  continue: boolean;
  violations: LimitViolation[];
}

const DURATION_PATTERN = /^(?:(\d+)h)?(?:(\d+)m)?(?:(\d+)s)?$/;

// =============================================================================
// DURATION
// =============================================================================

/**
 * Parse a duration expression ("2h30m", "90m", "1h", "45s") into seconds.
 *
 * A bare "0" is zero seconds. Otherwise returns null when the expression
 * has no h/m/s component or contains anything else.
 */
export function parseDuration(expression: string): number | null {
  const trimmed = expression.trim().toLowerCase();
  if (trimmed === '0') return 0;
  const match = DURATION_PATTERN.exec(trimmed);
  if (!trimmed || !match) return null;

  const [, hours, minutes, seconds] = match;
  return (
    Number(hours ?? 0) * 3600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0)
  );
}

export function formatElapsed(ms: number): string {
  const total = Math.floor(ms / 1000);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  if (h > 0) return `${h}h${m}m${s}s`;
  if (m > 0) return `${m}m${s}s`;
  return `${s}s`;
}

/**
 * Build Limits from loop settings. A duration that parses to zero
 * seconds means "no duration limit".
 */
export function buildLimits(settings: {
  maxIterations: number;
  maxDuration?: string;
  maxCost?: number;
}): Limits {
  const limits: Limits = { maxIterations: settings.maxIterations };

  if (settings.maxDuration !== undefined) {
    const seconds = parseDuration(settings.maxDuration);
    if (seconds !== null && seconds > 0) {
      limits.maxDurationMs = seconds * 1000;
    }
  }

  if (settings.maxCost !== undefined) {
    limits.maxCost = settings.maxCost;
  }

  return limits;
}

// =============================================================================
// EVALUATION
// =============================================================================

export function evaluateLimits(
  state: LimitState,
  limits: Limits,
  now: number = Date.now(),
): LimitEvaluation {
  const violations: LimitViolation[] = [];

  if (state.iteration >= limits.maxIterations) {
    violations.push({
      reason: 'max_iterations',
      message: `Max iterations (${limits.maxIterations}) reached`,
    });
  }

  if (limits.maxDurationMs !== undefined) {
    const elapsed = now - state.startedAt;
    if (elapsed >= limits.maxDurationMs) {
      violations.push({
        reason: 'max_duration',
        message: `Duration limit (${formatElapsed(limits.maxDurationMs)}) reached after ${formatElapsed(elapsed)}`,
      });
    }
  }

  // Unknown cost cannot be compared, so a zero total never stops the loop
  if (limits.maxCost !== undefined && state.totalCost > 0 && state.totalCost >= limits.maxCost) {
    violations.push({
      reason: 'max_cost',
      message: `Cost limit ($${limits.maxCost}) reached (current: $${state.totalCost.toFixed(4)})`,
    });
  }

  return { continue: violations.length === 0, violations };
}

export function shouldContinue(state: LimitState, limits: Limits, now: number = Date.now()): boolean {
  return evaluateLimits(state, limits, now).continue;
}
