import { describe, it, expect } from 'vitest';
import { buildLimits, evaluateLimits, formatElapsed, parseDuration, shouldContinue } from './limits.js';
import type { Limits } from '../types/index.js';

// =============================================================================
// HELPERS
// =============================================================================

function makeState(overrides: Partial<{ iteration: number; totalCost: number; startedAt: number }> = {}) {
  return { iteration: 0, totalCost: 0, startedAt: 0, ...overrides };
}

// =============================================================================
// parseDuration
// =============================================================================

describe('parseDuration', () => {
  it('parses combined hours and minutes', () => {
    expect(parseDuration('2h30m')).toBe(9000);
  });

  it('parses single components', () => {
    expect(parseDuration('90m')).toBe(5400);
    expect(parseDuration('1h')).toBe(3600);
    expect(parseDuration('45s')).toBe(45);
  });

  it('parses all three components', () => {
    expect(parseDuration('1h2m3s')).toBe(3723);
  });

  it('ignores case and surrounding whitespace', () => {
    expect(parseDuration('  2H ')).toBe(7200);
  });

  it('returns 0 for zero durations', () => {
    expect(parseDuration('0m')).toBe(0);
    expect(parseDuration('0')).toBe(0);
  });

  it('rejects expressions without a unit', () => {
    expect(parseDuration('30')).toBeNull();
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('soon')).toBeNull();
  });

  it('rejects components out of order', () => {
    expect(parseDuration('30m2h')).toBeNull();
  });
});

describe('formatElapsed', () => {
  it('formats seconds, minutes and hours', () => {
    expect(formatElapsed(0)).toBe('0s');
    expect(formatElapsed(59_000)).toBe('59s');
    expect(formatElapsed(60_000)).toBe('1m0s');
    expect(formatElapsed(3_723_000)).toBe('1h2m3s');
  });

  it('drops partial seconds', () => {
    expect(formatElapsed(1_999)).toBe('1s');
  });
});

// =============================================================================
// buildLimits
// =============================================================================

describe('buildLimits', () => {
  it('keeps only the iteration cap when nothing else is set', () => {
    expect(buildLimits({ maxIterations: 5 })).toEqual({ maxIterations: 5 });
  });

  it('converts the duration to milliseconds', () => {
    expect(buildLimits({ maxIterations: 5, maxDuration: '2h' })).toEqual({
      maxIterations: 5,
      maxDurationMs: 7_200_000,
    });
  });

  it('treats a zero duration as no limit', () => {
    expect(buildLimits({ maxIterations: 5, maxDuration: '0m' })).toEqual({ maxIterations: 5 });
    expect(buildLimits({ maxIterations: 5, maxDuration: '0' })).toEqual({ maxIterations: 5 });
  });

  it('carries the cost limit', () => {
    expect(buildLimits({ maxIterations: 5, maxCost: 2.5 })).toEqual({ maxIterations: 5, maxCost: 2.5 });
  });
});

// =============================================================================
// evaluateLimits
// =============================================================================

describe('evaluateLimits', () => {
  const limits: Limits = { maxIterations: 5 };

  it('continues while below the iteration cap', () => {
    const result = evaluateLimits(makeState({ iteration: 4 }), limits, 0);
    expect(result).toEqual({ continue: true, violations: [] });
  });

  it('stops at the iteration cap', () => {
    const result = evaluateLimits(makeState({ iteration: 5 }), limits, 0);
    expect(result.continue).toBe(false);
    expect(result.violations).toEqual([
      { reason: 'max_iterations', message: 'Max iterations (5) reached' },
    ]);
  });

  it('stops once elapsed time reaches the duration limit', () => {
    const withDuration: Limits = { maxIterations: 100, maxDurationMs: 7_200_000 };

    expect(evaluateLimits(makeState(), withDuration, 7_199_999).continue).toBe(true);

    const result = evaluateLimits(makeState(), withDuration, 7_200_000);
    expect(result.violations).toEqual([
      { reason: 'max_duration', message: 'Duration limit (2h0m0s) reached after 2h0m0s' },
    ]);
  });

  it('measures elapsed time from the session start', () => {
    const withDuration: Limits = { maxIterations: 100, maxDurationMs: 60_000 };
    const state = makeState({ startedAt: 1_000_000 });
    expect(evaluateLimits(state, withDuration, 1_059_999).continue).toBe(true);
    expect(evaluateLimits(state, withDuration, 1_060_000).continue).toBe(false);
  });

  it('passes the cost check while no cost has been observed', () => {
    const withCost: Limits = { maxIterations: 100, maxCost: 0.5 };
    expect(evaluateLimits(makeState({ totalCost: 0 }), withCost, 0).continue).toBe(true);
  });

  it('stops once total cost reaches the cost limit', () => {
    const withCost: Limits = { maxIterations: 100, maxCost: 0.5 };

    expect(evaluateLimits(makeState({ totalCost: 0.49 }), withCost, 0).continue).toBe(true);

    const result = evaluateLimits(makeState({ totalCost: 0.5 }), withCost, 0);
    expect(result.violations).toEqual([
      { reason: 'max_cost', message: 'Cost limit ($0.5) reached (current: $0.5000)' },
    ]);
  });

  it('reports every violated limit', () => {
    const all: Limits = { maxIterations: 2, maxDurationMs: 1_000, maxCost: 1 };
    const result = evaluateLimits(makeState({ iteration: 2, totalCost: 3 }), all, 5_000);
    expect(result.violations.map(v => v.reason)).toEqual(['max_iterations', 'max_duration', 'max_cost']);
  });
});

describe('shouldContinue', () => {
  it('is the conjunction of all checks', () => {
    const all: Limits = { maxIterations: 3, maxDurationMs: 10_000, maxCost: 1 };
    expect(shouldContinue(makeState({ iteration: 2, totalCost: 0.5 }), all, 9_000)).toBe(true);
    expect(shouldContinue(makeState({ iteration: 2, totalCost: 1.5 }), all, 9_000)).toBe(false);
  });
});
