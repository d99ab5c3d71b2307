/**
 * backend/src/shared/time/stopwatch.ts
 *
 * WHY:
 * - Services log how long each repository call took.
 * - Monotonic clock (performance.now), so wall-clock adjustments don't skew durations.
 */

export type Clock = () => number;

export type Stopwatch = {
  /** Whole milliseconds since start. */
  elapsedMs(): number;
};

const monotonicNow: Clock = () => performance.now();

export function startStopwatch(now: Clock = monotonicNow): Stopwatch {
  const startedAt = now();

  return {
    elapsedMs() {
      return Math.max(0, Math.round(now() - startedAt));
    },
  };
}
