import { describe, it, expect } from 'vitest';
import { startStopwatch } from '../../../../src/shared/time/stopwatch';

describe('startStopwatch', () => {
  it('reports whole milliseconds since start', () => {
    const readings = [100, 112.6];
    const stopwatch = startStopwatch(() => readings.shift() ?? 0);

    expect(stopwatch.elapsedMs()).toBe(13);
  });

  it('never reports a negative duration', () => {
    const readings = [50, 40];
    const stopwatch = startStopwatch(() => readings.shift() ?? 0);

    expect(stopwatch.elapsedMs()).toBe(0);
  });

  it('uses the monotonic clock by default', () => {
    const stopwatch = startStopwatch();

    expect(stopwatch.elapsedMs()).toBeGreaterThanOrEqual(0);
  });
});
