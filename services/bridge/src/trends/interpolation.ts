import type { TimedSample } from './types';

export const DEFAULT_EXPECTED_INTERVAL_MS = 5 * 60 * 1000;
export const DEFAULT_MAX_GAP_STEPS = 48;

export interface GapFillOptions {
  expectedIntervalMs?: number;
  /** Gaps spanning more expected-interval steps than this stay open. */
  maxGapSteps?: number;
}

/**
 * Fills gaps longer than twice the expected interval with linearly interpolated samples.
 * Input must be sorted by `epochMs`; real samples pass through untouched.
 */
export function fillGaps(samples: readonly TimedSample[], options: GapFillOptions = {}): TimedSample[] {
  const interval = options.expectedIntervalMs ?? DEFAULT_EXPECTED_INTERVAL_MS;
  const maxSteps = options.maxGapSteps ?? DEFAULT_MAX_GAP_STEPS;
  if (samples.length < 2 || interval <= 0) {
    return [...samples];
  }

  const result: TimedSample[] = [samples[0]];
  for (let index = 1; index < samples.length; index += 1) {
    const left = samples[index - 1];
    const right = samples[index];
    const delta = right.epochMs - left.epochMs;

    if (delta > 2 * interval) {
      const steps = Math.round(delta / interval);
      if (steps <= maxSteps) {
        const spacing = delta / steps;
        for (let step = 1; step < steps; step += 1) {
          const epochMs = Math.round(left.epochMs + step * spacing);
          const fraction = (epochMs - left.epochMs) / delta;
          result.push({
            timestamp: new Date(epochMs).toISOString(),
            epochMs,
            offsetMinutes: left.offsetMinutes,
            value: left.value + (right.value - left.value) * fraction,
            interpolated: true
          });
        }
      }
    }

    result.push(right);
  }
  return result;
}
