import assert from 'node:assert/strict';
import { test } from 'node:test';

import { downsample } from '../src/trends/downsample';
import { fillGaps } from '../src/trends/interpolation';
import type { TimedSample } from '../src/trends/types';
import { BASE_MS, MINUTE_MS } from './fixtures';

const INTERVAL_MS = 5 * MINUTE_MS;

const sample = (offsetMs: number, value: number): TimedSample => ({
  timestamp: new Date(BASE_MS + offsetMs).toISOString(),
  epochMs: BASE_MS + offsetMs,
  offsetMinutes: 0,
  value,
  interpolated: false
});

test('fills a twelve-step gap with eleven evenly spaced points', () => {
  const input = [sample(0, 70), sample(5 * MINUTE_MS, 71), sample(65 * MINUTE_MS, 80)];
  const result = fillGaps(input, { expectedIntervalMs: INTERVAL_MS, maxGapSteps: 48 });

  assert.equal(result.length, 14);
  const synthesized = result.filter((entry) => entry.interpolated);
  assert.equal(synthesized.length, 11);
  assert.deepEqual(
    synthesized.map((entry) => (entry.epochMs - BASE_MS) / MINUTE_MS),
    [10, 15, 20, 25, 30, 35, 40, 45, 50, 55, 60]
  );

  const midpoint = synthesized[5];
  assert.equal(midpoint.value, 75.5);
  assert.equal(midpoint.timestamp, '2025-07-01T10:35:00.000Z');
  assert.equal(midpoint.offsetMinutes, 0);
});

test('leaves a gap of exactly two intervals open and fills one just past it', () => {
  const exact = fillGaps([sample(0, 70), sample(2 * INTERVAL_MS, 72)], { expectedIntervalMs: INTERVAL_MS });
  assert.equal(exact.length, 2);

  const past = fillGaps([sample(0, 70), sample(2 * INTERVAL_MS + 1, 72)], { expectedIntervalMs: INTERVAL_MS });
  assert.equal(past.length, 3);
  assert.equal(past[1].interpolated, true);
  assert.equal(past[1].epochMs, BASE_MS + INTERVAL_MS + 1);
});

test('does not bridge gaps longer than the step cap', () => {
  const tooLong = fillGaps([sample(0, 70), sample(49 * INTERVAL_MS, 80)], { expectedIntervalMs: INTERVAL_MS });
  assert.equal(tooLong.length, 2);

  const atCap = fillGaps([sample(0, 70), sample(48 * INTERVAL_MS, 80)], { expectedIntervalMs: INTERVAL_MS });
  assert.equal(atCap.length, 49);
});

test('keeps real samples and their order intact', () => {
  const input = [sample(0, 70), sample(30 * MINUTE_MS, 73), sample(35 * MINUTE_MS, 72), sample(90 * MINUTE_MS, 75)];
  const result = fillGaps(input, { expectedIntervalMs: INTERVAL_MS });

  const real = result.filter((entry) => !entry.interpolated);
  assert.equal(real.length, input.length);
  real.forEach((entry, index) => assert.equal(entry, input[index]));
  for (let index = 1; index < result.length; index += 1) {
    assert.ok(result[index].epochMs >= result[index - 1].epochMs);
  }
});

test('decimates with a uniform stride from the first sample', () => {
  const week = Array.from({ length: 2016 }, (_, index) => index);
  const result = downsample(week, 300);
  assert.equal(result.length, 336);
  assert.equal(result[0], 0);
  assert.equal(result[1], 6);
  assert.equal(result[result.length - 1], 2010);

  assert.deepEqual(downsample(result, 300), result);
});

test('returns a copy when nothing needs dropping', () => {
  const input = [1, 2, 3];
  const result = downsample(input, 300);
  assert.deepEqual(result, input);
  assert.notEqual(result, input);
});
