export const DEFAULT_MAX_DISPLAY_POINTS = 300;

/**
 * Uniform decimation: keeps every `floor(n / maxPoints)`-th sample starting at index 0.
 * Lossy and meant for display only. Sequences already within `maxPoints` come back as a copy.
 */
export function downsample<T>(samples: readonly T[], maxPoints: number = DEFAULT_MAX_DISPLAY_POINTS): T[] {
  if (maxPoints <= 0 || samples.length <= maxPoints) {
    return [...samples];
  }
  const stride = Math.floor(samples.length / maxPoints);
  const result: T[] = [];
  for (let index = 0; index < samples.length; index += stride) {
    result.push(samples[index]);
  }
  return result;
}
