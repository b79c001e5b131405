/**
 * Frame sampler that selects recorded frames at a fixed interval.
 * Accepts the first frame in each sampling interval and skips the rest,
 * up to a cap on the number of samples per recording.
 */

export class FrameSampler {
  private readonly intervalSeconds: number;
  private readonly maxSamples: number;
  private lastSampledTimestamp: number;
  private sampled: number;

  constructor(intervalSeconds: number, maxSamples = Number.POSITIVE_INFINITY) {
    if (!(intervalSeconds > 0)) {
      throw new RangeError(`sampling interval must be positive, got ${intervalSeconds}`);
    }
    this.intervalSeconds = intervalSeconds;
    this.maxSamples = maxSamples;
    this.lastSampledTimestamp = -Infinity;
    this.sampled = 0;
  }

  /**
   * Returns true if this frame should be analyzed. The first frame is always
   * taken; later frames once the interval has elapsed since the last pick.
   */
  shouldSample(timestamp: number): boolean {
    if (this.sampled >= this.maxSamples) return false;
    if (timestamp - this.lastSampledTimestamp >= this.intervalSeconds) {
      this.lastSampledTimestamp = timestamp;
      this.sampled++;
      return true;
    }
    return false;
  }

  get sampledCount(): number {
    return this.sampled;
  }

  get exhausted(): boolean {
    return this.sampled >= this.maxSamples;
  }

  reset(): void {
    this.lastSampledTimestamp = -Infinity;
    this.sampled = 0;
  }
}
