// Interview Voice Analyzer - Pause segmentation
// Voiced intervals are runs of frames within topDb of the loudest frame;
// pauses are the gaps between consecutive voiced intervals. Leading and
// trailing silence is not a pause.

import type { PauseSummary, TimeInterval } from "./types.js";
import { SILENCE_AMPLITUDE_FLOOR, amplitudeToDb, frameRms } from "./signal-metrics.js";

export interface PauseOptions {
  topDb: number;
  /** Inclusive lower bound on a gap's duration. */
  minPauseSeconds: number;
  frameLength: number;
  hopLength: number;
}

export const DEFAULT_PAUSE_OPTIONS: PauseOptions = {
  topDb: 40,
  minPauseSeconds: 0.5,
  frameLength: 1024,
  hopLength: 256,
};

interface SampleInterval {
  startSample: number;
  endSample: number;
}

function voicedSampleIntervals(samples: Float32Array, options: PauseOptions): SampleInterval[] {
  const rms = frameRms(samples, options.frameLength, options.hopLength);
  let peak = 0;
  for (const value of rms) {
    if (value > peak) peak = value;
  }
  if (peak < SILENCE_AMPLITUDE_FLOOR) return [];

  const thresholdDb = amplitudeToDb(peak) - options.topDb;
  const intervals: SampleInterval[] = [];
  let runStart = -1;

  for (let i = 0; i <= rms.length; i++) {
    const voiced = i < rms.length && amplitudeToDb(rms[i]) > thresholdDb;
    if (voiced && runStart < 0) {
      runStart = i;
    } else if (!voiced && runStart >= 0) {
      const startSample = runStart * options.hopLength;
      const endSample = Math.min(samples.length, i * options.hopLength);
      if (endSample > startSample) intervals.push({ startSample, endSample });
      runStart = -1;
    }
  }
  return intervals;
}

/** Voiced intervals in seconds, in time order. Silence yields none. */
export function splitVoicedIntervals(
  samples: Float32Array,
  sampleRate: number,
  overrides: Partial<PauseOptions> = {},
): TimeInterval[] {
  if (samples.length === 0 || !(sampleRate > 0)) return [];
  const options = { ...DEFAULT_PAUSE_OPTIONS, ...overrides };
  return voicedSampleIntervals(samples, options).map(({ startSample, endSample }) => ({
    start: startSample / sampleRate,
    end: endSample / sampleRate,
  }));
}

/** Gaps between consecutive intervals that last at least minPauseSeconds. */
export function pausesBetween(intervals: TimeInterval[], minPauseSeconds: number): TimeInterval[] {
  const pauses: TimeInterval[] = [];
  for (let i = 1; i < intervals.length; i++) {
    const gap = { start: intervals[i - 1].end, end: intervals[i].start };
    if (gap.end - gap.start >= minPauseSeconds) {
      pauses.push(gap);
    }
  }
  return pauses;
}

export function segmentPauses(
  samples: Float32Array,
  sampleRate: number,
  overrides: Partial<PauseOptions> = {},
): PauseSummary {
  const options = { ...DEFAULT_PAUSE_OPTIONS, ...overrides };
  const voicedIntervals = splitVoicedIntervals(samples, sampleRate, options);

  let pauses: TimeInterval[];
  if (voicedIntervals.length === 0) {
    // Nothing audible: the whole buffer is one pause once it is long enough.
    const duration = sampleRate > 0 ? samples.length / sampleRate : 0;
    pauses = duration > 0 && duration >= options.minPauseSeconds ? [{ start: 0, end: duration }] : [];
  } else {
    pauses = pausesBetween(voicedIntervals, options.minPauseSeconds);
  }

  return {
    voicedIntervals,
    pauses,
    pauseCount: pauses.length,
    pauseTotalDuration: pauses.reduce((sum, p) => sum + (p.end - p.start), 0),
  };
}
