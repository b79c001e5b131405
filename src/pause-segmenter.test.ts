// Unit tests for pause segmentation

import { describe, it, expect } from "vitest";
import { pausesBetween, segmentPauses, splitVoicedIntervals } from "./pause-segmenter.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const SR = 16000;

/** Concatenates [seconds, amplitude] sections of a 220 Hz tone; amplitude 0 is silence. */
function sections(...parts: Array<[number, number]>): Float32Array {
  const total = parts.reduce((sum, [seconds]) => sum + Math.round(seconds * SR), 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const [seconds, amplitude] of parts) {
    const n = Math.round(seconds * SR);
    for (let i = 0; i < n; i++) {
      const t = offset + i;
      out[t] = amplitude * Math.sin((2 * Math.PI * 220 * t) / SR);
    }
    offset += n;
  }
  return out;
}

describe("splitVoicedIntervals", () => {
  it("finds the two speech runs around a two-second silence", () => {
    const intervals = splitVoicedIntervals(sections([4, 0.5], [2, 0], [4, 0.5]), SR);

    expect(intervals).toHaveLength(2);
    expect(intervals[0].start).toBe(0);
    expect(intervals[0].end).toBe(64512 / SR);
    expect(intervals[1].start).toBe(95744 / SR);
    expect(intervals[1].end).toBe(10);
  });

  it("returns nothing for digital silence or an empty buffer", () => {
    expect(splitVoicedIntervals(new Float32Array(SR), SR)).toEqual([]);
    expect(splitVoicedIntervals(new Float32Array(0), SR)).toEqual([]);
  });
});

describe("segmentPauses", () => {
  it("reports a ~2 s pause between two four-second answers", () => {
    const summary = segmentPauses(sections([4, 0.5], [2, 0], [4, 0.5]), SR);

    expect(summary.pauseCount).toBe(1);
    expect(summary.pauseTotalDuration).toBeCloseTo(1.952, 9);
    expect(Math.abs(summary.pauseTotalDuration - 2)).toBeLessThanOrEqual(0.1);
  });

  it("reports no pause for a single continuous interval", () => {
    const summary = segmentPauses(sections([2, 0.5]), SR);

    expect(summary.voicedIntervals).toHaveLength(1);
    expect(summary.pauseCount).toBe(0);
    expect(summary.pauseTotalDuration).toBe(0);
  });

  it("ignores gaps shorter than the minimum pause", () => {
    const summary = segmentPauses(sections([1, 0.5], [0.3, 0], [1, 0.5]), SR);

    expect(summary.voicedIntervals).toHaveLength(2);
    expect(summary.pauseCount).toBe(0);
  });

  it("counts pure silence as one whole-duration pause", () => {
    const summary = segmentPauses(new Float32Array(3 * SR), SR);

    expect(summary.voicedIntervals).toEqual([]);
    expect(summary.pauses).toEqual([{ start: 0, end: 3 }]);
    expect(summary.pauseCount).toBe(1);
    expect(summary.pauseTotalDuration).toBe(3);
  });

  it("does not count silence shorter than the minimum pause", () => {
    expect(segmentPauses(new Float32Array(4800), SR).pauseCount).toBe(0);
    expect(segmentPauses(new Float32Array(0), SR).pauseCount).toBe(0);
  });

  it("honours the topDb override", () => {
    const samples = sections([1, 0.5], [1, 0.0015], [1, 0.5]);

    const strict = segmentPauses(samples, SR, { topDb: 40 });
    const lenient = segmentPauses(samples, SR, { topDb: 60 });

    expect(strict.pauseCount).toBe(1);
    expect(strict.pauseTotalDuration).toBeCloseTo((31744 - 16640) / SR, 9);
    expect(lenient.voicedIntervals).toHaveLength(1);
    expect(lenient.pauseCount).toBe(0);
  });
});

describe("pausesBetween", () => {
  it("treats the minimum as inclusive", () => {
    const intervals = [
      { start: 0, end: 1 },
      { start: 1.5, end: 2 },
      { start: 2.4, end: 3 },
    ];

    expect(pausesBetween(intervals, 0.5)).toEqual([{ start: 1, end: 1.5 }]);
  });

  it("returns nothing for fewer than two intervals", () => {
    expect(pausesBetween([], 0.5)).toEqual([]);
    expect(pausesBetween([{ start: 0, end: 5 }], 0.5)).toEqual([]);
  });
});
