// Property-Based Tests for pause segmentation
// Feature: interview-voice-analyzer, Property 2: Pauses stay inside the buffer and respect the minimum

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { segmentPauses } from "./pause-segmenter.js";

describe("Feature: interview-voice-analyzer, Property 2: Pauses stay inside the buffer and respect the minimum", () => {
  it("every pause lies within the buffer and meets the minimum duration", () => {
    fc.assert(
      fc.property(
        fc.float32Array({ minLength: 0, maxLength: 16000, min: -1, max: 1, noNaN: true }),
        fc.double({ min: 0.05, max: 1, noNaN: true }),
        (samples, minPauseSeconds) => {
          const duration = samples.length / 16000;
          const summary = segmentPauses(samples, 16000, { minPauseSeconds });

          expect(summary.pauseCount).toBe(summary.pauses.length);
          expect(summary.pauseTotalDuration).toBeLessThanOrEqual(duration + 1e-9);
          for (const pause of summary.pauses) {
            expect(pause.start).toBeGreaterThanOrEqual(0);
            expect(pause.end).toBeLessThanOrEqual(duration + 1e-9);
            expect(pause.end - pause.start).toBeGreaterThanOrEqual(minPauseSeconds);
          }
        },
      ),
      { numRuns: 100 },
    );
  });

  it("digital silence is exactly one pause once it reaches the minimum", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 48000 }), (sampleCount) => {
        const summary = segmentPauses(new Float32Array(sampleCount), 16000, { minPauseSeconds: 0.5 });
        expect(summary.pauseCount).toBe(sampleCount >= 8000 ? 1 : 0);
      }),
      { numRuns: 200 },
    );
  });

  it("voiced intervals are ordered and disjoint", () => {
    fc.assert(
      fc.property(fc.float32Array({ minLength: 0, maxLength: 16000, min: -1, max: 1, noNaN: true }), (samples) => {
        const { voicedIntervals } = segmentPauses(samples, 16000);
        for (let i = 0; i < voicedIntervals.length; i++) {
          expect(voicedIntervals[i].end).toBeGreaterThan(voicedIntervals[i].start);
          if (i > 0) expect(voicedIntervals[i].start).toBeGreaterThan(voicedIntervals[i - 1].end);
        }
      }),
      { numRuns: 100 },
    );
  });
});
