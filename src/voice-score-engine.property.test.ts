// Property-Based Tests for the voice score engine
// Feature: interview-voice-analyzer, Property 5: Every score stays in [0, 100]

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { scoreVoice, scoreVoiceEmotion } from "./voice-score-engine.js";
import type { VoiceScoreInput } from "./voice-score-engine.js";
import { VOICE_AXES } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

function arbitraryInput(): fc.Arbitrary<VoiceScoreInput> {
  const value = fc.oneof(
    fc.double({ min: -1000, max: 1000, noNaN: true }),
    fc.constantFrom(Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY, 0),
  );
  return fc
    .record({
      jitter: value,
      pitchMean: value,
      pitchVariance: value,
      energyVariance: value,
      pauseCount: fc.integer({ min: 0, max: 500 }),
      durationSeconds: value,
      voicedFrameCount: fc.integer({ min: 0, max: 5000 }),
      split: fc.tuple(fc.nat(100), fc.nat(100)),
    })
    .map(({ split, ...rest }) => {
      const lowPct = Math.min(split[0], 100);
      const highPct = Math.min(split[1], 100 - lowPct);
      return {
        ...rest,
        voiceRange: { lowPct, midPct: 100 - lowPct - highPct, highPct, dominant: "mid" as const },
      };
    });
}

describe("Feature: interview-voice-analyzer, Property 5: Every score stays in [0, 100]", () => {
  it("all twelve axes are integers in [0, 100]", () => {
    fc.assert(
      fc.property(arbitraryInput(), (input) => {
        const { axes, summary } = scoreVoice(input);
        for (const axis of VOICE_AXES) {
          expect(Number.isInteger(axes[axis])).toBe(true);
          expect(axes[axis]).toBeGreaterThanOrEqual(0);
          expect(axes[axis]).toBeLessThanOrEqual(100);
        }
        expect(summary.average).toBeGreaterThanOrEqual(0);
        expect(summary.average).toBeLessThanOrEqual(100);
        expect(summary.dominantScore).toBe(Math.max(...VOICE_AXES.map((a) => axes[a])));
      }),
      { numRuns: 200 },
    );
  });

  it("emotion sub-scores are bounded and calmness mirrors nervousness", () => {
    fc.assert(
      fc.property(arbitraryInput(), fc.double({ min: 0, max: 1, noNaN: true }), (input, zeroCrossingRate) => {
        const scores = scoreVoiceEmotion({ ...input, zeroCrossingRate });
        for (const value of [scores.confidence, scores.nervousness, scores.calmness, scores.stability, scores.tension]) {
          expect(value).toBeGreaterThanOrEqual(0);
          expect(value).toBeLessThanOrEqual(100);
        }
        expect(scores.calmness).toBe(100 - scores.nervousness);
        expect(scores.feedback.length).toBeGreaterThanOrEqual(2);
      }),
      { numRuns: 200 },
    );
  });
});
