// Property-Based Tests for speaker turn assignment
// Feature: interview-voice-analyzer, Property 3: Speaker assignment is idempotent and total

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { assignSpeakers, resolveRoles } from "./speaker-turn-assigner.js";
import type { DiarizationTurn, TranscriptSegment } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

function arbitrarySegments(): fc.Arbitrary<TranscriptSegment[]> {
  return fc.array(
    fc
      .tuple(fc.double({ min: 0, max: 100, noNaN: true }), fc.double({ min: 0, max: 10, noNaN: true }))
      .map(([start, length]) => ({ start, end: start + length, text: "answer" })),
    { maxLength: 20 },
  );
}

function arbitraryTurns(): fc.Arbitrary<DiarizationTurn[]> {
  return fc.array(
    fc
      .tuple(
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.double({ min: 0, max: 15, noNaN: true }),
        fc.constantFrom("speaker_0", "speaker_1", "speaker_2"),
      )
      .map(([start, length, speakerLabel]) => ({ start, end: start + length, speakerLabel })),
    { maxLength: 20 },
  );
}

describe("Feature: interview-voice-analyzer, Property 3: Speaker assignment is idempotent and total", () => {
  it("assigning twice gives the same result as assigning once", () => {
    fc.assert(
      fc.property(arbitrarySegments(), arbitraryTurns(), (segments, turns) => {
        const once = assignSpeakers(segments, turns);
        expect(assignSpeakers(once, turns)).toEqual(once);
      }),
      { numRuns: 200 },
    );
  });

  it("every segment gets a label from the turns or unknown", () => {
    fc.assert(
      fc.property(arbitrarySegments(), arbitraryTurns(), (segments, turns) => {
        const labels = new Set(["unknown", ...turns.map((t) => t.speakerLabel)]);
        const assigned = assignSpeakers(segments, turns);
        expect(assigned).toHaveLength(segments.length);
        for (const segment of assigned) {
          expect(labels.has(segment.speaker ?? "")).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });

  it("every assigned label resolves to exactly one role and roles are unique", () => {
    fc.assert(
      fc.property(
        arbitrarySegments(),
        arbitraryTurns(),
        fc.constantFrom("earliest-first" as const, "most-talkative" as const),
        (segments, turns, strategy) => {
          const assigned = assignSpeakers(segments, turns);
          const roles = resolveRoles(assigned, strategy);
          for (const segment of assigned) {
            expect(roles.has(segment.speaker ?? "unknown")).toBe(true);
          }
          const values = [...roles.values()];
          expect(new Set(values).size).toBe(values.length);
        },
      ),
      { numRuns: 200 },
    );
  });
});
