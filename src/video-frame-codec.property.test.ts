// Property-Based Tests for the frame-sequence container
// Feature: interview-voice-analyzer, Property 6: Recorded frames read back in write order

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { decodeFrameContainer, encodeFrameRecord, encodeVideoFrame } from "./video-frame-codec.js";
import type { FrameHeader } from "./types.js";

// ─── Generators ─────────────────────────────────────────────────────────────────

const arbitraryFrameHeader = (): fc.Arbitrary<FrameHeader> =>
  fc.record({
    timestamp: fc.double({ min: 0, max: 86400, noNaN: true, noDefaultInfinity: true }),
    seq: fc.integer({ min: 0, max: 2 ** 24 - 1 }),
    width: fc.integer({ min: 1, max: 1920 }),
    height: fc.integer({ min: 1, max: 1080 }),
  });

const arbitraryPayload = (): fc.Arbitrary<Buffer> =>
  fc.uint8Array({ minLength: 0, maxLength: 512 }).map((arr) => Buffer.from(arr));

// ─── Property Tests ─────────────────────────────────────────────────────────────

describe("Feature: interview-voice-analyzer, Property 6: Recorded frames read back in write order", () => {
  it("every appended frame comes back with its header and payload, in order", () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(arbitraryFrameHeader(), arbitraryPayload()), { maxLength: 20 }), (frames) => {
        const container = Buffer.concat(frames.map(([h, p]) => encodeFrameRecord(encodeVideoFrame(h, p))));

        const decoded = decodeFrameContainer(container);

        expect(decoded.truncated).toBe(false);
        expect(decoded.skipped).toBe(0);
        expect(decoded.frames).toEqual(frames.map(([header, jpeg]) => ({ header, jpeg })));
      }),
      { numRuns: 100 },
    );
  });

  it("cutting the container anywhere never loses a fully written frame", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(arbitraryFrameHeader(), arbitraryPayload()), { minLength: 1, maxLength: 10 }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (frames, cutFraction) => {
          const records = frames.map(([h, p]) => encodeFrameRecord(encodeVideoFrame(h, p)));
          const container = Buffer.concat(records);
          const cut = Math.floor(container.length * cutFraction);

          let complete = 0;
          let consumed = 0;
          for (const record of records) {
            if (consumed + record.length > cut) break;
            consumed += record.length;
            complete++;
          }

          const decoded = decodeFrameContainer(container.subarray(0, cut));

          expect(decoded.frames).toHaveLength(complete);
          expect(decoded.truncated).toBe(consumed < cut);
        },
      ),
      { numRuns: 100 },
    );
  });
});
