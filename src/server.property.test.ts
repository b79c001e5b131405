// Property-Based Tests for Server - Control Message Parsing
// Feature: interview-voice-analyzer, Property 8: Only stop and abort are accepted as control messages

import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { parseClientMessage } from "./server.js";

describe("Feature: interview-voice-analyzer, Property 8: Only stop and abort are accepted as control messages", () => {
  /**
   * For any JSON object, parseClientMessage returns `{type}` exactly when
   * its `type` field is "stop" or "abort"; extra fields are dropped.
   */
  it("accepts an object exactly when its type is stop or abort", () => {
    fc.assert(
      fc.property(
        fc.oneof(fc.constantFrom("stop", "abort", "start", "STOP", ""), fc.string(), fc.integer()),
        fc.dictionary(fc.string().filter((k) => k !== "type"), fc.jsonValue()),
        (type, extra) => {
          const parsed = parseClientMessage(JSON.stringify({ ...extra, type }));
          if (type === "stop" || type === "abort") {
            expect(parsed).toEqual({ type });
          } else {
            expect(parsed).toBeNull();
          }
        },
      ),
      { numRuns: 200 },
    );
  });

  it("rejects text that is not a JSON object", () => {
    fc.assert(
      fc.property(
        fc.oneof(fc.string(), fc.jsonValue().filter((v) => typeof v !== "object" || v === null).map((v) => JSON.stringify(v))),
        (text) => {
          let isObject = false;
          try {
            const value: unknown = JSON.parse(text);
            isObject = typeof value === "object" && value !== null;
          } catch {
            isObject = false;
          }
          fc.pre(!isObject);
          expect(parseClientMessage(text)).toBeNull();
        },
      ),
      { numRuns: 200 },
    );
  });
});
