import { describe, it, expect, vi } from "vitest";
import { describeCapabilities, logCapabilities, probeCapabilities } from "./capabilities.js";
import type { Logger } from "./logger.js";

function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const NO_KEYS = { openaiApiKey: null, deepgramApiKey: null, dspThreads: 2 };

describe("probeCapabilities", () => {
  it("turns everything optional off without keys or detectors", () => {
    expect(probeCapabilities({ config: NO_KEYS, dspWorkerPresent: false })).toEqual({
      transcription: false,
      diarization: false,
      llmCommentary: false,
      dspThreads: false,
      posture: false,
      eyeContact: false,
    });
  });

  it("enables each backend from its own key", () => {
    const caps = probeCapabilities({
      config: { openaiApiKey: "test-openai-key", deepgramApiKey: "test-deepgram-key", dspThreads: 2 },
      dspWorkerPresent: true,
    });

    expect(caps).toMatchObject({ transcription: true, diarization: true, llmCommentary: true, dspThreads: true });
  });

  it("needs both a worker script and a thread count for threaded DSP", () => {
    expect(probeCapabilities({ config: { ...NO_KEYS, dspThreads: 0 }, dspWorkerPresent: true }).dspThreads).toBe(false);
    expect(probeCapabilities({ config: NO_KEYS, dspWorkerPresent: false }).dspThreads).toBe(false);
  });

  it("reports posture and eye contact per injected detector", () => {
    const caps = probeCapabilities({
      config: NO_KEYS,
      dspWorkerPresent: false,
      detectors: { faceDetector: { detect: async () => null } },
    });

    expect(caps.posture).toBe(false);
    expect(caps.eyeContact).toBe(true);
  });
});

describe("describeCapabilities", () => {
  it("notes the rule-based fallback when the LLM is off", () => {
    const lines = describeCapabilities(probeCapabilities({ config: NO_KEYS, dspWorkerPresent: false }));

    expect(lines).toEqual([
      "transcription: off",
      "diarization: off",
      "LLM commentary: off (rule-based fallback)",
      "DSP worker threads: off",
      "posture: off",
      "eye contact: off",
    ]);
  });

  it("logs one line per capability", () => {
    const logger = createSilentLogger();

    logCapabilities(probeCapabilities({ config: NO_KEYS, dspWorkerPresent: false }), logger);

    expect(logger.info).toHaveBeenCalledTimes(6);
    expect(logger.info).toHaveBeenCalledWith("Capability diarization: off");
  });
});
