// Unit tests for whole-session and per-speaker acoustic analysis

import { describe, it, expect } from "vitest";
import { AcousticAnalyzer, speakingRate } from "./acoustic-analyzer.js";
import { InlineDspExecutor } from "./dsp-executor.js";
import type { AudioBuffer, TranscriptSegment } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const SR = 16000;

/** 4 s tone, 2 s silence, 4 s tone. */
function makeInterviewAudio(): AudioBuffer {
  const samples = new Float32Array(10 * SR);
  for (let i = 0; i < samples.length; i++) {
    const silent = i >= 4 * SR && i < 6 * SR;
    samples[i] = silent ? 0 : 0.5 * Math.sin((2 * Math.PI * 220 * i) / SR);
  }
  return { samples, sampleRate: SR, durationSeconds: 10 };
}

function makeAnalyzer(): AcousticAnalyzer {
  return new AcousticAnalyzer(new InlineDspExecutor(), { topDb: 40, minPauseSeconds: 0.5 });
}

describe("speakingRate", () => {
  it("counts non-whitespace characters per minute", () => {
    expect(speakingRate("ab c\n", 30)).toBe(6);
  });

  it("is zero for zero-length audio", () => {
    expect(speakingRate("plenty of words", 0)).toBe(0);
  });
});

describe("AcousticAnalyzer.analyzeRecording", () => {
  it("combines signal metrics, pauses and speaking rate", async () => {
    const features = await makeAnalyzer().analyzeRecording(makeInterviewAudio(), "x".repeat(120));

    expect(features.pauseCount).toBe(1);
    expect(features.pauseTotalDuration).toBeCloseTo(1.952, 9);
    expect(features.speakingRateCharsPerMinute).toBeCloseTo(720, 9);
    expect(features.durationSeconds).toBe(10);
    expect(features.pitchMean).toBeGreaterThan(215);
    expect(features.pitchMean).toBeLessThan(225);
    expect(features.insufficientData).toBe(false);
  });
});

describe("AcousticAnalyzer.analyzeSpeakers", () => {
  const segments: TranscriptSegment[] = [
    { start: 0, end: 4, text: "hello there", speaker: "speaker_0" },
    { start: 6, end: 10, text: "general kenobi", speaker: "speaker_1" },
  ];

  it("scores each speaker over their own segments", async () => {
    const speakers = await makeAnalyzer().analyzeSpeakers(makeInterviewAudio(), segments, "earliest-first");

    expect(speakers.map((s) => [s.speaker, s.role])).toEqual([
      ["speaker_0", "interviewer"],
      ["speaker_1", "candidate"],
    ]);
    expect(speakers[0].segmentCount).toBe(1);
    expect(speakers[0].speakingSeconds).toBe(4);
    expect(speakers[0].features.durationSeconds).toBe(4);
    expect(speakers[0].features.pauseCount).toBe(0);
    expect(speakers[0].features.speakingRateCharsPerMinute).toBeCloseTo(150, 9);
    expect(speakers[1].features.speakingRateCharsPerMinute).toBeCloseTo(195, 9);
    expect(speakers[1].profile.summary.personalityType).toBeTypeOf("string");
  });

  it("reports a single unknown speaker when nothing was diarized", async () => {
    const unlabeled = segments.map(({ start, end, text }) => ({ start, end, text }));

    const speakers = await makeAnalyzer().analyzeSpeakers(makeInterviewAudio(), unlabeled, "earliest-first");

    expect(speakers).toHaveLength(1);
    expect(speakers[0].speaker).toBe("unknown");
    expect(speakers[0].role).toBe("unknown");
    expect(speakers[0].segmentCount).toBe(2);
    expect(speakers[0].features.durationSeconds).toBe(8);
  });

  it("flags a speaker whose segments fall outside the audio as insufficient data", async () => {
    const late: TranscriptSegment[] = [{ start: 20, end: 25, text: "after the end", speaker: "speaker_0" }];

    const [speaker] = await makeAnalyzer().analyzeSpeakers(makeInterviewAudio(), late, "earliest-first");

    expect(speaker.features.insufficientData).toBe(true);
    expect(speaker.features.pauseCount).toBe(0);
  });
});
