import { describe, it, expect, vi } from "vitest";
import { mkdtemp, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LiveSession, LiveSessionState, audioLevel } from "./live-session.js";
import type { LiveSessionDeps, LiveSessionOptions } from "./live-session.js";
import { PostSessionOrchestrator } from "./post-session-orchestrator.js";
import { ReportWriter } from "./report-writer.js";
import { AcousticAnalyzer } from "./acoustic-analyzer.js";
import { InlineDspExecutor } from "./dsp-executor.js";
import type { DspExecutor } from "./dsp-executor.js";
import { RuleBasedCommentaryService } from "./commentary-service.js";
import { VideoAnalyzer } from "./video-analyzer.js";
import { emptySignalMetrics } from "./signal-metrics.js";
import { encodeAudioFrame, encodeVideoFrame } from "./video-frame-codec.js";
import { encodeJpeg } from "./jpeg-frames.js";
import { float32ToPcm16, readWavFile } from "./wav-codec.js";
import type { TranscriptionService } from "./transcription-service.js";
import { AnalysisStage } from "./types.js";
import type { ServerMessage } from "./types.js";
import type { Logger } from "./logger.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const SR = 16000;

function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Half a second of a 220 Hz tone at amplitude 0.5, as an audio wire frame. */
function toneFrame(seq: number): Buffer {
  const samples = new Float32Array(SR / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = 0.5 * Math.sin((2 * Math.PI * 220 * (seq * samples.length + i)) / SR);
  }
  return encodeAudioFrame({ timestamp: seq * 0.5, seq }, float32ToPcm16(samples));
}

async function setup(overrides: { dsp?: DspExecutor; transcription?: TranscriptionService } = {}) {
  const base = await mkdtemp(join(tmpdir(), "live-"));
  const logger = createSilentLogger();
  const messages: ServerMessage[] = [];
  const dsp = overrides.dsp ?? new InlineDspExecutor();
  const orchestrator = new PostSessionOrchestrator({
    transcription: { transcribe: vi.fn(async () => ({ text: "", segments: [], detectedLanguage: null })) },
    diarization: null,
    commentary: new RuleBasedCommentaryService(),
    acoustic: new AcousticAnalyzer(dsp, { topDb: 40, minPauseSeconds: 0.5 }),
    video: new VideoAnalyzer(null, { logger }),
    roleStrategy: "earliest-first",
    logger,
  });
  const reportWriter = new ReportWriter(join(base, "reports"), logger);
  const options: LiveSessionOptions = {
    sessionsDir: join(base, "sessions"),
    sampleRate: SR,
    fps: 15,
    triggerSeconds: 1,
    overlapSeconds: 0.25,
    topDb: 40,
    minPauseSeconds: 0.5,
  };
  const deps: LiveSessionDeps = {
    dsp,
    orchestrator,
    reportWriter,
    transcription: overrides.transcription ?? null,
    send: (message) => messages.push(message),
    logger,
    createId: () => "live-1",
  };
  const session = await LiveSession.start(options, deps);
  return { session, messages, base, logger, reportWriter, orchestrator };
}

function types(messages: ServerMessage[]): string[] {
  return messages.map((m) => m.type);
}

// ─── audioLevel ─────────────────────────────────────────────────────────────────

describe("audioLevel", () => {
  it("maps window RMS onto 0-100", () => {
    expect(audioLevel(new Float32Array(0))).toBe(0);
    expect(audioLevel(new Float32Array(100))).toBe(0);
    expect(audioLevel(new Float32Array(100).fill(0.25))).toBe(25);
    expect(audioLevel(new Float32Array(100).fill(-1))).toBe(100);
  });
});

// ─── LiveSession ────────────────────────────────────────────────────────────────

describe("LiveSession", () => {
  it("announces the session id on start", async () => {
    const { session, messages } = await setup();

    expect(session.id).toBe("live-1");
    expect(messages).toEqual([{ type: "connected", sessionId: "live-1" }]);
    expect(session.getState()).toBe(LiveSessionState.RECORDING);
  });

  it("streams a snapshot per full window and one for the final flush", async () => {
    const { session, messages } = await setup();

    for (let seq = 0; seq < 3; seq++) {
      await session.handleBinary(toneFrame(seq));
    }
    const result = await session.stop();

    expect(types(messages)).toEqual(["connected", "realtime_analysis", "realtime_analysis", "processing", "report_ready"]);
    const snapshots = messages.flatMap((m) => (m.type === "realtime_analysis" ? [m.snapshot] : []));
    expect(snapshots.map((s) => s.windowSeconds)).toEqual([1, 0.75]);
    expect(snapshots[0].audioLevel).toBe(35);
    expect(snapshots[0].pauseCount).toBe(0);

    expect(result?.state).toBe(AnalysisStage.DONE);
    expect(result?.payload.audioFeatures).toMatchObject({ available: true, features: { durationSeconds: 1.5 } });
    expect(session.getState()).toBe(LiveSessionState.CLOSED);
  });

  it("leaves snapshot text empty without a transcription service", async () => {
    const { session, messages } = await setup();

    await session.handleBinary(toneFrame(0));
    await session.handleBinary(toneFrame(1));
    await session.stop();

    const snapshot = messages.find((m) => m.type === "realtime_analysis");
    expect(snapshot).toMatchObject({ snapshot: { text: null, accumulatedText: "" } });
  });

  it("builds a running transcript without repeating the overlap", async () => {
    const windowLengths: number[] = [];
    const replies = [
      { text: "Hello", segments: [{ start: 0, end: 0.9, text: " Hello" }], detectedLanguage: "en" },
      {
        text: "there everyone",
        segments: [
          { start: 0, end: 0.2, text: " there" },
          { start: 0.3, end: 0.7, text: " everyone" },
        ],
        detectedLanguage: "en",
      },
    ];
    const transcription: TranscriptionService = {
      transcribe: vi.fn(async (path: string) => {
        windowLengths.push((await readWavFile(path)).samples.length);
        const reply = replies.shift();
        if (!reply) throw new Error("unexpected window");
        return reply;
      }),
    };
    const { session, messages } = await setup({ transcription });

    for (let seq = 0; seq < 3; seq++) {
      await session.handleBinary(toneFrame(seq));
    }
    await session.stop();

    const snapshots = messages.flatMap((m) => (m.type === "realtime_analysis" ? [m.snapshot] : []));
    expect(snapshots.map((s) => s.text)).toEqual(["Hello", "everyone"]);
    expect(snapshots.map((s) => s.accumulatedText)).toEqual(["Hello", "Hello everyone"]);
    expect(windowLengths).toEqual([SR, 0.75 * SR]);
    expect(transcription.transcribe).toHaveBeenCalledWith(expect.stringMatching(/window-0\.wav$/), null);
  });

  it("keeps streaming when a window cannot be transcribed", async () => {
    const transcription: TranscriptionService = {
      transcribe: vi.fn(async () => {
        throw new Error("rate limited");
      }),
    };
    const { session, messages, logger } = await setup({ transcription });

    await session.handleBinary(toneFrame(0));
    await session.handleBinary(toneFrame(1));
    await session.stop();

    const snapshot = messages.find((m) => m.type === "realtime_analysis");
    expect(snapshot).toMatchObject({ snapshot: { text: null, accumulatedText: "", windowSeconds: 1 } });
    expect(logger.warn).toHaveBeenCalledWith("Session live-1: live transcription failed: rate limited");
    expect(messages.at(-1)).toMatchObject({ type: "report_ready" });
  });

  it("points the client at the written report", async () => {
    const { session, messages, base } = await setup();
    await session.handleBinary(toneFrame(0));

    await session.stop();

    const ready = messages.find((m) => m.type === "report_ready");
    expect(ready).toMatchObject({ type: "report_ready", sessionId: "live-1", state: AnalysisStage.DONE });
    if (ready?.type === "report_ready") {
      expect(ready.reportUrl).toMatch(/^\/reports\/\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}_live-1\.md$/);
      const markdown = await readFile(join(base, "reports", ready.reportUrl.slice("/reports/".length)), "utf-8");
      expect(markdown.split("\n")[0]).toBe("# Interview Practice Report");
    }
  });

  it("runs the post-session pipeline once however often stop is called", async () => {
    const { session, reportWriter } = await setup();
    const write = vi.spyOn(reportWriter, "write");
    await session.handleBinary(toneFrame(0));

    const [first, second] = await Promise.all([session.stop(), session.stop()]);

    expect(second).toBe(first);
    expect(write).toHaveBeenCalledTimes(1);
  });

  it("records video frames beside the audio", async () => {
    const { session, base, orchestrator } = await setup();
    const analyze = vi.spyOn(orchestrator, "analyze");
    const jpeg = encodeJpeg({ width: 16, height: 8, data: new Uint8Array(16 * 8 * 4).fill(90) });

    await session.handleBinary(encodeVideoFrame({ timestamp: 0, seq: 0, width: 16, height: 8 }, jpeg));
    await session.handleBinary(toneFrame(0));
    await session.stop();

    const sessionDir = join(base, "sessions", "live-1");
    expect(analyze).toHaveBeenCalledWith({
      sessionId: "live-1",
      audioPath: join(sessionDir, "audio.wav"),
      videoPath: join(sessionDir, "video.frames"),
    });
    const metadata: unknown = JSON.parse(await readFile(join(sessionDir, "session.json"), "utf-8"));
    expect(metadata).toMatchObject({ videoFrameCount: 1, frameWidth: 16, frameHeight: 8, audioBytesWritten: 16000 });
  });

  it("reports undecodable binary frames as recoverable errors", async () => {
    const { session, messages } = await setup();

    await session.handleBinary(Buffer.from("hello"));

    expect(messages.at(-1)).toEqual({ type: "error", message: "Unrecognized binary frame", recoverable: true });
    expect(session.getState()).toBe(LiveSessionState.RECORDING);
  });

  it("ignores frames that arrive after stop", async () => {
    const { session, logger } = await setup();
    await session.stop();

    await session.handleBinary(toneFrame(0));

    expect(logger.warn).toHaveBeenCalledWith('Session live-1: ignoring 16029-byte frame in "closed" state');
  });
});

describe("LiveSession.abort", () => {
  it("closes the recording without analyzing it", async () => {
    const { session, messages, base, orchestrator } = await setup();
    const analyze = vi.spyOn(orchestrator, "analyze");
    await session.handleBinary(toneFrame(0));

    await session.abort();
    await session.abort();

    expect(types(messages)).toEqual(["connected", "aborted"]);
    expect(analyze).not.toHaveBeenCalled();
    expect(await session.stop()).toBeNull();
    const metadata: unknown = JSON.parse(await readFile(join(base, "sessions", "live-1", "session.json"), "utf-8"));
    expect(metadata).toMatchObject({ sessionId: "live-1", audioBytesWritten: 16000 });
  });

  it("drops the snapshot of a window still being analyzed", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const dsp: DspExecutor = {
      kind: "inline",
      signalMetrics: async () => {
        await gate;
        return emptySignalMetrics(1);
      },
      pauses: async () => ({ voicedIntervals: [], pauses: [], pauseCount: 0, pauseTotalDuration: 0 }),
      close: async () => {},
    };
    const { session, messages } = await setup({ dsp });

    await session.handleBinary(toneFrame(0));
    await session.handleBinary(toneFrame(1));
    await session.abort();
    release();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(types(messages)).toEqual(["connected", "aborted"]);
  });

  it("dispose keeps the recording and sends nothing", async () => {
    const { session, messages } = await setup();

    await session.dispose();

    expect(types(messages)).toEqual(["connected"]);
    expect(session.getState()).toBe(LiveSessionState.CLOSED);
  });
});
