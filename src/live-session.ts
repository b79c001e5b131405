// Interview Voice Analyzer - Live session
// One WebSocket connection = one LiveSession. Binary frames are recorded
// in arrival order and audio is fed to a rolling accumulator; every full
// window is scored and pushed back as a realtime_analysis message.
//
// Lifecycle: RECORDING → PROCESSING (stop) → CLOSED
//            RECORDING → CLOSED             (abort or connection drop)
//
// stop() and abort() bump runId: window analyses still in flight finish
// but their snapshots are dropped. The recorder is finalized exactly once
// whichever path closes the session.

import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { PostSessionResult, RealtimeSnapshot, ServerMessage } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { SessionRecorder } from "./session-recorder.js";
import { StreamingChunkAccumulator } from "./chunk-accumulator.js";
import type { AudioWindow } from "./chunk-accumulator.js";
import type { DspExecutor } from "./dsp-executor.js";
import { encodeWav, pcm16ToFloat32 } from "./wav-codec.js";
import { decodeAudioFrame, decodeVideoFrame, getFrameType } from "./video-frame-codec.js";
import { scoreVoiceEmotion } from "./voice-score-engine.js";
import type { PostSessionOrchestrator } from "./post-session-orchestrator.js";
import type { ReportWriter } from "./report-writer.js";
import type { TranscriptionService } from "./transcription-service.js";

/** Segments starting this close before the previous window's end still count as new. */
const SEGMENT_START_TOLERANCE_SECONDS = 0.05;

export enum LiveSessionState {
  RECORDING = "recording",
  PROCESSING = "processing",
  CLOSED = "closed",
}

export interface LiveSessionOptions {
  sessionsDir: string;
  sampleRate: number;
  fps: number;
  triggerSeconds: number;
  overlapSeconds: number;
  topDb: number;
  minPauseSeconds: number;
  /** Transcription language hint; null lets the service detect it. */
  language?: string | null;
}

export interface LiveSessionDeps {
  dsp: DspExecutor;
  orchestrator: PostSessionOrchestrator;
  reportWriter: ReportWriter;
  /** Transcribes each window for the running transcript. Null or absent: snapshots carry no text. */
  transcription?: TranscriptionService | null;
  /** Delivers a message to the client; a closed socket drops it. */
  send: (message: ServerMessage) => void;
  logger?: Logger;
  createId?: () => string;
}

/** RMS of the window on a 0-100 scale. */
export function audioLevel(samples: Float32Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (const s of samples) sum += s * s;
  return Math.min(100, Math.round(Math.sqrt(sum / samples.length) * 100));
}

export class LiveSession {
  readonly id: string;
  private state = LiveSessionState.RECORDING;
  private runId = 0;
  private readonly recorder: SessionRecorder;
  private readonly accumulator: StreamingChunkAccumulator;
  private readonly options: LiveSessionOptions;
  private readonly deps: LiveSessionDeps;
  private readonly logger: Logger;
  /** Window analyses run one after another. */
  private analysisChain: Promise<void> = Promise.resolve();
  private stopping: Promise<PostSessionResult | null> | null = null;
  private aborting: Promise<void> | null = null;
  private windowSeq = 0;
  /** Session time up to which window transcripts have been kept. */
  private transcribedUntil = 0;
  private readonly transcriptParts: string[] = [];

  private constructor(id: string, recorder: SessionRecorder, options: LiveSessionOptions, deps: LiveSessionDeps) {
    this.id = id;
    this.recorder = recorder;
    this.options = options;
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("LiveSession");
    this.accumulator = new StreamingChunkAccumulator({
      sampleRate: options.sampleRate,
      overlapSeconds: options.overlapSeconds,
      logger: this.logger,
    });
  }

  static async start(options: LiveSessionOptions, deps: LiveSessionDeps): Promise<LiveSession> {
    const id = (deps.createId ?? uuidv4)();
    const recorder = await SessionRecorder.create(id, options.sessionsDir, {
      sampleRate: options.sampleRate,
      fps: options.fps,
      logger: deps.logger,
    });
    const session = new LiveSession(id, recorder, options, deps);
    session.logger.info(`Session ${id} started`);
    deps.send({ type: "connected", sessionId: id });
    return session;
  }

  getState(): LiveSessionState {
    return this.state;
  }

  // ─── Ingest ─────────────────────────────────────────────────────────────────────

  /** Records one binary wire frame. Frames arriving after stop/abort are ignored. */
  async handleBinary(data: Buffer): Promise<void> {
    if (this.state !== LiveSessionState.RECORDING) {
      this.logger.warn(`Session ${this.id}: ignoring ${data.length}-byte frame in "${this.state}" state`);
      return;
    }

    const type = getFrameType(data);
    if (type === "audio") {
      const frame = decodeAudioFrame(data);
      if (frame) return this.handleAudio(frame.pcm);
    } else if (type === "video") {
      const frame = decodeVideoFrame(data);
      if (frame) return this.recorder.writeVideoFrame(frame.header, frame.jpeg);
    }
    this.logger.warn(`Session ${this.id}: undecodable binary frame (${data.length} bytes)`);
    this.deps.send({ type: "error", message: "Unrecognized binary frame", recoverable: true });
  }

  private async handleAudio(pcm: Buffer): Promise<void> {
    await Promise.all([this.recorder.writeAudioChunk(pcm), this.accumulator.addChunk(pcm)]);
    const window = await this.accumulator.drainIfReady(this.options.triggerSeconds);
    if (window) this.queueAnalysis(window);
  }

  private queueAnalysis(window: AudioWindow): void {
    const capturedRunId = this.runId;
    this.analysisChain = this.analysisChain.then(() => this.analyzeWindow(window, capturedRunId));
  }

  private async analyzeWindow(window: AudioWindow, capturedRunId: number): Promise<void> {
    try {
      const samples = pcm16ToFloat32(window.pcm);
      const [metrics, pauses, text] = await Promise.all([
        this.deps.dsp.signalMetrics(samples, this.options.sampleRate, { topDb: this.options.topDb }),
        this.deps.dsp.pauses(samples, this.options.sampleRate, {
          topDb: this.options.topDb,
          minPauseSeconds: this.options.minPauseSeconds,
        }),
        this.transcribeWindow(window),
      ]);

      // Stopped or aborted while the window was being analyzed
      if (this.runId !== capturedRunId) return;

      const emotion = scoreVoiceEmotion(metrics);
      const snapshot: RealtimeSnapshot = {
        windowSeconds: window.durationSeconds,
        averageVolumeDb: metrics.averageVolumeDb,
        pitchMean: metrics.pitchMean,
        pauseCount: pauses.pauseCount,
        confidence: emotion.confidence,
        calmness: emotion.calmness,
        audioLevel: audioLevel(samples),
        text,
        accumulatedText: this.transcriptParts.join(" "),
      };
      this.deps.send({ type: "realtime_analysis", snapshot });
    } catch (err) {
      this.logger.error(`Session ${this.id}: realtime analysis failed: ${errorMessage(err)}`);
      if (this.runId === capturedRunId) {
        this.deps.send({ type: "error", message: "Realtime analysis failed", recoverable: true });
      }
    }
  }

  /**
   * Text of the window that was not already covered by the previous one.
   * The overlap is re-transcribed for context; segments that start inside
   * it are dropped. Null without a service or when transcription fails.
   */
  private async transcribeWindow(window: AudioWindow): Promise<string | null> {
    const transcription = this.deps.transcription;
    if (!transcription) return null;

    const path = join(this.recorder.sessionDir, `window-${this.windowSeq++}.wav`);
    try {
      await writeFile(path, encodeWav(window.pcm, this.options.sampleRate));
      const result = await transcription.transcribe(path, this.options.language ?? null);
      const fresh =
        result.segments.length > 0
          ? result.segments
              .filter((seg) => window.startSeconds + seg.start >= this.transcribedUntil - SEGMENT_START_TOLERANCE_SECONDS)
              .map((seg) => seg.text.trim())
          : [result.text.trim()];
      const text = fresh.filter((part) => part !== "").join(" ");
      this.transcribedUntil = window.startSeconds + window.durationSeconds;
      if (text !== "") this.transcriptParts.push(text);
      return text;
    } catch (err) {
      this.logger.warn(`Session ${this.id}: live transcription failed: ${errorMessage(err)}`);
      return null;
    } finally {
      await rm(path, { force: true });
    }
  }

  // ─── Stop / abort ───────────────────────────────────────────────────────────────

  /**
   * Ends recording, analyzes the final window, then runs the post-session
   * pipeline and writes the report. Repeated calls share one run.
   */
  stop(): Promise<PostSessionResult | null> {
    if (!this.stopping) {
      this.stopping = this.aborting ? this.aborting.then(() => null) : this.runStop();
    }
    return this.stopping;
  }

  private async runStop(): Promise<PostSessionResult | null> {
    this.state = LiveSessionState.PROCESSING;

    const finalWindow = await this.accumulator.flush();
    await this.analysisChain;
    if (finalWindow) {
      await this.analyzeWindow(finalWindow, this.runId);
    }
    this.runId++;

    this.deps.send({ type: "processing", message: "Analyzing the recording..." });
    try {
      const metadata = await this.recorder.finalize();
      const result = await this.deps.orchestrator.analyze({
        sessionId: this.id,
        audioPath: metadata.audioPath,
        videoPath: metadata.videoPath,
      });
      const written = await this.deps.reportWriter.write(result.payload);
      this.deps.send({
        type: "report_ready",
        sessionId: this.id,
        reportUrl: written.reportUrl,
        payloadUrl: written.payloadUrl,
        state: result.state,
      });
      return result;
    } catch (err) {
      this.logger.error(`Session ${this.id}: post-session processing failed: ${errorMessage(err)}`);
      this.deps.send({ type: "error", message: `Report generation failed: ${errorMessage(err)}`, recoverable: false });
      return null;
    } finally {
      this.state = LiveSessionState.CLOSED;
    }
  }

  /**
   * Drops pending analysis results and closes the recording without
   * analyzing it. No-op once stop() has begun.
   */
  abort(notify = true): Promise<void> {
    if (this.stopping) return this.stopping.then(() => undefined);
    if (!this.aborting) {
      this.aborting = this.runAbort(notify);
    }
    return this.aborting;
  }

  private async runAbort(notify: boolean): Promise<void> {
    this.runId++;
    this.state = LiveSessionState.CLOSED;
    await this.accumulator.flush();
    await this.recorder.finalize();
    this.logger.info(`Session ${this.id} aborted`);
    if (notify) this.deps.send({ type: "aborted", sessionId: this.id });
  }

  /** Connection dropped: keep the recording, skip analysis. */
  dispose(): Promise<void> {
    return this.abort(false);
  }
}
