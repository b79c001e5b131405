// Interview Voice Analyzer - Session recorder
// Persists one live session under <baseDir>/<sessionId>/:
//   audio.wav     16-bit mono PCM; the header is written with a zero data
//                 size and patched on finalize
//   video.frames  length-prefixed wire-format video frames, all at the
//                 first decodable frame's resolution
//   session.json  SessionRecordingMetadata
//
// Writes are serialized per recorder. finalize() runs once; later calls
// return the same metadata.

import { mkdir, open, writeFile } from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import { join } from "node:path";
import type { FrameHeader, SessionRecordingMetadata } from "./types.js";
import { ResourceStateError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { WAV_HEADER_BYTES, encodeWavHeader } from "./wav-codec.js";
import { encodeFrameRecord, encodeVideoFrame } from "./video-frame-codec.js";
import { decodeJpeg, fitJpegToSize } from "./jpeg-frames.js";

const BYTES_PER_SAMPLE = 2;

export const AUDIO_FILENAME = "audio.wav";
export const VIDEO_FILENAME = "video.frames";
export const METADATA_FILENAME = "session.json";

export interface SessionRecorderOptions {
  sampleRate?: number;
  fps?: number;
  logger?: Logger;
  now?: () => Date;
}

export class SessionRecorder {
  readonly sessionId: string;
  readonly sessionDir: string;
  private readonly sampleRate: number;
  private readonly fps: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly startedAt: string;

  private audioHandle: FileHandle | null = null;
  private videoHandle: FileHandle | null = null;
  private audioBytes = 0;
  private frameCount = 0;
  private droppedFrames = 0;
  private canonicalSize: { width: number; height: number } | null = null;
  private lock: Promise<void> = Promise.resolve();
  private finalizing: Promise<SessionRecordingMetadata> | null = null;

  private constructor(sessionId: string, sessionDir: string, options: SessionRecorderOptions) {
    this.sessionId = sessionId;
    this.sessionDir = sessionDir;
    this.sampleRate = options.sampleRate ?? 16000;
    this.fps = options.fps ?? 15;
    this.logger = options.logger ?? createConsoleLogger("SessionRecorder");
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now().toISOString();
  }

  static async create(sessionId: string, baseDir: string, options: SessionRecorderOptions = {}): Promise<SessionRecorder> {
    const sessionDir = join(baseDir, sessionId);
    await mkdir(sessionDir, { recursive: true });
    return new SessionRecorder(sessionId, sessionDir, options);
  }

  get audioPath(): string {
    return join(this.sessionDir, AUDIO_FILENAME);
  }

  get videoPath(): string {
    return join(this.sessionDir, VIDEO_FILENAME);
  }

  get finalized(): boolean {
    return this.finalizing !== null;
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.lock.then(fn);
    this.lock = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private finalizedError(what: string): ResourceStateError | null {
    if (!this.finalizing) return null;
    const err = new ResourceStateError(`${what} written after session ${this.sessionId} was finalized`);
    this.logger.warn(err.message);
    return err;
  }

  // ─── Audio ──────────────────────────────────────────────────────────────────────

  /** Appends raw 16-bit mono PCM. */
  writeAudioChunk(pcm: Buffer): Promise<void> {
    const closed = this.finalizedError("audio chunk");
    if (closed) return Promise.reject(closed);
    return this.exclusive(async () => {
      let chunk = pcm;
      if (chunk.length % BYTES_PER_SAMPLE !== 0) {
        this.logger.warn(`dropping trailing byte of odd-length chunk (${chunk.length} bytes)`);
        chunk = chunk.subarray(0, chunk.length - 1);
      }
      if (chunk.length === 0) return;

      if (!this.audioHandle) {
        this.audioHandle = await open(this.audioPath, "w");
        await this.audioHandle.write(this.wavHeader(0), 0, WAV_HEADER_BYTES, 0);
      }
      await this.audioHandle.write(chunk, 0, chunk.length, WAV_HEADER_BYTES + this.audioBytes);
      this.audioBytes += chunk.length;
    });
  }

  private wavHeader(dataBytes: number): Buffer {
    return encodeWavHeader(dataBytes, { sampleRate: this.sampleRate, channels: 1, bitsPerSample: 16 });
  }

  // ─── Video ──────────────────────────────────────────────────────────────────────

  /**
   * Appends a JPEG frame. The first decodable frame fixes the session's
   * resolution from its pixels, not its header; later frames are resized
   * to it. Frames that do not decode are dropped and counted.
   */
  writeVideoFrame(header: FrameHeader, jpeg: Buffer): Promise<void> {
    const closed = this.finalizedError("video frame");
    if (closed) return Promise.reject(closed);
    return this.exclusive(async () => {
      if (jpeg.length === 0) return;

      let size = this.canonicalSize;
      let payload = jpeg;
      try {
        if (size) {
          payload = fitJpegToSize(jpeg, size.width, size.height);
        } else {
          const image = decodeJpeg(jpeg);
          size = { width: image.width, height: image.height };
        }
      } catch (err) {
        this.droppedFrames++;
        this.logger.warn(`dropping video frame ${header.seq}: ${errorMessage(err)}`);
        return;
      }

      if (!this.videoHandle) {
        this.videoHandle = await open(this.videoPath, "w");
        this.canonicalSize = size;
      }
      const record = encodeFrameRecord(encodeVideoFrame({ ...header, ...size }, payload));
      await this.videoHandle.write(record);
      this.frameCount++;
    });
  }

  // ─── Finalize ───────────────────────────────────────────────────────────────────

  snapshot(): SessionRecordingMetadata {
    return {
      sessionId: this.sessionId,
      startedAt: this.startedAt,
      endedAt: null,
      sessionDir: this.sessionDir,
      audioPath: this.audioBytes > 0 ? this.audioPath : null,
      videoPath: this.frameCount > 0 ? this.videoPath : null,
      audioBytesWritten: this.audioBytes,
      audioDurationSeconds: this.audioBytes / (this.sampleRate * BYTES_PER_SAMPLE),
      videoFrameCount: this.frameCount,
      droppedVideoFrames: this.droppedFrames,
      fps: this.fps,
      frameWidth: this.canonicalSize?.width ?? null,
      frameHeight: this.canonicalSize?.height ?? null,
    };
  }

  /**
   * Closes both writers, patches the WAV sizes and writes session.json.
   * Idempotent: every call resolves to the same metadata.
   */
  finalize(): Promise<SessionRecordingMetadata> {
    if (!this.finalizing) {
      this.finalizing = this.exclusive(() => this.close());
    }
    return this.finalizing;
  }

  private async close(): Promise<SessionRecordingMetadata> {
    if (this.audioHandle) {
      await this.audioHandle.write(this.wavHeader(this.audioBytes), 0, WAV_HEADER_BYTES, 0);
      await this.audioHandle.close();
      this.audioHandle = null;
    }
    if (this.videoHandle) {
      await this.videoHandle.close();
      this.videoHandle = null;
    }

    const metadata: SessionRecordingMetadata = { ...this.snapshot(), endedAt: this.now().toISOString() };
    await writeFile(join(this.sessionDir, METADATA_FILENAME), JSON.stringify(metadata, null, 2), "utf-8");
    this.logger.info(
      `Session ${this.sessionId} recorded: ${metadata.audioDurationSeconds.toFixed(1)}s audio, ${metadata.videoFrameCount} frame(s)`,
    );
    return metadata;
  }
}
