// Interview Voice Analyzer - Streaming chunk accumulator
// Rolling 16-bit mono PCM buffer for live sessions. Once enough audio has
// built up, the whole buffer is handed out for analysis and only the
// trailing overlap is kept, so consecutive windows share context.
//
// Appends and drains are serialized through a promise-chain lock: a drain
// never observes half of an append.

import { ResourceStateError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

const BYTES_PER_SAMPLE = 2;

export interface ChunkAccumulatorOptions {
  sampleRate: number;
  /** Seconds of audio kept after each drain. */
  overlapSeconds: number;
  logger?: Logger;
}

export interface AudioWindow {
  pcm: Buffer;
  /** Offset of the window's first sample from the start of the stream. */
  startSeconds: number;
  durationSeconds: number;
  final: boolean;
}

export class StreamingChunkAccumulator {
  private buffer: Buffer = Buffer.alloc(0);
  /** Bytes appended since the last drain; the overlap tail is not counted. */
  private unanalyzedBytes = 0;
  private bufferStartSeconds = 0;
  private lock: Promise<void> = Promise.resolve();
  private isClosed = false;
  private readonly sampleRate: number;
  private readonly overlapBytes: number;
  private readonly logger: Logger;

  constructor(options: ChunkAccumulatorOptions) {
    if (!(options.sampleRate > 0)) {
      throw new RangeError(`sampleRate must be positive, got ${options.sampleRate}`);
    }
    if (!(options.overlapSeconds >= 0)) {
      throw new RangeError(`overlapSeconds must be >= 0, got ${options.overlapSeconds}`);
    }
    this.sampleRate = options.sampleRate;
    this.overlapBytes = Math.round(options.overlapSeconds * options.sampleRate) * BYTES_PER_SAMPLE;
    this.logger = options.logger ?? createConsoleLogger("ChunkAccumulator");
  }

  get closed(): boolean {
    return this.isClosed;
  }

  private exclusive<T>(fn: () => T): Promise<T> {
    const result = this.lock.then(fn);
    this.lock = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  addChunk(bytes: Buffer): Promise<void> {
    return this.exclusive(() => {
      if (this.isClosed) {
        const err = new ResourceStateError("audio chunk received after the accumulator was flushed");
        this.logger.warn(err.message);
        throw err;
      }
      let chunk = bytes;
      if (chunk.length % BYTES_PER_SAMPLE !== 0) {
        this.logger.warn(`dropping trailing byte of odd-length chunk (${chunk.length} bytes)`);
        chunk = chunk.subarray(0, chunk.length - 1);
      }
      if (chunk.length === 0) return;
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.unanalyzedBytes += chunk.length;
    });
  }

  bufferedDurationSeconds(): number {
    return this.buffer.length / BYTES_PER_SAMPLE / this.sampleRate;
  }

  shouldTrigger(thresholdSeconds: number): boolean {
    return !this.isClosed && this.bufferedDurationSeconds() >= thresholdSeconds;
  }

  /**
   * When the buffer holds at least `thresholdSeconds`, returns all of it and
   * keeps only the trailing overlap. Otherwise resolves to null.
   */
  drainIfReady(thresholdSeconds: number): Promise<AudioWindow | null> {
    return this.exclusive(() => (this.shouldTrigger(thresholdSeconds) ? this.takeWindow(false) : null));
  }

  /**
   * Final pass: returns whatever has not been analyzed yet (with the overlap
   * in front of it) and closes the accumulator. A second flush, or a flush
   * with nothing new since the last drain, resolves to null.
   */
  flush(): Promise<AudioWindow | null> {
    return this.exclusive(() => {
      if (this.isClosed) return null;
      const window = this.unanalyzedBytes > 0 ? this.takeWindow(true) : null;
      this.isClosed = true;
      this.buffer = Buffer.alloc(0);
      return window;
    });
  }

  private takeWindow(final: boolean): AudioWindow {
    const pcm = this.buffer;
    const window: AudioWindow = {
      pcm,
      startSeconds: this.bufferStartSeconds,
      durationSeconds: pcm.length / BYTES_PER_SAMPLE / this.sampleRate,
      final,
    };

    const keep = Math.min(this.overlapBytes, pcm.length);
    this.buffer = Buffer.from(pcm.subarray(pcm.length - keep));
    this.bufferStartSeconds += (pcm.length - keep) / BYTES_PER_SAMPLE / this.sampleRate;
    this.unanalyzedBytes = 0;
    return window;
  }
}
