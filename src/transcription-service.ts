// Interview Voice Analyzer - Transcription service
// Post-session transcript via the OpenAI audio transcription API. whisper-1
// is asked for verbose_json with segment timestamps; text-only models get a
// single segment spanning the recording. Results are memoized by content
// hash so re-analyzing a recording does not pay for a second API call.

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { File } from "node:buffer";
import type { TranscriptSegment, TranscriptionResult } from "./types.js";
import { ExternalServiceError, InputUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { isRetryable, withRetry } from "./retry.js";
import type { RetryOptions } from "./retry.js";
import { ContentHashCache, contentKey } from "./result-cache.js";
import { decodeWav } from "./wav-codec.js";
import { SILENCE_AMPLITUDE_FLOOR } from "./signal-metrics.js";

export interface TranscriptionService {
  transcribe(audioPath: string, language: string | null): Promise<TranscriptionResult>;
}

// ─── OpenAI client surface (injected for tests) ─────────────────────────────────

export interface OpenAITranscriptionRequest {
  file: File;
  model: string;
  response_format?: string;
  timestamp_granularities?: Array<"word" | "segment">;
  language?: string;
}

export interface OpenAITranscriptionClient {
  audio: {
    transcriptions: {
      create(params: OpenAITranscriptionRequest): Promise<OpenAITranscriptionResponse>;
    };
  };
}

export interface OpenAITranscriptionResponse {
  text: string;
  duration?: number;
  language?: string;
  segments?: Array<{
    id: number;
    start: number;
    end: number;
    text: string;
  }>;
}

export const EMPTY_TRANSCRIPTION: TranscriptionResult = { text: "", segments: [], detectedLanguage: null };

export interface OpenAITranscriptionOptions {
  model?: string;
  cache?: ContentHashCache<TranscriptionResult>;
  retry?: RetryOptions;
  logger?: Logger;
}

interface Probe {
  silent: boolean;
  durationSeconds: number | null;
}

/** Decodes WAV input to spot silence; other containers go to the API as-is. */
function probe(bytes: Buffer): Probe {
  try {
    const audio = decodeWav(bytes);
    let peak = 0;
    for (const s of audio.samples) {
      const magnitude = Math.abs(s);
      if (magnitude > peak) peak = magnitude;
    }
    return { silent: peak < SILENCE_AMPLITUDE_FLOOR, durationSeconds: audio.durationSeconds };
  } catch {
    return { silent: false, durationSeconds: null };
  }
}

export function parseTranscription(
  response: OpenAITranscriptionResponse,
  requestedLanguage: string | null,
  fallbackDurationSeconds: number | null,
): TranscriptionResult {
  const text = (response.text ?? "").trim();
  const detectedLanguage = response.language ?? requestedLanguage;
  if (!text) {
    return { text: "", segments: [], detectedLanguage };
  }

  let segments: TranscriptSegment[];
  if (response.segments && response.segments.length > 0) {
    segments = response.segments
      .filter((seg) => seg.text.trim().length > 0)
      .map((seg) => ({ start: seg.start, end: Math.max(seg.start, seg.end), text: seg.text.trim() }));
  } else {
    segments = [{ start: 0, end: response.duration ?? fallbackDurationSeconds ?? 0, text }];
  }

  return { text, segments, detectedLanguage };
}

export class OpenAITranscriptionService implements TranscriptionService {
  private readonly client: OpenAITranscriptionClient;
  private readonly model: string;
  private readonly cache: ContentHashCache<TranscriptionResult>;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;

  constructor(client: OpenAITranscriptionClient, options: OpenAITranscriptionOptions = {}) {
    this.client = client;
    this.model = options.model ?? "whisper-1";
    this.cache = options.cache ?? new ContentHashCache<TranscriptionResult>();
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createConsoleLogger("Transcription");
  }

  async transcribe(audioPath: string, language: string | null): Promise<TranscriptionResult> {
    let bytes: Buffer;
    try {
      bytes = await readFile(audioPath);
    } catch (err) {
      throw new InputUnavailableError(`audio file could not be read: ${errorMessage(err)}`, audioPath);
    }

    if (bytes.length === 0) {
      this.logger.warn(`${audioPath} is empty; skipping transcription`);
      return { ...EMPTY_TRANSCRIPTION, detectedLanguage: language };
    }

    const { silent, durationSeconds } = probe(bytes);
    if (silent) {
      this.logger.info(`${audioPath} is silent; skipping transcription`);
      return { ...EMPTY_TRANSCRIPTION, detectedLanguage: language };
    }

    const key = contentKey(`transcript:${this.model}:${language ?? "auto"}`, bytes);
    if (this.cache.has(key)) {
      this.logger.info(`Transcript cache hit for ${basename(audioPath)}`);
    }

    return this.cache.getOrCompute(key, () =>
      withRetry(() => this.request(bytes, basename(audioPath), language, durationSeconds), {
        label: "Transcription",
        ...this.retry,
      }),
    );
  }

  private async request(
    bytes: Buffer,
    filename: string,
    language: string | null,
    durationSeconds: number | null,
  ): Promise<TranscriptionResult> {
    const params: OpenAITranscriptionRequest = {
      file: new File([bytes], filename, { type: "audio/wav" }),
      model: this.model,
      response_format: "json",
    };
    // Only whisper-1 returns segment timestamps.
    if (this.model === "whisper-1") {
      params.response_format = "verbose_json";
      params.timestamp_granularities = ["segment"];
    }
    if (language) params.language = language;

    let response: OpenAITranscriptionResponse;
    try {
      response = await this.client.audio.transcriptions.create(params);
    } catch (err) {
      throw new ExternalServiceError("transcription", errorMessage(err), { retryable: isRetryable(err), cause: err });
    }

    const result = parseTranscription(response, language, durationSeconds);
    this.logger.info(`Transcribed ${filename}: ${result.segments.length} segment(s), ${result.text.length} chars`);
    return result;
  }
}
