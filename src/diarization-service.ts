// Interview Voice Analyzer - Diarization service
// Speaker turns from Deepgram's prerecorded API. Diarization is optional:
// without a key the orchestrator runs with every segment "unknown".

import { readFile } from "node:fs/promises";
import type { DiarizationTurn } from "./types.js";
import { ExternalServiceError, InputUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { isRetryable, withRetry } from "./retry.js";
import type { RetryOptions } from "./retry.js";

export interface DiarizationService {
  /** `speakerHint` is the expected number of speakers, if known. */
  diarize(audioPath: string, speakerHint?: number): Promise<DiarizationTurn[]>;
}

// ─── Deepgram client surface (injected for tests) ───────────────────────────────

export interface DeepgramPrerecordedOptions {
  model: string;
  diarize: boolean;
  utterances: boolean;
  punctuate: boolean;
  language?: string;
}

export interface DeepgramWord {
  start: number;
  end: number;
  speaker?: number;
}

export interface DeepgramPrerecordedResult {
  results?: {
    utterances?: Array<{ start: number; end: number; speaker?: number }>;
    channels?: Array<{ alternatives?: Array<{ words?: DeepgramWord[] }> }>;
  };
}

export interface DeepgramPrerecordedResponse {
  result: DeepgramPrerecordedResult | null;
  error: { message: string } | null;
}

export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(source: Buffer, options: DeepgramPrerecordedOptions): Promise<DeepgramPrerecordedResponse>;
    };
  };
}

function label(speaker: number): string {
  return `speaker_${speaker}`;
}

/** Consecutive words of the same speaker collapse into one turn. */
function turnsFromWords(words: DeepgramWord[]): DiarizationTurn[] {
  const turns: DiarizationTurn[] = [];
  for (const word of words) {
    if (word.speaker === undefined) continue;
    const last = turns[turns.length - 1];
    if (last && last.speakerLabel === label(word.speaker)) {
      last.end = Math.max(last.end, word.end);
    } else {
      turns.push({ start: word.start, end: word.end, speakerLabel: label(word.speaker) });
    }
  }
  return turns;
}

export function parseDiarization(result: DeepgramPrerecordedResult): DiarizationTurn[] {
  const utterances = result.results?.utterances ?? [];
  if (utterances.length > 0) {
    return utterances
      .filter((u) => u.speaker !== undefined)
      .map((u) => ({ start: u.start, end: u.end, speakerLabel: label(u.speaker ?? 0) }))
      .sort((a, b) => a.start - b.start);
  }
  const words = result.results?.channels?.[0]?.alternatives?.[0]?.words ?? [];
  return turnsFromWords(words);
}

export interface DeepgramDiarizationOptions {
  model?: string;
  language?: string | null;
  retry?: RetryOptions;
  logger?: Logger;
}

export class DeepgramDiarizationService implements DiarizationService {
  private readonly client: DeepgramPrerecordedClient;
  private readonly model: string;
  private readonly language: string | null;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;

  constructor(client: DeepgramPrerecordedClient, options: DeepgramDiarizationOptions = {}) {
    this.client = client;
    this.model = options.model ?? "nova-2";
    this.language = options.language ?? null;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createConsoleLogger("Diarization");
  }

  async diarize(audioPath: string, speakerHint?: number): Promise<DiarizationTurn[]> {
    let bytes: Buffer;
    try {
      bytes = await readFile(audioPath);
    } catch (err) {
      throw new InputUnavailableError(`audio file could not be read: ${errorMessage(err)}`, audioPath);
    }
    if (bytes.length === 0) return [];

    const options: DeepgramPrerecordedOptions = {
      model: this.model,
      diarize: true,
      utterances: true,
      punctuate: true,
    };
    if (this.language) options.language = this.language;

    const result = await withRetry(
      async () => {
        let response: DeepgramPrerecordedResponse;
        try {
          response = await this.client.listen.prerecorded.transcribeFile(bytes, options);
        } catch (err) {
          throw new ExternalServiceError("diarization", errorMessage(err), { retryable: isRetryable(err), cause: err });
        }
        if (response.error || !response.result) {
          throw new ExternalServiceError("diarization", response.error?.message ?? "empty response", {
            retryable: isRetryable(response.error),
          });
        }
        return response.result;
      },
      { label: "Diarization", ...this.retry },
    );

    const turns = parseDiarization(result);
    const speakers = new Set(turns.map((t) => t.speakerLabel)).size;
    if (speakerHint !== undefined && speakers !== speakerHint) {
      this.logger.warn(`Expected ${speakerHint} speaker(s), diarization found ${speakers}`);
    }
    this.logger.info(`Diarized ${turns.length} turn(s) across ${speakers} speaker(s)`);
    return turns;
  }
}
