// Interview Voice Analyzer - Configuration
// Reads process environment (populated from .env by dotenv at the entry
// point) into a typed, range-checked AppConfig.

import type { RoleStrategy } from "./types.js";

export interface AppConfig {
  port: number;
  openaiApiKey: string | null;
  deepgramApiKey: string | null;
  transcriptionModel: string;
  commentaryModel: string;
  /** ISO-639-1 hint for transcription; null lets the model detect it. */
  transcriptionLanguage: string | null;
  silenceTopDb: number;
  minPauseSeconds: number;
  roleStrategy: RoleStrategy;
  streamTriggerSeconds: number;
  streamOverlapSeconds: number;
  videoSampleIntervalSeconds: number;
  videoMaxSamples: number;
  videoConcurrency: number;
  /** 0 runs signal analysis on the main thread. */
  dspThreads: number;
  videoFps: number;
  sessionsDir: string;
  reportsDir: string;
  /** POST /api/analyze refuses paths outside this directory. */
  analyzeBaseDir: string;
}

export type Env = Record<string, string | undefined>;

export const LIVE_SAMPLE_RATE = 16000;

function text(env: Env, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function number(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = text(env, name);
  if (raw === null) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new Error(`${name} must be a number between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min: number, max: number): number {
  const value = number(env, name, fallback, min, max);
  if (!Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${env[name]}"`);
  }
  return value;
}

function roleStrategy(env: Env): RoleStrategy {
  const raw = text(env, "ROLE_STRATEGY") ?? "earliest-first";
  if (raw !== "earliest-first" && raw !== "most-talkative") {
    throw new Error(`ROLE_STRATEGY must be "earliest-first" or "most-talkative", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env): AppConfig {
  const streamTriggerSeconds = number(env, "STREAM_TRIGGER_SECONDS", 3, 0.5, 600);
  const streamOverlapSeconds = number(env, "STREAM_OVERLAP_SECONDS", 2, 0, 600);
  if (streamOverlapSeconds >= streamTriggerSeconds) {
    throw new Error(
      `STREAM_OVERLAP_SECONDS (${streamOverlapSeconds}) must be smaller than STREAM_TRIGGER_SECONDS (${streamTriggerSeconds})`,
    );
  }

  return {
    port: integer(env, "PORT", 3000, 0, 65535),
    openaiApiKey: text(env, "OPENAI_API_KEY"),
    deepgramApiKey: text(env, "DEEPGRAM_API_KEY"),
    transcriptionModel: text(env, "OPENAI_TRANSCRIPTION_MODEL") ?? "whisper-1",
    commentaryModel: text(env, "OPENAI_COMMENTARY_MODEL") ?? "gpt-4o-mini",
    transcriptionLanguage: text(env, "TRANSCRIPTION_LANGUAGE"),
    silenceTopDb: number(env, "SILENCE_TOP_DB", 40, 1, 120),
    minPauseSeconds: number(env, "MIN_PAUSE_SECONDS", 0.5, 0, 60),
    roleStrategy: roleStrategy(env),
    streamTriggerSeconds,
    streamOverlapSeconds,
    videoSampleIntervalSeconds: number(env, "VIDEO_SAMPLE_INTERVAL_SECONDS", 5, 0.1, 3600),
    videoMaxSamples: integer(env, "VIDEO_MAX_SAMPLES", 60, 1, 10000),
    videoConcurrency: integer(env, "VIDEO_CONCURRENCY", 4, 1, 64),
    dspThreads: integer(env, "DSP_THREADS", 2, 0, 64),
    videoFps: integer(env, "VIDEO_FPS", 15, 1, 120),
    sessionsDir: text(env, "SESSIONS_DIR") ?? "output/sessions",
    reportsDir: text(env, "REPORTS_DIR") ?? "output/reports",
    analyzeBaseDir: text(env, "ANALYZE_BASE_DIR") ?? "output",
  };
}
