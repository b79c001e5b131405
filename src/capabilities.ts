// Interview Voice Analyzer - Capability probe
// Decides once at startup which optional backends are live. Every flag
// that is off maps to a documented skip reason in the report rather than
// a failed run.

import type { AppConfig } from "./config.js";
import type { PoseGazeDetectors } from "./pose-gaze-sampler.js";
import type { Logger } from "./logger.js";

export interface Capabilities {
  /** OpenAI speech-to-text. */
  transcription: boolean;
  /** Deepgram speaker separation. */
  diarization: boolean;
  /** OpenAI commentary; the rule-based fallback is always available. */
  llmCommentary: boolean;
  /** Signal analysis on worker threads rather than the main thread. */
  dspThreads: boolean;
  posture: boolean;
  eyeContact: boolean;
}

export interface ProbeInputs {
  config: Pick<AppConfig, "openaiApiKey" | "deepgramApiKey" | "dspThreads">;
  /** Whether the compiled DSP worker script exists next to this module. */
  dspWorkerPresent: boolean;
  detectors?: PoseGazeDetectors;
}

export function probeCapabilities({ config, dspWorkerPresent, detectors = {} }: ProbeInputs): Capabilities {
  const openai = config.openaiApiKey !== null;
  return {
    transcription: openai,
    diarization: config.deepgramApiKey !== null,
    llmCommentary: openai,
    dspThreads: config.dspThreads > 0 && dspWorkerPresent,
    posture: detectors.poseDetector !== undefined,
    eyeContact: detectors.faceDetector !== undefined,
  };
}

/** One `on`/`off` line per capability. */
export function describeCapabilities(caps: Capabilities): string[] {
  const flag = (on: boolean) => (on ? "on" : "off");
  return [
    `transcription: ${flag(caps.transcription)}`,
    `diarization: ${flag(caps.diarization)}`,
    `LLM commentary: ${flag(caps.llmCommentary)}${caps.llmCommentary ? "" : " (rule-based fallback)"}`,
    `DSP worker threads: ${flag(caps.dspThreads)}`,
    `posture: ${flag(caps.posture)}`,
    `eye contact: ${flag(caps.eyeContact)}`,
  ];
}

export function logCapabilities(caps: Capabilities, logger: Logger): void {
  for (const line of describeCapabilities(caps)) {
    logger.info(`Capability ${line}`);
  }
}
