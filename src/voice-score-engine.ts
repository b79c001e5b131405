// Interview Voice Analyzer - Voice scoring
// Maps acoustic features onto the 12-axis voice profile, a one-line
// personality label, and the confidence/nervousness sub-scores shown in
// reports and live snapshots. Everything here is pure and deterministic.

import { VOICE_AXES } from "./types.js";
import type {
  AcousticFeatureSet,
  PersonalityType,
  SignalMetrics,
  VoiceAxis,
  VoiceAxisScores,
  VoiceEmotionScores,
  VoiceProfileSummary,
  VoiceScoreProfile,
} from "./types.js";

export type VoiceScoreInput = Pick<
  AcousticFeatureSet,
  | "jitter"
  | "pitchMean"
  | "pitchVariance"
  | "energyVariance"
  | "pauseCount"
  | "durationSeconds"
  | "voicedFrameCount"
  | "voiceRange"
>;

export type VoiceEmotionInput = Pick<
  SignalMetrics,
  "jitter" | "pitchVariance" | "energyVariance" | "zeroCrossingRate" | "voicedFrameCount"
>;

/** Register shares assumed when no frame was voiced. */
const REGISTER_BASELINE = { low: 30, mid: 40, high: 20 };

function finite(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export function clampScore(value: number): number {
  return Math.max(0, Math.min(100, Math.trunc(finite(value))));
}

// ─── 12-axis profile ────────────────────────────────────────────────────────────

export function computeAxes(input: VoiceScoreInput): VoiceAxisScores {
  const jitter = finite(input.jitter);
  const pitchStd = finite(input.pitchVariance);
  const pitchMean = finite(input.pitchMean);
  const energyVariance = finite(input.energyVariance);
  const pauseRate = finite(input.pauseCount) / Math.max(finite(input.durationSeconds), 1);

  const voiced = input.voicedFrameCount > 0;
  const lowPct = voiced ? finite(input.voiceRange.lowPct) : REGISTER_BASELINE.low;
  const midPct = voiced ? finite(input.voiceRange.midPct) : REGISTER_BASELINE.mid;
  const highPct = voiced ? finite(input.voiceRange.highPct) : REGISTER_BASELINE.high;

  const emotion = clampScore((pitchStd / 10) * 50 + 30);
  const presence = clampScore((pitchMean / 250) * 60 + (100 - jitter * 5));

  return {
    social: clampScore(70 - Math.trunc(jitter * 5) + Math.min(20, Math.trunc(pauseRate * 15))),
    action: clampScore(energyVariance * 300 + 40),
    emotion,
    instinct: clampScore(lowPct * 1.5),
    presence,
    self_expression: clampScore(midPct * 1.3),
    harmony: clampScore(100 - Math.min(100, Math.trunc(jitter * 8))),
    balance: clampScore(100 - Math.min(100, Math.trunc(energyVariance * 800))),
    adaptation: clampScore(50 + Math.trunc(pauseRate * 30)),
    thinking: clampScore(highPct * 1.8),
    analysis: clampScore(100 - Math.min(100, Math.trunc(pitchStd / 5))),
    sensation: clampScore((emotion + presence) / 2),
  };
}

/** First matching rule wins. */
export function classifyPersonality(axes: VoiceAxisScores): PersonalityType {
  if (axes.social > 70 && axes.emotion > 60) return "extroverted-expressive";
  if (axes.thinking > 70 && axes.harmony > 60) return "logical-harmonious";
  if (axes.emotion > 70 && axes.harmony < 50) return "passionate-intuitive";
  if (axes.social < 50 && axes.thinking > 60) return "introverted-analytical";
  return "balanced";
}

export function summarizeProfile(axes: VoiceAxisScores): VoiceProfileSummary {
  let dominantTrait: VoiceAxis = VOICE_AXES[0];
  let total = 0;
  for (const axis of VOICE_AXES) {
    total += axes[axis];
    if (axes[axis] > axes[dominantTrait]) dominantTrait = axis;
  }

  return {
    average: Math.round((total / VOICE_AXES.length) * 10) / 10,
    dominantTrait,
    dominantScore: axes[dominantTrait],
    personalityType: classifyPersonality(axes),
  };
}

export function scoreVoice(input: VoiceScoreInput): VoiceScoreProfile {
  const axes = computeAxes(input);
  return Object.freeze({
    axes: Object.freeze(axes),
    summary: Object.freeze(summarizeProfile(axes)),
  });
}

// ─── Confidence / nervousness ───────────────────────────────────────────────────

const MIN_VOICED_FRAMES_FOR_JITTER = 10;

export function emotionFeedback(confidence: number, nervousness: number, jitter: number): string[] {
  const feedback: string[] = [];

  if (confidence > 70) {
    feedback.push("You sound confident: your tone is steady and persuasive.");
  } else if (confidence > 50) {
    feedback.push("Some confidence comes through. A little more vocal energy would strengthen your answers.");
  } else {
    feedback.push("Work on sounding more certain. Rehearsing your key points out loud helps.");
  }

  if (nervousness > 70) {
    feedback.push("Nervousness is high. Take a breath and slow down before you answer.");
  } else if (nervousness > 50) {
    feedback.push("Some nervousness shows. Thorough preparation will help you stay composed.");
  } else {
    feedback.push("You sound relaxed. Keep it up.");
  }

  if (jitter > 10) {
    feedback.push("Your voice is trembling. Breathe slowly and focus on a steady delivery.");
  } else if (jitter > 5) {
    feedback.push("Your voice is slightly unsteady. Relax and aim for an even tone.");
  }

  return feedback;
}

export function scoreVoiceEmotion(input: VoiceEmotionInput): VoiceEmotionScores {
  const pitchStd = finite(input.pitchVariance);
  const energyStd = Math.sqrt(Math.max(0, finite(input.energyVariance)));
  const jitter = finite(input.jitter);

  let confidence = 50;
  if (pitchStd < 30) confidence += 20;
  else if (pitchStd < 50) confidence += 10;
  if (energyStd < 0.05) confidence += 15;
  else if (energyStd < 0.1) confidence += 5;
  if (jitter < 5) confidence += 15;

  let nervousness = 30;
  if (pitchStd > 50) nervousness += 25;
  else if (pitchStd > 30) nervousness += 15;
  if (jitter > 10) nervousness += 20;
  else if (jitter > 5) nervousness += 10;
  if (energyStd > 0.1) nervousness += 15;

  confidence = clampScore(confidence);
  nervousness = clampScore(nervousness);

  const tension =
    input.voicedFrameCount >= MIN_VOICED_FRAMES_FOR_JITTER
      ? clampScore(jitter * 8)
      : clampScore(finite(input.zeroCrossingRate) * 500);

  return {
    confidence,
    nervousness,
    calmness: 100 - nervousness,
    stability: 100 - nervousness,
    tension,
    feedback: emotionFeedback(confidence, nervousness, jitter),
  };
}
