// Interview Voice Analyzer - Report writer
// Renders a ReportPayload to Markdown and persists it next to the raw
// payload JSON. The renderer reads nothing but the payload; skipped
// blocks show their "skipped: <reason>" marker.
//
// Output files, overwritten on re-runs of the same session:
//   {reportsDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}.md
//   {reportsDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}.json
//
// Payload JSON leaving the process (the .json file, the /api/analyze
// response) uses snake_case keys: audioFeatures is written as
// audio_features, aiAnalysis as ai_analysis and so on, at every depth.

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Availability, ReportPayload, TranscriptSegment, VoiceAxis } from "./types.js";
import { VOICE_AXES } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";

/** Non-whitespace characters per minute. */
export const FAST_SPEAKING_RATE = 900;
export const SLOW_SPEAKING_RATE = 500;

const AXIS_LABELS: Record<VoiceAxis, string> = {
  social: "Social",
  action: "Action",
  emotion: "Emotion",
  instinct: "Instinct",
  presence: "Presence",
  self_expression: "Self-expression",
  harmony: "Harmony",
  balance: "Balance",
  adaptation: "Adaptation",
  thinking: "Thinking",
  analysis: "Analysis",
  sensation: "Sensation",
};

/**
 * Formats a number of seconds into `[MM:SS]` timestamp format.
 */
export function formatTimestamp(seconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(seconds));
  const minutes = Math.floor(totalSeconds / 60);
  const secs = totalSeconds % 60;
  return `[${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}]`;
}

/**
 * One line per segment:
 *   [MM:SS] (speaker) Segment text
 * The speaker tag is left out for unattributed segments.
 */
export function formatTranscript(segments: TranscriptSegment[]): string {
  return segments
    .map((segment) => {
      const speaker = segment.speaker && segment.speaker !== "unknown" ? ` (${segment.speaker})` : "";
      return `${formatTimestamp(segment.start)}${speaker} ${segment.text}`;
    })
    .join("\n");
}

/** `YYYY-MM-DD_HH-mm-ss_{sessionId}` in UTC. */
export function buildReportName(payload: Pick<ReportPayload, "generatedAt" | "sessionId">): string {
  const date = new Date(payload.generatedAt);
  const pad = (n: number) => String(n).padStart(2, "0");
  const stamp =
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`;
  return `${stamp}_${payload.sessionId}`;
}

function formatDate(iso: string): string {
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

function skipped(block: Availability<object>): string[] {
  return block.available ? [] : [`_${block.reason}_`];
}

// ─── Assessments ────────────────────────────────────────────────────────────────

export function assessSpeakingRate(rate: number): string {
  if (rate > FAST_SPEAKING_RATE) return "A little fast";
  if (rate < SLOW_SPEAKING_RATE) return "A little slow";
  return "Good pace";
}

export function assessVolume(db: number): string {
  if (db > -20) return "Good";
  if (db > -30) return "Adequate";
  return "A little quiet";
}

export function assessPauses(count: number): string {
  if (count > 15) return "Somewhat many";
  if (count < 5) return "Very few";
  return "Appropriate";
}

function assessConfidence(score: number): string {
  if (score > 70) return "You sound confident";
  if (score > 50) return "Aim to sound a little more confident";
  return "Practice will build confidence";
}

function assessNervousness(score: number): string {
  if (score > 70) return "Quite nervous";
  if (score > 50) return "Somewhat nervous";
  return "Relaxed";
}

// ─── Sections ───────────────────────────────────────────────────────────────────

function transcriptSection(payload: ReportPayload): string[] {
  const lines = ["## Transcript", "", ...skipped(payload.transcript)];
  const block = payload.transcript;
  if (block.available) {
    lines.push(block.text.trim().length > 0 ? block.text.trim() : "_No speech was recognized._");
    if (block.segments.length > 0) {
      lines.push("", "```", formatTranscript(block.segments), "```");
    }
  }
  return lines;
}

function acousticSection(payload: ReportPayload): string[] {
  const lines = ["## Acoustic Analysis", "", ...skipped(payload.audioFeatures)];
  const block = payload.audioFeatures;
  if (!block.available) return lines;

  const f = block.features;
  lines.push(
    "| Metric | Value | Assessment |",
    "|---|---|---|",
    `| Speaking rate | ${f.speakingRateCharsPerMinute.toFixed(1)} chars/min | ${assessSpeakingRate(f.speakingRateCharsPerMinute)} |`,
    `| Average volume | ${f.averageVolumeDb.toFixed(1)} dB | ${assessVolume(f.averageVolumeDb)} |`,
    `| Pauses | ${f.pauseCount} | ${assessPauses(f.pauseCount)} |`,
    `| Total pause time | ${f.pauseTotalDuration.toFixed(1)} s | - |`,
    `| Mean pitch | ${f.pitchMean.toFixed(1)} Hz | - |`,
    `| Pitch variation | ${f.pitchVariance.toFixed(1)} Hz | - |`,
    `| Jitter | ${f.jitter.toFixed(2)} Hz | - |`,
    `| Duration | ${f.durationSeconds.toFixed(1)} s | - |`,
  );
  if (f.insufficientData) {
    lines.push("", "_Not enough audio for reliable pitch and volume statistics._");
  }
  return lines;
}

function speakersSection(payload: ReportPayload): string[] {
  const lines = ["## Speakers", "", ...skipped(payload.speakers)];
  const block = payload.speakers;
  if (!block.available) return lines;

  if (!block.diarized) {
    lines.push("_Speakers were not separated; all speech is attributed to one unknown speaker._", "");
  }
  lines.push("| Speaker | Role | Segments | Speaking time | Mean pitch | Dominant trait |", "|---|---|---|---|---|---|");
  for (const s of block.speakers) {
    lines.push(
      `| ${s.speaker} | ${s.role} | ${s.segmentCount} | ${s.speakingSeconds.toFixed(1)} s | ` +
        `${s.features.pitchMean.toFixed(1)} Hz | ${AXIS_LABELS[s.profile.summary.dominantTrait]} |`,
    );
  }
  return lines;
}

function voiceProfileSection(payload: ReportPayload): string[] {
  const lines = ["## Voice Profile", "", ...skipped(payload.voiceProfile)];
  const block = payload.voiceProfile;
  if (!block.available) return lines;

  const { axes, summary } = block.profile;
  lines.push("| Axis | Score |", "|---|---|");
  for (const axis of VOICE_AXES) {
    lines.push(`| ${AXIS_LABELS[axis]} | ${axes[axis]} |`);
  }
  lines.push(
    "",
    `**Average**: ${summary.average.toFixed(1)}  `,
    `**Dominant trait**: ${AXIS_LABELS[summary.dominantTrait]} (${summary.dominantScore})  `,
    `**Voice type**: ${summary.personalityType}`,
  );
  return lines;
}

function voiceEmotionSection(payload: ReportPayload): string[] {
  const lines = ["## Voice Emotion", "", ...skipped(payload.voiceEmotion)];
  const block = payload.voiceEmotion;
  if (!block.available) return lines;

  lines.push(
    "| Measure | Score |",
    "|---|---|",
    `| Confidence | ${block.confidence}/100 |`,
    `| Nervousness | ${block.nervousness}/100 |`,
    `| Calmness | ${block.calmness}/100 |`,
    `| Stability | ${block.stability}/100 |`,
    `| Tension | ${block.tension}/100 |`,
  );
  if (block.feedback.length > 0) {
    lines.push("", ...block.feedback.map((line) => `- ${line}`));
  }
  return lines;
}

function aiSection(payload: ReportPayload): string[] {
  const lines = ["## AI Analysis", "", ...skipped(payload.aiAnalysis)];
  const block = payload.aiAnalysis;
  if (!block.available) return lines;

  if (block.source === "rule-based") {
    lines.push("_Generated by the built-in rules; the language model was not available._", "");
  }
  lines.push("### Keywords", "", ...block.keywords.map((k) => `- ${k}`), "");
  lines.push("### Tone", "", block.toneFeedback, "");
  lines.push(
    "| Measure | Score | Assessment |",
    "|---|---|---|",
    `| Confidence | ${block.confidenceScore}/100 | ${assessConfidence(block.confidenceScore)} |`,
    `| Nervousness | ${block.nervousnessScore}/100 | ${assessNervousness(block.nervousnessScore)} |`,
    "",
  );
  lines.push("### Overall Impression", "", block.impressionSummary);
  return lines;
}

function videoSection(payload: ReportPayload): string[] {
  const lines = ["## Posture and Eye Contact", "", ...skipped(payload.video)];
  const block = payload.video;
  if (!block.available) return lines;

  const score = (value: number | null) => (value === null ? "n/a" : `${value}/100`);
  lines.push(
    block.message,
    "",
    "| Measure | Score |",
    "|---|---|",
    `| Posture | ${score(block.postureScore)} |`,
    `| Eye contact | ${score(block.eyeContactScore)} |`,
    `| Frames analyzed | ${block.framesAnalyzed} |`,
  );
  return lines;
}

const NOTES_SECTION = [
  "## Interviewer Notes",
  "",
  "<!-- Add coaching notes here -->",
  "",
  "**Focus points**:",
  "- ",
  "",
  "**Practice before next session**:",
  "1. ",
];

/** Markdown report for one session. */
export function renderMarkdownReport(payload: ReportPayload): string {
  const status = payload.error ? `Failed (${payload.error})` : "Complete";
  const sections = [
    [
      "# Interview Practice Report",
      "",
      `**Date**: ${formatDate(payload.generatedAt)}  `,
      `**Session**: ${payload.sessionId}  `,
      `**Audio file**: \`${payload.filename}\`  `,
      `**Analysis**: ${status}`,
    ],
    transcriptSection(payload),
    acousticSection(payload),
    speakersSection(payload),
    voiceProfileSection(payload),
    voiceEmotionSection(payload),
    aiSection(payload),
    videoSection(payload),
    NOTES_SECTION,
  ];
  return sections.map((lines) => lines.join("\n").trimEnd()).join("\n\n---\n\n") + "\n";
}

// ─── Writer ─────────────────────────────────────────────────────────────────────

export interface WrittenReport {
  reportPath: string;
  payloadPath: string;
  /** Paths under the server's /reports route. */
  reportUrl: string;
  payloadUrl: string;
}

// ─── Payload JSON ───────────────────────────────────────────────────────────────

/** camelCase identifiers become snake_case; any other key is kept as is. */
export function snakeCaseKey(key: string): string {
  if (!/^[a-z][A-Za-z0-9]*$/.test(key)) return key;
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

export function toSnakeCaseJson(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toSnakeCaseJson);
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, v]) => [snakeCaseKey(key), toSnakeCaseJson(v)]));
  }
  return value;
}

export function serializeReportPayload(payload: ReportPayload): unknown {
  return toSnakeCaseJson(payload);
}

export class ReportWriter {
  readonly reportsDir: string;
  private readonly logger: Logger;

  constructor(reportsDir: string = "output/reports", logger: Logger = createConsoleLogger("ReportWriter")) {
    this.reportsDir = reportsDir;
    this.logger = logger;
  }

  async write(payload: ReportPayload): Promise<WrittenReport> {
    await mkdir(this.reportsDir, { recursive: true });

    const name = buildReportName(payload);
    const reportPath = join(this.reportsDir, `${name}.md`);
    const payloadPath = join(this.reportsDir, `${name}.json`);

    await writeFile(reportPath, renderMarkdownReport(payload), "utf-8");
    await writeFile(payloadPath, JSON.stringify(serializeReportPayload(payload), null, 2), "utf-8");

    this.logger.info(`Report written for session ${payload.sessionId}: ${reportPath}`);
    return { reportPath, payloadPath, reportUrl: `/reports/${name}.md`, payloadUrl: `/reports/${name}.json` };
  }
}
