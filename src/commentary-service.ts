// Interview Voice Analyzer - Interview commentary
// Keywords, tone feedback, confidence/nervousness estimates and an overall
// impression for a transcript. The LLM path asks for a JSON object; any
// transport failure or unusable reply (after retries) degrades to the
// rule-based heuristics so a session never loses its commentary block.

import type { AcousticSummary, Commentary } from "./types.js";
import { ExternalServiceError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { isRetryable, withRetry } from "./retry.js";
import type { RetryOptions } from "./retry.js";
import { clampScore } from "./voice-score-engine.js";
import { ContentHashCache, contentKey } from "./result-cache.js";

export interface CommentaryService {
  analyze(transcriptText: string, acoustic?: AcousticSummary): Promise<Commentary>;
}

// ─── OpenAI client surface (injected for tests) ─────────────────────────────────

export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        response_format?: { type: "json_object" | "text" };
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

// ─── Rule-based heuristics ──────────────────────────────────────────────────────

export const MAX_KEYWORDS = 10;
export const NO_KEYWORDS_PLACEHOLDER = "no keywords detected";
export const MAX_PROMPT_TRANSCRIPT_CHARS = 4000;

const INTERVIEW_KEYWORDS = [
  "motivation",
  "strength",
  "weakness",
  "experience",
  "skill",
  "goal",
  "team",
  "leadership",
  "challenge",
  "solution",
  "learning",
  "growth",
  "contribution",
  "responsibility",
  "initiative",
];

const FILLER_WORDS = ["um", "uh", "ah", "you know", "basically", "literally"];
const CASUAL_WORDS = ["gonna", "wanna", "kinda", "yeah", "stuff"];

const NEUTRAL_ACOUSTICS: AcousticSummary = {
  averageVolumeDb: -30,
  pauseCount: 0,
  pitchVariance: 0,
  speakingRateCharsPerMinute: 0,
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function countOccurrences(text: string, phrase: string): number {
  const matches = text.match(new RegExp(`\\b${escapeRegExp(phrase)}\\b`, "gi"));
  return matches ? matches.length : 0;
}

/** Interview vocabulary found in the transcript; a prefix match so "skills" counts as "skill". */
export function extractKeywords(text: string): string[] {
  const found = INTERVIEW_KEYWORDS.filter((kw) => new RegExp(`\\b${escapeRegExp(kw)}`, "i").test(text));
  return found.length > 0 ? found.slice(0, MAX_KEYWORDS) : [NO_KEYWORDS_PLACEHOLDER];
}

export function toneFeedback(text: string): string {
  const notes: string[] = [];

  const fillers = FILLER_WORDS.map((word) => ({ word, count: countOccurrences(text, word) })).filter(
    (f) => f.count > 0,
  );
  if (fillers.length > 0) {
    const total = fillers.reduce((sum, f) => sum + f.count, 0);
    const detail = fillers.map((f) => `"${f.word}" x${f.count}`).join(", ");
    notes.push(`Filler words detected (${total}): ${detail}. A short silent pause reads as more composed.`);
  }

  const casual = CASUAL_WORDS.filter((word) => countOccurrences(text, word) > 0);
  if (casual.length > 0) {
    notes.push(`Casual expressions (${casual.join(", ")}) slipped in; keep the register professional.`);
  }

  return notes.length > 0 ? notes.join(" ") : "Your phrasing is clean, with no noticeable filler words.";
}

export function estimateConfidence(acoustic: AcousticSummary): number {
  let score = 50;
  if (acoustic.averageVolumeDb > -20) score += 20;
  else if (acoustic.averageVolumeDb > -30) score += 10;

  if (acoustic.pauseCount < 5) score += 15;
  else if (acoustic.pauseCount < 10) score += 5;

  return clampScore(score);
}

export function estimateNervousness(acoustic: AcousticSummary): number {
  let score = 30;
  if (acoustic.pitchVariance > 50) score += 25;
  else if (acoustic.pitchVariance > 30) score += 15;

  if (acoustic.pauseCount > 10) score += 20;
  else if (acoustic.pauseCount > 5) score += 10;

  return clampScore(score);
}

export function impressionSummary(text: string, acoustic: AcousticSummary): string {
  const parts: string[] = [];
  parts.push(
    text.length > 500 ? "You gave a substantial answer." : "Your answers could go into more detail.",
  );
  if (acoustic.pauseCount < 5) {
    parts.push("Your delivery flowed smoothly.");
  } else if (acoustic.pauseCount > 15) {
    parts.push("There were quite a few pauses. Try to relax into your answers.");
  }
  return parts.join(" ");
}

export function ruleBasedCommentary(transcriptText: string, acoustic?: AcousticSummary): Commentary {
  const summary = acoustic ?? NEUTRAL_ACOUSTICS;
  return {
    keywords: extractKeywords(transcriptText),
    toneFeedback: toneFeedback(transcriptText),
    confidenceScore: estimateConfidence(summary),
    nervousnessScore: estimateNervousness(summary),
    impressionSummary: impressionSummary(transcriptText, summary),
    source: "rule-based",
  };
}

export class RuleBasedCommentaryService implements CommentaryService {
  async analyze(transcriptText: string, acoustic?: AcousticSummary): Promise<Commentary> {
    return ruleBasedCommentary(transcriptText, acoustic);
  }
}

// ─── LLM reply parsing ──────────────────────────────────────────────────────────

/** Removes a Markdown code fence wrapped around the JSON body. */
export function stripCodeFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith("```json")) text = text.slice(7);
  else if (text.startsWith("```")) text = text.slice(3);
  if (text.endsWith("```")) text = text.slice(0, -3);
  return text.trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(obj: Record<string, unknown>, field: string): string {
  const value = obj[field];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`LLM response missing or invalid '${field}' field`);
  }
  return value.trim();
}

function requireScore(obj: Record<string, unknown>, field: string): number {
  const value = obj[field];
  const numeric = typeof value === "string" ? Number(value) : value;
  if (typeof numeric !== "number" || !Number.isFinite(numeric)) {
    throw new Error(`LLM response missing or invalid '${field}' field`);
  }
  return clampScore(numeric);
}

/** Validates the model's JSON reply. Throws on anything unusable. */
export function parseCommentary(raw: string): Commentary {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new Error(`Failed to parse LLM response as JSON: ${raw.slice(0, 200)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error("LLM response is not a JSON object");
  }

  const rawKeywords = parsed.keywords;
  if (!Array.isArray(rawKeywords)) {
    throw new Error("LLM response missing or invalid 'keywords' array");
  }
  const keywords = rawKeywords
    .filter((kw): kw is string => typeof kw === "string")
    .map((kw) => kw.trim())
    .filter((kw) => kw.length > 0)
    .slice(0, MAX_KEYWORDS);

  return {
    keywords: keywords.length > 0 ? keywords : [NO_KEYWORDS_PLACEHOLDER],
    toneFeedback: requireString(parsed, "tone_feedback"),
    confidenceScore: requireScore(parsed, "confidence_score"),
    nervousnessScore: requireScore(parsed, "nervousness_score"),
    impressionSummary: requireString(parsed, "overall_impression"),
    source: "llm",
  };
}

export function buildCommentaryPrompt(
  transcriptText: string,
  acoustic?: AcousticSummary,
): { system: string; user: string } {
  const system = [
    "You are an experienced interview coach reviewing a mock job interview.",
    "Reply with a single JSON object and nothing else, using exactly these fields:",
    '  "keywords": 5 to 10 key terms the candidate used, as an array of strings',
    '  "tone_feedback": feedback on tone, register and filler words',
    '  "confidence_score": how confident the candidate sounds, 0 to 100',
    '  "nervousness_score": how nervous the candidate sounds, 0 to 100',
    '  "overall_impression": two or three sentences of overall impression',
  ].join("\n");

  const lines = ["Transcript:", transcriptText.slice(0, MAX_PROMPT_TRANSCRIPT_CHARS)];
  if (acoustic) {
    lines.push(
      "",
      "Acoustic measurements:",
      `- average volume: ${acoustic.averageVolumeDb.toFixed(1)} dB`,
      `- pauses: ${acoustic.pauseCount}`,
      `- pitch spread: ${acoustic.pitchVariance.toFixed(1)} Hz`,
      `- speaking rate: ${Math.round(acoustic.speakingRateCharsPerMinute)} chars/min`,
    );
  }
  return { system, user: lines.join("\n") };
}

// ─── OpenAI-backed service ──────────────────────────────────────────────────────

export interface OpenAICommentaryOptions {
  model?: string;
  temperature?: number;
  retry?: RetryOptions;
  logger?: Logger;
  /** Replies keyed on the prompt actually sent; fallbacks are never stored. */
  cache?: ContentHashCache<Commentary>;
}

export class OpenAICommentaryService implements CommentaryService {
  private readonly client: OpenAIChatClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;
  private readonly cache: ContentHashCache<Commentary>;

  constructor(client: OpenAIChatClient, options: OpenAICommentaryOptions = {}) {
    this.client = client;
    this.model = options.model ?? "gpt-4o-mini";
    this.temperature = options.temperature ?? 0.3;
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? createConsoleLogger("Commentary");
    this.cache = options.cache ?? new ContentHashCache<Commentary>();
  }

  async analyze(transcriptText: string, acoustic?: AcousticSummary): Promise<Commentary> {
    const prompt = buildCommentaryPrompt(transcriptText, acoustic);
    const key = contentKey(`commentary:${this.model}:${this.temperature}`, Buffer.from(`${prompt.system}\n${prompt.user}`));
    if (this.cache.has(key)) {
      this.logger.info("Commentary cache hit");
    }
    try {
      return await this.cache.getOrCompute(key, async () => {
        const commentary = await withRetry(() => this.request(prompt), { label: "Commentary", ...this.retry });
        this.logger.info(`Commentary generated: ${commentary.keywords.length} keyword(s)`);
        return commentary;
      });
    } catch (err) {
      this.logger.warn(`LLM commentary failed, using rule-based fallback: ${errorMessage(err)}`);
      return ruleBasedCommentary(transcriptText, acoustic);
    }
  }

  private async request(prompt: { system: string; user: string }): Promise<Commentary> {
    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        response_format: { type: "json_object" },
        temperature: this.temperature,
      });
      content = response.choices[0]?.message?.content;
    } catch (err) {
      throw new ExternalServiceError("commentary", errorMessage(err), { retryable: isRetryable(err), cause: err });
    }

    if (!content) {
      throw new ExternalServiceError("commentary", "LLM returned empty response");
    }
    try {
      return parseCommentary(content);
    } catch (err) {
      // A malformed reply is worth asking for again.
      throw new ExternalServiceError("commentary", errorMessage(err), { cause: err });
    }
  }
}
