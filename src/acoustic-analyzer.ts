// Interview Voice Analyzer - Acoustic analysis
// Turns a decoded recording into AcousticFeatureSets: one for the whole
// session and one per resolved speaker. Per-speaker metrics are computed
// over that speaker's segments only, concatenated in time order.

import type {
  AcousticFeatureSet,
  AudioBuffer,
  PauseSummary,
  RoleStrategy,
  SignalMetrics,
  SpeakerAnalysis,
  TranscriptSegment,
} from "./types.js";
import { UNKNOWN_SPEAKER } from "./types.js";
import type { DspExecutor } from "./dsp-executor.js";
import { resolveRoles, speakerLabelsInOrder } from "./speaker-turn-assigner.js";
import { scoreVoice } from "./voice-score-engine.js";

export interface AcousticAnalyzerOptions {
  topDb: number;
  minPauseSeconds: number;
}

/** Non-whitespace characters per minute of audio; 0 for zero-length audio. */
export function speakingRate(text: string, durationSeconds: number): number {
  if (!(durationSeconds > 0)) return 0;
  const chars = text.replace(/\s+/g, "").length;
  return chars / (durationSeconds / 60);
}

export function toFeatureSet(
  metrics: SignalMetrics,
  pauses: Pick<PauseSummary, "pauseCount" | "pauseTotalDuration">,
  rate: number,
): AcousticFeatureSet {
  return {
    ...metrics,
    pauseCount: pauses.pauseCount,
    pauseTotalDuration: pauses.pauseTotalDuration,
    speakingRateCharsPerMinute: rate,
  };
}

/** Sample range of a segment, clipped to the buffer. */
function segmentSlice(audio: AudioBuffer, segment: TranscriptSegment): Float32Array {
  const from = Math.max(0, Math.floor(segment.start * audio.sampleRate));
  const to = Math.min(audio.samples.length, Math.ceil(segment.end * audio.sampleRate));
  return to > from ? audio.samples.subarray(from, to) : new Float32Array(0);
}

function concat(parts: Float32Array[]): Float32Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const out = new Float32Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export class AcousticAnalyzer {
  private readonly executor: DspExecutor;
  private readonly options: AcousticAnalyzerOptions;

  constructor(executor: DspExecutor, options: AcousticAnalyzerOptions) {
    this.executor = executor;
    this.options = options;
  }

  async analyzeRecording(audio: AudioBuffer, transcriptText: string): Promise<AcousticFeatureSet> {
    const [metrics, pauses] = await Promise.all([
      this.executor.signalMetrics(audio.samples, audio.sampleRate, { topDb: this.options.topDb }),
      this.executor.pauses(audio.samples, audio.sampleRate, this.options),
    ]);
    return toFeatureSet(metrics, pauses, speakingRate(transcriptText, audio.durationSeconds));
  }

  /**
   * Groups segments by their `speaker` label (missing means "unknown"),
   * resolves roles, and scores each speaker. Speakers come out in order of
   * first appearance with "unknown" last.
   */
  async analyzeSpeakers(
    audio: AudioBuffer,
    segments: TranscriptSegment[],
    strategy: RoleStrategy,
  ): Promise<SpeakerAnalysis[]> {
    const roles = resolveRoles(segments, strategy);
    const labels = speakerLabelsInOrder(segments);
    if (segments.some((s) => (s.speaker ?? UNKNOWN_SPEAKER) === UNKNOWN_SPEAKER)) {
      labels.push(UNKNOWN_SPEAKER);
    }

    const results: SpeakerAnalysis[] = [];
    for (const label of labels) {
      const own = segments
        .filter((s) => (s.speaker ?? UNKNOWN_SPEAKER) === label)
        .sort((a, b) => a.start - b.start);
      results.push(await this.analyzeSpeaker(audio, label, own, roles.get(label) ?? "unknown"));
    }
    return results;
  }

  private async analyzeSpeaker(
    audio: AudioBuffer,
    label: string,
    segments: TranscriptSegment[],
    role: SpeakerAnalysis["role"],
  ): Promise<SpeakerAnalysis> {
    const slices = segments.map((s) => segmentSlice(audio, s)).filter((s) => s.length > 0);

    const [metrics, pauseSummaries] = await Promise.all([
      this.executor.signalMetrics(concat(slices), audio.sampleRate, { topDb: this.options.topDb }),
      Promise.all(slices.map((slice) => this.executor.pauses(slice, audio.sampleRate, this.options))),
    ]);

    const pauses = {
      pauseCount: pauseSummaries.reduce((sum, p) => sum + p.pauseCount, 0),
      pauseTotalDuration: pauseSummaries.reduce((sum, p) => sum + p.pauseTotalDuration, 0),
    };
    const speakingSeconds = segments.reduce((sum, s) => sum + Math.max(0, s.end - s.start), 0);
    const text = segments.map((s) => s.text).join(" ");
    const features = toFeatureSet(metrics, pauses, speakingRate(text, speakingSeconds));

    return {
      speaker: label,
      role,
      segmentCount: segments.length,
      speakingSeconds,
      features,
      profile: scoreVoice(features),
    };
  }
}
