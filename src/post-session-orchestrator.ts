// Interview Voice Analyzer - Post-session analysis orchestrator
// Sequences one session's offline analysis and assembles the ReportPayload.
// Every block either carries data or an explicit "skipped: <reason>"
// marker. A stage exception marks the run FAILED but the blocks computed
// before it are kept.
//
// The orchestrator writes nothing; persistence belongs to the caller.

import { basename } from "node:path";
import type {
  AcousticFeatureSet,
  AcousticSummary,
  AudioBuffer,
  AudioFeaturesBlock,
  Availability,
  Commentary,
  PostSessionResult,
  ReportPayload,
  RoleStrategy,
  SpeakersBlock,
  StageRecord,
  TranscriptBlock,
  TranscriptionResult,
  TranscriptSegment,
  VideoAnalysis,
  VoiceEmotionScores,
  VoiceProfileBlock,
} from "./types.js";
import { AnalysisStage, UNKNOWN_SPEAKER, available, unavailable } from "./types.js";
import { ExternalServiceError, InputUnavailableError, ResourceStateError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { readWavFile } from "./wav-codec.js";
import type { AcousticAnalyzer } from "./acoustic-analyzer.js";
import { assignSpeakers } from "./speaker-turn-assigner.js";
import { scoreVoice, scoreVoiceEmotion } from "./voice-score-engine.js";
import type { TranscriptionService } from "./transcription-service.js";
import type { DiarizationService } from "./diarization-service.js";
import type { CommentaryService } from "./commentary-service.js";
import type { VideoAnalyzer } from "./video-analyzer.js";

/**
 * Allowed stage transitions.
 *
 * PENDING → TRANSCRIBING → EXTRACTING_FEATURES → SCORING → ASSEMBLING → DONE
 * SCORING → VIDEO_ANALYZING → ASSEMBLING   when a video is analyzed
 * PENDING → VIDEO_ANALYZING | ASSEMBLING    when the audio is unavailable
 *
 * Any non-terminal stage may move to FAILED.
 */
const VALID_TRANSITIONS: ReadonlyMap<AnalysisStage, readonly AnalysisStage[]> = new Map([
  [AnalysisStage.PENDING, [AnalysisStage.TRANSCRIBING, AnalysisStage.VIDEO_ANALYZING, AnalysisStage.ASSEMBLING]],
  [AnalysisStage.TRANSCRIBING, [AnalysisStage.EXTRACTING_FEATURES]],
  [AnalysisStage.EXTRACTING_FEATURES, [AnalysisStage.SCORING]],
  [AnalysisStage.SCORING, [AnalysisStage.VIDEO_ANALYZING, AnalysisStage.ASSEMBLING]],
  [AnalysisStage.VIDEO_ANALYZING, [AnalysisStage.ASSEMBLING]],
  [AnalysisStage.ASSEMBLING, [AnalysisStage.DONE]],
]);

export function canTransition(from: AnalysisStage, to: AnalysisStage): boolean {
  if (from === AnalysisStage.DONE || from === AnalysisStage.FAILED) return false;
  if (to === AnalysisStage.FAILED) return true;
  return VALID_TRANSITIONS.get(from)?.includes(to) ?? false;
}

export interface PostSessionInput {
  sessionId: string;
  audioPath?: string | null;
  videoPath?: string | null;
  /** Defaults to the audio file's name, or `<sessionId>.wav`. */
  filename?: string;
  speakerHint?: number;
}

export interface PostSessionDeps {
  /** Null when no speech-to-text backend is configured. */
  transcription: TranscriptionService | null;
  /** Null when no diarization backend is configured. */
  diarization: DiarizationService | null;
  commentary: CommentaryService;
  acoustic: AcousticAnalyzer;
  video: VideoAnalyzer;
  roleStrategy: RoleStrategy;
  language?: string | null;
  logger?: Logger;
  now?: () => Date;
  readAudio?: (path: string) => Promise<AudioBuffer>;
}

/** Blocks filled in as the run progresses; null means "not reached". */
interface PartialResults {
  transcript: Availability<TranscriptBlock> | null;
  audioFeatures: Availability<AudioFeaturesBlock> | null;
  speakers: Availability<SpeakersBlock> | null;
  aiAnalysis: Availability<Commentary> | null;
  voiceProfile: Availability<VoiceProfileBlock> | null;
  voiceEmotion: Availability<VoiceEmotionScores> | null;
  video: Availability<VideoAnalysis> | null;
}

export function acousticSummary(features: AcousticFeatureSet): AcousticSummary {
  return {
    averageVolumeDb: features.averageVolumeDb,
    pauseCount: features.pauseCount,
    pitchVariance: features.pitchVariance,
    speakingRateCharsPerMinute: features.speakingRateCharsPerMinute,
  };
}

// ─── Run ────────────────────────────────────────────────────────────────────────

/** State of one analyze() call. */
class AnalysisRun {
  stage = AnalysisStage.PENDING;
  readonly stages: StageRecord[] = [];
  readonly results: PartialResults = {
    transcript: null,
    audioFeatures: null,
    speakers: null,
    aiAnalysis: null,
    voiceProfile: null,
    voiceEmotion: null,
    video: null,
  };

  constructor(
    readonly sessionId: string,
    private readonly logger: Logger,
    private readonly now: () => Date,
  ) {
    this.stages.push({ stage: AnalysisStage.PENDING, at: this.now().toISOString() });
  }

  transition(to: AnalysisStage, note?: string): void {
    if (!canTransition(this.stage, to)) {
      throw new ResourceStateError(
        `Invalid stage transition for session ${this.sessionId}: "${this.stage}" -> "${to}"`,
      );
    }
    this.logger.info(`Session ${this.sessionId}: ${this.stage} -> ${to}${note ? ` (${note})` : ""}`);
    this.stage = to;
    this.stages.push(note ? { stage: to, at: this.now().toISOString(), note } : { stage: to, at: this.now().toISOString() });
  }
}

function orSkipped<T>(block: Availability<T> | null, reason: string): Availability<T> {
  return block ?? unavailable(reason);
}

// ─── Orchestrator ───────────────────────────────────────────────────────────────

export class PostSessionOrchestrator {
  private readonly deps: PostSessionDeps;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly readAudio: (path: string) => Promise<AudioBuffer>;

  constructor(deps: PostSessionDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createConsoleLogger("PostSession");
    this.now = deps.now ?? (() => new Date());
    this.readAudio = deps.readAudio ?? readWavFile;
  }

  /**
   * Runs the full pipeline for one session. Never throws: unexpected
   * errors end in a FAILED result with `payload.error` set.
   */
  async analyze(input: PostSessionInput): Promise<PostSessionResult> {
    const run = new AnalysisRun(input.sessionId, this.logger, this.now);
    let error: string | null = null;

    try {
      await this.runStages(run, input);
      run.transition(AnalysisStage.ASSEMBLING);
    } catch (err) {
      error = errorMessage(err);
      this.logger.error(`Session ${input.sessionId} failed during ${run.stage}: ${error}`);
      run.transition(AnalysisStage.FAILED, error);
    }

    const payload = this.assemble(run, input, error);
    if (run.stage === AnalysisStage.ASSEMBLING) {
      run.transition(AnalysisStage.DONE);
      return { state: AnalysisStage.DONE, payload: { ...payload, stages: run.stages.slice() } };
    }
    return { state: AnalysisStage.FAILED, payload };
  }

  private async runStages(run: AnalysisRun, input: PostSessionInput): Promise<void> {
    const audio = await this.loadAudio(run, input.audioPath ?? null);

    if (audio) {
      const { buffer, path } = audio;

      run.transition(AnalysisStage.TRANSCRIBING);
      const transcript = await this.transcribe(run, path);
      const segments = await this.attributeSpeakers(run, path, transcript, input.speakerHint);

      run.transition(AnalysisStage.EXTRACTING_FEATURES);
      const features = await this.deps.acoustic.analyzeRecording(buffer, transcript.text);
      run.results.audioFeatures = available({ features });
      run.results.speakers =
        segments.length > 0
          ? available({
              speakers: await this.deps.acoustic.analyzeSpeakers(buffer, segments, this.deps.roleStrategy),
              diarized: segments.some((s) => s.speaker !== UNKNOWN_SPEAKER),
            })
          : unavailable("skipped: no transcript segments to attribute");

      run.transition(AnalysisStage.SCORING);
      run.results.voiceProfile = available({ profile: scoreVoice(features) });
      run.results.voiceEmotion = available(scoreVoiceEmotion(features));
      run.results.aiAnalysis =
        transcript.text.trim().length > 0
          ? available(await this.deps.commentary.analyze(transcript.text, acousticSummary(features)))
          : unavailable("skipped: the transcript is empty");
    }

    const videoPath = input.videoPath ?? null;
    if (!videoPath) {
      run.results.video = unavailable("skipped: no video was recorded");
    } else if (!this.deps.video.enabled) {
      run.results.video = unavailable("skipped: pose/gaze detectors are not configured");
    } else {
      run.transition(AnalysisStage.VIDEO_ANALYZING);
      run.results.video = await this.deps.video.analyze(videoPath);
    }
  }

  /** Null (and the audio blocks marked skipped) when the audio cannot be used. */
  private async loadAudio(
    run: AnalysisRun,
    audioPath: string | null,
  ): Promise<{ buffer: AudioBuffer; path: string } | null> {
    let reason: string;
    if (!audioPath) {
      reason = "skipped: no audio was recorded";
    } else {
      try {
        return { buffer: await this.readAudio(audioPath), path: audioPath };
      } catch (err) {
        if (!(err instanceof InputUnavailableError)) throw err;
        reason = `skipped: ${err.message}`;
      }
    }

    this.logger.warn(`Session ${run.sessionId}: audio unavailable, ${reason}`);
    const skipped = unavailable(reason);
    run.results.transcript = skipped;
    run.results.audioFeatures = skipped;
    run.results.speakers = skipped;
    run.results.aiAnalysis = skipped;
    run.results.voiceProfile = skipped;
    run.results.voiceEmotion = skipped;
    return null;
  }

  private async transcribe(run: AnalysisRun, audioPath: string): Promise<TranscriptionResult> {
    if (!this.deps.transcription) {
      run.results.transcript = unavailable("skipped: no transcription service is configured");
      return { text: "", segments: [], detectedLanguage: null };
    }
    try {
      const transcript = await this.deps.transcription.transcribe(audioPath, this.deps.language ?? null);
      run.results.transcript = available(transcript);
      return transcript;
    } catch (err) {
      if (!(err instanceof ExternalServiceError || err instanceof InputUnavailableError)) throw err;
      this.logger.warn(`Session ${run.sessionId}: transcription unavailable: ${err.message}`);
      run.results.transcript = unavailable(`skipped: transcription failed: ${err.message}`);
      return { text: "", segments: [], detectedLanguage: null };
    }
  }

  private async attributeSpeakers(
    run: AnalysisRun,
    audioPath: string,
    transcript: TranscriptionResult,
    speakerHint: number | undefined,
  ): Promise<TranscriptSegment[]> {
    const unknown = transcript.segments.map((s) => ({ ...s, speaker: UNKNOWN_SPEAKER }));
    if (transcript.segments.length === 0) return [];
    if (!this.deps.diarization) return unknown;

    try {
      const turns = await this.deps.diarization.diarize(audioPath, speakerHint);
      return assignSpeakers(transcript.segments, turns);
    } catch (err) {
      this.logger.warn(`Session ${run.sessionId}: diarization unavailable, speakers left unknown: ${errorMessage(err)}`);
      return unknown;
    }
  }

  // ─── Assembly ─────────────────────────────────────────────────────────────────

  private assemble(run: AnalysisRun, input: PostSessionInput, error: string | null): ReportPayload {
    const notReached = error ? `skipped: analysis failed before this stage (${error})` : "skipped: stage was not run";
    const { results } = run;

    return {
      sessionId: input.sessionId,
      filename: input.filename ?? (input.audioPath ? basename(input.audioPath) : `${input.sessionId}.wav`),
      generatedAt: this.now().toISOString(),
      stages: run.stages.slice(),
      transcript: orSkipped(results.transcript, notReached),
      audioFeatures: orSkipped(results.audioFeatures, notReached),
      speakers: orSkipped(results.speakers, notReached),
      aiAnalysis: orSkipped(results.aiAnalysis, notReached),
      voiceProfile: orSkipped(results.voiceProfile, notReached),
      voiceEmotion: orSkipped(results.voiceEmotion, notReached),
      video: orSkipped(results.video, notReached),
      error,
    };
  }
}
