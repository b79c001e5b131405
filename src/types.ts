// Interview Voice Analyzer - Shared TypeScript interfaces and types
// Every optional block in a payload is an explicit Availability<T> union,
// never a bag of fields with silent defaults.

// ─── Option-like blocks ─────────────────────────────────────────────────────────

export type Available<T> = { available: true } & T;

export interface Unavailable {
  available: false;
  /** Human-readable "skipped: <reason>" text the renderer can surface. */
  reason: string;
}

export type Availability<T> = Available<T> | Unavailable;

export function unavailable(reason: string): Unavailable {
  return { available: false, reason };
}

export function available<T extends object>(value: T): Available<T> {
  return { available: true, ...value };
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

/** Mono PCM samples in [-1, 1]. Stereo sources are downmixed on decode. */
export interface AudioBuffer {
  samples: Float32Array;
  sampleRate: number;
  durationSeconds: number;
}

export interface TimeInterval {
  start: number;
  end: number;
}

// ─── Transcript / Diarization ───────────────────────────────────────────────────

export interface TranscriptSegment {
  start: number;
  end: number;
  text: string;
  speaker?: string;
}

export interface DiarizationTurn {
  start: number;
  end: number;
  speakerLabel: string;
}

export const UNKNOWN_SPEAKER = "unknown";

/** "speaker-N" covers third and later labels. */
export type SpeakerRole = "interviewer" | "candidate" | "unknown" | `speaker-${number}`;

export type RoleStrategy = "earliest-first" | "most-talkative";

export interface TranscriptionResult {
  text: string;
  segments: TranscriptSegment[];
  detectedLanguage: string | null;
}

// ─── Acoustic features ──────────────────────────────────────────────────────────

export type VoiceRegister = "low" | "mid" | "high" | "unknown";

export interface VoiceRange {
  lowPct: number;
  midPct: number;
  highPct: number;
  dominant: VoiceRegister;
}

export interface SignalMetrics {
  averageVolumeDb: number;
  volumeVariance: number;
  /** Variance of linear frame RMS. */
  energyVariance: number;
  pitchMean: number;
  /** Spread of F0, as a standard deviation in Hz. */
  pitchVariance: number;
  jitter: number;
  zeroCrossingRate: number;
  voicedFrameCount: number;
  voiceRange: VoiceRange;
  durationSeconds: number;
  insufficientData: boolean;
}

export interface PauseSummary {
  voicedIntervals: TimeInterval[];
  pauses: TimeInterval[];
  pauseCount: number;
  pauseTotalDuration: number;
}

export interface AcousticFeatureSet extends SignalMetrics {
  pauseCount: number;
  pauseTotalDuration: number;
  speakingRateCharsPerMinute: number;
}

// ─── Scores ─────────────────────────────────────────────────────────────────────

export const VOICE_AXES = [
  "social",
  "action",
  "emotion",
  "instinct",
  "presence",
  "self_expression",
  "harmony",
  "balance",
  "adaptation",
  "thinking",
  "analysis",
  "sensation",
] as const;

export type VoiceAxis = (typeof VOICE_AXES)[number];

export type VoiceAxisScores = Record<VoiceAxis, number>;

export type PersonalityType =
  | "extroverted-expressive"
  | "logical-harmonious"
  | "passionate-intuitive"
  | "introverted-analytical"
  | "balanced";

export interface VoiceProfileSummary {
  average: number;
  dominantTrait: VoiceAxis;
  dominantScore: number;
  personalityType: PersonalityType;
}

export interface VoiceScoreProfile {
  readonly axes: Readonly<VoiceAxisScores>;
  readonly summary: Readonly<VoiceProfileSummary>;
}

export interface VoiceEmotionScores {
  confidence: number;
  nervousness: number;
  calmness: number;
  stability: number;
  tension: number;
  feedback: string[];
}

export interface SpeakerAnalysis {
  speaker: string;
  role: SpeakerRole;
  segmentCount: number;
  speakingSeconds: number;
  features: AcousticFeatureSet;
  profile: VoiceScoreProfile;
}

// ─── Commentary ─────────────────────────────────────────────────────────────────

export type CommentarySource = "llm" | "rule-based";

export interface Commentary {
  keywords: string[];
  toneFeedback: string;
  confidenceScore: number;
  nervousnessScore: number;
  impressionSummary: string;
  source: CommentarySource;
}

/** Subset of acoustic features handed to the commentary service. */
export interface AcousticSummary {
  averageVolumeDb: number;
  pauseCount: number;
  pitchVariance: number;
  speakingRateCharsPerMinute: number;
}

// ─── Video ──────────────────────────────────────────────────────────────────────

export type FrameType = "audio" | "video";

export interface FrameHeader {
  /** Seconds since the session started. */
  timestamp: number;
  seq: number;
  width: number;
  height: number;
}

export interface AudioFrameHeader {
  timestamp: number;
  seq: number;
}

export interface VideoFrame {
  header: FrameHeader;
  jpeg: Buffer;
}

export interface FrameScore {
  score: number;
  feedback: string;
}

export interface FrameSampleResult {
  timestamp: number;
  posture: FrameScore | null;
  eyeContact: FrameScore | null;
}

export interface VideoAnalysis {
  postureScore: number | null;
  eyeContactScore: number | null;
  framesAnalyzed: number;
  samples: FrameSampleResult[];
  message: string;
}

// ─── Recording ──────────────────────────────────────────────────────────────────

export interface SessionRecordingMetadata {
  sessionId: string;
  startedAt: string;
  endedAt: string | null;
  sessionDir: string;
  audioPath: string | null;
  videoPath: string | null;
  audioBytesWritten: number;
  audioDurationSeconds: number;
  videoFrameCount: number;
  /** Frames that could not be decoded for resizing. */
  droppedVideoFrames: number;
  fps: number;
  frameWidth: number | null;
  frameHeight: number | null;
}

// ─── Orchestration ──────────────────────────────────────────────────────────────

export enum AnalysisStage {
  PENDING = "pending",
  TRANSCRIBING = "transcribing",
  EXTRACTING_FEATURES = "extracting_features",
  SCORING = "scoring",
  VIDEO_ANALYZING = "video_analyzing",
  ASSEMBLING = "assembling",
  DONE = "done",
  FAILED = "failed",
}

export interface StageRecord {
  stage: AnalysisStage;
  at: string;
  note?: string;
}

export interface TranscriptBlock {
  text: string;
  segments: TranscriptSegment[];
  detectedLanguage: string | null;
}

export interface AudioFeaturesBlock {
  features: AcousticFeatureSet;
}

export interface SpeakersBlock {
  speakers: SpeakerAnalysis[];
  diarized: boolean;
}

export interface VoiceProfileBlock {
  profile: VoiceScoreProfile;
}

export interface ReportPayload {
  sessionId: string;
  filename: string;
  generatedAt: string;
  stages: StageRecord[];
  transcript: Availability<TranscriptBlock>;
  audioFeatures: Availability<AudioFeaturesBlock>;
  speakers: Availability<SpeakersBlock>;
  aiAnalysis: Availability<Commentary>;
  voiceProfile: Availability<VoiceProfileBlock>;
  voiceEmotion: Availability<VoiceEmotionScores>;
  video: Availability<VideoAnalysis>;
  error: string | null;
}

export interface PostSessionResult {
  state: AnalysisStage.DONE | AnalysisStage.FAILED;
  payload: ReportPayload;
}

// ─── Live session wire messages ─────────────────────────────────────────────────

export interface RealtimeSnapshot {
  windowSeconds: number;
  averageVolumeDb: number;
  pitchMean: number;
  pauseCount: number;
  confidence: number;
  calmness: number;
  /** Audio level 0-100 of the latest window. */
  audioLevel: number;
  /** New text from this window; null when live transcription is off or failed. */
  text: string | null;
  /** Everything transcribed so far in the session. */
  accumulatedText: string;
}

export type ClientMessage = { type: "stop" } | { type: "abort" };

export type ServerMessage =
  | { type: "connected"; sessionId: string }
  | { type: "realtime_analysis"; snapshot: RealtimeSnapshot }
  | { type: "processing"; message: string }
  | { type: "report_ready"; sessionId: string; reportUrl: string; payloadUrl: string; state: AnalysisStage }
  | { type: "aborted"; sessionId: string }
  | { type: "error"; message: string; recoverable: boolean };
