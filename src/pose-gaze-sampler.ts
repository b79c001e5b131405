/**
 * Per-frame posture and eye-contact scoring over injectable detectors.
 *
 * Posture comes from pose keypoints: shoulder tilt, nose-over-hips spine
 * alignment and forward lean. Eye contact comes from head yaw/pitch
 * estimated on six face landmarks. A frame with no usable detection scores
 * a neutral 50; a missing detector yields null for that measure.
 */

import type { FrameScore, VideoFrame } from "./types.js";
import { clampScore } from "./voice-score-engine.js";

// ─── Detector Interfaces ────────────────────────────────────────────────────────

export interface FaceDetection {
  landmarks: number[][]; // 6 landmarks: [x, y] pairs
  boundingBox: { x: number; y: number; width: number; height: number };
  confidence: number;
}

export interface PoseKeypoint {
  x: number;
  y: number;
  /** Depth relative to the hip midpoint, where the model provides one. */
  z?: number;
  confidence: number;
  name: string;
}

export interface PoseDetection {
  keypoints: PoseKeypoint[];
  confidence: number;
}

export interface FaceDetector {
  detect(imageData: Buffer, width: number, height: number): Promise<FaceDetection | null>;
}

export interface PoseDetector {
  detect(imageData: Buffer, width: number, height: number): Promise<PoseDetection | null>;
}

export interface PoseGazeDetectors {
  faceDetector?: FaceDetector;
  poseDetector?: PoseDetector;
}

// ─── Sampler contract ───────────────────────────────────────────────────────────

export interface PoseGazeSample {
  posture: FrameScore | null;
  eyeContact: FrameScore | null;
}

export interface PoseGazeSampler {
  readonly capabilities: { posture: boolean; eyeContact: boolean };
  sample(frame: VideoFrame): Promise<PoseGazeSample>;
}

export interface PoseGazeOptions {
  faceConfidenceThreshold: number;
  poseConfidenceThreshold: number;
  /** Shoulder height difference as a fraction of frame height. */
  shoulderTiltLimit: number;
  /** Nose-to-hip horizontal offset as a fraction of frame width. */
  spineOffsetLimit: number;
}

export const DEFAULT_POSE_GAZE_OPTIONS: PoseGazeOptions = {
  faceConfidenceThreshold: 0.5,
  poseConfidenceThreshold: 0.3,
  shoulderTiltLimit: 0.05,
  spineOffsetLimit: 0.1,
};

const UNDETECTED_POSTURE: FrameScore = { score: 50, feedback: "Posture could not be detected." };
const UNDETECTED_FACE: FrameScore = { score: 50, feedback: "Face could not be detected." };

// ─── Head Pose Estimation Helpers ────────────────────────────────────────────────

/**
 * Estimate yaw (horizontal head rotation) from 6 face landmarks.
 * Landmarks: [0] right eye, [1] left eye, [2] nose, [3] mouth, [4] right ear, [5] left ear.
 * Yaw = atan2(rightDist - leftDist, interEarDist) in degrees,
 * where rightDist = nose-to-right-ear, leftDist = nose-to-left-ear.
 */
export function estimateYaw(faceLandmarks: number[][]): number {
  const nose = faceLandmarks[2];
  const rightEar = faceLandmarks[4];
  const leftEar = faceLandmarks[5];

  const rightDist = Math.hypot(nose[0] - rightEar[0], nose[1] - rightEar[1]);
  const leftDist = Math.hypot(nose[0] - leftEar[0], nose[1] - leftEar[1]);
  const interEarDist = Math.hypot(rightEar[0] - leftEar[0], rightEar[1] - leftEar[1]);

  if (interEarDist === 0) return 0;
  return Math.atan2(rightDist - leftDist, interEarDist) * (180 / Math.PI);
}

/**
 * Estimate pitch (vertical head tilt) from the same landmarks.
 * Pitch = atan2(noseMouthDist - eyeNoseDist, eyeMouthDist) in degrees.
 */
export function estimatePitch(faceLandmarks: number[][]): number {
  const [rightEye, leftEye, nose, mouth] = faceLandmarks;

  const eyeMidY = (rightEye[1] + leftEye[1]) / 2;
  const eyeNoseDist = nose[1] - eyeMidY;
  const noseMouthDist = mouth[1] - nose[1];
  const eyeMouthDist = mouth[1] - eyeMidY;

  if (eyeMouthDist === 0) return 0;
  return Math.atan2(noseMouthDist - eyeNoseDist, eyeMouthDist) * (180 / Math.PI);
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export function scorePosture(
  pose: PoseDetection | null,
  width: number,
  height: number,
  options: PoseGazeOptions = DEFAULT_POSE_GAZE_OPTIONS,
): FrameScore {
  if (!pose || pose.confidence < options.poseConfidenceThreshold) return UNDETECTED_POSTURE;

  const find = (name: string) =>
    pose.keypoints.find((kp) => kp.name === name && kp.confidence >= options.poseConfidenceThreshold);
  const nose = find("nose");
  const leftShoulder = find("left_shoulder");
  const rightShoulder = find("right_shoulder");
  const hips = [find("left_hip"), find("right_hip")].filter((kp): kp is PoseKeypoint => kp !== undefined);

  if (!nose || !leftShoulder || !rightShoulder || hips.length === 0) return UNDETECTED_POSTURE;

  const shoulderTilt = Math.abs(leftShoulder.y - rightShoulder.y) / height;
  const hipX = hips.reduce((sum, kp) => sum + kp.x, 0) / hips.length;
  const spineOffset = Math.abs(nose.x - hipX) / width;

  let score = 100;
  const issues: string[] = [];
  if (shoulderTilt > options.shoulderTiltLimit) {
    score -= 20;
    issues.push("Your shoulders are tilted.");
  }
  if (spineOffset > options.spineOffsetLimit) {
    score -= 15;
    issues.push("Straighten your back.");
  }
  if (nose.z !== undefined && nose.z > 0) {
    score -= 10;
    issues.push("You are leaning forward slightly.");
  }

  let feedback: string;
  if (score >= 80) feedback = "Good posture.";
  else if (score >= 60) feedback = ["Reasonable posture.", ...issues].join(" ");
  else feedback = `Work on your posture: ${issues.join(" ")}`;

  return { score: clampScore(score), feedback };
}

export function scoreEyeContact(
  face: FaceDetection | null,
  options: PoseGazeOptions = DEFAULT_POSE_GAZE_OPTIONS,
): FrameScore {
  if (!face || face.confidence < options.faceConfidenceThreshold || face.landmarks.length < 6) {
    return UNDETECTED_FACE;
  }

  // Mean head rotation as a fraction of a quarter turn.
  const offset = (Math.abs(estimateYaw(face.landmarks)) + Math.abs(estimatePitch(face.landmarks))) / 2 / 90;
  const score = clampScore((1 - offset * 5) * 100);

  let feedback: string;
  if (score >= 80) feedback = "You are looking at the camera steadily.";
  else if (score >= 60) feedback = "You are mostly looking at the camera.";
  else feedback = "Try to keep your eyes on the camera.";

  return { score, feedback };
}

// ─── Detector-backed sampler ────────────────────────────────────────────────────

export class DetectorPoseGazeSampler implements PoseGazeSampler {
  private readonly deps: PoseGazeDetectors;
  private readonly options: PoseGazeOptions;

  constructor(deps: PoseGazeDetectors, options: Partial<PoseGazeOptions> = {}) {
    this.deps = deps;
    this.options = { ...DEFAULT_POSE_GAZE_OPTIONS, ...options };
  }

  get capabilities(): { posture: boolean; eyeContact: boolean } {
    return { posture: this.deps.poseDetector !== undefined, eyeContact: this.deps.faceDetector !== undefined };
  }

  async sample(frame: VideoFrame): Promise<PoseGazeSample> {
    const { width, height } = frame.header;
    const { faceDetector, poseDetector } = this.deps;

    const [pose, face] = await Promise.all([
      poseDetector ? poseDetector.detect(frame.jpeg, width, height) : Promise.resolve(undefined),
      faceDetector ? faceDetector.detect(frame.jpeg, width, height) : Promise.resolve(undefined),
    ]);

    return {
      posture: pose === undefined ? null : scorePosture(pose, width, height, this.options),
      eyeContact: face === undefined ? null : scoreEyeContact(face, this.options),
    };
  }
}
