// Interview Voice Analyzer - Recorded video analysis
// Reads a session's frame container, picks one frame per sampling interval
// (capped), scores posture and eye contact with bounded concurrency and
// averages the per-frame scores. Results keep their frame timestamps and
// are re-sorted after the out-of-order fan-out.

import type { Availability, FrameSampleResult, VideoAnalysis } from "./types.js";
import { available, unavailable } from "./types.js";
import { InputUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { FrameSampler } from "./frame-sampler.js";
import type { PoseGazeSampler } from "./pose-gaze-sampler.js";
import { readFrameContainer } from "./video-frame-codec.js";
import type { FrameContainer } from "./video-frame-codec.js";
import { runSettledWithConcurrency } from "./worker-pool.js";

export interface VideoAnalyzerOptions {
  intervalSeconds?: number;
  maxSamples?: number;
  concurrency?: number;
  logger?: Logger;
}

function meanScore(scores: number[]): number | null {
  if (scores.length === 0) return null;
  return Math.trunc(scores.reduce((a, b) => a + b, 0) / scores.length);
}

export class VideoAnalyzer {
  private readonly sampler: PoseGazeSampler | null;
  private readonly intervalSeconds: number;
  private readonly maxSamples: number;
  private readonly concurrency: number;
  private readonly logger: Logger;

  constructor(sampler: PoseGazeSampler | null, options: VideoAnalyzerOptions = {}) {
    this.sampler = sampler;
    this.intervalSeconds = options.intervalSeconds ?? 5;
    this.maxSamples = options.maxSamples ?? 60;
    this.concurrency = options.concurrency ?? 4;
    this.logger = options.logger ?? createConsoleLogger("VideoAnalyzer");
  }

  /** False when no detector is wired; the orchestrator then skips the stage. */
  get enabled(): boolean {
    if (!this.sampler) return false;
    const { posture, eyeContact } = this.sampler.capabilities;
    return posture || eyeContact;
  }

  async analyze(videoPath: string): Promise<Availability<VideoAnalysis>> {
    const sampler = this.sampler;
    if (!sampler || !this.enabled) {
      return unavailable("skipped: pose/gaze detectors are not configured");
    }

    let container: FrameContainer;
    try {
      container = await readFrameContainer(videoPath);
    } catch (err) {
      if (err instanceof InputUnavailableError) {
        this.logger.warn(`Video unavailable at ${videoPath}: ${err.message}`);
        return unavailable(`skipped: ${err.message}`);
      }
      throw err;
    }
    if (container.skipped > 0 || container.truncated) {
      this.logger.warn(
        `${videoPath}: ${container.skipped} undecodable frame(s)${container.truncated ? ", truncated tail" : ""}`,
      );
    }

    const picker = new FrameSampler(this.intervalSeconds, this.maxSamples);
    const picked = container.frames
      .slice()
      .sort((a, b) => a.header.timestamp - b.header.timestamp)
      .filter((frame) => picker.shouldSample(frame.header.timestamp));

    if (picked.length === 0) {
      return unavailable("skipped: the recording contains no decodable frames");
    }

    const settled = await runSettledWithConcurrency(
      picked.map((frame) => async (): Promise<FrameSampleResult> => {
        const result = await sampler.sample(frame);
        return { timestamp: frame.header.timestamp, posture: result.posture, eyeContact: result.eyeContact };
      }),
      this.concurrency,
    );

    const samples: FrameSampleResult[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === "fulfilled") {
        samples.push(outcome.value);
      } else {
        this.logger.warn(`Frame at ${picked[i].header.timestamp.toFixed(2)}s failed: ${errorMessage(outcome.reason)}`);
      }
    });
    samples.sort((a, b) => a.timestamp - b.timestamp);

    const postureScore = meanScore(samples.flatMap((s) => (s.posture ? [s.posture.score] : [])));
    const eyeContactScore = meanScore(samples.flatMap((s) => (s.eyeContact ? [s.eyeContact.score] : [])));

    if (postureScore === null && eyeContactScore === null) {
      return unavailable("skipped: no frame could be scored for posture or eye contact");
    }

    this.logger.info(`Analyzed ${samples.length}/${picked.length} sampled frame(s) from ${videoPath}`);
    return available({
      postureScore,
      eyeContactScore,
      framesAnalyzed: samples.length,
      samples,
      message: `Posture and eye contact estimated from ${samples.length} sampled frame(s)`,
    });
  }
}
