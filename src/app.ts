// Interview Voice Analyzer - Composition root
// Builds every pipeline component from an AppConfig and the external
// clients that are available. Missing clients switch the matching
// capability off; the pipeline then records a skip reason instead.

import type { AppConfig } from "./config.js";
import { LIVE_SAMPLE_RATE } from "./config.js";
import type { Capabilities } from "./capabilities.js";
import { logCapabilities, probeCapabilities } from "./capabilities.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { createDspExecutor, resolveDspWorkerUrl } from "./dsp-executor.js";
import type { DspExecutor } from "./dsp-executor.js";
import { AcousticAnalyzer } from "./acoustic-analyzer.js";
import { OpenAITranscriptionService } from "./transcription-service.js";
import type { OpenAITranscriptionClient, TranscriptionService } from "./transcription-service.js";
import { DeepgramDiarizationService } from "./diarization-service.js";
import type { DeepgramPrerecordedClient, DiarizationService } from "./diarization-service.js";
import { OpenAICommentaryService, RuleBasedCommentaryService } from "./commentary-service.js";
import type { CommentaryService, OpenAIChatClient } from "./commentary-service.js";
import { DetectorPoseGazeSampler } from "./pose-gaze-sampler.js";
import type { PoseGazeDetectors } from "./pose-gaze-sampler.js";
import { VideoAnalyzer } from "./video-analyzer.js";
import { PostSessionOrchestrator } from "./post-session-orchestrator.js";
import { ReportWriter } from "./report-writer.js";
import { createAppServer } from "./server.js";
import type { AppServer } from "./server.js";

export const APP_NAME = "Interview Voice Analyzer";
export const APP_VERSION = "0.1.0";

export interface ApplicationClients {
  /** Null when OPENAI_API_KEY is not set. */
  openai: (OpenAITranscriptionClient & OpenAIChatClient) | null;
  /** Null when DEEPGRAM_API_KEY is not set. */
  deepgram: DeepgramPrerecordedClient | null;
  detectors?: PoseGazeDetectors;
}

export interface Application {
  config: AppConfig;
  capabilities: Capabilities;
  dsp: DspExecutor;
  orchestrator: PostSessionOrchestrator;
  reportWriter: ReportWriter;
  server: AppServer;
  /** Stops the server, then the DSP worker threads. */
  close(): Promise<void>;
}

export function createApplication(
  config: AppConfig,
  clients: ApplicationClients,
  logger: Logger = createConsoleLogger("App"),
): Application {
  const detectors = clients.detectors ?? {};
  const capabilities = probeCapabilities({
    config: {
      openaiApiKey: clients.openai ? config.openaiApiKey : null,
      deepgramApiKey: clients.deepgram ? config.deepgramApiKey : null,
      dspThreads: config.dspThreads,
    },
    dspWorkerPresent: resolveDspWorkerUrl() !== null,
    detectors,
  });
  logCapabilities(capabilities, logger);

  const dsp = createDspExecutor(capabilities.dspThreads ? config.dspThreads : 0, createConsoleLogger("DspExecutor"));

  let transcription: TranscriptionService | null = null;
  let commentary: CommentaryService = new RuleBasedCommentaryService();
  if (clients.openai && capabilities.transcription) {
    transcription = new OpenAITranscriptionService(clients.openai, { model: config.transcriptionModel });
    commentary = new OpenAICommentaryService(clients.openai, { model: config.commentaryModel });
  }

  let diarization: DiarizationService | null = null;
  if (clients.deepgram && capabilities.diarization) {
    diarization = new DeepgramDiarizationService(clients.deepgram, { language: config.transcriptionLanguage });
  }

  const sampler = capabilities.posture || capabilities.eyeContact ? new DetectorPoseGazeSampler(detectors) : null;
  const video = new VideoAnalyzer(sampler, {
    intervalSeconds: config.videoSampleIntervalSeconds,
    maxSamples: config.videoMaxSamples,
    concurrency: config.videoConcurrency,
  });

  const orchestrator = new PostSessionOrchestrator({
    transcription,
    diarization,
    commentary,
    acoustic: new AcousticAnalyzer(dsp, { topDb: config.silenceTopDb, minPauseSeconds: config.minPauseSeconds }),
    video,
    roleStrategy: config.roleStrategy,
    language: config.transcriptionLanguage,
  });
  const reportWriter = new ReportWriter(config.reportsDir);

  const server = createAppServer({
    orchestrator,
    reportWriter,
    dsp,
    capabilities,
    transcription,
    analyzeBaseDir: config.analyzeBaseDir,
    liveOptions: {
      sessionsDir: config.sessionsDir,
      sampleRate: LIVE_SAMPLE_RATE,
      fps: config.videoFps,
      triggerSeconds: config.streamTriggerSeconds,
      overlapSeconds: config.streamOverlapSeconds,
      topDb: config.silenceTopDb,
      minPauseSeconds: config.minPauseSeconds,
      language: config.transcriptionLanguage,
    },
  });

  return {
    config,
    capabilities,
    dsp,
    orchestrator,
    reportWriter,
    server,
    async close() {
      await server.close();
      await dsp.close();
    },
  };
}
