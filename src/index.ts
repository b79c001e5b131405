// Interview Voice Analyzer - Entry point
// Loads configuration, creates the external API clients that have keys,
// wires the pipeline and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import OpenAI from "openai";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { APP_NAME, APP_VERSION, createApplication } from "./app.js";
import type { ApplicationClients } from "./app.js";
import type { DeepgramPrerecordedClient } from "./diarization-service.js";
import { errorMessage } from "./logger.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Configuration ──────────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  logFatal(`Invalid configuration: ${errorMessage(err)}`);
  process.exit(1);
}

// ─── Initialize API clients ─────────────────────────────────────────────────────

const clients: ApplicationClients = { openai: null, deepgram: null };

if (config.openaiApiKey) {
  logInit("Creating OpenAI client...");
  clients.openai = new OpenAI({ apiKey: config.openaiApiKey }) as unknown as ApplicationClients["openai"];
} else {
  logInit("OPENAI_API_KEY is not set: transcription off, rule-based commentary only");
}

if (config.deepgramApiKey) {
  logInit("Creating Deepgram client...");
  clients.deepgram = createDeepgramClient(config.deepgramApiKey) as unknown as DeepgramPrerecordedClient;
} else {
  logInit("DEEPGRAM_API_KEY is not set: speakers will not be separated");
}

// ─── Wire pipeline and start server ─────────────────────────────────────────────

logInit("Wiring analysis pipeline...");
const app = createApplication(config, clients);

app.server.listen(config.port).then(
  () => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`Live sessions: ws://localhost:${config.port}/ws/live`);
    logInit("Ready for connections");
  },
  (err: unknown) => {
    logFatal(`Could not start server: ${errorMessage(err)}`);
    process.exit(1);
  },
);

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
