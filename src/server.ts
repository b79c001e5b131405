// Interview Voice Analyzer - HTTP and WebSocket server
//
//   GET  /health        status + capability flags
//   POST /api/analyze   run the post-session pipeline on a recorded file
//                       under the analysis directory
//   GET  /reports/*     written Markdown reports and payload JSON
//   WS   /ws/live       one LiveSession per connection
//
// WebSocket messages of a connection are handled one at a time in arrival
// order, so audio chunks reach the recorder in the order they were sent.

import express, { type Express, type Request, type Response } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket } from "ws";
import type { ClientMessage, ServerMessage } from "./types.js";
import type { Capabilities } from "./capabilities.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { LiveSession } from "./live-session.js";
import type { LiveSessionOptions } from "./live-session.js";
import type { DspExecutor } from "./dsp-executor.js";
import type { PostSessionOrchestrator } from "./post-session-orchestrator.js";
import type { ReportWriter } from "./report-writer.js";
import { serializeReportPayload } from "./report-writer.js";
import type { TranscriptionService } from "./transcription-service.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const LIVE_PATH = "/ws/live";

/** Session ids end up in file names. */
const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  orchestrator: PostSessionOrchestrator;
  reportWriter: ReportWriter;
  dsp: DspExecutor;
  liveOptions: LiveSessionOptions;
  /** POST /api/analyze only reads files under this directory. */
  analyzeBaseDir: string;
  capabilities: Capabilities;
  /** Running transcript for live sessions; null leaves snapshot text empty. */
  transcription?: TranscriptionService | null;
  logger?: Logger;
  /** Session id source for live and uploaded sessions. Defaults to uuid v4. */
  createId?: () => string;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const logger = options.logger ?? createConsoleLogger("Server");
  const createId = options.createId ?? uuidv4;

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json());
  app.use("/reports", express.static(options.reportWriter.reportsDir));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", capabilities: options.capabilities });
  });

  app.post("/api/analyze", (req, res) => {
    handleAnalyze(req, res, options, createId, logger).catch((err) => {
      logger.error(`Unhandled error in /api/analyze: ${errorMessage(err)}`);
      if (!res.headersSent) res.status(500).json({ error: errorMessage(err) });
    });
  });

  const wss = new WebSocketServer({ server: httpServer, path: LIVE_PATH });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, options, createId, logger);
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          if (!httpServer.listening) {
            resolve();
            return;
          }
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}

// ─── POST /api/analyze ──────────────────────────────────────────────────────────

export interface AnalyzeRequest {
  audioPath: string;
  videoPath: string | null;
  sessionId: string | null;
}

/** Absolute path of `candidate` resolved against `baseDir`, or null when it lands outside it. */
export function resolveInside(baseDir: string, candidate: string): string | null {
  const root = resolve(baseDir);
  const full = resolve(root, candidate);
  const rel = relative(root, full);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return null;
  return full;
}

/**
 * Validated request body, or the reason it was rejected. Paths come back
 * absolute; relative ones are taken from `baseDir`.
 */
export function parseAnalyzeRequest(body: unknown, baseDir: string): AnalyzeRequest | string {
  if (typeof body !== "object" || body === null) return "request body must be a JSON object";
  const audioPath = "audioPath" in body ? body.audioPath : undefined;
  const videoPath = "videoPath" in body ? body.videoPath : undefined;
  const sessionId = "sessionId" in body ? body.sessionId : undefined;

  if (typeof audioPath !== "string" || audioPath.trim() === "") return "audioPath must be a non-empty string";
  if (videoPath !== undefined && videoPath !== null && typeof videoPath !== "string") {
    return "videoPath must be a string";
  }
  if (sessionId !== undefined && (typeof sessionId !== "string" || !SESSION_ID_PATTERN.test(sessionId))) {
    return "sessionId may only contain letters, digits, '_' and '-' (at most 64)";
  }

  const resolvedAudio = resolveInside(baseDir, audioPath);
  if (resolvedAudio === null) return "audioPath must be inside the analysis directory";
  let resolvedVideo: string | null = null;
  if (typeof videoPath === "string" && videoPath !== "") {
    resolvedVideo = resolveInside(baseDir, videoPath);
    if (resolvedVideo === null) return "videoPath must be inside the analysis directory";
  }
  return {
    audioPath: resolvedAudio,
    videoPath: resolvedVideo,
    sessionId: typeof sessionId === "string" ? sessionId : null,
  };
}

async function handleAnalyze(
  req: Request,
  res: Response,
  options: CreateServerOptions,
  createId: () => string,
  logger: Logger,
): Promise<void> {
  const parsed = parseAnalyzeRequest(req.body, options.analyzeBaseDir);
  if (typeof parsed === "string") {
    res.status(400).json({ error: parsed });
    return;
  }

  const sessionId = parsed.sessionId ?? createId();
  logger.info(`Analyzing ${parsed.audioPath} as session ${sessionId}`);
  const result = await options.orchestrator.analyze({
    sessionId,
    audioPath: parsed.audioPath,
    videoPath: parsed.videoPath,
  });
  const written = await options.reportWriter.write(result.payload);

  res.json({
    state: result.state,
    reportUrl: written.reportUrl,
    payloadUrl: written.payloadUrl,
    payload: serializeReportPayload(result.payload),
  });
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

/** Control message, or null for anything that is not `{type:"stop"}` / `{type:"abort"}`. */
export function parseClientMessage(text: string): ClientMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof value !== "object" || value === null || !("type" in value)) return null;
  if (value.type === "stop") return { type: "stop" };
  if (value.type === "abort") return { type: "abort" };
  return null;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function handleConnection(
  ws: WebSocket,
  options: CreateServerOptions,
  createId: () => string,
  logger: Logger,
): void {
  const started = LiveSession.start(options.liveOptions, {
    dsp: options.dsp,
    orchestrator: options.orchestrator,
    reportWriter: options.reportWriter,
    transcription: options.transcription ?? null,
    send: (message) => sendMessage(ws, message),
    logger,
    createId,
  });
  let queue: Promise<void> = Promise.resolve();

  started.catch((err) => {
    logger.error(`Could not start live session: ${errorMessage(err)}`);
    sendMessage(ws, { type: "error", message: `Could not start session: ${errorMessage(err)}`, recoverable: false });
    ws.close();
  });

  const enqueue = (task: (session: LiveSession) => Promise<void>): void => {
    queue = queue
      .then(async () => task(await started))
      .catch((err) => {
        logger.error(`Error handling live message: ${errorMessage(err)}`);
        sendMessage(ws, { type: "error", message: errorMessage(err), recoverable: true });
      });
  };

  ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
    if (isBinary) {
      const frame = toBuffer(data);
      enqueue((session) => session.handleBinary(frame));
      return;
    }

    const message = parseClientMessage(toBuffer(data).toString("utf-8"));
    if (!message) {
      logger.warn("Ignoring unrecognized control message");
      sendMessage(ws, { type: "error", message: "Unrecognized control message", recoverable: true });
      return;
    }
    if (message.type === "stop") {
      enqueue(async (session) => {
        await session.stop();
      });
    } else {
      enqueue((session) => session.abort());
    }
  });

  // A dropped connection keeps the recording but skips analysis
  ws.on("close", () => {
    enqueue((session) => session.dispose());
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error: ${err.message}`);
  });
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}
