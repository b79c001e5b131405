// Interview Voice Analyzer - DSP executor
// Signal analysis is CPU-bound; on a server it runs on a small pool of
// worker threads so WebSocket traffic keeps flowing while a long recording
// is analyzed. When the compiled worker script is not on disk (tests, ts
// sources run directly) the same functions run inline.

import { existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Worker } from "node:worker_threads";
import type { PauseSummary, SignalMetrics } from "./types.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger, errorMessage } from "./logger.js";
import { computeSignalMetrics } from "./signal-metrics.js";
import type { SignalMetricsOptions } from "./signal-metrics.js";
import { segmentPauses } from "./pause-segmenter.js";
import type { PauseOptions } from "./pause-segmenter.js";

// ─── Requests ───────────────────────────────────────────────────────────────────

export type DspRequest =
  | { op: "signal"; samples: Float32Array; sampleRate: number; options: Partial<SignalMetricsOptions> }
  | { op: "pauses"; samples: Float32Array; sampleRate: number; options: Partial<PauseOptions> };

export type DspResponse = { op: "signal"; metrics: SignalMetrics } | { op: "pauses"; summary: PauseSummary };

export interface DspEnvelope {
  id: number;
  request: DspRequest;
}

export type DspReply = { id: number; ok: true; response: DspResponse } | { id: number; ok: false; error: string };

export function runDspRequest(request: DspRequest): DspResponse {
  if (request.op === "signal") {
    return { op: "signal", metrics: computeSignalMetrics(request.samples, request.sampleRate, request.options) };
  }
  return { op: "pauses", summary: segmentPauses(request.samples, request.sampleRate, request.options) };
}

export function isDspEnvelope(value: unknown): value is DspEnvelope {
  if (typeof value !== "object" || value === null) return false;
  if (!("id" in value) || typeof value.id !== "number") return false;
  if (!("request" in value) || typeof value.request !== "object" || value.request === null) return false;
  const request = value.request;
  return (
    "op" in request &&
    (request.op === "signal" || request.op === "pauses") &&
    "samples" in request &&
    request.samples instanceof Float32Array
  );
}

export function isDspReply(value: unknown): value is DspReply {
  if (typeof value !== "object" || value === null) return false;
  if (!("id" in value) || typeof value.id !== "number" || !("ok" in value)) return false;
  return value.ok === true ? "response" in value : "error" in value && typeof value.error === "string";
}

// ─── Executors ──────────────────────────────────────────────────────────────────

export interface DspExecutor {
  readonly kind: "threaded" | "inline";
  signalMetrics(samples: Float32Array, sampleRate: number, options?: Partial<SignalMetricsOptions>): Promise<SignalMetrics>;
  pauses(samples: Float32Array, sampleRate: number, options?: Partial<PauseOptions>): Promise<PauseSummary>;
  close(): Promise<void>;
}

abstract class BaseDspExecutor implements DspExecutor {
  abstract get kind(): "threaded" | "inline";
  protected abstract run(request: DspRequest): Promise<DspResponse>;
  abstract close(): Promise<void>;

  async signalMetrics(
    samples: Float32Array,
    sampleRate: number,
    options: Partial<SignalMetricsOptions> = {},
  ): Promise<SignalMetrics> {
    const response = await this.run({ op: "signal", samples, sampleRate, options });
    if (response.op !== "signal") throw new Error(`DSP worker answered ${response.op} to a signal request`);
    return response.metrics;
  }

  async pauses(samples: Float32Array, sampleRate: number, options: Partial<PauseOptions> = {}): Promise<PauseSummary> {
    const response = await this.run({ op: "pauses", samples, sampleRate, options });
    if (response.op !== "pauses") throw new Error(`DSP worker answered ${response.op} to a pauses request`);
    return response.summary;
  }
}

export class InlineDspExecutor extends BaseDspExecutor {
  get kind(): "threaded" | "inline" {
    return "inline";
  }

  protected async run(request: DspRequest): Promise<DspResponse> {
    return runDspRequest(request);
  }

  async close(): Promise<void> {}
}

/** Workers that die this many times in a row without answering switch the pool to inline analysis. */
export const DEFAULT_MAX_RESPAWNS = 5;

export class ThreadedDspExecutor extends BaseDspExecutor {
  private readonly idle: Worker[] = [];
  private readonly waiting: Array<(worker: Worker | null) => void> = [];
  private readonly all = new Set<Worker>();
  private nextId = 1;
  private closed = false;
  private degraded = false;
  private consecutiveFailures = 0;
  private readonly scriptUrl: URL;
  private readonly logger: Logger;
  private readonly maxRespawns: number;

  constructor(
    scriptUrl: URL,
    size: number,
    logger: Logger = createConsoleLogger("DspExecutor"),
    maxRespawns = DEFAULT_MAX_RESPAWNS,
  ) {
    super();
    this.scriptUrl = scriptUrl;
    this.logger = logger;
    this.maxRespawns = maxRespawns;
    for (let i = 0; i < Math.max(1, Math.floor(size)); i++) {
      this.idle.push(this.spawn());
    }
  }

  /** "inline" once the respawn budget is spent. */
  get kind(): "threaded" | "inline" {
    return this.degraded ? "inline" : "threaded";
  }

  get workerCount(): number {
    return this.all.size;
  }

  private spawn(): Worker {
    const worker = new Worker(this.scriptUrl);
    this.all.add(worker);
    // Without a listener an idle worker's error would crash the process
    worker.on("error", (err) => {
      this.logger.error(`DSP worker error: ${err.message}`);
    });
    worker.on("exit", (code) => {
      this.all.delete(worker);
      const index = this.idle.indexOf(worker);
      if (index >= 0) this.idle.splice(index, 1);
      if (this.closed || this.degraded) return;

      this.consecutiveFailures++;
      if (this.consecutiveFailures > this.maxRespawns) {
        this.degrade();
        return;
      }
      this.logger.warn(`DSP worker exited with code ${code}; starting a replacement`);
      this.release(this.spawn());
    });
    return worker;
  }

  private degrade(): void {
    this.degraded = true;
    this.logger.error(`DSP workers failed ${this.consecutiveFailures} times in a row; analyzing inline`);
    const survivors = [...this.all];
    this.all.clear();
    this.idle.length = 0;
    for (const next of this.waiting.splice(0)) next(null);
    Promise.all(survivors.map((w) => w.terminate())).catch((err) => {
      this.logger.error(`Could not stop DSP workers: ${errorMessage(err)}`);
    });
  }

  private acquire(): Promise<Worker | null> {
    if (this.degraded) return Promise.resolve(null);
    const worker = this.idle.pop();
    if (worker) return Promise.resolve(worker);
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  private release(worker: Worker): void {
    if (!this.all.has(worker)) return;
    const next = this.waiting.shift();
    if (next) next(worker);
    else this.idle.push(worker);
  }

  protected async run(request: DspRequest): Promise<DspResponse> {
    if (this.closed) throw new Error("DSP executor is closed");
    const worker = await this.acquire();
    if (!worker) {
      if (this.closed) throw new Error("DSP executor is closed");
      return runDspRequest(request);
    }
    try {
      return await this.dispatch(worker, request);
    } finally {
      this.release(worker);
    }
  }

  private dispatch(worker: Worker, request: DspRequest): Promise<DspResponse> {
    const id = this.nextId++;
    // Callers often pass views into a larger recording; send a private copy.
    const buffer = new ArrayBuffer(request.samples.byteLength);
    const samples = new Float32Array(buffer);
    samples.set(request.samples);

    return new Promise<DspResponse>((resolve, reject) => {
      const cleanup = (): void => {
        worker.off("message", onMessage);
        worker.off("error", onError);
        worker.off("exit", onExit);
      };
      const onMessage = (message: unknown): void => {
        if (!isDspReply(message) || message.id !== id) return;
        cleanup();
        this.consecutiveFailures = 0;
        if (message.ok) resolve(message.response);
        else reject(new Error(`DSP worker failed: ${message.error}`));
      };
      const onError = (err: Error): void => {
        cleanup();
        reject(err);
      };
      const onExit = (code: number): void => {
        cleanup();
        reject(new Error(`DSP worker exited with code ${code} mid-request`));
      };
      worker.on("message", onMessage);
      worker.on("error", onError);
      worker.on("exit", onExit);
      const envelope: DspEnvelope = { id, request: { ...request, samples } };
      worker.postMessage(envelope, [buffer]);
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const workers = [...this.all];
    this.all.clear();
    this.idle.length = 0;
    for (const next of this.waiting.splice(0)) next(null);
    await Promise.all(workers.map((w) => w.terminate()));
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

/** URL of the compiled worker script, or null when it is not on disk. */
export function resolveDspWorkerUrl(): URL | null {
  const url = new URL("./dsp-worker.js", import.meta.url);
  return existsSync(fileURLToPath(url)) ? url : null;
}

export function createDspExecutor(threads: number, logger: Logger = createConsoleLogger("DspExecutor")): DspExecutor {
  const url = resolveDspWorkerUrl();
  if (threads > 0 && url) {
    try {
      const executor = new ThreadedDspExecutor(url, threads, logger);
      logger.info(`DSP analysis on ${threads} worker thread(s)`);
      return executor;
    } catch (err) {
      logger.warn(`Worker threads unavailable, analyzing inline: ${errorMessage(err)}`);
    }
  }
  return new InlineDspExecutor();
}
