// Interview Voice Analyzer - DSP worker thread entry point

import { parentPort } from "node:worker_threads";
import { isDspEnvelope, runDspRequest } from "./dsp-executor.js";
import type { DspReply } from "./dsp-executor.js";
import { errorMessage } from "./logger.js";

const port = parentPort;

if (port) {
  port.on("message", (message: unknown) => {
    if (!isDspEnvelope(message)) return;
    let reply: DspReply;
    try {
      reply = { id: message.id, ok: true, response: runDspRequest(message.request) };
    } catch (err) {
      reply = { id: message.id, ok: false, error: errorMessage(err) };
    }
    port.postMessage(reply);
  });
}
