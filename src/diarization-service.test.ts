import { describe, it, expect, vi } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DeepgramDiarizationService, parseDiarization } from "./diarization-service.js";
import type {
  DeepgramPrerecordedClient,
  DeepgramPrerecordedOptions,
  DeepgramPrerecordedResponse,
} from "./diarization-service.js";
import { ExternalServiceError, InputUnavailableError } from "./errors.js";
import type { Logger } from "./logger.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function createSilentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function makeClient(impl: (source: Buffer, options: DeepgramPrerecordedOptions) => Promise<DeepgramPrerecordedResponse>) {
  const transcribeFile = vi.fn(impl);
  const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
  return { client, transcribeFile };
}

async function writeAudio(bytes = Buffer.from("RIFF-placeholder-bytes")): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "diarize-"));
  const path = join(dir, "interview.wav");
  await writeFile(path, bytes);
  return path;
}

const noSleep = () => Promise.resolve();

describe("parseDiarization", () => {
  it("maps utterances to labelled turns in time order", () => {
    const turns = parseDiarization({
      results: {
        utterances: [
          { start: 4, end: 9, speaker: 1 },
          { start: 0, end: 3.5, speaker: 0 },
          { start: 9, end: 10 },
        ],
      },
    });

    expect(turns).toEqual([
      { start: 0, end: 3.5, speakerLabel: "speaker_0" },
      { start: 4, end: 9, speakerLabel: "speaker_1" },
    ]);
  });

  it("falls back to grouping words by speaker", () => {
    const turns = parseDiarization({
      results: {
        channels: [
          {
            alternatives: [
              {
                words: [
                  { start: 0, end: 0.4, speaker: 0 },
                  { start: 0.5, end: 0.9, speaker: 0 },
                  { start: 1.2, end: 1.6, speaker: 1 },
                  { start: 1.7, end: 2.1, speaker: 0 },
                ],
              },
            ],
          },
        ],
      },
    });

    expect(turns).toEqual([
      { start: 0, end: 0.9, speakerLabel: "speaker_0" },
      { start: 1.2, end: 1.6, speakerLabel: "speaker_1" },
      { start: 1.7, end: 2.1, speakerLabel: "speaker_0" },
    ]);
  });

  it("returns no turns for an empty result", () => {
    expect(parseDiarization({})).toEqual([]);
  });
});

describe("DeepgramDiarizationService", () => {
  it("requests diarized utterances from the prerecorded API", async () => {
    const { client, transcribeFile } = makeClient(async () => ({
      result: { results: { utterances: [{ start: 0, end: 2, speaker: 0 }] } },
      error: null,
    }));
    const service = new DeepgramDiarizationService(client, { language: "en", logger: createSilentLogger() });

    const turns = await service.diarize(await writeAudio());

    expect(turns).toEqual([{ start: 0, end: 2, speakerLabel: "speaker_0" }]);
    expect(transcribeFile.mock.calls[0][1]).toEqual({
      model: "nova-2",
      diarize: true,
      utterances: true,
      punctuate: true,
      language: "en",
    });
  });

  it("warns when the speaker count disagrees with the hint", async () => {
    const logger = createSilentLogger();
    const { client } = makeClient(async () => ({
      result: { results: { utterances: [{ start: 0, end: 2, speaker: 0 }] } },
      error: null,
    }));

    await new DeepgramDiarizationService(client, { logger }).diarize(await writeAudio(), 2);

    expect(logger.warn).toHaveBeenCalledWith("Expected 2 speaker(s), diarization found 1");
  });

  it("raises a service error for an error response", async () => {
    const { client, transcribeFile } = makeClient(async () => ({ result: null, error: { message: "bad audio" } }));
    const service = new DeepgramDiarizationService(client, { logger: createSilentLogger(), retry: { sleep: noSleep } });

    await expect(service.diarize(await writeAudio())).rejects.toThrow(ExternalServiceError);
    expect(transcribeFile).toHaveBeenCalledTimes(1);
  });

  it("retries a transport failure", async () => {
    const { client, transcribeFile } = makeClient(async () => ({ result: { results: {} }, error: null }));
    transcribeFile.mockRejectedValueOnce(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }));
    const service = new DeepgramDiarizationService(client, {
      logger: createSilentLogger(),
      retry: { sleep: noSleep, onRetry: () => {} },
    });

    await expect(service.diarize(await writeAudio())).resolves.toEqual([]);
    expect(transcribeFile).toHaveBeenCalledTimes(2);
  });

  it("returns no turns for an empty file without calling the API", async () => {
    const { client, transcribeFile } = makeClient(async () => ({ result: null, error: null }));
    const service = new DeepgramDiarizationService(client, { logger: createSilentLogger() });

    await expect(service.diarize(await writeAudio(Buffer.alloc(0)))).resolves.toEqual([]);
    expect(transcribeFile).not.toHaveBeenCalled();
  });

  it("reports a missing file as unavailable input", async () => {
    const { client } = makeClient(async () => ({ result: null, error: null }));
    const service = new DeepgramDiarizationService(client, { logger: createSilentLogger() });

    await expect(service.diarize("/nonexistent/interview.wav")).rejects.toBeInstanceOf(InputUnavailableError);
  });
});
