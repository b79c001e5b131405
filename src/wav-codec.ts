// Interview Voice Analyzer - WAV codec
// RIFF/WAVE parsing into mono float samples, and 16-bit mono header writing
// for the session recorder.

import { readFile } from "node:fs/promises";
import type { AudioBuffer } from "./types.js";
import { InputUnavailableError } from "./errors.js";

export const WAV_HEADER_BYTES = 44;

const FORMAT_PCM = 1;
const FORMAT_IEEE_FLOAT = 3;
const FORMAT_EXTENSIBLE = 0xfffe;

export interface WavFormat {
  sampleRate: number;
  channels: number;
  bitsPerSample: number;
}

/**
 * Builds a canonical 44-byte PCM header. The recorder writes it with a zero
 * data size first and patches it in place on finalize.
 */
export function encodeWavHeader(dataBytes: number, format: WavFormat): Buffer {
  const { sampleRate, channels, bitsPerSample } = format;
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  let offset = 0;

  header.write("RIFF", offset);
  offset += 4;
  header.writeUInt32LE(WAV_HEADER_BYTES + dataBytes - 8, offset);
  offset += 4;
  header.write("WAVE", offset);
  offset += 4;

  header.write("fmt ", offset);
  offset += 4;
  header.writeUInt32LE(16, offset);
  offset += 4;
  header.writeUInt16LE(FORMAT_PCM, offset);
  offset += 2;
  header.writeUInt16LE(channels, offset);
  offset += 2;
  header.writeUInt32LE(sampleRate, offset);
  offset += 4;
  header.writeUInt32LE(byteRate, offset);
  offset += 4;
  header.writeUInt16LE(blockAlign, offset);
  offset += 2;
  header.writeUInt16LE(bitsPerSample, offset);
  offset += 2;

  header.write("data", offset);
  offset += 4;
  header.writeUInt32LE(dataBytes, offset);

  return header;
}

/** Wraps raw 16-bit mono PCM in a WAV container. */
export function encodeWav(pcm16: Buffer, sampleRate: number): Buffer {
  return Buffer.concat([
    encodeWavHeader(pcm16.length, { sampleRate, channels: 1, bitsPerSample: 16 }),
    pcm16,
  ]);
}

export function pcm16ToFloat32(pcm: Buffer): Float32Array {
  const sampleCount = Math.floor(pcm.length / 2);
  const out = new Float32Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    out[i] = pcm.readInt16LE(i * 2) / 32768;
  }
  return out;
}

export function float32ToPcm16(samples: Float32Array): Buffer {
  const out = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, Number.isFinite(samples[i]) ? samples[i] : 0));
    out.writeInt16LE(Math.round(clamped < 0 ? clamped * 32768 : clamped * 32767), i * 2);
  }
  return out;
}

function readSample(buf: Buffer, offset: number, bitsPerSample: number, isFloat: boolean): number {
  if (isFloat) {
    return bitsPerSample === 64 ? buf.readDoubleLE(offset) : buf.readFloatLE(offset);
  }
  switch (bitsPerSample) {
    case 8:
      return (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return buf.readInt16LE(offset) / 32768;
    case 24:
      return buf.readIntLE(offset, 3) / 8388608;
    default:
      return buf.readInt32LE(offset) / 2147483648;
  }
}

/**
 * Decodes a RIFF/WAVE buffer into mono samples (channel mean).
 * Throws InputUnavailableError for anything that is not a playable WAV.
 */
export function decodeWav(buffer: Buffer, source: string | null = null): AudioBuffer {
  if (buffer.length === 0) {
    throw new InputUnavailableError("audio file is empty", source);
  }
  if (buffer.length < 12 || buffer.toString("ascii", 0, 4) !== "RIFF" || buffer.toString("ascii", 8, 12) !== "WAVE") {
    throw new InputUnavailableError("audio is not a RIFF/WAVE container", source);
  }

  let format: (WavFormat & { isFloat: boolean }) | null = null;
  let data: Buffer | null = null;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const chunkId = buffer.toString("ascii", offset, offset + 4);
    const declaredSize = buffer.readUInt32LE(offset + 4);
    const bodyStart = offset + 8;
    const available = buffer.length - bodyStart;

    if (chunkId === "fmt ") {
      if (declaredSize < 16 || available < 16) {
        throw new InputUnavailableError("WAV fmt chunk is truncated", source);
      }
      let audioFormat = buffer.readUInt16LE(bodyStart);
      if (audioFormat === FORMAT_EXTENSIBLE && declaredSize >= 26 && available >= 26) {
        audioFormat = buffer.readUInt16LE(bodyStart + 24);
      }
      format = {
        channels: buffer.readUInt16LE(bodyStart + 2),
        sampleRate: buffer.readUInt32LE(bodyStart + 4),
        bitsPerSample: buffer.readUInt16LE(bodyStart + 14),
        isFloat: audioFormat === FORMAT_IEEE_FLOAT,
      };
      if (audioFormat !== FORMAT_PCM && audioFormat !== FORMAT_IEEE_FLOAT) {
        throw new InputUnavailableError(`unsupported WAV encoding ${audioFormat}`, source);
      }
    } else if (chunkId === "data") {
      // Streaming writers leave 0 or 0xFFFFFFFF until they are closed.
      const size = declaredSize === 0 || declaredSize === 0xffffffff ? available : Math.min(declaredSize, available);
      data = buffer.subarray(bodyStart, bodyStart + size);
      break;
    }

    offset = bodyStart + declaredSize + (declaredSize % 2);
  }

  if (!format) {
    throw new InputUnavailableError("WAV has no fmt chunk", source);
  }
  if (!data) {
    throw new InputUnavailableError("WAV has no data chunk", source);
  }

  const { channels, sampleRate, bitsPerSample, isFloat } = format;
  const validBits = isFloat ? bitsPerSample === 32 || bitsPerSample === 64 : [8, 16, 24, 32].includes(bitsPerSample);
  if (channels < 1 || sampleRate <= 0 || !validBits) {
    throw new InputUnavailableError(
      `unsupported WAV layout: ${channels}ch ${sampleRate}Hz ${bitsPerSample}bit`,
      source,
    );
  }

  const bytesPerSample = bitsPerSample / 8;
  const frameBytes = bytesPerSample * channels;
  const frameCount = Math.floor(data.length / frameBytes);
  const samples = new Float32Array(frameCount);

  for (let i = 0; i < frameCount; i++) {
    let sum = 0;
    for (let ch = 0; ch < channels; ch++) {
      sum += readSample(data, i * frameBytes + ch * bytesPerSample, bitsPerSample, isFloat);
    }
    const value = sum / channels;
    samples[i] = Number.isFinite(value) ? value : 0;
  }

  return { samples, sampleRate, durationSeconds: frameCount / sampleRate };
}

export async function readWavFile(path: string): Promise<AudioBuffer> {
  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputUnavailableError(`audio file could not be read: ${reason}`, path);
  }
  return decodeWav(buffer, path);
}
