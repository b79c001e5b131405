/**
 * Binary frame codec for the live-session wire format and the recorded
 * frame-sequence container.
 *
 * Wire format: [0x4D 0x49 magic ("MI")][type byte][uint24 BE header JSON length][UTF-8 header JSON][payload]
 *
 * Video frames: type byte 0x56, payload = JPEG bytes
 * Audio frames: type byte 0x41, payload = 16-bit mono PCM
 *
 * Container (video.frames): a sequence of [uint32 BE record length][wire-encoded video frame].
 */

import { readFile } from "node:fs/promises";
import type { AudioFrameHeader, FrameHeader, FrameType, VideoFrame } from "./types.js";
import { InputUnavailableError } from "./errors.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const MAGIC_0 = 0x4d; // 'M'
const MAGIC_1 = 0x49; // 'I'
const TYPE_VIDEO = 0x56; // 'V'
const TYPE_AUDIO = 0x41; // 'A'

/** 2 (magic) + 1 (type) + 3 (header len) */
const PREFIX_BYTES = 6;

const MAX_HEADER_JSON_BYTES = 4096;

/** 2 MB */
const MAX_VIDEO_PAYLOAD_BYTES = 2 * 1024 * 1024;

export const MAX_FRAME_WIDTH = 1920;
export const MAX_FRAME_HEIGHT = 1080;

const RECORD_LENGTH_BYTES = 4;

// ─── Encode ─────────────────────────────────────────────────────────────────────

function encodeFrame(type: number, header: FrameHeader | AudioFrameHeader, payload: Buffer): Buffer {
  const headerJson = Buffer.from(JSON.stringify(header), "utf-8");
  const buf = Buffer.alloc(PREFIX_BYTES + headerJson.length + payload.length);

  buf[0] = MAGIC_0;
  buf[1] = MAGIC_1;
  buf[2] = type;
  buf.writeUIntBE(headerJson.length, 3, 3);
  headerJson.copy(buf, PREFIX_BYTES);
  payload.copy(buf, PREFIX_BYTES + headerJson.length);

  return buf;
}

export function encodeVideoFrame(header: FrameHeader, jpegBuffer: Buffer): Buffer {
  return encodeFrame(TYPE_VIDEO, header, jpegBuffer);
}

export function encodeAudioFrame(header: AudioFrameHeader, pcmBuffer: Buffer): Buffer {
  return encodeFrame(TYPE_AUDIO, header, pcmBuffer);
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isCount(value: unknown, min: number): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= min;
}

function toAudioHeader(obj: unknown): AudioFrameHeader | null {
  if (!isRecord(obj)) return null;
  const { timestamp, seq } = obj;
  if (!isTimestamp(timestamp) || !isCount(seq, 0)) return null;
  return { timestamp, seq };
}

function toVideoHeader(obj: unknown): FrameHeader | null {
  if (!isRecord(obj)) return null;
  const { timestamp, seq, width, height } = obj;
  if (!isTimestamp(timestamp) || !isCount(seq, 0)) return null;
  if (!isCount(width, 1) || !isCount(height, 1)) return null;
  if (width > MAX_FRAME_WIDTH || height > MAX_FRAME_HEIGHT) return null;
  return { timestamp, seq, width, height };
}

/** Splits a frame of the expected type into parsed header JSON and payload. */
function splitFrame(data: Buffer, type: number): { header: unknown; payload: Buffer } | null {
  if (!Buffer.isBuffer(data) || data.length < PREFIX_BYTES) return null;
  if (data[0] !== MAGIC_0 || data[1] !== MAGIC_1 || data[2] !== type) return null;

  const headerLen = data.readUIntBE(3, 3);
  if (headerLen <= 0 || headerLen > MAX_HEADER_JSON_BYTES) return null;
  if (data.length < PREFIX_BYTES + headerLen) return null;

  let header: unknown;
  try {
    header = JSON.parse(data.toString("utf-8", PREFIX_BYTES, PREFIX_BYTES + headerLen));
  } catch {
    return null;
  }
  return { header, payload: data.subarray(PREFIX_BYTES + headerLen) };
}

/** Returns null on malformed input or a frame over the size limits. */
export function decodeVideoFrame(data: Buffer): VideoFrame | null {
  const frame = splitFrame(data, TYPE_VIDEO);
  if (!frame) return null;
  const header = toVideoHeader(frame.header);
  if (!header || frame.payload.length > MAX_VIDEO_PAYLOAD_BYTES) return null;
  return { header, jpeg: frame.payload };
}

export function decodeAudioFrame(data: Buffer): { header: AudioFrameHeader; pcm: Buffer } | null {
  const frame = splitFrame(data, TYPE_AUDIO);
  if (!frame) return null;
  const header = toAudioHeader(frame.header);
  if (!header) return null;
  return { header, pcm: frame.payload };
}

// ─── Inspection ─────────────────────────────────────────────────────────────────

export function isWireFrame(data: Buffer): boolean {
  return Buffer.isBuffer(data) && data.length >= 2 && data[0] === MAGIC_0 && data[1] === MAGIC_1;
}

export function getFrameType(data: Buffer): FrameType | null {
  if (!isWireFrame(data) || data.length < 3) return null;
  if (data[2] === TYPE_VIDEO) return "video";
  if (data[2] === TYPE_AUDIO) return "audio";
  return null;
}

// ─── Frame-sequence container ───────────────────────────────────────────────────

export function encodeFrameRecord(frame: Buffer): Buffer {
  const prefix = Buffer.alloc(RECORD_LENGTH_BYTES);
  prefix.writeUInt32BE(frame.length, 0);
  return Buffer.concat([prefix, frame]);
}

export interface FrameContainer {
  frames: VideoFrame[];
  /** Records that failed to decode. */
  skipped: number;
  /** A trailing record was cut short (recorder stopped mid-write). */
  truncated: boolean;
}

export function decodeFrameContainer(buffer: Buffer): FrameContainer {
  const frames: VideoFrame[] = [];
  let skipped = 0;
  let offset = 0;

  while (offset + RECORD_LENGTH_BYTES <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const start = offset + RECORD_LENGTH_BYTES;
    if (start + length > buffer.length) {
      return { frames, skipped, truncated: true };
    }
    const frame = decodeVideoFrame(buffer.subarray(start, start + length));
    if (frame) frames.push(frame);
    else skipped++;
    offset = start + length;
  }

  return { frames, skipped, truncated: offset < buffer.length };
}

export async function readFrameContainer(path: string): Promise<FrameContainer> {
  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputUnavailableError(`video file could not be read: ${reason}`, path);
  }
  if (buffer.length === 0) {
    throw new InputUnavailableError("video file is empty", path);
  }
  return decodeFrameContainer(buffer);
}
