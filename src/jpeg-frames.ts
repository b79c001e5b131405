// Interview Voice Analyzer - JPEG frame helpers
// Decode/resize/encode for recorded frames: every frame of a session is
// stored at the first frame's resolution.

import jpeg from "jpeg-js";
import { InputUnavailableError } from "./errors.js";

export interface RgbaImage {
  width: number;
  height: number;
  /** width * height * 4 bytes, row-major RGBA. */
  data: Uint8Array;
}

export const DEFAULT_JPEG_QUALITY = 85;

export function decodeJpeg(bytes: Buffer): RgbaImage {
  try {
    const image = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true, maxResolutionInMP: 4 });
    return { width: image.width, height: image.height, data: image.data };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputUnavailableError(`frame is not a decodable JPEG: ${reason}`);
  }
}

export function encodeJpeg(image: RgbaImage, quality = DEFAULT_JPEG_QUALITY): Buffer {
  return jpeg.encode({ width: image.width, height: image.height, data: image.data }, quality).data;
}

/** Nearest-neighbour scale. */
export function resizeNearest(image: RgbaImage, width: number, height: number): RgbaImage {
  if (width === image.width && height === image.height) return image;

  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    const srcY = Math.min(image.height - 1, Math.floor((y * image.height) / height));
    for (let x = 0; x < width; x++) {
      const srcX = Math.min(image.width - 1, Math.floor((x * image.width) / width));
      const from = (srcY * image.width + srcX) * 4;
      const to = (y * width + x) * 4;
      data[to] = image.data[from];
      data[to + 1] = image.data[from + 1];
      data[to + 2] = image.data[from + 2];
      data[to + 3] = image.data[from + 3];
    }
  }
  return { width, height, data };
}

/**
 * Re-encodes a JPEG at the canonical size. Frames already at that size are
 * returned untouched.
 */
export function fitJpegToSize(bytes: Buffer, width: number, height: number, quality = DEFAULT_JPEG_QUALITY): Buffer {
  const image = decodeJpeg(bytes);
  if (image.width === width && image.height === height) return bytes;
  return encodeJpeg(resizeNearest(image, width, height), quality);
}
