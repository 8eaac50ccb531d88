import fs from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";
import type { DecodeFailure, DecodeFailureKind, DecodeResult, ImageSample } from "./types.js";
import { isRawExtension } from "./scan.js";

const SNIFF_BYTES = 4100;

function fail(kind: DecodeFailureKind, reason: string): DecodeResult {
  return { ok: false, failure: { kind, reason } };
}

/**
 * Read the head of a file and decide whether its bytes are a raster image we can
 * decode. Returns a failure for empty, unrecognized, non-image and RAW content;
 * rejects when the file cannot be opened or read.
 */
async function sniffFormat(filePath: string): Promise<DecodeFailure | null> {
  const fd = await fs.open(filePath, "r");
  try {
    const buf = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await fd.read(buf, 0, SNIFF_BYTES, 0);
    if (bytesRead === 0) {
      return { kind: "empty", reason: "File is empty (0 bytes readable)" };
    }

    const { fileTypeFromBuffer } = await import("file-type");
    const detected = await fileTypeFromBuffer(buf.subarray(0, bytesRead));
    if (!detected) {
      return {
        kind: "unrecognized",
        reason: "File format not recognized, may be corrupt or incomplete",
      };
    }
    if (isRawExtension(`.${detected.ext}`)) {
      return { kind: "raw", reason: `RAW content (${detected.mime}) is not decoded` };
    }
    if (!detected.mime.startsWith("image/")) {
      return { kind: "unrecognized", reason: `Detected ${detected.mime}, not a raster image` };
    }
    return null;
  } finally {
    await fd.close();
  }
}

function toSample(data: Buffer, width: number, height: number, channels: number): ImageSample {
  const pixelCount = width * height;
  const gray = new Uint8Array(pixelCount);
  const rgb = new Uint8Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    const o = i * channels;
    const r = data[o];
    // 1-2 channel output is greyscale (optionally with alpha)
    const g = channels >= 3 ? data[o + 1] : r;
    const b = channels >= 3 ? data[o + 2] : r;
    rgb[i * 3] = r;
    rgb[i * 3 + 1] = g;
    rgb[i * 3 + 2] = b;
    gray[i] = Math.round(0.299 * r + 0.587 * g + 0.114 * b);
  }
  return { width, height, gray, rgb };
}

/**
 * Decode a file into an ImageSample. RAW camera formats are never decoded:
 * they are rejected by extension or by their magic bytes. Content problems come
 * back as a DecodeFailure; an I/O error (missing file, EACCES) rejects.
 */
export async function decodeImage(filePath: string): Promise<DecodeResult> {
  const ext = path.extname(filePath).toLowerCase();
  if (isRawExtension(ext)) {
    return fail("raw", `RAW format ${ext} is not decoded`);
  }

  const failure = await sniffFormat(filePath);
  if (failure) {
    return { ok: false, failure };
  }

  try {
    const { data, info } = await sharp(filePath)
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.width === 0 || info.height === 0) {
      return fail("corrupt", "Image has zero size");
    }
    return { ok: true, sample: toSample(data, info.width, info.height, info.channels) };
  } catch (err) {
    return fail(
      "corrupt",
      `Image could not be decoded: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}
