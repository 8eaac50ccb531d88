import fs from "node:fs/promises";
import type { CaptureTime } from "./types.js";

const EXIF_DATE_TAGS = ["DateTimeOriginal", "CreateDate", "ModifyDate"] as const;

/**
 * Pick the capture date from parsed EXIF tags, in order of preference.
 */
export function pickCaptureDate(data: Record<string, unknown> | null | undefined): Date | null {
  if (!data) {
    return null;
  }
  for (const tag of EXIF_DATE_TAGS) {
    const date = resolveDate(data[tag]);
    if (date) {
      return date;
    }
  }
  return null;
}

/**
 * Read the capture date from EXIF. Returns null on any error; metadata problems
 * never fail the sort.
 */
export async function readExifCaptureDate(filePath: string): Promise<Date | null> {
  try {
    // Dynamic import to avoid loading exifr if not needed
    const exifr = await import("exifr");
    const data: unknown = await exifr.parse(filePath, { pick: [...EXIF_DATE_TAGS] });
    return isRecord(data) ? pickCaptureDate(data) : null;
  } catch {
    return null;
  }
}

/**
 * Capture time for a file: EXIF when present, otherwise the file's mtime.
 * Rejects only when the file itself cannot be stat'ed.
 */
export async function resolveCaptureTime(filePath: string): Promise<CaptureTime> {
  const exifDate = await readExifCaptureDate(filePath);
  if (exifDate) {
    return { date: exifDate, source: "exif" };
  }
  const stat = await fs.stat(filePath);
  return { date: stat.mtime, source: "mtime" };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function resolveDate(value: unknown): Date | null {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value;
  }
  if (typeof value === "string") {
    const exif = /^(\d{4}):(\d{2}):(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(value.trim());
    if (exif) {
      const [, y, mo, d, h, mi, s] = exif;
      return new Date(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s));
    }
    const d = new Date(value);
    if (!Number.isNaN(d.getTime())) {
      return d;
    }
  }
  return null;
}
