import { createReadStream, createWriteStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { OrganizeParams, OrganizeResult } from "./types.js";
import { resolveDestinationDir } from "./destination.js";
import { OrganizeError, errorCode } from "./errors.js";

const MAX_DISAMBIGUATOR = 9999;

/** `IMG_0001.jpg` → `IMG_0001_2.jpg` for n = 2. */
export function disambiguatedName(filename: string, n: number): string {
  if (n === 0) {
    return filename;
  }
  const ext = path.extname(filename);
  const stem = ext ? filename.slice(0, -ext.length) : filename;
  return `${stem}_${n}${ext}`;
}

/**
 * Claim a free name in `dir` by creating an empty file exclusively. Two writers
 * can never end up with the same name, and nothing existing is overwritten.
 */
export async function reserveDestination(
  dir: string,
  filename: string,
): Promise<{ path: string; disambiguator: number }> {
  for (let n = 0; n <= MAX_DISAMBIGUATOR; n++) {
    const candidate = path.join(dir, disambiguatedName(filename, n));
    try {
      const handle = await fs.open(candidate, "wx", 0o644);
      await handle.close();
      return { path: candidate, disambiguator: n };
    } catch (err) {
      if (errorCode(err) === "EEXIST") {
        continue;
      }
      throw new OrganizeError("reserve", candidate, err);
    }
  }
  throw new OrganizeError(
    "reserve",
    path.join(dir, filename),
    new Error(`no free name after ${MAX_DISAMBIGUATOR} attempts`),
  );
}

/**
 * Copy across volumes: write to `<dst>.partial`, rename it over `dst`, then
 * remove the source. The source is only removed once `dst` is complete.
 */
async function copyAcrossDevices(src: string, dst: string): Promise<void> {
  const partial = dst + ".partial";
  try {
    await pipeline(createReadStream(src), createWriteStream(partial, { flags: "wx" }));
    const stat = await fs.stat(src);
    await fs.utimes(partial, stat.atime, stat.mtime);
    await fs.rename(partial, dst);
  } catch (err) {
    await fs.rm(partial, { force: true });
    throw err;
  }
  await fs.unlink(src);
}

/**
 * Move `src` into its capture-time/verdict folder under `baseDir`.
 * On failure the source is left in place and an OrganizeError is thrown.
 */
export async function organizeFile(params: OrganizeParams): Promise<OrganizeResult> {
  const { src, baseDir, verdict, captureTime, folderPattern } = params;

  const destDir = resolveDestinationDir(baseDir, folderPattern, captureTime, verdict);
  try {
    await fs.mkdir(destDir, { recursive: true });
  } catch (err) {
    throw new OrganizeError("mkdir", destDir, err);
  }

  const reserved = await reserveDestination(destDir, path.basename(src));

  try {
    try {
      await fs.rename(src, reserved.path);
    } catch (err) {
      if (errorCode(err) !== "EXDEV") {
        throw err;
      }
      await copyAcrossDevices(src, reserved.path);
    }
  } catch (err) {
    // Release the reservation; the source was not touched
    await fs.rm(reserved.path, { force: true }).catch(() => undefined);
    throw new OrganizeError("move", src, err);
  }

  return { dest_path: reserved.path, disambiguator: reserved.disambiguator };
}
