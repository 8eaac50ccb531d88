import fs from "node:fs/promises";
import path from "node:path";

const RAW_EXTENSIONS = new Set([
  ".cr2",
  ".cr3",
  ".nef",
  ".arw",
  ".dng",
  ".raf",
  ".rw2",
  ".orf",
  ".pef",
  ".srw",
  ".raw",
]);

const PHOTO_EXTENSIONS = new Set([
  ".jpg",
  ".jpeg",
  ".png",
  ".tif",
  ".tiff",
  ".webp",
  ".heic",
  ".heif",
]);

export function isRawExtension(ext: string): boolean {
  return RAW_EXTENSIONS.has(ext.toLowerCase());
}

export function isSupportedExtension(ext: string): boolean {
  const lower = ext.toLowerCase();
  return RAW_EXTENSIONS.has(lower) || PHOTO_EXTENSIONS.has(lower);
}

/** True when `candidate` is `dir` itself or somewhere below it. */
export function isInside(dir: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(dir), path.resolve(candidate));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

export type ScannedFile = {
  rel_path: string;
  abs_path: string;
};

/**
 * List supported image files already present under `sourcePath`.
 * Anything under `excludeDir` (typically the destination tree) is left out.
 * Only the directory listing is read; a file that vanishes afterwards fails
 * when it is processed, not here.
 */
export async function scanSourceFiles(
  sourcePath: string,
  excludeDir?: string,
): Promise<ScannedFile[]> {
  const entries = await fs.readdir(sourcePath, {
    recursive: true,
    withFileTypes: true,
  });

  const files: ScannedFile[] = [];

  for (const entry of entries) {
    // Skip dotfiles and dot-directories
    if (entry.name.startsWith(".")) {
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    const ext = path.extname(entry.name).toLowerCase();
    if (!isSupportedExtension(ext)) {
      continue;
    }

    const absPath = path.join(entry.parentPath, entry.name);
    if (excludeDir && isInside(excludeDir, absPath)) {
      continue;
    }
    const relPath = path.relative(sourcePath, absPath);
    if (relPath.split(path.sep).some((seg) => seg.startsWith("."))) {
      continue;
    }

    files.push({ rel_path: relPath, abs_path: absPath });
  }

  // Sort by relative path for deterministic order
  files.sort((a, b) => a.rel_path.localeCompare(b.rel_path));

  return files;
}
