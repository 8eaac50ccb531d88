import fs from "node:fs/promises";
import path from "node:path";
import type { FileQueue } from "./queue.js";
import { isInside, isSupportedExtension } from "./scan.js";

export type WatchOptions = {
  sourceDir: string;
  /** Paths under this directory are never queued; the destination may live inside the source. */
  excludeDir?: string;
  /** Quiet period after the last event for a path before it is queued. */
  settleMs: number;
  recursive?: boolean;
  signal?: AbortSignal;
};

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Watch `sourceDir` and feed new image files into `queue` once they stop changing.
 * Resolves when `signal` aborts.
 */
export async function watchSource(
  queue: Pick<FileQueue, "enqueue">,
  opts: WatchOptions,
): Promise<void> {
  const { sourceDir, excludeDir, settleMs, signal } = opts;
  const timers = new Map<string, NodeJS.Timeout>();

  const settle = async (absPath: string): Promise<void> => {
    timers.delete(absPath);
    try {
      const stat = await fs.stat(absPath);
      if (stat.isFile()) {
        queue.enqueue(absPath);
      }
    } catch {
      // Gone again (moved away or a temp file); nothing to sort
    }
  };

  const schedule = (absPath: string) => {
    const existing = timers.get(absPath);
    if (existing) {
      clearTimeout(existing);
    }
    timers.set(
      absPath,
      setTimeout(() => {
        void settle(absPath);
      }, settleMs),
    );
  };

  try {
    const watcher = fs.watch(sourceDir, { recursive: opts.recursive ?? true, signal });
    for await (const event of watcher) {
      if (!event.filename) {
        continue;
      }
      const absPath = path.join(sourceDir, event.filename);
      if (excludeDir && isInside(excludeDir, absPath)) {
        continue;
      }
      if (path.basename(absPath).startsWith(".")) {
        continue;
      }
      if (!isSupportedExtension(path.extname(absPath))) {
        continue;
      }
      schedule(absPath);
    }
  } catch (err) {
    if (!isAbortError(err)) {
      throw err;
    }
  } finally {
    for (const timer of timers.values()) {
      clearTimeout(timer);
    }
    timers.clear();
  }
}
