import path from "node:path";
import type { FileOutcome, OnEvent, SortSettings, Verdict } from "./types.js";
import { resolveCaptureTime } from "./capture-time.js";
import { classifyFile } from "./classify.js";
import { errorMessage } from "./errors.js";
import { organizeFile } from "./organize.js";
import { isSupportedExtension, scanSourceFiles } from "./scan.js";

/**
 * Wrap a caller's event callback so that a throwing callback cannot change a
 * file's outcome or abort a sweep.
 */
function guardEventSink(onEvent?: OnEvent): OnEvent {
  return (event) => {
    try {
      onEvent?.(event);
    } catch (err) {
      process.stderr.write(
        `focus-sort: event handler failed on ${event.type}: ${errorMessage(err)}\n`,
      );
    }
  };
}

/**
 * Classify one file and move it into the destination tree.
 * Every failure, including a source that cannot be read, is reported as a
 * `file.error` event and an error outcome with the file left in place; this
 * never rejects.
 */
export async function processFile(
  srcPath: string,
  settings: SortSettings,
  onEvent?: OnEvent,
): Promise<FileOutcome> {
  const emit = guardEventSink(onEvent);
  const startMs = Date.now();
  const ext = path.extname(srcPath);

  if (!isSupportedExtension(ext)) {
    const reason = `unsupported extension ${ext || "(none)"}`;
    emit({ type: "file.skipped", src_path: srcPath, reason });
    return { src_path: srcPath, status: "skipped", error: reason };
  }

  emit({ type: "file.detected", src_path: srcPath });

  let verdict: Verdict;
  let destPath: string;
  try {
    const result = await classifyFile(srcPath, settings);
    verdict = result.verdict;
    emit({
      type: "file.classified",
      src_path: srcPath,
      verdict: result.verdict,
      variance: result.variance,
      floral_ratio: result.floral_ratio,
      bouquet: result.bouquet,
      threshold: result.threshold,
      reason: result.decode_failure?.reason,
      failure_kind: result.decode_failure?.kind,
    });

    const captureTime = await resolveCaptureTime(srcPath);
    if (captureTime.source === "mtime") {
      emit({
        type: "capture_time.fallback",
        src_path: srcPath,
        date: captureTime.date.toISOString(),
      });
    }

    const moved = await organizeFile({
      src: srcPath,
      baseDir: settings.dest_dir,
      verdict,
      captureTime: captureTime.date,
      folderPattern: settings.folder_pattern,
    });
    destPath = moved.dest_path;
  } catch (err) {
    const error = errorMessage(err);
    emit({ type: "file.error", src_path: srcPath, error });
    return { src_path: srcPath, status: "error", error };
  }

  emit({
    type: "file.moved",
    src_path: srcPath,
    dest_path: destPath,
    verdict,
    elapsed_ms: Date.now() - startMs,
  });
  return { src_path: srcPath, status: "moved", verdict, dest_path: destPath };
}

/**
 * Process every supported file already present in `sourceDir`, one at a time.
 * `handle` runs each file; pass a queue's `submit` to share it with a watcher.
 */
export async function sweepSource(
  sourceDir: string,
  settings: SortSettings,
  onEvent?: OnEvent,
  handle?: (filePath: string) => Promise<FileOutcome>,
): Promise<FileOutcome[]> {
  const emit = guardEventSink(onEvent);
  const run = handle ?? ((filePath: string) => processFile(filePath, settings, onEvent));
  emit({ type: "sweep.start", source_dir: sourceDir });

  const scanned = await scanSourceFiles(sourceDir, settings.dest_dir);
  const outcomes: FileOutcome[] = [];
  for (const file of scanned) {
    outcomes.push(await run(file.abs_path));
  }

  emit({
    type: "sweep.done",
    file_count: outcomes.length,
    moved_count: outcomes.filter((o) => o.status === "moved").length,
    error_count: outcomes.filter((o) => o.status === "error").length,
  });
  return outcomes;
}
