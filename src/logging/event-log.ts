import fs from "node:fs";
import path from "node:path";
import type { SortEvent } from "../photo/types.js";
import { errorMessage } from "../photo/errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function eventLevel(event: SortEvent): LogLevel {
  switch (event.type) {
    case "file.error":
      return "error";
    case "file.classified":
      // RAW is informational; other decode failures warn
      return event.failure_kind && event.failure_kind !== "raw" ? "warn" : "info";
    case "file.skipped":
    case "capture_time.fallback":
      return "debug";
    default:
      return "info";
  }
}

const fmtMetric = (n: number | null, digits = 2) => (n === null ? "n/a" : n.toFixed(digits));

export function formatEventMessage(event: SortEvent): string {
  switch (event.type) {
    case "file.detected":
      return `New file detected: ${event.src_path}`;
    case "file.skipped":
      return `Skipping ${event.src_path}: ${event.reason}`;
    case "file.classified":
      if (event.verdict === "unanalyzed") {
        return `Cannot analyze ${event.src_path}: ${event.reason ?? "not decodable"}`;
      }
      return `Image: ${event.src_path}, Laplacian var: ${fmtMetric(event.variance)}, Bouquet detected: ${event.bouquet}, Threshold: ${fmtMetric(event.threshold, 1)} -> ${event.verdict}`;
    case "capture_time.fallback":
      return `No EXIF capture time for ${event.src_path}, using mtime ${event.date}`;
    case "file.moved":
      return `Processed ${event.src_path} -> ${event.dest_path} (${event.verdict}, ${event.elapsed_ms}ms)`;
    case "file.error":
      return `Error processing ${event.src_path}: ${event.error}`;
    case "sweep.start":
      return `Processing existing files in ${event.source_dir}`;
    case "sweep.done":
      return `Existing files: ${event.file_count} found, ${event.moved_count} moved, ${event.error_count} failed`;
    case "watch.start":
      return `Monitoring ${event.source_dir} for new images...`;
    case "watch.stop":
      return `Stopped monitoring ${event.source_dir}`;
  }
}

export function formatLogLine(event: SortEvent, now: Date = new Date()): string {
  return `${now.toISOString()} ${eventLevel(event).toUpperCase()} ${formatEventMessage(event)}`;
}

export type LogSink = {
  write: (line: string, level: LogLevel) => void;
};

export type EventLoggerOptions = {
  /** Append every line to this file as well. */
  logFile?: string;
  minLevel?: LogLevel;
  json?: boolean;
  console?: boolean;
  now?: () => Date;
};

/**
 * Build an `onEvent` callback that logs each event as one line to the console
 * and, when configured, to an append-only log file. A failed log-file write
 * goes to stderr instead; `onEvent` does not throw.
 */
export function createEventLogger(opts: EventLoggerOptions = {}): {
  onEvent: (event: SortEvent) => void;
  close: () => void;
} {
  const minLevel = LEVEL_ORDER[opts.minLevel ?? "info"];
  const now = opts.now ?? (() => new Date());

  let fd: number | null = null;
  if (opts.logFile) {
    fs.mkdirSync(path.dirname(opts.logFile), { recursive: true, mode: 0o700 });
    fd = fs.openSync(opts.logFile, "a", 0o600);
  }

  const onEvent = (event: SortEvent) => {
    const level = eventLevel(event);
    if (LEVEL_ORDER[level] < minLevel) {
      return;
    }
    const ts = now();
    const line = opts.json
      ? JSON.stringify({ time: ts.toISOString(), level, ...event })
      : formatLogLine(event, ts);
    if (fd !== null) {
      try {
        fs.writeSync(fd, line + "\n");
      } catch (err) {
        process.stderr.write(
          `focus-sort: log file write failed (${errorMessage(err)}): ${line}\n`,
        );
      }
    }
    if (opts.console !== false) {
      const stream = level === "error" || level === "warn" ? process.stderr : process.stdout;
      stream.write(line + "\n");
    }
  };

  const close = () => {
    if (fd !== null) {
      fs.closeSync(fd);
      fd = null;
    }
  };

  return { onEvent, close };
}
