import fs from "node:fs/promises";
import os from "node:os";
import type { SorterConfig } from "../config/config.js";
import type { OnEvent } from "../photo/types.js";
import { ConfigError, loadConfig, toSortSettings } from "../config/config.js";
import { createEventLogger } from "../logging/event-log.js";
import { errorMessage } from "../photo/errors.js";
import { processFile, sweepSource } from "../photo/process.js";
import { FileQueue } from "../photo/queue.js";
import { watchSource } from "../photo/watch.js";
import { VERSION } from "../version.js";
import { CliUsageError, parseCliArgs, USAGE, type CliOptions } from "./args.js";

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  /** Aborting stops the watcher; defaults to SIGINT/SIGTERM. */
  signal?: AbortSignal;
  /** Echo log lines to stdout/stderr (default true). */
  logToConsole?: boolean;
};

/**
 * Check the source and destination before anything is moved. A destination base
 * that cannot be created (unmounted volume, permissions) is a startup error.
 */
export async function prepareDirectories(config: SorterConfig): Promise<void> {
  let sourceIsDir = false;
  try {
    sourceIsDir = (await fs.stat(config.source_dir)).isDirectory();
  } catch (err) {
    throw new ConfigError([`source_dir unreachable: ${errorMessage(err)}`]);
  }
  if (!sourceIsDir) {
    throw new ConfigError([`source_dir is not a directory: ${config.source_dir}`]);
  }
  try {
    await fs.mkdir(config.dest_dir, { recursive: true });
  } catch (err) {
    throw new ConfigError([`dest_dir cannot be created: ${errorMessage(err)}`]);
  }
}

function signalFromProcess(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const stop = () => controller.abort();
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    },
  };
}

/**
 * Start watching, then sweep the files already present through the same queue,
 * so uploads that land during a long sweep are picked up. Returns once `signal`
 * aborts and the queue has drained.
 */
async function sweepAndWatch(
  config: SorterConfig,
  onEvent: OnEvent,
  signal: AbortSignal,
): Promise<void> {
  const settings = toSortSettings(config);
  const queue = new FileQueue(
    (filePath) => processFile(filePath, settings, onEvent),
    (filePath, err) =>
      onEvent({ type: "file.error", src_path: filePath, error: errorMessage(err) }),
  );

  // Stops the watcher on shutdown, or when the sweep itself fails
  const stop = new AbortController();
  const abort = () => stop.abort();
  if (signal.aborted) {
    abort();
  } else {
    signal.addEventListener("abort", abort, { once: true });
  }

  onEvent({ type: "watch.start", source_dir: config.source_dir });
  try {
    const watching = watchSource(queue, {
      sourceDir: config.source_dir,
      excludeDir: config.dest_dir,
      settleMs: config.settle_ms,
      signal: stop.signal,
    });
    const sweeping = sweepSource(config.source_dir, settings, onEvent, (filePath) =>
      queue.submit(filePath),
    ).catch((err: unknown) => {
      abort();
      throw err;
    });

    const [swept, watched] = await Promise.allSettled([sweeping, watching]);
    await queue.idle();
    if (swept.status === "rejected") {
      throw swept.reason;
    }
    if (watched.status === "rejected") {
      throw watched.reason;
    }
  } finally {
    signal.removeEventListener("abort", abort);
  }
  onEvent({ type: "watch.stop", source_dir: config.source_dir });
}

/**
 * Run the CLI. Returns the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));

  let opts: CliOptions;
  try {
    opts = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof CliUsageError) {
      stderr(`${err.message}\n\n${USAGE}`);
      return 2;
    }
    throw err;
  }
  if (opts.help) {
    stdout(USAGE);
    return 0;
  }
  if (opts.version) {
    stdout(`${VERSION}\n`);
    return 0;
  }

  let config: SorterConfig;
  try {
    config = loadConfig({
      env: deps.env ?? process.env,
      homedir: deps.homedir ?? os.homedir,
      configPath: opts.configPath,
      overrides: opts.overrides,
    });
    await prepareDirectories(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      stderr(`${err.message}\n`);
      return 1;
    }
    throw err;
  }

  const logger = createEventLogger({
    logFile: config.log_file,
    minLevel: opts.verbose ? "debug" : "info",
    json: opts.json,
    console: deps.logToConsole ?? true,
  });
  try {
    if (opts.once) {
      await sweepSource(config.source_dir, toSortSettings(config), logger.onEvent);
      return 0;
    }

    if (deps.signal) {
      await sweepAndWatch(config, logger.onEvent, deps.signal);
    } else {
      const { signal, dispose } = signalFromProcess();
      try {
        await sweepAndWatch(config, logger.onEvent, signal);
      } finally {
        dispose();
      }
    }
    return 0;
  } finally {
    logger.close();
  }
}
