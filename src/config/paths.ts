import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".focus-sort";
const CONFIG_FILENAME = "focus-sort.json";
const LOG_FILENAME = "focus-sort.log";

function resolveDefaultHomeDir(env: NodeJS.ProcessEnv, homedir: () => string): string {
  return env.FOCUS_SORT_HOME?.trim() || env.HOME?.trim() || homedir();
}

/**
 * Expand a leading `~` and make the path absolute.
 */
export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const trimmed = input.trim();
  if (!trimmed) {
    return trimmed;
  }
  if (trimmed === "~" || trimmed.startsWith("~/")) {
    return path.resolve(resolveDefaultHomeDir(env, homedir), trimmed.slice(2));
  }
  return path.resolve(trimmed);
}

/**
 * State directory for the log file and default config.
 * Can be overridden via FOCUS_SORT_STATE_DIR.
 * Default: ~/.focus-sort
 */
export function resolveStateDir(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.FOCUS_SORT_STATE_DIR?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveDefaultHomeDir(env, homedir), STATE_DIRNAME);
}

/**
 * Config file path (JSON).
 * Can be overridden via FOCUS_SORT_CONFIG_PATH.
 * Default: ~/.focus-sort/focus-sort.json
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const override = env.FOCUS_SORT_CONFIG_PATH?.trim();
  if (override) {
    return resolveUserPath(override, env, homedir);
  }
  return path.join(resolveStateDir(env, homedir), CONFIG_FILENAME);
}

export function resolveDefaultLogFile(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  return path.join(resolveStateDir(env, homedir), LOG_FILENAME);
}
