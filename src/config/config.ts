import fs from "node:fs";
import os from "node:os";
import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { SortSettings } from "../photo/types.js";
import { DEFAULT_THRESHOLDS } from "../photo/classify.js";
import { DEFAULT_FOLDER_PATTERN, validatePattern } from "../photo/destination.js";
import { resolveConfigPath, resolveDefaultLogFile, resolveUserPath } from "./paths.js";

export const SorterConfigSchema = Type.Object(
  {
    source_dir: Type.String({ minLength: 1, description: "Directory watched for new images" }),
    dest_dir: Type.String({ minLength: 1, description: "Base of the sorted tree" }),
    blur_threshold: Type.Number({ exclusiveMinimum: 0 }),
    bouquet_threshold: Type.Number({ exclusiveMinimum: 0 }),
    bouquet_fraction: Type.Number({ minimum: 0, maximum: 1 }),
    folder_pattern: Type.String({ minLength: 1 }),
    settle_ms: Type.Integer({ minimum: 0 }),
    log_file: Type.String({ minLength: 1 }),
  },
  { additionalProperties: false },
);

export type SorterConfig = Static<typeof SorterConfigSchema>;

/** Partial config as it may appear in the file, env or CLI flags. */
export const SorterConfigInputSchema = Type.Partial(SorterConfigSchema, {
  additionalProperties: false,
});

export type SorterConfigInput = Static<typeof SorterConfigInputSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], source?: string) {
    super(`Invalid config${source ? ` (${source})` : ""}:\n- ${issues.join("\n- ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const ENV_STRING_KEYS = {
  FOCUS_SORT_SOURCE_DIR: "source_dir",
  FOCUS_SORT_DEST_DIR: "dest_dir",
  FOCUS_SORT_LOG_FILE: "log_file",
} as const;

const ENV_NUMBER_KEYS = {
  FOCUS_SORT_BLUR_THRESHOLD: "blur_threshold",
  FOCUS_SORT_BOUQUET_THRESHOLD: "bouquet_threshold",
  FOCUS_SORT_BOUQUET_FRACTION: "bouquet_fraction",
} as const;

function schemaIssues(value: unknown, schema: TSchema): string[] {
  return [...Value.Errors(schema, value)].map(
    (err) => `${err.path || "/"}: ${err.message}`,
  );
}

/**
 * Read overrides from FOCUS_SORT_* variables. Unparseable numbers are reported, not ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): SorterConfigInput {
  const out: SorterConfigInput = {};
  const issues: string[] = [];
  for (const [name, key] of Object.entries(ENV_STRING_KEYS)) {
    const raw = env[name]?.trim();
    if (raw) {
      out[key] = raw;
    }
  }
  for (const [name, key] of Object.entries(ENV_NUMBER_KEYS)) {
    const raw = env[name]?.trim();
    if (!raw) {
      continue;
    }
    const n = Number(raw);
    if (Number.isFinite(n)) {
      out[key] = n;
    } else {
      issues.push(`${name}: expected a number, got "${raw}"`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigError(issues, "environment");
  }
  return out;
}

/**
 * Parse a config file. A missing file yields an empty object.
 */
export function readConfigFile(configPath: string): SorterConfigInput {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError([err instanceof Error ? err.message : String(err)], configPath);
  }
  if (!Value.Check(SorterConfigInputSchema, parsed)) {
    throw new ConfigError(schemaIssues(parsed, SorterConfigInputSchema), configPath);
  }
  return parsed;
}

function semanticIssues(config: SorterConfig): string[] {
  const issues: string[] = [];
  if (config.bouquet_threshold > config.blur_threshold) {
    issues.push(
      `bouquet_threshold (${config.bouquet_threshold}) must not exceed ` +
        `blur_threshold (${config.blur_threshold})`,
    );
  }
  for (const err of validatePattern(config.folder_pattern)) {
    issues.push(`folder_pattern: ${err}`);
  }
  return issues;
}

export type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  configPath?: string;
  overrides?: SorterConfigInput;
};

/**
 * Resolve the effective config: defaults < config file < environment < overrides.
 * Throws ConfigError listing every problem found.
 */
export function loadConfig(opts: LoadConfigOptions = {}): SorterConfig {
  const env = opts.env ?? process.env;
  const homedir = opts.homedir ?? os.homedir;
  const configPath = opts.configPath
    ? resolveUserPath(opts.configPath, env, homedir)
    : resolveConfigPath(env, homedir);

  const fromFile = readConfigFile(configPath);
  const fromEnv = readEnvOverrides(env);
  const overrides = opts.overrides ?? {};
  if (!Value.Check(SorterConfigInputSchema, overrides)) {
    throw new ConfigError(schemaIssues(overrides, SorterConfigInputSchema), "overrides");
  }

  const merged: SorterConfigInput = {
    blur_threshold: DEFAULT_THRESHOLDS.blur_threshold,
    bouquet_threshold: DEFAULT_THRESHOLDS.bouquet_threshold,
    bouquet_fraction: DEFAULT_THRESHOLDS.bouquet_fraction,
    folder_pattern: DEFAULT_FOLDER_PATTERN,
    settle_ms: 1000,
    log_file: resolveDefaultLogFile(env, homedir),
    ...fromFile,
    ...fromEnv,
    ...overrides,
  };

  const issues: string[] = [];
  if (!merged.source_dir) {
    issues.push("source_dir is required");
  }
  if (!merged.dest_dir) {
    issues.push("dest_dir is required");
  }
  if (issues.length > 0) {
    throw new ConfigError(issues, configPath);
  }

  const resolved = {
    ...merged,
    source_dir: merged.source_dir ? resolveUserPath(merged.source_dir, env, homedir) : "",
    dest_dir: merged.dest_dir ? resolveUserPath(merged.dest_dir, env, homedir) : "",
    log_file: merged.log_file ? resolveUserPath(merged.log_file, env, homedir) : "",
  };
  if (!Value.Check(SorterConfigSchema, resolved)) {
    throw new ConfigError(schemaIssues(resolved, SorterConfigSchema), configPath);
  }

  const semantic = semanticIssues(resolved);
  if (semantic.length > 0) {
    throw new ConfigError(semantic, configPath);
  }
  return resolved;
}

export function toSortSettings(config: SorterConfig): SortSettings {
  return {
    dest_dir: config.dest_dir,
    folder_pattern: config.folder_pattern,
    blur_threshold: config.blur_threshold,
    bouquet_threshold: config.bouquet_threshold,
    bouquet_fraction: config.bouquet_fraction,
  };
}
