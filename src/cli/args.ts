import { parseArgs } from "node:util";
import type { SorterConfigInput } from "../config/config.js";

export type CliOptions = {
  configPath?: string;
  overrides: SorterConfigInput;
  once: boolean;
  json: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
};

export const USAGE = `Usage: focus-sort [options]

Watch a directory for new photos and sort them into
<dest>/<YYYY-MM-DD>/<HH>/<sharp|blurry|unsorted>/.

Options:
  -c, --config <path>            Config file (default ~/.focus-sort/focus-sort.json)
  -s, --source <dir>             Directory to watch
  -d, --dest <dir>               Base directory of the sorted tree
      --blur-threshold <n>       Laplacian variance needed to count as sharp
      --bouquet-threshold <n>    Relaxed threshold for floral photos
      --bouquet-fraction <n>     Floral pixel share that enables the relaxed threshold
      --log-file <path>          Append log lines to this file
      --once                     Sort files already present, then exit
      --json                     Log events as JSON lines
  -v, --verbose                  Include debug lines
  -h, --help                     Show this help
  -V, --version                  Print the version
`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseNumberFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    throw new CliUsageError(`--${name} expects a number, got "${raw}"`);
  }
  return n;
}

const OPTIONS = {
  config: { type: "string", short: "c" },
  source: { type: "string", short: "s" },
  dest: { type: "string", short: "d" },
  "blur-threshold": { type: "string" },
  "bouquet-threshold": { type: "string" },
  "bouquet-fraction": { type: "string" },
  "log-file": { type: "string" },
  once: { type: "boolean", default: false },
  json: { type: "boolean", default: false },
  verbose: { type: "boolean", short: "v", default: false },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "V", default: false },
} as const;

function parseFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false })
      .values;
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = parseFlags(argv);

  const overrides: SorterConfigInput = {};
  if (values.source) {
    overrides.source_dir = values.source;
  }
  if (values.dest) {
    overrides.dest_dir = values.dest;
  }
  if (values["log-file"]) {
    overrides.log_file = values["log-file"];
  }
  const blur = parseNumberFlag("blur-threshold", values["blur-threshold"]);
  if (blur !== undefined) {
    overrides.blur_threshold = blur;
  }
  const bouquet = parseNumberFlag("bouquet-threshold", values["bouquet-threshold"]);
  if (bouquet !== undefined) {
    overrides.bouquet_threshold = bouquet;
  }
  const fraction = parseNumberFlag("bouquet-fraction", values["bouquet-fraction"]);
  if (fraction !== undefined) {
    overrides.bouquet_fraction = fraction;
  }

  return {
    configPath: values.config,
    overrides,
    once: values.once ?? false,
    json: values.json ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    version: values.version ?? false,
  };
}
