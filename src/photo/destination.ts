import path from "node:path";
import type { Verdict } from "./types.js";

export const ALLOWED_TOKENS = new Set(["YYYY", "MM", "DD", "HH", "VERDICT"]);

export const DEFAULT_FOLDER_PATTERN = "{YYYY}-{MM}-{DD}/{HH}/{VERDICT}";

const MAX_FOLDER_DEPTH = 10;

export type TokenContext = Record<string, string>;

const TOKEN_RE = /\{([A-Z_]+)\}/g;

/** Folder name used for each verdict. Unanalyzed files share one catch-all bucket. */
export const VERDICT_FOLDERS: Record<Verdict, string> = {
  sharp: "sharp",
  blurry: "blurry",
  unanalyzed: "unsorted",
};

/**
 * Validate a folder pattern. Returns an array of error messages (empty = valid).
 */
export function validatePattern(pattern: string): string[] {
  const errors: string[] = [];
  if (!pattern) {
    errors.push("Pattern must not be empty");
    return errors;
  }

  let match: RegExpExecArray | null;
  const re = new RegExp(TOKEN_RE.source, "g");
  const seen = new Set<string>();
  while ((match = re.exec(pattern)) !== null) {
    const token = match[1];
    seen.add(token);
    if (!ALLOWED_TOKENS.has(token)) {
      errors.push(`Unknown token: {${token}}`);
    }
  }
  if (!seen.has("VERDICT")) {
    errors.push("Pattern must contain {VERDICT}");
  }
  if (pattern.startsWith("/")) {
    errors.push("Pattern must be relative");
  }
  if (pattern.split("/").some((seg) => seg === ".." || seg === ".")) {
    errors.push("Pattern must not contain . or .. segments");
  }
  if (pattern.split("/").length > MAX_FOLDER_DEPTH) {
    errors.push(`Pattern exceeds max folder depth of ${MAX_FOLDER_DEPTH}`);
  }

  return errors;
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Token values for one file, from its local capture time and verdict.
 */
export function buildTokenContext(captureTime: Date, verdict: Verdict): TokenContext {
  return {
    YYYY: String(captureTime.getFullYear()),
    MM: pad(captureTime.getMonth() + 1),
    DD: pad(captureTime.getDate()),
    HH: pad(captureTime.getHours()),
    VERDICT: VERDICT_FOLDERS[verdict],
  };
}

/** Substitute token values into a pattern; a token without a value becomes empty. */
export function expandPattern(pattern: string, ctx: TokenContext): string {
  return pattern.replace(TOKEN_RE, (_match, token: string) => ctx[token] ?? "");
}

/**
 * Absolute destination directory for a file under `baseDir`.
 * Throws when the pattern fails `validatePattern`.
 */
export function resolveDestinationDir(
  baseDir: string,
  folderPattern: string,
  captureTime: Date,
  verdict: Verdict,
): string {
  const errors = validatePattern(folderPattern);
  if (errors.length > 0) {
    throw new Error(`Invalid folder pattern "${folderPattern}": ${errors.join("; ")}`);
  }
  const rel = expandPattern(folderPattern, buildTokenContext(captureTime, verdict));
  return path.join(baseDir, ...rel.split("/").filter(Boolean));
}
