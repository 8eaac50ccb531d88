export type OrganizeOp = "mkdir" | "reserve" | "move";

/** A filesystem step of the move failed. The source file is still where it was. */
export class OrganizeError extends Error {
  readonly op: OrganizeOp;
  readonly path: string;
  readonly code?: string;

  constructor(op: OrganizeOp, filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${op} failed for ${filePath}: ${detail}`, { cause });
    this.name = "OrganizeError";
    this.op = op;
    this.path = filePath;
    this.code = errorCode(cause);
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
