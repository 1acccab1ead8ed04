import type { EtlPhase } from "./models";

/**
 * A data root is missing, is not a directory, or cannot be read.
 */
export class FileSystemError extends Error {
  constructor(
    public readonly path: string,
    message: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "FileSystemError";
  }
}

/**
 * A record is missing a required field or holds a value that cannot be parsed.
 */
export class MalformedRecordError extends Error {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly line?: number
  ) {
    super(
      line === undefined
        ? `${filePath}: ${message}`
        : `${filePath}:${line}: ${message}`
    );
    this.name = "MalformedRecordError";
  }
}

/**
 * A write hit a uniqueness constraint that the upsert policy does not absorb.
 */
export class StoreConstraintViolation extends Error {
  constructor(
    public readonly table: string,
    public readonly constraint: string | undefined,
    cause?: unknown
  ) {
    super(
      `Constraint violation on "${table}"` +
        (constraint ? ` (${constraint})` : ""),
      { cause }
    );
    this.name = "StoreConstraintViolation";
  }
}

/**
 * Wraps the failure that aborted a run with the phase and file it happened in.
 */
export class EtlRunError extends Error {
  constructor(
    public readonly phase: EtlPhase,
    public readonly filePath: string | undefined,
    cause: unknown
  ) {
    super(
      `ETL failed during ${phase}` +
        (filePath ? ` while processing ${filePath}` : "") +
        `: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = "EtlRunError";
  }
}

/**
 * Postgres reports errors as plain objects carrying a SQLSTATE `code`.
 */
export function isUniqueViolation(
  err: unknown
): err is { code: string; constraint?: string } {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "23505"
  );
}
