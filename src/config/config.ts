import path from "path";
import dotenv from "dotenv";
import type { MalformedRecordPolicy } from "../models";

// Load environment variables from the .env file at the project root.
dotenv.config({ path: path.resolve(__dirname, "..", "..", ".env") });

export interface PgConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface EtlConfig {
  postgres: PgConfig;
  files: {
    songDataDir: string;
    logDataDir: string;
    extension: string;
  };
  transform: {
    onMalformedRecord: MalformedRecordPolicy;
  };
  load: {
    /** Seconds; 0 means the duration must match exactly. */
    durationTolerance: number;
    /** Rewrite leftover missing-value sentinels to NULL after loading. */
    cleanupSentinels: boolean;
  };
}

const requiredEnv = [
  "PG_HOST",
  "PG_PORT",
  "PG_USER",
  "PG_PASSWORD",
  "PG_DATABASE",
] as const;

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PG_PORT: ${value}`);
  }
  return port;
}

function parsePolicy(value: string | undefined): MalformedRecordPolicy {
  if (value === undefined || value === "" || value === "skip") return "skip";
  if (value === "abort") return "abort";
  throw new Error(
    `Invalid ON_MALFORMED_RECORD: ${value} (expected "skip" or "abort")`
  );
}

function parseTolerance(value: string | undefined): number {
  if (value === undefined || value === "") return 0;
  const tolerance = Number(value);
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new Error(`Invalid DURATION_TOLERANCE: ${value}`);
  }
  return tolerance;
}

/**
 * Builds the run configuration from environment variables.
 * Throws on the first missing required variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EtlConfig {
  for (const key of requiredEnv) {
    if (!env[key]) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  }

  return {
    postgres: {
      host: env.PG_HOST ?? "localhost",
      port: parsePort(env.PG_PORT ?? "5432"),
      user: env.PG_USER ?? "",
      password: env.PG_PASSWORD ?? "",
      database: env.PG_DATABASE ?? "",
    },
    files: {
      songDataDir: path.resolve(env.SONG_DATA_DIR || "data/song_data"),
      logDataDir: path.resolve(env.LOG_DATA_DIR || "data/log_data"),
      extension: ".json",
    },
    transform: {
      onMalformedRecord: parsePolicy(env.ON_MALFORMED_RECORD),
    },
    load: {
      durationTolerance: parseTolerance(env.DURATION_TOLERANCE),
      cleanupSentinels: env.CLEANUP_SENTINELS !== "false",
    },
  };
}
