import type { ZodError } from "zod";
import { MalformedRecordError } from "./errors";
import {
  ArtistRow,
  LogRecord,
  logRecordSchema,
  MalformedRecordPolicy,
  PlayEvent,
  SongRow,
  songRecordSchema,
  TimeRow,
} from "./models";
import { logger } from "./utils/logger";

export const NEXT_SONG_PAGE = "NextSong";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface TransformResult<T> {
  rows: T[];
  skipped: number;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
    .join("; ");
}

/**
 * Converts a scalar to the text form the song and artist loads travel in.
 * Missing values become sentinels: NaN -> "NaN", null/undefined -> "None".
 */
export function toCanonicalText(value: unknown): string {
  if (value === null || value === undefined) return "None";
  if (typeof value === "number") return Number.isNaN(value) ? "NaN" : String(value);
  if (typeof value === "string") return value;
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  return JSON.stringify(value);
}

/**
 * Coordinates load into float columns, which take "NaN" but not "None".
 */
export function toCoordinateText(value: number | null | undefined): string {
  return value === null || value === undefined ? "NaN" : toCanonicalText(value);
}

/**
 * Projects one song metadata record into a song row and an artist row.
 */
export function transformSongRecord(
  record: unknown,
  filePath: string
): { song: SongRow; artist: ArtistRow } {
  const parsed = songRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new MalformedRecordError(filePath, describeIssues(parsed.error));
  }
  const r = parsed.data;

  return {
    song: {
      songId: toCanonicalText(r.song_id),
      title: toCanonicalText(r.title),
      artistId: toCanonicalText(r.artist_id),
      year: toCanonicalText(r.year),
      duration: toCanonicalText(r.duration),
    },
    artist: {
      artistId: toCanonicalText(r.artist_id),
      name: toCanonicalText(r.artist_name),
      location: toCanonicalText(r.artist_location),
      latitude: toCoordinateText(r.artist_latitude),
      longitude: toCoordinateText(r.artist_longitude),
    },
  };
}

/**
 * ISO-8601 week number of a UTC date: weeks start on Monday and week 1 is the
 * one containing the year's first Thursday.
 */
export function isoWeek(date: Date): number {
  const d = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate())
  );
  const isoDay = d.getUTCDay() || 7;
  // Shift to the Thursday of the same ISO week; its year owns the week.
  d.setUTCDate(d.getUTCDate() + 4 - isoDay);
  const yearStart = Date.UTC(d.getUTCFullYear(), 0, 1);
  return Math.ceil(((d.getTime() - yearStart) / MS_PER_DAY + 1) / 7);
}

/**
 * Derives the time dimension row for an epoch-milliseconds timestamp (UTC).
 */
export function deriveTimeFields(ts: number): TimeRow {
  const date = new Date(Math.trunc(ts));
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Timestamp out of range: ${ts}`);
  }

  return {
    startTime: date.toISOString(),
    hour: date.getUTCHours(),
    day: date.getUTCDate(),
    week: isoWeek(date),
    month: date.getUTCMonth() + 1,
    year: date.getUTCFullYear(),
    weekday: (date.getUTCDay() + 6) % 7,
  };
}

function isNextSong(record: unknown): boolean {
  return (
    typeof record === "object" &&
    record !== null &&
    "page" in record &&
    record.page === NEXT_SONG_PAGE
  );
}

function toPlayEvent(r: LogRecord, filePath: string): PlayEvent {
  let time: TimeRow;
  try {
    time = deriveTimeFields(r.ts);
  } catch (err) {
    throw new MalformedRecordError(
      filePath,
      `ts: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const lookup =
    r.song && r.artist && typeof r.length === "number"
      ? { title: r.song, artistName: r.artist, duration: r.length }
      : null;

  return {
    time,
    user: {
      userId: r.userId,
      firstName: r.firstName ?? null,
      lastName: r.lastName ?? null,
      gender: r.gender || null,
      level: r.level,
    },
    songPlay: {
      startTime: time.startTime,
      userId: r.userId,
      level: r.level,
      sessionId: r.sessionId,
      location: r.location ?? "",
      userAgent: r.userAgent ?? "",
    },
    lookup,
  };
}

/**
 * Builds the load-ready event for one NextSong log record.
 */
export function transformLogRecord(
  record: unknown,
  filePath: string
): PlayEvent {
  const parsed = logRecordSchema.safeParse(record);
  if (!parsed.success) {
    throw new MalformedRecordError(filePath, describeIssues(parsed.error));
  }
  return toPlayEvent(parsed.data, filePath);
}

function applyPolicy<T>(
  records: unknown[],
  policy: MalformedRecordPolicy,
  transform: (record: unknown) => T
): TransformResult<T> {
  const rows: T[] = [];
  let skipped = 0;
  for (const record of records) {
    try {
      rows.push(transform(record));
    } catch (err) {
      if (policy === "abort" || !(err instanceof MalformedRecordError)) {
        throw err;
      }
      skipped++;
      logger.warn(`Skipping malformed record: ${err.message}`);
    }
  }
  return { rows, skipped };
}

export function transformSongRecords(
  records: unknown[],
  filePath: string,
  policy: MalformedRecordPolicy
): TransformResult<{ song: SongRow; artist: ArtistRow }> {
  return applyPolicy(records, policy, (record) =>
    transformSongRecord(record, filePath)
  );
}

/**
 * Filters a log file's records to NextSong events, in file order, and
 * transforms each into a play event.
 */
export function transformLogRecords(
  records: unknown[],
  filePath: string,
  policy: MalformedRecordPolicy
): TransformResult<PlayEvent> {
  return applyPolicy(records.filter(isNextSong), policy, (record) =>
    transformLogRecord(record, filePath)
  );
}
