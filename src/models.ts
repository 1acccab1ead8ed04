import { z } from "zod";

export type EtlPhase =
  | "INIT"
  | "LOADING_SONGS"
  | "LOADING_LOGS"
  | "POST_PROCESS"
  | "COMMITTED"
  | "ROLLED_BACK";

export type MalformedRecordPolicy = "skip" | "abort";

/** Text the store rewrites to NULL once loading is done. */
export const MISSING_VALUE_SENTINELS = ["", "NULL", "NaN", "None"] as const;

// Raw input records as they appear in the data files.

const optionalNumber = z.union([z.number(), z.nan()]).nullable().optional();

export const songRecordSchema = z.object({
  song_id: z.string().min(1),
  title: z.string().min(1),
  artist_id: z.string().min(1),
  year: z.number().int().nonnegative(),
  duration: z.number().positive(),
  artist_name: z.string().min(1),
  artist_location: z.string().nullable().optional(),
  artist_latitude: optionalNumber,
  artist_longitude: optionalNumber,
});

export type SongRecord = z.infer<typeof songRecordSchema>;

// Log exports carry numbers as strings in places (userId, ts), so both forms are accepted.
const numeric = z.union([
  z.number(),
  z.string().regex(/^-?\d+(\.\d+)?$/).transform(Number),
]);

export const logRecordSchema = z.object({
  page: z.string(),
  ts: numeric.refine(Number.isFinite, "ts is not a finite epoch value"),
  userId: numeric.refine(Number.isInteger, "userId is not an integer"),
  firstName: z.string().nullable().optional(),
  lastName: z.string().nullable().optional(),
  gender: z.string().nullable().optional(),
  level: z.string().min(1),
  song: z.string().nullable().optional(),
  artist: z.string().nullable().optional(),
  length: z.number().nullable().optional(),
  sessionId: numeric.refine(Number.isInteger, "sessionId is not an integer"),
  location: z.string().nullable().optional(),
  userAgent: z.string().nullable().optional(),
});

export type LogRecord = z.infer<typeof logRecordSchema>;

// Rows handed to the store.

/** Song and artist values travel as canonical text; see `toCanonicalText`. */
export interface SongRow {
  songId: string;
  title: string;
  artistId: string;
  year: string;
  duration: string;
}

export interface ArtistRow {
  artistId: string;
  name: string;
  location: string;
  latitude: string;
  longitude: string;
}

export interface TimeRow {
  /** ISO-8601 UTC, millisecond precision. */
  startTime: string;
  hour: number;
  day: number;
  week: number;
  month: number;
  year: number;
  /** Monday = 0 ... Sunday = 6 */
  weekday: number;
}

export interface UserRow {
  userId: number;
  firstName: string | null;
  lastName: string | null;
  gender: string | null;
  level: string;
}

export interface SongPlayRow {
  startTime: string;
  userId: number;
  level: string;
  songId: string | null;
  artistId: string | null;
  sessionId: number;
  location: string;
  userAgent: string;
}

export interface SongLookup {
  title: string;
  artistName: string;
  duration: number;
}

export interface SongReference {
  songId: string | null;
  artistId: string | null;
}

export const RESOLUTION_MISS: SongReference = Object.freeze({
  songId: null,
  artistId: null,
});

/**
 * One NextSong event, ready to load. `songPlay` still lacks its song and
 * artist ids; those come from resolving `lookup` against the store.
 */
export interface PlayEvent {
  time: TimeRow;
  user: UserRow;
  songPlay: Omit<SongPlayRow, "songId" | "artistId">;
  lookup: SongLookup | null;
}
