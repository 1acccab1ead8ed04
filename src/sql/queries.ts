// DROP TABLES

export const songplayTableDrop = "DROP TABLE IF EXISTS songplays;";
export const userTableDrop = "DROP TABLE IF EXISTS users;";
export const songTableDrop = "DROP TABLE IF EXISTS songs;";
export const artistTableDrop = "DROP TABLE IF EXISTS artists;";
export const timeTableDrop = 'DROP TABLE IF EXISTS "time";';

// CREATE TABLES

// Location arrives as text and may hold a missing-value sentinel; a missing
// coordinate arrives as 'NaN'. cleanupSentinels rewrites both to NULL.
export const artistTableCreate = `
CREATE TABLE IF NOT EXISTS artists (
  artist_id varchar PRIMARY KEY,
  name varchar NOT NULL,
  location varchar NULL,
  latitude double precision NULL,
  longitude double precision NULL
);`;

export const songTableCreate = `
CREATE TABLE IF NOT EXISTS songs (
  song_id varchar PRIMARY KEY,
  title varchar NOT NULL,
  artist_id varchar NOT NULL,
  year int NOT NULL CHECK (year >= 0),
  duration double precision NOT NULL CHECK (duration > 0)
);`;

export const timeTableCreate = `
CREATE TABLE IF NOT EXISTS "time" (
  start_time timestamp(3) PRIMARY KEY,
  hour int NOT NULL,
  day int NOT NULL,
  week int NOT NULL,
  month int NOT NULL,
  year int NOT NULL,
  weekday int NOT NULL
);`;

export const userTableCreate = `
CREATE TABLE IF NOT EXISTS users (
  user_id int PRIMARY KEY,
  first_name varchar NULL,
  last_name varchar NULL,
  gender char(1) NULL,
  level varchar NOT NULL
);`;

export const songplayTableCreate = `
CREATE TABLE IF NOT EXISTS songplays (
  songplay_id serial PRIMARY KEY,
  start_time timestamp(3) NOT NULL REFERENCES "time" (start_time),
  user_id int NOT NULL REFERENCES users (user_id),
  level varchar NOT NULL,
  song_id varchar NULL,
  artist_id varchar NULL,
  session_id int NOT NULL,
  location text NOT NULL,
  user_agent text NOT NULL
);`;

// Unresolved plays have a NULL song_id; COALESCE keeps them deduplicated too.
export const songplayNaturalKeyCreate = `
CREATE UNIQUE INDEX IF NOT EXISTS songplays_natural_key
  ON songplays (start_time, user_id, COALESCE(song_id, ''));`;

// INSERT RECORDS

export const songTableInsert = `
INSERT INTO songs (song_id, title, artist_id, year, duration)
VALUES ($1, $2, $3, $4, $5)
ON CONFLICT (song_id) DO NOTHING;`;

export const artistTableInsert = `
INSERT INTO artists (artist_id, name, location, latitude, longitude)
VALUES ($1, $2, $3, $4, $5)
ON CONFLICT (artist_id) DO NOTHING;`;

export const timeTableInsert = `
INSERT INTO "time" (start_time, hour, day, week, month, year, weekday)
VALUES ($1, $2, $3, $4, $5, $6, $7)
ON CONFLICT (start_time) DO NOTHING;`;

export const userTableUpsert = `
INSERT INTO users (user_id, first_name, last_name, gender, level)
VALUES ($1, $2, $3, $4, $5)
ON CONFLICT (user_id) DO UPDATE SET level = EXCLUDED.level;`;

export const songplayTableInsert = `
INSERT INTO songplays
  (start_time, user_id, level, song_id, artist_id, session_id, location, user_agent)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8);`;

// FIND SONGS

// $4 is the duration tolerance in seconds; 0 means exact equality.
export const songSelect = `
SELECT s.song_id, s.artist_id
FROM songs AS s
INNER JOIN artists AS a ON s.artist_id = a.artist_id
WHERE s.title = $1
  AND a.name = $2
  AND ABS(s.duration - $3::double precision) <= $4::double precision
ORDER BY ABS(s.duration - $3::double precision), s.song_id
LIMIT 1;`;

// POST-LOAD CLEANUP

// $1 is the list of sentinel strings. Postgres treats NaN as equal to NaN.
export const artistSentinelCleanup = `
UPDATE artists SET
  location = CASE WHEN location = ANY($1::text[]) THEN NULL ELSE location END,
  latitude = CASE WHEN latitude = 'NaN'::float8 THEN NULL ELSE latitude END,
  longitude = CASE WHEN longitude = 'NaN'::float8 THEN NULL ELSE longitude END
WHERE location = ANY($1::text[])
   OR latitude = 'NaN'::float8
   OR longitude = 'NaN'::float8;`;

export const songplaySentinelCleanup = `
UPDATE songplays SET
  song_id = CASE WHEN song_id = ANY($1::text[]) THEN NULL ELSE song_id END,
  artist_id = CASE WHEN artist_id = ANY($1::text[]) THEN NULL ELSE artist_id END
WHERE song_id = ANY($1::text[])
   OR artist_id = ANY($1::text[]);`;

// QUERY LISTS

export const createTableQueries = [
  artistTableCreate,
  songTableCreate,
  timeTableCreate,
  userTableCreate,
  songplayTableCreate,
  songplayNaturalKeyCreate,
];

export const dropTableQueries = [
  songplayTableDrop,
  userTableDrop,
  songTableDrop,
  artistTableDrop,
  timeTableDrop,
];
