import type { ClientBase } from "pg";
import { isUniqueViolation, StoreConstraintViolation } from "../errors";
import {
  ArtistRow,
  MISSING_VALUE_SENTINELS,
  RESOLUTION_MISS,
  SongLookup,
  SongPlayRow,
  SongReference,
  SongRow,
  TimeRow,
  UserRow,
} from "../models";
import {
  artistSentinelCleanup,
  artistTableInsert,
  songplaySentinelCleanup,
  songplayTableInsert,
  songSelect,
  songTableInsert,
  timeTableInsert,
  userTableUpsert,
} from "../sql/queries";

/**
 * Write and lookup operations the loader needs from the warehouse.
 *
 * Songs, artists and time rows are first-write-wins: the insert methods
 * resolve to `false` when the key already exists. Users are last-write-wins
 * on `level` only. `insertSongPlay` rejects with `StoreConstraintViolation`
 * when the play's natural key is already stored.
 */
export interface WarehouseStore {
  insertSong(song: SongRow): Promise<boolean>;
  insertArtist(artist: ArtistRow): Promise<boolean>;
  insertTime(time: TimeRow): Promise<boolean>;
  upsertUser(user: UserRow): Promise<void>;
  /** Resolves to `RESOLUTION_MISS` when nothing matches. */
  findSongReference(lookup: SongLookup): Promise<SongReference>;
  insertSongPlay(songPlay: SongPlayRow): Promise<void>;
  /** Rewrites missing-value sentinels to NULL; resolves to the rows touched. */
  cleanupSentinels(): Promise<number>;
}

export type Queryable = Pick<ClientBase, "query">;

export interface PostgresWarehouseStoreOptions {
  durationTolerance?: number;
}

export class PostgresWarehouseStore implements WarehouseStore {
  private readonly durationTolerance: number;

  constructor(
    private readonly client: Queryable,
    options: PostgresWarehouseStoreOptions = {}
  ) {
    this.durationTolerance = options.durationTolerance ?? 0;
  }

  async insertSong(song: SongRow): Promise<boolean> {
    const res = await this.client.query(songTableInsert, [
      song.songId,
      song.title,
      song.artistId,
      song.year,
      song.duration,
    ]);
    return res.rowCount === 1;
  }

  async insertArtist(artist: ArtistRow): Promise<boolean> {
    const res = await this.client.query(artistTableInsert, [
      artist.artistId,
      artist.name,
      artist.location,
      artist.latitude,
      artist.longitude,
    ]);
    return res.rowCount === 1;
  }

  async insertTime(time: TimeRow): Promise<boolean> {
    const res = await this.client.query(timeTableInsert, [
      time.startTime,
      time.hour,
      time.day,
      time.week,
      time.month,
      time.year,
      time.weekday,
    ]);
    return res.rowCount === 1;
  }

  async upsertUser(user: UserRow): Promise<void> {
    await this.client.query(userTableUpsert, [
      user.userId,
      user.firstName,
      user.lastName,
      user.gender,
      user.level,
    ]);
  }

  async findSongReference(lookup: SongLookup): Promise<SongReference> {
    const res = await this.client.query<{ song_id: string; artist_id: string }>(
      songSelect,
      [lookup.title, lookup.artistName, lookup.duration, this.durationTolerance]
    );
    const match = res.rows[0];
    if (!match) return RESOLUTION_MISS;
    return { songId: match.song_id, artistId: match.artist_id };
  }

  /**
   * Runs inside a savepoint so that a duplicate key only undoes this insert
   * and leaves the surrounding transaction usable. The savepoint is released
   * on every path, so none stay open across calls.
   */
  async insertSongPlay(songPlay: SongPlayRow): Promise<void> {
    await this.client.query("SAVEPOINT songplay_insert");
    try {
      await this.client.query(songplayTableInsert, [
        songPlay.startTime,
        songPlay.userId,
        songPlay.level,
        songPlay.songId,
        songPlay.artistId,
        songPlay.sessionId,
        songPlay.location,
        songPlay.userAgent,
      ]);
    } catch (err) {
      await this.client.query("ROLLBACK TO SAVEPOINT songplay_insert");
      await this.client.query("RELEASE SAVEPOINT songplay_insert");
      if (isUniqueViolation(err)) {
        throw new StoreConstraintViolation("songplays", err.constraint, err);
      }
      throw err;
    }
    await this.client.query("RELEASE SAVEPOINT songplay_insert");
  }

  async cleanupSentinels(): Promise<number> {
    const sentinels = [...MISSING_VALUE_SENTINELS];
    const artists = await this.client.query(artistSentinelCleanup, [sentinels]);
    const songplays = await this.client.query(songplaySentinelCleanup, [
      sentinels,
    ]);
    return (artists.rowCount ?? 0) + (songplays.rowCount ?? 0);
  }
}
