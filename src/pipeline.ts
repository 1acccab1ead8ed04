import path from "path";
import cliProgress from "cli-progress";
import type { EtlConfig } from "./config/config";
import { EtlRunError, StoreConstraintViolation } from "./errors";
import { EtlPhase, PlayEvent, RESOLUTION_MISS, SongReference } from "./models";
import { withTransaction } from "./services/dbService";
import { listFiles, readJsonRecords } from "./services/fileService";
import {
  PostgresWarehouseStore,
  WarehouseStore,
} from "./services/warehouseStore";
import { transformLogRecords, transformSongRecords } from "./transformer";
import { logger } from "./utils/logger";

export type LoadingPhase = Extract<EtlPhase, "LOADING_SONGS" | "LOADING_LOGS">;

export interface ProgressEvent {
  phase: LoadingPhase;
  processed: number;
  total: number;
  filePath: string;
}

export interface EtlSummary {
  songFiles: number;
  logFiles: number;
  songsInserted: number;
  artistsInserted: number;
  events: number;
  playsInserted: number;
  resolved: number;
  unresolved: number;
  duplicatePlaysSkipped: number;
  malformedRecordsSkipped: number;
  sentinelsCleaned: number;
}

/** Opens a store, runs `work` in one transaction, commits or rolls back. */
export type TransactionRunner = <T>(
  work: (store: WarehouseStore) => Promise<T>
) => Promise<T>;

export interface EtlPipelineOptions {
  runInTransaction?: TransactionRunner;
  onProgress?: (event: ProgressEvent) => void;
  showProgressBar?: boolean;
}

const phaseLabels: Record<LoadingPhase, string> = {
  LOADING_SONGS: "Songs",
  LOADING_LOGS: "Logs",
};

function emptySummary(): EtlSummary {
  return {
    songFiles: 0,
    logFiles: 0,
    songsInserted: 0,
    artistsInserted: 0,
    events: 0,
    playsInserted: 0,
    resolved: 0,
    unresolved: 0,
    duplicatePlaysSkipped: 0,
    malformedRecordsSkipped: 0,
    sentinelsCleaned: 0,
  };
}

/**
 * Loads song files, then log files, into the warehouse in a single
 * transaction. An instance runs once.
 */
export class EtlPipeline {
  private _state: EtlPhase = "INIT";
  private currentFile: string | undefined;
  private readonly runInTransaction: TransactionRunner;

  constructor(
    private readonly config: EtlConfig,
    private readonly options: EtlPipelineOptions = {}
  ) {
    this.runInTransaction =
      options.runInTransaction ??
      (<T>(work: (store: WarehouseStore) => Promise<T>): Promise<T> =>
        withTransaction(config.postgres, (client) =>
          work(
            new PostgresWarehouseStore(client, {
              durationTolerance: config.load.durationTolerance,
            })
          )
        ));
  }

  get state(): EtlPhase {
    return this._state;
  }

  async run(): Promise<EtlSummary> {
    if (this._state !== "INIT") {
      throw new Error(`Pipeline already ran (state: ${this._state})`);
    }
    const { songDataDir, logDataDir, extension } = this.config.files;
    const summary = emptySummary();

    let songFiles: string[];
    let logFiles: string[];
    try {
      songFiles = listFiles(songDataDir, extension);
      logFiles = listFiles(logDataDir, extension);
    } catch (err) {
      this._state = "ROLLED_BACK";
      throw err;
    }
    logger.info(`${songFiles.length} files found in ${songDataDir}`);
    logger.info(`${logFiles.length} files found in ${logDataDir}`);

    try {
      await this.runInTransaction(async (store) => {
        this._state = "LOADING_SONGS";
        await this.processFiles("LOADING_SONGS", songFiles, (file) =>
          this.loadSongFile(store, file, summary)
        );
        summary.songFiles = songFiles.length;

        this._state = "LOADING_LOGS";
        await this.processFiles("LOADING_LOGS", logFiles, (file) =>
          this.loadLogFile(store, file, summary)
        );
        summary.logFiles = logFiles.length;

        this._state = "POST_PROCESS";
        this.currentFile = undefined;
        if (this.config.load.cleanupSentinels) {
          summary.sentinelsCleaned = await store.cleanupSentinels();
          logger.info(
            `Rewrote missing-value sentinels to NULL in ${summary.sentinelsCleaned} rows.`
          );
        }
      });
    } catch (err) {
      const failedIn = this._state;
      this._state = "ROLLED_BACK";
      const wrapped = new EtlRunError(failedIn, this.currentFile, err);
      logger.error(wrapped.message);
      throw wrapped;
    }

    this._state = "COMMITTED";
    logger.info(
      `Loaded ${summary.playsInserted} of ${summary.events} song plays ` +
        `(${summary.resolved} resolved, ${summary.unresolved} unresolved, ` +
        `${summary.duplicatePlaysSkipped} duplicates skipped).`
    );
    return summary;
  }

  private async processFiles(
    phase: LoadingPhase,
    files: string[],
    handler: (file: string) => Promise<void>
  ): Promise<void> {
    const progressBar =
      this.options.showProgressBar === false
        ? undefined
        : new cliProgress.SingleBar(
            {
              format: `${phaseLabels[phase]} [{bar}] {value}/{total} files`,
              hideCursor: true,
            },
            cliProgress.Presets.shades_classic
          );
    progressBar?.start(files.length, 0);

    try {
      for (const [index, file] of files.entries()) {
        this.currentFile = file;
        await handler(file);
        progressBar?.increment();
        this.options.onProgress?.({
          phase,
          processed: index + 1,
          total: files.length,
          filePath: file,
        });
      }
    } finally {
      progressBar?.stop();
    }
    logger.info(`Processed ${files.length} ${phaseLabels[phase].toLowerCase()} files.`);
  }

  private readRecords(file: string, summary: EtlSummary): unknown[] {
    if (this.config.transform.onMalformedRecord === "abort") {
      return readJsonRecords(file);
    }
    return readJsonRecords(file, {
      onMalformedLine: (err) => {
        summary.malformedRecordsSkipped++;
        logger.warn(`Skipping malformed record: ${err.message}`);
      },
    });
  }

  private async loadSongFile(
    store: WarehouseStore,
    file: string,
    summary: EtlSummary
  ): Promise<void> {
    const { rows, skipped } = transformSongRecords(
      this.readRecords(file, summary),
      file,
      this.config.transform.onMalformedRecord
    );
    summary.malformedRecordsSkipped += skipped;

    for (const { song, artist } of rows) {
      if (await store.insertSong(song)) summary.songsInserted++;
      if (await store.insertArtist(artist)) summary.artistsInserted++;
    }
  }

  private async loadLogFile(
    store: WarehouseStore,
    file: string,
    summary: EtlSummary
  ): Promise<void> {
    const { rows, skipped } = transformLogRecords(
      this.readRecords(file, summary),
      file,
      this.config.transform.onMalformedRecord
    );
    summary.malformedRecordsSkipped += skipped;

    for (const event of rows) {
      summary.events++;
      await store.insertTime(event.time);
      await store.upsertUser(event.user);

      const reference = await this.resolve(store, event);
      if (reference.songId === null) {
        summary.unresolved++;
      } else {
        summary.resolved++;
      }

      try {
        await store.insertSongPlay({ ...event.songPlay, ...reference });
        summary.playsInserted++;
      } catch (err) {
        if (!(err instanceof StoreConstraintViolation)) throw err;
        summary.duplicatePlaysSkipped++;
        logger.debug(
          `Song play already loaded (${event.songPlay.startTime}, user ${event.songPlay.userId}) in ${path.basename(file)}`
        );
      }
    }
  }

  private async resolve(
    store: WarehouseStore,
    event: PlayEvent
  ): Promise<SongReference> {
    if (event.lookup === null) return RESOLUTION_MISS;
    const reference = await store.findSongReference(event.lookup);
    if (reference.songId === null) {
      logger.debug(
        `No catalog match for "${event.lookup.title}" by "${event.lookup.artistName}" (${event.lookup.duration}s)`
      );
    }
    return reference;
  }
}
