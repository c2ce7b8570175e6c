import winston from "winston";
import { Logger } from "../utils/Logger";
import { writeFileAtomic, readFileIfExists } from "../utils/AtomicFile";
import { parseCsv, renderCsv, type CsvRow } from "../utils/Csv";
import { NotFoundError, PersistenceError, describeError } from "./Errors";
import type {
  SourceTrack,
  SyncStats,
  TrackRecord,
  UnsyncedQueryOptions,
} from "../types";

const PLAYLIST_ID_SEPARATOR = ",";

export interface TrackLibraryOptions {
  filePath: string;
  /** Platforms tracked besides source and target, e.g. ["soundcloud"] */
  extraPlatforms?: string[];
  now?: () => Date;
}

/**
 * Cross-platform ledger keyed by source track id. Records are created on first
 * sight and only ever updated afterwards; the CSV file is rewritten as a
 * whole on every persist().
 */
export class TrackLibrary {
  private readonly logger: winston.Logger;
  private readonly tracks = new Map<string, TrackRecord>();
  private readonly extraPlatforms: string[];
  private readonly now: () => Date;

  private constructor(
    public readonly filePath: string,
    extraPlatforms: string[],
    now: () => Date
  ) {
    this.logger = Logger.getInstance();
    this.extraPlatforms = extraPlatforms;
    this.now = now;
  }

  static async open(options: TrackLibraryOptions): Promise<TrackLibrary> {
    const contents = await readFileIfExists(options.filePath).catch(
      (error: unknown) => {
        throw new PersistenceError(
          `Could not read library ${options.filePath}: ${describeError(error)}`,
          options.filePath,
          error
        );
      }
    );

    let columns: string[] = [];
    let rows: CsvRow[] = [];
    if (contents !== null) {
      try {
        ({ columns, rows } = parseCsv(contents));
      } catch (error) {
        // Starting from an empty ledger would overwrite the match history
        throw new PersistenceError(
          `Library file ${options.filePath} is not valid CSV: ${describeError(
            error
          )}`,
          options.filePath,
          error
        );
      }
    }

    const platforms = mergePlatforms(
      options.extraPlatforms ?? [],
      platformsFromColumns(columns)
    );
    const library = new TrackLibrary(
      options.filePath,
      platforms,
      options.now ?? (() => new Date())
    );

    for (const row of rows) {
      const record = library.rowToRecord(row);
      if (record) {
        library.tracks.set(record.sourceId, record);
      }
    }

    library.logger.debug(
      `📚 Loaded ${library.tracks.size} tracks from ${options.filePath}`
    );
    return library;
  }

  get size(): number {
    return this.tracks.size;
  }

  get platforms(): string[] {
    return [...this.extraPlatforms];
  }

  getTrack(sourceId: string): TrackRecord | null {
    const record = this.tracks.get(sourceId);
    return record ? cloneRecord(record) : null;
  }

  /**
   * Inserts an unseen track. A known track keeps its data; only its playlist
   * membership grows.
   */
  recordTrack(track: SourceTrack, playlistId?: string): TrackRecord {
    const existing = this.tracks.get(track.id);
    if (existing) {
      if (playlistId) {
        existing.playlistIds.add(playlistId);
      }
      return cloneRecord(existing);
    }

    const record: TrackRecord = {
      sourceId: track.id,
      targetId: null,
      additionalPlatformIds: Object.fromEntries(
        this.extraPlatforms.map((platform) => [platform, null])
      ),
      trackName: track.name,
      artistName: track.artists[0] ?? "Unknown",
      albumName: track.album ?? "",
      playlistIds: new Set(playlistId ? [playlistId] : []),
      sourceAvailable: true,
      targetAvailable: null,
      additionalAvailability: Object.fromEntries(
        this.extraPlatforms.map((platform) => [platform, null])
      ),
      lastSyncedAt: null,
      notes: "",
    };
    this.tracks.set(record.sourceId, record);
    return cloneRecord(record);
  }

  setTargetMatch(sourceId: string, targetId: string | null, found: boolean): void {
    const record = this.requireRecord(sourceId);
    assertMatchConsistent(sourceId, targetId, found);

    record.targetId = targetId;
    record.targetAvailable = found;
    record.lastSyncedAt = this.now().toISOString();
  }

  setPlatformMatch(
    sourceId: string,
    platform: string,
    platformId: string | null,
    found: boolean
  ): void {
    const record = this.requireRecord(sourceId);
    assertMatchConsistent(sourceId, platformId, found);
    if (!this.extraPlatforms.includes(platform)) {
      this.extraPlatforms.push(platform);
    }

    record.additionalPlatformIds[platform] = platformId;
    record.additionalAvailability[platform] = found;
    record.lastSyncedAt = this.now().toISOString();
  }

  /**
   * Members of the playlist with no target id that still need a search:
   * never searched, or confirmed absent when `recheck` is set.
   */
  getUnsyncedTracks(
    playlistId: string,
    options: UnsyncedQueryOptions = {}
  ): TrackRecord[] {
    return this.membersOf(playlistId)
      .filter((record) => TrackLibrary.needsSearch(record, options))
      .map(cloneRecord);
  }

  static needsSearch(
    record: TrackRecord,
    options: UnsyncedQueryOptions = {}
  ): boolean {
    if (record.targetId !== null) {
      return false;
    }
    return record.lastSyncedAt === null || options.recheck === true;
  }

  static isConfirmedAbsent(record: TrackRecord): boolean {
    return (
      record.targetId === null &&
      record.targetAvailable === false &&
      record.lastSyncedAt !== null
    );
  }

  /**
   * Exact check: every member has a target id. When the playlist's current
   * source track ids are given, each must also already be a recorded member.
   */
  isPlaylistSynced(playlistId: string, currentTrackIds?: Iterable<string>): boolean {
    if (currentTrackIds && !this.hasMembers(playlistId, currentTrackIds)) {
      return false;
    }
    return this.membersOf(playlistId).every((record) => record.targetId !== null);
  }

  /** True when every given source track is already a recorded member of the playlist */
  hasMembers(playlistId: string, trackIds: Iterable<string>): boolean {
    for (const trackId of trackIds) {
      const record = this.tracks.get(trackId);
      if (!record || !record.playlistIds.has(playlistId)) {
        return false;
      }
    }
    return true;
  }

  getSyncStats(playlistId?: string): SyncStats {
    const records = playlistId
      ? this.membersOf(playlistId)
      : Array.from(this.tracks.values());

    const stats: SyncStats = { total: records.length, matched: 0, unavailable: 0, pending: 0 };
    for (const record of records) {
      if (record.targetId !== null) {
        stats.matched++;
      } else if (TrackLibrary.isConfirmedAbsent(record)) {
        stats.unavailable++;
      } else {
        stats.pending++;
      }
    }
    return stats;
  }

  getPlatformStats(platform: string): SyncStats {
    const stats: SyncStats = { total: this.tracks.size, matched: 0, unavailable: 0, pending: 0 };
    for (const record of this.tracks.values()) {
      const availability = record.additionalAvailability[platform] ?? null;
      if (availability === true) {
        stats.matched++;
      } else if (availability === false) {
        stats.unavailable++;
      } else {
        stats.pending++;
      }
    }
    return stats;
  }

  getUnavailableTracks(): TrackRecord[] {
    return Array.from(this.tracks.values())
      .filter(TrackLibrary.isConfirmedAbsent)
      .map(cloneRecord);
  }

  /** Writes the confirmed-absent tracks to a separate CSV; returns the row count */
  async exportUnavailable(outputPath: string): Promise<number> {
    const unavailable = this.getUnavailableTracks();
    const csv = renderCsv(
      ["artistName", "trackName", "albumName", "sourceId", "notes"],
      unavailable.map((record) => ({
        artistName: record.artistName,
        trackName: record.trackName,
        albumName: record.albumName,
        sourceId: record.sourceId,
        notes: record.notes,
      }))
    );

    try {
      await writeFileAtomic(outputPath, csv);
    } catch (error) {
      throw new PersistenceError(
        `Could not write export ${outputPath}: ${describeError(error)}`,
        outputPath,
        error
      );
    }
    return unavailable.length;
  }

  async persist(): Promise<void> {
    const csv = renderCsv(
      this.columns(),
      Array.from(this.tracks.values()).map((record) => this.recordToRow(record))
    );

    try {
      await writeFileAtomic(this.filePath, csv);
    } catch (error) {
      throw new PersistenceError(
        `Could not save library ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
    this.logger.debug(`💾 Library saved (${this.tracks.size} tracks)`);
  }

  private membersOf(playlistId: string): TrackRecord[] {
    return Array.from(this.tracks.values()).filter((record) =>
      record.playlistIds.has(playlistId)
    );
  }

  private requireRecord(sourceId: string): TrackRecord {
    const record = this.tracks.get(sourceId);
    if (!record) {
      throw new NotFoundError(
        `Track ${sourceId} is not in the library; record it before storing a match`
      );
    }
    return record;
  }

  private columns(): string[] {
    return [
      "sourceId",
      "targetId",
      ...this.extraPlatforms.map((platform) => `${platform}Id`),
      "trackName",
      "artistName",
      "albumName",
      "playlistIds",
      "sourceAvailable",
      "targetAvailable",
      ...this.extraPlatforms.map((platform) => `${platform}Available`),
      "lastSynced",
      "notes",
    ];
  }

  private recordToRow(record: TrackRecord): CsvRow {
    const row: CsvRow = {
      sourceId: record.sourceId,
      targetId: record.targetId ?? "",
      trackName: record.trackName,
      artistName: record.artistName,
      albumName: record.albumName,
      playlistIds: Array.from(record.playlistIds).sort().join(PLAYLIST_ID_SEPARATOR),
      sourceAvailable: formatBoolean(record.sourceAvailable),
      targetAvailable: formatBoolean(record.targetAvailable),
      lastSynced: record.lastSyncedAt ?? "",
      notes: record.notes,
    };
    for (const platform of this.extraPlatforms) {
      row[`${platform}Id`] = record.additionalPlatformIds[platform] ?? "";
      row[`${platform}Available`] = formatBoolean(
        record.additionalAvailability[platform] ?? null
      );
    }
    return row;
  }

  private rowToRecord(row: CsvRow): TrackRecord | null {
    const sourceId = row.sourceId?.trim();
    if (!sourceId) {
      return null;
    }

    const targetId = row.targetId?.trim() || null;
    const additionalPlatformIds: Record<string, string | null> = {};
    const additionalAvailability: Record<string, boolean | null> = {};
    for (const platform of this.extraPlatforms) {
      additionalPlatformIds[platform] = row[`${platform}Id`]?.trim() || null;
      additionalAvailability[platform] = parseBoolean(row[`${platform}Available`]);
    }

    const playlistIds = (row.playlistIds ?? "")
      .split(PLAYLIST_ID_SEPARATOR)
      .map((id) => id.trim())
      .filter((id) => id.length > 0);

    return {
      sourceId,
      targetId,
      additionalPlatformIds,
      trackName: row.trackName ?? "",
      artistName: row.artistName ?? "",
      albumName: row.albumName ?? "",
      playlistIds: new Set(playlistIds),
      sourceAvailable: parseBoolean(row.sourceAvailable) ?? true,
      // A stored target id always means the track is available
      targetAvailable: targetId ? true : parseBoolean(row.targetAvailable),
      additionalAvailability,
      lastSyncedAt: row.lastSynced?.trim() || null,
      notes: row.notes ?? "",
    };
  }
}

function assertMatchConsistent(
  sourceId: string,
  matchId: string | null,
  found: boolean
): void {
  if (found !== (matchId !== null)) {
    throw new Error(
      `Inconsistent match for track ${sourceId}: found=${found} with id ${matchId ?? "null"}`
    );
  }
}

function cloneRecord(record: TrackRecord): TrackRecord {
  return {
    ...record,
    additionalPlatformIds: { ...record.additionalPlatformIds },
    playlistIds: new Set(record.playlistIds),
    additionalAvailability: { ...record.additionalAvailability },
  };
}

function formatBoolean(value: boolean | null): string {
  if (value === null) {
    return "null";
  }
  return value ? "true" : "false";
}

function parseBoolean(value: string | undefined): boolean | null {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === "null") {
    return null;
  }
  return normalized === "true";
}

const FIXED_ID_COLUMNS = new Set(["sourceId", "targetId"]);

function platformsFromColumns(columns: string[]): string[] {
  return columns
    .filter((column) => column.endsWith("Id") && !FIXED_ID_COLUMNS.has(column))
    .map((column) => column.slice(0, -"Id".length))
    .filter((platform) => platform.length > 0);
}

function mergePlatforms(configured: string[], fromFile: string[]): string[] {
  return Array.from(new Set([...configured, ...fromFile]));
}
