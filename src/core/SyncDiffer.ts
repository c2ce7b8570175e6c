import winston from "winston";
import { Logger } from "../utils/Logger";
import { Throttle, withRetry } from "../utils/Throttle";
import { PlaylistResolver } from "./PlaylistResolver";
import { TrackLibrary } from "./TrackLibrary";
import { TrackWriter } from "./TrackWriter";
import { describeError, isFatalError } from "./Errors";
import type {
  PlaylistSyncResult,
  SourcePlatform,
  SourcePlaylistSummary,
  SyncRunResult,
  TargetPlatform,
} from "../types";

export interface SyncDependencies {
  source: SourcePlatform;
  target: TargetPlatform;
  library: TrackLibrary;
  resolver: PlaylistResolver;
}

export interface SyncSettings {
  batchSize: number;
  maxRetries: number;
  throttle: Throttle;
  now?: () => Date;
}

export interface SyncOptions {
  recheck?: boolean;
}

/**
 * Incremental sync: only what changed since the library last saw a playlist
 * reaches the target. A playlist whose tracks are all matched is skipped
 * without a single remote call.
 */
export class SyncDiffer {
  private readonly logger: winston.Logger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: SyncDependencies,
    private readonly settings: SyncSettings
  ) {
    this.logger = Logger.getInstance();
    this.now = settings.now ?? (() => new Date());
  }

  async syncAll(options: SyncOptions = {}): Promise<SyncRunResult> {
    const { source } = this.deps;

    this.logger.info(`🔄 Syncing owned ${source.name} playlists...`);
    const playlists = await withRetry(() => source.listOwnedPlaylists(), {
      maxRetries: this.settings.maxRetries,
      throttle: this.settings.throttle,
      label: `Listing ${source.name} playlists`,
      logger: this.logger,
    });

    const results: PlaylistSyncResult[] = [];
    let pauseBeforeNext = false;
    for (const playlist of playlists) {
      if (pauseBeforeNext) {
        await this.settings.throttle.betweenPlaylists();
      }
      const result = await this.syncPlaylist(playlist, options);
      results.push(result);
      pauseBeforeNext = result.status === "synced" || result.status === "failed";
    }

    const summary: SyncRunResult = {
      playlists: results,
      totalAdded: results.reduce((sum, result) => sum + result.added, 0),
      totalFound: results.reduce((sum, result) => sum + result.found, 0),
      totalNotFound: results.reduce((sum, result) => sum + result.notFound, 0),
      failed: results.filter((result) => result.status === "failed"),
    };

    this.logger.info(
      `✅ Sync finished: ${summary.totalAdded} tracks added across ${playlists.length} playlists` +
        (summary.failed.length > 0 ? `, ${summary.failed.length} failed` : "")
    );
    return summary;
  }

  /**
   * Nothing to do without a remote call: every current source track is a
   * known member and none of them still needs a search.
   */
  private isUpToDate(playlist: SourcePlaylistSummary, options: SyncOptions): boolean {
    const { library } = this.deps;
    if (library.isPlaylistSynced(playlist.id, playlist.trackIds)) {
      return true;
    }
    return (
      library.hasMembers(playlist.id, playlist.trackIds) &&
      library.getUnsyncedTracks(playlist.id, { recheck: options.recheck }).length === 0
    );
  }

  async syncPlaylist(
    playlist: SourcePlaylistSummary,
    options: SyncOptions = {}
  ): Promise<PlaylistSyncResult> {
    const { source, target, library, resolver } = this.deps;
    const result: PlaylistSyncResult = {
      sourcePlaylistId: playlist.id,
      name: playlist.name,
      status: "skipped",
      targetPlaylistId: null,
      added: 0,
      addedTracks: [],
      found: 0,
      notFound: 0,
    };

    if (playlist.trackIds.length === 0) {
      this.logger.debug(`⏭️ Skipping empty playlist: ${playlist.name}`);
      return result;
    }
    if (this.isUpToDate(playlist, options)) {
      this.logger.debug(`✓ Up to date: ${playlist.name}`);
      result.status = "up_to_date";
      return result;
    }

    this.logger.info(`🔄 Syncing: ${playlist.name}`);
    const writer = new TrackWriter(library, target, {
      maxRetries: this.settings.maxRetries,
      throttle: this.settings.throttle,
      recheck: options.recheck,
    });
    const retry = {
      maxRetries: this.settings.maxRetries,
      throttle: this.settings.throttle,
      logger: this.logger,
    };

    try {
      const tracks = await withRetry(() => source.listPlaylistTracks(playlist.id), {
        ...retry,
        label: `Fetching tracks of "${playlist.name}"`,
      });

      const present = new Set<string>();
      const labels = new Map<string, string>();
      let pending: string[] = [];
      let sinceFlush = 0;

      // Resolved on the first write so a playlist with no matches never reaches the target
      const resolveTarget = async (): Promise<string> => {
        if (result.targetPlaylistId) {
          return result.targetPlaylistId;
        }
        const resolution = await resolver.resolveOrCreate(
          playlist.name,
          `Synced from ${source.name} - ${tracks.length} tracks - ${this.now()
            .toISOString()
            .slice(0, 10)}`
        );
        if (!resolution.created) {
          const existing = await withRetry(
            () => target.listPlaylistTrackIds(resolution.playlistId),
            { ...retry, label: `Reading ${target.name} playlist contents` }
          );
          existing.forEach((id) => present.add(id));
        }
        result.targetPlaylistId = resolution.playlistId;
        return resolution.playlistId;
      };

      const flush = async () => {
        if (pending.length > 0) {
          const playlistId = await resolveTarget();
          const missing = pending.filter((id) => !present.has(id));
          if (missing.length > 0) {
            await writer.writeBatch(playlistId, missing);
            missing.forEach((id) => present.add(id));
            result.added += missing.length;
            result.addedTracks.push(...missing.map((id) => labels.get(id) ?? id));
          }
        }
        await library.persist();
        pending = [];
        sinceFlush = 0;
      };

      for (const track of tracks) {
        const record = library.recordTrack(track, playlist.id);
        const outcome = await writer.matchTrack(record);
        if (outcome.targetId === null) {
          result.notFound++;
        } else {
          result.found++;
          if (!present.has(outcome.targetId) && !pending.includes(outcome.targetId)) {
            pending.push(outcome.targetId);
            labels.set(outcome.targetId, `${record.artistName} - ${record.trackName}`);
          }
        }

        sinceFlush++;
        if (sinceFlush >= this.settings.batchSize) {
          await flush();
        }
      }
      await flush();

      result.status = "synced";
      if (result.targetPlaylistId === null) {
        this.logger.info(`   No ${target.name} matches for ${playlist.name}`);
      } else {
        this.logger.info(
          `✅ Synced ${playlist.name}: ${result.added} added, ${result.notFound} not on ${target.name}`
        );
      }
      return result;
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }

      await library.persist();
      result.status = "failed";
      result.error = describeError(error);
      this.logger.error(`❌ Sync of "${playlist.name}" failed: ${result.error}`);
      return result;
    }
  }
}
