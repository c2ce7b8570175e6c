import winston from "winston";
import { Logger } from "../utils/Logger";
import { Throttle, withRetry } from "../utils/Throttle";
import { CheckpointStore } from "./CheckpointStore";
import { PlaylistResolver } from "./PlaylistResolver";
import { TrackLibrary } from "./TrackLibrary";
import { TrackWriter } from "./TrackWriter";
import { describeError, isFatalError } from "./Errors";
import type {
  CheckpointState,
  PlaylistProgress,
  PlaylistTransferResult,
  SourcePlatform,
  SourcePlaylistSummary,
  TargetPlatform,
  TransferRunResult,
} from "../types";

export interface TransferDependencies {
  source: SourcePlatform;
  target: TargetPlatform;
  library: TrackLibrary;
  checkpoints: CheckpointStore;
  resolver: PlaylistResolver;
}

export interface TransferSettings {
  batchSize: number;
  maxRetries: number;
  throttle: Throttle;
  now?: () => Date;
}

export interface TransferOptions {
  /** Ignore any saved checkpoint */
  fresh?: boolean;
  /** Search again for tracks previously confirmed absent */
  recheck?: boolean;
}

/**
 * Drives a full transfer of every owned source playlist. Progress lives in
 * the checkpoint: a run that is interrupted resumes at the last saved batch,
 * and the checkpoint is removed once every playlist has completed.
 */
export class TransferOrchestrator {
  private readonly logger: winston.Logger;
  private readonly now: () => Date;

  constructor(
    private readonly deps: TransferDependencies,
    private readonly settings: TransferSettings
  ) {
    this.logger = Logger.getInstance();
    this.now = settings.now ?? (() => new Date());
  }

  async run(options: TransferOptions = {}): Promise<TransferRunResult> {
    const { source, checkpoints } = this.deps;

    const retry = {
      maxRetries: this.settings.maxRetries,
      throttle: this.settings.throttle,
      logger: this.logger,
    };
    const userId = await withRetry(() => source.getCurrentUserId(), {
      ...retry,
      label: `Fetching ${source.name} user`,
    });

    this.logger.info(`📡 Fetching owned ${source.name} playlists...`);
    const playlists = await withRetry(() => source.listOwnedPlaylists(), {
      ...retry,
      label: `Listing ${source.name} playlists`,
    });
    this.logger.info(`📋 Found ${playlists.length} owned playlists`);

    let state = options.fresh ? null : await checkpoints.load();
    if (state && state.sourceUserId !== null && state.sourceUserId !== userId) {
      this.logger.warn(
        `⚠️ Checkpoint belongs to ${source.name} user ${state.sourceUserId}, not ${userId}; starting fresh`
      );
      state = null;
    }
    const resumed = state !== null;
    if (state) {
      checkpoints.reconcile(state, playlists);
      const counts = CheckpointStore.countByStatus(state);
      this.logger.info(
        `📂 Resuming from checkpoint: ${counts.completed}/${state.playlists.length} playlists completed`
      );
    } else {
      if (options.fresh) {
        this.logger.info("⚠️ Starting fresh (ignoring any existing checkpoint)");
      }
      state = checkpoints.init(playlists, userId);
    }
    await checkpoints.save(state);

    const summaries = new Map(playlists.map((playlist) => [playlist.id, playlist]));
    const results: PlaylistTransferResult[] = [];
    const queue = this.orderForProcessing(state);

    for (const progress of state.playlists) {
      if (progress.status === "completed") {
        this.logger.info(`⏭️ Skipping already completed: ${progress.name}`);
        results.push(toResult(progress, "skipped", 0));
      }
    }

    for (let i = 0; i < queue.length; i++) {
      const progress = queue[i];
      const summary = summaries.get(progress.sourcePlaylistId);
      if (!summary) {
        continue;
      }

      this.logger.info(
        `🎵 Playlist ${i + 1}/${queue.length}: ${progress.name} (${summary.trackIds.length} tracks)`
      );
      results.push(
        await this.transferPlaylist(state, progress, summary, options.recheck === true)
      );

      if (i < queue.length - 1) {
        await this.settings.throttle.betweenPlaylists();
      }
    }

    const checkpointCleared = CheckpointStore.isFinished(state);
    if (checkpointCleared) {
      await checkpoints.clear();
      this.logger.info("🧹 All playlists completed, checkpoint cleared");
    } else {
      await checkpoints.save(state);
    }

    const completed = results.filter((result) => result.status === "completed");
    const failed = results.filter((result) => result.status === "failed");
    return {
      resumed,
      playlists: results,
      completed,
      failed,
      totalFound: completed.reduce((sum, result) => sum + result.found, 0),
      totalNotFound: completed.reduce((sum, result) => sum + result.notFound, 0),
      checkpointCleared,
    };
  }

  /** The interrupted playlist first, then everything not yet completed, in order */
  private orderForProcessing(state: CheckpointState): PlaylistProgress[] {
    const open = state.playlists.filter((progress) => progress.status !== "completed");
    return [
      ...open.filter((progress) => progress.status === "in_progress"),
      ...open.filter((progress) => progress.status !== "in_progress"),
    ];
  }

  private async transferPlaylist(
    state: CheckpointState,
    progress: PlaylistProgress,
    summary: SourcePlaylistSummary,
    recheck: boolean
  ): Promise<PlaylistTransferResult> {
    const { source, target, library, checkpoints, resolver } = this.deps;

    if (summary.trackIds.length === 0) {
      this.logger.info(`⏭️ Skipping empty playlist: ${progress.name}`);
      progress.totalTracks = 0;
      progress.status = "completed";
      await checkpoints.save(state);
      return toResult(progress, "completed", 0);
    }

    progress.name = summary.name;
    progress.status = "in_progress";
    progress.error = null;
    await checkpoints.save(state);

    const writer = new TrackWriter(library, target, {
      maxRetries: this.settings.maxRetries,
      throttle: this.settings.throttle,
      recheck,
    });
    let added = 0;

    try {
      const tracks = await withRetry(() => source.listPlaylistTracks(summary.id), {
        maxRetries: this.settings.maxRetries,
        throttle: this.settings.throttle,
        label: `Fetching tracks of "${summary.name}"`,
        logger: this.logger,
      });

      if (tracks.length === 0) {
        this.logger.info(`⏭️ No tracks retrieved, nothing to transfer: ${progress.name}`);
        progress.totalTracks = 0;
        progress.processedTrackCount = 0;
        progress.status = "completed";
        await checkpoints.save(state);
        return toResult(progress, "completed", 0);
      }

      progress.totalTracks = tracks.length;
      // The source playlist may have shrunk since the last run
      progress.processedTrackCount = Math.min(progress.processedTrackCount, tracks.length);

      let created = false;
      if (!progress.targetPlaylistId) {
        const resolution = await resolver.resolveOrCreate(
          summary.name,
          `Transferred from ${source.name} - ${tracks.length} tracks - ${this.now()
            .toISOString()
            .slice(0, 10)}`
        );
        progress.targetPlaylistId = resolution.playlistId;
        created = resolution.created;
        // Saved before any track moves so a crash never creates a second playlist
        await checkpoints.save(state);
      }
      const targetPlaylistId = progress.targetPlaylistId;

      const present = new Set<string>(
        created
          ? []
          : await withRetry(() => target.listPlaylistTrackIds(targetPlaylistId), {
              maxRetries: this.settings.maxRetries,
              throttle: this.settings.throttle,
              label: `Reading ${target.name} playlist contents`,
              logger: this.logger,
            })
      );
      if (present.size > 0) {
        this.logger.info(`   Existing playlist has ${present.size} tracks`);
      }

      if (progress.processedTrackCount > 0) {
        this.logger.info(
          `📍 Resuming from track ${progress.processedTrackCount + 1}/${tracks.length}`
        );
      }

      let pending: string[] = [];
      let found = 0;
      let notFound = 0;
      let sinceFlush = 0;

      const flush = async (processedCount: number) => {
        if (pending.length > 0) {
          await writer.writeBatch(targetPlaylistId, pending);
          pending.forEach((id) => present.add(id));
          added += pending.length;
        }
        await library.persist();
        progress.processedTrackCount = processedCount;
        progress.tracksFound += found;
        progress.tracksNotFound += notFound;
        await checkpoints.save(state);
        pending = [];
        found = 0;
        notFound = 0;
        sinceFlush = 0;
      };

      for (let index = progress.processedTrackCount; index < tracks.length; index++) {
        const record = library.recordTrack(tracks[index], summary.id);
        const outcome = await writer.matchTrack(record);

        if (outcome.targetId !== null) {
          found++;
          if (!present.has(outcome.targetId) && !pending.includes(outcome.targetId)) {
            pending.push(outcome.targetId);
          } else {
            this.logger.debug(
              `⏭️ Already in playlist: ${record.artistName} - ${record.trackName}`
            );
          }
        } else {
          notFound++;
        }

        sinceFlush++;
        if (sinceFlush >= this.settings.batchSize) {
          await flush(index + 1);
        }
      }
      await flush(tracks.length);

      progress.status = "completed";
      await checkpoints.save(state);

      this.logger.info(
        `✅ Completed: ${progress.name} (found ${progress.tracksFound}/${tracks.length}, not found ${progress.tracksNotFound})`
      );
      return toResult(progress, "completed", added);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }

      progress.status = "failed";
      progress.error = describeError(error);
      this.logger.error(`❌ Playlist "${progress.name}" failed: ${progress.error}`);
      await library.persist();
      await checkpoints.save(state);
      return toResult(progress, "failed", added);
    }
  }
}

function toResult(
  progress: PlaylistProgress,
  status: PlaylistTransferResult["status"],
  added: number
): PlaylistTransferResult {
  const result: PlaylistTransferResult = {
    sourcePlaylistId: progress.sourcePlaylistId,
    name: progress.name,
    status,
    targetPlaylistId: progress.targetPlaylistId,
    total: progress.totalTracks,
    found: progress.tracksFound,
    notFound: progress.tracksNotFound,
    added,
  };
  if (progress.error) {
    result.error = progress.error;
  }
  return result;
}
