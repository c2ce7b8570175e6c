import winston from "winston";
import { Logger } from "../utils/Logger";
import { Throttle, withRetry } from "../utils/Throttle";
import { TrackLibrary } from "./TrackLibrary";
import {
  BatchFailure,
  TransientRemoteError,
  describeError,
} from "./Errors";
import type { TargetPlatform, TrackRecord } from "../types";

export interface TrackWriterSettings {
  maxRetries: number;
  throttle: Throttle;
  recheck?: boolean;
}

export interface MatchOutcome {
  targetId: string | null;
  /** False when the library already knew the answer */
  searched: boolean;
}

/**
 * Matching and batched writing shared by full transfers and incremental
 * syncs. Matches are recorded in the library; persisting is left to the
 * caller so it can line up with its own progress bookkeeping.
 */
export class TrackWriter {
  private readonly logger: winston.Logger;

  constructor(
    private readonly library: TrackLibrary,
    private readonly target: TargetPlatform,
    private readonly settings: TrackWriterSettings
  ) {
    this.logger = Logger.getInstance();
  }

  async matchTrack(record: TrackRecord): Promise<MatchOutcome> {
    if (record.targetId !== null) {
      return { targetId: record.targetId, searched: false };
    }
    if (!TrackLibrary.needsSearch(record, { recheck: this.settings.recheck })) {
      this.logger.debug(
        `⏭️ Not on ${this.target.name} (known): ${record.artistName} - ${record.trackName}`
      );
      return { targetId: null, searched: false };
    }

    const label = `${record.artistName} - ${record.trackName}`;
    let targetId: string | null;
    try {
      targetId = await withRetry(
        async () => {
          try {
            return await this.target.searchTrack({
              trackName: record.trackName,
              artistName: record.artistName,
              albumName: record.albumName || undefined,
            });
          } finally {
            await this.settings.throttle.afterSearch();
          }
        },
        {
          maxRetries: this.settings.maxRetries,
          throttle: this.settings.throttle,
          label: `Search for "${label}"`,
          logger: this.logger,
        }
      );
    } catch (error) {
      if (error instanceof TransientRemoteError) {
        throw new BatchFailure(
          `Search for "${label}" failed after ${this.settings.maxRetries + 1} attempts: ${error.message}`,
          this.settings.maxRetries + 1,
          [],
          error
        );
      }
      throw error;
    }

    this.library.setTargetMatch(record.sourceId, targetId, targetId !== null);
    if (targetId === null) {
      this.logger.debug(`❌ Not found: ${label}`);
    }
    return { targetId, searched: true };
  }

  /**
   * Adds `trackIds` in one call, retrying the ids that did not land. Throws
   * BatchFailure once the retries are spent.
   */
  async writeBatch(playlistId: string, trackIds: string[]): Promise<void> {
    if (trackIds.length === 0) {
      return;
    }

    const attempts = this.settings.maxRetries + 1;
    let remaining = [...trackIds];
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        const retryAfterMs =
          lastError instanceof TransientRemoteError ? lastError.retryAfterMs : undefined;
        this.logger.warn(
          `⚠️ Batch add failed, retrying ${remaining.length} tracks (attempt ${attempt}/${attempts})`
        );
        await this.settings.throttle.beforeRetry(attempt - 1, retryAfterMs);
      }

      try {
        const result = await this.target.addTracks(playlistId, remaining);
        if (result.status === "success") {
          this.logger.debug(`➕ Added ${remaining.length} tracks to ${playlistId}`);
          return;
        }

        const failed = new Set(result.failedIds);
        remaining = remaining.filter((id) => failed.has(id));
        if (remaining.length === 0) {
          return;
        }
        lastError = new TransientRemoteError(
          `${remaining.length} of ${trackIds.length} tracks were not added`
        );
      } catch (error) {
        if (!(error instanceof TransientRemoteError)) {
          throw error;
        }
        lastError = error;
      } finally {
        await this.settings.throttle.afterBatch();
      }
    }

    throw new BatchFailure(
      `Adding ${remaining.length} tracks to playlist ${playlistId} failed after ${attempts} attempts: ${describeError(lastError)}`,
      attempts,
      remaining,
      lastError
    );
  }
}
