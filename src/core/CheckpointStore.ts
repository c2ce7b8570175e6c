import winston from "winston";
import { z } from "zod";
import { Logger } from "../utils/Logger";
import {
  readFileIfExists,
  removeFileIfExists,
  writeFileAtomic,
} from "../utils/AtomicFile";
import { PersistenceError, describeError } from "./Errors";
import type {
  CheckpointState,
  PlaylistProgress,
  PlaylistStatus,
  SourcePlaylistSummary,
} from "../types";

const PlaylistProgressSchema = z
  .object({
    sourcePlaylistId: z.string().min(1),
    name: z.string(),
    targetPlaylistId: z.string().min(1).nullable(),
    totalTracks: z.number().int().nonnegative(),
    processedTrackCount: z.number().int().nonnegative(),
    tracksFound: z.number().int().nonnegative(),
    tracksNotFound: z.number().int().nonnegative(),
    status: z.enum(["pending", "in_progress", "completed", "failed"]),
    error: z.string().nullable(),
  })
  .refine((progress) => progress.processedTrackCount <= progress.totalTracks, {
    message: "processedTrackCount exceeds totalTracks",
  });

const CheckpointSchema = z
  .object({
    version: z.literal(1),
    startedAt: z.string().datetime(),
    updatedAt: z.string().datetime(),
    sourceUserId: z.string().nullable(),
    totalPlaylists: z.number().int().nonnegative(),
    playlists: z.array(PlaylistProgressSchema),
  })
  .refine(
    (state) =>
      state.playlists.filter((progress) => progress.status === "in_progress")
        .length <= 1,
    { message: "more than one playlist is in progress" }
  );

export type StatusCounts = Record<PlaylistStatus, number>;

export interface ReconcileResult {
  added: string[];
  removed: string[];
}

/**
 * JSON checkpoint for a transfer run. A missing or unreadable file means
 * "no checkpoint"; writes replace the file atomically.
 */
export class CheckpointStore {
  private readonly logger: winston.Logger;
  private readonly now: () => Date;

  constructor(
    public readonly filePath: string,
    options: { now?: () => Date } = {}
  ) {
    this.logger = Logger.getInstance();
    this.now = options.now ?? (() => new Date());
  }

  async load(): Promise<CheckpointState | null> {
    let contents: string | null;
    try {
      contents = await readFileIfExists(this.filePath);
    } catch (error) {
      this.logger.warn(
        `⚠️ Could not read checkpoint ${this.filePath}, starting fresh: ${describeError(error)}`
      );
      return null;
    }

    if (contents === null) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(contents);
    } catch (error) {
      this.logger.warn(
        `⚠️ Checkpoint file corrupted, starting fresh: ${describeError(error)}`
      );
      return null;
    }

    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("⚠️ Checkpoint file is invalid, starting fresh", {
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      });
      return null;
    }

    return parsed.data;
  }

  init(
    playlists: SourcePlaylistSummary[],
    sourceUserId: string | null = null
  ): CheckpointState {
    const timestamp = this.now().toISOString();
    return {
      version: 1,
      startedAt: timestamp,
      updatedAt: timestamp,
      sourceUserId,
      totalPlaylists: playlists.length,
      playlists: playlists.map(newProgress),
    };
  }

  async save(state: CheckpointState): Promise<void> {
    state.updatedAt = this.now().toISOString();
    state.totalPlaylists = state.playlists.length;

    try {
      await writeFileAtomic(this.filePath, JSON.stringify(state, null, 2));
    } catch (error) {
      throw new PersistenceError(
        `Could not save checkpoint ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
  }

  async clear(): Promise<boolean> {
    try {
      return await removeFileIfExists(this.filePath);
    } catch (error) {
      throw new PersistenceError(
        `Could not delete checkpoint ${this.filePath}: ${describeError(error)}`,
        this.filePath,
        error
      );
    }
  }

  /**
   * Aligns a loaded checkpoint with the playlists the user owns now: progress
   * for playlists that disappeared is dropped, new ones are appended as
   * pending. Existing entries keep their order and progress.
   */
  reconcile(
    state: CheckpointState,
    playlists: SourcePlaylistSummary[]
  ): ReconcileResult {
    const current = new Map(playlists.map((playlist) => [playlist.id, playlist]));
    const known = new Set(state.playlists.map((progress) => progress.sourcePlaylistId));

    const removed = state.playlists
      .filter((progress) => !current.has(progress.sourcePlaylistId))
      .map((progress) => progress.sourcePlaylistId);
    const additions = playlists.filter((playlist) => !known.has(playlist.id));

    state.playlists = [
      ...state.playlists.filter((progress) => current.has(progress.sourcePlaylistId)),
      ...additions.map(newProgress),
    ];
    state.totalPlaylists = state.playlists.length;

    if (removed.length > 0) {
      this.logger.warn(
        `⚠️ Dropped ${removed.length} playlist(s) from checkpoint that are no longer owned`
      );
    }
    if (additions.length > 0) {
      this.logger.info(`➕ Added ${additions.length} new playlist(s) to checkpoint`);
    }

    return { added: additions.map((playlist) => playlist.id), removed };
  }

  static countByStatus(state: CheckpointState): StatusCounts {
    const counts: StatusCounts = {
      pending: 0,
      in_progress: 0,
      completed: 0,
      failed: 0,
    };
    for (const progress of state.playlists) {
      counts[progress.status]++;
    }
    return counts;
  }

  static isFinished(state: CheckpointState): boolean {
    return state.playlists.every((progress) => progress.status === "completed");
  }
}

function newProgress(playlist: SourcePlaylistSummary): PlaylistProgress {
  return {
    sourcePlaylistId: playlist.id,
    name: playlist.name,
    targetPlaylistId: null,
    totalTracks: playlist.trackIds.length,
    processedTrackCount: 0,
    tracksFound: 0,
    tracksNotFound: 0,
    status: "pending",
    error: null,
  };
}
