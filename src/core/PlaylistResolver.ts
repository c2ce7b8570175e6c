import winston from "winston";
import { Logger } from "../utils/Logger";
import { Throttle, withRetry } from "../utils/Throttle";
import type { TargetPlatform } from "../types";

export interface PlaylistResolution {
  playlistId: string;
  created: boolean;
}

/**
 * Maps source playlist names onto target playlists. The target's playlists
 * are listed once per run; afterwards lookups are local and every playlist
 * this resolver creates is added to the cache, so one name never yields two
 * target playlists.
 */
export class PlaylistResolver {
  private readonly logger: winston.Logger;
  private cache: Map<string, string> | null = null;

  constructor(
    private readonly target: TargetPlatform,
    private readonly options: { throttle?: Throttle; maxRetries?: number } = {}
  ) {
    this.logger = Logger.getInstance();
  }

  async buildCache(): Promise<number> {
    this.logger.info(`📂 Building ${this.target.name} playlist cache...`);

    const playlists = await withRetry(() => this.target.listPlaylists(), {
      maxRetries: this.options.maxRetries ?? 3,
      throttle: this.options.throttle ?? new Throttle(),
      label: `Listing ${this.target.name} playlists`,
      logger: this.logger,
    });

    const cache = new Map<string, string>();
    for (const playlist of playlists) {
      // First listed wins when the target already holds duplicate names
      if (!cache.has(playlist.name)) {
        cache.set(playlist.name, playlist.id);
      }
    }
    this.cache = cache;

    this.logger.info(`📂 Cached ${cache.size} ${this.target.name} playlists`);
    return cache.size;
  }

  findExisting(name: string): string | null {
    if (!this.cache) {
      throw new Error("Playlist cache not built; call buildCache() first");
    }
    return this.cache.get(name) ?? null;
  }

  async resolveOrCreate(
    name: string,
    description: string = ""
  ): Promise<PlaylistResolution> {
    if (!this.cache) {
      await this.buildCache();
    }

    const existing = this.findExisting(name);
    if (existing) {
      this.logger.info(`📂 Reusing existing ${this.target.name} playlist: ${name}`);
      return { playlistId: existing, created: false };
    }

    // Not retried: a create that timed out may still have happened remotely
    const playlistId = await this.target.createPlaylist(name, description);
    this.cache?.set(name, playlistId);

    this.logger.info(
      `✅ Created ${this.target.name} playlist "${name}" (ID: ${playlistId})`
    );
    return { playlistId, created: true };
  }
}
