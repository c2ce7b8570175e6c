import winston from "winston";
import { Config } from "../config";
import { Logger, Throttle } from "../utils";
import { SpotifyService, TidalService } from "../services";
import { CheckpointStore } from "./CheckpointStore";
import { PlaylistResolver } from "./PlaylistResolver";
import { SyncDiffer } from "./SyncDiffer";
import { TrackLibrary } from "./TrackLibrary";
import { TransferOrchestrator } from "./TransferOrchestrator";
import { formatCheckpointStatus, formatLibrarySummary } from "./Reports";
import type {
  SourcePlatform,
  SyncRunResult,
  TargetPlatform,
  TransferRunResult,
} from "../types";

export interface PorterOptions {
  libraryFile?: string;
  checkpointFile?: string;
  exportFile?: string;
  batchSize?: number;
  /** Defaults to the configured Spotify client */
  source?: SourcePlatform;
  /** Defaults to the configured TIDAL client */
  target?: TargetPlatform;
  throttle?: Throttle;
}

export interface RunOptions {
  fresh?: boolean;
  recheck?: boolean;
}

/**
 * Entry point shared by the CLI and the scheduled daemon. Platform clients
 * are only built, and credentials only required, by commands that need them.
 */
export class PlaylistPorter {
  private readonly config: Config;
  private readonly logger: winston.Logger;
  private readonly throttle: Throttle;
  private source?: SourcePlatform;
  private target?: TargetPlatform;

  readonly libraryFile: string;
  readonly checkpointFile: string;
  readonly exportFile: string;
  readonly batchSize: number;

  constructor(options: PorterOptions = {}) {
    this.config = Config.getInstance();
    this.logger = Logger.getInstance();
    this.libraryFile = options.libraryFile ?? this.config.libraryFile;
    this.checkpointFile = options.checkpointFile ?? this.config.checkpointFile;
    this.exportFile = options.exportFile ?? this.config.exportFile;
    this.batchSize = options.batchSize ?? this.config.batchSize;
    this.throttle =
      options.throttle ??
      new Throttle({
        searchDelayMs: this.config.searchDelayMs,
        batchDelayMs: this.config.batchDelayMs,
        playlistDelayMs: this.config.playlistDelayMs,
        retryBackoffMs: this.config.retryBackoffMs,
      });
    this.source = options.source;
    this.target = options.target;
  }

  get targetName(): string {
    return this.target?.name ?? "TIDAL";
  }

  get sourceName(): string {
    return this.source?.name ?? "Spotify";
  }

  async transfer(options: RunOptions = {}): Promise<TransferRunResult> {
    const { source, target } = this.platforms();
    const library = await this.openLibrary();

    this.logger.info(`🚀 Starting ${source.name} to ${target.name} transfer`);
    const orchestrator = new TransferOrchestrator(
      {
        source,
        target,
        library,
        checkpoints: new CheckpointStore(this.checkpointFile),
        resolver: this.newResolver(target),
      },
      {
        batchSize: this.batchSize,
        maxRetries: this.config.maxBatchRetries,
        throttle: this.throttle,
      }
    );
    return orchestrator.run(options);
  }

  async sync(options: RunOptions = {}): Promise<SyncRunResult> {
    const { source, target } = this.platforms();
    const library = await this.openLibrary();

    const differ = new SyncDiffer(
      { source, target, library, resolver: this.newResolver(target) },
      {
        batchSize: this.batchSize,
        maxRetries: this.config.maxBatchRetries,
        throttle: this.throttle,
      }
    );
    return differ.syncAll({ recheck: options.recheck });
  }

  async checkpointStatus(): Promise<string[]> {
    const state = await new CheckpointStore(this.checkpointFile).load();
    return formatCheckpointStatus(state, this.checkpointFile);
  }

  async librarySummary(): Promise<string[]> {
    const library = await this.openLibrary();
    return formatLibrarySummary(library, this.targetName);
  }

  async exportUnavailable(): Promise<number> {
    const library = await this.openLibrary();
    const count = await library.exportUnavailable(this.exportFile);
    this.logger.info(`📤 Exported ${count} unavailable tracks to ${this.exportFile}`);
    return count;
  }

  /** Deletes the checkpoint; the library is kept */
  async reset(): Promise<boolean> {
    return new CheckpointStore(this.checkpointFile).clear();
  }

  private openLibrary(): Promise<TrackLibrary> {
    return TrackLibrary.open({
      filePath: this.libraryFile,
      extraPlatforms: this.config.extraPlatforms,
    });
  }

  private newResolver(target: TargetPlatform): PlaylistResolver {
    return new PlaylistResolver(target, {
      throttle: this.throttle,
      maxRetries: this.config.maxBatchRetries,
    });
  }

  private platforms(): { source: SourcePlatform; target: TargetPlatform } {
    if (this.source && this.target) {
      return { source: this.source, target: this.target };
    }

    const credentials = this.config.requirePlatformCredentials();
    const source =
      this.source ??
      new SpotifyService({
        clientId: credentials.spotifyClientId,
        clientSecret: credentials.spotifyClientSecret,
        refreshToken: credentials.spotifyRefreshToken,
      });
    const target =
      this.target ??
      new TidalService(
        {
          clientId: credentials.tidalClientId,
          refreshToken: credentials.tidalRefreshToken,
        },
        { countryCode: this.config.tidalCountryCode }
      );

    this.source = source;
    this.target = target;
    return { source, target };
  }
}
