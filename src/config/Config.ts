export interface PlatformCredentials {
  spotifyClientId: string;
  spotifyClientSecret: string;
  spotifyRefreshToken: string;
  tidalClientId: string;
  tidalRefreshToken: string;
}

export class Config {
  private static instance: Config | undefined;

  // Spotify (source) Configuration
  public readonly spotifyClientId: string;
  public readonly spotifyClientSecret: string;
  public readonly spotifyRefreshToken: string;

  // TIDAL (target) Configuration
  public readonly tidalClientId: string;
  public readonly tidalRefreshToken: string;
  public readonly tidalCountryCode: string;

  // Storage Configuration
  public readonly libraryFile: string;
  public readonly checkpointFile: string;
  public readonly exportFile: string;
  public readonly extraPlatforms: string[];

  // Transfer Configuration
  public readonly batchSize: number;
  public readonly maxBatchRetries: number;
  public readonly searchDelayMs: number;
  public readonly batchDelayMs: number;
  public readonly playlistDelayMs: number;
  public readonly retryBackoffMs: number;

  // Scheduled sync Configuration
  public readonly cronSchedule: string;
  public readonly runOnStartup: boolean;
  public readonly journalDir: string | null;

  // Logging
  public readonly logLevel: string;
  public readonly logToFile: boolean;

  private constructor() {
    // Credentials are optional here: --status, --library, --export and
    // --reset never reach the platforms
    this.spotifyClientId = this.getEnvVar("SPOTIFY_CLIENT_ID", "");
    this.spotifyClientSecret = this.getEnvVar("SPOTIFY_CLIENT_SECRET", "");
    this.spotifyRefreshToken = this.getEnvVar("SPOTIFY_REFRESH_TOKEN", "");

    this.tidalClientId = this.getEnvVar("TIDAL_CLIENT_ID", "");
    this.tidalRefreshToken = this.getEnvVar("TIDAL_REFRESH_TOKEN", "");
    this.tidalCountryCode = this.validateCountryCode(
      this.getEnvVar("TIDAL_COUNTRY_CODE", "US")
    );

    this.libraryFile = this.getEnvVar("LIBRARY_FILE", "data/music_library.csv");
    this.checkpointFile = this.getEnvVar(
      "CHECKPOINT_FILE",
      "data/transfer_checkpoint.json"
    );
    this.exportFile = this.getEnvVar(
      "EXPORT_FILE",
      "data/unavailable_on_target.csv"
    );
    // Set but empty means no extra platform columns
    this.extraPlatforms = this.validatePlatformList(
      process.env.EXTRA_PLATFORMS ?? "soundcloud"
    );

    this.batchSize = this.validatePositiveInteger(
      this.getEnvVar("BATCH_SIZE", "50"),
      "BATCH_SIZE",
      1,
      100
    );
    this.maxBatchRetries = this.validatePositiveInteger(
      this.getEnvVar("MAX_BATCH_RETRIES", "3"),
      "MAX_BATCH_RETRIES",
      0,
      10
    );
    this.searchDelayMs = this.validatePositiveInteger(
      this.getEnvVar("SEARCH_DELAY_MS", "1500"),
      "SEARCH_DELAY_MS",
      0
    );
    this.batchDelayMs = this.validatePositiveInteger(
      this.getEnvVar("BATCH_DELAY_MS", "3000"),
      "BATCH_DELAY_MS",
      0
    );
    this.playlistDelayMs = this.validatePositiveInteger(
      this.getEnvVar("PLAYLIST_DELAY_MS", "5000"),
      "PLAYLIST_DELAY_MS",
      0
    );
    this.retryBackoffMs = this.validatePositiveInteger(
      this.getEnvVar("RETRY_BACKOFF_MS", "5000"),
      "RETRY_BACKOFF_MS",
      0
    );

    this.cronSchedule = this.validateCronSchedule(
      this.getEnvVar("CRON_SCHEDULE", "0 9 * * *")
    );
    this.runOnStartup = this.getBooleanEnvVar("RUN_ON_STARTUP", false);
    this.journalDir = this.getEnvVar("JOURNAL_DIR", "") || null;

    this.logLevel = this.validateLogLevel(this.getEnvVar("LOG_LEVEL", "info"));
    this.logToFile = this.getBooleanEnvVar("LOG_TO_FILE", true);
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config();
    }
    return Config.instance;
  }

  // Drops the cached instance so the next getInstance() re-reads the environment
  public static reload(): Config {
    Config.instance = undefined;
    return Config.getInstance();
  }

  public requirePlatformCredentials(): PlatformCredentials {
    const required: Array<[string, string]> = [
      ["SPOTIFY_CLIENT_ID", this.spotifyClientId],
      ["SPOTIFY_CLIENT_SECRET", this.spotifyClientSecret],
      ["SPOTIFY_REFRESH_TOKEN", this.spotifyRefreshToken],
      ["TIDAL_CLIENT_ID", this.tidalClientId],
      ["TIDAL_REFRESH_TOKEN", this.tidalRefreshToken],
    ];

    const missingVars = required
      .filter(([, value]) => !value)
      .map(([name]) => name);

    if (missingVars.length > 0) {
      throw new Error(
        `Missing required environment variables: ${missingVars.join(", ")}\n` +
          "Please check your .env file or environment configuration."
      );
    }

    return {
      spotifyClientId: this.spotifyClientId,
      spotifyClientSecret: this.spotifyClientSecret,
      spotifyRefreshToken: this.spotifyRefreshToken,
      tidalClientId: this.tidalClientId,
      tidalRefreshToken: this.tidalRefreshToken,
    };
  }

  private getEnvVar(name: string, defaultValue?: string): string {
    const value = process.env[name];
    if (!value) {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      throw new Error(`Environment variable ${name} is required`);
    }
    return value.trim();
  }

  private getBooleanEnvVar(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (!value) {
      return defaultValue;
    }
    const lowerValue = value.toLowerCase().trim();
    if (lowerValue === "true" || lowerValue === "1" || lowerValue === "yes") {
      return true;
    }
    if (lowerValue === "false" || lowerValue === "0" || lowerValue === "no") {
      return false;
    }
    throw new Error(
      `Invalid boolean value for ${name}: ${value}. Use true/false, 1/0, or yes/no.`
    );
  }

  private validatePositiveInteger(
    value: string,
    varName: string,
    min: number = 1,
    max?: number
  ): number {
    const num = parseInt(value, 10);
    if (isNaN(num)) {
      throw new Error(`${varName} must be a valid integer, got: ${value}`);
    }
    if (num < min) {
      throw new Error(`${varName} must be at least ${min}, got: ${num}`);
    }
    if (max !== undefined && num > max) {
      throw new Error(`${varName} must be at most ${max}, got: ${num}`);
    }
    return num;
  }

  private validateCountryCode(code: string): string {
    const upper = code.toUpperCase();
    if (!/^[A-Z]{2}$/.test(upper)) {
      throw new Error(
        `Invalid TIDAL_COUNTRY_CODE: ${code}. Must be a two-letter ISO country code`
      );
    }
    return upper;
  }

  private validatePlatformList(value: string): string[] {
    const platforms = value
      .split(",")
      .map((platform) => platform.trim().toLowerCase())
      .filter((platform) => platform.length > 0);

    for (const platform of platforms) {
      if (!/^[a-z][a-z0-9]*$/.test(platform)) {
        throw new Error(
          `Invalid platform name in EXTRA_PLATFORMS: ${platform}. Use lowercase letters and digits only`
        );
      }
      if (platform === "source" || platform === "target") {
        throw new Error(
          `EXTRA_PLATFORMS cannot contain the reserved name "${platform}"`
        );
      }
    }

    return Array.from(new Set(platforms));
  }

  private validateLogLevel(level: string): string {
    const validLevels = [
      "error",
      "warn",
      "info",
      "http",
      "verbose",
      "debug",
      "silly",
    ];
    const lowerLevel = level.toLowerCase().trim();
    if (!validLevels.includes(lowerLevel)) {
      throw new Error(
        `Invalid log level: ${level}. Valid levels are: ${validLevels.join(
          ", "
        )}`
      );
    }
    return lowerLevel;
  }

  private validateCronSchedule(schedule: string): string {
    // Basic cron validation - 5 parts separated by spaces
    const parts = schedule.trim().split(/\s+/);
    if (parts.length !== 5) {
      throw new Error(
        `Invalid cron schedule: ${schedule}. Must have 5 parts (minute hour day month weekday)`
      );
    }

    return schedule.trim();
  }
}
