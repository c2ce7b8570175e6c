import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Config } from "../../src/config/Config";

const MANAGED = [
  "SPOTIFY_CLIENT_ID",
  "SPOTIFY_CLIENT_SECRET",
  "SPOTIFY_REFRESH_TOKEN",
  "TIDAL_CLIENT_ID",
  "TIDAL_REFRESH_TOKEN",
  "TIDAL_COUNTRY_CODE",
  "BATCH_SIZE",
  "EXTRA_PLATFORMS",
  "CRON_SCHEDULE",
  "RUN_ON_STARTUP",
  "JOURNAL_DIR",
];

describe("Config", () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of MANAGED) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of MANAGED) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    Config.reload();
  });

  it("falls back to defaults", () => {
    const config = Config.reload();

    expect(config.batchSize).toBe(50);
    expect(config.tidalCountryCode).toBe("US");
    expect(config.extraPlatforms).toEqual(["soundcloud"]);
    expect(config.cronSchedule).toBe("0 9 * * *");
    expect(config.runOnStartup).toBe(false);
    expect(config.journalDir).toBeNull();
  });

  it("reads and normalises overrides", () => {
    process.env.BATCH_SIZE = "20";
    process.env.TIDAL_COUNTRY_CODE = "gb";
    process.env.EXTRA_PLATFORMS = "SoundCloud, bandcamp, soundcloud";
    process.env.RUN_ON_STARTUP = "yes";
    process.env.JOURNAL_DIR = "/notes";

    const config = Config.reload();

    expect(config.batchSize).toBe(20);
    expect(config.tidalCountryCode).toBe("GB");
    expect(config.extraPlatforms).toEqual(["soundcloud", "bandcamp"]);
    expect(config.runOnStartup).toBe(true);
    expect(config.journalDir).toBe("/notes");
  });

  it("rejects out-of-range and malformed values", () => {
    process.env.BATCH_SIZE = "101";
    expect(() => Config.reload()).toThrow("BATCH_SIZE must be at most 100, got: 101");

    process.env.BATCH_SIZE = "50";
    process.env.TIDAL_COUNTRY_CODE = "USA";
    expect(() => Config.reload()).toThrow("Invalid TIDAL_COUNTRY_CODE: USA");

    process.env.TIDAL_COUNTRY_CODE = "US";
    process.env.CRON_SCHEDULE = "0 9 * *";
    expect(() => Config.reload()).toThrow("Invalid cron schedule");
  });

  it("names every missing credential", () => {
    process.env.SPOTIFY_CLIENT_ID = "test-client";
    process.env.TIDAL_CLIENT_ID = "test-client";

    expect(() => Config.reload().requirePlatformCredentials()).toThrow(
      "Missing required environment variables: SPOTIFY_CLIENT_SECRET, SPOTIFY_REFRESH_TOKEN, TIDAL_REFRESH_TOKEN"
    );
  });

  it("turns the extra platforms off when set to an empty value", () => {
    process.env.EXTRA_PLATFORMS = "";

    expect(Config.reload().extraPlatforms).toEqual([]);
  });
});
