import dotenv from "dotenv";
import cron from "node-cron";
import { PlaylistPorter } from "./core/PlaylistPorter";
import { SyncJournal, formatTime } from "./core/SyncJournal";
import { formatJournalEntry } from "./core/Reports";
import { describeError } from "./core/Errors";
import { Logger } from "./utils/Logger";
import { Config } from "./config/Config";
import type { SyncRunResult } from "./types";

// Load environment variables
dotenv.config();

/** One scheduled sync, followed by a journal entry when a journal is configured */
export async function runScheduledSync(
  porter: PlaylistPorter,
  journal: SyncJournal | null,
  now: () => Date = () => new Date()
): Promise<SyncRunResult> {
  const logger = Logger.getInstance();
  const result = await porter.sync();

  logger.info("✅ Scheduled sync completed", {
    playlists: result.playlists.length,
    added: result.totalAdded,
    notFound: result.totalNotFound,
    failed: result.failed.length,
  });

  if (journal) {
    const entry = formatJournalEntry(result, formatTime(now()), {
      source: porter.sourceName,
      target: porter.targetName,
    });
    await journal.append(entry);
  }
  return result;
}

async function main() {
  const logger = Logger.getInstance();
  const config = Config.getInstance();

  logger.info("🎵 playlist-porter daemon starting up...");

  try {
    config.requirePlatformCredentials();
    if (!cron.validate(config.cronSchedule)) {
      throw new Error(`Invalid cron schedule: ${config.cronSchedule}`);
    }

    const porter = new PlaylistPorter();
    const journal = config.journalDir ? new SyncJournal(config.journalDir) : null;
    let running = false;

    const syncOnce = async (label: string) => {
      if (running) {
        logger.warn(`⏭️ ${label} skipped: previous sync still running`);
        return;
      }
      running = true;
      logger.info(`🔄 Starting ${label}...`);
      try {
        await runScheduledSync(porter, journal);
      } catch (error) {
        logger.error(`❌ ${label} failed: ${describeError(error)}`);
      } finally {
        running = false;
      }
    };

    logger.info(`📅 Scheduling cron job: ${config.cronSchedule}`);
    cron.schedule(config.cronSchedule, () => syncOnce("scheduled sync"), {
      scheduled: true,
      timezone: process.env.TZ || "UTC",
    });

    if (config.runOnStartup) {
      logger.info("🚀 Running initial sync...");
      await syncOnce("initial sync");
    }

    logger.info("🎶 playlist-porter is running! Use the CLI for one-off transfers.");

    const shutdown = (signal: string) => {
      logger.info(`📴 Received ${signal}, shutting down gracefully...`);
      process.exit(0);
    };

    process.on("SIGTERM", () => shutdown("SIGTERM"));
    process.on("SIGINT", () => shutdown("SIGINT"));
  } catch (error) {
    logger.error(`💥 Failed to start playlist-porter: ${describeError(error)}`);
    process.exit(1);
  }
}

// Only run if this file is executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error("💥 Fatal error:", error);
    process.exit(1);
  });
}
