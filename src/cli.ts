#!/usr/bin/env node

import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import { PlaylistPorter } from "./core/PlaylistPorter";
import { formatSyncSummary, formatTransferSummary } from "./core/Reports";
import { describeError, isTransferError } from "./core/Errors";
import { Logger } from "./utils/Logger";

// Load environment variables
dotenv.config();

export interface CliOptions {
  sync?: boolean;
  fresh?: boolean;
  status?: boolean;
  library?: boolean;
  export?: boolean;
  reset?: boolean;
  recheck?: boolean;
  checkpointFile?: string;
  libraryFile?: string;
  exportFile?: string;
  batchSize?: number;
  verbose?: boolean;
}

const parseBatchSize = (value: string): number => {
  const size = parseInt(value, 10);
  if (isNaN(size) || size < 1 || size > 100) {
    throw new InvalidArgumentError("Must be an integer between 1 and 100.");
  }
  return size;
};

// Global error handler
const handleError = (error: unknown, operation: string): never => {
  const logger = Logger.getInstance();
  logger.error(`❌ ${operation} failed: ${describeError(error)}`);

  console.error(`Error: ${describeError(error)}`);
  if (isTransferError(error)) {
    console.error(`Reason: ${error.code}`);
  }

  process.exit(1);
};

const printLines = (lines: string[]) => {
  lines.forEach((line) => console.log(line));
};

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("playlist-porter")
    .description(
      "Transfer owned Spotify playlists to TIDAL and keep them in sync"
    )
    .version("1.0.0")
    .option("--sync", "Incremental sync: only add tracks missing from TIDAL")
    .option("--fresh", "Ignore the checkpoint and start the transfer over")
    .option("--status", "Show checkpoint progress and exit")
    .option("--library", "Show library statistics and exit")
    .option("--export", "Export tracks unavailable on TIDAL to CSV and exit")
    .option("--reset", "Delete the checkpoint (the library is kept)")
    .option("--recheck", "Search again for tracks previously not found")
    .option("--checkpoint-file <path>", "Checkpoint file location")
    .option("--library-file <path>", "Library CSV location")
    .option("--export-file <path>", "Export CSV location")
    .option("--batch-size <number>", "Tracks per batch write (1-100)", parseBatchSize)
    .option("-v, --verbose", "Enable debug logging")
    .action(async (options: CliOptions) => {
      process.exitCode = await run(options);
    });

  return program;
}

/** Runs one CLI invocation; resolves to the process exit code */
export async function run(options: CliOptions): Promise<number> {
  if (options.verbose) {
    Logger.reconfigure({ level: "debug" });
  }

  const porter = new PlaylistPorter({
    checkpointFile: options.checkpointFile,
    libraryFile: options.libraryFile,
    exportFile: options.exportFile,
    batchSize: options.batchSize,
  });

  if (options.status) {
    console.log("📊 Transfer Status\n");
    printLines(await porter.checkpointStatus());
    return 0;
  }

  if (options.library) {
    console.log("📚 Library Statistics\n");
    printLines(await porter.librarySummary());
    return 0;
  }

  if (options.export) {
    const count = await porter.exportUnavailable();
    console.log(`✅ Exported ${count} tracks to ${porter.exportFile}`);
    return 0;
  }

  if (options.reset) {
    const removed = await porter.reset();
    console.log(
      removed
        ? `✅ Checkpoint ${porter.checkpointFile} deleted`
        : `No checkpoint at ${porter.checkpointFile}`
    );
    return 0;
  }

  if (options.sync) {
    console.log("🔄 Starting incremental sync...\n");
    const result = await porter.sync({ recheck: options.recheck });
    console.log("\n📊 Sync Results:");
    printLines(formatSyncSummary(result, porter.targetName));
    return result.failed.length > 0 ? 1 : 0;
  }

  console.log("🎵 Starting playlist transfer...\n");
  const result = await porter.transfer({
    fresh: options.fresh,
    recheck: options.recheck,
  });
  console.log("\n📊 Transfer Results:");
  printLines(formatTransferSummary(result, porter.targetName));
  return result.failed.length > 0 ? 1 : 0;
}

// Only run if this file is executed directly
if (require.main === module) {
  buildProgram()
    .parseAsync()
    .catch((error: unknown) => handleError(error, "Playlist transfer"));
}
