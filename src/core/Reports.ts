import { CheckpointStore } from "./CheckpointStore";
import { TrackLibrary } from "./TrackLibrary";
import type {
  CheckpointState,
  SyncRunResult,
  SyncStats,
  TransferRunResult,
} from "../types";

const MAX_LISTED_TRACKS = 15;

const percent = (part: number, total: number): string =>
  total === 0 ? "0.0%" : `${((part / total) * 100).toFixed(1)}%`;

/** Lines printed by `--status` */
export function formatCheckpointStatus(
  state: CheckpointState | null,
  filePath: string
): string[] {
  if (!state) {
    return [`No checkpoint found at ${filePath}`, "Nothing to resume."];
  }

  const counts = CheckpointStore.countByStatus(state);
  const lines = [
    `Checkpoint: ${filePath}`,
    `Started: ${state.startedAt}`,
    `Last updated: ${state.updatedAt}`,
    "",
    `Playlists: ${state.playlists.length}`,
    `  Completed:   ${counts.completed}`,
    `  In progress: ${counts.in_progress}`,
    `  Pending:     ${counts.pending}`,
    `  Failed:      ${counts.failed}`,
  ];

  const current = state.playlists.find((progress) => progress.status === "in_progress");
  if (current) {
    lines.push(
      "",
      `Currently processing: ${current.name}`,
      `  Progress: ${current.processedTrackCount}/${current.totalTracks} tracks`
    );
  }

  const failed = state.playlists.filter((progress) => progress.status === "failed");
  if (failed.length > 0) {
    lines.push("", "Failed playlists:");
    for (const progress of failed) {
      lines.push(
        `  - ${progress.name} (${progress.processedTrackCount}/${progress.totalTracks}): ${
          progress.error ?? "unknown error"
        }`
      );
    }
  }

  return lines;
}

function formatStats(label: string, stats: SyncStats): string[] {
  return [
    `${label}:`,
    `  Matched:     ${stats.matched} (${percent(stats.matched, stats.total)})`,
    `  Unavailable: ${stats.unavailable}`,
    `  Pending:     ${stats.pending}`,
  ];
}

/** Lines printed by `--library` */
export function formatLibrarySummary(library: TrackLibrary, targetName: string): string[] {
  const stats = library.getSyncStats();
  const lines = [
    `Library: ${library.filePath}`,
    `Total tracks: ${stats.total}`,
    "",
    ...formatStats(targetName, stats),
  ];

  for (const platform of library.platforms) {
    lines.push("", ...formatStats(platform, library.getPlatformStats(platform)));
  }
  return lines;
}

/** Final summary of a full transfer; failed playlists are named with their reason */
export function formatTransferSummary(result: TransferRunResult, targetName: string): string[] {
  const lines = [
    `Playlists completed: ${result.completed.length}`,
    `Playlists already done: ${
      result.playlists.filter((playlist) => playlist.status === "skipped").length
    }`,
    `Tracks found on ${targetName}: ${result.totalFound}`,
    `Tracks not found: ${result.totalNotFound}`,
  ];

  if (result.failed.length > 0) {
    lines.push("", `Failed playlists (${result.failed.length}):`);
    for (const playlist of result.failed) {
      lines.push(`  - ${playlist.name}: ${playlist.error ?? "unknown error"}`);
    }
    lines.push("", "Run again to retry the failed playlists.");
  } else if (result.checkpointCleared) {
    lines.push("", "All playlists transferred; checkpoint removed.");
  }
  return lines;
}

export function formatSyncSummary(result: SyncRunResult, targetName: string): string[] {
  const count = (status: string) =>
    result.playlists.filter((playlist) => playlist.status === status).length;

  const lines = [
    `Playlists synced: ${count("synced")}`,
    `Playlists up to date: ${count("up_to_date")}`,
    `Tracks added: ${result.totalAdded}`,
    `Tracks not on ${targetName}: ${result.totalNotFound}`,
  ];

  if (result.failed.length > 0) {
    lines.push("", `Failed playlists (${result.failed.length}):`);
    for (const playlist of result.failed) {
      lines.push(`  - ${playlist.name}: ${playlist.error ?? "unknown error"}`);
    }
  }
  return lines;
}

/** Markdown entry for the sync journal; `time` is "HH:MM" */
export function formatJournalEntry(
  result: SyncRunResult,
  time: string,
  names: { source: string; target: string }
): string {
  const heading = `### 🎵 ${names.source}-${names.target} Sync (${time})`;
  const synced = result.playlists.filter((playlist) => playlist.status === "synced");
  const upToDate = result.playlists.filter((playlist) => playlist.status === "up_to_date");
  const addedTracks = synced.flatMap((playlist) => playlist.addedTracks);

  if (synced.length === 0 && result.failed.length === 0) {
    return [heading, `All ${upToDate.length} playlists already synced. No changes.`].join("\n");
  }

  const lines = [heading];
  if (synced.length > 0) {
    lines.push(`**Synced ${synced.length} playlist(s):**`);
    synced.forEach((playlist) => lines.push(`  - ${playlist.name}`));
  }

  if (addedTracks.length > 0) {
    lines.push("", `**New tracks added (${addedTracks.length}):**`);
    addedTracks
      .slice(0, MAX_LISTED_TRACKS)
      .forEach((track) => lines.push(`  - ${track}`));
    if (addedTracks.length > MAX_LISTED_TRACKS) {
      lines.push(`  - *...and ${addedTracks.length - MAX_LISTED_TRACKS} more*`);
    }
  }

  if (result.failed.length > 0) {
    lines.push("", `**Failed (${result.failed.length}):**`);
    result.failed.forEach((playlist) =>
      lines.push(`  - ${playlist.name}: ${playlist.error ?? "unknown error"}`)
    );
  }

  lines.push(
    "",
    `Tracks: ${result.totalFound} found, ${result.totalNotFound} unavailable on ${names.target}`
  );
  return lines.join("\n");
}
