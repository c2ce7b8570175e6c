export type {
  SourceTrack,
  TrackRecord,
  SyncStats,
  UnsyncedQueryOptions,
  PlaylistSyncResult,
  SyncRunResult,
} from "./Track";
export type {
  SourcePlaylistSummary,
  SourcePlatform,
  TargetPlaylistSummary,
  TrackQuery,
  AddTracksResult,
  TargetPlatform,
} from "./Platform";
export type {
  PlaylistStatus,
  PlaylistProgress,
  CheckpointState,
  PlaylistTransferResult,
  TransferRunResult,
} from "./Checkpoint";
