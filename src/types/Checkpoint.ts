export type PlaylistStatus = "pending" | "in_progress" | "completed" | "failed";

export interface PlaylistProgress {
  sourcePlaylistId: string;
  name: string;
  targetPlaylistId: string | null;
  totalTracks: number;
  processedTrackCount: number;
  tracksFound: number;
  tracksNotFound: number;
  status: PlaylistStatus;
  error: string | null;
}

export interface CheckpointState {
  version: 1;
  startedAt: string;
  updatedAt: string;
  sourceUserId: string | null;
  totalPlaylists: number;
  playlists: PlaylistProgress[];
}

export interface PlaylistTransferResult {
  sourcePlaylistId: string;
  name: string;
  status: "completed" | "skipped" | "failed";
  targetPlaylistId: string | null;
  total: number;
  found: number;
  notFound: number;
  added: number;
  error?: string;
}

export interface TransferRunResult {
  resumed: boolean;
  playlists: PlaylistTransferResult[];
  completed: PlaylistTransferResult[];
  failed: PlaylistTransferResult[];
  totalFound: number;
  totalNotFound: number;
  checkpointCleared: boolean;
}
