export interface SourceTrack {
  id: string;
  name: string;
  artists: string[];
  album?: string;
}

export interface TrackRecord {
  sourceId: string;
  targetId: string | null;
  additionalPlatformIds: Record<string, string | null>;
  trackName: string;
  artistName: string;
  albumName: string;
  playlistIds: Set<string>;
  sourceAvailable: boolean;
  /** null until the target has been searched */
  targetAvailable: boolean | null;
  additionalAvailability: Record<string, boolean | null>;
  lastSyncedAt: string | null;
  notes: string;
}

export interface SyncStats {
  total: number;
  matched: number;
  unavailable: number;
  pending: number;
}

export interface UnsyncedQueryOptions {
  /** Include tracks already searched and confirmed absent */
  recheck?: boolean;
}

export interface PlaylistSyncResult {
  sourcePlaylistId: string;
  name: string;
  status: "skipped" | "up_to_date" | "synced" | "failed";
  targetPlaylistId: string | null;
  added: number;
  /** "Artist - Title" of every track added this run */
  addedTracks: string[];
  found: number;
  notFound: number;
  error?: string;
}

export interface SyncRunResult {
  playlists: PlaylistSyncResult[];
  totalAdded: number;
  totalFound: number;
  totalNotFound: number;
  failed: PlaylistSyncResult[];
}
