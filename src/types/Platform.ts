import type { SourceTrack } from "./Track";

export interface SourcePlaylistSummary {
  id: string;
  name: string;
  trackIds: string[];
}

export interface SourcePlatform {
  readonly name: string;
  /** Account the playlists belong to; checkpoints are tied to it */
  getCurrentUserId(): Promise<string>;
  /** Playlists owned by the authenticated user, in listing order */
  listOwnedPlaylists(): Promise<SourcePlaylistSummary[]>;
  listPlaylistTracks(playlistId: string): Promise<SourceTrack[]>;
}

export interface TargetPlaylistSummary {
  id: string;
  name: string;
}

export interface TrackQuery {
  trackName: string;
  artistName: string;
  albumName?: string;
}

export type AddTracksResult =
  | { status: "success" }
  | { status: "partial"; failedIds: string[] };

export interface TargetPlatform {
  readonly name: string;
  listPlaylists(): Promise<TargetPlaylistSummary[]>;
  createPlaylist(name: string, description: string): Promise<string>;
  /** Resolves to the best candidate id, or null when nothing matched */
  searchTrack(query: TrackQuery): Promise<string | null>;
  addTracks(playlistId: string, trackIds: string[]): Promise<AddTracksResult>;
  listPlaylistTrackIds(playlistId: string): Promise<string[]>;
}
