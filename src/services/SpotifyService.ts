import axios, { type AxiosInstance } from "axios";
import winston from "winston";
import { Logger } from "../utils/Logger";
import { TransientRemoteError } from "../core/Errors";
import { AuthSession, type AccessToken } from "./AuthSession";
import { toRemoteError } from "./HttpErrors";
import type { SourcePlatform, SourcePlaylistSummary, SourceTrack } from "../types";

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface SpotifyServiceOptions {
  baseUrl?: string;
  accountsUrl?: string;
  timeout?: number;
}

interface SpotifyTokenResponse {
  access_token: string;
  expires_in: number;
  refresh_token?: string;
}

interface SpotifyPage<T> {
  items: T[];
  next: string | null;
}

interface SpotifyPlaylist {
  id: string;
  name: string;
  owner: { id: string };
}

interface SpotifyTrack {
  id: string | null;
  name: string;
  artists: Array<{ name: string }>;
  album?: { name?: string | null } | null;
}

interface SpotifyPlaylistItem {
  track: SpotifyTrack | null;
}

const PLAYLIST_PAGE_SIZE = 50;
const TRACK_PAGE_SIZE = 100;
const TRACK_FIELDS = "items(track(id,name,artists(name),album(name))),next";

/**
 * Spotify Web API source. Listing owned playlists reads every playlist's
 * tracks to report their ids; those tracks are kept so the transfer does not
 * fetch them twice.
 */
export class SpotifyService implements SourcePlatform {
  readonly name = "Spotify";

  private readonly logger: winston.Logger;
  private readonly client: AxiosInstance;
  private readonly session: AuthSession;
  private readonly trackCache = new Map<string, SourceTrack[]>();
  private userId?: string;

  constructor(credentials: SpotifyCredentials, options: SpotifyServiceOptions = {}) {
    this.logger = Logger.getInstance();
    this.client = axios.create({
      baseURL: options.baseUrl ?? "https://api.spotify.com/v1",
      timeout: options.timeout ?? 15000,
    });

    const accounts = axios.create({
      baseURL: options.accountsUrl ?? "https://accounts.spotify.com",
      timeout: options.timeout ?? 15000,
    });
    const basic = Buffer.from(
      `${credentials.clientId}:${credentials.clientSecret}`
    ).toString("base64");

    this.session = new AuthSession(
      this.name,
      credentials.refreshToken,
      async (refreshToken): Promise<AccessToken> => {
        try {
          const response = await accounts.post<SpotifyTokenResponse>(
            "/api/token",
            new URLSearchParams({
              grant_type: "refresh_token",
              refresh_token: refreshToken,
            }),
            { headers: { Authorization: `Basic ${basic}` } }
          );
          return {
            accessToken: response.data.access_token,
            expiresIn: response.data.expires_in,
            refreshToken: response.data.refresh_token,
          };
        } catch (error) {
          throw toRemoteError(error, "Spotify token refresh");
        }
      }
    );
  }

  async getCurrentUserId(): Promise<string> {
    if (!this.userId) {
      const me = await this.get<{ id: string }>("/me", {}, "Fetching Spotify profile");
      this.userId = me.id;
      this.logger.debug(`✅ Connected to Spotify as ${me.id}`);
    }
    return this.userId;
  }

  async listOwnedPlaylists(): Promise<SourcePlaylistSummary[]> {
    const userId = await this.getCurrentUserId();

    const playlists: SpotifyPlaylist[] = [];
    for (let offset = 0; ; offset += PLAYLIST_PAGE_SIZE) {
      const page = await this.get<SpotifyPage<SpotifyPlaylist>>(
        "/me/playlists",
        { limit: PLAYLIST_PAGE_SIZE, offset },
        "Listing Spotify playlists"
      );
      playlists.push(...page.items);
      if (!page.next || page.items.length < PLAYLIST_PAGE_SIZE) {
        break;
      }
    }

    const owned = playlists.filter((playlist) => playlist.owner.id === userId);
    this.logger.info(
      `📋 Found ${playlists.length} Spotify playlists, ${owned.length} owned by you`
    );

    const summaries: SourcePlaylistSummary[] = [];
    for (const playlist of owned) {
      const tracks = await this.fetchPlaylistTracks(playlist.id);
      this.trackCache.set(playlist.id, tracks);
      summaries.push({
        id: playlist.id,
        name: playlist.name,
        trackIds: tracks.map((track) => track.id),
      });
    }
    return summaries;
  }

  async listPlaylistTracks(playlistId: string): Promise<SourceTrack[]> {
    const cached = this.trackCache.get(playlistId);
    if (cached) {
      return cached;
    }
    const tracks = await this.fetchPlaylistTracks(playlistId);
    this.trackCache.set(playlistId, tracks);
    return tracks;
  }

  private async fetchPlaylistTracks(playlistId: string): Promise<SourceTrack[]> {
    const tracks: SourceTrack[] = [];

    for (let offset = 0; ; offset += TRACK_PAGE_SIZE) {
      const page = await this.get<SpotifyPage<SpotifyPlaylistItem>>(
        `/playlists/${encodeURIComponent(playlistId)}/tracks`,
        { limit: TRACK_PAGE_SIZE, offset, fields: TRACK_FIELDS },
        `Fetching tracks of playlist ${playlistId}`
      );

      for (const item of page.items) {
        // Local files and removed tracks come back without an id
        const track = item.track;
        if (!track || !track.id) {
          continue;
        }
        tracks.push({
          id: track.id,
          name: track.name,
          artists: track.artists.map((artist) => artist.name),
          album: track.album?.name ?? undefined,
        });
      }

      if (!page.next || page.items.length < TRACK_PAGE_SIZE) {
        break;
      }
    }

    return tracks;
  }

  private async get<T>(
    url: string,
    params: Record<string, string | number>,
    context: string
  ): Promise<T> {
    const token = await this.session.getAccessToken();
    try {
      const response = await this.client.get<T>(url, {
        params,
        headers: { Authorization: `Bearer ${token}` },
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 401) {
        this.session.invalidate();
        throw new TransientRemoteError(`${context}: access token rejected`);
      }
      throw toRemoteError(error, context);
    }
  }
}
