import axios, { type AxiosInstance } from "axios";
import winston from "winston";
import { Logger } from "../utils/Logger";
import { RemoteRequestError, TransientRemoteError } from "../core/Errors";
import { AuthSession, type AccessToken } from "./AuthSession";
import { toRemoteError } from "./HttpErrors";
import type {
  AddTracksResult,
  TargetPlatform,
  TargetPlaylistSummary,
  TrackQuery,
} from "../types";

export interface TidalCredentials {
  clientId: string;
  refreshToken: string;
}

export interface TidalServiceOptions {
  countryCode?: string;
  baseUrl?: string;
  authUrl?: string;
  timeout?: number;
}

interface TidalTokenResponse {
  access_token: string;
  expires_in: number;
  refresh_token?: string;
}

interface TidalSession {
  userId: number;
  countryCode: string;
}

interface TidalPage<T> {
  items: T[];
  totalNumberOfItems: number;
}

interface TidalPlaylist {
  uuid: string;
  title: string;
}

interface TidalTrack {
  id: number;
  title: string;
}

interface TidalPlaylistItem {
  type: string;
  item: { id: number };
}

interface TidalRequest {
  method: "GET" | "POST";
  url: string;
  params?: Record<string, string | number>;
  data?: URLSearchParams;
  headers?: Record<string, string>;
}

const PAGE_SIZE = 100;

/**
 * TIDAL v1 API target. Requests carry the account's country code; playlist
 * writes send the playlist's current ETag as required by the API.
 */
export class TidalService implements TargetPlatform {
  readonly name = "TIDAL";

  private readonly logger: winston.Logger;
  private readonly client: AxiosInstance;
  private readonly session: AuthSession;
  private readonly countryCode: string;
  private userId?: number;

  constructor(credentials: TidalCredentials, options: TidalServiceOptions = {}) {
    this.logger = Logger.getInstance();
    this.countryCode = options.countryCode ?? "US";
    this.client = axios.create({
      baseURL: options.baseUrl ?? "https://api.tidal.com/v1",
      timeout: options.timeout ?? 15000,
    });

    const auth = axios.create({
      baseURL: options.authUrl ?? "https://auth.tidal.com/v1",
      timeout: options.timeout ?? 15000,
    });

    this.session = new AuthSession(
      this.name,
      credentials.refreshToken,
      async (refreshToken): Promise<AccessToken> => {
        try {
          const response = await auth.post<TidalTokenResponse>(
            "/oauth2/token",
            new URLSearchParams({
              client_id: credentials.clientId,
              refresh_token: refreshToken,
              grant_type: "refresh_token",
              scope: "r_usr w_usr",
            })
          );
          return {
            accessToken: response.data.access_token,
            expiresIn: response.data.expires_in,
            refreshToken: response.data.refresh_token,
          };
        } catch (error) {
          throw toRemoteError(error, "TIDAL token refresh");
        }
      }
    );
  }

  async getUserId(): Promise<number> {
    if (this.userId === undefined) {
      const session = await this.request<TidalSession>(
        { method: "GET", url: "/sessions" },
        "Fetching TIDAL session"
      );
      this.userId = session.userId;
      this.logger.debug(`✅ Connected to TIDAL as user ${session.userId}`);
    }
    return this.userId;
  }

  async listPlaylists(): Promise<TargetPlaylistSummary[]> {
    const userId = await this.getUserId();
    const playlists = await this.collectPages<TidalPlaylist>(
      `/users/${userId}/playlists`,
      "Listing TIDAL playlists"
    );
    return playlists.map((playlist) => ({ id: playlist.uuid, name: playlist.title }));
  }

  async createPlaylist(name: string, description: string): Promise<string> {
    const userId = await this.getUserId();
    const playlist = await this.request<TidalPlaylist>(
      {
        method: "POST",
        url: `/users/${userId}/playlists`,
        data: new URLSearchParams({ title: name, description }),
      },
      `Creating TIDAL playlist "${name}"`
    );
    return playlist.uuid;
  }

  async searchTrack(query: TrackQuery): Promise<string | null> {
    const page = await this.request<TidalPage<TidalTrack>>(
      {
        method: "GET",
        url: "/search/tracks",
        params: { query: `${query.artistName} ${query.trackName}`, limit: 1 },
      },
      `Searching TIDAL for "${query.artistName} - ${query.trackName}"`
    );

    const best = page.items[0];
    return best ? String(best.id) : null;
  }

  async addTracks(playlistId: string, trackIds: string[]): Promise<AddTracksResult> {
    const url = `/playlists/${encodeURIComponent(playlistId)}`;
    const etag = await this.fetchEtag(url);

    await this.request<unknown>(
      {
        method: "POST",
        url: `${url}/items`,
        data: new URLSearchParams({
          trackIds: trackIds.join(","),
          onDupes: "SKIP",
          onArtifactNotFound: "SKIP",
        }),
        headers: { "If-None-Match": etag },
      },
      `Adding ${trackIds.length} tracks to TIDAL playlist ${playlistId}`
    );
    return { status: "success" };
  }

  async listPlaylistTrackIds(playlistId: string): Promise<string[]> {
    const items = await this.collectPages<TidalPlaylistItem>(
      `/playlists/${encodeURIComponent(playlistId)}/items`,
      `Reading TIDAL playlist ${playlistId}`
    );
    return items
      .filter((entry) => entry.type === "track")
      .map((entry) => String(entry.item.id));
  }

  private async fetchEtag(url: string): Promise<string> {
    const token = await this.session.getAccessToken();
    try {
      const response = await this.client.get<unknown>(url, {
        params: { countryCode: this.countryCode },
        headers: { Authorization: `Bearer ${token}` },
      });
      const etag = response.headers["etag"];
      if (typeof etag !== "string" || etag === "") {
        throw new RemoteRequestError(`TIDAL playlist ${url} returned no ETag`);
      }
      return etag;
    } catch (error) {
      throw this.mapError(error, `Reading TIDAL playlist ${url}`);
    }
  }

  private async collectPages<T>(url: string, context: string): Promise<T[]> {
    const items: T[] = [];
    for (let offset = 0; ; offset += PAGE_SIZE) {
      const page = await this.request<TidalPage<T>>(
        { method: "GET", url, params: { limit: PAGE_SIZE, offset } },
        context
      );
      items.push(...page.items);
      if (page.items.length < PAGE_SIZE || items.length >= page.totalNumberOfItems) {
        return items;
      }
    }
  }

  private async request<T>(req: TidalRequest, context: string): Promise<T> {
    const token = await this.session.getAccessToken();
    try {
      const response = await this.client.request<T>({
        method: req.method,
        url: req.url,
        data: req.data,
        params: { ...req.params, countryCode: this.countryCode },
        headers: { ...req.headers, Authorization: `Bearer ${token}` },
      });
      return response.data;
    } catch (error) {
      throw this.mapError(error, context);
    }
  }

  private mapError(error: unknown, context: string): unknown {
    if (axios.isAxiosError(error) && error.response?.status === 401) {
      this.session.invalidate();
      return new TransientRemoteError(`${context}: access token rejected`);
    }
    return toRemoteError(error, context);
  }
}
