import nock from "nock";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { SpotifyService } from "../../src/services/SpotifyService";
import { RemoteRequestError, TransientRemoteError } from "../../src/core/Errors";

const API = "https://api.spotify.test";
const ACCOUNTS = "https://accounts.spotify.test";

describe("SpotifyService", () => {
  let service: SpotifyService;

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    service = new SpotifyService(
      { clientId: "test-client", clientSecret: "test-secret", refreshToken: "test-refresh" },
      { baseUrl: `${API}/v1`, accountsUrl: ACCOUNTS }
    );
  });

  afterEach(() => {
    nock.cleanAll();
  });

  const mockToken = (times = 1) =>
    nock(ACCOUNTS)
      .post("/api/token", { grant_type: "refresh_token", refresh_token: "test-refresh" })
      .basicAuth({ user: "test-client", pass: "test-secret" })
      .times(times)
      .reply(200, { access_token: "test-access", expires_in: 3600 });

  const api = () => nock(API, { reqheaders: { authorization: "Bearer test-access" } });

  it("lists owned playlists with their track ids", async () => {
    const token = mockToken();
    const scope = api()
      .get("/v1/me")
      .reply(200, { id: "user-1" })
      .get("/v1/me/playlists")
      .query({ limit: "50", offset: "0" })
      .reply(200, {
        items: [
          { id: "p1", name: "Mine", owner: { id: "user-1" } },
          { id: "p2", name: "Followed", owner: { id: "someone-else" } },
        ],
        next: null,
      })
      .get("/v1/playlists/p1/tracks")
      .query(true)
      .reply(200, {
        items: [
          {
            track: { id: "s1", name: "One", artists: [{ name: "Artist" }, { name: "Guest" }], album: { name: "LP" } },
          },
          { track: null },
          { track: { id: null, name: "Local file", artists: [], album: null } },
        ],
        next: null,
      });

    const playlists = await service.listOwnedPlaylists();

    expect(playlists).toEqual([{ id: "p1", name: "Mine", trackIds: ["s1"] }]);
    // Served from the listing, no second request
    expect(await service.listPlaylistTracks("p1")).toEqual([
      { id: "s1", name: "One", artists: ["Artist", "Guest"], album: "LP" },
    ]);
    expect(token.isDone()).toBe(true);
    expect(scope.isDone()).toBe(true);
  });

  it("follows track pages", async () => {
    mockToken();
    const firstPage = Array.from({ length: 100 }, (_, index) => ({
      track: { id: `s${index}`, name: `Song ${index}`, artists: [{ name: "Artist" }] },
    }));
    const scope = api()
      .get("/v1/playlists/p1/tracks")
      .query((query) => query.offset === "0")
      .reply(200, { items: firstPage, next: `${API}/v1/playlists/p1/tracks?offset=100` })
      .get("/v1/playlists/p1/tracks")
      .query((query) => query.offset === "100")
      .reply(200, {
        items: [{ track: { id: "last", name: "Last", artists: [{ name: "Artist" }] } }],
        next: null,
      });

    const tracks = await service.listPlaylistTracks("p1");

    expect(tracks).toHaveLength(101);
    expect(tracks[100]).toEqual({ id: "last", name: "Last", artists: ["Artist"], album: undefined });
    expect(scope.isDone()).toBe(true);
  });

  it("refreshes the token after a 401", async () => {
    const token = mockToken(2);
    api().get("/v1/me").reply(401, {}).get("/v1/me").reply(200, { id: "user-1" });

    await expect(service.getCurrentUserId()).rejects.toBeInstanceOf(TransientRemoteError);
    expect(await service.getCurrentUserId()).toBe("user-1");
    expect(token.isDone()).toBe(true);
  });

  it("reports rate limits with their Retry-After", async () => {
    mockToken();
    api().get("/v1/me").reply(429, {}, { "Retry-After": "7" });

    const error = await service.getCurrentUserId().catch((failure: unknown) => failure);

    expect(error).toBeInstanceOf(TransientRemoteError);
    expect(error).toMatchObject({ retryAfterMs: 7000 });
  });

  it("does not retry a missing playlist", async () => {
    mockToken();
    api().get("/v1/playlists/gone/tracks").query(true).reply(404, { error: { status: 404 } });

    await expect(service.listPlaylistTracks("gone")).rejects.toBeInstanceOf(RemoteRequestError);
  });
});
