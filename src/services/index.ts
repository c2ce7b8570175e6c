export { AuthSession } from "./AuthSession";
export type { AccessToken, TokenRefresher } from "./AuthSession";
export { parseRetryAfter, toRemoteError } from "./HttpErrors";
export { SpotifyService } from "./SpotifyService";
export type { SpotifyCredentials, SpotifyServiceOptions } from "./SpotifyService";
export { TidalService } from "./TidalService";
export type { TidalCredentials, TidalServiceOptions } from "./TidalService";
