import winston from "winston";
import { Logger } from "../utils/Logger";

export interface AccessToken {
  accessToken: string;
  /** Lifetime in seconds */
  expiresIn: number;
  /** Set when the provider rotates refresh tokens */
  refreshToken?: string;
}

export type TokenRefresher = (refreshToken: string) => Promise<AccessToken>;

// Refresh slightly early so a request never leaves with a token about to lapse
const EXPIRY_MARGIN_MS = 60 * 1000;

/**
 * Holds one platform's OAuth tokens. The access token is fetched lazily and
 * renewed through the injected refresher once it expires or is invalidated.
 */
export class AuthSession {
  private readonly logger: winston.Logger;
  private accessToken?: string;
  private expiresAt = 0;
  private pending?: Promise<string>;

  constructor(
    public readonly platform: string,
    private refreshToken: string,
    private readonly refresher: TokenRefresher,
    private readonly now: () => number = () => Date.now()
  ) {
    this.logger = Logger.getInstance();
  }

  async getAccessToken(): Promise<string> {
    if (this.accessToken && this.now() < this.expiresAt - EXPIRY_MARGIN_MS) {
      return this.accessToken;
    }
    if (!this.pending) {
      this.pending = this.refresh().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  /** Forces a refresh on the next request, e.g. after a 401 */
  invalidate(): void {
    this.accessToken = undefined;
    this.expiresAt = 0;
  }

  private async refresh(): Promise<string> {
    this.logger.debug(`🔑 Refreshing ${this.platform} access token`);
    const token = await this.refresher(this.refreshToken);

    this.accessToken = token.accessToken;
    this.expiresAt = this.now() + token.expiresIn * 1000;
    if (token.refreshToken) {
      this.refreshToken = token.refreshToken;
    }
    return token.accessToken;
  }
}
