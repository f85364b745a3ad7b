import {
  requestSpotifyToken,
  type SpotifyCredentials,
} from '@/adapters/sources/spotify/spotifyAuth';
import { safeJsonParse, safeReadText } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { globalFetch, type FetchLike } from '@/shared/utils/fetch';

export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';

export interface SpotifyApiResult<T> {
  ok: boolean;
  status: number;
  /** Parsed JSON body; null for 204 and for failures. */
  body: T | null;
  /** Raw body text of a failed request, for error mapping. */
  errorText: string;
}

export interface SpotifyRequestOptions {
  method?: 'GET' | 'PUT' | 'POST';
  params?: Record<string, string>;
  json?: unknown;
}

export interface SpotifyWebClientOptions extends SpotifyCredentials {
  refreshToken: string;
  /** Called when the accounts service rotates the refresh token. */
  persistRefreshToken?: (refreshToken: string) => Promise<void>;
  fetch?: FetchLike;
  now?: () => number;
  retryDelayMs?: number;
  log?: ComponentLogger;
}

/**
 * Spotify Web API access for one account: bearer token from a refresh token,
 * one retry with a fresh token on 401.
 */
export class SpotifyWebClient {
  private readonly log: ComponentLogger;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly retryDelayMs: number;

  private refreshToken: string;
  private accessToken = '';
  private tokenExpiresAt = 0;
  private authError = false;
  private refreshPromise: Promise<string | null> | null = null;

  constructor(private readonly options: SpotifyWebClientOptions) {
    this.refreshToken = options.refreshToken.trim();
    this.fetchImpl = options.fetch ?? globalFetch;
    this.now = options.now ?? Date.now;
    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.log = options.log ?? createLogger('Sources', 'Spotify');
  }

  public get hasAuthError(): boolean {
    return this.authError;
  }

  public get isConfigured(): boolean {
    return Boolean(this.options.clientId && this.refreshToken);
  }

  public async request<T>(
    path: string,
    options: SpotifyRequestOptions = {},
  ): Promise<SpotifyApiResult<T>> {
    const token = await this.getAccessToken();
    if (!token) {
      this.authError = true;
      return { ok: false, status: 401, body: null, errorText: 'no access token' };
    }

    const url = new URL(`${SPOTIFY_API_BASE}${path}`);
    for (const [key, value] of Object.entries(options.params ?? {})) {
      url.searchParams.set(key, value);
    }

    const response = await this.rawRequest<T>(url.toString(), token, options);
    if (response.status !== 401) {
      return response;
    }

    // Expired or revoked mid-flight: retry once with a fresh token.
    const retryToken = await this.getAccessToken(true);
    if (!retryToken || retryToken === token) {
      this.authError = true;
      return response;
    }
    return this.rawRequest<T>(url.toString(), retryToken, options);
  }

  public async getAccessToken(forceRefresh = false): Promise<string | null> {
    if (forceRefresh) {
      this.accessToken = '';
      this.tokenExpiresAt = 0;
    }
    if (this.accessToken && this.now() < this.tokenExpiresAt - 5_000) {
      return this.accessToken;
    }
    if (!this.refreshToken) {
      this.log.warn('no spotify refresh token configured');
      return null;
    }

    // One refresh at a time; concurrent callers share it.
    if (!this.refreshPromise) {
      this.refreshPromise = this.refreshAccessToken(this.refreshToken).finally(() => {
        this.refreshPromise = null;
      });
    }
    return this.refreshPromise;
  }

  private async rawRequest<T>(
    url: string,
    token: string,
    options: SpotifyRequestOptions,
  ): Promise<SpotifyApiResult<T>> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    let res: Response;
    try {
      res = await this.fetchImpl(url, { method: options.method ?? 'GET', headers, body });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn('spotify api error', { url, message });
      return { ok: false, status: 0, body: null, errorText: message };
    }

    const text = await safeReadText(res, '', {
      onError: 'debug',
      log: this.log,
      label: 'spotify api read failed',
      context: { status: res.status },
    });
    if (!res.ok) {
      this.log.debug('spotify api request failed', { url, status: res.status, body: text.slice(0, 200) });
      return { ok: false, status: res.status, body: null, errorText: text };
    }
    this.authError = false;
    const parsed = text.trim() ? safeJsonParse<T | null>(text, null) : null;
    return { ok: true, status: res.status, body: parsed, errorText: '' };
  }

  private async refreshAccessToken(refreshToken: string): Promise<string | null> {
    const maxAttempts = 3;
    let delayMs = this.retryDelayMs;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const result = await requestSpotifyToken(
        this.fetchImpl,
        this.options,
        { grant_type: 'refresh_token', refresh_token: refreshToken },
        this.log,
      );
      if (result.ok) {
        const { token } = result;
        this.accessToken = token.accessToken;
        this.tokenExpiresAt = this.now() + token.expiresInSec * 1000;
        this.authError = false;
        if (token.scope) {
          this.log.debug('spotify token refreshed', { scope: token.scope });
        }
        if (token.refreshToken && token.refreshToken !== refreshToken) {
          this.refreshToken = token.refreshToken;
          await this.persistRotatedToken(token.refreshToken);
        }
        return token.accessToken;
      }

      this.log.warn('spotify token refresh failed', {
        status: result.status,
        body: result.message,
        attempt,
      });
      const retryable = result.status === 0 || result.status >= 500;
      if (!retryable || attempt === maxAttempts) {
        break;
      }
      if (delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
      }
      delayMs *= 2;
    }

    this.authError = true;
    return null;
  }

  private async persistRotatedToken(refreshToken: string): Promise<void> {
    if (!this.options.persistRefreshToken) {
      return;
    }
    try {
      await this.options.persistRefreshToken(refreshToken);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.warn('failed to persist rotated spotify refresh token', { message });
    }
  }
}
