import { safeJsonParse, safeReadText } from '@/shared/bestEffort';
import type { ComponentLogger } from '@/shared/logging/logger';
import type { FetchLike } from '@/shared/utils/fetch';

export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';
export const SPOTIFY_AUTHORIZE_URL = 'https://accounts.spotify.com/authorize';
export const SPOTIFY_SCOPES = [
  'user-read-currently-playing',
  'user-read-playback-state',
  'user-modify-playback-state',
];

export interface SpotifyCredentials {
  clientId: string;
  /** Optional: without it the PKCE public-client flow is used. */
  clientSecret?: string;
}

export interface SpotifyToken {
  accessToken: string;
  expiresInSec: number;
  refreshToken?: string;
  scope?: string;
}

export type TokenRequestResult =
  | { ok: true; token: SpotifyToken }
  | { ok: false; status: number; message: string };

interface TokenPayload {
  access_token?: unknown;
  expires_in?: unknown;
  refresh_token?: unknown;
  scope?: unknown;
}

/**
 * One POST to the accounts service token endpoint (refresh or code exchange).
 * Network faults resolve to status 0.
 */
export async function requestSpotifyToken(
  fetchImpl: FetchLike,
  credentials: SpotifyCredentials,
  params: Record<string, string>,
  log: ComponentLogger,
): Promise<TokenRequestResult> {
  const body = new URLSearchParams({ ...params, client_id: credentials.clientId });
  const headers: Record<string, string> = {
    'Content-Type': 'application/x-www-form-urlencoded',
  };
  if (credentials.clientSecret) {
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
    headers.Authorization = `Basic ${basic}`;
  }

  let res: Response;
  try {
    res = await fetchImpl(SPOTIFY_TOKEN_URL, { method: 'POST', headers, body: body.toString() });
  } catch (error) {
    return { ok: false, status: 0, message: error instanceof Error ? error.message : String(error) };
  }

  const text = await safeReadText(res, '', {
    onError: 'debug',
    log,
    label: 'spotify token response read failed',
    context: { status: res.status },
  });
  if (!res.ok) {
    return { ok: false, status: res.status, message: text.slice(0, 200) };
  }

  const payload = safeJsonParse<TokenPayload | null>(text, null) ?? {};
  const accessToken = typeof payload.access_token === 'string' ? payload.access_token : '';
  if (!accessToken) {
    return { ok: false, status: res.status, message: 'token response missing access_token' };
  }
  const expiresIn = Number(payload.expires_in ?? 3600);
  return {
    ok: true,
    token: {
      accessToken,
      expiresInSec: Number.isFinite(expiresIn) && expiresIn > 0 ? expiresIn : 3600,
      refreshToken: typeof payload.refresh_token === 'string' ? payload.refresh_token : undefined,
      scope: typeof payload.scope === 'string' ? payload.scope : undefined,
    },
  };
}
