import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import {
  createOAuthState,
  createPkcePair,
} from '@/adapters/sources/spotify/pkce';
import {
  SPOTIFY_AUTHORIZE_URL,
  SPOTIFY_SCOPES,
  requestSpotifyToken,
} from '@/adapters/sources/spotify/spotifyAuth';
import { ConfigError } from '@/domain/errors';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { UrlOpenerPort } from '@/ports/PlaybackPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { globalFetch, type FetchLike } from '@/shared/utils/fetch';

export interface SpotifyLoginOptions {
  configPort: ConfigPort;
  opener: UrlOpenerPort;
  timeoutMs?: number;
  fetch?: FetchLike;
  log?: ComponentLogger;
}

export function buildAuthorizeUrl(params: {
  clientId: string;
  redirectUri: string;
  state: string;
  codeChallenge: string;
}): string {
  const url = new URL(SPOTIFY_AUTHORIZE_URL);
  url.searchParams.set('client_id', params.clientId);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('redirect_uri', params.redirectUri);
  url.searchParams.set('scope', SPOTIFY_SCOPES.join(' '));
  url.searchParams.set('state', params.state);
  url.searchParams.set('code_challenge_method', 'S256');
  url.searchParams.set('code_challenge', params.codeChallenge);
  return url.toString();
}

/**
 * Authorization-code login with PKCE. Opens the browser, waits for the
 * redirect on a local server bound to the configured redirect URI, and
 * stores the refresh token in the configuration.
 */
export async function runSpotifyLogin(options: SpotifyLoginOptions): Promise<void> {
  const log = options.log ?? createLogger('Sources', 'SpotifyLogin');
  const config = options.configPort.getConfig();
  const { clientId, clientSecret, redirectUri } = config.sources.spotify;
  if (!clientId) {
    throw new ConfigError('sources.spotify.clientId is not set');
  }
  const redirect = new URL(redirectUri);
  if (redirect.protocol !== 'http:') {
    throw new ConfigError('sources.spotify.redirectUri must be a local http:// URL');
  }

  const pkce = createPkcePair();
  const state = createOAuthState();
  const code = await waitForAuthorizationCode({
    redirect,
    state,
    timeoutMs: options.timeoutMs ?? 5 * 60_000,
    log,
    onListening: async () => {
      const authorizeUrl = buildAuthorizeUrl({
        clientId,
        redirectUri,
        state,
        codeChallenge: pkce.challenge,
      });
      log.info('opening spotify authorization page', { url: authorizeUrl });
      await options.opener.open(authorizeUrl);
    },
  });

  const result = await requestSpotifyToken(
    options.fetch ?? globalFetch,
    { clientId, clientSecret: clientSecret || undefined },
    {
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
      code_verifier: pkce.verifier,
    },
    log,
  );
  if (!result.ok) {
    throw new Error(`spotify token exchange failed (${result.status}): ${result.message}`);
  }
  const refreshToken = result.token.refreshToken;
  if (!refreshToken) {
    throw new Error('spotify token exchange returned no refresh token');
  }

  await options.configPort.updateConfig((current) => {
    current.sources.spotify.refreshToken = refreshToken;
    current.sources.spotify.enabled = true;
  });
  log.info('spotify login stored', { scope: result.token.scope ?? '' });
}

interface CallbackOptions {
  redirect: URL;
  state: string;
  timeoutMs: number;
  log: ComponentLogger;
  onListening: () => Promise<void>;
}

function waitForAuthorizationCode(options: CallbackOptions): Promise<string> {
  const { redirect } = options;
  return new Promise<string>((resolve, reject) => {
    let settled = false;
    const server = http.createServer((req, res) => {
      const outcome = readCallback(req, redirect.pathname, options.state);
      if (outcome.kind === 'ignore') {
        respond(res, 404, 'Not found');
        return;
      }
      if (outcome.kind === 'error') {
        respond(res, 400, `Spotify login failed: ${outcome.message}`);
        finish(new Error(outcome.message));
        return;
      }
      respond(res, 200, 'Spotify login complete. You can close this tab.');
      finish(null, outcome.code);
    });

    const timer = setTimeout(() => {
      finish(new Error('timed out waiting for the spotify redirect'));
    }, options.timeoutMs);

    function finish(error: Error | null, code?: string): void {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      server.close();
      if (error || !code) {
        reject(error ?? new Error('no authorization code received'));
      } else {
        resolve(code);
      }
    }

    server.on('error', (error) => finish(error));
    server.listen(Number(redirect.port || 80), redirect.hostname, () => {
      options.log.info('waiting for spotify redirect', { redirectUri: redirect.toString() });
      options.onListening().catch((error: unknown) => {
        finish(error instanceof Error ? error : new Error(String(error)));
      });
    });
  });
}

export type CallbackOutcome =
  | { kind: 'code'; code: string }
  | { kind: 'error'; message: string }
  | { kind: 'ignore' };

export function readCallback(
  req: Pick<IncomingMessage, 'url'>,
  expectedPath: string,
  expectedState: string,
): CallbackOutcome {
  const url = new URL(req.url ?? '/', 'http://localhost');
  if (url.pathname !== expectedPath) {
    return { kind: 'ignore' };
  }
  const error = url.searchParams.get('error');
  if (error) {
    return { kind: 'error', message: error };
  }
  if (url.searchParams.get('state') !== expectedState) {
    return { kind: 'error', message: 'state mismatch' };
  }
  const code = url.searchParams.get('code');
  return code ? { kind: 'code', code } : { kind: 'error', message: 'missing code' };
}

function respond(res: ServerResponse, status: number, message: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
  res.end(message);
}
