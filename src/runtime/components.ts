import { CatboxUploader } from '@/adapters/artwork/catboxUploader';
import { NormalizingUploader } from '@/adapters/artwork/coverNormalizer';
import { DiscordPresenceSession } from '@/adapters/discord/discordPresenceSession';
import { MediaSessionAdapter } from '@/adapters/sources/mediaSession/mediaSessionAdapter';
import { SpotifyPlayback } from '@/adapters/sources/spotify/spotifyPlayback';
import { SpotifySourceAdapter } from '@/adapters/sources/spotify/spotifySourceAdapter';
import { SpotifyWebClient } from '@/adapters/sources/spotify/spotifyWebClient';
import { SystemUrlOpener } from '@/adapters/system/urlOpener';
import { ArtworkPublisher } from '@/application/artwork/artworkPublisher';
import { DeepLinkResolver } from '@/application/deeplink/deepLinkResolver';
import type { PresenceAppConfig } from '@/domain/config/types';
import { ConfigError } from '@/domain/errors';
import type { ClockPort } from '@/ports/ClockPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { StreamingPlaybackPort, UrlOpenerPort } from '@/ports/PlaybackPort';
import type { SourceAdapterRegistry } from '@/ports/SourceAdapterPort';
import { RotatingLogFile } from '@/shared/logging/logFile';
import { createLogger, logManager } from '@/shared/logging/logger';

/**
 * Applies the configured console and file thresholds to the global logger.
 */
export function configureLogging(config: PresenceAppConfig, logFilePath: string): void {
  const { consoleLevel, fileLevel } = config.logging;
  logManager.configure({
    level: consoleLevel,
    file: fileLevel === 'none' ? null : new RotatingLogFile(logFilePath),
    fileLevel,
  });
}

/**
 * Spotify Web API client, or null when the account is disabled or was never
 * linked with `--spotify-login`.
 */
export function createSpotifyClient(configPort: ConfigPort): SpotifyWebClient | null {
  const spotify = configPort.getConfig().sources.spotify;
  if (!spotify.enabled) {
    return null;
  }
  const client = new SpotifyWebClient({
    clientId: spotify.clientId,
    clientSecret: spotify.clientSecret || undefined,
    refreshToken: spotify.refreshToken,
    persistRefreshToken: async (refreshToken) => {
      await configPort.updateConfig((current) => {
        current.sources.spotify.refreshToken = refreshToken;
      });
    },
  });
  if (!client.isConfigured) {
    createLogger('Runtime').warn('spotify source enabled but not linked; run --spotify-login');
    return null;
  }
  return client;
}

export function createSourceAdapters(
  config: PresenceAppConfig,
  spotify: SpotifyWebClient | null,
): SourceAdapterRegistry {
  const adapters: SourceAdapterRegistry = {};
  const { mediaSession } = config.sources;
  if (mediaSession.enabled) {
    adapters.primary = new MediaSessionAdapter({
      players: mediaSession.players,
      timeoutMs: mediaSession.timeoutMs,
    });
  }
  if (spotify) {
    adapters.fallback = new SpotifySourceAdapter(spotify);
  }
  return adapters;
}

export function createArtworkPublisher(config: PresenceAppConfig): ArtworkPublisher | null {
  if (!config.artwork.enabled) {
    return null;
  }
  const uploader = new CatboxUploader({
    uploadUrl: config.artwork.uploadUrl,
    maxBytes: config.artwork.maxBytes,
  });
  return new ArtworkPublisher(new NormalizingUploader(uploader, config.artwork.maxDimension));
}

export function createPresenceSession(config: PresenceAppConfig): DiscordPresenceSession {
  const { clientId, autoAcceptJoinRequests } = config.discord;
  if (!clientId) {
    throw new ConfigError('discord.clientId is not set');
  }
  return new DiscordPresenceSession({ clientId, autoAcceptJoinRequests });
}

export function createDeepLinkResolver(
  config: PresenceAppConfig,
  clock: ClockPort,
  spotify: SpotifyWebClient | null,
  opener: UrlOpenerPort = new SystemUrlOpener(),
): DeepLinkResolver {
  const playback: StreamingPlaybackPort | null = spotify ? new SpotifyPlayback(spotify) : null;
  return new DeepLinkResolver({
    ...config.deepLink,
    opener,
    clock,
    playback,
  });
}

/**
 * Custom schemes this program answers: the configured invite scheme and, when
 * a Discord application is set, `discord-<clientId>`.
 */
export function inviteSchemes(config: PresenceAppConfig): string[] {
  const schemes = [config.deepLink.scheme];
  if (config.discord.clientId) {
    schemes.push(`discord-${config.discord.clientId}`);
  }
  return schemes;
}
