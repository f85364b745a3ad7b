import type { LogLevel } from '@/types/logLevel';

export interface PresenceAppConfig {
  discord: DiscordConfig;
  sources: SourcesConfig;
  artwork: ArtworkConfig;
  scheduler: SchedulerConfig;
  startup: StartupConfig;
  deepLink: DeepLinkConfig;
  tray: TrayConfig;
  logging: LoggingConfig;
  updatedAt?: string;
}

export interface DiscordConfig {
  /** Application id from the Discord developer portal. */
  clientId: string;
  /** Rich Presence art asset shown when a track has no cover. */
  assetKey: string;
  partyId: string;
  autoAcceptJoinRequests: boolean;
}

export interface SourcesConfig {
  mediaSession: MediaSessionSourceConfig;
  spotify: SpotifySourceConfig;
}

export interface MediaSessionSourceConfig {
  enabled: boolean;
  /**
   * Case-insensitive player names (MPRIS identity, bundle id or app id) to
   * accept. Empty accepts every player.
   */
  players: string[];
  timeoutMs: number;
}

export interface SpotifySourceConfig {
  enabled: boolean;
  clientId: string;
  /** Optional; without it the PKCE refresh flow is used. */
  clientSecret: string;
  redirectUri: string;
  refreshToken: string;
}

export interface ArtworkConfig {
  enabled: boolean;
  uploadUrl: string;
  maxBytes: number;
  /** Covers are scaled down to fit this many pixels per side before upload. */
  maxDimension: number;
}

export interface SchedulerConfig {
  intervalMs: number;
}

export interface StartupConfig {
  connectAttempts: number;
  retryDelayMs: number;
}

export interface DeepLinkConfig {
  scheme: string;
  /** `{query}` is replaced with the URL-encoded "title artist". */
  searchUrlTemplate: string;
  matchByTitle: boolean;
  latencyOffsetMs: number;
}

export interface TrayConfig {
  enabled: boolean;
}

export interface LoggingConfig {
  consoleLevel: LogLevel;
  fileLevel: LogLevel;
}
