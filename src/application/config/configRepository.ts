import type { StoragePort } from '@/ports/StoragePort';
import type {
  LoggingConfig,
  PresenceAppConfig,
} from '@/domain/config/types';
import type { LogLevel } from '@/types/logLevel';

const LOG_LEVELS: readonly LogLevel[] = ['spam', 'debug', 'info', 'warn', 'error', 'none'];
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*$/;

/**
 * Configuration store backed by a JSON file on disk.
 */
export class ConfigRepository {
  private config: PresenceAppConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    private readonly configPath: string,
  ) {}

  public get path(): string {
    return this.configPath;
  }

  public async load(): Promise<PresenceAppConfig> {
    const fallback = defaultConfig();
    const loaded = await this.storage.readJson<unknown>(this.configPath, fallback, {
      writeIfMissing: true,
    });
    this.config = normalizeConfig(loaded);
    if (serializeConfig(this.config) !== serializeConfig(isRecord(loaded) ? loaded : {})) {
      await this.storage.writeJson(this.configPath, this.config);
    }
    return this.config;
  }

  public get(): PresenceAppConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.configPath, this.get());
  }

  public async update(
    mutator: (config: PresenceAppConfig) => void | Promise<void>,
  ): Promise<PresenceAppConfig> {
    const current = this.config ?? (await this.load());
    const before = serializeConfig(current);
    await mutator(current);
    this.config = normalizeConfig(current);
    if (serializeConfig(this.config) !== before) {
      this.config.updatedAt = new Date().toISOString();
    }
    await this.save();
    return this.config;
  }
}

function serializeConfig(config: unknown): string {
  return JSON.stringify(config, (key, value) => (key === 'updatedAt' ? undefined : value));
}

export function defaultConfig(): PresenceAppConfig {
  return {
    discord: {
      clientId: '',
      assetKey: 'music',
      partyId: 'listen-along',
      autoAcceptJoinRequests: true,
    },
    sources: {
      mediaSession: {
        enabled: true,
        players: [],
        timeoutMs: 4000,
      },
      spotify: {
        enabled: false,
        clientId: '',
        clientSecret: '',
        redirectUri: 'http://127.0.0.1:8888/callback',
        refreshToken: '',
      },
    },
    artwork: {
      enabled: true,
      uploadUrl: 'https://catbox.moe/user/api.php',
      maxBytes: 20 * 1024 * 1024,
      maxDimension: 512,
    },
    scheduler: { intervalMs: 5000 },
    startup: { connectAttempts: 3, retryDelayMs: 2000 },
    deepLink: {
      scheme: 'listenalong',
      searchUrlTemplate: 'https://open.spotify.com/search/{query}',
      matchByTitle: true,
      latencyOffsetMs: 1500,
    },
    tray: { enabled: false },
    logging: { consoleLevel: 'info', fileLevel: 'debug' },
  };
}

/**
 * Fills missing sections from the defaults and clamps values into range.
 * Unknown keys are dropped.
 */
export function normalizeConfig(raw: unknown): PresenceAppConfig {
  const defaults = defaultConfig();
  const root = isRecord(raw) ? raw : {};
  const discord = section(root, 'discord');
  const sources = section(root, 'sources');
  const mediaSession = section(sources, 'mediaSession');
  const spotify = section(sources, 'spotify');
  const artwork = section(root, 'artwork');
  const scheduler = section(root, 'scheduler');
  const startup = section(root, 'startup');
  const deepLink = section(root, 'deepLink');
  const tray = section(root, 'tray');
  const logging = section(root, 'logging');

  const scheme = str(deepLink.scheme, defaults.deepLink.scheme).toLowerCase();
  const searchUrlTemplate = str(deepLink.searchUrlTemplate, defaults.deepLink.searchUrlTemplate);

  const config: PresenceAppConfig = {
    discord: {
      clientId: str(discord.clientId, defaults.discord.clientId),
      assetKey: str(discord.assetKey, defaults.discord.assetKey) || defaults.discord.assetKey,
      partyId: str(discord.partyId, defaults.discord.partyId) || defaults.discord.partyId,
      autoAcceptJoinRequests: bool(
        discord.autoAcceptJoinRequests,
        defaults.discord.autoAcceptJoinRequests,
      ),
    },
    sources: {
      mediaSession: {
        enabled: bool(mediaSession.enabled, defaults.sources.mediaSession.enabled),
        players: Array.isArray(mediaSession.players)
          ? mediaSession.players
              .filter((entry): entry is string => typeof entry === 'string')
              .map((entry) => entry.trim())
              .filter(Boolean)
          : [],
        timeoutMs: int(mediaSession.timeoutMs, defaults.sources.mediaSession.timeoutMs, 500, 60_000),
      },
      spotify: {
        enabled: bool(spotify.enabled, defaults.sources.spotify.enabled),
        clientId: str(spotify.clientId, ''),
        clientSecret: str(spotify.clientSecret, ''),
        redirectUri: str(spotify.redirectUri, defaults.sources.spotify.redirectUri),
        refreshToken: str(spotify.refreshToken, ''),
      },
    },
    artwork: {
      enabled: bool(artwork.enabled, defaults.artwork.enabled),
      uploadUrl: str(artwork.uploadUrl, defaults.artwork.uploadUrl) || defaults.artwork.uploadUrl,
      maxBytes: int(artwork.maxBytes, defaults.artwork.maxBytes, 1024, defaults.artwork.maxBytes),
      maxDimension: int(artwork.maxDimension, defaults.artwork.maxDimension, 64, 2048),
    },
    scheduler: {
      intervalMs: int(scheduler.intervalMs, defaults.scheduler.intervalMs, 1000, 300_000),
    },
    startup: {
      connectAttempts: int(startup.connectAttempts, defaults.startup.connectAttempts, 1, 100),
      retryDelayMs: int(startup.retryDelayMs, defaults.startup.retryDelayMs, 0, 60_000),
    },
    deepLink: {
      scheme: SCHEME_PATTERN.test(scheme) ? scheme : defaults.deepLink.scheme,
      searchUrlTemplate: searchUrlTemplate.includes('{query}')
        ? searchUrlTemplate
        : defaults.deepLink.searchUrlTemplate,
      matchByTitle: bool(deepLink.matchByTitle, defaults.deepLink.matchByTitle),
      latencyOffsetMs: int(deepLink.latencyOffsetMs, defaults.deepLink.latencyOffsetMs, 0, 30_000),
    },
    tray: {
      enabled: bool(tray.enabled, defaults.tray.enabled),
    },
    logging: {
      consoleLevel: level(logging.consoleLevel, defaults.logging.consoleLevel),
      fileLevel: level(logging.fileLevel, defaults.logging.fileLevel),
    },
  };
  if (typeof root.updatedAt === 'string') {
    config.updatedAt = root.updatedAt;
  }
  return config;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: UnknownRecord, key: string): UnknownRecord {
  const value = parent[key];
  return isRecord(value) ? value : {};
}

function str(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value.trim() : fallback;
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function int(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(max, Math.max(min, Math.round(value)));
}

function level(value: unknown, fallback: LoggingConfig['consoleLevel']): LogLevel {
  return LOG_LEVELS.find((entry) => entry === value) ?? fallback;
}
