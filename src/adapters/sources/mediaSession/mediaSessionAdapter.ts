import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseFile } from 'music-metadata';
import { MediaControlReader } from '@/adapters/sources/mediaSession/mediaControlReader';
import { PlayerctlReader } from '@/adapters/sources/mediaSession/playerctlReader';
import { SmtcReader } from '@/adapters/sources/mediaSession/smtcReader';
import type { MediaSessionInfo, MediaSessionReader } from '@/adapters/sources/mediaSession/types';
import { runCommand, type CommandRunner } from '@/adapters/system/commandRunner';
import { createTrackSnapshot, type TrackSnapshot } from '@/domain/track/trackSnapshot';
import type { SourceAdapter } from '@/ports/SourceAdapterPort';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export interface MediaSessionAdapterOptions {
  /** Player allow-list; empty accepts any player. */
  players: readonly string[];
  timeoutMs: number;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  /** Overrides the platform reader (tests). */
  reader?: MediaSessionReader;
  readFile?: (path: string) => Promise<Uint8Array>;
  /** Cover embedded in a local audio file's tags. */
  readEmbeddedCover?: (path: string) => Promise<Uint8Array | null>;
  log?: ComponentLogger;
}

async function readEmbeddedCover(filePath: string): Promise<Uint8Array | null> {
  const metadata = await parseFile(filePath, { skipPostHeaders: true });
  const picture = metadata.common.picture?.[0];
  return picture?.data.length ? picture.data : null;
}

export function createMediaSessionReader(
  platform: NodeJS.Platform,
  run: CommandRunner,
  players: readonly string[],
  timeoutMs: number,
): MediaSessionReader | null {
  switch (platform) {
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return new PlayerctlReader(run, players, timeoutMs);
    case 'darwin':
      return new MediaControlReader(run, timeoutMs);
    case 'win32':
      return new SmtcReader(run, timeoutMs);
    default:
      return null;
  }
}

/**
 * Primary source: whatever the operating system reports as now playing.
 */
export class MediaSessionAdapter implements SourceAdapter {
  public readonly id = 'primary';
  public readonly name: string;

  private readonly reader: MediaSessionReader | null;
  private readonly players: string[];
  private readonly readFile: (path: string) => Promise<Uint8Array>;
  private readonly readEmbeddedCover: (path: string) => Promise<Uint8Array | null>;
  private readonly log: ComponentLogger;

  constructor(options: MediaSessionAdapterOptions) {
    const platform = options.platform ?? process.platform;
    this.players = options.players.map((player) => player.toLowerCase());
    this.reader =
      options.reader ??
      createMediaSessionReader(platform, options.run ?? runCommand, options.players, options.timeoutMs);
    this.readFile = options.readFile ?? ((path) => fs.readFile(path));
    this.readEmbeddedCover = options.readEmbeddedCover ?? readEmbeddedCover;
    this.log = options.log ?? createLogger('Sources', 'MediaSession');
    this.name = this.reader ? `media session (${this.reader.name})` : 'media session';
    if (!this.reader) {
      this.log.warn('no media session reader for this platform', { platform });
    }
  }

  public async probe(): Promise<TrackSnapshot | null> {
    if (!this.reader) {
      return null;
    }
    const info = await this.reader.read();
    if (!info || !this.isAllowed(info)) {
      return null;
    }
    return createTrackSnapshot({
      title: info.title,
      artist: info.artist,
      album: info.album,
      sourceId: this.id,
      isPlaying: info.isPlaying,
      positionMs: info.positionMs,
      durationMs: info.durationMs,
      playerName: info.playerName,
      externalId: info.spotifyTrackId,
      ...(await this.resolveArtwork(info)),
    });
  }

  private isAllowed(info: MediaSessionInfo): boolean {
    if (this.players.length === 0) {
      return true;
    }
    const player = info.playerName?.toLowerCase();
    return player !== undefined && this.players.some((entry) => player.includes(entry));
  }

  private async resolveArtwork(
    info: MediaSessionInfo,
  ): Promise<{ artworkUrl?: string; artworkBytes?: Uint8Array }> {
    if (info.artworkBase64) {
      return { artworkBytes: Buffer.from(info.artworkBase64, 'base64') };
    }
    const artUrl = info.artUrl;
    if (!artUrl) {
      return this.embeddedArtwork(info.trackUrl);
    }
    if (/^https?:\/\//i.test(artUrl)) {
      return { artworkUrl: artUrl };
    }
    if (artUrl.startsWith('file://')) {
      const bytes = await bestEffort<Uint8Array | null>(() => this.readFile(fileURLToPath(artUrl)), {
        fallback: null,
        onError: 'debug',
        log: this.log,
        label: 'cover file unreadable',
        context: { artUrl },
      });
      return bytes ? { artworkBytes: bytes } : {};
    }
    return {};
  }

  private async embeddedArtwork(trackUrl: string | undefined): Promise<{ artworkBytes?: Uint8Array }> {
    if (!trackUrl?.startsWith('file://')) {
      return {};
    }
    const bytes = await bestEffort<Uint8Array | null>(() => this.readEmbeddedCover(fileURLToPath(trackUrl)), {
      fallback: null,
      onError: 'debug',
      log: this.log,
      label: 'embedded cover unreadable',
      context: { trackUrl },
    });
    return bytes ? { artworkBytes: bytes } : {};
  }
}
