import { AdapterProbeError, errorMessage } from '@/domain/errors';
import type { MediaSessionInfo, MediaSessionReader } from '@/adapters/sources/mediaSession/types';
import { CommandError, type CommandRunner } from '@/adapters/system/commandRunner';
import { safeJsonParse } from '@/shared/bestEffort';

type JsonRecord = Record<string, unknown>;

/**
 * Parses the JSON printed by `media-control get` (macOS). The Windows reader
 * prints the same shape. Durations and elapsed time are in seconds;
 * `null` or an empty object means no session.
 */
export function parseMediaControlJson(raw: string): MediaSessionInfo | null {
  const trimmed = raw.trim();
  if (!trimmed || trimmed === 'null') {
    return null;
  }
  const parsed = safeJsonParse<unknown>(trimmed, null);
  if (!isRecord(parsed)) {
    throw new Error('media session output is not a JSON object');
  }
  const payload = isRecord(parsed.payload) ? parsed.payload : parsed;

  const title = text(payload.title);
  const artist = text(payload.artist);
  if (!title && !artist) {
    return null;
  }
  const artworkBase64 = text(payload.artworkData);
  return {
    playerName: text(payload.playerName) ?? text(payload.bundleIdentifier),
    title: title ?? '',
    artist: artist ?? '',
    album: text(payload.album),
    isPlaying: payload.playing === true,
    positionMs: secondsToMs(payload.elapsedTime),
    durationMs: secondsToMs(payload.duration),
    ...(artworkBase64
      ? { artworkBase64, artworkMimeType: text(payload.artworkMimeType) ?? 'image/jpeg' }
      : {}),
  };
}

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function secondsToMs(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? Math.round(value * 1000)
    : undefined;
}

/**
 * macOS now-playing through the `media-control` CLI.
 */
export class MediaControlReader implements MediaSessionReader {
  public readonly name = 'media-control';

  constructor(
    private readonly run: CommandRunner,
    private readonly timeoutMs: number,
  ) {}

  public async read(): Promise<MediaSessionInfo | null> {
    let stdout: string;
    try {
      ({ stdout } = await this.run('media-control', ['get'], { timeoutMs: this.timeoutMs }));
    } catch (error) {
      const message =
        error instanceof CommandError && error.missing
          ? 'media-control is not installed'
          : `media-control failed: ${errorMessage(error)}`;
      throw new AdapterProbeError('primary', message, { cause: error });
    }
    try {
      return parseMediaControlJson(stdout);
    } catch (error) {
      throw new AdapterProbeError('primary', errorMessage(error), { cause: error });
    }
  }
}
