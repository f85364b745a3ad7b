import { AdapterProbeError } from '@/domain/errors';
import type { MediaSessionInfo, MediaSessionReader } from '@/adapters/sources/mediaSession/types';
import { CommandError, type CommandRunner } from '@/adapters/system/commandRunner';

const FIELDS = [
  'playerName',
  'status',
  'xesam:title',
  'xesam:artist',
  'xesam:album',
  'mpris:artUrl',
  'position',
  'mpris:length',
  'mpris:trackid',
  'xesam:url',
] as const;

export const PLAYERCTL_FORMAT = FIELDS.map((field) => `{{${field}}}`).join('\t');

const SPOTIFY_TRACK_ID = /(?:spotify[:/]track[:/])([A-Za-z0-9]{22})$/;

/**
 * Parses one line of `playerctl metadata --format` output. MPRIS reports
 * position and length in microseconds.
 */
export function parsePlayerctlLine(line: string): MediaSessionInfo | null {
  const values = line.replace(/\r?\n$/, '').split('\t');
  if (values.length < FIELDS.length) {
    return null;
  }
  const [playerName, status, title, artist, album, artUrl, position, length, trackId, url] = values;
  if (!title.trim() && !artist.trim()) {
    return null;
  }
  const spotifyTrackId = SPOTIFY_TRACK_ID.exec(trackId.trim())?.[1];
  const trackUrl = url.trim();
  return {
    playerName: playerName.trim() || undefined,
    title: title.trim(),
    artist: artist.trim(),
    album: album.trim() || undefined,
    isPlaying: status.trim().toLowerCase() === 'playing',
    positionMs: microsToMs(position),
    durationMs: microsToMs(length),
    artUrl: artUrl.trim() || undefined,
    ...(spotifyTrackId ? { spotifyTrackId } : {}),
    ...(trackUrl ? { trackUrl } : {}),
  };
}

function microsToMs(raw: string): number | undefined {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Math.round(Number(trimmed) / 1000);
}

/**
 * Linux MPRIS through `playerctl`.
 */
export class PlayerctlReader implements MediaSessionReader {
  public readonly name = 'playerctl';

  constructor(
    private readonly run: CommandRunner,
    private readonly players: readonly string[],
    private readonly timeoutMs: number,
  ) {}

  public async read(): Promise<MediaSessionInfo | null> {
    const args = this.players.length > 0 ? [`--player=${this.players.join(',')}`] : [];
    args.push('metadata', '--format', PLAYERCTL_FORMAT);
    try {
      const { stdout } = await this.run('playerctl', args, { timeoutMs: this.timeoutMs });
      const line = stdout.split('\n').find((entry) => entry.trim().length > 0);
      return line ? parsePlayerctlLine(line) : null;
    } catch (error) {
      if (error instanceof CommandError && !error.missing && /no player/i.test(error.stderr)) {
        return null;
      }
      const message =
        error instanceof CommandError && error.missing
          ? 'playerctl is not installed'
          : `playerctl failed: ${error instanceof Error ? error.message : String(error)}`;
      throw new AdapterProbeError('primary', message, { cause: error });
    }
  }
}
