/**
 * Priority order of the track sources. The arbitrator walks this list
 * front to back; it is never reordered at runtime.
 */
export const SOURCE_PRIORITY = ['primary', 'fallback'] as const;

export type SourceId = (typeof SOURCE_PRIORITY)[number];

/**
 * Point-in-time read of what a single source is playing.
 */
export interface TrackSnapshot {
  readonly title: string;
  readonly artist: string;
  readonly album?: string;
  /** Raw cover image; needs an upload before the remote side can show it. */
  readonly artworkBytes?: Uint8Array;
  /** Cover that is already publicly reachable and can be referenced directly. */
  readonly artworkUrl?: string;
  readonly sourceId: SourceId;
  readonly positionMs?: number;
  readonly durationMs?: number;
  readonly isPlaying: boolean;
  /** Streaming-service track id (Spotify) when the source knows it. */
  readonly externalId?: string;
  /** Human-readable player name, e.g. "Spotify" or "Music". */
  readonly playerName?: string;
}

export type TrackSnapshotInput = Omit<TrackSnapshot, 'title' | 'artist'> & {
  title?: string | null;
  artist?: string | null;
};

const UNKNOWN_TITLE = 'Unknown';
const UNKNOWN_ARTIST = 'Unknown Artist';

export function createTrackSnapshot(input: TrackSnapshotInput): TrackSnapshot {
  const snapshot: TrackSnapshot = {
    ...input,
    title: cleanText(input.title) || UNKNOWN_TITLE,
    artist: cleanText(input.artist) || UNKNOWN_ARTIST,
    album: cleanText(input.album) || undefined,
    positionMs: normalizeMs(input.positionMs),
    durationMs: normalizeMs(input.durationMs),
  };
  return Object.freeze(snapshot);
}

/**
 * Identity used for reconciliation: position and duration are ignored so
 * that a progressing track does not count as a change.
 */
export function isSameTrack(left: TrackSnapshot | null, right: TrackSnapshot | null): boolean {
  if (!left || !right) {
    return left === right;
  }
  return (
    left.title === right.title &&
    left.artist === right.artist &&
    left.sourceId === right.sourceId
  );
}

export function describeTrack(snapshot: TrackSnapshot): string {
  return `${snapshot.title} — ${snapshot.artist}`;
}

function cleanText(value: string | null | undefined): string {
  return typeof value === 'string' ? value.trim() : '';
}

function normalizeMs(value: number | undefined): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return undefined;
  }
  return Math.round(value);
}
