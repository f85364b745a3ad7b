import { encodeInvite } from '@/domain/deeplink/invite';
import type { PresencePayload } from '@/domain/presence/types';
import type { TrackSnapshot } from '@/domain/track/trackSnapshot';

export interface PayloadOptions {
  /** Art asset key shown when no cover URL is available. */
  assetKey: string;
  partyId: string;
  inviteScheme: string;
}

const MIN_TEXT = 2;
const MAX_TEXT = 128;

/**
 * Builds the full update for a newly published track. The start timestamp is
 * back-dated by the playback position so the remote progress bar keeps
 * running without further updates.
 */
export function buildPresencePayload(
  snapshot: TrackSnapshot,
  artworkUrl: string | null,
  nowMs: number,
  options: PayloadOptions,
): PresencePayload {
  const startTimestamp = nowMs - (snapshot.positionMs ?? 0);
  const endTimestamp =
    snapshot.durationMs !== undefined && snapshot.durationMs > 0
      ? startTimestamp + snapshot.durationMs
      : undefined;

  const joinSecret = encodeInvite(
    {
      title: snapshot.title,
      artist: snapshot.artist,
      trackId: snapshot.externalId,
      startedAt: Math.floor(startTimestamp / 1000),
    },
    options.inviteScheme,
  );

  return {
    details: fitActivityText(snapshot.title),
    state: fitActivityText(`by ${snapshot.artist}`),
    largeImage: artworkUrl ?? options.assetKey,
    largeText: fitActivityText(snapshot.album || snapshot.title),
    smallText: snapshot.playerName ? fitActivityText(snapshot.playerName) : undefined,
    startTimestamp,
    endTimestamp,
    partyId: options.partyId,
    partySize: [1, 2],
    joinSecret,
  };
}

/**
 * Discord rejects activity strings shorter than 2 or longer than 128 characters.
 */
export function fitActivityText(value: string): string {
  const chars = Array.from(value.trim());
  if (chars.length > MAX_TEXT) {
    return chars.slice(0, MAX_TEXT - 1).join('') + '…';
  }
  const text = chars.join('');
  return text.length < MIN_TEXT ? text.padEnd(MIN_TEXT, ' ') : text;
}
