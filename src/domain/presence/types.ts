import type { TrackSnapshot } from '@/domain/track/trackSnapshot';

export type PresenceMode = 'idle' | 'active' | 'paused';

/**
 * What the remote side currently shows, as far as this process knows.
 */
export interface PublishedState {
  lastSnapshot: TrackSnapshot | null;
  artworkUrl: string | null;
  artworkCacheKey: string | null;
  connected: boolean;
}

export interface PresenceState {
  mode: PresenceMode;
  published: PublishedState;
  lastError: string | null;
}

export function createPresenceState(): PresenceState {
  return {
    mode: 'idle',
    published: {
      lastSnapshot: null,
      artworkUrl: null,
      artworkCacheKey: null,
      connected: false,
    },
    lastError: null,
  };
}

/**
 * Protocol-neutral presence payload; the session adapter maps it onto the wire format.
 */
export interface PresencePayload {
  details: string;
  state: string;
  largeImage: string;
  largeText: string;
  smallText?: string;
  startTimestamp: number;
  endTimestamp?: number;
  partyId: string;
  partySize: [current: number, max: number];
  joinSecret?: string;
}

export interface PresenceStatus {
  mode: PresenceMode;
  connected: boolean;
  track: { title: string; artist: string; sourceId: TrackSnapshot['sourceId'] } | null;
  lastError: string | null;
}
