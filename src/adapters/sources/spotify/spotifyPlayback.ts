import {
  acceptTopByPrefix,
  pickBestMatch,
  plainQuery,
  structuredQuery,
  type MatchCandidate,
} from '@/adapters/sources/spotify/trackMatching';
import type {
  SpotifyPlaybackState,
  SpotifySearchResponse,
  SpotifyTrackObject,
} from '@/adapters/sources/spotify/spotifyTypes';
import type { SpotifyApiResult, SpotifyWebClient } from '@/adapters/sources/spotify/spotifyWebClient';
import type {
  PlayFailureReason,
  PlayOutcome,
  PlayRequest,
  StreamingPlaybackPort,
} from '@/ports/PlaybackPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

interface SearchHit extends MatchCandidate {
  uri: string;
}

/**
 * Maps a failed `PUT /me/player/play` onto a reason the resolver can report.
 */
export function classifyPlayFailure(result: SpotifyApiResult<unknown>): PlayFailureReason {
  const text = result.errorText.toLowerCase();
  if (result.status === 404 || text.includes('no active device') || text.includes('player command failed')) {
    return 'no_active_device';
  }
  if (result.status === 403) {
    return 'premium_required';
  }
  if (result.status === 401) {
    return 'unauthorized';
  }
  if (result.status === 502 || result.status === 503) {
    return 'server_error';
  }
  return 'playback_error';
}

function toHit(track: SpotifyTrackObject): SearchHit | null {
  if (!track.uri || !track.name) {
    return null;
  }
  return {
    uri: track.uri,
    name: track.name,
    artists: (track.artists ?? []).map((artist) => artist.name ?? ''),
  };
}

/**
 * Starts a listen-along track on the user's active Spotify device.
 */
export class SpotifyPlayback implements StreamingPlaybackPort {
  private readonly log: ComponentLogger;

  constructor(
    private readonly client: SpotifyWebClient,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('DeepLink', 'SpotifyPlayback');
  }

  public async hasActiveSession(): Promise<boolean> {
    if (!this.client.isConfigured) {
      return false;
    }
    const result = await this.client.request<SpotifyPlaybackState>('/me/player');
    if (!result.ok || result.status === 204 || !result.body) {
      return false;
    }
    return result.body.device?.is_active === true;
  }

  public async play(request: PlayRequest): Promise<PlayOutcome> {
    const target = request.trackId
      ? { uri: `spotify:track:${request.trackId}`, name: request.title }
      : await this.search(request.title, request.artist);
    if (!target) {
      return { ok: false, reason: 'no_match' };
    }

    const result = await this.client.request<unknown>('/me/player/play', {
      method: 'PUT',
      json: {
        uris: [target.uri],
        ...(request.positionMs > 0 ? { position_ms: Math.round(request.positionMs) } : {}),
      },
    });
    if (!result.ok) {
      const reason = classifyPlayFailure(result);
      this.log.debug('spotify play failed', { status: result.status, reason });
      return { ok: false, reason };
    }
    return { ok: true, trackName: target.name };
  }

  /**
   * Structured `track:… artist:…` search first, then a plain-text search.
   */
  public async search(title: string, artist: string): Promise<SearchHit | null> {
    const structured = await this.searchTracks(structuredQuery(title, artist), 5);
    const fromStructured = pickBestMatch(structured, title, artist);
    if (fromStructured) {
      return fromStructured;
    }
    if (structured.length > 0) {
      this.log.debug('structured search had results but no match', { count: structured.length });
    }

    const plain = await this.searchTracks(plainQuery(title, artist), 10);
    return pickBestMatch(plain, title, artist) ?? acceptTopByPrefix(plain, title);
  }

  private async searchTracks(query: string, limit: number): Promise<SearchHit[]> {
    if (!query) {
      return [];
    }
    const result = await this.client.request<SpotifySearchResponse>('/search', {
      params: { q: query, type: 'track', limit: String(limit) },
    });
    const items = result.body?.tracks?.items ?? [];
    return items.map(toHit).filter((hit): hit is SearchHit => hit !== null);
  }
}
