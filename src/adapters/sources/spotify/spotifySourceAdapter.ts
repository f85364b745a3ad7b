import type { SpotifyCurrentlyPlaying, SpotifyTrackObject } from '@/adapters/sources/spotify/spotifyTypes';
import type { SpotifyWebClient } from '@/adapters/sources/spotify/spotifyWebClient';
import { AdapterProbeError } from '@/domain/errors';
import { createTrackSnapshot, type TrackSnapshot } from '@/domain/track/trackSnapshot';
import type { SourceAdapter } from '@/ports/SourceAdapterPort';

/**
 * Largest album image; Spotify lists them widest first.
 */
export function pickCoverUrl(track: SpotifyTrackObject): string | undefined {
  const images = track.album?.images ?? [];
  const url = images.find((image) => typeof image.url === 'string' && image.url)?.url;
  return url || undefined;
}

export function toTrackSnapshot(payload: SpotifyCurrentlyPlaying): TrackSnapshot | null {
  const item = payload.item;
  if (!item || payload.currently_playing_type === 'ad') {
    return null;
  }
  const artists = (item.artists ?? [])
    .map((artist) => artist.name?.trim() ?? '')
    .filter((name) => name.length > 0);
  return createTrackSnapshot({
    title: item.name,
    artist: artists.join(', '),
    album: item.album?.name,
    artworkUrl: pickCoverUrl(item),
    sourceId: 'fallback',
    positionMs: payload.progress_ms ?? undefined,
    durationMs: item.duration_ms,
    isPlaying: payload.is_playing === true,
    externalId: item.id ?? undefined,
    playerName: 'Spotify',
  });
}

/**
 * Fallback source: the account's "currently playing" from the Web API.
 */
export class SpotifySourceAdapter implements SourceAdapter {
  public readonly id = 'fallback';
  public readonly name = 'spotify';

  constructor(private readonly client: SpotifyWebClient) {}

  public async probe(): Promise<TrackSnapshot | null> {
    const result = await this.client.request<SpotifyCurrentlyPlaying>('/me/player/currently-playing', {
      params: { additional_types: 'track' },
    });
    if (result.status === 204) {
      return null;
    }
    if (!result.ok) {
      throw new AdapterProbeError(
        this.id,
        result.status === 0
          ? `spotify unreachable: ${result.errorText}`
          : `spotify currently-playing failed with http ${result.status}`,
      );
    }
    return result.body ? toTrackSnapshot(result.body) : null;
  }
}
