import { createHash } from 'node:crypto';
import { UploadError, errorMessage } from '@/domain/errors';
import type { TrackSnapshot } from '@/domain/track/trackSnapshot';
import type { ArtworkUploadPort } from '@/ports/ArtworkUploadPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

/**
 * Cache key for a track's cover. Derived from the track identity rather than
 * the image bytes, so the same song never uploads twice even when a player
 * re-encodes its thumbnail.
 */
export function deriveArtworkCacheKey(
  snapshot: Pick<TrackSnapshot, 'title' | 'artist' | 'sourceId'>,
): string {
  return createHash('sha1')
    .update(`${snapshot.title}\0${snapshot.artist}\0${snapshot.sourceId}`)
    .digest('hex');
}

/**
 * Turns raw cover bytes into a public URL, once per cache key for the life of
 * the process. Failed uploads are not cached.
 */
export class ArtworkPublisher {
  private readonly cache = new Map<string, string>();

  constructor(
    private readonly uploader: ArtworkUploadPort,
    private readonly log: ComponentLogger = createLogger('Presence', 'Artwork'),
  ) {}

  public get size(): number {
    return this.cache.size;
  }

  public lookup(cacheKey: string): string | null {
    return this.cache.get(cacheKey) ?? null;
  }

  public async publish(cacheKey: string, bytes: Uint8Array): Promise<string> {
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }
    let url: string;
    try {
      url = await this.uploader.upload({ bytes, fileName: 'cover.jpg' });
    } catch (error) {
      if (error instanceof UploadError) {
        throw error;
      }
      throw new UploadError(errorMessage(error), { cause: error });
    }
    this.cache.set(cacheKey, url);
    this.log.debug('artwork uploaded', { cacheKey, url, bytes: bytes.byteLength });
    return url;
  }
}
