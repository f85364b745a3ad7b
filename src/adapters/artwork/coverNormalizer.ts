import { Jimp, JimpMime } from 'jimp';
import { errorMessage } from '@/domain/errors';
import type { ArtworkUploadPort, ArtworkUploadRequest } from '@/ports/ArtworkUploadPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

const JPEG_QUALITY = 85;

/**
 * Re-encodes covers as JPEG no larger than `maxDimension` on either side
 * before handing them to the real uploader. Bytes Jimp cannot decode are
 * uploaded unchanged.
 */
export class NormalizingUploader implements ArtworkUploadPort {
  private readonly log: ComponentLogger;

  constructor(
    private readonly inner: ArtworkUploadPort,
    private readonly maxDimension: number,
    log?: ComponentLogger,
  ) {
    this.log = log ?? createLogger('Artwork', 'Normalizer');
  }

  public async upload(request: ArtworkUploadRequest): Promise<string> {
    return this.inner.upload(await this.normalize(request));
  }

  private async normalize(request: ArtworkUploadRequest): Promise<ArtworkUploadRequest> {
    try {
      const image = await Jimp.read(Buffer.from(request.bytes));
      const { width, height } = image.bitmap;
      const scale = Math.min(1, this.maxDimension / width, this.maxDimension / height);
      if (scale < 1) {
        image.scale(scale);
      }
      const bytes = await image.getBuffer(JimpMime.jpeg, { quality: JPEG_QUALITY });
      this.log.spam('cover normalized', {
        from: `${width}x${height}`,
        to: `${image.bitmap.width}x${image.bitmap.height}`,
        bytes: bytes.byteLength,
      });
      return { bytes, fileName: 'cover.jpg', mimeType: 'image/jpeg' };
    } catch (error) {
      this.log.debug('cover not decodable; uploading as is', { message: errorMessage(error) });
      return request;
    }
  }
}
