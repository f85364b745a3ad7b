import { UploadError, errorMessage } from '@/domain/errors';
import type { ArtworkUploadPort, ArtworkUploadRequest } from '@/ports/ArtworkUploadPort';
import { safeReadText } from '@/shared/bestEffort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { globalFetch, type FetchLike } from '@/shared/utils/fetch';

export interface CatboxUploaderOptions {
  uploadUrl: string;
  maxBytes: number;
  attempts?: number;
  timeoutMs?: number;
  retryDelayMs?: number;
  fetch?: FetchLike;
  log?: ComponentLogger;
}

const MAX_URL_LENGTH = 500;

/**
 * Anonymous image upload to catbox.moe (`reqtype=fileupload`). The service
 * answers with the public file URL as plain text.
 */
export class CatboxUploader implements ArtworkUploadPort {
  private readonly fetchImpl: FetchLike;
  private readonly attempts: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly log: ComponentLogger;

  constructor(private readonly options: CatboxUploaderOptions) {
    this.fetchImpl = options.fetch ?? globalFetch;
    this.attempts = Math.max(1, options.attempts ?? 2);
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.log = options.log ?? createLogger('Artwork', 'Catbox');
  }

  public async upload(request: ArtworkUploadRequest): Promise<string> {
    const size = request.bytes.byteLength;
    if (size === 0) {
      throw new UploadError('artwork is empty');
    }
    if (size > this.options.maxBytes) {
      throw new UploadError(`artwork is ${size} bytes, limit is ${this.options.maxBytes}`);
    }

    let lastError = 'upload failed';
    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      try {
        return await this.send(request);
      } catch (error) {
        lastError = errorMessage(error);
        this.log.debug('artwork upload attempt failed', { attempt, message: lastError });
        if (attempt < this.attempts && this.retryDelayMs > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
        }
      }
    }
    throw new UploadError(`catbox upload failed after ${this.attempts} attempt(s): ${lastError}`);
  }

  private async send(request: ArtworkUploadRequest): Promise<string> {
    const form = new FormData();
    form.append('reqtype', 'fileupload');
    form.append(
      'fileToUpload',
      new Blob([request.bytes], { type: request.mimeType ?? 'image/jpeg' }),
      request.fileName ?? 'cover.jpg',
    );

    const res = await this.fetchImpl(this.options.uploadUrl, {
      method: 'POST',
      body: form,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const text = (
      await safeReadText(res, '', {
        onError: 'debug',
        log: this.log,
        label: 'catbox response read failed',
        context: { status: res.status },
      })
    ).trim();
    if (!res.ok) {
      throw new Error(`http ${res.status}: ${text.slice(0, 200)}`);
    }
    if (!isPublicUrl(text)) {
      throw new Error(`unexpected response: ${text.slice(0, 200)}`);
    }
    return text;
  }
}

function isPublicUrl(value: string): boolean {
  return /^https?:\/\/\S+$/.test(value) && value.length < MAX_URL_LENGTH;
}
