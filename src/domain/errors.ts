import type { SourceId } from '@/domain/track/trackSnapshot';

/**
 * A source adapter could not be read this tick. Recovered by the arbitrator,
 * which treats the adapter as having nothing to report.
 */
export class AdapterProbeError extends Error {
  public readonly name = 'AdapterProbeError';

  constructor(
    public readonly sourceId: SourceId,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The artwork transport gave up. The tick proceeds without artwork.
 */
export class UploadError extends Error {
  public readonly name = 'UploadError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Raised by a presence session when `update`/`clear` is called while disconnected.
 */
export class NotConnectedError extends Error {
  public readonly name = 'NotConnectedError';

  constructor(message = 'presence session is not connected') {
    super(message);
  }
}

export class StartupConnectError extends Error {
  public readonly name = 'StartupConnectError';

  constructor(
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`could not connect presence session after ${attempts} attempt(s)`, options);
  }
}

export class ConfigError extends Error {
  public readonly name = 'ConfigError';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
