import { StartupConnectError, errorMessage } from '@/domain/errors';
import type { PresenceSessionPort } from '@/ports/PresenceSessionPort';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export interface ConnectRetryOptions {
  attempts: number;
  delayMs: number;
  log?: ComponentLogger;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Opens the presence session at startup, waiting `delayMs` between attempts.
 * Throws StartupConnectError once every attempt has failed.
 */
export async function connectWithRetry(
  session: PresenceSessionPort,
  options: ConnectRetryOptions,
): Promise<void> {
  const log = options.log ?? createLogger('Presence', 'Startup');
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, Math.floor(options.attempts));
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      await session.connect();
      log.info('presence session connected', { attempt });
      return;
    } catch (error) {
      lastError = error;
      log.warn('presence session connect failed', {
        attempt,
        attempts,
        message: errorMessage(error),
      });
      if (attempt < attempts && options.delayMs > 0) {
        await sleep(options.delayMs);
      }
    }
  }
  throw new StartupConnectError(attempts, { cause: lastError });
}
