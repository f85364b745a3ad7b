import { errorMessage } from '@/domain/errors';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type Stoppable = {
  stop: () => Promise<void>;
};

export type ShutdownHooks = {
  exit?: (code: number) => void;
  forceExitMs?: number;
  /** Defaults to the real process; tests pass an EventEmitter. */
  target?: NodeJS.EventEmitter;
};

const SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP'] as const;

/**
 * Routes termination signals and fatal errors into a single release path.
 * Returns the shutdown function so other triggers (the tray Exit item) can
 * reuse it.
 */
export function registerShutdownHandlers(
  runtime: Stoppable,
  log: ComponentLogger = createLogger('Runtime'),
  hooks: ShutdownHooks = {},
): (reason: string, code?: number) => Promise<void> {
  const exit = hooks.exit ?? ((code: number) => process.exit(code));
  const target = hooks.target ?? process;
  let shuttingDown = false;

  const shutdown = async (reason: string, code = 0) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    log.info('shutting down', { reason });

    // A stop step that never settles must not keep the process alive.
    const forceExit = setTimeout(() => {
      log.warn('shutdown timed out; forcing exit');
      exit(1);
    }, hooks.forceExitMs ?? 8000);

    try {
      await runtime.stop();
    } catch (error) {
      log.error('shutdown failed', { message: errorMessage(error) });
      code = 1;
    }

    clearTimeout(forceExit);
    exit(code);
  };

  for (const signal of SIGNALS) {
    target.on(signal, () => {
      void shutdown(signal);
    });
  }
  target.on('uncaughtException', (error: unknown) => {
    log.error('uncaught exception', { message: errorMessage(error) });
    void shutdown('uncaughtException', 1);
  });
  target.on('unhandledRejection', (reason: unknown) => {
    log.error('unhandled rejection', { message: errorMessage(reason) });
    void shutdown('unhandledRejection', 1);
  });

  return shutdown;
}
