import { LogStatusReporter, StatusFanout } from '@/adapters/status/logStatusReporter';
import { TrayController } from '@/adapters/tray/trayController';
import { Arbitrator } from '@/application/arbitration/arbitrator';
import { PresenceReconciler } from '@/application/presence/presenceReconciler';
import { connectWithRetry } from '@/application/presence/startupConnect';
import { PresenceLoop } from '@/application/scheduler/presenceLoop';
import { errorMessage } from '@/domain/errors';
import {
  createArtworkPublisher,
  createDeepLinkResolver,
  createPresenceSession,
  createSourceAdapters,
  createSpotifyClient,
} from '@/runtime/components';
import type { RuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';
import { createLogger } from '@/shared/logging/logger';

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** Fires once the loop has processed an `exit` command (tray or signal). */
  onExitRequested: (listener: () => void) => void;
};

export type RuntimeOptions = {
  assetsDir: string;
};

type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
  timeoutMs: number;
};

/**
 * Host mode: publish the local now-playing track until asked to stop.
 * The configuration must already be loaded into `ports.config`.
 */
export function createRuntime(ports: RuntimePorts, options: RuntimeOptions): Runtime {
  const log = createLogger('Runtime');
  const config = ports.config.getConfig();

  const session = createPresenceSession(config);
  const spotify = createSpotifyClient(ports.config);
  const adapters = createSourceAdapters(config, spotify);
  if (!adapters.primary && !adapters.fallback) {
    log.warn('no track source is enabled; presence will stay empty');
  }

  const status = new StatusFanout([new LogStatusReporter()]);
  const reconciler = new PresenceReconciler({
    session,
    clock: ports.clock,
    payload: {
      assetKey: config.discord.assetKey,
      partyId: config.discord.partyId,
      inviteScheme: config.deepLink.scheme,
    },
    artwork: createArtworkPublisher(config),
    status,
  });
  const loop = new PresenceLoop({
    selector: new Arbitrator(adapters),
    reconciler,
    intervalMs: config.scheduler.intervalMs,
  });
  const resolver = createDeepLinkResolver(config, ports.clock, spotify);

  const tray = config.tray.enabled
    ? new TrayController({
        iconDir: options.assetsDir,
        onCommand: (command) => {
          void loop.dispatch(command);
        },
      })
    : null;

  let started = false;
  let unsubscribeJoin: (() => void) | null = null;

  const services: LifecycleService[] = [
    { name: 'presence loop', stop: () => loop.dispatch('exit'), timeoutMs: 5000 },
    {
      name: 'tray',
      stop: async () => {
        await tray?.stop();
      },
      timeoutMs: 1000,
    },
  ];

  const start = async () => {
    log.info('starting presence host', {
      configPath: ports.config.getConfigPath(),
      sources: Object.keys(adapters).join(',') || 'none',
      intervalMs: config.scheduler.intervalMs,
    });

    await connectWithRetry(session, {
      attempts: config.startup.connectAttempts,
      delayMs: config.startup.retryDelayMs,
    });

    unsubscribeJoin = session.onJoin((secret) => {
      resolver.resolve(secret).then(
        (action) => log.info('join handled', { kind: action.kind }),
        (error: unknown) => log.warn('join handling failed', { message: errorMessage(error) }),
      );
    });

    if (tray) {
      try {
        await tray.start();
        status.add(tray);
      } catch (error) {
        log.warn('tray unavailable; continuing without it', { message: errorMessage(error) });
      }
    }

    loop.start();
    started = true;
  };

  const stop = async () => {
    unsubscribeJoin?.();
    unsubscribeJoin = null;
    if (!started) {
      await session.disconnect();
      return;
    }
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, service.timeoutMs, log);
    }
  };

  return {
    start,
    stop,
    onExitRequested: (listener) => {
      loop.onExit(listener);
    },
  };
}
