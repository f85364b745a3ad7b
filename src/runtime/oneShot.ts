import { runSpotifyLogin } from '@/adapters/sources/spotify/spotifyLogin';
import { currentLaunchCommand, registerUriSchemes } from '@/adapters/system/uriRegistration';
import { SystemUrlOpener } from '@/adapters/system/urlOpener';
import { connectWithRetry } from '@/application/presence/startupConnect';
import type { DeepLinkResolver } from '@/application/deeplink/deepLinkResolver';
import type { PresenceAppConfig } from '@/domain/config/types';
import { errorMessage } from '@/domain/errors';
import type { PresenceSessionPort } from '@/ports/PresenceSessionPort';
import {
  createDeepLinkResolver,
  createPresenceSession,
  createSpotifyClient,
  inviteSchemes,
} from '@/runtime/components';
import type { RuntimePorts } from '@/runtime/ports';
import { createLogger, type ComponentLogger } from '@/shared/logging/logger';

export type OneShotCommand = 'clear' | 'register-uri' | 'spotify-login' | { join: string };

/**
 * Connects, clears whatever a previous run left on the profile and leaves.
 */
export async function clearRemotePresence(
  session: PresenceSessionPort,
  config: PresenceAppConfig,
  log: ComponentLogger,
): Promise<number> {
  try {
    await connectWithRetry(session, {
      attempts: config.startup.connectAttempts,
      delayMs: config.startup.retryDelayMs,
      log,
    });
    await session.clear();
    log.info('presence cleared');
    return 0;
  } catch (error) {
    log.error('clear failed', { message: errorMessage(error) });
    return 1;
  } finally {
    await session.disconnect();
  }
}

/**
 * Handles one invite URI the way a Join click would.
 */
export async function openInvite(
  resolver: DeepLinkResolver,
  uri: string,
  log: ComponentLogger,
): Promise<number> {
  try {
    const action = await resolver.resolve(uri);
    switch (action.kind) {
      case 'play':
        log.info('playing invite', { track: action.trackName, positionMs: action.positionMs });
        return 0;
      case 'search':
        log.info('opened web search', { reason: action.reason });
        return 0;
      case 'invalid':
        return 1;
    }
  } catch (error) {
    log.error('invite failed', { message: errorMessage(error) });
    return 1;
  }
}

export async function runOneShot(command: OneShotCommand, ports: RuntimePorts): Promise<number> {
  const log = createLogger('Cli');
  const config = ports.config.getConfig();

  if (command === 'clear') {
    return clearRemotePresence(createPresenceSession(config), config, log);
  }

  if (command === 'register-uri') {
    try {
      await registerUriSchemes({
        schemes: inviteSchemes(config),
        launchCommand: currentLaunchCommand(),
      });
      return 0;
    } catch (error) {
      log.error('uri registration failed', { message: errorMessage(error) });
      return 1;
    }
  }

  if (command === 'spotify-login') {
    try {
      await runSpotifyLogin({ configPort: ports.config, opener: new SystemUrlOpener() });
      return 0;
    } catch (error) {
      log.error('spotify login failed', { message: errorMessage(error) });
      return 1;
    }
  }

  const resolver = createDeepLinkResolver(config, ports.clock, createSpotifyClient(ports.config));
  return openInvite(resolver, command.join, log);
}
