import { tests, type TestCase } from './testHarness';
import './architecture/importBoundaries.test';
import './arbitrator.test';
import './artworkPublisher.test';
import './catboxUploader.test';
import './cliArgs.test';
import './configRepository.test';
import './coverNormalizer.test';
import './deepLinkResolver.test';
import './discordPresenceSession.test';
import './environment.test';
import './invite.test';
import './logger.test';
import './mediaSession.test';
import './oneShot.test';
import './presenceLoop.test';
import './presencePayload.test';
import './presenceReconciler.test';
import './runtimeShutdown.test';
import './spotify.test';
import './startupConnect.test';
import './statusTray.test';
import './systemIntegration.test';

async function runCase({ name, fn, timeoutMs }: TestCase): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${name} timed out after ${timeoutMs} ms`)), timeoutMs);
  });
  try {
    await Promise.race([Promise.resolve().then(fn), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

async function run(): Promise<void> {
  let failures = 0;
  for (const entry of tests) {
    const { name } = entry;
    try {
      await runCase(entry);
      console.log(`ok - ${name}`);
    } catch (error) {
      failures += 1;
      console.error(`not ok - ${name}`);
      console.error(error);
    }
  }
  console.log(`${tests.length - failures}/${tests.length} passed`);
  if (failures > 0) {
    process.exitCode = 1;
  }
}

void run();
