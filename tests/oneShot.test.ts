import assert from 'node:assert/strict';
import { test } from './testHarness';
import { defaultConfig } from '../src/application/config/configRepository';
import { DeepLinkResolver } from '../src/application/deeplink/deepLinkResolver';
import { clearRemotePresence, openInvite } from '../src/runtime/oneShot';
import { FakeClock } from './fakes/clock';
import { createCapturingLogger } from './fakes/logger';
import { FakePresenceSession } from './fakes/presenceSession';

function quickConfig(connectAttempts: number) {
  const config = defaultConfig();
  config.startup = { connectAttempts, retryDelayMs: 0 };
  return config;
}

function resolverOpening(open: (url: string) => Promise<void>) {
  const { log } = createCapturingLogger();
  return new DeepLinkResolver({
    scheme: 'listenalong',
    searchUrlTemplate: 'https://search.example.test/?q={query}',
    matchByTitle: true,
    latencyOffsetMs: 0,
    opener: { open },
    clock: new FakeClock(),
    playback: null,
    log,
  });
}

test('clear connects, clears and disconnects', async () => {
  const session = new FakePresenceSession();
  const { log, entries } = createCapturingLogger();

  assert.equal(await clearRemotePresence(session, quickConfig(2), log), 0);
  assert.deepEqual(session.calls, ['connect', 'clear', 'disconnect']);
  assert.equal(entries().at(-1)?.message, 'presence cleared');
});

test('clear still disconnects when the client never answers', async () => {
  const session = new FakePresenceSession();
  session.connectFailures = 3;
  const { log, entries } = createCapturingLogger();

  assert.equal(await clearRemotePresence(session, quickConfig(2), log), 1);
  assert.deepEqual(session.calls, ['connect', 'connect', 'disconnect']);
  assert.deepEqual(entries().at(-1), {
    level: 'error',
    message: 'clear failed',
    context: { message: 'could not connect presence session after 2 attempt(s)' },
  });
});

test('an invite without playback opens the web search', async () => {
  const opened: string[] = [];
  const resolver = resolverOpening(async (url) => {
    opened.push(url);
  });
  const { log } = createCapturingLogger();

  assert.equal(await openInvite(resolver, 'listenalong://sync?track=Song&artist=Band', log), 0);
  assert.deepEqual(opened, ['https://search.example.test/?q=Song%20Band']);
});

test('invalid invites and opener failures exit with 1', async () => {
  const { log, entries } = createCapturingLogger();
  const failing = resolverOpening(async () => {
    throw new Error('no browser');
  });

  assert.equal(await openInvite(failing, 'https://example.test/', log), 1);
  assert.equal(await openInvite(failing, 'listenalong://sync?track=Song&artist=Band', log), 1);
  assert.deepEqual(entries().at(-1), { level: 'error', message: 'invite failed', context: { message: 'no browser' } });
});
