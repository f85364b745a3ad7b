import assert from 'node:assert/strict';
import type { SetActivity } from '@xhayper/discord-rpc';
import { ActivityType } from 'discord-api-types/v10';
import { test } from './testHarness';
import { createCapturingLogger } from './fakes/logger';
import {
  DiscordPresenceSession,
  toDiscordActivity,
  type RpcConnection,
} from '../src/adapters/discord/discordPresenceSession';
import { NotConnectedError } from '../src/domain/errors';
import type { PresencePayload } from '../src/domain/presence/types';

class StubConnection implements RpcConnection {
  public readonly username = 'listener';
  public alive = true;
  public activities: SetActivity[] = [];
  public cleared = 0;
  public invites: string[] = [];
  public destroyed = 0;
  public setActivityError: Error | null = null;
  public joinListener: ((data: unknown) => void) | null = null;
  public joinRequestListener: ((data: unknown) => void) | null = null;

  public async login(): Promise<void> {}
  public isAlive(): boolean {
    return this.alive;
  }
  public async setActivity(activity: SetActivity): Promise<void> {
    if (this.setActivityError) {
      throw this.setActivityError;
    }
    this.activities.push(activity);
  }
  public async clearActivity(): Promise<void> {
    this.cleared += 1;
  }
  public async sendJoinInvite(userId: string): Promise<void> {
    this.invites.push(userId);
  }
  public async subscribeJoinEvents(): Promise<void> {}
  public onReady(): void {}
  public onDisconnected(): void {}
  public onJoin(listener: (data: unknown) => void): void {
    this.joinListener = listener;
  }
  public onJoinRequest(listener: (data: unknown) => void): void {
    this.joinRequestListener = listener;
  }
  public async destroy(): Promise<void> {
    this.destroyed += 1;
  }
}

const payload: PresencePayload = {
  details: 'Song A',
  state: 'by Artist X',
  largeImage: 'https://files.example/cover.jpg',
  largeText: 'Album Z',
  startTimestamp: 1_000_000,
  endTimestamp: 1_180_000,
  partyId: 'party-1',
  partySize: [1, 2],
  joinSecret: 'listenalong://sync?track=Song%20A',
};

function createSession(autoAcceptJoinRequests = true) {
  const connection = new StubConnection();
  const { log } = createCapturingLogger();
  const created: string[] = [];
  const session = new DiscordPresenceSession({
    clientId: 'test-client',
    autoAcceptJoinRequests,
    log,
    createConnection: (clientId) => {
      created.push(clientId);
      return connection;
    },
  });
  return { session, connection, created };
}

test('toDiscordActivity maps the payload onto a listening activity', () => {
  assert.deepEqual(toDiscordActivity(payload), {
    type: ActivityType.Listening,
    details: 'Song A',
    state: 'by Artist X',
    startTimestamp: new Date(1_000_000),
    endTimestamp: new Date(1_180_000),
    largeImageKey: 'https://files.example/cover.jpg',
    largeImageText: 'Album Z',
    smallImageText: undefined,
    partyId: 'party-1',
    partySize: 1,
    partyMax: 2,
    joinSecret: 'listenalong://sync?track=Song%20A',
  });
  assert.equal(ActivityType.Listening, 2);
});

test('toDiscordActivity leaves the end timestamp out for unknown durations', () => {
  const { endTimestamp: _end, ...open } = payload;
  assert.equal(toDiscordActivity(open).endTimestamp, undefined);
});

test('update and clear reject before connect', async () => {
  const { session, created } = createSession();
  await assert.rejects(session.update(payload), NotConnectedError);
  await assert.rejects(session.clear(), NotConnectedError);
  assert.deepEqual(created, []);
});

test('connect creates a connection and update sends the activity', async () => {
  const { session, connection, created } = createSession();
  await session.connect();
  await session.connect();
  assert.deepEqual(created, ['test-client']);
  assert.equal(session.isConnected(), true);

  await session.update(payload);
  await session.clear();
  assert.equal(connection.activities.length, 1);
  assert.equal(connection.activities[0]?.details, 'Song A');
  assert.equal(connection.cleared, 1);
});

test('a failed call on a dropped pipe becomes NotConnectedError', async () => {
  const { session, connection } = createSession();
  await session.connect();
  connection.alive = false;
  connection.setActivityError = new Error('pipe closed');

  await assert.rejects(session.update(payload), {
    name: 'NotConnectedError',
    message: 'discord connection lost: pipe closed',
  });
  assert.equal(session.isConnected(), false);
});

test('a failed call on a live pipe keeps its own error', async () => {
  const { session, connection } = createSession();
  await session.connect();
  connection.setActivityError = new Error('invalid activity');

  await assert.rejects(session.update(payload), { message: 'invalid activity' });
  assert.equal(session.isConnected(), true);
});

test('disconnect destroys the connection', async () => {
  const { session, connection } = createSession();
  await session.connect();
  await session.disconnect();
  assert.equal(connection.destroyed, 1);
  assert.equal(session.isConnected(), false);
  await assert.rejects(session.clear(), NotConnectedError);
});

test('join events reach listeners with their secret', async () => {
  const { session, connection } = createSession();
  const secrets: string[] = [];
  session.onJoin((secret) => secrets.push(secret));
  await session.connect();

  connection.joinListener?.({ secret: 'listenalong://sync?track=B' });
  connection.joinListener?.({ secret: '' });
  connection.joinListener?.('garbage');
  assert.deepEqual(secrets, ['listenalong://sync?track=B']);
});

test('join requests are accepted only when configured', async () => {
  const accepting = createSession(true);
  await accepting.session.connect();
  accepting.connection.joinRequestListener?.({ user: { id: 'user-1', username: 'friend' } });
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(accepting.connection.invites, ['user-1']);

  const manual = createSession(false);
  await manual.session.connect();
  manual.connection.joinRequestListener?.({ user: { id: 'user-2', username: 'friend' } });
  await new Promise((resolve) => setImmediate(resolve));
  assert.deepEqual(manual.connection.invites, []);
});
