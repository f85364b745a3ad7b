import assert from 'node:assert/strict';
import { test } from './testHarness';
import { encodeInvite, parseInvite, MAX_INVITE_LENGTH } from '../src/domain/deeplink/invite';

const TRACK_ID = 'AbCdEfGhIjKlMnOpQrStUv';

test('invite encodes the spotify id, title, artist and start time', () => {
  const uri = encodeInvite(
    { title: 'Blue & Gold', artist: 'Test Duo', trackId: TRACK_ID, startedAt: 1_700_000_000 },
    'listenalong',
  );
  assert.equal(
    uri,
    `listenalong://sync?sp=${TRACK_ID}&track=Blue%20%26%20Gold&artist=Test%20Duo&at=1700000000`,
  );
  assert.deepEqual(parseInvite(uri, 'listenalong'), {
    title: 'Blue & Gold',
    artist: 'Test Duo',
    trackId: TRACK_ID,
    startedAt: 1_700_000_000,
  });
});

test('long titles and artists are shortened until the uri fits', () => {
  const invite = { title: 'x'.repeat(60), artist: 'y'.repeat(40), startedAt: 1_700_000_000 };

  const capped = encodeInvite(invite, 'listenalong');
  assert.equal(capped.length, 127);
  assert.ok(capped.length <= MAX_INVITE_LENGTH);

  const tight = encodeInvite(invite, 'listenalong', 100);
  assert.equal(tight, `listenalong://sync?track=${'x'.repeat(26)}&artist=${'y'.repeat(27)}&at=1700000000`);
});

test('discord join uris wrap the invite', () => {
  const inner = 'listenalong://sync?track=Song&artist=Band';
  assert.deepEqual(parseInvite(`discord-1234567890://join/${encodeURIComponent(inner)}`, 'listenalong'), {
    title: 'Song',
    artist: 'Band',
  });
});

test('bare scheme form carries only a title', () => {
  assert.deepEqual(parseInvite('ListenAlong://Some%20Song/', 'listenalong'), { title: 'Some Song', artist: '' });
});

test('invalid invites are rejected', () => {
  assert.equal(parseInvite('', 'listenalong'), null);
  assert.equal(parseInvite('https://example.test/?track=x', 'listenalong'), null);
  assert.equal(parseInvite('listenalong://sync?artist=Band', 'listenalong'), null);
  assert.equal(parseInvite('listenalong://%E0%A4%A', 'listenalong'), null);
  assert.deepEqual(parseInvite('listenalong://sync?track=T&sp=short&at=soon', 'listenalong'), {
    title: 'T',
    artist: '',
  });
});
