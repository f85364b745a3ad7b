import assert from 'node:assert/strict';
import { test } from './testHarness';
import { buildPresencePayload, fitActivityText } from '../src/domain/presence/payload';
import { createTrackSnapshot, isSameTrack } from '../src/domain/track/trackSnapshot';

const options = { assetKey: 'app-logo', partyId: 'party-test', inviteScheme: 'listenalong' };

test('activity text is padded and capped', () => {
  assert.equal(fitActivityText('a'), 'a ');
  assert.equal(fitActivityText('  ok  '), 'ok');
  const long = fitActivityText('z'.repeat(130));
  assert.equal(Array.from(long).length, 128);
  assert.equal(long.endsWith('z…'), true);
});

test('payload without duration has no end time and shows the player', () => {
  const snapshot = createTrackSnapshot({
    title: 'Stream',
    artist: 'Radio',
    sourceId: 'primary',
    isPlaying: true,
    playerName: 'Web Radio',
  });
  const payload = buildPresencePayload(snapshot, null, 1_700_000_000_500, options);

  assert.equal(payload.startTimestamp, 1_700_000_000_500);
  assert.equal(payload.endTimestamp, undefined);
  assert.equal(payload.largeImage, 'app-logo');
  assert.equal(payload.largeText, 'Stream');
  assert.equal(payload.smallText, 'Web Radio');
  assert.equal(payload.joinSecret, 'listenalong://sync?track=Stream&artist=Radio&at=1700000000');
});

test('snapshots default missing text and compare by identity', () => {
  const blank = createTrackSnapshot({ title: ' ', artist: null, sourceId: 'fallback', isPlaying: true });
  assert.equal(blank.title, 'Unknown');
  assert.equal(blank.artist, 'Unknown Artist');

  const early = createTrackSnapshot({ title: 'T', artist: 'A', sourceId: 'primary', isPlaying: true, positionMs: 1 });
  const later = createTrackSnapshot({ title: 'T', artist: 'A', sourceId: 'primary', isPlaying: true, positionMs: 90_000 });
  const elsewhere = createTrackSnapshot({ title: 'T', artist: 'A', sourceId: 'fallback', isPlaying: true });
  assert.equal(isSameTrack(early, later), true);
  assert.equal(isSameTrack(early, elsewhere), false);
  assert.equal(isSameTrack(null, null), true);
  assert.equal(isSameTrack(early, null), false);
});
