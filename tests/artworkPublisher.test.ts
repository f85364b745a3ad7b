import assert from 'node:assert/strict';
import { test } from './testHarness';
import { ArtworkPublisher, deriveArtworkCacheKey } from '../src/application/artwork/artworkPublisher';
import { UploadError } from '../src/domain/errors';
import type { ArtworkUploadPort } from '../src/ports/ArtworkUploadPort';
import { createCapturingLogger } from './fakes/logger';
import { FakeUploader } from './fakes/uploader';

const bytes = new Uint8Array([1, 2, 3]);

test('cache key depends on track identity only', () => {
  const base = { title: 'Song', artist: 'Artist', sourceId: 'primary' as const };
  assert.equal(deriveArtworkCacheKey(base), deriveArtworkCacheKey({ ...base }));
  assert.notEqual(deriveArtworkCacheKey(base), deriveArtworkCacheKey({ ...base, sourceId: 'fallback' }));
  assert.match(deriveArtworkCacheKey(base), /^[0-9a-f]{40}$/);
});

test('publisher uploads once per cache key', async () => {
  const { log } = createCapturingLogger();
  const uploader = new FakeUploader();
  const publisher = new ArtworkPublisher(uploader, log);

  assert.equal(await publisher.publish('k1', bytes), 'https://files.example.test/1.jpg');
  assert.equal(await publisher.publish('k1', new Uint8Array([9])), 'https://files.example.test/1.jpg');
  assert.equal(await publisher.publish('k2', bytes), 'https://files.example.test/2.jpg');
  assert.equal(uploader.requests.length, 2);
  assert.equal(uploader.requests[0].fileName, 'cover.jpg');
  assert.equal(publisher.size, 2);
  assert.equal(publisher.lookup('k2'), 'https://files.example.test/2.jpg');
  assert.equal(publisher.lookup('missing'), null);
});

test('failed uploads are not cached', async () => {
  const { log } = createCapturingLogger();
  const uploader = new FakeUploader();
  uploader.failures = 1;
  const publisher = new ArtworkPublisher(uploader, log);

  await assert.rejects(publisher.publish('k1', bytes), UploadError);
  assert.equal(publisher.lookup('k1'), null);
  assert.equal(await publisher.publish('k1', bytes), 'https://files.example.test/2.jpg');
});

test('foreign uploader errors surface as UploadError', async () => {
  const { log } = createCapturingLogger();
  const uploader: ArtworkUploadPort = {
    upload: async () => {
      throw new TypeError('fetch failed');
    },
  };
  const publisher = new ArtworkPublisher(uploader, log);

  await assert.rejects(publisher.publish('k1', bytes), (error: unknown) => {
    assert.ok(error instanceof UploadError);
    assert.equal(error.message, 'fetch failed');
    return true;
  });
});
