import assert from 'node:assert/strict';
import { test } from './testHarness';
import { CatboxUploader } from '../src/adapters/artwork/catboxUploader';
import { UploadError } from '../src/domain/errors';
import { createFakeFetch, type FakeReply } from './fakes/fetch';
import { createCapturingLogger } from './fakes/logger';

const UPLOAD_URL = 'https://upload.example.test/api.php';
const COVER = new Uint8Array([1, 2, 3, 4]);

function uploaderWith(replies: FakeReply[], maxBytes = 1024) {
  const { fetch, requests } = createFakeFetch(replies);
  const { log } = createCapturingLogger();
  const uploader = new CatboxUploader({ uploadUrl: UPLOAD_URL, maxBytes, retryDelayMs: 0, fetch, log });
  return { uploader, requests };
}

test('catbox upload posts a multipart form and returns the trimmed url', async () => {
  const { uploader, requests } = uploaderWith([{ status: 200, body: ' https://files.example.test/abc.jpg\n' }]);

  const url = await uploader.upload({ bytes: COVER, mimeType: 'image/png', fileName: 'cover.png' });

  assert.equal(url, 'https://files.example.test/abc.jpg');
  assert.equal(requests.length, 1);
  assert.equal(requests[0].url, UPLOAD_URL);
  assert.equal(requests[0].method, 'POST');
  const form = requests[0].body;
  assert.ok(form instanceof FormData);
  assert.equal(form.get('reqtype'), 'fileupload');
  const file = form.get('fileToUpload');
  assert.ok(file instanceof Blob);
  assert.equal(file.size, 4);
  assert.equal(file.type, 'image/png');
});

test('catbox upload retries once after a server error', async () => {
  const { uploader, requests } = uploaderWith([
    { status: 500, body: 'busy' },
    { status: 200, body: 'https://files.example.test/second.jpg' },
  ]);

  assert.equal(await uploader.upload({ bytes: COVER }), 'https://files.example.test/second.jpg');
  assert.equal(requests.length, 2);
});

test('catbox upload reports the last failure after every attempt', async () => {
  const { uploader } = uploaderWith([{ status: 200, body: '<html>error</html>' }, new Error('socket hang up')]);

  await assert.rejects(uploader.upload({ bytes: COVER }), (error: unknown) => {
    assert.ok(error instanceof UploadError);
    assert.equal(error.message, 'catbox upload failed after 2 attempt(s): socket hang up');
    return true;
  });
});

test('catbox upload rejects empty and oversized covers without a request', async () => {
  const { uploader, requests } = uploaderWith([]);

  await assert.rejects(uploader.upload({ bytes: new Uint8Array(0) }), /artwork is empty/);
  await assert.rejects(
    uploader.upload({ bytes: new Uint8Array(2048) }),
    (error: unknown) => error instanceof UploadError && error.message === 'artwork is 2048 bytes, limit is 1024',
  );
  assert.equal(requests.length, 0);
});
