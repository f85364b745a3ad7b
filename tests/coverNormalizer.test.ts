import assert from 'node:assert/strict';
import { Jimp, JimpMime } from 'jimp';
import { test } from './testHarness';
import { NormalizingUploader } from '../src/adapters/artwork/coverNormalizer';
import { createCapturingLogger } from './fakes/logger';
import { FakeUploader } from './fakes/uploader';

async function pngCover(width: number, height: number): Promise<Uint8Array> {
  return new Jimp({ width, height, color: 0x3366ccff }).getBuffer(JimpMime.png);
}

test('large covers are scaled down and re-encoded as JPEG', async () => {
  const inner = new FakeUploader();
  const { log } = createCapturingLogger();
  const uploader = new NormalizingUploader(inner, 256, log);

  const url = await uploader.upload({ bytes: await pngCover(1024, 512), mimeType: 'image/png', fileName: 'cover.png' });

  assert.equal(url, 'https://files.example.test/1.jpg');
  const sent = inner.requests[0];
  assert.equal(sent.mimeType, 'image/jpeg');
  assert.equal(sent.fileName, 'cover.jpg');
  const decoded = await Jimp.read(Buffer.from(sent.bytes));
  assert.equal(decoded.bitmap.width, 256);
  assert.equal(decoded.bitmap.height, 128);
});

test('small covers keep their size', async () => {
  const inner = new FakeUploader();
  const { log } = createCapturingLogger();

  await new NormalizingUploader(inner, 512, log).upload({ bytes: await pngCover(64, 32) });

  const decoded = await Jimp.read(Buffer.from(inner.requests[0].bytes));
  assert.equal(decoded.bitmap.width, 64);
  assert.equal(decoded.bitmap.height, 32);
});

test('undecodable bytes are uploaded unchanged', async () => {
  const inner = new FakeUploader();
  const { log, entries } = createCapturingLogger();
  const request = { bytes: new Uint8Array([1, 2, 3]), fileName: 'cover.jpg' };

  await new NormalizingUploader(inner, 512, log).upload(request);

  assert.equal(inner.requests[0], request);
  assert.equal(entries()[0].message, 'cover not decodable; uploading as is');
});
