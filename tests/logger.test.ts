import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { test } from './testHarness';
import { RotatingLogFile } from '../src/shared/logging/logFile';
import { ComponentLogger, type LoggerConfig } from '../src/shared/logging/logger';

function collectingStream(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, chunks };
}

function configWith(overrides: Partial<LoggerConfig>) {
  const out = collectingStream();
  const err = collectingStream();
  const fileLines: string[] = [];
  const config: LoggerConfig = {
    level: 'info',
    json: false,
    stdout: out.stream,
    stderr: err.stream,
    file: { write: (line) => fileLines.push(line) },
    fileLevel: 'none',
    ...overrides,
  };
  return { config, stdout: out.chunks, stderr: err.chunks, fileLines };
}

test('line output carries level, scopes and sorted context', () => {
  const { config, stdout } = configWith({});
  const log = new ComponentLogger(config, ['Presence', 'Reconciler']);

  log.info('presence updated', { title: 'Song A', artist: 'Artist X', attempt: 2 });
  log.debug('hidden');

  assert.equal(stdout.length, 1);
  assert.match(
    stdout[0],
    /^\[\d{4}-\d{2}-\d{2}T[^\]]+\]\[INFO\]\[Presence\|Reconciler\] \[artist="Artist X" attempt=2 title="Song A"\] presence updated\n$/,
  );
});

test('errors go to stderr and the file takes its own threshold', () => {
  const { config, stdout, stderr, fileLines } = configWith({ level: 'warn', fileLevel: 'debug', json: true });
  const log = new ComponentLogger(config, ['Runtime']);

  log.debug('tick');
  log.error('fatal', { code: 1 });

  assert.deepEqual(stdout, []);
  assert.equal(stderr.length, 1);
  assert.equal(fileLines.length, 2);
  const parsed: unknown = JSON.parse(fileLines[1]);
  assert.ok(typeof parsed === 'object' && parsed !== null);
  assert.deepEqual(
    { ...parsed, timestamp: 'ts' },
    { timestamp: 'ts', level: 'error', scopes: ['Runtime'], message: 'fatal', context: { code: 1 } },
  );
});

test('log file rolls over once it would pass its size limit', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nowplaying-log-'));
  try {
    const filePath = path.join(dir, 'logs', 'presence.log');
    const file = new RotatingLogFile(filePath, { maxBytes: 20, backups: 2 });

    file.write('aaaaaaaaa');
    file.write('aaaaaaaaa');
    file.write('bbbbbbbbb');

    assert.equal(await fs.readFile(filePath, 'utf-8'), 'bbbbbbbbb\n');
    assert.equal(await fs.readFile(`${filePath}.1`, 'utf-8'), 'aaaaaaaaa\naaaaaaaaa\n');
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
