import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { StorageAdapter } from '../src/adapters/storage/StorageAdapter';
import { ConfigRepository, defaultConfig, normalizeConfig } from '../src/application/config/configRepository';
import type { StoragePort, StorageReadOptions } from '../src/ports/StoragePort';
import { createCapturingLogger } from './fakes/logger';

class MemoryStorage implements StoragePort {
  public readonly files = new Map<string, string>();
  public readonly writes: string[] = [];

  public async readJson<T>(filePath: string, fallback: T, options?: StorageReadOptions): Promise<T> {
    const raw = this.files.get(filePath);
    if (raw !== undefined) {
      return JSON.parse(raw);
    }
    if (options?.writeIfMissing) {
      await this.writeJson(filePath, fallback);
    }
    return fallback;
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    this.writes.push(filePath);
    this.files.set(filePath, JSON.stringify(data));
  }

  public stored(filePath: string): unknown {
    const raw = this.files.get(filePath);
    return raw === undefined ? undefined : JSON.parse(raw);
  }
}

test('missing config file is created with the defaults', async () => {
  const storage = new MemoryStorage();
  const repo = new ConfigRepository(storage, 'config.json');

  const config = await repo.load();

  assert.deepEqual(config, defaultConfig());
  assert.deepEqual(storage.writes, ['config.json']);
  assert.deepEqual(storage.stored('config.json'), defaultConfig());
});

test('out-of-range and malformed values fall back or clamp', () => {
  const config = normalizeConfig({
    discord: { clientId: ' 123 ', assetKey: '' },
    sources: { mediaSession: { players: [' spotify ', 3, ''], timeoutMs: 10 } },
    scheduler: { intervalMs: 10 },
    startup: { connectAttempts: 500, retryDelayMs: -1 },
    deepLink: { scheme: 'Bad Scheme!', searchUrlTemplate: 'https://search.example.test/', latencyOffsetMs: 250.6 },
    artwork: { maxBytes: 'big' },
    logging: { consoleLevel: 'loud', fileLevel: 'spam' },
    extra: true,
  });

  assert.equal(config.discord.clientId, '123');
  assert.equal(config.discord.assetKey, 'music');
  assert.deepEqual(config.sources.mediaSession.players, ['spotify']);
  assert.equal(config.sources.mediaSession.timeoutMs, 500);
  assert.equal(config.scheduler.intervalMs, 1000);
  assert.deepEqual(config.startup, { connectAttempts: 100, retryDelayMs: 0 });
  assert.equal(config.deepLink.scheme, 'listenalong');
  assert.equal(config.deepLink.searchUrlTemplate, 'https://open.spotify.com/search/{query}');
  assert.equal(config.deepLink.latencyOffsetMs, 251);
  assert.equal(config.artwork.maxBytes, 20 * 1024 * 1024);
  assert.deepEqual(config.logging, { consoleLevel: 'info', fileLevel: 'spam' });
  assert.equal('extra' in config, false);
});

test('schemes are lowercased before validation', () => {
  assert.equal(normalizeConfig({ deepLink: { scheme: 'MyApp+Sync' } }).deepLink.scheme, 'myapp+sync');
});

test('a config that needed normalizing is written back', async () => {
  const storage = new MemoryStorage();
  storage.files.set('config.json', JSON.stringify({ scheduler: { intervalMs: 10 } }));
  const repo = new ConfigRepository(storage, 'config.json');

  const config = await repo.load();

  assert.equal(config.scheduler.intervalMs, 1000);
  assert.deepEqual(storage.writes, ['config.json']);
  assert.deepEqual(storage.stored('config.json'), config);
});

test('a config already in shape is not rewritten', async () => {
  const storage = new MemoryStorage();
  storage.files.set('config.json', JSON.stringify(defaultConfig()));

  await new ConfigRepository(storage, 'config.json').load();

  assert.deepEqual(storage.writes, []);
});

test('update persists changes and stamps updatedAt', async () => {
  const storage = new MemoryStorage();
  const repo = new ConfigRepository(storage, 'config.json');
  await repo.load();

  const unchanged = await repo.update(() => {});
  assert.equal(unchanged.updatedAt, undefined);

  const updated = await repo.update((config) => {
    config.sources.spotify.refreshToken = 'refresh-test';
  });
  assert.equal(updated.sources.spotify.refreshToken, 'refresh-test');
  assert.match(updated.updatedAt ?? '', /^\d{4}-\d{2}-\d{2}T/);
  assert.deepEqual(storage.stored('config.json'), updated);
});

test('get before load throws', () => {
  assert.throws(() => new ConfigRepository(new MemoryStorage(), 'config.json').get(), /configuration not loaded/);
});

test('file storage writes the defaults to disk', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nowplaying-config-'));
  try {
    const configPath = path.join(dir, 'nested', 'config.json');
    const { log } = createCapturingLogger();
    const config = await new ConfigRepository(new StorageAdapter(log), configPath).load();

    const raw: unknown = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    assert.deepEqual(raw, config);
    assert.deepEqual(await fs.readdir(path.join(dir, 'nested')), ['config.json']);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('file storage reads invalid json as the fallback and leaves the file alone', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'nowplaying-config-'));
  try {
    const filePath = path.join(dir, 'config.json');
    await fs.writeFile(filePath, '{broken', 'utf-8');
    const { log, entries } = createCapturingLogger();

    const value = await new StorageAdapter(log).readJson(filePath, { ok: false }, { writeIfMissing: true });

    assert.deepEqual(value, { ok: false });
    assert.equal(await fs.readFile(filePath, 'utf-8'), '{broken');
    assert.equal(entries()[0].level, 'warn');
    assert.equal(entries()[0].message, 'invalid json; using defaults');
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
