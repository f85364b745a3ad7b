import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { loadConfig } from '../src/config';
import { APP_ROOT } from '../src/config/environment';

const repoRoot = path.resolve(__dirname, '..');

test('install directory is the project root', () => {
  assert.equal(APP_ROOT, repoRoot);
});

test('loadConfig ignores the working directory', () => {
  const launcher = mkdtempSync(path.join(os.tmpdir(), 'presence-launcher-'));
  const previous = process.cwd();
  process.chdir(launcher);
  try {
    const config = loadConfig();
    assert.equal(config.configPath, path.join(repoRoot, 'data', 'config.json'));
    assert.equal(config.logFilePath, path.join(repoRoot, 'data', 'presence.log'));
    assert.equal(config.assetsDir, path.join(repoRoot, 'assets'));
  } finally {
    process.chdir(previous);
    rmSync(launcher, { recursive: true, force: true });
  }
});

test('an explicit root replaces the install directory', () => {
  const root = path.join(os.tmpdir(), 'presence-root');
  const config = loadConfig(root);
  assert.equal(config.configPath, path.join(root, 'data', 'config.json'));
  assert.equal(config.env.dataDir, path.join(root, 'data'));
});
