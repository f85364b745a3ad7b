import assert from 'node:assert/strict';
import { test } from './testHarness';
import { parseCliArgs } from '../src/cli/args';

test('no arguments runs the host', () => {
  assert.deepEqual(parseCliArgs([]), { kind: 'host' });
  assert.deepEqual(parseCliArgs(['  ']), { kind: 'host' });
});

test('flags map to one-shot commands', () => {
  assert.deepEqual(parseCliArgs(['--clear']), { kind: 'clear' });
  assert.deepEqual(parseCliArgs(['--register-uri']), { kind: 'register-uri' });
  assert.deepEqual(parseCliArgs(['--spotify-login']), { kind: 'spotify-login' });
  assert.deepEqual(parseCliArgs(['-h']), { kind: 'help' });
});

test('a positional argument is an invite uri', () => {
  assert.deepEqual(parseCliArgs([' listenalong://sync?track=A&artist=B&at=1 ']), {
    kind: 'join',
    uri: 'listenalong://sync?track=A&artist=B&at=1',
  });
});

test('help wins over everything else', () => {
  assert.deepEqual(parseCliArgs(['--clear', '--help', '--bogus']), { kind: 'help' });
});

test('unknown options and multiple commands are errors', () => {
  assert.deepEqual(parseCliArgs(['--verbose']), { kind: 'error', message: 'unknown option: --verbose' });
  assert.deepEqual(parseCliArgs(['--clear', 'listenalong://sync']), {
    kind: 'error',
    message: 'only one command may be given',
  });
});
