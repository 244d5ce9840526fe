// ABOUTME: Tests for configuration loading
// ABOUTME: Validates YAML parsing, schema errors and environment overrides

import { test } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { rmSync } from 'node:fs';
import { parseConfig, loadConfig, applyEnvOverrides, DEFAULT_TIMEOUT_SECONDS } from './config.js';
import { ConfigError } from './errors.js';

test('parseConfig fills defaults for an empty file', () => {
  assert.deepStrictEqual(parseConfig(''), {
    timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
    parallel: false,
    preferences: {},
  });
});

test('parseConfig reads timeout, parallelism and tool preferences', () => {
  const config = parseConfig('timeoutSeconds: 30\nparallel: true\npreferences:\n  python: [uv, pip]\n');

  assert.deepStrictEqual(config, {
    timeoutSeconds: 30,
    parallel: true,
    preferences: { python: ['uv', 'pip'] },
  });
});

test('parseConfig rejects unknown keys', () => {
  assert.throws(
    () => parseConfig('colour: true\n', '/project/.polydev.yaml'),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.filePath === '/project/.polydev.yaml' &&
      /^invalid configuration: \(root\): Unrecognized key/.test(err.message)
  );
});

test('parseConfig reports the path of an invalid value', () => {
  assert.throws(
    () => parseConfig('timeoutSeconds: -5\n'),
    (err: unknown) => err instanceof ConfigError && err.message.startsWith('invalid configuration: timeoutSeconds: ')
  );
});

test('parseConfig rejects preferences for unsupported ecosystems', () => {
  assert.throws(() => parseConfig('preferences:\n  go: [gofmt]\n'), ConfigError);
});

test('parseConfig wraps YAML syntax errors', () => {
  assert.throws(
    () => parseConfig('timeoutSeconds: [1, 2\n'),
    (err: unknown) => err instanceof ConfigError && err.message.startsWith('invalid YAML: ')
  );
});

test('applyEnvOverrides takes timeout and parallel from the environment', () => {
  const base = parseConfig('');
  assert.deepStrictEqual(
    applyEnvOverrides(base, { POLYDEV_TIMEOUT_SECONDS: '45', POLYDEV_PARALLEL: 'true' }),
    { timeoutSeconds: 45, parallel: true, preferences: {} }
  );
  assert.strictEqual(applyEnvOverrides({ ...base, parallel: true }, { POLYDEV_PARALLEL: '0' }).parallel, false);
});

test('applyEnvOverrides ignores empty variables', () => {
  const base = parseConfig('timeoutSeconds: 10\n');
  assert.deepStrictEqual(applyEnvOverrides(base, { POLYDEV_TIMEOUT_SECONDS: '', POLYDEV_PARALLEL: '' }), base);
});

test('applyEnvOverrides rejects a timeout that is not a positive integer', () => {
  assert.throws(
    () => applyEnvOverrides(parseConfig(''), { POLYDEV_TIMEOUT_SECONDS: 'soon' }),
    { name: 'ConfigError', message: 'POLYDEV_TIMEOUT_SECONDS must be a positive integer, got "soon"' }
  );
});

test('loadConfig returns defaults without a config file', async () => {
  const tmpDir = await mkdtemp(join(tmpdir(), 'test-config-'));
  try {
    const loaded = await loadConfig(tmpDir, {});
    assert.strictEqual(loaded.source, undefined);
    assert.strictEqual(loaded.config.timeoutSeconds, DEFAULT_TIMEOUT_SECONDS);
  } finally {
    rmSync(tmpDir, { recursive: true, force: true });
  }
});

test('loadConfig reads .polydev.yml and applies environment overrides', async () => {
  const tmpDir = await mkdtemp(join(tmpdir(), 'test-config-'));
  try {
    await writeFile(join(tmpDir, '.polydev.yml'), 'timeoutSeconds: 120\npreferences:\n  node: [pnpm]\n');

    const loaded = await loadConfig(tmpDir, { POLYDEV_PARALLEL: '1' });

    assert.strictEqual(loaded.source, join(tmpDir, '.polydev.yml'));
    assert.deepStrictEqual(loaded.config, {
      timeoutSeconds: 120,
      parallel: true,
      preferences: { node: ['pnpm'] },
    });
  } finally {
    rmSync(tmpDir, { recursive: true, force: true });
  }
});
