// ABOUTME: Tests for terminal color palette
// ABOUTME: Validates NO_COLOR, TERM=dumb, TTY detection and painting

import { test } from 'node:test';
import assert from 'node:assert';
import { supportsColor, getColors, paint } from './colors.js';

test('supportsColor returns true for a TTY with no overrides', () => {
  assert.strictEqual(supportsColor({}, true), true);
});

test('supportsColor returns false when NO_COLOR is set', () => {
  assert.strictEqual(supportsColor({ NO_COLOR: '1', TERM: 'xterm-256color' }, true), false);
});

test('supportsColor returns false when TERM=dumb', () => {
  assert.strictEqual(supportsColor({ TERM: 'dumb' }, true), false);
});

test('supportsColor returns false when output is piped', () => {
  assert.strictEqual(supportsColor({}, false), false);
});

test('getColors returns escape codes when color is supported', () => {
  const colors = getColors({}, true);

  assert.strictEqual(colors.red, '\x1b[31m');
  assert.strictEqual(colors.green, '\x1b[32m');
  assert.strictEqual(colors.reset, '\x1b[0m');
});

test('getColors returns empty strings when color is unsupported', () => {
  const colors = getColors({ NO_COLOR: '1' }, true);

  assert.deepStrictEqual(colors, {
    red: '',
    green: '',
    yellow: '',
    blue: '',
    dim: '',
    reset: '',
  });
});

test('paint wraps text in the color and reset codes', () => {
  assert.strictEqual(paint(getColors({}, true), 'yellow', 'warn'), '\x1b[33mwarn\x1b[0m');
  assert.strictEqual(paint(getColors({}, false), 'yellow', 'warn'), 'warn');
});
