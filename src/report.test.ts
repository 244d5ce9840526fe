// ABOUTME: Tests for console reporting
// ABOUTME: Validates outcome lines, ecosystem headers and the summary banner without colors

import { test } from 'node:test';
import assert from 'node:assert';
import {
  createConsoleListener,
  formatEcosystemHeader,
  formatOutcome,
  formatSummary,
  formatSummaryLine,
  getStatusTag,
} from './report.js';
import { getColors } from './colors.js';
import { summarize } from './summary.js';

const plain = getColors({}, false);

test('getStatusTag paints tags when colors are on', () => {
  assert.strictEqual(getStatusTag('failed', getColors({}, true)), '\x1b[31m[FAIL]\x1b[0m');
  assert.strictEqual(getStatusTag('skipped', plain), '[SKIP]');
});

test('formatOutcome shows the command of a passed step', () => {
  assert.strictEqual(
    formatOutcome({ step: 'format', ecosystem: 'rust', status: 'passed', command: 'cargo fmt -- --check' }, plain),
    '  [PASS] format (cargo fmt -- --check)'
  );
});

test('formatOutcome indents the skip reason', () => {
  assert.strictEqual(
    formatOutcome({ step: 'audit', ecosystem: 'rust', status: 'skipped', message: 'cargo-audit not installed' }, plain),
    '  [SKIP] audit\n         cargo-audit not installed'
  );
});

test('formatOutcome includes tool output only for failures', () => {
  const failed = formatOutcome(
    {
      step: 'test',
      ecosystem: 'python',
      status: 'failed',
      command: 'pytest',
      message: 'pytest exited with code 1',
      output: 'FAILED test_app.py::test_add\n1 failed',
    },
    plain
  );
  assert.strictEqual(
    failed,
    [
      '  [FAIL] test (pytest)',
      '         pytest exited with code 1',
      '         | FAILED test_app.py::test_add',
      '         | 1 failed',
    ].join('\n')
  );

  const passed = formatOutcome(
    { step: 'test', ecosystem: 'python', status: 'passed', output: 'all good' },
    plain
  );
  assert.strictEqual(passed, '  [PASS] test');
});

test('formatEcosystemHeader starts a new block', () => {
  assert.strictEqual(formatEcosystemHeader('Node.js', plain), '\n▸ Node.js');
});

test('formatSummaryLine describes each kind of run', () => {
  assert.strictEqual(
    formatSummaryLine(summarize([]), plain),
    '[INFO] Nothing to do: no matching ecosystem detected'
  );
  assert.strictEqual(
    formatSummaryLine(
      summarize([
        { step: 'lint', ecosystem: 'node', status: 'passed' },
        { step: 'test', ecosystem: 'node', status: 'skipped' },
      ]),
      plain
    ),
    '[PASS] All steps passed (1 passed, 0 failed, 1 skipped)'
  );
  assert.strictEqual(
    formatSummaryLine(summarize([{ step: 'lint', ecosystem: 'node', status: 'failed' }]), plain),
    '[FAIL] 1 step(s) failed (0 passed, 1 failed, 0 skipped)'
  );
  assert.strictEqual(
    formatSummaryLine(summarize([{ step: 'lint', ecosystem: 'node', status: 'passed' }], true), plain),
    '[INTERRUPTED] Run interrupted after 1 step(s) (1 passed, 0 failed, 0 skipped)'
  );
});

test('formatSummary frames the summary line with rules', () => {
  const rule = '='.repeat(32);
  assert.strictEqual(
    formatSummary(summarize([]), plain),
    `\n${rule}\n[INFO] Nothing to do: no matching ecosystem detected\n${rule}`
  );
});

test('createConsoleListener writes headers and outcomes as they arrive', () => {
  const written: string[] = [];
  const listener = createConsoleListener(plain, (text) => written.push(text));

  listener.ecosystemStarted?.('python', 'Python');
  listener.outcomeRecorded?.({ step: 'lint', ecosystem: 'python', status: 'passed', command: 'ruff check .' });

  assert.deepStrictEqual(written, ['\n▸ Python', '  [PASS] lint (ruff check .)']);
});
