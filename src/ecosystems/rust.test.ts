// ABOUTME: Tests for the Rust ecosystem definition
// ABOUTME: Validates cargo step plans for update, check and clean under each mode flag

import { test } from 'node:test';
import assert from 'node:assert';
import { tmpdir } from 'node:os';
import {
  RustEcosystem,
  planRustUpdate,
  planRustCheck,
  planRustClean,
  CARGO,
  CARGO_OUTDATED,
} from './rust.js';
import { DEFAULT_RUN_MODE } from '../run-mode.js';
import type { Invocation, RunMode, Step } from './types.js';

function mode(overrides: Partial<RunMode> = {}): RunMode {
  return { ...DEFAULT_RUN_MODE, ...overrides };
}

function invocationOf(step: Step, toolId = 'cargo'): Invocation {
  assert.strictEqual(step.kind, 'command');
  if (step.kind !== 'command') throw new Error('not a command step');
  const tool = step.candidates.find((c) => c.id === toolId);
  if (!tool) throw new Error(`no candidate ${toolId}`);
  return step.invoke(tool);
}

test('update applies cargo update by default', () => {
  const steps = planRustUpdate(mode());

  assert.deepStrictEqual(steps.map((s) => s.name), ['update']);
  assert.deepStrictEqual(invocationOf(steps[0]), { command: 'cargo', args: ['update'] });
});

test('update --check prefers cargo-outdated and falls back to a dry-run update', () => {
  const [step] = planRustUpdate(mode({ checkOnly: true }));

  assert.strictEqual(step.name, 'outdated');
  assert.strictEqual(step.kind, 'command');
  if (step.kind !== 'command') return;
  assert.deepStrictEqual(step.candidates, [CARGO_OUTDATED, CARGO]);
  assert.deepStrictEqual(step.invoke(CARGO_OUTDATED), { command: 'cargo', args: ['outdated'] });
  assert.deepStrictEqual(step.invoke(CARGO), { command: 'cargo', args: ['update', '--dry-run'] });
});

test('update --audit appends cargo audit', () => {
  const steps = planRustUpdate(mode({ audit: true }));

  assert.deepStrictEqual(steps.map((s) => s.name), ['update', 'audit']);
  assert.deepStrictEqual(invocationOf(steps[1], 'cargo-audit'), { command: 'cargo', args: ['audit'] });
});

test('check plans format, lint, build, test and audit in order', () => {
  const steps = planRustCheck(mode());

  assert.deepStrictEqual(steps.map((s) => s.name), ['format', 'lint', 'build', 'test', 'audit']);
  assert.deepStrictEqual(invocationOf(steps[0]).args, ['fmt', '--', '--check']);
  assert.deepStrictEqual(invocationOf(steps[1]).args, ['clippy', '--']);
  assert.deepStrictEqual(invocationOf(steps[2]).args, ['check']);
  assert.deepStrictEqual(invocationOf(steps[3]).args, ['test']);
});

test('check --fix formats in place and lets clippy fix', () => {
  const steps = planRustCheck(mode({ fix: true }));

  assert.deepStrictEqual(invocationOf(steps[0]).args, ['fmt']);
  assert.deepStrictEqual(invocationOf(steps[1]).args, [
    'clippy',
    '--fix',
    '--allow-dirty',
    '--allow-staged',
    '--',
  ]);
});

test('check --strict denies clippy warnings', () => {
  const steps = planRustCheck(mode({ strict: true, fix: true }));

  assert.deepStrictEqual(invocationOf(steps[1]).args, [
    'clippy',
    '--fix',
    '--allow-dirty',
    '--allow-staged',
    '--',
    '-D',
    'warnings',
  ]);
});

test('clean removes target only by default', () => {
  assert.deepStrictEqual(planRustClean(mode()), [
    { kind: 'remove', name: 'build artifacts', patterns: ['target'] },
  ]);
});

test('clean --all trims the cargo cache unless dry-running', () => {
  const steps = planRustClean(mode({ cleanAll: true }));
  assert.deepStrictEqual(steps.map((s) => s.name), ['build artifacts', 'cargo cache']);
  assert.deepStrictEqual(invocationOf(steps[1], 'cargo-cache'), { command: 'cargo', args: ['cache', '-a'] });

  const dryRun = planRustClean(mode({ cleanAll: true, dryRun: true }));
  const cacheStep = dryRun[1];
  assert.ok(cacheStep.kind === 'command' && cacheStep.skipReason);
});

test('RustEcosystem dispatches to the plan for each task', async () => {
  const rust = new RustEcosystem();
  const context = { rootPath: tmpdir(), mode: mode() };

  assert.deepStrictEqual(rust.markers, ['Cargo.toml']);
  assert.strictEqual((await rust.plan('update', context)).length, 1);
  assert.strictEqual((await rust.plan('check', context)).length, 5);
  assert.strictEqual((await rust.plan('clean', context)).length, 1);
});
