// ABOUTME: Rust ecosystem definition for Cargo projects
// ABOUTME: Plans cargo update, fmt/clippy/check/test/audit and target cleanup steps

import type {
  EcosystemDefinition,
  PlanContext,
  RunMode,
  Step,
  Task,
  ToolCandidate,
} from './types.js';

export const CARGO: ToolCandidate = {
  id: 'cargo',
  binary: 'cargo',
  installHint: 'https://rustup.rs',
};

export const CARGO_OUTDATED: ToolCandidate = {
  id: 'cargo-outdated',
  binary: 'cargo-outdated',
  installHint: 'cargo install cargo-outdated',
};

export const CARGO_AUDIT: ToolCandidate = {
  id: 'cargo-audit',
  binary: 'cargo-audit',
  installHint: 'cargo install cargo-audit',
};

export const CARGO_CACHE: ToolCandidate = {
  id: 'cargo-cache',
  binary: 'cargo-cache',
  installHint: 'cargo install cargo-cache',
};

const auditStep: Step = {
  kind: 'command',
  name: 'audit',
  candidates: [CARGO_AUDIT],
  invoke: () => ({ command: 'cargo', args: ['audit'] }),
};

export function planRustUpdate(mode: RunMode): Step[] {
  const steps: Step[] = [];

  if (mode.checkOnly) {
    // cargo-outdated gives a proper report; a dry-run update is the fallback
    steps.push({
      kind: 'command',
      name: 'outdated',
      candidates: [CARGO_OUTDATED, CARGO],
      invoke: (tool) =>
        tool.id === 'cargo-outdated'
          ? { command: 'cargo', args: ['outdated'] }
          : { command: 'cargo', args: ['update', '--dry-run'] },
    });
  } else {
    steps.push({
      kind: 'command',
      name: 'update',
      candidates: [CARGO],
      invoke: () => ({ command: 'cargo', args: ['update'] }),
    });
  }

  if (mode.audit) {
    steps.push(auditStep);
  }

  return steps;
}

export function planRustCheck(mode: RunMode): Step[] {
  const clippyArgs = mode.fix
    ? ['clippy', '--fix', '--allow-dirty', '--allow-staged', '--']
    : ['clippy', '--'];
  if (mode.strict) {
    clippyArgs.push('-D', 'warnings');
  }

  return [
    {
      kind: 'command',
      name: 'format',
      candidates: [CARGO],
      invoke: () => ({
        command: 'cargo',
        args: mode.fix ? ['fmt'] : ['fmt', '--', '--check'],
      }),
    },
    {
      kind: 'command',
      name: 'lint',
      candidates: [CARGO],
      invoke: () => ({ command: 'cargo', args: clippyArgs }),
    },
    {
      kind: 'command',
      name: 'build',
      candidates: [CARGO],
      invoke: () => ({ command: 'cargo', args: ['check'] }),
    },
    {
      kind: 'command',
      name: 'test',
      candidates: [CARGO],
      invoke: () => ({ command: 'cargo', args: ['test'] }),
    },
    auditStep,
  ];
}

export function planRustClean(mode: RunMode): Step[] {
  const steps: Step[] = [{ kind: 'remove', name: 'build artifacts', patterns: ['target'] }];

  if (mode.cleanAll) {
    steps.push({
      kind: 'command',
      name: 'cargo cache',
      candidates: [CARGO_CACHE],
      invoke: () => ({ command: 'cargo', args: ['cache', '-a'] }),
      skipReason: mode.dryRun ? 'dry run: cargo cache is not trimmed' : undefined,
    });
  }

  return steps;
}

export class RustEcosystem implements EcosystemDefinition {
  readonly type = 'rust' as const;
  readonly displayName = 'Rust';
  readonly markers = ['Cargo.toml'];

  async plan(task: Task, { mode }: PlanContext): Promise<Step[]> {
    switch (task) {
      case 'update':
        return planRustUpdate(mode);
      case 'check':
        return planRustCheck(mode);
      case 'clean':
        return planRustClean(mode);
    }
  }
}
