// ABOUTME: Node.js ecosystem definition for npm, pnpm and yarn projects
// ABOUTME: Plans outdated/update/audit, eslint/prettier/tsc/test checks and build output cleanup

import { access, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  EcosystemDefinition,
  Invocation,
  PlanContext,
  RunMode,
  Step,
  Task,
  ToolCandidate,
} from './types.js';

export type JsPackageManager = 'npm' | 'pnpm' | 'yarn';

export const NPM: ToolCandidate = {
  id: 'npm',
  binary: 'npm',
  installHint: 'https://nodejs.org',
  lockfiles: ['package-lock.json'],
};

export const PNPM: ToolCandidate = {
  id: 'pnpm',
  binary: 'pnpm',
  installHint: 'npm install -g pnpm',
  lockfiles: ['pnpm-lock.yaml'],
};

export const YARN: ToolCandidate = {
  id: 'yarn',
  binary: 'yarn',
  installHint: 'npm install -g yarn',
  lockfiles: ['yarn.lock'],
};

/** Default order when no lockfile disambiguates. */
export const PACKAGE_MANAGERS: ToolCandidate[] = [NPM, PNPM, YARN];

export const ESLINT_CONFIGS = [
  'eslint.config.js',
  'eslint.config.mjs',
  'eslint.config.cjs',
  'eslint.config.ts',
  '.eslintrc.js',
  '.eslintrc.cjs',
  '.eslintrc.json',
  '.eslintrc.yml',
  '.eslintrc.yaml',
  '.eslintrc',
];

export const PRETTIER_CONFIGS = [
  '.prettierrc',
  '.prettierrc.json',
  '.prettierrc.yml',
  '.prettierrc.yaml',
  '.prettierrc.js',
  '.prettierrc.cjs',
  'prettier.config.js',
  'prettier.config.mjs',
  'prettier.config.cjs',
];

export interface NodeProjectFacts {
  hasEslintConfig: boolean;
  hasPrettierConfig: boolean;
  hasTsconfig: boolean;
  hasTestScript: boolean;
}

function asPackageManager(tool: ToolCandidate): JsPackageManager {
  switch (tool.id) {
    case 'pnpm':
      return 'pnpm';
    case 'yarn':
      return 'yarn';
    default:
      return 'npm';
  }
}

/** Run a binary from the project's node_modules through the package manager. */
export function localBinary(pm: JsPackageManager, binary: string, args: string[]): Invocation {
  switch (pm) {
    case 'pnpm':
      return { command: 'pnpm', args: ['exec', binary, ...args] };
    case 'yarn':
      return { command: 'yarn', args: [binary, ...args] };
    case 'npm':
      return { command: 'npx', args: [binary, ...args] };
  }
}

export function getUpdateCommand(pm: JsPackageManager, minorOnly: boolean): Invocation {
  switch (pm) {
    case 'pnpm':
      return { command: 'pnpm', args: minorOnly ? ['update'] : ['update', '--latest'] };
    case 'yarn':
      return { command: 'yarn', args: minorOnly ? ['upgrade'] : ['upgrade', '--latest'] };
    case 'npm':
      return { command: 'npm', args: minorOnly ? ['update'] : ['update', '--save'] };
  }
}

async function anyExists(rootPath: string, names: readonly string[]): Promise<boolean> {
  for (const name of names) {
    try {
      await access(join(rootPath, name));
      return true;
    } catch {
      // Not this one
    }
  }
  return false;
}

export function declaresTestScript(packageJsonContent: string): boolean {
  let manifest: unknown;
  try {
    manifest = JSON.parse(packageJsonContent);
  } catch {
    return false;
  }
  if (typeof manifest !== 'object' || manifest === null || !('scripts' in manifest)) {
    return false;
  }
  const scripts = manifest.scripts;
  return (
    typeof scripts === 'object' &&
    scripts !== null &&
    'test' in scripts &&
    typeof scripts.test === 'string'
  );
}

export async function inspectNodeProject(rootPath: string): Promise<NodeProjectFacts> {
  let packageJson = '';
  try {
    packageJson = await readFile(join(rootPath, 'package.json'), 'utf-8');
  } catch {
    packageJson = '';
  }

  return {
    hasEslintConfig: await anyExists(rootPath, ESLINT_CONFIGS),
    hasPrettierConfig: await anyExists(rootPath, PRETTIER_CONFIGS),
    hasTsconfig: await anyExists(rootPath, ['tsconfig.json']),
    hasTestScript: declaresTestScript(packageJson),
  };
}

function auditStep(): Step {
  return {
    kind: 'command',
    name: 'audit',
    candidates: PACKAGE_MANAGERS,
    invoke: (tool) => ({ command: asPackageManager(tool), args: ['audit'] }),
  };
}

export function planNodeUpdate(mode: RunMode): Step[] {
  const steps: Step[] = [];

  if (mode.checkOnly) {
    steps.push({
      kind: 'command',
      name: 'outdated',
      candidates: PACKAGE_MANAGERS,
      // Exit code 1 only reports that newer versions exist
      invoke: (tool) => ({ command: asPackageManager(tool), args: ['outdated'], okExitCodes: [1] }),
    });
  } else {
    steps.push({
      kind: 'command',
      name: 'update',
      candidates: PACKAGE_MANAGERS,
      invoke: (tool) => getUpdateCommand(asPackageManager(tool), mode.minorOnly),
    });
  }

  if (mode.audit) {
    steps.push(auditStep());
  }

  return steps;
}

export function planNodeCheck(mode: RunMode, facts: NodeProjectFacts): Step[] {
  return [
    {
      kind: 'command',
      name: 'lint',
      candidates: PACKAGE_MANAGERS,
      invoke: (tool) =>
        localBinary(asPackageManager(tool), 'eslint', mode.fix ? ['--fix', '.'] : ['.']),
      skipReason: facts.hasEslintConfig ? undefined : 'no ESLint config found',
    },
    {
      kind: 'command',
      name: 'format',
      candidates: PACKAGE_MANAGERS,
      invoke: (tool) =>
        localBinary(asPackageManager(tool), 'prettier', mode.fix ? ['--write', '.'] : ['--check', '.']),
      skipReason: facts.hasPrettierConfig ? undefined : 'no Prettier config found',
    },
    {
      kind: 'command',
      name: 'typecheck',
      candidates: PACKAGE_MANAGERS,
      invoke: (tool) => localBinary(asPackageManager(tool), 'tsc', ['--noEmit']),
      skipReason: facts.hasTsconfig ? undefined : 'no tsconfig.json found',
    },
    {
      kind: 'command',
      name: 'test',
      candidates: PACKAGE_MANAGERS,
      invoke: (tool) => ({ command: asPackageManager(tool), args: ['test'] }),
      skipReason: facts.hasTestScript ? undefined : 'no test script in package.json',
    },
    auditStep(),
  ];
}

export function planNodeClean(mode: RunMode): Step[] {
  const steps: Step[] = [
    {
      kind: 'remove',
      name: 'build artifacts',
      patterns: ['dist', 'build', '.next', '.nuxt', '.output', '.cache', '.parcel-cache', '.turbo'],
    },
    { kind: 'remove', name: 'coverage', patterns: ['coverage'] },
  ];

  if (mode.cleanAll) {
    steps.push({ kind: 'remove', name: 'dependencies', patterns: ['node_modules'] });
  }

  return steps;
}

export class NodeEcosystem implements EcosystemDefinition {
  readonly type = 'node' as const;
  readonly displayName = 'Node.js';
  readonly markers = ['package.json'];

  async plan(task: Task, { rootPath, mode }: PlanContext): Promise<Step[]> {
    switch (task) {
      case 'update':
        return planNodeUpdate(mode);
      case 'check':
        return planNodeCheck(mode, await inspectNodeProject(rootPath));
      case 'clean':
        return planNodeClean(mode);
    }
  }
}
