// ABOUTME: Python ecosystem definition for pyproject, setup.py and requirements.txt projects
// ABOUTME: Chooses between poetry, uv and pip and plans ruff/mypy/pytest/bandit checks

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseTOML, type TomlTable } from 'smol-toml';
import { globIterate } from 'glob';
import type {
  EcosystemDefinition,
  PlanContext,
  RunMode,
  Step,
  Task,
  ToolCandidate,
} from './types.js';

export const POETRY: ToolCandidate = {
  id: 'poetry',
  binary: 'poetry',
  installHint: 'pipx install poetry',
  lockfiles: ['poetry.lock'],
};

export const UV: ToolCandidate = {
  id: 'uv',
  binary: 'uv',
  installHint: 'pipx install uv',
  lockfiles: ['uv.lock'],
};

export const PIP: ToolCandidate = {
  id: 'pip',
  binary: 'pip',
  installHint: 'python -m ensurepip --upgrade',
};

export const PIP_AUDIT: ToolCandidate = {
  id: 'pip-audit',
  binary: 'pip-audit',
  installHint: 'pip install pip-audit',
};

export const SAFETY: ToolCandidate = {
  id: 'safety',
  binary: 'safety',
  installHint: 'pip install safety',
};

export const RUFF: ToolCandidate = { id: 'ruff', binary: 'ruff', installHint: 'pip install ruff' };
export const MYPY: ToolCandidate = { id: 'mypy', binary: 'mypy', installHint: 'pip install mypy' };
export const PYTEST: ToolCandidate = { id: 'pytest', binary: 'pytest', installHint: 'pip install pytest' };
export const BANDIT: ToolCandidate = { id: 'bandit', binary: 'bandit', installHint: 'pip install bandit' };

const SOURCE_IGNORES = ['.venv/**', 'venv/**', '.git/**', 'node_modules/**'];

export interface PythonProjectFacts {
  hasPyproject: boolean;
  hasRequirements: boolean;
  /** pyproject.toml declares a [tool.poetry] table. */
  usesPoetry: boolean;
  hasSources: boolean;
  hasTests: boolean;
}

export function declaresPoetry(pyprojectContent: string): boolean {
  let document: TomlTable;
  try {
    document = parseTOML(pyprojectContent);
  } catch {
    // An unparseable pyproject cannot be driven by poetry either
    return false;
  }
  const tool = document.tool;
  return (
    typeof tool === 'object' &&
    tool !== null &&
    !Array.isArray(tool) &&
    !(tool instanceof Date) &&
    'poetry' in tool
  );
}

async function anyMatch(rootPath: string, pattern: string): Promise<boolean> {
  for await (const _match of globIterate(pattern, { cwd: rootPath, ignore: SOURCE_IGNORES })) {
    return true;
  }
  return false;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function inspectPythonProject(rootPath: string): Promise<PythonProjectFacts> {
  let pyproject: string | null = null;
  try {
    pyproject = await readFile(join(rootPath, 'pyproject.toml'), 'utf-8');
  } catch {
    pyproject = null;
  }

  let hasRequirements = true;
  try {
    await stat(join(rootPath, 'requirements.txt'));
  } catch {
    hasRequirements = false;
  }

  const hasSources = await anyMatch(rootPath, '**/*.py');
  const hasTests =
    hasSources &&
    ((await isDirectory(join(rootPath, 'tests'))) || (await anyMatch(rootPath, '**/test_*.py')));

  return {
    hasPyproject: pyproject !== null,
    hasRequirements,
    usesPoetry: pyproject !== null && declaresPoetry(pyproject),
    hasSources,
    hasTests,
  };
}

function dependencyManagers(facts: PythonProjectFacts): ToolCandidate[] {
  if (!facts.hasPyproject) return [PIP];
  return facts.usesPoetry ? [POETRY, UV, PIP] : [UV, PIP];
}

export function planPythonUpdate(mode: RunMode, facts: PythonProjectFacts): Step[] {
  const steps: Step[] = [];
  const skipReason =
    facts.hasPyproject || facts.hasRequirements
      ? undefined
      : 'no pyproject.toml or requirements.txt to update from';

  if (mode.checkOnly) {
    steps.push({
      kind: 'command',
      name: 'outdated',
      candidates: dependencyManagers(facts),
      invoke: (tool) => {
        switch (tool.id) {
          case 'poetry':
            return { command: 'poetry', args: ['show', '--outdated'] };
          case 'uv':
            return { command: 'uv', args: ['pip', 'list', '--outdated'] };
          default:
            return { command: 'pip', args: ['list', '--outdated'] };
        }
      },
      skipReason,
    });
  } else {
    steps.push({
      kind: 'command',
      name: 'update',
      candidates: dependencyManagers(facts),
      invoke: (tool) => {
        switch (tool.id) {
          case 'poetry':
            return { command: 'poetry', args: ['update'] };
          case 'uv':
            return {
              command: 'uv',
              args: ['pip', 'compile', 'pyproject.toml', '-o', 'requirements.lock'],
            };
          default:
            return facts.hasPyproject
              ? { command: 'pip', args: ['install', '-e', '.[dev]', '--upgrade'] }
              : { command: 'pip', args: ['install', '-r', 'requirements.txt', '--upgrade'] };
        }
      },
      skipReason,
    });
  }

  if (mode.audit) {
    steps.push({
      kind: 'command',
      name: 'audit',
      candidates: [PIP_AUDIT, SAFETY],
      invoke: (tool) =>
        tool.id === 'safety'
          ? { command: 'safety', args: ['check'] }
          : { command: 'pip-audit', args: [] },
    });
  }

  return steps;
}

export function planPythonCheck(mode: RunMode, facts: PythonProjectFacts): Step[] {
  const noSources = facts.hasSources ? undefined : 'no Python files found';

  return [
    {
      kind: 'command',
      name: 'lint',
      candidates: [RUFF],
      invoke: () => ({ command: 'ruff', args: mode.fix ? ['check', '--fix', '.'] : ['check', '.'] }),
      skipReason: noSources,
    },
    {
      kind: 'command',
      name: 'format',
      candidates: [RUFF],
      invoke: () => ({ command: 'ruff', args: mode.fix ? ['format', '.'] : ['format', '--check', '.'] }),
      skipReason: noSources,
    },
    {
      kind: 'command',
      name: 'typecheck',
      candidates: [MYPY],
      invoke: () => ({ command: 'mypy', args: ['.'] }),
      skipReason: noSources,
    },
    {
      kind: 'command',
      name: 'test',
      candidates: [PYTEST],
      invoke: () => ({ command: 'pytest', args: [] }),
      skipReason: noSources ?? (facts.hasTests ? undefined : 'no tests directory or test_*.py files'),
    },
    {
      kind: 'command',
      name: 'security',
      candidates: [BANDIT],
      invoke: () => ({ command: 'bandit', args: ['-r', '.', '-x', './.venv,./.git,./venv'] }),
      skipReason: noSources,
    },
  ];
}

export function planPythonClean(mode: RunMode): Step[] {
  const steps: Step[] = [
    { kind: 'remove', name: 'bytecode', patterns: ['**/__pycache__', '**/*.pyc', '**/*.pyo'] },
    { kind: 'remove', name: 'build artifacts', patterns: ['build', 'dist', '*.egg-info', '.eggs'] },
    {
      kind: 'remove',
      name: 'test caches',
      patterns: ['.pytest_cache', '.coverage', 'htmlcov', '.mypy_cache', '.ruff_cache'],
    },
  ];

  if (mode.cleanAll) {
    steps.push({ kind: 'remove', name: 'virtualenv', patterns: ['.venv', 'venv'] });
  }

  return steps;
}

export class PythonEcosystem implements EcosystemDefinition {
  readonly type = 'python' as const;
  readonly displayName = 'Python';
  readonly markers = ['pyproject.toml', 'setup.py', 'requirements.txt'];

  async plan(task: Task, { rootPath, mode }: PlanContext): Promise<Step[]> {
    switch (task) {
      case 'update':
        return planPythonUpdate(mode, await inspectPythonProject(rootPath));
      case 'check':
        return planPythonCheck(mode, await inspectPythonProject(rootPath));
      case 'clean':
        return planPythonClean(mode);
    }
  }
}
