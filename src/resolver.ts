// ABOUTME: Chooses which concrete tool runs a step from a preference-ordered candidate list
// ABOUTME: Selection is a pure function of installed binaries, present lockfiles and user preference

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import type { Step, ToolCandidate, ToolProbe } from './ecosystems/types.js';

export interface ToolEnvironment {
  installed: ReadonlySet<string>;
  lockfiles: ReadonlySet<string>;
}

/**
 * Order candidates for selection: configured preference first, then
 * candidates whose lockfile is present, then the declared order.
 */
export function rankCandidates(
  candidates: readonly ToolCandidate[],
  lockfiles: ReadonlySet<string>,
  preference: readonly string[] = []
): ToolCandidate[] {
  const preferenceRank = (candidate: ToolCandidate): number => {
    const index = preference.indexOf(candidate.id);
    return index === -1 ? preference.length : index;
  };
  const hasLockfile = (candidate: ToolCandidate): boolean =>
    (candidate.lockfiles ?? []).some((file) => lockfiles.has(file));

  // Array.prototype.sort is stable, so ties keep the declared order
  return [...candidates].sort((a, b) => {
    const byPreference = preferenceRank(a) - preferenceRank(b);
    if (byPreference !== 0) return byPreference;
    return Number(hasLockfile(b)) - Number(hasLockfile(a));
  });
}

export function resolveTool(
  candidates: readonly ToolCandidate[],
  environment: ToolEnvironment,
  preference: readonly string[] = []
): ToolCandidate | null {
  for (const candidate of rankCandidates(candidates, environment.lockfiles, preference)) {
    if (environment.installed.has(candidate.binary)) {
      return candidate;
    }
  }
  return null;
}

/** Every candidate a list of steps could pick from. */
export function collectCandidates(steps: readonly Step[]): ToolCandidate[] {
  const candidates: ToolCandidate[] = [];
  for (const step of steps) {
    if (step.kind === 'command') {
      candidates.push(...step.candidates);
    }
  }
  return candidates;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Probe each distinct binary and lockfile once. The resulting environment is
 * shared read-only by every step of the run.
 */
export async function probeEnvironment(
  rootPath: string,
  candidates: readonly ToolCandidate[],
  probe: ToolProbe
): Promise<ToolEnvironment> {
  const binaries = [...new Set(candidates.map((c) => c.binary))];
  const lockfileNames = [...new Set(candidates.flatMap((c) => c.lockfiles ?? []))];

  const [binaryResults, lockfileResults] = await Promise.all([
    Promise.all(binaries.map(async (binary) => [binary, await probe(binary)] as const)),
    Promise.all(
      lockfileNames.map(async (file) => [file, await fileExists(join(rootPath, file))] as const)
    ),
  ]);

  return {
    installed: new Set(binaryResults.filter(([, found]) => found).map(([binary]) => binary)),
    lockfiles: new Set(lockfileResults.filter(([, found]) => found).map(([file]) => file)),
  };
}
