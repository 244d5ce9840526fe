// ABOUTME: Finds and removes build artifacts matched by glob patterns under a project root
// ABOUTME: Dry runs report the matches without touching the filesystem

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { glob } from 'glob';

const IGNORED = ['**/.git/**', '**/node_modules/**'];

/**
 * Resolve patterns to project-relative paths, sorted and without duplicates.
 * Paths nested inside another match are dropped since removing the parent
 * covers them.
 */
export async function findArtifacts(rootPath: string, patterns: readonly string[]): Promise<string[]> {
  const matches = new Set<string>();

  for (const pattern of patterns) {
    const found = await glob(pattern, {
      cwd: rootPath,
      dot: true,
      // Top-level patterns like "node_modules" must still match themselves
      ignore: pattern.includes('/') ? IGNORED : [],
    });
    for (const path of found) {
      matches.add(path.split('\\').join('/'));
    }
  }

  const sorted = [...matches].sort();
  return sorted.filter(
    (path) => !sorted.some((other) => other !== path && path.startsWith(`${other}/`))
  );
}

export async function removeArtifacts(rootPath: string, paths: readonly string[]): Promise<void> {
  for (const path of paths) {
    await rm(join(rootPath, path), { recursive: true, force: true });
  }
}
