// ABOUTME: Detects which ecosystems apply to a project root from their marker files
// ABOUTME: Looks only at the root directory, never recursively

import { access } from 'node:fs/promises';
import { join } from 'node:path';
import type { EcosystemDefinition, EcosystemType } from './ecosystems/types.js';

export async function hasMarker(
  rootPath: string,
  definition: EcosystemDefinition
): Promise<boolean> {
  for (const marker of definition.markers) {
    try {
      await access(join(rootPath, marker));
      return true;
    } catch {
      // Missing marker, try the next one
    }
  }
  return false;
}

/**
 * Returns the definitions that apply to rootPath, in the order given.
 * An explicit target skips probing the other ecosystems but still requires
 * the target's own markers to be present.
 */
export async function detectEcosystems(
  rootPath: string,
  definitions: readonly EcosystemDefinition[],
  target: EcosystemType | 'all' = 'all'
): Promise<EcosystemDefinition[]> {
  const candidates =
    target === 'all' ? definitions : definitions.filter((d) => d.type === target);

  const detected: EcosystemDefinition[] = [];
  for (const definition of candidates) {
    if (await hasMarker(rootPath, definition)) {
      detected.push(definition);
    }
  }
  return detected;
}
