// ABOUTME: Registry of supported ecosystems in their fixed reporting order
// ABOUTME: Rust, then Python, then Node.js; the order keeps output reproducible

import type { EcosystemDefinition, EcosystemType } from './types.js';
import { RustEcosystem } from './rust.js';
import { PythonEcosystem } from './python.js';
import { NodeEcosystem } from './node.js';

export const ECOSYSTEM_ORDER: readonly EcosystemType[] = ['rust', 'python', 'node'];

export const ALL_ECOSYSTEMS: readonly EcosystemDefinition[] = [
  new RustEcosystem(),
  new PythonEcosystem(),
  new NodeEcosystem(),
];

export function isEcosystemType(value: string): value is EcosystemType {
  return ECOSYSTEM_ORDER.some((type) => type === value);
}

/** Sort definitions into ECOSYSTEM_ORDER regardless of how they were supplied. */
export function inFixedOrder(definitions: readonly EcosystemDefinition[]): EcosystemDefinition[] {
  return [...definitions].sort(
    (a, b) => ECOSYSTEM_ORDER.indexOf(a.type) - ECOSYSTEM_ORDER.indexOf(b.type)
  );
}
