// ABOUTME: Cross-ecosystem cleanup of editor, OS, log and temp files
// ABOUTME: Only planned for the clean task when general cleanup is requested

import type { RunMode, Step } from './types.js';

export function planGeneralClean(mode: RunMode): Step[] {
  if (!mode.cleanGeneral) return [];

  return [
    { kind: 'remove', name: 'editor files', patterns: ['.idea', '*.swp', '*~'] },
    { kind: 'remove', name: 'os files', patterns: ['.DS_Store', 'Thumbs.db'] },
    { kind: 'remove', name: 'logs', patterns: ['**/*.log'] },
    { kind: 'remove', name: 'temp directories', patterns: ['tmp', '.tmp', 'temp'] },
  ];
}
