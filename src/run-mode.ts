// ABOUTME: Builds the immutable RunMode for one invocation from CLI flags and config
// ABOUTME: CLI flags win over environment and file settings

import type { EcosystemType, RunMode } from './ecosystems/types.js';
import { isEcosystemType } from './ecosystems/index.js';
import { DEFAULT_TIMEOUT_SECONDS, type PolydevConfig } from './config.js';

export type TargetArgument = EcosystemType | 'all';

export const TARGET_CHOICES: readonly TargetArgument[] = ['rust', 'python', 'node', 'all'];

export const DEFAULT_RUN_MODE: RunMode = Object.freeze({
  target: 'all',
  checkOnly: false,
  minorOnly: false,
  audit: false,
  fix: false,
  strict: false,
  dryRun: false,
  cleanAll: false,
  cleanGeneral: false,
  parallel: false,
  timeoutMs: DEFAULT_TIMEOUT_SECONDS * 1000,
  preferences: {},
});

export type CommandFlags = {
  check?: boolean;
  minor?: boolean;
  audit?: boolean;
  fix?: boolean;
  strict?: boolean;
  dryRun?: boolean;
  all?: boolean;
  general?: boolean;
  parallel?: boolean;
  /** Seconds. */
  timeout?: number;
};

export function parseTarget(value: string | undefined): TargetArgument {
  if (value === undefined || value === 'all') return 'all';
  if (isEcosystemType(value)) return value;
  throw new Error(`unknown ecosystem "${value}" (expected one of: ${TARGET_CHOICES.join(', ')})`);
}

export function buildRunMode(
  target: TargetArgument,
  flags: CommandFlags,
  config: PolydevConfig
): RunMode {
  const timeoutSeconds = flags.timeout ?? config.timeoutSeconds;

  return Object.freeze({
    target,
    checkOnly: flags.check ?? false,
    minorOnly: flags.minor ?? false,
    audit: flags.audit ?? false,
    fix: flags.fix ?? false,
    strict: flags.strict ?? false,
    dryRun: flags.dryRun ?? false,
    cleanAll: flags.all ?? false,
    cleanGeneral: flags.general ?? false,
    parallel: flags.parallel ?? config.parallel,
    timeoutMs: timeoutSeconds * 1000,
    preferences: config.preferences,
  });
}
