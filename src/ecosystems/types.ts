// ABOUTME: Ecosystem definition contract for multi-language lifecycle tasks
// ABOUTME: Defines steps, tool candidates, outcomes and the exec seam shared by Rust, Python and Node

export type EcosystemType = 'rust' | 'python' | 'node';

export type Task = 'update' | 'check' | 'clean';

export type OutcomeStatus = 'passed' | 'failed' | 'skipped';

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** null when the process was terminated by a signal. */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

export interface ExecOptions {
  cwd?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Runs a program to completion. Resolves for any process that started,
 * whatever its exit status; rejects when it could not be spawned, was
 * aborted, or overran the output limit.
 */
export type ExecFn = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/** Reports whether a program can be invoked in the current environment. */
export type ToolProbe = (binary: string) => Promise<boolean>;

export interface ToolCandidate {
  id: string;
  binary: string;
  installHint: string;
  /** Lockfiles that mark the project as belonging to this tool. */
  lockfiles?: string[];
}

export interface Invocation {
  command: string;
  args: string[];
  /** Nonzero exit codes that still count as success. */
  okExitCodes?: number[];
}

export interface CommandStep {
  kind: 'command';
  name: string;
  candidates: ToolCandidate[];
  invoke: (tool: ToolCandidate) => Invocation;
  skipReason?: string;
}

export interface RemoveStep {
  kind: 'remove';
  name: string;
  patterns: string[];
}

export type Step = CommandStep | RemoveStep;

export interface RunMode {
  target: EcosystemType | 'all';
  checkOnly: boolean;
  minorOnly: boolean;
  audit: boolean;
  fix: boolean;
  strict: boolean;
  dryRun: boolean;
  cleanAll: boolean;
  cleanGeneral: boolean;
  parallel: boolean;
  timeoutMs: number;
  preferences: Partial<Record<EcosystemType, string[]>>;
}

export interface PlanContext {
  rootPath: string;
  mode: RunMode;
}

export interface EcosystemDefinition {
  readonly type: EcosystemType;
  readonly displayName: string;
  readonly markers: readonly string[];

  /** Build the ordered step list for a task. Steps run in this order. */
  plan(task: Task, context: PlanContext): Promise<Step[]>;
}

export type OutcomeScope = EcosystemType | 'general';

export interface OperationOutcome {
  readonly step: string;
  readonly ecosystem: OutcomeScope;
  readonly status: OutcomeStatus;
  readonly command?: string;
  readonly message?: string;
  readonly output?: string;
}

export interface RunSummary {
  readonly outcomes: readonly OperationOutcome[];
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
  readonly interrupted: boolean;
}
