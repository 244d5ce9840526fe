// ABOUTME: Runs a single planned step and classifies it as passed, failed or skipped
// ABOUTME: Never throws for tool problems; only a user interrupt escapes as an error

import { access, constants } from 'node:fs/promises';
import type {
  CommandStep,
  ExecFn,
  ExecResult,
  Invocation,
  OperationOutcome,
  OutcomeScope,
  RemoveStep,
  Step,
} from './ecosystems/types.js';
import { findArtifacts, removeArtifacts } from './artifacts.js';
import { resolveTool, type ToolEnvironment } from './resolver.js';
import { spawnErrorCode } from './exec.js';
import { InterruptedError, OutputLimitError, errorMessage } from './errors.js';

export const OUTPUT_TAIL_LINES = 20;

export interface ExecutionContext {
  ecosystem: OutcomeScope;
  rootPath: string;
  environment: ToolEnvironment;
  exec: ExecFn;
  timeoutMs: number;
  dryRun: boolean;
  preference?: readonly string[];
  signal?: AbortSignal;
}

export function formatCommand(invocation: Invocation): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/\s/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/** Last lines of combined stdout/stderr, or undefined when the tool was silent. */
export function outputTail(result: Pick<ExecResult, 'stdout' | 'stderr'>, lines = OUTPUT_TAIL_LINES): string | undefined {
  const combined = [result.stdout, result.stderr]
    .map((text) => text.trimEnd())
    .filter((text) => text.length > 0)
    .join('\n');
  if (combined.length === 0) return undefined;
  return combined.split('\n').slice(-lines).join('\n');
}

export async function executeStep(step: Step, context: ExecutionContext): Promise<OperationOutcome> {
  if (context.signal?.aborted) {
    throw new InterruptedError(step.name);
  }
  return step.kind === 'command'
    ? executeCommand(step, context)
    : executeRemove(step, context);
}

async function executeCommand(step: CommandStep, context: ExecutionContext): Promise<OperationOutcome> {
  const base = { step: step.name, ecosystem: context.ecosystem };

  if (step.skipReason) {
    return { ...base, status: 'skipped', message: step.skipReason };
  }

  const tool = resolveTool(step.candidates, context.environment, context.preference);
  if (!tool) {
    const wanted = step.candidates[0];
    return {
      ...base,
      status: 'skipped',
      message: wanted
        ? `${wanted.binary} not installed (install: ${wanted.installHint})`
        : 'no tool configured',
    };
  }

  const invocation = step.invoke(tool);
  const command = formatCommand(invocation);

  try {
    await access(context.rootPath, constants.R_OK | constants.X_OK);
  } catch (err) {
    return {
      ...base,
      status: 'failed',
      command,
      message: `working directory ${context.rootPath} is not accessible: ${errorMessage(err)}`,
    };
  }

  let result: ExecResult;
  try {
    result = await context.exec(invocation.command, invocation.args, {
      cwd: context.rootPath,
      timeoutMs: context.timeoutMs,
      signal: context.signal,
    });
  } catch (err) {
    if (context.signal?.aborted) {
      throw new InterruptedError(step.name, { cause: err });
    }
    if (err instanceof OutputLimitError) {
      return {
        ...base,
        status: 'failed',
        command,
        message: `${invocation.command} was stopped after writing more than ${Math.round(err.limitBytes / (1024 * 1024))} MiB of output`,
        output: outputTail(err),
      };
    }
    if (spawnErrorCode(err) === 'ENOENT') {
      return {
        ...base,
        status: 'skipped',
        command,
        message: `${invocation.command} could not be started (install: ${tool.installHint})`,
      };
    }
    return { ...base, status: 'failed', command, message: `${invocation.command} could not be started: ${errorMessage(err)}` };
  }

  // A Ctrl-C may reach the tool before the abort reaches polydev
  if (context.signal?.aborted) {
    throw new InterruptedError(step.name);
  }

  const output = outputTail(result);

  if (result.timedOut) {
    return {
      ...base,
      status: 'failed',
      command,
      message: `timed out after ${Math.round(context.timeoutMs / 1000)}s`,
      output,
    };
  }

  if (result.exitCode === null) {
    return {
      ...base,
      status: 'failed',
      command,
      message: `terminated by ${result.signal ?? 'unknown signal'}`,
      output,
    };
  }

  if (result.exitCode === 0 || (invocation.okExitCodes ?? []).includes(result.exitCode)) {
    return { ...base, status: 'passed', command };
  }

  return {
    ...base,
    status: 'failed',
    command,
    message: `${invocation.command} exited with code ${result.exitCode}`,
    output,
  };
}

async function executeRemove(step: RemoveStep, context: ExecutionContext): Promise<OperationOutcome> {
  const base = { step: step.name, ecosystem: context.ecosystem };

  let paths: string[];
  try {
    paths = await findArtifacts(context.rootPath, step.patterns);
  } catch (err) {
    return { ...base, status: 'failed', message: `could not search for artifacts: ${errorMessage(err)}` };
  }

  if (paths.length === 0) {
    return { ...base, status: 'skipped', message: 'nothing to remove' };
  }

  if (context.dryRun) {
    return { ...base, status: 'passed', message: `would remove: ${paths.join(', ')}` };
  }

  try {
    await removeArtifacts(context.rootPath, paths);
  } catch (err) {
    return { ...base, status: 'failed', message: `could not remove artifacts: ${errorMessage(err)}` };
  }

  return { ...base, status: 'passed', message: `removed: ${paths.join(', ')}` };
}
