// ABOUTME: Shell execution utilities for running ecosystem tools
// ABOUTME: Provides injectable exec function and PATH lookup for testing

import { spawn, type ChildProcess } from 'node:child_process';
import which from 'which';
import type { ExecFn, ExecOptions, ExecResult } from './ecosystems/types.js';
import { OutputLimitError } from './errors.js';

export const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Signal the child's whole process group, so test workers or anything else
 * the tool started go down with it. Requires a detached spawn.
 */
function killProcessGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  if (process.platform === 'win32') {
    child.kill(signal);
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch {
    // Group already gone; the direct child may still be reaping
    child.kill(signal);
  }
}

function abortError(signal: AbortSignal): Error {
  return Object.assign(new Error('The operation was aborted', { cause: signal.reason }), {
    name: 'AbortError',
    code: 'ABORT_ERR',
  });
}

export const defaultExec: ExecFn = (
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> =>
  new Promise((resolve, reject) => {
    const { signal, timeoutMs } = options;
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
    });

    let stdout = '';
    let stderr = '';
    let outputBytes = 0;
    let timedOut = false;
    let overflowed = false;

    const onOutput = (stream: 'stdout' | 'stderr') => (chunk: string) => {
      if (overflowed) return;
      outputBytes += Buffer.byteLength(chunk);
      if (outputBytes > MAX_OUTPUT_BYTES) {
        overflowed = true;
        killProcessGroup(child, 'SIGTERM');
        return;
      }
      if (stream === 'stdout') {
        stdout += chunk;
      } else {
        stderr += chunk;
      }
    };
    child.stdout.setEncoding('utf8').on('data', onOutput('stdout'));
    child.stderr.setEncoding('utf8').on('data', onOutput('stderr'));

    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            killProcessGroup(child, 'SIGTERM');
          }, timeoutMs);

    const onAbort = (): void => killProcessGroup(child, 'SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = (): void => {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    child.once('error', (error) => {
      cleanup();
      reject(error);
    });

    child.once('close', (exitCode, exitSignal) => {
      cleanup();
      if (signal?.aborted) {
        reject(abortError(signal));
        return;
      }
      if (overflowed) {
        reject(new OutputLimitError(MAX_OUTPUT_BYTES, { stdout, stderr }));
        return;
      }
      resolve({ stdout, stderr, exitCode, signal: exitSignal, timedOut });
    });
  });

/** True when the binary resolves to an executable file on PATH (or is one). */
export async function binaryExists(name: string): Promise<boolean> {
  return (await which(name, { nothrow: true })) !== null;
}

/** Error code attached by Node to a failed spawn, if any. */
export function spawnErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
