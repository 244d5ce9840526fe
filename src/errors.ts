// ABOUTME: Error classes raised by polydev outside of per-step outcomes
// ABOUTME: Config problems exit with code 2, user interrupts stop the run early

export interface PolydevErrorOptions {
  cause?: unknown;
}

export class PolydevError extends Error {
  constructor(message: string, options: PolydevErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
  }
}

/** Configuration file or override could not be read or validated. */
export class ConfigError extends PolydevError {
  readonly filePath?: string;

  constructor(message: string, options: PolydevErrorOptions & { filePath?: string } = {}) {
    super(message, options);
    this.filePath = options.filePath;
  }
}

/** The run was aborted (SIGINT) while a step was executing. */
export class InterruptedError extends PolydevError {
  constructor(step: string, options: PolydevErrorOptions = {}) {
    super(`interrupted during ${step}`, options);
  }
}

/** A tool wrote more output than polydev buffers; it was killed mid-run. */
export class OutputLimitError extends PolydevError {
  readonly code = 'ERR_OUTPUT_LIMIT';
  readonly limitBytes: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(limitBytes: number, output: { stdout: string; stderr: string }) {
    super(`output exceeded ${limitBytes} bytes`);
    this.limitBytes = limitBytes;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
