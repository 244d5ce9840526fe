// ABOUTME: Collects step outcomes for one run and folds them into a summary
// ABOUTME: Derives the process exit code from the number of failed steps

import type { OperationOutcome, RunSummary } from './ecosystems/types.js';

/** Exit codes from 126 upwards carry meaning for shells. */
export const MAX_FAILURE_EXIT_CODE = 125;
export const INTERRUPTED_EXIT_CODE = 130;

export function summarize(
  outcomes: readonly OperationOutcome[],
  interrupted = false
): RunSummary {
  let passed = 0;
  let failed = 0;
  let skipped = 0;

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'passed':
        passed++;
        break;
      case 'failed':
        failed++;
        break;
      case 'skipped':
        skipped++;
        break;
    }
  }

  return Object.freeze({
    outcomes: Object.freeze([...outcomes]),
    total: outcomes.length,
    passed,
    failed,
    skipped,
    interrupted,
  });
}

export class RunAggregator {
  private readonly outcomes: OperationOutcome[] = [];
  private interrupted = false;
  private finalized: RunSummary | null = null;

  record(outcome: OperationOutcome): void {
    if (this.finalized) {
      throw new Error('run summary already finalized');
    }
    this.outcomes.push(Object.freeze({ ...outcome }));
  }

  markInterrupted(): void {
    this.interrupted = true;
  }

  finalize(): RunSummary {
    if (!this.finalized) {
      this.finalized = summarize(this.outcomes, this.interrupted);
    }
    return this.finalized;
  }
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.interrupted) return INTERRUPTED_EXIT_CODE;
  return Math.min(summary.failed, MAX_FAILURE_EXIT_CODE);
}
