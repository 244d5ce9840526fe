// ABOUTME: Console rendering for step outcomes and the end-of-run summary
// ABOUTME: One line per outcome with indented diagnostics, then a banner with the counts

import type { OperationOutcome, OutcomeStatus, RunSummary } from './ecosystems/types.js';
import type { RunListener } from './orchestrator.js';
import { paint, type ColorName, type Colors } from './colors.js';

const STATUS_TAGS: Record<OutcomeStatus, { tag: string; color: ColorName }> = {
  passed: { tag: '[PASS]', color: 'green' },
  failed: { tag: '[FAIL]', color: 'red' },
  skipped: { tag: '[SKIP]', color: 'yellow' },
};

const RULE = '================================';
const DETAIL_INDENT = '         ';

export function getStatusTag(status: OutcomeStatus, colors: Colors): string {
  const { tag, color } = STATUS_TAGS[status];
  return paint(colors, color, tag);
}

export function formatOutcome(outcome: OperationOutcome, colors: Colors): string {
  let line = `  ${getStatusTag(outcome.status, colors)} ${outcome.step}`;
  if (outcome.command) {
    line += ` ${paint(colors, 'dim', `(${outcome.command})`)}`;
  }

  const lines = [line];
  if (outcome.message) {
    lines.push(`${DETAIL_INDENT}${outcome.message}`);
  }
  if (outcome.output && outcome.status === 'failed') {
    for (const outputLine of outcome.output.split('\n')) {
      lines.push(paint(colors, 'dim', `${DETAIL_INDENT}| ${outputLine}`));
    }
  }
  return lines.join('\n');
}

export function formatEcosystemHeader(displayName: string, colors: Colors): string {
  return `\n${paint(colors, 'blue', `▸ ${displayName}`)}`;
}

function countsLine(summary: RunSummary): string {
  return `${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`;
}

export function formatSummaryLine(summary: RunSummary, colors: Colors): string {
  if (summary.interrupted) {
    return `${paint(colors, 'red', '[INTERRUPTED]')} Run interrupted after ${summary.total} step(s) (${countsLine(summary)})`;
  }
  if (summary.total === 0) {
    return `${paint(colors, 'blue', '[INFO]')} Nothing to do: no matching ecosystem detected`;
  }
  if (summary.failed === 0) {
    return `${getStatusTag('passed', colors)} All steps passed (${countsLine(summary)})`;
  }
  return `${getStatusTag('failed', colors)} ${summary.failed} step(s) failed (${countsLine(summary)})`;
}

export function formatSummary(summary: RunSummary, colors: Colors): string {
  return ['', RULE, formatSummaryLine(summary, colors), RULE].join('\n');
}

/** Listener that prints each ecosystem header and outcome as it is recorded. */
export function createConsoleListener(
  colors: Colors,
  write: (text: string) => void = (text) => console.log(text)
): RunListener {
  return {
    ecosystemStarted: (_scope, displayName) => write(formatEcosystemHeader(displayName, colors)),
    outcomeRecorded: (outcome) => write(formatOutcome(outcome, colors)),
  };
}
