// ABOUTME: Top-level driver that runs update, check or clean across detected ecosystems
// ABOUTME: Plans each ecosystem's steps, executes them fail-soft and aggregates the outcomes

import type {
  EcosystemDefinition,
  ExecFn,
  OperationOutcome,
  OutcomeScope,
  RunMode,
  RunSummary,
  Step,
  Task,
  ToolProbe,
} from './ecosystems/types.js';
import { ALL_ECOSYSTEMS, inFixedOrder } from './ecosystems/index.js';
import { planGeneralClean } from './ecosystems/general.js';
import { detectEcosystems } from './detect.js';
import { collectCandidates, probeEnvironment, type ToolEnvironment } from './resolver.js';
import { executeStep } from './executor.js';
import { RunAggregator } from './summary.js';
import { defaultExec, binaryExists } from './exec.js';
import { InterruptedError, errorMessage } from './errors.js';

export interface RunListener {
  ecosystemStarted?(scope: OutcomeScope, displayName: string): void;
  outcomeRecorded?(outcome: OperationOutcome): void;
}

export interface RunOptions {
  ecosystems?: readonly EcosystemDefinition[];
  exec?: ExecFn;
  probe?: ToolProbe;
  signal?: AbortSignal;
  listener?: RunListener;
}

interface WorkUnit {
  scope: OutcomeScope;
  displayName: string;
  steps: Step[];
  preference?: readonly string[];
}

interface UnitResult {
  unit: WorkUnit;
  outcomes: OperationOutcome[];
  interrupted: boolean;
}

async function planUnits(
  task: Task,
  mode: RunMode,
  rootPath: string,
  definitions: readonly EcosystemDefinition[]
): Promise<{ units: WorkUnit[]; planningFailures: OperationOutcome[] }> {
  const units: WorkUnit[] = [];
  const planningFailures: OperationOutcome[] = [];

  for (const definition of definitions) {
    try {
      units.push({
        scope: definition.type,
        displayName: definition.displayName,
        steps: await definition.plan(task, { rootPath, mode }),
        preference: mode.preferences[definition.type],
      });
    } catch (err) {
      planningFailures.push({
        step: 'plan',
        ecosystem: definition.type,
        status: 'failed',
        message: `could not plan ${task}: ${errorMessage(err)}`,
      });
    }
  }

  if (task === 'clean' && mode.target === 'all') {
    const steps = planGeneralClean(mode);
    if (steps.length > 0) {
      units.push({ scope: 'general', displayName: 'General', steps });
    }
  }

  return { units, planningFailures };
}

async function runUnit(
  unit: WorkUnit,
  rootPath: string,
  mode: RunMode,
  environment: ToolEnvironment,
  exec: ExecFn,
  signal: AbortSignal | undefined,
  onOutcome: (outcome: OperationOutcome) => void
): Promise<boolean> {
  for (const step of unit.steps) {
    let outcome: OperationOutcome;
    try {
      outcome = await executeStep(step, {
        ecosystem: unit.scope,
        rootPath,
        environment,
        exec,
        timeoutMs: mode.timeoutMs,
        dryRun: mode.dryRun,
        preference: unit.preference,
        signal,
      });
    } catch (err) {
      if (err instanceof InterruptedError) {
        return true;
      }
      outcome = {
        step: step.name,
        ecosystem: unit.scope,
        status: 'failed',
        message: errorMessage(err),
      };
    }
    onOutcome(outcome);
  }
  return false;
}

/**
 * Run one task against the project at rootPath.
 *
 * Every planned step gets an attempt: a failed step never stops the steps
 * after it. Only an abort through `options.signal` ends the run early, in
 * which case the summary holds what completed and is marked interrupted.
 */
export async function run(
  task: Task,
  mode: RunMode,
  rootPath: string,
  options: RunOptions = {}
): Promise<RunSummary> {
  const aggregator = new RunAggregator();
  const listener = options.listener ?? {};
  const exec = options.exec ?? defaultExec;
  const probe = options.probe ?? binaryExists;

  const definitions = inFixedOrder(options.ecosystems ?? ALL_ECOSYSTEMS);
  const detected = await detectEcosystems(rootPath, definitions, mode.target);
  const { units, planningFailures } = await planUnits(task, mode, rootPath, detected);

  for (const failure of planningFailures) {
    aggregator.record(failure);
    listener.outcomeRecorded?.(failure);
  }

  const runnable = units.flatMap((unit) =>
    unit.steps.filter((step) => step.kind !== 'command' || !step.skipReason)
  );
  const environment = await probeEnvironment(rootPath, collectCandidates(runnable), probe);

  const record = (outcome: OperationOutcome): void => {
    aggregator.record(outcome);
    listener.outcomeRecorded?.(outcome);
  };

  if (mode.parallel) {
    // Buffer per unit, then report in the fixed order
    const results: UnitResult[] = await Promise.all(
      units.map(async (unit) => {
        const outcomes: OperationOutcome[] = [];
        const interrupted = await runUnit(unit, rootPath, mode, environment, exec, options.signal, (o) =>
          outcomes.push(o)
        );
        return { unit, outcomes, interrupted };
      })
    );

    for (const result of results) {
      listener.ecosystemStarted?.(result.unit.scope, result.unit.displayName);
      result.outcomes.forEach(record);
      if (result.interrupted) aggregator.markInterrupted();
    }
  } else {
    for (const unit of units) {
      listener.ecosystemStarted?.(unit.scope, unit.displayName);
      const interrupted = await runUnit(unit, rootPath, mode, environment, exec, options.signal, record);
      if (interrupted) {
        aggregator.markInterrupted();
        break;
      }
    }
  }

  return aggregator.finalize();
}
