// ABOUTME: Commander program wiring the update, check and clean commands to the orchestrator
// ABOUTME: Dependencies are injectable so argument handling can be tested without spawning tools

import { resolve } from 'node:path';
import { Argument, Command, InvalidArgumentError } from 'commander';
import type { RunMode, Task } from './ecosystems/types.js';
import { run } from './orchestrator.js';
import { loadConfig } from './config.js';
import { buildRunMode, parseTarget, TARGET_CHOICES, type CommandFlags } from './run-mode.js';
import { getColors } from './colors.js';
import { createConsoleListener, formatSummary } from './report.js';
import { exitCodeFor } from './summary.js';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_ERROR_EXIT_CODE = 2;

export interface CliDeps {
  setExitCode: (code: number) => void;
  runTask?: typeof run;
  loadConfig?: typeof loadConfig;
  env?: NodeJS.ProcessEnv;
  isTTY?: boolean;
  signal?: AbortSignal;
  write?: (text: string) => void;
  writeError?: (text: string) => void;
}

type GlobalFlags = {
  cwd?: string;
};

export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('must be a positive integer number of seconds');
  }
  return seconds;
}

const TASK_TITLES: Record<Task, string> = {
  update: 'Updating dependencies',
  check: 'Running quality checks',
  clean: 'Cleaning build artifacts',
};

async function runTaskCommand(
  task: Task,
  ecosystem: string | undefined,
  command: Command,
  deps: CliDeps
): Promise<void> {
  const env = deps.env ?? process.env;
  const write = deps.write ?? ((text: string) => console.log(text));
  const writeError = deps.writeError ?? ((text: string) => console.error(text));
  const colors = getColors(env, deps.isTTY ?? process.stdout.isTTY === true);
  const flags = command.optsWithGlobals<GlobalFlags & CommandFlags>();
  const rootPath = resolve(flags.cwd ?? process.cwd());

  let mode: RunMode;
  try {
    const { config, source } = await (deps.loadConfig ?? loadConfig)(rootPath, env);
    mode = buildRunMode(parseTarget(ecosystem), flags, config);
    write(`🚀 ${TASK_TITLES[task]} in ${colors.blue}${rootPath}${colors.reset}`);
    if (source) {
      write(`   Using config ${source}`);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      const where = error.filePath ? ` (${error.filePath})` : '';
      writeError(`❌ Configuration error${where}: ${error.message}`);
      deps.setExitCode(CONFIG_ERROR_EXIT_CODE);
      return;
    }
    throw error;
  }

  if (mode.dryRun) {
    write('🔍 Running in DRY-RUN mode: nothing will be removed');
  }

  const summary = await (deps.runTask ?? run)(task, mode, rootPath, {
    signal: deps.signal,
    listener: createConsoleListener(colors, write),
  });

  write(formatSummary(summary, colors));
  deps.setExitCode(exitCodeFor(summary));
}

function ecosystemArgument(): Argument {
  return new Argument('[ecosystem]', 'ecosystem to target').choices(TARGET_CHOICES).default('all');
}

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name('polydev')
    .description('Update, check and clean Rust, Python and Node.js projects with whatever tools are installed')
    .option('-C, --cwd <dir>', 'project root to operate on')
    .option('--parallel', 'run ecosystems concurrently')
    .option('--timeout <seconds>', 'limit for each external tool invocation', parseSeconds);

  const action =
    (task: Task) =>
    async (ecosystem: string | undefined, _options: CommandFlags, command: Command): Promise<void> => {
      try {
        await runTaskCommand(task, ecosystem, command, deps);
      } catch (error) {
        (deps.writeError ?? ((text: string) => console.error(text)))(`\n❌ Error: ${errorMessage(error)}`);
        deps.setExitCode(1);
      }
    };

  program
    .command('update')
    .description('update dependencies, or list available updates with --check')
    .addArgument(ecosystemArgument())
    .option('-c, --check', 'check for updates without applying them')
    .option('-m, --minor', 'only take minor and patch updates')
    .option('-a, --audit', 'run a security audit after updating')
    .action(action('update'));

  program
    .command('check')
    .description('run formatters, linters, type checkers, tests and audits')
    .addArgument(ecosystemArgument())
    .option('--fix', 'let tools fix what they can')
    .option('--strict', 'treat warnings as errors')
    .action(action('check'));

  program
    .command('clean')
    .description('remove build artifacts and caches')
    .addArgument(ecosystemArgument())
    .option('-a, --all', 'also remove dependencies and virtual environments')
    .option('-d, --dry-run', 'show what would be removed')
    .option('--general', 'also remove editor, OS, log and temp files')
    .action(action('clean'));

  return program;
}
