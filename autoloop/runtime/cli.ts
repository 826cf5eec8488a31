/**
 * CLI — Command parsing and dispatch for autoloop
 *
 * Kept free of process globals so every command can be driven from tests;
 * the bin entry (../cli.ts) supplies the real dependencies.
 */

import { resolve } from 'path';
import type { AgentConfig, AgentRunner, LoopMode, LoopOutcome, LoopResult } from '../types/index.js';
import { ExitCode } from '../types/index.js';
import { checkDependencies } from './agent.js';
import {
  checkWorkingDir,
  layerFromEnv,
  loadConfigFile,
  mergeLayers,
  resolveLoopConfig,
  resolveTodoConfig,
  DEFAULT_TODO_FILE,
  type ConfigSources,
  type FlagName,
  type FlagValues,
} from './config.js';
import { AlreadyRunningError, ConfigError, MissingDependencyError, errorMessage } from './errors.js';
import { formatHealthReport, formatStatus, readLatestState, readLockStatus, runHealthChecks } from './health.js';
import { runLoop } from './loop.js';
import type { ScopeDeps } from './scope.js';
import { defaultLogDir } from './state-paths.js';
import { runTodoLoop } from './todo-loop.js';

// =============================================================================
// TYPES
// =============================================================================

export type CliCommand = 'run' | 'todo' | 'status' | 'health' | 'check-deps' | 'help' | 'version';

export interface ParsedArgs {
  command: CliCommand;
  flags: FlagValues;
  dryRun: boolean;
  json: boolean;
}

/** Loop dependencies a caller may override; the agent comes from createAgent */
export type LoopOverrides = Omit<ScopeDeps, 'agent'> & {
  sleep?: (ms: number) => Promise<void>;
};

export interface CliDeps {
  /** Read a file from disk */
  readFile: (path: string, encoding: 'utf-8') => Promise<string>;
  /** Current working directory */
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Home directory for default log locations */
  home?: string;
  /** Console output */
  log: (message: string) => void;
  /** Console error */
  error: (message: string) => void;
  createAgent: (config: AgentConfig) => AgentRunner;
  /** Resolve a command on PATH; null when missing */
  findExecutable: (command: string) => Promise<string | null>;
  loop?: LoopOverrides;
}

// =============================================================================
// CONSTANTS
// =============================================================================

export const VERSION = '0.1.0';

export const HELP_TEXT = `
autoloop - run an AI coding agent in a loop until the work is done

Usage: autoloop <command> [options]

Commands:
  run         Repeat one task until the agent reports completion
  todo        Work through a Markdown TODO checklist, one item per iteration
  status      Show the latest session in a log directory
  health      Check dependencies, locks, state files and TODO.md
  check-deps  Verify the agent command is installed
  help        Show this help
  version     Show the version

Run options:
  -p, --prompt <text>          The task for the agent (required)
  -c, --completion <phrase>    Completion phrase (default: TASK_COMPLETE)
  -t, --threshold <n>          Consecutive completions needed (default: 2)
  -m, --max-iterations <n>     Maximum iterations (default: 50)
  --max-cost <dollars>         Stop once reported cost reaches this amount
  --max-duration <duration>    Stop after a duration such as 2h30m or 90m

Todo options:
  -f, --file <path>            Checklist file (default: TODO.md)
  -m, --max-iterations <n>     Maximum iterations (default: 100)

Shared options:
  --working-dir <path>         Directory the agent runs in (default: current)
  --log-dir <path>             Session log directory
  --log-format <json|text>     Console log format (default: json)
  --config <path>              Config file (default: autoloop.config.json)
  --dry-run                    Show what would happen without running the agent
  --json                       Machine-readable output (health)

Exit codes:
  0 done, 1 error, 2 limit reached, 3 already running,
  4 only blocked items left, 128+N interrupted by signal N

Examples:
  autoloop run -p "Fix all failing tests" -c ALL_TESTS_PASS
  autoloop run -p "Add unit tests" --max-cost 10.00
  autoloop run -p "Review and fix code quality issues" --max-duration 8h
  autoloop todo -f TODO.md
`;

const VALID_COMMANDS: readonly CliCommand[] = ['run', 'todo', 'status', 'health', 'check-deps', 'help', 'version'];

const VALUE_FLAGS: Record<string, FlagName> = {
  '-p': 'prompt',
  '--prompt': 'prompt',
  '-c': 'completion',
  '--completion': 'completion',
  '-t': 'threshold',
  '--threshold': 'threshold',
  '-m': 'max-iterations',
  '--max-iterations': 'max-iterations',
  '--max-cost': 'max-cost',
  '--max-duration': 'max-duration',
  '--working-dir': 'working-dir',
  '--log-dir': 'log-dir',
  '--log-format': 'log-format',
  '--config': 'config',
  '-f': 'file',
  '--file': 'file',
};

const OUTCOME_EXIT_CODES: Record<LoopOutcome, number> = {
  completed: ExitCode.Success,
  dry_run: ExitCode.Success,
  limit_reached: ExitCode.LimitReached,
  no_actionable_tasks: ExitCode.NoActionableTasks,
  // A signal exits the process from the signal guard; this is only seen
  // when that exit is replaced
  interrupted: ExitCode.Error,
};

// =============================================================================
// PARSING
// =============================================================================

/**
 * Resolve a raw command string to a CliCommand.
 * Returns 'help' for nothing, --help or -h; 'run' when the first argument is
 * already an option. Throws for unknown commands.
 */
export function resolveCommand(raw: string | undefined): CliCommand {
  if (raw === undefined || raw === '' || raw === '--help' || raw === '-h') return 'help';
  if (raw === '--version' || raw === '-v') return 'version';
  if (raw.startsWith('-')) return 'run';
  const command = VALID_COMMANDS.find(c => c === raw);
  if (!command) throw new ConfigError([`Unknown command: ${raw}`]);
  return command;
}

/**
 * Parse CLI arguments into structured form. Options take their value as
 * the next argument or after "=".
 *
 * @param argv - process.argv.slice(2)
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const command = resolveCommand(argv[0]);
  const rest = argv[0] !== undefined && argv[0].startsWith('-') && command === 'run' ? argv : argv.slice(1);

  const flags: FlagValues = {};
  const errors: string[] = [];
  let dryRun = false;
  let json = false;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const name = eq === -1 ? token : token.slice(0, eq);

    if (name === '--dry-run' && eq === -1) {
      dryRun = true;
      continue;
    }
    if (name === '--json' && eq === -1) {
      json = true;
      continue;
    }

    const flag = VALUE_FLAGS[name];
    if (flag === undefined) {
      errors.push(token.startsWith('-') ? `Unknown option: ${token}` : `Unexpected argument: ${token}`);
      continue;
    }

    if (eq !== -1) {
      flags[flag] = token.slice(eq + 1);
    } else if (i + 1 < rest.length) {
      flags[flag] = rest[++i];
    } else {
      errors.push(`Option ${name} requires a value`);
    }
  }

  if (errors.length > 0) throw new ConfigError(errors);
  return { command, flags, dryRun, json };
}

export function exitCodeFor(outcome: LoopOutcome): number {
  return OUTCOME_EXIT_CODES[outcome];
}

// =============================================================================
// COMMAND HANDLERS
// =============================================================================

function configSources(args: ParsedArgs, deps: CliDeps): ConfigSources {
  return {
    flags: args.flags,
    dryRun: args.dryRun,
    env: deps.env,
    cwd: deps.cwd,
    home: deps.home,
    readFile: deps.readFile,
  };
}

async function ensureAgent(command: string, deps: CliDeps): Promise<void> {
  const missing = await checkDependencies([command], deps.findExecutable);
  if (missing.length > 0) throw new MissingDependencyError(missing);
}

function printResult(result: LoopResult, mode: LoopMode, deps: CliDeps): void {
  if (result.outcome === 'dry_run') return;

  deps.log('');
  deps.log('Loop complete:');
  deps.log(`  Outcome: ${result.outcome}`);
  deps.log(`  Iterations: ${result.iterations}`);
  if (mode === 'signal') {
    deps.log(`  Total cost: $${result.totalCost.toFixed(4)}`);
    deps.log(`  Completion signals still needed: ${result.remaining}`);
  } else {
    deps.log(`  Remaining items: ${result.remaining}`);
  }
  if (result.limitReasons.length > 0) deps.log(`  Limits reached: ${result.limitReasons.join(', ')}`);
  if (result.stateFile) deps.log(`  State file: ${result.stateFile}`);
}

/**
 * Run the signal loop.
 */
export async function runSignal(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const config = await resolveLoopConfig(configSources(args, deps));
  await checkWorkingDir(config.workingDir);
  if (!config.dryRun) await ensureAgent(config.agent.command, deps);

  const result = await runLoop(config, { ...deps.loop, agent: deps.createAgent(config.agent) });
  printResult(result, 'signal', deps);
  return exitCodeFor(result.outcome);
}

/**
 * Run the checklist loop.
 */
export async function runTodo(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const config = await resolveTodoConfig(configSources(args, deps));
  await checkWorkingDir(config.workingDir);
  if (!config.dryRun) await ensureAgent(config.agent.command, deps);

  const result = await runTodoLoop(config, { ...deps.loop, agent: deps.createAgent(config.agent) });
  printResult(result, 'todo', deps);
  return exitCodeFor(result.outcome);
}

/**
 * Show the latest session of each log directory.
 */
export async function runStatus(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const explicit = args.flags['log-dir'];
  const dirs = explicit !== undefined
    ? [resolve(deps.cwd, explicit)]
    : [
      deps.env.AUTOLOOP_LOG_DIR || defaultLogDir('signal', deps.home),
      deps.env.TODO_LOG_DIR || defaultLogDir('todo', deps.home),
    ];

  for (const dir of dirs) {
    deps.log(`\n=== ${dir} ===`);
    const latest = await readLatestState(dir);
    if (!latest) {
      deps.log('No sessions found.');
      continue;
    }
    const lock = await readLockStatus(dir);
    for (const line of formatStatus(latest, lock)) deps.log(line);
  }

  deps.log('');
  return ExitCode.Success;
}

/**
 * Run health checks. Exits 1 when any check failed.
 */
export async function runHealth(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const report = await runHealthChecks({
    agentCommand: await agentCommandFor(args, deps),
    logDirs: {
      signal: deps.env.AUTOLOOP_LOG_DIR || defaultLogDir('signal', deps.home),
      todo: deps.env.TODO_LOG_DIR || defaultLogDir('todo', deps.home),
    },
    todoFile: resolve(deps.cwd, deps.env.TODO_FILE || DEFAULT_TODO_FILE),
    find: deps.findExecutable,
  });

  if (args.json) {
    deps.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatHealthReport(report)) deps.log(line);
  }
  return report.errors > 0 ? ExitCode.Error : ExitCode.Success;
}

/**
 * Verify the agent command (required) and git (optional).
 */
export async function runCheckDeps(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const agentCommand = await agentCommandFor(args, deps);
  deps.log('Checking dependencies...');

  const agentPath = await deps.findExecutable(agentCommand);
  if (agentPath) deps.log(`  [OK] ${agentCommand}: ${agentPath}`);
  else deps.error(`  [ERROR] ${agentCommand} not found on PATH`);

  const gitPath = await deps.findExecutable('git');
  if (gitPath) deps.log(`  [OK] git: ${gitPath}`);
  else deps.log('  [WARN] git not found (optional)');

  return agentPath ? ExitCode.Success : ExitCode.Error;
}

/**
 * The agent command from the config file and environment, without the
 * validation a full loop config needs.
 */
async function agentCommandFor(args: ParsedArgs, deps: CliDeps): Promise<string> {
  const sources = configSources(args, deps);
  const file = await loadConfigFile(sources, 'signal');
  if (file.errors.length > 0) throw new ConfigError(file.errors);
  const merged = mergeLayers(file.layer, layerFromEnv(deps.env, 'signal').layer);
  return merged.agentCommand ?? 'claude';
}

// =============================================================================
// DISPATCH
// =============================================================================

/**
 * Parse argv, run the command and map the result or error to an exit code.
 */
export async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    deps.error(errorMessage(error));
    deps.error('Run "autoloop help" for usage.');
    return ExitCode.Error;
  }

  try {
    switch (args.command) {
      case 'run':
        return await runSignal(args, deps);
      case 'todo':
        return await runTodo(args, deps);
      case 'status':
        return await runStatus(args, deps);
      case 'health':
        return await runHealth(args, deps);
      case 'check-deps':
        return await runCheckDeps(args, deps);
      case 'version':
        deps.log(`autoloop v${VERSION}`);
        return ExitCode.Success;
      case 'help':
        deps.log(HELP_TEXT);
        return ExitCode.Success;
    }
  } catch (error) {
    if (error instanceof AlreadyRunningError) {
      deps.error(error.message);
      deps.error(`Lock file: ${error.lockPath}`);
      return ExitCode.AlreadyRunning;
    }
    if (error instanceof ConfigError || error instanceof MissingDependencyError) {
      deps.error(error.message);
      return ExitCode.Error;
    }
    deps.error(`Error: ${errorMessage(error)}`);
    return ExitCode.Error;
  }
}
