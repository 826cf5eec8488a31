/**
 * Todo Loop: works through a Markdown checklist, one item per iteration.
 *
 * The checklist is re-read every pass; the agent edits it as it goes.
 * The loop stops when no unfinished items remain, when the agent prints
 * ALL_TODOS_COMPLETE, when only blocked items are left, or at the
 * iteration cap.
 */

import { readFile } from 'fs/promises';
import type {
  ChecklistCounts,
  ChecklistItem,
  LoopHooks,
  LoopResult,
  TerminalStatus,
  TodoLoopConfig,
} from '../types/index.js';
import { parseChecklistFile, remainingItems, selectNextItem, summarizeChecklist } from '../skills/checklist/index.js';
import { containsSignal } from './completion.js';
import { ConfigError, errnoCode, errorMessage } from './errors.js';
import { defaultSleep, invokeAgent, invokeHook, saveOutput } from './iteration.js';
import { buildTodoPrompt } from './prompt.js';
import { withLoopScope, type LoopScope, type ScopeDeps } from './scope.js';
import { createSessionId } from './state-paths.js';

export const TODO_COMPLETION_SIGNAL = 'ALL_TODOS_COMPLETE';

export interface TodoLoopDeps extends ScopeDeps {
  sleep?: (ms: number) => Promise<void>;
  hooks?: LoopHooks;
}

async function readChecklist(todoFile: string): Promise<ChecklistItem[]> {
  const parsed = await parseChecklistFile(todoFile, path => readFile(path, 'utf-8'));
  return parsed.items;
}

/**
 * Read the checklist before anything is locked or written. A missing file
 * or one without checklist items is a configuration error.
 */
export async function loadInitialChecklist(todoFile: string): Promise<ChecklistItem[]> {
  let items: ChecklistItem[];
  try {
    items = await readChecklist(todoFile);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') throw new ConfigError([`TODO file not found: ${todoFile}`]);
    throw error;
  }

  if (items.length === 0) {
    throw new ConfigError([
      `No valid TODO items found in ${todoFile}. Expected format: '- [ ] Task description' or '- [x] Completed task'`,
    ]);
  }
  return items;
}

export async function runTodoLoop(config: TodoLoopConfig, deps: TodoLoopDeps): Promise<LoopResult> {
  const initial = await loadInitialChecklist(config.todoFile);
  if (config.dryRun) return dryRun(config, deps, initial);

  return withLoopScope(
    {
      mode: 'todo',
      logDir: config.logDir,
      logFormat: config.logFormat,
      prompt: config.todoFile,
      workingDir: config.workingDir,
    },
    deps,
    scope => iterate(config, deps, scope, summarizeChecklist(initial)),
  );
}

async function iterate(
  config: TodoLoopConfig,
  deps: TodoLoopDeps,
  scope: LoopScope,
  initialCounts: ChecklistCounts,
): Promise<LoopResult> {
  const { logger, store, paths } = scope;
  const sleep = deps.sleep ?? defaultSleep;

  await logger.info('Starting TODO-driven loop', {
    todo_file: config.todoFile,
    pending: initialCounts.pending,
    in_progress: initialCounts.inProgress,
    completed: initialCounts.completed,
    max_iterations: config.maxIterations,
  });
  await store.setChecklistCounts(initialCounts);

  let counts = initialCounts;
  let outcome: TerminalStatus = 'interrupted';

  while (scope.interrupted === null) {
    if (store.session.iteration >= config.maxIterations) {
      counts = await recount(config.todoFile, counts, scope);
      if (remainingItems(counts) === 0) {
        await logger.success('All TODOs complete!', { total_iterations: store.session.iteration });
        outcome = 'completed';
        break;
      }
      await logger.warn('Max iterations reached', { remaining_tasks: remainingItems(counts) });
      outcome = 'limit_reached';
      break;
    }

    const iteration = store.session.iteration + 1;
    await store.update({ iteration });

    const items = await readChecklist(config.todoFile);
    counts = summarizeChecklist(items);
    await store.setChecklistCounts(counts);

    if (remainingItems(counts) === 0) {
      await logger.success('All TODOs complete!', { total_iterations: iteration });
      outcome = 'completed';
      break;
    }

    const item = selectNextItem(items);
    if (!item) {
      await logger.warn('No actionable tasks found (all remaining items are blocked)', {
        blocked: counts.blocked,
      });
      outcome = 'no_actionable_tasks';
      break;
    }

    await logger.info('=== Starting iteration ===', { pending: counts.pending, in_progress: counts.inProgress });
    await logger.info('Processing task', { task: item.text, line: item.line });

    const prompt = buildTodoPrompt(config.todoFile, item, TODO_COMPLETION_SIGNAL);
    await invokeHook(deps.hooks, 'onIterationStart', h => h.onIterationStart?.(iteration, prompt), logger);

    const result = await invokeAgent(deps.agent, { prompt, workingDir: config.workingDir }, logger);
    if (scope.interrupted !== null) break;

    await saveOutput(paths.outputFile(iteration), result.output, logger);

    const signalFound = containsSignal(result.output, TODO_COMPLETION_SIGNAL);
    await invokeHook(deps.hooks, 'onIterationEnd', h => h.onIterationEnd?.({
      iteration,
      prompt,
      output: result.output,
      exitCode: result.exitCode,
      costDelta: 0,
      signalFound,
    }), logger);

    if (signalFound) {
      counts = await recount(config.todoFile, counts, scope);
      await logger.success('All TODOs marked complete!', { total_iterations: iteration });
      outcome = 'completed';
      break;
    }

    if (result.exitCode !== 0) {
      await logger.warn('Agent exited with error', { exit_code: result.exitCode });
    }

    if (scope.interrupted !== null) break;
    await sleep(config.iterationDelayMs);
  }

  await store.finalize(outcome);

  const session = store.session;
  const loopResult: LoopResult = {
    outcome,
    sessionId: session.id,
    iterations: session.iteration,
    totalCost: session.totalCost,
    completionCount: session.completionCount,
    limitReasons: outcome === 'limit_reached' ? ['max_iterations'] : [],
    remaining: remainingItems(counts),
    stateFile: paths.stateFile,
    sessionLog: paths.sessionLog,
  };

  await invokeHook(deps.hooks, 'onFinish', h => h.onFinish?.(loopResult), logger);
  return loopResult;
}

/**
 * Re-read the checklist for final counts. Keeps the last known counts if
 * the file can no longer be read.
 */
async function recount(todoFile: string, previous: ChecklistCounts, scope: LoopScope): Promise<ChecklistCounts> {
  try {
    const counts = summarizeChecklist(await readChecklist(todoFile));
    await scope.store.setChecklistCounts(counts);
    return counts;
  } catch (error) {
    await scope.logger.warn(`Could not re-read TODO file: ${errorMessage(error)}`);
    return previous;
  }
}

function dryRun(config: TodoLoopConfig, deps: TodoLoopDeps, items: ChecklistItem[]): LoopResult {
  const write = deps.write ?? ((line: string) => console.log(line));
  const now = deps.now ?? Date.now;
  const counts = summarizeChecklist(items);
  const next = selectNextItem(items);

  write(`[DRY RUN] TODO file: ${config.todoFile}`);
  write(`  Pending: ${counts.pending}, in progress: ${counts.inProgress}, completed: ${counts.completed}, blocked: ${counts.blocked}`);
  write(`  Max iterations: ${config.maxIterations}`);
  write(next ? `Next task: ${next.raw}` : 'No actionable tasks');

  return {
    outcome: 'dry_run',
    sessionId: createSessionId(new Date(now()), deps.pid ?? process.pid),
    iterations: 0,
    totalCost: 0,
    completionCount: 0,
    limitReasons: [],
    remaining: remainingItems(counts),
  };
}
