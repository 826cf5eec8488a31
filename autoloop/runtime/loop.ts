/**
 * Signal Loop: runs one task through the agent until it reports
 * completion a threshold number of times in a row, or a budget runs out.
 *
 * Loop:
 *   1. Check limits (iterations, duration, cost)
 *   2. Build the prompt (task + instructions, or a continuation)
 *   3. Run the agent and keep its output
 *   4. Add any reported cost
 *   5. On a clean exit, update the completion streak
 *   6. Persist, pause, repeat
 */

import type {
  AgentRunner,
  LimitReason,
  LoopConfig,
  LoopHooks,
  LoopResult,
  TerminalStatus,
} from '../types/index.js';
import { checkCompletion } from './completion.js';
import { parseCost } from './cost.js';
import { defaultSleep, invokeAgent, invokeHook, saveOutput } from './iteration.js';
import { buildLimits, evaluateLimits } from './limits.js';
import { buildSignalPrompt } from './prompt.js';
import { withLoopScope, type LoopScope, type ScopeDeps } from './scope.js';
import { createSessionId } from './state-paths.js';

export interface LoopDeps extends ScopeDeps {
  agent: AgentRunner;
  sleep?: (ms: number) => Promise<void>;
  hooks?: LoopHooks;
}

/**
 * Run the signal-mode loop. Throws AlreadyRunningError before anything is
 * written when another live instance holds the lock.
 */
export async function runLoop(config: LoopConfig, deps: LoopDeps): Promise<LoopResult> {
  if (config.dryRun) return dryRun(config, deps);

  return withLoopScope(
    {
      mode: 'signal',
      logDir: config.logDir,
      logFormat: config.logFormat,
      prompt: config.prompt,
      workingDir: config.workingDir,
    },
    deps,
    scope => iterate(config, deps, scope),
  );
}

async function iterate(config: LoopConfig, deps: LoopDeps, scope: LoopScope): Promise<LoopResult> {
  const { logger, store, paths, now } = scope;
  const sleep = deps.sleep ?? defaultSleep;
  const limits = buildLimits(config);
  const limitReasons: LimitReason[] = [];

  await logger.info('Starting signal loop', {
    prompt_length: config.prompt.length,
    completion_signal: config.completionSignal,
    threshold: config.completionThreshold,
    max_iterations: config.maxIterations,
    max_duration: config.maxDuration,
    max_cost: config.maxCost,
    working_dir: config.workingDir,
  });

  let outcome: TerminalStatus = 'interrupted';

  while (scope.interrupted === null) {
    const evaluation = evaluateLimits(store.session, limits, now());
    if (!evaluation.continue) {
      for (const violation of evaluation.violations) {
        limitReasons.push(violation.reason);
        await logger.warn(violation.message, { reason: violation.reason });
      }
      outcome = 'limit_reached';
      break;
    }

    const iteration = store.session.iteration + 1;
    await store.update({ iteration });

    const prompt = buildSignalPrompt({
      prompt: config.prompt,
      completionSignal: config.completionSignal,
      completionThreshold: config.completionThreshold,
      iteration,
    });

    await logger.info('=== Starting iteration ===');
    await invokeHook(deps.hooks, 'onIterationStart', h => h.onIterationStart?.(iteration, prompt), logger);

    const result = await invokeAgent(deps.agent, { prompt, workingDir: config.workingDir }, logger);
    if (scope.interrupted !== null) break;

    await saveOutput(paths.outputFile(iteration), result.output, logger);

    const costDelta = parseCost(result.output) ?? 0;
    if (costDelta > 0) {
      await store.addCost(costDelta);
      await logger.info('Cost update', { iteration_cost: costDelta, total_cost: store.session.totalCost });
    }

    let signalFound = false;
    let detected = false;
    if (result.exitCode === 0) {
      const previous = store.session.completionCount;
      const check = checkCompletion(result.output, config.completionSignal, config.completionThreshold, previous);
      signalFound = check.matched;
      detected = check.detected;
      await store.update({ completionCount: check.count });

      if (check.matched) {
        await logger.success('Completion signal detected', {
          count: check.count,
          threshold: config.completionThreshold,
        });
      } else if (previous > 0) {
        await logger.info('Completion counter reset (signal not found in this iteration)');
      }
    } else {
      await logger.warn('Agent exited with error, will retry...', { exit_code: result.exitCode });
    }

    await invokeHook(deps.hooks, 'onIterationEnd', h => h.onIterationEnd?.({
      iteration,
      prompt,
      output: result.output,
      exitCode: result.exitCode,
      costDelta,
      signalFound,
    }), logger);

    if (detected) {
      await logger.success('Task completed successfully!', {
        total_iterations: iteration,
        total_cost: store.session.totalCost,
      });
      outcome = 'completed';
      break;
    }

    if (scope.interrupted !== null) break;
    await sleep(config.iterationDelayMs);
  }

  if (outcome !== 'completed' && scope.interrupted === null) {
    await logger.warn('Loop ended without completion signal', {
      final_iteration: store.session.iteration,
      completion_count: store.session.completionCount,
    });
  }

  await store.finalize(outcome);

  const session = store.session;
  const loopResult: LoopResult = {
    outcome,
    sessionId: session.id,
    iterations: session.iteration,
    totalCost: session.totalCost,
    completionCount: session.completionCount,
    limitReasons,
    remaining: Math.max(0, config.completionThreshold - session.completionCount),
    stateFile: paths.stateFile,
    sessionLog: paths.sessionLog,
  };

  await invokeHook(deps.hooks, 'onFinish', h => h.onFinish?.(loopResult), logger);
  return loopResult;
}

function dryRun(config: LoopConfig, deps: LoopDeps): LoopResult {
  const write = deps.write ?? ((line: string) => console.log(line));
  const now = deps.now ?? Date.now;

  write('[DRY RUN] Would run the agent with these settings:');
  write(`  Agent: ${[config.agent.command, ...config.agent.args].join(' ')}`);
  write(`  Working directory: ${config.workingDir}`);
  write(`  Log directory: ${config.logDir}`);
  write(`  Completion signal: ${config.completionSignal} (x${config.completionThreshold})`);
  write(`  Max iterations: ${config.maxIterations}`);
  if (config.maxDuration !== undefined) write(`  Max duration: ${config.maxDuration}`);
  if (config.maxCost !== undefined) write(`  Max cost: $${config.maxCost}`);
  write('');
  write('First prompt:');
  write(buildSignalPrompt({
    prompt: config.prompt,
    completionSignal: config.completionSignal,
    completionThreshold: config.completionThreshold,
    iteration: 1,
  }));

  return {
    outcome: 'dry_run',
    sessionId: createSessionId(new Date(now()), deps.pid ?? process.pid),
    iterations: 0,
    totalCost: 0,
    completionCount: 0,
    limitReasons: [],
    remaining: config.completionThreshold,
  };
}
