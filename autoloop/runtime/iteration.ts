/**
 * Steps shared by both loop controllers. None of them throw: failures are
 * logged and the loop carries on.
 */

import { writeFile } from 'fs/promises';
import type { AgentInvocation, AgentResult, AgentRunner, LoopHooks } from '../types/index.js';
import { errorMessage } from './errors.js';
import type { SessionLogger } from './logger.js';

export const DEFAULT_ITERATION_DELAY_MS = 2000;

export function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Safely invoke a loop hook. Hook errors are logged but never crash the loop.
 */
export async function invokeHook(
  hooks: LoopHooks | undefined,
  name: keyof LoopHooks,
  call: (hooks: LoopHooks) => void,
  logger: SessionLogger,
): Promise<void> {
  if (!hooks || typeof hooks[name] !== 'function') return;
  try {
    call(hooks);
  } catch (error) {
    await logger.warn(`Hook ${name} failed: ${errorMessage(error)}`);
  }
}

/**
 * Run the agent once. A runner that throws is treated like a failed run
 * with no output.
 */
export async function invokeAgent(
  agent: AgentRunner,
  invocation: AgentInvocation,
  logger: SessionLogger,
): Promise<AgentResult> {
  await logger.info('Running agent...');
  let result: AgentResult;
  try {
    result = await agent.run(invocation);
  } catch (error) {
    await logger.error(`Agent invocation failed: ${errorMessage(error)}`);
    result = { output: '', exitCode: 1 };
  }
  await logger.info('Agent execution complete', {
    exit_code: result.exitCode,
    output_size: result.output.length,
  });
  return result;
}

export async function saveOutput(path: string, output: string, logger: SessionLogger): Promise<void> {
  try {
    await writeFile(path, output, 'utf-8');
  } catch (error) {
    await logger.warn(`Could not save agent output: ${errorMessage(error)}`, { path });
  }
}
