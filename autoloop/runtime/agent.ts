/**
 * Agent Runner: runs the external coding agent as a child process.
 *
 * The prompt is always the last argument. stdout and stderr are merged into
 * one transcript and echoed as they arrive. The call resolves when the child
 * closes; it never rejects, so a spawn failure is just another non-zero exit.
 */

import { spawn, type ChildProcess } from 'child_process';
import { access } from 'fs/promises';
import { constants as fsConstants } from 'fs';
import { constants as osConstants } from 'os';
import { delimiter, isAbsolute, join, resolve } from 'path';
import type { AgentConfig, AgentInvocation, AgentResult, AgentRunner } from '../types/index.js';
import { errorMessage } from './errors.js';

export const DEFAULT_AGENT: AgentConfig = {
  command: 'claude',
  args: ['--dangerously-skip-permissions', '-p'],
};

/** Exit code reported when the command could not be started */
export const SPAWN_FAILURE_EXIT_CODE = 127;

export interface ProcessAgentOptions {
  /** Receives output chunks as they arrive (default: process.stdout) */
  echo?: (chunk: string) => void;
  env?: NodeJS.ProcessEnv;
}

function signalExitCode(signal: NodeJS.Signals): number {
  const signo: unknown = Reflect.get(osConstants.signals, signal);
  return typeof signo === 'number' ? 128 + signo : 1;
}

export class ProcessAgentRunner implements AgentRunner {
  private readonly config: AgentConfig;
  private readonly echo: (chunk: string) => void;
  private readonly env: NodeJS.ProcessEnv;
  private child: ChildProcess | null = null;

  constructor(config: AgentConfig = DEFAULT_AGENT, options: ProcessAgentOptions = {}) {
    this.config = config;
    this.echo = options.echo ?? ((chunk: string) => { process.stdout.write(chunk); });
    this.env = options.env ?? process.env;
  }

  run(invocation: AgentInvocation): Promise<AgentResult> {
    return new Promise(resolvePromise => {
      const chunks: string[] = [];
      let settled = false;

      const finish = (exitCode: number) => {
        if (settled) return;
        settled = true;
        this.child = null;
        resolvePromise({ output: chunks.join(''), exitCode });
      };

      const child = spawn(this.config.command, [...this.config.args, invocation.prompt], {
        cwd: invocation.workingDir,
        env: this.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      this.child = child;

      const collect = (chunk: Buffer) => {
        const text = chunk.toString();
        chunks.push(text);
        this.echo(text);
      };
      child.stdout?.on('data', collect);
      child.stderr?.on('data', collect);

      child.on('error', error => {
        chunks.push(`Failed to start ${this.config.command}: ${errorMessage(error)}\n`);
        finish(SPAWN_FAILURE_EXIT_CODE);
      });

      child.on('close', (code, signal) => {
        if (code !== null) finish(code);
        else if (signal !== null) finish(signalExitCode(signal));
        else finish(1);
      });
    });
  }

  terminate(): void {
    if (this.child && this.child.exitCode === null) {
      this.child.kill('SIGTERM');
    }
  }
}

// =============================================================================
// DEPENDENCY CHECKS
// =============================================================================

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate a command the way a shell would. Commands containing a path
 * separator are checked as given; bare names are looked up on PATH.
 */
export async function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Promise<string | null> {
  if (command === '') return null;

  if (command.includes('/')) {
    const path = isAbsolute(command) ? command : resolve(cwd, command);
    return (await isExecutable(path)) ? path : null;
  }

  const dirs = (env.PATH ?? '').split(delimiter).filter(dir => dir !== '');
  for (const dir of dirs) {
    const candidate = join(dir, command);
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

/**
 * Returns the commands that could not be found.
 */
export async function checkDependencies(
  commands: string[],
  find: (command: string) => Promise<string | null> = command => findExecutable(command),
): Promise<string[]> {
  const missing: string[] = [];
  for (const command of commands) {
    if ((await find(command)) === null) missing.push(command);
  }
  return missing;
}
