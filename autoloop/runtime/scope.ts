/**
 * Loop Scope: everything a loop run holds between start and exit.
 *
 * Opens the log directory, takes the lock, creates the session and installs
 * the signal guard, then runs the loop body. Whatever way the body ends
 * (return, throw or signal) the session is finalized, "Session ended" is
 * logged and the lock is released, exactly once.
 */

import { mkdir } from 'fs/promises';
import type { AgentRunner, LogFormat, LoopMode, TerminalStatus } from '../types/index.js';
import { errorMessage } from './errors.js';
import { acquireLock, type LockHandle } from './lock.js';
import { SessionLogger } from './logger.js';
import { SessionStore } from './session.js';
import { installSignalGuard, type SignalGuard, type SignalSource, type TerminationSignal } from './signals.js';
import { createSessionId, resolveSessionPaths, type SessionPaths } from './state-paths.js';

export interface ScopeDeps {
  agent: AgentRunner;
  now?: () => number;
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
  signals?: SignalSource;
  exit?: (code: number) => void;
  /** Console sink for log lines (default: console.log) */
  write?: (line: string) => void;
  color?: boolean;
}

export interface ScopeSettings {
  mode: LoopMode;
  logDir: string;
  logFormat: LogFormat;
  /** Recorded as the session's prompt field */
  prompt: string;
  workingDir: string;
}

export interface LoopScope {
  paths: SessionPaths;
  logger: SessionLogger;
  store: SessionStore;
  now: () => number;
  /** The termination signal received, if any */
  readonly interrupted: TerminationSignal | null;
}

export async function withLoopScope<T>(
  settings: ScopeSettings,
  deps: ScopeDeps,
  body: (scope: LoopScope) => Promise<T>,
): Promise<T> {
  const now = deps.now ?? Date.now;
  const pid = deps.pid ?? process.pid;

  await mkdir(settings.logDir, { recursive: true });

  const sessionId = createSessionId(new Date(now()), pid);
  const paths = resolveSessionPaths(settings.logDir, sessionId);

  let store: SessionStore | undefined;
  const logger = new SessionLogger({
    format: settings.logFormat,
    context: () => ({ session: sessionId, iteration: store?.session.iteration ?? 0 }),
    write: deps.write,
    now: () => new Date(now()),
    color: deps.color,
  });

  const lock: LockHandle = await acquireLock(paths.lockFile, {
    pid,
    isProcessAlive: deps.isProcessAlive,
    onStale: stalePid => logger.warn('Stale lock file found, removing', { stale_pid: stalePid }),
  });

  try {
    store = await SessionStore.create({
      id: sessionId,
      mode: settings.mode,
      prompt: settings.prompt,
      workingDir: settings.workingDir,
      stateFile: paths.stateFile,
      now,
    });
  } catch (error) {
    await lock.release();
    throw error;
  }
  logger.setLogFile(paths.sessionLog);

  const session = store;
  let closing: Promise<void> | undefined;
  const close = (status: TerminalStatus): Promise<void> => {
    if (closing) return closing;
    closing = (async () => {
      try {
        await session.finalize(status);
        const { iteration, startedAt } = session.session;
        await logger.info('Session ended', {
          total_iterations: iteration,
          elapsed_seconds: Math.floor((now() - startedAt) / 1000),
          final_status: session.session.status,
        });
      } finally {
        await lock.release();
      }
    })();
    return closing;
  };

  const guard: SignalGuard = installSignalGuard(
    async signal => {
      deps.agent.terminate?.();
      await logger.warn(`Received ${signal}, shutting down`);
      await close('interrupted');
    },
    { source: deps.signals, exit: deps.exit },
  );

  const scope: LoopScope = {
    paths,
    logger,
    store: session,
    now,
    get interrupted() {
      return guard.interrupted;
    },
  };

  try {
    return await body(scope);
  } catch (error) {
    await logger.error(`Loop failed: ${errorMessage(error)}`);
    throw error;
  } finally {
    // Leave the listeners in place while a signal-driven shutdown is running
    if (guard.interrupted === null) guard.dispose();
    await close('interrupted');
  }
}
