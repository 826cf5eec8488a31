import { join, resolve } from 'path';
import { homedir } from 'os';
import type { LoopMode } from '../types/index.js';

export interface SessionPaths {
  logDir: string;
  stateFile: string;
  sessionLog: string;
  lockFile: string;
  outputFile(iteration: number): string;
}

/** One lock per log directory, whichever mode holds it */
export const LOCK_FILE_NAME = '.autoloop.lock';

const DEFAULT_LOG_DIRS: Record<LoopMode, string> = {
  signal: '.autoloop/loop-logs',
  todo: '.autoloop/todo-logs',
};

const STATE_FILE_PATTERN = /^state_(.+)\.json$/;

export function defaultLogDir(mode: LoopMode, home: string = homedir()): string {
  return join(home, DEFAULT_LOG_DIRS[mode]);
}

/**
 * Session ids sort chronologically: local YYYYMMDD_HHMMSS then the pid.
 */
export function createSessionId(date: Date, pid: number): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}_${pid}`;
}

export function resolveSessionPaths(logDir: string, sessionId: string): SessionPaths {
  const base = resolve(logDir);
  return {
    logDir: base,
    stateFile: join(base, `state_${sessionId}.json`),
    sessionLog: join(base, `session_${sessionId}.jsonl`),
    lockFile: join(base, LOCK_FILE_NAME),
    outputFile: (iteration: number) => join(base, `output_${sessionId}_iter${iteration}.txt`),
  };
}

/**
 * Extract the session id from a state file name, or null if the name is
 * not a state file.
 */
export function sessionIdFromStateFile(fileName: string): string | null {
  const match = STATE_FILE_PATTERN.exec(fileName);
  return match ? match[1] : null;
}
