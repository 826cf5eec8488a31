/**
 * Status & Health: read-only inspection of log directories, locks and
 * the TODO checklist. Nothing here writes or removes a file.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type { ChecklistCounts, LoopMode, StateRecord } from '../types/index.js';
import { parseChecklist, summarizeChecklist } from '../skills/checklist/index.js';
import { errnoCode, errorMessage } from './errors.js';
import { isProcessAlive, readLockPid } from './lock.js';
import { readStateFile } from './session.js';
import { LOCK_FILE_NAME, sessionIdFromStateFile } from './state-paths.js';

// =============================================================================
// TYPES
// =============================================================================

export type LockStatus =
  | { state: 'none' }
  | { state: 'live'; pid: number }
  | { state: 'stale'; pid: number | null };

export interface LatestSession {
  file: string;
  record: StateRecord;
}

export type CheckLevel = 'ok' | 'info' | 'warn' | 'error';

export interface HealthCheck {
  section: string;
  level: CheckLevel;
  message: string;
}

export interface HealthReport {
  checks: HealthCheck[];
  errors: number;
  warnings: number;
}

export interface HealthOptions {
  agentCommand: string;
  logDirs: Record<LoopMode, string>;
  todoFile: string;
  find: (command: string) => Promise<string | null>;
  isProcessAlive?: (pid: number) => boolean;
}

// =============================================================================
// STATUS
// =============================================================================

async function listDir(dir: string): Promise<string[] | null> {
  try {
    return await readdir(dir);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Find the most recent state file in a log directory. Session ids start
 * with the start timestamp, so the greatest id is the latest session.
 */
export async function readLatestState(logDir: string): Promise<LatestSession | null> {
  const entries = await listDir(logDir);
  if (!entries) return null;

  const latest = entries
    .filter(name => sessionIdFromStateFile(name) !== null)
    .sort()
    .pop();
  if (!latest) return null;

  const file = join(logDir, latest);
  return { file, record: await readStateFile(file) };
}

export async function readLockStatus(
  logDir: string,
  alive: (pid: number) => boolean = isProcessAlive,
): Promise<LockStatus> {
  const lockPath = join(logDir, LOCK_FILE_NAME);
  try {
    await readFile(lockPath);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return { state: 'none' };
    throw error;
  }

  const pid = await readLockPid(lockPath);
  if (pid !== null && alive(pid)) return { state: 'live', pid };
  return { state: 'stale', pid };
}

export function formatStatus(latest: LatestSession, lock: LockStatus): string[] {
  const r = latest.record;
  const lines = [
    `Session:          ${r.session_id}`,
    `Status:           ${r.status}`,
    `Iteration:        ${r.iteration}`,
    `Completion count: ${r.completion_count}`,
    `Total cost:       $${r.total_cost.toFixed(4)}`,
    `Started:          ${r.started_at}`,
    `Last update:      ${r.last_update}`,
    `Working dir:      ${r.working_dir}`,
  ];

  if (r.mode === 'todo') {
    lines.push(`TODO file:        ${r.todo_file ?? r.prompt}`);
    lines.push(
      `Items:            ${r.pending ?? 0} pending, ${r.in_progress ?? 0} in progress, ` +
      `${r.completed ?? 0} completed, ${r.blocked ?? 0} blocked`,
    );
  }

  lines.push(`Lock:             ${describeLock(lock)}`);
  return lines;
}

function describeLock(lock: LockStatus): string {
  switch (lock.state) {
    case 'none':
      return 'none';
    case 'live':
      return `held by running process PID ${lock.pid}`;
    case 'stale':
      return lock.pid === null ? 'stale (unreadable)' : `stale (PID ${lock.pid} not running)`;
  }
}

// =============================================================================
// HEALTH
// =============================================================================

/**
 * Run every health check. Errors mean a loop cannot start; warnings are
 * worth a look.
 */
export async function runHealthChecks(options: HealthOptions): Promise<HealthReport> {
  const checks: HealthCheck[] = [];
  const add = (section: string, level: CheckLevel, message: string) => {
    checks.push({ section, level, message });
  };
  const alive = options.isProcessAlive ?? isProcessAlive;

  // Dependencies
  const agentPath = await options.find(options.agentCommand);
  if (agentPath) add('Dependencies', 'ok', `${options.agentCommand}: ${agentPath}`);
  else add('Dependencies', 'error', `${options.agentCommand} not found on PATH (required)`);

  const gitPath = await options.find('git');
  if (gitPath) add('Dependencies', 'ok', `git: ${gitPath}`);
  else add('Dependencies', 'warn', 'git not found (recommended for version control)');

  // State files
  for (const mode of ['signal', 'todo'] as const) {
    const dir = options.logDirs[mode];
    let entries: string[] | null;
    try {
      entries = await listDir(dir);
    } catch (error) {
      add('State Files', 'error', `${dir}: cannot read (${errorMessage(error)})`);
      continue;
    }
    if (!entries) {
      add('State Files', 'info', `${dir}: not created yet`);
      continue;
    }

    const lock = await readLockStatus(dir, alive);
    if (lock.state === 'none') add('State Files', 'ok', `${dir}: ${entries.length} files, no lock`);
    else if (lock.state === 'live') add('State Files', 'info', `${dir}: lock held by running process PID ${lock.pid}`);
    else add('State Files', 'warn', `${dir}: stale lock file (owner not running)`);

    try {
      const latest = await readLatestState(dir);
      if (latest) {
        add('State Files', 'info', `Latest session ${latest.record.session_id}: ${latest.record.status}`);
      }
    } catch (error) {
      add('State Files', 'error', `Latest state file is unreadable: ${errorMessage(error)}`);
    }
  }

  // TODO checklist
  let content: string | null = null;
  try {
    content = await readFile(options.todoFile, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') add('TODO', 'info', `${options.todoFile} not found (optional)`);
    else add('TODO', 'error', `${options.todoFile}: cannot read (${errorMessage(error)})`);
  }

  if (content !== null) {
    const counts: ChecklistCounts = summarizeChecklist(parseChecklist(content, options.todoFile).items);
    add('TODO', 'ok', `${options.todoFile} exists`);
    add(
      'TODO',
      'info',
      `Pending: ${counts.pending}, In-progress: ${counts.inProgress}, Completed: ${counts.completed}, Blocked: ${counts.blocked}`,
    );
    if (counts.inProgress > 1) add('TODO', 'warn', 'Multiple tasks marked as in-progress');
  }

  return {
    checks,
    errors: checks.filter(c => c.level === 'error').length,
    warnings: checks.filter(c => c.level === 'warn').length,
  };
}

const LEVEL_LABELS: Record<CheckLevel, string> = {
  ok: '[OK]',
  info: '[INFO]',
  warn: '[WARN]',
  error: '[ERROR]',
};

export function formatHealthReport(report: HealthReport): string[] {
  const lines: string[] = [];
  let section = '';

  for (const check of report.checks) {
    if (check.section !== section) {
      section = check.section;
      lines.push('', `=== ${section} ===`);
    }
    lines.push(`  ${LEVEL_LABELS[check.level]} ${check.message}`);
  }

  lines.push('', '=== Summary ===');
  if (report.errors === 0 && report.warnings === 0) {
    lines.push('All checks passed!');
  } else if (report.errors === 0) {
    lines.push(`Checks completed with ${report.warnings} warning(s)`);
  } else {
    lines.push(`Checks completed with ${report.errors} error(s) and ${report.warnings} warning(s)`);
  }
  return lines;
}
