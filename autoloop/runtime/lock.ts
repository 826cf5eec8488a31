/**
 * Lock Manager: one live loop per log directory.
 *
 * The lock is a file holding the owner's pid. A lock whose pid no longer
 * names a live process is stale and gets replaced. The pid is written to a
 * private temp file first, then hard-linked into place: the link either
 * fails with EEXIST or publishes a complete file, so a lock on disk always
 * holds a pid and two racing starters cannot both win.
 */

import { randomUUID } from 'crypto';
import { link, readFile, writeFile, rm } from 'fs/promises';
import { AlreadyRunningError, errnoCode } from './errors.js';

export interface LockHandle {
  path: string;
  pid: number;
  /** Remove the lock file. Safe to call more than once. */
  release(): Promise<void>;
}

export interface AcquireLockOptions {
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
  /** Called with the stale owner's pid (null if the file was unreadable) */
  onStale?: (pid: number | null) => void | Promise<void>;
}

const MAX_ACQUIRE_ATTEMPTS = 3;

/**
 * Signal 0 probes a pid without delivering anything. ESRCH means gone;
 * EPERM means it exists under another user.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoCode(error) === 'EPERM';
  }
}

/**
 * Read the pid recorded in a lock file. Returns null when the file is
 * missing or does not hold a positive integer.
 */
export async function readLockPid(lockPath: string): Promise<number | null> {
  let content: string;
  try {
    content = await readFile(lockPath, 'utf-8');
  } catch {
    return null;
  }

  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const pid = Number(trimmed);
  return pid > 0 ? pid : null;
}

async function lockFileExists(lockPath: string): Promise<boolean> {
  try {
    await readFile(lockPath);
    return true;
  } catch {
    return false;
  }
}

export async function acquireLock(
  lockPath: string,
  options: AcquireLockOptions = {},
): Promise<LockHandle> {
  const pid = options.pid ?? process.pid;
  const alive = options.isProcessAlive ?? isProcessAlive;

  for (let attempt = 1; attempt <= MAX_ACQUIRE_ATTEMPTS; attempt++) {
    if (await lockFileExists(lockPath)) {
      const owner = await readLockPid(lockPath);
      if (owner !== null && alive(owner)) {
        throw new AlreadyRunningError(owner, lockPath);
      }
      await options.onStale?.(owner);
      await rm(lockPath, { force: true });
    }

    // Someone else may have linked theirs between our check and ours; re-check
    if (await publishLock(lockPath, pid)) return createHandle(lockPath, pid);
  }

  const owner = await readLockPid(lockPath);
  throw new AlreadyRunningError(owner ?? 0, lockPath);
}

/**
 * Link a fully written pid file into place. Returns false when a lock
 * already exists.
 */
async function publishLock(lockPath: string, pid: number): Promise<boolean> {
  const tempPath = `${lockPath}.${pid}.${randomUUID()}.tmp`;
  await writeFile(tempPath, `${pid}\n`, 'utf-8');
  try {
    await link(tempPath, lockPath);
    return true;
  } catch (error) {
    if (errnoCode(error) === 'EEXIST') return false;
    throw error;
  } finally {
    await rm(tempPath, { force: true });
  }
}

function createHandle(lockPath: string, pid: number): LockHandle {
  return {
    path: lockPath,
    pid,
    release: async () => {
      await rm(lockPath, { force: true });
    },
  };
}
