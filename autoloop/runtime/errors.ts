/**
 * Errors raised before a loop starts. Anything thrown from here aborts
 * the run before a state file exists.
 */

export class AlreadyRunningError extends Error {
  readonly pid: number;
  readonly lockPath: string;

  constructor(pid: number, lockPath: string) {
    super(`Another instance is running (PID: ${pid})`);
    this.name = 'AlreadyRunningError';
    this.pid = pid;
    this.lockPath = lockPath;
  }
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(errors.length === 1 ? errors[0] : `Invalid configuration:\n  - ${errors.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export class MissingDependencyError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required dependencies: ${missing.join(', ')}`);
    this.name = 'MissingDependencyError';
    this.missing = missing;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * The errno code of a Node system error ("ENOENT", "EEXIST", ...), if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
