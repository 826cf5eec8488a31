/**
 * autoloop runtime
 *
 * Programmatic entry point. The CLI lives in ./cli.ts.
 */

export { runLoop, type LoopDeps } from './loop.js';
export { runTodoLoop, loadInitialChecklist, TODO_COMPLETION_SIGNAL, type TodoLoopDeps } from './todo-loop.js';
export { ProcessAgentRunner, DEFAULT_AGENT, findExecutable, checkDependencies } from './agent.js';
export { checkCompletion, containsSignal, DEFAULT_COMPLETION_SIGNAL, DEFAULT_COMPLETION_THRESHOLD } from './completion.js';
export { parseCost } from './cost.js';
export { buildLimits, evaluateLimits, shouldContinue, parseDuration } from './limits.js';
export { acquireLock, isProcessAlive, type LockHandle } from './lock.js';
export { SessionLogger } from './logger.js';
export { SessionStore, readStateFile, parseStateRecord } from './session.js';
export { installSignalGuard, SIGNAL_EXIT_CODES, type TerminationSignal } from './signals.js';
export { resolveLoopConfig, resolveTodoConfig } from './config.js';
export { runHealthChecks, readLatestState } from './health.js';
export { dispatch, parseArgs, exitCodeFor, type CliDeps } from './cli.js';
export { AlreadyRunningError, ConfigError, MissingDependencyError } from './errors.js';
