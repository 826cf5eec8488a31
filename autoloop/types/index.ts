/**
 * autoloop Type Definitions
 *
 * Central type definitions for the loop runners, the session store
 * and the checklist parser.
 */

// =============================================================================
// SESSION TYPES
// =============================================================================

export type LoopMode = 'signal' | 'todo';

export type SessionStatus =
  | 'running'
  | 'completed'
  | 'interrupted'
  | 'limit_reached'
  | 'no_actionable_tasks';

export type TerminalStatus = Exclude<SessionStatus, 'running'>;

export interface ChecklistCounts {
  pending: number;
  inProgress: number;
  completed: number;
  blocked: number;
}

/**
 * In-memory session. Mutated only through SessionStore so every change
 * reaches the state file.
 */
export interface Session {
  id: string;
  mode: LoopMode;
  status: SessionStatus;
  iteration: number;
  completionCount: number;
  totalCost: number;
  /** Task text (signal mode) or checklist path (todo mode) */
  prompt: string;
  workingDir: string;
  /** Epoch milliseconds */
  startedAt: number;
  lastUpdate: number;
  checklist?: ChecklistCounts;
}

/**
 * On-disk state record. Field names are part of the file format read by
 * external status tools; keep them stable.
 */
export interface StateRecord {
  session_id: string;
  status: SessionStatus;
  iteration: number;
  completion_count: number;
  prompt: string;
  working_dir: string;
  started_at: string;
  last_update: string;
  total_cost: number;
  mode?: LoopMode;
  todo_file?: string;
  pending?: number;
  in_progress?: number;
  completed?: number;
  blocked?: number;
}

// =============================================================================
// LOG TYPES
// =============================================================================

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'SUCCESS';

export type LogFormat = 'json' | 'text';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  session: string;
  iteration: number;
  [field: string]: unknown;
}

export type LogFields = Record<string, string | number | boolean | null | undefined>;

// =============================================================================
// CONFIG TYPES
// =============================================================================

export interface AgentConfig {
  /** Executable name or path, looked up on PATH */
  command: string;
  /** Arguments placed before the prompt, which is always the last argument */
  args: string[];
}

interface SharedLoopConfig {
  maxIterations: number;
  workingDir: string;
  logDir: string;
  logFormat: LogFormat;
  iterationDelayMs: number;
  dryRun: boolean;
  agent: AgentConfig;
}

export interface LoopConfig extends SharedLoopConfig {
  prompt: string;
  completionSignal: string;
  completionThreshold: number;
  maxCost?: number;
  /** Duration expression such as "2h30m" */
  maxDuration?: string;
}

export interface TodoLoopConfig extends SharedLoopConfig {
  todoFile: string;
}

// =============================================================================
// LIMIT TYPES
// =============================================================================

export interface Limits {
  maxIterations: number;
  maxDurationMs?: number;
  maxCost?: number;
}

export type LimitReason = 'max_iterations' | 'max_duration' | 'max_cost';

export interface LimitViolation {
  reason: LimitReason;
  message: string;
}

// =============================================================================
// AGENT TYPES
// =============================================================================

export interface AgentInvocation {
  prompt: string;
  workingDir: string;
}

export interface AgentResult {
  output: string;
  exitCode: number;
}

/**
 * The external task-execution agent. Opaque: the loop sees text and an
 * exit code, nothing else.
 */
export interface AgentRunner {
  run(invocation: AgentInvocation): Promise<AgentResult>;
  /** Stop an in-flight invocation, if the runner owns a child process */
  terminate?(): void;
}

// =============================================================================
// LOOP TYPES
// =============================================================================

export interface IterationRecord {
  iteration: number;
  prompt: string;
  output: string;
  exitCode: number;
  costDelta: number;
  signalFound: boolean;
}

export type LoopOutcome =
  | 'completed'
  | 'limit_reached'
  | 'interrupted'
  | 'no_actionable_tasks'
  | 'dry_run';

export interface LoopResult {
  outcome: LoopOutcome;
  sessionId: string;
  iterations: number;
  totalCost: number;
  completionCount: number;
  limitReasons: LimitReason[];
  /**
   * Work left when the loop stopped: remaining checklist items in todo
   * mode, completion signals still needed in signal mode.
   */
  remaining: number;
  stateFile?: string;
  sessionLog?: string;
}

export interface LoopHooks {
  onIterationStart?(iteration: number, prompt: string): void;
  onIterationEnd?(record: IterationRecord): void;
  onFinish?(result: LoopResult): void;
}

export const ExitCode = {
  Success: 0,
  Error: 1,
  LimitReached: 2,
  AlreadyRunning: 3,
  NoActionableTasks: 4,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

// =============================================================================
// CHECKLIST TYPES
// =============================================================================

export type ChecklistStatus = 'pending' | 'in_progress' | 'done';

export interface ChecklistItem {
  /** Item text without the list bullet and status marker */
  text: string;
  /** The item's first source line, trimmed */
  raw: string;
  status: ChecklistStatus;
  highPriority: boolean;
  blocked: boolean;
  blockedReason?: string;
  line: number;
  depth: number;
}
