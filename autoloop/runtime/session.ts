/**
 * Session Store: the single mutable state record of a loop run.
 *
 * Every mutation is written to the state file straight away so an outside
 * observer always sees current progress. Writes go to a temp file that is
 * renamed over the state file, and are queued so they land in call order.
 * Once the status is terminal the record is frozen.
 */

import { readFile, rename, writeFile } from 'fs/promises';
import type {
  ChecklistCounts,
  LoopMode,
  Session,
  SessionStatus,
  StateRecord,
  TerminalStatus,
} from '../types/index.js';

export interface CreateSessionOptions {
  id: string;
  mode: LoopMode;
  prompt: string;
  workingDir: string;
  stateFile: string;
  now?: () => number;
}

export type SessionPatch = Partial<Pick<Session, 'iteration' | 'completionCount' | 'checklist'>>;

const SESSION_STATUSES: readonly SessionStatus[] = [
  'running',
  'completed',
  'interrupted',
  'limit_reached',
  'no_actionable_tasks',
];

// =============================================================================
// ENCODING
// =============================================================================

/**
 * Encode a session as its on-disk record, in a fixed field order.
 */
export function toStateRecord(session: Session): StateRecord {
  const record: StateRecord = {
    session_id: session.id,
    status: session.status,
    iteration: session.iteration,
    completion_count: session.completionCount,
    prompt: session.prompt,
    working_dir: session.workingDir,
    started_at: new Date(session.startedAt).toISOString(),
    last_update: new Date(session.lastUpdate).toISOString(),
    total_cost: session.totalCost,
  };

  if (session.mode === 'todo') {
    record.mode = 'todo';
    record.todo_file = session.prompt;
    if (session.checklist) {
      record.pending = session.checklist.pending;
      record.in_progress = session.checklist.inProgress;
      record.completed = session.checklist.completed;
      record.blocked = session.checklist.blocked;
    }
  }

  return record;
}

function isSessionStatus(value: unknown): value is SessionStatus {
  return typeof value === 'string' && SESSION_STATUSES.some(status => status === value);
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a parsed state file. Returns the record, or the list of
 * problems found.
 */
export function parseStateRecord(value: unknown): { record: StateRecord } | { errors: string[] } {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    return { errors: ['state must be a JSON object'] };
  }

  const errors: string[] = [];
  const v: Record<string, unknown> = { ...value };

  const strings = ['session_id', 'prompt', 'working_dir', 'started_at', 'last_update'] as const;
  for (const key of strings) {
    if (typeof v[key] !== 'string') errors.push(`${key} must be a string`);
  }
  if (!isSessionStatus(v.status)) errors.push(`status must be one of ${SESSION_STATUSES.join(', ')}`);
  if (!isCount(v.iteration)) errors.push('iteration must be a non-negative integer');
  if (!isCount(v.completion_count)) errors.push('completion_count must be a non-negative integer');
  if (typeof v.total_cost !== 'number' || v.total_cost < 0) errors.push('total_cost must be a non-negative number');

  const {
    session_id, status, iteration, completion_count, prompt,
    working_dir, started_at, last_update, total_cost,
  } = v;

  if (
    errors.length > 0 ||
    typeof session_id !== 'string' || !isSessionStatus(status) ||
    !isCount(iteration) || !isCount(completion_count) ||
    typeof prompt !== 'string' || typeof working_dir !== 'string' ||
    typeof started_at !== 'string' || typeof last_update !== 'string' ||
    typeof total_cost !== 'number'
  ) {
    return { errors };
  }

  const record: StateRecord = {
    session_id, status, iteration, completion_count, prompt,
    working_dir, started_at, last_update, total_cost,
  };

  if (v.mode === 'todo' || v.mode === 'signal') record.mode = v.mode;
  if (typeof v.todo_file === 'string') record.todo_file = v.todo_file;
  if (isCount(v.pending)) record.pending = v.pending;
  if (isCount(v.in_progress)) record.in_progress = v.in_progress;
  if (isCount(v.completed)) record.completed = v.completed;
  if (isCount(v.blocked)) record.blocked = v.blocked;

  return { record };
}

export async function readStateFile(path: string): Promise<StateRecord> {
  const content = await readFile(path, 'utf-8');
  const parsed = parseStateRecord(JSON.parse(content));
  if ('errors' in parsed) {
    throw new Error(`Invalid state file ${path}: ${parsed.errors.join('; ')}`);
  }
  return parsed.record;
}

// =============================================================================
// STORE
// =============================================================================

export class SessionStore {
  private readonly state: Session;
  private readonly stateFile: string;
  private readonly now: () => number;
  private writes: Promise<void> = Promise.resolve();
  private writeCount = 0;

  private constructor(session: Session, stateFile: string, now: () => number) {
    this.state = session;
    this.stateFile = stateFile;
    this.now = now;
  }

  /**
   * Create a running session and write its first state record.
   */
  static async create(options: CreateSessionOptions): Promise<SessionStore> {
    const now = options.now ?? Date.now;
    const startedAt = now();
    const store = new SessionStore(
      {
        id: options.id,
        mode: options.mode,
        status: 'running',
        iteration: 0,
        completionCount: 0,
        totalCost: 0,
        prompt: options.prompt,
        workingDir: options.workingDir,
        startedAt,
        lastUpdate: startedAt,
      },
      options.stateFile,
      now,
    );
    await store.persist();
    return store;
  }

  get session(): Readonly<Session> {
    return this.state;
  }

  get path(): string {
    return this.stateFile;
  }

  get isTerminal(): boolean {
    return this.state.status !== 'running';
  }

  /**
   * Apply counter changes and persist. Ignored once the session is final.
   */
  async update(patch: SessionPatch): Promise<void> {
    if (this.isTerminal) return;

    if (patch.iteration !== undefined) this.state.iteration = patch.iteration;
    if (patch.completionCount !== undefined) this.state.completionCount = patch.completionCount;
    if (patch.checklist !== undefined) this.state.checklist = { ...patch.checklist };
    await this.persist();
  }

  /**
   * Add a cost delta. Negative or non-finite deltas are ignored so the
   * total never decreases.
   */
  async addCost(delta: number): Promise<void> {
    if (this.isTerminal || !Number.isFinite(delta) || delta <= 0) return;
    this.state.totalCost += delta;
    await this.persist();
  }

  /**
   * Move to a terminal status. Returns false if the session was already
   * final, in which case nothing changes.
   */
  async finalize(status: TerminalStatus): Promise<boolean> {
    if (this.isTerminal) return false;
    this.state.status = status;
    await this.persist();
    return true;
  }

  setChecklistCounts(counts: ChecklistCounts): Promise<void> {
    return this.update({ checklist: counts });
  }

  /**
   * Write the current record. Each call snapshots the record when it is
   * made, so the last call wins on disk.
   */
  persist(): Promise<void> {
    this.state.lastUpdate = this.now();
    const content = JSON.stringify(toStateRecord(this.state), null, 2) + '\n';
    const tempFile = `${this.stateFile}.${process.pid}.${++this.writeCount}.tmp`;

    const write = this.writes.then(async () => {
      await writeFile(tempFile, content, 'utf-8');
      await rename(tempFile, this.stateFile);
    });
    this.writes = write.catch(() => undefined);
    return write;
  }
}
