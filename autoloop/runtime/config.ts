/**
 * Config: resolves loop settings from four layers, lowest first:
 *
 *   1. built-in defaults
 *   2. autoloop.config.json (or the file named by --config)
 *   3. environment variables
 *   4. command-line flags
 *
 * Each layer is parsed on its own, then merged and validated once. Every
 * problem found is reported together in a single ConfigError.
 */

import { stat } from 'fs/promises';
import { join, resolve } from 'path';
import { homedir } from 'os';
import type { AgentConfig, LogFormat, LoopConfig, LoopMode, TodoLoopConfig } from '../types/index.js';
import { DEFAULT_AGENT } from './agent.js';
import { DEFAULT_COMPLETION_SIGNAL, DEFAULT_COMPLETION_THRESHOLD } from './completion.js';
import { ConfigError, errnoCode, errorMessage } from './errors.js';
import { DEFAULT_ITERATION_DELAY_MS } from './iteration.js';
import { parseDuration } from './limits.js';
import { defaultLogDir } from './state-paths.js';

// =============================================================================
// TYPES
// =============================================================================

/** Settings any layer may supply. Unvalidated until merged. */
export interface SettingsLayer {
  prompt?: string;
  completionSignal?: string;
  completionThreshold?: number;
  maxIterations?: number;
  maxCost?: number;
  maxDuration?: string;
  workingDir?: string;
  logDir?: string;
  logFormat?: string;
  iterationDelayMs?: number;
  agentCommand?: string;
  agentArgs?: string[];
  todoFile?: string;
  dryRun?: boolean;
}

/** Flag values as typed on the command line */
export type FlagName =
  | 'prompt'
  | 'completion'
  | 'threshold'
  | 'max-iterations'
  | 'max-cost'
  | 'max-duration'
  | 'working-dir'
  | 'log-dir'
  | 'log-format'
  | 'config'
  | 'file';

export type FlagValues = Partial<Record<FlagName, string>>;

export interface ConfigSources {
  flags: FlagValues;
  dryRun: boolean;
  env: NodeJS.ProcessEnv;
  cwd: string;
  home?: string;
  readFile: (path: string, encoding: 'utf-8') => Promise<string>;
}

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_CONFIG_FILE = 'autoloop.config.json';
export const DEFAULT_SIGNAL_MAX_ITERATIONS = 50;
export const DEFAULT_TODO_MAX_ITERATIONS = 100;
export const DEFAULT_TODO_FILE = 'TODO.md';

const LOG_FORMATS: readonly LogFormat[] = ['json', 'text'];

const SIGNAL_ENV = {
  completionSignal: 'AUTOLOOP_COMPLETION_SIGNAL',
  completionThreshold: 'AUTOLOOP_COMPLETION_THRESHOLD',
  maxIterations: 'AUTOLOOP_MAX_ITERATIONS',
  maxCost: 'AUTOLOOP_MAX_COST',
  maxDuration: 'AUTOLOOP_MAX_DURATION',
  logDir: 'AUTOLOOP_LOG_DIR',
  logFormat: 'AUTOLOOP_LOG_FORMAT',
} as const;

const TODO_ENV = {
  todoFile: 'TODO_FILE',
  maxIterations: 'TODO_MAX_ITERATIONS',
  logDir: 'TODO_LOG_DIR',
  logFormat: 'TODO_LOG_FORMAT',
} as const;

const AGENT_COMMAND_ENV = 'AUTOLOOP_AGENT_COMMAND';

// =============================================================================
// LAYER PARSING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isLogFormat(value: unknown): value is LogFormat {
  return typeof value === 'string' && LOG_FORMATS.some(format => format === value);
}

/**
 * Parse a number typed as text. Reports an error and returns undefined
 * when the text is not a finite number.
 */
function parseNumber(value: string | undefined, name: string, errors: string[]): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(parsed)) {
    errors.push(`${name} must be a number (got "${value}")`);
    return undefined;
  }
  return parsed;
}

function readString(section: Record<string, unknown>, key: string, path: string, errors: string[]): string | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    errors.push(`${path} must be a string`);
    return undefined;
  }
  return value;
}

function readNumber(section: Record<string, unknown>, key: string, path: string, errors: string[]): number | undefined {
  const value = section[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    errors.push(`${path} must be a number`);
    return undefined;
  }
  return value;
}

/**
 * Parse the JSON config file contents into a layer for `mode`. The
 * optional "todo" section overrides shared keys in checklist mode.
 */
export function parseConfigFile(value: unknown, mode: LoopMode): { layer: SettingsLayer; errors: string[] } {
  if (!isRecord(value)) {
    return { layer: {}, errors: ['config file must contain a JSON object'] };
  }

  const errors: string[] = [];
  const layer: SettingsLayer = {
    completionSignal: readString(value, 'completionSignal', 'completionSignal', errors),
    completionThreshold: readNumber(value, 'completionThreshold', 'completionThreshold', errors),
    maxIterations: readNumber(value, 'maxIterations', 'maxIterations', errors),
    maxCost: readNumber(value, 'maxCost', 'maxCost', errors),
    maxDuration: readString(value, 'maxDuration', 'maxDuration', errors),
    workingDir: readString(value, 'workingDir', 'workingDir', errors),
    logDir: readString(value, 'logDir', 'logDir', errors),
    logFormat: readString(value, 'logFormat', 'logFormat', errors),
    iterationDelayMs: readNumber(value, 'iterationDelayMs', 'iterationDelayMs', errors),
  };

  if (value.agent !== undefined) {
    if (!isRecord(value.agent)) {
      errors.push('agent must be an object');
    } else {
      layer.agentCommand = readString(value.agent, 'command', 'agent.command', errors);
      if (value.agent.args !== undefined) {
        if (isStringArray(value.agent.args)) layer.agentArgs = value.agent.args;
        else errors.push('agent.args must be an array of strings');
      }
    }
  }

  if (value.todo !== undefined) {
    if (!isRecord(value.todo)) {
      errors.push('todo must be an object');
    } else if (mode === 'todo') {
      layer.todoFile = readString(value.todo, 'file', 'todo.file', errors);
      layer.maxIterations = readNumber(value.todo, 'maxIterations', 'todo.maxIterations', errors) ?? layer.maxIterations;
      layer.logDir = readString(value.todo, 'logDir', 'todo.logDir', errors) ?? layer.logDir;
      layer.logFormat = readString(value.todo, 'logFormat', 'todo.logFormat', errors) ?? layer.logFormat;
    }
  }

  return { layer, errors };
}

/**
 * Read the config file. An explicitly named file must exist; the default
 * file is optional.
 */
export async function loadConfigFile(
  sources: ConfigSources,
  mode: LoopMode,
): Promise<{ layer: SettingsLayer; errors: string[] }> {
  const explicit = sources.flags.config;
  const path = resolve(sources.cwd, explicit ?? DEFAULT_CONFIG_FILE);

  let content: string;
  try {
    content = await sources.readFile(path, 'utf-8');
  } catch (error) {
    if (explicit === undefined && errnoCode(error) === 'ENOENT') {
      return { layer: {}, errors: [] };
    }
    return { layer: {}, errors: [`Cannot read config file ${path}: ${errorMessage(error)}`] };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { layer: {}, errors: [`Invalid JSON in config file ${path}: ${errorMessage(error)}`] };
  }

  const result = parseConfigFile(parsed, mode);
  return { layer: result.layer, errors: result.errors.map(message => `${path}: ${message}`) };
}

export function layerFromEnv(env: NodeJS.ProcessEnv, mode: LoopMode): { layer: SettingsLayer; errors: string[] } {
  const errors: string[] = [];
  const agentCommand = env[AGENT_COMMAND_ENV] || undefined;

  if (mode === 'todo') {
    return {
      layer: {
        todoFile: env[TODO_ENV.todoFile] || undefined,
        maxIterations: parseNumber(env[TODO_ENV.maxIterations] || undefined, TODO_ENV.maxIterations, errors),
        logDir: env[TODO_ENV.logDir] || undefined,
        logFormat: env[TODO_ENV.logFormat] || undefined,
        agentCommand,
      },
      errors,
    };
  }

  return {
    layer: {
      completionSignal: env[SIGNAL_ENV.completionSignal] || undefined,
      completionThreshold: parseNumber(
        env[SIGNAL_ENV.completionThreshold] || undefined, SIGNAL_ENV.completionThreshold, errors,
      ),
      maxIterations: parseNumber(env[SIGNAL_ENV.maxIterations] || undefined, SIGNAL_ENV.maxIterations, errors),
      maxCost: parseNumber(env[SIGNAL_ENV.maxCost] || undefined, SIGNAL_ENV.maxCost, errors),
      maxDuration: env[SIGNAL_ENV.maxDuration] || undefined,
      logDir: env[SIGNAL_ENV.logDir] || undefined,
      logFormat: env[SIGNAL_ENV.logFormat] || undefined,
      agentCommand,
    },
    errors,
  };
}

export function layerFromFlags(flags: FlagValues, dryRun: boolean): { layer: SettingsLayer; errors: string[] } {
  const errors: string[] = [];
  return {
    layer: {
      prompt: flags.prompt,
      completionSignal: flags.completion,
      completionThreshold: parseNumber(flags.threshold, '--threshold', errors),
      maxIterations: parseNumber(flags['max-iterations'], '--max-iterations', errors),
      maxCost: parseNumber(flags['max-cost'], '--max-cost', errors),
      maxDuration: flags['max-duration'],
      workingDir: flags['working-dir'],
      logDir: flags['log-dir'],
      logFormat: flags['log-format'],
      todoFile: flags.file,
      dryRun: dryRun || undefined,
    },
    errors,
  };
}

/**
 * Merge layers left to right; later layers win for every key they set.
 */
export function mergeLayers(...layers: SettingsLayer[]): SettingsLayer {
  const merged: SettingsLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}

// =============================================================================
// VALIDATION
// =============================================================================

function requirePositiveInteger(value: number | undefined, name: string, errors: string[]): number {
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    errors.push(`${name} must be a positive integer`);
    return 1;
  }
  return value;
}

function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

interface SharedSettings {
  maxIterations: number;
  workingDir: string;
  logDir: string;
  logFormat: LogFormat;
  iterationDelayMs: number;
  dryRun: boolean;
  agent: AgentConfig;
}

function validateShared(
  merged: SettingsLayer,
  sources: ConfigSources,
  mode: LoopMode,
  errors: string[],
): SharedSettings {
  const home = sources.home ?? homedir();

  const maxIterations = requirePositiveInteger(merged.maxIterations, 'max iterations', errors);

  let logFormat: LogFormat = 'json';
  if (isLogFormat(merged.logFormat)) logFormat = merged.logFormat;
  else errors.push(`log format must be one of ${LOG_FORMATS.join(', ')} (got "${merged.logFormat}")`);

  const iterationDelayMs = merged.iterationDelayMs ?? DEFAULT_ITERATION_DELAY_MS;
  if (!Number.isFinite(iterationDelayMs) || iterationDelayMs < 0) {
    errors.push('iteration delay must be a non-negative number of milliseconds');
  }

  const agentCommand = merged.agentCommand ?? DEFAULT_AGENT.command;
  if (agentCommand.trim() === '') errors.push('agent command must not be empty');

  return {
    maxIterations,
    workingDir: resolve(sources.cwd, expandHome(merged.workingDir ?? '.', home)),
    logDir: resolve(sources.cwd, expandHome(merged.logDir ?? defaultLogDir(mode, home), home)),
    logFormat,
    iterationDelayMs,
    dryRun: merged.dryRun ?? false,
    agent: { command: agentCommand, args: merged.agentArgs ?? [...DEFAULT_AGENT.args] },
  };
}

/**
 * The agent runs inside the working directory, so it must exist before the
 * loop starts.
 */
export async function checkWorkingDir(workingDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(workingDir)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') throw new ConfigError([`Working directory not found: ${workingDir}`]);
    throw error;
  }
  if (!isDirectory) throw new ConfigError([`Working directory is not a directory: ${workingDir}`]);
}

// =============================================================================
// RESOLUTION
// =============================================================================

async function collectLayers(sources: ConfigSources, mode: LoopMode, defaults: SettingsLayer) {
  const file = await loadConfigFile(sources, mode);
  const env = layerFromEnv(sources.env, mode);
  const flags = layerFromFlags(sources.flags, sources.dryRun);
  return {
    merged: mergeLayers(defaults, file.layer, env.layer, flags.layer),
    errors: [...file.errors, ...env.errors, ...flags.errors],
  };
}

/**
 * Resolve the signal-mode configuration. Throws ConfigError listing every
 * problem found.
 */
export async function resolveLoopConfig(sources: ConfigSources): Promise<LoopConfig> {
  const { merged, errors } = await collectLayers(sources, 'signal', {
    completionSignal: DEFAULT_COMPLETION_SIGNAL,
    completionThreshold: DEFAULT_COMPLETION_THRESHOLD,
    maxIterations: DEFAULT_SIGNAL_MAX_ITERATIONS,
    logFormat: 'json',
  });

  const prompt = merged.prompt ?? '';
  if (prompt.trim() === '') errors.push('Prompt is required (-p, --prompt)');

  const completionSignal = merged.completionSignal ?? DEFAULT_COMPLETION_SIGNAL;
  if (completionSignal.trim() === '') errors.push('completion signal must not be empty');

  const completionThreshold = requirePositiveInteger(merged.completionThreshold, 'completion threshold', errors);

  if (merged.maxCost !== undefined && !(merged.maxCost > 0)) {
    errors.push('max cost must be a positive number');
  }
  if (merged.maxDuration !== undefined && parseDuration(merged.maxDuration) === null) {
    errors.push(`max duration "${merged.maxDuration}" is not a duration like 2h30m, 90m or 45s`);
  }

  const shared = validateShared(merged, sources, 'signal', errors);
  if (errors.length > 0) throw new ConfigError(errors);

  const config: LoopConfig = {
    ...shared,
    prompt,
    completionSignal,
    completionThreshold,
  };
  if (merged.maxCost !== undefined) config.maxCost = merged.maxCost;
  if (merged.maxDuration !== undefined) config.maxDuration = merged.maxDuration;
  return config;
}

/**
 * Resolve the checklist-mode configuration. The TODO file is resolved
 * against the working directory.
 */
export async function resolveTodoConfig(sources: ConfigSources): Promise<TodoLoopConfig> {
  const { merged, errors } = await collectLayers(sources, 'todo', {
    maxIterations: DEFAULT_TODO_MAX_ITERATIONS,
    todoFile: DEFAULT_TODO_FILE,
    logFormat: 'json',
  });

  const shared = validateShared(merged, sources, 'todo', errors);
  const todoFile = merged.todoFile ?? DEFAULT_TODO_FILE;
  if (todoFile.trim() === '') errors.push('TODO file must not be empty');

  if (errors.length > 0) throw new ConfigError(errors);

  return {
    ...shared,
    todoFile: resolve(shared.workingDir, expandHome(todoFile, sources.home ?? homedir())),
  };
}
