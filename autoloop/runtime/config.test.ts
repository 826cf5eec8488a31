import { describe, it, expect } from 'vitest';
import {
  loadConfigFile,
  mergeLayers,
  parseConfigFile,
  resolveLoopConfig,
  resolveTodoConfig,
  type ConfigSources,
} from './config.js';
import { ConfigError } from './errors.js';

function enoent(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

function makeSources(overrides: Partial<ConfigSources> = {}, files: Record<string, string> = {}): ConfigSources {
  return {
    flags: {},
    dryRun: false,
    env: {},
    cwd: '/work',
    home: '/home/dev',
    readFile: async path => {
      const content = files[path];
      if (content === undefined) throw enoent(path);
      return content;
    },
    ...overrides,
  };
}

async function configErrors(attempt: Promise<unknown>): Promise<string[]> {
  try {
    await attempt;
  } catch (error) {
    if (error instanceof ConfigError) return error.errors;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveLoopConfig', () => {
  it('fills in defaults around the prompt', async () => {
    const config = await resolveLoopConfig(makeSources({ flags: { prompt: 'Fix it' } }));

    expect(config).toEqual({
      prompt: 'Fix it',
      completionSignal: 'TASK_COMPLETE',
      completionThreshold: 2,
      maxIterations: 50,
      workingDir: '/work',
      logDir: '/home/dev/.autoloop/loop-logs',
      logFormat: 'json',
      iterationDelayMs: 2000,
      dryRun: false,
      agent: { command: 'claude', args: ['--dangerously-skip-permissions', '-p'] },
    });
  });

  it('layers file, then environment, then flags', async () => {
    const file = JSON.stringify({
      maxIterations: 10,
      completionSignal: 'FROM_FILE',
      completionThreshold: 3,
      logFormat: 'text',
    });
    const config = await resolveLoopConfig(makeSources(
      {
        flags: { prompt: 'Fix it', 'max-iterations': '30' },
        env: { AUTOLOOP_MAX_ITERATIONS: '20', AUTOLOOP_COMPLETION_SIGNAL: 'FROM_ENV' },
      },
      { '/work/autoloop.config.json': file },
    ));

    expect(config.maxIterations).toBe(30);
    expect(config.completionSignal).toBe('FROM_ENV');
    expect(config.completionThreshold).toBe(3);
    expect(config.logFormat).toBe('text');
  });

  it('treats empty environment variables as unset', async () => {
    const config = await resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it' },
      env: { AUTOLOOP_MAX_ITERATIONS: '', AUTOLOOP_COMPLETION_SIGNAL: '' },
    }));

    expect(config.maxIterations).toBe(50);
    expect(config.completionSignal).toBe('TASK_COMPLETE');
  });

  it('keeps optional budgets when given', async () => {
    const config = await resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it', 'max-cost': '2.5', 'max-duration': '1h30m' },
    }));

    expect(config.maxCost).toBe(2.5);
    expect(config.maxDuration).toBe('1h30m');
  });

  it('accepts a bare zero duration', async () => {
    const config = await resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it', 'max-duration': '0' },
    }));

    expect(config.maxDuration).toBe('0');
  });

  it('expands the home directory and resolves relative paths', async () => {
    const config = await resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it', 'log-dir': '~/logs', 'working-dir': 'project' },
    }));

    expect(config.logDir).toBe('/home/dev/logs');
    expect(config.workingDir).toBe('/work/project');
  });

  it('reads the agent from the file and its command from the environment', async () => {
    const file = JSON.stringify({ agent: { command: 'file-agent', args: ['--auto'] } });
    const config = await resolveLoopConfig(makeSources(
      { flags: { prompt: 'Fix it' }, env: { AUTOLOOP_AGENT_COMMAND: 'env-agent' } },
      { '/work/autoloop.config.json': file },
    ));

    expect(config.agent).toEqual({ command: 'env-agent', args: ['--auto'] });
  });

  it('sets dry run from the flag', async () => {
    const config = await resolveLoopConfig(makeSources({ flags: { prompt: 'Fix it' }, dryRun: true }));
    expect(config.dryRun).toBe(true);
  });

  it('requires a prompt', async () => {
    await expect(resolveLoopConfig(makeSources())).rejects.toThrow('Prompt is required (-p, --prompt)');
  });

  it('reports every invalid value together', async () => {
    const errors = await configErrors(resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it', threshold: 'abc', 'max-cost': '-1', 'max-duration': '10' },
      env: { AUTOLOOP_LOG_FORMAT: 'xml' },
    })));

    expect(errors).toEqual([
      '--threshold must be a number (got "abc")',
      'max cost must be a positive number',
      'max duration "10" is not a duration like 2h30m, 90m or 45s',
      'log format must be one of json, text (got "xml")',
    ]);
  });

  it('rejects thresholds and iteration caps below one', async () => {
    const errors = await configErrors(resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it', threshold: '0', 'max-iterations': '2.5' },
    })));

    expect(errors).toEqual([
      'completion threshold must be a positive integer',
      'max iterations must be a positive integer',
    ]);
  });

  it('requires an explicitly named config file to exist', async () => {
    const errors = await configErrors(resolveLoopConfig(makeSources({
      flags: { prompt: 'Fix it', config: 'custom.json' },
    })));

    expect(errors).toEqual([
      "Cannot read config file /work/custom.json: ENOENT: no such file or directory, open '/work/custom.json'",
    ]);
  });

  it('reports malformed JSON in the config file', async () => {
    const errors = await configErrors(resolveLoopConfig(makeSources(
      { flags: { prompt: 'Fix it' } },
      { '/work/autoloop.config.json': '{ not json' },
    )));

    expect(errors).toHaveLength(1);
    expect(errors[0].startsWith('Invalid JSON in config file /work/autoloop.config.json: ')).toBe(true);
  });
});

describe('resolveTodoConfig', () => {
  it('defaults to TODO.md in the working directory', async () => {
    const config = await resolveTodoConfig(makeSources());

    expect(config.todoFile).toBe('/work/TODO.md');
    expect(config.maxIterations).toBe(100);
    expect(config.logDir).toBe('/home/dev/.autoloop/todo-logs');
  });

  it('prefers the todo section of the config file over shared keys', async () => {
    const file = JSON.stringify({ maxIterations: 3, todo: { file: 'tasks.md', maxIterations: 7 } });
    const config = await resolveTodoConfig(makeSources({}, { '/work/autoloop.config.json': file }));

    expect(config.todoFile).toBe('/work/tasks.md');
    expect(config.maxIterations).toBe(7);
  });

  it('reads only the todo environment variables', async () => {
    const config = await resolveTodoConfig(makeSources({
      env: { AUTOLOOP_MAX_ITERATIONS: '5', TODO_MAX_ITERATIONS: '8', TODO_FILE: 'env.md', TODO_LOG_FORMAT: 'text' },
    }));

    expect(config.maxIterations).toBe(8);
    expect(config.todoFile).toBe('/work/env.md');
    expect(config.logFormat).toBe('text');
  });

  it('resolves the file flag against the working directory', async () => {
    const config = await resolveTodoConfig(makeSources({
      flags: { file: 'docs/TODO.md', 'working-dir': '/repo' },
      env: { TODO_FILE: 'env.md' },
    }));

    expect(config.todoFile).toBe('/repo/docs/TODO.md');
  });

  it('names the environment variable in number errors', async () => {
    const errors = await configErrors(resolveTodoConfig(makeSources({ env: { TODO_MAX_ITERATIONS: 'lots' } })));
    expect(errors).toEqual(['TODO_MAX_ITERATIONS must be a number (got "lots")']);
  });
});

describe('parseConfigFile', () => {
  it('rejects anything but an object', () => {
    expect(parseConfigFile([], 'signal').errors).toEqual(['config file must contain a JSON object']);
  });

  it('reports mistyped keys', () => {
    const { errors } = parseConfigFile({ maxIterations: 'ten', agent: { args: [1] }, todo: 'x' }, 'signal');
    expect(errors).toEqual([
      'maxIterations must be a number',
      'agent.args must be an array of strings',
      'todo must be an object',
    ]);
  });

  it('ignores the todo section in signal mode', () => {
    const { layer } = parseConfigFile({ maxIterations: 4, todo: { maxIterations: 9 } }, 'signal');
    expect(layer.maxIterations).toBe(4);
    expect(layer.todoFile).toBeUndefined();
  });
});

describe('loadConfigFile', () => {
  it('treats a missing default file as empty', async () => {
    expect(await loadConfigFile(makeSources(), 'signal')).toEqual({ layer: {}, errors: [] });
  });

  it('prefixes errors with the file path', async () => {
    const result = await loadConfigFile(
      makeSources({}, { '/work/autoloop.config.json': '{"maxCost": "a lot"}' }),
      'signal',
    );
    expect(result.errors).toEqual(['/work/autoloop.config.json: maxCost must be a number']);
  });
});

describe('mergeLayers', () => {
  it('lets later layers win only for keys they set', () => {
    expect(mergeLayers(
      { maxIterations: 1, logFormat: 'json' },
      { maxIterations: 2, logFormat: undefined },
      { prompt: 'p' },
    )).toEqual({ maxIterations: 2, logFormat: 'json', prompt: 'p' });
  });
});
