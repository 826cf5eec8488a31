#!/usr/bin/env node

/**
 * autoloop CLI entry point
 *
 * This is the bin entry for `npx autoloop` / `npm install -g autoloop`.
 * Delegates to runtime/cli.ts for all logic.
 */

import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { dispatch } from './runtime/cli.js';
import { ProcessAgentRunner, findExecutable } from './runtime/agent.js';

const exitCode = await dispatch(process.argv.slice(2), {
  readFile: (path: string, encoding: 'utf-8') => readFile(path, encoding),
  cwd: process.cwd(),
  env: process.env,
  home: homedir(),
  log: (msg: string) => console.log(msg),
  error: (msg: string) => console.error(msg),
  createAgent: config => new ProcessAgentRunner(config),
  findExecutable: command => findExecutable(command),
});

process.exit(exitCode);
