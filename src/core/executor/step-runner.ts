import { chmod } from 'node:fs/promises';
import { join } from 'node:path';
import { execa, ExecaError } from 'execa';

import { writeText } from '../../utils/fs.js';
import { shellQuote } from '../../utils/shell.js';
import { quietLogger, type Logger } from '../../utils/logger.js';
import { CancelledError } from '../errors.js';
import type { Step } from '../steps.js';

export interface ScriptInvocation {
  part: string;
  step: Step;
  /** Generated script to run with `sh -e`. */
  scriptPath: string;
  cwd: string;
  signal?: AbortSignal;
}

/** Runs generated step scripts. Tests and embedders may substitute their own. */
export interface ScriptRunner {
  run(invocation: ScriptInvocation): Promise<void>;
}

export class ScriptError extends Error {
  constructor(
    readonly scriptPath: string,
    readonly exitCode: number | undefined,
    readonly output: string
  ) {
    super(`script '${scriptPath}' ${exitCode === undefined ? 'was terminated' : `exited with code ${exitCode}`}`);
    this.name = 'ScriptError';
  }
}

const OUTPUT_TAIL_LINES = 20;

export class ShellScriptRunner implements ScriptRunner {
  constructor(private readonly logger: Logger = quietLogger()) {}

  async run(inv: ScriptInvocation): Promise<void> {
    this.logger.debug(`Running ${inv.step} script for part '${inv.part}'`, { script: inv.scriptPath, cwd: inv.cwd });
    try {
      const res = await execa('sh', ['-e', inv.scriptPath], {
        cwd: inv.cwd,
        stdin: 'ignore',
        all: true,
        cancelSignal: inv.signal,
        killSignal: 'SIGTERM',
        forceKillAfterDelay: 5_000
      });
      for (const line of res.all.split('\n').filter(Boolean)) this.logger.debug(`[${inv.part}:${inv.step}] ${line}`);
    } catch (err) {
      if (err instanceof ExecaError) {
        if (err.isCanceled || inv.signal?.aborted) throw new CancelledError();
        const output = tail(typeof err.all === 'string' ? err.all : '', OUTPUT_TAIL_LINES);
        throw new ScriptError(inv.scriptPath, err.exitCode, output);
      }
      throw err;
    }
  }
}

/** Write `body` as `parts/<name>/run/<file>` under a shell header. */
export async function writeScript(runDir: string, file: string, environment: string, cwd: string, body: string): Promise<string> {
  const path = join(runDir, file);
  const content = ['#!/bin/sh', 'set -e', '', '# Environment', environment, '', `cd ${shellQuote(cwd)}`, '', body, ''].join('\n');
  await writeText(path, content);
  await chmod(path, 0o755);
  return path;
}

function tail(text: string, lines: number): string {
  const all = text.split('\n');
  return all.slice(Math.max(0, all.length - lines)).join('\n').trimEnd();
}
