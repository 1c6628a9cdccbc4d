#!/usr/bin/env node
import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { runCleanCommand } from './commands/clean.js';
import { runExplainCommand } from './commands/explain.js';
import { runPlanCommand } from './commands/plan.js';
import { describeFailure, type CommandResult } from './commands/result.js';
import { runRunCommand } from './commands/run.js';
import { runStatusCommand } from './commands/status.js';
import { DEFAULT_PROJECT_FILE } from './project.js';
import { createRenderer, getRenderer } from './ui/renderer.js';

interface GlobalFlags {
  file: string;
  workDir?: string;
  verbose: boolean;
  quiet: boolean;
}

function buildCli(): Command {
  const program = new Command();
  let globals: GlobalFlags = { file: DEFAULT_PROJECT_FILE, verbose: false, quiet: false };

  program
    .name('partwright')
    .description('Incremental, dependency-aware part builds: pull, build, stage and prime')
    .version(detectVersionSync() ?? '0.0.0', '-v, --version');

  program
    .option('-f, --file <path>', 'Project file', DEFAULT_PROJECT_FILE)
    .option('--work-dir <dir>', 'Work directory (defaults to .partwright beside the project file)')
    .option('--verbose', 'Show debug output')
    .option('--quiet', 'Machine-friendly output (JSON lines)');

  program.hook('preAction', (thisCommand) => {
    const o = thisCommand.opts<{ file: string; workDir?: string; verbose?: boolean; quiet?: boolean }>();
    globals = { file: o.file, workDir: o.workDir, verbose: !!o.verbose, quiet: !!o.quiet };
    process.env.PARTWRIGHT_VERBOSE = globals.verbose ? '1' : '0';
    createRenderer({ quiet: globals.quiet });
  });

  const project = () => ({ file: globals.file, workDir: globals.workDir, verbose: globals.verbose });

  program
    .command('plan')
    .description('Show the actions needed to bring parts to a step')
    .argument('[step]', 'Target step', 'prime')
    .argument('[parts...]', 'Parts to select (defaults to all)')
    .option('--force', 'Rerun every step of the selected parts')
    .option('--json', 'Print the plan as JSON on stdout')
    .action(async (step: string, parts: string[], opts: { force?: boolean; json?: boolean }) => {
      report('Plan failed', await runPlanCommand({ ...project(), step, parts, force: !!opts.force, json: !!opts.json }));
    });

  program
    .command('run')
    .description('Plan and execute the actions needed to bring parts to a step')
    .argument('[step]', 'Target step', 'prime')
    .argument('[parts...]', 'Parts to select (defaults to all)')
    .option('--force', 'Rerun every step of the selected parts')
    .option('--json', 'Print the run outcome as JSON on stdout')
    .action(async (step: string, parts: string[], opts: { force?: boolean; json?: boolean }) => {
      report('Run failed', await runRunCommand({ ...project(), step, parts, force: !!opts.force, json: !!opts.json }));
    });

  program
    .command('clean')
    .description('Undo a step and every later step')
    .argument('[parts...]', 'Parts to clean (defaults to all)')
    .option('--step <step>', 'First step to undo', 'pull')
    .action(async (parts: string[], opts: { step: string }) => {
      report('Clean failed', await runCleanCommand({ ...project(), parts, step: opts.step }));
    });

  program
    .command('status')
    .description('Show the state of every step')
    .argument('[parts...]', 'Parts to show (defaults to all)')
    .option('--json', 'Print the statuses as JSON on stdout')
    .action(async (parts: string[], opts: { json?: boolean }) => {
      report('Status failed', await runStatusCommand({ ...project(), parts, json: !!opts.json }));
    });

  program
    .command('explain')
    .description('Explain why a step would or would not run')
    .argument('<part>', 'Part name')
    .argument('<step>', 'Step')
    .option('--json', 'Print the explanation as JSON on stdout')
    .action(async (part: string, step: string, opts: { json?: boolean }) => {
      report('Explain failed', await runExplainCommand({ ...project(), part, step, json: !!opts.json }));
    });

  return program;
}

function report(fallbackTitle: string, res: CommandResult): void {
  if (res.ok) return;
  const r = getRenderer();
  if (res.cancelled) {
    r.warn('Cancelled.');
    process.exitCode = 130;
    return;
  }
  const { title, details, tip } = describeFailure(res.error);
  r.error(title || fallbackTitle, details, tip);
  process.exitCode = 1;
}

function detectVersionSync(): string | null {
  try {
    let current = dirname(fileURLToPath(import.meta.url));
    for (let i = 0; i < 8; i++) {
      const candidate = resolve(current, 'package.json');
      if (existsSync(candidate)) {
        const parsed: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
        if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') return parsed.version;
        return null;
      }
      const parent = resolve(current, '..');
      if (parent === current) break;
      current = parent;
    }
    return null;
  } catch {
    return null;
  }
}

await buildCli().parseAsync(process.argv);
