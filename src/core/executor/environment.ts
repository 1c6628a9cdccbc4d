import { stat } from 'node:fs/promises';
import { join } from 'node:path';

import { shellQuote } from '../../utils/shell.js';
import type { PartPaths, WorkspacePaths } from '../../workspace/layout.js';
import type { ResolvedPart } from '../parts/graph.js';
import type { ProjectOptions } from '../parts/types.js';
import type { PluginContext } from '../plugins/types.js';
import type { Step } from '../steps.js';

export interface EnvironmentEntry {
  name: string;
  value: string;
  /** User-provided values are exported in double quotes so they can refer to earlier variables. */
  expand: boolean;
}

export interface StepEnvironmentArgs {
  part: ResolvedPart;
  step: Step;
  ws: WorkspacePaths;
  paths: PartPaths;
  options: ProjectOptions;
  /** Mounted overlay view, when layered builds are enabled and the step sees one. */
  overlayView: string | null;
}

const BIN_DIRS = ['usr/sbin', 'usr/bin', 'sbin', 'bin'] as const;

export function pluginContext(part: ResolvedPart, paths: PartPaths, ws: WorkspacePaths, options: ProjectOptions): PluginContext {
  return {
    partName: part.definition.name,
    dirs: paths,
    stageDir: ws.stageDir,
    primeDir: ws.primeDir,
    projectDir: options.projectDir,
    parallelBuildCount: options.parallelBuildCount,
    targetArch: options.targetArch
  };
}

/**
 * Variables exported to a step's scripts, in export order: the engine's own, the project
 * environment, the plugin's (build only) and finally the part's `buildEnvironment`.
 */
export async function stepEnvironment(args: StepEnvironmentArgs): Promise<EnvironmentEntry[]> {
  const { part, step, ws, paths, options } = args;
  const own = (name: string, value: string): EnvironmentEntry => ({ name, value, expand: false });

  const entries: EnvironmentEntry[] = [
    own('PARTWRIGHT_PART_NAME', part.definition.name),
    own('PARTWRIGHT_STEP', step),
    own('PARTWRIGHT_PART_SRC', paths.srcDir),
    own('PARTWRIGHT_PART_BUILD', paths.buildDir),
    own('PARTWRIGHT_PART_INSTALL', paths.installDir),
    own('PARTWRIGHT_STAGE', ws.stageDir),
    own('PARTWRIGHT_PRIME', ws.primeDir),
    own('PARTWRIGHT_PROJECT_DIR', options.projectDir),
    own('PARTWRIGHT_PARALLEL_BUILD_COUNT', String(options.parallelBuildCount)),
    own('PARTWRIGHT_TARGET_ARCH', options.targetArch)
  ];
  if (args.overlayView) entries.push(own('PARTWRIGHT_OVERLAY', args.overlayView));

  const binPaths = await existingBinPaths([paths.installDir, ws.stageDir]);
  if (binPaths.length > 0) entries.push({ name: 'PATH', value: [...binPaths, '$PATH'].join(':'), expand: true });

  for (const [name, value] of Object.entries(options.environment)) entries.push({ name, value, expand: true });

  if (step === 'build') {
    const env = part.plugin.getBuildEnvironment(part.definition, pluginContext(part, paths, ws, options));
    for (const [name, value] of Object.entries(env)) entries.push(own(name, value));
  }

  for (const group of part.definition.buildEnvironment) {
    for (const [name, value] of Object.entries(group)) entries.push({ name, value, expand: true });
  }

  return entries;
}

export function renderEnvironment(entries: readonly EnvironmentEntry[]): string {
  return entries.map((e) => `export ${e.name}=${e.expand ? expandable(e.value) : shellQuote(e.value)}`).join('\n');
}

/** Double-quoted so `$NAME` still expands; backslashes, quotes and backticks are taken literally. */
function expandable(value: string): string {
  return `"${value.replace(/[\\"`]/g, '\\$&')}"`;
}

async function existingBinPaths(roots: readonly string[]): Promise<string[]> {
  const out: string[] = [];
  for (const root of roots) {
    for (const dir of BIN_DIRS) {
      const abs = join(root, dir);
      try {
        if ((await stat(abs)).isDirectory()) out.push(abs);
      } catch {
        continue;
      }
    }
  }
  return out;
}
