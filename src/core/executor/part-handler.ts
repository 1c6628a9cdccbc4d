import { cp, lstat, mkdir, rm } from 'node:fs/promises';

import type { Logger } from '../../utils/logger.js';
import { listTree, type TreeEntry } from '../../utils/tree.js';
import type { FilesystemLayout, MergeResult } from '../../workspace/filesystem.js';
import { partPaths, type PartPaths, type SharedArea, type WorkspacePaths } from '../../workspace/layout.js';
import type { OverlayManager } from '../../workspace/overlay.js';
import type { PartGraph, ResolvedPart } from '../parts/graph.js';
import type { ProjectOptions, ScriptOverride } from '../parts/types.js';
import type { SourceContext } from '../plugins/types.js';
import type { StateStore } from '../state/store.js';
import type { Step } from '../steps.js';
import { pluginContext, renderEnvironment, stepEnvironment } from './environment.js';
import { organizeFiles } from './organize.js';
import { writeScript, type ScriptRunner } from './step-runner.js';

/** What a finished step produced, for its state record. */
export interface StepOutcome extends MergeResult {
  /** Identity of the pulled source; pull only. */
  sourceIdentity: string | null;
}

export interface PartHandlerDeps {
  ws: WorkspacePaths;
  options: ProjectOptions;
  graph: PartGraph;
  fs: FilesystemLayout;
  overlay: OverlayManager;
  state: StateStore;
  runner: ScriptRunner;
  logger: Logger;
}

interface StepRun {
  part: ResolvedPart;
  step: Step;
  paths: PartPaths;
  signal?: AbortSignal;
  overlayView: string | null;
}

const EMPTY: MergeResult = { files: [], directories: [] };

/**
 * Runs one lifecycle step of one part. Each step runs the part's `before` snippet, then either
 * its `run` override or the built-in behaviour, then its `after` snippet.
 */
export class PartHandler {
  constructor(private readonly deps: PartHandlerDeps) {}

  sourceContext(name: string, signal?: AbortSignal): SourceContext {
    return {
      projectDir: this.deps.options.projectDir,
      srcDir: partPaths(this.deps.ws, name).srcDir,
      workDir: this.deps.ws.workDir,
      signal
    };
  }

  async run(part: ResolvedPart, step: Step, signal?: AbortSignal): Promise<StepOutcome> {
    const paths = partPaths(this.deps.ws, part.definition.name);
    await mkdir(paths.runDir, { recursive: true });
    await mkdir(paths.stateDir, { recursive: true });
    const ctx: StepRun = { part, step, paths, signal, overlayView: null };

    switch (step) {
      case 'pull':
        return await this.pull(ctx);
      case 'overlay':
        return await this.overlayStep(ctx);
      case 'build':
        return await this.build(ctx);
      case 'stage':
        return await this.stage(ctx);
      case 'prime':
        return await this.prime(ctx);
    }
  }

  private async pull(ctx: StepRun): Promise<StepOutcome> {
    const { part, paths } = ctx;
    const def = part.definition;
    await rm(paths.srcDir, { recursive: true, force: true });
    await mkdir(paths.srcDir, { recursive: true });

    const override = def.overrides.pull;
    const sourceCtx = this.sourceContext(def.name, ctx.signal);
    const identify = async () => (part.source ? await part.source.identify(def, sourceCtx) : null);

    let identity: string | null = null;
    await this.script(ctx, 'before', override, paths.srcDir);
    const commands = part.plugin.getPullCommands(def, pluginContext(part, paths, this.deps.ws, this.deps.options));
    if (override?.run !== undefined) {
      await this.script(ctx, 'run', override, paths.srcDir);
      identity = await identify();
    } else if (commands.length > 0) {
      await this.commands(ctx, commands, paths.srcDir);
      identity = await identify();
    } else if (part.source) {
      const snapshot = await part.source.pull(def, sourceCtx);
      this.deps.logger.debug(`Pulled '${def.name}'`, { files: snapshot.files });
      identity = snapshot.identity;
    }
    await this.script(ctx, 'after', override, paths.srcDir);

    return { ...EMPTY, sourceIdentity: identity };
  }

  private async overlayStep(ctx: StepRun): Promise<StepOutcome> {
    const { part, paths } = ctx;
    const override = part.definition.overrides.overlay;
    const lower = this.lowerLayers(part);

    const view = await this.deps.overlay.mount(paths, lower);
    try {
      const withView = { ...ctx, overlayView: view };
      await this.script(withView, 'before', override, view);
      await this.script(withView, 'run', override, view);
      await this.script(withView, 'after', override, view);
      const recorded = await this.deps.overlay.recordLayer(paths, lower);
      this.deps.logger.debug(`Recorded overlay layer for '${part.definition.name}'`, { entries: recorded.length });
    } finally {
      await this.deps.overlay.unmount(paths);
    }
    return { ...EMPTY, sourceIdentity: null };
  }

  private async build(ctx: StepRun): Promise<StepOutcome> {
    const { part, paths } = ctx;
    const def = part.definition;
    await rm(paths.buildDir, { recursive: true, force: true });
    await rm(paths.installDir, { recursive: true, force: true });
    await mkdir(paths.installDir, { recursive: true });
    await cp(paths.srcDir, paths.buildDir, { recursive: true, verbatimSymlinks: true, preserveTimestamps: true });
    await mkdir(paths.buildDir, { recursive: true });

    let run = ctx;
    if (this.deps.options.overlay.enabled) {
      const view = await this.deps.overlay.mount(paths, [...this.lowerLayers(part), paths.layerDir]);
      run = { ...ctx, overlayView: view };
    }

    try {
      const override = def.overrides.build;
      await this.script(run, 'before', override, paths.buildDir);
      if (override?.run !== undefined) {
        await this.script(run, 'run', override, paths.buildDir);
      } else {
        const commands = part.plugin.getBuildCommands(def, pluginContext(part, paths, this.deps.ws, this.deps.options));
        await this.commands(run, commands, paths.buildDir);
      }
      await organizeFiles(def.name, def.organize, paths.installDir);
      await this.script(run, 'after', override, paths.buildDir);
    } finally {
      if (run.overlayView) await this.deps.overlay.unmount(paths);
    }

    return { ...EMPTY, sourceIdentity: null };
  }

  private async stage(ctx: StepRun): Promise<StepOutcome> {
    const { part } = ctx;
    const name = part.definition.name;
    const override = part.definition.overrides.stage;
    const stageDir = this.deps.ws.stageDir;
    await mkdir(stageDir, { recursive: true });

    // Files this part staged before, and overlay changes it applied, are taken back out first.
    await this.deps.fs.clean(name, 'stage');

    await this.script(ctx, 'before', override, stageDir);
    let result: MergeResult;
    if (override?.run !== undefined) {
      result = await this.adoptChanges(ctx, 'stage', stageDir, override);
    } else {
      result = await this.deps.fs.stage(part);
    }
    if (this.deps.options.overlay.enabled) await this.deps.fs.applyLayer(part);
    await this.script(ctx, 'after', override, stageDir);

    return { ...result, sourceIdentity: null };
  }

  private async prime(ctx: StepRun): Promise<StepOutcome> {
    const { part } = ctx;
    const name = part.definition.name;
    const override = part.definition.overrides.prime;
    const primeDir = this.deps.ws.primeDir;
    await mkdir(primeDir, { recursive: true });

    await this.deps.fs.clean(name, 'prime');

    await this.script(ctx, 'before', override, primeDir);
    let result: MergeResult;
    if (override?.run !== undefined) {
      result = await this.adoptChanges(ctx, 'prime', primeDir, override);
    } else {
      const staged = await this.deps.state.get(name, 'stage');
      if (!staged) throw new Error(`part '${name}' has no recorded stage step`);
      result = await this.deps.fs.prime(part, staged);
    }
    await this.script(ctx, 'after', override, primeDir);

    return { ...result, sourceIdentity: null };
  }

  /** Run a `run` override in a shared area and claim whatever it created or changed there. */
  private async adoptChanges(ctx: StepRun, area: SharedArea, dir: string, override: ScriptOverride): Promise<MergeResult> {
    const before = await signatures(dir);
    await this.script(ctx, 'run', override, dir);
    const after = await listTree(dir);
    const changed: TreeEntry[] = [];
    for (const e of after) {
      const sig = await signature(dir, e);
      if (before.get(e.path) !== sig) changed.push(e);
    }
    return await this.deps.fs.adopt(area, ctx.part.definition.name, changed);
  }

  private lowerLayers(part: ResolvedPart): string[] {
    const deps = this.deps.graph.dependenciesOf(part.definition.name, { transitive: true });
    return this.deps.overlay.lowerLayers(deps.map((d) => partPaths(this.deps.ws, d).layerDir));
  }

  private async script(ctx: StepRun, phase: keyof ScriptOverride, override: ScriptOverride | undefined, cwd: string): Promise<void> {
    const body = override?.[phase];
    if (body === undefined || body.trim() === '') return;
    await this.exec(ctx, phase === 'run' ? `${ctx.step}.sh` : `${ctx.step}-${phase}.sh`, body, cwd);
  }

  private async commands(ctx: StepRun, commands: readonly string[], cwd: string): Promise<void> {
    if (commands.length === 0) return;
    await this.exec(ctx, `${ctx.step}.sh`, commands.join('\n'), cwd);
  }

  private async exec(ctx: StepRun, file: string, body: string, cwd: string): Promise<void> {
    const env = await stepEnvironment({
      part: ctx.part,
      step: ctx.step,
      ws: this.deps.ws,
      paths: ctx.paths,
      options: this.deps.options,
      overlayView: ctx.overlayView
    });
    const scriptPath = await writeScript(ctx.paths.runDir, file, renderEnvironment(env), cwd, body);
    await this.deps.runner.run({ part: ctx.part.definition.name, step: ctx.step, scriptPath, cwd, signal: ctx.signal });
  }
}

async function signatures(root: string): Promise<Map<string, string>> {
  const out = new Map<string, string>();
  for (const e of await listTree(root)) out.set(e.path, await signature(root, e));
  return out;
}

async function signature(root: string, e: TreeEntry): Promise<string> {
  if (e.kind === 'dir') return 'dir';
  const st = await lstat(`${root}/${e.path}`);
  return `${e.kind}:${st.ino}:${st.size}:${st.mtimeMs}`;
}
