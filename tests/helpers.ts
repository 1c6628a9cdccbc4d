import { chmod, mkdir, mkdtemp, readFile, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { LifecycleManager, type LifecycleManagerOptions } from '../src/core/lifecycle-manager.js';
import type { PartDefinitionInput, ProjectOptionsInput } from '../src/core/parts/types.js';
import type { Plugin } from '../src/core/plugins/types.js';
import { PluginRegistry } from '../src/core/plugins/registry.js';
import { Logger } from '../src/utils/logger.js';
import { listTree } from '../src/utils/tree.js';

export async function tempDir(label = 'test'): Promise<string> {
  return await mkdtemp(join(tmpdir(), `partwright-${label}-`));
}

export type TreeSpec = Record<string, string | { content: string; mode: number } | { link: string }>;

/** Write files (and symlinks) below `root`; keys are POSIX paths. */
export async function writeTree(root: string, spec: TreeSpec): Promise<void> {
  for (const [rel, value] of Object.entries(spec)) {
    const abs = join(root, rel);
    await mkdir(dirname(abs), { recursive: true });
    if (typeof value === 'string') {
      await writeFile(abs, value, 'utf8');
    } else if ('link' in value) {
      await symlink(value.link, abs);
    } else {
      await writeFile(abs, value.content, 'utf8');
      await chmod(abs, value.mode);
    }
  }
}

export async function readTree(root: string): Promise<string[]> {
  return (await listTree(root)).map((e) => (e.kind === 'dir' ? `${e.path}/` : e.path));
}

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

export function collectingLogger(level: 'debug' | 'info' | 'warn' | 'error' = 'warn'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger({ level, sink: (line) => lines.push(line) }), lines };
}

/** Accepts any properties and contributes no commands. */
export class PassthroughPlugin implements Plugin {
  readonly kind: string = 'passthrough';
  readonly pullProperties = ['source-branch'];

  validateProperties(): void {}

  getPullCommands(): string[] {
    return [];
  }

  getBuildCommands(): string[] {
    return [];
  }

  getBuildEnvironment(): Record<string, string> {
    return {};
  }
}

export function pluginsWithPassthrough(): PluginRegistry {
  return PluginRegistry.withBuiltins().register(new PassthroughPlugin());
}

export interface TestProject {
  root: string;
  workDir: string;
  create(parts: PartDefinitionInput[], extra?: Partial<ProjectOptionsInput>, opts?: Omit<LifecycleManagerOptions, 'parts' | 'options'>): LifecycleManager;
}

/** A project directory with its work directory inside; every manager created shares both. */
export async function testProject(label = 'project'): Promise<TestProject> {
  const root = await tempDir(label);
  const workDir = join(root, 'work');
  return {
    root,
    workDir,
    create(parts, extra = {}, opts = {}) {
      return LifecycleManager.create({
        parts,
        options: { workDir, projectDir: root, parallelBuildCount: 2, targetArch: 'x64', ...extra },
        plugins: pluginsWithPassthrough(),
        ...opts
      });
    }
  };
}
