import { resolve } from 'node:path';

import { resolveLogJson, resolveLogLevel, resolveWorkDir } from '../config/env.js';
import { LifecycleManager } from '../core/lifecycle-manager.js';
import { loadProjectFile } from '../core/project/loader.js';
import { Logger, type LogLevel } from '../utils/logger.js';

export interface ProjectCommandOptions {
  /** Project file; defaults to `parts.yaml` in the current directory. */
  file?: string;
  workDir?: string;
  verbose?: boolean;
}

export const DEFAULT_PROJECT_FILE = 'parts.yaml';

export function cliLogger(opts: { verbose?: boolean } = {}): Logger {
  const level: LogLevel = opts.verbose ? 'debug' : resolveLogLevel();
  return new Logger({ level, json: resolveLogJson() });
}

/**
 * Load the project file and build the lifecycle manager. The work directory comes from
 * `--work-dir`, the file's `options.workDir` or `PARTWRIGHT_WORK_DIR`, in that order. A relative
 * `--work-dir` resolves against the current directory, the others against the project directory.
 */
export async function openProject(opts: ProjectCommandOptions): Promise<LifecycleManager> {
  const project = await loadProjectFile(opts.file ?? DEFAULT_PROJECT_FILE);
  const workDir = opts.workDir ? resolve(opts.workDir) : resolve(project.projectDir, project.options.workDir ?? resolveWorkDir());
  return LifecycleManager.create({
    parts: project.parts,
    options: {
      ...project.options,
      projectDir: project.projectDir,
      workDir
    },
    logger: cliLogger(opts)
  });
}
