import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { Step } from '../core/steps.js';

export type SharedArea = 'stage' | 'prime' | 'overlay';

export interface WorkspacePaths {
  workDir: string;
  partsDir: string;
  stageDir: string;
  primeDir: string;
  overlayDir: string;
  stateDir: string;
  ownershipDir: string;
  journalPath: string;
}

export interface PartPaths {
  partDir: string;
  /** Pulled sources. */
  srcDir: string;
  /** Build tree (a copy of the sources the build runs in). */
  buildDir: string;
  /** Build output the stage step merges from. */
  installDir: string;
  /** Overlay layer (changes on top of the base + dependency layers). */
  layerDir: string;
  /** Scratch directory holding the materialised overlay view. */
  viewDir: string;
  /** Generated step scripts. */
  runDir: string;
  /** Persisted step states. */
  stateDir: string;
}

export function workspacePaths(workDir: string): WorkspacePaths {
  const root = resolve(workDir);
  const stateDir = join(root, 'state');
  return {
    workDir: root,
    partsDir: join(root, 'parts'),
    stageDir: join(root, 'stage'),
    primeDir: join(root, 'prime'),
    overlayDir: join(root, 'overlay'),
    stateDir,
    ownershipDir: join(stateDir, 'ownership'),
    journalPath: join(root, 'journal.jsonl')
  };
}

export function partPaths(ws: WorkspacePaths, partName: string): PartPaths {
  const partDir = join(ws.partsDir, partName);
  return {
    partDir,
    srcDir: join(partDir, 'src'),
    buildDir: join(partDir, 'build'),
    installDir: join(partDir, 'install'),
    layerDir: join(partDir, 'layer'),
    viewDir: join(partDir, 'view'),
    runDir: join(partDir, 'run'),
    stateDir: join(partDir, 'state')
  };
}

export function sharedAreaDir(ws: WorkspacePaths, area: SharedArea): string {
  switch (area) {
    case 'stage':
      return ws.stageDir;
    case 'prime':
      return ws.primeDir;
    case 'overlay':
      return ws.overlayDir;
  }
}

export function stateFilePath(ws: WorkspacePaths, partName: string, step: Step): string {
  return join(partPaths(ws, partName).stateDir, `${step}.json`);
}

export async function initWorkspace(workDir: string): Promise<WorkspacePaths> {
  const ws = workspacePaths(workDir);
  await mkdir(ws.partsDir, { recursive: true });
  await mkdir(ws.stageDir, { recursive: true });
  await mkdir(ws.primeDir, { recursive: true });
  await mkdir(ws.ownershipDir, { recursive: true });
  return ws;
}
