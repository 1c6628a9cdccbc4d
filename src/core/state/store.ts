import { readdir, rm } from 'node:fs/promises';

import { isNotFound, readJson, writeJsonAtomic } from '../../utils/fs.js';
import { quietLogger, type Logger } from '../../utils/logger.js';
import { partPaths, stateFilePath, type WorkspacePaths } from '../../workspace/layout.js';
import { StateCorruptionError } from '../errors.js';
import { isStep, type Step } from '../steps.js';
import { STATE_FORMAT_VERSION, StepStateSchema, type DirtyMarker, type StepState } from './types.js';

/**
 * One JSON record per (part, step) under `parts/<name>/state/<step>.json`.
 *
 * Writes go through a temp file and a rename, so readers see the previous record or the new
 * one. Anything unreadable is reported as a warning and read as "never run".
 */
export class StateStore {
  constructor(
    private readonly ws: WorkspacePaths,
    private readonly logger: Logger = quietLogger()
  ) {}

  async get(part: string, step: Step): Promise<StepState | null> {
    const { state, warnings } = await this.readSafe(part, step);
    for (const w of warnings) this.logger.warn(w, { part, step });
    return state;
  }

  async readSafe(part: string, step: Step): Promise<{ state: StepState | null; warnings: string[] }> {
    const path = stateFilePath(this.ws, part, step);
    let raw: unknown;
    try {
      raw = await readJson(path);
    } catch (err) {
      if (isNotFound(err)) return { state: null, warnings: [] };
      const reason = err instanceof Error ? err.message : String(err);
      return { state: null, warnings: [new StateCorruptionError(path, reason).toString()] };
    }

    try {
      return { state: parseState(path, raw, part, step), warnings: [] };
    } catch (err) {
      if (err instanceof StateCorruptionError) return { state: null, warnings: [err.toString()] };
      throw err;
    }
  }

  async put(state: StepState): Promise<void> {
    const parsed = StepStateSchema.parse(state);
    await writeJsonAtomic(stateFilePath(this.ws, parsed.part, parsed.step), parsed);
  }

  /** Remove the record; the step reads as never run afterwards. */
  async invalidate(part: string, step: Step): Promise<void> {
    await rm(stateFilePath(this.ws, part, step), { force: true });
  }

  /**
   * Flag a recorded step as dirty while keeping its ownership information, so a later rerun can
   * still clean what the step placed in the shared areas. Returns `false` when nothing is recorded.
   */
  async markDirty(part: string, step: Step, marker: DirtyMarker): Promise<boolean> {
    const state = await this.get(part, step);
    if (!state) return false;
    if (state.dirty) return true;
    await this.put({ ...state, dirty: marker });
    return true;
  }

  /** Steps with a readable record for `part`. */
  async recordedSteps(part: string): Promise<Step[]> {
    let names: string[];
    try {
      names = await readdir(partPaths(this.ws, part).stateDir);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const steps = names.filter((n) => n.endsWith('.json')).map((n) => n.slice(0, -'.json'.length));
    return steps.filter(isStep);
  }
}

function parseState(path: string, raw: unknown, part: string, step: Step): StepState {
  if (!raw || typeof raw !== 'object' || !('version' in raw)) {
    throw new StateCorruptionError(path, 'missing format version');
  }
  if (raw.version !== STATE_FORMAT_VERSION) {
    throw new StateCorruptionError(path, `unknown state format version ${JSON.stringify(raw.version)}`);
  }
  const parsed = StepStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateCorruptionError(path, parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '));
  }
  if (parsed.data.part !== part || parsed.data.step !== step) {
    throw new StateCorruptionError(path, `record belongs to ${parsed.data.part}:${parsed.data.step}`);
  }
  return parsed.data;
}
