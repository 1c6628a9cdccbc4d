import type { PartDefinition } from '../parts/types.js';
import type { PartPaths } from '../../workspace/layout.js';

/**
 * Read-only view of the environment a plugin describes commands for. Plugins never execute
 * anything themselves; they only return commands and variables.
 */
export interface PluginContext {
  readonly partName: string;
  readonly dirs: Readonly<PartPaths>;
  readonly stageDir: string;
  readonly primeDir: string;
  readonly projectDir: string;
  readonly parallelBuildCount: number;
  readonly targetArch: string;
}

export interface Plugin {
  readonly kind: string;
  /** Property keys that affect the pull step. Other properties only invalidate build and later. */
  readonly pullProperties?: readonly string[];
  /** Throws `PluginPropertyError` when the part's properties do not fit this build system. */
  validateProperties(part: PartDefinition): void;
  /** Commands that fetch the sources. An empty list delegates to the part's source handler. */
  getPullCommands(part: PartDefinition, ctx: PluginContext): string[];
  getBuildCommands(part: PartDefinition, ctx: PluginContext): string[];
  getBuildEnvironment(part: PartDefinition, ctx: PluginContext): Record<string, string>;
}

/** Identifies a pulled source tree; folded into the pull step's fingerprint. */
export interface SourceSnapshot {
  identity: string;
  files: number;
}

export interface SourceHandler {
  readonly type: string;
  /**
   * Identity of the source as it would be pulled now (content hash, declared version...).
   * `null` when the source cannot be identified before pulling; the identity recorded by the last
   * pull then stands.
   */
  identify(part: PartDefinition, ctx: SourceContext): Promise<string | null>;
  pull(part: PartDefinition, ctx: SourceContext): Promise<SourceSnapshot>;
}

export interface SourceContext {
  readonly projectDir: string;
  /** Destination directory for the pulled sources. */
  readonly srcDir: string;
  /** The engine's work directory; never part of a pulled source. */
  readonly workDir: string;
  readonly signal?: AbortSignal;
}
