import { z } from 'zod';

import { shellJoin, shellQuote } from '../../utils/shell.js';
import type { PartDefinition } from '../parts/types.js';
import { parsePluginProperties } from './properties.js';
import type { Plugin, PluginContext } from './types.js';

export const MakeProperties = z
  .object({
    /** Extra arguments passed to both `make` invocations. */
    'make-parameters': z.array(z.string()).default([])
  })
  .strict();

export type MakeProperties = z.infer<typeof MakeProperties>;

/**
 * Builds Makefile-driven parts: `make` followed by `make install` into the part's install
 * directory through `DESTDIR`.
 */
export class MakePlugin implements Plugin {
  readonly kind = 'make';

  validateProperties(part: PartDefinition): void {
    parsePluginProperties(MakeProperties, part);
  }

  getPullCommands(): string[] {
    return [];
  }

  getBuildCommands(part: PartDefinition, ctx: PluginContext): string[] {
    const props = parsePluginProperties(MakeProperties, part);
    return [
      this.makeCommand(ctx, [], props['make-parameters']),
      `${this.makeCommand(ctx, ['install'], props['make-parameters'])} DESTDIR=${shellQuote(ctx.dirs.installDir)}`
    ];
  }

  getBuildEnvironment(): Record<string, string> {
    return {};
  }

  private makeCommand(ctx: PluginContext, targets: string[], parameters: string[]): string {
    return ['make', `-j${ctx.parallelBuildCount}`, ...[targets, parameters].map((words) => shellJoin(words)).filter(Boolean)].join(' ');
  }
}
