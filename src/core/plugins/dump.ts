import { z } from 'zod';

import { shellQuote } from '../../utils/shell.js';
import type { PartDefinition } from '../parts/types.js';
import { parsePluginProperties } from './properties.js';
import type { Plugin, PluginContext } from './types.js';

const DumpProperties = z.object({}).strict();

/** Copies the part's sources as-is into its install directory. */
export class DumpPlugin implements Plugin {
  readonly kind = 'dump';

  validateProperties(part: PartDefinition): void {
    parsePluginProperties(DumpProperties, part);
  }

  getPullCommands(): string[] {
    return [];
  }

  getBuildCommands(_part: PartDefinition, ctx: PluginContext): string[] {
    return [`cp -R -P -p ./. ${shellQuote(ctx.dirs.installDir)}/`];
  }

  getBuildEnvironment(): Record<string, string> {
    return {};
  }
}
