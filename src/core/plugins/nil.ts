import { z } from 'zod';

import type { PartDefinition } from '../parts/types.js';
import { parsePluginProperties } from './properties.js';
import type { Plugin } from './types.js';

const NilProperties = z.object({}).strict();

/** Does nothing on its own; parts rely on overrides and dependencies. */
export class NilPlugin implements Plugin {
  readonly kind = 'nil';

  validateProperties(part: PartDefinition): void {
    parsePluginProperties(NilProperties, part);
  }

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
