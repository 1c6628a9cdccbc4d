import type { z } from 'zod';

import { PluginPropertyError } from '../errors.js';
import type { PartDefinition } from '../parts/types.js';

/** Parse a part's properties with a plugin schema, turning zod issues into a `PluginPropertyError`. */
export function parsePluginProperties<T extends z.ZodTypeAny>(schema: T, part: PartDefinition): z.infer<T> {
  const parsed = schema.safeParse(part.properties);
  if (parsed.success) return parsed.data;
  const problems = parsed.error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : 'properties';
    return `${where}: ${issue.message}`;
  });
  throw new PluginPropertyError(part.name, problems);
}
