import { stat } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve, sep } from 'node:path';

import { hashTree, listTree, type ListTreeOptions } from '../../utils/tree.js';
import { migrateEntry } from '../../workspace/migration.js';
import { CancelledError } from '../errors.js';
import type { PartDefinition } from '../parts/types.js';
import type { SourceContext, SourceHandler, SourceSnapshot } from '../plugins/types.js';

const IGNORED_DIRS = ['.git', 'node_modules'] as const;

/**
 * Copies a directory from the project tree. The identity is a content hash, so editing a file in
 * the source directory invalidates the pull step. A work directory inside the source (`source: .`
 * with the default work dir) is left out of both.
 */
export class LocalSource implements SourceHandler {
  readonly type = 'local';

  async identify(part: PartDefinition, ctx: SourceContext): Promise<string | null> {
    const dir = this.locate(part, ctx);
    if (!dir || !(await isDirectory(dir))) return null;
    const { sha256 } = await hashTree(dir, treeOptions(dir, ctx));
    return part.source?.version ? `${part.source.version}:${sha256}` : sha256;
  }

  async pull(part: PartDefinition, ctx: SourceContext): Promise<SourceSnapshot> {
    const dir = this.locate(part, ctx);
    if (!dir) throw new Error(`part '${part.name}' has no source location`);
    if (!(await isDirectory(dir))) throw new Error(`source directory '${dir}' does not exist`);

    for (const entry of await listTree(dir, treeOptions(dir, ctx))) {
      if (ctx.signal?.aborted) throw new CancelledError();
      await migrateEntry(entry, join(dir, entry.path), join(ctx.srcDir, entry.path), { mode: 'copy' });
    }

    const { sha256, files } = await hashTree(ctx.srcDir, { ignore: IGNORED_DIRS });
    return { identity: part.source?.version ? `${part.source.version}:${sha256}` : sha256, files };
  }

  private locate(part: PartDefinition, ctx: SourceContext): string | null {
    const location = part.source?.location;
    if (!location) return null;
    return isAbsolute(location) ? location : resolve(ctx.projectDir, location);
  }
}

function treeOptions(dir: string, ctx: SourceContext): ListTreeOptions {
  const inside = relative(dir, resolve(ctx.workDir));
  const nested = inside !== '' && !inside.startsWith('..') && !isAbsolute(inside);
  return { ignore: IGNORED_DIRS, exclude: nested ? [inside.split(sep).join('/')] : [] };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}
