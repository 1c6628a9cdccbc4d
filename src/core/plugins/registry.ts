import type { Plugin } from './types.js';
import { DumpPlugin } from './dump.js';
import { MakePlugin } from './make.js';
import { NilPlugin } from './nil.js';

/** Maps a part's declared build-system kind to the plugin that describes its commands. */
export class PluginRegistry {
  private readonly plugins = new Map<string, Plugin>();

  constructor(plugins: Iterable<Plugin> = []) {
    for (const p of plugins) this.register(p);
  }

  static withBuiltins(): PluginRegistry {
    return new PluginRegistry([new NilPlugin(), new DumpPlugin(), new MakePlugin()]);
  }

  /** Registers `plugin`, replacing any plugin of the same kind. */
  register(plugin: Plugin): this {
    this.plugins.set(plugin.kind, plugin);
    return this;
  }

  resolve(kind: string): Plugin | undefined {
    return this.plugins.get(kind);
  }

  has(kind: string): boolean {
    return this.plugins.has(kind);
  }

  kinds(): string[] {
    return [...this.plugins.keys()].sort();
  }
}
