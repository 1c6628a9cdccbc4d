import type { SourceHandler } from '../plugins/types.js';
import { LocalSource } from './local.js';

export class SourceRegistry {
  private readonly handlers = new Map<string, SourceHandler>();

  constructor(handlers: Iterable<SourceHandler> = []) {
    for (const h of handlers) this.register(h);
  }

  static withBuiltins(): SourceRegistry {
    return new SourceRegistry([new LocalSource()]);
  }

  register(handler: SourceHandler): this {
    this.handlers.set(handler.type, handler);
    return this;
  }

  resolve(type: string): SourceHandler | undefined {
    return this.handlers.get(type);
  }

  types(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
