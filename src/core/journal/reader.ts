import { readFile } from 'node:fs/promises';

import { isNotFound } from '../../utils/fs.js';
import { JournalEntrySchema, type JournalEntry, type JournalEventType } from './types.js';

export class JournalReader {
  constructor(private readonly journalPath: string) {}

  async readAll(): Promise<JournalEntry[]> {
    const { entries } = await this.readAllSafe();
    return entries;
  }

  /** Unparsable lines are skipped and reported instead of failing the read. */
  async readAllSafe(): Promise<{ entries: JournalEntry[]; warnings: string[] }> {
    const warnings: string[] = [];
    const entries: JournalEntry[] = [];

    const lines = await readJsonlLines(this.journalPath);
    for (let i = 0; i < lines.length; i++) {
      const isLast = i === lines.length - 1;
      try {
        entries.push(JournalEntrySchema.parse(JSON.parse(lines[i])));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        warnings.push(`journal parse failed at line ${i + 1}${isLast ? ' (last line)' : ''}: ${message}`);
      }
    }

    return { entries, warnings };
  }

  async tail(n: number): Promise<JournalEntry[]> {
    const entries = await this.readAll();
    return entries.slice(Math.max(0, entries.length - n));
  }

  async findByType(type: JournalEventType): Promise<JournalEntry[]> {
    const entries = await this.readAll();
    return entries.filter((e) => e.type === type);
  }

  /** Id of the most recent run, used to seed the run id sequence. */
  async lastRunId(): Promise<string | null> {
    const entries = await this.findByType('run_started');
    return entries.at(-1)?.runId ?? null;
  }

  async verifyIntegrity(): Promise<{ ok: boolean; message?: string }> {
    const { entries, warnings } = await this.readAllSafe();
    if (warnings.length) return { ok: false, message: warnings.join('\n') };
    for (let i = 0; i < entries.length; i++) {
      const expected = i + 1;
      if (entries[i].seq !== expected) {
        return { ok: false, message: `Sequence gap at index ${i} (expected seq=${expected}, got ${entries[i].seq})` };
      }
    }
    return { ok: true };
  }
}

async function readJsonlLines(path: string): Promise<string[]> {
  try {
    const content = await readFile(path, 'utf8');
    return content
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}
