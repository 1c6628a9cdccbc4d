import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { isNotFound } from '../../utils/fs.js';
import { JournalEntrySchema, type JournalEntry, type JournalEntryInput } from './types.js';

/** Append-only JSONL record of runs. Each entry gets the next `seq`; appends never interleave. */
export class JournalWriter {
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly journalPath: string,
    private nextSeq: number
  ) {}

  static async open(journalPath: string): Promise<JournalWriter> {
    await mkdir(dirname(journalPath), { recursive: true });
    return new JournalWriter(journalPath, await computeNextSeq(journalPath));
  }

  async append(event: JournalEntryInput): Promise<JournalEntry> {
    const write = this.queue.then(() => this.write(event));
    this.queue = write.then(
      () => undefined,
      () => undefined
    );
    return await write;
  }

  private async write(event: JournalEntryInput): Promise<JournalEntry> {
    const entry = JournalEntrySchema.parse({
      ...event,
      seq: this.nextSeq,
      timestamp: new Date().toISOString()
    });

    const fh = await open(this.journalPath, 'a');
    try {
      await fh.writeFile(`${JSON.stringify(entry)}\n`, 'utf8');
      await fh.sync();
    } finally {
      await fh.close();
    }

    this.nextSeq += 1;
    return entry;
  }
}

async function computeNextSeq(journalPath: string): Promise<number> {
  let content: string;
  try {
    content = await readFile(journalPath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) return 1;
    throw err;
  }

  const lines = content
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  // A crash mid-append can leave a partial last line; use the last parsable one.
  for (let i = lines.length - 1; i >= 0; i--) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(lines[i]);
    } catch {
      continue;
    }
    if (parsed && typeof parsed === 'object' && 'seq' in parsed && typeof parsed.seq === 'number' && Number.isFinite(parsed.seq)) {
      return parsed.seq + 1;
    }
  }
  return 1;
}
