export interface RunIdParts {
  yyyyMMdd: string; // YYYYMMDD
  nnn: string; // 3 digits
}

export function formatRunId(parts: RunIdParts): string {
  return `r-${parts.yyyyMMdd}-${parts.nnn}`;
}

export function parseRunId(runId: string): RunIdParts | null {
  const m = /^r-(\d{8})-(\d{3})$/.exec(runId);
  if (!m) return null;
  return { yyyyMMdd: m[1], nnn: m[2] };
}

/**
 * Run ids are sequential per UTC day. The generator is seeded with the last id found in the
 * journal so ids stay unique across process restarts.
 */
export class RunIdGenerator {
  private currentDate: string | null = null;
  private seq = 0;

  constructor(lastRunId?: string | null) {
    const parsed = lastRunId ? parseRunId(lastRunId) : null;
    if (parsed) {
      this.currentDate = parsed.yyyyMMdd;
      this.seq = Number(parsed.nnn);
    }
  }

  next(now: Date = new Date()): string {
    const yyyyMMdd = formatDate(now);
    if (this.currentDate !== yyyyMMdd) {
      this.currentDate = yyyyMMdd;
      this.seq = 0;
    }
    this.seq += 1;
    return formatRunId({ yyyyMMdd, nnn: String(this.seq).padStart(3, '0') });
  }
}

function formatDate(d: Date): string {
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(d.getUTCDate()).padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}
