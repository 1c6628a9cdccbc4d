import { describe, expect, it } from 'vitest';

import { actionLine, formatMs, partColumnWidth, statusLine, stripAnsi } from '../src/cli/ui/format.js';

describe('formatMs', () => {
  it('picks a compact unit', () => {
    expect(formatMs(124)).toBe('124ms');
    expect(formatMs(3_200)).toBe('3.2s');
    expect(formatMs(102_000)).toBe('1m 42s');
    expect(formatMs(120_000)).toBe('2m');
    expect(formatMs(8_100_000)).toBe('2h 15m');
  });
});

describe('plan and status lines', () => {
  it('aligns part and step columns', () => {
    const line = actionLine({ part: 'libfoo', step: 'build', reason: 'never-run', type: 'run', detail: 'never run' });
    expect(stripAnsi(line)).toBe('  libfoo          build    never-run  (never run)');
  });

  it('omits a detail that only repeats the reason', () => {
    const line = actionLine({ part: 'app', step: 'prime', reason: 'forced', type: 'rerun', detail: 'forced' }, 6);
    expect(stripAnsi(line)).toBe('  app   prime    forced');
  });

  it('shows why a step is dirty', () => {
    const line = statusLine({ part: 'app', step: 'stage', status: 'dirty', reason: 'dependency-changed', detail: "stage for part 'lib' will run" }, 6);
    expect(stripAnsi(line)).toBe("  app   stage    dirty  (stage for part 'lib' will run)");
  });

  it('widens the part column for long names', () => {
    expect(partColumnWidth(['x'])).toBe(16);
    expect(partColumnWidth(['a-very-long-part-name'])).toBe(23);
  });
});
