import type { Action } from '../../core/actions.js';
import type { StepStatus } from '../../core/planner.js';
import { theme, INDENT, PART_LABEL_WIDTH, RULE_WIDTH } from './theme.js';

// ── Time Formatting ─────────────────────────────────────────────────────────

/**
 * Format milliseconds into a compact human-readable string.
 * Examples: "124ms", "3.2s", "1m 42s", "2h 15m"
 */
export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) return String(ms);
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) return `${totalSeconds.toFixed(1)}s`;
  const m = Math.floor(totalSeconds / 60);
  const s = Math.round(totalSeconds % 60);
  if (m < 60) return s > 0 ? `${m}m ${s}s` : `${m}m`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return rm > 0 ? `${h}h ${rm}m` : `${h}h`;
}

// ── Table Alignment ─────────────────────────────────────────────────────────

export function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

export function horizontalRule(width: number = RULE_WIDTH): string {
  return theme.dim('─'.repeat(width));
}

/**
 * "  State       executing"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

// ── Actions ─────────────────────────────────────────────────────────────────

/**
 *   libfoo          build    never-run
 */
export function actionLine(action: Action, partWidth: number = PART_LABEL_WIDTH): string {
  const reason = theme.reason(action.reason)(action.reason);
  const detail = action.detail && action.detail !== action.reason ? theme.dim(`  (${action.detail})`) : '';
  return `${INDENT}${theme.part(padRight(action.part, partWidth))}${theme.step(padRight(action.step, 9))}${reason}${detail}`;
}

export function statusLine(status: StepStatus, partWidth: number = PART_LABEL_WIDTH): string {
  const label = theme.status(status.status)(status.status);
  const detail = status.detail ? theme.dim(`  (${status.detail})`) : '';
  return `${INDENT}${theme.part(padRight(status.part, partWidth))}${theme.step(padRight(status.step, 9))}${label}${detail}`;
}

export function partColumnWidth(names: readonly string[]): number {
  return Math.max(PART_LABEL_WIDTH, ...names.map((n) => n.length + 2));
}

// ── Helpers ─────────────────────────────────────────────────────────────────

export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1b\[[0-9;]*m/g, '');
}
