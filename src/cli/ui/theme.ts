import chalk, { type ChalkInstance } from 'chalk';

import type { ActionReason } from '../../core/actions.js';
import type { StepStatusKind } from '../../core/planner.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  bold: chalk.bold,
  dim: chalk.dim,

  warning: chalk.yellow,
  error: chalk.red,

  check: chalk.green('✔'),
  cross: chalk.red('✖'),

  part: chalk.cyan,
  step: chalk.bold,

  reason: (reason: ActionReason): ChalkInstance => {
    const map: Record<ActionReason, ChalkInstance> = {
      'never-run': chalk.white,
      'properties-changed': chalk.yellow,
      'dependency-changed': chalk.magenta,
      'downstream-invalidated': chalk.blue,
      forced: chalk.red
    };
    return map[reason];
  },

  status: (status: StepStatusKind): ChalkInstance => {
    if (status === 'valid') return chalk.green;
    if (status === 'dirty') return chalk.yellow;
    return chalk.dim;
  }
} as const;

// ── Layout Constants ────────────────────────────────────────────────────────

/** Default indent for nested content (two spaces). */
export const INDENT = '  ';

/** Width used for horizontal rules. */
export const RULE_WIDTH = 56;

/** Column width for part names in tables. */
export const PART_LABEL_WIDTH = 16;
