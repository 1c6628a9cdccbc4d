import type { Action } from '../../core/actions.js';
import type { StepStatus } from '../../core/planner.js';
import { actionLine, formatMs, horizontalRule, partColumnWidth, statusLine } from './format.js';
import { startSpinner, type SpinnerHandle } from './spinner.js';
import { theme, INDENT } from './theme.js';

// ── Renderer Interface ──────────────────────────────────────────────────────

/**
 * Single output coordinator for the CLI. Human-facing output goes to stderr; `result` writes
 * machine-readable JSON to stdout for `--json`.
 *
 * - InteractiveRenderer: colours and spinners on a TTY
 * - QuietRenderer: one JSON object per line (--quiet)
 */
export interface Renderer {
  heading(title: string): void;
  actions(actions: readonly Action[]): void;
  statuses(statuses: readonly StepStatus[]): void;

  actionStarted(action: Action): void;
  actionCompleted(action: Action, durationMs: number): void;
  actionFailed(action: Action, durationMs: number, brief: string): void;

  error(title: string, details: string, tip?: string): void;
  warn(message: string): void;
  spinner(message: string): SpinnerHandle;

  result(value: unknown): void;
  text(message: string): void;
  success(message: string): void;
}

// ── Interactive Renderer ────────────────────────────────────────────────────

export class InteractiveRenderer implements Renderer {
  private active: SpinnerHandle | null = null;

  private writeln(msg: string = ''): void {
    process.stderr.write(msg + '\n');
  }

  heading(title: string): void {
    this.writeln(`${INDENT}${theme.bold(title)}`);
    this.writeln(`${INDENT}${horizontalRule()}`);
  }

  actions(actions: readonly Action[]): void {
    if (actions.length === 0) {
      this.writeln(`${INDENT}${theme.dim('(nothing to do)')}`);
      return;
    }
    const width = partColumnWidth(actions.map((a) => a.part));
    for (const a of actions) this.writeln(actionLine(a, width));
  }

  statuses(statuses: readonly StepStatus[]): void {
    const width = partColumnWidth(statuses.map((s) => s.part));
    for (const s of statuses) this.writeln(statusLine(s, width));
  }

  actionStarted(action: Action): void {
    this.active?.stop();
    this.active = this.spinner(`${action.step} ${theme.part(action.part)}`);
  }

  actionCompleted(action: Action, durationMs: number): void {
    const text = `${action.step} ${theme.part(action.part)} ${theme.dim(formatMs(durationMs))}`;
    if (this.active) {
      this.active.succeed(text);
      this.active = null;
    } else {
      this.writeln(`${INDENT}${theme.check} ${text}`);
    }
  }

  actionFailed(action: Action, durationMs: number, brief: string): void {
    const text = `${action.step} ${theme.part(action.part)} ${theme.dim(formatMs(durationMs))}`;
    if (this.active) {
      this.active.fail(text);
      this.active = null;
    } else {
      this.writeln(`${INDENT}${theme.cross} ${text}`);
    }
    this.writeln(`${INDENT}${INDENT}${theme.dim(brief)}`);
  }

  error(title: string, details: string, tip?: string): void {
    this.writeln();
    this.writeln(`${INDENT}${theme.error(theme.bold('ERROR'))}  ${title}`);
    if (details) {
      this.writeln();
      for (const line of details.split('\n')) this.writeln(`${INDENT}${line}`);
    }
    if (tip) {
      this.writeln();
      this.writeln(`${INDENT}${theme.dim('Tip:')} ${tip}`);
    }
    this.writeln();
  }

  warn(message: string): void {
    this.writeln(`${INDENT}${theme.warning('⚠')} ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    return startSpinner(message);
  }

  result(value: unknown): void {
    process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
  }

  text(message: string): void {
    this.writeln(message);
  }

  success(message: string): void {
    this.writeln(`${INDENT}${theme.check} ${message}`);
  }
}

// ── Quiet Renderer (JSON lines) ─────────────────────────────────────────────

export class QuietRenderer implements Renderer {
  private emit(type: string, data: Record<string, unknown> = {}): void {
    const event = { type, timestamp: new Date().toISOString(), ...data };
    process.stderr.write(JSON.stringify(event) + '\n');
  }

  heading(): void { /* no-op */ }

  actions(actions: readonly Action[]): void {
    this.emit('plan', { actions });
  }

  statuses(statuses: readonly StepStatus[]): void {
    this.emit('status', { statuses });
  }

  actionStarted(action: Action): void {
    this.emit('action_started', { part: action.part, step: action.step, reason: action.reason });
  }

  actionCompleted(action: Action, durationMs: number): void {
    this.emit('action_completed', { part: action.part, step: action.step, durationMs });
  }

  actionFailed(action: Action, durationMs: number, brief: string): void {
    this.emit('action_failed', { part: action.part, step: action.step, durationMs, error: brief });
  }

  error(title: string, details: string, tip?: string): void {
    this.emit('error', { title, details, tip });
  }

  warn(message: string): void {
    this.emit('warning', { message });
  }

  spinner(message: string): SpinnerHandle {
    this.emit('progress', { message });
    return {
      update: () => {},
      succeed: () => {},
      fail: () => {},
      warn: () => {},
      stop: () => {}
    };
  }

  result(value: unknown): void {
    process.stdout.write(`${JSON.stringify(value)}\n`);
  }

  text(message: string): void {
    this.emit('text', { message });
  }

  success(message: string): void {
    this.emit('success', { message });
  }
}

// ── Factory ─────────────────────────────────────────────────────────────────

let _instance: Renderer | null = null;

/** The global renderer; interactive unless `createRenderer` or `setRenderer` said otherwise. */
export function getRenderer(): Renderer {
  _instance ??= new InteractiveRenderer();
  return _instance;
}

/** Override the global renderer (tests). */
export function setRenderer(renderer: Renderer): void {
  _instance = renderer;
}

export function createRenderer(opts: { quiet?: boolean } = {}): Renderer {
  const r = opts.quiet ? new QuietRenderer() : new InteractiveRenderer();
  _instance = r;
  return r;
}
