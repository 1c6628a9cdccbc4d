import ora, { type Ora } from 'ora';

// ── TTY-Aware Spinner ───────────────────────────────────────────────────────
// Wraps `ora` with a consistent API. Falls back to static lines in non-TTY
// contexts (CI, piped output). Writes to stderr to keep stdout clean.

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  stop(): void;
}

export function startSpinner(text: string): SpinnerHandle {
  const stream = process.stderr;
  // Verbose runs log to stderr between frames, which garbles an animated spinner.
  const verbose = process.env.PARTWRIGHT_VERBOSE === '1';

  if (!stream.isTTY || verbose) {
    stream.write(`  ${text}\n`);
    return {
      update(t: string) {
        stream.write(`  ${t}\n`);
      },
      succeed(t?: string) {
        if (t) stream.write(`  ✔ ${t}\n`);
      },
      fail(t?: string) {
        if (t) stream.write(`  ✖ ${t}\n`);
      },
      warn(t?: string) {
        if (t) stream.write(`  ⚠ ${t}\n`);
      },
      stop() {
        // static mode
      }
    };
  }

  // `ora` turns itself off under CI=1; a TTY is enough here.
  const spinner: Ora = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();

  return {
    update(t: string) {
      spinner.text = t;
    },
    succeed(t?: string) {
      spinner.succeed(t ?? spinner.text);
    },
    fail(t?: string) {
      spinner.fail(t ?? spinner.text);
    },
    warn(t?: string) {
      spinner.warn(t ?? spinner.text);
    },
    stop() {
      spinner.stop();
    }
  };
}
