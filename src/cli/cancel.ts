export type CancelSignal = 'SIGINT' | 'SIGTERM';

export interface InstalledCliCancellation {
  /** Flips on the first SIGINT/SIGTERM. */
  signal: AbortSignal;
  /** Number of cancellation triggers seen. */
  count: number;
  /** Remove the handlers. */
  dispose(): void;
}

/**
 * First SIGINT/SIGTERM aborts the returned signal so the running step is terminated and no
 * further actions start; a second one exits the process (130 for SIGINT, 143 for SIGTERM).
 */
export function installCliCancellation(
  opts: {
    onCancel?: (signal: CancelSignal) => void;
    exit?: (code: number) => void;
  } = {}
): InstalledCliCancellation {
  const controller = new AbortController();
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  let count = 0;
  let disposed = false;

  const trigger = (signal: CancelSignal) => {
    if (disposed) return;
    count += 1;

    if (count === 1) {
      controller.abort(signal);
      opts.onCancel?.(signal);
      return;
    }

    exit(signal === 'SIGTERM' ? 143 : 130);
  };

  const onSigint = () => trigger('SIGINT');
  const onSigterm = () => trigger('SIGTERM');

  // `on`, not `once`: a second press forces the exit.
  process.on('SIGINT', onSigint);
  process.on('SIGTERM', onSigterm);

  return {
    get signal() {
      return controller.signal;
    },
    get count() {
      return count;
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      process.off('SIGINT', onSigint);
      process.off('SIGTERM', onSigterm);
    }
  };
}
