/**
 * Signal Guard: turns SIGINT, SIGTERM and SIGHUP into one clean shutdown.
 *
 * The first signal runs the cleanup callback and then exits with
 * 128 + signal number. Signals arriving while cleanup runs are ignored.
 */

import { errorMessage } from './errors.js';

export type TerminationSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export const SIGNAL_EXIT_CODES: Record<TerminationSignal, number> = {
  SIGINT: 130,
  SIGTERM: 143,
  SIGHUP: 129,
};

const TERMINATION_SIGNALS: readonly TerminationSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** The subset of `process` the guard listens on */
export interface SignalSource {
  on(event: TerminationSignal, listener: () => void): unknown;
  removeListener(event: TerminationSignal, listener: () => void): unknown;
}

export interface SignalGuardOptions {
  source?: SignalSource;
  exit?: (code: number) => void;
  /** Reports a failure inside the cleanup callback */
  onError?: (message: string) => void;
}

export interface SignalGuard {
  /** The signal received, once one has arrived */
  readonly interrupted: TerminationSignal | null;
  dispose(): void;
}

export function installSignalGuard(
  cleanup: (signal: TerminationSignal, exitCode: number) => Promise<void>,
  options: SignalGuardOptions = {},
): SignalGuard {
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const onError = options.onError ?? ((message: string) => console.error(message));

  let received: TerminationSignal | null = null;
  const listeners = new Map<TerminationSignal, () => void>();

  const dispose = () => {
    for (const [signal, listener] of listeners) {
      source.removeListener(signal, listener);
    }
    listeners.clear();
  };

  for (const signal of TERMINATION_SIGNALS) {
    const listener = () => {
      if (received !== null) return;
      received = signal;
      const exitCode = SIGNAL_EXIT_CODES[signal];

      void cleanup(signal, exitCode)
        .catch(error => onError(`Cleanup after ${signal} failed: ${errorMessage(error)}`))
        .finally(() => {
          dispose();
          exit(exitCode);
        });
    };
    listeners.set(signal, listener);
    source.on(signal, listener);
  }

  return {
    get interrupted() {
      return received;
    },
    dispose,
  };
}
