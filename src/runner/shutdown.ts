/**
 * Graceful shutdown handler.
 *
 * SIGINT and SIGTERM both cancel the run's token. The running sequence
 * notices at its next checkpoint; nothing is aborted here.
 */
import { consoleOutput, type Output } from '../lib/output.js';
import { debug } from '../lib/utils/debug.js';
import type { CancellationToken } from './cancellation.js';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Where signals arrive from; `process` in production */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export const INTERRUPT_MESSAGE = '[INFO] Received interrupt signal, shutting down gracefully...';

/** Install signal handlers for a run. Returns a function that removes them. */
export function installShutdownHandlers(
  token: CancellationToken,
  output: Output = consoleOutput,
  source: SignalSource = process,
): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (!token.cancel(signal)) {
      debug('shutdown', `${signal} ignored, stop already requested (${token.reason})`);
      return;
    }
    output.log();
    output.log(INTERRUPT_MESSAGE);
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    source.on(signal, onSignal);
  }

  return () => {
    for (const signal of SHUTDOWN_SIGNALS) {
      source.off(signal, onSignal);
    }
  };
}
