/**
 * core/signals.ts
 *
 * Turns operator interrupts into a cooperative cancellation signal.
 */

import { scopedLogger } from './logger';

const log = scopedLogger('core/signals');

export interface ShutdownSignal {
  signal: AbortSignal;
  /** Removes the process listeners. */
  dispose(): void;
}

export function shutdownSignal(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): ShutdownSignal {
  const controller = new AbortController();

  const dispose = (): void => {
    for (const name of signals) process.off(name, onSignal);
  };

  function onSignal(name: NodeJS.Signals): void {
    log.info({ signal: name }, 'Received shutdown signal, starting graceful shutdown');
    dispose();
    controller.abort(name);
  }

  for (const name of signals) process.on(name, onSignal);
  return { signal: controller.signal, dispose };
}

export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise(resolve => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
