/**
 * Interrupt handling: termination signals abort a shared AbortSignal so the
 * dispatcher can return and resources be released.
 */

/** Anything that delivers process signals; `process` is one. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface ShutdownHandle {
  /** Aborts on the first termination signal */
  readonly signal: AbortSignal;
  /** Stop listening for signals. */
  dispose(): void;
}

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Listen for termination signals until disposed.
 *
 * @example
 * ```typescript
 * const shutdown = listenForShutdown((signal) => logger.info(`received ${signal}`));
 * try {
 *   await dispatcher.run({ commands, signal: shutdown.signal });
 * } finally {
 *   shutdown.dispose();
 * }
 * ```
 */
export function listenForShutdown(
  onSignal?: (signal: NodeJS.Signals) => void,
  source: SignalSource = process,
  signals: readonly NodeJS.Signals[] = SHUTDOWN_SIGNALS
): ShutdownHandle {
  const controller = new AbortController();

  const listener = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      return;
    }
    onSignal?.(signal);
    controller.abort();
  };

  for (const signal of signals) {
    source.on(signal, listener);
  }

  return {
    signal: controller.signal,
    dispose() {
      for (const signal of signals) {
        source.off(signal, listener);
      }
    },
  };
}
