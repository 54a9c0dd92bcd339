import type { Logger } from './logging/agent-logger';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/**
 * Anything shutdown signals arrive on; `process` in production
 */
export interface SignalSource {
  on(event: ShutdownSignal, listener: () => void): unknown;
  removeListener(event: ShutdownSignal, listener: () => void): unknown;
}

export interface Stoppable {
  shutdown(): Promise<void>;
}

/**
 * Route SIGINT and SIGTERM to `target.shutdown()`. Each signal triggers it
 * at most once; repeats are logged and ignored.
 *
 * Returns a function that removes the listeners again.
 */
export function registerShutdownSignals(
  target: Stoppable,
  logger: Logger,
  source: SignalSource = process,
): () => void {
  const handled = new Set<ShutdownSignal>();

  const handlers = SHUTDOWN_SIGNALS.map((signal) => {
    const handler = () => {
      if (handled.has(signal)) {
        logger.debug(`Received ${signal} again, already shutting down`);
        return;
      }
      handled.add(signal);
      logger.info(`Received ${signal}, shutting down gracefully`);
      target.shutdown().catch((error) => {
        logger.error('Error during shutdown', error);
        process.exitCode = 1;
      });
    };
    source.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      source.removeListener(signal, handler);
    }
  };
}
