import { logger } from './logger.js';

/**
 * Cooperative interrupt flag shared by the ingestion and analysis loops.
 * Loops poll `isCancelled` between blocking steps; `sleep` wakes early on cancel.
 */
export class CancellationToken {
  private reason: string | null = null;
  private listeners = new Set<() => void>();

  get isCancelled(): boolean {
    return this.reason !== null;
  }

  get cancelReason(): string | null {
    return this.reason;
  }

  cancel(reason = 'interrupted'): void {
    if (this.reason !== null) return;
    this.reason = reason;
    for (const listener of this.listeners) {
      listener();
    }
    this.listeners.clear();
  }

  onCancel(listener: () => void): () => void {
    if (this.isCancelled) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0 || this.isCancelled) return Promise.resolve();
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve();
      }, ms);
      const unsubscribe = this.onCancel(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}

/**
 * First SIGINT/SIGTERM requests a graceful stop; a second one runs `onForce`.
 * Returns a disposer that removes the handlers.
 */
export function bindProcessSignals(token: CancellationToken, onForce: () => Promise<void>): () => void {
  const handler = (signal: NodeJS.Signals) => {
    if (!token.isCancelled) {
      logger.warn(`Received ${signal}, finishing current step and saving progress (send again to force quit)`);
      token.cancel(signal);
      return;
    }
    logger.warn(`Received ${signal} again, forcing shutdown`);
    void onForce().finally(() => process.exit(130));
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);

  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}
