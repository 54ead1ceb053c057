import type { TokenStore } from '../services/token-store.js';
import type { RevocationPolicy } from '../services/revocation-policy.js';
import { DEFAULT_GC_INTERVAL_MS } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('gc');

export interface GarbageCollectorOptions {
  store: TokenStore;
  revocationPolicy: RevocationPolicy;
  intervalMs?: number;
}

export interface CollectionResult {
  families: number;
  revocations: number;
}

/**
 * Periodic removal of expired refresh families and blacklist entries
 *
 * Only rows that can no longer be used are deleted, so runs need no
 * coordination with grants or with other instances.
 */
export class GarbageCollector {
  private readonly store: TokenStore;
  private readonly revocationPolicy: RevocationPolicy;
  private readonly intervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<CollectionResult> | null = null;

  constructor(options: GarbageCollectorOptions) {
    this.store = options.store;
    this.revocationPolicy = options.revocationPolicy;
    this.intervalMs = options.intervalMs ?? DEFAULT_GC_INTERVAL_MS;
  }

  /**
   * Run one collection pass. Overlapping calls share the pass in flight.
   */
  runOnce(): Promise<CollectionResult> {
    if (!this.running) {
      this.running = this.collect().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        log.error('Garbage collection failed', { error });
      });
    }, this.intervalMs);

    // Prevent the interval from keeping the process alive
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  get started(): boolean {
    return this.timer !== null;
  }

  private async collect(): Promise<CollectionResult> {
    const [families, revocations] = await Promise.all([
      this.store.deleteExpired(),
      this.revocationPolicy.deleteExpired(),
    ]);

    if (families > 0 || revocations > 0) {
      log.info('Expired records deleted', { families, revocations });
    }

    return { families, revocations };
  }
}
