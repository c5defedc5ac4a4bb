import type { FastifyBaseLogger } from 'fastify';
import { TIMINGS } from '../config.js';

export type PaymentLockOptions = {
  logger: FastifyBaseLogger;
  staleMs?: number;
};

/**
 * Process-wide single-flight guard for the physical payment terminal.
 *
 * A holder that keeps the lock past `staleMs` is treated as dead: the next
 * `acquire()` force-releases it and takes it over.
 */
export class PaymentLock {
  private readonly log: FastifyBaseLogger;
  private readonly staleMs: number;
  private acquiredAtMs: number | null = null;

  constructor(opts: PaymentLockOptions) {
    this.log = opts.logger;
    this.staleMs = opts.staleMs ?? TIMINGS.paymentLockTimeoutMs;
  }

  acquire(): boolean {
    const now = Date.now();

    if (this.acquiredAtMs !== null) {
      const heldForMs = now - this.acquiredAtMs;
      if (heldForMs <= this.staleMs) {
        this.log.info({ heldForMs }, 'payment already in progress');
        return false;
      }
      this.log.warn({ heldForMs, staleMs: this.staleMs }, 'payment lock expired, force releasing');
      this.release();
    }

    this.acquiredAtMs = now;
    return true;
  }

  release(): void {
    this.acquiredAtMs = null;
  }

  get isHeld(): boolean {
    return this.acquiredAtMs !== null;
  }

  get heldSinceMs(): number | null {
    return this.acquiredAtMs;
  }
}
