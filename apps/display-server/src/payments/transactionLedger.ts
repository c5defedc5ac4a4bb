import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';

export type TransactionStatus = 'processing' | 'completed' | 'failed' | 'cancelled' | 'pending_verification';

export type TransactionState = {
  transactionId: string;
  deviceId: string;
  amount: number;
  status: TransactionStatus;
  startedAt: Date;
  result: Record<string, unknown> | null;
  completedAt: Date | null;
};

export type TransactionSnapshot = {
  transactionId: string;
  deviceId: string;
  amount: number;
  status: TransactionStatus;
  startedAt: string;
  result: Record<string, unknown> | null;
  completedAt: string | null;
};

const TERMINAL_STATUSES: ReadonlySet<TransactionStatus> = new Set(['completed', 'failed', 'cancelled']);

export function isTerminalStatus(status: TransactionStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function toSnapshot(tx: TransactionState): TransactionSnapshot {
  return {
    transactionId: tx.transactionId,
    deviceId: tx.deviceId,
    amount: tx.amount,
    status: tx.status,
    startedAt: tx.startedAt.toISOString(),
    result: tx.result,
    completedAt: tx.completedAt?.toISOString() ?? null,
  };
}

/**
 * In-flight payment records, one per device.
 *
 * Records outlive the connection that started them so a device that drops
 * mid-payment is told the real outcome when it reconnects.
 */
export class TransactionLedger {
  private readonly log: FastifyBaseLogger;
  private readonly byDevice = new Map<string, TransactionState>();

  constructor(opts: { logger: FastifyBaseLogger }) {
    this.log = opts.logger;
  }

  begin(deviceId: string, amount: number): TransactionState {
    const previous = this.byDevice.get(deviceId);
    if (previous) {
      this.log.warn(
        { deviceId, transactionId: previous.transactionId, status: previous.status },
        'superseding previous transaction record',
      );
    }

    const tx: TransactionState = {
      transactionId: randomUUID(),
      deviceId,
      amount,
      status: 'processing',
      startedAt: new Date(),
      result: null,
      completedAt: null,
    };
    this.byDevice.set(deviceId, tx);
    return tx;
  }

  get(deviceId: string): TransactionState | null {
    return this.byDevice.get(deviceId) ?? null;
  }

  /**
   * Records a status change for the device's current transaction. Updates that name
   * a different transaction id are ignored so a late callback cannot touch its successor.
   */
  setStatus(
    deviceId: string,
    transactionId: string,
    status: TransactionStatus,
    result?: Record<string, unknown>,
  ): TransactionState | null {
    const tx = this.byDevice.get(deviceId);
    if (!tx || tx.transactionId !== transactionId) return null;

    tx.status = status;
    if (result !== undefined) tx.result = result;
    if (isTerminalStatus(status)) tx.completedAt = new Date();
    return tx;
  }

  /** Flags a `processing` record whose device vanished; other statuses are left alone. */
  markPendingVerification(deviceId: string): TransactionState | null {
    const tx = this.byDevice.get(deviceId);
    if (!tx || tx.status !== 'processing') return null;

    tx.status = 'pending_verification';
    this.log.warn(
      { deviceId, transactionId: tx.transactionId, amount: tx.amount },
      'transaction marked for verification after disconnect',
    );
    return tx;
  }

  clear(deviceId: string, transactionId?: string): boolean {
    const tx = this.byDevice.get(deviceId);
    if (!tx) return false;
    if (transactionId !== undefined && tx.transactionId !== transactionId) return false;
    return this.byDevice.delete(deviceId);
  }

  list(): TransactionSnapshot[] {
    return [...this.byDevice.values()].map(toSnapshot);
  }
}
