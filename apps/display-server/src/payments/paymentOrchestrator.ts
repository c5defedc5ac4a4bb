import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { TIMINGS } from '../config.js';
import type { DisplayState } from '../display/displayState.js';
import { errorMessage, type ProtocolErrorCode } from '../errors.js';
import type { DeliveryQueue, OutboundMessage, SendOutcome } from '../messaging/deliveryQueue.js';
import { now, readNumber, readObject, readString } from '../protocol/frames.js';
import type { PaymentLock } from './paymentLock.js';
import { PROGRESS_STATUS, type PaymentTerminal, type TerminalEvent } from './terminal.js';
import type { TransactionLedger, TransactionStatus } from './transactionLedger.js';

export type StartPaymentResult =
  | { ok: true; transactionId: string; intentId: string }
  | { ok: false; code: ProtocolErrorCode; message: string };

type Outcome =
  | { status: 'completed'; result: Record<string, unknown> }
  | { status: 'failed'; message: string }
  | { status: 'cancelled' };

type ActivePurchase = {
  deviceId: string;
  intentId: string;
  transactionId: string;
  amount: number;
  orderNumber: unknown;
  outcome: Outcome['status'] | null;
  cancelRequested: boolean;
  recorded: Promise<void>;
  markRecorded: () => void;
};

export type PaymentOrchestratorDeps = {
  logger: FastifyBaseLogger;
  display: DisplayState;
  lock: PaymentLock;
  ledger: TransactionLedger;
  queue: DeliveryQueue;
  terminal: PaymentTerminal;
  /** Direct, unqueued write to a device (progress updates and validation errors). */
  notify: (deviceId: string, message: OutboundMessage) => SendOutcome;
  maxAmount: number;
  /** How long a cancel waits for the terminal to report an outcome before recording `cancelled` itself. */
  cancelGraceMs?: number;
};

/** Resolves `true` if `work` settles within `ms`, `false` otherwise. Never rejects. */
export async function settlesWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
    timer.unref();
  });
  try {
    return await Promise.race([work.then(() => true, () => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

function outcomeMessage(purchase: ActivePurchase, outcome: Outcome): OutboundMessage {
  switch (outcome.status) {
    case 'completed':
      return {
        type: 'PAYMENT_SUCCESS',
        data: {
          amount: purchase.amount,
          orderNumber: purchase.orderNumber,
          transaction: outcome.result,
          transactionId: purchase.transactionId,
          timestamp: now(),
        },
      };
    case 'failed':
      return { type: 'PAYMENT_FAILED', message: outcome.message, data: { transactionId: purchase.transactionId } };
    case 'cancelled':
      return { type: 'PAYMENT_CANCELLED', data: { transactionId: purchase.transactionId } };
  }
}

/**
 * Drives one card purchase at a time from `START_PAYMENT` to its outcome.
 *
 * Gating order: display mode, payload shape, amount range, then the payment
 * lock. Outcomes are written to the ledger first and then handed to the
 * delivery queue; the ledger record is cleared when the queue settles the
 * outcome as confirmed, however long that takes.
 *
 * A cancel asks the terminal to stop but keeps reading its events: an approval
 * that races the cancel is still recorded as `completed`.
 */
export class PaymentOrchestrator {
  private readonly deps: PaymentOrchestratorDeps;
  private readonly log: FastifyBaseLogger;
  private active: ActivePurchase | null = null;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly cancelGraceMs: number;

  constructor(deps: PaymentOrchestratorDeps) {
    this.deps = deps;
    this.log = deps.logger;
    this.cancelGraceMs = deps.cancelGraceMs ?? TIMINGS.paymentCancelGraceMs;
  }

  get activePurchase(): { deviceId: string; intentId: string; transactionId: string } | null {
    if (!this.active) return null;
    const { deviceId, intentId, transactionId } = this.active;
    return { deviceId, intentId, transactionId };
  }

  startPayment(deviceId: string, frame: Record<string, unknown>): StartPaymentResult {
    const { display, lock, ledger, maxAmount } = this.deps;

    if (display.currentMode !== 'CDS') {
      return this.reject(deviceId, 'ERR_007', 'Payment can only be processed in CDS mode');
    }

    const data = readObject(frame, 'data');
    if (!data) return this.reject(deviceId, 'ERR_004', 'Invalid payment data type');

    const amount = readNumber(data, 'amount');
    if (amount === null) return this.reject(deviceId, 'ERR_004', 'Invalid amount type');
    if (amount <= 0) return this.reject(deviceId, 'ERR_006', 'Amount must be positive');
    if (amount > maxAmount) return this.reject(deviceId, 'ERR_006', 'Amount exceeds maximum');

    if (!lock.acquire()) {
      return this.reject(deviceId, 'ERR_006', 'Another payment is already in progress');
    }

    const tx = ledger.begin(deviceId, amount);
    let markRecorded = (): void => undefined;
    const recorded = new Promise<void>((resolve) => {
      markRecorded = resolve;
    });
    const purchase: ActivePurchase = {
      deviceId,
      intentId: randomUUID(),
      transactionId: tx.transactionId,
      amount,
      orderNumber: data.orderNumber ?? null,
      outcome: null,
      cancelRequested: false,
      recorded,
      markRecorded,
    };
    this.active = purchase;
    display.startPayment(data);

    this.log.info(
      { deviceId, transactionId: tx.transactionId, intentId: purchase.intentId, amount },
      'payment started',
    );

    this.track(this.run(purchase, readString(data, 'orderNumber') ?? 'Unknown'));
    return { ok: true, transactionId: tx.transactionId, intentId: purchase.intentId };
  }

  /**
   * Cancels the device's running purchase. With nothing running, clears the
   * device's payment record and display overlay.
   */
  cancelPayment(deviceId: string): void {
    this.track(this.cancel(deviceId));
  }

  private async cancel(deviceId: string): Promise<void> {
    const purchase = this.active;
    if (!purchase || purchase.deviceId !== deviceId) {
      this.deps.ledger.clear(deviceId);
      this.deps.display.cancelPayment();
      return;
    }
    if (purchase.cancelRequested) return;

    purchase.cancelRequested = true;
    this.log.info({ deviceId, intentId: purchase.intentId }, 'payment cancel requested');
    this.track(this.requestTerminalCancel(purchase));

    if (await settlesWithin(purchase.recorded, this.cancelGraceMs)) return;

    this.log.warn(
      { deviceId, intentId: purchase.intentId, graceMs: this.cancelGraceMs },
      'terminal reported no outcome after cancel; recording cancellation',
    );
    await this.finish(purchase, { status: 'cancelled' });
  }

  private async requestTerminalCancel(purchase: ActivePurchase): Promise<void> {
    try {
      await this.deps.terminal.cancel(purchase.intentId);
    } catch (e) {
      this.log.warn({ err: e, intentId: purchase.intentId }, 'terminal cancel failed');
    }
  }

  /**
   * Cancels the running purchase and waits a bounded time for in-flight flows.
   * A terminal that never answers cannot hold shutdown open.
   */
  async stop(): Promise<void> {
    const purchase = this.active;
    if (purchase) this.cancelPayment(purchase.deviceId);

    if (!(await settlesWithin(this.whenIdle(), this.cancelGraceMs * 2))) {
      this.log.warn({ inFlight: this.inFlight.size }, 'payment flows still running at shutdown');
    }
  }

  /** Resolves once every purchase or cancellation started so far has settled and reported its outcome. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((e: unknown) => {
        this.log.error({ err: e }, 'payment flow crashed');
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private reject(deviceId: string, code: ProtocolErrorCode, message: string): StartPaymentResult {
    this.log.info({ deviceId, code }, `payment rejected: ${message}`);
    this.deps.notify(deviceId, { type: 'PAYMENT_FAILED', code, message: `${code}: ${message}`, timestamp: now() });
    return { ok: false, code, message };
  }

  private async run(purchase: ActivePurchase, customerReference: string): Promise<void> {
    const events = this.deps.terminal.purchase({
      intentId: purchase.intentId,
      amount: purchase.amount,
      customerReference,
    });

    try {
      for await (const event of events) {
        await this.onEvent(purchase, event);
        // A recorded cancellation keeps listening so a late approval is not lost.
        if (purchase.outcome !== null && purchase.outcome !== 'cancelled') break;
      }
    } catch (e) {
      this.log.error({ err: e, intentId: purchase.intentId }, 'payment terminal error');
      await this.finish(purchase, this.interrupted(purchase, errorMessage(e)));
      return;
    }

    if (purchase.outcome === null) {
      await this.finish(purchase, this.interrupted(purchase, 'Payment terminal ended without a result'));
    }
  }

  private interrupted(purchase: ActivePurchase, message: string): Outcome {
    return purchase.cancelRequested ? { status: 'cancelled' } : { status: 'failed', message };
  }

  private async onEvent(purchase: ActivePurchase, event: TerminalEvent): Promise<void> {
    switch (event.kind) {
      case 'reading_started':
      case 'waiting':
      case 'pin_entry': {
        if (purchase.outcome !== null) return;
        const status = PROGRESS_STATUS[event.kind];
        this.deps.display.updatePaymentStatus(status);
        this.deps.notify(purchase.deviceId, {
          type: 'PAYMENT_STATUS',
          data: { status, transactionId: purchase.transactionId },
          timestamp: now(),
        });
        return;
      }
      case 'approved':
        await this.finish(purchase, { status: 'completed', result: event.result });
        return;
      case 'declined':
        await this.finish(purchase, { status: 'failed', message: event.reason });
        return;
      case 'error':
        await this.finish(purchase, this.interrupted(purchase, event.message));
        return;
    }
  }

  private async finish(purchase: ActivePurchase, outcome: Outcome): Promise<void> {
    if (purchase.outcome !== null) {
      if (purchase.outcome !== 'cancelled' || outcome.status !== 'completed') return;
      this.log.error(
        { deviceId: purchase.deviceId, transactionId: purchase.transactionId, intentId: purchase.intentId },
        'terminal approved a purchase already recorded as cancelled; recording the approval',
      );
    }
    purchase.outcome = outcome.status;
    purchase.markRecorded();

    const { ledger, lock, display, queue } = this.deps;

    // Only the purchase that owns the lock may release it; a stale holder may have been force-released.
    if (this.active === purchase) {
      this.active = null;
      lock.release();
    }

    const status: TransactionStatus = outcome.status;
    const record = ledger.setStatus(
      purchase.deviceId,
      purchase.transactionId,
      status,
      outcome.status === 'completed' ? outcome.result : undefined,
    );
    if (!record) {
      this.log.warn(
        { deviceId: purchase.deviceId, transactionId: purchase.transactionId, status },
        'no ledger record left for this outcome',
      );
    }

    if (outcome.status === 'completed') display.setPaymentSuccess(outcome.result);
    else if (outcome.status === 'failed') display.setPaymentFailed(outcome.message);
    else display.cancelPayment();

    this.log.info(
      { deviceId: purchase.deviceId, transactionId: purchase.transactionId, status },
      'payment settled',
    );

    const confirmed = await queue.enqueue(outcomeMessage(purchase, outcome), {
      deviceId: purchase.deviceId,
      requireConfirmation: true,
      onSettled: (delivered) => this.outcomeSettled(purchase, status, delivered),
    });

    if (outcome.status === 'completed') {
      display.clearPayment();
      display.clearCart();
    }

    if (!confirmed) {
      this.log.info(
        { deviceId: purchase.deviceId, transactionId: purchase.transactionId, status },
        'payment outcome not confirmed yet; queue keeps retrying',
      );
    }
  }

  private outcomeSettled(purchase: ActivePurchase, status: TransactionStatus, delivered: boolean): void {
    const { deviceId, transactionId } = purchase;
    if (!delivered) {
      this.log.warn(
        { code: 'ERR_009', deviceId, transactionId, status },
        'payment outcome never confirmed by device; keeping record for reconnection',
      );
      return;
    }

    // A late approval may have replaced this outcome; only the outcome on record clears it.
    const record = this.deps.ledger.get(deviceId);
    if (record?.transactionId === transactionId && record.status === status) {
      this.deps.ledger.clear(deviceId, transactionId);
    }
  }
}
