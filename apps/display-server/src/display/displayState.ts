import type { FastifyBaseLogger } from 'fastify';
import { displayModeSchema, type DisplayMode } from '../config.js';

export type PaymentDisplayStatus = 'idle' | 'processing' | 'success' | 'failed' | 'cancelled';

export type JsonObject = Record<string, unknown>;

const STATUS_ALIASES: Readonly<Record<string, PaymentDisplayStatus>> = Object.freeze({
  processing: 'processing',
  waiting_card: 'processing',
  reading: 'processing',
  pin_entry: 'processing',
  success: 'success',
  failed: 'failed',
  error: 'failed',
  cancelled: 'cancelled',
});

export function parseDisplayMode(value: string): DisplayMode {
  const parsed = displayModeSchema.safeParse(value.trim().toUpperCase());
  return parsed.success ? parsed.data : 'NONE';
}

/**
 * What the paired screens currently show: which surface is active, the live
 * cart, the kitchen order backlog and the payment overlay. Rendering lives
 * elsewhere; this only holds the state the protocol reads and mutates.
 */
export class DisplayState {
  private readonly log: FastifyBaseLogger;
  private mode: DisplayMode;
  private cart: JsonObject = {};
  private readonly orders: JsonObject[] = [];
  private nextPendingOrder = 0;

  private payment: {
    status: PaymentDisplayStatus;
    data: JsonObject;
    message: string | null;
    transaction: JsonObject | null;
  } = { status: 'idle', data: {}, message: null, transaction: null };

  constructor(opts: { logger: FastifyBaseLogger; initialMode?: DisplayMode }) {
    this.log = opts.logger;
    this.mode = opts.initialMode ?? 'NONE';
  }

  get currentMode(): DisplayMode {
    return this.mode;
  }

  get cartData(): JsonObject {
    return { ...this.cart };
  }

  get orderList(): JsonObject[] {
    return this.orders.map((o) => ({ ...o }));
  }

  get paymentStatus(): PaymentDisplayStatus {
    return this.payment.status;
  }

  get paymentMessage(): string | null {
    return this.payment.message;
  }

  get paymentData(): JsonObject {
    return { ...this.payment.data };
  }

  get transactionData(): JsonObject | null {
    return this.payment.transaction ? { ...this.payment.transaction } : null;
  }

  setMode(mode: string): DisplayMode {
    this.mode = parseDisplayMode(mode);
    if (this.mode === 'NONE' && mode.trim().toUpperCase() !== 'NONE') {
      this.log.warn({ requested: mode }, 'unknown display mode, falling back to NONE');
    } else {
      this.log.info({ mode: this.mode }, 'display mode changed');
    }
    return this.mode;
  }

  updateCart(data: JsonObject): void {
    this.cart = { ...data };
  }

  clearCart(): void {
    this.cart = {};
  }

  addOrder(order: JsonObject): void {
    this.orders.push({ ...order });
  }

  /** Orders added since the last drain, oldest first. */
  drainPendingOrders(): JsonObject[] {
    const pending = this.orders.slice(this.nextPendingOrder).map((o) => ({ ...o }));
    this.nextPendingOrder = this.orders.length;
    return pending;
  }

  startPayment(data: JsonObject): void {
    this.payment = { status: 'processing', data: { ...data }, message: null, transaction: null };
  }

  updatePaymentStatus(status: string, message: string | null = null): void {
    const key = status.toLowerCase();
    if (Object.hasOwn(STATUS_ALIASES, key)) this.payment.status = STATUS_ALIASES[key];
    this.payment.message = message;
  }

  setPaymentSuccess(transaction: JsonObject | null): void {
    this.payment.status = 'success';
    this.payment.transaction = transaction ? { ...transaction } : null;
    this.payment.message = null;
  }

  setPaymentFailed(message: string): void {
    this.payment.status = 'failed';
    this.payment.message = message;
  }

  cancelPayment(): void {
    this.payment.status = 'cancelled';
    this.payment.message = 'Payment cancelled';
  }

  clearPayment(): void {
    this.payment = { status: 'idle', data: {}, message: null, transaction: null };
  }
}
