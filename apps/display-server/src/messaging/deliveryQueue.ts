import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { TIMINGS } from '../config.js';
import { errorMessage } from '../errors.js';

export type SendOutcome = 'sent' | 'offline';

/**
 * Writes a serialized frame to a device. Returns `'offline'` when no connection
 * is registered for the device; throws when the transport rejects the write.
 */
export type MessageSender = (deviceId: string, frame: string) => SendOutcome;

export type OutboundMessage = { type: string } & Record<string, unknown>;

export type EnqueueOptions = {
  deviceId: string;
  requireConfirmation?: boolean;
  timeoutMs?: number;
  /**
   * Runs once when a confirmed message leaves the queue: confirmed, out of retries,
   * expired or dropped on stop. Unlike the returned promise it is not cut short by `timeoutMs`.
   */
  onSettled?: (delivered: boolean) => void;
};

export type SecureEnvelope = {
  type: 'SECURE_MESSAGE';
  messageId: string;
  sequenceNumber: number;
  timestamp: string;
  payload: OutboundMessage;
  requireAck: boolean;
};

type QueuedMessage = {
  id: string;
  sequenceNumber: number;
  deviceId: string;
  payload: OutboundMessage;
  createdAtMs: number;
  requireConfirmation: boolean;
  retryCount: number;
  lastAttemptMs: number | null;
  lastError: string | null;
  onSettled: ((delivered: boolean) => void) | null;
};

export type DeliveryQueueOptions = {
  logger: FastifyBaseLogger;
  sender?: MessageSender;
  retryIntervalMs?: number;
  maxRetries?: number;
  messageExpiryMs?: number;
  expirySweepIntervalMs?: number;
  defaultTimeoutMs?: number;
};

/**
 * Guaranteed-delivery outbound queue.
 *
 * Each message is wrapped in a `SECURE_MESSAGE` envelope and sent at once. Messages
 * that require confirmation stay pending until the device acknowledges them with
 * `DELIVERY_CONFIRMED`, the retry ceiling is reached, or they expire. Whichever
 * happens first settles the message; the others become no-ops.
 */
export class DeliveryQueue {
  private readonly log: FastifyBaseLogger;
  private sender: MessageSender | null;
  private readonly retryIntervalMs: number;
  private readonly maxRetries: number;
  private readonly messageExpiryMs: number;
  private readonly expirySweepIntervalMs: number;
  private readonly defaultTimeoutMs: number;

  private readonly pending = new Map<string, QueuedMessage>();
  private readonly waiters = new Map<string, (delivered: boolean) => void>();
  private lastSequenceNumber = 0;
  private retryTimer: NodeJS.Timeout | null = null;
  private expiryTimer: NodeJS.Timeout | null = null;

  constructor(opts: DeliveryQueueOptions) {
    this.log = opts.logger;
    this.sender = opts.sender ?? null;
    this.retryIntervalMs = opts.retryIntervalMs ?? TIMINGS.retryIntervalMs;
    this.maxRetries = opts.maxRetries ?? TIMINGS.maxRetries;
    this.messageExpiryMs = opts.messageExpiryMs ?? TIMINGS.messageExpiryMs;
    this.expirySweepIntervalMs = opts.expirySweepIntervalMs ?? TIMINGS.expirySweepIntervalMs;
    this.defaultTimeoutMs = opts.defaultTimeoutMs ?? TIMINGS.deliveryTimeoutMs;
  }

  setSender(sender: MessageSender): void {
    this.sender = sender;
  }

  start(): void {
    if (this.retryTimer) return;
    this.retryTimer = setInterval(() => this.processRetries(), this.retryIntervalMs);
    this.retryTimer.unref();
    this.expiryTimer = setInterval(() => this.expireStale(), this.expirySweepIntervalMs);
    this.expiryTimer.unref();
  }

  /** Stops the timers and fails every outstanding waiter. */
  stop(): void {
    if (this.retryTimer) clearInterval(this.retryTimer);
    if (this.expiryTimer) clearInterval(this.expiryTimer);
    this.retryTimer = null;
    this.expiryTimer = null;

    for (const id of [...this.pending.keys()]) this.settle(id, false);
    for (const resolve of this.waiters.values()) resolve(false);
    this.waiters.clear();
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  isPending(messageId: string): boolean {
    return this.pending.has(messageId);
  }

  retryCountOf(messageId: string): number | null {
    return this.pending.get(messageId)?.retryCount ?? null;
  }

  enqueue(message: OutboundMessage, opts: EnqueueOptions): Promise<boolean> {
    const requireConfirmation = opts.requireConfirmation ?? true;
    const now = Date.now();
    this.lastSequenceNumber = Math.max(now, this.lastSequenceNumber + 1);

    const queued: QueuedMessage = {
      id: randomUUID(),
      sequenceNumber: this.lastSequenceNumber,
      deviceId: opts.deviceId,
      payload: structuredClone(message),
      createdAtMs: now,
      requireConfirmation,
      retryCount: 0,
      lastAttemptMs: null,
      lastError: null,
      onSettled: opts.onSettled ?? null,
    };

    if (!requireConfirmation) {
      this.attempt(queued);
      return Promise.resolve(true);
    }

    this.pending.set(queued.id, queued);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        // The message stays queued for background retry; only the caller stops waiting.
        if (this.waiters.delete(queued.id)) {
          this.log.warn({ messageId: queued.id, deviceId: queued.deviceId }, 'delivery confirmation timed out');
          resolve(false);
        }
      }, opts.timeoutMs ?? this.defaultTimeoutMs);
      timer.unref();

      this.waiters.set(queued.id, (delivered) => {
        clearTimeout(timer);
        resolve(delivered);
      });

      this.attempt(queued);
    });
  }

  /**
   * Acknowledgment from the receiving device. Repeated or unknown ids are ignored,
   * as are confirmations sent by a device other than the message's target.
   */
  confirmDelivery(messageId: string, fromDeviceId?: string): boolean {
    const message = this.pending.get(messageId);
    if (!message) return false;
    if (fromDeviceId !== undefined && fromDeviceId !== message.deviceId) {
      this.log.warn({ messageId, fromDeviceId, deviceId: message.deviceId }, 'delivery confirmation from wrong device');
      return false;
    }

    this.log.debug({ messageId, deviceId: message.deviceId }, 'delivery confirmed');
    this.settle(messageId, true);
    return true;
  }

  markFailed(messageId: string, error: string): void {
    const message = this.pending.get(messageId);
    if (!message) return;

    message.retryCount++;
    message.lastError = error;
    message.lastAttemptMs = Date.now();

    if (message.retryCount >= this.maxRetries) {
      this.log.error(
        { code: 'ERR_009', messageId, deviceId: message.deviceId, retries: message.retryCount, lastError: error },
        'delivery retries exhausted',
      );
      this.settle(messageId, false);
      return;
    }

    this.log.warn(
      { messageId, deviceId: message.deviceId, retry: message.retryCount, maxRetries: this.maxRetries },
      'delivery attempt failed',
    );
  }

  private settle(messageId: string, delivered: boolean): void {
    const message = this.pending.get(messageId);
    if (!message) return;
    this.pending.delete(messageId);

    const resolve = this.waiters.get(messageId);
    if (resolve) {
      this.waiters.delete(messageId);
      resolve(delivered);
    }

    try {
      message.onSettled?.(delivered);
    } catch (e) {
      this.log.error({ err: e, messageId, deviceId: message.deviceId }, 'delivery settlement callback failed');
    }
  }

  /** Resends everything still pending for a device, e.g. right after it reconnects. */
  resendPending(deviceId: string): number {
    let resent = 0;
    for (const message of [...this.pending.values()]) {
      if (message.deviceId !== deviceId) continue;
      this.attempt(message);
      resent++;
    }
    return resent;
  }

  private envelope(message: QueuedMessage): SecureEnvelope {
    return {
      type: 'SECURE_MESSAGE',
      messageId: message.id,
      sequenceNumber: message.sequenceNumber,
      timestamp: new Date().toISOString(),
      payload: message.payload,
      requireAck: message.requireConfirmation,
    };
  }

  private attempt(message: QueuedMessage): void {
    message.lastAttemptMs = Date.now();
    if (!this.sender) return;

    try {
      const outcome = this.sender(message.deviceId, JSON.stringify(this.envelope(message)));
      if (outcome === 'offline') {
        this.log.debug({ messageId: message.id, deviceId: message.deviceId }, 'device offline, delivery deferred');
      }
    } catch (e) {
      if (message.requireConfirmation) {
        this.markFailed(message.id, errorMessage(e));
      } else {
        this.log.warn({ err: e, deviceId: message.deviceId }, 'fire-and-forget send failed');
      }
    }
  }

  private processRetries(): void {
    const now = Date.now();
    for (const message of [...this.pending.values()]) {
      if (!message.requireConfirmation || message.retryCount >= this.maxRetries) continue;
      const sinceLast = message.lastAttemptMs === null ? Infinity : now - message.lastAttemptMs;
      if (sinceLast >= this.retryIntervalMs) this.attempt(message);
    }
  }

  private expireStale(): void {
    const now = Date.now();
    for (const message of [...this.pending.values()]) {
      if (now - message.createdAtMs > this.messageExpiryMs) {
        this.log.warn({ messageId: message.id, deviceId: message.deviceId }, 'queued message expired');
        this.settle(message.id, false);
      }
    }
  }
}
