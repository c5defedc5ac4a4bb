import type { FastifyBaseLogger } from 'fastify';
import { pino } from 'pino';
import type { ServerConfig } from './config.js';
import type { SocketSink } from './connections/connectionManager.js';
import type { PaymentTerminal, PurchaseRequest, TerminalEvent } from './payments/terminal.js';
import { frameSchema, type Frame } from './protocol/frames.js';

export const TEST_SECRET = 'test-secret-0123456789';

export function silentLogger(): FastifyBaseLogger {
  return pino({ level: 'silent' });
}

export function testConfig(overrides: Partial<ServerConfig> = {}): ServerConfig {
  return {
    host: '127.0.0.1',
    portRange: { min: 8080, max: 8090 },
    sharedSecret: TEST_SECRET,
    logLevel: 'silent',
    initialMode: 'CDS',
    paymentMaxAmount: 100_000,
    ...overrides,
  };
}

/** In-memory socket that records what the server wrote to it. */
export class FakeSink implements SocketSink {
  readonly frames: Frame[] = [];
  closed: { code: number | undefined; reason: string | undefined } | null = null;
  failSends = false;

  send(frame: string): void {
    if (this.failSends) throw new Error('socket is not open');
    this.frames.push(frameSchema.parse(JSON.parse(frame)));
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  ofType(type: string): Frame[] {
    return this.frames.filter((f) => f.type === type);
  }

  last(): Frame | undefined {
    return this.frames[this.frames.length - 1];
  }
}

/**
 * Terminal driven by the test: each purchase yields whatever is pushed for it
 * and ends after an outcome event. `cancel` pushes `onCancel`, an operator-cancel
 * error by default; `null` makes the terminal ignore cancels.
 */
export class ScriptedTerminal implements PaymentTerminal {
  readonly requests: PurchaseRequest[] = [];
  readonly cancelled: string[] = [];
  private queue: TerminalEvent[] = [];
  private wake: (() => void) | null = null;
  private readonly onCancel: TerminalEvent | null;

  constructor(opts: { onCancel?: TerminalEvent | null } = {}) {
    this.onCancel = opts.onCancel === undefined ? { kind: 'error', message: 'cancelled by operator' } : opts.onCancel;
  }

  push(...events: TerminalEvent[]): void {
    this.queue.push(...events);
    this.wake?.();
  }

  async *purchase(request: PurchaseRequest): AsyncIterable<TerminalEvent> {
    this.requests.push(request);
    for (;;) {
      const event = this.queue.shift();
      if (event === undefined) {
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
        this.wake = null;
        continue;
      }
      yield event;
      if (event.kind === 'approved' || event.kind === 'declined' || event.kind === 'error') return;
    }
  }

  async cancel(intentId: string): Promise<void> {
    this.cancelled.push(intentId);
    if (this.onCancel) this.push(this.onCancel);
  }
}
