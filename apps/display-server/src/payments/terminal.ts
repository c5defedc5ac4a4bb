/**
 * Narrow contract for the card-payment SDK.
 *
 * A purchase is a single request whose progress comes back as a stream of
 * tagged events. The stream ends after `approved`, `declined` or `error`.
 */
export type TerminalEvent =
  | { kind: 'reading_started' }
  | { kind: 'waiting' }
  | { kind: 'pin_entry' }
  | { kind: 'approved'; result: Record<string, unknown> }
  | { kind: 'declined'; reason: string }
  | { kind: 'error'; message: string };

export type PurchaseRequest = {
  intentId: string;
  amount: number;
  customerReference: string;
};

export interface PaymentTerminal {
  purchase(request: PurchaseRequest): AsyncIterable<TerminalEvent>;
  cancel(intentId: string): Promise<void>;
}

export const PROGRESS_STATUS: Readonly<Record<'reading_started' | 'waiting' | 'pin_entry', string>> = Object.freeze({
  reading_started: 'reading',
  waiting: 'waiting_card',
  pin_entry: 'pin_entry',
});

/**
 * Stand-in used when no card terminal is attached: every purchase fails with an
 * explicit reason instead of hanging.
 */
export class UnavailableTerminal implements PaymentTerminal {
  async *purchase(): AsyncIterable<TerminalEvent> {
    yield { kind: 'error', message: 'No payment terminal is attached' };
  }

  async cancel(): Promise<void> {
    return undefined;
  }
}
