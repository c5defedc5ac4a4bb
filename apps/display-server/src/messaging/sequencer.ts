export type SequenceGap = {
  /** Sequence number that never arrived. */
  expected: number;
  /** First buffered sequence number delivery resumed from. */
  resumedAt: number;
};

export type SequencerOptions<T> = {
  dispatch: (deviceId: string, message: T) => void;
  /** Called when a stalled gap is skipped so the application layer learns about lost messages. */
  onGap?: (deviceId: string, gap: SequenceGap) => void;
  /** Per-device buffer size that forces a gap skip. */
  maxBuffered?: number;
};

type DeviceSequence<T> = {
  lastApplied: number;
  buffered: Map<number, T>;
};

export type ReceiveOutcome = 'dispatched' | 'buffered' | 'duplicate';

const DEFAULT_MAX_BUFFERED = 100;

/**
 * Per-device ordering buffer.
 *
 * Messages are applied in strictly increasing sequence order with no gaps.
 * Numbers at or below the last applied one are dropped as replays; numbers
 * ahead of the next expected one wait until their predecessors arrive.
 */
export class Sequencer<T> {
  private readonly devices = new Map<string, DeviceSequence<T>>();
  private readonly dispatch: (deviceId: string, message: T) => void;
  private readonly onGap: ((deviceId: string, gap: SequenceGap) => void) | undefined;
  private readonly maxBuffered: number;

  constructor(opts: SequencerOptions<T>) {
    this.dispatch = opts.dispatch;
    this.onGap = opts.onGap;
    this.maxBuffered = opts.maxBuffered ?? DEFAULT_MAX_BUFFERED;
  }

  receive(deviceId: string, sequenceNumber: number | undefined, message: T): ReceiveOutcome {
    if (sequenceNumber === undefined) {
      this.dispatch(deviceId, message);
      return 'dispatched';
    }

    const state = this.stateFor(deviceId);

    if (sequenceNumber <= state.lastApplied) return 'duplicate';

    if (sequenceNumber > state.lastApplied + 1) {
      if (state.buffered.has(sequenceNumber)) return 'duplicate';
      state.buffered.set(sequenceNumber, message);
      if (state.buffered.size > this.maxBuffered) this.skipGap(deviceId, state);
      return 'buffered';
    }

    this.apply(deviceId, state, sequenceNumber, message);
    this.drain(deviceId, state);
    return 'dispatched';
  }

  /** Restart numbering for a device, dropping anything still buffered. */
  reset(deviceId: string): void {
    this.devices.delete(deviceId);
  }

  lastApplied(deviceId: string): number {
    return this.devices.get(deviceId)?.lastApplied ?? 0;
  }

  bufferedCount(deviceId: string): number {
    return this.devices.get(deviceId)?.buffered.size ?? 0;
  }

  private stateFor(deviceId: string): DeviceSequence<T> {
    let state = this.devices.get(deviceId);
    if (!state) {
      state = { lastApplied: 0, buffered: new Map() };
      this.devices.set(deviceId, state);
    }
    return state;
  }

  private apply(deviceId: string, state: DeviceSequence<T>, sequenceNumber: number, message: T): void {
    // Advance before dispatching so a handler that re-enters sees the new position.
    state.lastApplied = sequenceNumber;
    this.dispatch(deviceId, message);
  }

  private drain(deviceId: string, state: DeviceSequence<T>): void {
    let next = state.lastApplied + 1;
    let message = state.buffered.get(next);
    while (message !== undefined) {
      state.buffered.delete(next);
      this.apply(deviceId, state, next, message);
      next = state.lastApplied + 1;
      message = state.buffered.get(next);
    }
  }

  private skipGap(deviceId: string, state: DeviceSequence<T>): void {
    const resumedAt = Math.min(...state.buffered.keys());
    const expected = state.lastApplied + 1;
    state.lastApplied = resumedAt - 1;
    this.onGap?.(deviceId, { expected, resumedAt });
    this.drain(deviceId, state);
  }
}
