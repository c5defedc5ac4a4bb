import { afterEach, describe, expect, it, vi } from 'vitest';
import { createServices, type DisplayServices } from '../app.js';
import { hmacBase64Url } from '../auth/challengeAuth.js';
import { FakeSink, ScriptedTerminal, silentLogger, TEST_SECRET, testConfig } from '../testSupport.js';
import { ConnectionManager, type DeviceConnection } from './connectionManager.js';
import { createMessageHandlers } from './messageHandlers.js';

function newServices(): DisplayServices & { terminal: ScriptedTerminal } {
  const terminal = new ScriptedTerminal();
  const services = createServices({
    logger: silentLogger(),
    config: testConfig(),
    terminal,
    serverPort: () => 8080,
  });
  return { ...services, terminal };
}

function challengeOf(sink: FakeSink): string {
  const challenge = sink.ofType('AUTH_CHALLENGE')[0]?.challenge;
  if (typeof challenge !== 'string') throw new Error('no challenge was sent');
  return challenge;
}

function pair(
  manager: ConnectionManager,
  deviceId = 'till-1',
  role?: 'cashier' | 'display',
): { conn: DeviceConnection; sink: FakeSink } {
  const sink = new FakeSink();
  const conn = manager.accept(sink);
  const challenge = challengeOf(sink);
  conn.receive(
    JSON.stringify({ type: 'AUTH_RESPONSE', challenge, response: hmacBase64Url(TEST_SECRET, challenge), deviceId, role }),
  );
  return { conn, sink };
}

function send(conn: DeviceConnection, frame: Record<string, unknown>): void {
  conn.receive(JSON.stringify(frame));
}

describe('ConnectionManager handshake', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('sends a challenge on accept', () => {
    const { manager } = newServices();
    const sink = new FakeSink();
    manager.accept(sink);

    expect(sink.frames).toHaveLength(1);
    expect(challengeOf(sink)).toMatch(/^[A-Za-z0-9_-]{43}$/);
  });

  it('authenticates, registers and sends the reconnection snapshot', () => {
    const { manager, auth } = newServices();
    const { sink } = pair(manager);

    expect(sink.frames.map((f) => f.type)).toEqual(['AUTH_CHALLENGE', 'AUTH_SUCCESS', 'RECONNECTED']);
    expect(sink.frames[1]).toMatchObject({
      type: 'AUTH_SUCCESS',
      message: 'Display ready',
      currentMode: 'CDS',
      supportsNearPay: true,
    });
    const token = sink.frames[1]?.token;
    expect(typeof token === 'string' ? token.split('.') : []).toHaveLength(3);
    expect(sink.frames[2]).toMatchObject({
      type: 'RECONNECTED',
      currentMode: 'CDS',
      serverPort: 8080,
      activeTransaction: null,
    });

    expect(auth.isAuthenticated('till-1')).toBe(true);
    expect(manager.listDevices()).toMatchObject([{ deviceId: 'till-1', role: 'cashier' }]);
  });

  it('keeps the role the device declared', () => {
    const { manager } = newServices();
    pair(manager, 'screen-1', 'display');

    expect(manager.listDevices()).toMatchObject([{ deviceId: 'screen-1', role: 'display' }]);
  });

  it('closes the connection on a wrong response', () => {
    const { manager } = newServices();
    const sink = new FakeSink();
    const conn = manager.accept(sink);
    send(conn, { type: 'AUTH_RESPONSE', challenge: challengeOf(sink), response: 'bogus', deviceId: 'till-1' });

    expect(sink.last()).toMatchObject({
      type: 'AUTH_FAILED',
      code: 'ERR_002',
      message: 'Invalid authentication response',
    });
    expect(sink.closed).toEqual({ code: 1008, reason: 'Authentication failed' });
    expect(manager.connectedCount).toBe(0);
  });

  it('rejects a response computed for a different challenge', () => {
    const { manager, auth } = newServices();
    const sink = new FakeSink();
    const conn = manager.accept(sink);
    const { challenge: foreign } = auth.generateChallenge();
    send(conn, { type: 'AUTH_RESPONSE', challenge: foreign, response: hmacBase64Url(TEST_SECRET, foreign) });

    expect(sink.last()).toMatchObject({ type: 'AUTH_FAILED', code: 'ERR_002' });
    expect(sink.closed).not.toBeNull();
  });

  it('rejects an incomplete response', () => {
    const { manager } = newServices();
    const sink = new FakeSink();
    const conn = manager.accept(sink);
    send(conn, { type: 'AUTH_RESPONSE', challenge: challengeOf(sink) });

    expect(sink.last()).toMatchObject({ type: 'AUTH_FAILED', message: 'Missing challenge or response' });
  });

  it('rejects application messages before authentication', () => {
    const { manager } = newServices();
    const sink = new FakeSink();
    const conn = manager.accept(sink);
    send(conn, { type: 'SET_MODE', mode: 'KDS' });

    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_010', message: 'Not authenticated' });
    expect(sink.closed).toEqual({ code: 1008, reason: 'Not authenticated' });
  });

  it('times out a silent handshake after ten seconds', () => {
    vi.useFakeTimers();
    const { manager } = newServices();
    const sink = new FakeSink();
    manager.accept(sink);

    vi.advanceTimersByTime(9999);
    expect(sink.closed).toBeNull();

    vi.advanceTimersByTime(1);
    expect(sink.last()).toMatchObject({ type: 'AUTH_FAILED', message: 'Authentication timeout' });
    expect(sink.closed).not.toBeNull();
  });

  it('supersedes an earlier connection for the same device', () => {
    const { manager, auth } = newServices();
    const first = pair(manager);
    const second = pair(manager);

    expect(first.sink.closed).toEqual({ code: 4000, reason: 'Superseded by a new connection' });
    first.conn.handleClose();

    expect(manager.connectedCount).toBe(1);
    expect(auth.isAuthenticated('till-1')).toBe(true);
    expect(manager.sendToDevice('till-1', { type: 'HELLO' })).toBe('sent');
    expect(second.sink.last()).toEqual({ type: 'HELLO' });
  });
});

describe('ConnectionManager active channel', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('answers PING with PONG', () => {
    const { manager } = newServices();
    const { conn, sink } = pair(manager);
    send(conn, { type: 'PING', timestamp: 'device-clock' });

    expect(sink.last()).toMatchObject({ type: 'PONG', received: 'device-clock' });
  });

  it('closes on a malformed frame', () => {
    const { manager } = newServices();
    const { conn, sink } = pair(manager);
    conn.receive('{oops');

    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_003', message: 'Invalid JSON format' });
    expect(sink.closed).toEqual({ code: 1008, reason: 'Malformed frame' });
    expect(manager.connectedCount).toBe(0);
  });

  it('reports an unknown type without closing', () => {
    const { manager } = newServices();
    const { conn, sink } = pair(manager);
    send(conn, { type: 'DANCE' });

    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_003', message: 'Unknown message type: DANCE' });
    expect(sink.closed).toBeNull();
  });

  it('applies sequenced messages in order', () => {
    const { manager, display } = newServices();
    const { conn } = pair(manager);

    send(conn, { type: 'SET_MODE', mode: 'KDS', sequenceNumber: 2 });
    expect(display.currentMode).toBe('CDS');

    send(conn, { type: 'SET_MODE', mode: 'NONE', sequenceNumber: 1 });
    expect(display.currentMode).toBe('KDS');
  });

  it('rejects a non-integer sequence number', () => {
    const { manager } = newServices();
    const { conn, sink } = pair(manager);
    send(conn, { type: 'SET_MODE', mode: 'KDS', sequenceNumber: 'two' });

    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_004' });
  });

  it('reports a skipped sequence gap', () => {
    const services = newServices();
    const logger = silentLogger();
    const manager = new ConnectionManager({
      logger,
      auth: services.auth,
      queue: services.queue,
      ledger: services.ledger,
      display: services.display,
      handlers: createMessageHandlers({
        logger,
        display: services.display,
        ledger: services.ledger,
        payments: services.payments,
      }),
      serverPort: () => null,
      maxBufferedPerDevice: 2,
    });
    const { conn, sink } = pair(manager);

    for (const seq of [2, 3, 4]) send(conn, { type: 'CLEAR_PAYMENT', sequenceNumber: seq });

    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_005', message: 'Message(s) 1 lost; resuming at 2' });
    expect(manager.sequencer.lastApplied('till-1')).toBe(4);
  });

  it('reports payment validation errors on the same connection', () => {
    const { manager } = newServices();
    const { conn, sink } = pair(manager);
    send(conn, { type: 'START_PAYMENT', data: { amount: -5 } });

    expect(sink.last()).toMatchObject({
      type: 'PAYMENT_FAILED',
      code: 'ERR_006',
      message: 'ERR_006: Amount must be positive',
    });
    expect(sink.closed).toBeNull();
  });

  it('routes cart and order updates to the display', () => {
    const { manager, display } = newServices();
    const { conn, sink } = pair(manager);

    send(conn, { type: 'UPDATE_CART', data: { total: 12 } });
    send(conn, { type: 'NEW_ORDER', data: { id: 'o-1' } });
    send(conn, { type: 'UPDATE_CART', data: 'nope' });

    expect(display.cartData).toEqual({ total: 12 });
    expect(display.orderList).toEqual([{ id: 'o-1' }]);
    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_004', message: 'Invalid cart data type' });
  });

  it('resolves a queued delivery when the device confirms it', async () => {
    const { manager, queue } = newServices();
    const { conn, sink } = pair(manager);

    const delivered = queue.enqueue({ type: 'PAYMENT_SUCCESS' }, { deviceId: 'till-1' });
    const envelope = sink.last();
    expect(envelope).toMatchObject({ type: 'SECURE_MESSAGE', payload: { type: 'PAYMENT_SUCCESS' }, requireAck: true });

    send(conn, { type: 'DELIVERY_CONFIRMED', messageId: envelope?.messageId });
    await expect(delivered).resolves.toBe(true);
  });

  it('acknowledges inbound secure messages and applies each id once', () => {
    const { manager, display } = newServices();
    const { conn, sink } = pair(manager);
    const secure = { type: 'SECURE_MESSAGE', messageId: 'm-1', payload: { type: 'SET_MODE', mode: 'KDS' }, requireAck: true };

    send(conn, secure);
    expect(display.currentMode).toBe('KDS');
    expect(sink.last()).toMatchObject({ type: 'DELIVERY_CONFIRMED', messageId: 'm-1' });

    display.setMode('CDS');
    send(conn, secure);
    expect(display.currentMode).toBe('CDS');
    expect(sink.ofType('DELIVERY_CONFIRMED')).toHaveLength(2);
  });

  it('rejects a secure message without a typed payload', () => {
    const { manager } = newServices();
    const { conn, sink } = pair(manager);
    send(conn, { type: 'SECURE_MESSAGE', messageId: 'm-2', payload: 'SET_MODE' });

    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_004', message: 'Invalid payload type' });
  });

  it('answers transaction status queries', () => {
    const { manager, ledger } = newServices();
    const { conn, sink } = pair(manager);
    const tx = ledger.begin('till-1', 30);

    send(conn, { type: 'QUERY_TRANSACTION_STATUS', transactionId: tx.transactionId });
    expect(sink.last()).toMatchObject({
      type: 'TRANSACTION_STATUS',
      transactionId: tx.transactionId,
      status: 'processing',
      amount: 30,
      result: null,
    });

    send(conn, { type: 'QUERY_TRANSACTION_STATUS', transactionId: 'missing' });
    expect(sink.last()).toMatchObject({ type: 'ERROR', code: 'ERR_006', message: 'Transaction not found: missing' });
  });
});

describe('ConnectionManager disconnects', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('flags a running payment on disconnect and reports it on reconnect', () => {
    const { manager, ledger, auth } = newServices();
    const { conn } = pair(manager);
    send(conn, { type: 'START_PAYMENT', data: { amount: 25 } });
    const tx = ledger.get('till-1');
    if (!tx) throw new Error('payment should have started');

    conn.handleClose();

    expect(tx.status).toBe('pending_verification');
    expect(manager.connectedCount).toBe(0);
    expect(auth.isAuthenticated('till-1')).toBe(false);

    const { sink } = pair(manager);
    expect(sink.ofType('RECONNECTED')[0]).toMatchObject({
      activeTransaction: {
        transactionId: tx.transactionId,
        status: 'pending_verification',
        amount: 25,
        startedAt: tx.startedAt.toISOString(),
      },
    });
  });

  it('delivers a result that arrived while the device was away once it reconnects', async () => {
    const { manager, ledger, terminal } = newServices();
    const first = pair(manager);
    send(first.conn, { type: 'START_PAYMENT', data: { amount: 25, orderNumber: 'C-9' } });
    const tx = ledger.get('till-1');
    if (!tx) throw new Error('payment should have started');

    first.conn.handleClose();
    expect(tx.status).toBe('pending_verification');

    terminal.push({ kind: 'approved', result: { authCode: 'OK-1' } });
    await vi.waitFor(() => expect(ledger.get('till-1')?.status).toBe('completed'));

    const { conn, sink } = pair(manager);
    expect(sink.frames.map((f) => f.type)).toEqual(['AUTH_CHALLENGE', 'AUTH_SUCCESS', 'RECONNECTED', 'SECURE_MESSAGE']);
    expect(sink.ofType('RECONNECTED')[0]).toMatchObject({
      activeTransaction: { transactionId: tx.transactionId, status: 'completed', amount: 25 },
    });
    const outcome = sink.last();
    expect(outcome).toMatchObject({
      type: 'SECURE_MESSAGE',
      requireAck: true,
      payload: {
        type: 'PAYMENT_SUCCESS',
        data: { amount: 25, orderNumber: 'C-9', transaction: { authCode: 'OK-1' }, transactionId: tx.transactionId },
      },
    });

    send(conn, { type: 'DELIVERY_CONFIRMED', messageId: outcome?.messageId });
    expect(ledger.get('till-1')).toBeNull();
  });

  it('closes connections idle past the health timeout', () => {
    vi.useFakeTimers();
    const { manager, ledger } = newServices();
    manager.start();
    const idle = pair(manager, 'till-1');
    const chatty = pair(manager, 'till-2');
    send(idle.conn, { type: 'START_PAYMENT', data: { amount: 25 } });

    vi.advanceTimersByTime(50_000);
    send(chatty.conn, { type: 'PING' });
    vi.advanceTimersByTime(40_000);

    expect(idle.sink.closed).toEqual({ code: 4001, reason: 'Health check timeout' });
    expect(ledger.get('till-1')?.status).toBe('pending_verification');
    expect(chatty.sink.closed).toBeNull();
    expect(manager.listDevices().map((d) => d.deviceId)).toEqual(['till-2']);
    manager.stop();
  });

  it('closes every socket on stop', () => {
    const { manager } = newServices();
    const { sink } = pair(manager);
    const pending = new FakeSink();
    manager.accept(pending);

    manager.stop();

    expect(sink.closed).toEqual({ code: 1001, reason: 'Server shutting down' });
    expect(pending.closed).toEqual({ code: 1001, reason: 'Server shutting down' });
    expect(manager.connectedCount).toBe(0);
  });

  it('reports offline devices and broadcasts to the rest', () => {
    const { manager } = newServices();
    const a = pair(manager, 'till-1');
    const b = pair(manager, 'screen-1', 'display');
    b.sink.failSends = true;

    expect(manager.sendToDevice('nobody', { type: 'HELLO' })).toBe('offline');
    expect(manager.broadcast({ type: 'HELLO' })).toBe(1);
    expect(a.sink.last()).toEqual({ type: 'HELLO' });
  });
});
