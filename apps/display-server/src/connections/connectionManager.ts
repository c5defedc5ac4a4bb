import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import type { ChallengeAuth, DeviceRole } from '../auth/challengeAuth.js';
import { TIMINGS } from '../config.js';
import type { DisplayState } from '../display/displayState.js';
import type { DeliveryQueue, OutboundMessage, SendOutcome } from '../messaging/deliveryQueue.js';
import { Sequencer, type SequenceGap } from '../messaging/sequencer.js';
import type { TransactionLedger } from '../payments/transactionLedger.js';
import {
  authFailedFrame,
  authResponseSchema,
  deliveryConfirmedSchema,
  errorFrame,
  now,
  parseFrame,
  secureMessageSchema,
  sequenceNumberSchema,
  transactionQuerySchema,
  type Frame,
} from '../protocol/frames.js';
import { isApplicationMessageType, type MessageHandlers } from './messageHandlers.js';

/** The transport side of one accepted socket. */
export type SocketSink = {
  send(frame: string): void;
  close(code?: number, reason?: string): void;
};

export type ConnectionPhase = 'connecting' | 'challenge_sent' | 'active' | 'closed';

export type ConnectedDevice = {
  deviceId: string;
  role: DeviceRole;
  connectedAt: string;
  lastSeenAt: string;
};

export type ConnectionManagerOptions = {
  logger: FastifyBaseLogger;
  auth: ChallengeAuth;
  queue: DeliveryQueue;
  ledger: TransactionLedger;
  display: DisplayState;
  handlers: MessageHandlers;
  /** Port the listener ended up on, reported in `RECONNECTED`. */
  serverPort: () => number | null;
  authTimeoutMs?: number;
  healthCheckIntervalMs?: number;
  connectionTimeoutMs?: number;
  maxBufferedPerDevice?: number;
};

const CLOSE_GOING_AWAY = 1001;
const CLOSE_POLICY = 1008;
const CLOSE_SUPERSEDED = 4000;
const CLOSE_HEALTH_TIMEOUT = 4001;

const RECENT_SECURE_IDS = 256;

/**
 * One accepted socket and where it is in the handshake.
 */
export class DeviceConnection {
  readonly id = randomUUID();
  readonly connectedAt = new Date();
  phase: ConnectionPhase = 'connecting';
  deviceId: string | null = null;
  role: DeviceRole | null = null;
  challenge: string | null = null;
  lastSeenMs = Date.now();
  authTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly manager: ConnectionManager,
    readonly sink: SocketSink,
  ) {}

  /** Feed one inbound text frame. */
  receive(raw: string): void {
    this.manager.handleFrame(this, raw);
  }

  /** The transport saw the socket close or error. */
  handleClose(): void {
    this.manager.handleClose(this);
  }

  send(message: OutboundMessage): void {
    this.sink.send(JSON.stringify(message));
  }
}

/**
 * Owns every device socket: runs the challenge handshake, registers authenticated
 * devices, answers health pings, routes ordered application messages through the
 * sequencer and closes connections that go quiet.
 */
export class ConnectionManager {
  private readonly log: FastifyBaseLogger;
  private readonly auth: ChallengeAuth;
  private readonly queue: DeliveryQueue;
  private readonly ledger: TransactionLedger;
  private readonly display: DisplayState;
  private readonly handlers: MessageHandlers;
  private readonly serverPort: () => number | null;
  private readonly authTimeoutMs: number;
  private readonly healthCheckIntervalMs: number;
  private readonly connectionTimeoutMs: number;

  readonly sequencer: Sequencer<Frame>;

  private readonly connections = new Set<DeviceConnection>();
  private readonly byDevice = new Map<string, DeviceConnection>();
  private readonly recentSecureIds = new Map<string, string[]>();
  private healthTimer: NodeJS.Timeout | null = null;

  constructor(opts: ConnectionManagerOptions) {
    this.log = opts.logger;
    this.auth = opts.auth;
    this.queue = opts.queue;
    this.ledger = opts.ledger;
    this.display = opts.display;
    this.handlers = opts.handlers;
    this.serverPort = opts.serverPort;
    this.authTimeoutMs = opts.authTimeoutMs ?? TIMINGS.authHandshakeTimeoutMs;
    this.healthCheckIntervalMs = opts.healthCheckIntervalMs ?? TIMINGS.healthCheckIntervalMs;
    this.connectionTimeoutMs = opts.connectionTimeoutMs ?? TIMINGS.connectionTimeoutMs;

    this.sequencer = new Sequencer<Frame>({
      dispatch: (deviceId, frame) => this.dispatch(deviceId, frame),
      onGap: (deviceId, gap) => this.reportGap(deviceId, gap),
      maxBuffered: opts.maxBufferedPerDevice,
    });

    this.queue.setSender((deviceId, frame) => this.sendFrame(deviceId, frame));
  }

  start(): void {
    this.auth.start();
    this.queue.start();
    if (this.healthTimer) return;
    this.healthTimer = setInterval(() => this.checkHealth(), this.healthCheckIntervalMs);
    this.healthTimer.unref();
  }

  stop(): void {
    if (this.healthTimer) clearInterval(this.healthTimer);
    this.healthTimer = null;

    for (const conn of [...this.connections]) this.closeConnection(conn, CLOSE_GOING_AWAY, 'Server shutting down');
    this.queue.stop();
    this.auth.stop();
  }

  get connectedCount(): number {
    return this.byDevice.size;
  }

  listDevices(): ConnectedDevice[] {
    return [...this.byDevice.values()].map((conn) => ({
      deviceId: conn.deviceId ?? 'unknown',
      role: conn.role ?? 'cashier',
      connectedAt: conn.connectedAt.toISOString(),
      lastSeenAt: new Date(conn.lastSeenMs).toISOString(),
    }));
  }

  accept(sink: SocketSink): DeviceConnection {
    const conn = new DeviceConnection(this, sink);
    this.connections.add(conn);

    const { challenge, issuedAt } = this.auth.generateChallenge();
    conn.challenge = challenge;
    conn.authTimer = setTimeout(() => {
      if (conn.phase !== 'challenge_sent') return;
      this.log.warn({ connectionId: conn.id }, 'authentication timeout');
      this.rejectAuth(conn, 'Authentication timeout');
    }, this.authTimeoutMs);
    conn.authTimer.unref();

    conn.phase = 'challenge_sent';
    conn.send({ type: 'AUTH_CHALLENGE', challenge, timestamp: issuedAt });
    this.log.debug({ connectionId: conn.id }, 'connection accepted, challenge sent');
    return conn;
  }

  /**
   * Writes a serialized frame to the device's registered connection. Throws when the
   * transport rejects the write so the delivery queue can count the failed attempt.
   */
  sendFrame(deviceId: string, frame: string): SendOutcome {
    const conn = this.byDevice.get(deviceId);
    if (!conn) return 'offline';
    conn.sink.send(frame);
    return 'sent';
  }

  /** Best-effort direct write; failures are logged, never thrown. */
  sendToDevice(deviceId: string, message: OutboundMessage): SendOutcome {
    try {
      return this.sendFrame(deviceId, JSON.stringify(message));
    } catch (e) {
      this.log.warn({ err: e, deviceId, type: message.type }, 'send to device failed');
      return 'offline';
    }
  }

  broadcast(message: OutboundMessage): number {
    let sent = 0;
    for (const deviceId of this.byDevice.keys()) {
      if (this.sendToDevice(deviceId, message) === 'sent') sent++;
    }
    return sent;
  }

  handleFrame(conn: DeviceConnection, raw: string): void {
    if (conn.phase === 'closed') return;

    const parsed = parseFrame(raw);
    if (!parsed.ok) {
      this.log.warn({ connectionId: conn.id, deviceId: conn.deviceId, reason: parsed.reason }, 'malformed frame');
      this.safeSend(conn, errorFrame('ERR_003', parsed.reason));
      this.closeConnection(conn, CLOSE_POLICY, 'Malformed frame');
      return;
    }

    if (conn.phase === 'active' && conn.deviceId !== null) {
      this.handleActiveFrame(conn, conn.deviceId, parsed.frame);
    } else {
      this.handleHandshakeFrame(conn, parsed.frame);
    }
  }

  handleClose(conn: DeviceConnection): void {
    if (conn.authTimer) clearTimeout(conn.authTimer);
    conn.authTimer = null;
    this.connections.delete(conn);
    if (conn.phase === 'closed') return;
    conn.phase = 'closed';

    const deviceId = conn.deviceId;
    if (deviceId === null || this.byDevice.get(deviceId) !== conn) return;

    this.byDevice.delete(deviceId);
    this.auth.removeSession(deviceId);
    this.ledger.markPendingVerification(deviceId);
    this.log.info({ deviceId, connectionId: conn.id }, 'device disconnected');
  }

  private closeConnection(conn: DeviceConnection, code: number, reason: string): void {
    try {
      conn.sink.close(code, reason);
    } catch (e) {
      this.log.warn({ err: e, connectionId: conn.id }, 'socket close failed');
    }
    this.handleClose(conn);
  }

  private safeSend(conn: DeviceConnection, message: OutboundMessage): void {
    try {
      conn.send(message);
    } catch (e) {
      this.log.warn({ err: e, connectionId: conn.id, type: message.type }, 'send failed');
    }
  }

  // --- Handshake ---

  private handleHandshakeFrame(conn: DeviceConnection, frame: Frame): void {
    if (frame.type !== 'AUTH_RESPONSE') {
      this.log.warn({ connectionId: conn.id, type: frame.type }, 'unauthenticated message');
      this.safeSend(conn, errorFrame('ERR_010', 'Not authenticated'));
      this.closeConnection(conn, CLOSE_POLICY, 'Not authenticated');
      return;
    }

    const parsed = authResponseSchema.safeParse(frame);
    if (!parsed.success) {
      this.rejectAuth(conn, 'Missing challenge or response');
      return;
    }

    const { challenge, response } = parsed.data;
    if (challenge !== conn.challenge || !this.auth.verifyResponse(challenge, response)) {
      this.rejectAuth(conn, 'Invalid authentication response');
      return;
    }

    this.activate(conn, parsed.data.deviceId ?? 'unknown', parsed.data.role ?? 'cashier');
  }

  private rejectAuth(conn: DeviceConnection, message: string): void {
    this.safeSend(conn, authFailedFrame(message));
    this.closeConnection(conn, CLOSE_POLICY, 'Authentication failed');
  }

  private activate(conn: DeviceConnection, deviceId: string, role: DeviceRole): void {
    if (conn.authTimer) clearTimeout(conn.authTimer);
    conn.authTimer = null;

    const previous = this.byDevice.get(deviceId);
    if (previous && previous !== conn) {
      // The device came back on a new socket; the old one must not touch its session or ledger entry.
      this.log.info({ deviceId, connectionId: previous.id }, 'superseding previous connection');
      previous.phase = 'closed';
      this.connections.delete(previous);
      try {
        previous.sink.close(CLOSE_SUPERSEDED, 'Superseded by a new connection');
      } catch (e) {
        this.log.warn({ err: e, connectionId: previous.id }, 'socket close failed');
      }
    }

    conn.phase = 'active';
    conn.deviceId = deviceId;
    conn.role = role;
    conn.challenge = null;
    conn.lastSeenMs = Date.now();
    this.byDevice.set(deviceId, conn);
    this.sequencer.reset(deviceId);

    const token = this.auth.issueToken(deviceId, role);
    const currentMode = this.display.currentMode;

    this.safeSend(conn, {
      type: 'AUTH_SUCCESS',
      token,
      message: 'Display ready',
      currentMode,
      supportsNearPay: true,
      timestamp: now(),
    });

    const tx = this.ledger.get(deviceId);
    this.safeSend(conn, {
      type: 'RECONNECTED',
      message: 'Reconnection successful',
      currentMode,
      serverPort: this.serverPort(),
      timestamp: now(),
      activeTransaction: tx
        ? {
            transactionId: tx.transactionId,
            status: tx.status,
            amount: tx.amount,
            startedAt: tx.startedAt.toISOString(),
          }
        : null,
    });

    const resent = this.queue.resendPending(deviceId);
    this.log.info(
      { deviceId, role, connectionId: conn.id, activeTransaction: tx?.status ?? null, resent },
      'device authenticated',
    );
  }

  // --- Active channel ---

  private handleActiveFrame(conn: DeviceConnection, deviceId: string, frame: Frame): void {
    switch (frame.type) {
      case 'PING':
        conn.lastSeenMs = Date.now();
        this.safeSend(conn, { type: 'PONG', timestamp: now(), received: frame.timestamp ?? null });
        return;

      case 'DELIVERY_CONFIRMED': {
        conn.lastSeenMs = Date.now();
        const parsed = deliveryConfirmedSchema.safeParse(frame);
        if (!parsed.success) {
          this.safeSend(conn, errorFrame('ERR_004', 'messageId must be a string'));
          return;
        }
        this.queue.confirmDelivery(parsed.data.messageId, deviceId);
        return;
      }

      case 'SECURE_MESSAGE':
        conn.lastSeenMs = Date.now();
        this.handleSecureMessage(conn, deviceId, frame);
        return;

      case 'QUERY_TRANSACTION_STATUS':
        conn.lastSeenMs = Date.now();
        this.handleTransactionQuery(conn, deviceId, frame);
        return;

      case 'AUTH_RESPONSE':
        this.safeSend(conn, errorFrame('ERR_010', 'Connection is already authenticated'));
        return;

      default: {
        conn.lastSeenMs = Date.now();
        const seq = sequenceNumberSchema.safeParse(frame.sequenceNumber);
        if (!seq.success) {
          this.safeSend(conn, errorFrame('ERR_004', 'sequenceNumber must be a non-negative integer'));
          return;
        }
        const outcome = this.sequencer.receive(deviceId, seq.data, frame);
        if (outcome !== 'dispatched') {
          this.log.debug({ deviceId, type: frame.type, sequenceNumber: seq.data, outcome }, 'message held by sequencer');
        }
      }
    }
  }

  private handleSecureMessage(conn: DeviceConnection, deviceId: string, frame: Frame): void {
    const parsed = secureMessageSchema.safeParse(frame);
    if (!parsed.success) {
      this.safeSend(conn, errorFrame('ERR_004', 'Invalid payload type'));
      return;
    }

    const { messageId, payload, requireAck } = parsed.data;
    if (messageId === undefined || this.rememberSecureId(deviceId, messageId)) {
      this.dispatch(deviceId, payload);
    } else {
      this.log.debug({ deviceId, messageId }, 'duplicate secure message ignored');
    }

    // Duplicates are acknowledged again so the sender stops retrying.
    if (requireAck && messageId !== undefined) {
      this.safeSend(conn, { type: 'DELIVERY_CONFIRMED', messageId, timestamp: now() });
    }
  }

  /** Returns false when the id was already seen for this device. */
  private rememberSecureId(deviceId: string, messageId: string): boolean {
    let recent = this.recentSecureIds.get(deviceId);
    if (!recent) {
      recent = [];
      this.recentSecureIds.set(deviceId, recent);
    }
    if (recent.includes(messageId)) return false;
    recent.push(messageId);
    if (recent.length > RECENT_SECURE_IDS) recent.shift();
    return true;
  }

  private handleTransactionQuery(conn: DeviceConnection, deviceId: string, frame: Frame): void {
    const parsed = transactionQuerySchema.safeParse(frame);
    if (!parsed.success) {
      this.safeSend(conn, errorFrame('ERR_006', 'Missing transactionId'));
      return;
    }

    const { transactionId } = parsed.data;
    const tx = this.ledger.get(deviceId);
    if (!tx || tx.transactionId !== transactionId) {
      this.safeSend(conn, errorFrame('ERR_006', `Transaction not found: ${transactionId}`));
      return;
    }

    this.safeSend(conn, {
      type: 'TRANSACTION_STATUS',
      transactionId,
      status: tx.status,
      amount: tx.amount,
      result: tx.result,
      timestamp: now(),
    });
  }

  private dispatch(deviceId: string, frame: Frame): void {
    const reply = (message: OutboundMessage) => {
      this.sendToDevice(deviceId, message);
    };

    if (!isApplicationMessageType(frame.type)) {
      this.log.warn({ deviceId, type: frame.type }, 'unknown message type');
      reply(errorFrame('ERR_003', `Unknown message type: ${frame.type}`));
      return;
    }

    try {
      this.handlers[frame.type]({ deviceId, reply }, frame);
    } catch (e) {
      this.log.error({ err: e, deviceId, type: frame.type }, 'message handler failed');
      reply(errorFrame('ERR_003', `Error handling ${frame.type}`));
    }
  }

  private reportGap(deviceId: string, gap: SequenceGap): void {
    this.log.warn({ deviceId, ...gap }, 'sequence gap skipped');
    const lost =
      gap.resumedAt - gap.expected === 1 ? `${gap.expected}` : `${gap.expected}-${gap.resumedAt - 1}`;
    this.sendToDevice(deviceId, errorFrame('ERR_005', `Message(s) ${lost} lost; resuming at ${gap.resumedAt}`));
  }

  // --- Health ---

  checkHealth(): void {
    const cutoff = Date.now() - this.connectionTimeoutMs;
    for (const conn of [...this.byDevice.values()]) {
      if (conn.lastSeenMs >= cutoff) continue;
      this.log.warn(
        { deviceId: conn.deviceId, idleMs: Date.now() - conn.lastSeenMs },
        'closing connection after missed health checks',
      );
      this.closeConnection(conn, CLOSE_HEALTH_TIMEOUT, 'Health check timeout');
    }
  }
}
