import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { RawData } from 'ws';
import type { ConnectionManager, DeviceConnection, SocketSink } from '../connections/connectionManager.js';
import { ProtocolError } from '../errors.js';

/** The part of a `ws` socket the device channel uses. */
export interface DeviceSocket {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: (code: number) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export function decodeFrame(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function socketSink(socket: DeviceSocket): SocketSink {
  return {
    send(frame) {
      if (socket.readyState !== socket.OPEN) throw new ProtocolError('ERR_001', 'Connection lost');
      socket.send(frame);
    },
    close(code, reason) {
      socket.close(code, reason);
    },
  };
}

/** Hands a freshly upgraded socket to the manager and forwards its events. */
export function bindDeviceSocket(
  socket: DeviceSocket,
  manager: ConnectionManager,
  log: FastifyBaseLogger,
): DeviceConnection {
  const conn = manager.accept(socketSink(socket));

  socket.on('message', (data) => {
    conn.receive(decodeFrame(data));
  });

  socket.on('close', (code) => {
    log.debug({ connectionId: conn.id, code }, 'device socket closed');
    conn.handleClose();
  });

  socket.on('error', (err) => {
    log.warn({ err, connectionId: conn.id }, 'device socket error');
    conn.handleClose();
  });

  return conn;
}

/** Devices pair over a websocket at the server root. */
export async function registerDeviceSocketRoute(app: FastifyInstance, manager: ConnectionManager) {
  app.get('/', { websocket: true }, (socket, req) => {
    const conn = bindDeviceSocket(socket, manager, req.log);
    req.log.info({ connectionId: conn.id, remoteAddress: req.ip }, 'device socket opened');
  });
}
