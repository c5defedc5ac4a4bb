import websocket from '@fastify/websocket';
import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from 'fastify';
import { ChallengeAuth } from './auth/challengeAuth.js';
import type { ServerConfig } from './config.js';
import { ConnectionManager } from './connections/connectionManager.js';
import { createMessageHandlers } from './connections/messageHandlers.js';
import { DisplayState } from './display/displayState.js';
import { DeliveryQueue } from './messaging/deliveryQueue.js';
import { PaymentLock } from './payments/paymentLock.js';
import { PaymentOrchestrator } from './payments/paymentOrchestrator.js';
import { UnavailableTerminal, type PaymentTerminal } from './payments/terminal.js';
import { TransactionLedger } from './payments/transactionLedger.js';
import { resolveLanAddress } from './net/lanAddress.js';
import { registerDeviceSocketRoute } from './routes/deviceSocket.js';
import { registerStatusRoutes } from './routes/status.js';

export type DisplayServices = {
  auth: ChallengeAuth;
  queue: DeliveryQueue;
  ledger: TransactionLedger;
  lock: PaymentLock;
  display: DisplayState;
  payments: PaymentOrchestrator;
  manager: ConnectionManager;
};

export function createServices(opts: {
  logger: FastifyBaseLogger;
  config: ServerConfig;
  terminal?: PaymentTerminal;
  serverPort?: () => number | null;
}): DisplayServices {
  const { logger, config } = opts;

  const auth = new ChallengeAuth({ sharedSecret: config.sharedSecret, logger });
  const queue = new DeliveryQueue({ logger });
  const ledger = new TransactionLedger({ logger });
  const lock = new PaymentLock({ logger });
  const display = new DisplayState({ logger, initialMode: config.initialMode });

  const payments: PaymentOrchestrator = new PaymentOrchestrator({
    logger,
    display,
    lock,
    ledger,
    queue,
    terminal: opts.terminal ?? new UnavailableTerminal(),
    notify: (deviceId, message) => manager.sendToDevice(deviceId, message),
    maxAmount: config.paymentMaxAmount,
  });

  const manager: ConnectionManager = new ConnectionManager({
    logger,
    auth,
    queue,
    ledger,
    display,
    handlers: createMessageHandlers({ logger, display, ledger, payments }),
    serverPort: opts.serverPort ?? (() => null),
  });

  return { auth, queue, ledger, lock, display, payments, manager };
}

export async function buildApp(opts: {
  config: ServerConfig;
  logger?: FastifyServerOptions['logger'];
  terminal?: PaymentTerminal;
}) {
  const app = Fastify({ logger: opts.logger ?? true });

  const serverPort = (): number | null => {
    const address = app.server.address();
    return address !== null && typeof address === 'object' ? address.port : null;
  };

  const services = createServices({ logger: app.log, config: opts.config, terminal: opts.terminal, serverPort });

  await app.register(websocket);
  await registerDeviceSocketRoute(app, services.manager);
  await registerStatusRoutes(app, {
    manager: services.manager,
    display: services.display,
    queue: services.queue,
    ledger: services.ledger,
    serverPort,
    lanAddress: () => resolveLanAddress(),
  });

  app.addHook('onReady', async () => {
    services.manager.start();
  });

  app.addHook('onClose', async () => {
    await services.payments.stop();
    services.manager.stop();
  });

  return app;
}
