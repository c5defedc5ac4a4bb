import type { FastifyInstance } from 'fastify';
import type { ConnectionManager } from '../connections/connectionManager.js';
import type { DisplayState } from '../display/displayState.js';
import type { DeliveryQueue } from '../messaging/deliveryQueue.js';
import type { TransactionLedger } from '../payments/transactionLedger.js';

export async function registerStatusRoutes(
  app: FastifyInstance,
  deps: {
    manager: ConnectionManager;
    display: DisplayState;
    queue: DeliveryQueue;
    ledger: TransactionLedger;
    serverPort: () => number | null;
    lanAddress: () => string;
  },
) {
  app.get('/health', async () => ({ ok: true }));

  app.get('/status', async () => ({
    ok: true,
    port: deps.serverPort(),
    lanAddress: deps.lanAddress(),
    mode: deps.display.currentMode,
    payment: deps.display.paymentStatus,
    devices: deps.manager.listDevices(),
    pendingDeliveries: deps.queue.pendingCount,
    transactions: deps.ledger.list(),
  }));
}
