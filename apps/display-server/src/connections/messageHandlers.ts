import type { FastifyBaseLogger } from 'fastify';
import type { DisplayState } from '../display/displayState.js';
import type { OutboundMessage } from '../messaging/deliveryQueue.js';
import type { PaymentOrchestrator } from '../payments/paymentOrchestrator.js';
import type { TransactionLedger } from '../payments/transactionLedger.js';
import { errorFrame, readObject, readString, type Frame } from '../protocol/frames.js';

export const APPLICATION_MESSAGE_TYPES = [
  'SET_MODE',
  'UPDATE_CART',
  'NEW_ORDER',
  'START_PAYMENT',
  'UPDATE_PAYMENT_STATUS',
  'PAYMENT_SUCCESS',
  'PAYMENT_FAILED',
  'CANCEL_PAYMENT',
  'CLEAR_PAYMENT',
] as const;

export type ApplicationMessageType = (typeof APPLICATION_MESSAGE_TYPES)[number];

const KNOWN_TYPES: ReadonlySet<string> = new Set(APPLICATION_MESSAGE_TYPES);

export function isApplicationMessageType(type: string): type is ApplicationMessageType {
  return KNOWN_TYPES.has(type);
}

export type MessageContext = {
  deviceId: string;
  reply: (message: OutboundMessage) => void;
};

export type MessageHandler = (ctx: MessageContext, frame: Frame) => void;

export type MessageHandlers = Record<ApplicationMessageType, MessageHandler>;

export function createMessageHandlers(deps: {
  logger: FastifyBaseLogger;
  display: DisplayState;
  ledger: TransactionLedger;
  payments: PaymentOrchestrator;
}): MessageHandlers {
  const { logger: log, display, ledger, payments } = deps;

  return {
    SET_MODE(ctx, frame) {
      const mode = readString(frame, 'mode');
      if (mode === null) {
        ctx.reply(errorFrame('ERR_004', 'mode must be a string'));
        return;
      }
      display.setMode(mode);
    },

    UPDATE_CART(ctx, frame) {
      const cart = readObject(frame, 'data');
      if (!cart) {
        ctx.reply(errorFrame('ERR_004', 'Invalid cart data type'));
        return;
      }
      display.updateCart(cart);
    },

    NEW_ORDER(ctx, frame) {
      const order = readObject(frame, 'data');
      if (!order) {
        ctx.reply(errorFrame('ERR_004', 'Invalid order data type'));
        return;
      }
      display.addOrder(order);
      log.info({ deviceId: ctx.deviceId, orderId: order.id ?? null }, 'order received');
    },

    START_PAYMENT(ctx, frame) {
      payments.startPayment(ctx.deviceId, frame);
    },

    UPDATE_PAYMENT_STATUS(_ctx, frame) {
      display.updatePaymentStatus(readString(frame, 'status') ?? 'processing', readString(frame, 'message'));
    },

    PAYMENT_SUCCESS(ctx, frame) {
      display.setPaymentSuccess(readObject(frame, 'data'));
      ledger.clear(ctx.deviceId);
    },

    PAYMENT_FAILED(_ctx, frame) {
      display.setPaymentFailed(readString(frame, 'message') ?? 'Payment failed');
    },

    CANCEL_PAYMENT(ctx) {
      payments.cancelPayment(ctx.deviceId);
    },

    CLEAR_PAYMENT() {
      display.clearPayment();
    },
  };
}
