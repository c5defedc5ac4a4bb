import { z } from 'zod';
import type { ProtocolErrorCode } from '../errors.js';

// --- Inbound ---

export const frameSchema = z.object({ type: z.string().min(1) }).passthrough();

export type Frame = z.infer<typeof frameSchema>;

export const authResponseSchema = z.object({
  type: z.literal('AUTH_RESPONSE'),
  challenge: z.string().min(1).max(256),
  response: z.string().min(1).max(256),
  deviceId: z.string().trim().min(1).max(128).optional(),
  role: z.enum(['cashier', 'display']).optional(),
});

export const sequenceNumberSchema = z.number().int().nonnegative().optional();

export const deliveryConfirmedSchema = z.object({
  messageId: z.string().min(1).max(128),
});

export const secureMessageSchema = z.object({
  messageId: z.string().min(1).max(128).optional(),
  payload: frameSchema,
  requireAck: z.boolean().optional(),
});

export const transactionQuerySchema = z.object({
  transactionId: z.string().min(1).max(128),
});

export type ParsedFrame = { ok: true; frame: Frame } | { ok: false; reason: string };

/** Decodes one wire frame: a JSON object with a string `type`. */
export function parseFrame(raw: string): ParsedFrame {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'Invalid JSON format' };
  }

  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    return { ok: false, reason: 'Frame must be a JSON object' };
  }

  const parsed = frameSchema.safeParse(json);
  if (!parsed.success) return { ok: false, reason: 'Missing message type' };
  return { ok: true, frame: parsed.data };
}

export function readString(frame: Record<string, unknown>, key: string): string | null {
  const v = frame[key];
  return typeof v === 'string' ? v : null;
}

export function readObject(frame: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const parsed = z.record(z.unknown()).safeParse(frame[key]);
  return parsed.success ? parsed.data : null;
}

export function readNumber(frame: Record<string, unknown>, key: string): number | null {
  const v = frame[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

// --- Outbound ---

export function now(): string {
  return new Date().toISOString();
}

export type ErrorFrame = {
  type: 'ERROR';
  code: ProtocolErrorCode;
  message: string;
  timestamp: string;
};

export function errorFrame(code: ProtocolErrorCode, message: string): ErrorFrame {
  return { type: 'ERROR', code, message, timestamp: now() };
}

export function authFailedFrame(message: string) {
  return { type: 'AUTH_FAILED', code: 'ERR_002', message, timestamp: now() } as const;
}
