/**
 * Error codes surfaced to devices as `ERROR.code`.
 *
 * Devices switch on the code to pick a localized message; the `message`
 * field is a short human-readable reason, never a stack trace.
 */
export const PROTOCOL_ERROR_CODES = {
  ERR_001: 'Connection lost',
  ERR_002: 'Authentication failed',
  ERR_003: 'Message parse error',
  ERR_004: 'Type validation error',
  ERR_005: 'Sequence error',
  ERR_006: 'Payment validation failed',
  ERR_007: 'Mode mismatch',
  ERR_008: 'Port binding failed',
  ERR_009: 'Max retries exceeded',
  ERR_010: 'Unauthorized action',
} as const;

export type ProtocolErrorCode = keyof typeof PROTOCOL_ERROR_CODES;

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ProtocolError';
    this.code = code;
  }
}

export function isProtocolError(err: unknown): err is ProtocolError {
  return err instanceof ProtocolError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
