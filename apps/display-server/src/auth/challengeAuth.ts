import crypto from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { TIMINGS } from '../config.js';

export type DeviceRole = 'cashier' | 'display';

export type Challenge = {
  challenge: string;
  issuedAt: string;
};

export type DeviceSession = {
  deviceId: string;
  role: DeviceRole;
  token: string;
  expiresAt: Date;
};

export type ChallengeAuthOptions = {
  sharedSecret: string;
  logger: FastifyBaseLogger;
  challengeTimeoutMs?: number;
  sessionTtlMs?: number;
  cleanupIntervalMs?: number;
};

const TOKEN_ISSUER = 'tillbridge';

const tokenPayloadSchema = z.object({
  iss: z.string(),
  sub: z.string().min(1),
  iat: z.number().int(),
  exp: z.number().int(),
  role: z.enum(['cashier', 'display']),
  jti: z.string(),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

export function hmacBase64Url(key: string, data: string): string {
  return crypto.createHmac('sha256', key).update(data).digest('base64url');
}

export function safeEquals(a: string, b: string): boolean {
  const aBuf = Buffer.from(a, 'utf8');
  const bBuf = Buffer.from(b, 'utf8');
  if (aBuf.length !== bBuf.length) return false;
  return crypto.timingSafeEqual(aBuf, bBuf);
}

function randomToken(bytes: number): string {
  return crypto.randomBytes(bytes).toString('base64url');
}

function encodeSegment(value: Record<string, unknown>): string {
  return Buffer.from(JSON.stringify(value), 'utf8').toString('base64url');
}

function decodePayload(segment: string): TokenPayload | null {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(segment, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  const parsed = tokenPayloadSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Challenge-response authentication for paired devices.
 *
 * A device proves knowledge of the shared secret by returning
 * `base64url(HMAC-SHA256(secret, challenge))`. Challenges are single use and
 * expire after 30s. Issued tokens are JWT-shaped (HS256) and verifiable without
 * consulting the session map.
 */
export class ChallengeAuth {
  private readonly secret: string;
  private readonly log: FastifyBaseLogger;
  private readonly challengeTimeoutMs: number;
  private readonly sessionTtlMs: number;
  private readonly cleanupIntervalMs: number;

  private readonly challenges = new Map<string, number>();
  private readonly sessions = new Map<string, DeviceSession>();
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(opts: ChallengeAuthOptions) {
    this.secret = opts.sharedSecret;
    this.log = opts.logger;
    this.challengeTimeoutMs = opts.challengeTimeoutMs ?? TIMINGS.challengeTimeoutMs;
    this.sessionTtlMs = opts.sessionTtlMs ?? TIMINGS.sessionTtlMs;
    this.cleanupIntervalMs = opts.cleanupIntervalMs ?? TIMINGS.sessionCleanupIntervalMs;
  }

  start(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => this.cleanupExpiredSessions(), this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stop(): void {
    if (this.cleanupTimer) clearInterval(this.cleanupTimer);
    this.cleanupTimer = null;
  }

  generateChallenge(): Challenge {
    const challenge = randomToken(32);
    const issuedAtMs = Date.now();
    this.challenges.set(challenge, issuedAtMs);
    return { challenge, issuedAt: new Date(issuedAtMs).toISOString() };
  }

  /** Expected response a device must send back for `challenge`. */
  expectedResponse(challenge: string): string {
    return hmacBase64Url(this.secret, challenge);
  }

  verifyResponse(challenge: string, response: string): boolean {
    const issuedAtMs = this.challenges.get(challenge);
    if (issuedAtMs === undefined) return false;

    if (Date.now() - issuedAtMs > this.challengeTimeoutMs) {
      this.challenges.delete(challenge);
      return false;
    }

    const valid = safeEquals(response, this.expectedResponse(challenge));
    if (valid) this.challenges.delete(challenge);
    return valid;
  }

  issueToken(deviceId: string, role: DeviceRole): string {
    const issuedAtMs = Date.now();
    const expiresAt = new Date(issuedAtMs + this.sessionTtlMs);

    const payload: TokenPayload = {
      iss: TOKEN_ISSUER,
      sub: deviceId,
      iat: Math.floor(issuedAtMs / 1000),
      exp: Math.floor(expiresAt.getTime() / 1000),
      role,
      jti: randomToken(16),
    };

    const header = encodeSegment({ alg: 'HS256', typ: 'JWT' });
    const body = encodeSegment(payload);
    const token = `${header}.${body}.${hmacBase64Url(this.secret, `${header}.${body}`)}`;

    // A new session supersedes any previous one for the same device.
    this.sessions.set(deviceId, { deviceId, role, token, expiresAt });
    return token;
  }

  /** Stateless check: shape, expiry and signature. */
  verifyToken(token: string): TokenPayload | null {
    const parts = token.split('.');
    if (parts.length !== 3) return null;
    const [header, body, signature] = parts;

    const payload = decodePayload(body);
    if (!payload) return null;
    if (Math.floor(Date.now() / 1000) > payload.exp) return null;

    if (!safeEquals(signature, hmacBase64Url(this.secret, `${header}.${body}`))) return null;
    return payload;
  }

  validateToken(token: string): boolean {
    return this.verifyToken(token) !== null;
  }

  deviceIdOf(token: string): string | null {
    return this.verifyToken(token)?.sub ?? null;
  }

  isAuthenticated(deviceId: string): boolean {
    const session = this.sessions.get(deviceId);
    if (!session) return false;
    if (session.expiresAt.getTime() <= Date.now()) {
      this.sessions.delete(deviceId);
      return false;
    }
    return true;
  }

  getSession(deviceId: string): DeviceSession | null {
    return this.isAuthenticated(deviceId) ? (this.sessions.get(deviceId) ?? null) : null;
  }

  removeSession(deviceId: string): void {
    this.sessions.delete(deviceId);
  }

  cleanupExpiredSessions(): void {
    const now = Date.now();
    let sessionsDropped = 0;
    let challengesDropped = 0;

    for (const [deviceId, session] of this.sessions) {
      if (session.expiresAt.getTime() <= now) {
        this.sessions.delete(deviceId);
        sessionsDropped++;
      }
    }
    for (const [challenge, issuedAtMs] of this.challenges) {
      if (now - issuedAtMs > this.challengeTimeoutMs) {
        this.challenges.delete(challenge);
        challengesDropped++;
      }
    }

    if (sessionsDropped > 0 || challengesDropped > 0) {
      this.log.debug({ sessionsDropped, challengesDropped }, 'auth cleanup');
    }
  }

  get activeSessionCount(): number {
    return this.sessions.size;
  }

  get pendingChallengeCount(): number {
    return this.challenges.size;
  }
}
