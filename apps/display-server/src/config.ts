import { z } from 'zod';

export const TIMINGS = Object.freeze({
  challengeTimeoutMs: 30 * 1000,
  authHandshakeTimeoutMs: 10 * 1000,
  healthCheckIntervalMs: 30 * 1000,
  connectionTimeoutMs: 60 * 1000,
  retryIntervalMs: 5 * 1000,
  maxRetries: 10,
  messageExpiryMs: 30 * 60 * 1000,
  expirySweepIntervalMs: 5 * 60 * 1000,
  paymentLockTimeoutMs: 5 * 60 * 1000,
  paymentCancelGraceMs: 5 * 1000,
  sessionTtlMs: 60 * 60 * 1000,
  sessionCleanupIntervalMs: 60 * 1000,
  deliveryTimeoutMs: 30 * 1000,
});

export type Timings = typeof TIMINGS;

export const displayModeSchema = z.enum(['NONE', 'CDS', 'KDS']);

export type DisplayMode = z.infer<typeof displayModeSchema>;

const portSchema = z.coerce.number().int().min(1).max(65535);

const envSchema = z
  .object({
    HOST: z.string().trim().min(1).default('0.0.0.0'),
    PORT_MIN: portSchema.default(8080),
    PORT_MAX: portSchema.default(8090),
    WS_SHARED_SECRET: z.string().min(16, 'WS_SHARED_SECRET must be at least 16 characters'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    INITIAL_MODE: z
      .string()
      .trim()
      .transform((v) => v.toUpperCase())
      .pipe(displayModeSchema)
      .default('NONE'),
    PAYMENT_MAX_AMOUNT: z.coerce.number().positive().default(100_000),
  })
  .refine((env) => env.PORT_MIN <= env.PORT_MAX, {
    message: 'PORT_MIN must not exceed PORT_MAX',
    path: ['PORT_MIN'],
  });

export type ServerConfig = {
  host: string;
  portRange: { min: number; max: number };
  sharedSecret: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  initialMode: DisplayMode;
  paymentMaxAmount: number;
};

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [k, v] of Object.entries(env)) {
    out[k] = v === undefined || v.trim() === '' ? undefined : v;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv): ServerConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const reasons = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`);
    throw new Error(`Invalid configuration (${reasons.join('; ')})`);
  }

  const e = parsed.data;
  return {
    host: e.HOST,
    portRange: { min: e.PORT_MIN, max: e.PORT_MAX },
    sharedSecret: e.WS_SHARED_SECRET,
    logLevel: e.LOG_LEVEL,
    initialMode: e.INITIAL_MODE,
    paymentMaxAmount: e.PAYMENT_MAX_AMOUNT,
  };
}
