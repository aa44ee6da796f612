import { join } from 'node:path';
import { z } from 'zod';

export const DEFAULT_TORQUE_HOME = '/var/spool/torque';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

/**
 * Zod schema for the relay's environment.
 *
 * Values arrive as strings; numbers and flags are coerced here so the
 * rest of the code only sees typed config.
 */
export const relayEnvSchema = z.object({
  TORQUE_HOME: z.string().min(1).default(DEFAULT_TORQUE_HOME),
  SERVER_LOGS_DIR: z.string().min(1).optional(),
  ACCOUNTING_LOGS_DIR: z.string().min(1).optional(),
  WEBHOOK_URL: z.string().url({ message: 'WEBHOOK_URL must be a valid URL' }),
  WEBHOOK_USERNAME: z.string().min(1).optional(),
  WEBHOOK_CHANNEL: z.string().min(1).optional(),
  MIN_POST_DELAY_SECONDS: z.coerce.number().min(0).default(6),
  REPLAY_FILES: z.coerce.number().int().min(0).default(7),
  FAILURE_POLICY: z.enum(['continue', 'abort']).default('continue'),
  FAILURE_COOLDOWN_SECONDS: z.coerce.number().min(0).default(120),
  WATCH_POLLING: booleanFlag.default('false'),
  WATCH_POLL_INTERVAL_MS: z.coerce.number().int().min(50).default(1000),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  STATUS_HOST: z.string().min(1).default('127.0.0.1'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type RelayEnv = z.infer<typeof relayEnvSchema>;

export interface RelayConfig {
  serverLogsDir: string;
  accountingLogsDir: string;
  webhook: { url: string; username: string | undefined; channel: string | undefined };
  minPostDelaySeconds: number;
  replayFiles: number;
  failurePolicy: 'continue' | 'abort';
  failureCooldownSeconds: number;
  watch: { usePolling: boolean; pollIntervalMs: number };
  status: { port: number; host: string } | null;
  logLevel: RelayEnv['LOG_LEVEL'];
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/**
 * Builds the relay config from environment variables.
 *
 * Empty strings count as unset. Throws ConfigError listing every
 * invalid variable.
 */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = relayEnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    serverLogsDir: e.SERVER_LOGS_DIR ?? join(e.TORQUE_HOME, 'server_logs'),
    accountingLogsDir: e.ACCOUNTING_LOGS_DIR ?? join(e.TORQUE_HOME, 'server_priv', 'accounting'),
    webhook: { url: e.WEBHOOK_URL, username: e.WEBHOOK_USERNAME, channel: e.WEBHOOK_CHANNEL },
    minPostDelaySeconds: e.MIN_POST_DELAY_SECONDS,
    replayFiles: e.REPLAY_FILES,
    failurePolicy: e.FAILURE_POLICY,
    failureCooldownSeconds: e.FAILURE_COOLDOWN_SECONDS,
    watch: { usePolling: e.WATCH_POLLING, pollIntervalMs: e.WATCH_POLL_INTERVAL_MS },
    status: e.STATUS_PORT === undefined ? null : { port: e.STATUS_PORT, host: e.STATUS_HOST },
    logLevel: e.LOG_LEVEL,
  };
}
