import { z } from 'zod';
import * as dotenv from 'dotenv';

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (val) => (val === undefined || val === '' ? undefined : val === 'true' || val === true),
    z.boolean().default(fallback),
  );

const configSchema = z.object({
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  VENUE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RECONCILE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(5_000),
  RECONCILE_MAX_BACKOFF_MS: z.coerce.number().int().positive().default(60_000),
  UNACKED_ORDER_GRACE_MS: z.coerce.number().int().nonnegative().default(60_000),
  BALANCE_SOURCE: z.enum(['equity', 'cash', 'buying_power']).default('equity'),
  CANCEL_RELATED_ON_FILL: booleanFlag(true),
  DEFAULT_VENUE: z.string().optional(),
  SIMULATE_ORDERS: booleanFlag(false),
});

export type BalanceSource = 'equity' | 'cash' | 'buying_power';

export interface GatewayConfig {
  logLevel: string;
  venueTimeoutMs: number;
  reconcileIntervalMs: number;
  reconcileMaxBackoffMs: number;
  unackedOrderGraceMs: number;
  balanceSource: BalanceSource;
  cancelRelatedOnFill: boolean;
  defaultVenue?: string;
  simulateOrders: boolean;
}

export function loadConfig(envOverrides?: Record<string, string | undefined>): GatewayConfig {
  dotenv.config();
  const env = envOverrides ?? process.env;

  const parsed = configSchema.parse(env);

  return {
    logLevel: parsed.LOG_LEVEL,
    venueTimeoutMs: parsed.VENUE_TIMEOUT_MS,
    reconcileIntervalMs: parsed.RECONCILE_INTERVAL_MS,
    reconcileMaxBackoffMs: parsed.RECONCILE_MAX_BACKOFF_MS,
    unackedOrderGraceMs: parsed.UNACKED_ORDER_GRACE_MS,
    balanceSource: parsed.BALANCE_SOURCE,
    cancelRelatedOnFill: parsed.CANCEL_RELATED_ON_FILL,
    defaultVenue: parsed.DEFAULT_VENUE || undefined,
    simulateOrders: parsed.SIMULATE_ORDERS,
  };
}
