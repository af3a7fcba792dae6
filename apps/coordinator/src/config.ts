import { z } from "zod";

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const CoordinatorConfigSchema = z.object({
  inboxCapacity: z.number().int().positive().default(256),
  schedulerInboxCapacity: z.number().int().positive().default(1024),
  maxRetries: z.number().int().nonnegative().default(3),
  retryBackoffMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(500),
  retryBackoffMaxMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(30_000),
  dispatchTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(60_000),
  receiveTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(1_000),
  tickIntervalMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(1_000),
  capacityWarningPasses: z.number().int().positive().default(10),
  shutdownGraceMs: z.number().int().nonnegative().max(MAX_TIMER_DELAY_MS).default(10_000),
  onDependencyFailure: z.enum(["cancel", "fallback"]).default("cancel"),
  fallbackResult: z.unknown().optional()
});

export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;
export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;

export const DEFAULT_CONFIG: CoordinatorConfig = CoordinatorConfigSchema.parse({});

export function resolveConfig(input: CoordinatorConfigInput = {}): CoordinatorConfig {
  return CoordinatorConfigSchema.parse(input);
}

const envInt = z.coerce.number().int();

const EnvSchema = z.object({
  COORDINATOR_INBOX_CAPACITY: envInt.positive().optional(),
  COORDINATOR_SCHEDULER_INBOX_CAPACITY: envInt.positive().optional(),
  COORDINATOR_MAX_RETRIES: envInt.nonnegative().optional(),
  COORDINATOR_RETRY_BACKOFF_MS: envInt.nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
  COORDINATOR_RETRY_BACKOFF_MAX_MS: envInt.nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
  COORDINATOR_DISPATCH_TIMEOUT_MS: envInt.positive().max(MAX_TIMER_DELAY_MS).optional(),
  COORDINATOR_RECEIVE_TIMEOUT_MS: envInt.positive().max(MAX_TIMER_DELAY_MS).optional(),
  COORDINATOR_TICK_INTERVAL_MS: envInt.positive().max(MAX_TIMER_DELAY_MS).optional(),
  COORDINATOR_CAPACITY_WARNING_PASSES: envInt.positive().optional(),
  COORDINATOR_SHUTDOWN_GRACE_MS: envInt.nonnegative().max(MAX_TIMER_DELAY_MS).optional(),
  COORDINATOR_ON_DEPENDENCY_FAILURE: z.enum(["cancel", "fallback"]).optional(),
  COORDINATOR_FALLBACK_RESULT: z.string().optional()
});

/**
 * Reads `COORDINATOR_*` variables over the defaults. A fallback result is
 * taken as JSON when it parses and as a plain string otherwise.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const parsed = EnvSchema.parse(env);

  return resolveConfig({
    inboxCapacity: parsed.COORDINATOR_INBOX_CAPACITY,
    schedulerInboxCapacity: parsed.COORDINATOR_SCHEDULER_INBOX_CAPACITY,
    maxRetries: parsed.COORDINATOR_MAX_RETRIES,
    retryBackoffMs: parsed.COORDINATOR_RETRY_BACKOFF_MS,
    retryBackoffMaxMs: parsed.COORDINATOR_RETRY_BACKOFF_MAX_MS,
    dispatchTimeoutMs: parsed.COORDINATOR_DISPATCH_TIMEOUT_MS,
    receiveTimeoutMs: parsed.COORDINATOR_RECEIVE_TIMEOUT_MS,
    tickIntervalMs: parsed.COORDINATOR_TICK_INTERVAL_MS,
    capacityWarningPasses: parsed.COORDINATOR_CAPACITY_WARNING_PASSES,
    shutdownGraceMs: parsed.COORDINATOR_SHUTDOWN_GRACE_MS,
    onDependencyFailure: parsed.COORDINATOR_ON_DEPENDENCY_FAILURE,
    fallbackResult:
      parsed.COORDINATOR_FALLBACK_RESULT === undefined
        ? undefined
        : parseLooseJson(parsed.COORDINATOR_FALLBACK_RESULT)
  });
}

function parseLooseJson(raw: string): unknown {
  try {
    const value: unknown = JSON.parse(raw);
    return value;
  } catch {
    return raw;
  }
}
