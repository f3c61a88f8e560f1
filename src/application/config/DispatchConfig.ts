/**
 * Dispatch configuration.
 *
 * Everything tunable about the reference pipelines as plain data, so it can
 * come from a JSON file or the environment. Collaborators that are not data
 * (clock, logger, stores, validators) are passed to the bus factories
 * separately.
 *
 * @module application/config/DispatchConfig
 *
 * @example
 * ```typescript
 * const config = parseDispatchConfig({
 *   retry: { maxAttempts: 5 },
 *   circuitBreaker: {
 *     failureThreshold: 3,
 *     overrides: { 'handler:payments.capture': { recoveryTimeout: 60_000 } },
 *   },
 *   idempotency: { ttl: 60_000, ttlByType: { 'orders.place': 86_400_000 } },
 * });
 * ```
 */

import { z } from 'zod';
import { ConfigurationError } from '../../domain/errors';

const milliseconds = z.number().int().nonnegative();
const positiveInt = z.number().int().positive();

const breakerSettingsSchema = z.object({
  failureThreshold: positiveInt.default(5),
  recoveryTimeout: milliseconds.default(30_000),
  successThreshold: positiveInt.default(2),
  halfOpenMaxCalls: positiveInt.default(1),
  trialLeaseMs: milliseconds.default(30_000),
});

export const DispatchConfigSchema = z.object({
  logging: z
    .object({
      enabled: z.boolean().default(true),
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      slowDispatchMs: milliseconds.default(1000),
    })
    .default({}),

  retry: z
    .object({
      maxAttempts: z.number().int().nonnegative().default(3),
      baseDelay: milliseconds.default(100),
      jitterMax: milliseconds.default(100),
    })
    .default({}),

  circuitBreaker: breakerSettingsSchema
    .extend({
      overrides: z.record(z.string(), breakerSettingsSchema.partial()).default({}),
    })
    .default({}),

  idempotency: z
    .object({
      enabled: z.boolean().default(true),
      ttl: positiveInt.default(86_400_000),
      ttlByType: z.record(z.string(), positiveInt).default({}),
      inFlightTtl: positiveInt.default(300_000),
      keyPrefix: z.string().min(1).default('idem'),
      onInFlight: z.enum(['wait', 'reject']).default('wait'),
      cancellation: z.enum(['complete-in-background', 'release']).default('complete-in-background'),
      checkFingerprint: z.boolean().default(true),
    })
    .default({}),

  timeout: z
    .object({
      timeoutMs: milliseconds.default(0),
      timeouts: z.record(z.string(), positiveInt).default({}),
    })
    .default({}),

  metrics: z
    .object({
      enabled: z.boolean().default(true),
      slowThresholdMs: milliseconds.default(1000),
    })
    .default({}),

  queryCache: z
    .object({
      enabled: z.boolean().default(false),
      ttl: positiveInt.default(300_000),
      ttlByType: z.record(z.string(), positiveInt).default({}),
      keyPrefix: z.string().min(1).default('query'),
      cacheAll: z.boolean().default(false),
      capacity: positiveInt.default(1000),
      /** Event name → key patterns cleared when the command bus publishes it */
      invalidation: z.record(z.string(), z.array(z.string().min(1))).default({}),
    })
    .default({}),

  bulkhead: z
    .object({
      enabled: z.boolean().default(false),
      maxConcurrent: positiveInt.default(10),
      maxWaitMs: milliseconds.default(5_000),
      limits: z.record(z.string(), positiveInt).default({}),
    })
    .default({}),
});

/** Fully resolved configuration */
export type DispatchConfig = z.output<typeof DispatchConfigSchema>;

/** Accepted input; every field optional */
export type DispatchConfigInput = z.input<typeof DispatchConfigSchema>;

/**
 * Validate `input` and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseDispatchConfig(input: unknown = {}): DispatchConfig {
  const parsed = DispatchConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigurationError('Invalid dispatch configuration', issues);
  }
  return parsed.data;
}

export const DEFAULT_DISPATCH_CONFIG: Readonly<DispatchConfig> = Object.freeze(parseDispatchConfig());

type EnvValue = 'number' | 'boolean' | 'string';

/**
 * Environment variable → config path.
 */
const ENV_MAPPING: ReadonlyArray<[variable: string, path: [string, string], type: EnvValue]> = [
  ['DISPATCH_LOG_ENABLED', ['logging', 'enabled'], 'boolean'],
  ['DISPATCH_LOG_LEVEL', ['logging', 'level'], 'string'],
  ['DISPATCH_SLOW_DISPATCH_MS', ['logging', 'slowDispatchMs'], 'number'],
  ['DISPATCH_RETRY_MAX_ATTEMPTS', ['retry', 'maxAttempts'], 'number'],
  ['DISPATCH_RETRY_BASE_DELAY_MS', ['retry', 'baseDelay'], 'number'],
  ['DISPATCH_RETRY_JITTER_MAX_MS', ['retry', 'jitterMax'], 'number'],
  ['DISPATCH_BREAKER_FAILURE_THRESHOLD', ['circuitBreaker', 'failureThreshold'], 'number'],
  ['DISPATCH_BREAKER_RECOVERY_TIMEOUT_MS', ['circuitBreaker', 'recoveryTimeout'], 'number'],
  ['DISPATCH_BREAKER_SUCCESS_THRESHOLD', ['circuitBreaker', 'successThreshold'], 'number'],
  ['DISPATCH_BREAKER_HALF_OPEN_MAX_CALLS', ['circuitBreaker', 'halfOpenMaxCalls'], 'number'],
  ['DISPATCH_BREAKER_TRIAL_LEASE_MS', ['circuitBreaker', 'trialLeaseMs'], 'number'],
  ['DISPATCH_IDEMPOTENCY_ENABLED', ['idempotency', 'enabled'], 'boolean'],
  ['DISPATCH_IDEMPOTENCY_TTL_MS', ['idempotency', 'ttl'], 'number'],
  ['DISPATCH_IDEMPOTENCY_KEY_PREFIX', ['idempotency', 'keyPrefix'], 'string'],
  ['DISPATCH_IDEMPOTENCY_ON_IN_FLIGHT', ['idempotency', 'onInFlight'], 'string'],
  ['DISPATCH_IDEMPOTENCY_CANCELLATION', ['idempotency', 'cancellation'], 'string'],
  ['DISPATCH_TIMEOUT_MS', ['timeout', 'timeoutMs'], 'number'],
  ['DISPATCH_METRICS_ENABLED', ['metrics', 'enabled'], 'boolean'],
  ['DISPATCH_METRICS_SLOW_THRESHOLD_MS', ['metrics', 'slowThresholdMs'], 'number'],
  ['DISPATCH_QUERY_CACHE_ENABLED', ['queryCache', 'enabled'], 'boolean'],
  ['DISPATCH_QUERY_CACHE_TTL_MS', ['queryCache', 'ttl'], 'number'],
  ['DISPATCH_QUERY_CACHE_KEY_PREFIX', ['queryCache', 'keyPrefix'], 'string'],
  ['DISPATCH_QUERY_CACHE_ALL', ['queryCache', 'cacheAll'], 'boolean'],
  ['DISPATCH_QUERY_CACHE_CAPACITY', ['queryCache', 'capacity'], 'number'],
  ['DISPATCH_BULKHEAD_ENABLED', ['bulkhead', 'enabled'], 'boolean'],
  ['DISPATCH_BULKHEAD_MAX_CONCURRENT', ['bulkhead', 'maxConcurrent'], 'number'],
  ['DISPATCH_BULKHEAD_MAX_WAIT_MS', ['bulkhead', 'maxWaitMs'], 'number'],
];

/**
 * Build a configuration from `DISPATCH_*` environment variables. Unset
 * variables keep their defaults.
 *
 * @throws ConfigurationError when a variable holds an invalid value
 */
export function readDispatchConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DispatchConfig {
  const input: Record<string, Record<string, unknown>> = {};

  for (const [variable, [section, field], type] of ENV_MAPPING) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') {
      continue;
    }
    input[section] = { ...input[section], [field]: convert(raw.trim(), type) };
  }

  return parseDispatchConfig(input);
}

function convert(raw: string, type: EnvValue): unknown {
  switch (type) {
    case 'number':
      return Number(raw);
    case 'boolean':
      if (['true', '1', 'yes'].includes(raw.toLowerCase())) {
        return true;
      }
      if (['false', '0', 'no'].includes(raw.toLowerCase())) {
        return false;
      }
      return raw;
    case 'string':
      return raw;
  }
}
