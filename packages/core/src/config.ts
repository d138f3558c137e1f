/* ================================================================
 * mqbridge - queue configuration
 * ============================================================== */
import { z } from 'zod';
import { ConfigurationError } from './errors';

export const BROKER_CLIENTS = ['pulsar', 'rabbitmq', 'gcp', 'nats'] as const;
export type BrokerClient = (typeof BROKER_CLIENTS)[number];

export const DEFAULT_RECEIVE_TIMEOUT_MS = 1_000;
export const DEFAULT_CONNECT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_CONNECT_ATTEMPTS = 3;
export const DEFAULT_SUBSCRIPTION_NAME = 'mqbridge-sub';

const UNIT_MS: Record<string, number> = { ms: 1, s: 1_000, m: 60_000, h: 3_600_000 };
const DURATION_RE = /^(\d+)\s*(ms|s|m|h)?$/;

/** Milliseconds as a number, or a string such as "250ms", "30s", "5m". */
export type Duration = number | string;

function toMilliseconds(raw: unknown): unknown {
   if (typeof raw !== 'string') return raw;
   const match = DURATION_RE.exec(raw.trim());
   if (!match) return raw;
   const [, amount = '0', unit = 'ms'] = match;
   return Number(amount) * (UNIT_MS[unit] ?? 1);
}

const duration = z.preprocess(
   toMilliseconds,
   z
      .number({
         invalid_type_error: 'expected milliseconds or a duration such as "500ms", "30s" or "5m"',
      })
      .int()
      .nonnegative(),
);

const intFrom = (min: number) => z.coerce.number().int().min(min);

export const queueConfigurationSchema = z
   .object({
      brokerClient: z.enum(BROKER_CLIENTS),
      address: z.string().min(1),
      authToken: z.string().min(1).optional(),
      credentialsPath: z.string().min(1).optional(),
      queueName: z.string().min(1),
      subscriptionName: z.string().min(1).default(DEFAULT_SUBSCRIPTION_NAME),
      prefetch: intFrom(1).default(1),
      ackDeadline: duration.default(30_000),
      receiveTimeout: duration.default(DEFAULT_RECEIVE_TIMEOUT_MS),
      maxRetries: intFrom(0).default(3),
      backoffInitial: duration.default(1_000),
      backoffMultiplier: z.coerce.number().min(1).default(2),
      backoffCap: duration.default(60_000),
      connectAttempts: intFrom(1).default(DEFAULT_CONNECT_ATTEMPTS),
      connectRetryDelay: duration.default(DEFAULT_CONNECT_RETRY_DELAY_MS),
      options: z.record(z.unknown()).default({}),
   })
   .refine((c) => c.ackDeadline > 0, {
      message: 'must be greater than zero',
      path: ['ackDeadline'],
   })
   .refine((c) => c.backoffCap >= c.backoffInitial, {
      message: 'must not be smaller than backoffInitial',
      path: ['backoffCap'],
   });

/**
 * Configuration as written by callers, before validation.
 */
export interface QueueConfigurationInput {
   brokerClient: BrokerClient;
   address: string;
   authToken?: string;
   credentialsPath?: string;
   queueName: string;
   subscriptionName?: string;
   prefetch?: number | string;
   ackDeadline?: Duration;
   receiveTimeout?: Duration;
   maxRetries?: number | string;
   backoffInitial?: Duration;
   backoffMultiplier?: number | string;
   backoffCap?: Duration;
   connectAttempts?: number | string;
   connectRetryDelay?: Duration;
   /** Adapter-specific pass-through */
   options?: Record<string, unknown>;
}

export interface BackoffPolicy {
   readonly initialMs: number;
   readonly multiplier: number;
   readonly capMs: number;
}

/**
 * Validated, frozen configuration. Durations are in milliseconds.
 */
export interface QueueConfiguration {
   readonly brokerClient: BrokerClient;
   readonly address: string;
   readonly authToken?: string;
   readonly credentialsPath?: string;
   readonly queueName: string;
   readonly subscriptionName: string;
   readonly prefetch: number;
   readonly ackDeadlineMs: number;
   readonly receiveTimeoutMs: number;
   readonly maxRetries: number;
   readonly backoff: BackoffPolicy;
   readonly connectAttempts: number;
   readonly connectBackoff: BackoffPolicy;
   /** Adapter-specific pass-through */
   readonly options: Readonly<Record<string, unknown>>;
}

const formatIssues = (error: z.ZodError) =>
   error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);

export function parseQueueConfiguration(input: unknown): QueueConfiguration {
   const result = queueConfigurationSchema.safeParse(input);
   if (!result.success) {
      throw new ConfigurationError('Invalid queue configuration', formatIssues(result.error));
   }
   const c = result.data;
   return Object.freeze({
      brokerClient: c.brokerClient,
      address: c.address,
      authToken: c.authToken,
      credentialsPath: c.credentialsPath,
      queueName: c.queueName,
      subscriptionName: c.subscriptionName,
      prefetch: c.prefetch,
      ackDeadlineMs: c.ackDeadline,
      receiveTimeoutMs: c.receiveTimeout,
      maxRetries: c.maxRetries,
      backoff: Object.freeze({
         initialMs: c.backoffInitial,
         multiplier: c.backoffMultiplier,
         capMs: c.backoffCap,
      }),
      connectAttempts: c.connectAttempts,
      connectBackoff: Object.freeze({
         initialMs: c.connectRetryDelay,
         multiplier: c.backoffMultiplier,
         capMs: Math.max(c.backoffCap, c.connectRetryDelay),
      }),
      options: Object.freeze({ ...c.options }),
   });
}

/**
 * Validate the adapter-specific `options` of a configuration against the
 * adapter's own schema.
 * @throws ConfigurationError listing every issue
 */
export function parseAdapterOptions<T extends z.ZodTypeAny>(
   schema: T,
   config: Pick<QueueConfiguration, 'brokerClient' | 'options'>,
): z.output<T> {
   const result = schema.safeParse(config.options);
   if (!result.success) {
      throw new ConfigurationError(
         `Invalid ${config.brokerClient} options`,
         formatIssues(result.error),
      );
   }
   return result.data;
}

/**
 * Prefix a bare `host:port` with the broker's URL scheme.
 */
export function withScheme(address: string, scheme: string): string {
   const trimmed = address.trim();
   return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `${scheme}://${trimmed}`;
}

const isQueueConfiguration = (
   config: QueueConfiguration | QueueConfigurationInput,
): config is QueueConfiguration =>
   Object.isFrozen(config) && 'ackDeadlineMs' in config && 'backoff' in config;

/**
 * Accept either raw input or an already-parsed configuration.
 */
export function resolveQueueConfiguration(
   config: QueueConfiguration | QueueConfigurationInput,
): QueueConfiguration {
   return isQueueConfiguration(config) ? config : parseQueueConfiguration(config);
}

const ENV_KEYS = {
   brokerClient: 'MQBRIDGE_BROKER_CLIENT',
   address: 'MQBRIDGE_ADDRESS',
   authToken: 'MQBRIDGE_AUTH_TOKEN',
   credentialsPath: 'MQBRIDGE_CREDENTIALS_PATH',
   queueName: 'MQBRIDGE_QUEUE_NAME',
   subscriptionName: 'MQBRIDGE_SUBSCRIPTION_NAME',
   prefetch: 'MQBRIDGE_PREFETCH',
   ackDeadline: 'MQBRIDGE_ACK_DEADLINE',
   receiveTimeout: 'MQBRIDGE_RECEIVE_TIMEOUT',
   maxRetries: 'MQBRIDGE_MAX_RETRIES',
   backoffInitial: 'MQBRIDGE_BACKOFF_INITIAL',
   backoffMultiplier: 'MQBRIDGE_BACKOFF_MULTIPLIER',
   backoffCap: 'MQBRIDGE_BACKOFF_CAP',
   connectAttempts: 'MQBRIDGE_CONNECT_ATTEMPTS',
   connectRetryDelay: 'MQBRIDGE_CONNECT_RETRY_DELAY',
} as const;

/**
 * Build a configuration from `MQBRIDGE_*` variables; `overrides` win.
 */
export function loadConfigFromEnv(
   env: NodeJS.ProcessEnv = process.env,
   overrides: Partial<QueueConfigurationInput> = {},
): QueueConfiguration {
   const fromEnv: Record<string, string> = {};
   for (const [key, variable] of Object.entries(ENV_KEYS)) {
      const value = env[variable];
      if (value !== undefined && value !== '') fromEnv[key] = value;
   }
   return parseQueueConfiguration({ ...fromEnv, ...overrides });
}
