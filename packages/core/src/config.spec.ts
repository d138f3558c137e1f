import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
   loadConfigFromEnv,
   parseAdapterOptions,
   parseQueueConfiguration,
   resolveQueueConfiguration,
   withScheme,
} from './config';
import { ConfigurationError } from './errors';

const base = { brokerClient: 'nats', address: 'localhost:4222', queueName: 'jobs' } as const;

function issuesOf(fn: () => unknown): readonly string[] {
   try {
      fn();
   } catch (err) {
      if (err instanceof ConfigurationError) return err.issues;
      throw err;
   }
   throw new Error('expected a ConfigurationError');
}

describe('parseQueueConfiguration', () => {
   it('applies defaults', () => {
      const config = parseQueueConfiguration(base);

      expect(config).toMatchObject({
         brokerClient: 'nats',
         queueName: 'jobs',
         subscriptionName: 'mqbridge-sub',
         prefetch: 1,
         ackDeadlineMs: 30_000,
         receiveTimeoutMs: 1_000,
         maxRetries: 3,
         connectAttempts: 3,
         options: {},
      });
      expect(config.backoff).toEqual({ initialMs: 1_000, multiplier: 2, capMs: 60_000 });
      expect(config.connectBackoff).toEqual({ initialMs: 1_000, multiplier: 2, capMs: 60_000 });
   });

   it('parses duration strings and numeric strings', () => {
      const config = parseQueueConfiguration({
         ...base,
         ackDeadline: '45s',
         receiveTimeout: '250ms',
         backoffInitial: '1500',
         backoffCap: '2m',
         connectRetryDelay: '1h',
      });

      expect(config.ackDeadlineMs).toBe(45_000);
      expect(config.receiveTimeoutMs).toBe(250);
      expect(config.backoff.initialMs).toBe(1_500);
      expect(config.backoff.capMs).toBe(120_000);
      expect(config.connectBackoff).toEqual({
         initialMs: 3_600_000,
         multiplier: 2,
         capMs: 3_600_000,
      });
   });

   it('freezes the result', () => {
      const config = parseQueueConfiguration({ ...base, options: { partitions: 4 } });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.backoff)).toBe(true);
      expect(Object.isFrozen(config.options)).toBe(true);
   });

   it('lists every invalid field', () => {
      const issues = issuesOf(() =>
         parseQueueConfiguration({ ...base, brokerClient: 'kafka', prefetch: 0 }),
      );

      expect(issues.map((issue) => issue.split(':')[0])).toEqual(['brokerClient', 'prefetch']);
   });

   it('rejects a zero ack deadline', () => {
      expect(issuesOf(() => parseQueueConfiguration({ ...base, ackDeadline: 0 }))).toEqual([
         'ackDeadline: must be greater than zero',
      ]);
   });

   it('rejects a backoff cap below the initial delay', () => {
      expect(
         issuesOf(() =>
            parseQueueConfiguration({ ...base, backoffInitial: '10s', backoffCap: '1s' }),
         ),
      ).toEqual(['backoffCap: must not be smaller than backoffInitial']);
   });

   it('rejects a shrinking backoff multiplier', () => {
      const issues = issuesOf(() => parseQueueConfiguration({ ...base, backoffMultiplier: 0.5 }));

      expect(issues).toHaveLength(1);
      expect(issues[0]?.startsWith('backoffMultiplier:')).toBe(true);
   });

   it('rejects malformed durations', () => {
      const issues = issuesOf(() => parseQueueConfiguration({ ...base, ackDeadline: 'soon' }));

      expect(issues).toHaveLength(1);
      expect(issues[0]?.startsWith('ackDeadline:')).toBe(true);
   });
});

describe('resolveQueueConfiguration', () => {
   it('passes a parsed configuration through untouched', () => {
      const config = parseQueueConfiguration(base);

      expect(resolveQueueConfiguration(config)).toBe(config);
   });

   it('parses raw input', () => {
      expect(resolveQueueConfiguration(base).ackDeadlineMs).toBe(30_000);
   });
});

describe('loadConfigFromEnv', () => {
   const env = {
      MQBRIDGE_BROKER_CLIENT: 'gcp',
      MQBRIDGE_ADDRESS: 'demo-project',
      MQBRIDGE_QUEUE_NAME: 'jobs',
      MQBRIDGE_PREFETCH: '8',
      MQBRIDGE_ACK_DEADLINE: '20s',
      MQBRIDGE_MAX_RETRIES: '0',
      MQBRIDGE_BACKOFF_MULTIPLIER: '1.5',
      MQBRIDGE_AUTH_TOKEN: '',
   };

   it('reads MQBRIDGE_* variables', () => {
      const config = loadConfigFromEnv(env);

      expect(config.brokerClient).toBe('gcp');
      expect(config.address).toBe('demo-project');
      expect(config.prefetch).toBe(8);
      expect(config.ackDeadlineMs).toBe(20_000);
      expect(config.maxRetries).toBe(0);
      expect(config.backoff.multiplier).toBe(1.5);
      expect(config.authToken).toBeUndefined();
   });

   it('lets overrides win', () => {
      expect(loadConfigFromEnv(env, { queueName: 'other' }).queueName).toBe('other');
   });

   it('fails without the required variables', () => {
      expect(() => loadConfigFromEnv({})).toThrow(ConfigurationError);
   });
});

describe('parseAdapterOptions', () => {
   const schema = z.object({ partitions: z.number().int().min(0).default(0) });

   it('applies the adapter defaults', () => {
      const config = parseQueueConfiguration(base);

      expect(parseAdapterOptions(schema, config)).toEqual({ partitions: 0 });
   });

   it('names the broker and the offending option', () => {
      const config = parseQueueConfiguration({ ...base, options: { partitions: -1 } });

      expect(() => parseAdapterOptions(schema, config)).toThrow(
         'Invalid nats options: partitions: Number must be greater than or equal to 0',
      );
   });
});

describe('withScheme', () => {
   it('prefixes a bare host', () => {
      expect(withScheme('localhost:5672', 'amqp')).toBe('amqp://localhost:5672');
   });

   it('keeps an explicit scheme', () => {
      expect(withScheme(' amqps://broker.internal ', 'amqp')).toBe('amqps://broker.internal');
   });
});
