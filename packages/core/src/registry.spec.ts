import { afterEach, describe, expect, it } from 'vitest';
import { parseQueueConfiguration } from './config';
import { QueueConnection } from './connection';
import { ConfigurationError } from './errors';
import { createLogger } from './logger';
import { create, register, registeredProviders, unregister } from './registry';
import { MemoryAdapter } from './testing/memory-adapter';

const logger = createLogger({ level: 'silent' });
const config = parseQueueConfiguration({
   brokerClient: 'rabbitmq',
   address: 'memory',
   queueName: 'jobs',
});

describe('adapter registry', () => {
   afterEach(() => {
      unregister('rabbitmq');
   });

   it('builds the adapter registered for the broker key', () => {
      const adapter = new MemoryAdapter();
      register('rabbitmq', () => adapter);

      expect(create(config, logger)).toBe(adapter);
      expect(registeredProviders()).toEqual(['rabbitmq']);
   });

   it('passes the configuration to the factory', () => {
      let received: unknown;
      register('rabbitmq', (cfg) => {
         received = cfg;
         return new MemoryAdapter();
      });

      create(config, logger);

      expect(received).toBe(config);
   });

   it('refuses a second registration for the same key', () => {
      register('rabbitmq', () => new MemoryAdapter());

      expect(() => register('rabbitmq', () => new MemoryAdapter())).toThrow(
         'Broker "rabbitmq" already registered',
      );
   });

   it('names the known brokers when the key is missing', () => {
      expect(() => create(config, logger)).toThrow(ConfigurationError);
      expect(() => create(config, logger)).toThrow('Known: [–]');
   });

   it('is what QueueConnection uses when no adapter is injected', async () => {
      const adapter = new MemoryAdapter();
      register('rabbitmq', () => adapter);

      const connection = await QueueConnection.open(config, { logger });

      expect(adapter.connectCalls).toBe(1);
      await connection.close();
   });
});
