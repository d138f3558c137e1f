/* ================================================================
 * Plugin registry – adapters call register("rabbitmq", factory)
 * ============================================================== */
import type { BrokerClient, QueueConfiguration } from './config';
import { ConfigurationError } from './errors';
import { componentLogger, type Logger } from './logger';
import type { BackendAdapter } from './types';

/**
 * Builds an adapter for a validated configuration. The adapter is not
 * connected yet; `QueueConnection` owns the connect/disconnect cycle.
 */
export type AdapterFactory = (config: QueueConfiguration, logger: Logger) => BackendAdapter;

const REGISTRY: Map<BrokerClient, AdapterFactory> = new Map();

/**
 * register an adapter factory.
 *
 * Adapter packages call this on import, so importing
 * `@mqbridge/rabbitmq` is enough to make `brokerClient: 'rabbitmq'`
 * available.
 * @param provider - broker key the factory serves
 * @param factory - builds an unconnected adapter
 * @throws Error if the provider is already registered.
 * @example
 * ```ts
 * import { register } from '@mqbridge/core';
 * register('rabbitmq', (config, logger) => new RabbitAdapter(config, logger));
 * ```
 * @see create
 */
export function register(provider: BrokerClient, factory: AdapterFactory): void {
   if (REGISTRY.has(provider)) {
      throw new Error(`Broker "${provider}" already registered`);
   }
   REGISTRY.set(provider, factory);
}

/**
 * Remove a registration. Returns whether one existed.
 */
export function unregister(provider: BrokerClient): boolean {
   return REGISTRY.delete(provider);
}

export function registeredProviders(): BrokerClient[] {
   return [...REGISTRY.keys()];
}

/**
 * Build the adapter selected by `config.brokerClient`.
 * @throws ConfigurationError if no adapter is registered for it.
 * @see register
 */
export function create(config: QueueConfiguration, logger?: Logger): BackendAdapter {
   const factory = REGISTRY.get(config.brokerClient);
   if (!factory) {
      const known = registeredProviders().join(', ');
      throw new ConfigurationError(
         `Broker "${config.brokerClient}" not registered (import its adapter package). Known: [${known || '–'}]`,
      );
   }
   return factory(
      config,
      componentLogger('adapter', logger, { provider: config.brokerClient }),
   );
}
