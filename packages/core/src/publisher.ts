import type { QueueConnection } from './connection';
import type { PublishOptions } from './types';

const encoder = new TextEncoder();

/**
 * Sends messages to the connection's queue. No buffering: each call is
 * one publish that resolves once the broker has accepted the message.
 */
export class Publisher {
   constructor(private readonly connection: QueueConnection) {}

   /**
    * Publish `payload` (strings are UTF-8 encoded).
    * @throws PublishError on transport failure; the caller may retry
    * @throws ConnectionClosedError once the connection is closed
    */
   async send(payload: Uint8Array | string, options?: PublishOptions): Promise<void> {
      const bytes = typeof payload === 'string' ? encoder.encode(payload) : payload;
      await this.connection.execute((adapter) => adapter.publish(bytes, options), {
         serial: true,
      });
   }

   sendJson(value: unknown, options?: PublishOptions): Promise<void> {
      return this.send(JSON.stringify(value), options);
   }
}
