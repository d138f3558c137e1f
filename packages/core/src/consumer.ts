import type { QueueConnection } from './connection';
import type { MessageHandle } from './message-handle';

export interface MessageStreamOptions {
   /** End the stream after this long without a message; runs until aborted when omitted */
   inactivityTimeoutMs?: number;
   /** Handles requested per poll (defaults to the configured prefetch) */
   batchSize?: number;
   signal?: AbortSignal;
}

/**
 * Pulls messages from the connection's queue as {@link MessageHandle}s.
 * Consumers place no lock around `poll`; several of them on one queue
 * compete for messages as the broker distributes them.
 */
export class Consumer {
   constructor(private readonly connection: QueueConnection) {}

   /**
    * Largest batch one poll may return: the adapter's advertised
    * maximum, or 1 when it cannot batch.
    */
   get batchLimit(): number {
      const caps = this.connection.capabilities;
      return caps.prefetchBatching ? Math.max(1, caps.maxPrefetch) : 1;
   }

   /**
    * Receive up to `maxCount` messages (clamped to {@link batchLimit}),
    * waiting at most the configured receive timeout. An empty array
    * means nothing arrived in time.
    * @throws ConnectionClosedError if the connection is, or gets, closed
    */
   async poll(maxCount: number = this.connection.config.prefetch): Promise<MessageHandle[]> {
      const count = Math.max(1, Math.min(Math.floor(maxCount), this.batchLimit));
      const timeoutMs = this.connection.config.receiveTimeoutMs;
      const messages = await this.connection.execute(
         (adapter, signal) => adapter.receive(count, timeoutMs, signal),
         { serial: true },
      );
      this.connection.assertOpen();
      return messages.slice(0, count).map((message) => this.connection.track(message));
   }

   /**
    * Stream handles one at a time. Each call starts a fresh sequence.
    */
   async *messages(options: MessageStreamOptions = {}): AsyncGenerator<MessageHandle, void, undefined> {
      const { inactivityTimeoutMs, batchSize, signal } = options;
      let lastMessageAt = Date.now();

      while (!signal?.aborted) {
         const batch = await this.poll(batchSize);
         if (batch.length === 0) {
            if (
               inactivityTimeoutMs !== undefined &&
               Date.now() - lastMessageAt >= inactivityTimeoutMs
            ) {
               return;
            }
            continue;
         }
         lastMessageAt = Date.now();
         yield* batch;
      }
   }
}
