/* ================================================================
 * mqbridge - RetryingConsumer: receive → process → ack/nack → retry
 * ============================================================== */
import { backoffDelay, sleep } from './backoff';
import type { BackoffPolicy } from './config';
import type { QueueConnection } from './connection';
import type { Consumer } from './consumer';
import {
   ConnectError,
   ConnectionClosedError,
   ProcessingError,
   QueueError,
   RetriesExhaustedError,
   StaleAckError,
} from './errors';
import { dispatchError } from './error-sink';
import { componentLogger, type Logger } from './logger';
import { AckState, type MessageHandle } from './message-handle';
import type { ErrorContext, ErrorSink } from './types';

/**
 * Caller-supplied processing logic. Resolving acks the message; throwing
 * (or rejecting) counts as a failed attempt. `signal` aborts when the
 * ack deadline expires.
 */
export type ProcessFn = (
   payload: Uint8Array,
   handle: MessageHandle,
   signal: AbortSignal,
) => unknown;

export interface RetryingConsumerOptions {
   /** Receives RetriesExhaustedError, StaleAckError and loop errors */
   errorSink?: ErrorSink;
   logger?: Logger;
   /** Messages processed concurrently per cycle (defaults to config.prefetch) */
   prefetch?: number;
   /** Defaults to config.maxRetries */
   maxRetries?: number;
   /** Overrides of config.backoff */
   backoff?: Partial<BackoffPolicy>;
   /** How many failure counts to remember for brokers that do not count redeliveries */
   attemptMemory?: number;
}

export interface CycleReport {
   received: number;
   acked: number;
   retried: number;
   dropped: number;
   timedOut: number;
   /** Settlements that failed; the broker redelivers those */
   errored: number;
}

type Outcome = 'acked' | 'retried' | 'dropped' | 'timedOut' | 'errored';

type Attempt =
   | { status: 'ok' }
   | { status: 'failed'; error: unknown }
   | { status: 'expired' };

const DEFAULT_ATTEMPT_MEMORY = 10_000;

const terminates = (err: unknown) =>
   err instanceof ConnectError || err instanceof ConnectionClosedError;

const asQueueError = (err: unknown): QueueError =>
   err instanceof QueueError
      ? err
      : new ProcessingError(err instanceof Error ? err.message : String(err), { cause: err });

/**
 * The consumption loop most applications use.
 *
 * Each polled message is processed under its ack deadline and settled
 * exactly once: acked on success; on failure nacked after the current
 * backoff interval until `maxRetries` failures have been retried, then
 * acked and reported as {@link RetriesExhaustedError}. If the deadline
 * expires first the broker owns redelivery and the handle is left alone.
 *
 * Processing must be idempotent: brokers may deliver a message twice
 * and no de-duplication happens here.
 */
export class RetryingConsumer {
   readonly prefetch: number;
   readonly maxRetries: number;
   readonly backoff: BackoffPolicy;

   private readonly consumer: Consumer;
   private readonly logger: Logger;
   private readonly errorSink?: ErrorSink;
   private readonly attemptMemory: number;
   /* message id → failures so far, oldest first */
   private readonly failures = new Map<string, number>();

   constructor(
      private readonly connection: QueueConnection,
      options: RetryingConsumerOptions = {},
   ) {
      const { config } = connection;
      this.consumer = connection.consumer();
      this.prefetch = Math.min(options.prefetch ?? config.prefetch, this.consumer.batchLimit);
      this.maxRetries = options.maxRetries ?? config.maxRetries;
      this.backoff = { ...config.backoff, ...options.backoff };
      this.errorSink = options.errorSink;
      this.attemptMemory = options.attemptMemory ?? DEFAULT_ATTEMPT_MEMORY;
      this.logger = componentLogger('retrying-consumer', options.logger, {
         queue: config.queueName,
      });
   }

   /**
    * Consume until `signal` aborts. Resolves on abort; rejects only with
    * ConnectError or ConnectionClosedError.
    */
   async run(handler: ProcessFn, options: { signal?: AbortSignal } = {}): Promise<void> {
      const { signal } = options;
      while (!signal?.aborted) {
         try {
            await this.runOnce(handler, signal);
         } catch (err) {
            if (signal?.aborted && err instanceof ConnectionClosedError) return;
            if (terminates(err)) throw err;
            this.report(asQueueError(err), { source: 'consumer', level: 'error' });
            await sleep(this.backoff.initialMs, signal);
         }
      }
   }

   /**
    * One poll and the processing of everything it returned.
    */
   async runOnce(handler: ProcessFn, signal?: AbortSignal): Promise<CycleReport> {
      const handles = await this.consumer.poll(this.prefetch);
      const outcomes = await Promise.all(
         handles.map((handle) => this.processOne(handle, handler, signal)),
      );

      const report: CycleReport = {
         received: handles.length,
         acked: 0,
         retried: 0,
         dropped: 0,
         timedOut: 0,
         errored: 0,
      };
      for (const outcome of outcomes) report[outcome] += 1;
      if (handles.length) this.logger.debug(report, 'Cycle complete');
      return report;
   }

   /**
    * Failures recorded so far for a message id.
    */
   failuresOf(messageId: string): number {
      return this.failures.get(messageId) ?? 0;
   }

   private async processOne(
      handle: MessageHandle,
      handler: ProcessFn,
      stop?: AbortSignal,
   ): Promise<Outcome> {
      const prior = Math.max(handle.redeliveryCount, this.failuresOf(handle.id));
      const attempt = await this.attempt(handle, handler);

      if (attempt.status === 'expired' || handle.state === AckState.TimedOut) {
         if (attempt.status === 'failed') this.remember(handle.id, prior + 1);
         this.reportStale(handle);
         return 'timedOut';
      }

      try {
         if (attempt.status === 'ok') {
            this.forget(handle.id);
            // the handler may have settled the handle itself
            if (handle.state === AckState.Acked) return 'acked';
            if (handle.state === AckState.Nacked) return 'retried';
            return (await handle.ack()) ? 'acked' : this.staleAfter(handle);
         }

         const failures = prior + 1;
         if (failures > this.maxRetries) {
            this.forget(handle.id);
            if (!(await handle.ack())) return this.staleAfter(handle);
            this.report(new RetriesExhaustedError(handle.id, failures, { cause: attempt.error }), {
               source: 'consumer',
               messageId: handle.id,
               level: 'error',
            });
            return 'dropped';
         }

         this.remember(handle.id, failures);
         this.logger.debug(
            { messageId: handle.id, failures, err: attempt.error },
            'Processing failed; scheduling redelivery',
         );
         return (await this.retry(handle, failures, stop)) ? 'retried' : this.staleAfter(handle);
      } catch (err) {
         if (terminates(err)) throw err;
         this.report(asQueueError(err), {
            source: 'consumer',
            messageId: handle.id,
            level: 'error',
         });
         return 'errored';
      }
   }

   /* Run processing under the handle's deadline. Late completions are
    * only logged: the broker already owns the message. */
   private async attempt(handle: MessageHandle, handler: ProcessFn): Promise<Attempt> {
      if (handle.signal.aborted) return { status: 'expired' };

      let detach = () => {};
      const expired = new Promise<Attempt>((resolve) => {
         const onExpire = () => resolve({ status: 'expired' });
         handle.signal.addEventListener('abort', onExpire, { once: true });
         detach = () => handle.signal.removeEventListener('abort', onExpire);
      });
      const run = (async (): Promise<Attempt> => {
         try {
            await handler(handle.payload, handle, handle.signal);
            return { status: 'ok' };
         } catch (error) {
            return { status: 'failed', error };
         }
      })();

      const result = await Promise.race([run, expired]);
      detach();
      if (result.status === 'expired') {
         void run.then((late) =>
            this.logger.debug(
               { messageId: handle.id, status: late.status },
               'Processing finished after ack deadline',
            ),
         );
      }
      return result;
   }

   /**
    * Ask for redelivery after the backoff interval for `failures`.
    * Resolves false if the handle expired meanwhile.
    */
   private async retry(
      handle: MessageHandle,
      failures: number,
      stop?: AbortSignal,
   ): Promise<boolean> {
      const caps = this.connection.capabilities;
      const delay = backoffDelay(failures, this.backoff);

      if (!caps.explicitNack) {
         // redelivery happens when the ack deadline lapses
         return true;
      }
      if (caps.delayedRedelivery) {
         return handle.nack(Math.min(delay, caps.maxRedeliveryDelayMs));
      }
      await sleep(delay, stop);
      return handle.nack();
   }

   private staleAfter(handle: MessageHandle): Outcome {
      this.reportStale(handle);
      return 'timedOut';
   }

   private reportStale(handle: MessageHandle): void {
      this.report(new StaleAckError(handle.id, 'process'), {
         source: 'consumer',
         messageId: handle.id,
         level: 'warn',
      });
   }

   private remember(messageId: string, failures: number): void {
      this.failures.delete(messageId);
      this.failures.set(messageId, failures);
      while (this.failures.size > this.attemptMemory) {
         const oldest = this.failures.keys().next();
         if (oldest.done) break;
         this.failures.delete(oldest.value);
      }
   }

   private forget(messageId: string): void {
      this.failures.delete(messageId);
   }

   private report(error: QueueError, context: ErrorContext): void {
      dispatchError(this.logger, this.errorSink, error, context);
   }
}
