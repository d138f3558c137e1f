/* ================================================================
 * mqbridge - QueueConnection: owns one adapter and its lifecycle
 * ============================================================== */
import { backoffDelay, sleep } from './backoff';
import {
   resolveQueueConfiguration,
   type QueueConfiguration,
   type QueueConfigurationInput,
} from './config';
import { Consumer } from './consumer';
import {
   ConfigurationError,
   ConnectError,
   ConnectionClosedError,
   ConnectionLostError,
   QueueConflictError,
   type QueueError,
} from './errors';
import { dispatchError } from './error-sink';
import { componentLogger, type Logger } from './logger';
import { MessageHandle, type HandleOwner } from './message-handle';
import { Publisher } from './publisher';
import { create } from './registry';
import type { BackendAdapter, BackendCapabilities, ErrorContext, ErrorSink, Message } from './types';

export const ConnectionState = {
   /** Not opened yet */
   Idle: 'IDLE',
   Connecting: 'CONNECTING',
   Open: 'OPEN',
   /** Closed for good */
   Closed: 'CLOSED',
} as const;

export type ConnectionState = (typeof ConnectionState)[keyof typeof ConnectionState];

export interface ConnectionOptions {
   logger?: Logger;
   /** Receives reconnect notices and stale settlements */
   errorSink?: ErrorSink;
   /** Use this adapter instead of the registered one for `brokerClient` */
   adapter?: BackendAdapter;
}

export interface ConnectionHealth {
   provider: string;
   state: ConnectionState;
   connected: boolean;
   pendingHandles: number;
}

interface ExecuteOptions {
   /** Serialize with other serial calls when the adapter is not concurrency-safe */
   serial?: boolean;
}

/**
 * Fatal while connecting: retrying cannot help.
 */
const isFatal = (err: unknown) =>
   err instanceof QueueConflictError ||
   err instanceof ConfigurationError ||
   err instanceof ConnectionClosedError;

/**
 * A connection to one queue on one broker.
 *
 * IDLE → CONNECTING → OPEN → CLOSED. `open()` connects with bounded
 * exponential backoff; an OPEN connection whose session drops reconnects
 * on the next operation. `close()` is final: every publisher, consumer
 * and pending handle obtained from it then fails with
 * {@link ConnectionClosedError}.
 *
 * @example
 * ```ts
 * import '@mqbridge/rabbitmq';
 * const connection = await QueueConnection.open({
 *   brokerClient: 'rabbitmq',
 *   address: 'localhost:5672',
 *   queueName: 'jobs',
 * });
 * await connection.publisher().send('hello');
 * await connection.close();
 * ```
 */
export class QueueConnection {
   readonly config: QueueConfiguration;

   private readonly adapter: BackendAdapter;
   private readonly logger: Logger;
   private readonly errorSink?: ErrorSink;
   private readonly shutdown = new AbortController();
   private readonly handles = new Set<MessageHandle>();

   private state_: ConnectionState = ConnectionState.Idle;
   private lifecycle: Promise<void> | undefined;
   private serialTail: Promise<unknown> = Promise.resolve();

   private readonly owner: HandleOwner = {
      assertOpen: () => this.assertOpen(),
      settle: (kind, message, delayMs) =>
         this.execute((adapter) =>
            kind === 'ack' ? adapter.ack(message) : adapter.nack(message, delayMs),
         ),
      report: (error, context) => this.report(error, context),
      release: (handle) => {
         this.handles.delete(handle);
      },
      expired: (message) => void this.handBack(message),
   };

   constructor(
      config: QueueConfiguration | QueueConfigurationInput,
      options: ConnectionOptions = {},
   ) {
      this.config = resolveQueueConfiguration(config);
      this.logger = componentLogger('connection', options.logger, {
         provider: this.config.brokerClient,
         queue: this.config.queueName,
      });
      this.errorSink = options.errorSink;
      this.adapter = options.adapter ?? create(this.config, options.logger);
   }

   /**
    * Build and open a connection in one step.
    * @throws ConnectError when the broker stays unreachable
    * @throws QueueConflictError when the queue exists with other settings
    */
   static async open(
      config: QueueConfiguration | QueueConfigurationInput,
      options?: ConnectionOptions,
   ): Promise<QueueConnection> {
      const connection = new QueueConnection(config, options);
      await connection.open();
      return connection;
   }

   get state(): ConnectionState {
      return this.state_;
   }

   get capabilities(): BackendCapabilities {
      return this.adapter.capabilities;
   }

   get closed(): boolean {
      return this.state_ === ConnectionState.Closed;
   }

   async open(): Promise<void> {
      this.assertOpen();
      if (this.state_ === ConnectionState.Open && this.adapter.isConnected()) return;
      await this.establish();
   }

   health(): ConnectionHealth {
      return {
         provider: this.adapter.provider,
         state: this.state_,
         connected: this.state_ === ConnectionState.Open && this.adapter.isConnected(),
         pendingHandles: this.handles.size,
      };
   }

   publisher(): Publisher {
      this.assertOpen();
      return new Publisher(this);
   }

   consumer(): Consumer {
      this.assertOpen();
      return new Consumer(this);
   }

   /**
    * Close for good. In-flight receives are cut short; pending handles
    * stay unacked and the broker redelivers them.
    */
   async close(): Promise<void> {
      if (this.state_ === ConnectionState.Closed) return;
      const connecting = this.lifecycle;
      this.state_ = ConnectionState.Closed;
      this.shutdown.abort();

      for (const handle of this.handles) handle.detach();
      this.handles.clear();

      if (connecting) {
         await connecting.catch((err: unknown) =>
            this.logger.debug({ err }, 'Connect attempt interrupted by close'),
         );
      }
      await this.adapter.disconnect();
      this.logger.info('Connection closed');
   }

   assertOpen(): void {
      if (this.state_ === ConnectionState.Closed) throw new ConnectionClosedError();
   }

   /**
    * Run one adapter call, reconnecting first if the session is down and
    * retrying once if the call reports the session lost.
    * @internal used by Publisher and Consumer
    */
   async execute<T>(
      operation: (adapter: BackendAdapter, signal: AbortSignal) => Promise<T>,
      options: ExecuteOptions = {},
   ): Promise<T> {
      this.assertOpen();
      if (this.state_ !== ConnectionState.Open || !this.adapter.isConnected()) {
         await this.reconnect();
      }
      const run = () => this.call(operation, options);
      try {
         return await run();
      } catch (err) {
         if (!(err instanceof ConnectionLostError) || this.closed) throw err;
         await this.reconnect(err);
         return run();
      }
   }

   /**
    * Wrap a received message in a handle whose deadline starts now.
    * @internal used by Consumer
    */
   track(message: Message): MessageHandle {
      this.assertOpen();
      const handle = new MessageHandle(message, this.owner, this.config.ackDeadlineMs);
      this.handles.add(handle);
      return handle;
   }

   private call<T>(
      operation: (adapter: BackendAdapter, signal: AbortSignal) => Promise<T>,
      { serial = false }: ExecuteOptions,
   ): Promise<T> {
      const invoke = () => {
         this.assertOpen();
         return operation(this.adapter, this.shutdown.signal);
      };
      if (!serial || this.adapter.capabilities.concurrentOperations) return invoke();

      const next = this.serialTail.then(invoke, invoke);
      this.serialTail = next.then(
         () => undefined,
         () => undefined,
      );
      return next;
   }

   /* Connect/disconnect never overlap: every caller shares the one
    * in-flight lifecycle transition. */
   private establish(): Promise<void> {
      if (!this.lifecycle) {
         this.lifecycle = this.connectWithRetry().finally(() => {
            this.lifecycle = undefined;
         });
      }
      return this.lifecycle;
   }

   private reconnect(cause?: unknown): Promise<void> {
      if (this.lifecycle) return this.lifecycle;
      if (this.state_ === ConnectionState.Open) {
         const lost =
            cause instanceof ConnectionLostError
               ? cause
               : new ConnectionLostError(`Connection to ${this.adapter.provider} lost`, { cause });
         this.report(lost, { source: 'connection', level: 'warn' });
      }
      for (const handle of this.handles) handle.invalidate();
      this.handles.clear();

      this.lifecycle = this.disconnectQuietly()
         .then(() => this.connectWithRetry())
         .finally(() => {
            this.lifecycle = undefined;
         });
      return this.lifecycle;
   }

   private async connectWithRetry(): Promise<void> {
      const { connectAttempts, connectBackoff } = this.config;
      this.setState(ConnectionState.Connecting);
      let lastError: unknown;

      for (let attempt = 1; attempt <= connectAttempts; attempt++) {
         this.assertOpen();
         try {
            await this.adapter.connect();
            await this.adapter.declareQueue(this.config.queueName);
            this.assertOpen();
            this.setState(ConnectionState.Open);
            this.logger.info({ attempt }, 'Connection open');
            return;
         } catch (err) {
            await this.disconnectQuietly();
            if (isFatal(err) || this.closed) {
               this.setState(ConnectionState.Idle);
               throw err;
            }
            lastError = err;
            this.logger.warn({ err, attempt, of: connectAttempts }, 'Connect attempt failed');
         }
         if (attempt < connectAttempts) {
            await sleep(backoffDelay(attempt, connectBackoff), this.shutdown.signal);
         }
      }

      this.setState(ConnectionState.Idle);
      throw new ConnectError(
         `Could not connect to ${this.adapter.provider} at ${this.config.address} after ${connectAttempts} attempt(s)`,
         connectAttempts,
         { cause: lastError },
      );
   }

   private async handBack(message: Message): Promise<void> {
      if (this.state_ !== ConnectionState.Open || !this.adapter.isConnected()) return;
      try {
         await this.call((adapter) => adapter.expire(message), { serial: true });
      } catch (err) {
         this.logger.warn({ err, messageId: message.id }, 'Could not hand back an expired delivery');
      }
   }

   private async disconnectQuietly(): Promise<void> {
      try {
         await this.adapter.disconnect();
      } catch (err) {
         this.logger.debug({ err }, 'Disconnect after failure raised');
      }
   }

   private setState(next: ConnectionState): void {
      if (this.state_ !== ConnectionState.Closed) this.state_ = next;
   }

   private report(error: QueueError, context: ErrorContext): void {
      dispatchError(this.logger, this.errorSink, error, context);
   }
}

/**
 * Scoped acquisition: open a connection, run `fn`, always close.
 */
export async function withConnection<T>(
   config: QueueConfiguration | QueueConfigurationInput,
   fn: (connection: QueueConnection) => Promise<T>,
   options?: ConnectionOptions,
): Promise<T> {
   const connection = await QueueConnection.open(config, options);
   try {
      return await fn(connection);
   } finally {
      await connection.close();
   }
}
