/* ====================================================================
 * mqbridge – RabbitMQ adapter (durable quorum queue, basic.get pull,
 * publisher confirms)
 * ==================================================================== */
import {
   ConnectError,
   ConnectionLostError,
   PublishError,
   QueueConflictError,
   QueueError,
   parseAdapterOptions,
   register,
   sleep,
   withScheme,
   type BackendAdapter,
   type BackendCapabilities,
   type Logger,
   type Message,
   type PublishOptions,
   type PublishReceipt,
   type QueueConfiguration,
} from '@mqbridge/core';
import { connect, type ChannelModel, type ConfirmChannel, type GetMessage } from 'amqplib';
import { ulid } from 'ulid';
import { z } from 'zod';

// ──────────────────────────────────────────────────────────────────────
// Options
// ──────────────────────────────────────────────────────────────────────
export const rabbitOptionsSchema = z.object({
   /** Merged over the quorum-queue defaults on declare */
   queueArguments: z.record(z.unknown()).default({}),
   /** Pause between empty basic.get calls while waiting for messages */
   pollIntervalMs: z.number().int().positive().default(50),
});

export type RabbitOptions = z.output<typeof rabbitOptionsSchema>;

export const RABBITMQ_CAPABILITIES: BackendCapabilities = {
   prefetchBatching: true,
   maxPrefetch: 65_535,
   explicitNack: true,
   delayedRedelivery: false,
   maxRedeliveryDelayMs: 0,
   concurrentOperations: true,
};

const defaultQueueArguments = { 'x-queue-type': 'quorum' };

const PRECONDITION_FAILED = 406;

interface Session {
   connection: ChannelModel;
   channel: ConfirmChannel;
   /** Bumped per connect so receipts from an older channel never match */
   generation: number;
}

/**
 * AMQP URL for `address`, with `authToken` as the password when the
 * URL carries no credentials (OAuth 2 plugin convention).
 */
export function amqpUrl(address: string, authToken?: string): string {
   const url = new URL(withScheme(address, 'amqp'));
   if (authToken && !url.password) url.password = authToken;
   return url.toString();
}

function redact(url: string): string {
   const parsed = new URL(url);
   if (parsed.password) parsed.password = '***';
   return parsed.toString();
}

const replyCode = (err: unknown): unknown =>
   err instanceof Error && 'code' in err ? err.code : undefined;

function stringHeaders(headers: Record<string, unknown> | undefined): Record<string, string> {
   const out: Record<string, string> = {};
   for (const [key, value] of Object.entries(headers ?? {})) {
      if (key.startsWith('x-') || value === undefined || value === null) continue;
      out[key] = Buffer.isBuffer(value) ? value.toString('utf8') : String(value);
   }
   return out;
}

function redeliveryCount(raw: GetMessage): number {
   const count: unknown = raw.properties.headers?.['x-delivery-count'];
   if (typeof count === 'number' && Number.isFinite(count)) return count;
   return raw.fields.redelivered ? 1 : 0;
}

// ──────────────────────────────────────────────────────────────────────
// Adapter implementation
// ──────────────────────────────────────────────────────────────────────
export class RabbitAdapter implements BackendAdapter {
   readonly provider = 'rabbitmq' as const;
   readonly capabilities = RABBITMQ_CAPABILITIES;
   readonly url: string;
   readonly options: RabbitOptions;

   private session: Session | undefined;
   private generation = 0;
   private queue: string;
   private readonly deliveries = new Map<string, GetMessage>();

   constructor(
      config: QueueConfiguration,
      private readonly logger: Logger,
   ) {
      this.url = amqpUrl(config.address, config.authToken);
      this.options = parseAdapterOptions(rabbitOptionsSchema, config);
      this.queue = config.queueName;
   }

   async connect(): Promise<void> {
      let connection: ChannelModel;
      try {
         connection = await connect(this.url);
      } catch (err) {
         throw new ConnectError(`Could not connect to RabbitMQ at ${redact(this.url)}`, 1, {
            cause: err,
         });
      }
      connection.on('error', (err: unknown) => this.logger.warn({ err }, 'AMQP connection error'));
      connection.on('close', () => this.dropSession(connection));

      try {
         const channel = await connection.createConfirmChannel();
         channel.on('error', (err: unknown) => this.logger.warn({ err }, 'AMQP channel error'));
         channel.on('close', () => this.dropSession(connection));
         this.session = { connection, channel, generation: ++this.generation };
      } catch (err) {
         await connection.close().catch((closeErr: unknown) =>
            this.logger.debug({ err: closeErr }, 'Closing half-open connection failed'),
         );
         throw new ConnectError('Could not open an AMQP channel', 1, { cause: err });
      }
      this.logger.debug({ url: redact(this.url) }, 'AMQP session open');
   }

   isConnected(): boolean {
      return this.session !== undefined;
   }

   /* ---------------- queue declaration ------------------- */
   async declareQueue(name: string): Promise<void> {
      const { channel } = this.requireSession();
      try {
         await channel.assertQueue(name, {
            durable: true,
            arguments: { ...defaultQueueArguments, ...this.options.queueArguments },
         });
      } catch (err) {
         if (replyCode(err) === PRECONDITION_FAILED) {
            throw new QueueConflictError(
               `Queue "${name}" exists with different arguments`,
               name,
               { cause: err },
            );
         }
         throw this.lostOr(err);
      }
      this.queue = name;
   }

   /* ---------------- publish ------------------- */
   async publish(payload: Uint8Array, options: PublishOptions = {}): Promise<PublishReceipt> {
      const { channel } = this.requireSession();
      const messageId = ulid();
      try {
         await new Promise<void>((resolve, reject) => {
            channel.sendToQueue(
               this.queue,
               Buffer.from(payload),
               {
                  persistent: true,
                  messageId,
                  timestamp: Math.floor(Date.now() / 1000),
                  headers: { ...options.headers },
               },
               (err: unknown) => (err ? reject(err) : resolve()),
            );
         });
      } catch (err) {
         if (!this.isConnected()) {
            throw new ConnectionLostError('AMQP session lost during publish', { cause: err });
         }
         throw new PublishError(`Broker did not confirm message ${messageId}`, { cause: err });
      }
      return { messageId };
   }

   /* ---------------- receive ------------------- */
   async receive(maxCount: number, timeoutMs: number, signal?: AbortSignal): Promise<Message[]> {
      const deadline = Date.now() + timeoutMs;
      const out: Message[] = [];

      while (out.length < maxCount) {
         const session = this.requireSession();
         let raw: GetMessage | false;
         try {
            raw = await session.channel.get(this.queue, { noAck: false });
         } catch (err) {
            throw this.lostOr(err);
         }
         if (raw) {
            out.push(this.toMessage(raw, session));
            continue;
         }
         if (out.length || signal?.aborted) break;
         const remaining = deadline - Date.now();
         if (remaining <= 0) break;
         if (!(await sleep(Math.min(this.options.pollIntervalMs, remaining), signal))) break;
      }
      return out;
   }

   /* ---------------- settlement ------------------- */
   async ack(message: Message): Promise<void> {
      const { channel } = this.requireSession();
      const raw = this.deliveries.get(message.receipt);
      if (!raw) return;
      try {
         channel.ack(raw);
      } catch (err) {
         throw this.lostOr(err);
      }
      this.deliveries.delete(message.receipt);
   }

   /** Requeues immediately; RabbitMQ has no per-message redelivery delay. */
   async nack(message: Message): Promise<void> {
      const { channel } = this.requireSession();
      const raw = this.deliveries.get(message.receipt);
      if (!raw) return;
      try {
         channel.nack(raw, false, true);
      } catch (err) {
         throw this.lostOr(err);
      }
      this.deliveries.delete(message.receipt);
   }

   /** RabbitMQ only redelivers unacked messages when the channel closes, so requeue. */
   async expire(message: Message): Promise<void> {
      return this.nack(message);
   }

   /* -------- lifecycle / teardown ------ */
   async disconnect(): Promise<void> {
      const session = this.session;
      if (!session) return;
      this.session = undefined;
      this.deliveries.clear();
      // unacked deliveries go back to the queue when the channel closes
      try {
         await session.channel.close();
      } catch (err) {
         this.logger.debug({ err }, 'AMQP channel already closed');
      }
      try {
         await session.connection.close();
      } catch (err) {
         this.logger.debug({ err }, 'AMQP connection already closed');
      }
   }

   private toMessage(raw: GetMessage, session: Session): Message {
      const receipt = `${session.generation}:${raw.fields.deliveryTag}`;
      this.deliveries.set(receipt, raw);
      const { messageId, timestamp, headers } = raw.properties;
      return {
         id: typeof messageId === 'string' && messageId ? messageId : receipt,
         receipt,
         payload: new Uint8Array(raw.content),
         headers: stringHeaders(headers),
         enqueuedAt: typeof timestamp === 'number' ? new Date(timestamp * 1000) : undefined,
         redeliveryCount: redeliveryCount(raw),
      };
   }

   private dropSession(connection: ChannelModel): void {
      if (this.session?.connection !== connection) return;
      this.logger.warn('AMQP session closed by the broker');
      this.session = undefined;
      this.deliveries.clear();
      void connection
         .close()
         .catch((err: unknown) => this.logger.debug({ err }, 'AMQP connection already closed'));
   }

   private requireSession(): Session {
      if (!this.session) throw new ConnectionLostError('AMQP session is not open');
      return this.session;
   }

   private lostOr(err: unknown): unknown {
      if (err instanceof QueueError || this.isConnected()) return err;
      return new ConnectionLostError('AMQP channel closed', { cause: err });
   }
}

// ──────────────────────────────────────────────────────────────────────
// Self‑registration
// ──────────────────────────────────────────────────────────────────────
register('rabbitmq', (config, logger) => new RabbitAdapter(config, logger));
