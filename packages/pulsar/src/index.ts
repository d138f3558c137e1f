/* ====================================================================
 * mqbridge – Apache Pulsar adapter (WebSocket producer / pull-mode
 * shared consumer, admin REST for topic + subscription)
 * ==================================================================== */
import {
   ConfigurationError,
   ConnectError,
   ConnectionLostError,
   PublishError,
   QueueConflictError,
   parseAdapterOptions,
   register,
   withScheme,
   type BackendAdapter,
   type BackendCapabilities,
   type Logger,
   type Message,
   type PublishOptions,
   type PublishReceipt,
   type QueueConfiguration,
} from '@mqbridge/core';
import { ulid } from 'ulid';
import { WebSocket } from 'ws';
import { z } from 'zod';
import { PulsarAdmin, PulsarAdminError, topicPath, type TopicName } from './admin';
import { frameText, openSocket, sendFrame } from './socket';

export { PulsarAdmin, PulsarAdminError, topicPath, type TopicName } from './admin';

// ──────────────────────────────────────────────────────────────────────
// Options
// ──────────────────────────────────────────────────────────────────────
export const pulsarOptionsSchema = z.object({
   tenant: z.string().min(1).default('public'),
   namespace: z.string().min(1).default('default'),
   /** 0 declares a non-partitioned topic */
   partitions: z.number().int().min(0).default(0),
   /** Consumer-side queue; defaults to the configured prefetch */
   receiverQueueSize: z.number().int().positive().optional(),
   /** Publish acknowledgement, admin call and handshake timeout */
   requestTimeoutMs: z.number().int().positive().default(10_000),
});

export type PulsarOptions = z.output<typeof pulsarOptionsSchema>;

export const PULSAR_CAPABILITIES: BackendCapabilities = {
   prefetchBatching: true,
   maxPrefetch: 1_000,
   explicitNack: true,
   delayedRedelivery: false,
   maxRedeliveryDelayMs: 0,
   concurrentOperations: false,
};

/* brokers refuse ack timeouts below one second */
const MIN_ACK_TIMEOUT_MS = 1_000;
const ACK_TIMEOUT_ENV = 'PULSAR_UNACKED_MESSAGES_TIMEOUT_SEC';
const CONFLICT = 409;

const SCHEMES: Record<string, { web: string; ws: string }> = {
   'http:': { web: 'http', ws: 'ws' },
   'https:': { web: 'https', ws: 'wss' },
   'ws:': { web: 'http', ws: 'ws' },
   'wss:': { web: 'https', ws: 'wss' },
};

/**
 * Admin (HTTP) and WebSocket base URLs for a broker or proxy web-service
 * address such as "localhost:8080" or "https://pulsar.internal".
 */
export function pulsarUrls(address: string): { web: string; ws: string } {
   const url = new URL(withScheme(address, 'http'));
   const scheme = SCHEMES[url.protocol];
   if (!scheme) {
      throw new ConfigurationError('Invalid pulsar address', [
         `address: expected an http(s) or ws(s) web-service URL, got "${url.protocol}//"`,
      ]);
   }
   const path = url.pathname.replace(/\/+$/, '');
   return { web: `${scheme.web}://${url.host}${path}`, ws: `${scheme.ws}://${url.host}${path}` };
}

/**
 * Unacked-message timeout for the consumer. An explicit environment
 * override wins when it is above ten seconds.
 */
export function ackTimeoutMillis(ackDeadlineMs: number, env: NodeJS.ProcessEnv = process.env): number {
   const seconds = Number(env[ACK_TIMEOUT_ENV]);
   if (Number.isFinite(seconds) && seconds > 10) return seconds * 1_000;
   return Math.max(MIN_ACK_TIMEOUT_MS, ackDeadlineMs);
}

/* "2024-05-01 12:00:00.123" from older brokers, ISO-8601 from newer ones */
function parsePublishTime(raw: string | undefined): Date | undefined {
   if (!raw) return undefined;
   const iso = raw.includes('T') ? raw : `${raw.replace(' ', 'T')}Z`;
   const time = Date.parse(iso);
   return Number.isNaN(time) ? undefined : new Date(time);
}

// ──────────────────────────────────────────────────────────────────────
// Wire frames
// ──────────────────────────────────────────────────────────────────────
const producerResponse = z.object({
   result: z.string(),
   messageId: z.string().optional(),
   errorMsg: z.string().optional(),
   context: z.string().optional(),
});

type ProducerResponse = z.output<typeof producerResponse>;

const consumerMessage = z.object({
   messageId: z.string(),
   payload: z.string(),
   properties: z.record(z.string()).default({}),
   publishTime: z.string().optional(),
   redeliveryCount: z.number().int().nonnegative().default(0),
});

type ConsumerMessage = z.output<typeof consumerMessage>;

interface PendingSend {
   resolve: (response: ProducerResponse) => void;
   reject: (err: Error) => void;
   timer: NodeJS.Timeout;
}

interface Session {
   producer: WebSocket;
   consumer?: WebSocket;
   opening?: Promise<WebSocket>;
   /** Publishes awaiting a broker receipt, by context */
   pending: Map<string, PendingSend>;
   /** Delivered but not yet handed out */
   buffer: ConsumerMessage[];
   /** Permits granted that the broker has not used yet */
   permits: number;
   generation: number;
}

// ──────────────────────────────────────────────────────────────────────
// Adapter implementation
// ──────────────────────────────────────────────────────────────────────
export class PulsarAdapter implements BackendAdapter {
   readonly provider = 'pulsar' as const;
   readonly capabilities = PULSAR_CAPABILITIES;
   readonly options: PulsarOptions;
   readonly urls: { web: string; ws: string };
   readonly admin: PulsarAdmin;

   private session: Session | undefined;
   private generation = 0;
   private readonly deliveries = new Map<string, string>();
   private readonly waiters = new Set<() => void>();

   constructor(
      private readonly config: QueueConfiguration,
      private readonly logger: Logger,
      private readonly env: NodeJS.ProcessEnv = process.env,
   ) {
      this.options = parseAdapterOptions(pulsarOptionsSchema, config);
      this.urls = pulsarUrls(config.address);
      this.admin = new PulsarAdmin({
         baseUrl: this.urls.web,
         authToken: config.authToken,
         timeoutMs: this.options.requestTimeoutMs,
      });
   }

   get topic(): TopicName {
      return {
         tenant: this.options.tenant,
         namespace: this.options.namespace,
         topic: this.config.queueName,
      };
   }

   get producerUrl(): string {
      return `${this.urls.ws}/ws/v2/producer/${topicPath(this.topic)}`;
   }

   get consumerUrl(): string {
      const query = new URLSearchParams({
         subscriptionType: 'Shared',
         pullMode: 'true',
         receiverQueueSize: String(this.options.receiverQueueSize ?? this.config.prefetch),
         ackTimeoutMillis: String(ackTimeoutMillis(this.config.ackDeadlineMs, this.env)),
      });
      const subscription = encodeURIComponent(this.config.subscriptionName);
      return `${this.urls.ws}/ws/v2/consumer/${topicPath(this.topic)}/${subscription}?${query}`;
   }

   /* ---------------- connect (producer socket) ------------------- */
   async connect(): Promise<void> {
      let producer: WebSocket;
      try {
         producer = await openSocket(this.producerUrl, this.authHeaders(), this.options.requestTimeoutMs);
      } catch (err) {
         throw new ConnectError(`Could not open a Pulsar producer at ${this.urls.ws}`, 1, {
            cause: err,
         });
      }
      const session: Session = {
         producer,
         pending: new Map(),
         buffer: [],
         permits: 0,
         generation: ++this.generation,
      };
      producer.on('message', (data) => this.onProducerFrame(session, frameText(data)));
      producer.on('error', (err) => this.logger.warn({ err }, 'Pulsar producer socket error'));
      producer.on('close', (code) => this.dropSession(session, `producer closed (${code})`));
      this.session = session;
      this.logger.debug({ topic: this.config.queueName }, 'Pulsar producer open');
   }

   isConnected(): boolean {
      const session = this.session;
      if (!session || session.producer.readyState !== WebSocket.OPEN) return false;
      return !session.consumer || session.consumer.readyState === WebSocket.OPEN;
   }

   /* ---------------- topic + subscription ------------------- */
   async declareQueue(name: string): Promise<void> {
      const topic = { ...this.topic, topic: name };
      const desired = this.options.partitions;
      const existing = await this.admin.partitions(topic);

      if (desired > 0 && existing === 0) {
         try {
            await this.admin.createPartitionedTopic(topic, desired);
         } catch (err) {
            if (err instanceof PulsarAdminError && err.statusCode === CONFLICT) {
               throw new QueueConflictError(
                  `Topic "${name}" exists without partitions, configured ${desired}`,
                  name,
                  { cause: err },
               );
            }
            throw err;
         }
      } else if (existing !== desired) {
         throw new QueueConflictError(
            `Topic "${name}" has ${existing} partitions, configured ${desired}`,
            name,
         );
      } else if (desired === 0) {
         await this.admin.createTopic(topic);
      }
      // must exist before the first publish
      await this.admin.createSubscription(topic, this.config.subscriptionName);
   }

   /* ---------------- publish ------------------- */
   async publish(payload: Uint8Array, options: PublishOptions = {}): Promise<PublishReceipt> {
      const session = this.requireSession();
      const messageId = ulid();
      const timeoutMs = this.options.requestTimeoutMs;

      const response = await new Promise<ProducerResponse>((resolve, reject) => {
         const timer = setTimeout(() => {
            session.pending.delete(messageId);
            reject(new PublishError(`No receipt for message ${messageId} within ${timeoutMs}ms`));
         }, timeoutMs);
         session.pending.set(messageId, { resolve, reject, timer });

         sendFrame(session.producer, {
            payload: Buffer.from(payload).toString('base64'),
            properties: { ...options.headers, messageId },
            context: messageId,
         }).catch((err: unknown) => {
            clearTimeout(timer);
            session.pending.delete(messageId);
            reject(err instanceof Error ? err : new ConnectionLostError(String(err)));
         });
      });

      if (response.result !== 'ok') {
         throw new PublishError(
            `Pulsar rejected message ${messageId}: ${response.errorMsg ?? response.result}`,
         );
      }
      return { messageId, brokerId: response.messageId };
   }

   /* ---------------- receive (pull mode) ------------------- */
   async receive(maxCount: number, timeoutMs: number, signal?: AbortSignal): Promise<Message[]> {
      const session = this.requireSession();
      const consumer = await this.ensureConsumer(session);

      const wanted = maxCount - session.buffer.length - session.permits;
      if (wanted > 0) {
         await sendFrame(consumer, { type: 'permit', permitMessages: wanted });
         session.permits += wanted;
      }
      if (!session.buffer.length) await this.waitForDelivery(timeoutMs, signal);
      if (this.session !== session) throw new ConnectionLostError('Pulsar session lost during receive');

      return session.buffer.splice(0, maxCount).map((raw) => this.toMessage(raw, session));
   }

   /* ---------------- settlement ------------------- */
   async ack(message: Message): Promise<void> {
      await this.settle(message, (messageId) => ({ messageId }));
   }

   /** Redelivered by the broker right away; Pulsar's WebSocket API has no per-message delay. */
   async nack(message: Message): Promise<void> {
      await this.settle(message, (messageId) => ({ type: 'negativeAcknowledge', messageId }));
   }

   /** The consumer's ackTimeoutMillis brings the message back. */
   async expire(message: Message): Promise<void> {
      this.deliveries.delete(message.receipt);
   }

   /* -------- lifecycle / teardown ------ */
   async disconnect(): Promise<void> {
      const session = this.session;
      if (!session) return;
      // closing the consumer hands its unacked messages to other consumers
      this.dropSession(session, 'disconnect requested', true);
   }

   private async settle(message: Message, frame: (messageId: string) => object): Promise<void> {
      const session = this.requireSession();
      const messageId = this.deliveries.get(message.receipt);
      if (!messageId || !session.consumer) return;
      await sendFrame(session.consumer, frame(messageId));
      this.deliveries.delete(message.receipt);
   }

   private ensureConsumer(session: Session): Promise<WebSocket> {
      if (session.consumer) return Promise.resolve(session.consumer);
      session.opening ??= this.openConsumer(session);
      return session.opening;
   }

   private async openConsumer(session: Session): Promise<WebSocket> {
      let consumer: WebSocket;
      try {
         consumer = await openSocket(this.consumerUrl, this.authHeaders(), this.options.requestTimeoutMs);
      } catch (err) {
         session.opening = undefined;
         throw new ConnectionLostError('Could not open the Pulsar consumer', { cause: err });
      }
      if (this.session !== session) {
         consumer.close();
         throw new ConnectionLostError('Pulsar session closed while the consumer was opening');
      }
      consumer.on('message', (data) => this.onConsumerFrame(session, frameText(data)));
      consumer.on('error', (err) => this.logger.warn({ err }, 'Pulsar consumer socket error'));
      consumer.on('close', (code) => this.dropSession(session, `consumer closed (${code})`));
      session.consumer = consumer;
      this.logger.debug({ subscription: this.config.subscriptionName }, 'Pulsar consumer open');
      return consumer;
   }

   private onProducerFrame(session: Session, text: string): void {
      const parsed = producerResponse.safeParse(safeJson(text));
      const context = parsed.success ? parsed.data.context : undefined;
      const pending = context === undefined ? undefined : session.pending.get(context);
      if (!parsed.success || context === undefined || !pending) {
         this.logger.debug({ frame: text }, 'Ignoring unexpected producer frame');
         return;
      }
      clearTimeout(pending.timer);
      session.pending.delete(context);
      pending.resolve(parsed.data);
   }

   private onConsumerFrame(session: Session, text: string): void {
      const parsed = consumerMessage.safeParse(safeJson(text));
      if (!parsed.success) {
         this.logger.debug({ frame: text }, 'Ignoring unexpected consumer frame');
         return;
      }
      session.permits = Math.max(0, session.permits - 1);
      session.buffer.push(parsed.data);
      this.wake();
   }

   private waitForDelivery(timeoutMs: number, signal?: AbortSignal): Promise<void> {
      if (timeoutMs <= 0 || signal?.aborted) return Promise.resolve();
      return new Promise((resolve) => {
         const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            this.waiters.delete(done);
            resolve();
         };
         const timer = setTimeout(done, timeoutMs);
         signal?.addEventListener('abort', done, { once: true });
         this.waiters.add(done);
      });
   }

   private wake(): void {
      for (const waiter of [...this.waiters]) waiter();
   }

   private toMessage(raw: ConsumerMessage, session: Session): Message {
      const receipt = `${session.generation}:${raw.messageId}`;
      this.deliveries.set(receipt, raw.messageId);
      const { messageId, ...headers } = raw.properties;
      return {
         id: messageId || raw.messageId,
         receipt,
         payload: new Uint8Array(Buffer.from(raw.payload, 'base64')),
         headers,
         enqueuedAt: parsePublishTime(raw.publishTime),
         redeliveryCount: raw.redeliveryCount,
      };
   }

   private dropSession(session: Session, reason: string, requested = false): void {
      if (this.session !== session) return;
      this.session = undefined;
      if (!requested) this.logger.warn({ reason }, 'Pulsar session lost');

      for (const pending of session.pending.values()) {
         clearTimeout(pending.timer);
         pending.reject(new ConnectionLostError(`Pulsar ${reason} before the publish was confirmed`));
      }
      session.pending.clear();
      session.buffer.length = 0;
      this.deliveries.clear();
      session.consumer?.close(1000);
      session.producer.close(1000);
      this.wake();
   }

   private requireSession(): Session {
      const session = this.session;
      if (!session || session.producer.readyState !== WebSocket.OPEN) {
         throw new ConnectionLostError('Pulsar session is not open');
      }
      return session;
   }

   private authHeaders(): Record<string, string> {
      return this.config.authToken ? { Authorization: `Bearer ${this.config.authToken}` } : {};
   }
}

function safeJson(text: string): unknown {
   try {
      return JSON.parse(text);
   } catch {
      return undefined;
   }
}

// ──────────────────────────────────────────────────────────────────────
// Self‑registration
// ──────────────────────────────────────────────────────────────────────
register('pulsar', (config, logger) => new PulsarAdapter(config, logger));
