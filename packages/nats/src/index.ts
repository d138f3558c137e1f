/* ===================================================================
 * mqbridge – NATS JetStream adapter (work-queue stream, durable pull
 * consumer, explicit acks)
 * =================================================================== */
import { readFileSync } from 'node:fs';
import {
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
import {
   AckPolicy,
   connect,
   credsAuthenticator,
   headers,
   nanos,
   NatsError,
   RetentionPolicy,
   type ConnectionOptions,
   type JetStreamClient,
   type JetStreamManager,
   type JsMsg,
   type NatsConnection,
} from 'nats';
import { ulid } from 'ulid';
import { z } from 'zod';

/* ──────────────────────────────────────────────────────────────────
 * Options
 * ─────────────────────────────────────────────────────────────────*/
export const natsOptionsSchema = z.object({
   /** Connection name (shows up in monitoring) */
   name: z.string().min(1).default('mqbridge'),
   /** JetStream domain, for leaf-node / scoped deployments */
   jsDomain: z.string().min(1).optional(),
   /** Stream replicas used when the stream is created */
   replicas: z.number().int().min(1).default(1),
});

export type NatsOptions = z.output<typeof natsOptionsSchema>;

export const NATS_CAPABILITIES: BackendCapabilities = {
   prefetchBatching: true,
   maxPrefetch: 256,
   explicitNack: true,
   delayedRedelivery: true,
   maxRedeliveryDelayMs: 3_600_000,
   concurrentOperations: true,
};

/* pull requests shorter than this are rejected by the client */
const MIN_FETCH_EXPIRES_MS = 1_000;

/* Helpers */
export const toStreamName = (subject: string) =>
   subject.replace(/[.*>\s-]/g, '_').toUpperCase(); // "orders.created" → "ORDERS_CREATED"
export const toDurableName = (name: string) => name.replace(/[.*>\s]/g, '_');

const isNotFound = (err: unknown) =>
   err instanceof NatsError && (err.code === '404' || err.api_error?.code === 404);

function readHeaders(jm: JsMsg): Record<string, string> {
   const out: Record<string, string> = {};
   for (const key of jm.headers?.keys() ?? []) {
      if (key === 'messageId' || key.startsWith('Nats-')) continue;
      out[key] = jm.headers?.get(key) ?? '';
   }
   return out;
}

interface Session {
   nc: NatsConnection;
   js: JetStreamClient;
   jsm: JetStreamManager;
   generation: number;
}

/* ──────────────────────────────────────────────────────────────────
 * Adapter implementation
 * ─────────────────────────────────────────────────────────────────*/
export class NatsAdapter implements BackendAdapter {
   readonly provider = 'nats' as const;
   readonly capabilities = NATS_CAPABILITIES;
   readonly servers: string[];
   readonly options: NatsOptions;

   private session: Session | undefined;
   private generation = 0;
   private subject: string;
   private readonly deliveries = new Map<string, JsMsg>();

   constructor(
      private readonly config: QueueConfiguration,
      private readonly logger: Logger,
   ) {
      this.servers = config.address
         .split(',')
         .map((server) => server.trim())
         .filter(Boolean)
         .map((server) => withScheme(server, 'nats'));
      this.options = parseAdapterOptions(natsOptionsSchema, config);
      this.subject = config.queueName;
   }

   get stream(): string {
      return toStreamName(this.subject);
   }

   get durable(): string {
      return toDurableName(this.config.subscriptionName);
   }

   /* ----- connect (connection + JetStream handles) ----------------- */
   async connect(): Promise<void> {
      const { authToken, credentialsPath } = this.config;
      const options: ConnectionOptions = { servers: this.servers, name: this.options.name };
      if (authToken) options.token = authToken;
      if (credentialsPath) options.authenticator = credsAuthenticator(readFileSync(credentialsPath));

      let nc: NatsConnection;
      try {
         nc = await connect(options);
      } catch (err) {
         throw new ConnectError(`Could not connect to NATS at ${this.servers.join(',')}`, 1, {
            cause: err,
         });
      }
      const domain = this.options.jsDomain;
      let jsm: JetStreamManager;
      try {
         jsm = await nc.jetstreamManager({ domain });
      } catch (err) {
         await nc
            .close()
            .catch((closeErr: unknown) =>
               this.logger.debug({ err: closeErr }, 'Closing NATS connection without JetStream failed'),
            );
         throw new ConnectError(
            `JetStream is not available at ${this.servers.join(',')}${domain ? ` in domain "${domain}"` : ''}`,
            1,
            { cause: err },
         );
      }
      this.session = { nc, js: nc.jetstream({ domain }), jsm, generation: ++this.generation };
      void nc.closed().then((err) => {
         if (err) this.logger.warn({ err }, 'NATS connection closed with an error');
      });
   }

   isConnected(): boolean {
      return this.session !== undefined && !this.session.nc.isClosed();
   }

   /* ----- ensure stream + durable consumer ------------------------- */
   async declareQueue(name: string): Promise<void> {
      const { jsm } = this.requireSession();
      this.subject = name;
      const stream = this.stream;

      try {
         const info = await jsm.streams.info(stream);
         if (!info.config.subjects.includes(name)) {
            throw new QueueConflictError(
               `Stream ${stream} exists without subject "${name}"`,
               name,
            );
         }
      } catch (err) {
         if (!isNotFound(err)) throw err;
         await jsm.streams.add({
            name: stream,
            subjects: [name],
            retention: RetentionPolicy.Workqueue,
            num_replicas: this.options.replicas,
         });
         this.logger.info({ stream, subject: name }, 'Created JetStream stream');
      }

      try {
         const info = await jsm.consumers.info(stream, this.durable);
         if (info.config.ack_policy !== AckPolicy.Explicit) {
            throw new QueueConflictError(
               `Consumer ${this.durable} on ${stream} does not use explicit acks`,
               name,
            );
         }
      } catch (err) {
         if (!isNotFound(err)) throw err;
         await jsm.consumers.add(stream, {
            durable_name: this.durable,
            ack_policy: AckPolicy.Explicit,
            ack_wait: nanos(this.config.ackDeadlineMs),
            filter_subject: name,
            max_deliver: -1,
         });
      }
   }

   /* ----- publish -------------------------------------------------- */
   async publish(payload: Uint8Array, options: PublishOptions = {}): Promise<PublishReceipt> {
      const { js, nc } = this.requireSession();
      const messageId = ulid();
      const hdrs = headers();
      hdrs.set('messageId', messageId);
      for (const [key, value] of Object.entries(options.headers ?? {})) hdrs.set(key, value);

      try {
         const ack = await js.publish(this.subject, payload, { msgID: messageId, headers: hdrs });
         return { messageId, brokerId: `${ack.stream}:${ack.seq}` };
      } catch (err) {
         if (nc.isClosed()) {
            throw new ConnectionLostError('NATS connection closed during publish', { cause: err });
         }
         throw new PublishError(`JetStream did not store message ${messageId}`, { cause: err });
      }
   }

   /* ----- receive (one pull request) ------------------------------- */
   async receive(maxCount: number, timeoutMs: number, signal?: AbortSignal): Promise<Message[]> {
      const session = this.requireSession();
      if (signal?.aborted) return [];
      const consumer = await session.js.consumers.get(this.stream, this.durable);
      const batch = await consumer.fetch({
         max_messages: maxCount,
         expires: Math.max(timeoutMs, MIN_FETCH_EXPIRES_MS),
      });
      const stop = () => batch.stop();
      signal?.addEventListener('abort', stop, { once: true });
      if (signal?.aborted) stop();

      const out: Message[] = [];
      try {
         for await (const jm of batch) out.push(this.toMessage(jm, session));
      } catch (err) {
         if (!this.isConnected()) {
            throw new ConnectionLostError('NATS connection closed during fetch', { cause: err });
         }
         throw err;
      } finally {
         signal?.removeEventListener('abort', stop);
      }
      return out;
   }

   /* ----- settlement ----------------------------------------------- */
   async ack(message: Message): Promise<void> {
      this.requireSession();
      const jm = this.deliveries.get(message.receipt);
      if (!jm) return;
      this.deliveries.delete(message.receipt);
      jm.ack();
   }

   async nack(message: Message, delayMs?: number): Promise<void> {
      this.requireSession();
      const jm = this.deliveries.get(message.receipt);
      if (!jm) return;
      this.deliveries.delete(message.receipt);
      if (delayMs) jm.nak(delayMs);
      else jm.nak();
   }

   /** The consumer's ack_wait matches the ack deadline; the server redelivers on its own. */
   async expire(message: Message): Promise<void> {
      this.deliveries.delete(message.receipt);
   }

   /* ----- lifecycle / teardown ------------------------------------- */
   async disconnect(): Promise<void> {
      const session = this.session;
      if (!session) return;
      this.session = undefined;
      this.deliveries.clear();
      // unacked messages come back once ack_wait elapses
      if (!session.nc.isClosed()) await session.nc.close();
   }

   private toMessage(jm: JsMsg, session: Session): Message {
      const receipt = `${session.generation}:${jm.seq}`;
      this.deliveries.set(receipt, jm);
      return {
         id: jm.headers?.get('messageId') || `${jm.info.stream}:${jm.seq}`,
         receipt,
         payload: jm.data,
         headers: readHeaders(jm),
         enqueuedAt: new Date(Math.floor(jm.info.timestampNanos / 1e6)),
         // the server counts deliveries from 1
         redeliveryCount: Math.max(0, jm.info.redeliveryCount - 1),
      };
   }

   private requireSession(): Session {
      if (!this.session || this.session.nc.isClosed()) {
         throw new ConnectionLostError('NATS connection is not open');
      }
      return this.session;
   }
}

/* ──────────────────────────────────────────────────────────────────
 * Self-registration
 * ─────────────────────────────────────────────────────────────────*/
register('nats', (config, logger) => new NatsAdapter(config, logger));
