/* =====================================================================
 * mqbridge – Google Cloud Pub/Sub adapter (topic + pull subscription,
 * synchronous pull, ack-deadline based nack)
 * ===================================================================== */
import {
   ConnectError,
   ConnectionLostError,
   PublishError,
   QueueConflictError,
   QueueError,
   parseAdapterOptions,
   register,
   type BackendAdapter,
   type BackendCapabilities,
   type Logger,
   type Message,
   type PublishOptions,
   type PublishReceipt,
   type QueueConfiguration,
} from '@mqbridge/core';
import { PubSub, v1, type ClientConfig, type Topic, type protos } from '@google-cloud/pubsub';
import { ulid } from 'ulid';
import { z } from 'zod';

type ReceivedMessage = protos.google.pubsub.v1.IReceivedMessage;
type Timestamp = protos.google.protobuf.ITimestamp;

/* ──────────────────────────────────────────────────────────────────
 * Options
 * ─────────────────────────────────────────────────────────────────*/
export const gcpOptionsSchema = z.object({
   /** Regional or private endpoint, e.g. "europe-west1-pubsub.googleapis.com" */
   apiEndpoint: z.string().min(1).optional(),
});

export type GcpOptions = z.output<typeof gcpOptionsSchema>;

/* Pub/Sub bounds for ack deadlines, in seconds */
const MIN_ACK_DEADLINE_S = 10;
const MAX_ACK_DEADLINE_S = 600;
/* pulls shorter than this tend to end before the server answers */
const MIN_PULL_TIMEOUT_MS = 1_000;

export const GCP_CAPABILITIES: BackendCapabilities = {
   prefetchBatching: true,
   maxPrefetch: 1_000,
   explicitNack: true,
   delayedRedelivery: true,
   maxRedeliveryDelayMs: MAX_ACK_DEADLINE_S * 1_000,
   concurrentOperations: true,
};

/* gRPC status codes the adapter reacts to */
const DEADLINE_EXCEEDED = 4;
const ALREADY_EXISTS = 6;
const UNAVAILABLE = 14;

/* Helpers -------------------------------------------------------- */
const grpcCode = (err: unknown): number | undefined =>
   err instanceof Error && 'code' in err && typeof err.code === 'number' ? err.code : undefined;

export const ackDeadlineSeconds = (ms: number) =>
   Math.min(MAX_ACK_DEADLINE_S, Math.max(MIN_ACK_DEADLINE_S, Math.ceil(ms / 1_000)));

function toDate(time: Timestamp | undefined): Date | undefined {
   if (!time || time.seconds === null || time.seconds === undefined) return undefined;
   const seconds = typeof time.seconds === 'object' ? time.seconds.toNumber() : Number(time.seconds);
   return new Date(seconds * 1_000 + Math.floor((time.nanos ?? 0) / 1e6));
}

function toBytes(data: Uint8Array | string | null | undefined): Uint8Array {
   if (typeof data === 'string') return new Uint8Array(Buffer.from(data, 'base64'));
   return new Uint8Array(data ?? []);
}

/** Resolve with `undefined` as soon as `signal` aborts. */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T | undefined> {
   if (!signal) return promise;
   return new Promise((resolve, reject) => {
      const onAbort = () => resolve(undefined);
      signal.addEventListener('abort', onAbort, { once: true });
      promise.then(
         (value) => {
            signal.removeEventListener('abort', onAbort);
            resolve(value);
         },
         (err: unknown) => {
            signal.removeEventListener('abort', onAbort);
            reject(err);
         },
      );
   });
}

interface Session {
   pubsub: PubSub;
   subscriber: v1.SubscriberClient;
   topic: Topic;
   generation: number;
}

/* ──────────────────────────────────────────────────────────────────
 * Adapter
 * ─────────────────────────────────────────────────────────────────*/
export class GcpPubSubAdapter implements BackendAdapter {
   readonly provider = 'gcp' as const;
   readonly capabilities = GCP_CAPABILITIES;
   readonly options: GcpOptions;

   private session: Session | undefined;
   private generation = 0;
   private readonly deliveries = new Map<string, string>();

   constructor(
      private readonly config: QueueConfiguration,
      private readonly logger: Logger,
   ) {
      this.options = parseAdapterOptions(gcpOptionsSchema, config);
   }

   get projectId(): string {
      return this.config.address.trim();
   }

   get subscriptionPath(): string {
      return `projects/${this.projectId}/subscriptions/${this.config.subscriptionName}`;
   }

   /* ------------- connect -------------------------------------- */
   async connect(): Promise<void> {
      const clientOptions: ClientConfig = {
         projectId: this.projectId,
         keyFilename: this.config.credentialsPath,
         apiEndpoint: this.options.apiEndpoint,
      };
      try {
         const pubsub = new PubSub(clientOptions);
         // picks up PUBSUB_EMULATOR_HOST for the low-level subscriber too
         const resolved = await pubsub.getClientConfig();
         const subscriber = new v1.SubscriberClient({
            projectId: this.projectId,
            keyFilename: this.config.credentialsPath,
            apiEndpoint: resolved.apiEndpoint ?? this.options.apiEndpoint,
            servicePath: resolved.servicePath,
            port: resolved.port === undefined ? undefined : Number(resolved.port),
            sslCreds: resolved.sslCreds,
         });
         this.session = {
            pubsub,
            subscriber,
            topic: pubsub.topic(this.config.queueName),
            generation: ++this.generation,
         };
      } catch (err) {
         throw new ConnectError(`Could not set up Pub/Sub clients for ${this.projectId}`, 1, {
            cause: err,
         });
      }
   }

   isConnected(): boolean {
      return this.session !== undefined;
   }

   /* ------------- topic + subscription -------------------------- */
   async declareQueue(name: string): Promise<void> {
      const { pubsub } = this.requireSession();
      const topic = pubsub.topic(name);
      try {
         const [topicExists] = await topic.exists();
         if (!topicExists) await this.createIfAbsent(() => topic.create());

         const subscription = pubsub.subscription(this.config.subscriptionName);
         const [subscriptionExists] = await subscription.exists();
         if (subscriptionExists) {
            const [metadata] = await subscription.getMetadata();
            if (metadata.topic !== topic.name) {
               throw new QueueConflictError(
                  `Subscription "${this.config.subscriptionName}" is bound to ${metadata.topic ?? 'no topic'}, not ${topic.name}`,
                  name,
               );
            }
         } else {
            await this.createIfAbsent(() =>
               topic.createSubscription(this.config.subscriptionName, {
                  ackDeadlineSeconds: ackDeadlineSeconds(this.config.ackDeadlineMs),
               }),
            );
            this.logger.info(
               { topic: name, subscription: this.config.subscriptionName },
               'Created Pub/Sub subscription',
            );
         }
      } catch (err) {
         throw this.lostOr(err);
      }
   }

   /* ------------- producer -------------------------------------- */
   async publish(payload: Uint8Array, options: PublishOptions = {}): Promise<PublishReceipt> {
      const { topic } = this.requireSession();
      const messageId = ulid();
      try {
         const brokerId = await topic.publishMessage({
            data: Buffer.from(payload),
            attributes: { ...options.headers, messageId },
         });
         return { messageId, brokerId };
      } catch (err) {
         if (grpcCode(err) === UNAVAILABLE) {
            throw new ConnectionLostError('Pub/Sub unavailable during publish', { cause: err });
         }
         throw new PublishError(`Pub/Sub did not accept message ${messageId}`, { cause: err });
      }
   }

   /* ------------- consumer -------------------------------------- */
   async receive(maxCount: number, timeoutMs: number, signal?: AbortSignal): Promise<Message[]> {
      const session = this.requireSession();
      if (signal?.aborted) return [];

      const pull = session.subscriber.pull(
         { subscription: this.subscriptionPath, maxMessages: maxCount },
         { timeout: Math.max(timeoutMs, MIN_PULL_TIMEOUT_MS) },
      );
      let response: Awaited<typeof pull> | undefined;
      try {
         response = await untilAborted(pull, signal);
      } catch (err) {
         if (grpcCode(err) === DEADLINE_EXCEEDED) return [];
         throw this.lostOr(err);
      }

      if (!response) {
         // hand back whatever the abandoned pull still leases
         pull
            .then(([late]) => this.release(session, late.receivedMessages ?? []))
            .catch((err: unknown) => this.logger.debug({ err }, 'Abandoned pull failed'));
         return [];
      }

      const out: Message[] = [];
      for (const received of response[0].receivedMessages ?? []) {
         const message = this.toMessage(received, session);
         if (message) out.push(message);
      }
      return out;
   }

   /* ------------- settlement ------------------------------------ */
   async ack(message: Message): Promise<void> {
      const { subscriber } = this.requireSession();
      const ackId = this.deliveries.get(message.receipt);
      if (!ackId) return;
      try {
         await subscriber.acknowledge({ subscription: this.subscriptionPath, ackIds: [ackId] });
      } catch (err) {
         throw this.lostOr(err);
      }
      this.deliveries.delete(message.receipt);
   }

   /** Shortens the lease; the message comes back once it runs out. */
   async nack(message: Message, delayMs = 0): Promise<void> {
      const { subscriber } = this.requireSession();
      const ackId = this.deliveries.get(message.receipt);
      if (!ackId) return;
      try {
         await subscriber.modifyAckDeadline({
            subscription: this.subscriptionPath,
            ackIds: [ackId],
            ackDeadlineSeconds: Math.min(MAX_ACK_DEADLINE_S, Math.ceil(delayMs / 1_000)),
         });
      } catch (err) {
         throw this.lostOr(err);
      }
      this.deliveries.delete(message.receipt);
   }

   /** The subscription lease can outlast the ack deadline; end it now. */
   async expire(message: Message): Promise<void> {
      return this.nack(message, 0);
   }

   /* ------------- teardown -------------------------------------- */
   async disconnect(): Promise<void> {
      const session = this.session;
      if (!session) return;
      this.session = undefined;
      // leased messages return once their ack deadline passes
      this.deliveries.clear();
      try {
         await session.subscriber.close();
      } catch (err) {
         this.logger.debug({ err }, 'Closing the Pub/Sub subscriber failed');
      }
      try {
         await session.pubsub.close();
      } catch (err) {
         this.logger.debug({ err }, 'Closing the Pub/Sub client failed');
      }
   }

   private toMessage(received: ReceivedMessage, session: Session): Message | undefined {
      const { ackId, message } = received;
      if (!ackId || !message) return undefined;
      const receipt = `${session.generation}:${ackId}`;
      this.deliveries.set(receipt, ackId);

      const { messageId, ...headers } = message.attributes ?? {};
      return {
         id: messageId || message.messageId || ackId,
         receipt,
         payload: toBytes(message.data),
         headers,
         enqueuedAt: toDate(message.publishTime ?? undefined),
         // only reported when the subscription has a dead-letter policy
         redeliveryCount: Math.max(0, (received.deliveryAttempt ?? 1) - 1),
      };
   }

   private async release(session: Session, received: ReceivedMessage[]): Promise<void> {
      const ackIds = received.flatMap((r) => (r.ackId ? [r.ackId] : []));
      if (!ackIds.length || this.session !== session) return;
      await session.subscriber.modifyAckDeadline({
         subscription: this.subscriptionPath,
         ackIds,
         ackDeadlineSeconds: 0,
      });
   }

   private async createIfAbsent(create: () => Promise<unknown>): Promise<void> {
      try {
         await create();
      } catch (err) {
         // another client won the race
         if (grpcCode(err) !== ALREADY_EXISTS) throw err;
      }
   }

   private requireSession(): Session {
      if (!this.session) throw new ConnectionLostError('Pub/Sub clients are not open');
      return this.session;
   }

   private lostOr(err: unknown): unknown {
      if (err instanceof QueueError || grpcCode(err) !== UNAVAILABLE) return err;
      return new ConnectionLostError('Pub/Sub unavailable', { cause: err });
   }
}

/* ──────────────────────────────────────────────────────────────────
 * Self-registration
 * ─────────────────────────────────────────────────────────────────*/
register('gcp', (config, logger) => new GcpPubSubAdapter(config, logger));
