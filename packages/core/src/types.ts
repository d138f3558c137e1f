/* ================================================================
 * mqbridge - core contracts
 * ============================================================== */
import type { BrokerClient } from './config';
import type { QueueError } from './errors';

/**
 * Message represents a single delivery handed out by an adapter.
 * Never mutated once produced.
 */
export interface Message {
   /**
    * Logical identity, stable across redeliveries of the same item
    * (a `messageId` header stamped on publish, or the broker's own id).
    */
   readonly id: string;
   /**
    * Broker token for settling *this* delivery (delivery tag, ack id,
    * stream sequence ...). May change between redeliveries.
    */
   readonly receipt: string;
   /** Raw payload bytes, untouched by the adapter */
   readonly payload: Uint8Array;
   /** Headers / properties / attributes, minus adapter bookkeeping */
   readonly headers: Readonly<Record<string, string>>;
   /** When the broker accepted the message, if it reports it */
   readonly enqueuedAt?: Date;
   /** 0 on first delivery; grows by at least one on every redelivery */
   readonly redeliveryCount: number;
}

export interface PublishOptions {
   /** Extra headers delivered alongside the payload */
   headers?: Record<string, string>;
}

/**
 * Broker-side confirmation of a publish.
 */
export interface PublishReceipt {
   /** Logical message id (the stamped `messageId` header) */
   messageId: string;
   /** Broker's own id for the stored message, when it returns one */
   brokerId?: string;
}

/**
 * Static description of what a backend can do. The consumer runtime
 * consults it to clamp prefetch and to pick a redelivery strategy.
 */
export interface BackendCapabilities {
   /** Whether one `receive` may return more than one message */
   readonly prefetchBatching: boolean;
   /** Upper bound on messages returned by one `receive` */
   readonly maxPrefetch: number;
   /** Whether `nack` triggers a redelivery; otherwise redelivery waits for deadline expiry */
   readonly explicitNack: boolean;
   /** Whether `nack(message, delayMs)` honours the delay */
   readonly delayedRedelivery: boolean;
   /** Longest delay `nack` accepts when `delayedRedelivery` is set */
   readonly maxRedeliveryDelayMs: number;
   /** Whether data-path calls may overlap; when false the connection serializes them */
   readonly concurrentOperations: boolean;
}

/**
 * Broker adapter contract. One flat implementation per broker,
 * built by the factory registered under its broker key.
 */
export interface BackendAdapter {
   /** Broker key (e.g. "rabbitmq", "nats") */
   readonly provider: BrokerClient;
   readonly capabilities: BackendCapabilities;

   /**
    * Establish the broker session.
    * @throws ConnectError on authentication or network failure
    */
   connect(): Promise<void>;

   /** Whether the broker session is currently usable */
   isConnected(): boolean;

   /**
    * Create the queue / topic / subscription if absent. Idempotent.
    * @throws QueueConflictError if it exists with incompatible settings
    */
   declareQueue(name: string): Promise<void>;

   /**
    * At-least-once send of `payload` to the configured queue.
    * Resolves once the broker has accepted the message.
    * @throws PublishError on transport failure
    * @throws ConnectionLostError if the session is gone
    */
   publish(payload: Uint8Array, options?: PublishOptions): Promise<PublishReceipt>;

   /**
    * Pull up to `maxCount` messages, waiting at most `timeoutMs` for the
    * first one. Resolves early (possibly with what it has) when `signal`
    * aborts.
    */
   receive(maxCount: number, timeoutMs: number, signal?: AbortSignal): Promise<Message[]>;

   /** Positive acknowledgement; a no-op for unknown or settled deliveries */
   ack(message: Message): Promise<void>;

   /**
    * Negative acknowledgement asking for redelivery, after `delayMs`
    * when the backend supports delayed redelivery. A no-op for unknown
    * or settled deliveries.
    */
   nack(message: Message, delayMs?: number): Promise<void>;

   /**
    * The ack deadline of `message` passed unsettled. Brokers without a
    * redelivery timer of their own get it back now; every adapter drops
    * the receipt. A no-op for unknown or settled deliveries.
    */
   expire(message: Message): Promise<void>;

   /** Release every broker resource. Safe to call repeatedly. */
   disconnect(): Promise<void>;
}

/**
 * Where a reported error came from.
 */
export interface ErrorContext {
   /** Component that reported it */
   source: 'connection' | 'handle' | 'consumer';
   messageId?: string;
   /** Severity hint for sinks that log */
   level: 'warn' | 'error';
}

/**
 * Caller-supplied destination for errors that must not be thrown
 * (poison messages, stale settlements, transparent reconnects).
 */
export type ErrorSink = (error: QueueError, context: ErrorContext) => void | Promise<void>;
