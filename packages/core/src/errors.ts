/* ================================================================
 * mqbridge - error taxonomy
 * ============================================================== */

export type QueueErrorCode =
   | 'CONFIGURATION'
   | 'CONNECT'
   | 'CONNECTION_LOST'
   | 'CONNECTION_CLOSED'
   | 'PUBLISH'
   | 'QUEUE_CONFLICT'
   | 'DOUBLE_ACK'
   | 'STALE_ACK'
   | 'RETRIES_EXHAUSTED'
   | 'PROCESSING';

/**
 * Base class of every error raised by mqbridge.
 * `code` is stable and safe to switch on; `name` mirrors the subclass.
 */
export abstract class QueueError extends Error {
   abstract readonly code: QueueErrorCode;

   constructor(message: string, options?: { cause?: unknown }) {
      super(message, options);
      this.name = new.target.name;
   }
}

/** Invalid configuration or an unknown broker key. */
export class ConfigurationError extends QueueError {
   readonly code = 'CONFIGURATION' as const;

   constructor(
      message: string,
      public readonly issues: readonly string[] = [],
   ) {
      super(issues.length ? `${message}: ${issues.join('; ')}` : message);
   }
}

/** The broker could not be reached within the connect retry budget. */
export class ConnectError extends QueueError {
   readonly code = 'CONNECT' as const;

   constructor(
      message: string,
      public readonly attempts: number,
      options?: { cause?: unknown },
   ) {
      super(message, options);
   }
}

/**
 * An adapter found its broker session gone. The owning connection
 * reconnects and retries the operation; callers normally never see it.
 */
export class ConnectionLostError extends QueueError {
   readonly code = 'CONNECTION_LOST' as const;
}

/** Operation attempted on a connection that has been closed. */
export class ConnectionClosedError extends QueueError {
   readonly code = 'CONNECTION_CLOSED' as const;

   constructor(message = 'Queue connection is closed') {
      super(message);
   }
}

/** Transport failure while publishing. The caller may retry. */
export class PublishError extends QueueError {
   readonly code = 'PUBLISH' as const;
}

/** The queue exists with settings incompatible with the configuration. */
export class QueueConflictError extends QueueError {
   readonly code = 'QUEUE_CONFLICT' as const;

   constructor(
      message: string,
      public readonly queue: string,
      options?: { cause?: unknown },
   ) {
      super(message, options);
   }
}

/** A settled handle was settled again the other way (ack after nack or the reverse). */
export class DoubleAckError extends QueueError {
   readonly code = 'DOUBLE_ACK' as const;

   constructor(
      public readonly messageId: string,
      public readonly state: string,
      attempted: 'ack' | 'nack',
   ) {
      super(`Cannot ${attempted} message ${messageId}: already ${state}`);
   }
}

/** Settlement attempted after the ack deadline expired; reported, never thrown. */
export class StaleAckError extends QueueError {
   readonly code = 'STALE_ACK' as const;

   constructor(
      public readonly messageId: string,
      attempted: 'ack' | 'nack' | 'process',
   ) {
      super(`Ignored stale ${attempted} for message ${messageId}: ack deadline expired`);
   }
}

/** A poison message was dropped after its retry budget ran out. */
export class RetriesExhaustedError extends QueueError {
   readonly code = 'RETRIES_EXHAUSTED' as const;

   constructor(
      public readonly messageId: string,
      public readonly attempts: number,
      options?: { cause?: unknown },
   ) {
      super(`Message ${messageId} dropped after ${attempts} failed attempts`, options);
   }
}

/** Wraps whatever non-Error value processing logic threw. */
export class ProcessingError extends QueueError {
   readonly code = 'PROCESSING' as const;
}

export function isQueueError(value: unknown, code?: QueueErrorCode): value is QueueError {
   return value instanceof QueueError && (code === undefined || value.code === code);
}

export function toError(value: unknown): Error {
   if (value instanceof Error) return value;
   return new ProcessingError(
      typeof value === 'string' ? value : `Non-error thrown: ${String(value)}`,
      { cause: value },
   );
}
