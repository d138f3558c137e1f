/* ================================================================
 * mqbridge - MessageHandle: one delivery plus its settlement state
 * ============================================================== */
import { DoubleAckError, StaleAckError, type QueueError } from './errors';
import type { ErrorContext, Message } from './types';

export const AckState = {
   Pending: 'PENDING',
   Acked: 'ACKED',
   Nacked: 'NACKED',
   TimedOut: 'TIMED_OUT',
} as const;

export type AckState = (typeof AckState)[keyof typeof AckState];

type Settlement = 'ack' | 'nack';

/**
 * What a handle needs from the connection that produced it.
 */
export interface HandleOwner {
   /** Throws ConnectionClosedError once the connection is closed */
   assertOpen(): void;
   settle(kind: Settlement, message: Message, delayMs?: number): Promise<void>;
   report(error: QueueError, context: ErrorContext): void;
   release(handle: MessageHandle): void;
   /** The ack deadline passed with the delivery unsettled */
   expired(message: Message): void;
}

const decoder = new TextDecoder();

/**
 * Wraps a received {@link Message} with its ack state.
 *
 * PENDING moves to ACKED or NACKED once. Repeating the same settlement
 * is a no-op; settling the other way throws {@link DoubleAckError}.
 * The ack-deadline timer, started on construction, moves PENDING to
 * TIMED_OUT; settlements after that are reported as stale and ignored.
 */
export class MessageHandle {
   readonly deadline: Date;

   private state_: AckState = AckState.Pending;
   private timer: NodeJS.Timeout | undefined;
   private readonly expiry = new AbortController();

   constructor(
      readonly message: Message,
      private readonly owner: HandleOwner,
      ackDeadlineMs: number,
   ) {
      this.deadline = new Date(Date.now() + ackDeadlineMs);
      this.arm(ackDeadlineMs);
   }

   get state(): AckState {
      return this.state_;
   }

   get settled(): boolean {
      return this.state_ !== AckState.Pending;
   }

   get id(): string {
      return this.message.id;
   }

   get payload(): Uint8Array {
      return this.message.payload;
   }

   get headers(): Readonly<Record<string, string>> {
      return this.message.headers;
   }

   get redeliveryCount(): number {
      return this.message.redeliveryCount;
   }

   get enqueuedAt(): Date | undefined {
      return this.message.enqueuedAt;
   }

   /** Aborts when the ack deadline expires */
   get signal(): AbortSignal {
      return this.expiry.signal;
   }

   text(): string {
      return decoder.decode(this.message.payload);
   }

   json<T = unknown>(): T {
      return JSON.parse(this.text());
   }

   /**
    * Compare-and-set. Returns whether the state was `from` and is now `to`.
    */
   transition(from: AckState, to: AckState): boolean {
      if (this.state_ !== from) return false;
      this.state_ = to;
      return true;
   }

   /**
    * Resolves `true` when this call acked the message, `false` for a
    * tolerated no-op (already acked, or deadline expired).
    */
   ack(): Promise<boolean> {
      return this.settle('ack');
   }

   /**
    * Resolves `true` when this call nacked the message, `false` for a
    * tolerated no-op (already nacked, or deadline expired).
    */
   nack(delayMs?: number): Promise<boolean> {
      return this.settle('nack', delayMs);
   }

   /**
    * Stop the deadline timer without settling; used when the owning
    * connection closes and the broker takes over redelivery.
    */
   detach(): void {
      this.disarm();
   }

   /**
    * Expire now. The session that delivered the message is gone, so the
    * broker will redeliver it regardless of what this handle does.
    */
   invalidate(): void {
      this.disarm();
      this.timeOut(false);
   }

   private async settle(kind: Settlement, delayMs?: number): Promise<boolean> {
      const target = kind === 'ack' ? AckState.Acked : AckState.Nacked;
      const current = this.state_;

      if (current === target) return false;
      if (current === AckState.TimedOut) {
         this.owner.report(new StaleAckError(this.id, kind), {
            source: 'handle',
            messageId: this.id,
            level: 'warn',
         });
         return false;
      }
      if (current !== AckState.Pending) {
         throw new DoubleAckError(this.id, current, kind);
      }

      this.owner.assertOpen();
      this.transition(AckState.Pending, target);
      this.disarm();

      try {
         await this.owner.settle(kind, this.message, delayMs);
      } catch (err) {
         this.rollback(target);
         throw err;
      }
      this.owner.release(this);
      return true;
   }

   /* The broker never saw the settlement: return to PENDING, or to
    * TIMED_OUT if the deadline passed while we waited. */
   private rollback(from: AckState): void {
      const remaining = this.deadline.getTime() - Date.now();
      if (remaining > 0) {
         if (this.transition(from, AckState.Pending)) this.arm(remaining);
      } else if (this.transition(from, AckState.Pending)) {
         this.timeOut(true);
      }
   }

   private arm(ms: number): void {
      this.timer = setTimeout(() => this.expire(), ms);
      this.timer.unref();
   }

   private disarm(): void {
      if (this.timer !== undefined) clearTimeout(this.timer);
      this.timer = undefined;
   }

   private expire(): void {
      this.timer = undefined;
      this.timeOut(true);
   }

   /* `handBack` asks the owner to return the delivery to the broker;
    * a stale session has nothing left to return it on. */
   private timeOut(handBack: boolean): void {
      if (!this.transition(AckState.Pending, AckState.TimedOut)) return;
      this.expiry.abort();
      this.owner.release(this);
      if (handBack) this.owner.expired(this.message);
   }
}
