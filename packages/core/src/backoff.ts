import type { BackoffPolicy } from './config';

/**
 * Delay before retry number `attempt` (1-based):
 * `min(cap, initial × multiplier^(attempt − 1))`.
 * Non-decreasing in `attempt` because the multiplier is at least 1.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
   if (attempt <= 1) return Math.min(policy.initialMs, policy.capMs);
   const raw = policy.initialMs * Math.pow(policy.multiplier, attempt - 1);
   return Number.isFinite(raw) ? Math.min(raw, policy.capMs) : policy.capMs;
}

/**
 * Successive delays for attempts 1..count.
 */
export function backoffSchedule(count: number, policy: BackoffPolicy): number[] {
   return Array.from({ length: count }, (_, i) => backoffDelay(i + 1, policy));
}

/**
 * Resolve after `ms`, or as soon as `signal` aborts. Resolves `false`
 * when cut short.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
   if (signal?.aborted) return Promise.resolve(false);
   if (ms <= 0) return Promise.resolve(true);
   return new Promise((resolve) => {
      const onAbort = () => {
         clearTimeout(timer);
         resolve(false);
      };
      const timer = setTimeout(() => {
         signal?.removeEventListener('abort', onAbort);
         resolve(true);
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
   });
}
