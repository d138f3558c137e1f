import type { QueueError } from './errors';
import type { Logger } from './logger';
import type { ErrorContext, ErrorSink } from './types';

/**
 * Log `error` and hand it to `sink`. A sink that throws or rejects is
 * logged; it never propagates into the caller's loop.
 */
export function dispatchError(
   logger: Logger,
   sink: ErrorSink | undefined,
   error: QueueError,
   context: ErrorContext,
): void {
   logger[context.level](
      { err: error, source: context.source, messageId: context.messageId },
      error.message,
   );
   if (!sink) return;
   try {
      Promise.resolve(sink(error, context)).catch((err: unknown) =>
         logger.error({ err }, 'Error sink failed'),
      );
   } catch (err) {
      logger.error({ err }, 'Error sink failed');
   }
}
