/* ================================================================
 * mqbridge - Core contracts & runtime
 * ============================================================== */
export * from './backoff';
export * from './config';
export * from './connection';
export * from './consumer';
export * from './error-sink';
export * from './errors';
export * from './logger';
export * from './message-handle';
export * from './publisher';
export * from './registry';
export * from './retrying-consumer';
export type * from './types';
