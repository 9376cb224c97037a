/**
 * Client for a server's datasources REST resource.
 *
 * List, fetch, update, delete, download and publish datasources, with
 * chunked uploads for large files.
 */

export * from './core';
export * from './models';
export * from './server';

export { validateInput } from './utils/validation';
export { initLogDB, logError } from './utils/logger';
export { withSpan, getCurrentTraceContext } from './utils/telemetry';
export type { RetryOptions } from './utils/retryUtils';
