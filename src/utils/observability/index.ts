/**
 * Logging: JSON records with request-scoped context and redaction.
 */

export type * from './types.js';

export { createLogger, initObservability } from './logger.js';
export { withLogContext, getLogContext, createRequestId } from './context.js';
export { redactSecrets, safeSnippet } from './redaction.js';
