/**
 * MCP Recovery - Backoff Above the Connection Cache
 */

export { RetryStrategy, backoffDelay, type LinearBackoff, type RetryOptions } from './retry-strategy.js';
