/**
 * MCP Module Index
 *
 * The fail-fast MCP connection cache and the pieces around it.
 */

export * from './config.js';
export * from './constants.js';
export * from './types.js';

// Cache manager
export * from './manager/index.js';

// Registry - per-server wrappers and the configuration cache
export * from './registry/index.js';

// Connection - factory, handles, health checks and close policy
export * from './connection/index.js';

// Configuration stores
export * from './repository/index.js';

// Tool dispatch with backoff
export * from './dispatch/index.js';
export * from './recovery/index.js';

export * from './errors/index.js';
export * from './utils/index.js';

export { createMcpService, type MCPService } from './service.js';
