/**
 * MCP Manager Components
 *
 * The fail-fast connection cache that dispatch code goes through to reach MCP
 * servers.
 */

export { MCPCacheManager, type MCPCacheManagerOptions } from './cache-manager.js';
