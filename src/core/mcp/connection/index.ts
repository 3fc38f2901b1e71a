/**
 * MCP Connection - Establishing, Checking and Closing Connections
 */

export { MCPConnectionFactory, resolveSseUrl, type FactoryProperties } from './connection-factory.js';
export { MCPServiceHandle, type ToolProvidingHandle, type ToolCallResult } from './service-handle.js';
export { HealthCheckScheduler, type HealthCheckTarget, type HealthCheckOptions } from './health-check.js';
export { closeHandleSafely, type ClosePolicy } from './close-policy.js';
