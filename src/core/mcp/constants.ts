/**
 * Constants for the MCP connection cache.
 *
 * Default property values, connection states, log prefixes, error messages and the
 * lookup tables used to classify transport failures.
 */

// ======================================================
// Connection States
// ======================================================

/**
 * Lifecycle states of a cached connection.
 *
 * CLOSING is reserved: no transition assigns it, and every consumer treats it the
 * same as CLOSED. It stays part of the union because callers may test for it.
 */
export const CONNECTION_STATES = {
	CONNECTED: 'CONNECTED',
	CLOSING: 'CLOSING',
	CLOSED: 'CLOSED',
	RECONNECTING: 'RECONNECTING',
} as const;

// ======================================================
// Transport Types
// ======================================================

export const TRANSPORT_TYPES = {
	STDIO: 'stdio',
	SSE: 'sse',
	STREAMABLE_HTTP: 'streamable-http',
} as const;

// ======================================================
// Default Property Values
// ======================================================

export const DEFAULT_PROPERTIES = {
	maxRetries: 3,
	requestTimeoutMs: 60000, // 1 minute
	initializationTimeoutMs: 120000, // 2 minutes
	retryWaitMultiplier: 1,
	ssePathSuffix: '/sse',
	userAgent: 'MCP-Client/1.0.0',
	requestRetryCount: 3,
	connectionRebuildDelayMs: 100,
	healthCheckIntervalMs: 5000,
	maxPendingRequests: 100,
	gracefulCloseTimeoutMs: 5000,
	closeSettleMs: 200,
	forcedCloseSettleMs: 100,
	shutdownTimeoutMs: 5000,
	healthCheckPoolSize: 2,
	configStore: 'sqlite',
	configDbPath: './data/mcp-config.db',
} as const;

/**
 * Worker pool names, also used as task id prefixes in logs.
 */
export const POOL_NAMES = {
	CONNECTION: 'mcp-connection',
	REBUILD: 'mcp-rebuild',
	HEALTH_CHECK: 'mcp-health-check',
} as const;

// ======================================================
// Error Classification Tables
// ======================================================

/**
 * Fragments of an error's type name that mark it as connection-related.
 */
export const CONNECTION_ERROR_TYPE_MARKERS = ['Timeout', 'Connection', 'Closed', 'ReadTimeout'];

/**
 * Fragments of a type name that identify a read timeout, checked on the error and
 * on its cause.
 */
export const READ_TIMEOUT_TYPE_MARKERS = ['ReadTimeoutException', 'ReadTimeout'];

/**
 * Lower-cased message fragments that make an I/O error connection-related.
 */
export const IO_ERROR_MESSAGE_MARKERS = ['connection', 'closed', 'reset', 'broken', 'read timeout'];

/**
 * Lower-cased message fragments that make any other error connection-related.
 */
export const CONNECTION_ERROR_MESSAGE_MARKERS = [
	'timeout',
	'timed out',
	'connection',
	'closed',
	'read timeout',
];

/**
 * Node.js system error codes raised by sockets, pipes and child processes.
 */
export const IO_ERROR_CODES = [
	'ECONNRESET',
	'ECONNREFUSED',
	'ECONNABORTED',
	'EPIPE',
	'ENOTCONN',
	'EHOSTUNREACH',
	'ENETUNREACH',
	'ENETDOWN',
	'EAI_AGAIN',
	'ETIMEDOUT',
	'ERR_STREAM_DESTROYED',
	'ERR_STREAM_WRITE_AFTER_END',
];

// ======================================================
// Error Messages
// ======================================================

export const ERROR_MESSAGES = {
	CONNECTION_UNAVAILABLE: 'Failed to get valid connection for server',
	CONFIG_NOT_FOUND: 'MCP server configuration not found',
	CONNECTION_FAILED: 'Failed to connect to MCP server',
	EXECUTION_FAILED: 'Failed to execute request',
	UNSUPPORTED_SERVER_TYPE: 'Unsupported server type',
	INVALID_CONFIG: 'Invalid server configuration',
	MANAGER_SHUT_DOWN: 'MCP cache manager has been shut down',
	POOL_SHUT_DOWN: 'Worker pool has been shut down',
};

// ======================================================
// Logging Constants
// ======================================================

export const LOG_PREFIXES = {
	CACHE: '[MCP-CACHE]',
	POOL: '[MCP-POOL]',
	HEALTH: '[MCP-HEALTH]',
	FACTORY: '[MCP-FACTORY]',
	CONFIG: '[MCP-CONFIG]',
	DISPATCH: '[MCP-DISPATCH]',
};
