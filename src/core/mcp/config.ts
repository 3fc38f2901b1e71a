import { z } from 'zod';
import type { Env } from '../env.js';
import { DEFAULT_PROPERTIES } from './constants.js';

// ======================================================
// Server Configuration
// ======================================================

const serverName = z
	.string()
	.min(1)
	.max(128)
	.regex(/^[A-Za-z0-9._-]+$/, 'Server name may only contain letters, digits, ".", "_" and "-"')
	.describe('Stable identity of the server; used as the connection cache key');

export const StdioServerConfigSchema = z
	.object({
		name: serverName,
		transport: z.literal('stdio'),
		command: z
			.string()
			.min(1)
			.describe("Command to launch the MCP server (e.g., 'node', 'python', 'uvx')"),
		args: z
			.array(z.string())
			.default([])
			.describe("Arguments to pass to the command (e.g., ['server.js', '--port=3000'])"),
		env: z
			.record(z.string())
			.default({})
			.describe('Environment variables to set for the server process'),
		enabled: z.boolean().default(true),
	})
	.strict();

export const SseServerConfigSchema = z
	.object({
		name: serverName,
		transport: z.literal('sse'),
		url: z
			.string()
			.url()
			.describe('SSE endpoint; the configured path suffix is appended when the URL has no path'),
		headers: z.record(z.string()).default({}),
		enabled: z.boolean().default(true),
	})
	.strict();

export const StreamableHttpServerConfigSchema = z
	.object({
		name: serverName,
		transport: z.literal('streamable-http'),
		url: z.string().url().describe('Base URL of the streamable HTTP MCP endpoint'),
		headers: z.record(z.string()).default({}),
		enabled: z.boolean().default(true),
	})
	.strict();

export const ServerConfigSchema = z.discriminatedUnion('transport', [
	StdioServerConfigSchema,
	SseServerConfigSchema,
	StreamableHttpServerConfigSchema,
]);

export type StdioServerConfig = z.output<typeof StdioServerConfigSchema>;
export type SseServerConfig = z.output<typeof SseServerConfigSchema>;
export type StreamableHttpServerConfig = z.output<typeof StreamableHttpServerConfigSchema>;

/**
 * A validated server configuration, as held by the configuration cache.
 */
export type ServerConfig = z.output<typeof ServerConfigSchema>;

/**
 * Server configuration as written by users (defaults not yet applied).
 */
export type ServerConfigInput = z.input<typeof ServerConfigSchema>;

export type ServerConfigValidationResult =
	| { success: true; data: ServerConfig }
	| { success: false; errors: string[] };

/**
 * Validate raw input as a server configuration, collecting every issue as a
 * "path: message" string.
 */
export function validateServerConfig(input: unknown): ServerConfigValidationResult {
	const result = ServerConfigSchema.safeParse(input);
	if (result.success) {
		return { success: true, data: result.data };
	}
	return {
		success: false,
		errors: result.error.issues.map(issue =>
			issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
		),
	};
}

// ======================================================
// Cache Manager Properties
// ======================================================

export const McpPropertiesSchema = z.object({
	/** Connect attempts made by the connection factory before giving up */
	maxRetries: z.number().int().nonnegative().default(DEFAULT_PROPERTIES.maxRetries),
	/** Per-request timeout applied to remote tool calls */
	requestTimeoutMs: z.number().int().positive().default(DEFAULT_PROPERTIES.requestTimeoutMs),
	/** Timeout for the MCP initialize handshake, usually longer than a request */
	initializationTimeoutMs: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_PROPERTIES.initializationTimeoutMs),
	/** Seconds multiplied by the attempt number between backoff retries */
	retryWaitMultiplier: z.number().nonnegative().default(DEFAULT_PROPERTIES.retryWaitMultiplier),
	ssePathSuffix: z.string().default(DEFAULT_PROPERTIES.ssePathSuffix),
	userAgent: z.string().default(DEFAULT_PROPERTIES.userAgent),
	/** Retries after the first attempt in executeWithRetry */
	requestRetryCount: z.number().int().nonnegative().default(DEFAULT_PROPERTIES.requestRetryCount),
	connectionRebuildDelayMs: z
		.number()
		.int()
		.nonnegative()
		.default(DEFAULT_PROPERTIES.connectionRebuildDelayMs),
	healthCheckIntervalMs: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_PROPERTIES.healthCheckIntervalMs),
	/** A connected wrapper with more requests in flight is considered stuck */
	maxPendingRequests: z.number().int().positive().default(DEFAULT_PROPERTIES.maxPendingRequests),
	gracefulCloseTimeoutMs: z
		.number()
		.int()
		.nonnegative()
		.default(DEFAULT_PROPERTIES.gracefulCloseTimeoutMs),
	closeSettleMs: z.number().int().nonnegative().default(DEFAULT_PROPERTIES.closeSettleMs),
	forcedCloseSettleMs: z
		.number()
		.int()
		.nonnegative()
		.default(DEFAULT_PROPERTIES.forcedCloseSettleMs),
	shutdownTimeoutMs: z.number().int().nonnegative().default(DEFAULT_PROPERTIES.shutdownTimeoutMs),
	healthCheckPoolSize: z
		.number()
		.int()
		.positive()
		.default(DEFAULT_PROPERTIES.healthCheckPoolSize),
	configStore: z.enum(['sqlite', 'in-memory']).default(DEFAULT_PROPERTIES.configStore),
	configDbPath: z.string().default(DEFAULT_PROPERTIES.configDbPath),
});

export type McpProperties = z.output<typeof McpPropertiesSchema>;

export type McpPropertiesInput = z.input<typeof McpPropertiesSchema>;

/**
 * Fill in defaults and validate. Throws a ZodError on out-of-range values.
 */
export function resolveMcpProperties(input: McpPropertiesInput = {}): McpProperties {
	return McpPropertiesSchema.parse(input);
}

/**
 * Map validated environment variables onto cache manager properties.
 */
export function loadMcpProperties(source: Env): McpProperties {
	return resolveMcpProperties({
		maxRetries: source.MCP_MAX_RETRIES,
		requestTimeoutMs: source.MCP_TIMEOUT_MS,
		initializationTimeoutMs: source.MCP_INITIALIZATION_TIMEOUT_MS,
		retryWaitMultiplier: source.MCP_RETRY_WAIT_MULTIPLIER,
		ssePathSuffix: source.MCP_SSE_PATH_SUFFIX,
		userAgent: source.MCP_USER_AGENT,
		requestRetryCount: source.MCP_REQUEST_RETRY_COUNT,
		connectionRebuildDelayMs: source.MCP_CONNECTION_REBUILD_DELAY_MS,
		healthCheckIntervalMs: source.MCP_HEALTH_CHECK_INTERVAL_MS,
		maxPendingRequests: source.MCP_MAX_PENDING_REQUESTS,
		gracefulCloseTimeoutMs: source.MCP_GRACEFUL_CLOSE_TIMEOUT_MS,
		closeSettleMs: source.MCP_CLOSE_SETTLE_MS,
		forcedCloseSettleMs: source.MCP_FORCED_CLOSE_SETTLE_MS,
		shutdownTimeoutMs: source.MCP_SHUTDOWN_TIMEOUT_MS,
		healthCheckPoolSize: source.MCP_HEALTH_CHECK_POOL_SIZE,
		configStore: source.MCP_CONFIG_STORE,
		configDbPath: source.MCP_CONFIG_DB_PATH,
	});
}
