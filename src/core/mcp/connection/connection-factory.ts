/**
 * MCP Connection Factory
 *
 * Builds the transport for a server configuration, runs the MCP handshake and
 * wraps the connected client in a MCPServiceHandle. Only background workers
 * call this, so it is allowed to wait out the initialization timeout and the
 * retry backoff.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import type {
	McpProperties,
	ServerConfig,
	SseServerConfig,
	StdioServerConfig,
	StreamableHttpServerConfig,
} from '../config.js';
import { LOG_PREFIXES, TRANSPORT_TYPES } from '../constants.js';
import { ConnectionFailureError, ConnectionTimeoutError } from '../errors/index.js';
import type { ConnectionFactory } from '../types.js';
import { sleep, withTimeout } from '../utils/index.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';
import { MCPServiceHandle } from './service-handle.js';

const CLIENT_VERSION = '1.0.0';

export type FactoryProperties = Pick<
	McpProperties,
	| 'maxRetries'
	| 'requestTimeoutMs'
	| 'initializationTimeoutMs'
	| 'retryWaitMultiplier'
	| 'ssePathSuffix'
	| 'userAgent'
>;

/**
 * Append the SSE path suffix when the URL points at a bare host.
 */
export function resolveSseUrl(url: string, ssePathSuffix: string): URL {
	const parsed = new URL(url);
	if (parsed.pathname === '' || parsed.pathname === '/') {
		const suffix = ssePathSuffix.startsWith('/') ? ssePathSuffix : `/${ssePathSuffix}`;
		parsed.pathname = suffix;
	}
	return parsed;
}

export class MCPConnectionFactory implements ConnectionFactory<MCPServiceHandle> {
	private readonly logger: Logger;

	constructor(
		private readonly properties: FactoryProperties,
		logger?: Logger
	) {
		this.logger = logger ?? defaultLogger;
	}

	/**
	 * Connect, retrying up to `maxRetries` times with a linear backoff of
	 * `retryWaitMultiplier` seconds per attempt.
	 *
	 * @throws ConnectionFailureError once every attempt has failed
	 */
	async createConnection(config: ServerConfig): Promise<MCPServiceHandle> {
		const maxAttempts = Math.max(1, this.properties.maxRetries);
		let lastError: unknown;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				const handle = await this.connectOnce(config);
				this.logger.info(
					`${LOG_PREFIXES.FACTORY} Connected to ${config.name} (${config.transport}) on attempt ${attempt}`
				);
				return handle;
			} catch (error) {
				lastError = error;
				this.logger.warn(
					`${LOG_PREFIXES.FACTORY} Connection attempt ${attempt}/${maxAttempts} failed for ${config.name}: ${error instanceof Error ? error.message : String(error)}`
				);
			}

			if (attempt < maxAttempts) {
				await sleep(this.properties.retryWaitMultiplier * 1000 * attempt);
			}
		}

		throw new ConnectionFailureError(
			`Failed to connect to MCP server ${config.name} after ${maxAttempts} attempt(s)`,
			config.name,
			maxAttempts,
			lastError
		);
	}

	/**
	 * Build the transport for a config without connecting it
	 */
	createTransport(config: ServerConfig): Transport {
		switch (config.transport) {
			case TRANSPORT_TYPES.STDIO:
				return this.createStdioTransport(config);
			case TRANSPORT_TYPES.SSE:
				return this.createSseTransport(config);
			case TRANSPORT_TYPES.STREAMABLE_HTTP:
				return this.createStreamableHttpTransport(config);
		}
	}

	private async connectOnce(config: ServerConfig): Promise<MCPServiceHandle> {
		const transport = this.createTransport(config);
		const client = new Client({ name: `mcp-cache-client-${config.name}`, version: CLIENT_VERSION });
		const timeoutMs = this.properties.initializationTimeoutMs;

		try {
			await withTimeout(
				client.connect(transport, { timeout: timeoutMs }),
				timeoutMs,
				() =>
					new ConnectionTimeoutError(
						`Initialization of ${config.name} timed out after ${timeoutMs}ms`,
						config.name,
						timeoutMs
					)
			);
		} catch (error) {
			await transport.close().catch((closeError: unknown) => {
				this.logger.debug(
					`${LOG_PREFIXES.FACTORY} Cleanup after failed connect to ${config.name} failed: ${closeError instanceof Error ? closeError.message : String(closeError)}`
				);
			});
			throw error;
		}

		return new MCPServiceHandle(config.name, client, transport, this.properties.requestTimeoutMs, this.logger);
	}

	private createStdioTransport(config: StdioServerConfig): Transport {
		this.logger.debug(`${LOG_PREFIXES.FACTORY} Creating stdio transport for ${config.name}`, {
			command: config.command,
			args: config.args,
		});
		return new StdioClientTransport({
			command: config.command,
			args: config.args,
			env: { ...getDefaultEnvironment(), ...config.env },
		});
	}

	private createSseTransport(config: SseServerConfig): Transport {
		const url = resolveSseUrl(config.url, this.properties.ssePathSuffix);
		this.logger.debug(`${LOG_PREFIXES.FACTORY} Creating SSE transport for ${config.name}`, {
			url: url.toString(),
		});
		return new SSEClientTransport(url, {
			requestInit: { headers: this.buildHeaders(config.headers) },
		});
	}

	private createStreamableHttpTransport(config: StreamableHttpServerConfig): Transport {
		this.logger.debug(`${LOG_PREFIXES.FACTORY} Creating streamable HTTP transport for ${config.name}`, {
			url: config.url,
		});
		return new StreamableHTTPClientTransport(new URL(config.url), {
			requestInit: { headers: this.buildHeaders(config.headers) },
		});
	}

	private buildHeaders(headers: Record<string, string>): Record<string, string> {
		return { 'User-Agent': this.properties.userAgent, ...headers };
	}
}
