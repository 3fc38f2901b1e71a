/**
 * MCP Tool Dispatcher
 *
 * The caller-side layer over the connection cache: lists the tools of whatever is
 * connected right now, and calls a tool with a backoff loop around
 * executeWithRetry so a request can outlast a reconnect.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import type { ToolCallResult, ToolProvidingHandle } from '../connection/service-handle.js';
import { LOG_PREFIXES } from '../constants.js';
import { ConnectionErrorUtils, RetryExhaustedError } from '../errors/index.js';
import type { MCPCacheManager } from '../manager/cache-manager.js';
import { RetryStrategy } from '../recovery/index.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';

export interface DispatchedTool {
	serverName: string;
	name: string;
	description?: string;
	inputSchema: Tool['inputSchema'];
}

export interface ToolDispatcherOptions {
	/** Backoff attempts around executeWithRetry */
	maxAttempts?: number;
	/** Linear backoff step; defaults to retryWaitMultiplier seconds */
	baseDelayMs?: number;
	logger?: Logger;
}

export class MCPToolDispatcher<H extends ToolProvidingHandle> {
	private readonly maxAttempts: number;
	private readonly backoffStepMs: number;
	private readonly logger: Logger;

	constructor(
		private readonly manager: MCPCacheManager<H>,
		options: ToolDispatcherOptions = {}
	) {
		this.maxAttempts = options.maxAttempts ?? 3;
		this.backoffStepMs = options.baseDelayMs ?? manager.properties.retryWaitMultiplier * 1000;
		this.logger = options.logger ?? defaultLogger;
	}

	/**
	 * Tools of every server connected right now. A server whose listing fails is
	 * skipped, and reported to the cache if the failure looks like a dead
	 * connection.
	 */
	async listTools(scope?: string): Promise<DispatchedTool[]> {
		const services = this.manager.getOrLoadServices(scope);
		const listings = await Promise.all(
			Array.from(services, async ([serverName, handle]) => {
				try {
					const tools = await handle.listTools();
					return tools.map(tool => ({
						serverName,
						name: tool.name,
						description: tool.description,
						inputSchema: tool.inputSchema,
					}));
				} catch (error) {
					this.logger.warn(
						`${LOG_PREFIXES.DISPATCH} Failed to list tools for server ${serverName}: ${error instanceof Error ? error.message : String(error)}`
					);
					if (ConnectionErrorUtils.isConnectionError(error)) {
						this.manager.handleConnectionError(serverName);
					}
					return [];
				}
			})
		);
		return listings.flat();
	}

	/**
	 * Call a tool, backing off between attempts while the connection is rebuilt.
	 *
	 * @throws The last failure from the cache (MCPExecutionError or ConfigurationError)
	 */
	async callTool(
		serverName: string,
		toolName: string,
		args: Record<string, unknown> = {}
	): Promise<ToolCallResult> {
		const strategy = RetryStrategy.linear(serverName, this.maxAttempts, this.backoffStepMs);
		this.logger.debug(`${LOG_PREFIXES.DISPATCH} Calling tool ${toolName} on server ${serverName}`);

		try {
			return await strategy.execute(() =>
				this.manager.executeWithRetry(serverName, handle => handle.callTool(toolName, args))
			);
		} catch (error) {
			if (error instanceof RetryExhaustedError) {
				this.logger.warn(
					`${LOG_PREFIXES.DISPATCH} Tool ${toolName} on server ${serverName} failed:\n${error.getAttemptSummary()}`
				);
				throw error.lastError;
			}
			throw error;
		}
	}
}
