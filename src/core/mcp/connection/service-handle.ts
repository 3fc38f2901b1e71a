/**
 * A connected MCP client session, as handed out by the connection cache.
 */

import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import { LOG_PREFIXES } from '../constants.js';
import type { ConnectionHandle } from '../types.js';
import type { Logger } from '../../logger/index.js';

export type ToolCallResult = Awaited<ReturnType<Client['callTool']>>;

/**
 * A connection handle that can list and call tools
 */
export interface ToolProvidingHandle extends ConnectionHandle {
	listTools(): Promise<Tool[]>;
	callTool(name: string, args?: Record<string, unknown>): Promise<ToolCallResult>;
}

export class MCPServiceHandle implements ToolProvidingHandle {
	private open = true;

	constructor(
		readonly serverName: string,
		private readonly client: Client,
		private readonly transport: Transport,
		private readonly requestTimeoutMs: number,
		private readonly logger: Logger
	) {
		this.client.onclose = () => {
			if (this.open) {
				this.logger.warn(`${LOG_PREFIXES.FACTORY} Transport closed for server: ${this.serverName}`);
			}
			this.open = false;
		};
		this.client.onerror = error => {
			this.logger.debug(`${LOG_PREFIXES.FACTORY} Transport error for server ${this.serverName}: ${error.message}`);
		};
	}

	isOpen(): boolean {
		return this.open;
	}

	async listTools(): Promise<Tool[]> {
		const result = await this.client.listTools(undefined, { timeout: this.requestTimeoutMs });
		return result.tools;
	}

	async callTool(name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> {
		return this.client.callTool({ name, arguments: args }, undefined, {
			timeout: this.requestTimeoutMs,
		});
	}

	/**
	 * Close the client session, which also closes its transport.
	 */
	async closeGracefully(): Promise<void> {
		this.open = false;
		await this.client.close();
	}

	/**
	 * Tear the transport down directly, bypassing the client.
	 */
	async close(): Promise<void> {
		this.open = false;
		await this.transport.close();
	}
}
