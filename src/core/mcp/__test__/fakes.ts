import { vi } from 'vitest';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ServerConfig, ServerConfigInput } from '../config.js';
import type { ToolCallResult, ToolProvidingHandle } from '../connection/service-handle.js';
import type { ConnectionFactory } from '../types.js';
import { createLogger } from '../../logger/index.js';

export const silentLogger = createLogger({ silent: true });

export const stdioConfig = (name: string): ServerConfigInput => ({
	name,
	transport: 'stdio',
	command: 'mcp-test-server',
});

/**
 * In-process connection handle with scriptable close behaviour
 */
export class FakeHandle implements ToolProvidingHandle {
	open = true;
	gracefulCloseCalls = 0;
	forcedCloseCalls = 0;
	/** closeGracefully never settles */
	hangOnGracefulClose = false;
	failGracefulClose = false;
	failForcedClose = false;
	tools: Tool[] = [{ name: 'echo', inputSchema: { type: 'object' } }];

	readonly callTool = vi.fn(
		async (name: string, args: Record<string, unknown> = {}): Promise<ToolCallResult> => ({
			content: [{ type: 'text', text: `${this.serverName}:${name}:${JSON.stringify(args)}` }],
		})
	);

	constructor(readonly serverName: string) {}

	isOpen(): boolean {
		return this.open;
	}

	async listTools(): Promise<Tool[]> {
		return this.tools;
	}

	async closeGracefully(): Promise<void> {
		this.gracefulCloseCalls++;
		if (this.hangOnGracefulClose) {
			await new Promise<never>(() => {});
		}
		if (this.failGracefulClose) {
			throw new Error('graceful close failed');
		}
		this.open = false;
	}

	async close(): Promise<void> {
		this.forcedCloseCalls++;
		if (this.failForcedClose) {
			throw new Error('forced close failed');
		}
		this.open = false;
	}
}

/**
 * Factory that hands out FakeHandles and remembers them. Swap `createConnection`'s
 * implementation to script failures.
 */
export function createFakeFactory() {
	const handles: FakeHandle[] = [];
	const createConnection = vi.fn(async (config: ServerConfig): Promise<FakeHandle | null> => {
		const handle = new FakeHandle(config.name);
		handles.push(handle);
		return handle;
	});
	const factory: ConnectionFactory<FakeHandle> = { createConnection };
	return { factory, createConnection, handles };
}

/**
 * A promise plus the function that resolves it
 */
export function deferred<T = void>() {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>(r => {
		resolve = r;
	});
	return { promise, resolve };
}

export const flushImmediates = () => new Promise<void>(resolve => setImmediate(resolve));
