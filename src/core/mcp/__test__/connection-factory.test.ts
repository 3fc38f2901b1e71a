import { describe, it, expect, vi, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { MCPConnectionFactory, resolveSseUrl, type FactoryProperties } from '../connection/connection-factory.js';
import { MCPServiceHandle } from '../connection/service-handle.js';
import { validateServerConfig, type ServerConfig, type ServerConfigInput } from '../config.js';
import { ConnectionFailureError } from '../errors/index.js';
import { silentLogger } from './fakes.js';

const properties: FactoryProperties = {
	maxRetries: 3,
	requestTimeoutMs: 1000,
	initializationTimeoutMs: 1000,
	retryWaitMultiplier: 0,
	ssePathSuffix: '/sse',
	userAgent: 'test-agent/1.0',
};

const parse = (input: ServerConfigInput): ServerConfig => {
	const result = validateServerConfig(input);
	if (!result.success) {
		throw new Error(result.errors.join('; '));
	}
	return result.data;
};

describe('resolveSseUrl', () => {
	it('appends the suffix to a bare host', () => {
		expect(resolveSseUrl('http://localhost:9001', '/sse').toString()).toBe('http://localhost:9001/sse');
		expect(resolveSseUrl('http://localhost:9001/', 'events').toString()).toBe('http://localhost:9001/events');
	});

	it('keeps an explicit path', () => {
		expect(resolveSseUrl('https://mcp.example.com/v1/stream?key=test-secret', '/sse').toString()).toBe(
			'https://mcp.example.com/v1/stream?key=test-secret'
		);
	});
});

describe('MCPConnectionFactory', () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it('builds the transport that matches the config', () => {
		const factory = new MCPConnectionFactory(properties, silentLogger);

		expect(
			factory.createTransport(parse({ name: 'files', transport: 'stdio', command: 'mcp-files' }))
		).toBeInstanceOf(StdioClientTransport);
		expect(
			factory.createTransport(parse({ name: 'events', transport: 'sse', url: 'http://localhost:9001' }))
		).toBeInstanceOf(SSEClientTransport);
		expect(
			factory.createTransport(
				parse({ name: 'search', transport: 'streamable-http', url: 'http://localhost:9002/mcp' })
			)
		).toBeInstanceOf(StreamableHTTPClientTransport);
	});

	it('gives up after maxRetries failed handshakes', async () => {
		const connect = vi.spyOn(Client.prototype, 'connect').mockRejectedValue(new Error('spawn ENOENT'));
		const factory = new MCPConnectionFactory(properties, silentLogger);

		const error = await factory
			.createConnection(parse({ name: 'files', transport: 'stdio', command: 'mcp-files' }))
			.catch((e: unknown) => e);

		expect(error).toBeInstanceOf(ConnectionFailureError);
		if (error instanceof ConnectionFailureError) {
			expect(error.message).toBe('Failed to connect to MCP server files after 3 attempt(s)');
			expect(error.attempt).toBe(3);
			expect(error.serverName).toBe('files');
			expect(error.cause).toBeInstanceOf(Error);
		}
		expect(connect).toHaveBeenCalledTimes(3);
	});

	it('still makes one attempt when maxRetries is zero', async () => {
		const connect = vi.spyOn(Client.prototype, 'connect').mockRejectedValue(new Error('refused'));
		const factory = new MCPConnectionFactory({ ...properties, maxRetries: 0 }, silentLogger);

		await expect(
			factory.createConnection(parse({ name: 'files', transport: 'stdio', command: 'mcp-files' }))
		).rejects.toBeInstanceOf(ConnectionFailureError);
		expect(connect).toHaveBeenCalledTimes(1);
	});

	it('returns an open handle once the handshake succeeds', async () => {
		vi.spyOn(Client.prototype, 'connect')
			.mockRejectedValueOnce(new Error('not ready'))
			.mockResolvedValueOnce(undefined);
		const factory = new MCPConnectionFactory(properties, silentLogger);

		const handle = await factory.createConnection(
			parse({ name: 'events', transport: 'sse', url: 'http://localhost:9001' })
		);

		expect(handle).toBeInstanceOf(MCPServiceHandle);
		expect(handle.serverName).toBe('events');
		expect(handle.isOpen()).toBe(true);
	});
});

describe('MCPServiceHandle', () => {
	const connectPair = async () => {
		const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
		const server = new McpServer({ name: 'test-server', version: '1.0.0' });
		server.tool('echo', 'Echo the message back', { message: z.string() }, async ({ message }) => ({
			content: [{ type: 'text', text: `echo: ${message}` }],
		}));
		await server.connect(serverTransport);

		const client = new Client({ name: 'test-client', version: '1.0.0' });
		await client.connect(clientTransport);

		const handle = new MCPServiceHandle('alpha', client, clientTransport, 1000, silentLogger);
		return { handle, server };
	};

	it('lists and calls tools over the session', async () => {
		const { handle, server } = await connectPair();

		const tools = await handle.listTools();
		const result = await handle.callTool('echo', { message: 'hi' });

		expect(tools.map(tool => tool.name)).toEqual(['echo']);
		expect(tools[0].description).toBe('Echo the message back');
		expect(result.content).toEqual([{ type: 'text', text: 'echo: hi' }]);
		await server.close();
	});

	it('reports closed after a graceful close', async () => {
		const { handle, server } = await connectPair();

		await handle.closeGracefully();

		expect(handle.isOpen()).toBe(false);
		await server.close();
	});

	it('reports closed after a forced close', async () => {
		const { handle } = await connectPair();

		await handle.close();

		expect(handle.isOpen()).toBe(false);
	});

	it('notices when the server goes away', async () => {
		const { handle, server } = await connectPair();
		expect(handle.isOpen()).toBe(true);

		await server.close();

		expect(handle.isOpen()).toBe(false);
	});
});
