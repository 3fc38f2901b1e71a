/**
 * Tests for the MCP cache administration API
 * Runs the real Express app against a cache manager backed by in-process handles
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { ApiServer, createApiApp, normalizeApiPrefix } from '../server.js';
import { MCPCacheManager, MCPToolDispatcher, InMemoryConfigRepository } from '../../../core/mcp/index.js';
import {
	FakeHandle,
	createFakeFactory,
	silentLogger,
	stdioConfig,
} from '../../../core/mcp/__test__/fakes.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('MCP API Endpoints', () => {
	let fake: ReturnType<typeof createFakeFactory>;
	let manager: MCPCacheManager<FakeHandle>;
	let app: Application;

	const connect = async (serverName: string) => {
		manager.getConnection(serverName);
		await vi.waitFor(() => expect(manager.getConnectionStats().get(serverName)?.state).toBe('CONNECTED'));
	};

	beforeEach(async () => {
		fake = createFakeFactory();
		manager = new MCPCacheManager<FakeHandle>({
			connectionFactory: fake.factory,
			configRepository: new InMemoryConfigRepository([stdioConfig('alpha'), stdioConfig('beta')]),
			properties: {
				requestRetryCount: 1,
				connectionRebuildDelayMs: 0,
				healthCheckIntervalMs: 60000,
				closeSettleMs: 0,
				forcedCloseSettleMs: 0,
				shutdownTimeoutMs: 200,
			},
			logger: silentLogger,
		});
		await manager.initialize();
		const dispatcher = new MCPToolDispatcher(manager, { maxAttempts: 2, baseDelayMs: 1, logger: silentLogger });
		app = new ApiServer({ manager, dispatcher }, { port: 0 }).getApp();
	});

	afterEach(async () => {
		await manager.shutdown();
	});

	describe('GET /health', () => {
		it('reports status and connection counts with a request id', async () => {
			await connect('alpha');

			const response = await request(app).get('/health').expect(200);

			expect(response.headers['x-request-id']).toMatch(UUID_PATTERN);
			expect(response.body.meta.requestId).toBe(response.headers['x-request-id']);
			expect(response.body.success).toBe(true);
			expect(response.body.data.status).toBe('healthy');
			expect(response.body.data.connections).toEqual({
				total: 1,
				connected: 1,
				byState: { CONNECTED: 1, CLOSING: 0, CLOSED: 0, RECONNECTING: 0 },
			});
		});

		it('keeps a caller-supplied request id', async () => {
			const requestId = '3f2b8c1e-4d5a-4b6c-8d7e-9f0a1b2c3d4e';

			const response = await request(app).get('/health').set('X-Request-ID', requestId).expect(200);

			expect(response.headers['x-request-id']).toBe(requestId);
			expect(response.body.meta.requestId).toBe(requestId);
		});

		it('replaces a request id that is not a UUID', async () => {
			const response = await request(app).get('/health').set('X-Request-ID', 'not-a-uuid').expect(200);

			expect(response.headers['x-request-id']).toMatch(UUID_PATTERN);
			expect(response.headers['x-request-id']).not.toBe('not-a-uuid');
		});

		it('answers 503 once the manager is shut down', async () => {
			await manager.shutdown();

			const response = await request(app).get('/health').expect(503);

			expect(response.body.data.status).toBe('shutting_down');
		});
	});

	describe('GET /api/mcp/connections', () => {
		it('lists registered connections and configured servers', async () => {
			await connect('alpha');

			const response = await request(app).get('/api/mcp/connections').expect(200);

			expect(response.body.data).toEqual({
				connections: [{ serverName: 'alpha', state: 'CONNECTED', pendingRequests: 0, hasHandle: true }],
				configuredServers: ['alpha', 'beta'],
			});
		});

		it('reports per-server health', async () => {
			await connect('alpha');

			const healthy = await request(app).get('/api/mcp/connections/alpha/health').expect(200);
			const unknown = await request(app).get('/api/mcp/connections/gamma/health').expect(200);

			expect(healthy.body.data).toEqual({ serverName: 'alpha', healthy: true });
			expect(unknown.body.data).toEqual({ serverName: 'gamma', healthy: false });
		});

		it('rejects an invalid server name', async () => {
			const response = await request(app).get('/api/mcp/connections/bad%20name/health').expect(400);

			expect(response.body.error.code).toBe('VALIDATION_ERROR');
		});
	});

	describe('POST /api/mcp/cache/invalidate', () => {
		it('invalidates a single server', async () => {
			await connect('alpha');

			const response = await request(app)
				.post('/api/mcp/cache/invalidate')
				.send({ serverName: 'alpha' })
				.expect(200);

			expect(response.body.data).toEqual({ invalidated: 1, serverName: 'alpha' });
			expect(manager.getConnectionStats().get('alpha')?.state).toBe('RECONNECTING');
		});

		it('invalidates everything without a server name', async () => {
			await connect('alpha');
			await connect('beta');

			const response = await request(app).post('/api/mcp/cache/invalidate').send({}).expect(200);

			expect(response.body.data).toEqual({ invalidated: 2, serverName: null });
		});

		it('rejects a non-string server name', async () => {
			const response = await request(app)
				.post('/api/mcp/cache/invalidate')
				.send({ serverName: 42 })
				.expect(400);

			expect(response.body.error.code).toBe('VALIDATION_ERROR');
		});
	});

	describe('POST /api/mcp/cache/reload', () => {
		it('reloads configurations', async () => {
			const response = await request(app).post('/api/mcp/cache/reload').expect(200);

			expect(response.body.data).toEqual({ reloaded: true, configuredServers: ['alpha', 'beta'] });
		});
	});

	describe('GET /api/mcp/tools', () => {
		it('lists tools of connected servers', async () => {
			await connect('alpha');

			const response = await request(app).get('/api/mcp/tools').expect(200);

			expect(response.body.data).toEqual({
				tools: [{ serverName: 'alpha', name: 'echo', inputSchema: { type: 'object' } }],
				count: 1,
			});
		});
	});

	describe('POST /api/mcp/tools/:serverName/:toolName', () => {
		it('calls the tool and returns its result', async () => {
			await connect('alpha');

			const response = await request(app)
				.post('/api/mcp/tools/alpha/echo')
				.send({ arguments: { message: 'hi' } })
				.expect(200);

			expect(response.body.data).toEqual({
				serverName: 'alpha',
				toolName: 'echo',
				result: { content: [{ type: 'text', text: 'alpha:echo:{"message":"hi"}' }] },
			});
		});

		it('returns 404 for a server without configuration', async () => {
			const response = await request(app).post('/api/mcp/tools/gamma/echo').send({}).expect(404);

			expect(response.body.error.code).toBe('SERVER_NOT_FOUND');
			expect(response.body.error.message).toBe('MCP server configuration not found: gamma');
		});

		it('returns 500 when the tool itself fails', async () => {
			await connect('alpha');
			fake.handles[0].callTool.mockRejectedValueOnce(new Error('unknown tool: nope'));

			const response = await request(app).post('/api/mcp/tools/alpha/nope').send({}).expect(500);

			expect(response.body.error.code).toBe('MCP_SERVER_ERROR');
			expect(response.body.error.details).toMatchObject({ connectionRelated: false, attempts: 1 });
		});

		it('returns 503 while the server cannot be reached', async () => {
			fake.createConnection.mockResolvedValue(null);

			const response = await request(app).post('/api/mcp/tools/beta/echo').send({}).expect(503);

			expect(response.body.error.code).toBe('MCP_UNAVAILABLE');
			expect(response.body.error.message).toBe('Failed to execute after 2 attempts for server: beta');
			expect(response.body.error.details).toMatchObject({ connectionRelated: true, serverName: 'beta' });
		});

		it('rejects arguments that are not an object', async () => {
			const response = await request(app)
				.post('/api/mcp/tools/alpha/echo')
				.send({ arguments: 'hi' })
				.expect(400);

			expect(response.body.error.code).toBe('VALIDATION_ERROR');
		});
	});

	describe('error handling', () => {
		it('returns 404 for unknown routes', async () => {
			const response = await request(app).get('/api/unknown').expect(404);

			expect(response.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /api/unknown not found' });
		});

		it('returns 400 for a malformed JSON body', async () => {
			const response = await request(app)
				.post('/api/mcp/cache/invalidate')
				.set('Content-Type', 'application/json')
				.send('{"serverName":')
				.expect(400);

			expect(response.body.error.code).toBe('BAD_REQUEST');
		});
	});
});

describe('normalizeApiPrefix', () => {
	it('defaults to /api and tidies custom prefixes', () => {
		expect(normalizeApiPrefix(undefined)).toBe('/api');
		expect(normalizeApiPrefix('v2/')).toBe('/v2');
		expect(normalizeApiPrefix('/admin')).toBe('/admin');
		expect(normalizeApiPrefix('/')).toBe('');
	});

	it('mounts the MCP routes under the chosen prefix', async () => {
		const manager = new MCPCacheManager<FakeHandle>({
			connectionFactory: createFakeFactory().factory,
			configRepository: new InMemoryConfigRepository([stdioConfig('alpha')]),
			properties: { healthCheckIntervalMs: 60000, shutdownTimeoutMs: 200 },
			logger: silentLogger,
		});
		await manager.initialize();
		const dispatcher = new MCPToolDispatcher(manager, { maxAttempts: 1, logger: silentLogger });
		const app = createApiApp({ manager, dispatcher }, { apiPrefix: 'admin' });

		try {
			const response = await request(app).get('/admin/mcp/connections').expect(200);
			expect(response.body.data.configuredServers).toEqual(['alpha']);
			await request(app).get('/api/mcp/connections').expect(404);
		} finally {
			await manager.shutdown();
		}
	});
});
