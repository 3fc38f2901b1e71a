import { Router, type Request, type Response } from 'express';
import {
	ConnectionErrorUtils,
	type MCPCacheManager,
	type MCPToolDispatcher,
	type ToolProvidingHandle,
} from '../../../core/mcp/index.js';
import { logger } from '../../../core/logger/index.js';
import { describeMcpFailure, errorResponse, successResponse, ERROR_CODES } from '../utils/response.js';
import {
	validateInvalidateRequest,
	validateServerNameParam,
	validateToolCall,
} from '../middleware/validation.js';

export interface McpRouteDependencies<H extends ToolProvidingHandle> {
	manager: MCPCacheManager<H>;
	dispatcher: MCPToolDispatcher<H>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

export function createMcpRoutes<H extends ToolProvidingHandle>({
	manager,
	dispatcher,
}: McpRouteDependencies<H>): Router {
	const router = Router();

	/**
	 * GET /api/mcp/connections
	 * State, pending requests and handle presence per registered server
	 */
	router.get('/connections', (req: Request, res: Response) => {
		const connections = Array.from(manager.getConnectionStats(), ([serverName, stats]) => ({
			serverName,
			...stats,
		}));
		successResponse(
			res,
			{ connections, configuredServers: manager.getConfiguredServers() },
			200,
			req.requestId
		);
	});

	/**
	 * GET /api/mcp/connections/:serverName/health
	 */
	router.get('/connections/:serverName/health', validateServerNameParam, (req: Request, res: Response) => {
		const { serverName } = req.params;
		successResponse(
			res,
			{ serverName, healthy: manager.checkConnectionHealth(serverName) },
			200,
			req.requestId
		);
	});

	/**
	 * POST /api/mcp/cache/invalidate
	 * Rebuild one server's connection, or all of them without a serverName
	 */
	router.post('/cache/invalidate', validateInvalidateRequest, (req: Request, res: Response) => {
		const serverName: unknown = isRecord(req.body) ? req.body.serverName : undefined;
		const target = typeof serverName === 'string' ? serverName : undefined;

		logger.info('Invalidating MCP connection cache', { requestId: req.requestId, serverName: target });
		const invalidated = manager.invalidateCache(target);
		successResponse(res, { invalidated, serverName: target ?? null }, 200, req.requestId);
	});

	/**
	 * POST /api/mcp/cache/reload
	 * Reload configurations from the store and rebuild every connection
	 */
	router.post('/cache/reload', async (req: Request, res: Response) => {
		try {
			await manager.invalidateAllCache();
			successResponse(
				res,
				{ reloaded: true, configuredServers: manager.getConfiguredServers() },
				200,
				req.requestId
			);
		} catch (error) {
			logger.error('Failed to reload MCP configuration', {
				requestId: req.requestId,
				error: ConnectionErrorUtils.describe(error),
			});
			errorResponse(res, ERROR_CODES.INTERNAL_ERROR, ConnectionErrorUtils.describe(error), 500, undefined, req.requestId);
		}
	});

	/**
	 * GET /api/mcp/tools
	 * Tools of every server that is connected right now
	 */
	router.get('/tools', async (req: Request, res: Response) => {
		try {
			const tools = await dispatcher.listTools(req.requestId);
			successResponse(res, { tools, count: tools.length }, 200, req.requestId);
		} catch (error) {
			errorResponse(res, ERROR_CODES.INTERNAL_ERROR, ConnectionErrorUtils.describe(error), 500, undefined, req.requestId);
		}
	});

	/**
	 * POST /api/mcp/tools/:serverName/:toolName
	 * Body: { arguments?: object }
	 */
	router.post('/tools/:serverName/:toolName', validateToolCall, async (req: Request, res: Response) => {
		const { serverName, toolName } = req.params;
		const rawArgs: unknown = isRecord(req.body) ? req.body.arguments : undefined;
		const args = isRecord(rawArgs) ? rawArgs : {};

		try {
			logger.info('Executing MCP tool', { requestId: req.requestId, serverName, toolName });
			const result = await dispatcher.callTool(serverName, toolName, args);
			successResponse(res, { serverName, toolName, result }, 200, req.requestId);
		} catch (error) {
			logger.error('MCP tool execution failed', {
				requestId: req.requestId,
				serverName,
				toolName,
				error: ConnectionErrorUtils.describe(error),
			});
			const failure = describeMcpFailure(error);
			errorResponse(res, failure.code, failure.message, failure.statusCode, failure.details, req.requestId);
		}
	});

	return router;
}
