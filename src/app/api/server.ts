import express, { type Application, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import http from 'http';
import { logger } from '../../core/logger/index.js';
import { CONNECTION_STATES, type ConnectionState, type ToolProvidingHandle } from '../../core/mcp/index.js';
import { errorResponse, successResponse, ERROR_CODES } from './utils/response.js';
import { requestIdMiddleware, requestLoggingMiddleware, errorLoggingMiddleware } from './middleware/logging.js';
import { createMcpRoutes, type McpRouteDependencies } from './routes/mcp.js';

export interface ApiServerConfig {
	port: number;
	host?: string;
	/** Browser origins allowed by CORS; requests without an Origin are always let through */
	corsOrigins?: string[];
	rateLimitWindowMs?: number;
	rateLimitMaxRequests?: number;
	/** Mount point of the MCP routes; '' mounts them at the root */
	apiPrefix?: string;
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000'];
const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000;
const DEFAULT_RATE_LIMIT_MAX = 100;

export function normalizeApiPrefix(prefix: string | undefined): string {
	if (prefix === undefined) {
		return '/api';
	}
	const trimmed = prefix.replace(/\/+$/, '');
	if (trimmed === '') {
		return '';
	}
	return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Build the Express application: security headers, CORS, a rate limit on the
 * API routes, request ids and logging, the liveness probe and the MCP routes.
 */
export function createApiApp<H extends ToolProvidingHandle>(
	deps: McpRouteDependencies<H>,
	config: Omit<ApiServerConfig, 'port' | 'host'> = {}
): Application {
	const app = express();
	const apiPrefix = normalizeApiPrefix(config.apiPrefix);
	const allowedOrigins = config.corsOrigins ?? DEFAULT_CORS_ORIGINS;

	app.use(helmet({ contentSecurityPolicy: false, crossOriginEmbedderPolicy: false }));
	app.use(
		cors({
			origin: (origin, callback) => {
				if (!origin || allowedOrigins.includes(origin)) {
					callback(null, true);
				} else {
					callback(new Error('Not allowed by CORS'));
				}
			},
			methods: ['GET', 'POST', 'OPTIONS'],
			allowedHeaders: ['Content-Type', 'X-Request-ID'],
			exposedHeaders: ['X-Request-ID'],
		})
	);
	app.use(requestIdMiddleware);
	app.use(requestLoggingMiddleware);

	const limiter = rateLimit({
		windowMs: config.rateLimitWindowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS,
		limit: config.rateLimitMaxRequests ?? DEFAULT_RATE_LIMIT_MAX,
		standardHeaders: true,
		legacyHeaders: false,
		handler: (req, res) => {
			errorResponse(
				res,
				ERROR_CODES.RATE_LIMIT_EXCEEDED,
				'Too many requests, please try again later.',
				429,
				undefined,
				req.requestId
			);
		},
	});
	const mcpMount = `${apiPrefix}/mcp`;
	app.use(mcpMount, limiter, express.json({ limit: '1mb' }), createMcpRoutes(deps));

	app.get('/health', (req: Request, res: Response) => {
		const byState: Record<ConnectionState, number> = {
			[CONNECTION_STATES.CONNECTED]: 0,
			[CONNECTION_STATES.CLOSING]: 0,
			[CONNECTION_STATES.CLOSED]: 0,
			[CONNECTION_STATES.RECONNECTING]: 0,
		};
		for (const stats of deps.manager.getConnectionStats().values()) {
			byState[stats.state] += 1;
		}
		const total = Object.values(byState).reduce((sum, count) => sum + count, 0);

		successResponse(
			res,
			{
				status: deps.manager.isShutdown() ? 'shutting_down' : 'healthy',
				uptime: process.uptime(),
				connections: { total, connected: byState.CONNECTED, byState },
			},
			deps.manager.isShutdown() ? 503 : 200,
			req.requestId
		);
	});

	app.use((req: Request, res: Response) => {
		errorResponse(
			res,
			ERROR_CODES.NOT_FOUND,
			`Route ${req.method} ${req.originalUrl} not found`,
			404,
			undefined,
			req.requestId
		);
	});

	app.use(errorLoggingMiddleware);
	app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
		if (res.headersSent) {
			next(err);
			return;
		}

		// body-parser tags malformed or oversized bodies with a 4xx status
		const status: unknown = err instanceof Error ? Reflect.get(err, 'status') : undefined;
		const clientStatus = typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
		const message = err instanceof Error && err.message ? err.message : 'An unexpected error occurred';

		errorResponse(
			res,
			clientStatus ? ERROR_CODES.BAD_REQUEST : ERROR_CODES.INTERNAL_ERROR,
			message,
			clientStatus ?? 500,
			undefined,
			req.requestId
		);
	});

	return app;
}

/**
 * HTTP listener around the administration app
 */
export class ApiServer<H extends ToolProvidingHandle> {
	private readonly app: Application;
	private httpServer: http.Server | undefined;

	constructor(
		deps: McpRouteDependencies<H>,
		private readonly config: ApiServerConfig
	) {
		this.app = createApiApp(deps, config);
	}

	async start(): Promise<void> {
		const host = this.config.host ?? 'localhost';
		const server = http.createServer(this.app);

		await new Promise<void>((resolve, reject) => {
			server.once('error', reject);
			server.listen(this.config.port, host, () => {
				server.off('error', reject);
				resolve();
			});
		});

		this.httpServer = server;
		logger.info(`[API Server] Listening on ${host}:${this.config.port}`);
	}

	/**
	 * Stop accepting connections and drop idle keep-alive sockets.
	 */
	async stop(): Promise<void> {
		const server = this.httpServer;
		if (!server) {
			return;
		}
		this.httpServer = undefined;

		const closed = new Promise<void>((resolve, reject) => {
			server.close(err => (err ? reject(err) : resolve()));
		});
		server.closeIdleConnections();
		await closed;
		logger.info('[API Server] Stopped');
	}

	getApp(): Application {
		return this.app;
	}
}
