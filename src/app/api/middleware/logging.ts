import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { logger } from '../../../core/logger/index.js';

declare global {
	namespace Express {
		interface Request {
			requestId: string;
			startTime: number;
		}
	}
}

const REQUEST_ID_HEADER = 'X-Request-ID';
const PROBE_PATHS = new Set(['/health']);

/**
 * Tag the request with an id and echo it back. A caller-supplied X-Request-ID is
 * kept when it is a UUID, so ids survive a hop through a proxy.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
	const incoming = req.get(REQUEST_ID_HEADER);
	req.requestId = incoming !== undefined && isUuid(incoming) ? incoming : uuidv4();
	req.startTime = Date.now();
	res.setHeader(REQUEST_ID_HEADER, req.requestId);
	next();
}

/**
 * One log line per finished request, leveled by outcome: 5xx error, 4xx warn,
 * liveness probes debug, everything else info.
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
	res.on('finish', () => {
		const { statusCode } = res;
		const line = `${req.method} ${req.originalUrl} ${statusCode}`;
		const meta = {
			requestId: req.requestId,
			durationMs: Date.now() - req.startTime,
			ip: req.ip,
			userAgent: req.get('user-agent') ?? 'unknown',
		};

		if (statusCode >= 500) {
			logger.error(line, meta);
		} else if (statusCode >= 400) {
			logger.warn(line, meta);
		} else if (PROBE_PATHS.has(req.path)) {
			logger.debug(line, meta);
		} else {
			logger.info(line, meta);
		}
	});
	next();
}

export function errorLoggingMiddleware(err: unknown, req: Request, _res: Response, next: NextFunction): void {
	logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, {
		requestId: req.requestId,
		error: err instanceof Error ? err.message : String(err),
		stack: err instanceof Error ? err.stack : undefined,
	});
	next(err);
}
