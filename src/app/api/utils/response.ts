import type { Response } from 'express';
import {
	ConfigurationError,
	ConnectionErrorUtils,
	MCPConnectionError,
} from '../../../core/mcp/index.js';

export const ERROR_CODES = {
	VALIDATION_ERROR: 'VALIDATION_ERROR',
	NOT_FOUND: 'NOT_FOUND',
	INTERNAL_ERROR: 'INTERNAL_ERROR',
	BAD_REQUEST: 'BAD_REQUEST',
	SERVER_NOT_FOUND: 'SERVER_NOT_FOUND',
	MCP_SERVER_ERROR: 'MCP_SERVER_ERROR',
	MCP_UNAVAILABLE: 'MCP_UNAVAILABLE',
	RATE_LIMIT_EXCEEDED: 'RATE_LIMIT_EXCEEDED',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

interface ResponseMeta {
	timestamp: string;
	requestId?: string;
}

export interface ApiError {
	code: ErrorCode;
	message: string;
	details?: unknown;
}

/**
 * Envelope shared by every endpoint
 */
export type ApiResponse<T = unknown> =
	| { success: true; data: T; meta: ResponseMeta }
	| { success: false; error: ApiError; meta: ResponseMeta };

const buildMeta = (requestId?: string): ResponseMeta => ({
	timestamp: new Date().toISOString(),
	...(requestId && { requestId }),
});

/**
 * Cache errors go out through their own toJSON; any other Error is cut down to
 * name and message.
 */
const toDetails = (details: unknown): unknown => {
	if (details instanceof MCPConnectionError) {
		return details.toJSON();
	}
	if (details instanceof Error) {
		return { name: details.name, message: details.message };
	}
	return details;
};

export function successResponse<T>(res: Response, data: T, statusCode = 200, requestId?: string): void {
	const body: ApiResponse<T> = { success: true, data, meta: buildMeta(requestId) };
	res.status(statusCode).json(body);
}

export function errorResponse(
	res: Response,
	code: ErrorCode,
	message: string,
	statusCode = 500,
	details?: unknown,
	requestId?: string
): void {
	const error: ApiError = { code, message };
	if (details !== undefined) {
		error.details = toDetails(details);
	}
	const body: ApiResponse<never> = { success: false, error, meta: buildMeta(requestId) };
	res.status(statusCode).json(body);
}

export interface MCPFailure {
	statusCode: number;
	code: ErrorCode;
	message: string;
	details?: unknown;
}

/**
 * Map a failure from the cache or the dispatcher onto HTTP: a server without
 * configuration is 404, an unusable connection 503, anything the MCP server
 * itself reported 500.
 */
export function describeMcpFailure(error: unknown): MCPFailure {
	const message = ConnectionErrorUtils.describe(error);
	if (error instanceof ConfigurationError) {
		return { statusCode: 404, code: ERROR_CODES.SERVER_NOT_FOUND, message };
	}
	if (error instanceof MCPConnectionError) {
		return error.recoverable
			? { statusCode: 503, code: ERROR_CODES.MCP_UNAVAILABLE, message, details: error }
			: { statusCode: 500, code: ERROR_CODES.MCP_SERVER_ERROR, message, details: error };
	}
	return { statusCode: 500, code: ERROR_CODES.MCP_SERVER_ERROR, message };
}
