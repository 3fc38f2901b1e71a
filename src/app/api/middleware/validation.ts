import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { body, param, validationResult, type ValidationChain } from 'express-validator';
import { errorResponse, ERROR_CODES } from '../utils/response.js';

// Same alphabet the config store accepts for server names
const SERVER_NAME_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export interface FieldProblem {
	field: string;
	location: string;
	message: string;
}

function collectProblems(req: Request): FieldProblem[] {
	return validationResult(req)
		.array({ onlyFirstError: true })
		.map(issue =>
			issue.type === 'field'
				? { field: issue.path, location: issue.location, message: String(issue.msg) }
				: { field: '', location: 'request', message: String(issue.msg) }
		);
}

/**
 * Run the chains, then answer 400 with one problem per field if any failed.
 */
function validate(...chains: ValidationChain[]): RequestHandler {
	return async (req: Request, res: Response, next: NextFunction) => {
		try {
			for (const chain of chains) {
				await chain.run(req);
			}
		} catch (error) {
			next(error);
			return;
		}

		const problems = collectProblems(req);
		if (problems.length > 0) {
			errorResponse(res, ERROR_CODES.VALIDATION_ERROR, 'Validation failed', 400, problems, req.requestId);
			return;
		}
		next();
	};
}

const serverNameInPath = () =>
	param('serverName')
		.matches(SERVER_NAME_PATTERN)
		.withMessage('Server name may only contain letters, digits, ".", "_" and "-"');

export const validateServerNameParam = validate(serverNameInPath());

export const validateInvalidateRequest = validate(
	body('serverName')
		.optional()
		.isString()
		.withMessage('serverName must be a string')
		.bail()
		.matches(SERVER_NAME_PATTERN)
		.withMessage('serverName must be a valid server name')
);

export const validateToolCall = validate(
	serverNameInPath(),
	param('toolName').isLength({ min: 1, max: 256 }).withMessage('Tool name must be between 1 and 256 characters'),
	body('arguments').optional().isObject({ strict: true }).withMessage('arguments must be a JSON object')
);
