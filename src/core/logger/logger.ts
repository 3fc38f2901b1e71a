import winston from 'winston';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { env } from '../env.js';

const LOG_LEVELS = {
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
	silly: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
	/** Write plain lines to this file instead of the coloured stderr stream */
	file?: string;
	/** Prefix for every line, e.g. the component name */
	scope?: string;
}

const isLogLevel = (level: string): level is LogLevel => Object.hasOwn(LOG_LEVELS, level);

// ===== Redaction =====

const REDACTED = '[REDACTED]';

// Server configs carry env maps and headers for the spawned MCP servers
const SENSITIVE_KEY = /api[-_]?key|password|passwd|secret|token|authorization|credential/i;
const INLINE_SECRET =
	/\b(api[-_]?key|password|passwd|secret|token|authorization)(\s*[:=]\s*)(["']?)((?:Bearer\s+)?[^\s"',;]+)\3/gi;
const MAX_REDACT_DEPTH = 4;

/**
 * Mask `key=value` and `key: "value"` pairs whose key looks like a credential.
 * Returns the message untouched when REDACT_SECRETS is off.
 */
export const redactSensitiveData = (message: string): string => {
	if (!env.REDACT_SECRETS) return message;
	return message.replace(
		INLINE_SECRET,
		(_match, key: string, separator: string, quote: string) => `${key}${separator}${quote}${REDACTED}${quote}`
	);
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype;

function redactValue(key: string, value: unknown, depth: number): unknown {
	if (SENSITIVE_KEY.test(key) && value !== undefined && value !== null) {
		return REDACTED;
	}
	if (typeof value === 'string') {
		return redactSensitiveData(value);
	}
	if (depth >= MAX_REDACT_DEPTH) {
		return value;
	}
	if (Array.isArray(value)) {
		return value.map(item => redactValue('', item, depth + 1));
	}
	if (isPlainObject(value)) {
		return Object.fromEntries(
			Object.entries(value).map(([childKey, child]) => [childKey, redactValue(childKey, child, depth + 1)])
		);
	}
	return value;
}

/**
 * Copy of `meta` with credential-looking fields masked, nested objects included.
 */
export const redactMeta = (meta: LogMeta): LogMeta => {
	if (!env.REDACT_SECRETS) return meta;
	return Object.fromEntries(Object.entries(meta).map(([key, value]) => [key, redactValue(key, value, 0)]));
};

const RESERVED_FIELDS = new Set(['level', 'message', 'timestamp', 'scope']);

const redactFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	for (const key of Object.keys(info)) {
		if (!RESERVED_FIELDS.has(key)) {
			info[key] = redactValue(key, info[key], 0);
		}
	}
	return info;
});

// ===== Line formats =====

const levelColor: Record<LogLevel, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.cyan,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

interface LogRecord {
	level: string;
	message: unknown;
	[key: string]: unknown;
}

function metaOf(info: LogRecord): string {
	const fields = Object.entries(info).filter(([key]) => !RESERVED_FIELDS.has(key));
	return fields.length > 0 ? JSON.stringify(Object.fromEntries(fields)) : '';
}

function scopeOf(info: LogRecord): string {
	return typeof info.scope === 'string' ? `[${info.scope}] ` : '';
}

const consoleLine = winston.format.printf(info => {
	const paint = isLogLevel(info.level) ? levelColor[info.level] : chalk.white;
	const meta = metaOf(info);
	return [
		chalk.dim(String(info.timestamp)),
		paint(info.level.toUpperCase().padEnd(5)),
		`${chalk.bold(scopeOf(info))}${String(info.message)}`,
		meta && chalk.dim(meta),
	]
		.filter(Boolean)
		.join(' ');
});

const fileLine = winston.format.printf(info => {
	const meta = metaOf(info);
	const line = `${String(info.timestamp)} ${info.level.toUpperCase()} ${scopeOf(info)}${String(info.message)}`;
	return meta ? `${line} ${meta}` : line;
});

function buildTransport(file: string | undefined): winston.transport {
	if (file) {
		fs.mkdirSync(path.dirname(file), { recursive: true });
		return new winston.transports.File({
			filename: file,
			format: winston.format.combine(winston.format.timestamp(), redactFormat(), fileLine),
		});
	}
	// stdout may belong to a stdio MCP transport, so every level goes to stderr
	return new winston.transports.Console({
		stderrLevels: Object.keys(LOG_LEVELS),
		format: winston.format.combine(winston.format.timestamp({ format: 'HH:mm:ss.SSS' }), redactFormat(), consoleLine),
	});
}

// ===== Logger =====

export class Logger {
	private readonly winstonLogger: winston.Logger;
	private readonly options: LoggerOptions;

	constructor(options: LoggerOptions = {}) {
		const requested = options.level?.toLowerCase();
		this.options = options;
		this.winstonLogger = winston.createLogger({
			levels: LOG_LEVELS,
			level: requested && isLogLevel(requested) ? requested : env.MCP_LOG_LEVEL,
			defaultMeta: options.scope ? { scope: options.scope } : undefined,
			transports: [buildTransport(options.file ?? env.MCP_LOG_FILE)],
			silent: options.silent ?? false,
		});
	}

	error(message: string, meta?: LogMeta): void {
		this.winstonLogger.log('error', message, meta);
	}

	warn(message: string, meta?: LogMeta): void {
		this.winstonLogger.log('warn', message, meta);
	}

	info(message: string, meta?: LogMeta): void {
		this.winstonLogger.log('info', message, meta);
	}

	debug(message: string, meta?: LogMeta): void {
		this.winstonLogger.log('debug', message, meta);
	}

	silly(message: string, meta?: LogMeta): void {
		this.winstonLogger.log('silly', message, meta);
	}

	/**
	 * Unknown level names are reported and ignored.
	 */
	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (!isLogLevel(normalized)) {
			this.warn(`Ignoring unknown log level "${level}"`, { validLevels: Object.keys(LOG_LEVELS) });
			return;
		}
		this.winstonLogger.level = normalized;
	}

	getLevel(): string {
		return this.winstonLogger.level;
	}

	setSilent(silent: boolean): void {
		this.winstonLogger.silent = silent;
	}

	isSilentMode(): boolean {
		return this.winstonLogger.silent;
	}

	/**
	 * A logger sharing this one's level, silence and destination, tagged with
	 * its own scope.
	 */
	createChild(scope: string, overrides: Omit<LoggerOptions, 'scope'> = {}): Logger {
		return new Logger({
			...this.options,
			level: this.getLevel(),
			silent: this.isSilentMode(),
			...overrides,
			scope: this.options.scope ? `${this.options.scope}:${scope}` : scope,
		});
	}
}

export const logger = new Logger({ silent: env.NODE_ENV === 'test' });

export const createLogger = (options: LoggerOptions = {}): Logger => new Logger(options);

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};
