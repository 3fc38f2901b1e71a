import { config } from 'dotenv';
import { z } from 'zod';

// Values already present in the process environment win over the .env file, so an
// embedding host (or an MCP launcher passing "env") keeps control.
config({ override: false });

const flag = (fallback: boolean) =>
	z
		.enum(['true', 'false'])
		.default(fallback ? 'true' : 'false')
		.transform(value => value === 'true');

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	MCP_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silly']).default('info'),
	MCP_LOG_FILE: z.string().optional(),
	REDACT_SECRETS: flag(true),
	// Connection cache
	MCP_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
	MCP_TIMEOUT_MS: millis(60000),
	MCP_INITIALIZATION_TIMEOUT_MS: millis(120000),
	MCP_RETRY_WAIT_MULTIPLIER: z.coerce.number().nonnegative().default(1),
	MCP_SSE_PATH_SUFFIX: z.string().default('/sse'),
	MCP_USER_AGENT: z.string().default('MCP-Client/1.0.0'),
	MCP_REQUEST_RETRY_COUNT: z.coerce.number().int().nonnegative().default(3),
	MCP_CONNECTION_REBUILD_DELAY_MS: millis(100),
	MCP_HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
	MCP_MAX_PENDING_REQUESTS: z.coerce.number().int().positive().default(100),
	MCP_GRACEFUL_CLOSE_TIMEOUT_MS: millis(5000),
	MCP_CLOSE_SETTLE_MS: millis(200),
	MCP_FORCED_CLOSE_SETTLE_MS: millis(100),
	MCP_SHUTDOWN_TIMEOUT_MS: millis(5000),
	MCP_HEALTH_CHECK_POOL_SIZE: z.coerce.number().int().positive().default(2),
	// Config store
	MCP_CONFIG_STORE: z.enum(['sqlite', 'in-memory']).default('sqlite'),
	MCP_CONFIG_DB_PATH: z.string().default('./data/mcp-config.db'),
	// Admin API
	API_PORT: z.coerce.number().int().positive().default(3001),
	API_HOST: z.string().default('localhost'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate an environment map. Throws a ZodError listing every invalid
 * variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
	return envSchema.parse(source);
}

export const env: Env = parseEnv();
