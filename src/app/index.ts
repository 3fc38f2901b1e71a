#!/usr/bin/env node

import { Command } from 'commander';
import { env } from '../core/env.js';
import { logger } from '../core/logger/index.js';
import { createMcpService, loadMcpProperties, resolveMcpProperties } from '../core/mcp/index.js';
import { ApiServer } from './api/server.js';

interface CliOptions {
	port: string;
	host: string;
	apiPrefix: string;
	store?: string;
	dbPath?: string;
	logLevel?: string;
}

const parseStore = (value: string | undefined): 'sqlite' | 'in-memory' | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (value === 'sqlite' || value === 'in-memory') {
		return value;
	}
	throw new Error(`Unknown config store '${value}', expected sqlite or in-memory`);
};

const program = new Command();

program
	.name('mcp-conn-cache')
	.description('Fail-fast MCP connection cache with an HTTP administration API')
	.version(process.env.npm_package_version ?? '0.1.0', '-v, --version', 'output the current version')
	.option('--port <port>', 'Port for the API server', String(env.API_PORT))
	.option('--host <host>', 'Host for the API server', env.API_HOST)
	.option('--api-prefix <prefix>', 'API prefix for routes (use empty string to disable)', '/api')
	.option('--store <store>', 'Configuration store: sqlite | in-memory')
	.option('--db-path <path>', 'SQLite configuration database path')
	.option('--log-level <level>', 'Log level: error | warn | info | debug | silly')
	.action(async (opts: CliOptions) => {
		if (opts.logLevel) {
			logger.setLevel(opts.logLevel);
		}

		const port = Number.parseInt(opts.port, 10);
		if (!Number.isInteger(port) || port <= 0 || port > 65535) {
			logger.error(`Invalid port: ${opts.port}`);
			process.exit(1);
		}

		const properties = resolveMcpProperties({
			...loadMcpProperties(env),
			...(opts.store !== undefined && { configStore: parseStore(opts.store) }),
			...(opts.dbPath !== undefined && { configDbPath: opts.dbPath }),
		});

		const service = await createMcpService(properties, logger);
		const server = new ApiServer(
			{ manager: service.manager, dispatcher: service.dispatcher },
			{ port, host: opts.host, apiPrefix: opts.apiPrefix }
		);
		await server.start();

		let shuttingDown = false;
		const handleShutdown = async (signal: string): Promise<void> => {
			if (shuttingDown) {
				return;
			}
			shuttingDown = true;
			logger.info(`${signal} received, shutting down`);
			try {
				await server.stop();
				const report = await service.close();
				logger.info('MCP connection cache stopped', {
					closedCount: report.closedCount,
					failedCount: report.failedCount,
				});
				process.exit(0);
			} catch (error) {
				logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
				process.exit(1);
			}
		};

		process.on('SIGINT', () => void handleShutdown('SIGINT'));
		process.on('SIGTERM', () => void handleShutdown('SIGTERM'));
	});

program.parseAsync(process.argv).catch((error: unknown) => {
	logger.error(`Startup failed: ${error instanceof Error ? error.message : String(error)}`);
	process.exit(1);
});
