/**
 * Wiring for a running MCP connection cache: configuration store, connection
 * factory, cache manager and tool dispatcher built from one set of properties.
 */

import type { McpProperties } from './config.js';
import { MCPConnectionFactory } from './connection/connection-factory.js';
import type { MCPServiceHandle } from './connection/service-handle.js';
import { MCPToolDispatcher } from './dispatch/tool-dispatcher.js';
import { MCPCacheManager } from './manager/cache-manager.js';
import { createConfigRepository } from './repository/factory.js';
import type { InMemoryConfigRepository, SqliteConfigRepository } from './repository/index.js';
import type { ShutdownReport } from './types.js';
import { logger as defaultLogger, type Logger } from '../logger/index.js';

export interface MCPService {
	manager: MCPCacheManager<MCPServiceHandle>;
	dispatcher: MCPToolDispatcher<MCPServiceHandle>;
	repository: InMemoryConfigRepository | SqliteConfigRepository;
	/** Shut the manager down, then close the configuration store */
	close(): Promise<ShutdownReport>;
}

export async function createMcpService(properties: McpProperties, logger: Logger = defaultLogger): Promise<MCPService> {
	const repository = await createConfigRepository(properties, logger);
	const manager = new MCPCacheManager<MCPServiceHandle>({
		connectionFactory: new MCPConnectionFactory(properties, logger),
		configRepository: repository,
		properties,
		logger,
	});
	await manager.initialize();

	return {
		manager,
		dispatcher: new MCPToolDispatcher(manager, { logger }),
		repository,
		async close() {
			const report = await manager.shutdown();
			await repository.close();
			return report;
		},
	};
}
