import type { McpProperties } from '../config.js';
import type { Logger } from '../../logger/index.js';
import { InMemoryConfigRepository } from './in-memory.js';
import { SqliteConfigRepository } from './sqlite.js';

/**
 * Open the configuration store selected by `configStore`
 */
export async function createConfigRepository(
	properties: Pick<McpProperties, 'configStore' | 'configDbPath'>,
	logger?: Logger
): Promise<InMemoryConfigRepository | SqliteConfigRepository> {
	if (properties.configStore === 'in-memory') {
		return new InMemoryConfigRepository();
	}

	const repository = new SqliteConfigRepository({ path: properties.configDbPath, logger });
	await repository.connect();
	return repository;
}
