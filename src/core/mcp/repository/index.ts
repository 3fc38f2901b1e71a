export { InMemoryConfigRepository } from './in-memory.js';
export {
	SqliteConfigRepository,
	type SqliteConfigRepositoryOptions,
	type ConfigStatus,
} from './sqlite.js';
export { createConfigRepository } from './factory.js';
