import { validateServerConfig, type ServerConfig, type ServerConfigInput } from '../config.js';
import { ConfigurationError } from '../errors/index.js';
import type { ConfigRepository } from '../types.js';

/**
 * Process-local configuration store, for embedding hosts and tests
 */
export class InMemoryConfigRepository implements ConfigRepository {
	private readonly configs = new Map<string, ServerConfig>();

	constructor(initial: ServerConfigInput[] = []) {
		for (const config of initial) {
			this.upsert(config);
		}
	}

	/**
	 * Validate and store a configuration, replacing any with the same name.
	 *
	 * @throws ConfigurationError when the input is not a valid server configuration
	 */
	upsert(input: ServerConfigInput): ServerConfig {
		const result = validateServerConfig(input);
		if (!result.success) {
			throw new ConfigurationError(
				`Invalid server configuration: ${result.errors.join('; ')}`,
				input.name
			);
		}
		this.configs.set(result.data.name, result.data);
		return result.data;
	}

	setEnabled(serverName: string, enabled: boolean): boolean {
		const existing = this.configs.get(serverName);
		if (!existing) {
			return false;
		}
		this.configs.set(serverName, { ...existing, enabled });
		return true;
	}

	remove(serverName: string): boolean {
		return this.configs.delete(serverName);
	}

	async findEnabledConfigs(): Promise<ServerConfig[]> {
		return Array.from(this.configs.values()).filter(config => config.enabled);
	}

	async findAllConfigs(): Promise<ServerConfig[]> {
		return Array.from(this.configs.values());
	}

	async close(): Promise<void> {
		this.configs.clear();
	}
}
