import type { ServerConfig } from '../config.js';
import { LOG_PREFIXES } from '../constants.js';
import type { ConfigRepository } from '../types.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';

/**
 * In-memory view of the enabled server configurations, keyed by server name.
 * Entries are replaced wholesale on reload and never mutated in place.
 */
export class ServerConfigCache {
	private configs = new Map<string, ServerConfig>();
	private readonly logger: Logger;

	constructor(
		private readonly repository: ConfigRepository,
		logger?: Logger
	) {
		this.logger = logger ?? defaultLogger;
	}

	/**
	 * Load every enabled config. A repository failure is logged and leaves the
	 * cache empty; it never fails startup.
	 *
	 * @returns Number of configs loaded
	 */
	async initialize(): Promise<number> {
		this.logger.info(`${LOG_PREFIXES.CONFIG} Loading MCP server configurations`);
		try {
			const configs = await this.repository.findEnabledConfigs();
			this.replaceAll(configs);
			this.logger.info(`${LOG_PREFIXES.CONFIG} Loaded ${configs.length} MCP server configurations`);
			return configs.length;
		} catch (error) {
			this.logger.error(
				`${LOG_PREFIXES.CONFIG} Failed to initialize configuration cache: ${error instanceof Error ? error.message : String(error)}`
			);
			return 0;
		}
	}

	/**
	 * Fetch the configs again and swap them in. On a repository failure the previous
	 * entries stay in place.
	 *
	 * @returns True if the cache was repopulated
	 */
	async reload(): Promise<boolean> {
		try {
			const configs = await this.repository.findEnabledConfigs();
			this.replaceAll(configs);
			this.logger.info(`${LOG_PREFIXES.CONFIG} Reloaded ${configs.length} MCP server configurations`);
			return true;
		} catch (error) {
			this.logger.error(
				`${LOG_PREFIXES.CONFIG} Failed to reload configurations: ${error instanceof Error ? error.message : String(error)}`
			);
			return false;
		}
	}

	get(serverName: string): ServerConfig | undefined {
		return this.configs.get(serverName);
	}

	has(serverName: string): boolean {
		return this.configs.has(serverName);
	}

	names(): string[] {
		return Array.from(this.configs.keys());
	}

	get size(): number {
		return this.configs.size;
	}

	clear(): void {
		this.configs.clear();
	}

	private replaceAll(configs: ServerConfig[]): void {
		const next = new Map<string, ServerConfig>();
		for (const config of configs) {
			if (!config.enabled) {
				continue;
			}
			if (next.has(config.name)) {
				this.logger.warn(
					`${LOG_PREFIXES.CONFIG} Duplicate configuration for server '${config.name}', keeping the last one`
				);
			}
			next.set(config.name, config);
		}
		this.configs = next;
	}
}
