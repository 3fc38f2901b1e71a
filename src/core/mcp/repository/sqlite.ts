/**
 * SQLite Configuration Repository
 *
 * Persists MCP server configurations with better-sqlite3. One row per server:
 * the transport type in its own column, the transport settings as JSON and an
 * ENABLE/DISABLE status.
 *
 * @example
 * ```typescript
 * const repository = new SqliteConfigRepository({ path: './data/mcp-config.db' });
 * await repository.connect();
 * await repository.saveConfig({ name: 'files', transport: 'stdio', command: 'mcp-files' });
 * ```
 */

import Database from 'better-sqlite3';
import { mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { dirname, resolve } from 'path';

import { validateServerConfig, type ServerConfig, type ServerConfigInput } from '../config.js';
import { LOG_PREFIXES } from '../constants.js';
import { ConfigurationError } from '../errors/index.js';
import type { ConfigRepository } from '../types.js';
import { logger as defaultLogger, type Logger } from '../../logger/index.js';

export type ConfigStatus = 'ENABLE' | 'DISABLE';

export interface SqliteConfigRepositoryOptions {
	/** Database file, or ':memory:' */
	path: string;
	logger?: Logger;
}

interface ConfigRow {
	id: number;
	mcp_server_name: string;
	connection_type: string;
	connection_config: string;
	status: string;
	created_at: string;
	updated_at: string;
}

interface UpsertParams {
	name: string;
	type: string;
	config: string;
	status: ConfigStatus;
	now: string;
}

const MEMORY_PATH = ':memory:';

export class SqliteConfigRepository implements ConfigRepository {
	private readonly logger: Logger;
	private readonly dbPath: string;
	private db: Database.Database | undefined;

	constructor(options: SqliteConfigRepositoryOptions) {
		this.dbPath = options.path === MEMORY_PATH ? MEMORY_PATH : resolve(options.path);
		this.logger = options.logger ?? defaultLogger;
	}

	async connect(): Promise<void> {
		if (this.db) {
			return;
		}

		if (this.dbPath !== MEMORY_PATH) {
			const dir = dirname(this.dbPath);
			if (!existsSync(dir)) {
				await mkdir(dir, { recursive: true });
			}
		}

		const db = new Database(this.dbPath);
		if (this.dbPath !== MEMORY_PATH) {
			db.pragma('journal_mode = WAL');
		}
		db.exec(`
			CREATE TABLE IF NOT EXISTS mcp_config (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				mcp_server_name TEXT NOT NULL UNIQUE,
				connection_type TEXT NOT NULL,
				connection_config TEXT NOT NULL,
				status TEXT NOT NULL DEFAULT 'ENABLE' CHECK (status IN ('ENABLE', 'DISABLE')),
				created_at TEXT NOT NULL,
				updated_at TEXT NOT NULL
			);
			CREATE INDEX IF NOT EXISTS idx_mcp_config_status ON mcp_config(status);
		`);
		this.db = db;
		this.logger.info(`${LOG_PREFIXES.CONFIG} SQLite configuration store opened`, { path: this.dbPath });
	}

	isConnected(): boolean {
		return this.db !== undefined;
	}

	async close(): Promise<void> {
		if (!this.db) {
			return;
		}
		this.db.close();
		this.db = undefined;
		this.logger.debug(`${LOG_PREFIXES.CONFIG} SQLite configuration store closed`);
	}

	/**
	 * Enabled configurations. A row that fails validation is logged and skipped.
	 */
	async findEnabledConfigs(): Promise<ServerConfig[]> {
		const rows = this.database()
			.prepare<[ConfigStatus], ConfigRow>(
				'SELECT * FROM mcp_config WHERE status = ? ORDER BY mcp_server_name'
			)
			.all('ENABLE');
		return this.toConfigs(rows);
	}

	async findAllConfigs(): Promise<ServerConfig[]> {
		const rows = this.database()
			.prepare<[], ConfigRow>('SELECT * FROM mcp_config ORDER BY mcp_server_name')
			.all();
		return this.toConfigs(rows);
	}

	/**
	 * Insert or replace a server's configuration. `enabled: false` is stored as
	 * DISABLE.
	 *
	 * @throws ConfigurationError when the input is not a valid server configuration
	 */
	async saveConfig(input: ServerConfigInput): Promise<ServerConfig> {
		const result = validateServerConfig(input);
		if (!result.success) {
			throw new ConfigurationError(
				`Invalid server configuration: ${result.errors.join('; ')}`,
				input.name
			);
		}

		const { name, transport, enabled, ...connection } = result.data;
		this.database()
			.prepare<UpsertParams>(
				`INSERT INTO mcp_config (mcp_server_name, connection_type, connection_config, status, created_at, updated_at)
				 VALUES (@name, @type, @config, @status, @now, @now)
				 ON CONFLICT(mcp_server_name) DO UPDATE SET
					connection_type = excluded.connection_type,
					connection_config = excluded.connection_config,
					status = excluded.status,
					updated_at = excluded.updated_at`
			)
			.run({
				name,
				type: transport,
				config: JSON.stringify(connection),
				status: enabled ? 'ENABLE' : 'DISABLE',
				now: new Date().toISOString(),
			});

		this.logger.info(`${LOG_PREFIXES.CONFIG} Saved configuration for server: ${name}`);
		return result.data;
	}

	/**
	 * @returns False when no such server is stored
	 */
	async setStatus(serverName: string, status: ConfigStatus): Promise<boolean> {
		const info = this.database()
			.prepare<[ConfigStatus, string, string]>(
				'UPDATE mcp_config SET status = ?, updated_at = ? WHERE mcp_server_name = ?'
			)
			.run(status, new Date().toISOString(), serverName);
		return info.changes > 0;
	}

	async deleteConfig(serverName: string): Promise<boolean> {
		const info = this.database()
			.prepare<[string]>('DELETE FROM mcp_config WHERE mcp_server_name = ?')
			.run(serverName);
		return info.changes > 0;
	}

	private database(): Database.Database {
		if (!this.db) {
			throw new Error('SQLite configuration store is not connected');
		}
		return this.db;
	}

	private toConfigs(rows: ConfigRow[]): ServerConfig[] {
		const configs: ServerConfig[] = [];
		for (const row of rows) {
			const config = this.parseRow(row);
			if (config) {
				configs.push(config);
			}
		}
		return configs;
	}

	private parseRow(row: ConfigRow): ServerConfig | null {
		let connection: unknown;
		try {
			connection = JSON.parse(row.connection_config);
		} catch (error) {
			this.logger.warn(
				`${LOG_PREFIXES.CONFIG} Skipping server ${row.mcp_server_name}: connection_config is not JSON (${error instanceof Error ? error.message : String(error)})`
			);
			return null;
		}
		if (typeof connection !== 'object' || connection === null || Array.isArray(connection)) {
			this.logger.warn(
				`${LOG_PREFIXES.CONFIG} Skipping server ${row.mcp_server_name}: connection_config must be an object`
			);
			return null;
		}

		const result = validateServerConfig({
			...connection,
			name: row.mcp_server_name,
			transport: row.connection_type,
			enabled: row.status === 'ENABLE',
		});
		if (!result.success) {
			this.logger.warn(
				`${LOG_PREFIXES.CONFIG} Skipping invalid configuration for server ${row.mcp_server_name}: ${result.errors.join('; ')}`
			);
			return null;
		}
		return result.data;
	}
}
