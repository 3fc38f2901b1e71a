/**
 * SQLite Configuration Repository Tests
 *
 * Runs against an in-memory database, plus a temporary file for the cases that
 * need a second connection to write rows directly.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SqliteConfigRepository } from '../sqlite.js';
import { createConfigRepository } from '../factory.js';
import { InMemoryConfigRepository } from '../in-memory.js';
import { ConfigurationError } from '../../errors/index.js';
import { createLogger } from '../../../logger/index.js';

const logger = createLogger({ silent: true });

describe('SqliteConfigRepository', () => {
	let repository: SqliteConfigRepository;

	beforeEach(async () => {
		repository = new SqliteConfigRepository({ path: ':memory:', logger });
		await repository.connect();
	});

	afterEach(async () => {
		await repository.close();
	});

	it('round-trips a saved configuration', async () => {
		await repository.saveConfig({
			name: 'files',
			transport: 'stdio',
			command: 'mcp-files',
			args: ['--root', '/srv'],
			env: { LOG_LEVEL: 'debug' },
		});

		expect(await repository.findEnabledConfigs()).toEqual([
			{
				name: 'files',
				transport: 'stdio',
				command: 'mcp-files',
				args: ['--root', '/srv'],
				env: { LOG_LEVEL: 'debug' },
				enabled: true,
			},
		]);
	});

	it('returns only enabled configurations, ordered by name', async () => {
		await repository.saveConfig({ name: 'zeta', transport: 'sse', url: 'http://localhost:9001' });
		await repository.saveConfig({ name: 'alpha', transport: 'stdio', command: 'mcp-alpha' });
		await repository.saveConfig({ name: 'off', transport: 'stdio', command: 'mcp-off', enabled: false });

		const enabled = await repository.findEnabledConfigs();
		const all = await repository.findAllConfigs();

		expect(enabled.map(config => config.name)).toEqual(['alpha', 'zeta']);
		expect(all.map(config => config.name)).toEqual(['alpha', 'off', 'zeta']);
	});

	it('updates an existing server in place', async () => {
		await repository.saveConfig({ name: 'search', transport: 'sse', url: 'http://localhost:9001' });
		await repository.saveConfig({
			name: 'search',
			transport: 'streamable-http',
			url: 'http://localhost:9002/mcp',
			headers: { Authorization: 'Bearer test-secret' },
		});

		expect(await repository.findAllConfigs()).toEqual([
			{
				name: 'search',
				transport: 'streamable-http',
				url: 'http://localhost:9002/mcp',
				headers: { Authorization: 'Bearer test-secret' },
				enabled: true,
			},
		]);
	});

	it('toggles and deletes by server name', async () => {
		await repository.saveConfig({ name: 'files', transport: 'stdio', command: 'mcp-files' });

		expect(await repository.setStatus('files', 'DISABLE')).toBe(true);
		expect(await repository.findEnabledConfigs()).toEqual([]);
		expect(await repository.setStatus('files', 'ENABLE')).toBe(true);
		expect(await repository.findEnabledConfigs()).toHaveLength(1);

		expect(await repository.deleteConfig('files')).toBe(true);
		expect(await repository.deleteConfig('files')).toBe(false);
		expect(await repository.setStatus('files', 'ENABLE')).toBe(false);
	});

	it('rejects an invalid configuration', async () => {
		await expect(
			repository.saveConfig({ name: 'files', transport: 'stdio', command: '' })
		).rejects.toBeInstanceOf(ConfigurationError);
		expect(await repository.findAllConfigs()).toEqual([]);
	});

	it('refuses queries once closed', async () => {
		await repository.close();

		expect(repository.isConnected()).toBe(false);
		await expect(repository.findEnabledConfigs()).rejects.toThrow(
			'SQLite configuration store is not connected'
		);
	});

	describe('with a database file', () => {
		let dir: string;
		let dbPath: string;
		let fileRepository: SqliteConfigRepository;

		beforeEach(async () => {
			dir = mkdtempSync(join(tmpdir(), 'mcp-config-'));
			dbPath = join(dir, 'nested', 'config.db');
			fileRepository = new SqliteConfigRepository({ path: dbPath, logger });
			await fileRepository.connect();
		});

		afterEach(async () => {
			await fileRepository.close();
			rmSync(dir, { recursive: true, force: true });
		});

		it('creates the parent directory', () => {
			expect(existsSync(dbPath)).toBe(true);
		});

		it('skips rows that no longer validate', async () => {
			await fileRepository.saveConfig({ name: 'good', transport: 'stdio', command: 'mcp-good' });

			const raw = new Database(dbPath);
			const insert = raw.prepare<[string, string, string]>(
				`INSERT INTO mcp_config (mcp_server_name, connection_type, connection_config, status, created_at, updated_at)
				 VALUES (?, ?, ?, 'ENABLE', '2026-01-01T00:00:00.000Z', '2026-01-01T00:00:00.000Z')`
			);
			insert.run('broken-json', 'stdio', '{not json');
			insert.run('array-json', 'stdio', '[]');
			insert.run('unknown-type', 'carrier-pigeon', '{}');
			raw.close();

			const configs = await fileRepository.findEnabledConfigs();

			expect(configs.map(config => config.name)).toEqual(['good']);
		});
	});
});

describe('createConfigRepository', () => {
	it('opens the store named by configStore', async () => {
		const inMemory = await createConfigRepository({ configStore: 'in-memory', configDbPath: 'unused' }, logger);
		const sqlite = await createConfigRepository({ configStore: 'sqlite', configDbPath: ':memory:' }, logger);

		expect(inMemory).toBeInstanceOf(InMemoryConfigRepository);
		expect(sqlite).toBeInstanceOf(SqliteConfigRepository);
		if (sqlite instanceof SqliteConfigRepository) {
			expect(sqlite.isConnected()).toBe(true);
		}
		await sqlite.close();
	});
});
