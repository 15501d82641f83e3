/**
 * Cache Stores
 *
 * Durable homes for object cache snapshots. The cache works without a store;
 * with one it can be preloaded on connect and persisted on disconnect.
 *
 * @module filesystem/cache/store
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { CacheSnapshot, CacheStore } from './types.js';
import { CacheSnapshotSchema } from './types.js';
import { CACHE_STORE_TYPES, ERROR_MESSAGES, LOG_PREFIXES } from '../constants.js';
import { CachePersistenceError } from '../errors.js';
import { createLogger, type Logger } from '../../logger/index.js';

/**
 * Keeps the last saved snapshot in process memory.
 *
 * Lets two facades in one process hand a warm cache to each other, and
 * gives tests a store without touching the disk.
 */
export class MemoryCacheStore implements CacheStore {
	private snapshot: string | undefined;

	getStoreType(): string {
		return CACHE_STORE_TYPES.MEMORY;
	}

	async load(): Promise<CacheSnapshot | undefined> {
		if (this.snapshot === undefined) {
			return undefined;
		}
		return CacheSnapshotSchema.parse(JSON.parse(this.snapshot));
	}

	async save(snapshot: CacheSnapshot): Promise<void> {
		this.snapshot = JSON.stringify(snapshot);
	}
}

/**
 * Stores the snapshot as a JSON file.
 *
 * A missing file loads as "no snapshot". A file that does not parse or does
 * not match the snapshot schema is logged and ignored, so a corrupt cache
 * never blocks startup. Writes go through a temporary file and a rename.
 *
 * @example
 * ```typescript
 * const cache = new ObjectCache({ store: new FileCacheStore('./data/cache.json') });
 * await cache.load();
 * ```
 */
export class FileCacheStore implements CacheStore {
	private readonly logger: Logger;

	constructor(
		private readonly filePath: string,
		logger?: Logger
	) {
		this.logger = logger ?? createLogger({ level: process.env.CACHEDFS_LOG_LEVEL || 'info' });
	}

	getStoreType(): string {
		return CACHE_STORE_TYPES.FILE;
	}

	async load(): Promise<CacheSnapshot | undefined> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePath, 'utf8');
		} catch (error) {
			if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
				this.logger.debug(`${LOG_PREFIXES.CACHE_STORE} No snapshot yet`, { file: this.filePath });
				return undefined;
			}
			throw new CachePersistenceError(
				ERROR_MESSAGES.CACHE_LOAD_FAILED,
				this.filePath,
				error instanceof Error ? error : new Error(String(error))
			);
		}

		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch (error) {
			this.logger.warn(`${LOG_PREFIXES.CACHE_STORE} ${ERROR_MESSAGES.CACHE_LOAD_FAILED}`, {
				file: this.filePath,
				error: error instanceof Error ? error.message : String(error),
			});
			return undefined;
		}

		const parsed = CacheSnapshotSchema.safeParse(data);
		if (!parsed.success) {
			this.logger.warn(`${LOG_PREFIXES.CACHE_STORE} ${ERROR_MESSAGES.CACHE_LOAD_FAILED}`, {
				file: this.filePath,
				issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
			});
			return undefined;
		}

		return parsed.data;
	}

	async save(snapshot: CacheSnapshot): Promise<void> {
		const tempPath = `${this.filePath}.${process.pid}.tmp`;
		try {
			await fs.mkdir(path.dirname(this.filePath), { recursive: true });
			await fs.writeFile(tempPath, JSON.stringify(snapshot), 'utf8');
			await fs.rename(tempPath, this.filePath);
		} catch (error) {
			await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				this.logger.warn(`${LOG_PREFIXES.CACHE_STORE} Could not remove temporary snapshot`, {
					file: tempPath,
					error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
				});
			});
			throw new CachePersistenceError(
				ERROR_MESSAGES.CACHE_SAVE_FAILED,
				this.filePath,
				error instanceof Error ? error : new Error(String(error))
			);
		}
	}
}
