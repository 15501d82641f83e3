/**
 * Filesystem Factory
 *
 * Builds a connected facade from a validated configuration.
 *
 * @module filesystem/factory
 */

import { Filesystem } from './filesystem.js';
import type { Adapter } from './adapter/types.js';
import { InMemoryAdapter } from './adapter/in-memory.js';
import { ObjectCache } from './cache/object-cache.js';
import { FileCacheStore } from './cache/store.js';
import type { CacheStore } from './cache/types.js';
import { FilesystemSchema } from './config.js';
import type { CacheConfig, FilesystemConfig, ResolvedFilesystemConfig } from './config.js';
import { CACHE_STORE_TYPES, ERROR_MESSAGES, LOG_PREFIXES } from './constants.js';
import { FilesystemError } from './errors.js';
import { createLogger, type Logger } from '../logger/index.js';
import { env } from '../env.js';

/**
 * Validate a configuration and apply its defaults
 *
 * @throws {FilesystemError} listing every schema issue
 */
export function parseFilesystemConfig(config: FilesystemConfig): ResolvedFilesystemConfig {
	const validationResult = FilesystemSchema.safeParse(config);
	if (!validationResult.success) {
		throw new FilesystemError(
			`${ERROR_MESSAGES.INVALID_CONFIG}: ${validationResult.error.errors
				.map(e => `${e.path.join('.')}: ${e.message}`)
				.join(', ')}`,
			'configure'
		);
	}
	return validationResult.data;
}

function createCacheStore(config: CacheConfig, logger: Logger): CacheStore | undefined {
	switch (config.type) {
		case CACHE_STORE_TYPES.FILE:
			return new FileCacheStore(config.path, logger);
		case CACHE_STORE_TYPES.MEMORY:
			return undefined;
	}
}

/**
 * Creates a filesystem and loads its cache
 *
 * @param adapter - storage provider; defaults to a fresh in-memory adapter
 *
 * @example
 * ```typescript
 * const filesystem = await createFilesystem(new InMemoryAdapter(), {
 *   visibility: 'private',
 *   cache: { type: 'file', path: './data/cache.json' },
 * });
 *
 * await filesystem.write('notes/today.md', '- ship it');
 *
 * // Persist the cache when done
 * await filesystem.disconnect();
 * ```
 */
export async function createFilesystem(
	adapter: Adapter = new InMemoryAdapter(),
	config: FilesystemConfig = {}
): Promise<Filesystem> {
	const logger = createLogger({ level: env.CACHEDFS_LOG_LEVEL });
	const resolved = parseFilesystemConfig(config);

	logger.debug(`${LOG_PREFIXES.FACTORY} Creating filesystem`, {
		adapter: adapter.getAdapterType(),
		cacheType: resolved.cache.type,
		visibility: resolved.visibility,
	});

	const store = createCacheStore(resolved.cache, logger);
	const filesystem = new Filesystem(adapter, {
		visibility: resolved.visibility,
		autosave: resolved.autosave,
		cache: new ObjectCache({ store, logger }),
		logger,
	});

	try {
		await filesystem.connect();
	} catch (error) {
		logger.error(`${LOG_PREFIXES.FACTORY} Failed to load cache`, {
			error: error instanceof Error ? error.message : String(error),
		});
		throw error;
	}

	return filesystem;
}

/**
 * Reads the configuration from environment variables
 *
 * Environment variables used:
 * - CACHEDFS_VISIBILITY: 'public' or 'private' (default: 'public')
 * - CACHEDFS_CACHE_PATH: snapshot file; when unset the cache lives in memory only
 * - CACHEDFS_CACHE_AUTOSAVE: 'true' to persist after every mutation
 */
export function getFilesystemConfigFromEnv(): FilesystemConfig {
	const cachePath = env.CACHEDFS_CACHE_PATH;

	return {
		visibility: env.CACHEDFS_VISIBILITY,
		autosave: env.CACHEDFS_CACHE_AUTOSAVE,
		cache: cachePath ? { type: 'file', path: cachePath } : { type: 'memory' },
	};
}

/**
 * Creates a filesystem configured from environment variables
 */
export async function createFilesystemFromEnv(adapter: Adapter = new InMemoryAdapter()): Promise<Filesystem> {
	return createFilesystem(adapter, getFilesystemConfigFromEnv());
}
