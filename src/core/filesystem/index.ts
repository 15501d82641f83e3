/**
 * Filesystem Module Public API
 *
 * A uniform file and directory API over pluggable storage adapters, with an
 * in-memory metadata cache that answers repeated existence checks, reads,
 * metadata lookups and listings without a round trip to the adapter.
 *
 * @module filesystem
 */

// Core exports
export { Filesystem } from './filesystem.js';
export type { FilesystemOptions } from './filesystem.js';
export { File, Directory, Handler } from './handler.js';

// Adapters
export { InMemoryAdapter } from './adapter/in-memory.js';
export type { InMemoryAdapterOptions } from './adapter/in-memory.js';
export type { Adapter, AdapterConfig, AdapterResult } from './adapter/types.js';

// Cache
export { ObjectCache } from './cache/object-cache.js';
export type { ObjectCacheOptions } from './cache/object-cache.js';
export { MemoryCacheStore, FileCacheStore } from './cache/store.js';
export { CacheSnapshotSchema } from './cache/types.js';
export type { CacheEntry, CacheSnapshot, CacheStats, CacheStore } from './cache/types.js';

// Plugins
export { PluginRegistry, ListFilesPlugin, EmptyDirPlugin, parsePluginArguments } from './plugins/index.js';
export type { FilesystemPlugin } from './plugins/index.js';

// Type exports
export { PRESENCE, METADATA_FIELDS } from './types.js';
export type {
	AdapterObject,
	HandlerKind,
	ListingMode,
	MetadataField,
	ObjectFields,
	ObjectRecord,
	ObjectType,
	Presence,
	Visibility,
	WriteOptions,
} from './types.js';

// Configuration exports
export { FilesystemSchema } from './config.js';
export type {
	CacheConfig,
	FileCacheConfig,
	FilesystemConfig,
	MemoryCacheConfig,
	ResolvedFilesystemConfig,
} from './config.js';

// Error exports
export {
	FilesystemError,
	FileNotFoundError,
	FileExistsError,
	InvalidArgumentError,
	PluginNotFoundError,
	CachePersistenceError,
} from './errors.js';

// Constants exports
export { LOG_PREFIXES, ERROR_MESSAGES, DEFAULTS, ADAPTER_TYPES, CACHE_STORE_TYPES } from './constants.js';

// Path helpers
export { normalizePath, dirname, basename, isDescendant, ancestors, ROOT } from './path.js';

// Factory functions
export {
	createFilesystem,
	createFilesystemFromEnv,
	getFilesystemConfigFromEnv,
	parseFilesystemConfig,
} from './factory.js';
