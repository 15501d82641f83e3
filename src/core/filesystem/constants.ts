/**
 * Filesystem Module Constants
 *
 * @module filesystem/constants
 */

/**
 * Log prefixes for consistent logging across the filesystem module
 */
export const LOG_PREFIXES = {
	FILESYSTEM: '[Filesystem]',
	CACHE: '[ObjectCache]',
	CACHE_STORE: '[CacheStore]',
	ADAPTER: '[Adapter]',
	PLUGINS: '[PluginRegistry]',
	FACTORY: '[FilesystemFactory]',
} as const;

/**
 * Error messages for the filesystem module
 */
export const ERROR_MESSAGES = {
	FILE_NOT_FOUND: 'File not found at path',
	FILE_EXISTS: 'File already exists at path',
	PLUGIN_NOT_FOUND: 'Plugin not found for method',
	INVALID_METADATA_FIELD: 'Could not fetch metadata',
	INVALID_STREAM: 'expects argument #2 to be a readable stream',
	PATH_OUTSIDE_ROOT: 'Path is outside of the defined root',
	ROOT_VIOLATION: 'The root directory can not be deleted',
	INVALID_PLUGIN_METHOD: 'Invalid plugin method name',
	RESERVED_PLUGIN_METHOD: 'Plugin method shadows a filesystem operation',
	INVALID_PLUGIN_ARGUMENTS: 'Invalid plugin arguments',
	INVALID_CONFIG: 'Invalid filesystem configuration',
	CACHE_LOAD_FAILED: 'Failed to load cache snapshot',
	CACHE_SAVE_FAILED: 'Failed to persist cache snapshot',
} as const;

export const DEFAULTS = {
	VISIBILITY: 'public',
	MIMETYPE: 'text/plain',
	DIRECTORY_MIMETYPE: 'directory',
	SNAPSHOT_VERSION: 1,
} as const;

/**
 * Adapter type identifiers
 */
export const ADAPTER_TYPES = {
	IN_MEMORY: 'in-memory',
} as const;

/**
 * Cache store type identifiers
 */
export const CACHE_STORE_TYPES = {
	MEMORY: 'memory',
	FILE: 'file',
} as const;

/**
 * Native facade operations; plugins may not register under these names
 */
export const RESERVED_METHODS: ReadonlySet<string> = new Set([
	'connect',
	'disconnect',
	'has',
	'write',
	'writeStream',
	'put',
	'putStream',
	'update',
	'updateStream',
	'read',
	'readStream',
	'readAndDelete',
	'rename',
	'copy',
	'delete',
	'deleteDir',
	'createDir',
	'listContents',
	'listPaths',
	'listWith',
	'getMetadata',
	'getMimetype',
	'getTimestamp',
	'getVisibility',
	'getSize',
	'getWithMetadata',
	'setVisibility',
	'resolve',
	'flushCache',
	'assertPresent',
	'assertAbsent',
	'addPlugin',
	'invoke',
]);
