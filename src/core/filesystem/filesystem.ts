/**
 * Filesystem Facade
 *
 * Public entry point for file and directory operations. Every read-type
 * operation asks the object cache first and falls through to the adapter on
 * a miss; every mutation checks its precondition, calls the adapter and, only
 * when the adapter reports success, reconciles the cache.
 *
 * Adapter failures are reported as `false`. Precondition violations and
 * invalid arguments throw before the adapter is touched.
 *
 * @module filesystem/filesystem
 */

import { Readable } from 'stream';
import type { Adapter, AdapterConfig, AdapterResult } from './adapter/types.js';
import { ObjectCache } from './cache/object-cache.js';
import { PluginRegistry } from './plugins/registry.js';
import type { FilesystemPlugin } from './plugins/types.js';
import { Directory, File } from './handler.js';
import type {
	AdapterObject,
	HandlerKind,
	MetadataField,
	ObjectRecord,
	Visibility,
	WriteOptions,
} from './types.js';
import { PRESENCE } from './types.js';
import { FileExistsError, FileNotFoundError, InvalidArgumentError } from './errors.js';
import { DEFAULTS, ERROR_MESSAGES, LOG_PREFIXES } from './constants.js';
import { ROOT, normalizePath } from './path.js';
import { createLogger, type Logger } from '../logger/index.js';

export interface FilesystemOptions {
	/** Visibility for new objects when a call passes none (default: public) */
	visibility?: Visibility;
	/** Defaults to an in-memory cache without persistence */
	cache?: ObjectCache;
	/** Save the cache after every successful mutation */
	autosave?: boolean;
	logger?: Logger;
}

/**
 * Fields whose cached values a content change makes stale
 */
const CONTENT_FIELDS = ['contents', 'size', 'timestamp'] as const;

type MetadataGetter = (filesystem: Filesystem, path: string, target: ObjectRecord) => Promise<void>;

/**
 * Dispatch table for `getWithMetadata` and `listWith`
 */
const METADATA_GETTERS: Record<MetadataField, MetadataGetter> = {
	mimetype: async (filesystem, path, target) => {
		const mimetype = await filesystem.getMimetype(path);
		if (mimetype !== false) target.mimetype = mimetype;
	},
	timestamp: async (filesystem, path, target) => {
		const timestamp = await filesystem.getTimestamp(path);
		if (timestamp !== false) target.timestamp = timestamp;
	},
	visibility: async (filesystem, path, target) => {
		const visibility = await filesystem.getVisibility(path);
		if (visibility !== false) target.visibility = visibility;
	},
	size: async (filesystem, path, target) => {
		const size = await filesystem.getSize(path);
		if (size !== false) target.size = size;
	},
};

const isMetadataField = (field: string): field is MetadataField => Object.hasOwn(METADATA_GETTERS, field);

/**
 * Filesystem
 *
 * @example
 * ```typescript
 * const filesystem = new Filesystem(new InMemoryAdapter());
 * await filesystem.write('docs/readme.md', '# Hello');
 * await filesystem.has('docs/readme.md');  // true, answered by the cache
 * await filesystem.read('docs/readme.md'); // '# Hello'
 * ```
 */
export class Filesystem {
	private readonly cache: ObjectCache;
	private readonly plugins: PluginRegistry;
	private readonly visibility: Visibility;
	private readonly autosave: boolean;
	private readonly logger: Logger;
	private connected = false;

	constructor(
		private readonly adapter: Adapter,
		options: FilesystemOptions = {}
	) {
		this.logger = options.logger ?? createLogger({ level: process.env.CACHEDFS_LOG_LEVEL || 'info' });
		this.cache = options.cache ?? new ObjectCache({ logger: this.logger });
		this.plugins = new PluginRegistry(this.logger);
		this.visibility = options.visibility ?? DEFAULTS.VISIBILITY;
		this.autosave = options.autosave ?? false;
	}

	getAdapter(): Adapter {
		return this.adapter;
	}

	getCache(): ObjectCache {
		return this.cache;
	}

	getDefaultVisibility(): Visibility {
		return this.visibility;
	}

	// Lifecycle

	/**
	 * Preload the cache from its store. Operations work without connecting;
	 * the cache then simply starts empty.
	 */
	async connect(): Promise<void> {
		if (this.connected) {
			this.logger.debug(`${LOG_PREFIXES.FILESYSTEM} Already connected`);
			return;
		}

		const loaded = await this.cache.load();
		this.connected = true;

		this.logger.info(`${LOG_PREFIXES.FILESYSTEM} Connected`, {
			adapter: this.adapter.getAdapterType(),
			cacheLoaded: loaded,
		});
	}

	/**
	 * Persist the cache to its store
	 */
	async disconnect(): Promise<void> {
		if (!this.connected) {
			return;
		}

		await this.cache.save();
		this.connected = false;

		this.logger.info(`${LOG_PREFIXES.FILESYSTEM} Disconnected`, {
			cache: this.cache.getStats(),
		});
	}

	isConnected(): boolean {
		return this.connected;
	}

	// Existence

	async has(path: string): Promise<boolean> {
		path = normalizePath(path);

		const cached = this.cache.has(path);
		if (cached !== PRESENCE.UNKNOWN) {
			return cached === PRESENCE.PRESENT;
		}

		this.logger.debug(`${LOG_PREFIXES.FILESYSTEM} Cache miss, consulting adapter`, { operation: 'has', path });
		const object = await this.adapter.has(path);
		if (object === false) {
			return false;
		}

		this.cache.upsert(path, object === true ? {} : object, true);
		return true;
	}

	/**
	 * @throws {FileNotFoundError}
	 */
	async assertPresent(path: string): Promise<void> {
		if (!(await this.has(path))) {
			throw new FileNotFoundError(normalizePath(path));
		}
	}

	/**
	 * @throws {FileExistsError}
	 */
	async assertAbsent(path: string): Promise<void> {
		if (await this.has(path)) {
			throw new FileExistsError(normalizePath(path));
		}
	}

	// Writing

	/**
	 * Create a new file
	 *
	 * @throws {FileExistsError} when the path already exists
	 */
	async write(path: string, contents: string, options: WriteOptions = {}): Promise<boolean> {
		path = normalizePath(path);
		await this.assertAbsent(path);

		return this.createFile(path, contents, options);
	}

	/**
	 * Create a new file from a readable stream
	 *
	 * @throws {InvalidArgumentError} when `stream` is not readable
	 * @throws {FileExistsError} when the path already exists
	 */
	async writeStream(path: string, stream: Readable, options: WriteOptions = {}): Promise<boolean> {
		this.assertReadable('writeStream', stream);
		path = normalizePath(path);
		await this.assertAbsent(path);

		return this.createFileFromStream(path, stream, options);
	}

	/**
	 * Replace the contents of an existing file
	 *
	 * @throws {FileNotFoundError}
	 */
	async update(path: string, contents: string): Promise<boolean> {
		path = normalizePath(path);
		await this.assertPresent(path);

		return this.replaceFile(path, contents);
	}

	/**
	 * @throws {InvalidArgumentError} when `stream` is not readable
	 * @throws {FileNotFoundError}
	 */
	async updateStream(path: string, stream: Readable): Promise<boolean> {
		this.assertReadable('updateStream', stream);
		path = normalizePath(path);
		await this.assertPresent(path);

		return this.replaceFileFromStream(path, stream);
	}

	/**
	 * Create the file or replace its contents when it exists
	 */
	async put(path: string, contents: string, options: WriteOptions = {}): Promise<boolean> {
		path = normalizePath(path);

		if (await this.has(path)) {
			return this.replaceFile(path, contents);
		}
		return this.createFile(path, contents, options);
	}

	/**
	 * @throws {InvalidArgumentError} when `stream` is not readable
	 */
	async putStream(path: string, stream: Readable, options: WriteOptions = {}): Promise<boolean> {
		this.assertReadable('putStream', stream);
		path = normalizePath(path);

		if (await this.has(path)) {
			return this.replaceFileFromStream(path, stream);
		}
		return this.createFileFromStream(path, stream, options);
	}

	// Reading

	/**
	 * @throws {FileNotFoundError}
	 */
	async read(path: string): Promise<string | false> {
		path = normalizePath(path);
		await this.assertPresent(path);

		const cached = this.cache.read(path);
		if (cached !== undefined) {
			return cached;
		}

		this.logger.debug(`${LOG_PREFIXES.FILESYSTEM} Cache miss, consulting adapter`, { operation: 'read', path });
		const object = await this.adapter.read(path);
		if (!object || object.contents === undefined) {
			return this.failed('read', path);
		}

		this.cache.upsert(path, { type: 'file', ...object }, true);
		return object.contents;
	}

	/**
	 * Open a file for reading. Streams are handed through and never cached.
	 *
	 * @throws {FileNotFoundError}
	 */
	async readStream(path: string): Promise<Readable | false> {
		path = normalizePath(path);
		await this.assertPresent(path);

		const object = await this.adapter.readStream(path);
		if (!object || !object.stream) {
			return this.failed('readStream', path);
		}

		return object.stream;
	}

	/**
	 * Read a file, then delete it
	 *
	 * @throws {FileNotFoundError}
	 */
	async readAndDelete(path: string): Promise<string | false> {
		const contents = await this.read(path);
		if (contents === false) {
			return false;
		}

		return (await this.delete(path)) ? contents : false;
	}

	// Moving and removing

	/**
	 * @throws {FileNotFoundError} when `path` does not exist
	 * @throws {FileExistsError} when `newpath` already exists
	 */
	async rename(path: string, newpath: string): Promise<boolean> {
		path = normalizePath(path);
		newpath = normalizePath(newpath);
		await this.assertPresent(path);
		await this.assertAbsent(newpath);

		if (!(await this.adapter.rename(path, newpath))) {
			return this.failed('rename', path);
		}

		this.cache.rename(path, newpath);
		this.cache.ensureParentDirectories(newpath);
		await this.persist();
		return true;
	}

	/**
	 * @throws {FileNotFoundError} when `path` does not exist
	 * @throws {FileExistsError} when `newpath` already exists
	 */
	async copy(path: string, newpath: string): Promise<boolean> {
		path = normalizePath(path);
		newpath = normalizePath(newpath);
		await this.assertPresent(path);
		await this.assertAbsent(newpath);

		if (!(await this.adapter.copy(path, newpath))) {
			return this.failed('copy', path);
		}

		// The copy shares everything but its timestamp with the source
		const source = this.cache.peek(path);
		this.cache.upsert(
			newpath,
			{
				type: source?.type ?? 'file',
				size: source?.size,
				mimetype: source?.mimetype,
				visibility: source?.visibility,
				contents: source?.contents,
			},
			true
		);
		this.cache.ensureParentDirectories(newpath);
		this.cache.invalidate(newpath);
		await this.persist();
		return true;
	}

	/**
	 * Delete a file
	 *
	 * @throws {FileNotFoundError}
	 */
	async delete(path: string): Promise<boolean> {
		path = normalizePath(path);
		await this.assertPresent(path);

		if (!(await this.adapter.delete(path))) {
			return this.failed('delete', path);
		}

		this.cache.remove(path);
		await this.persist();
		return true;
	}

	/**
	 * Delete a directory and everything below it
	 *
	 * @throws {InvalidArgumentError} for the root directory
	 */
	async deleteDir(dirname: string): Promise<boolean> {
		dirname = normalizePath(dirname);
		if (dirname === ROOT) {
			throw new InvalidArgumentError(ERROR_MESSAGES.ROOT_VIOLATION, 'deleteDir');
		}

		if (!(await this.adapter.deleteDir(dirname))) {
			return this.failed('deleteDir', dirname);
		}

		this.cache.removeDirectoryRecursive(dirname);
		await this.persist();
		return true;
	}

	async createDir(dirname: string, options: WriteOptions = {}): Promise<boolean> {
		dirname = normalizePath(dirname);
		if (dirname === ROOT) {
			return true;
		}

		const object = await this.adapter.createDir(dirname, this.adapterConfig(options));
		if (!object) {
			return this.failed('createDir', dirname);
		}

		this.cache.upsert(dirname, { type: 'dir' }, true);
		this.cache.upsert(dirname, object, true);
		this.cache.ensureParentDirectories(dirname);
		this.cache.invalidate(dirname);
		await this.persist();
		return true;
	}

	// Listing

	/**
	 * List a directory. A complete cached listing is served without the
	 * adapter; otherwise the adapter's snapshot is merged and marked complete.
	 */
	async listContents(directory = ROOT, recursive = false): Promise<ObjectRecord[] | false> {
		directory = normalizePath(directory);

		if (this.cache.isComplete(directory, recursive)) {
			return this.cache.listing(directory, recursive);
		}

		this.logger.debug(`${LOG_PREFIXES.FILESYSTEM} Cache miss, consulting adapter`, {
			operation: 'listContents',
			directory,
			recursive,
		});
		const generation = this.cache.getGeneration(directory);
		const contents = await this.adapter.listContents(directory, recursive);
		if (contents === false) {
			return this.failed('listContents', directory);
		}

		const listing = this.cache.storeListing(directory, recursive, contents, generation);
		await this.persist();
		return listing;
	}

	async listPaths(directory = ROOT, recursive = false): Promise<string[] | false> {
		const contents = await this.listContents(directory, recursive);
		return contents && contents.map(object => object.path);
	}

	/**
	 * List a directory and fetch extra metadata for every file in it
	 *
	 * @throws {InvalidArgumentError} for unknown metadata fields
	 */
	async listWith(fields: string[], directory = ROOT, recursive = false): Promise<ObjectRecord[] | false> {
		this.assertMetadataFields(fields);

		const contents = await this.listContents(directory, recursive);
		if (contents === false) {
			return false;
		}

		const result: ObjectRecord[] = [];
		for (const object of contents) {
			if (object.type !== 'file') {
				result.push(object);
				continue;
			}
			const metadata = await this.getWithMetadata(object.path, fields);
			result.push(metadata ? { ...object, ...metadata } : object);
		}
		return result;
	}

	// Metadata

	/**
	 * @throws {FileNotFoundError}
	 */
	async getMetadata(path: string): Promise<ObjectRecord | false> {
		path = normalizePath(path);
		await this.assertPresent(path);

		const cached = this.cache.getMetadata(path);
		if (cached) {
			return cached;
		}

		const object = await this.adapter.getMetadata(path);
		if (!object) {
			return this.failed('getMetadata', path);
		}

		return this.cache.upsert(path, object, true);
	}

	/**
	 * Base metadata plus the requested fields, each fetched through its getter
	 *
	 * @throws {InvalidArgumentError} for unknown metadata fields
	 * @throws {FileNotFoundError}
	 */
	async getWithMetadata(path: string, fields: string[]): Promise<ObjectRecord | false> {
		const valid = this.assertMetadataFields(fields);

		const metadata = await this.getMetadata(path);
		if (!metadata) {
			return false;
		}

		for (const field of valid) {
			await METADATA_GETTERS[field](this, metadata.path, metadata);
		}
		return metadata;
	}

	getMimetype(path: string): Promise<string | false> {
		return this.fetchField(
			'mimetype',
			path,
			p => this.cache.getMimetype(p),
			p => this.adapter.getMimetype(p),
			record => record.mimetype
		);
	}

	getTimestamp(path: string): Promise<number | false> {
		return this.fetchField(
			'timestamp',
			path,
			p => this.cache.getTimestamp(p),
			p => this.adapter.getTimestamp(p),
			record => record.timestamp
		);
	}

	getVisibility(path: string): Promise<Visibility | false> {
		return this.fetchField(
			'visibility',
			path,
			p => this.cache.getVisibility(p),
			p => this.adapter.getVisibility(p),
			record => record.visibility
		);
	}

	getSize(path: string): Promise<number | false> {
		return this.fetchField(
			'size',
			path,
			p => this.cache.getSize(p),
			p => this.adapter.getSize(p),
			record => record.size
		);
	}

	/**
	 * @throws {FileNotFoundError}
	 */
	async setVisibility(path: string, visibility: Visibility): Promise<boolean> {
		path = normalizePath(path);
		await this.assertPresent(path);

		const object = await this.adapter.setVisibility(path, visibility);
		if (!object) {
			return this.failed('setVisibility', path);
		}

		this.cache.upsert(path, { visibility }, true);
		this.cache.upsert(path, object, true);
		this.cache.touch(path);
		await this.persist();
		return true;
	}

	// Handles

	/**
	 * Bind a file or directory handle to `path`. Without `kind` the type is
	 * taken from the path's metadata.
	 *
	 * @throws {FileNotFoundError} when `kind` is omitted and the path does not exist
	 */
	resolve(path: string, kind: 'file'): Promise<File>;
	resolve(path: string, kind: 'dir'): Promise<Directory>;
	resolve(path: string, kind?: HandlerKind): Promise<File | Directory | false>;
	async resolve(path: string, kind?: HandlerKind): Promise<File | Directory | false> {
		path = normalizePath(path);

		if (kind === undefined) {
			const metadata = await this.getMetadata(path);
			if (!metadata) {
				return false;
			}
			kind = metadata.type === 'dir' ? 'dir' : 'file';
		}

		return kind === 'file' ? new File(this, path) : new Directory(this, path);
	}

	// Cache

	flushCache(): this {
		this.cache.flush();
		return this;
	}

	// Plugins

	/**
	 * @throws {InvalidArgumentError} when the plugin's method name is malformed or reserved
	 */
	addPlugin(plugin: FilesystemPlugin): this {
		this.plugins.register(plugin);
		return this;
	}

	/**
	 * Call a plugin by method name
	 *
	 * @throws {PluginNotFoundError} when no plugin handles `method`
	 */
	invoke(method: string, ...args: unknown[]): Promise<unknown> {
		return this.plugins.find(method).handle(this, ...args);
	}

	getPluginMethods(): string[] {
		return this.plugins.getMethods();
	}

	// Helper Methods

	private async createFile(path: string, contents: string, options: WriteOptions): Promise<boolean> {
		const object = await this.adapter.write(path, contents, this.adapterConfig(options));
		if (!object) {
			return this.failed('write', path);
		}

		this.storeFile(path, object, contents);
		this.cache.ensureParentDirectories(path);
		this.cache.invalidate(path);
		await this.persist();
		return true;
	}

	private async createFileFromStream(path: string, stream: Readable, options: WriteOptions): Promise<boolean> {
		const object = await this.adapter.writeStream(path, stream, this.adapterConfig(options));
		if (!object) {
			return this.failed('writeStream', path);
		}

		this.storeFile(path, object);
		this.cache.ensureParentDirectories(path);
		this.cache.invalidate(path);
		await this.persist();
		return true;
	}

	private async replaceFile(path: string, contents: string): Promise<boolean> {
		const object = await this.adapter.update(path, contents);
		if (!object) {
			return this.failed('update', path);
		}

		this.storeFile(path, object, contents);
		await this.persist();
		return true;
	}

	private async replaceFileFromStream(path: string, stream: Readable): Promise<boolean> {
		const object = await this.adapter.updateStream(path, stream);
		if (!object) {
			return this.failed('updateStream', path);
		}

		this.storeFile(path, object);
		await this.persist();
		return true;
	}

	/**
	 * Write-back after new contents were stored. Fields the new contents
	 * determine are replaced; the rest of the record is kept.
	 */
	private storeFile(path: string, object: AdapterObject, contents?: string): void {
		const known = contents ?? object.contents;
		this.cache.forgetFields(path, CONTENT_FIELDS);
		this.cache.upsert(path, object, true);
		this.cache.upsert(
			path,
			{
				type: 'file',
				contents: known,
				size: object.size ?? (known === undefined ? undefined : Buffer.byteLength(known)),
			},
			true
		);
		this.cache.touch(path);
	}

	private async fetchField<T>(
		field: MetadataField,
		path: string,
		fromCache: (path: string) => T | undefined,
		fromAdapter: (path: string) => Promise<AdapterResult>,
		pick: (record: ObjectRecord) => T | undefined
	): Promise<T | false> {
		path = normalizePath(path);
		await this.assertPresent(path);

		const cached = fromCache(path);
		if (cached !== undefined) {
			return cached;
		}

		const object = await fromAdapter(path);
		if (!object) {
			return this.failed(field, path);
		}

		const value = pick(this.cache.upsert(path, object, true));
		return value === undefined ? this.failed(field, path) : value;
	}

	private adapterConfig(options: WriteOptions): AdapterConfig {
		return { visibility: options.visibility ?? this.visibility };
	}

	private assertReadable(operation: string, stream: unknown): void {
		if (!(stream instanceof Readable) || !stream.readable) {
			throw new InvalidArgumentError(`${operation} ${ERROR_MESSAGES.INVALID_STREAM}`, operation);
		}
	}

	private assertMetadataFields(fields: string[]): MetadataField[] {
		return fields.map(field => {
			if (!isMetadataField(field)) {
				throw new InvalidArgumentError(`${ERROR_MESSAGES.INVALID_METADATA_FIELD}: ${field}`, 'getWithMetadata');
			}
			return field;
		});
	}

	private failed(operation: string, path: string): false {
		this.logger.warn(`${LOG_PREFIXES.FILESYSTEM} Adapter reported failure`, {
			operation,
			path,
			adapter: this.adapter.getAdapterType(),
		});
		return false;
	}

	private async persist(): Promise<void> {
		if (!this.autosave || !this.cache.hasStore()) {
			return;
		}

		try {
			await this.cache.save();
		} catch (error) {
			// Not rethrown: the adapter change has already been applied
			this.logger.error(`${LOG_PREFIXES.FILESYSTEM} ${ERROR_MESSAGES.CACHE_SAVE_FAILED}`, {
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}
