/**
 * Adapter Interface
 *
 * Defines the contract every storage provider implements. The filesystem
 * facade never touches storage directly; it calls these methods and merges
 * what they return into its object cache.
 *
 * A method either resolves to a descriptor of the object it touched or to
 * `false` when the operation did not happen. Adapters should not throw for
 * ordinary failures such as a missing path.
 *
 * @module filesystem/adapter/types
 */

import type { Readable } from 'stream';
import type { AdapterObject, Visibility } from '../types.js';

/**
 * Options passed to operations that create objects
 */
export interface AdapterConfig {
	visibility: Visibility;
}

export type AdapterResult = AdapterObject | false;

/**
 * Adapter Interface
 *
 * @example
 * ```typescript
 * class S3Adapter implements Adapter {
 *   async read(path: string): Promise<AdapterResult> {
 *     const body = await this.fetchObject(path);
 *     return body === undefined ? false : { type: 'file', path, contents: body };
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Adapter {
	/**
	 * Identifier of the storage provider, used in logs
	 */
	getAdapterType(): string;

	/**
	 * Check whether a path exists.
	 *
	 * May resolve to a descriptor when the provider learns metadata for free.
	 */
	has(path: string): Promise<AdapterObject | boolean>;

	/**
	 * Create a new file. Resolves to `false` when the file could not be written.
	 */
	write(path: string, contents: string, config: AdapterConfig): Promise<AdapterResult>;

	writeStream(path: string, stream: Readable, config: AdapterConfig): Promise<AdapterResult>;

	/**
	 * Replace the contents of an existing file
	 */
	update(path: string, contents: string): Promise<AdapterResult>;

	updateStream(path: string, stream: Readable): Promise<AdapterResult>;

	/**
	 * Read a file. The descriptor carries `contents`.
	 */
	read(path: string): Promise<AdapterResult>;

	/**
	 * Open a file for reading. The descriptor carries `stream`.
	 */
	readStream(path: string): Promise<AdapterResult>;

	rename(path: string, newpath: string): Promise<boolean>;

	copy(path: string, newpath: string): Promise<boolean>;

	/**
	 * Delete a file
	 */
	delete(path: string): Promise<boolean>;

	/**
	 * Delete a directory and everything below it
	 */
	deleteDir(dirname: string): Promise<boolean>;

	createDir(dirname: string, config: AdapterConfig): Promise<AdapterResult>;

	/**
	 * List the entries below a directory.
	 *
	 * Must return a full snapshot: the cache marks the directory complete
	 * after merging it. Resolves to `false` when the listing failed.
	 */
	listContents(directory: string, recursive: boolean): Promise<AdapterObject[] | false>;

	getMetadata(path: string): Promise<AdapterResult>;

	getMimetype(path: string): Promise<AdapterResult>;

	getTimestamp(path: string): Promise<AdapterResult>;

	getVisibility(path: string): Promise<AdapterResult>;

	getSize(path: string): Promise<AdapterResult>;

	setVisibility(path: string, visibility: Visibility): Promise<AdapterResult>;
}
