/**
 * File and directory handles
 *
 * Thin objects bound to one path and one facade. Every call delegates back
 * into the facade, so handles share its cache and its preconditions.
 *
 * @module filesystem/handler
 */

import type { Readable } from 'stream';
import type { Filesystem } from './filesystem.js';
import { normalizePath } from './path.js';
import type { HandlerKind, ObjectRecord, Visibility, WriteOptions } from './types.js';

export abstract class Handler {
	constructor(
		protected readonly filesystem: Filesystem,
		protected path: string
	) {}

	abstract readonly kind: HandlerKind;

	getPath(): string {
		return this.path;
	}

	getFilesystem(): Filesystem {
		return this.filesystem;
	}

	isFile(): boolean {
		return this.kind === 'file';
	}

	isDir(): boolean {
		return this.kind === 'dir';
	}

	getTimestamp(): Promise<number | false> {
		return this.filesystem.getTimestamp(this.path);
	}

	getVisibility(): Promise<Visibility | false> {
		return this.filesystem.getVisibility(this.path);
	}

	getMetadata(): Promise<ObjectRecord | false> {
		return this.filesystem.getMetadata(this.path);
	}
}

export class File extends Handler {
	readonly kind = 'file';

	exists(): Promise<boolean> {
		return this.filesystem.has(this.path);
	}

	read(): Promise<string | false> {
		return this.filesystem.read(this.path);
	}

	readStream(): Promise<Readable | false> {
		return this.filesystem.readStream(this.path);
	}

	write(contents: string, options?: WriteOptions): Promise<boolean> {
		return this.filesystem.write(this.path, contents, options);
	}

	writeStream(stream: Readable, options?: WriteOptions): Promise<boolean> {
		return this.filesystem.writeStream(this.path, stream, options);
	}

	update(contents: string): Promise<boolean> {
		return this.filesystem.update(this.path, contents);
	}

	updateStream(stream: Readable): Promise<boolean> {
		return this.filesystem.updateStream(this.path, stream);
	}

	put(contents: string, options?: WriteOptions): Promise<boolean> {
		return this.filesystem.put(this.path, contents, options);
	}

	putStream(stream: Readable, options?: WriteOptions): Promise<boolean> {
		return this.filesystem.putStream(this.path, stream, options);
	}

	/**
	 * Rename the file; on success the handle follows it to the new path
	 */
	async rename(newpath: string): Promise<boolean> {
		const renamed = await this.filesystem.rename(this.path, newpath);
		if (renamed) {
			this.path = normalizePath(newpath);
		}
		return renamed;
	}

	/**
	 * Copy the file and return a handle to the copy
	 */
	async copy(newpath: string): Promise<File | false> {
		const copied = await this.filesystem.copy(this.path, newpath);
		return copied ? new File(this.filesystem, normalizePath(newpath)) : false;
	}

	delete(): Promise<boolean> {
		return this.filesystem.delete(this.path);
	}

	getMimetype(): Promise<string | false> {
		return this.filesystem.getMimetype(this.path);
	}

	getSize(): Promise<number | false> {
		return this.filesystem.getSize(this.path);
	}
}

export class Directory extends Handler {
	readonly kind = 'dir';

	delete(): Promise<boolean> {
		return this.filesystem.deleteDir(this.path);
	}

	getContents(recursive = false): Promise<ObjectRecord[] | false> {
		return this.filesystem.listContents(this.path, recursive);
	}
}
