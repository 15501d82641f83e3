/**
 * In-Memory Adapter Implementation
 *
 * Map-backed storage provider and the factory's default adapter. All data is
 * lost when the process exits.
 *
 * @module filesystem/adapter/in-memory
 */

import { Readable } from 'stream';
import mime from 'mime-types';
import type { Adapter, AdapterConfig, AdapterResult } from './types.js';
import type { AdapterObject, Visibility } from '../types.js';
import { ADAPTER_TYPES, DEFAULTS, LOG_PREFIXES } from '../constants.js';
import { ROOT, ancestors, dirname, isDescendant } from '../path.js';
import { createLogger, type Logger } from '../../logger/index.js';

interface FileNode {
	type: 'file';
	contents: string;
	timestamp: number;
	visibility: Visibility;
}

interface DirectoryNode {
	type: 'dir';
	timestamp: number;
	visibility: Visibility;
}

type StorageNode = FileNode | DirectoryNode;

export interface InMemoryAdapterOptions {
	/** Clock returning unix seconds; defaults to the system clock */
	now?: () => number;
	/** Visibility given to directories created implicitly by a write */
	directoryVisibility?: Visibility;
	logger?: Logger;
}

/**
 * In-Memory Storage Adapter
 *
 * Directories are stored as explicit nodes. Writing a file creates its
 * missing parent directories.
 *
 * @example
 * ```typescript
 * const adapter = new InMemoryAdapter();
 * await adapter.write('docs/readme.md', '# Hello', { visibility: 'public' });
 * const listing = await adapter.listContents('docs', false);
 * ```
 */
export class InMemoryAdapter implements Adapter {
	private nodes = new Map<string, StorageNode>();
	private readonly now: () => number;
	private readonly directoryVisibility: Visibility;
	private readonly logger: Logger;

	constructor(options: InMemoryAdapterOptions = {}) {
		this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
		this.directoryVisibility = options.directoryVisibility ?? DEFAULTS.VISIBILITY;
		this.logger = options.logger ?? createLogger({ level: process.env.CACHEDFS_LOG_LEVEL || 'info' });
	}

	getAdapterType(): string {
		return ADAPTER_TYPES.IN_MEMORY;
	}

	async has(path: string): Promise<boolean> {
		return path === ROOT || this.nodes.has(path);
	}

	async write(path: string, contents: string, config: AdapterConfig): Promise<AdapterResult> {
		if (!this.prepareParents(path) || this.nodes.get(path)?.type === 'dir') {
			this.logger.debug(`${LOG_PREFIXES.ADAPTER} Write rejected`, { path });
			return false;
		}

		const node: FileNode = {
			type: 'file',
			contents,
			timestamp: this.now(),
			visibility: config.visibility,
		};
		this.nodes.set(path, node);

		return { ...this.describe(path, node), contents };
	}

	async writeStream(path: string, stream: Readable, config: AdapterConfig): Promise<AdapterResult> {
		const contents = await this.consume(path, stream);
		if (contents === false) {
			return false;
		}

		const result = await this.write(path, contents, config);
		return result && this.withoutContents(result);
	}

	async update(path: string, contents: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		if (node?.type !== 'file') {
			return false;
		}

		node.contents = contents;
		node.timestamp = this.now();

		return { ...this.describe(path, node), contents };
	}

	async updateStream(path: string, stream: Readable): Promise<AdapterResult> {
		const contents = await this.consume(path, stream);
		if (contents === false) {
			return false;
		}

		const result = await this.update(path, contents);
		return result && this.withoutContents(result);
	}

	async read(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		if (node?.type !== 'file') {
			return false;
		}

		return { type: 'file', path, contents: node.contents };
	}

	async readStream(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		if (node?.type !== 'file') {
			return false;
		}

		return { type: 'file', path, stream: Readable.from([Buffer.from(node.contents)]) };
	}

	async rename(path: string, newpath: string): Promise<boolean> {
		const node = this.nodes.get(path);
		if (!node || this.nodes.has(newpath) || isDescendant(path, newpath) || !this.prepareParents(newpath)) {
			return false;
		}

		const moved: Array<[string, StorageNode]> = [[newpath, node]];
		for (const [key, value] of this.nodes) {
			if (isDescendant(path, key)) {
				moved.push([newpath + key.slice(path.length), value]);
			}
		}

		this.removeTree(path);
		for (const [key, value] of moved) {
			this.nodes.set(key, value);
		}

		this.logger.debug(`${LOG_PREFIXES.ADAPTER} Renamed`, { path, newpath, entries: moved.length });
		return true;
	}

	async copy(path: string, newpath: string): Promise<boolean> {
		const node = this.nodes.get(path);
		if (node?.type !== 'file' || this.nodes.has(newpath) || !this.prepareParents(newpath)) {
			return false;
		}

		this.nodes.set(newpath, { ...node, timestamp: this.now() });
		return true;
	}

	async delete(path: string): Promise<boolean> {
		if (this.nodes.get(path)?.type !== 'file') {
			return false;
		}

		return this.nodes.delete(path);
	}

	async deleteDir(dirname: string): Promise<boolean> {
		if (this.nodes.get(dirname)?.type !== 'dir') {
			return false;
		}

		const removed = this.removeTree(dirname);
		this.logger.debug(`${LOG_PREFIXES.ADAPTER} Directory deleted`, { dirname, removed });
		return true;
	}

	async createDir(dirname: string, config: AdapterConfig): Promise<AdapterResult> {
		const existing = this.nodes.get(dirname);
		if (existing?.type === 'file' || !this.prepareParents(dirname)) {
			return false;
		}

		const node: DirectoryNode = existing ?? {
			type: 'dir',
			timestamp: this.now(),
			visibility: config.visibility,
		};
		this.nodes.set(dirname, node);

		return { type: 'dir', path: dirname, visibility: node.visibility };
	}

	async listContents(directory: string, recursive: boolean): Promise<AdapterObject[] | false> {
		if (this.nodes.get(directory)?.type === 'file') {
			return false;
		}

		const entries: AdapterObject[] = [];
		for (const [path, node] of this.nodes) {
			if (!isDescendant(directory, path)) {
				continue;
			}
			if (!recursive && dirname(path) !== directory) {
				continue;
			}
			entries.push(this.describe(path, node));
		}

		entries.sort((a, b) => a.path.localeCompare(b.path));
		return entries;
	}

	async getMetadata(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		return node ? this.describe(path, node) : false;
	}

	async getMimetype(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		if (!node) {
			return false;
		}

		return { path, mimetype: this.guessMimetype(path, node) };
	}

	async getTimestamp(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		return node ? { path, timestamp: node.timestamp } : false;
	}

	async getVisibility(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		return node ? { path, visibility: node.visibility } : false;
	}

	async getSize(path: string): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		if (node?.type !== 'file') {
			return false;
		}

		return { path, size: Buffer.byteLength(node.contents) };
	}

	async setVisibility(path: string, visibility: Visibility): Promise<AdapterResult> {
		const node = this.nodes.get(path);
		if (!node) {
			return false;
		}

		node.visibility = visibility;
		return { path, visibility };
	}

	// Helper Methods

	/**
	 * Number of stored nodes, directories included
	 */
	getSizeInfo(): { files: number; directories: number } {
		let files = 0;
		for (const node of this.nodes.values()) {
			if (node.type === 'file') files++;
		}
		return { files, directories: this.nodes.size - files };
	}

	/**
	 * Create missing parent directories. Fails when an ancestor is a file.
	 */
	private prepareParents(path: string): boolean {
		if (path === ROOT) {
			return false;
		}

		const parents = ancestors(path).filter(parent => parent !== ROOT);
		if (parents.some(parent => this.nodes.get(parent)?.type === 'file')) {
			return false;
		}

		for (const parent of parents) {
			if (!this.nodes.has(parent)) {
				this.nodes.set(parent, {
					type: 'dir',
					timestamp: this.now(),
					visibility: this.directoryVisibility,
				});
			}
		}
		return true;
	}

	private removeTree(path: string): number {
		let removed = this.nodes.delete(path) ? 1 : 0;
		for (const key of [...this.nodes.keys()]) {
			if (isDescendant(path, key)) {
				this.nodes.delete(key);
				removed++;
			}
		}
		return removed;
	}

	private describe(path: string, node: StorageNode): AdapterObject {
		if (node.type === 'dir') {
			return { type: 'dir', path, timestamp: node.timestamp, visibility: node.visibility };
		}

		return {
			type: 'file',
			path,
			timestamp: node.timestamp,
			visibility: node.visibility,
			size: Buffer.byteLength(node.contents),
			mimetype: this.guessMimetype(path, node),
		};
	}

	private guessMimetype(path: string, node: StorageNode): string {
		if (node.type === 'dir') {
			return DEFAULTS.DIRECTORY_MIMETYPE;
		}
		return mime.lookup(path) || DEFAULTS.MIMETYPE;
	}

	private withoutContents(object: AdapterObject): AdapterObject {
		const { contents: _contents, ...rest } = object;
		return rest;
	}

	private async consume(path: string, stream: Readable): Promise<string | false> {
		const chunks: Buffer[] = [];
		try {
			for await (const chunk of stream) {
				chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
			}
		} catch (error) {
			this.logger.warn(`${LOG_PREFIXES.ADAPTER} Failed to consume stream`, {
				path,
				error: error instanceof Error ? error.message : String(error),
			});
			return false;
		}
		return Buffer.concat(chunks).toString('utf8');
	}
}
