/**
 * Object Cache
 *
 * In-memory view of the adapter's namespace. The cache is the only component
 * that decides whether a value is trustworthy: it holds per-path records with
 * partial metadata, tombstones for paths known to be absent and a set of
 * directories whose listings are known to be exhaustive.
 *
 * Every operation here is synchronous. The facade awaits the adapter and then
 * reconciles the result in a single call, so no other operation can observe a
 * half-applied update.
 *
 * @module filesystem/cache/object-cache
 */

import type { ListingMode, ObjectFields, ObjectRecord, Presence } from '../types.js';
import { PRESENCE } from '../types.js';
import type { CacheEntry, CacheSnapshot, CacheStats, CacheStore, KnownEntry } from './types.js';
import { CacheSnapshotSchema } from './types.js';
import { DEFAULTS, ERROR_MESSAGES, LOG_PREFIXES } from '../constants.js';
import { FilesystemError } from '../errors.js';
import { ROOT, ancestors, basename, dirname, isDescendant, normalizePath } from '../path.js';
import { createLogger, type Logger } from '../../logger/index.js';

export interface ObjectCacheOptions {
	/** Where snapshots are loaded from and saved to; omit for a purely in-memory cache */
	store?: CacheStore;
	logger?: Logger;
}

/**
 * Marker taken before a listing is fetched. A listing whose marker is stale
 * was overtaken by a mutation and must not be merged.
 */
export interface ListingGeneration {
	readonly epoch: number;
	readonly generation: number;
}

function createRecord(path: string): ObjectRecord {
	return { path, dirname: dirname(path), basename: basename(path) };
}

function byPath(a: ObjectRecord, b: ObjectRecord): number {
	return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

function mergeFields(record: ObjectRecord, fields: ObjectFields): void {
	if (fields.type !== undefined) record.type = fields.type;
	if (fields.size !== undefined) record.size = fields.size;
	if (fields.mimetype !== undefined) record.mimetype = fields.mimetype;
	if (fields.timestamp !== undefined) record.timestamp = fields.timestamp;
	if (fields.visibility !== undefined) record.visibility = fields.visibility;
	if (fields.contents !== undefined) record.contents = fields.contents;
}

/**
 * Object Cache
 *
 * @example
 * ```typescript
 * const cache = new ObjectCache();
 * cache.upsert('docs/a.txt', { type: 'file', size: 2 }, true);
 * cache.has('docs/a.txt'); // 'present'
 * cache.has('docs/b.txt'); // 'unknown' until 'docs' is listed
 * ```
 */
export class ObjectCache {
	private entries = new Map<string, CacheEntry>();
	private complete = new Map<string, ListingMode>();
	private generations = new Map<string, number>();
	private epoch = 0;
	private readonly store: CacheStore | undefined;
	private readonly logger: Logger;

	private stats: CacheStats = {
		hits: 0,
		misses: 0,
		writeBacks: 0,
		invalidations: 0,
		listingsStored: 0,
	};

	constructor(options: ObjectCacheOptions = {}) {
		this.store = options.store;
		this.logger = options.logger ?? createLogger({ level: process.env.CACHEDFS_LOG_LEVEL || 'info' });
	}

	// Existence

	/**
	 * Three-valued existence check.
	 *
	 * `absent` comes from a tombstone, from an ancestor known to be missing or
	 * a file, or from a complete listing of the parent (or a recursive one of
	 * any further ancestor) that lacks the path.
	 */
	has(path: string): Presence {
		if (path === ROOT) {
			return this.hit(PRESENCE.PRESENT);
		}

		const entry = this.entries.get(path);
		if (entry?.kind === 'missing') {
			return this.hit(PRESENCE.ABSENT);
		}
		if (entry?.kind === 'known' && entry.confirmed) {
			return this.hit(PRESENCE.PRESENT);
		}

		const parents = ancestors(path);
		for (const ancestor of parents) {
			const parent = this.entries.get(ancestor);
			if (parent?.kind === 'missing' || (parent?.kind === 'known' && parent.record.type === 'file')) {
				return this.hit(PRESENCE.ABSENT);
			}
		}

		// A shallow listing covers direct children, a recursive one every depth
		if (parents.some((ancestor, depth) => this.isComplete(ancestor, depth > 0))) {
			return this.hit(PRESENCE.ABSENT);
		}

		this.stats.misses++;
		return PRESENCE.UNKNOWN;
	}

	isComplete(directory: string, recursive: boolean): boolean {
		const mode = this.complete.get(directory);
		if (mode === undefined) {
			return false;
		}
		return recursive ? mode === 'recursive' : true;
	}

	// Write-back

	/**
	 * Merge fields into the record for `path`, creating it when needed.
	 *
	 * Fields left undefined keep their cached value. A change of type starts a
	 * fresh record since nothing known about the old object still applies.
	 *
	 * @param confirmed - the adapter vouched for the path's existence
	 * @returns a copy of the merged record
	 */
	upsert(path: string, fields: ObjectFields, confirmed = false): ObjectRecord {
		const existing = this.entries.get(path);
		let entry: KnownEntry;

		if (
			existing?.kind === 'known' &&
			(fields.type === undefined || existing.record.type === undefined || existing.record.type === fields.type)
		) {
			entry = existing;
			entry.confirmed = entry.confirmed || confirmed;
		} else {
			entry = { kind: 'known', record: createRecord(path), confirmed };
			this.entries.set(path, entry);
		}

		mergeFields(entry.record, fields);
		this.stats.writeBacks++;

		return { ...entry.record };
	}

	/**
	 * Drop fields that a content change made stale, keeping the record itself
	 */
	forgetFields(path: string, fields: ReadonlyArray<keyof ObjectFields>): void {
		const entry = this.entries.get(path);
		if (entry?.kind !== 'known') {
			return;
		}
		for (const field of fields) {
			delete entry.record[field];
		}
	}

	/**
	 * Record every ancestor of `path` as an existing directory.
	 *
	 * Synthesized directories are not marked complete: only their existence is
	 * known, not their children.
	 */
	ensureParentDirectories(path: string): void {
		for (const ancestor of ancestors(path)) {
			if (ancestor === ROOT) {
				break;
			}

			const entry = this.entries.get(ancestor);
			if (entry?.kind === 'known' && entry.record.type !== 'file') {
				entry.record.type = 'dir';
				if (!entry.confirmed) {
					entry.confirmed = true;
					this.invalidate(ancestor);
				}
				continue;
			}

			this.entries.set(ancestor, {
				kind: 'known',
				record: { ...createRecord(ancestor), type: 'dir' },
				confirmed: true,
			});
			this.invalidate(ancestor);
		}
	}

	/**
	 * Forget listing completeness affected by a change at `path`.
	 *
	 * The parent loses completeness in both modes. Further ancestors keep their
	 * shallow listing, which did not change, but lose recursive completeness.
	 */
	invalidate(path: string): void {
		if (path === ROOT) {
			return;
		}

		this.touch(path);
		const parent = dirname(path);
		this.complete.delete(parent);

		for (const ancestor of ancestors(parent)) {
			if (this.complete.get(ancestor) === 'recursive') {
				this.complete.set(ancestor, 'shallow');
			}
		}

		this.stats.invalidations++;
	}

	/**
	 * Mark listings that cover `path` as overtaken without dropping their
	 * completeness. Used for changes that keep the set of children intact.
	 */
	touch(path: string): void {
		if (path === ROOT) {
			return;
		}
		for (const ancestor of ancestors(path)) {
			this.generations.set(ancestor, (this.generations.get(ancestor) ?? 0) + 1);
		}
	}

	/**
	 * Marker to hand back to `storeListing` once the adapter listing arrives
	 */
	getGeneration(directory: string): ListingGeneration {
		return { epoch: this.epoch, generation: this.generations.get(directory) ?? 0 };
	}

	// Removal

	/**
	 * Replace the record for `path` with a tombstone
	 */
	remove(path: string): void {
		this.entries.set(path, { kind: 'missing' });
		this.invalidate(path);
		this.logger.debug(`${LOG_PREFIXES.CACHE} Removed`, { path });
	}

	/**
	 * Drop `directory` and every cached path below it
	 */
	removeDirectoryRecursive(directory: string): void {
		const dropped = this.dropDescendants(directory);
		this.epoch++;

		if (directory === ROOT) {
			this.entries.clear();
			this.complete.clear();
		} else {
			this.entries.set(directory, { kind: 'missing' });
			this.complete.delete(directory);
			this.invalidate(directory);
		}

		this.logger.debug(`${LOG_PREFIXES.CACHE} Removed directory`, { directory, dropped });
	}

	/**
	 * Move the record at `from` to `to`.
	 *
	 * `from` becomes a tombstone. When the moved object may be a directory,
	 * cached descendants of both paths are invalidated rather than rewritten.
	 */
	rename(from: string, to: string): ObjectRecord {
		const existing = this.entries.get(from);
		const record: ObjectRecord = createRecord(to);

		if (existing?.kind === 'known') {
			const { path: _path, dirname: _dirname, basename: _basename, ...fields } = existing.record;
			mergeFields(record, fields);
		}

		if (record.type !== 'file') {
			this.epoch++;
			this.dropDescendants(from);
			this.dropDescendants(to);
			this.complete.delete(from);
			this.complete.delete(to);
		}

		this.entries.set(from, { kind: 'missing' });
		this.entries.set(to, { kind: 'known', record, confirmed: true });
		this.invalidate(from);
		this.invalidate(to);

		this.logger.debug(`${LOG_PREFIXES.CACHE} Renamed`, { from, to, type: record.type });
		return { ...record };
	}

	// Listings

	/**
	 * Merge a full adapter listing and mark the directory complete.
	 *
	 * Records under the directory that the listing no longer contains are
	 * evicted. A recursive listing also completes every listed subdirectory.
	 *
	 * When `since` shows that a mutation under the directory happened while the
	 * listing was fetched, the listing is returned as-is and the cache is left
	 * alone: merging it could resurrect deleted paths or evict new ones.
	 *
	 * @returns the merged listing
	 */
	storeListing(
		directory: string,
		recursive: boolean,
		entries: Array<ObjectFields & { path: string }>,
		since?: ListingGeneration
	): ObjectRecord[] {
		if (since && this.isStale(directory, since)) {
			this.logger.debug(`${LOG_PREFIXES.CACHE} Skipped overtaken listing`, { directory, recursive });
			return entries
				.map(entry => {
					const record = createRecord(normalizePath(entry.path));
					mergeFields(record, entry);
					return record;
				})
				.sort(byPath);
		}

		const listed = new Set<string>();
		const subdirectories: string[] = [];

		for (const entry of entries) {
			const path = normalizePath(entry.path);
			listed.add(path);
			this.upsert(path, entry, true);
			if (recursive && entry.type === 'dir') {
				subdirectories.push(path);
			}
		}

		for (const [path, entry] of [...this.entries]) {
			if (entry.kind === 'known' && this.inScope(directory, path, recursive) && !listed.has(path)) {
				this.entries.delete(path);
			}
		}

		if (recursive) {
			this.complete.set(directory, 'recursive');
			for (const subdirectory of subdirectories) {
				this.complete.set(subdirectory, 'recursive');
			}
		} else if (!this.isComplete(directory, false)) {
			this.complete.set(directory, 'shallow');
		}

		this.stats.listingsStored++;
		this.logger.debug(`${LOG_PREFIXES.CACHE} Stored listing`, {
			directory,
			recursive,
			entries: entries.length,
		});

		return this.listing(directory, recursive);
	}

	/**
	 * Cached records below `directory`, sorted by path.
	 *
	 * Only authoritative after `isComplete(directory, recursive)` returned true.
	 */
	listing(directory: string, recursive: boolean): ObjectRecord[] {
		const result: ObjectRecord[] = [];
		for (const [path, entry] of this.entries) {
			if (entry.kind === 'known' && entry.confirmed && this.inScope(directory, path, recursive)) {
				result.push({ ...entry.record });
			}
		}
		return result.sort(byPath);
	}

	// Derived getters: a miss is `undefined`, never an adapter call

	/**
	 * Copy of whatever is cached for `path`, without touching the stats
	 */
	peek(path: string): ObjectRecord | undefined {
		const entry = this.entries.get(path);
		return entry?.kind === 'known' ? { ...entry.record } : undefined;
	}


	read(path: string): string | undefined {
		return this.field(path, record => record.contents);
	}

	getMimetype(path: string): string | undefined {
		return this.field(path, record => record.mimetype);
	}

	getTimestamp(path: string): number | undefined {
		return this.field(path, record => record.timestamp);
	}

	getVisibility(path: string): ObjectRecord['visibility'] {
		return this.field(path, record => record.visibility);
	}

	getSize(path: string): number | undefined {
		return this.field(path, record =>
			record.size ?? (record.contents !== undefined ? Buffer.byteLength(record.contents) : undefined)
		);
	}

	/**
	 * The full record, once its type is known
	 */
	getMetadata(path: string): ObjectRecord | undefined {
		return this.field(path, record => (record.type !== undefined ? { ...record } : undefined));
	}

	// Lifecycle

	flush(): void {
		this.entries.clear();
		this.complete.clear();
		this.epoch++;
		this.logger.debug(`${LOG_PREFIXES.CACHE} Flushed`);
	}

	/**
	 * Replace the cache state with the stored snapshot, if any
	 */
	async load(): Promise<boolean> {
		if (!this.store) {
			return false;
		}

		const snapshot = await this.store.load();
		if (!snapshot) {
			return false;
		}

		this.restore(snapshot);
		this.logger.info(`${LOG_PREFIXES.CACHE} Loaded snapshot`, {
			store: this.store.getStoreType(),
			entries: this.entries.size,
			completeDirectories: this.complete.size,
		});
		return true;
	}

	async save(): Promise<void> {
		if (!this.store) {
			return;
		}

		await this.store.save(this.toSnapshot());
		this.logger.debug(`${LOG_PREFIXES.CACHE} Saved snapshot`, {
			store: this.store.getStoreType(),
			entries: this.entries.size,
		});
	}

	hasStore(): boolean {
		return this.store !== undefined;
	}

	toSnapshot(): CacheSnapshot {
		return {
			version: DEFAULTS.SNAPSHOT_VERSION,
			entries: [...this.entries].map(([path, entry]): [string, CacheEntry] => [
				path,
				entry.kind === 'known'
					? { kind: 'known', record: { ...entry.record }, confirmed: entry.confirmed }
					: { kind: 'missing' },
			]),
			complete: [...this.complete],
		};
	}

	/**
	 * @throws {FilesystemError} when the snapshot does not match the schema
	 */
	restore(snapshot: CacheSnapshot): void {
		const parsed = CacheSnapshotSchema.safeParse(snapshot);
		if (!parsed.success) {
			throw new FilesystemError(
				`${ERROR_MESSAGES.CACHE_LOAD_FAILED}: ${parsed.error.errors
					.map(e => `${e.path.join('.')}: ${e.message}`)
					.join(', ')}`,
				'restore'
			);
		}

		this.entries = new Map(parsed.data.entries);
		this.complete = new Map(parsed.data.complete);
		this.epoch++;
	}

	// Additional utility methods

	getStats(): Readonly<CacheStats> {
		return { ...this.stats };
	}

	getSize(): { entries: number; tombstones: number; completeDirectories: number } {
		let tombstones = 0;
		for (const entry of this.entries.values()) {
			if (entry.kind === 'missing') tombstones++;
		}
		return {
			entries: this.entries.size - tombstones,
			tombstones,
			completeDirectories: this.complete.size,
		};
	}

	// Helper Methods

	private hit(presence: Presence): Presence {
		this.stats.hits++;
		return presence;
	}

	private field<T>(path: string, pick: (record: ObjectRecord) => T | undefined): T | undefined {
		const entry = this.entries.get(path);
		const value = entry?.kind === 'known' ? pick(entry.record) : undefined;

		if (value === undefined) {
			this.stats.misses++;
		} else {
			this.stats.hits++;
		}
		return value;
	}

	private isStale(directory: string, since: ListingGeneration): boolean {
		const current = this.getGeneration(directory);
		return current.epoch !== since.epoch || current.generation !== since.generation;
	}

	private inScope(directory: string, path: string, recursive: boolean): boolean {
		return isDescendant(directory, path) && (recursive || dirname(path) === directory);
	}

	private dropDescendants(directory: string): number {
		let dropped = 0;
		for (const path of [...this.entries.keys()]) {
			if (isDescendant(directory, path)) {
				this.entries.delete(path);
				dropped++;
			}
		}
		for (const path of [...this.complete.keys()]) {
			if (isDescendant(directory, path)) {
				this.complete.delete(path);
			}
		}
		return dropped;
	}
}
