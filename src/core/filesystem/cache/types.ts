/**
 * Object Cache Types
 *
 * @module filesystem/cache/types
 */

import { z } from 'zod';
import { DEFAULTS } from '../constants.js';

const ObjectRecordSchema = z.object({
	path: z.string(),
	dirname: z.string(),
	basename: z.string(),
	type: z.enum(['file', 'dir']).optional(),
	size: z.number().int().nonnegative().optional(),
	mimetype: z.string().optional(),
	timestamp: z.number().optional(),
	visibility: z.enum(['public', 'private']).optional(),
	contents: z.string().optional(),
});

const CacheEntrySchema = z.discriminatedUnion('kind', [
	z.object({
		kind: z.literal('known'),
		record: ObjectRecordSchema,
		/** Existence was confirmed by the adapter or implied by a child */
		confirmed: z.boolean(),
	}),
	/** Tombstone: the path is known not to exist */
	z.object({ kind: z.literal('missing') }),
]);

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

export type KnownEntry = Extract<CacheEntry, { kind: 'known' }>;

/**
 * Serialized form of the cache, written by cache stores
 */
export const CacheSnapshotSchema = z
	.object({
		version: z.literal(DEFAULTS.SNAPSHOT_VERSION),
		entries: z.array(z.tuple([z.string(), CacheEntrySchema])),
		complete: z.array(z.tuple([z.string(), z.enum(['shallow', 'recursive'])])),
	})
	.strict();

export type CacheSnapshot = z.infer<typeof CacheSnapshotSchema>;

export interface CacheStats {
	hits: number;
	misses: number;
	writeBacks: number;
	invalidations: number;
	listingsStored: number;
}

/**
 * Persistence for cache snapshots
 */
export interface CacheStore {
	getStoreType(): string;

	/**
	 * Resolves to `undefined` when nothing was stored yet
	 */
	load(): Promise<CacheSnapshot | undefined>;

	save(snapshot: CacheSnapshot): Promise<void>;
}
