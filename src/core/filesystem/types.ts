/**
 * Filesystem Types
 *
 * Shared data model for the facade, the object cache and the adapters.
 *
 * @module filesystem/types
 */

import type { Readable } from 'stream';

export type ObjectType = 'file' | 'dir';

export type Visibility = 'public' | 'private';

/**
 * Known state of one path.
 *
 * Every field except `path` may be missing: the cache accumulates fields
 * from several adapter calls and merges them per field.
 */
export interface ObjectRecord {
	path: string;
	dirname: string;
	basename: string;
	type?: ObjectType;
	size?: number;
	mimetype?: string;
	/** Unix timestamp in seconds */
	timestamp?: number;
	visibility?: Visibility;
	contents?: string;
}

/**
 * Fields an adapter or a caller may merge into a record
 */
export type ObjectFields = Partial<Omit<ObjectRecord, 'path' | 'dirname' | 'basename'>>;

/**
 * Descriptor returned by a successful adapter call
 */
export interface AdapterObject extends ObjectFields {
	path: string;
	type?: ObjectType;
	stream?: Readable;
}

/**
 * Three-valued answer of the cache to an existence query
 */
export const PRESENCE = {
	PRESENT: 'present',
	ABSENT: 'absent',
	UNKNOWN: 'unknown',
} as const;

export type Presence = (typeof PRESENCE)[keyof typeof PRESENCE];

export type ListingMode = 'shallow' | 'recursive';

/**
 * Metadata fields that `getWithMetadata` and `listWith` can fetch
 */
export const METADATA_FIELDS = ['mimetype', 'timestamp', 'visibility', 'size'] as const;

export type MetadataField = (typeof METADATA_FIELDS)[number];

export interface WriteOptions {
	visibility?: Visibility;
}

export type HandlerKind = ObjectType;
