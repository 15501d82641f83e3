/**
 * Filesystem Configuration Module
 *
 * Zod schemas for the facade configuration: the default visibility of new
 * objects, where the object cache is persisted and whether it is saved after
 * every mutation.
 *
 * @module filesystem/config
 */

import { z } from 'zod';

/**
 * Cache kept in process memory only
 */
const MemoryCacheSchema = z
	.object({
		type: z.literal('memory'),
	})
	.strict();

export type MemoryCacheConfig = z.infer<typeof MemoryCacheSchema>;

/**
 * Cache persisted to a JSON snapshot file
 *
 * @example
 * ```typescript
 * const config: FileCacheConfig = { type: 'file', path: './data/cache.json' };
 * ```
 */
const FileCacheSchema = z
	.object({
		type: z.literal('file'),

		/** Location of the snapshot file; parent directories are created on save */
		path: z.string().min(1).describe('Cache snapshot file path'),
	})
	.strict();

export type FileCacheConfig = z.infer<typeof FileCacheSchema>;

const CacheConfigSchema = z
	.discriminatedUnion('type', [MemoryCacheSchema, FileCacheSchema], {
		errorMap: (issue, ctx) => {
			if (issue.code === z.ZodIssueCode.invalid_union_discriminator) {
				return { message: `Invalid cache type. Expected 'memory' or 'file'.` };
			}
			return { message: ctx.defaultError };
		},
	})
	.describe('Object cache persistence');

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Filesystem Configuration Schema
 *
 * @example
 * ```typescript
 * const config: FilesystemConfig = {
 *   visibility: 'private',
 *   autosave: true,
 *   cache: { type: 'file', path: './data/cache.json' },
 * };
 * ```
 */
export const FilesystemSchema = z
	.object({
		/** Visibility given to new files and directories when the caller passes none */
		visibility: z.enum(['public', 'private']).default('public').describe('Default visibility'),

		/** Persist the cache after every successful mutation */
		autosave: z.boolean().default(false).describe('Save the cache after each mutation'),

		cache: CacheConfigSchema.default({ type: 'memory' }),
	})
	.strict()
	.describe('Filesystem configuration');

/** Configuration as callers write it; omitted fields take their defaults */
export type FilesystemConfig = z.input<typeof FilesystemSchema>;

/** Configuration after validation, with defaults applied */
export type ResolvedFilesystemConfig = z.output<typeof FilesystemSchema>;
