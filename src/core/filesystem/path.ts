/**
 * Path helpers
 *
 * All paths inside the filesystem are relative to the adapter root, use `/`
 * as separator and carry neither a leading nor a trailing slash. The root
 * itself is the empty string.
 *
 * @module filesystem/path
 */

import { InvalidArgumentError } from './errors.js';
import { ERROR_MESSAGES } from './constants.js';

export const ROOT = '';

/**
 * Normalize a caller supplied path.
 *
 * @throws {InvalidArgumentError} when `..` segments climb above the root
 *
 * @example
 * ```typescript
 * normalizePath('/a//b/./c.txt/'); // 'a/b/c.txt'
 * normalizePath('a/b/../c');       // 'a/c'
 * ```
 */
export function normalizePath(path: string): string {
	const segments: string[] = [];

	for (const segment of path.replace(/\\/g, '/').split('/')) {
		if (segment === '' || segment === '.') {
			continue;
		}
		if (segment === '..') {
			if (segments.length === 0) {
				throw new InvalidArgumentError(`${ERROR_MESSAGES.PATH_OUTSIDE_ROOT}: [${path}]`, 'normalize');
			}
			segments.pop();
			continue;
		}
		segments.push(segment);
	}

	return segments.join('/');
}

/**
 * Parent directory of a normalized path; the parent of a top-level entry is the root
 */
export function dirname(path: string): string {
	const index = path.lastIndexOf('/');
	return index === -1 ? ROOT : path.slice(0, index);
}

export function basename(path: string): string {
	return path.slice(path.lastIndexOf('/') + 1);
}

/**
 * Whether `path` lies strictly below `directory` (at any depth)
 */
export function isDescendant(directory: string, path: string): boolean {
	if (path === directory) {
		return false;
	}
	return directory === ROOT ? path !== ROOT : path.startsWith(`${directory}/`);
}

/**
 * Every ancestor of `path`, nearest first, ending with the root
 *
 * @example
 * ```typescript
 * ancestors('a/b/c.txt'); // ['a/b', 'a', '']
 * ```
 */
export function ancestors(path: string): string[] {
	const result: string[] = [];
	let current = path;
	while (current !== ROOT) {
		current = dirname(current);
		result.push(current);
	}
	return result;
}
