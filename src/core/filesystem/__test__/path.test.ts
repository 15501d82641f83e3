import { describe, it, expect } from 'vitest';
import { ROOT, ancestors, basename, dirname, isDescendant, normalizePath } from '../path.js';
import { InvalidArgumentError } from '../errors.js';

describe('path helpers', () => {
	describe('normalizePath', () => {
		it('strips leading, trailing and duplicate separators', () => {
			expect(normalizePath('/a//b/./c.txt/')).toBe('a/b/c.txt');
		});

		it('resolves parent segments', () => {
			expect(normalizePath('a/b/../c')).toBe('a/c');
			expect(normalizePath('a/..')).toBe(ROOT);
		});

		it('treats backslashes as separators', () => {
			expect(normalizePath('a\\b\\c.txt')).toBe('a/b/c.txt');
		});

		it('maps every spelling of the root to the empty string', () => {
			expect(normalizePath('')).toBe('');
			expect(normalizePath('/')).toBe('');
			expect(normalizePath('./')).toBe('');
		});

		it('rejects paths that climb above the root', () => {
			expect(() => normalizePath('../etc/passwd')).toThrow(InvalidArgumentError);
			expect(() => normalizePath('a/../../b')).toThrow('Path is outside of the defined root: [a/../../b]');
		});
	});

	describe('dirname and basename', () => {
		it('splits nested paths', () => {
			expect(dirname('a/b/c.txt')).toBe('a/b');
			expect(basename('a/b/c.txt')).toBe('c.txt');
		});

		it('uses the root as parent of top-level entries', () => {
			expect(dirname('c.txt')).toBe(ROOT);
			expect(basename('c.txt')).toBe('c.txt');
		});
	});

	describe('isDescendant', () => {
		it('matches paths strictly below a directory', () => {
			expect(isDescendant('a', 'a/b')).toBe(true);
			expect(isDescendant('a', 'a/b/c')).toBe(true);
			expect(isDescendant('a', 'a')).toBe(false);
		});

		it('does not match siblings sharing a prefix', () => {
			expect(isDescendant('a', 'ab/c')).toBe(false);
		});

		it('treats every non-root path as below the root', () => {
			expect(isDescendant(ROOT, 'x')).toBe(true);
			expect(isDescendant(ROOT, ROOT)).toBe(false);
		});
	});

	describe('ancestors', () => {
		it('lists ancestors nearest first, ending with the root', () => {
			expect(ancestors('a/b/c.txt')).toEqual(['a/b', 'a', '']);
			expect(ancestors('c.txt')).toEqual(['']);
			expect(ancestors(ROOT)).toEqual([]);
		});
	});
});
