/**
 * Cache Store Tests
 *
 * File-backed snapshots live in a scratch directory under the OS temp dir.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileCacheStore, MemoryCacheStore } from '../cache/store.js';
import type { CacheSnapshot } from '../cache/types.js';
import { CachePersistenceError } from '../errors.js';

// Mock the logger to reduce noise in tests
vi.mock('../../logger/index.js', () => ({
	createLogger: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

const snapshot: CacheSnapshot = {
	version: 1,
	entries: [
		[
			'docs/a.txt',
			{
				kind: 'known',
				record: { path: 'docs/a.txt', dirname: 'docs', basename: 'a.txt', type: 'file', size: 4 },
				confirmed: true,
			},
		],
		['docs/gone.txt', { kind: 'missing' }],
	],
	complete: [['docs', 'shallow']],
};

describe('MemoryCacheStore', () => {
	it('loads nothing before the first save', async () => {
		const store = new MemoryCacheStore();
		expect(await store.load()).toBeUndefined();
		expect(store.getStoreType()).toBe('memory');
	});

	it('returns what was saved', async () => {
		const store = new MemoryCacheStore();
		await store.save(snapshot);
		expect(await store.load()).toEqual(snapshot);
	});
});

describe('FileCacheStore', () => {
	let directory: string;
	let filePath: string;

	beforeEach(async () => {
		directory = await fs.mkdtemp(path.join(os.tmpdir(), 'cachedfs-store-'));
		filePath = path.join(directory, 'nested', 'cache.json');
	});

	afterEach(async () => {
		await fs.rm(directory, { recursive: true, force: true });
	});

	it('treats a missing file as no snapshot', async () => {
		const store = new FileCacheStore(filePath);
		expect(await store.load()).toBeUndefined();
	});

	it('creates parent directories and round-trips the snapshot', async () => {
		const store = new FileCacheStore(filePath);
		await store.save(snapshot);

		expect(await store.load()).toEqual(snapshot);
		expect(JSON.parse(await fs.readFile(filePath, 'utf8'))).toEqual(snapshot);
	});

	it('leaves no temporary file behind', async () => {
		const store = new FileCacheStore(filePath);
		await store.save(snapshot);

		expect(await fs.readdir(path.dirname(filePath))).toEqual(['cache.json']);
	});

	it('ignores a file that is not JSON', async () => {
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, '{not json', 'utf8');

		expect(await new FileCacheStore(filePath).load()).toBeUndefined();
	});

	it('ignores a snapshot of another version', async () => {
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, JSON.stringify({ ...snapshot, version: 2 }), 'utf8');

		expect(await new FileCacheStore(filePath).load()).toBeUndefined();
	});

	it('fails to load when the path is a directory', async () => {
		await fs.mkdir(filePath, { recursive: true });

		await expect(new FileCacheStore(filePath).load()).rejects.toThrow(CachePersistenceError);
	});

	it('fails to save below a regular file', async () => {
		const blocker = path.join(directory, 'blocker');
		await fs.writeFile(blocker, 'x', 'utf8');
		const store = new FileCacheStore(path.join(blocker, 'cache.json'));

		await expect(store.save(snapshot)).rejects.toThrow('Failed to persist cache snapshot');
	});

	it('removes the temporary file when the final rename fails', async () => {
		await fs.mkdir(filePath, { recursive: true });
		const store = new FileCacheStore(filePath);

		await expect(store.save(snapshot)).rejects.toThrow(CachePersistenceError);
		expect(await fs.readdir(path.dirname(filePath))).toEqual(['cache.json']);
	});
});
