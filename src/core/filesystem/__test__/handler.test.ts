/**
 * File and Directory Handle Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Readable } from 'stream';
import { Filesystem } from '../filesystem.js';
import { Directory, File } from '../handler.js';
import { FIXED_TIME, RecordingAdapter } from './recording-adapter.js';

// Mock the logger to reduce noise in tests
vi.mock('../../logger/index.js', () => ({
	createLogger: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

describe('Handles', () => {
	let adapter: RecordingAdapter;
	let filesystem: Filesystem;

	beforeEach(() => {
		adapter = new RecordingAdapter();
		filesystem = new Filesystem(adapter);
	});

	describe('File', () => {
		it('writes and reads through the facade cache', async () => {
			const file = await filesystem.resolve('notes/today.md', 'file');

			expect(file.isFile()).toBe(true);
			expect(file.isDir()).toBe(false);
			expect(await file.exists()).toBe(false);
			expect(await file.write('- ship it')).toBe(true);
			adapter.reset();

			expect(await file.exists()).toBe(true);
			expect(await file.read()).toBe('- ship it');
			expect(await file.getSize()).toBe(9);
			expect(await file.getTimestamp()).toBe(FIXED_TIME);
			expect(adapter.calls).toEqual([]);
		});

		it('follows the file when it is renamed', async () => {
			const file = new File(filesystem, 'a.txt');
			await file.put('hello');

			expect(await file.rename('/archive/a.txt')).toBe(true);
			expect(file.getPath()).toBe('archive/a.txt');
			expect(await file.read()).toBe('hello');
		});

		it('returns a handle to a copy', async () => {
			const file = new File(filesystem, 'a.txt');
			await file.write('hello');

			const copy = await file.copy('b.txt');

			expect(copy).toBeInstanceOf(File);
			expect(copy && copy.getPath()).toBe('b.txt');
			expect(copy && (await copy.read())).toBe('hello');
		});

		it('updates, streams and deletes', async () => {
			const file = new File(filesystem, 's.txt');
			await file.writeStream(Readable.from(['one']));
			await file.updateStream(Readable.from(['two']));
			await file.putStream(Readable.from(['three']));

			expect(await file.read()).toBe('three');
			expect(await file.getMimetype()).toBe('text/plain');
			expect(await file.readStream()).toBeInstanceOf(Readable);

			await file.update('four');
			expect(await file.read()).toBe('four');

			expect(await file.delete()).toBe(true);
			expect(await file.exists()).toBe(false);
		});

		it('reports its metadata and visibility', async () => {
			const file = new File(filesystem, 'a.txt');
			await file.write('x', { visibility: 'private' });

			expect(await file.getVisibility()).toBe('private');
			expect(await file.getMetadata()).toMatchObject({ path: 'a.txt', type: 'file', visibility: 'private' });
			expect(file.getFilesystem()).toBe(filesystem);
		});
	});

	describe('Directory', () => {
		it('lists its contents and deletes itself', async () => {
			await filesystem.write('d/a.txt', 'a');
			await filesystem.write('d/e/b.txt', 'b');
			const directory = await filesystem.resolve('d');

			expect(directory).toBeInstanceOf(Directory);
			if (!(directory instanceof Directory)) return;

			expect(directory.isDir()).toBe(true);
			const shallow = await directory.getContents();
			const deep = await directory.getContents(true);
			expect(shallow && shallow.map(object => object.path)).toEqual(['d/a.txt', 'd/e']);
			expect(deep && deep.map(object => object.path)).toEqual(['d/a.txt', 'd/e', 'd/e/b.txt']);

			expect(await directory.delete()).toBe(true);
			expect(await filesystem.has('d/a.txt')).toBe(false);
		});
	});
});
