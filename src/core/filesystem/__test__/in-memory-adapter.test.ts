/**
 * In-Memory Adapter Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Readable } from 'stream';
import { InMemoryAdapter } from '../adapter/in-memory.js';
import { FIXED_TIME } from './recording-adapter.js';

// Mock the logger to reduce noise in tests
vi.mock('../../logger/index.js', () => ({
	createLogger: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

const PUBLIC = { visibility: 'public' } as const;

async function drain(stream: Readable): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(Buffer.from(chunk));
	}
	return Buffer.concat(chunks).toString('utf8');
}

describe('InMemoryAdapter', () => {
	let adapter: InMemoryAdapter;

	beforeEach(() => {
		adapter = new InMemoryAdapter({ now: () => FIXED_TIME });
	});

	describe('Writing', () => {
		it('returns the metadata of a written file', async () => {
			const result = await adapter.write('docs/data.json', '{}', PUBLIC);

			expect(result).toEqual({
				type: 'file',
				path: 'docs/data.json',
				timestamp: FIXED_TIME,
				visibility: 'public',
				size: 2,
				mimetype: 'application/json',
				contents: '{}',
			});
		});

		it('creates missing parent directories', async () => {
			await adapter.write('a/b/c.txt', 'x', { visibility: 'private' });

			expect(await adapter.has('a')).toBe(true);
			expect(await adapter.getMetadata('a/b')).toEqual({
				type: 'dir',
				path: 'a/b',
				timestamp: FIXED_TIME,
				visibility: 'public',
			});
			expect(adapter.getSizeInfo()).toEqual({ files: 1, directories: 2 });
		});

		it('gives implicit directories the configured visibility', async () => {
			const privateDirs = new InMemoryAdapter({ now: () => FIXED_TIME, directoryVisibility: 'private' });
			await privateDirs.write('a/b.txt', 'x', PUBLIC);

			expect(await privateDirs.getVisibility('a')).toEqual({ path: 'a', visibility: 'private' });
		});

		it('refuses to write below a file or over a directory', async () => {
			await adapter.write('a.txt', 'x', PUBLIC);
			await adapter.createDir('d', PUBLIC);

			expect(await adapter.write('a.txt/b.txt', 'y', PUBLIC)).toBe(false);
			expect(await adapter.write('d', 'y', PUBLIC)).toBe(false);
		});

		it('consumes streams and omits the contents from the result', async () => {
			const result = await adapter.writeStream('s.txt', Readable.from(['ab', 'c']), PUBLIC);

			expect(result).toEqual({
				type: 'file',
				path: 's.txt',
				timestamp: FIXED_TIME,
				visibility: 'public',
				size: 3,
				mimetype: 'text/plain',
			});
			expect(await adapter.read('s.txt')).toEqual({ type: 'file', path: 's.txt', contents: 'abc' });
		});

		it('updates existing files only', async () => {
			expect(await adapter.update('missing.txt', 'x')).toBe(false);

			await adapter.write('a.txt', 'old', PUBLIC);
			const result = await adapter.update('a.txt', 'newer');

			expect(result).toMatchObject({ path: 'a.txt', size: 5, contents: 'newer' });
		});
	});

	describe('Reading', () => {
		it('reads contents as a stream', async () => {
			await adapter.write('a.txt', 'streamed', PUBLIC);
			const result = await adapter.readStream('a.txt');

			expect(result).not.toBe(false);
			if (result && result.stream) {
				expect(await drain(result.stream)).toBe('streamed');
			}
		});

		it('does not read directories', async () => {
			await adapter.createDir('d', PUBLIC);
			expect(await adapter.read('d')).toBe(false);
			expect(await adapter.getSize('d')).toBe(false);
		});

		it('reports the directory mimetype for directories', async () => {
			await adapter.createDir('d', PUBLIC);
			expect(await adapter.getMimetype('d')).toEqual({ path: 'd', mimetype: 'directory' });
		});

		it('always has the root', async () => {
			expect(await adapter.has('')).toBe(true);
		});
	});

	describe('Moving and removing', () => {
		it('renames a directory with its whole subtree', async () => {
			await adapter.write('d/a.txt', 'a', PUBLIC);
			await adapter.write('d/e/b.txt', 'b', PUBLIC);

			expect(await adapter.rename('d', 'x')).toBe(true);

			const listing = await adapter.listContents('x', true);
			expect(listing && listing.map(object => object.path)).toEqual(['x/a.txt', 'x/e', 'x/e/b.txt']);
			expect(await adapter.has('d')).toBe(false);
			expect(await adapter.has('d/a.txt')).toBe(false);
		});

		it('refuses to rename onto an existing path or into its own subtree', async () => {
			await adapter.write('a.txt', 'a', PUBLIC);
			await adapter.write('b.txt', 'b', PUBLIC);
			await adapter.createDir('d', PUBLIC);

			expect(await adapter.rename('a.txt', 'b.txt')).toBe(false);
			expect(await adapter.rename('d', 'd/inner')).toBe(false);
			expect(await adapter.rename('missing', 'x')).toBe(false);
		});

		it('copies files but not directories', async () => {
			await adapter.write('a.txt', 'a', PUBLIC);
			await adapter.createDir('d', PUBLIC);

			expect(await adapter.copy('a.txt', 'copies/a.txt')).toBe(true);
			expect(await adapter.read('copies/a.txt')).toEqual({ type: 'file', path: 'copies/a.txt', contents: 'a' });
			expect(await adapter.copy('d', 'e')).toBe(false);
		});

		it('deletes files with delete and directories with deleteDir', async () => {
			await adapter.write('d/a.txt', 'a', PUBLIC);

			expect(await adapter.delete('d')).toBe(false);
			expect(await adapter.deleteDir('d/a.txt')).toBe(false);

			expect(await adapter.deleteDir('d')).toBe(true);
			expect(adapter.getSizeInfo()).toEqual({ files: 0, directories: 0 });
		});
	});

	describe('Directories and listings', () => {
		it('keeps an existing directory on createDir', async () => {
			await adapter.createDir('d', { visibility: 'private' });
			expect(await adapter.createDir('d', PUBLIC)).toEqual({ type: 'dir', path: 'd', visibility: 'private' });
		});

		it('refuses to create a directory over a file', async () => {
			await adapter.write('a.txt', 'a', PUBLIC);
			expect(await adapter.createDir('a.txt', PUBLIC)).toBe(false);
		});

		it('lists direct children only unless recursive', async () => {
			await adapter.write('b.txt', 'b', PUBLIC);
			await adapter.write('a/c.txt', 'c', PUBLIC);

			const shallow = await adapter.listContents('', false);
			const deep = await adapter.listContents('', true);

			expect(shallow && shallow.map(object => object.path)).toEqual(['a', 'b.txt']);
			expect(deep && deep.map(object => object.path)).toEqual(['a', 'a/c.txt', 'b.txt']);
		});

		it('lists a missing directory as empty and a file as a failure', async () => {
			await adapter.write('a.txt', 'a', PUBLIC);

			expect(await adapter.listContents('nowhere', false)).toEqual([]);
			expect(await adapter.listContents('a.txt', false)).toBe(false);
		});
	});

	it('changes visibility of existing objects', async () => {
		await adapter.write('a.txt', 'a', PUBLIC);

		expect(await adapter.setVisibility('a.txt', 'private')).toEqual({ path: 'a.txt', visibility: 'private' });
		expect(await adapter.getVisibility('a.txt')).toEqual({ path: 'a.txt', visibility: 'private' });
		expect(await adapter.setVisibility('missing.txt', 'private')).toBe(false);
	});
});
