/**
 * Plugin Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Filesystem } from '../filesystem.js';
import { InMemoryAdapter } from '../adapter/in-memory.js';
import { EmptyDirPlugin, ListFilesPlugin, PluginRegistry } from '../plugins/index.js';
import type { FilesystemPlugin } from '../plugins/index.js';
import { InvalidArgumentError, PluginNotFoundError } from '../errors.js';

// Mock the logger to reduce noise in tests
vi.mock('../../logger/index.js', () => ({
	createLogger: () => ({
		info: vi.fn(),
		debug: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	}),
}));

function pluginNamed(method: string): FilesystemPlugin<string> {
	return {
		method,
		handle: async () => method,
	};
}

describe('PluginRegistry', () => {
	let registry: PluginRegistry;

	beforeEach(() => {
		registry = new PluginRegistry();
	});

	it('finds plugins by their exact method name', () => {
		const plugin = pluginNamed('countLines');
		registry.register(plugin);

		expect(registry.find('countLines')).toBe(plugin);
		expect(registry.has('countlines')).toBe(false);
		expect(registry.getMethods()).toEqual(['countLines']);
	});

	it('rejects malformed method names', () => {
		expect(() => registry.register(pluginNamed('1st'))).toThrow(InvalidArgumentError);
		expect(() => registry.register(pluginNamed('has space'))).toThrow("Invalid plugin method name: 'has space'");
	});

	it('rejects names of native operations', () => {
		expect(() => registry.register(pluginNamed('read'))).toThrow(
			"Plugin method shadows a filesystem operation: 'read'"
		);
	});

	it('replaces a plugin registered under the same name', () => {
		const second = pluginNamed('countLines');
		registry.register(pluginNamed('countLines'));
		registry.register(second);

		expect(registry.find('countLines')).toBe(second);
	});

	it('throws for unknown methods', () => {
		expect(() => registry.find('missing')).toThrow(PluginNotFoundError);
		expect(() => registry.find('missing')).toThrow('Plugin not found for method: missing');
	});
});

describe('Filesystem plugins', () => {
	let filesystem: Filesystem;

	beforeEach(async () => {
		filesystem = new Filesystem(new InMemoryAdapter());
		await filesystem.write('docs/a.txt', 'a');
		await filesystem.write('docs/b.txt', 'b');
		await filesystem.write('docs/sub/c.txt', 'c');
	});

	it('invokes a registered plugin with the caller arguments', async () => {
		const handle = vi.fn(async (_filesystem: Filesystem, ...args: unknown[]) => args.length);
		filesystem.addPlugin({ method: 'countArgs', handle });

		expect(await filesystem.invoke('countArgs', 'x', 2)).toBe(2);
		expect(handle).toHaveBeenCalledWith(filesystem, 'x', 2);
		expect(filesystem.getPluginMethods()).toEqual(['countArgs']);
	});

	it('rejects unknown methods', () => {
		expect(() => filesystem.invoke('missing')).toThrow(PluginNotFoundError);
	});

	describe('listFiles', () => {
		beforeEach(() => {
			filesystem.addPlugin(new ListFilesPlugin());
		});

		it('lists the files of a directory without subdirectories', async () => {
			const files = await filesystem.invoke('listFiles', 'docs');
			expect(Array.isArray(files) && files.map(file => file.path)).toEqual(['docs/a.txt', 'docs/b.txt']);
		});

		it('lists recursively', async () => {
			const files = await filesystem.invoke('listFiles', 'docs', true);
			expect(Array.isArray(files) && files.map(file => file.path)).toEqual([
				'docs/a.txt',
				'docs/b.txt',
				'docs/sub/c.txt',
			]);
		});

		it('defaults to a shallow listing of the root', async () => {
			expect(await filesystem.invoke('listFiles')).toEqual([]);
		});

		it('validates its arguments', async () => {
			await expect(filesystem.invoke('listFiles', 42)).rejects.toThrow(InvalidArgumentError);
		});
	});

	describe('emptyDir', () => {
		beforeEach(() => {
			filesystem.addPlugin(new EmptyDirPlugin());
		});

		it('removes every child and keeps the directory', async () => {
			expect(await filesystem.invoke('emptyDir', 'docs')).toBe(3);

			expect(await filesystem.has('docs')).toBe(true);
			expect(await filesystem.listContents('docs')).toEqual([]);
			expect(await filesystem.has('docs/sub/c.txt')).toBe(false);
		});

		it('requires a directory argument', async () => {
			await expect(filesystem.invoke('emptyDir')).rejects.toThrow('Invalid plugin arguments for emptyDir');
		});
	});
});
