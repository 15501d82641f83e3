import { z } from 'zod';
import type { FilesystemPlugin } from './types.js';
import { parsePluginArguments } from './types.js';
import type { Filesystem } from '../filesystem.js';

const EmptyDirArguments = z.tuple([z.string()]);

/**
 * `emptyDir(directory)`: delete every direct child of a directory and keep
 * the directory itself.
 *
 * Resolves to the number of children removed, or `false` when the listing
 * failed. Children the adapter refuses to delete are left in place.
 */
export class EmptyDirPlugin implements FilesystemPlugin<number | false> {
	readonly method = 'emptyDir';

	async handle(filesystem: Filesystem, ...args: unknown[]): Promise<number | false> {
		const [directory] = parsePluginArguments(this.method, EmptyDirArguments, 1, args);

		const contents = await filesystem.listContents(directory, false);
		if (contents === false) {
			return false;
		}

		let removed = 0;
		for (const object of contents) {
			const deleted =
				object.type === 'dir' ? await filesystem.deleteDir(object.path) : await filesystem.delete(object.path);
			if (deleted) {
				removed++;
			}
		}
		return removed;
	}
}
