import { z } from 'zod';
import type { FilesystemPlugin } from './types.js';
import { parsePluginArguments } from './types.js';
import type { Filesystem } from '../filesystem.js';
import type { ObjectRecord } from '../types.js';

const ListFilesArguments = z.tuple([z.string().default(''), z.boolean().default(false)]);

/**
 * `listFiles(directory?, recursive?)`: the files of a listing, without directories
 */
export class ListFilesPlugin implements FilesystemPlugin<ObjectRecord[] | false> {
	readonly method = 'listFiles';

	async handle(filesystem: Filesystem, ...args: unknown[]): Promise<ObjectRecord[] | false> {
		const [directory, recursive] = parsePluginArguments(this.method, ListFilesArguments, 2, args);

		const contents = await filesystem.listContents(directory, recursive);
		if (contents === false) {
			return false;
		}

		return contents.filter(object => object.type === 'file');
	}
}
