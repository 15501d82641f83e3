/**
 * Plugin Types
 *
 * A plugin adds an operation the facade does not implement natively. It is
 * looked up by its exact method name and receives the facade plus the
 * caller's arguments.
 *
 * @module filesystem/plugins/types
 */

import type { z } from 'zod';
import type { Filesystem } from '../filesystem.js';
import { InvalidArgumentError } from '../errors.js';
import { ERROR_MESSAGES } from '../constants.js';

export interface FilesystemPlugin<TResult = unknown> {
	/** Name the plugin is invoked by */
	readonly method: string;

	handle(filesystem: Filesystem, ...args: unknown[]): Promise<TResult>;
}

/**
 * Validate the positional arguments of a plugin call.
 *
 * Arguments beyond `arity` are ignored; missing ones are passed as
 * `undefined` so that optional tuple items take their defaults.
 *
 * @throws {InvalidArgumentError} when the arguments do not match the schema
 */
export function parsePluginArguments<T extends z.ZodTypeAny>(
	method: string,
	schema: T,
	arity: number,
	args: unknown[]
): z.output<T> {
	const padded = Array.from({ length: arity }, (_, index) => args[index]);
	const result = schema.safeParse(padded);

	if (!result.success) {
		throw new InvalidArgumentError(
			`${ERROR_MESSAGES.INVALID_PLUGIN_ARGUMENTS} for ${method}: ${result.error.errors
				.map(e => `${e.path.join('.')}: ${e.message}`)
				.join(', ')}`,
			'invoke'
		);
	}

	return result.data;
}
