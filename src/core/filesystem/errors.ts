/**
 * Filesystem Error Classes
 *
 * Precondition violations, invalid usage and configuration errors are thrown.
 * Adapter failures are not errors: the facade reports them as a `false` result.
 *
 * @module filesystem/errors
 */

import { ERROR_MESSAGES } from './constants.js';

/**
 * Base Filesystem Error Class
 *
 * @example
 * ```typescript
 * throw new FilesystemError('Failed to save snapshot', 'save', originalError);
 * ```
 */
export class FilesystemError extends Error {
	constructor(
		message: string,
		/** The operation that failed (e.g., 'read', 'write', 'invoke') */
		public readonly operation: string,
		/** The underlying error that caused this error, if any */
		public override readonly cause?: Error
	) {
		super(message);
		this.name = 'FilesystemError';
	}
}

/**
 * Thrown when an operation requires a path that does not exist
 */
export class FileNotFoundError extends FilesystemError {
	constructor(
		/** The path that was not found */
		public readonly path: string
	) {
		super(`${ERROR_MESSAGES.FILE_NOT_FOUND}: ${path}`, 'assert_present');
		this.name = 'FileNotFoundError';
	}
}

/**
 * Thrown when an operation requires a path to be absent but it exists
 */
export class FileExistsError extends FilesystemError {
	constructor(
		/** The path that already exists */
		public readonly path: string
	) {
		super(`${ERROR_MESSAGES.FILE_EXISTS}: ${path}`, 'assert_absent');
		this.name = 'FileExistsError';
	}
}

/**
 * Malformed arguments: unknown metadata fields, non-readable streams,
 * paths escaping the root and similar misuse.
 */
export class InvalidArgumentError extends FilesystemError {
	constructor(message: string, operation = 'validate') {
		super(message, operation);
		this.name = 'InvalidArgumentError';
	}
}

/**
 * Configuration error: a plugin method was invoked that nobody registered
 */
export class PluginNotFoundError extends FilesystemError {
	constructor(public readonly method: string) {
		super(`${ERROR_MESSAGES.PLUGIN_NOT_FOUND}: ${method}`, 'invoke');
		this.name = 'PluginNotFoundError';
	}
}

/**
 * Raised when a cache snapshot can not be written to its store
 */
export class CachePersistenceError extends FilesystemError {
	constructor(
		message: string,
		public readonly location: string,
		cause?: Error
	) {
		super(message, 'persist', cause);
		this.name = 'CachePersistenceError';
	}
}
