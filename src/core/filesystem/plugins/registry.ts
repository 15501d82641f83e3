/**
 * Plugin Registry
 *
 * @module filesystem/plugins/registry
 */

import type { FilesystemPlugin } from './types.js';
import { InvalidArgumentError, PluginNotFoundError } from '../errors.js';
import { ERROR_MESSAGES, LOG_PREFIXES, RESERVED_METHODS } from '../constants.js';
import { createLogger, type Logger } from '../../logger/index.js';

const METHOD_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;

/**
 * Name-to-plugin lookup. Names are validated when a plugin is registered,
 * so a bad name fails at setup rather than at the first call.
 */
export class PluginRegistry {
	private plugins = new Map<string, FilesystemPlugin>();
	private readonly logger: Logger;

	constructor(logger?: Logger) {
		this.logger = logger ?? createLogger({ level: process.env.CACHEDFS_LOG_LEVEL || 'info' });
	}

	/**
	 * @throws {InvalidArgumentError} for malformed names and names of native operations
	 */
	register(plugin: FilesystemPlugin): void {
		const { method } = plugin;

		if (!METHOD_PATTERN.test(method)) {
			throw new InvalidArgumentError(`${ERROR_MESSAGES.INVALID_PLUGIN_METHOD}: '${method}'`, 'register');
		}
		if (RESERVED_METHODS.has(method)) {
			throw new InvalidArgumentError(`${ERROR_MESSAGES.RESERVED_PLUGIN_METHOD}: '${method}'`, 'register');
		}

		if (this.plugins.has(method)) {
			this.logger.warn(`${LOG_PREFIXES.PLUGINS} Replacing plugin`, { method });
		}
		this.plugins.set(method, plugin);
		this.logger.debug(`${LOG_PREFIXES.PLUGINS} Registered plugin`, { method });
	}

	/**
	 * @throws {PluginNotFoundError} when no plugin handles `method`
	 */
	find(method: string): FilesystemPlugin {
		const plugin = this.plugins.get(method);
		if (!plugin) {
			throw new PluginNotFoundError(method);
		}
		return plugin;
	}

	has(method: string): boolean {
		return this.plugins.has(method);
	}

	getMethods(): string[] {
		return [...this.plugins.keys()];
	}
}
