import { config } from 'dotenv';
import { z } from 'zod';

config({ override: false });

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	CACHEDFS_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'silly']).default('info'),
	REDACT_SECRETS: z.boolean().default(true),
	// Filesystem Configuration
	CACHEDFS_VISIBILITY: z.enum(['public', 'private']).default('public'),
	CACHEDFS_CACHE_PATH: z.string().optional(),
	CACHEDFS_CACHE_AUTOSAVE: z.boolean().default(false),
});

type EnvSchema = z.infer<typeof envSchema>;

const readEnv = (): Record<keyof EnvSchema, unknown> => ({
	NODE_ENV: process.env.NODE_ENV || 'development',
	CACHEDFS_LOG_LEVEL: process.env.CACHEDFS_LOG_LEVEL || 'info',
	REDACT_SECRETS: process.env.REDACT_SECRETS === 'false' ? false : true,
	CACHEDFS_VISIBILITY: process.env.CACHEDFS_VISIBILITY || 'public',
	CACHEDFS_CACHE_PATH: process.env.CACHEDFS_CACHE_PATH || undefined,
	CACHEDFS_CACHE_AUTOSAVE: process.env.CACHEDFS_CACHE_AUTOSAVE === 'true',
});

const isEnvKey = (
	values: Record<keyof EnvSchema, unknown>,
	prop: string | symbol
): prop is keyof EnvSchema => typeof prop === 'string' && prop in values;

// Reads process.env on every access so tests and long-lived processes see updates
export const env: EnvSchema = new Proxy({} as EnvSchema, {
	get(_target, prop: string | symbol): unknown {
		const values = readEnv();
		if (isEnvKey(values, prop)) {
			return values[prop];
		}
		return typeof prop === 'string' ? process.env[prop] : undefined;
	},
});
