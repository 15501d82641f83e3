/**
 * Logger exports
 *
 * Winston-backed logger with coloured console output, secret redaction
 * and optional file output.
 */

export {
	Logger,
	logger,
	createLogger,
	setGlobalLogLevel,
	getGlobalLogLevel,
	redactSensitiveData,
} from './logger.js';
export type { LoggerOptions, LogMeta, ChalkColor, LogLevel } from './logger.js';
