import winston from 'winston';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { env } from '../env.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
};

type LogLevel = keyof typeof logLevels;

const isLogLevel = (level: string): level is LogLevel => Object.keys(logLevels).includes(level);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token', 'auth', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["'])?.*?\\3(?=[\\s,}]|$)`,
	'gi'
);

export const redactSensitiveData = (message: string): string => {
	const shouldRedact = env.REDACT_SECRETS !== false;
	if (!shouldRedact) return message;

	return message.replace(MASK_REGEX, (_match, key: string, separator: string, quote?: string) => {
		const quoteMark = quote || '';
		return `${key}${separator}${quoteMark}***REDACTED***${quoteMark}`;
	});
};

// ===== 3. Visual Formatting Layer =====

const chalkColors = {
	red: chalk.red,
	green: chalk.green,
	yellow: chalk.yellow,
	blue: chalk.blue,
	magenta: chalk.magenta,
	cyan: chalk.cyan,
	white: chalk.white,
	gray: chalk.gray,
} as const;

type ChalkColor = keyof typeof chalkColors;

const isChalkColor = (value: unknown): value is ChalkColor =>
	typeof value === 'string' && value in chalkColors;

const levelColorMap: Record<string, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

// Fields winston adds on its own; everything else is caller metadata
const RESERVED_FIELDS = new Set(['level', 'message', 'timestamp', 'color']);

const formatMeta = (info: Record<string, unknown>): string => {
	const meta: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(info)) {
		if (!RESERVED_FIELDS.has(key) && value !== undefined) {
			meta[key] = value;
		}
	}
	if (Object.keys(meta).length === 0) return '';
	try {
		return ` ${redactSensitiveData(JSON.stringify(meta))}`;
	} catch {
		return ' [unserializable metadata]';
	}
};

// Create custom format for masking
const maskFormat = winston.format(info => {
	if (typeof info.message === 'string') {
		info.message = redactSensitiveData(info.message);
	}
	return info;
});

// Console formatting
const consoleFormat = winston.format.printf(info => {
	const { level, message, timestamp, color } = info;
	const colorize = levelColorMap[level] || chalk.white;
	let formattedMessage = String(message);

	// Apply custom color if specified
	if (isChalkColor(color)) {
		formattedMessage = chalkColors[color](formattedMessage);
	}

	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${formattedMessage}${formatMeta(info)}`;
});

// File formatting (no colors)
const fileFormat = winston.format.printf(info => {
	return `${String(info.timestamp)} [${info.level.toUpperCase()}]: ${String(info.message)}${formatMeta(info)}`;
});

// ===== 4. Configuration Layer =====

const getDefaultLogLevel = (): LogLevel => {
	const envLevel = process.env.CACHEDFS_LOG_LEVEL ?? env.CACHEDFS_LOG_LEVEL;
	const normalized = envLevel?.toLowerCase();
	if (normalized && isLogLevel(normalized)) {
		return normalized;
	}
	return 'info'; // Safe default
};

// ===== 5. Logger Options Interface =====

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
	file?: string;
}

export type LogMeta = Record<string, unknown>;

// ===== 6. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean = false;

	constructor(options: LoggerOptions = {}) {
		const requested = options.level?.toLowerCase();
		const level = requested && isLogLevel(requested) ? requested : getDefaultLogLevel();
		this.isSilent = options.silent || false;

		this.logger = winston.createLogger({
			levels: logLevels,
			level: level,
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat()
			),
			transports: this.createTransports(options.file),
			silent: this.isSilent,
		});
	}

	private createTransports(filePath?: string): winston.transport[] {
		const transports: winston.transport[] = [];

		if (filePath) {
			fs.mkdirSync(path.dirname(filePath), { recursive: true });
			transports.push(
				new winston.transports.File({
					filename: filePath,
					format: winston.format.combine(
						winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
						maskFormat(),
						fileFormat
					),
				})
			);
		} else {
			transports.push(
				new winston.transports.Console({
					format: winston.format.combine(
						winston.format.timestamp({ format: 'HH:mm:ss' }),
						maskFormat(),
						consoleFormat
					),
					stderrLevels: Object.keys(logLevels), // Redirect all log levels to stderr
				})
			);
		}

		return transports;
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.error(message, { ...meta, color });
	}

	warn(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.warn(message, { ...meta, color });
	}

	info(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.info(message, { ...meta, color });
	}

	verbose(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.verbose(message, { ...meta, color });
	}

	debug(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.debug(message, { ...meta, color });
	}

	silly(message: string, meta?: LogMeta, color?: ChalkColor): void {
		this.logger.silly(message, { ...meta, color });
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${Object.keys(logLevels).join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}

	setSilent(silent: boolean): void {
		this.isSilent = silent;
		this.logger.silent = silent;
	}

	isSilentMode(): boolean {
		return this.isSilent;
	}

	redirectToFile(filePath: string): void {
		try {
			fs.mkdirSync(path.dirname(filePath), { recursive: true });

			this.logger.clear();
			this.logger.add(
				new winston.transports.File({
					filename: filePath,
					format: winston.format.combine(
						winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
						maskFormat(),
						fileFormat
					),
				})
			);
		} catch (error) {
			this.error(`Failed to redirect logger to file: ${error}`);
		}
	}

	// ===== Utility Methods =====

	createChild(options: LoggerOptions = {}): Logger {
		const childOptions: LoggerOptions = {
			level: options.level || this.getLevel(),
			silent: options.silent !== undefined ? options.silent : this.isSilent,
		};

		// Only include file option if it's defined
		if (options.file !== undefined) {
			childOptions.file = options.file;
		}

		return new Logger(childOptions);
	}

	// Get logger instance for advanced usage
	getWinstonLogger(): winston.Logger {
		return this.logger;
	}
}

// ===== 7. Singleton Pattern =====

export const logger = new Logger();

// ===== Export Types =====

export type { ChalkColor, LogLevel };

// ===== Utility Functions =====

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};

export const setGlobalLogLevel = (level: string): void => {
	logger.setLevel(level);
};

export const getGlobalLogLevel = (): string => {
	return logger.getLevel();
};
