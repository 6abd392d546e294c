import { type Logger, type LoggerOptions, pino } from 'pino';

export type { Logger } from 'pino';

export enum LogLevel {
	Trace = 'trace',
	Debug = 'debug',
	Info = 'info',
	Warn = 'warn',
	Error = 'error',
	Fatal = 'fatal',
	Silent = 'silent',
}

export type CreateLoggerOptions = {
	/** Bound as `name` on every line */
	name?: string;
	level?: LogLevel;
	pretty?: boolean;
};

/**
 * pino options for {@link createLogger}. The pino-pretty transport is only
 * used when `pretty` is set and `NODE_ENV` is not `production`.
 */
export function loggerOptions(options: CreateLoggerOptions = {}): LoggerOptions {
	const pretty = options.pretty && process.env.NODE_ENV !== 'production';
	const baseOptions = pretty
		? {
				transport: {
					target: 'pino-pretty',
					options: { colorize: true },
				},
			}
		: {};

	return {
		...baseOptions,
		...(options.name ? { name: options.name } : {}),
		...(options.level ? { level: options.level } : {}),
		formatters: {
			bindings(bindings) {
				return { ...bindings, nodeVersion: process.version };
			},
			level: (label) => {
				return { level: label.toUpperCase() };
			},
		},
	};
}

/**
 * Creates the pino logger used by the publisher when none is injected.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'metrics', level: LogLevel.Debug });
 * logger.info({ batches: 3 }, 'Published metric batches');
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	return pino(loggerOptions(options));
}
