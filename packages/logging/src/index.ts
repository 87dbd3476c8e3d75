import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Log levels supported by the logger
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
	level: LogLevel;
	/** Bound to every line as `service` */
	serviceName: string;
	/** Pretty-print through pino-pretty (development only) */
	pretty?: boolean;
	base?: Record<string, unknown>;
	/** Write to this stream instead of stdout; ignored when pretty is set */
	destination?: DestinationStream;
}

/**
 * Create a configured Pino logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
	const options: LoggerOptions = {
		level: config.level,
		base: {
			service: config.serviceName,
			...config.base,
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}

	return config.destination ? pino(options, config.destination) : pino(options);
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
	return parent.child(bindings);
}

let defaultLogger: Logger = pino({ level: 'info' });

/**
 * Replace the process-wide default logger.
 */
export function setDefaultLogger(logger: Logger): void {
	defaultLogger = logger;
}

export function getLogger(): Logger {
	return defaultLogger;
}
