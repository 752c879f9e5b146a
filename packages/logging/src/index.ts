/**
 * @biotap/logging
 *
 * Pino loggers that write one JSON object per line: ISO `time`, `level` as
 * its label and `service` on every line. With `pretty` set, output goes
 * through pino-pretty instead.
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions, type TransportSingleOptions } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggerConfig {
	level: LogLevel;
	serviceName: string;
	pretty?: boolean;
	/** Stream to write to instead of stdout; ignored when pretty */
	destination?: DestinationStream;
}

export const PRETTY_TRANSPORT: TransportSingleOptions = {
	target: 'pino-pretty',
	options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
};

export function createLoggerOptions(config: Pick<LoggerConfig, 'level' | 'serviceName'>): LoggerOptions {
	return {
		level: config.level,
		base: { service: config.serviceName },
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};
}

export function createLogger(config: LoggerConfig): Logger {
	const options = createLoggerOptions(config);
	if (config.pretty) {
		return pino({ ...options, transport: PRETTY_TRANSPORT });
	}
	return config.destination ? pino(options, config.destination) : pino(options);
}
