/**
 * Agent Logger
 * =============
 *
 * Structured logging for agent-level events (settings store, MQTT connection,
 * periodic publishers). Thin wrapper around a single winston root logger.
 *
 * Every component receives its own child logger at construction time; children
 * share the root's transports and its level, so `setLogLevel()` on any of them
 * takes effect process-wide on the next emitted entry.
 *
 * Usage:
 *   const logger = createLogger({ level: 'info' });
 *   const mqttLogger = logger.child(LogComponents.mqtt);
 *   mqttLogger.info('Connected to MQTT broker', { host, port });
 *   mqttLogger.error('Publish failed', error, { topic });
 */

import winston from 'winston';
import { isLogLevel, LogComponents } from './types';
import type { LogContext, LogLevel } from './types';

export type LogFormat = 'json' | 'pretty';

/**
 * The logging surface components depend on. Tests inject jest mocks of it.
 */
export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, error?: unknown, context?: LogContext): void;
}

export interface LoggerOptions {
	level?: LogLevel;
	format?: LogFormat;
	service?: string;
	/** Replaces the default console transport */
	transports?: winston.LoggerOptions['transports'];
}

const upperCaseLevel = winston.format((info) => {
	info.level = info.level.toUpperCase();
	return info;
});

const prettyFormat = winston.format.printf(({ level, message, timestamp, component, service: _service, ...metadata }) => {
	let msg = `${timestamp} [${level}] [${component ?? 'agent'}]: ${message}`;

	if (Object.keys(metadata).length > 0) {
		msg += ` ${JSON.stringify(metadata)}`;
	}

	return msg;
});

function serializeError(error: unknown): Record<string, unknown> {
	if (error instanceof Error) {
		return {
			name: error.name,
			message: error.message,
			stack: error.stack,
		};
	}
	return { message: String(error) };
}

export class AgentLogger implements Logger {
	constructor(
		private readonly base: winston.Logger,
		private readonly context: LogContext = {},
	) {}

	/**
	 * Logger for a component. Shares level and transports with this one.
	 */
	public child(component: string, context: LogContext = {}): AgentLogger {
		return new AgentLogger(this.base, { ...this.context, ...context, component });
	}

	/**
	 * Update the process-wide minimum log level
	 */
	public setLogLevel(level: LogLevel): void {
		const oldLevel = this.getLogLevel();
		if (oldLevel === level) {
			return;
		}

		this.base.level = level;

		// Always show the change, even when the new level filters out info
		const announceAt: LogLevel = this.base.isLevelEnabled('info') ? 'info' : level;
		this.write(announceAt, `Log level changed: ${oldLevel} → ${level}`, { component: LogComponents.agent });
	}

	public getLogLevel(): LogLevel {
		return isLogLevel(this.base.level) ? this.base.level : 'info';
	}

	public debug(message: string, context?: LogContext): void {
		this.write('debug', message, context);
	}

	public info(message: string, context?: LogContext): void {
		this.write('info', message, context);
	}

	public warn(message: string, context?: LogContext): void {
		this.write('warn', message, context);
	}

	public error(message: string, error?: unknown, context?: LogContext): void {
		const errorContext = error === undefined ? {} : { error: serializeError(error) };
		this.write('error', message, { ...context, ...errorContext });
	}

	private write(level: LogLevel, message: string, context?: LogContext): void {
		this.base.log(level, message, { ...this.context, ...context });
	}
}

/**
 * Create the process root logger.
 */
export function createLogger(options: LoggerOptions = {}): AgentLogger {
	const format = options.format ?? 'pretty';

	const base = winston.createLogger({
		level: options.level ?? 'info',
		format: winston.format.combine(
			winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
			winston.format.errors({ stack: true }),
			format === 'pretty'
				? winston.format.combine(upperCaseLevel(), winston.format.colorize(), prettyFormat)
				: winston.format.json(),
		),
		defaultMeta: { service: options.service ?? 'grid-device-agent' },
		transports: options.transports ?? [new winston.transports.Console()],
	});

	return new AgentLogger(base);
}
