/**
 * Logging Types & Component Names
 *
 * Standardized component names for structured logging.
 * Use these constants instead of hardcoded strings to ensure consistency.
 *
 * Usage:
 *   logger.info('Connected to MQTT broker', { component: LogComponents.mqtt });
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface LogContext {
	component?: string;
	operation?: string;
	[key: string]: unknown;
}

export const LogComponents = {
	agent: 'Agent',
	settings: 'Settings',
	mqtt: 'Mqtt',
	heartbeat: 'Heartbeat',
	measurement: 'Measurement',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}
