/**
 * Process configuration from environment variables
 */

import path from 'path';
import { z } from 'zod';
import { InvalidEnvironmentError } from '../errors';
import { LOG_LEVELS } from '../logging/types';
import type { LogFormat } from '../logging/agent-logger';
import type { LogLevel } from '../logging/types';
import { formatZodIssues } from './schema';

export interface AgentEnvironment {
	identityPath: string;
	settingsPath: string;
	logLevel: LogLevel;
	logFormat: LogFormat;
	settingsPollIntervalMs: number;
}

const EnvSchema = z.object({
	DEVICE_IDENTITY_PATH: z.string().min(1).default('device.json'),
	SETTINGS_PATH: z.string().min(1).default('config.yaml'),
	LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
	LOG_FORMAT: z.enum(['json', 'pretty']).default('pretty'),
	SETTINGS_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
});

/**
 * Relative paths resolve against `cwd`.
 */
export function loadEnvironment(
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): AgentEnvironment {
	const result = EnvSchema.safeParse(env);
	if (!result.success) {
		throw new InvalidEnvironmentError(formatZodIssues(result.error));
	}

	const parsed = result.data;
	return {
		identityPath: path.resolve(cwd, parsed.DEVICE_IDENTITY_PATH),
		settingsPath: path.resolve(cwd, parsed.SETTINGS_PATH),
		logLevel: parsed.LOG_LEVEL,
		logFormat: parsed.LOG_FORMAT,
		settingsPollIntervalMs: parsed.SETTINGS_POLL_INTERVAL_MS,
	};
}
