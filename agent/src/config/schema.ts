/**
 * Zod schemas for the identity and settings documents
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/types';

export const IdentityDocumentSchema = z
	.object({
		device_id: z.string().trim().min(1),
		power: z.number().nonnegative().optional(),
		rated_power: z.number().nonnegative().optional(),
	})
	.refine((doc) => doc.power !== undefined || doc.rated_power !== undefined, {
		message: 'Required',
		path: ['power'],
	});

export type IdentityDocument = z.infer<typeof IdentityDocumentSchema>;

const MqttSectionSchema = z
	.object({
		host: z.string().trim().min(1).optional(),
		port: z.number().int().min(1).max(65535).optional(),
		client_id: z.string().trim().min(1).optional(),
	})
	.strict();

const AppSectionSchema = z
	.object({
		poll_interval: z.number().int().positive().optional(),
		heartbeat_interval: z.number().int().positive().optional(),
	})
	.strict();

const LoggingSectionSchema = z
	.object({
		level: z.enum(LOG_LEVELS).optional(),
	})
	.strict();

/**
 * Every section and key is optional; unknown ones reject the whole document.
 */
export const SettingsDocumentSchema = z
	.object({
		mqtt: MqttSectionSchema.nullish(),
		app: AppSectionSchema.nullish(),
		logging: LoggingSectionSchema.nullish(),
	})
	.strict();

export type SettingsDocument = z.infer<typeof SettingsDocumentSchema>;

export function formatZodIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join('.') : 'document';
		return `${path}: ${issue.message}`;
	});
}
