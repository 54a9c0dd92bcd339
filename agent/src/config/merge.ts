/**
 * Explicit field-by-field mapping and merging of settings.
 */

import type { IdentityDocument, SettingsDocument } from './schema';
import { RECONNECT_FIELDS, SETTINGS_FIELD_NAMES, SETTINGS_FIELDS } from './types';
import type {
	ChangeRecord,
	FieldChange,
	IdentityRecord,
	RuntimeSettings,
	SettingsField,
	SettingsPatch,
} from './types';

export function toIdentityRecord(doc: IdentityDocument): IdentityRecord {
	return Object.freeze({
		deviceId: doc.device_id,
		ratedPower: doc.power ?? doc.rated_power ?? 0,
	});
}

/**
 * Keys absent from the document are absent from the patch.
 */
export function toSettingsPatch(doc: SettingsDocument): SettingsPatch {
	const patch: SettingsPatch = {};

	if (doc.mqtt?.host !== undefined) patch.brokerHost = doc.mqtt.host;
	if (doc.mqtt?.port !== undefined) patch.brokerPort = doc.mqtt.port;
	if (doc.mqtt?.client_id !== undefined) patch.clientId = doc.mqtt.client_id;
	if (doc.app?.poll_interval !== undefined) patch.pollIntervalSeconds = doc.app.poll_interval;
	if (doc.app?.heartbeat_interval !== undefined) patch.heartbeatIntervalSeconds = doc.app.heartbeat_interval;
	if (doc.logging?.level !== undefined) patch.logLevel = doc.logging.level;

	return patch;
}

function diffField<K extends SettingsField>(
	key: K,
	before: RuntimeSettings,
	after: RuntimeSettings,
	changes: { [P in K]?: FieldChange<RuntimeSettings[P]> },
): void {
	if (before[key] !== after[key]) {
		changes[key] = { old: before[key], new: after[key] };
	}
}

/**
 * Apply a patch onto the current settings.
 * Returns a new frozen record plus the per-field differences.
 */
export function mergeSettings(
	current: RuntimeSettings,
	patch: SettingsPatch,
): { settings: RuntimeSettings; changes: ChangeRecord } {
	const settings: RuntimeSettings = Object.freeze({ ...current, ...patch });
	const changes: ChangeRecord = {};

	for (const key of SETTINGS_FIELDS) {
		diffField(key, current, settings, changes);
	}

	return { settings, changes };
}

export function isEmptyChangeRecord(changes: ChangeRecord): boolean {
	return Object.keys(changes).length === 0;
}

export function requiresReconnect(changes: ChangeRecord): boolean {
	return RECONNECT_FIELDS.some((field) => changes[field] !== undefined);
}

/**
 * "mqtt.port: 1883 → 1884, app.poll_interval: 5 → 10"
 */
export function formatChanges(changes: ChangeRecord): string {
	const parts: string[] = [];

	for (const key of SETTINGS_FIELDS) {
		const change = changes[key];
		if (change) {
			parts.push(`${SETTINGS_FIELD_NAMES[key]}: ${String(change.old)} → ${String(change.new)}`);
		}
	}

	return parts.join(', ');
}
