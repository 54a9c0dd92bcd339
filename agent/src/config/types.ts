/**
 * Configuration records
 *
 * Two categories of configuration:
 * - IdentityRecord: loaded once from device.json, immutable for the process lifetime
 * - RuntimeSettings: loaded from config.yaml and hot-reloaded while running
 */

import type { LogLevel } from '../logging/types';

export interface IdentityRecord {
	/** Unique per physical/simulated device, also the default MQTT client id */
	readonly deviceId: string;
	/** Rated power in watts */
	readonly ratedPower: number;
}

/**
 * Always replaced wholesale, never mutated in place.
 */
export interface RuntimeSettings {
	readonly brokerHost: string;
	readonly brokerPort: number;
	/** null means "use the device id" */
	readonly clientId: string | null;
	readonly pollIntervalSeconds: number;
	readonly heartbeatIntervalSeconds: number;
	readonly logLevel: LogLevel;
}

export type SettingsField = keyof RuntimeSettings;

export type SettingsPatch = { -readonly [K in SettingsField]?: RuntimeSettings[K] };

export interface FieldChange<T> {
	old: T;
	new: T;
}

/**
 * Per-field differences produced by one successful reload. Empty when nothing changed.
 */
export type ChangeRecord = { [K in SettingsField]?: FieldChange<RuntimeSettings[K]> };

export type ReloadStatus = 'changed' | 'unchanged' | 'failed';

export interface ReloadResult {
	status: ReloadStatus;
	changes: ChangeRecord;
	/** Set when status is 'failed' */
	error?: Error;
}

export const DEFAULT_RUNTIME_SETTINGS: RuntimeSettings = Object.freeze({
	brokerHost: 'localhost',
	brokerPort: 1883,
	clientId: null,
	pollIntervalSeconds: 5,
	heartbeatIntervalSeconds: 30,
	logLevel: 'info',
});

/**
 * Settings document paths, in the order changes are reported.
 */
export const SETTINGS_FIELD_NAMES: Readonly<Record<SettingsField, string>> = {
	brokerHost: 'mqtt.host',
	brokerPort: 'mqtt.port',
	clientId: 'mqtt.client_id',
	pollIntervalSeconds: 'app.poll_interval',
	heartbeatIntervalSeconds: 'app.heartbeat_interval',
	logLevel: 'logging.level',
};

export const SETTINGS_FIELDS: readonly SettingsField[] = [
	'brokerHost',
	'brokerPort',
	'clientId',
	'pollIntervalSeconds',
	'heartbeatIntervalSeconds',
	'logLevel',
];

/**
 * A change to any of these invalidates the live broker session.
 */
export const RECONNECT_FIELDS: readonly SettingsField[] = ['brokerHost', 'brokerPort', 'clientId'];
