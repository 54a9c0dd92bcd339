/**
 * Configuration Module
 * ====================
 *
 * Identity and runtime settings: records, document schemas, merging,
 * process environment and the hot-reloading Settings Store.
 */

export { SettingsStore } from './settings-store';
export type { ChangeListener, ReloadFailedListener, SettingsStoreOptions } from './settings-store';

export { loadEnvironment } from './env';
export type { AgentEnvironment } from './env';

export { formatChanges, isEmptyChangeRecord, mergeSettings, requiresReconnect } from './merge';

export { DEFAULT_RUNTIME_SETTINGS, RECONNECT_FIELDS, SETTINGS_FIELD_NAMES } from './types';
export type {
	ChangeRecord,
	FieldChange,
	IdentityRecord,
	ReloadResult,
	ReloadStatus,
	RuntimeSettings,
	SettingsField,
} from './types';
