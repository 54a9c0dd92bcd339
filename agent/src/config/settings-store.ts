/**
 * Settings Store
 *
 * Owns the device identity (device.json, loaded once) and the runtime
 * settings (config.yaml, hot-reloaded).
 *
 * Reload contract:
 * 1. The whole document is read, parsed and validated before anything is applied
 * 2. On failure the previous settings stay in effect and listeners are not called
 * 3. On success a new settings record replaces the old one in a single swap,
 *    then change listeners run synchronously, in registration order
 *
 * Watching polls the file's modification time and content, so an edit within
 * the filesystem's timestamp resolution is still seen. A slow listener
 * delays the next poll, reloads never overlap.
 */

import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { IdentityMalformedError, IdentityNotFoundError, SettingsParseError } from '../errors';
import { PeriodicTask } from '../lib/periodic-task';
import type { Logger } from '../logging/agent-logger';
import { formatChanges, isEmptyChangeRecord, mergeSettings, toIdentityRecord, toSettingsPatch } from './merge';
import { formatZodIssues, IdentityDocumentSchema, SettingsDocumentSchema } from './schema';
import type { SettingsDocument } from './schema';
import { DEFAULT_RUNTIME_SETTINGS } from './types';
import type { ChangeRecord, IdentityRecord, ReloadResult, RuntimeSettings } from './types';

export type ChangeListener = (changes: ChangeRecord, settings: RuntimeSettings) => void;
export type ReloadFailedListener = (error: SettingsParseError) => void;

/**
 * What the watch loop last saw of the settings file
 */
interface SourceSnapshot {
	mtimeMs: number;
	content: string;
}

export interface SettingsStoreOptions {
	identityPath: string;
	settingsPath: string;
	logger: Logger;
	/** How often the settings file is checked for modification */
	pollIntervalMs?: number;
	defaults?: RuntimeSettings;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export class SettingsStore {
	private identity?: IdentityRecord;
	private settings: RuntimeSettings;
	private readonly changeListeners: ChangeListener[] = [];
	private readonly reloadFailedListeners: ReloadFailedListener[] = [];
	private watchTask?: PeriodicTask;
	/** Settings file at the last reload attempt, undefined when absent */
	private lastSeen?: SourceSnapshot;
	private readonly logger: Logger;

	constructor(private readonly options: SettingsStoreOptions) {
		this.logger = options.logger;
		this.settings = options.defaults ?? DEFAULT_RUNTIME_SETTINGS;
	}

	/**
	 * Load device.json. Throws IdentityNotFoundError or IdentityMalformedError.
	 */
	public loadIdentity(): IdentityRecord {
		if (this.identity) {
			return this.identity;
		}

		const { identityPath } = this.options;

		if (!fs.existsSync(identityPath)) {
			this.logger.error(`device.json not found at ${identityPath}`, undefined, { path: identityPath });
			throw new IdentityNotFoundError(identityPath);
		}

		let raw: unknown;
		try {
			raw = JSON.parse(fs.readFileSync(identityPath, 'utf-8'));
		} catch (error) {
			this.logger.error(`device.json is malformed`, error, { path: identityPath });
			throw new IdentityMalformedError(identityPath, [describe(error)]);
		}

		const result = IdentityDocumentSchema.safeParse(raw);
		if (!result.success) {
			const issues = formatZodIssues(result.error);
			this.logger.error(`device.json missing required fields`, undefined, { path: identityPath, issues });
			throw new IdentityMalformedError(identityPath, issues);
		}

		this.identity = toIdentityRecord(result.data);
		this.logger.info(`Device ID: ${this.identity.deviceId}, Power: ${this.identity.ratedPower}W`, {
			path: identityPath,
		});
		return this.identity;
	}

	public getIdentity(): IdentityRecord {
		if (!this.identity) {
			throw new Error('Device identity has not been loaded');
		}
		return this.identity;
	}

	/**
	 * Current settings. The returned record is frozen and never changes;
	 * a reload swaps in a new one.
	 */
	public getSettings(): RuntimeSettings {
		return this.settings;
	}

	public onChange(listener: ChangeListener): void {
		this.changeListeners.push(listener);
	}

	public onReloadFailed(listener: ReloadFailedListener): void {
		this.reloadFailedListeners.push(listener);
	}

	/**
	 * Re-read config.yaml and apply it, notifying listeners of any change.
	 */
	public reload(): ReloadResult {
		return this.applyFromSource(true);
	}

	/**
	 * Apply config.yaml once, then poll it for modification.
	 */
	public async watch(): Promise<void> {
		if (this.watchTask) {
			return;
		}

		const { settingsPath } = this.options;
		this.lastSeen = this.snapshot();

		if (!this.lastSeen) {
			this.logger.info(`No settings file at ${settingsPath}, using defaults`, { path: settingsPath });
		} else {
			// Nothing is listening yet that cares about the difference from defaults
			this.applyFromSource(false);
		}

		this.watchTask = new PeriodicTask({
			name: 'settings-watch',
			intervalMs: this.options.pollIntervalMs ?? 1000,
			logger: this.logger,
			run: () => {
				this.poll();
			},
		});
		this.watchTask.start();
	}

	/**
	 * One watch tick: reload if the file's modification time or content
	 * differs from the last attempt. Returns undefined when there was nothing to do.
	 */
	public poll(): ReloadResult | undefined {
		const current = this.snapshot();

		if (!current) {
			if (this.lastSeen) {
				this.logger.warn('Settings file removed, keeping current settings', { path: this.options.settingsPath });
				this.lastSeen = undefined;
			}
			return undefined;
		}

		const previous = this.lastSeen;
		if (previous && previous.mtimeMs === current.mtimeMs && previous.content === current.content) {
			return undefined;
		}

		this.lastSeen = current;
		return this.reload();
	}

	/**
	 * Stop watching. Resolves after an in-flight reload has finished.
	 */
	public async stop(): Promise<void> {
		if (!this.watchTask) {
			return;
		}
		await this.watchTask.stop();
		this.watchTask = undefined;
	}

	private applyFromSource(notify: boolean): ReloadResult {
		const { settingsPath } = this.options;

		let document: SettingsDocument;
		try {
			document = this.readDocument();
		} catch (error) {
			const parseError = error instanceof SettingsParseError
				? error
				: new SettingsParseError(settingsPath, [describe(error)]);

			this.logger.warn('Settings reload failed, keeping previous settings', {
				path: settingsPath,
				issues: parseError.issues,
			});
			this.notifyReloadFailed(parseError);
			return { status: 'failed', changes: {}, error: parseError };
		}

		const { settings, changes } = mergeSettings(this.settings, toSettingsPatch(document));

		if (isEmptyChangeRecord(changes)) {
			this.logger.info('Settings reloaded: no changes detected', { path: settingsPath });
			return { status: 'unchanged', changes };
		}

		this.settings = settings;
		this.logger.info(`Settings reloaded: ${formatChanges(changes)}`, { path: settingsPath });

		if (notify) {
			this.notifyChange(changes, settings);
		}
		return { status: 'changed', changes };
	}

	/**
	 * Throws SettingsParseError on I/O, YAML or validation failure.
	 */
	private readDocument(): SettingsDocument {
		const { settingsPath } = this.options;

		let raw: string;
		try {
			raw = fs.readFileSync(settingsPath, 'utf-8');
		} catch (error) {
			throw new SettingsParseError(settingsPath, [describe(error)]);
		}

		let parsed: unknown;
		try {
			parsed = parseYaml(raw);
		} catch (error) {
			throw new SettingsParseError(settingsPath, [describe(error)]);
		}

		// An empty document is valid and changes nothing
		const result = SettingsDocumentSchema.safeParse(parsed ?? {});
		if (!result.success) {
			throw new SettingsParseError(settingsPath, formatZodIssues(result.error));
		}
		return result.data;
	}

	private snapshot(): SourceSnapshot | undefined {
		const { settingsPath } = this.options;
		try {
			const { mtimeMs } = fs.statSync(settingsPath);
			return { mtimeMs, content: fs.readFileSync(settingsPath, 'utf-8') };
		} catch (error) {
			this.logger.debug('Settings file not readable', {
				path: settingsPath,
				error: describe(error),
			});
			return undefined;
		}
	}

	private notifyChange(changes: ChangeRecord, settings: RuntimeSettings): void {
		for (const listener of this.changeListeners) {
			try {
				listener(changes, settings);
			} catch (error) {
				this.logger.error('Settings change listener failed', error);
			}
		}
	}

	private notifyReloadFailed(error: SettingsParseError): void {
		for (const listener of this.reloadFailedListeners) {
			try {
				listener(error);
			} catch (listenerError) {
				this.logger.error('Settings reload-failed listener failed', listenerError);
			}
		}
	}
}
