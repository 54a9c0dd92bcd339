/**
 * Device Agent
 *
 * Orchestrates all device-side operations:
 * - Settings store (identity + hot-reloaded settings)
 * - MQTT connection supervisor
 * - Heartbeat and measurement publishers
 *
 * Shutdown order: publishers → settings watch → MQTT connection.
 */

import { SettingsStore } from './config/settings-store';
import { requiresReconnect } from './config/merge';
import { DEFAULT_RUNTIME_SETTINGS } from './config/types';
import type { ChangeRecord, IdentityRecord, RuntimeSettings } from './config/types';
import { PeriodicTask } from './lib/periodic-task';
import type { AgentLogger } from './logging/agent-logger';
import { LogComponents } from './logging/types';
import { ConnectionManager } from './mqtt/manager';
import { MqttSessionFactory } from './mqtt/session';
import type { SessionFactory } from './mqtt/session';
import { measurementTopic } from './mqtt/topics';
import { createMeasurement } from './simulation/power-measurement';
import type { RandomSource } from './simulation/power-measurement';

export interface DeviceAgentOptions {
  identityPath: string;
  settingsPath: string;
  logger: AgentLogger;
  /** Defaults to mqtt.js sessions */
  sessionFactory?: SessionFactory;
  /** Length of one interval unit; settings intervals and backoff are expressed in it */
  timeUnitMs?: number;
  /** Defaults to one time unit */
  settingsPollIntervalMs?: number;
  random?: RandomSource;
  now?: () => Date;
}

const BACKOFF_BASE_UNITS = 5;
const BACKOFF_MAX_UNITS = 60;

export default class DeviceAgent {
  private readonly store: SettingsStore;
  private readonly logger: AgentLogger;
  private readonly measurementLogger: AgentLogger;
  private readonly timeUnitMs: number;
  private identity?: IdentityRecord;
  private connection?: ConnectionManager;
  private heartbeat?: PeriodicTask;
  private measurement?: PeriodicTask;
  private shutdownPromise?: Promise<void>;
  private initialized = false;

  constructor(private readonly options: DeviceAgentOptions) {
    this.logger = options.logger.child(LogComponents.agent);
    this.measurementLogger = options.logger.child(LogComponents.measurement);
    this.timeUnitMs = options.timeUnitMs ?? 1000;

    this.store = new SettingsStore({
      identityPath: options.identityPath,
      settingsPath: options.settingsPath,
      logger: options.logger.child(LogComponents.settings),
      pollIntervalMs: options.settingsPollIntervalMs ?? this.timeUnitMs,
      // LOG_LEVEL stays in effect until the settings document names a level
      defaults: { ...DEFAULT_RUNTIME_SETTINGS, logLevel: options.logger.getLogLevel() },
    });
  }

  /**
   * Throws StartupFatalError when the identity cannot be loaded; nothing is
   * started in that case.
   */
  public async init(): Promise<void> {
    if (this.shutdownPromise) {
      throw new Error('Device Agent has been shut down');
    }
    if (this.initialized) {
      return;
    }
    this.initialized = true;

    // 1. Identity first, nothing else starts without it
    const identity = this.store.loadIdentity();
    this.identity = identity;

    // 2. Settings: initial load, then watch
    await this.store.watch();
    if (this.shutdownPromise) {
      return;
    }
    this.options.logger.setLogLevel(this.store.getSettings().logLevel);
    this.store.onChange((changes, settings) => this.handleSettingsChange(changes, settings));

    // 3. MQTT connection supervisor
    this.connection = new ConnectionManager({
      identity,
      settings: () => this.store.getSettings(),
      sessionFactory: this.options.sessionFactory
        ?? new MqttSessionFactory({ logger: this.options.logger.child(LogComponents.mqtt) }),
      logger: this.options.logger.child(LogComponents.mqtt),
      backoff: {
        baseDelayMs: BACKOFF_BASE_UNITS * this.timeUnitMs,
        maxDelayMs: BACKOFF_MAX_UNITS * this.timeUnitMs,
        multiplier: 2,
      },
    });
    this.connection.start();

    // 4. Periodic publishers, intervals read live from settings
    this.heartbeat = new PeriodicTask({
      name: 'heartbeat',
      intervalMs: () => this.store.getSettings().heartbeatIntervalSeconds * this.timeUnitMs,
      logger: this.options.logger.child(LogComponents.heartbeat),
      run: () => this.publishHeartbeat(),
    });
    this.measurement = new PeriodicTask({
      name: 'measurement',
      intervalMs: () => this.store.getSettings().pollIntervalSeconds * this.timeUnitMs,
      logger: this.measurementLogger,
      run: () => this.publishMeasurement(),
    });
    this.heartbeat.start();
    this.measurement.start();

    const settings = this.store.getSettings();
    this.logger.info('Device Agent initialized successfully', {
      deviceId: identity.deviceId,
      broker: `${settings.brokerHost}:${settings.brokerPort}`,
      pollInterval: settings.pollIntervalSeconds,
      heartbeatInterval: settings.heartbeatIntervalSeconds,
    });
  }

  /**
   * Ordered, idempotent shutdown. Every call returns the same promise.
   */
  public shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.stopComponents();
    }
    return this.shutdownPromise;
  }

  public getConnection(): ConnectionManager | undefined {
    return this.connection;
  }

  public getSettingsStore(): SettingsStore {
    return this.store;
  }

  private async stopComponents(): Promise<void> {
    this.logger.info('Stopping Device Agent');

    // Stop publishers
    await Promise.all([this.heartbeat?.stop(), this.measurement?.stop()]);
    this.logger.debug('Publishers stopped');

    // Stop settings watch
    await this.store.stop();
    this.logger.debug('Settings watch stopped');

    // Stop MQTT connection (publishes offline, releases the session)
    await this.connection?.stop();

    this.logger.info('Device Agent stopped');
  }

  private handleSettingsChange(changes: ChangeRecord, settings: RuntimeSettings): void {
    if (changes.logLevel) {
      this.options.logger.setLogLevel(changes.logLevel.new);
    }

    if (changes.pollIntervalSeconds || changes.heartbeatIntervalSeconds) {
      this.logger.info('Publish intervals take effect on the next tick', {
        pollInterval: settings.pollIntervalSeconds,
        heartbeatInterval: settings.heartbeatIntervalSeconds,
      });
    }

    if (requiresReconnect(changes)) {
      this.connection?.requestReconnect();
    }
  }

  private async publishHeartbeat(): Promise<void> {
    if (!this.connection?.isConnected()) {
      return;
    }
    await this.connection.publishStatus('online');
  }

  private async publishMeasurement(): Promise<void> {
    const connection = this.connection;
    const identity = this.identity;
    if (!connection?.isConnected() || !identity) {
      return;
    }

    const now = this.options.now?.() ?? new Date();
    const payload = JSON.stringify(createMeasurement(identity.ratedPower, now, this.options.random));

    const published = await connection.publish(measurementTopic(identity.deviceId), payload, { qos: 0 });
    if (published) {
      this.measurementLogger.info(`Published measurement: ${payload}`, { topic: measurementTopic(identity.deviceId) });
    }
  }
}
