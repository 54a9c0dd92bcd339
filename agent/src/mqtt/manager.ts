import { EventEmitter } from 'events';
import type { IdentityRecord, RuntimeSettings } from '../config/types';
import { sleep as defaultSleep } from '../lib/sleep';
import type { SleepFn } from '../lib/sleep';
import type { Logger } from '../logging/agent-logger';
import { getConnectionErrorType } from '../utils/network-errors';
import { DEFAULT_BACKOFF, ExponentialBackoff } from '../utils/retry-policy';
import type { BackoffConfig } from '../utils/retry-policy';
import { sameTarget } from './session';
import type { BrokerSession, PublishOptions, SessionFactory, SessionTarget, WillMessage } from './session';
import { statusPayload, statusTopic } from './topics';
import type { DeviceStatus } from './topics';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/**
 * Why the supervising loop stopped waiting on a live session
 */
type WakeReason = 'closed' | 'reconnect' | 'shutdown';

export interface ConnectionManagerOptions {
  identity: IdentityRecord;
  /** Live settings reader, consulted before every connection attempt */
  settings: () => RuntimeSettings;
  sessionFactory: SessionFactory;
  logger: Logger;
  backoff?: BackoffConfig;
  /** A session that drops sooner than this keeps the backoff escalating. Defaults to the base delay. */
  stableAfterMs?: number;
  sleep?: SleepFn;
  now?: () => number;
}

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Connection Manager
 *
 * Owns the single broker session of this device. A supervising loop is the
 * only writer of connection state: it connects, retries with exponential
 * backoff, announces online status, and tears the session down when asked
 * to reconnect or stop. Other callers only set a request and wake the loop.
 *
 * Every connection registers a retained "offline" last-will on the status
 * topic, so observers see offline even when the agent dies without a clean
 * disconnect.
 *
 * Events:
 * - 'stateChange' ({ from, to })
 * - 'connect' (target): session established and online status sent
 * - 'disconnect' (reason): 'closed' | 'reconnect' | 'shutdown'
 * - 'retry' (RetryEvent)
 */
export class ConnectionManager extends EventEmitter {
  private state: ConnectionState = 'disconnected';
  private session: BrokerSession | null = null;
  private loop?: Promise<void>;
  private stopping = false;
  private wake?: (reason: WakeReason) => void;
  private readonly shutdownController = new AbortController();
  private readonly backoff: ExponentialBackoff;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly stableAfterMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: ConnectionManagerOptions) {
    super();
    this.logger = options.logger;
    const backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.backoff = new ExponentialBackoff(backoff);
    this.stableAfterMs = options.stableAfterMs ?? backoff.baseDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start the supervising loop (idempotent). A stopped manager stays stopped.
   */
  public start(): void {
    if (this.loop || this.stopping) {
      return;
    }

    this.logger.info('Starting MQTT connection supervisor', {
      deviceId: this.options.identity.deviceId,
    });

    this.loop = this.supervise().catch((error) => {
      this.logger.error('MQTT connection supervisor exited unexpectedly', error);
      this.session = null;
      this.setState('disconnected');
    });
  }

  /**
   * Terminal shutdown. Resolves once the loop exited and the session is released.
   */
  public async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true;
      this.logger.info('Stopping MQTT connection manager', { state: this.state });
      this.shutdownController.abort();
      this.wake?.('shutdown');
    }

    await this.loop;
  }

  /**
   * Ask the loop to cycle the live session. Ignored unless connected.
   */
  public requestReconnect(): void {
    if (this.state !== 'connected' || this.stopping) {
      this.logger.debug('Reconnect requested while not connected, ignoring', { state: this.state });
      return;
    }

    this.logger.info('Reconnect requested');
    this.wake?.('reconnect');
  }

  /**
   * Publish message to MQTT topic.
   *
   * Dropped (not queued) when not connected. A failed publish is logged and
   * never changes connection state. Resolves true when the session accepted it.
   */
  public async publish(
    topic: string,
    payload: string,
    options: Partial<PublishOptions> = {}
  ): Promise<boolean> {
    const session = this.session;
    if (this.state !== 'connected' || !session) {
      this.logger.debug(`Not connected, dropping message: ${topic}`, { topic });
      return false;
    }

    const qos = options.qos ?? 0;
    const retain = options.retain ?? false;
    this.logger.debug(`Publishing: ${topic}`, { topic, qos, retain, payload });

    try {
      await session.publish(topic, payload, { qos, retain });
      return true;
    } catch (error) {
      this.logger.error(`Publish failed: ${topic}`, error, { topic, qos, retain });
      return false;
    }
  }

  /**
   * Publish {"status": status} to the device status topic, retained, QoS 1
   */
  public publishStatus(status: DeviceStatus): Promise<boolean> {
    return this.publish(statusTopic(this.options.identity.deviceId), statusPayload(status), {
      qos: 1,
      retain: true,
    });
  }

  public isConnected(): boolean {
    return this.state === 'connected';
  }

  public getState(): ConnectionState {
    return this.state;
  }

  /**
   * Delay the next connection failure would wait
   */
  public getNextRetryDelay(): number {
    return this.backoff.peekNextDelay();
  }

  private async supervise(): Promise<void> {
    while (!this.stopping) {
      const target = this.currentTarget();
      this.setState('connecting');

      let session: BrokerSession;
      try {
        session = await this.options.sessionFactory.connect({ ...target, will: this.lastWill() });
      } catch (error) {
        this.setState('disconnected');
        if (this.stopping) {
          break;
        }
        await this.waitBeforeRetry(target, error);
        continue;
      }

      if (this.stopping) {
        // Never announced online, nothing to retract
        await this.release(session);
        break;
      }

      if (!sameTarget(target, this.currentTarget())) {
        this.logger.info('Broker settings changed while connecting, reconnecting', {
          host: target.host,
          port: target.port,
        });
        await this.release(session);
        this.setState('disconnected');
        continue;
      }

      const ended = this.waitForSessionEnd(session);
      const failuresBeforeConnect = this.backoff.getConsecutiveFailures();
      const connectedAt = this.now();
      this.session = session;
      this.backoff.reset();
      this.setState('connected');

      this.logger.info(`Connected to MQTT broker at ${target.host}:${target.port}`, {
        host: target.host,
        port: target.port,
        clientId: target.clientId,
      });

      await this.publishStatus('online');
      this.emit('connect', target);

      const reason = await ended;
      await this.teardown(session, reason);

      if (reason === 'closed' && !this.stopping) {
        if (this.now() - connectedAt < this.stableAfterMs) {
          // Accepted then dropped: continue the failure sequence instead of starting over
          this.backoff.restore(failuresBeforeConnect);
        }
        await this.waitBeforeReconnect(target);
      }
    }

    this.setState('disconnected');
    this.logger.info('MQTT connection supervisor stopped');
  }

  private async waitBeforeRetry(target: SessionTarget, error: unknown): Promise<void> {
    const delayMs = this.backoff.recordFailure();
    const attempt = this.backoff.getConsecutiveFailures();

    this.logger.warn(`Connection failed (attempt ${attempt}), retrying in ${delayMs}ms`, {
      host: target.host,
      port: target.port,
      attempt,
      delayMs,
      errorType: getConnectionErrorType(error),
      error: error instanceof Error ? error.message : String(error),
    });

    const event: RetryEvent = { attempt, delayMs, error };
    this.emit('retry', event);

    await this.sleep(delayMs, this.shutdownController.signal);
  }

  private async waitBeforeReconnect(target: SessionTarget): Promise<void> {
    const delayMs = this.backoff.recordFailure();
    const attempt = this.backoff.getConsecutiveFailures();

    this.logger.info(`Reconnecting in ${delayMs}ms`, {
      host: target.host,
      port: target.port,
      attempt,
      delayMs,
    });

    await this.sleep(delayMs, this.shutdownController.signal);
  }

  private waitForSessionEnd(session: BrokerSession): Promise<WakeReason> {
    return new Promise((resolve) => {
      this.wake = resolve;
      session.onClose(() => resolve('closed'));
    });
  }

  private async teardown(session: BrokerSession, reason: WakeReason): Promise<void> {
    this.wake = undefined;

    if (reason === 'closed') {
      this.logger.warn('MQTT connection lost', {
        host: session.target.host,
        port: session.target.port,
      });
    } else {
      this.logger.info(
        reason === 'reconnect' ? 'Disconnecting to apply new broker settings' : 'Disconnecting from MQTT broker',
        { host: session.target.host, port: session.target.port }
      );
      // Best effort; the last-will covers us if this does not make it out
      await this.publishStatus('offline');
    }

    this.session = null;
    this.setState('disconnected');
    await this.release(session);
    this.emit('disconnect', reason);
  }

  private async release(session: BrokerSession): Promise<void> {
    try {
      await session.end();
    } catch (error) {
      this.logger.warn('Error releasing MQTT session', {
        host: session.target.host,
        port: session.target.port,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private currentTarget(): SessionTarget {
    const settings = this.options.settings();
    return {
      host: settings.brokerHost,
      port: settings.brokerPort,
      clientId: settings.clientId ?? this.options.identity.deviceId,
    };
  }

  private lastWill(): WillMessage {
    return {
      topic: statusTopic(this.options.identity.deviceId),
      payload: statusPayload('offline'),
      qos: 1,
      retain: true,
    };
  }

  private setState(next: ConnectionState): void {
    if (this.state === next) {
      return;
    }
    const from = this.state;
    this.state = next;
    this.logger.debug(`Connection state: ${from} → ${next}`);
    this.emit('stateChange', { from, to: next });
  }
}
