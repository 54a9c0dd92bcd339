import mqtt from 'mqtt';
import type { MqttClient } from 'mqtt';
import { SessionClosedError } from '../errors';
import type { Logger } from '../logging/agent-logger';

export type QoS = 0 | 1 | 2;

export interface PublishOptions {
  qos: QoS;
  retain: boolean;
}

export interface WillMessage extends PublishOptions {
  topic: string;
  payload: string;
}

/**
 * Where a session points. Two sessions with equal targets are interchangeable.
 */
export interface SessionTarget {
  host: string;
  port: number;
  clientId: string;
}

export interface SessionOptions extends SessionTarget {
  will: WillMessage;
}

/**
 * One established broker connection. Owned by a single ConnectionManager.
 */
export interface BrokerSession {
  readonly target: SessionTarget;
  publish(topic: string, payload: string, options: PublishOptions): Promise<void>;
  /** Clean disconnect; the broker discards the last-will */
  end(): Promise<void>;
  /** Called once when the connection goes away, for whatever reason */
  onClose(listener: () => void): void;
}

/**
 * Opens sessions. Resolves once the broker acknowledged the connection,
 * rejects on any failure before that.
 */
export interface SessionFactory {
  connect(options: SessionOptions): Promise<BrokerSession>;
}

export function sameTarget(a: SessionTarget, b: SessionTarget): boolean {
  return a.host === b.host && a.port === b.port && a.clientId === b.clientId;
}

export interface MqttSessionFactoryOptions {
  logger: Logger;
  connectTimeoutMs?: number;
  publishTimeoutMs?: number;
  endTimeoutMs?: number;
  keepaliveSeconds?: number;
}

/**
 * mqtt.js backed sessions.
 *
 * Auto-reconnect is disabled on the client; reconnection policy belongs to
 * ConnectionManager.
 */
export class MqttSessionFactory implements SessionFactory {
  constructor(private readonly options: MqttSessionFactoryOptions) {}

  public connect(options: SessionOptions): Promise<BrokerSession> {
    const { logger } = this.options;
    const connectTimeoutMs = this.options.connectTimeoutMs ?? 10000;
    const brokerUrl = `mqtt://${options.host}:${options.port}`;
    const target: SessionTarget = { host: options.host, port: options.port, clientId: options.clientId };

    logger.debug(`Connecting to MQTT broker: ${brokerUrl}`, { clientId: options.clientId });

    return new Promise((resolve, reject) => {
      const client = mqtt.connect(brokerUrl, {
        clientId: options.clientId,
        clean: true,
        reconnectPeriod: 0,
        connectTimeout: connectTimeoutMs,
        keepalive: this.options.keepaliveSeconds ?? 60,
        will: {
          topic: options.will.topic,
          payload: Buffer.from(options.will.payload),
          qos: options.will.qos,
          retain: options.will.retain,
        },
      });

      // Guard in case the client never reports back
      const connectionTimeout = setTimeout(() => {
        fail(new Error(`MQTT connection timeout after ${connectTimeoutMs}ms: ${brokerUrl}`));
      }, connectTimeoutMs + 1000);

      const onError = (error: Error) => fail(error);
      const onClose = () => fail(new SessionClosedError(options.host, options.port));

      const fail = (error: Error) => {
        clearTimeout(connectionTimeout);
        client.removeAllListeners();
        // Late errors from a discarded client must not become unhandled 'error' events
        client.on('error', (lateError) => {
          logger.debug('Error from discarded MQTT client', { brokerUrl, error: lateError.message });
        });
        client.end(true);
        reject(error);
      };

      client.once('connect', () => {
        clearTimeout(connectionTimeout);
        client.removeListener('error', onError);
        client.removeListener('close', onClose);
        resolve(new MqttSession(client, target, {
          logger,
          publishTimeoutMs: this.options.publishTimeoutMs ?? 5000,
          endTimeoutMs: this.options.endTimeoutMs ?? 5000,
        }));
      });

      client.once('error', onError);
      client.once('close', onClose);
    });
  }
}

interface MqttSessionSettings {
  logger: Logger;
  publishTimeoutMs: number;
  endTimeoutMs: number;
}

class MqttSession implements BrokerSession {
  private closed = false;
  private closeListeners: Array<() => void> = [];

  constructor(
    private readonly client: MqttClient,
    public readonly target: SessionTarget,
    private readonly settings: MqttSessionSettings,
  ) {
    client.on('close', () => this.handleClose());
    client.on('error', (error) => {
      settings.logger.warn('MQTT client error', {
        host: target.host,
        port: target.port,
        error: error.message,
      });
    });
  }

  public publish(topic: string, payload: string, options: PublishOptions): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error(`MQTT publish timeout after ${this.settings.publishTimeoutMs}ms: ${topic}`));
      }, this.settings.publishTimeoutMs);

      this.client.publish(topic, payload, { qos: options.qos, retain: options.retain }, (error) => {
        clearTimeout(timeout);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  public end(): Promise<void> {
    return new Promise((resolve) => {
      // A graceful end waits for in-flight QoS 1 messages; on a dead link that
      // never happens and a forced end() is a no-op once disconnecting
      const forceTimer = setTimeout(() => {
        this.settings.logger.warn('Graceful MQTT disconnect stalled, destroying the connection', {
          host: this.target.host,
          port: this.target.port,
          timeoutMs: this.settings.endTimeoutMs,
        });
        this.onClose(() => resolve());
        this.client.stream.destroy();
      }, this.settings.endTimeoutMs);

      this.client.end(false, {}, () => {
        clearTimeout(forceTimer);
        resolve();
      });
    });
  }

  public onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  private handleClose(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener();
    }
  }
}
