export { default as DeviceAgent } from './agent';
export type { DeviceAgentOptions } from './agent';
export { registerShutdownSignals, SHUTDOWN_SIGNALS } from './shutdown-signals';
export type { ShutdownSignal, SignalSource, Stoppable } from './shutdown-signals';

export * from './config';
export * from './errors';
export * from './logging';

export { ConnectionManager } from './mqtt/manager';
export type { ConnectionManagerOptions, ConnectionState, RetryEvent } from './mqtt/manager';
export { MqttSessionFactory, sameTarget } from './mqtt/session';
export type {
  BrokerSession,
  MqttSessionFactoryOptions,
  PublishOptions,
  QoS,
  SessionFactory,
  SessionOptions,
  SessionTarget,
  WillMessage,
} from './mqtt/session';
export { measurementTopic, statusPayload, statusTopic } from './mqtt/topics';
export type { DeviceStatus } from './mqtt/topics';

export { createMeasurement, simulatePower } from './simulation/power-measurement';
export type { Measurement } from './simulation/power-measurement';
