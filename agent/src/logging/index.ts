/**
 * Logging Module
 * ==============
 */

export * from './types';
export { AgentLogger, createLogger } from './agent-logger';
export type { Logger, LoggerOptions, LogFormat } from './agent-logger';
