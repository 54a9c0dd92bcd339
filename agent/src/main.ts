/**
 * Process entry point
 *
 * Environment:
 *   DEVICE_IDENTITY_PATH       device.json location (default ./device.json)
 *   SETTINGS_PATH              config.yaml location (default ./config.yaml)
 *   LOG_LEVEL                  debug | info | warn | error (default info)
 *   LOG_FORMAT                 pretty | json (default pretty)
 *   SETTINGS_POLL_INTERVAL_MS  settings file check interval (default 1000)
 */

import dotenv from 'dotenv';
import DeviceAgent from './agent';
import { loadEnvironment } from './config/env';
import type { AgentEnvironment } from './config/env';
import { StartupFatalError } from './errors';
import { createLogger } from './logging/agent-logger';
import { LogComponents } from './logging/types';
import { registerShutdownSignals } from './shutdown-signals';

dotenv.config();

async function main(): Promise<void> {
  let environment: AgentEnvironment;
  try {
    environment = loadEnvironment();
  } catch (error) {
    // No logger configuration yet, report with defaults
    createLogger().error('Failed to start Device Agent', error, { component: LogComponents.agent });
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: environment.logLevel, format: environment.logFormat });
  const agentLogger = logger.child(LogComponents.agent);

  const agent = new DeviceAgent({
    identityPath: environment.identityPath,
    settingsPath: environment.settingsPath,
    settingsPollIntervalMs: environment.settingsPollIntervalMs,
    logger,
  });

  const unregisterSignals = registerShutdownSignals(agent, agentLogger);

  try {
    await agent.init();
  } catch (error) {
    if (error instanceof StartupFatalError) {
      agentLogger.error('Failed to start Device Agent', error);
    } else {
      agentLogger.error('Unexpected error during startup, shutting down', error);
    }
    process.exitCode = 1;
    await agent.shutdown();
    unregisterSignals();
  }
}

main().catch((error) => {
  console.error('Device Agent crashed', error);
  process.exitCode = 1;
});
