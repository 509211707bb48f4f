import { Logger } from '@nestjs/common';
import type { ReputationConfiguration } from './config.types';

/* c8 ignore start */
export function logConfigurationSummary(config: ReputationConfiguration): void {
  const summaryLogger = new Logger('Configuration');

  summaryLogger.log(`Environment: ${config.environment}`);
  summaryLogger.log(`HTTP Server: port ${config.server.port}`);
  summaryLogger.log(`API Key: ${config.server.apiKey ? 'configured' : 'not configured (API routes locked)'}`);
  summaryLogger.log(`Reputation Strategy: ${config.strategy}`);
  summaryLogger.log(
    `History: ${config.history.maxEntries} sessions per address, ` +
      `retention ${config.history.retentionSeconds}s, prior after ${config.history.minSamples} sessions`,
  );

  if (config.sweep.enabled) {
    summaryLogger.log(`History Sweep: every ${config.sweep.intervalSeconds}s`);
  } else {
    summaryLogger.log('History Sweep: disabled');
  }

  summaryLogger.log('Configuration loaded successfully');
}
/* c8 ignore stop */
