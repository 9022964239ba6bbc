// src/index.ts - Coordinator service entry point
import { Server } from 'http';
import { createApp, startApiServer } from './api/server';
import { config, validateConfig } from './config';
import { DeadLetter } from './coordinator/dead-letter-queue';
import { Runtime, buildRuntime } from './runtime';
import { DeploymentRecord, MigrationRecord } from './types';
import { errorMessage } from './types/errors';
import { logger, shortId } from './utils/logger';

function logLifecycle(runtime: Runtime): void {
  const { coordinator } = runtime;

  coordinator.on('tokenDeployed', (record: DeploymentRecord) => {
    logger.info(`✅ Deployed ${shortId(record.launchId)} on chain ${record.chainId}`, { token: record.tokenAddress });
  });
  coordinator.on('migrationCompleted', (record: MigrationRecord) => {
    logger.info(`🎓 ${shortId(record.launchId)} migrated on chain ${record.chainId}`, { pair: record.liquidityPair });
  });
  coordinator.on('legFailed', (entry: DeadLetter) => {
    logger.error(`Leg ${entry.id} parked; re-dispatch with POST /dead-letters/${entry.id}/redispatch`);
  });
}

async function startApplication(): Promise<void> {
  logger.info('🚀 Starting cross-chain launchpad coordinator...');

  validateConfig(config);
  if (config.CHAIN_IDS.length === 0) {
    throw new Error('CHAIN_IDS is empty; nothing to coordinate');
  }

  const runtime = await buildRuntime(config);
  logLifecycle(runtime);
  await runtime.coordinator.start();

  const app = createApp({
    coordinator: runtime.coordinator,
    sources: runtime.sources,
    authorizer: runtime.authorizer
  });
  const server = await startApiServer(app, config.API_PORT);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down...`);

    await closeServer(server);
    await runtime.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch(error => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => {
      logger.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

if (require.main === module) {
  startApplication().catch(error => {
    logger.error('Failed to start application', { error: errorMessage(error) });
    process.exit(1);
  });
}

export { startApplication };
