import process from 'node:process';

import type { FastifyInstance } from 'fastify';
import type { BaseLogger } from 'pino';

import { createApp } from './app';
import { ensureAssets } from './assets';
import type { StatusboardConfig } from './config';
import { InstanceLock } from './lock';
import { createStandaloneLogger } from './logger';
import type { AppContext } from './types';

export interface PreparedServer {
  app: FastifyInstance;
  ctx: AppContext;
  lock: InstanceLock | null;
}

/**
 * Startup up to, but not including, listening: assets, config load, lock,
 * then the block schedulers. Nothing is left held when a step fails.
 */
export const prepareServer = async (config: StatusboardConfig, log: BaseLogger): Promise<PreparedServer> => {
  await ensureAssets(config, log);

  const { app, ctx, startSchedulers } = await createApp(config, { startSchedulers: false });

  const lock = config.enableLock ? new InstanceLock(config.lockPath, log) : null;
  try {
    await lock?.acquire();
  } catch (error) {
    await app.close();
    throw error;
  }

  startSchedulers();
  return { app, ctx, lock };
};

export const startServer = async (config: StatusboardConfig): Promise<void> => {
  const log = createStandaloneLogger(config.logLevel);

  const prepared = await prepareServer(config, log).catch((error: unknown) => {
    log.error({ err: error }, 'Failed to initialise statusboard');
    return null;
  });
  if (!prepared) {
    process.exit(1);
    return;
  }

  const { app, ctx, lock } = prepared;

  const exitWithLockReleased = async (code: number): Promise<never> => {
    await lock?.release();
    process.exit(code);
  };

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Received termination signal, shutting down');
    try {
      await app.close();
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      await exitWithLockReleased(1);
    }
    await exitWithLockReleased(0);
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  const port = config.portOverride ?? ctx.store.snapshot().port;
  try {
    await app.listen({ port, host: config.host });
    app.log.info({ port, host: config.host, pid: process.pid }, 'Statusboard listening');
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start statusboard');
    await app.close();
    await exitWithLockReleased(1);
  }
};
