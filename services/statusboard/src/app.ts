import { existsSync } from 'node:fs';

import cors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import fastify, { type FastifyInstance } from 'fastify';
import {
  CommandExecutor,
  DashboardStore,
  SchedulerSupervisor,
  describeError,
  type HostProbe
} from '@statusboard/core';

import { APP_NAME, type StatusboardConfig } from './config';
import { createLogger } from './logger';
import { createMetrics } from './metrics';
import { registerHealthRoutes } from './routes/health';
import { registerPageRoutes } from './routes/page';
import { registerEventRoutes } from './routes/events';
import { mapErrorToResponse } from './errors';
import type { AppContext } from './types';

export interface CreateAppOptions {
  /** Start one scheduler per block once the app is built (default true). */
  startSchedulers?: boolean;
  now?: () => Date;
  host?: HostProbe;
}

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
  /** Starts one scheduler per block; a no-op once they run. */
  startSchedulers: () => void;
}

export const createApp = async (
  config: StatusboardConfig,
  options: CreateAppOptions = {}
): Promise<CreateAppResult> => {
  const logger = createLogger(config.logLevel);
  const app = fastify({ logger });
  await app.register(cors, { origin: true, credentials: true });

  const metrics = createMetrics();
  metrics.readinessGauge.set({ component: 'store' }, 0);
  metrics.readinessGauge.set({ component: 'schedulers' }, 0);

  const store = new DashboardStore({ configPath: config.configPath, version: config.appVersion });
  store.on('config:loaded', ({ configPath, created, blockCount }) => {
    if (created) {
      app.log.info({ configPath, blockCount }, 'Config file not found, created it with the default blocks');
    } else {
      app.log.info({ configPath, blockCount }, 'Loaded config');
    }
  });
  store.on('persist:failed', (error) => {
    metrics.persistFailures.inc();
    app.log.error({ err: error, configPath: error.configPath }, 'Error saving config');
  });

  const readiness = {
    store: false,
    schedulers: false
  };

  await store.load();
  readiness.store = true;
  metrics.readinessGauge.set({ component: 'store' }, 1);

  const executor = new CommandExecutor({
    shell: config.shell,
    variables: {
      appName: APP_NAME,
      appVersion: config.appVersion,
      now: options.now,
      host: options.host
    }
  });
  const supervisor = new SchedulerSupervisor({ store, executor, now: options.now });

  supervisor.on('tick:completed', (tick) => {
    metrics.blockTicks.inc({ block: tick.name });
    metrics.tickDuration.observe({ block: tick.name }, tick.durationMs / 1000);
    app.log.debug({ block: tick.name, durationMs: tick.durationMs, failures: tick.failures }, 'Block updated');
  });
  supervisor.on('command:failed', ({ name, label, command, error }) => {
    metrics.commandFailures.inc({ block: name });
    app.log.warn({ block: name, label, command, reason: describeError(error) }, 'Command failed');
  });
  supervisor.on('tick:failed', ({ name, error }) => {
    metrics.tickFailures.inc({ block: name });
    app.log.error({ err: error, block: name }, 'Block tick failed');
  });

  const ctx: AppContext = {
    config,
    store,
    executor,
    supervisor,
    metrics,
    readiness
  };

  registerHealthRoutes(app, ctx);
  registerPageRoutes(app, ctx);
  registerEventRoutes(app, ctx);

  if (existsSync(config.iconsDir)) {
    await app.register(fastifyStatic, {
      root: config.iconsDir,
      prefix: '/icons/',
      decorateReply: false
    });
  } else {
    app.log.warn({ iconsDir: config.iconsDir }, 'Icons directory not found, /icons is not served');
  }

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  app.addHook('onClose', async () => {
    await supervisor.stop();
    readiness.schedulers = false;
  });

  const startSchedulers = () => {
    if (supervisor.isRunning()) {
      return;
    }
    supervisor.start();
    readiness.schedulers = true;
    metrics.readinessGauge.set({ component: 'schedulers' }, 1);
    app.log.info({ blocks: supervisor.getSchedulers().map((scheduler) => scheduler.name) }, 'Block schedulers started');
  };

  if (options.startSchedulers ?? true) {
    startSchedulers();
  }

  return { app, ctx, startSchedulers };
};
