import { promises as fs } from 'node:fs';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import type { BaseLogger } from 'pino';
import {
  CommandExecutor,
  DashboardStore,
  SchedulerSupervisor,
  describeError,
  type HostProbe
} from '@statusboard/core';

import { APP_NAME, type StatusboardConfig } from './config';
import { buildPage } from './page';

export interface StaticPageOptions {
  now?: () => Date;
  host?: HostProbe;
}

/**
 * Loads the config fresh from disk, runs every block once, persists the
 * results and renders the page.
 */
export const generateStaticPage = async (
  config: StatusboardConfig,
  log: BaseLogger,
  options: StaticPageOptions = {}
): Promise<string> => {
  const store = new DashboardStore({ configPath: config.configPath, version: config.appVersion });
  store.on('persist:failed', (error) => {
    log.error({ err: error, configPath: error.configPath }, 'Could not save updated config');
  });
  await store.load();

  const executor = new CommandExecutor({
    shell: config.shell,
    variables: { appName: APP_NAME, appVersion: config.appVersion, now: options.now, host: options.host }
  });
  const supervisor = new SchedulerSupervisor({ store, executor, now: options.now });
  supervisor.on('command:failed', ({ name, label, command, error }) => {
    log.warn({ block: name, label, command, reason: describeError(error) }, 'Command failed');
  });
  supervisor.on('tick:failed', ({ name, error }) => {
    log.error({ err: error, block: name }, 'Block tick failed');
  });

  await supervisor.runAllOnce();
  return buildPage(config, store.snapshot(), log);
};

export const writeHtmlToFile = async (content: string, target: string): Promise<string> => {
  const absolutePath = path.resolve(target);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.writeFile(absolutePath, content, 'utf8');
  return absolutePath;
};

export interface IntervalGenerationOptions extends StaticPageOptions {
  intervalSeconds: number;
  outputPath?: string;
  signal: AbortSignal;
}

/**
 * Regenerates the static page every `intervalSeconds` (the first run is
 * immediate) until `signal` aborts. Resolves with the number of successful
 * generations.
 */
export const runIntervalGeneration = async (
  config: StatusboardConfig,
  log: BaseLogger,
  options: IntervalGenerationOptions
): Promise<number> => {
  const target = options.outputPath || config.staticOutputPath;
  let generated = 0;

  const runGeneration = async () => {
    log.info('Generating static page');
    try {
      const html = await generateStaticPage(config, log, options);
      const written = await writeHtmlToFile(html, target);
      generated += 1;
      log.info({ path: written }, 'Static page updated');
    } catch (error) {
      log.error({ err: error, path: target }, 'Error generating static page');
    }
  };

  log.info({ intervalSeconds: options.intervalSeconds }, 'Starting static page generation');
  await runGeneration();

  while (!options.signal.aborted) {
    try {
      await delay(options.intervalSeconds * 1000, undefined, { signal: options.signal });
    } catch (error) {
      if (options.signal.aborted) {
        break;
      }
      throw error;
    }
    await runGeneration();
  }

  log.info({ generated }, 'Static page generation stopped');
  return generated;
};
