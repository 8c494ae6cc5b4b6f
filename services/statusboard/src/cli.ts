#!/usr/bin/env node

import process from 'node:process';

import { Command, InvalidArgumentError } from 'commander';

import { ensureAssets } from './assets';
import { DEFAULT_VERSION, loadConfig } from './config';
import { createStandaloneLogger } from './logger';
import { startServer } from './server';
import { generateStaticPage, runIntervalGeneration, writeHtmlToFile } from './staticPage';

export interface CliOptions {
  dryRun: boolean;
  interval: number;
  output?: string;
}

export type CliMode =
  | { kind: 'dry-run'; outputPath?: string }
  | { kind: 'interval'; intervalSeconds: number; outputPath?: string }
  | { kind: 'server' };

const parseSeconds = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Interval must be a whole number of seconds.');
  }
  return parsed;
};

export const resolveMode = (options: CliOptions): CliMode => {
  if (options.dryRun) {
    return { kind: 'dry-run', outputPath: options.output };
  }
  if (options.interval > 0) {
    return { kind: 'interval', intervalSeconds: options.interval, outputPath: options.output };
  }
  return { kind: 'server' };
};

const runMode = async (mode: CliMode): Promise<void> => {
  const config = loadConfig();

  if (mode.kind === 'server') {
    await startServer(config);
    return;
  }

  const log = createStandaloneLogger(config.logLevel);
  await ensureAssets(config, log);

  if (mode.kind === 'dry-run') {
    const html = await generateStaticPage(config, log);
    if (mode.outputPath) {
      const written = await writeHtmlToFile(html, mode.outputPath);
      log.info({ path: written }, 'Wrote static page');
    } else {
      process.stdout.write(`${html}\n`);
    }
    return;
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Received termination signal, stopping');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await runIntervalGeneration(config, log, {
    intervalSeconds: mode.intervalSeconds,
    outputPath: mode.outputPath,
    signal: controller.signal
  });
};

export function createProgram(action: (mode: CliMode) => Promise<void> = runMode): Command {
  const program = new Command();

  program
    .name('statusboard')
    .description('Serve a self-refreshing status page built from shell commands')
    .version(process.env.STATUSBOARD_VERSION?.trim() || DEFAULT_VERSION)
    .option('-d, --dry-run', 'generate the page once and exit', false)
    .option('-t, --interval <seconds>', 'regenerate a static page every N seconds', parseSeconds, 0)
    .option('-o, --output <path>', 'write the generated page to this file')
    .action(async (options: CliOptions) => {
      await action(resolveMode(options));
    });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
