import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import { ensureAssets } from '../src/assets';
import { resolvePaths, type StatusboardConfig } from '../src/config';
import { createStandaloneLogger } from '../src/logger';
import { generateStaticPage, runIntervalGeneration, writeHtmlToFile } from '../src/staticPage';

const log = createStandaloneLogger('silent');
const fixedNow = () => new Date('2024-06-01T12:00:00.000Z');

const makeConfig = async (): Promise<StatusboardConfig> => {
  const tmp = await mkdtemp(path.join(os.tmpdir(), 'statusboard-static-'));
  const config: StatusboardConfig = {
    host: '127.0.0.1',
    portOverride: null,
    logLevel: 'silent',
    shell: 'sh',
    appVersion: '1.2.3',
    enableLock: false,
    ...resolvePaths(tmp)
  };
  await ensureAssets(config, log);
  await writeFile(
    config.configPath,
    JSON.stringify({
      blocks: [
        { type: 'single', title: 'Echo', command: 'echo static', interval: 30 },
        {
          type: 'group',
          title: 'About',
          commands: [
            { label: 'Name', command: '%app_name' },
            { label: 'Version', command: '%app_version' }
          ],
          interval: 30
        }
      ]
    }),
    'utf8'
  );
  return config;
};

test('runs every block once and persists the results', async (t) => {
  const config = await makeConfig();
  t.after(() => rm(config.homeDir, { recursive: true, force: true }));

  const html = await generateStaticPage(config, log, { now: fixedNow });
  assert.ok(html.includes('"output":"static"'));
  assert.ok(html.includes('{"label":"Name","command":"%app_name","output":"Statusboard"}'));
  assert.ok(html.includes('"version":"1.2.3"'));

  const saved = JSON.parse(await readFile(config.configPath, 'utf8'));
  assert.equal(saved.blocks[0].output, 'static');
  assert.equal(saved.blocks[0].last_updated, '2024-06-01T12:00:00.000Z');
  assert.equal(saved.blocks[1].commands[1].output, '1.2.3');
});

test('writes the page to a nested output path', async (t) => {
  const tmp = await mkdtemp(path.join(os.tmpdir(), 'statusboard-static-'));
  t.after(() => rm(tmp, { recursive: true, force: true }));

  const written = await writeHtmlToFile('<html></html>', path.join(tmp, 'out', 'page.html'));
  assert.equal(written, path.join(tmp, 'out', 'page.html'));
  assert.equal(await readFile(written, 'utf8'), '<html></html>');
});

test('interval generation runs immediately and stops on abort', async (t) => {
  const config = await makeConfig();
  t.after(() => rm(config.homeDir, { recursive: true, force: true }));

  const controller = new AbortController();
  controller.abort();
  const generated = await runIntervalGeneration(config, log, {
    intervalSeconds: 60,
    signal: controller.signal,
    now: fixedNow
  });

  assert.equal(generated, 1);
  const page = await readFile(config.staticOutputPath, 'utf8');
  assert.ok(page.includes('"output":"static"'));
});

test('interval generation repeats until aborted', async (t) => {
  const config = await makeConfig();
  t.after(() => rm(config.homeDir, { recursive: true, force: true }));
  const outputPath = path.join(config.homeDir, 'public', 'status.html');

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), 1500);
  t.after(() => clearTimeout(timer));

  const generated = await runIntervalGeneration(config, log, {
    intervalSeconds: 1,
    outputPath,
    signal: controller.signal
  });

  assert.ok(generated >= 2, `expected at least two generations, got ${generated}`);
  assert.ok((await readFile(outputPath, 'utf8')).includes('"output":"static"'));
});

test('a failed generation is logged and does not end the loop', async (t) => {
  const config = await makeConfig();
  t.after(() => rm(config.homeDir, { recursive: true, force: true }));
  await rm(config.templatePath);

  const controller = new AbortController();
  controller.abort();
  const generated = await runIntervalGeneration(config, log, {
    intervalSeconds: 1,
    signal: controller.signal
  });

  assert.equal(generated, 0);
});
