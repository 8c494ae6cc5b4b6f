import assert from 'node:assert/strict';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import { DEFAULT_ASSETS_DIR, ensureAssets } from '../src/assets';
import { resolvePaths } from '../src/config';
import { createStandaloneLogger } from '../src/logger';

const log = createStandaloneLogger('silent');

test('copies the template and icons into a fresh home directory', async (t) => {
  const tmp = await mkdtemp(path.join(os.tmpdir(), 'statusboard-assets-'));
  t.after(() => rm(tmp, { recursive: true, force: true }));
  const paths = resolvePaths(path.join(tmp, 'home'));

  await ensureAssets(paths, log);

  const template = await readFile(paths.templatePath, 'utf8');
  const packaged = await readFile(path.join(DEFAULT_ASSETS_DIR, 'template.html'), 'utf8');
  assert.equal(template, packaged);
  assert.ok((await stat(paths.iconPath)).isFile());
});

test('refreshes the template but leaves existing icons alone', async (t) => {
  const tmp = await mkdtemp(path.join(os.tmpdir(), 'statusboard-assets-'));
  t.after(() => rm(tmp, { recursive: true, force: true }));
  const paths = resolvePaths(tmp);

  await mkdir(paths.iconsDir, { recursive: true });
  await writeFile(paths.iconPath, 'custom icon', 'utf8');
  await writeFile(paths.templatePath, 'stale template', 'utf8');

  await ensureAssets(paths, log);

  assert.notEqual(await readFile(paths.templatePath, 'utf8'), 'stale template');
  assert.equal(await readFile(paths.iconPath, 'utf8'), 'custom icon');
});

test('fails when the packaged template is missing', async (t) => {
  const tmp = await mkdtemp(path.join(os.tmpdir(), 'statusboard-assets-'));
  t.after(() => rm(tmp, { recursive: true, force: true }));
  const paths = resolvePaths(path.join(tmp, 'home'));

  await assert.rejects(ensureAssets(paths, log, path.join(tmp, 'no-assets')), { code: 'ENOENT' });
});
