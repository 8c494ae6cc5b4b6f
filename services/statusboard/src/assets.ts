import { existsSync, promises as fs } from 'node:fs';
import path from 'node:path';

import type { BaseLogger } from 'pino';

import type { StatusboardConfig } from './config';

export const DEFAULT_ASSETS_DIR = path.join(__dirname, '..', 'assets');

type AssetPaths = Pick<StatusboardConfig, 'homeDir' | 'templatePath' | 'iconsDir'>;

/**
 * Prepares the home directory: the template is refreshed from the packaged
 * copy on every start, the icons directory only when it is missing.
 */
export const ensureAssets = async (
  paths: AssetPaths,
  log: BaseLogger,
  assetsDir: string = DEFAULT_ASSETS_DIR
): Promise<void> => {
  await fs.mkdir(paths.homeDir, { recursive: true });

  const templateSource = path.join(assetsDir, 'template.html');
  log.info({ from: templateSource, to: paths.templatePath }, 'Copying page template');
  await fs.copyFile(templateSource, paths.templatePath);

  if (!existsSync(paths.iconsDir)) {
    const iconsSource = path.join(assetsDir, 'icons');
    log.info({ from: iconsSource, to: paths.iconsDir }, 'Copying icons');
    await fs.cp(iconsSource, paths.iconsDir, { recursive: true });
  }
};
