import { promises as fs } from 'node:fs';

import type { BaseLogger } from 'pino';
import { renderPage, toDataUri, type DashboardConfig } from '@statusboard/core';

import { PageAssetError } from './errors';

export interface PageAssets {
  templatePath: string;
  iconPath: string;
}

/** The page icon as a data URI, or an empty string when the icon cannot be read. */
export const loadIconDataUri = async (iconPath: string, log: BaseLogger): Promise<string> => {
  try {
    const bytes = await fs.readFile(iconPath);
    return toDataUri(bytes, 'image/png');
  } catch (error) {
    log.warn({ err: error, iconPath }, 'Could not read icon file');
    return '';
  }
};

/** Reads the template from disk on every call so edits show up without a restart. */
export const buildPage = async (assets: PageAssets, snapshot: DashboardConfig, log: BaseLogger): Promise<string> => {
  let template: string;
  try {
    template = await fs.readFile(assets.templatePath, 'utf8');
  } catch (error) {
    throw new PageAssetError(`Failed to read template file ${assets.templatePath}`, { cause: error });
  }

  const iconDataUri = await loadIconDataUri(assets.iconPath, log);
  return renderPage(template, snapshot, iconDataUri);
};
