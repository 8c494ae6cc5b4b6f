import os from 'node:os';
import path from 'node:path';

export const APP_NAME = 'Statusboard';
export const DEFAULT_VERSION = '0.1.0';

export interface StatusboardConfig {
  host: string;
  /** Overrides the port stored in config.json when set. */
  portOverride: number | null;
  logLevel: string;
  shell: string;
  appVersion: string;
  enableLock: boolean;
  homeDir: string;
  configPath: string;
  templatePath: string;
  iconsDir: string;
  iconPath: string;
  lockPath: string;
  staticOutputPath: string;
}

const toBool = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const resolveHomeDir = (env: NodeJS.ProcessEnv): string => {
  const configured = env.STATUSBOARD_HOME?.trim();
  if (configured) {
    return path.resolve(configured);
  }

  const userHome = os.homedir();
  if (!userHome) {
    throw new Error('Unable to determine the user home directory; set STATUSBOARD_HOME');
  }
  return path.join(userHome, '.statusboard');
};

/** Every file the service reads or writes lives under `homeDir`. */
export const resolvePaths = (homeDir: string) => {
  const iconsDir = path.join(homeDir, 'icons');
  return {
    homeDir,
    configPath: path.join(homeDir, 'config.json'),
    templatePath: path.join(homeDir, 'template.html'),
    iconsDir,
    iconPath: path.join(iconsDir, 'statusboard.png'),
    lockPath: path.join(homeDir, 'statusboard.lock'),
    staticOutputPath: path.join(homeDir, 'index.html')
  };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): StatusboardConfig => {
  const rawPort = env.STATUSBOARD_PORT?.trim();
  let portOverride: number | null = null;
  if (rawPort) {
    portOverride = Number.parseInt(rawPort, 10);
    if (Number.isNaN(portOverride) || portOverride < 0 || portOverride > 65535) {
      throw new Error('STATUSBOARD_PORT must be an integer between 0 and 65535');
    }
  }

  const host = env.STATUSBOARD_HOST?.trim() || '0.0.0.0';
  const logLevel = env.STATUSBOARD_LOG_LEVEL?.trim() || 'info';
  const shell = env.STATUSBOARD_SHELL?.trim() || 'bash';
  const appVersion = env.STATUSBOARD_VERSION?.trim() || DEFAULT_VERSION;
  const enableLock = toBool(env.STATUSBOARD_ENABLE_LOCK, true);

  return {
    host,
    portOverride,
    logLevel,
    shell,
    appVersion,
    enableLock,
    ...resolvePaths(resolveHomeDir(env))
  };
};
