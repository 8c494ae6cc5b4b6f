import os, { type NetworkInterfaceInfo } from 'node:os';

import { describeError } from './errors';
import { VARIABLE_SENTINEL } from './schema';

export const UNKNOWN_VARIABLE = 'Unknown variable';
export const NOT_AVAILABLE = 'N/A';

/** The slice of `node:os` the resolver queries, swappable in tests. */
export interface HostProbe {
  hostname(): string;
  userInfo(): { username: string };
  networkInterfaces(): NodeJS.Dict<NetworkInterfaceInfo[]>;
}

export interface VariableContext {
  appName: string;
  appVersion: string;
  now?: () => Date;
  host?: HostProbe;
}

type VariableSource = (now: Date, host: HostProbe, context: VariableContext) => string;

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

const formatDate = (now: Date): string =>
  `${pad(now.getFullYear(), 4)}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;

const formatTime = (now: Date): string =>
  `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;

const firstExternalIpv4 = (host: HostProbe): string | null => {
  for (const addresses of Object.values(host.networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }
  return null;
};

const VARIABLES = new Map<string, VariableSource>([
  ['hostname', (_now, host) => host.hostname()],
  ['time', (now) => formatTime(now)],
  ['date', (now) => formatDate(now)],
  ['year', (now) => pad(now.getFullYear(), 4)],
  ['month', (now) => pad(now.getMonth() + 1)],
  ['day', (now) => pad(now.getDate())],
  ['dayname', (now) => WEEKDAYS[now.getDay()] ?? ''],
  ['hours', (now) => pad(now.getHours())],
  ['minutes', (now) => pad(now.getMinutes())],
  ['seconds', (now) => pad(now.getSeconds())],
  ['username', (_now, host) => host.userInfo().username],
  ['ip_address', (_now, host) => firstExternalIpv4(host) ?? NOT_AVAILABLE],
  ['app_name', (_now, _host, context) => context.appName],
  ['app_version', (_now, _host, context) => context.appVersion]
]);

export const listVariables = (): string[] => Array.from(VARIABLES.keys());

export const isVariableReference = (command: string): boolean =>
  command.length > 1 && command.startsWith(VARIABLE_SENTINEL);

/**
 * Resolves a built-in variable by name (without the sentinel). Never throws:
 * unknown names map to {@link UNKNOWN_VARIABLE} and a failing OS query is
 * returned inline as `Error: <message>`.
 */
export const resolveVariable = (name: string, context: VariableContext): string => {
  const source = VARIABLES.get(name);
  if (!source) {
    return UNKNOWN_VARIABLE;
  }

  try {
    const now = context.now ? context.now() : new Date();
    return source(now, context.host ?? os, context);
  } catch (error) {
    return `Error: ${describeError(error)}`;
  }
};
