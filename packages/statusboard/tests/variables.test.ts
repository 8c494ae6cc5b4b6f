import assert from 'node:assert/strict';
import type { NetworkInterfaceInfo } from 'node:os';
import { test } from 'node:test';

import {
  NOT_AVAILABLE,
  UNKNOWN_VARIABLE,
  isVariableReference,
  listVariables,
  resolveVariable,
  type HostProbe,
  type VariableContext
} from '../src';

const ipv4 = (address: string, internal: boolean): NetworkInterfaceInfo => ({
  address,
  netmask: '255.255.255.0',
  family: 'IPv4',
  mac: '00:00:00:00:00:00',
  internal,
  cidr: `${address}/24`
});

const ipv6 = (address: string): NetworkInterfaceInfo => ({
  address,
  netmask: 'ffff:ffff:ffff:ffff::',
  family: 'IPv6',
  mac: '00:00:00:00:00:00',
  internal: false,
  cidr: `${address}/64`,
  scopeid: 0
});

const makeProbe = (overrides: Partial<HostProbe> = {}): HostProbe => ({
  hostname: () => 'board-host',
  userInfo: () => ({ username: 'operator' }),
  networkInterfaces: () => ({
    lo: [ipv4('127.0.0.1', true)],
    eth0: [ipv6('fe80::1'), ipv4('192.168.1.20', false)],
    eth1: [ipv4('10.0.0.5', false)]
  }),
  ...overrides
});

// Tuesday, 5 March 2024, 07:08:09 local time
const fixedNow = () => new Date(2024, 2, 5, 7, 8, 9);

const makeContext = (overrides: Partial<VariableContext> = {}): VariableContext => ({
  appName: 'Statusboard',
  appVersion: '1.2.3',
  now: fixedNow,
  host: makeProbe(),
  ...overrides
});

test('resolves clock variables from the current local time', () => {
  const context = makeContext();
  assert.equal(resolveVariable('date', context), '2024-03-05');
  assert.equal(resolveVariable('time', context), '07:08:09');
  assert.equal(resolveVariable('year', context), '2024');
  assert.equal(resolveVariable('month', context), '03');
  assert.equal(resolveVariable('day', context), '05');
  assert.equal(resolveVariable('dayname', context), 'Tuesday');
  assert.equal(resolveVariable('hours', context), '07');
  assert.equal(resolveVariable('minutes', context), '08');
  assert.equal(resolveVariable('seconds', context), '09');
});

test('resolves host and application variables', () => {
  const context = makeContext();
  assert.equal(resolveVariable('hostname', context), 'board-host');
  assert.equal(resolveVariable('username', context), 'operator');
  assert.equal(resolveVariable('app_name', context), 'Statusboard');
  assert.equal(resolveVariable('app_version', context), '1.2.3');
});

test('ip_address picks the first non-internal IPv4 address', () => {
  assert.equal(resolveVariable('ip_address', makeContext()), '192.168.1.20');

  const loopbackOnly = makeContext({
    host: makeProbe({ networkInterfaces: () => ({ lo: [ipv4('127.0.0.1', true)], eth0: [ipv6('fe80::2')] }) })
  });
  assert.equal(resolveVariable('ip_address', loopbackOnly), NOT_AVAILABLE);
});

test('unknown names resolve to the placeholder', () => {
  const context = makeContext();
  assert.equal(resolveVariable('uptime', context), UNKNOWN_VARIABLE);
  assert.equal(resolveVariable('constructor', context), UNKNOWN_VARIABLE);
  assert.equal(resolveVariable('', context), UNKNOWN_VARIABLE);
});

test('a failing host query is returned inline instead of thrown', () => {
  const context = makeContext({
    host: makeProbe({
      userInfo: () => {
        throw new Error('no passwd entry');
      }
    })
  });
  assert.equal(resolveVariable('username', context), 'Error: no passwd entry');
  assert.equal(resolveVariable('hostname', context), 'board-host');
});

test('every listed variable resolves to a string without throwing', () => {
  const context = makeContext();
  const names = listVariables();
  assert.equal(names.length, 14);
  for (const name of names) {
    const value = resolveVariable(name, context);
    assert.equal(typeof value, 'string');
    assert.notEqual(value, UNKNOWN_VARIABLE);
  }
});

test('variable references need the sentinel and a name', () => {
  assert.equal(isVariableReference('%date'), true);
  assert.equal(isVariableReference('%'), false);
  assert.equal(isVariableReference('date'), false);
  assert.equal(isVariableReference('echo %date'), false);
});
