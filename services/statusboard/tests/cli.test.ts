import assert from 'node:assert/strict';
import { test } from 'node:test';

import { createProgram, resolveMode, type CliMode } from '../src/cli';

const parse = async (args: string[]): Promise<CliMode[]> => {
  const modes: CliMode[] = [];
  const program = createProgram(async (mode) => {
    modes.push(mode);
  });
  program.exitOverride();
  await program.parseAsync(args, { from: 'user' });
  return modes;
};

test('starts the server when no flag is given', async () => {
  assert.deepEqual(await parse([]), [{ kind: 'server' }]);
});

test('dry run with and without an output file', async () => {
  assert.deepEqual(await parse(['--dry-run']), [{ kind: 'dry-run', outputPath: undefined }]);
  assert.deepEqual(await parse(['-d', '-o', 'page.html']), [{ kind: 'dry-run', outputPath: 'page.html' }]);
});

test('interval mode takes whole seconds', async () => {
  assert.deepEqual(await parse(['-t', '30']), [{ kind: 'interval', intervalSeconds: 30, outputPath: undefined }]);
  assert.deepEqual(await parse(['--interval', '5', '--output', 'out/index.html']), [
    { kind: 'interval', intervalSeconds: 5, outputPath: 'out/index.html' }
  ]);
});

test('an interval of zero starts the server', async () => {
  assert.deepEqual(await parse(['-t', '0']), [{ kind: 'server' }]);
});

test('dry run wins over an interval', () => {
  assert.deepEqual(resolveMode({ dryRun: true, interval: 10 }), { kind: 'dry-run', outputPath: undefined });
});

test('rejects a malformed interval', async () => {
  const program = createProgram(async () => undefined);
  program.exitOverride();
  program.configureOutput({ writeErr: () => undefined });
  await assert.rejects(program.parseAsync(['-t', 'soon'], { from: 'user' }), {
    code: 'commander.invalidArgument'
  });
});
