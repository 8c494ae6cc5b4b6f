import { spawn, type ChildProcess } from 'node:child_process';

import { CommandExecutionError, describeError } from './errors';
import { isVariableReference, resolveVariable, type VariableContext } from './variables';

const DEFAULT_SHELL = 'bash';

export interface CommandExecutorOptions {
  variables: VariableContext;
  shell?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ExecuteOptions {
  /** Aborting kills the command's whole process group and rejects the call. */
  signal?: AbortSignal;
}

/** Inline text written into an output slot when its command failed. */
export const formatFailure = (error: unknown): string => `Error: ${describeError(error)}`;

export class CommandExecutor {
  private readonly variables: VariableContext;
  private readonly shell: string;
  private readonly cwd: string | undefined;
  private readonly env: NodeJS.ProcessEnv | undefined;

  constructor(options: CommandExecutorOptions) {
    this.variables = options.variables;
    this.shell = options.shell ?? DEFAULT_SHELL;
    this.cwd = options.cwd;
    this.env = options.env;
  }

  getShell(): string {
    return this.shell;
  }

  /**
   * Runs a command line or resolves a `%variable`. Resolves with the trimmed
   * combined stdout/stderr, rejects with {@link CommandExecutionError} when the
   * shell exits non-zero, is killed, or cannot be spawned.
   */
  async execute(command: string, options: ExecuteOptions = {}): Promise<string> {
    if (isVariableReference(command)) {
      return resolveVariable(command.slice(1), this.variables);
    }
    return this.runShell(command, options.signal);
  }

  private runShell(command: string, signal: AbortSignal | undefined): Promise<string> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let settled = false;

      const collected = () => Buffer.concat(chunks).toString('utf8');

      const aborted = () =>
        new CommandExecutionError('aborted', { command, exitCode: null, signal: null, output: collected() });

      if (signal?.aborted) {
        reject(aborted());
        return;
      }

      // Its own process group, so an abort also reaches grandchildren such as `sleep`.
      const child = spawn(this.shell, ['-c', command], {
        cwd: this.cwd,
        env: this.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: true
      });

      const onAbort = () => {
        killProcessGroup(child);
        settle(() => reject(aborted()));
      };

      const settle = (finish: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        finish();
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.once('error', (error) => {
        settle(() =>
          reject(
            new CommandExecutionError(error.message, {
              command,
              exitCode: null,
              signal: null,
              output: collected(),
              cause: error
            })
          )
        );
      });

      child.once('close', (code, exitSignal) => {
        settle(() => {
          const output = collected();
          if (code === 0) {
            resolve(output.trim());
            return;
          }
          const message = exitSignal ? `signal: ${exitSignal}` : `exit status ${code ?? 'unknown'}`;
          reject(new CommandExecutionError(message, { command, exitCode: code, signal: exitSignal, output }));
        });
      });
    });
  }
}

const killProcessGroup = (child: ChildProcess) => {
  if (child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
    } catch (error) {
      // The group is gone already or was never created; fall back to the shell itself.
      child.kill('SIGKILL');
    }
  }
  child.stdout?.destroy();
  child.stderr?.destroy();
};
