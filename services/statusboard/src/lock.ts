import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';

import type { BaseLogger } from 'pino';
import { describeError } from '@statusboard/core';

export class InstanceLockedError extends Error {
  readonly code = 'INSTANCE_LOCKED';
  readonly lockPath: string;

  constructor(lockPath: string) {
    super(`Another instance of statusboard is already running. Lock file exists: ${lockPath}`);
    this.name = 'InstanceLockedError';
    this.lockPath = lockPath;
  }
}

const isAlreadyExistsError = (error: unknown): boolean =>
  Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'EEXIST');

/** A lock file holding the PID of the running server. */
export class InstanceLock {
  private readonly lockPath: string;
  private readonly log: BaseLogger;
  private handle: FileHandle | null = null;

  constructor(lockPath: string, log: BaseLogger) {
    this.lockPath = lockPath;
    this.log = log;
  }

  isHeld(): boolean {
    return this.handle !== null;
  }

  async acquire(): Promise<void> {
    if (this.handle) {
      return;
    }

    try {
      this.handle = await fs.open(this.lockPath, 'wx', 0o644);
    } catch (error) {
      if (isAlreadyExistsError(error)) {
        throw new InstanceLockedError(this.lockPath);
      }
      throw new Error(`Failed to create lock file ${this.lockPath}: ${describeError(error)}`, { cause: error });
    }

    await this.handle.writeFile(String(process.pid), 'utf8');
    this.log.info({ lockPath: this.lockPath, pid: process.pid }, 'Acquired lock');
  }

  /** Closes and removes the lock file; a failed removal is logged, not thrown. */
  async release(): Promise<void> {
    const handle = this.handle;
    if (!handle) {
      return;
    }
    this.handle = null;

    try {
      await handle.close();
      await fs.rm(this.lockPath);
      this.log.info({ lockPath: this.lockPath }, 'Released lock');
    } catch (error) {
      this.log.warn({ err: error, lockPath: this.lockPath }, 'Failed to remove lock file');
    }
  }
}
