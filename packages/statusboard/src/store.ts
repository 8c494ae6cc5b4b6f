import { EventEmitter } from 'node:events';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { createDefaultConfig } from './defaults';
import {
  ConfigLoadError,
  ConfigValidationError,
  PersistenceError,
  StatusboardError,
  describeError
} from './errors';
import { parseDashboardConfig, type DashboardConfig } from './schema';

const clone = <T>(value: T): T =>
  typeof structuredClone === 'function' ? structuredClone(value) : JSON.parse(JSON.stringify(value));

const isNotFoundError = (error: unknown): boolean =>
  Boolean(error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT');

export interface DashboardStoreOptions {
  configPath: string;
  /** Stamped into the tree on load; the file's own value is kept when omitted. */
  version?: string;
  createDefaults?: () => DashboardConfig;
}

export interface ConfigLoadedEvent {
  configPath: string;
  created: boolean;
  blockCount: number;
}

type DashboardStoreEvents = {
  'config:loaded': [event: ConfigLoadedEvent];
  'config:updated': [snapshot: DashboardConfig];
  'persist:failed': [error: PersistenceError];
};

export type DashboardMutation = (draft: DashboardConfig) => void;

/**
 * Owns the configuration tree. Every mutation and every write of the config
 * file runs through one promise queue; readers get deep copies of the last
 * committed tree.
 */
export class DashboardStore extends EventEmitter<DashboardStoreEvents> {
  private readonly configPath: string;
  private readonly version: string | undefined;
  private readonly createDefaults: () => DashboardConfig;
  private operationQueue: Promise<void> = Promise.resolve();
  private tree: DashboardConfig | null = null;

  constructor(options: DashboardStoreOptions) {
    super();
    this.configPath = path.resolve(options.configPath);
    this.version = options.version;
    this.createDefaults = options.createDefaults ?? (() => createDefaultConfig());
  }

  /**
   * Reads the config file, or writes the default blocks when it does not
   * exist yet. Any other read, parse or write problem is fatal to startup.
   */
  async load(): Promise<DashboardConfig> {
    return this.enqueue(async () => {
      const raw = await this.readConfigFile();

      if (raw === null) {
        const defaults = this.withVersion(parseDashboardConfig(this.createDefaults()));
        await fs.mkdir(path.dirname(this.configPath), { recursive: true });
        await this.writeTree(defaults);
        this.tree = defaults;
        this.emit('config:loaded', {
          configPath: this.configPath,
          created: true,
          blockCount: defaults.blocks.length
        });
        return clone(defaults);
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        throw new ConfigLoadError(this.configPath, `invalid JSON (${describeError(error)})`, error);
      }

      let tree: DashboardConfig;
      try {
        tree = this.withVersion(parseDashboardConfig(parsed));
      } catch (error) {
        if (error instanceof ConfigValidationError) {
          throw new ConfigLoadError(this.configPath, error.message, error.issues);
        }
        throw error;
      }

      this.tree = tree;
      this.emit('config:loaded', {
        configPath: this.configPath,
        created: false,
        blockCount: tree.blocks.length
      });
      return clone(tree);
    });
  }

  isLoaded(): boolean {
    return this.tree !== null;
  }

  /** A deep copy of the last committed tree; never reflects a half-applied mutation. */
  snapshot(): DashboardConfig {
    return clone(this.getTree());
  }

  /**
   * Applies `mutation` to a draft copy, validates it and swaps it in as a
   * whole, then persists the new tree inside the same queue slot. A throwing
   * mutation leaves the committed tree untouched. A failed write is reported
   * through `persist:failed`; the in-memory commit stands.
   */
  async mutate(mutation: DashboardMutation): Promise<DashboardConfig> {
    this.getTree();
    return this.enqueue(async () => {
      const draft = clone(this.getTree());
      mutation(draft);
      const next = parseDashboardConfig(draft);
      this.tree = next;
      this.emit('config:updated', clone(next));

      try {
        await this.writeTree(next);
      } catch (error) {
        const failure = error instanceof PersistenceError ? error : new PersistenceError(this.configPath, error);
        this.emit('persist:failed', failure);
      }

      return clone(next);
    });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  private getTree(): DashboardConfig {
    if (!this.tree) {
      throw new StatusboardError('Dashboard store has not been loaded');
    }
    return this.tree;
  }

  private withVersion(tree: DashboardConfig): DashboardConfig {
    return this.version === undefined ? tree : { ...tree, version: this.version };
  }

  private async readConfigFile(): Promise<string | null> {
    try {
      return await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw new ConfigLoadError(this.configPath, describeError(error), error);
    }
  }

  private async writeTree(tree: DashboardConfig): Promise<void> {
    try {
      await fs.writeFile(this.configPath, `${JSON.stringify(tree, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new PersistenceError(this.configPath, error);
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.operationQueue.then(operation);
    this.operationQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
