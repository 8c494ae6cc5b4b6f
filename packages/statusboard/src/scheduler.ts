import { EventEmitter } from 'node:events';

import { StatusboardError, TickAbortedError } from './errors';
import { formatFailure, type CommandExecutor } from './executor';
import { blockCommands, type Block, type DashboardConfig } from './schema';
import type { DashboardStore } from './store';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface BlockRef {
  index: number;
  title: string;
  name: string;
}

export interface TickCompletedEvent extends BlockRef {
  lastUpdated: string;
  durationMs: number;
  failures: number;
  outputs: string[];
}

export interface CommandFailedEvent extends BlockRef {
  label: string;
  command: string;
  error: unknown;
}

export interface TickFailedEvent extends BlockRef {
  error: unknown;
}

export type SchedulerEvents = {
  'tick:completed': [event: TickCompletedEvent];
  'command:failed': [event: CommandFailedEvent];
  'tick:failed': [event: TickFailedEvent];
};

export interface BlockSchedulerOptions {
  index: number;
  block: Block;
  store: DashboardStore;
  executor: CommandExecutor;
  events: EventEmitter<SchedulerEvents>;
  now?: () => Date;
}

const schedulerName = (index: number, title: string) => `block[${index}] ${title}`;

/** Writes one tick's outputs into the block at `index`, exhaustively per block type. */
const applyTick = (tree: DashboardConfig, index: number, outputs: string[], stamp: (previous: string) => string) => {
  const block = tree.blocks[index];
  if (!block) {
    throw new StatusboardError(`Block ${index} no longer exists`);
  }

  switch (block.type) {
    case 'single':
      block.output = outputs[0] ?? '';
      break;
    case 'group':
      block.commands.forEach((command, slot) => {
        command.output = outputs[slot] ?? '';
      });
      break;
  }

  block.last_updated = stamp(block.last_updated);
  tree.last_updated = stamp(tree.last_updated);
};

/** Next timestamp for a field, strictly after its previous value. */
const advance = (now: Date) => (previous: string): string => {
  const previousMs = Date.parse(previous);
  const nextMs = Number.isNaN(previousMs) ? now.getTime() : Math.max(now.getTime(), previousMs + 1);
  return new Date(nextMs).toISOString();
};

export class BlockScheduler {
  readonly index: number;
  readonly title: string;
  readonly name: string;
  private readonly block: Block;
  private readonly store: DashboardStore;
  private readonly executor: CommandExecutor;
  private readonly events: EventEmitter<SchedulerEvents>;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly liveTicks = new Set<AbortController>();
  private status: SchedulerState = 'idle';
  private tickCount = 0;

  constructor(options: BlockSchedulerOptions) {
    this.index = options.index;
    this.block = options.block;
    this.title = options.block.title;
    this.name = schedulerName(options.index, options.block.title);
    this.store = options.store;
    this.executor = options.executor;
    this.events = options.events;
    this.now = options.now ?? (() => new Date());
  }

  get state(): SchedulerState {
    return this.status;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get intervalMs(): number {
    return this.block.interval * 1000;
  }

  /** Runs the first tick right away, then one every `interval` seconds. */
  start(): void {
    if (this.status === 'stopped' || this.timer || this.inFlight) {
      return;
    }
    this.loop();
  }

  /**
   * Cancels the schedule and aborts running commands. A tick whose commands
   * were cut short is dropped; a commit already queued on the store finishes
   * before this resolves.
   */
  async stop(): Promise<void> {
    this.status = 'stopped';
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    for (const controller of this.liveTicks) {
      controller.abort();
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Executes every command of the block in declared order, then commits all
   * outputs and the new timestamps through a single store mutation.
   */
  async runOnce(): Promise<TickCompletedEvent> {
    const ref = this.ref();
    const started = Date.now();
    if (this.status !== 'stopped') {
      this.status = 'running';
    }
    const controller = new AbortController();
    this.liveTicks.add(controller);

    try {
      const outputs: string[] = [];
      let failures = 0;

      for (const { label, command } of blockCommands(this.block)) {
        try {
          outputs.push(await this.executor.execute(command, { signal: controller.signal }));
        } catch (error) {
          if (controller.signal.aborted) {
            throw new TickAbortedError(this.name);
          }
          failures += 1;
          outputs.push(formatFailure(error));
          this.events.emit('command:failed', { ...ref, label, command, error });
        }
      }

      if (controller.signal.aborted) {
        throw new TickAbortedError(this.name);
      }

      const committed = await this.store.mutate((draft) => {
        applyTick(draft, this.index, outputs, advance(this.now()));
      });

      this.tickCount += 1;
      const event: TickCompletedEvent = {
        ...ref,
        lastUpdated: committed.blocks[this.index]?.last_updated ?? committed.last_updated,
        durationMs: Date.now() - started,
        failures,
        outputs
      };
      this.events.emit('tick:completed', event);
      return event;
    } finally {
      this.liveTicks.delete(controller);
      if (this.status === 'running') {
        this.status = 'idle';
      }
    }
  }

  private loop(): void {
    const started = Date.now();
    const tick = this.runOnce().then(
      () => undefined,
      (error: unknown) => {
        if (!(error instanceof TickAbortedError)) {
          this.events.emit('tick:failed', { ...this.ref(), error });
        }
      }
    );

    this.inFlight = tick.finally(() => {
      this.inFlight = null;
      if (this.status === 'stopped') {
        return;
      }
      const delay = Math.max(0, this.intervalMs - (Date.now() - started));
      this.timer = setTimeout(() => {
        this.timer = null;
        this.loop();
      }, delay);
    });
  }

  private ref(): BlockRef {
    return { index: this.index, title: this.title, name: this.name };
  }
}

export interface SchedulerSupervisorOptions {
  store: DashboardStore;
  executor: CommandExecutor;
  now?: () => Date;
}

/**
 * Owns one scheduler per configured block. Blocks are fixed for the process
 * lifetime, so the schedulers are created once from the loaded tree.
 */
export class SchedulerSupervisor extends EventEmitter<SchedulerEvents> {
  private readonly store: DashboardStore;
  private readonly executor: CommandExecutor;
  private readonly now: (() => Date) | undefined;
  private schedulers: BlockScheduler[] = [];
  private started = false;

  constructor(options: SchedulerSupervisorOptions) {
    super();
    this.store = options.store;
    this.executor = options.executor;
    this.now = options.now;
  }

  getSchedulers(): readonly BlockScheduler[] {
    return this.ensureSchedulers();
  }

  isRunning(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const scheduler of this.ensureSchedulers()) {
      scheduler.start();
    }
  }

  async stop(): Promise<void> {
    this.started = false;
    await Promise.all(this.schedulers.map((scheduler) => scheduler.stop()));
  }

  /** One tick of every block, run concurrently; failed ticks are reported, not thrown. */
  async runAllOnce(): Promise<TickCompletedEvent[]> {
    const results = await Promise.allSettled(this.ensureSchedulers().map((scheduler) => scheduler.runOnce()));
    const completed: TickCompletedEvent[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        completed.push(result.value);
        return;
      }
      const scheduler = this.schedulers[index];
      if (scheduler && !(result.reason instanceof TickAbortedError)) {
        this.emit('tick:failed', {
          index: scheduler.index,
          title: scheduler.title,
          name: scheduler.name,
          error: result.reason
        });
      }
    });
    return completed;
  }

  private ensureSchedulers(): BlockScheduler[] {
    if (this.schedulers.length === 0) {
      const snapshot = this.store.snapshot();
      this.schedulers = snapshot.blocks.map(
        (block, index) =>
          new BlockScheduler({
            index,
            block,
            store: this.store,
            executor: this.executor,
            events: this,
            now: this.now
          })
      );
    }
    return this.schedulers;
  }
}
