import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export interface StatusboardMetrics {
  register: Registry;
  blockTicks: Counter<'block'>;
  commandFailures: Counter<'block'>;
  tickFailures: Counter<'block'>;
  persistFailures: Counter<string>;
  tickDuration: Histogram<'block'>;
  readinessGauge: Gauge<'component'>;
}

export const createMetrics = (): StatusboardMetrics => {
  const register = new Registry();

  const blockTicks = new Counter({
    name: 'statusboard_block_ticks_total',
    help: 'Total number of committed block ticks',
    registers: [register],
    labelNames: ['block'] as const
  });

  const commandFailures = new Counter({
    name: 'statusboard_command_failures_total',
    help: 'Total number of commands that exited non-zero or failed to start',
    registers: [register],
    labelNames: ['block'] as const
  });

  const tickFailures = new Counter({
    name: 'statusboard_tick_failures_total',
    help: 'Total number of ticks that could not be committed',
    registers: [register],
    labelNames: ['block'] as const
  });

  const persistFailures = new Counter({
    name: 'statusboard_persist_failures_total',
    help: 'Total number of failed config file writes',
    registers: [register]
  });

  const tickDuration = new Histogram({
    name: 'statusboard_tick_duration_seconds',
    help: 'Time taken to run every command of a block',
    registers: [register],
    labelNames: ['block'] as const,
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 15, 60]
  });

  const readinessGauge = new Gauge({
    name: 'statusboard_component_ready',
    help: 'Readiness state per component (1 ready, 0 not ready)',
    registers: [register],
    labelNames: ['component'] as const
  });

  return {
    register,
    blockTicks,
    commandFailures,
    tickFailures,
    persistFailures,
    tickDuration,
    readinessGauge
  };
};
