import type { CommandExecutor, DashboardStore, SchedulerSupervisor } from '@statusboard/core';

import type { StatusboardConfig } from './config';
import type { StatusboardMetrics } from './metrics';

export interface ReadinessState {
  store: boolean;
  schedulers: boolean;
}

export interface AppContext {
  config: StatusboardConfig;
  store: DashboardStore;
  executor: CommandExecutor;
  supervisor: SchedulerSupervisor;
  metrics: StatusboardMetrics;
  readiness: ReadinessState;
}
