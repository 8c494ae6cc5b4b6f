export class StatusboardError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StatusboardError';
  }
}

export interface CommandFailureDetails {
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  output: string;
  cause?: unknown;
}

export class CommandExecutionError extends StatusboardError {
  readonly code = 'COMMAND_EXECUTION_FAILED';
  readonly command: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly output: string;

  constructor(message: string, details: CommandFailureDetails) {
    super(message, { cause: details.cause });
    this.name = 'CommandExecutionError';
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.output = details.output;
  }
}

/** A tick abandoned because its scheduler was stopped; nothing was committed. */
export class TickAbortedError extends StatusboardError {
  readonly code = 'TICK_ABORTED';

  constructor(schedulerName: string) {
    super(`Tick of ${schedulerName} was aborted`);
    this.name = 'TickAbortedError';
  }
}

export class ConfigValidationError extends StatusboardError {
  readonly code = 'CONFIG_VALIDATION_FAILED';
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

export class ConfigLoadError extends StatusboardError {
  readonly code = 'CONFIG_LOAD_FAILED';
  readonly configPath: string;

  constructor(configPath: string, message: string, cause?: unknown) {
    super(`Failed to load config file ${configPath}: ${message}`, { cause });
    this.name = 'ConfigLoadError';
    this.configPath = configPath;
  }
}

export class PersistenceError extends StatusboardError {
  readonly code = 'CONFIG_PERSIST_FAILED';
  readonly configPath: string;

  constructor(configPath: string, cause: unknown) {
    super(`Failed to write config file ${configPath}: ${describeError(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.configPath = configPath;
  }
}

export class TemplateRenderError extends StatusboardError {
  readonly code = 'TEMPLATE_RENDER_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'TemplateRenderError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
