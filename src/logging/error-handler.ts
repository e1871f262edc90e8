/**
 * Error Logging and Handling System
 * Centralized logging and error types for the fleet compiler.
 *
 * Log lines go to stderr so that compiled output on stdout stays machine-readable.
 */

export enum ErrorLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL'
}

const LEVEL_ORDER: Record<ErrorLevel, number> = {
  [ErrorLevel.DEBUG]: 10,
  [ErrorLevel.INFO]: 20,
  [ErrorLevel.WARN]: 30,
  [ErrorLevel.ERROR]: 40,
  [ErrorLevel.FATAL]: 50
};

export interface ErrorLog {
  level: ErrorLevel;
  message: string;
  timestamp: Date;
  stack?: string;
  context?: Record<string, unknown>;
}

export interface ErrorHandlerOptions {
  minLevel?: ErrorLevel;
  /** Keep logs in memory without writing them anywhere. */
  silent?: boolean;
  write?: (line: string) => void;
}

export class ErrorHandler {
  private logs: ErrorLog[] = [];
  private readonly minLevel: ErrorLevel;
  private readonly silent: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ErrorHandlerOptions = {}) {
    this.minLevel = options.minLevel ?? ErrorLevel.INFO;
    this.silent = options.silent ?? false;
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  log(level: ErrorLevel, message: string, error?: Error, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const errorLog: ErrorLog = {
      level,
      message,
      timestamp: new Date(),
      stack: error?.stack,
      context
    };
    this.logs.push(errorLog);
    this.outputLog(errorLog);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(ErrorLevel.ERROR, message, error, context);
  }

  private outputLog(log: ErrorLog): void {
    if (this.silent) {
      return;
    }
    const context = log.context ? ` ${JSON.stringify(log.context)}` : '';
    this.write(`[${log.timestamp.toISOString()}] ${log.level}: ${log.message}${context}`);
    if (log.stack && LEVEL_ORDER[log.level] >= LEVEL_ORDER[ErrorLevel.ERROR]) {
      this.write(log.stack);
    }
  }

  getLogs(level?: ErrorLevel): ErrorLog[] {
    if (level) {
      return this.logs.filter(log => log.level === level);
    }
    return this.logs;
  }

  clearLogs(): void {
    this.logs = [];
  }
}

export function parseErrorLevel(value: string | undefined): ErrorLevel | undefined {
  if (!value) {
    return undefined;
  }
  const upper = value.toUpperCase();
  return Object.values(ErrorLevel).find(level => level === upper);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Error taxonomy

export interface Violation {
  /** Dotted manifest path, e.g. `virtual_machines.worker.count`. */
  path: string;
  rule: ViolationRule;
  value: unknown;
  message: string;
}

export type ViolationRule =
  | 'shape-exclusive'
  | 'shape-start-required'
  | 'shape-start-forbidden'
  | 'batch-count-range'
  | 'unknown-reference'
  | 'name-pattern'
  | 'name-reserved-suffix'
  | 'range'
  | 'mac-format'
  | 'unknown-extension'
  | 'duplicate-instance-name'
  | 'duplicate-id'
  | 'duplicate-mac'
  | 'duplicate-network-key'
  | 'id-overflow'
  | 'control-plane-required';

export interface ManifestIssue {
  file: string;
  path: string;
  message: string;
}

/** Unreadable or ill-shaped manifest input. Always fatal. */
export class ManifestLoadError extends Error {
  constructor(message: string, public readonly issues: ManifestIssue[] = []) {
    super(issues.length > 0
      ? `${message}:\n${issues.map(i => `  ${i.file}: ${i.path}: ${i.message}`).join('\n')}`
      : message);
    this.name = 'ManifestLoadError';
  }
}

export class DerivationOverflowError extends Error {
  constructor(message: string, public readonly value: number) {
    super(message);
    this.name = 'DerivationOverflowError';
  }
}

export class TopologyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TopologyError';
  }
}

export class ValidationFailedError extends Error {
  constructor(public readonly violations: Violation[]) {
    super(`Manifest has ${violations.length} violation(s)`);
    this.name = 'ValidationFailedError';
  }
}

export function formatViolation(violation: Violation): string {
  return `${violation.path} [${violation.rule}]: ${violation.message}`;
}
