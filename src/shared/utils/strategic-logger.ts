/**
 * Strategic Logger - Minimal, structured logging for the banking client
 *
 * Output format: "timestamp level [component] message"
 * Everything goes to stderr; stdout belongs to CLI output.
 */

export enum LogLevel {
  Silent = 0,
  Error = 1,
  Warn = 2,
  Info = 3,
  Debug = 4,
  Trace = 5
}

export type LogLevelName = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  silent: LogLevel.Silent,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  info: LogLevel.Info,
  debug: LogLevel.Debug,
  trace: LogLevel.Trace
};

/**
 * Parse a level name (case-insensitive). Accepts `warning` as an alias of `warn`.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const normalized = value.trim().toLowerCase();
  const name = normalized === 'warning' ? 'warn' : normalized;
  return isLogLevelName(name) ? LEVEL_NAMES[name] : null;
}

export function isLogLevelName(value: string): value is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, value);
}

export interface ComponentLogger {
  error(message: string, error?: unknown): void;
  warn(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  trace(message: string, data?: unknown): void;
  network(message: string, data?: unknown): void;
  startOperation(operationName: string): string;
  endOperation(operationId: string): number | null;
}

export class StrategicLogger {
  private static instance: StrategicLogger;
  private logLevel: LogLevel;
  private operations: Map<string, { name: string; startTime: number }> = new Map();

  // Terminal colors (used only for level indicators)
  private colors = {
    reset: '\x1b[0m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m'
  };

  private constructor() {
    this.logLevel = this.determineLogLevel();
  }

  public static getInstance(): StrategicLogger {
    if (!StrategicLogger.instance) {
      StrategicLogger.instance = new StrategicLogger();
    }
    return StrategicLogger.instance;
  }

  private determineLogLevel(): LogLevel {
    if (process.env.DEBUG === 'true') return LogLevel.Trace;
    return parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.Info;
  }

  private formatMessage(level: string, component: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString().substring(11, 23);
    const levelColor = this.getLevelColor(level);
    const lvl = level.padEnd(5);

    let formatted = `${this.colors.gray}${timestamp}${this.colors.reset} ${levelColor}${lvl}${this.colors.reset} ${this.colors.cyan}[${component}]${this.colors.reset} ${message}`;

    if (data !== undefined && this.logLevel >= LogLevel.Debug) {
      const dataStr = typeof data === 'object' ? JSON.stringify(data) : String(data);
      if (dataStr.length < 200) {
        formatted += ` ${this.colors.gray}${dataStr}${this.colors.reset}`;
      }
    }

    return formatted;
  }

  private getLevelColor(level: string): string {
    switch (level) {
      case 'error': return this.colors.red;
      case 'warn': return this.colors.yellow;
      case 'info': return this.colors.blue;
      case 'debug': return this.colors.magenta;
      default: return this.colors.gray;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level <= this.logLevel;
  }

  private write(line: string): void {
    process.stderr.write(`${line}\n`);
  }

  public error(component: string, message: string, error?: unknown): void {
    if (!this.shouldLog(LogLevel.Error)) return;

    this.write(this.formatMessage('error', component, message));

    if (error instanceof Error && error.stack && this.logLevel >= LogLevel.Debug) {
      this.write(`${this.colors.gray}${error.stack}${this.colors.reset}`);
    }
  }

  public warn(component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.Warn)) return;
    this.write(this.formatMessage('warn', component, message, data));
  }

  public info(component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.Info)) return;
    this.write(this.formatMessage('info', component, message, data));
  }

  public debug(component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.Debug)) return;
    this.write(this.formatMessage('debug', component, message, data));
  }

  public trace(component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.Trace)) return;
    this.write(this.formatMessage('trace', component, message, data));
  }

  public network(component: string, message: string, data?: unknown): void {
    if (!this.shouldLog(LogLevel.Debug)) return;
    this.write(this.formatMessage('debug', component, message, data));
  }

  // Operation timing
  public startOperation(operationName: string): string {
    const operationId = `${operationName}_${Date.now()}_${this.operations.size}`;
    this.operations.set(operationId, { name: operationName, startTime: Date.now() });
    this.trace('Perf', `started: ${operationName}`);
    return operationId;
  }

  public endOperation(operationId: string): number | null {
    const operation = this.operations.get(operationId);
    if (!operation) {
      this.warn('Perf', `operation not found: ${operationId}`);
      return null;
    }

    this.operations.delete(operationId);
    const duration = Date.now() - operation.startTime;
    this.debug('Perf', `completed: ${operation.name} (${duration}ms)`);
    return duration;
  }

  // Configuration
  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public createComponentLogger(componentName: string): ComponentLogger {
    return {
      error: (message, error) => this.error(componentName, message, error),
      warn: (message, data) => this.warn(componentName, message, data),
      info: (message, data) => this.info(componentName, message, data),
      debug: (message, data) => this.debug(componentName, message, data),
      trace: (message, data) => this.trace(componentName, message, data),
      network: (message, data) => this.network(componentName, message, data),
      startOperation: (operationName) => this.startOperation(operationName),
      endOperation: (operationId) => this.endOperation(operationId)
    };
  }
}

export function createLogger(componentName: string): ComponentLogger {
  return StrategicLogger.getInstance().createComponentLogger(componentName);
}
