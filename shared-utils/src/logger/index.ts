/**
 * Logger interface shared by every service
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(
    private serviceName: string,
    level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)
  ) {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug"))
      console.debug(`[${this.serviceName}] ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info"))
      console.log(`[${this.serviceName}] ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn"))
      console.warn(`[${this.serviceName}] ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error"))
      console.error(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Logger for a sub-component, e.g. `[pipeline:pass]`
   */
  child(component: string): ConsoleLogger {
    const child = new ConsoleLogger(`${this.serviceName}:${component}`);
    child.threshold = this.threshold;
    return child;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

export function createLogger(serviceName: string): ConsoleLogger {
  return new ConsoleLogger(serviceName);
}

/**
 * Logger that drops everything; handy for tests
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
