/**
 * Logger utility for the network status monitor
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function resolveLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' || configured === 'error') {
    return configured;
  }
  if (process.env.NODE_ENV === 'development' || process.env.DEBUG === 'true') {
    return 'debug';
  }
  return 'info';
}

export class Logger {
  private component: string;

  constructor(component: string) {
    this.component = component;
  }

  /**
   * Create a logger for a sub-component, e.g. `Monitor:Scheduler`
   */
  child(component: string): Logger {
    return new Logger(`${this.component}:${component}`);
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ' ' + args.map(arg => formatArg(arg)).join(' ') : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}${formattedArgs}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[resolveLevel()];
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled('info')) {
      console.log(this.formatMessage('info', message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled('error')) {
      console.error(this.formatMessage('error', message, ...args));
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled('debug')) {
      console.debug(this.formatMessage('debug', message, ...args));
    }
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg);
  }
  return String(arg);
}
