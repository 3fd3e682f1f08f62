/**
 * Logger utility for syswatch
 */

export class Logger {
  private component: string;

  constructor(component: string) {
    this.component = component;
  }

  private formatArg(arg: unknown): string {
    if (arg instanceof Error) {
      return arg.message;
    }
    if (typeof arg === 'object' && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  }

  private formatMessage(level: string, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.length > 0 ? ' ' + args.map(arg => this.formatArg(arg)).join(' ') : '';

    return `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}${formattedArgs}`;
  }

  info(message: string, ...args: unknown[]): void {
    console.log(this.formatMessage('info', message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.formatMessage('warn', message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.formatMessage('error', message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' || process.env.DEBUG === 'true' || process.env.LOG_LEVEL === 'debug') {
      console.debug(this.formatMessage('debug', message, ...args));
    }
  }
}

// Default logger instance
export const logger = new Logger('SysWatch');
