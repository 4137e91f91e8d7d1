import chalk from 'chalk';

type Paint = (text: string) => string;

const LEVEL_COLORS: Record<string, Paint> = {
  LOG: chalk.cyan,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  DEBUG: chalk.gray,
  SUCCESS: chalk.green,
};

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  return typeof arg === 'object' && arg !== null ? JSON.stringify(arg, null, 2) : String(arg);
}

export class AppLogger {
  private readonly prefix = `[${process.pid}]`;

  private formatMessage(level: string, message: string, ...args: unknown[]): string {
    const paint = LEVEL_COLORS[level] ?? chalk.white;
    const formattedArgs = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';

    return paint(`${this.prefix} [${level}] ${message}${formattedArgs}`);
  }

  log(message: string, ...args: unknown[]): void {
    console.log(this.formatMessage('LOG', message, ...args));
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(this.formatMessage('WARN', message, ...args));
  }

  error(message: string, ...args: unknown[]): void {
    console.error(this.formatMessage('ERROR', message, ...args));
  }

  debug(message: string, ...args: unknown[]): void {
    console.debug(this.formatMessage('DEBUG', message, ...args));
  }

  success(message: string, ...args: unknown[]): void {
    console.log(this.formatMessage('SUCCESS', message, ...args));
  }
}

export const appLogger = new AppLogger();
