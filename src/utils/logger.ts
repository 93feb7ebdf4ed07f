import chalk from 'chalk';

const PREFIX = '[proxy]';

/**
 * Console logger for the proxy.
 *
 * info/success go to stdout; warn, error and debug go to stderr. Debug
 * output is off unless enabled with --debug or SAMPLING_PROXY_DEBUG=1.
 */
export class Logger {
  private debugEnabled: boolean;

  constructor() {
    this.debugEnabled = isTruthy(process.env.SAMPLING_PROXY_DEBUG);
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugMode(): boolean {
    return this.debugEnabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.debugEnabled) return;
    console.error(chalk.gray(`${PREFIX} ${timestamp()} ${message}`), ...args.map(formatArg));
  }

  info(message: string, ...args: unknown[]): void {
    console.log(`${chalk.cyan(PREFIX)} ${message}`, ...args.map(formatArg));
  }

  success(message: string, ...args: unknown[]): void {
    console.log(`${chalk.green(PREFIX)} ${chalk.green(message)}`, ...args.map(formatArg));
  }

  warn(message: string, ...args: unknown[]): void {
    console.error(`${chalk.yellow(PREFIX)} ${chalk.yellow(message)}`, ...args.map(formatArg));
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`${chalk.red(PREFIX)} ${chalk.red(message)}`, ...args.map(formatArg));
  }
}

function isTruthy(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

function timestamp(): string {
  return new Date().toISOString();
}

// Errors print as "Name: message" instead of a full inspect dump
function formatArg(arg: unknown): unknown {
  if (arg instanceof Error) {
    return `${arg.name}: ${arg.message}`;
  }
  return arg;
}

export const logger = new Logger();
