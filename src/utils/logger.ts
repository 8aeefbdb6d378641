import chalk from 'chalk';

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LOG_PREFIXES: Record<LogLevel, string> = {
  info: chalk.blue('ℹ'),
  warn: chalk.yellow('⚠'),
  error: chalk.red('✗'),
  debug: chalk.gray('⋯'),
};

class Logger {
  private verbose = false;
  private quiet = false;

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  /** Quiet mode keeps stdout clean for machine-readable output; errors still print */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  info(message: string, ...args: unknown[]): void {
    if (this.quiet) return;
    console.log(`${LOG_PREFIXES.info} ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.quiet) return;
    console.warn(`${LOG_PREFIXES.warn} ${chalk.yellow(message)}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`${LOG_PREFIXES.error} ${chalk.red(message)}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.verbose && !this.quiet) {
      console.error(`${LOG_PREFIXES.debug} ${chalk.gray(message)}`, ...args);
    }
  }

  divider(): void {
    if (this.quiet) return;
    console.log(chalk.gray('─'.repeat(60)));
  }

  header(title: string): void {
    if (this.quiet) return;
    console.log();
    console.log(chalk.bold.cyan(title));
    this.divider();
  }
}

export const logger = new Logger();
