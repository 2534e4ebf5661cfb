import chalk from 'chalk';

/**
 * Sink for human-readable progress and diagnostic messages.
 * Nothing the core returns depends on what a reporter does with them.
 */
export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleReporter: Reporter = {
  info: message => console.log(message),
  warn: message => console.warn(chalk.yellow(message)),
  error: message => console.error(chalk.red(message))
};

export const silentReporter: Reporter = {
  info: () => {},
  warn: () => {},
  error: () => {}
};
