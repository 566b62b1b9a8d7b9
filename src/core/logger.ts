import chalk from 'chalk';

export interface Logger {
  info: (text: string) => void;
  success: (text: string) => void;
  warning: (text: string) => void;
  error: (text: string) => void;
  source: (text: string) => void;
}

export const logger: Logger = {
  info: (text: string) => console.log(chalk.blue(text)),
  success: (text: string) => console.log(chalk.green(text)),
  warning: (text: string) => console.warn(chalk.yellow(text)),
  error: (text: string) => console.error(chalk.red(text)),
  source: (text: string) => console.log(chalk.gray(text)),
};

export const silentLogger: Logger = {
  info: () => {},
  success: () => {},
  warning: () => {},
  error: () => {},
  source: () => {},
};
