import chalk from "chalk";

export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleReporter(): Reporter {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message))
  };
}
