import chalk from "chalk";

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function defaultLogger(): Logger {
  return {
    info: (m) => console.log(chalk.dim(m)),
    warn: (m) => console.warn(chalk.yellow(m)),
    error: (m) => console.error(chalk.red(m)),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
