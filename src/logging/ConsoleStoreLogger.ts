import chalk from "chalk";
import type { StoreLogger } from "./StoreLogger.js";

const PREFIX = chalk.dim("[employee-store]");

/**
 * Terminal logger with a dim prefix and coloured status glyphs.
 */
export const createConsoleStoreLogger = (): StoreLogger => {
  const writeLine = (text: string): void => {
    console.error(`${PREFIX} ${text}`);
  };

  return {
    success(message: string): void {
      writeLine(`${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      writeLine(message);
    },

    warn(message: string): void {
      writeLine(`${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      writeLine(`${chalk.red("✗")} ${message}`);
    },
  };
};

/**
 * Default console logger instance.
 */
export const consoleLogger = createConsoleStoreLogger();
