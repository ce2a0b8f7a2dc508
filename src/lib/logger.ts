// src/lib/logger.ts
import chalk from "chalk";

type Sink = (line: string) => void;

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  step(msg: string): void;
  dim(msg: string): void;
  success(msg: string): void;
  fail(msg: string): void;
}

const toStdout: Sink = (line) => console.log(line);
const toStderr: Sink = (line) => console.error(line);

/** Build a logger writing progress lines to `out` and problems to `err`. */
export function createLogger(out: Sink = toStdout, err: Sink = toStderr): Logger {
  return {
    info: (msg) => out(`${chalk.green("[+]")} ${msg}`),
    warn: (msg) => err(`${chalk.yellow("[!]")} ${msg}`),
    error: (msg) => err(`${chalk.red("[x]")} ${msg}`),
    step: (msg) => out(`${chalk.cyan("  →")} ${msg}`),
    dim: (msg) => out(chalk.dim(`    ${msg}`)),
    success: (msg) => out(`${chalk.green("  ✓")} ${msg}`),
    fail: (msg) => out(`${chalk.red("  ✗")} ${msg}`),
  };
}

export const logger = createLogger();

// For commands whose stdout is machine-readable
export const stderrLogger = createLogger(toStderr, toStderr);
