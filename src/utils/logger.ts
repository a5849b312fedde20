import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import ora, { type Ora } from "ora";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

interface LoggerState {
  level: LogLevel;
  file?: string;
}

const state: LoggerState = { level: "info" };

/**
 * Set the threshold for console output and, optionally, a plain-text log
 * file that receives every line at or above the threshold.
 */
export function configureLogger(options: { level?: LogLevel; file?: string }): void {
  if (options.level) state.level = options.level;
  state.file = options.file;
  if (state.file) {
    mkdirSync(dirname(state.file), { recursive: true });
  }
}

export function getLogLevel(): LogLevel {
  return state.level;
}

/** Change the threshold only; the log file stays as configured. */
export function setLogLevel(level: LogLevel): void {
  state.level = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[state.level];
}

function write(level: LogLevel, line: string, msg: string): void {
  if (!enabled(level)) return;
  console.log(line);
  if (state.file) {
    appendFileSync(
      state.file,
      `${new Date().toISOString()} | ${level.toUpperCase().padEnd(5)} | ${msg}\n`,
      "utf-8"
    );
  }
}

export const log = {
  info: (msg: string) => write("info", chalk.blue("info") + " " + msg, msg),
  success: (msg: string) => write("info", chalk.green("pass") + " " + msg, msg),
  fail: (msg: string) => write("error", chalk.red("fail") + " " + msg, msg),
  warn: (msg: string) => write("warn", chalk.yellow("warn") + " " + msg, msg),
  error: (msg: string) => write("error", chalk.red("error") + " " + msg, msg),
  debug: (msg: string) => write("debug", chalk.gray("debug") + " " + msg, msg),
  dim: (msg: string) => write("info", chalk.dim(msg), msg),
  heading: (msg: string) => write("info", "\n" + chalk.bold(msg), msg),
  scenario: (name: string, passed: boolean) =>
    write(
      "info",
      `  ${passed ? chalk.green("✓") : chalk.red("✗")} ${name}`,
      `${passed ? "PASS" : "FAIL"} ${name}`
    ),
};

export function spinner(text: string): Ora {
  return ora({ text, color: "cyan", isSilent: !enabled("info") }).start();
}
