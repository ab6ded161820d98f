import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const satisfies readonly LogLevel[];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAG: Record<Exclude<LogLevel, "silent">, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.blue("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

export interface Logger {
  debug(message: string, payload?: unknown): void;
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  scope?: string;
}

export function createLogger({ level, scope = "club" }: LoggerOptions): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (msgLevel: Exclude<LogLevel, "silent">, message: string, payload?: unknown) => {
    if (LEVEL_RANK[msgLevel] < threshold) return;
    const line = `${chalk.dim(new Date().toISOString())} ${LEVEL_TAG[msgLevel]} ${chalk.cyan(`[${scope}]`)} ${message}`;
    const args = payload === undefined ? [line] : [line, payload];
    if (msgLevel === "error") {
      console.error(...args);
    } else if (msgLevel === "warn") {
      console.warn(...args);
    } else {
      console.info(...args);
    }
  };

  return {
    debug: (message, payload) => write("debug", message, payload),
    info: (message, payload) => write("info", message, payload),
    warn: (message, payload) => write("warn", message, payload),
    error: (message, payload) => write("error", message, payload),
    child: (childScope) => createLogger({ level, scope: `${scope}:${childScope}` }),
  };
}
