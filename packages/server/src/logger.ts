import type { RemoteConsole } from "vscode-languageserver/node";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function enabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Logger that writes to stderr. stdout belongs to the LSP stream, so
 * nothing here may ever go through `console.log`.
 */
export function createStderrLogger(threshold: LogLevel = "info"): Logger {
  const write = (level: LogLevel, message: string) => {
    if (!enabled(threshold, level)) return;
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [${level.toUpperCase().padEnd(5)}] ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) =>
      write(
        "error",
        error === undefined ? message : `${message}\n  ${describeError(error)}`,
      ),
  };
}

/**
 * Logger that forwards to the client's output channel through the
 * connection console.
 */
export function createConnectionLogger(
  console: RemoteConsole,
  threshold: LogLevel = "info",
): Logger {
  return {
    debug: (message) => {
      if (enabled(threshold, "debug")) console.log(message);
    },
    info: (message) => {
      if (enabled(threshold, "info")) console.info(message);
    },
    warn: (message) => {
      if (enabled(threshold, "warn")) console.warn(message);
    },
    error: (message, error) => {
      console.error(
        error === undefined ? message : `${message}: ${describeError(error)}`,
      );
    },
  };
}

let activeLogger: Logger = createStderrLogger(
  process.env.MINIYAML_LS_DEBUG ? "debug" : "warn",
);

export function getLogger(): Logger {
  return activeLogger;
}

export function setLogger(logger: Logger): void {
  activeLogger = logger;
}
