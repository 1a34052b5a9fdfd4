import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  setDebugMode: (enabled: boolean) => void;
  isDebugEnabled: () => boolean;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.green("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack ?? `${arg.name}: ${arg.message}`;
  }
  if (typeof arg === "string") {
    return arg;
  }
  if (arg !== null && typeof arg === "object") {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function write(level: LogLevel, scope: string | undefined, args: unknown[]): void {
  const prefix = [chalk.dim(new Date().toISOString()), LEVEL_LABELS[level]];
  if (scope) {
    prefix.push(chalk.cyan(`[${scope}]`));
  }
  const line = `${prefix.join(" ")} ${args.map(formatArg).join(" ")}\n`;
  const target = level === "warn" || level === "error" ? process.stderr : process.stdout;
  try {
    target.write(line);
  } catch {
    // stdio closed
  }
}

export function parseDebugMode(value: boolean | string | undefined): boolean {
  if (typeof value === "string") {
    return value === "true" || value === "1";
  }
  return Boolean(value);
}

export function createLogger(debugMode: boolean | string = false, scope?: string): Logger {
  let debugEnabled = parseDebugMode(debugMode);

  return {
    debug: (...args: unknown[]) => {
      if (debugEnabled) {
        write("debug", scope, args);
      }
    },
    info: (...args: unknown[]) => write("info", scope, args),
    warn: (...args: unknown[]) => write("warn", scope, args),
    error: (...args: unknown[]) => write("error", scope, args),
    setDebugMode: (enabled: boolean) => {
      debugEnabled = enabled;
    },
    isDebugEnabled: () => debugEnabled,
  };
}
