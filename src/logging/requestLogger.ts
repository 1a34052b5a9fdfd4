import chalk from "chalk";

import logger from "./logger.js";

import type { StreamRequest } from "../types/stream.js";

function formatMethod(method: string): string {
  const upperMethod = method.toUpperCase();

  switch (upperMethod) {
    case "GET":
      return chalk.green(upperMethod);
    case "POST":
      return chalk.yellow(upperMethod);
    case "DELETE":
      return chalk.red(upperMethod);
    default:
      return chalk.white(upperMethod);
  }
}

function getStatusColor(status: number): typeof chalk.red {
  if (status >= 500) {return chalk.red;}
  if (status >= 400) {return chalk.yellow;}
  if (status >= 300) {return chalk.cyan;}
  if (status >= 200) {return chalk.green;}
  return chalk.white;
}

export function maskHeaders(headers: Readonly<Record<string, string>>): Record<string, string> {
  const masked: Record<string, string> = { ...headers };
  if (masked["Authorization"]) {
    masked["Authorization"] = "Bearer ********";
  }
  return masked;
}

export function logRequest(request: StreamRequest, operation: string): void {
  if (!logger.isDebugEnabled()) { return; }

  const size = request.body?.length ?? 0;
  logger.debug(
    `${chalk.blue("➤")} ${formatMethod(request.method)} ${chalk.cyan(request.url)} ${chalk.yellow(operation)} ${chalk.dim(`${size}B`)}`,
  );
  logger.debug(`  ${chalk.dim("headers:")}`, maskHeaders(request.headers));
}

export function logResponse(status: number, operation: string, durationMs?: number): void {
  if (!logger.isDebugEnabled()) { return; }

  let output = `${chalk.blue("⮑")} ${getStatusColor(status)(String(status))} ${chalk.yellow(operation)}`;

  if (durationMs !== undefined) {
    output += ` ${chalk.dim("in")} ${chalk.magenta(`${durationMs}ms`)}`;
  }

  logger.debug(output);
}
