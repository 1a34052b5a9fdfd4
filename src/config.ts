import "dotenv/config";
import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";

import { V1_API_PATHS, type ApiPaths } from "./constants/endpoints.js";
import { ConfigurationError } from "./errors.js";
import { createLogger, parseDebugMode } from "./logging/configLogger.js";

export interface ClientConfiguration {
  /** API token sent as a bearer credential */
  readonly token: string;
  /** Optional organization identifier, sent as `OpenAI-Organization` */
  readonly organizationIdentifier?: string | undefined;
  /** API host, optionally with `:port`. Point it at a proxy or a compatible server. */
  readonly host: string;
  readonly scheme: "https" | "http";
  /** Request timeout in milliseconds */
  readonly timeoutInterval: number;
  readonly paths: ApiPaths;
  readonly debugMode: boolean;
  /** Longest single stream line, in bytes, held while waiting for its newline */
  readonly maxStreamBufferSize: number;
}

export interface ClientConfigurationInit {
  token?: string | undefined;
  organizationIdentifier?: string | undefined;
  host?: string | undefined;
  scheme?: "https" | "http" | undefined;
  timeoutInterval?: number | undefined;
  paths?: Partial<ApiPaths> | undefined;
  debugMode?: boolean | undefined;
  maxStreamBufferSize?: number | undefined;
  /** JSON file with any of the fields above; defaults to `genai.config.json` in the working directory */
  configPath?: string | undefined;
}

type FileConfig = Omit<ClientConfigurationInit, "configPath">;

export const DEFAULT_CONFIG_FILE = "genai.config.json";

const DEFAULT_CONFIG = {
  host: "api.openai.com",
  scheme: "https",
  timeoutInterval: 60_000,
  debugMode: false,
  maxStreamBufferSize: 1024 * 1024, // 1 MB - one pending stream line
} as const;

export const DEFAULT_MAX_STREAM_BUFFER_SIZE: number = DEFAULT_CONFIG.maxStreamBufferSize;

export function getEnv(key: string): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  return value;
}

export function coalesceEnv(...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = getEnv(key);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

export const DEBUG_MODE = parseDebugMode(getEnv("DEBUG_MODE"));

const logger = createLogger(DEBUG_MODE, "config");

function parsePositiveNumber(name: string, value: string | number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive number. Got: ${String(value)}`);
  }
  return parsed;
}

function parseScheme(value: string | undefined): "https" | "http" | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === "https" || value === "http") {
    return value;
  }
  throw new ConfigurationError(`scheme must be "https" or "http". Got: ${value}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`Config field "${key}" must be a string`);
  }
  return value;
}

function optionalNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number") {
    throw new ConfigurationError(`Config field "${key}" must be a number`);
  }
  return value;
}

function readPaths(value: unknown): Partial<ApiPaths> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`Config field "paths" must be an object`);
  }
  const paths: Record<string, string> = {};
  for (const key of Object.keys(V1_API_PATHS)) {
    const path = optionalString(value, key);
    if (path !== undefined) {
      paths[key] = path;
    }
  }
  return paths;
}

export function loadConfigFromFile(configPath?: string): FileConfig {
  const explicit = configPath !== undefined;
  const path = explicit ? resolve(configPath) : join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!existsSync(path)) {
    if (explicit) {
      throw new ConfigurationError(`Config file not found: ${path}`);
    }
    logger.debug(`No ${DEFAULT_CONFIG_FILE} in ${process.cwd()}, using defaults.`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"));
  } catch (error: unknown) {
    throw new ConfigurationError(
      `Unable to read ${path}: ${error instanceof Error ? error.message : "Unknown error"}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${path} must contain a JSON object`);
  }

  const debugMode = parsed["debugMode"];
  return {
    token: optionalString(parsed, "token"),
    organizationIdentifier: optionalString(parsed, "organizationIdentifier"),
    host: optionalString(parsed, "host"),
    scheme: parseScheme(optionalString(parsed, "scheme")),
    timeoutInterval: optionalNumber(parsed, "timeoutInterval"),
    paths: readPaths(parsed["paths"]),
    debugMode: typeof debugMode === "boolean" ? debugMode : undefined,
    maxStreamBufferSize: optionalNumber(parsed, "maxStreamBufferSize"),
  };
}

/**
 * Builds the client configuration. Explicit values win over environment
 * variables, which win over the config file, which wins over defaults.
 */
export function resolveConfiguration(init: ClientConfigurationInit = {}): ClientConfiguration {
  const fileConfig = loadConfigFromFile(init.configPath);

  const token = init.token ?? getEnv("OPENAI_API_KEY") ?? fileConfig.token;
  if (!token) {
    throw new ConfigurationError(
      "An API token is required. Pass `token` or set OPENAI_API_KEY.",
    );
  }

  const envDebug = getEnv("DEBUG_MODE");

  const configuration: ClientConfiguration = {
    token,
    organizationIdentifier:
      init.organizationIdentifier
      ?? coalesceEnv("OPENAI_ORGANIZATION", "OPENAI_ORG_ID")
      ?? fileConfig.organizationIdentifier,
    host: init.host ?? getEnv("OPENAI_API_HOST") ?? fileConfig.host ?? DEFAULT_CONFIG.host,
    scheme:
      init.scheme
      ?? parseScheme(getEnv("OPENAI_API_SCHEME"))
      ?? fileConfig.scheme
      ?? DEFAULT_CONFIG.scheme,
    timeoutInterval:
      parsePositiveNumber("timeoutInterval", init.timeoutInterval)
      ?? parsePositiveNumber("OPENAI_TIMEOUT_MS", getEnv("OPENAI_TIMEOUT_MS"))
      ?? parsePositiveNumber("timeoutInterval", fileConfig.timeoutInterval)
      ?? DEFAULT_CONFIG.timeoutInterval,
    paths: { ...V1_API_PATHS, ...fileConfig.paths, ...init.paths },
    debugMode:
      init.debugMode
      ?? (envDebug !== undefined ? parseDebugMode(envDebug) : undefined)
      ?? fileConfig.debugMode
      ?? DEFAULT_CONFIG.debugMode,
    maxStreamBufferSize:
      parsePositiveNumber("maxStreamBufferSize", init.maxStreamBufferSize)
      ?? parsePositiveNumber("OPENAI_MAX_STREAM_BUFFER_SIZE", getEnv("OPENAI_MAX_STREAM_BUFFER_SIZE"))
      ?? parsePositiveNumber("maxStreamBufferSize", fileConfig.maxStreamBufferSize)
      ?? DEFAULT_CONFIG.maxStreamBufferSize,
  };

  return Object.freeze(configuration);
}
