import type { ClientConfiguration } from "../../config.js";

const normalizeBase = (base: string): string => base.replace(/\/+$/, "");

const normalizePath = (path?: string): string => {
  if (!path) {
    return "";
  }
  return path.startsWith("/") ? path : `/${path}`;
};

export const getApiBaseUrl = (configuration: Pick<ClientConfiguration, "scheme" | "host">): string => {
  return `${configuration.scheme}://${normalizeBase(configuration.host)}`;
};

export const buildApiUrl = (
  configuration: Pick<ClientConfiguration, "scheme" | "host">,
  path?: string,
): string => {
  return `${getApiBaseUrl(configuration)}${normalizePath(path)}`;
};

/**
 * Appends one encoded path segment, e.g. `/v1/models` + `gpt-4` -> `/v1/models/gpt-4`
 */
export const withPath = (base: string, segment: string): string => {
  return `${normalizeBase(base)}/${encodeURIComponent(segment)}`;
};
