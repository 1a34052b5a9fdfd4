/**
 * Axios Transport
 *
 * Default byte-level connection. Streaming calls hand the response body to
 * the session chunk by chunk; plain calls buffer it whole. Every HTTP status
 * resolves; only connection-level failures reject.
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";

import { StreamCancelledError } from "../errors.js";
import { logger } from "../logging/index.js";
import {
  errorFromResponseBody,
  isSuccessStatus,
  streamToString,
  toTransportError,
} from "../utils/http/index.js";

import type {
  BytesHandler,
  DoneHandler,
  StreamRequest,
  Transport,
  TransportResponse,
} from "../types/stream.js";
import type { Readable } from "stream";

function toAxiosConfig(request: StreamRequest, signal?: AbortSignal): AxiosRequestConfig {
  return {
    method: request.method,
    url: request.url,
    headers: { ...request.headers },
    data: request.body,
    timeout: request.timeout,
    validateStatus: () => true,
    ...(signal ? { signal } : {}),
  };
}

function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, raw] of Object.entries(headers)) {
    const value: unknown = raw;
    if (typeof value === "string") {
      flat[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      flat[key.toLowerCase()] = value.map(String).join(", ");
    } else if (typeof value === "number" || typeof value === "boolean") {
      flat[key.toLowerCase()] = String(value);
    }
  }
  return flat;
}

export class AxiosTransport implements Transport {
  constructor(private readonly http: AxiosInstance = axios.create()) {}

  open(request: StreamRequest, onBytes: BytesHandler, onDone: DoneHandler, signal?: AbortSignal): void {
    let settled = false;
    const done = (error?: Error): void => {
      if (settled) { return; }
      settled = true;
      onDone(error);
    };

    void this.pump(request, onBytes, signal).then(
      () => done(),
      (error: unknown) => done(toTransportError(error)),
    );
  }

  async send(request: StreamRequest): Promise<TransportResponse> {
    try {
      const response = await this.http.request<ArrayBuffer | undefined>({
        ...toAxiosConfig(request),
        responseType: "arraybuffer",
      });
      return {
        status: response.status,
        headers: flattenHeaders(response.headers),
        body: response.data ? Buffer.from(response.data) : Buffer.alloc(0),
      };
    } catch (error: unknown) {
      throw toTransportError(error);
    }
  }

  private async pump(request: StreamRequest, onBytes: BytesHandler, signal?: AbortSignal): Promise<void> {
    const response = await this.http.request<Readable>({
      ...toAxiosConfig(request, signal),
      responseType: "stream",
    });
    const stream = response.data;

    if (!isSuccessStatus(response.status)) {
      const body = await streamToString(stream);
      logger.debug(`[TRANSPORT] ${request.url} answered ${response.status}`);
      throw errorFromResponseBody(response.status, body);
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        stream.destroy();
        reject(new StreamCancelledError());
      };
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      const cleanup = (): void => {
        signal?.removeEventListener("abort", onAbort);
      };

      stream.on("data", (chunk: Buffer | string) => {
        onBytes(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
      });
      stream.once("end", () => {
        cleanup();
        resolve();
      });
      stream.once("error", (error: Error) => {
        cleanup();
        reject(error);
      });
    });
  }
}
