/**
 * Client Error Types
 *
 * Every failure the library reports is one of these. Streaming failures are
 * delivered as values through the result channel, never thrown at the caller.
 */

import type { APIErrorResponse } from './types/results.js';

export type ClientErrorCode =
  | 'CONFIGURATION'
  | 'EMPTY_DATA'
  | 'API_ERROR'
  | 'HTTP_STATUS'
  | 'TRANSPORT'
  | 'DECODE'
  | 'BUFFER_OVERFLOW'
  | 'CANCELLED';

export class ClientError extends Error {
  constructor(
    message: string,
    public readonly code: ClientErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ClientError';
  }
}

export class ConfigurationError extends ClientError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export class EmptyDataError extends ClientError {
  constructor(url?: string) {
    super(url ? `Response from ${url} has no body` : 'Response has no body', 'EMPTY_DATA');
    this.name = 'EmptyDataError';
  }
}

/**
 * Structured error object returned by the API, either as a whole response
 * body or as one event of a stream.
 */
export class APIError extends ClientError {
  public readonly type: string | null;
  public readonly param: string | null;
  public readonly apiCode: string | null;

  constructor(
    public readonly response: APIErrorResponse,
    public readonly status?: number
  ) {
    super(response.error.message, 'API_ERROR');
    this.name = 'APIError';
    this.type = response.error.type ?? null;
    this.param = response.error.param ?? null;
    this.apiCode = response.error.code ?? null;
  }

  withStatus(status: number): APIError {
    return new APIError(this.response, status);
  }
}

export class HTTPStatusError extends ClientError {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super(`HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`, 'HTTP_STATUS');
    this.name = 'HTTPStatusError';
  }
}

export class TransportError extends ClientError {
  constructor(
    message: string,
    public readonly transportCode?: string,
    cause?: unknown
  ) {
    super(message, 'TRANSPORT', { cause });
    this.name = 'TransportError';
  }
}

export class DecodeError extends ClientError {
  constructor(
    message: string,
    public readonly payload: string,
    cause?: unknown
  ) {
    super(message, 'DECODE', { cause });
    this.name = 'DecodeError';
  }
}

export class StreamBufferOverflowError extends ClientError {
  constructor(
    public readonly size: number,
    public readonly limit: number
  ) {
    super(`Stream line of ${size} bytes exceeds buffer limit of ${limit} bytes`, 'BUFFER_OVERFLOW');
    this.name = 'StreamBufferOverflowError';
  }
}

export class StreamCancelledError extends ClientError {
  constructor() {
    super('Stream cancelled by caller', 'CANCELLED');
    this.name = 'StreamCancelledError';
  }
}

export type StreamError =
  | DecodeError
  | APIError
  | TransportError
  | HTTPStatusError
  | StreamBufferOverflowError
  | StreamCancelledError;
