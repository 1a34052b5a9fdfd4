/**
 * Streaming pipeline contracts
 */

import type { StreamError } from '../errors.js';
import type { Result } from '../utils/result.js';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Fully built outbound request. Frozen at construction; nothing downstream
 * mutates it.
 */
export interface StreamRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: Buffer | undefined;
  /** Milliseconds, applied by the transport */
  readonly timeout: number;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: Buffer;
}

export type BytesHandler = (chunk: Buffer) => void;
export type DoneHandler = (error?: Error) => void;

/**
 * Byte-level connection the streaming core runs on.
 */
export interface Transport {
  /**
   * Issue `request` and deliver the response body. `onBytes` fires any number
   * of times in order, then `onDone` fires exactly once. Never throws; every
   * failure arrives through `onDone`.
   */
  open(request: StreamRequest, onBytes: BytesHandler, onDone: DoneHandler, signal?: AbortSignal): void;

  /**
   * Issue `request` and buffer the whole response. Rejects only on
   * connection-level failure; any HTTP status resolves.
   */
  send(request: StreamRequest): Promise<TransportResponse>;
}

export type StreamResultHandler<T> = (result: Result<T, StreamError>) => void;
export type StreamCompletionHandler = (error?: Error) => void;

/**
 * Caller-side view of an in-flight stream
 */
export interface StreamHandle {
  readonly id: number;
  readonly isCompleted: boolean;
  cancel(): void;
}
