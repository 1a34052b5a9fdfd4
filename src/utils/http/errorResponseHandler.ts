/**
 * Error Response Handler
 *
 * Maps failed HTTP responses and thrown transport errors onto the client's
 * error types.
 */

import axios from "axios";

import {
  APIError,
  HTTPStatusError,
  StreamCancelledError,
  TransportError,
} from "../../errors.js";
import { APIErrorResponseSchema } from "../../types/results.js";

/**
 * Extracts error message from unknown error type
 *
 * Handles:
 * - Error instances (message property)
 * - String errors
 * - Objects with message/error properties, including `{ error: { message } }`
 * - null/undefined
 */
export function extractErrorMessage(error: unknown): string {
  if (error === null || error === undefined) {
    return 'Unknown error (empty response)';
  }

  if (error instanceof Error) {
    return error.message || 'Unknown error';
  }

  if (typeof error === 'string') {
    return error.trim() || 'Unknown error (empty string)';
  }

  if (typeof error === 'object') {
    const messageVal: unknown = Reflect.get(error, 'message');
    if (typeof messageVal === 'string' && messageVal.trim()) {
      return messageVal.trim();
    }

    const errorProp: unknown = Reflect.get(error, 'error');
    if (typeof errorProp === 'string' && errorProp.trim()) {
      return errorProp.trim();
    }
    if (typeof errorProp === 'object' && errorProp !== null) {
      const nestedMessage: unknown = Reflect.get(errorProp, 'message');
      if (typeof nestedMessage === 'string' && nestedMessage.trim()) {
        return nestedMessage.trim();
      }
    }

    try {
      const stringified = JSON.stringify(error);
      if (stringified && stringified !== '{}' && stringified !== '[]') {
        return `Error details: ${stringified}`;
      }
    } catch {
      // circular structure, fall through
    }
  }

  return 'Unknown error';
}

/**
 * Interprets the body of a non-2xx response: a structured API error when the
 * body is one, otherwise a plain status error carrying the text.
 */
export function errorFromResponseBody(status: number, text: string): APIError | HTTPStatusError {
  try {
    const parsed = APIErrorResponseSchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return new APIError(parsed.data, status);
    }
  } catch {
    // not JSON
  }
  return new HTTPStatusError(status, text);
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Maps a thrown axios or socket error onto the client's transport error.
 * Cancellation stays distinguishable.
 */
export function toTransportError(error: unknown): Error {
  if (error instanceof TransportError || error instanceof APIError || error instanceof HTTPStatusError) {
    return error;
  }
  if (error instanceof StreamCancelledError || axios.isCancel(error)) {
    return new StreamCancelledError();
  }
  if (axios.isAxiosError(error)) {
    const code = error.code ?? 'UNKNOWN';
    const detail = code === 'ECONNABORTED' || code === 'ETIMEDOUT'
      ? 'Request timed out.'
      : 'No response received from server. This could indicate a network issue or incorrect host.';
    return new TransportError(`${error.message}. ${detail}`, code, error);
  }
  if (error instanceof Error) {
    const code: unknown = Reflect.get(error, 'code');
    return new TransportError(error.message, typeof code === 'string' ? code : undefined, error);
  }
  return new TransportError(extractErrorMessage(error));
}
