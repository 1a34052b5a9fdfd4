/**
 * SSE (Server-Sent Events) formatting
 *
 * Writes the framing the stream decoder reads: one `data:` line per event,
 * a blank separator, and the terminator line at the end.
 */

import { STREAM_EVENT_PREFIX, STREAM_TERMINATOR } from "../../constants/endpoints.js";

export function formatSSEChunk(data: unknown): string {
  return `${STREAM_EVENT_PREFIX} ${JSON.stringify(data)}\n\n`;
}

export function formatSSETerminator(): string {
  return `${STREAM_EVENT_PREFIX} ${STREAM_TERMINATOR}\n\n`;
}
