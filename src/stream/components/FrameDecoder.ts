/**
 * FrameDecoder - Stream Framing Component
 *
 * Turns raw response bytes into event frames. The wire format is
 * newline-delimited:
 *
 *   data: {"id":"1",...}\n
 *   \n
 *   data: [DONE]\n
 *
 * Bytes are buffered until a `\n` arrives, so a line split across chunks (or
 * a UTF-8 sequence split mid-character) is decoded only once complete. Lines
 * without the `data:` prefix are dropped, as are blank lines.
 */

import { DEFAULT_MAX_STREAM_BUFFER_SIZE } from "../../config.js";
import { STREAM_EVENT_PREFIX, STREAM_TERMINATOR } from "../../constants/endpoints.js";
import { StreamBufferOverflowError } from "../../errors.js";
import { logger } from "../../logging/index.js";

export type Frame =
  | { type: "payload"; data: string }
  | { type: "terminator" };

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;
const EMPTY = Buffer.alloc(0);

export class FrameDecoder {
  private pending: Buffer = EMPTY;
  private readonly maxBufferSize: number;

  /**
   * @param maxBufferSize - Longest pending line, in bytes, before the decoder gives up
   */
  constructor(maxBufferSize: number = DEFAULT_MAX_STREAM_BUFFER_SIZE) {
    this.maxBufferSize = maxBufferSize;
  }

  /**
   * Append a chunk and return every frame it completes, in arrival order.
   * Throws StreamBufferOverflowError when an unterminated line outgrows the limit.
   */
  feed(chunk: Uint8Array | string): Frame[] {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk);
    const buffer = this.pending.length > 0 ? Buffer.concat([this.pending, bytes]) : bytes;
    const frames: Frame[] = [];

    let start = 0;
    let newline = buffer.indexOf(NEWLINE, start);
    while (newline !== -1) {
      const frame = this.parseLine(buffer.subarray(start, newline));
      if (frame) {
        frames.push(frame);
      }
      start = newline + 1;
      newline = buffer.indexOf(NEWLINE, start);
    }

    this.pending = start === 0 ? buffer : Buffer.from(buffer.subarray(start));

    if (this.pending.length > this.maxBufferSize) {
      const size = this.pending.length;
      this.pending = EMPTY;
      throw new StreamBufferOverflowError(size, this.maxBufferSize);
    }

    return frames;
  }

  /**
   * Flush at end of stream. An unterminated final line still counts when it
   * is the terminator or a data line holding complete JSON; any other
   * residue is dropped.
   */
  finish(): Frame[] {
    const residual = this.pending;
    this.pending = EMPTY;

    if (residual.length === 0) {
      return [];
    }

    const frame = this.parseLine(residual);
    if (frame?.type === "terminator" || (frame?.type === "payload" && isCompleteJson(frame.data))) {
      return [frame];
    }

    logger.debug(`[FRAME DECODER] Discarding ${residual.length} trailing bytes at end of stream`);
    return [];
  }

  /**
   * Drop buffered bytes
   */
  reset(): void {
    this.pending = EMPTY;
  }

  get bufferedBytes(): number {
    return this.pending.length;
  }

  private parseLine(raw: Buffer): Frame | null {
    const end = raw.length > 0 && raw[raw.length - 1] === CARRIAGE_RETURN ? raw.length - 1 : raw.length;
    const line = raw.toString("utf8", 0, end);

    if (!line.trim()) {
      return null;
    }

    if (!line.startsWith(STREAM_EVENT_PREFIX)) {
      logger.debug(`[FRAME DECODER] Ignoring line:`, line.substring(0, 50));
      return null;
    }

    const data = line.substring(STREAM_EVENT_PREFIX.length).trim();
    if (!data) {
      return null;
    }

    if (data === STREAM_TERMINATOR) {
      return { type: "terminator" };
    }

    return { type: "payload", data };
  }
}

function isCompleteJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}
