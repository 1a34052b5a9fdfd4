/**
 * StreamingSession
 *
 * Owns one in-flight stream: transport bytes -> FrameDecoder -> EventDecoder
 * -> onResult, then exactly one onComplete.
 *
 *   idle --perform()--> active --terminator / end of data--> completing --> done
 *                          \------------ transport error / cancel ----------/
 *
 * Deliveries are handled synchronously, one chunk at a time, so onResult
 * calls for a session never overlap and keep arrival order.
 */

import { StreamCancelledError, type StreamError } from "../errors.js";
import { logger } from "../logging/index.js";
import { toError, type Result } from "../utils/result.js";

import { FrameDecoder, type Frame } from "./components/FrameDecoder.js";

import type { EventDecoder } from "./components/EventDecoder.js";
import type {
  StreamHandle,
  StreamRequest,
  StreamResultHandler,
  Transport,
} from "../types/stream.js";

export type SessionState = "idle" | "active" | "completing" | "done";

export type SessionCompletionHandler<T> = (session: StreamingSession<T>, error?: Error) => void;

export interface StreamingSessionOptions<T> {
  transport: Transport;
  decoder: EventDecoder<T>;
  maxBufferSize?: number | undefined;
}

let nextSessionId = 1;

export class StreamingSession<T> implements StreamHandle {
  readonly id: number = nextSessionId++;

  onResult?: StreamResultHandler<T> | undefined;
  onComplete?: SessionCompletionHandler<T> | undefined;

  private state: SessionState = "idle";
  private completed = false;
  private resultCount = 0;
  private readonly frames: FrameDecoder;
  private readonly transport: Transport;
  private readonly decoder: EventDecoder<T>;
  private readonly controller = new AbortController();

  constructor(options: StreamingSessionOptions<T>) {
    this.transport = options.transport;
    this.decoder = options.decoder;
    this.frames = new FrameDecoder(options.maxBufferSize);
  }

  get currentState(): SessionState {
    return this.state;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  get deliveredResults(): number {
    return this.resultCount;
  }

  /**
   * Start the stream. Returns once the transport call is kicked off; results
   * arrive through the callbacks.
   */
  perform(request: StreamRequest): void {
    if (this.state !== "idle") {
      logger.debug(`[STREAM ${this.id}] perform() ignored in state ${this.state}`);
      return;
    }

    this.state = "active";
    logger.debug(`[STREAM ${this.id}] Opening ${request.method} ${request.url}`);

    this.transport.open(
      request,
      (chunk) => this.receive(chunk),
      (error) => this.finish(error),
      this.controller.signal,
    );
  }

  /**
   * Stop the stream early. onComplete receives a StreamCancelledError and the
   * transport connection is aborted.
   */
  cancel(): void {
    if (this.completed) {
      return;
    }
    logger.debug(`[STREAM ${this.id}] Cancelled in state ${this.state}`);
    this.frames.reset();
    this.complete(new StreamCancelledError());
    this.controller.abort();
  }

  /**
   * Terminate a session that never reached the transport (e.g. its request
   * could not be built).
   */
  fail(error: Error): void {
    this.frames.reset();
    this.complete(error);
  }

  private receive(chunk: Buffer): void {
    if (this.state !== "active") {
      return;
    }

    let frames: Frame[];
    try {
      frames = this.frames.feed(chunk);
    } catch (error: unknown) {
      logger.error(`[STREAM ${this.id}] Framing failed:`, error);
      this.fail(toError(error));
      this.controller.abort();
      return;
    }

    this.handleFrames(frames);
  }

  private handleFrames(frames: Frame[]): void {
    for (const frame of frames) {
      if (this.state !== "active") {
        return;
      }
      if (frame.type === "terminator") {
        logger.debug(`[STREAM ${this.id}] Received terminator after ${this.resultCount} results`);
        this.state = "completing";
        this.frames.reset();
        return;
      }
      this.emit(this.decoder.decode(frame.data));
    }
  }

  private finish(error?: Error): void {
    if (this.completed) {
      return;
    }

    if (error) {
      logger.debug(`[STREAM ${this.id}] Transport failed:`, error.message);
      this.fail(error);
      return;
    }

    if (this.state === "active") {
      this.handleFrames(this.frames.finish());
    }
    this.state = "completing";
    this.complete();
  }

  private emit(result: Result<T, StreamError>): void {
    this.resultCount++;
    if (!result.success) {
      logger.warn(`[STREAM ${this.id}] Payload error (${result.error.name}): ${result.error.message}`);
    }
    try {
      this.onResult?.(result);
    } catch (callbackError: unknown) {
      logger.error(`[STREAM ${this.id}] onResult callback threw:`, callbackError);
    }
  }

  private complete(error?: Error): void {
    if (this.completed) {
      return;
    }
    this.completed = true;
    this.state = "done";

    logger.debug(
      `[STREAM ${this.id}] Completed with ${this.resultCount} results${error ? ` (${error.name}: ${error.message})` : ""}`,
    );

    try {
      this.onComplete?.(this, error);
    } catch (callbackError: unknown) {
      logger.error(`[STREAM ${this.id}] onComplete callback threw:`, callbackError);
    }
  }
}
