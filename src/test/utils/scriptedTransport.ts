/**
 * In-process Transport stand-in. Streaming calls are held open until the test
 * pushes bytes and ends them; plain calls are answered by a responder.
 */

import type { StreamRequest, Transport, TransportResponse } from "../../types/stream.js";

export type Responder = (request: StreamRequest) => TransportResponse | Promise<TransportResponse>;

export class OpenedStream {
  constructor(
    readonly request: StreamRequest,
    private readonly onBytes: (chunk: Buffer) => void,
    private readonly onDone: (error?: Error) => void,
    readonly signal: AbortSignal | undefined,
  ) {}

  get aborted(): boolean {
    return this.signal?.aborted ?? false;
  }

  push(...chunks: Array<string | Uint8Array>): this {
    for (const chunk of chunks) {
      this.onBytes(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
    }
    return this;
  }

  end(): void {
    this.onDone();
  }

  fail(error: Error): void {
    this.onDone(error);
  }

  /** Parsed JSON request body */
  body(): unknown {
    return this.request.body ? JSON.parse(this.request.body.toString("utf8")) : undefined;
  }
}

export class ScriptedTransport implements Transport {
  readonly opened: OpenedStream[] = [];
  readonly sent: StreamRequest[] = [];

  constructor(private responder: Responder = () => jsonResponse(200, {})) {}

  respondWith(responder: Responder): void {
    this.responder = responder;
  }

  open(
    request: StreamRequest,
    onBytes: (chunk: Buffer) => void,
    onDone: (error?: Error) => void,
    signal?: AbortSignal,
  ): void {
    this.opened.push(new OpenedStream(request, onBytes, onDone, signal));
  }

  async send(request: StreamRequest): Promise<TransportResponse> {
    this.sent.push(request);
    return this.responder(request);
  }

  stream(index: number): OpenedStream {
    const opened = this.opened[index];
    if (!opened) {
      throw new Error(`No stream opened at index ${index} (${this.opened.length} opened)`);
    }
    return opened;
  }

  lastSent(): StreamRequest {
    const request = this.sent[this.sent.length - 1];
    if (!request) {
      throw new Error("No request sent");
    }
    return request;
  }
}

export function jsonResponse(status: number, body: unknown): TransportResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: Buffer.from(JSON.stringify(body), "utf8"),
  };
}

export function textResponse(status: number, body: string): TransportResponse {
  return {
    status,
    headers: { "content-type": "text/plain" },
    body: Buffer.from(body, "utf8"),
  };
}
