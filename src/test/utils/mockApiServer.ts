/**
 * Mock API server
 *
 * In-process express app on an ephemeral port, answering the routes the
 * transport and client tests drive.
 */

import express from "express";

import { formatSSEChunk, formatSSETerminator } from "../../utils/http/index.js";

import { apiErrorBody, chatChunk } from "./payloads.js";

import type { Request, Response } from "express";
import type { Server } from "http";

export interface MockApiServer {
  baseUrl: string;
  host: string;
  /** Headers of the last request each route saw */
  lastHeaders: Map<string, Request["headers"]>;
  close(): Promise<void>;
}

const STREAM_WORDS = ["Hello", " from", " the", " mock", " server"];

function record(server: MockApiServer, route: string, req: Request): void {
  server.lastHeaders.set(route, req.headers);
}

export async function startMockApiServer(): Promise<MockApiServer> {
  const app = express();
  app.use(express.json());

  const state: MockApiServer = {
    baseUrl: "",
    host: "",
    lastHeaders: new Map(),
    close: async () => undefined,
  };

  // Streams one word per chunk, each event split across two writes
  app.post("/v1/chat/completions", (req: Request, res: Response) => {
    record(state, "chat", req);
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");

    let index = 0;
    const writeNext = (): void => {
      const word = STREAM_WORDS[index];
      if (word === undefined) {
        res.write(formatSSETerminator());
        res.end();
        return;
      }
      const event = formatSSEChunk(chatChunk(`chunk-${index}`, word));
      const middle = Math.floor(event.length / 2);
      res.write(event.slice(0, middle));
      res.write(event.slice(middle));
      index++;
      setTimeout(writeNext, 2);
    };
    writeNext();
  });

  // Writes one event, then holds the connection open
  app.post("/v1/hanging", (req: Request, res: Response) => {
    record(state, "hanging", req);
    res.setHeader("Content-Type", "text/event-stream");
    res.write(formatSSEChunk(chatChunk("first", "only")));
  });

  app.post("/v1/unauthorized", (req: Request, res: Response) => {
    record(state, "unauthorized", req);
    res.status(401).json(apiErrorBody("Incorrect API key provided", "invalid_api_key"));
  });

  app.get("/v1/models", (req: Request, res: Response) => {
    record(state, "models", req);
    res.json({
      object: "list",
      data: [
        { id: "test-model", object: "model", created: 1700000000, owned_by: "tests" },
        { id: "other-model", object: "model", created: 1700000001, owned_by: "tests" },
      ],
    });
  });

  app.get("/v1/broken", (req: Request, res: Response) => {
    record(state, "broken", req);
    res.status(502).type("text/plain").send("Bad Gateway");
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;

  state.host = `127.0.0.1:${port}`;
  state.baseUrl = `http://${state.host}`;
  state.close = () =>
    new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((error) => (error ? reject(error) : resolve()));
    });

  return state;
}
