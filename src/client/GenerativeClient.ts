/**
 * Generative API Client
 *
 * One instance per credential set. Plain calls resolve to a `Result` and
 * never reject; streaming calls return a handle and report through
 * callbacks. Any number of calls of either kind may be in flight at once.
 */

import { resolveConfiguration } from "../config.js";
import { APIError, EmptyDataError, HTTPStatusError } from "../errors.js";
import { logger, logRequest, logResponse } from "../logging/index.js";
import {
  JSONRequest,
  makeStreamable,
  MultipartFormDataRequest,
  type BuildOptions,
  type RequestBuildable,
} from "../requests/RequestBuilder.js";
import { EventDecoder, type PayloadSchema } from "../stream/components/EventDecoder.js";
import { SessionRegistry } from "../stream/SessionRegistry.js";
import { StreamingSession } from "../stream/StreamingSession.js";
import { AxiosTransport } from "../transport/AxiosTransport.js";
import {
  AudioTranscriptionResultSchema,
  AudioTranslationResultSchema,
  ChatResultSchema,
  ChatStreamResultSchema,
  CompletionsResultSchema,
  EditsResultSchema,
  EmbeddingsResultSchema,
  ImagesResultSchema,
  ModelResultSchema,
  ModelsResultSchema,
  ModerationsResultSchema,
} from "../types/results.js";
import { errorFromResponseBody, isSuccessStatus } from "../utils/http/index.js";
import { failure, success, toError, type Result } from "../utils/result.js";
import { buildApiUrl, withPath } from "../utils/url/index.js";

import type { ClientConfiguration, ClientConfigurationInit } from "../config.js";
import type {
  AudioSpeechQuery,
  AudioTranscriptionQuery,
  AudioTranslationQuery,
  ChatQuery,
  CompletionsQuery,
  EditsQuery,
  EmbeddingsQuery,
  ImageEditsQuery,
  ImagesQuery,
  ImageVariationsQuery,
  ModelQuery,
  ModerationsQuery,
} from "../types/queries.js";
import type {
  AudioSpeechResult,
  AudioTranscriptionResult,
  AudioTranslationResult,
  ChatResult,
  ChatStreamResult,
  CompletionsResult,
  EditsResult,
  EmbeddingsResult,
  ImagesResult,
  ModelResult,
  ModelsResult,
  ModerationsResult,
} from "../types/results.js";
import type {
  StreamCompletionHandler,
  StreamHandle,
  StreamRequest,
  StreamResultHandler,
  Transport,
  TransportResponse,
} from "../types/stream.js";

/**
 * Last look at every request before it goes out. Return the request as is,
 * or a replacement (extra headers, a rewritten URL).
 */
export interface GenerativeClientDelegate {
  didPrepareRequest(client: GenerativeClient, request: StreamRequest): StreamRequest;
}

export interface GenerativeClientOptions {
  transport?: Transport | undefined;
  delegate?: GenerativeClientDelegate | undefined;
}

export class GenerativeClient {
  readonly configuration: ClientConfiguration;
  delegate: GenerativeClientDelegate | undefined;

  private readonly transport: Transport;
  private readonly sessions = new SessionRegistry();

  constructor(configuration: string | ClientConfigurationInit, options: GenerativeClientOptions = {}) {
    this.configuration = resolveConfiguration(
      typeof configuration === "string" ? { token: configuration } : configuration,
    );
    this.transport = options.transport ?? new AxiosTransport();
    this.delegate = options.delegate;

    if (this.configuration.debugMode) {
      logger.setDebugMode(true);
    }
  }

  /** Streams currently in flight */
  get activeStreamCount(): number {
    return this.sessions.size;
  }

  /**
   * Cancel every active stream. Each one completes with StreamCancelledError.
   */
  close(): void {
    const cancelled = this.sessions.cancelAll();
    if (cancelled > 0) {
      logger.debug(`[CLIENT] Cancelled ${cancelled} active stream(s)`);
    }
  }

  // ==========================================================================
  // Text
  // ==========================================================================

  completions(query: CompletionsQuery): Promise<Result<CompletionsResult>> {
    return this.execute("completions", this.jsonRequest(this.configuration.paths.completions, query), CompletionsResultSchema);
  }

  completionsStream(
    query: CompletionsQuery,
    onResult: StreamResultHandler<CompletionsResult>,
    onComplete?: StreamCompletionHandler,
  ): StreamHandle {
    return this.stream("completionsStream", this.configuration.paths.completions, query, CompletionsResultSchema, onResult, onComplete);
  }

  chats(query: ChatQuery): Promise<Result<ChatResult>> {
    return this.execute("chats", this.jsonRequest(this.configuration.paths.chats, query), ChatResultSchema);
  }

  chatsStream(
    query: ChatQuery,
    onResult: StreamResultHandler<ChatStreamResult>,
    onComplete?: StreamCompletionHandler,
  ): StreamHandle {
    return this.stream("chatsStream", this.configuration.paths.chats, query, ChatStreamResultSchema, onResult, onComplete);
  }

  edits(query: EditsQuery): Promise<Result<EditsResult>> {
    return this.execute("edits", this.jsonRequest(this.configuration.paths.edits, query), EditsResultSchema);
  }

  embeddings(query: EmbeddingsQuery): Promise<Result<EmbeddingsResult>> {
    return this.execute("embeddings", this.jsonRequest(this.configuration.paths.embeddings, query), EmbeddingsResultSchema);
  }

  moderations(query: ModerationsQuery): Promise<Result<ModerationsResult>> {
    return this.execute("moderations", this.jsonRequest(this.configuration.paths.moderations, query), ModerationsResultSchema);
  }

  // ==========================================================================
  // Models
  // ==========================================================================

  model(query: ModelQuery): Promise<Result<ModelResult>> {
    const url = withPath(buildApiUrl(this.configuration, this.configuration.paths.models), query.model);
    return this.execute("model", new JSONRequest(url, undefined, "GET"), ModelResultSchema);
  }

  models(): Promise<Result<ModelsResult>> {
    return this.execute("models", this.jsonRequest(this.configuration.paths.models, undefined, "GET"), ModelsResultSchema);
  }

  // ==========================================================================
  // Images
  // ==========================================================================

  images(query: ImagesQuery): Promise<Result<ImagesResult>> {
    return this.execute("images", this.jsonRequest(this.configuration.paths.images, query), ImagesResultSchema);
  }

  imageEdits(query: ImageEditsQuery): Promise<Result<ImagesResult>> {
    const request = new MultipartFormDataRequest(this.url(this.configuration.paths.imageEdits), {
      image: query.image,
      mask: query.mask,
      prompt: query.prompt,
      model: query.model,
      n: query.n,
      response_format: query.response_format,
      size: query.size,
      user: query.user,
    });
    return this.execute("imageEdits", request, ImagesResultSchema);
  }

  imageVariations(query: ImageVariationsQuery): Promise<Result<ImagesResult>> {
    const request = new MultipartFormDataRequest(this.url(this.configuration.paths.imageVariations), {
      image: query.image,
      model: query.model,
      n: query.n,
      response_format: query.response_format,
      size: query.size,
      user: query.user,
    });
    return this.execute("imageVariations", request, ImagesResultSchema);
  }

  // ==========================================================================
  // Audio
  // ==========================================================================

  audioTranscriptions(query: AudioTranscriptionQuery): Promise<Result<AudioTranscriptionResult>> {
    const request = new MultipartFormDataRequest(this.url(this.configuration.paths.audioTranscriptions), {
      file: query.file,
      model: query.model,
      prompt: query.prompt,
      response_format: query.response_format,
      temperature: query.temperature,
      language: query.language,
    });
    return this.execute("audioTranscriptions", request, AudioTranscriptionResultSchema);
  }

  audioTranslations(query: AudioTranslationQuery): Promise<Result<AudioTranslationResult>> {
    const request = new MultipartFormDataRequest(this.url(this.configuration.paths.audioTranslations), {
      file: query.file,
      model: query.model,
      prompt: query.prompt,
      response_format: query.response_format,
      temperature: query.temperature,
    });
    return this.execute("audioTranslations", request, AudioTranslationResultSchema);
  }

  /**
   * Text to speech. A 2xx answer is returned as raw audio bytes.
   */
  async audioCreateSpeech(query: AudioSpeechQuery): Promise<Result<AudioSpeechResult>> {
    const sent = await this.send("audioCreateSpeech", this.jsonRequest(this.configuration.paths.audioSpeech, query));
    if (!sent.success) {
      return sent;
    }

    const { response, url } = sent.data;
    if (!isSuccessStatus(response.status)) {
      return failure(errorFromResponseBody(response.status, response.body.toString("utf8")));
    }
    if (response.body.length === 0) {
      return failure(new EmptyDataError(url));
    }
    return success({ audio: response.body });
  }

  // ==========================================================================
  // Plumbing
  // ==========================================================================

  private get buildOptions(): BuildOptions {
    return {
      token: this.configuration.token,
      organizationIdentifier: this.configuration.organizationIdentifier,
      timeout: this.configuration.timeoutInterval,
    };
  }

  private url(path: string): string {
    return buildApiUrl(this.configuration, path);
  }

  private jsonRequest(path: string, body?: unknown, method: "GET" | "POST" = "POST"): JSONRequest {
    return new JSONRequest(this.url(path), body, method);
  }

  private prepare(request: StreamRequest): StreamRequest {
    return this.delegate ? this.delegate.didPrepareRequest(this, request) : request;
  }

  private async send(
    operation: string,
    request: RequestBuildable,
  ): Promise<Result<{ response: TransportResponse; url: string }>> {
    try {
      const built = this.prepare(await request.build(this.buildOptions));
      logRequest(built, operation);

      const startTime = Date.now();
      const response = await this.transport.send(built);
      logResponse(response.status, operation, Date.now() - startTime);

      return success({ response, url: built.url });
    } catch (error: unknown) {
      const normalized = toError(error);
      logger.error(`[CLIENT] ${operation} failed: ${normalized.message}`);
      return failure(normalized);
    }
  }

  private async execute<T>(
    operation: string,
    request: RequestBuildable,
    schema: PayloadSchema<T>,
  ): Promise<Result<T>> {
    const sent = await this.send(operation, request);
    if (!sent.success) {
      return sent;
    }
    return decodeResponse(sent.data.response, sent.data.url, new EventDecoder(schema));
  }

  private stream<T>(
    operation: string,
    path: string,
    query: object,
    schema: PayloadSchema<T>,
    onResult: StreamResultHandler<T>,
    onComplete?: StreamCompletionHandler,
  ): StreamHandle {
    const session = new StreamingSession<T>({
      transport: this.transport,
      decoder: new EventDecoder(schema),
      maxBufferSize: this.configuration.maxStreamBufferSize,
    });
    session.onResult = onResult;
    session.onComplete = (finished, error) => {
      this.sessions.remove(finished);
      onComplete?.(error);
    };
    this.sessions.add(session);

    let request: StreamRequest;
    try {
      const builder = new JSONRequest(this.url(path), makeStreamable(query), "POST", true);
      request = this.prepare(builder.buildSync(this.buildOptions));
    } catch (error: unknown) {
      session.fail(toError(error));
      return session;
    }

    logRequest(request, operation);
    session.perform(request);
    return session;
  }
}

/**
 * Decode a buffered response body. A structured API error keeps the HTTP
 * status; any other non-2xx body becomes an HTTPStatusError.
 */
function decodeResponse<T>(response: TransportResponse, url: string, decoder: EventDecoder<T>): Result<T> {
  const ok = isSuccessStatus(response.status);

  if (response.body.length === 0) {
    return failure(ok ? new EmptyDataError(url) : new HTTPStatusError(response.status, ""));
  }

  const text = response.body.toString("utf8");
  const decoded = decoder.decode(text);

  if (decoded.success) {
    return ok ? decoded : failure(new HTTPStatusError(response.status, text));
  }
  if (decoded.error instanceof APIError) {
    return failure(decoded.error.withStatus(response.status));
  }
  return failure(ok ? decoded.error : new HTTPStatusError(response.status, text));
}
