/**
 * Request Builders
 *
 * Turn a query into the frozen `StreamRequest` descriptor the transport
 * consumes. JSON bodies are serialized directly; multipart bodies go through
 * the platform `FormData` encoder.
 */

import { buildRequestHeaders, type RequestAuth } from "../utils/http/headerUtils.js";

import type { MultipartFieldValue, MultipartFields, UploadFile } from "../types/queries.js";
import type { HttpMethod, StreamRequest } from "../types/stream.js";

export interface BuildOptions extends RequestAuth {
  timeout: number;
}

export interface RequestBuildable {
  readonly url: string;
  readonly streaming: boolean;
  build(options: BuildOptions): Promise<StreamRequest>;
}

function freezeRequest(request: StreamRequest): StreamRequest {
  return Object.freeze({ ...request, headers: Object.freeze({ ...request.headers }) });
}

/**
 * Copy of `query` that asks the server to stream its answer
 */
export function makeStreamable<Q extends object>(query: Q): Q & { stream: true } {
  return { ...query, stream: true };
}

export class JSONRequest implements RequestBuildable {
  constructor(
    public readonly url: string,
    private readonly body?: unknown,
    private readonly method: HttpMethod = "POST",
    public readonly streaming: boolean = false,
  ) {}

  buildSync(options: BuildOptions): StreamRequest {
    const hasBody = this.body !== undefined;
    return freezeRequest({
      method: this.method,
      url: this.url,
      headers: buildRequestHeaders(options, {
        contentType: hasBody ? "application/json" : undefined,
        streaming: this.streaming,
      }),
      body: hasBody ? Buffer.from(JSON.stringify(this.body), "utf8") : undefined,
      timeout: options.timeout,
    });
  }

  async build(options: BuildOptions): Promise<StreamRequest> {
    return this.buildSync(options);
  }
}

export function isUploadFile(value: MultipartFieldValue): value is UploadFile {
  return typeof value === "object" && !Array.isArray(value) && "data" in value && "fileName" in value;
}

export function toFormData(fields: MultipartFields): FormData {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }
    if (isUploadFile(value)) {
      const blob = new Blob([Buffer.from(value.data)], { type: value.contentType ?? "application/octet-stream" });
      form.append(name, blob, value.fileName);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        form.append(name, String(item));
      }
    } else {
      form.append(name, String(value));
    }
  }
  return form;
}

export class MultipartFormDataRequest implements RequestBuildable {
  public readonly streaming = false;

  constructor(
    public readonly url: string,
    private readonly fields: MultipartFields,
  ) {}

  async build(options: BuildOptions): Promise<StreamRequest> {
    // Response serializes the form and picks the boundary
    const encoded = new Response(toFormData(this.fields));
    const contentType = encoded.headers.get("content-type") ?? "multipart/form-data";
    const body = Buffer.from(await encoded.arrayBuffer());

    return freezeRequest({
      method: "POST",
      url: this.url,
      headers: buildRequestHeaders(options, { contentType }),
      body,
      timeout: options.timeout,
    });
  }
}
