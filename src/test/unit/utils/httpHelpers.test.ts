import { Readable } from "stream";

import { AxiosError } from "axios";
import { expect } from "chai";

import { APIError, HTTPStatusError, StreamCancelledError, TransportError } from "../../../errors.js";
import { parseDebugMode } from "../../../logging/configLogger.js";
import { maskHeaders } from "../../../logging/requestLogger.js";
import {
  buildRequestHeaders,
  errorFromResponseBody,
  extractErrorMessage,
  isSuccessStatus,
  streamToString,
  toTransportError,
} from "../../../utils/http/index.js";
import { buildApiUrl, getApiBaseUrl, withPath } from "../../../utils/url/index.js";

describe("HTTP helpers", () => {
  describe("URLs", () => {
    it("joins scheme, host and path", () => {
      expect(buildApiUrl({ scheme: "https", host: "api.test" }, "/v1/models")).to.equal("https://api.test/v1/models");
      expect(buildApiUrl({ scheme: "http", host: "localhost:8080/" }, "v1/models")).to.equal("http://localhost:8080/v1/models");
      expect(getApiBaseUrl({ scheme: "https", host: "api.test//" })).to.equal("https://api.test");
    });

    it("appends an encoded path segment", () => {
      expect(withPath("https://api.test/v1/models", "ft:base/custom")).to.equal("https://api.test/v1/models/ft%3Abase%2Fcustom");
      expect(withPath("https://api.test/v1/models/", "m1")).to.equal("https://api.test/v1/models/m1");
    });
  });

  describe("headers", () => {
    it("adds only the headers that apply", () => {
      expect(buildRequestHeaders({ token: "test-secret" })).to.deep.equal({ Authorization: "Bearer test-secret" });
      expect(
        buildRequestHeaders({ token: "test-secret", organizationIdentifier: "org-test" }, { contentType: "application/json", streaming: true }),
      ).to.deep.equal({
        Authorization: "Bearer test-secret",
        "Content-Type": "application/json",
        "OpenAI-Organization": "org-test",
        Accept: "text/event-stream",
        "Cache-Control": "no-cache",
      });
    });

    it("masks the bearer token for logging", () => {
      const headers = { Authorization: "Bearer test-secret", Accept: "text/event-stream" };
      expect(maskHeaders(headers)).to.deep.equal({ Authorization: "Bearer ********", Accept: "text/event-stream" });
      expect(headers.Authorization).to.equal("Bearer test-secret");
    });
  });

  describe("error mapping", () => {
    it("parses a structured error body", () => {
      const error = errorFromResponseBody(404, '{"error":{"message":"No such model","type":"invalid_request_error","code":"model_not_found"}}');
      expect(error).to.be.instanceOf(APIError);
      if (error instanceof APIError) {
        expect(error.status).to.equal(404);
        expect(error.apiCode).to.equal("model_not_found");
        expect(error.param).to.equal(null);
      }
    });

    it("falls back to HTTPStatusError for other bodies", () => {
      const error = errorFromResponseBody(500, "<html>oops</html>");
      expect(error).to.be.instanceOf(HTTPStatusError);
      expect(error.message).to.equal("HTTP 500: <html>oops</html>");
    });

    it("classifies statuses", () => {
      expect([199, 200, 204, 299, 300, 404].map(isSuccessStatus)).to.deep.equal([false, true, true, true, false, false]);
    });

    it("maps axios failures to TransportError with their code", () => {
      const mapped = toTransportError(new AxiosError("timeout of 50ms exceeded", "ECONNABORTED"));
      expect(mapped).to.be.instanceOf(TransportError);
      if (mapped instanceof TransportError) {
        expect(mapped.transportCode).to.equal("ECONNABORTED");
        expect(mapped.message).to.equal("timeout of 50ms exceeded. Request timed out.");
      }
    });

    it("keeps cancellation distinguishable", () => {
      expect(toTransportError(new StreamCancelledError())).to.be.instanceOf(StreamCancelledError);
    });

    it("passes client errors through untouched", () => {
      const original = new HTTPStatusError(503, "busy");
      expect(toTransportError(original)).to.equal(original);
    });

    it("extracts messages from unknown values", () => {
      expect(extractErrorMessage(new Error("boom"))).to.equal("boom");
      expect(extractErrorMessage("  plain  ")).to.equal("plain");
      expect(extractErrorMessage({ error: { message: "nested" } })).to.equal("nested");
      expect(extractErrorMessage(null)).to.equal("Unknown error (empty response)");
    });
  });

  it("reads a stream into a string", async () => {
    const text = await streamToString(Readable.from([Buffer.from("caf"), Buffer.from("é")]));
    expect(text).to.equal("café");
  });

  it("parses debug switches", () => {
    expect(["true", "1", "false", "yes"].map(parseDebugMode)).to.deep.equal([true, true, false, false]);
    expect(parseDebugMode(undefined)).to.equal(false);
  });
});
