import { fileURLToPath } from "url";

import { expect } from "chai";
import { afterEach, beforeEach, describe, it } from "mocha";

import { loadConfigFromFile, resolveConfiguration } from "../../config.js";
import { V1_API_PATHS } from "../../constants/endpoints.js";
import { ConfigurationError } from "../../errors.js";

const FIXTURE = fileURLToPath(new URL("../fixtures/client.config.json", import.meta.url));
const INVALID_FIXTURE = fileURLToPath(new URL("../fixtures/invalid.config.json", import.meta.url));

const ENV_KEYS = [
  "OPENAI_API_KEY",
  "OPENAI_ORGANIZATION",
  "OPENAI_ORG_ID",
  "OPENAI_API_HOST",
  "OPENAI_API_SCHEME",
  "OPENAI_TIMEOUT_MS",
  "OPENAI_MAX_STREAM_BUFFER_SIZE",
  "DEBUG_MODE",
];

describe("Configuration", function () {
  let savedEnv: Record<string, string | undefined> = {};

  beforeEach(function () {
    savedEnv = {};
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(function () {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it("fills in defaults around the token", function () {
    const configuration = resolveConfiguration({ token: "test-secret" });

    expect(configuration.token).to.equal("test-secret");
    expect(configuration.organizationIdentifier).to.equal(undefined);
    expect(configuration.host).to.equal("api.openai.com");
    expect(configuration.scheme).to.equal("https");
    expect(configuration.timeoutInterval).to.equal(60_000);
    expect(configuration.maxStreamBufferSize).to.equal(1024 * 1024);
    expect(configuration.debugMode).to.equal(false);
    expect(configuration.paths).to.deep.equal(V1_API_PATHS);
    expect(Object.isFrozen(configuration)).to.equal(true);
  });

  it("requires a token", function () {
    expect(() => resolveConfiguration({})).to.throw(ConfigurationError, /API token is required/);
  });

  it("reads the environment", function () {
    process.env["OPENAI_API_KEY"] = "env-secret";
    process.env["OPENAI_ORG_ID"] = "org-env";
    process.env["OPENAI_API_HOST"] = "env.api.test";
    process.env["OPENAI_API_SCHEME"] = "http";
    process.env["OPENAI_TIMEOUT_MS"] = "2500";
    process.env["DEBUG_MODE"] = "true";

    const configuration = resolveConfiguration();

    expect(configuration.token).to.equal("env-secret");
    expect(configuration.organizationIdentifier).to.equal("org-env");
    expect(configuration.host).to.equal("env.api.test");
    expect(configuration.scheme).to.equal("http");
    expect(configuration.timeoutInterval).to.equal(2500);
    expect(configuration.debugMode).to.equal(true);
  });

  it("prefers OPENAI_ORGANIZATION over OPENAI_ORG_ID", function () {
    process.env["OPENAI_ORGANIZATION"] = "org-primary";
    process.env["OPENAI_ORG_ID"] = "org-fallback";

    expect(resolveConfiguration({ token: "test-secret" }).organizationIdentifier).to.equal("org-primary");
  });

  it("lets explicit values win over the environment", function () {
    process.env["OPENAI_API_HOST"] = "env.api.test";

    const configuration = resolveConfiguration({ token: "test-secret", host: "explicit.api.test" });

    expect(configuration.host).to.equal("explicit.api.test");
  });

  it("reads a config file below the environment", function () {
    process.env["OPENAI_API_HOST"] = "env.api.test";

    const configuration = resolveConfiguration({ configPath: FIXTURE });

    expect(configuration.token).to.equal("file-secret");
    expect(configuration.host).to.equal("env.api.test");
    expect(configuration.scheme).to.equal("http");
    expect(configuration.timeoutInterval).to.equal(5000);
    expect(configuration.maxStreamBufferSize).to.equal(4096);
    expect(configuration.paths.chats).to.equal("/proxy/chat/completions");
    expect(configuration.paths.completions).to.equal(V1_API_PATHS.completions);
  });

  it("merges explicit path overrides over the file", function () {
    const configuration = resolveConfiguration({
      configPath: FIXTURE,
      paths: { chats: "/explicit/chat" },
    });
    expect(configuration.paths.chats).to.equal("/explicit/chat");
  });

  it("rejects a missing explicit config file", function () {
    expect(() => loadConfigFromFile("does/not/exist.json")).to.throw(ConfigurationError, /Config file not found/);
  });

  it("rejects a config file field of the wrong type", function () {
    expect(() => loadConfigFromFile(INVALID_FIXTURE)).to.throw(ConfigurationError, 'Config field "host" must be a string');
  });

  it("rejects a non-positive timeout", function () {
    expect(() => resolveConfiguration({ token: "test-secret", timeoutInterval: 0 })).to.throw(
      ConfigurationError,
      "timeoutInterval must be a positive number. Got: 0",
    );
  });

  it("rejects a non-numeric timeout from the environment", function () {
    process.env["OPENAI_TIMEOUT_MS"] = "soon";
    expect(() => resolveConfiguration({ token: "test-secret" })).to.throw(
      ConfigurationError,
      "OPENAI_TIMEOUT_MS must be a positive number. Got: soon",
    );
  });

  it("rejects an unknown scheme", function () {
    process.env["OPENAI_API_SCHEME"] = "ftp";
    expect(() => resolveConfiguration({ token: "test-secret" })).to.throw(ConfigurationError, /scheme must be/);
  });
});
