/**
 * Environment Helper Tests
 *
 * Run with: npx tsx --test src/config/env.test.ts
 */

import { describe, it, afterEach } from "node:test";
import assert from "node:assert/strict";
import { EnvConfigError, optionalEnv, optionalEnvFlag } from "./env.js";
import { configuredLogLevel, validateConfig, type AppConfig } from "./index.js";

const KEY = "KBUILD_TEST_VALUE";

const BASE_CONFIG: AppConfig = {
  env: "test",
  logLevel: "info",
  logFile: "",
  useSystemToolchain: false,
  ninjaBinary: "ninja",
};

describe("environment helpers", () => {
  afterEach(() => {
    delete process.env[KEY];
  });

  it("falls back to the default for unset and empty values", () => {
    assert.equal(optionalEnv(KEY, "ninja"), "ninja");
    process.env[KEY] = "";
    assert.equal(optionalEnv(KEY, "ninja"), "ninja");
    process.env[KEY] = "samu";
    assert.equal(optionalEnv(KEY, "ninja"), "samu");
  });

  it("parses flag values as booleans", () => {
    process.env[KEY] = "No";
    assert.equal(optionalEnvFlag(KEY), false);
    process.env[KEY] = "maybe";
    assert.throws(
      () => optionalEnvFlag(KEY),
      (err: unknown) =>
        err instanceof EnvConfigError &&
        err.message ===
          "Environment variable KBUILD_TEST_VALUE must be a boolean (true/false/1/0/yes/no), got: maybe"
    );
  });

  it("treats a set but empty flag as on", () => {
    assert.equal(optionalEnvFlag(KEY), false);
    process.env[KEY] = "";
    assert.equal(optionalEnvFlag(KEY), true);
    process.env[KEY] = "0";
    assert.equal(optionalEnvFlag(KEY), false);
  });
});

describe("validateConfig", () => {
  it("accepts a valid configuration", () => {
    assert.doesNotThrow(() => validateConfig(BASE_CONFIG));
  });

  it("rejects unknown environments and log levels", () => {
    assert.throws(() => validateConfig({ ...BASE_CONFIG, env: "staging" }), /Invalid NODE_ENV: staging/);
    assert.throws(
      () => validateConfig({ ...BASE_CONFIG, logLevel: "loud" }),
      /Invalid KBUILD_LOG_LEVEL: loud/
    );
  });

  it("falls back to info for an invalid log level", () => {
    assert.equal(configuredLogLevel({ ...BASE_CONFIG, logLevel: "loud" }), "info");
    assert.equal(configuredLogLevel({ ...BASE_CONFIG, logLevel: "debug" }), "debug");
  });
});
