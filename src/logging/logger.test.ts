/**
 * Logger Tests
 *
 * Run with: npx tsx --test src/logging/logger.test.ts
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createLogger,
  formatLogEntry,
  getGenerationId,
  initGenerationId,
  isLogLevel,
} from "./index.js";

describe("formatLogEntry", () => {
  it("marks entries written before a generation starts", () => {
    assert.equal(
      formatLogEntry("info", "Manifest written", { edges: 3 }, "2024-01-01T00:00:00.000Z"),
      '[2024-01-01T00:00:00.000Z] [INFO ] [no-generation-id] Manifest written {"edges":3}'
    );
  });

  it("tags entries with the generation ID and omits empty context", () => {
    const id = initGenerationId();

    assert.match(id, /^\d{8}-[0-9a-f]{6}$/);
    assert.equal(getGenerationId(), id);
    assert.equal(
      formatLogEntry("error", "Failed", {}, "2024-01-01T00:00:00.000Z"),
      `[2024-01-01T00:00:00.000Z] [ERROR] [${id}] Failed`
    );
  });
});

describe("createLogger", () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), "kbuild-logger-"));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("appends entries at or above its level to the log file", () => {
    const logFile = join(dir, "logs", "build.log");
    const logger = createLogger({ level: "warn", console: false, logFile });

    logger.info("Rule registered", { rule: "cc" });
    logger.warn("Disk low", { free: 1 });

    const id = getGenerationId() ?? "no-generation-id";
    const text = readFileSync(logFile, "utf-8");
    assert.match(text, /^\[[^\]]+\] \[WARN \] \[[^\]]+\] Disk low \{"free":1\}\n$/);
    assert.equal(text.includes(`[${id}]`), true);
  });
});

describe("isLogLevel", () => {
  it("accepts the four levels only", () => {
    assert.equal(isLogLevel("debug"), true);
    assert.equal(isLogLevel("error"), true);
    assert.equal(isLogLevel("verbose"), false);
  });
});
