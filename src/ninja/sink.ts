/**
 * Destinations for rendered manifest text.
 */

import { mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { randomBytes } from "node:crypto";

export interface ManifestSink {
  /** Human-readable location, used in log messages */
  readonly location: string;
  write(text: string): void;
  close(): void;
}

/**
 * Writes the manifest to disk when closed.
 *
 * Text goes to a temporary file beside the target which is then renamed
 * over it, so the build executor never reads a half-written manifest.
 */
export class FileManifestSink implements ManifestSink {
  private readonly chunks: string[] = [];

  constructor(public readonly location: string) {}

  write(text: string): void {
    this.chunks.push(text);
  }

  close(): void {
    const tmp = `${this.location}.tmp.${randomBytes(4).toString("hex")}`;
    mkdirSync(dirname(this.location), { recursive: true });
    try {
      writeFileSync(tmp, this.chunks.join(""), "utf-8");
      renameSync(tmp, this.location);
    } catch (err) {
      rmSync(tmp, { force: true });
      throw err;
    }
  }
}

/**
 * Keeps the manifest in memory.
 */
export class MemoryManifestSink implements ManifestSink {
  readonly location = "(memory)";
  private text = "";
  private closed = false;

  write(text: string): void {
    this.text += text;
  }

  close(): void {
    this.closed = true;
  }

  get contents(): string {
    return this.text;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
