/**
 * Generation ID management.
 * Each manifest generation gets an ID that tags its log lines.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short, unique generation ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateGenerationId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentGenerationId: string | null = null;

/**
 * Start a new generation. Called once per build-script run.
 */
export function initGenerationId(): string {
  currentGenerationId = generateGenerationId();
  return currentGenerationId;
}

/**
 * The current generation ID, or null before `initGenerationId`.
 */
export function getGenerationId(): string | null {
  return currentGenerationId;
}
