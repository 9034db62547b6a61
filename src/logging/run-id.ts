/**
 * Run ID generation and management.
 * Each CLI invocation gets a run ID so its log lines can be grouped.
 */

import { randomBytes } from "node:crypto";

/**
 * Generate a short run ID.
 * Format: date prefix + random suffix (e.g., "20240115-a1b2c3")
 */
export function generateRunId(): string {
  const datePart = new Date().toISOString().slice(0, 10).replace(/-/g, "");
  const randomPart = randomBytes(3).toString("hex");
  return `${datePart}-${randomPart}`;
}

let currentRunId: string | null = null;

/**
 * Initialize the run ID for this invocation. Call once at startup.
 */
export function initRunId(): string {
  currentRunId = generateRunId();
  return currentRunId;
}

/** Returns null until initRunId() has been called. */
export function getRunId(): string | null {
  return currentRunId;
}
