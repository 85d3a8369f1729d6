/**
 * Debug logging utilities for the policy analyzer
 *
 * Console logging plus an optional append-only debug file for analysis runs.
 * Configured via environment variables.
 *
 * @module analyzer/debug
 */

import * as fs from "fs";
import * as path from "path";

// ============================================================================
// CONFIGURATION
// ============================================================================

const DEBUG_LOG_PATH =
  process.env.BPA_DEBUG_LOG_PATH || path.join(process.cwd(), "debug-analyzer.log");

const DEBUG_LOG_FILE_ENABLED =
  (process.env.BPA_DEBUG_LOG_FILE ?? "false").toLowerCase() === "true";

const DEBUG_LOG_CLEAR_ON_START =
  (process.env.BPA_DEBUG_LOG_CLEAR_ON_START ?? "false").toLowerCase() === "true";

const DEBUG_LOG_MAX_DATA_CHARS = 8000;

let fileWriteWarned = false;

function warnFileWriteOnce(error: unknown): void {
  if (fileWriteWarned) return;
  fileWriteWarned = true;
  const msg = error instanceof Error ? error.message : String(error);
  console.warn(`[Debug] Could not write ${DEBUG_LOG_PATH}: ${msg}`);
}

// ============================================================================
// DEBUG LOGGING FUNCTIONS
// ============================================================================

/**
 * Format a log line with an ISO timestamp and an optional truncated payload.
 */
export function formatDebugLine(message: string, data?: unknown, timestamp = new Date()): string {
  let logLine = `[${timestamp.toISOString()}] ${message}`;

  if (data !== undefined) {
    let payload: string;
    try {
      payload = typeof data === "string" ? data : JSON.stringify(data, null, 2);
    } catch {
      payload = "[unserializable]";
    }
    if (payload.length > DEBUG_LOG_MAX_DATA_CHARS) {
      payload = payload.slice(0, DEBUG_LOG_MAX_DATA_CHARS) + "...[truncated]";
    }
    logLine += ` | ${payload}`;
  }
  return logLine;
}

/**
 * Log a message to the console and, when enabled, to the debug file
 */
export function debugLog(message: string, data?: unknown): void {
  const logLine = formatDebugLine(message, data);

  if (DEBUG_LOG_FILE_ENABLED) {
    fs.promises.appendFile(DEBUG_LOG_PATH, logLine + "\n").catch(warnFileWriteOnce);
  }

  console.log(logLine);
}

/**
 * Clear the debug log file at startup
 */
export function clearDebugLog(): void {
  if (!DEBUG_LOG_FILE_ENABLED) return;
  if (!DEBUG_LOG_CLEAR_ON_START) return;

  fs.promises
    .writeFile(DEBUG_LOG_PATH, `=== Policy Analyzer Debug Log Started at ${new Date().toISOString()} ===\n`)
    .catch(warnFileWriteOnce);
}
