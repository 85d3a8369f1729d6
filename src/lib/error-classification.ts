/**
 * Error Classification
 *
 * Classifies collaborator (LLM) failures so the pipeline can log them with a
 * stable category before falling back to the deterministic result.
 *
 * @module error-classification
 */

import { CollaboratorResponseError, CollaboratorTimeoutError } from "./errors";

export type ErrorCategory =
  | "provider_outage"
  | "rate_limit"
  | "malformed_response"
  | "timeout"
  | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  retriable: boolean;
};

/** Patterns indicating LLM provider rate limiting or quota exhaustion */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /capacity/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /invalid.*key/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [
  /timeout/i,
  /timed?\s*out/i,
  /AbortError/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
];

function readStatusCode(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" ? status : null;
}

/**
 * Classify an error raised while talking to the collaborator.
 */
export function classifyError(error: unknown): ClassifiedError {
  const msg = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (error instanceof CollaboratorResponseError) {
    return { category: "malformed_response", message: msg, retriable: true };
  }

  if (
    error instanceof CollaboratorTimeoutError ||
    name === "TimeoutError" ||
    name === "AbortError" ||
    TIMEOUT_PATTERNS.some((p) => p.test(msg))
  ) {
    return { category: "timeout", message: msg, retriable: true };
  }

  // Misconfigured credentials count as an outage for this run
  if (AUTH_PATTERNS.some((p) => p.test(msg))) {
    return { category: "provider_outage", message: msg, retriable: false };
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(msg))) {
    return { category: "rate_limit", message: msg, retriable: true };
  }

  // Status code on error object (AI SDK pattern)
  const statusCode = readStatusCode(error);
  if (statusCode !== null) {
    if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
      return { category: "rate_limit", message: msg, retriable: true };
    }
    if (statusCode === 401 || statusCode === 403 || statusCode >= 500) {
      return { category: "provider_outage", message: msg, retriable: false };
    }
  }

  return { category: "unknown", message: msg, retriable: false };
}
