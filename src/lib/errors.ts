/**
 * Error types raised by the policy analysis core.
 *
 * @module errors
 */

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[],
    public readonly source?: string,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigValidationError";
  }
}

export type EvidenceSide = "left" | "right";

/**
 * Raised when a finding is built without page or snippet evidence on one side.
 * Findings that raise this are never emitted.
 */
export class EvidenceIntegrityError extends Error {
  constructor(
    message: string,
    public readonly side: EvidenceSide,
  ) {
    super(message);
    this.name = "EvidenceIntegrityError";
  }
}

export class InsightStoreError extends Error {
  constructor(
    message: string,
    public readonly location: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InsightStoreError";
  }
}

export class CollaboratorTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`Collaborator ${operation} timed out after ${timeoutMs}ms`);
    this.name = "CollaboratorTimeoutError";
  }
}

export class CollaboratorResponseError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly rawText?: string,
  ) {
    super(message);
    this.name = "CollaboratorResponseError";
  }
}
