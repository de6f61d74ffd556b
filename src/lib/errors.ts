import type { z } from "zod/v4";

/**
 * Error taxonomy for the ingestion, detection and report paths.
 *
 * Line- and rule-local failures (ParseError, RuleEvaluationError) never
 * escalate. Collaborator failures (CollaboratorError, ValidationError) are
 * absorbed by the report fallback. The rejection errors are thrown back to
 * the caller of a core operation.
 */
export abstract class SocError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ParseError extends SocError {
  readonly code = "PARSE_ERROR";

  constructor(
    message: string,
    readonly lineNumber: number,
  ) {
    super(message);
  }
}

export class IngestFatalError extends SocError {
  readonly code = "INGEST_FATAL";
}

export class RuleEvaluationError extends SocError {
  readonly code = "RULE_EVALUATION_FAILED";

  constructor(
    readonly ruleName: string,
    cause: unknown,
  ) {
    super(`Rule ${ruleName} failed: ${describeError(cause)}`, { cause });
  }
}

export type CollaboratorFailure = "timeout" | "unavailable" | "failed";

export class CollaboratorError extends SocError {
  readonly code = "COLLABORATOR_ERROR";

  constructor(
    readonly reason: CollaboratorFailure,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ValidationError extends SocError {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    readonly issues: z.ZodError["issues"] = [],
  ) {
    super(message);
  }
}

export class JobConflictError extends SocError {
  readonly code = "JOB_CONFLICT";

  constructor(
    readonly uploadId: string,
    readonly activeJobId: string,
  ) {
    super(`Upload ${uploadId} already has an active ingest job (${activeJobId})`);
  }
}

export class IngestNotReadyError extends SocError {
  readonly code = "INGEST_NOT_READY";

  constructor(
    readonly uploadId: string,
    readonly status: string | null,
  ) {
    super(
      status
        ? `Ingestion for upload ${uploadId} is ${status}; detection requires a completed ingest`
        : `Upload ${uploadId} has not been ingested`,
    );
  }
}

export class NoFindingsError extends SocError {
  readonly code = "NO_FINDINGS";

  constructor(readonly uploadId: string) {
    super(`Upload ${uploadId} has no findings to report on`);
  }
}

export class InvalidTransitionError extends SocError {
  readonly code = "INVALID_TRANSITION";

  constructor(
    readonly jobId: string,
    readonly from: string,
    readonly to: string,
  ) {
    super(`Ingest job ${jobId} cannot move from ${from} to ${to}`);
  }
}

export class NotFoundError extends SocError {
  readonly code = "NOT_FOUND";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : "Unknown error";
}
