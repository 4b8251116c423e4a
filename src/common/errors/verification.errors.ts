/**
 * Verification Error Classes
 *
 * Failure taxonomy for the verification pipeline:
 * - DecodeError: upload is not a readable image (recovered into AUTO_REJECT)
 * - ModelUnavailableError: captioning/OCR backend failed or timed out (retryable)
 * - PipelineError: any other stage failure
 * - ConfigurationError: invalid thresholds/weights/env at startup (fatal)
 * - InvalidUploadError: rejected at the HTTP boundary before the pipeline runs
 *
 * Each error includes:
 * - HTTP status code
 * - Machine-readable error code
 * - User-facing message
 * - Telemetry label
 */

export enum VerificationErrorCode {
  DECODE_FAILED = "DECODE_FAILED",
  MODEL_UNAVAILABLE = "MODEL_UNAVAILABLE",
  PIPELINE_FAILED = "PIPELINE_FAILED",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION",
  INVALID_UPLOAD = "INVALID_UPLOAD",
}

export type PipelineStage =
  | "normalize"
  | "classify"
  | "extract"
  | "match"
  | "aggregate"
  | "decide";

export type CapabilityStage = Extract<PipelineStage, "classify" | "extract">;

export type ModelUnavailableReason = "timeout" | "backend_error" | "closed";

export class VerificationError extends Error {
  constructor(
    public readonly code: VerificationErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "VerificationError";

    Error.captureStackTrace(this, this.constructor);
  }

  toResponse() {
    return {
      error: {
        code: this.code,
        message: this.message,
        details: this.details,
      },
    };
  }

  getTelemetryLabel(): string {
    return this.code.toLowerCase();
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return typeof cause === "string" ? cause : "unknown error";
}

export class DecodeError extends VerificationError {
  constructor(
    reason: string,
    public readonly cause?: unknown,
  ) {
    super(
      VerificationErrorCode.DECODE_FAILED,
      422,
      `Image could not be decoded: ${reason}`,
      { reason },
    );
    this.name = "DecodeError";
  }
}

export class ModelUnavailableError extends VerificationError {
  constructor(
    public readonly stage: CapabilityStage,
    public readonly reason: ModelUnavailableReason,
    public readonly cause?: unknown,
  ) {
    super(
      VerificationErrorCode.MODEL_UNAVAILABLE,
      503,
      reason === "timeout"
        ? `The ${stage} model did not respond in time`
        : `The ${stage} model is unavailable: ${describeCause(cause)}`,
      { stage, reason, retryable: true },
    );
    this.name = "ModelUnavailableError";
  }
}

export class PipelineError extends VerificationError {
  constructor(
    public readonly stage: PipelineStage,
    public readonly cause: unknown,
  ) {
    super(
      VerificationErrorCode.PIPELINE_FAILED,
      500,
      `Verification failed during ${stage}: ${describeCause(cause)}`,
      { stage },
    );
    this.name = "PipelineError";
  }
}

export class ConfigurationError extends VerificationError {
  constructor(readonly reasons: readonly string[]) {
    super(
      VerificationErrorCode.INVALID_CONFIGURATION,
      500,
      `Configuration validation failed: ${reasons.join("; ")}`,
      { reasons },
    );
    this.name = "ConfigurationError";
  }
}

export class InvalidUploadError extends VerificationError {
  constructor(reasons: readonly string[]) {
    super(
      VerificationErrorCode.INVALID_UPLOAD,
      400,
      `Invalid upload: ${reasons.join("; ")}`,
      { reasons },
    );
    this.name = "InvalidUploadError";
  }
}
