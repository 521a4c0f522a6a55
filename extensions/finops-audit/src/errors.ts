/**
 * FinOps Audit — Error Types
 *
 * Resource-level errors (normalization, insufficient data) are recovered by the
 * auditor; configuration and input errors are fatal for the whole run.
 */

export const AuditErrorCodes = {
  NORMALIZATION_FAILED: "NORMALIZATION_FAILED",
  INSUFFICIENT_DATA: "INSUFFICIENT_DATA",
  INVALID_CONFIG: "INVALID_CONFIG",
  INVALID_INPUT: "INVALID_INPUT",
  TIMED_OUT: "TIMED_OUT",
} as const;

export type AuditErrorCode = (typeof AuditErrorCodes)[keyof typeof AuditErrorCodes];

export class AuditEngineError extends Error {
  constructor(
    message: string,
    public code: AuditErrorCode,
  ) {
    super(message);
    this.name = "AuditEngineError";
  }
}

/** A raw resource lacks one of its identity fields. */
export class NormalizationError extends AuditEngineError {
  constructor(
    public resourceId: string | undefined,
    public missingFields: string[],
  ) {
    super(
      `Resource ${resourceId ?? "<unknown>"} is missing required fields: ${missingFields.join(", ")}`,
      AuditErrorCodes.NORMALIZATION_FAILED,
    );
    this.name = "NormalizationError";
  }
}

/** A rule needs a metric the resource does not report. */
export class InsufficientDataError extends AuditEngineError {
  constructor(
    public resourceId: string,
    public metric: string,
  ) {
    super(`Resource ${resourceId} has no "${metric}" data`, AuditErrorCodes.INSUFFICIENT_DATA);
    this.name = "InsufficientDataError";
  }
}

export class ConfigurationError extends AuditEngineError {
  constructor(public issues: string[]) {
    super(`Invalid audit configuration: ${issues.join("; ")}`, AuditErrorCodes.INVALID_CONFIG);
    this.name = "ConfigurationError";
  }
}

export class InputValidationError extends AuditEngineError {
  constructor(public issues: string[]) {
    super(`Invalid audit request: ${issues.join("; ")}`, AuditErrorCodes.INVALID_INPUT);
    this.name = "InputValidationError";
  }
}

export class AuditTimeoutError extends AuditEngineError {
  constructor(
    public deadlineMs: number,
    public kinds: string[],
  ) {
    super(
      `Audit deadline of ${deadlineMs}ms expired before ${kinds.join(", ")} completed`,
      AuditErrorCodes.TIMED_OUT,
    );
    this.name = "AuditTimeoutError";
  }
}

/**
 * Format any thrown value into a single-line message.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;
  if (error instanceof AuditEngineError) return `[${error.code}] ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
