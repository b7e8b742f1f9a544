export class SqlProbeError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SqlProbeError";
  }
}

export class ConfigError extends SqlProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

// =============================================================================
// RUN FAILURES
// =============================================================================

export class NotFoundError extends SqlProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "NotFoundError";
  }
}

export class GenerationError extends SqlProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GenerationError";
  }
}

export class ExecutionError extends SqlProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ExecutionError";
  }
}

export class ReportCreationError extends SqlProbeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ReportCreationError";
  }
}

export class InvalidExpectedCountError extends SqlProbeError {
  constructor(
    public readonly rawValue: string,
    cause?: unknown,
  ) {
    super(`Expected count "${rawValue}" is not an integer.`, cause);
    this.name = "InvalidExpectedCountError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  notFound: "NOT_FOUND",
  generation: "GENERATION_ERROR",
  execution: "EXECUTION_ERROR",
  report: "REPORT_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends SqlProbeError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;

  if (error instanceof NotFoundError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.notFound,
      title: "Object not found.",
      message: error.message,
      hint: "Check the schema and object name, and that the configured role can see it.",
      cause: error,
    });
  }

  if (error instanceof GenerationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.generation,
      title: "Test generation failed.",
      message: error.message,
      hint: "Check the llm section of the config and the run log for the failing stage.",
      cause: error,
    });
  }

  if (error instanceof ExecutionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.execution,
      title: "Test execution failed.",
      message: error.message,
      hint: "Check the warehouse and storage sections of the config.",
      cause: error,
    });
  }

  if (error instanceof ReportCreationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.report,
      title: "Report could not be written.",
      message: error.message,
      hint: "Check that reports_dir is writable.",
      cause: error,
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error.",
      message: error.message,
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error.",
    message,
    hint: "Rerun with --debug for the stack trace.",
    cause: error,
  });
}
