/**
 * Base error class for all c-testgen errors
 */
export class TestgenError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TestgenError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends TestgenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Source file could not be read or is not usable as generation input.
 * Fatal for that file only.
 */
export class ContextBuildError extends TestgenError {
  constructor(
    message: string,
    public readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, "CONTEXT_BUILD_ERROR", { filePath }, options);
    this.name = "ContextBuildError";
  }
}

/**
 * Every generation backend failed for one call
 */
export class GenerationError extends TestgenError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, "GENERATION_ERROR", context, options);
    this.name = "GenerationError";
  }
}

/**
 * A single backend request failed (HTTP status or transport error)
 */
export class BackendRequestError extends TestgenError {
  constructor(
    message: string,
    public readonly backend: string,
    public readonly status?: number
  ) {
    super(message, "BACKEND_REQUEST_ERROR", { backend, status });
    this.name = "BackendRequestError";
  }
}

/**
 * Unexpected fault while rewriting generated text
 */
export class NormalizationError extends TestgenError {
  constructor(message: string, public readonly step: string, options?: { cause?: unknown }) {
    super(message, "NORMALIZATION_ERROR", { step }, options);
    this.name = "NormalizationError";
  }
}

/**
 * A validator check threw instead of returning an outcome
 */
export class ValidationCheckError extends TestgenError {
  constructor(message: string, public readonly checkId: string, options?: { cause?: unknown }) {
    super(message, "VALIDATION_CHECK_ERROR", { checkId }, options);
    this.name = "ValidationCheckError";
  }
}

/**
 * The run was aborted from outside (SIGINT)
 */
export class RunInterruptedError extends TestgenError {
  constructor(filePath?: string) {
    super("Run interrupted", "RUN_INTERRUPTED", filePath !== undefined ? { filePath } : undefined);
    this.name = "RunInterruptedError";
  }
}
