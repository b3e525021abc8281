// Error classes
export {
  TestgenError,
  ConfigError,
  ContextBuildError,
  GenerationError,
  BackendRequestError,
  NormalizationError,
  ValidationCheckError,
  RunInterruptedError,
} from "./errors.js";

// Result type and utilities
export { ok, err, unwrap, unwrapOr, tryCatch, tryCatchAsync } from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, Logger } from "./logger.js";
export type { LogLevel } from "./logger.js";
