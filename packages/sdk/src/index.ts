/**
 * Document key generator SDK
 *
 * Compiles key expressions such as "user::%name%::#MONO_INCR#" and evaluates them against JSON
 * documents to produce import keys
 */

// Re-export types
export type {
  FieldPath,
  DocumentInput,
  LookupResult,
  DocumentLookup,
  MonoIncrState,
  Generator,
  GeneratorKind,
  CompileOptions,
  KeyGenConfig,
} from "./types.js";

// Compiler and pipeline
export {
  compileKeyGenerator,
  validateDelimiters,
  KeyGenerator,
  MAX_KEY_SIZE,
  DEFAULT_FIELD_DELIMITER,
  DEFAULT_GENERATOR_DELIMITER,
} from "./keygen.js";

// Field paths
export { parseFieldPath, formatFieldPath, removeFrom } from "./field-path.js";

// Document lookup
export { jsonLookup, formatScalar, classify, resolvePath, parseDocument } from "./lookup.js";

// Batch evaluation
export type { KeyResult, KeyResultSummary } from "./batch.js";
export { generateKeys, summarizeKeyResults } from "./batch.js";

// Configuration
export { KeyGenConfigSchema, parseConfig, loadConfig } from "./config.js";

// Logging
export type { LogLevel, LogEntry } from "./observability/logs.js";
export { logger, Logger, resolveLogLevel } from "./observability/logs.js";

// Errors
export {
  KeyGenError,
  DelimiterError,
  ExpressionError,
  EmptyExpressionError,
  FieldPathError,
  ResultError,
  isResultError,
} from "./errors.js";
export type { ResultErrorOptions } from "./errors.js";
