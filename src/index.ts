/**
 * record-rules - declarative record validation.
 *
 * Field-level constraint checking followed by model-level rule checking,
 * with the first violation reported as a structured error.
 */

export * from './types/index.js';
export * from './engines/index.js';
export * from './records/index.js';
export {
  ErrorCode,
  ErrorKind,
  ExitCode,
  RecordRulesError,
  InvalidRecordError,
  SchemaDefinitionError,
  FieldAccessError,
  ConfigurationError,
  InputError,
  NotFoundError,
  UsageError,
  classifyError,
  createErrorResponse,
  type ErrorCodeType,
  type ExitCodeType,
} from './utils/errors.js';
export { loadConfig, ConfigSchema, type Config } from './utils/config.js';
export { logger, type LogLevel, type LogContext } from './utils/logger.js';
