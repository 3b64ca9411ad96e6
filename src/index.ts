// ============================================================================
// Configuration
// ============================================================================

export { Configuration } from './config/configuration.js';
export type { ConfigurationBackup } from './config/configuration.js';
export { configurationOptionsSchema, parseConfigurationOptions } from './config/schema.js';
export type { ConfigurationOptions } from './config/schema.js';
export type { FilterSnapshot, JsonValue, ParseResult, PathPattern, StorageKind } from './config/types.js';
export {
  DEFAULT_EXCLUDED_CONTENT_TYPES,
  DEFAULT_EXCLUDED_CONTROLLERS,
  DEFAULT_EXCLUDED_PATHS,
  DEFAULT_MAX_BODY_SIZE,
  DEFAULT_SENSITIVE_BODY_KEYS,
  DEFAULT_SENSITIVE_HEADERS,
  FILTERED_VALUE,
} from './config/defaults.js';
export {
  enabledForController,
  filterBody,
  filterHeaders,
  filterSensitiveData,
  matchPath,
  parseJson,
  shouldLogContentType,
  shouldLogPath,
} from './config/filters.js';

// ============================================================================
// State and administration
// ============================================================================

export {
  LoggerState,
  getLoggerState,
  setLoggerState,
  enable,
  disable,
  isEnabled,
  enabledFor,
  configure,
  configuration,
  globalConfiguration,
  withConfiguration,
  setMetadata,
  getMetadata,
  addMetadata,
  setLoggable,
  getLoggable,
  clearContext,
  setPrimaryStorage,
  getPrimaryStorage,
  enableSecondaryDatabase,
  disableSecondaryDatabase,
  cleanup,
  search,
  analyze,
  testLogging,
} from './state.js';
export type { ConfigureInput } from './state.js';
export { ContextStore } from './context/context-store.js';
export type { ContextFrame, ContextStoreOptions } from './context/context-store.js';
export { ConfigurationScope } from './context/configuration-scope.js';

// ============================================================================
// Middleware
// ============================================================================

export { createCaptureMiddleware, getRequestId } from './middleware/capture.js';
export type { CaptureMiddlewareOptions } from './middleware/capture.js';
export type {
  ClientAddressResolver,
  HandlerDescriptor,
  HandlerResolver,
  InboundLoggerEnv,
} from './middleware/types.js';

// ============================================================================
// Handler groups
// ============================================================================

export {
  HandlerGroup,
  defineHandlerGroup,
  addLogMetadata,
  setLogLoggable,
  logEvent,
} from './handlers/handler-group.js';
export type {
  CurrentUser,
  CurrentUserResolver,
  GroupHandler,
  HandlerGroupOptions,
  LogContext,
  LogContextCallback,
} from './handlers/handler-group.js';

// ============================================================================
// Records
// ============================================================================

export type {
  LoggableRef,
  LogRecord,
  LogRequestInput,
  LogRequestOptions,
  NewLogRecord,
  RequestAnalysis,
  SearchCriteria,
} from './record/types.js';
export { logRecordSchema, validateLogRecord } from './record/schema.js';
export { buildLogRecord } from './record/build.js';
export {
  durationSeconds,
  formattedCall,
  formattedDuration,
  formattedRequest,
  formattedResponse,
  isFailure,
  isSlow,
  isSuccess,
  statusText,
} from './record/format.js';

// ============================================================================
// Storage, cache, logging
// ============================================================================

export * from './storage/index.js';
export * from './cache/index.js';
export * from './logging/index.js';

// ============================================================================
// Testing
// ============================================================================

export { TestLogging, assertRequestCount, assertRequestLogged, assertSuccessRate } from './testing/test-logging.js';
export type { TestLogCriteria, TestLoggingConfigureOptions, TestLoggingOptions } from './testing/test-logging.js';

// ============================================================================
// Errors
// ============================================================================

export {
  InboundLoggerError,
  ConfigurationError,
  ConnectionResolutionError,
  RecordValidationError,
} from './core/exceptions.js';
