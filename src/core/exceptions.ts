/**
 * Base class for every error raised by the inbound logger itself.
 * Errors thrown by the wrapped application handler are never wrapped in this.
 */
export class InboundLoggerError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string = 'INBOUND_LOGGER_ERROR', details?: Record<string, unknown>) {
    super(message);
    this.name = 'InboundLoggerError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Invalid options, unknown adapter kind or malformed location string.
 * Raised at configuration time so misconfiguration surfaces before traffic flows.
 *
 * @example
 * ```ts
 * throw new ConfigurationError('Unsupported storage adapter: mongodb', { adapter: 'mongodb' });
 * ```
 */
export class ConfigurationError extends InboundLoggerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A named connection was requested at I/O time but is not registered.
 * Never resolved by falling back to the default connection.
 */
export class ConnectionResolutionError extends InboundLoggerError {
  public readonly connectionName: string;

  constructor(connectionName: string, message?: string) {
    super(
      message ?? `Cannot retrieve connection '${connectionName}': connection is not established`,
      'CONNECTION_NOT_ESTABLISHED',
      { connectionName }
    );
    this.name = 'ConnectionResolutionError';
    this.connectionName = connectionName;
  }
}

/**
 * A log record failed validation (missing method, url or status, negative duration).
 */
export class RecordValidationError extends InboundLoggerError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request log: ${issues.join('; ')}`, 'RECORD_VALIDATION_ERROR', { issues });
    this.name = 'RecordValidationError';
    this.issues = issues;
  }
}
