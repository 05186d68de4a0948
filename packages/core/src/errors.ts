/**
 * Error classes raised while building the engine.
 *
 * Linting itself never throws for user code; every error here is raised
 * once, at startup, before any file is analyzed.
 */

/**
 * Base class for all logmsglint errors
 */
export class LogMsgLintError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LogMsgLintError';
  }
}

/**
 * Error thrown when a sensitive-data pattern is not a valid regular expression
 */
export class InvalidPatternError extends LogMsgLintError {
  public readonly pattern: string;
  public readonly errorCause: Error | undefined;

  constructor(pattern: string, errorCause?: Error | undefined) {
    const reason = errorCause ? `: ${errorCause.message}` : '';
    super(`invalid sensitive-data pattern ${JSON.stringify(pattern)}${reason}`);
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when a raw configuration value has the wrong shape
 */
export class InvalidConfigurationError extends LogMsgLintError {
  /** Config key being read, if the error is scoped to one */
  public readonly key: string | undefined;
  /** Runtime type of the offending value */
  public readonly actual: string;

  constructor(message: string, actual: string, key?: string | undefined) {
    super(key === undefined ? message : `key ${JSON.stringify(key)}: ${message}`);
    this.name = 'InvalidConfigurationError';
    this.key = key;
    this.actual = actual;
  }
}

/**
 * Error thrown when a configuration file cannot be read
 */
export class ConfigLoadError extends LogMsgLintError {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Error thrown when a configuration file is not valid JSON
 */
export class ConfigParseError extends LogMsgLintError {
  public readonly filePath: string;
  public readonly errorCause: Error | undefined;

  constructor(message: string, filePath: string, errorCause?: Error | undefined) {
    super(message);
    this.name = 'ConfigParseError';
    this.filePath = filePath;
    this.errorCause = errorCause;
  }
}

/**
 * Describe the runtime type of a value for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) {return 'null';}
  if (Array.isArray(value)) {return 'array';}
  return typeof value;
}
