/**
 * Error Classes for MQ Topology
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Input shape errors (1xxx)
  INPUT_NOT_A_LIST = "E1000",
  INPUT_EMPTY = "E1001",
  INPUT_NOT_A_MAPPING = "E1002",
  INPUT_FILE_NOT_FOUND = "E1003",
  INPUT_MALFORMED_TREE = "E1004",

  // Configuration errors (2xxx)
  CONFIG_INVALID = "E2000",
  CONFIG_FIELD_MAPPING_INVALID = "E2001",

  // Reference data errors (3xxx)
  REFERENCE_MALFORMED = "E3000",
  REFERENCE_UNREADABLE = "E3001",

  // Change detection errors (4xxx)
  CHANGE_DETECTION_FAILED = "E4000",
  BASELINE_UNREADABLE = "E4001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  FILE_SYSTEM_ERROR = "E9002",
}

/**
 * Base error class for all MQ Topology errors
 */
export class TopologyError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TopologyError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Raised before any processing starts when an input has the wrong shape
 * (records not a list, empty record list, tree not a mapping).
 */
export class InputShapeError extends TopologyError {
  constructor(message: string, code: ErrorCode = ErrorCode.INPUT_NOT_A_LIST, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "InputShapeError";
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends TopologyError {
  public readonly configPath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context?: Record<string, unknown> & { configPath?: string }
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
    this.configPath = context?.configPath;
  }

  override toString(): string {
    const location = this.configPath ? ` in ${this.configPath}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * A reference table exists but could not be read or parsed.
 * The pipeline downgrades this to a warning and an empty table.
 */
export class ReferenceDataError extends TopologyError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.REFERENCE_MALFORMED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "ReferenceDataError";
    this.filePath = context?.filePath;
  }
}

/**
 * Change detection errors
 */
export class ChangeDetectionError extends TopologyError {
  constructor(message: string, code: ErrorCode = ErrorCode.CHANGE_DETECTION_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ChangeDetectionError";
  }
}

/**
 * Check if an error is a TopologyError
 */
export function isTopologyError(error: unknown): error is TopologyError {
  return error instanceof TopologyError;
}

/**
 * Wrap an unknown error in a TopologyError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): TopologyError {
  if (isTopologyError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TopologyError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new TopologyError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
