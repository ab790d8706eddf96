/**
 * Error types for predicate pushdown.
 *
 * Contract violations (malformed markers, degenerate domains, unknown types)
 * are never retryable. Only driver failures that indicate a lost connection
 * are marked retryable, and retrying them is left to the caller.
 */

/**
 * Pushdown error codes.
 */
export enum PushdownErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',

  // Contract violations
  InvalidArgument = 'INVALID_ARGUMENT',
  InvalidMarker = 'INVALID_MARKER',
  InvalidRange = 'INVALID_RANGE',
  InvalidDomain = 'INVALID_DOMAIN',
  DegenerateDomain = 'DEGENERATE_DOMAIN',
  InvalidIdentifier = 'INVALID_IDENTIFIER',

  // Type errors
  UnknownType = 'UNKNOWN_TYPE',
  InvalidBindValue = 'INVALID_BIND_VALUE',

  // Statement errors
  ParameterIndexOutOfRange = 'PARAMETER_INDEX_OUT_OF_RANGE',
  UnboundParameter = 'UNBOUND_PARAMETER',
  ExecutionError = 'EXECUTION_ERROR',

  // Client lifecycle
  ClientClosed = 'CLIENT_CLOSED',
}

/**
 * Error shape reported by the mysql2 driver.
 */
export interface DriverErrorResponse {
  /** MySQL error number */
  errno?: number;
  /** Symbolic error code, e.g. ER_PARSE_ERROR */
  code?: string;
  /** SQLSTATE code */
  sqlState?: string;
  /** Error message */
  message?: string;
  /** Server-side message */
  sqlMessage?: string;
  /** Whether the connection is unusable after this error */
  fatal?: boolean;
}

/**
 * Base pushdown error class.
 */
export class PushdownError extends Error {
  /** Error code */
  readonly code: PushdownErrorCode;
  /** Whether this error is retryable */
  readonly retryable: boolean;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: PushdownErrorCode;
    message: string;
    retryable?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PushdownError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends PushdownError {
  constructor(message: string) {
    super({
      code: PushdownErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Contract Violations
// ============================================================================

/**
 * A caller broke a precondition (empty SQL, misaligned column lists, ...).
 */
export class InvalidArgumentError extends PushdownError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: PushdownErrorCode.InvalidArgument,
      message,
      details,
    });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * A marker uses a bound that its side of the range cannot carry.
 */
export class InvalidMarkerError extends PushdownError {
  constructor(side: 'low' | 'high', bound: string) {
    super({
      code: PushdownErrorCode.InvalidMarker,
      message: side === 'low'
        ? `Low marker should never use ${bound} bound`
        : `High marker should never use ${bound} bound`,
      details: { side, bound },
    });
    this.name = 'InvalidMarkerError';
  }
}

/**
 * A range whose low end lies above its high end, or that admits no value.
 */
export class InvalidRangeError extends PushdownError {
  constructor(message: string) {
    super({
      code: PushdownErrorCode.InvalidRange,
      message: `Invalid range: ${message}`,
    });
    this.name = 'InvalidRangeError';
  }
}

/**
 * A domain carries a value that does not fit its column type.
 */
export class InvalidDomainError extends PushdownError {
  constructor(typeName: string, value: unknown) {
    super({
      code: PushdownErrorCode.InvalidDomain,
      message: `Value ${describeValue(value)} does not fit type ${typeName}`,
      details: { type: typeName },
    });
    this.name = 'InvalidDomainError';
  }
}

/**
 * A column domain renders to no disjunct at all.
 */
export class DegenerateDomainError extends PushdownError {
  constructor(columnName: string) {
    super({
      code: PushdownErrorCode.DegenerateDomain,
      message: `Domain for column ${columnName} produces no predicate`,
      details: { column: columnName },
    });
    this.name = 'DegenerateDomainError';
  }
}

/**
 * Identifier text that is not a canonical UUID.
 */
export class InvalidIdentifierError extends PushdownError {
  constructor(text: string, cause?: unknown) {
    super({
      code: PushdownErrorCode.InvalidIdentifier,
      message: `Invalid identifier: ${text}`,
      details: { identifier: text },
      cause,
    });
    this.name = 'InvalidIdentifierError';
  }
}

// ============================================================================
// Type Errors
// ============================================================================

/**
 * A declared type outside the supported set.
 */
export class UnknownTypeError extends PushdownError {
  constructor(typeName: string, representation?: string) {
    super({
      code: PushdownErrorCode.UnknownType,
      message: representation
        ? `Unknown type: ${typeName} (${representation})`
        : `Unknown type: ${typeName}`,
      details: { type: typeName, representation },
    });
    this.name = 'UnknownTypeError';
  }
}

/**
 * A bind value whose runtime form does not match its declared type.
 */
export class InvalidBindValueError extends PushdownError {
  constructor(position: number, typeName: string, value: unknown) {
    super({
      code: PushdownErrorCode.InvalidBindValue,
      message: `Cannot bind ${describeValue(value)} as ${typeName} at position ${position}`,
      details: { position, type: typeName },
    });
    this.name = 'InvalidBindValueError';
  }
}

// ============================================================================
// Statement Errors
// ============================================================================

/**
 * Parameter position outside 1..parameterCount.
 */
export class ParameterIndexOutOfRangeError extends PushdownError {
  constructor(position: number, parameterCount: number) {
    super({
      code: PushdownErrorCode.ParameterIndexOutOfRange,
      message: `Parameter index ${position} out of range (1..${parameterCount})`,
      details: { position, parameterCount },
    });
    this.name = 'ParameterIndexOutOfRangeError';
  }
}

/**
 * Statement executed before every placeholder was bound.
 */
export class UnboundParameterError extends PushdownError {
  constructor(positions: number[]) {
    super({
      code: PushdownErrorCode.UnboundParameter,
      message: `No value bound for parameter(s) ${positions.join(', ')}`,
      details: { positions },
    });
    this.name = 'UnboundParameterError';
  }
}

/**
 * Failure reported by the driver while running a statement.
 */
export class ExecutionError extends PushdownError {
  /** MySQL error number */
  readonly errno?: number;
  /** SQLSTATE code */
  readonly sqlState?: string;

  constructor(message: string, options: { errno?: number; sqlState?: string; retryable?: boolean; cause?: unknown } = {}) {
    super({
      code: PushdownErrorCode.ExecutionError,
      message,
      retryable: options.retryable,
      details: options.errno !== undefined ? { errno: options.errno, sqlState: options.sqlState } : undefined,
      cause: options.cause,
    });
    this.name = 'ExecutionError';
    this.errno = options.errno;
    this.sqlState = options.sqlState;
  }
}

// ============================================================================
// Client Errors
// ============================================================================

/**
 * Client used after close().
 */
export class ClientClosedError extends PushdownError {
  constructor() {
    super({
      code: PushdownErrorCode.ClientClosed,
      message: 'Pushdown client is closed',
    });
    this.name = 'ClientClosedError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/** errnos after which the connection is gone and a fresh attempt may succeed */
const CONNECTION_LOST_ERRNOS: ReadonlySet<number> = new Set([
  2003, // CR_CONNECTION_ERROR
  2006, // CR_SERVER_GONE_ERROR
  2013, // CR_SERVER_LOST
  1040, // ER_CON_COUNT_ERROR
]);

/**
 * Maps a driver error to an ExecutionError.
 *
 * Pushdown errors pass through unchanged.
 */
export function fromDriverError(error: unknown): PushdownError {
  if (error instanceof PushdownError) {
    return error;
  }

  if (!isDriverErrorResponse(error)) {
    return new ExecutionError(String(error), { cause: error });
  }

  const message = error.sqlMessage ?? error.message ?? 'Unknown driver error';
  return new ExecutionError(message, {
    errno: error.errno,
    sqlState: error.sqlState,
    retryable: error.errno !== undefined && CONNECTION_LOST_ERRNOS.has(error.errno),
    cause: error,
  });
}

/**
 * Checks if an error is a pushdown error.
 */
export function isPushdownError(error: unknown): error is PushdownError {
  return error instanceof PushdownError;
}

/**
 * Checks if an error is retryable.
 */
export function isRetryableError(error: unknown): boolean {
  return isPushdownError(error) && error.retryable;
}

function isDriverErrorResponse(error: unknown): error is DriverErrorResponse {
  return typeof error === 'object' && error !== null && ('errno' in error || 'sqlState' in error || 'message' in error);
}

function describeValue(value: unknown): string {
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  return String(value);
}
