/**
 * Typed Error System for the mbridge client
 *
 * Provides a structured error hierarchy with error codes for programmatic
 * error handling. All client errors extend BridgeError for consistent
 * instanceof checks and error identification.
 */

/**
 * Error codes for programmatic error handling.
 * Organized by error category prefix:
 * - ENCODING_*    : Token, packed-string and reference errors (raised before dispatch)
 * - VALIDATION_*  : Caller input and configuration errors
 * - ENGINE_*      : Nonzero status returned by the engine channel
 * - CONCURRENCY_* : Gate and buffer-capacity errors
 * - STATE_*       : Descriptor and connection lifecycle errors
 */
export enum ErrorCode {
  // Encoding errors
  ENCODING_MALFORMED_PACKED = 'ENCODING_MALFORMED_PACKED',
  ENCODING_INVALID_TOKEN = 'ENCODING_INVALID_TOKEN',
  ENCODING_REFERENCE_TOO_LONG = 'ENCODING_REFERENCE_TOO_LONG',
  ENCODING_MALFORMED_RESULT = 'ENCODING_MALFORMED_RESULT',

  // Validation errors
  VALIDATION_TYPE_ERROR = 'VALIDATION_TYPE_ERROR',
  VALIDATION_INVALID_NAME = 'VALIDATION_INVALID_NAME',
  VALIDATION_RANGE_ERROR = 'VALIDATION_RANGE_ERROR',
  VALIDATION_REQUIRED_FIELD = 'VALIDATION_REQUIRED_FIELD',
  VALIDATION_INVALID_OPTION = 'VALIDATION_INVALID_OPTION',

  // Engine errors
  ENGINE_STATUS = 'ENGINE_STATUS',
  ENGINE_INTERRUPTED = 'ENGINE_INTERRUPTED',

  // Concurrency and resource errors
  CONCURRENCY_REENTRANT_CALL = 'CONCURRENCY_REENTRANT_CALL',
  CONCURRENCY_BUFFER_OVERFLOW = 'CONCURRENCY_BUFFER_OVERFLOW',

  // Lifecycle errors
  STATE_ILLEGAL_TRANSITION = 'STATE_ILLEGAL_TRANSITION',
  STATE_NOT_OPEN = 'STATE_NOT_OPEN',
  STATE_CLOSED = 'STATE_CLOSED',
}

/**
 * Base error class for all mbridge errors.
 *
 * Provides structured error information including:
 * - Error code for programmatic handling
 * - Descriptive message
 * - Optional context data
 * - Optional original cause
 *
 * @example
 * ```typescript
 * try {
 *   db.get({ global: 'orders', subscripts: [1] });
 * } catch (error) {
 *   if (error instanceof BridgeError) {
 *     switch (error.code) {
 *       case ErrorCode.ENGINE_STATUS:
 *         // Inspect the engine status
 *         break;
 *       case ErrorCode.STATE_NOT_OPEN:
 *         // Open the database first
 *         break;
 *     }
 *   }
 * }
 * ```
 */
export class BridgeError extends Error {
  /**
   * Error code for programmatic error identification
   */
  readonly code: ErrorCode;

  /**
   * Additional context data related to the error
   */
  readonly context?: Record<string, unknown>;

  /**
   * Original error that caused this error
   */
  readonly cause?: Error;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { context?: Record<string, unknown>; cause?: Error }
  ) {
    super(message);
    this.name = 'BridgeError';
    this.code = code;
    this.context = options?.context;
    this.cause = options?.cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a JSON-serializable representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack,
    };
  }
}

/**
 * Error thrown while encoding tokens, packing lists or building references.
 * Always raised before any engine call is attempted.
 *
 * @example
 * ```typescript
 * throw EncodingError.malformedPacked('3:ab', 2, 'token shorter than its length prefix');
 * ```
 */
export class EncodingError extends BridgeError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'EncodingError';
  }

  /**
   * Creates an error for a packed string that cannot be parsed
   */
  static malformedPacked(packed: string, offset: number, reason: string): EncodingError {
    return new EncodingError(
      ErrorCode.ENCODING_MALFORMED_PACKED,
      `Malformed packed string at offset ${offset}: ${reason}`,
      { packed: packed.length > 64 ? `${packed.slice(0, 64)}...` : packed, offset, reason }
    );
  }

  /**
   * Creates an error for a token the codec cannot represent
   */
  static invalidToken(token: string, reason: string): EncodingError {
    return new EncodingError(ErrorCode.ENCODING_INVALID_TOKEN, `Invalid token '${token}': ${reason}`, {
      token,
      reason,
    });
  }

  /**
   * Creates an error for a reference that stays over the indirection limit
   * even in its slotted form
   */
  static referenceTooLong(name: string, length: number, limit: number): EncodingError {
    return new EncodingError(
      ErrorCode.ENCODING_REFERENCE_TOO_LONG,
      `Reference to '${name}' is ${length} characters, over the indirection limit of ${limit}`,
      { name, length, limit }
    );
  }

  /**
   * Creates an error for engine output that does not decode to the expected shape
   */
  static malformedResult(entry: string, details: string, cause?: Error): EncodingError {
    return new EncodingError(
      ErrorCode.ENCODING_MALFORMED_RESULT,
      `Malformed result from '${entry}': ${details}`,
      { entry, details },
      cause
    );
  }
}

/**
 * Error thrown during input validation.
 *
 * @example
 * ```typescript
 * throw ValidationError.invalidName('^orders(1)', 'names may not carry subscripts');
 * ```
 */
export class ValidationError extends BridgeError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'ValidationError';
  }

  /**
   * Creates an error for type validation failure
   */
  static invalidType(paramName: string, expected: string, actual: string): ValidationError {
    return new ValidationError(
      ErrorCode.VALIDATION_TYPE_ERROR,
      `${paramName} must be ${expected}, got ${actual}`,
      { paramName, expectedType: expected, actualType: actual }
    );
  }

  /**
   * Creates an error for a global, local or routine name the engine would reject
   */
  static invalidName(name: string, reason: string): ValidationError {
    return new ValidationError(ErrorCode.VALIDATION_INVALID_NAME, `Invalid name '${name}': ${reason}`, {
      name,
      reason,
    });
  }

  /**
   * Creates an error for range validation failure
   */
  static outOfRange(paramName: string, constraint: string, actual?: unknown): ValidationError {
    return new ValidationError(ErrorCode.VALIDATION_RANGE_ERROR, `${paramName} ${constraint}`, {
      paramName,
      constraint,
      actual,
    });
  }

  /**
   * Creates an error for missing required field
   */
  static requiredField(fieldName: string, operation?: string): ValidationError {
    const operationInfo = operation ? ` for ${operation}` : '';
    return new ValidationError(
      ErrorCode.VALIDATION_REQUIRED_FIELD,
      `Missing required field '${fieldName}'${operationInfo}`,
      { fieldName, operation }
    );
  }

  /**
   * Creates an error for an unknown configuration value
   */
  static invalidOption(option: string, value: unknown, allowed: readonly string[]): ValidationError {
    return new ValidationError(
      ErrorCode.VALIDATION_INVALID_OPTION,
      `Invalid value '${String(value)}' for option '${option}'. Allowed: ${allowed.join(', ')}`,
      { option, value, allowed }
    );
  }
}

/**
 * Error carrying a nonzero status returned by the engine channel.
 * The status and the engine's own message are kept verbatim.
 */
export class EngineError extends BridgeError {
  /**
   * Engine-defined status code
   */
  readonly status: number;

  /**
   * Message text the engine placed in the error buffer
   */
  readonly engineMessage: string;

  constructor(status: number, engineMessage: string, entry?: string, code: ErrorCode = ErrorCode.ENGINE_STATUS) {
    super(code, engineMessage === '' ? `Engine returned status ${status}` : engineMessage, {
      context: { status, entry },
    });
    this.name = 'EngineError';
    this.status = status;
    this.engineMessage = engineMessage;
  }

  /**
   * Mnemonic of the engine message (`LVUNDEF` in `%YDB-E-LVUNDEF, ...`), if any
   */
  get mnemonic(): string | undefined {
    const match = /%[A-Z]+-[A-Z]-([A-Z0-9]+)/.exec(this.engineMessage);
    return match?.[1];
  }

  /**
   * Renders the error in the result-object shape of the given mode
   */
  toEngineResult(mode: 'strict' | 'canonical'): EngineErrorResult {
    if (mode === 'strict') {
      return { ok: 0, ErrorCode: this.status, ErrorMessage: this.engineMessage };
    }
    return { ok: false, errorCode: this.status, errorMessage: this.engineMessage };
  }
}

/**
 * Engine error objects in strict and canonical shape.
 */
export type EngineErrorResult =
  | { ok: 0; ErrorCode: number; ErrorMessage: string }
  | { ok: false; errorCode: number; errorMessage: string };

/**
 * Completion of a call during which the engine trapped an interrupt.
 */
export class InterruptError extends EngineError {
  constructor(status: number, engineMessage: string, entry?: string) {
    super(status, engineMessage, entry, ErrorCode.ENGINE_INTERRUPTED);
    this.name = 'InterruptError';
  }
}

/**
 * Error thrown by the call gate or by a descriptor buffer.
 * Fatal to the call that raised it; the gate is left released.
 */
export class ConcurrencyError extends BridgeError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'ConcurrencyError';
  }

  /**
   * Creates an error for a call issued while another call holds the gate
   * on the same stack
   */
  static reentrantCall(entry: string, holder: string | undefined): ConcurrencyError {
    const holderInfo = holder ? ` while '${holder}' is executing` : '';
    return new ConcurrencyError(
      ErrorCode.CONCURRENCY_REENTRANT_CALL,
      `Cannot call '${entry}'${holderInfo}: the engine channel is not reentrant`,
      { entry, holder }
    );
  }

  /**
   * Creates an error for a write that exceeds a buffer's fixed capacity
   */
  static bufferOverflow(buffer: string, required: number, capacity: number): ConcurrencyError {
    return new ConcurrencyError(
      ErrorCode.CONCURRENCY_BUFFER_OVERFLOW,
      `${buffer} buffer overflow: ${required} bytes required, capacity is ${capacity}`,
      { buffer, required, capacity }
    );
  }
}

/**
 * Error thrown for lifecycle violations of descriptors and connections.
 */
export class StateError extends BridgeError {
  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: Error) {
    super(code, message, { context, cause });
    this.name = 'StateError';
  }

  /**
   * Creates an error for a descriptor transition the state machine forbids
   */
  static illegalTransition(id: number, from: string, to: string): StateError {
    return new StateError(
      ErrorCode.STATE_ILLEGAL_TRANSITION,
      `Call descriptor #${id} cannot move from '${from}' to '${to}'`,
      { id, from, to }
    );
  }

  /**
   * Creates an error for opening a database that is already open
   */
  static alreadyOpen(): StateError {
    return new StateError(ErrorCode.STATE_ILLEGAL_TRANSITION, 'The database is already open');
  }

  /**
   * Creates an error for an operation issued before open
   */
  static notOpen(operation: string): StateError {
    return new StateError(ErrorCode.STATE_NOT_OPEN, `Cannot run '${operation}': the database is not open`, {
      operation,
    });
  }

  /**
   * Creates an error for an operation issued after close
   */
  static closed(operation: string): StateError {
    return new StateError(
      ErrorCode.STATE_CLOSED,
      `Cannot run '${operation}': the database connection is closed and cannot be reopened`,
      { operation }
    );
  }
}

/**
 * Utility function to check if an error is an mbridge error
 */
export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

/**
 * Utility function to check if an error matches a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBridgeError(error) && error.code === code;
}
