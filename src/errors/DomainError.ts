/**
 * Domain Error Base Class
 * Structured errors with error codes, CLI exit-code mapping,
 * and retry capability information.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Argument Errors (1xxx)
  | 'ARG_001' // Value out of range / not allowed
  // Tagger Errors (2xxx)
  | 'TAGGER_001' // Tagger unavailable or failed on a line
  // Parsing Errors (3xxx)
  | 'PARSE_003' // Encoding error
  | 'PARSE_005' // Malformed content
  // File System Errors (4xxx)
  | 'FILE_001' // File not found
  | 'FILE_002' // Permission denied
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** File path if applicable */
  filePath?: string;
  /** Line index if applicable */
  lineIndex?: number;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** Process exit code the CLI reports for this error */
  abstract readonly exitCode: number;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      exitCode: this.exitCode,
      isRetryable: this.isRetryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Create a user-friendly error message (without sensitive details).
   */
  toUserMessage(): string {
    return `Error ${this.code}: ${this.message}`;
  }
}

// ============================================================================
// Argument Errors
// ============================================================================

export class InvalidArgumentError extends DomainError {
  readonly code: ErrorCode = 'ARG_001';
  readonly exitCode = 2;

  constructor(
    message: string,
    public readonly argument: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, argument }, false);
  }

  static outOfRange(argument: string, value: number, min: number, max: number): InvalidArgumentError {
    return new InvalidArgumentError(
      `${argument} must be between ${min} and ${max} (got ${value})`,
      argument,
      { value, min, max }
    );
  }

  static notAllowed(argument: string, value: string, allowed: readonly string[]): InvalidArgumentError {
    return new InvalidArgumentError(
      `Unknown ${argument} "${value}" (expected one of: ${allowed.join(', ')})`,
      argument,
      { value, allowed: [...allowed] }
    );
  }
}

// ============================================================================
// Tagger Errors
// ============================================================================

export class TaggerUnavailableError extends DomainError {
  readonly code: ErrorCode = 'TAGGER_001';
  readonly exitCode = 1;

  constructor(
    message: string,
    public readonly tagger: string,
    context: DomainErrorContext = {}
  ) {
    // Recoverable: the detector keeps the line and moves on
    super(message, { ...context, tagger }, true);
  }

  static fromCause(tagger: string, cause: unknown, lineIndex?: number): TaggerUnavailableError {
    if (cause instanceof TaggerUnavailableError) {
      return cause;
    }
    const error = cause instanceof Error ? cause : undefined;
    return new TaggerUnavailableError(
      `POS tagger "${tagger}" failed${error ? ': ' + error.message : ''}`,
      tagger,
      { cause: error, lineIndex }
    );
  }
}

// ============================================================================
// Parsing Errors
// ============================================================================

export class ParsingError extends DomainError {
  readonly code: ErrorCode;
  readonly exitCode = 65;

  constructor(
    message: string,
    public readonly source: string,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, source }, false);
    this.code = this.determineCode(context);
  }

  private determineCode(context: DomainErrorContext): ErrorCode {
    if (context.encoding !== undefined) return 'PARSE_003';
    if (context.cause?.message?.includes('encoding')) return 'PARSE_003';
    return 'PARSE_005';
  }

  static unreadable(filePath: string, cause?: Error): ParsingError {
    return new ParsingError(
      `Unable to read email body from ${filePath}${cause ? ': ' + cause.message : ''}`,
      'email',
      { filePath, cause }
    );
  }

  static invalidEncoding(filePath: string, encoding: string, cause?: Error): ParsingError {
    return new ParsingError(
      `${filePath} is not valid ${encoding} text`,
      'email',
      { filePath, encoding, cause }
    );
  }
}

// ============================================================================
// File System Errors
// ============================================================================

export class FileSystemError extends DomainError {
  readonly code: ErrorCode;
  readonly exitCode = 66;

  constructor(
    message: string,
    code: ErrorCode,
    filePath: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message, { ...context, filePath }, isRetryable);
    this.code = code;
  }

  static permissionDenied(filePath: string): FileSystemError {
    return new FileSystemError(
      `Permission denied: ${filePath}`,
      'FILE_002',
      filePath
    );
  }
}

export class FileNotFoundError extends FileSystemError {
  constructor(filePath: string) {
    super(`Email file not found: ${filePath}`, 'FILE_001', filePath);
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Node's EACCES / EPERM from a file operation.
 */
export function isPermissionError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'EACCES' || error.code === 'EPERM')
  );
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new (class UnknownError extends DomainError {
    readonly code: ErrorCode = 'UNKNOWN';
    readonly exitCode = 1;
  })(message, { cause });
}
