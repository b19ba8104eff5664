/**
 * Error Module
 * Exports all domain error types and utilities.
 */

export {
  DomainError,
  DomainErrorContext,
  ErrorCode,
  InvalidArgumentError,
  TaggerUnavailableError,
  ParsingError,
  FileSystemError,
  FileNotFoundError,
  isDomainError,
  isPermissionError,
  wrapError,
} from './DomainError';
