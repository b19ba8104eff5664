/**
 * Email signature stripper
 *
 * Classifies the lines of a plaintext email body and drops the trailing
 * signature block while keeping conversation, quoted threads and blank lines.
 *
 * @example
 * ```typescript
 * import { splitLines, classify, filterKept, joinLines } from 'email-signature-stripper';
 *
 * const lines = splitLines(body);
 * const results = classify(lines, 0.9);
 * const cleaned = joinLines(filterKept(lines, results));
 * ```
 */

// Line classification
export {
  splitLines,
  joinLines,
  createLine,
  SignatureDetector,
  classify,
  filterKept,
  stripSignature,
  DEFAULT_THRESHOLD,
  BUILT_IN_RULES,
  buildRuleTable,
  hasContactShape,
  hasContactDetail,
  Line,
  LineView,
  ScanMode,
  ScanState,
  ReasonTag,
  RuleStage,
  SignatureRule,
  ClassificationResult,
  DetectorOptions,
  StripOptions,
  StripResult,
} from './cleaning';

// POS tagging
export {
  createPosTagger,
  AVAILABLE_MODELS,
  CompromisePosTagger,
  NullPosTagger,
  PosLabel,
  PosTag,
  PosTagger,
} from './tagging';

// Email files
export { EmailBodyExtractor, HtmlToTextConverter } from './parsing';
export {
  convert,
  cleanEmailFile,
  deriveOutputPath,
  ConvertOptions,
  ConvertSummary,
} from './services/emailCleanerService';

// Configuration
export {
  getSignatureConfig,
  validateSignatureConfig,
  validateLineBounds,
  validateThreshold,
  SignatureConfig,
  DEFAULT_SIGNATURE_CONFIG,
} from './config/signature';

// Errors
export {
  DomainError,
  InvalidArgumentError,
  TaggerUnavailableError,
  ParsingError,
  FileSystemError,
  FileNotFoundError,
  isDomainError,
  isPermissionError,
  wrapError,
} from './errors';
