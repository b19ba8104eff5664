/**
 * Signature cleaning
 * Export all cleaning components
 */

export { splitLines, joinLines, createLine } from './LineSplitter';
export {
  SignatureDetector,
  classify,
  filterKept,
  stripSignature,
  DEFAULT_THRESHOLD,
} from './SignatureDetector';
export { BUILT_IN_RULES, buildRuleTable, hasContactShape, hasContactDetail } from './signatureRules';

export {
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
} from './types';
