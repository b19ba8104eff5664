/**
 * Signature Cleaning Types
 * Type definitions for line splitting and signature detection
 */

import type { PosTagger } from '../tagging/types';

export interface Line {
  /** Position in the document (0-based) */
  readonly index: number;
  /** Original text including the trailing terminator, if any */
  readonly content: string;
  /** Text without the terminator */
  readonly text: string;
  readonly isBlank: boolean;
}

export type ScanMode = 'CONVERSATION' | 'SIGNATURE';

/**
 * Diagnostic reason attached to every classified line.
 * Never affects what is kept.
 */
export type ReasonTag =
  | 'QUOTE_DELIMITER'
  | 'EMAIL_HEADER'
  | 'SIGNATURE_OPENING'
  | 'SIGNATURE_SEPARATOR'
  | 'CONTACT_PATTERN'
  | 'SIGNATURE_CONTINUATION'
  | 'BLANK'
  | 'ORDINARY';

export interface ScanState {
  mode: ScanMode;
  linesSinceSignatureStart: number;
}

export interface ClassificationResult {
  readonly lineIndex: number;
  readonly keep: boolean;
  readonly reasonTag: ReasonTag;
  /** Scanner mode after this line was consumed */
  readonly mode: ScanMode;
  /** Tagger confidence, present when the tagger was consulted */
  readonly confidence?: number;
}

/**
 * Features of a line that rules match against.
 */
export interface LineView {
  readonly line: Line;
  /** Trimmed text */
  readonly trimmed: string;
  readonly words: readonly string[];
  readonly isShort: boolean;
  readonly isLong: boolean;
}

export type RuleStage = 'override' | 'opening' | 'contact';

/**
 * One entry of the rule table: pattern -> tag -> effect.
 */
export interface SignatureRule {
  readonly name: string;
  readonly stage: RuleStage;
  readonly tag: ReasonTag;
  readonly keep: boolean;
  readonly nextMode: ScanMode;
  test(view: LineView): boolean;
}

export interface LineBounds {
  /** A line with at most this many words is short */
  shortLineMaxWords: number;
  /** A line with at least this many words is long */
  longLineMinWords: number;
}

export interface DetectorOptions extends Partial<LineBounds> {
  /** Extra rules, evaluated after the built-in rules of the same stage */
  rules?: readonly SignatureRule[];
}

export interface StripOptions extends DetectorOptions {
  threshold?: number;
  tagger?: PosTagger;
}

export interface StripResult {
  text: string;
  results: ClassificationResult[];
  lines_kept: number;
  lines_dropped: number;
}
