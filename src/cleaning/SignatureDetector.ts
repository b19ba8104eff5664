/**
 * Signature Detector
 * Single-pass line classifier: decides line by line whether the scanner is
 * inside a trailing signature block and which lines to keep.
 */

import logger from '../utils/logger';
import { getSignatureConfig, validateLineBounds, validateThreshold } from '../config/signature';
import { TaggerUnavailableError } from '../errors';
import { createPosTagger } from '../tagging';
import { PosTag, PosTagger } from '../tagging/types';
import { joinLines, splitLines } from './LineSplitter';
import {
  buildRuleTable,
  createLineView,
  hasContactDetail,
  isProperNounDominant,
} from './signatureRules';
import {
  ClassificationResult,
  DetectorOptions,
  Line,
  LineBounds,
  LineView,
  ReasonTag,
  RuleStage,
  ScanMode,
  ScanState,
  SignatureRule,
  StripOptions,
  StripResult,
} from './types';

export const DEFAULT_THRESHOLD = 0.9;

export class SignatureDetector {
  private rules: Record<RuleStage, SignatureRule[]>;
  private bounds: LineBounds;

  constructor(
    private readonly tagger: PosTagger,
    options: DetectorOptions = {}
  ) {
    const defaults = getSignatureConfig();
    this.rules = buildRuleTable(options.rules);
    this.bounds = {
      shortLineMaxWords: options.shortLineMaxWords ?? defaults.shortLineMaxWords,
      longLineMinWords: options.longLineMinWords ?? defaults.longLineMinWords,
    };
    validateLineBounds(this.bounds.shortLineMaxWords, this.bounds.longLineMinWords);
  }

  /**
   * Classify every line, in order. Each decision depends only on the
   * lines before it.
   */
  classify(lines: readonly Line[], threshold: number = DEFAULT_THRESHOLD): ClassificationResult[] {
    validateThreshold(threshold);

    const state: ScanState = { mode: 'CONVERSATION', linesSinceSignatureStart: 0 };
    let signatureEntries = 0;

    const results = lines.map((line) => {
      const before = state.mode;
      const result = this.step(state, createLineView(line, this.bounds), threshold);
      if (before !== 'SIGNATURE' && state.mode === 'SIGNATURE') {
        signatureEntries++;
      }
      return result;
    });

    const kept = results.filter((r) => r.keep).length;
    logger.debug('Classified email lines', {
      total_lines: lines.length,
      lines_kept: kept,
      lines_dropped: lines.length - kept,
      signature_entries: signatureEntries,
      final_mode: state.mode,
      tagger: this.tagger.name,
    });

    return results;
  }

  private step(state: ScanState, view: LineView, threshold: number): ClassificationResult {
    if (state.mode === 'SIGNATURE') {
      state.linesSinceSignatureStart++;
    }

    // Quote and forward delimiters win in any mode
    const override = this.findRule('override', view);
    if (override) {
      return this.applyRule(state, view, override);
    }

    if (state.mode === 'SIGNATURE') {
      return this.continueSignature(state, view);
    }

    return this.scanConversation(state, view, threshold);
  }

  private continueSignature(state: ScanState, view: LineView): ClassificationResult {
    const contact = hasContactDetail(view.trimmed);

    if (view.isLong && !contact && !isProperNounDominant(view.words)) {
      this.transition(state, 'CONVERSATION');
      return this.result(view, true, 'ORDINARY', state);
    }

    return this.result(view, false, contact ? 'CONTACT_PATTERN' : 'SIGNATURE_CONTINUATION', state);
  }

  private scanConversation(
    state: ScanState,
    view: LineView,
    threshold: number
  ): ClassificationResult {
    if (view.line.isBlank) {
      return this.result(view, true, 'BLANK', state);
    }

    const cue = this.findRule('opening', view) ?? this.findRule('contact', view);
    if (cue) {
      return this.applyRule(state, view, cue);
    }

    if (view.isShort) {
      return this.consultTagger(state, view, threshold);
    }

    return this.result(view, true, 'ORDINARY', state);
  }

  /**
   * Ambiguous short line: drop it only on a confident salutation or
   * contact signal. Keeps the line when the tagger fails.
   */
  private consultTagger(
    state: ScanState,
    view: LineView,
    threshold: number
  ): ClassificationResult {
    let signal: PosTag;
    try {
      signal = this.tagger.tag(view.trimmed);
    } catch (error) {
      const failure = TaggerUnavailableError.fromCause(this.tagger.name, error, view.line.index);
      logger.warn('POS signal unavailable, keeping line', {
        code: failure.code,
        error: failure.message,
        line_index: view.line.index,
      });
      return this.result(view, true, 'ORDINARY', state);
    }

    // A threshold of 1.0 never drops through this rule
    const confident = threshold < 1 && signal.confidence >= threshold;
    if (signal.label !== 'ORDINARY' && confident) {
      this.transition(state, 'SIGNATURE');
      return this.result(view, false, 'SIGNATURE_OPENING', state, signal.confidence);
    }

    return this.result(view, true, 'ORDINARY', state, signal.confidence);
  }

  private findRule(stage: RuleStage, view: LineView): SignatureRule | undefined {
    return this.rules[stage].find((rule) => rule.test(view));
  }

  private applyRule(state: ScanState, view: LineView, rule: SignatureRule): ClassificationResult {
    this.transition(state, rule.nextMode);
    return this.result(view, rule.keep, rule.tag, state);
  }

  private transition(state: ScanState, next: ScanMode): void {
    if (next === 'SIGNATURE' && state.mode !== 'SIGNATURE') {
      state.linesSinceSignatureStart = 0;
    } else if (next === 'CONVERSATION' && state.mode === 'SIGNATURE') {
      logger.debug('Left signature mode', {
        lines_in_signature: state.linesSinceSignatureStart,
      });
    }
    state.mode = next;
  }

  private result(
    view: LineView,
    keep: boolean,
    reasonTag: ReasonTag,
    state: ScanState,
    confidence?: number
  ): ClassificationResult {
    return Object.freeze({
      lineIndex: view.line.index,
      keep,
      reasonTag,
      mode: state.mode,
      ...(confidence !== undefined && { confidence }),
    });
  }
}

/**
 * Classify lines with a fresh detector. Uses the configured tagger model
 * when none is given.
 */
export function classify(
  lines: readonly Line[],
  threshold: number = DEFAULT_THRESHOLD,
  tagger: PosTagger = createPosTagger(getSignatureConfig().model),
  options: DetectorOptions = {}
): ClassificationResult[] {
  return new SignatureDetector(tagger, options).classify(lines, threshold);
}

export function filterKept(
  lines: readonly Line[],
  results: readonly ClassificationResult[]
): Line[] {
  return lines.filter((_line, position) => results[position]?.keep === true);
}

/**
 * Split, classify and reassemble a body without its signature lines.
 */
export function stripSignature(body: string, options: StripOptions = {}): StripResult {
  const { threshold = DEFAULT_THRESHOLD, tagger, ...detectorOptions } = options;
  const lines = splitLines(body);
  const results = classify(lines, threshold, tagger, detectorOptions);
  const kept = filterKept(lines, results);

  return {
    text: joinLines(kept),
    results,
    lines_kept: kept.length,
    lines_dropped: lines.length - kept.length,
  };
}
