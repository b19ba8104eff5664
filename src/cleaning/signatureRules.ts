/**
 * Signature Rules
 * Line heuristics and the built-in rule table used by the SignatureDetector.
 */

import { LineBounds, LineView, Line, SignatureRule, RuleStage } from './types';

// Closing salutations, compared against the normalized line
const SIGNATURE_CLOSINGS = new Set([
  'best',
  'best regards',
  'best wishes',
  'thanks',
  'thank you',
  'thanks a lot',
  'regards',
  'kind regards',
  'warm regards',
  'cheers',
  'sincerely',
  'yours truly',
  'yours sincerely',
  'many thanks',
]);

// Mobile and client auto-signatures
const AUTO_SIGNATURE_PREFIXES = [
  'sent from my',
  'sent from mail for',
  'sent from outlook for',
  'sent from windows',
  'get outlook for',
  'sent with my',
];

const QUOTE_DELIMITER_KEYWORDS = ['original message', 'forwarded message', 'forwarded by'];

const EMAIL_HEADER_PATTERN =
  /^(?:(?:from|to|cc|bcc|subject|date|sent|references):|message-id|in-reply-to|mime-version|content-type|from\s+\S+@\S+)/i;

const REPLY_HEADER_PATTERN = /^on\s.*\swrote:/i;
const RULE_LINE_PATTERN = /^([-_=*#·])\1{2,}$/;
const SEPARATOR_PATTERN = /^--\s?$/;
const CLOSING_WITH_NAME_PATTERN = /^([^,]+),\s*([A-Z][\w.'-]*(?:\s+[A-Z][\w.'-]*)?)$/;
const EDGE_PUNCTUATION_PATTERN = /^[\s!-\/:-@[-`{-~]+|[\s!-\/:-@[-`{-~]+$/g;

// Contact info patterns
const EMAIL_PATTERN = /[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/i;
const PHONE_PATTERN = /\+?\d[\d\s().-]{6,}\d/g;
const DATE_PATTERN = /\d{4}[-/.]\d{1,2}[-/.]\d{1,2}|\d{1,2}[-/.]\d{1,2}[-/.]\d{2,4}/;
const MIN_PHONE_DIGITS = 7;
const CONTACT_LABEL_PATTERN = /^(?:tel|telephone|phone|mobile|cell|fax|e-?mail|web|office|direct|linkedin)\b\s*[.:]/i;
const URL_PATTERN = /(?:https?:\/\/|www\.)\S+/i;
const PIPE_LAYOUT_PATTERN = /\S\s*\|\s*\S/;

const WORD_PATTERN = /[\p{L}\p{N}]/u;

/**
 * Strip surrounding punctuation and whitespace, lowercase.
 */
export function normalizeLine(text: string): string {
  return text.replace(EDGE_PUNCTUATION_PATTERN, '').toLowerCase();
}

export function countWords(text: string): string[] {
  return text.split(/\s+/).filter((token) => WORD_PATTERN.test(token));
}

export function createLineView(line: Line, bounds: LineBounds): LineView {
  const trimmed = line.text.trim();
  const words = countWords(trimmed);
  return {
    line,
    trimmed,
    words,
    isShort: words.length <= bounds.shortLineMaxWords,
    isLong: words.length >= bounds.longLineMinWords,
  };
}

export function isClosingSalutation(trimmed: string): boolean {
  if (SIGNATURE_CLOSINGS.has(normalizeLine(trimmed))) {
    return true;
  }

  // "Best, Jane" / "Thanks, Jane Doe"
  const withName = trimmed.match(CLOSING_WITH_NAME_PATTERN);
  return withName !== null && SIGNATURE_CLOSINGS.has(normalizeLine(withName[1]));
}

export function isAutoSignature(trimmed: string): boolean {
  const normalized = normalizeLine(trimmed);
  return AUTO_SIGNATURE_PREFIXES.some((prefix) => normalized.startsWith(prefix));
}

export function isQuotedLine(trimmed: string): boolean {
  return trimmed.startsWith('>');
}

export function isRuleLine(trimmed: string): boolean {
  return RULE_LINE_PATTERN.test(trimmed);
}

/**
 * "-----Original Message-----", "---------- Forwarded message ---------", ...
 */
export function isForwardBanner(trimmed: string): boolean {
  const lower = trimmed.toLowerCase();
  if (lower.startsWith('begin forwarded message')) return true;
  return QUOTE_DELIMITER_KEYWORDS.some((keyword) => lower.includes(keyword));
}

export function isReplyHeader(trimmed: string): boolean {
  return REPLY_HEADER_PATTERN.test(trimmed);
}

export function isEmailHeaderLine(trimmed: string): boolean {
  return EMAIL_HEADER_PATTERN.test(trimmed);
}

/**
 * A run of at least seven digits that is not a calendar date.
 */
export function hasPhoneNumber(text: string): boolean {
  for (const [candidate] of text.matchAll(PHONE_PATTERN)) {
    const digits = candidate.replace(/\D/g, '').length;
    if (digits >= MIN_PHONE_DIGITS && !DATE_PATTERN.test(candidate)) {
      return true;
    }
  }
  return false;
}

/**
 * Structural contact-card shape: phone, email, labelled field,
 * or a pipe-delimited "Name | Title" layout.
 */
export function hasContactShape(trimmed: string): boolean {
  return (
    EMAIL_PATTERN.test(trimmed) ||
    hasPhoneNumber(trimmed) ||
    CONTACT_LABEL_PATTERN.test(trimmed) ||
    PIPE_LAYOUT_PATTERN.test(trimmed)
  );
}

/**
 * Contact shape, or a link. Links only count once a signature has started.
 */
export function hasContactDetail(trimmed: string): boolean {
  return hasContactShape(trimmed) || URL_PATTERN.test(trimmed);
}

/**
 * More than half of the words start with a capital letter.
 */
export function isProperNounDominant(words: readonly string[]): boolean {
  if (words.length === 0) return false;
  const capitalized = words.filter((word) => /^\p{Lu}/u.test(word)).length;
  return capitalized > words.length / 2;
}

export const BUILT_IN_RULES: readonly SignatureRule[] = [
  {
    name: 'quote-marker',
    stage: 'override',
    tag: 'QUOTE_DELIMITER',
    keep: true,
    nextMode: 'CONVERSATION',
    test: (view) => isQuotedLine(view.trimmed),
  },
  {
    name: 'original-message',
    stage: 'override',
    tag: 'QUOTE_DELIMITER',
    keep: true,
    nextMode: 'CONVERSATION',
    test: (view) => isForwardBanner(view.trimmed),
  },
  {
    name: 'rule-line',
    stage: 'override',
    tag: 'QUOTE_DELIMITER',
    keep: true,
    nextMode: 'CONVERSATION',
    test: (view) => isRuleLine(view.trimmed),
  },
  {
    name: 'reply-header',
    stage: 'override',
    tag: 'QUOTE_DELIMITER',
    keep: true,
    nextMode: 'CONVERSATION',
    test: (view) => isReplyHeader(view.trimmed),
  },
  {
    name: 'email-header',
    stage: 'override',
    tag: 'EMAIL_HEADER',
    keep: true,
    nextMode: 'CONVERSATION',
    test: (view) => isEmailHeaderLine(view.trimmed),
  },
  {
    name: 'closing-salutation',
    stage: 'opening',
    tag: 'SIGNATURE_OPENING',
    keep: true,
    nextMode: 'SIGNATURE',
    test: (view) => isClosingSalutation(view.trimmed),
  },
  {
    name: 'auto-signature',
    stage: 'opening',
    tag: 'SIGNATURE_OPENING',
    keep: true,
    nextMode: 'SIGNATURE',
    test: (view) => isAutoSignature(view.trimmed),
  },
  {
    name: 'signature-separator',
    stage: 'opening',
    tag: 'SIGNATURE_SEPARATOR',
    keep: true,
    nextMode: 'SIGNATURE',
    test: (view) => SEPARATOR_PATTERN.test(view.line.text),
  },
  {
    name: 'contact-card',
    stage: 'contact',
    tag: 'CONTACT_PATTERN',
    keep: false,
    nextMode: 'SIGNATURE',
    test: (view) => view.isShort && hasContactShape(view.trimmed),
  },
];

/**
 * Group rules by stage, built-ins first, preserving order.
 */
export function buildRuleTable(
  extraRules: readonly SignatureRule[] = []
): Record<RuleStage, SignatureRule[]> {
  const table: Record<RuleStage, SignatureRule[]> = {
    override: [],
    opening: [],
    contact: [],
  };

  for (const rule of [...BUILT_IN_RULES, ...extraRules]) {
    table[rule.stage].push(rule);
  }

  return table;
}
