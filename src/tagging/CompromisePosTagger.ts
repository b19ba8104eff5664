/**
 * Compromise POS Tagger
 * Scores short lines with the compromise NLP library.
 *
 * Farewell lines and contact cards rarely contain a verb, so any line with
 * one is ordinary. Otherwise the label comes from which kind of term
 * dominates, and the confidence is that kind's share of the terms.
 */

import nlp from 'compromise';
import { PosTag, PosTagger } from './types';

const GREETING_PATTERN = /^(?:hi|hello|hey|dear|good (?:morning|afternoon|evening))\b/i;

const CONTACT_TERMS =
  '(#ProperNoun|#Person|#Organization|#Place|#Value|#Email|#PhoneNumber|#Url|#Acronym)';

const SALUTATION_TERMS =
  '(#Expression|best|regards|cheers|thanks|sincerely|warmly|cordially|wishes|yours)';

export class CompromisePosTagger implements PosTagger {
  readonly name = 'compromise';

  tag(text: string): PosTag {
    const trimmed = text.trim();
    if (!trimmed) {
      return { label: 'ORDINARY', confidence: 0 };
    }

    // Opening greetings belong to the message
    if (GREETING_PATTERN.test(trimmed)) {
      return { label: 'ORDINARY', confidence: 1 };
    }

    const doc = nlp(trimmed);
    const total = doc.terms().length;
    if (total === 0) {
      return { label: 'ORDINARY', confidence: 0 };
    }

    const verbs = doc.match('#Verb').terms().length;
    if (verbs > 0) {
      return { label: 'ORDINARY', confidence: verbs / total };
    }

    const contactShare = doc.match(CONTACT_TERMS).terms().length / total;
    const salutationShare = doc.match(SALUTATION_TERMS).terms().length / total;

    if (contactShare > 0 && contactShare >= salutationShare) {
      return { label: 'CONTACT_LIKE', confidence: contactShare };
    }
    if (salutationShare > 0) {
      return { label: 'SALUTATION_LIKE', confidence: salutationShare };
    }

    return { label: 'ORDINARY', confidence: 1 };
  }
}
