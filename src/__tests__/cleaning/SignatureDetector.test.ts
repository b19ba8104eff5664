/**
 * Unit Tests for SignatureDetector
 */

import logger from '../../utils/logger';
import { splitLines, joinLines } from '../../cleaning/LineSplitter';
import {
  SignatureDetector,
  classify,
  filterKept,
  stripSignature,
} from '../../cleaning/SignatureDetector';
import { SignatureRule } from '../../cleaning/types';
import { InvalidArgumentError } from '../../errors';
import { NullPosTagger } from '../../tagging';
import { PosTag, PosTagger } from '../../tagging/types';

const ORDINARY: PosTag = { label: 'ORDINARY', confidence: 0 };

function stubTagger(tags: Record<string, PosTag> = {}): PosTagger & { tag: jest.Mock } {
  return {
    name: 'stub',
    tag: jest.fn((text: string) => tags[text] ?? ORDINARY),
  };
}

function linesOf(texts: string[]) {
  return splitLines(texts.map((text) => `${text}\n`).join(''));
}

describe('SignatureDetector', () => {
  describe('classify', () => {
    it('should drop the block after a closing salutation', () => {
      const lines = linesOf([
        'Hi there,',
        '',
        'Body text here.',
        '',
        'Best,',
        'Jane Doe',
        'Jane Doe | Example Org',
        '555-0100 | jane@example.org',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results.map((r) => r.keep)).toEqual([
        true,
        true,
        true,
        true,
        true,
        false,
        false,
        false,
      ]);
      expect(results.map((r) => r.reasonTag)).toEqual([
        'ORDINARY',
        'BLANK',
        'ORDINARY',
        'BLANK',
        'SIGNATURE_OPENING',
        'SIGNATURE_CONTINUATION',
        'CONTACT_PATTERN',
        'CONTACT_PATTERN',
      ]);
      expect(joinLines(filterKept(lines, results))).toBe('Hi there,\n\nBody text here.\n\nBest,\n');
    });

    it('should return to conversation on a reply header', () => {
      const lines = linesOf([
        'Thanks,',
        'Jane',
        'On Mon, Jan 1, 2024, Jane Doe wrote:',
        '> earlier text',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[0]).toMatchObject({ keep: true, reasonTag: 'SIGNATURE_OPENING', mode: 'SIGNATURE' });
      expect(results[1]).toMatchObject({ keep: false, mode: 'SIGNATURE' });
      expect(results[2]).toMatchObject({
        keep: true,
        reasonTag: 'QUOTE_DELIMITER',
        mode: 'CONVERSATION',
      });
      expect(results[3]).toMatchObject({
        keep: true,
        reasonTag: 'QUOTE_DELIMITER',
        mode: 'CONVERSATION',
      });
    });

    it('should keep a body without signature cues', () => {
      const lines = linesOf([
        'Hello team,',
        '',
        'The quarterly report is ready for review and the numbers look solid.',
        'Let me know what you think before Friday afternoon.',
        '',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results.every((r) => r.keep)).toBe(true);
      expect(results.every((r) => r.mode === 'CONVERSATION')).toBe(true);
    });

    it('should keep an auto-signature line and drop what follows', () => {
      const lines = linesOf(['Quick update below.', 'Sent from my iPhone', 'Jane']);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[1]).toMatchObject({
        keep: true,
        reasonTag: 'SIGNATURE_OPENING',
        mode: 'SIGNATURE',
      });
      expect(results[2]).toMatchObject({ keep: false, reasonTag: 'SIGNATURE_CONTINUATION' });
    });

    it('should keep the RFC separator and drop the signature after it', () => {
      const lines = linesOf([
        'The venue moved to the east wing of the main building today.',
        '-- ',
        'Jane',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[0]).toMatchObject({ keep: true, reasonTag: 'ORDINARY' });
      expect(results[1]).toMatchObject({
        keep: true,
        reasonTag: 'SIGNATURE_SEPARATOR',
        mode: 'SIGNATURE',
      });
      expect(results[2]).toMatchObject({ keep: false, reasonTag: 'SIGNATURE_CONTINUATION' });
    });

    it('should keep a bare -- line in the cleaned body', () => {
      const result = stripSignature('Notes follow.\n--\nJane Doe\n', { tagger: stubTagger() });

      expect(result.text).toBe('Notes follow.\n--\n');
    });

    it('should keep short lines that mention a date', () => {
      const result = stripSignature(
        'Hi Bob,\nDeadline moved to 2024-01-15.\nPlease confirm by then.\nSee the room list too.\n',
        { tagger: stubTagger() }
      );

      expect(result.text).toBe(
        'Hi Bob,\nDeadline moved to 2024-01-15.\nPlease confirm by then.\nSee the room list too.\n'
      );
      expect(result.results.every((r) => r.mode === 'CONVERSATION')).toBe(true);
    });

    it('should keep short lines with a link in the conversation', () => {
      const body = 'Hi Bob,\nDraft: https://example.org/draft\nComments welcome.\n';

      const result = stripSignature(body, { tagger: stubTagger() });

      expect(result.text).toBe(body);
    });

    it('should drop links that follow a signature opening', () => {
      const lines = linesOf(['Best,', 'www.example.org']);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[1]).toMatchObject({ keep: false, reasonTag: 'CONTACT_PATTERN' });
    });

    it('should open a signature on a short contact line', () => {
      const lines = linesOf(['Hello,', 'jane@example.org', 'Thanks for reading.']);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[1]).toMatchObject({
        keep: false,
        reasonTag: 'CONTACT_PATTERN',
        mode: 'SIGNATURE',
      });
      expect(results[2]).toMatchObject({ keep: false, reasonTag: 'SIGNATURE_CONTINUATION' });
    });

    it('should drop blank lines inside a signature', () => {
      const lines = linesOf(['Regards,', '', 'Jane']);

      const results = classify(lines, 0.9, stubTagger());

      expect(results.map((r) => r.keep)).toEqual([true, false, false]);
      expect(results[1].mode).toBe('SIGNATURE');
    });

    it('should let quoted lines, rule lines and headers override signature mode', () => {
      const lines = linesOf([
        'Cheers,',
        'Jane',
        '-----',
        'Best,',
        'Jane',
        'From: Jane Doe <jane@example.org>',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[2]).toMatchObject({
        keep: true,
        reasonTag: 'QUOTE_DELIMITER',
        mode: 'CONVERSATION',
      });
      expect(results[4]).toMatchObject({ keep: false, mode: 'SIGNATURE' });
      expect(results[5]).toMatchObject({
        keep: true,
        reasonTag: 'EMAIL_HEADER',
        mode: 'CONVERSATION',
      });
    });

    it('should requalify a long prose line after a signature opening', () => {
      const lines = linesOf([
        'Best,',
        'Jane Doe',
        'Also, I forgot to mention that the venue changed to the east wing.',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[2]).toMatchObject({
        keep: true,
        reasonTag: 'ORDINARY',
        mode: 'CONVERSATION',
      });
    });

    it('should not requalify long lines that look like contact details', () => {
      const lines = linesOf([
        'Best,',
        'Reach me any time at jane@example.org or on my mobile line.',
        'Jane Doe Senior Director Of Product Example Org Worldwide',
      ]);

      const results = classify(lines, 0.9, stubTagger());

      expect(results[1]).toMatchObject({ keep: false, reasonTag: 'CONTACT_PATTERN' });
      expect(results[2]).toMatchObject({ keep: false, reasonTag: 'SIGNATURE_CONTINUATION' });
    });

    it('should consult the tagger only for short lines in conversation', () => {
      const tagger = stubTagger();
      const lines = linesOf([
        'Hi Bob,',
        'The quarterly report is ready for review and the numbers look solid.',
        'Best,',
        'Jane',
      ]);

      classify(lines, 0.9, tagger);

      expect(tagger.tag).toHaveBeenCalledTimes(1);
      expect(tagger.tag).toHaveBeenCalledWith('Hi Bob,');
    });

    it('should return an empty result for no lines', () => {
      expect(classify([], 0.9, stubTagger())).toEqual([]);
    });
  });

  describe('threshold', () => {
    const lines = linesOf(['Jane Doe']);

    it('should drop an ambiguous line at threshold 0', () => {
      const tagger = stubTagger({ 'Jane Doe': { label: 'CONTACT_LIKE', confidence: 0.4 } });

      const [result] = classify(lines, 0, tagger);

      expect(result).toEqual({
        lineIndex: 0,
        keep: false,
        reasonTag: 'SIGNATURE_OPENING',
        mode: 'SIGNATURE',
        confidence: 0.4,
      });
    });

    it('should never drop through the tagger at threshold 1', () => {
      const tagger = stubTagger({ 'Jane Doe': { label: 'SALUTATION_LIKE', confidence: 1 } });

      const [result] = classify(lines, 1, tagger);

      expect(result).toMatchObject({ keep: true, reasonTag: 'ORDINARY', mode: 'CONVERSATION' });
    });

    it('should drop at or below the signal confidence and keep above it', () => {
      const tagger = stubTagger({ 'Jane Doe': { label: 'CONTACT_LIKE', confidence: 0.6 } });

      expect(classify(lines, 0.5, tagger)[0].keep).toBe(false);
      expect(classify(lines, 0.6, tagger)[0].keep).toBe(false);
      expect(classify(lines, 0.7, tagger)[0].keep).toBe(true);
    });

    it('should keep ordinary signals regardless of confidence', () => {
      const tagger = stubTagger({ 'Jane Doe': { label: 'ORDINARY', confidence: 1 } });

      expect(classify(lines, 0, tagger)[0]).toMatchObject({ keep: true, confidence: 1 });
    });

    it.each([-0.1, 1.1, Number.NaN])('should reject threshold %p', (threshold) => {
      const tagger = stubTagger();

      expect(() => classify(lines, threshold, tagger)).toThrow(InvalidArgumentError);
      expect(tagger.tag).not.toHaveBeenCalled();
    });
  });

  describe('tagger failures', () => {
    it('should keep the line and warn when the tagger throws', () => {
      const tagger: PosTagger = {
        name: 'broken',
        tag: () => {
          throw new Error('model not loaded');
        },
      };

      const results = classify(linesOf(['Jane Doe', 'Acme Corp']), 0, tagger);

      expect(results.map((r) => r.keep)).toEqual([true, true]);
      expect(results.every((r) => r.mode === 'CONVERSATION')).toBe(true);
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith('POS signal unavailable, keeping line', {
        code: 'TAGGER_001',
        error: 'POS tagger "broken" failed: model not loaded',
        line_index: 0,
      });
    });

    it('should fail open with the disabled tagger', () => {
      const results = classify(linesOf(['Jane Doe']), 0, new NullPosTagger());

      expect(results[0]).toMatchObject({ keep: true, reasonTag: 'ORDINARY' });
    });
  });

  describe('ordering', () => {
    it('should decide each line from its prefix only', () => {
      const prefix = ['Hi Bob,', '', 'Best,', 'Jane'];
      const suffixA = ['jane@example.org', 'On Mon, Jan 1, 2024, Bob wrote:', '> hi'];
      const suffixB = ['> hi', 'On Mon, Jan 1, 2024, Bob wrote:', 'jane@example.org'];

      const a = classify(linesOf([...prefix, ...suffixA]), 0.9, stubTagger());
      const b = classify(linesOf([...prefix, ...suffixB]), 0.9, stubTagger());

      expect(a.slice(0, prefix.length)).toEqual(b.slice(0, prefix.length));
    });

    it('should not carry state between invocations', () => {
      const detector = new SignatureDetector(stubTagger());

      detector.classify(linesOf(['Best,', 'Jane']));
      const results = detector.classify(linesOf(['Project notes']));

      expect(results[0]).toMatchObject({ keep: true, mode: 'CONVERSATION' });
    });

    it('should be idempotent on its own output', () => {
      const body = 'Hi Bob,\n\nSee attached.\n\nBest,\nJane\njane@example.org\n';

      const once = stripSignature(body, { tagger: stubTagger() });
      const twice = stripSignature(once.text, { tagger: stubTagger() });

      expect(twice.text).toBe(once.text);
    });
  });

  describe('options', () => {
    it('should apply extra rules after the built-in rules of their stage', () => {
      const disclaimer: SignatureRule = {
        name: 'disclaimer',
        stage: 'opening',
        tag: 'SIGNATURE_OPENING',
        keep: false,
        nextMode: 'SIGNATURE',
        test: (view) => /^confidentiality notice/i.test(view.trimmed),
      };
      const lines = linesOf([
        'See you on Monday.',
        'CONFIDENTIALITY NOTICE: this message is private.',
        'It is intended for the named recipient.',
      ]);

      const results = classify(lines, 0.9, stubTagger(), { rules: [disclaimer] });

      expect(results.map((r) => r.keep)).toEqual([true, false, false]);
      expect(results[1].mode).toBe('SIGNATURE');
    });

    it.each([
      [{ shortLineMaxWords: 0 }],
      [{ shortLineMaxWords: 6, longLineMinWords: 6 }],
      [{ shortLineMaxWords: 8, longLineMinWords: 4 }],
    ])('should reject invalid line bounds %p', (bounds) => {
      expect(() => new SignatureDetector(stubTagger(), bounds)).toThrow(InvalidArgumentError);
    });

    it('should honor custom line bounds', () => {
      const tagger = stubTagger();
      const lines = linesOf(['Jane Doe Example']);

      classify(lines, 0.9, tagger, { shortLineMaxWords: 2, longLineMinWords: 5 });

      expect(tagger.tag).not.toHaveBeenCalled();
    });
  });

  describe('stripSignature', () => {
    it('should return the reassembled body and counts', () => {
      const body = 'Hi Bob,\n\nSee attached.\n\nBest,\nJane\njane@example.org\n';

      const result = stripSignature(body, { tagger: stubTagger() });

      expect(result.text).toBe('Hi Bob,\n\nSee attached.\n\nBest,\n');
      expect(result.lines_kept).toBe(5);
      expect(result.lines_dropped).toBe(2);
      expect(result.results).toHaveLength(7);
    });
  });
});
