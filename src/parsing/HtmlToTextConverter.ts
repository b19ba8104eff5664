/**
 * HTML to Text Converter
 * Flattens HTML email bodies to plain text while keeping line structure
 */

import { convert as htmlToText, HtmlToTextOptions } from 'html-to-text';
import logger from '../utils/logger';

export interface ConverterOptions {
  preserve_links?: boolean;
  max_line_length?: number;
  word_wrap?: boolean;
}

const DEFAULT_OPTIONS: ConverterOptions = {
  preserve_links: false,
  max_line_length: 80,
  word_wrap: false,
};

export class HtmlToTextConverter {
  private options: ConverterOptions;

  constructor(options: ConverterOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Convert HTML to plain text
   */
  convert(html: string): string {
    if (!html || html.trim().length === 0) {
      return '';
    }

    try {
      const htmlToTextOptions: HtmlToTextOptions = {
        wordwrap: this.options.word_wrap ? this.options.max_line_length : false,
        preserveNewlines: true,
        selectors: [
          { selector: 'script', format: 'skip' },
          { selector: 'style', format: 'skip' },
          { selector: 'head', format: 'skip' },
          { selector: 'img', format: 'skip' },
          {
            selector: 'a',
            options: {
              ignoreHref: !this.options.preserve_links,
            },
          },
          { selector: 'p', options: { leadingLineBreaks: 1, trailingLineBreaks: 2 } },
          { selector: 'br', format: 'lineBreak' },
          { selector: 'div', options: { leadingLineBreaks: 1, trailingLineBreaks: 1 } },
        ],
      };

      return this.normalizeWhitespace(htmlToText(html, htmlToTextOptions));
    } catch (error) {
      logger.warn('Error converting HTML to text', {
        error: error instanceof Error ? error.message : String(error),
        htmlPreview: html.substring(0, 100),
      });

      // Fallback: strip tags manually
      return this.stripHtmlTags(html);
    }
  }

  /**
   * Strip HTML tags (simple fallback method)
   */
  stripHtmlTags(html: string): string {
    if (!html) return '';

    let text = html.replace(/\r\n/g, '\n');

    // Remove script and style tags with content
    text = text.replace(/<script\b[^<]*(?:(?!<\/script>)<[^<]*)*<\/script>/gi, '');
    text = text.replace(/<style\b[^<]*(?:(?!<\/style>)<[^<]*)*<\/style>/gi, '');

    // Line-producing tags
    text = text.replace(/<br\s*\/?>/gi, '\n');
    text = text.replace(/<\/p>/gi, '\n\n');
    text = text.replace(/<\/div>/gi, '\n');

    text = text.replace(/<[^>]+>/g, '');
    text = this.decodeHtmlEntities(text);

    return this.normalizeWhitespace(text);
  }

  /**
   * Decode common HTML entities
   */
  private decodeHtmlEntities(text: string): string {
    const entities: Record<string, string> = {
      '&nbsp;': ' ',
      '&lt;': '<',
      '&gt;': '>',
      '&quot;': '"',
      '&#39;': "'",
      '&apos;': "'",
      '&hellip;': '...',
      '&mdash;': '—',
      '&ndash;': '–',
      '&copy;': '©',
      '&reg;': '®',
      '&trade;': '™',
    };

    let result = text;

    for (const [entity, char] of Object.entries(entities)) {
      result = result.replace(new RegExp(entity, 'gi'), char);
    }

    result = result.replace(/&#(\d+);/g, (_match, dec: string) =>
      String.fromCodePoint(parseInt(dec, 10))
    );
    result = result.replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) =>
      String.fromCodePoint(parseInt(hex, 16))
    );

    // Last, so "&amp;lt;" decodes to "&lt;" rather than "<"
    return result.replace(/&amp;/gi, '&');
  }

  /**
   * Collapse runs of blank lines and trailing spaces, keep line breaks
   */
  private normalizeWhitespace(text: string): string {
    return text
      .replace(/\r\n?/g, '\n')
      .replace(/[ \t]+$/gm, '')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  /**
   * Check if text appears to be HTML
   */
  static isHtml(text: string): boolean {
    if (!text) return false;

    // Known tags only: "<jane@example.org>" is an address, not markup
    return /<\/?(?:html|head|body|div|p|br|span|table|tr|td|a|b|i|u|strong|em|font|img|ul|ol|li|h[1-6]|blockquote)\b[^>]*>/i.test(
      text
    );
  }
}
