/**
 * Email Body Extractor
 * Reads an email file and returns its best plain-text body, normalized for
 * line classification.
 */

import { readFile } from 'fs/promises';
import { ParsedMail, simpleParser } from 'mailparser';
import logger from '../utils/logger';
import { FileSystemError, ParsingError, isPermissionError } from '../errors';
import { HtmlToTextConverter } from './HtmlToTextConverter';
import { TextContent } from './types';

// Message header or mbox "From " line at the top of the file
const MESSAGE_START_PATTERN =
  /^(?:(?:from|to|cc|subject|date|received|return-path|delivered-to|reply-to|message-id|mime-version|content-type|x-[a-z0-9-]+):[ \t]|From \S+@\S+ )/i;

const BODY_ENCODING = 'utf-8';

export class EmailBodyExtractor {
  private htmlConverter: HtmlToTextConverter;

  constructor(htmlConverter: HtmlToTextConverter = new HtmlToTextConverter()) {
    this.htmlConverter = htmlConverter;
  }

  /**
   * Read a file and extract its normalized body
   */
  async extractFromFile(filePath: string): Promise<string> {
    let bytes: Buffer;
    try {
      bytes = await readFile(filePath);
    } catch (error) {
      if (isPermissionError(error)) {
        throw FileSystemError.permissionDenied(filePath);
      }
      throw ParsingError.unreadable(filePath, error instanceof Error ? error : undefined);
    }

    return this.extract(this.decode(filePath, bytes));
  }

  /**
   * Strict UTF-8: invalid bytes are an error, never replacement characters
   */
  private decode(filePath: string, bytes: Buffer): string {
    try {
      return new TextDecoder(BODY_ENCODING, { fatal: true }).decode(bytes);
    } catch (error) {
      throw ParsingError.invalidEncoding(
        filePath,
        BODY_ENCODING,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Extract the normalized body from raw file contents
   */
  async extract(raw: string): Promise<string> {
    let content: TextContent = { text: '', source: 'raw' };

    if (MESSAGE_START_PATTERN.test(raw)) {
      content = await this.parseMessage(raw);
    }

    if (!content.text.trim()) {
      content = { text: raw, source: 'raw' };
    }

    let body = content.text;
    if (HtmlToTextConverter.isHtml(body)) {
      body = this.htmlConverter.convert(body);
    }

    logger.debug('Extracted email body', {
      source: content.source,
      length: body.length,
    });

    return this.normalize(body);
  }

  /**
   * Extract best text content from a parsed message.
   * Prefers plain text, falls back to HTML→text conversion.
   */
  extractBestTextContent(message: ParsedMail): TextContent {
    if (message.text && message.text.trim().length > 0) {
      return { text: message.text, source: 'plain' };
    }

    if (message.html) {
      return { text: this.htmlConverter.convert(message.html), source: 'html' };
    }

    logger.warn('No text content found in message', {
      messageId: message.messageId,
      subject: message.subject,
    });

    return { text: '', source: 'plain' };
  }

  private async parseMessage(raw: string): Promise<TextContent> {
    try {
      const message = await simpleParser(raw);
      return this.extractBestTextContent(message);
    } catch (error) {
      logger.warn('Could not parse email, using raw text', {
        error: error instanceof Error ? error.message : String(error),
      });
      return { text: '', source: 'raw' };
    }
  }

  /**
   * Trim, unwrap a quoted body and use LF line endings
   */
  private normalize(body: string): string {
    let normalized = body.trim();
    if (normalized.length >= 2 && normalized.startsWith('"') && normalized.endsWith('"')) {
      normalized = normalized.slice(1, -1).trim();
    }

    return normalized.replace(/\r\n?/g, '\n');
  }
}
