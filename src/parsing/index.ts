/**
 * Parsing Module - Export Index
 * Body extraction and HTML flattening
 */

export { EmailBodyExtractor } from './EmailBodyExtractor';
export { HtmlToTextConverter, ConverterOptions } from './HtmlToTextConverter';
export { TextContent } from './types';
