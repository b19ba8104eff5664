/**
 * Parsing Types
 */

export interface TextContent {
  text: string;
  source: 'plain' | 'html' | 'raw';
}
