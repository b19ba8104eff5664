/**
 * Line Splitter
 * Turns a normalized body into positional lines, terminators attached.
 */

import { Line } from './types';

const LINE_PATTERN = /[^\n]*\n|[^\n]+$/g;

export function createLine(index: number, content: string): Line {
  const text = content.endsWith('\n') ? content.slice(0, -1) : content;
  return Object.freeze({
    index,
    content,
    text,
    isBlank: text.trim().length === 0,
  });
}

/**
 * Split text into lines. Joining the `content` of the result reproduces
 * the input exactly.
 */
export function splitLines(body: string): Line[] {
  const chunks = body.match(LINE_PATTERN) ?? [];
  return chunks.map((chunk, index) => createLine(index, chunk));
}

export function joinLines(lines: readonly Line[]): string {
  return lines.map((line) => line.content).join('');
}
