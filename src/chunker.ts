// ============================================================================
// FILE: src/chunker.ts
// PURPOSE: Number source lines and split them into bounded-size chunks
// ============================================================================

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigurationError } from './errors.js';
import type { CodeChunk } from './types.js';

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * numberLines - Prefix every line with its 1-based number
 *
 * A trailing line break does not produce an extra empty row, but blank
 * lines inside the text keep their own number.
 *
 * EXAMPLE:
 * numberLines('a\n\nb\n') -> '1 | a\n2 | \n3 | b'
 */
export function numberLines(text: string): string {
  if (text === '') return '';

  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') lines.pop();

  return lines.map((line, i) => `${i + 1} | ${line}`).join('\n');
}

/**
 * decodeSource - Strict UTF-8, falling back to latin1 for other encodings
 */
export function decodeSource(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes).toString('latin1');
  }
}

/**
 * readFileWithLines - Read a file and return its numbered text
 *
 * @param filePath - File to read
 * @returns "<n> | <line>" rows joined by "\n"
 */
export async function readFileWithLines(filePath: string): Promise<string> {
  const bytes = await fs.readFile(filePath);
  return numberLines(decodeSource(bytes));
}

/**
 * splitIntoChunks - Split numbered text into chunks of at most maxChars
 *
 * Whole lines are accumulated greedily; each line costs its length plus
 * one for the joining newline. A line that alone exceeds the budget is
 * emitted as its own chunk rather than cut. Joining the result with "\n"
 * gives back the input.
 *
 * @param numberedText - Output of numberLines()
 * @param maxChars - Character budget per chunk
 * @returns Ordered chunk strings; [''] for empty input
 *
 * EXAMPLE:
 * splitIntoChunks('1 | ab\n2 | cd', 8) -> ['1 | ab', '2 | cd']
 */
export function splitIntoChunks(numberedText: string, maxChars: number): string[] {
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new ConfigurationError(`maxChars must be a positive integer, got ${maxChars}`);
  }

  if (numberedText.length <= maxChars) {
    return [numberedText];
  }

  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const line of numberedText.split('\n')) {
    const cost = line.length + 1;
    if (current.length > 0 && currentLength + cost > maxChars) {
      chunks.push(current.join('\n'));
      current = [];
      currentLength = 0;
    }
    current.push(line);
    currentLength += cost;
  }

  if (current.length > 0) {
    chunks.push(current.join('\n'));
  }

  return chunks;
}

/**
 * buildChunks - Wrap the chunks of one file with their provenance
 *
 * @param filePath - Originating file
 * @param numberedText - Numbered content of the file
 * @param maxChars - Character budget per chunk
 * @param metadata - Sidecar payload copied onto every chunk as-is
 */
export function buildChunks(
  filePath: string,
  numberedText: string,
  maxChars: number,
  metadata: Record<string, unknown> = {}
): CodeChunk[] {
  const ext = path.extname(filePath);
  const className = path.basename(filePath, ext);
  const language = ext.replace(/^\./, '');

  return splitIntoChunks(numberedText, maxChars).map(text => ({
    file_path: filePath,
    class_name: className,
    content_with_lines: text,
    language,
    metadata,
  }));
}
