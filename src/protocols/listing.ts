/**
 * Directory listing parser
 *
 * Works on Unix `ls -l` style lines:
 *   drwxr-xr-x 2 user group 4096 Jan 28 10:00 dirName
 *
 * Only the leading type character and the last whitespace-separated token
 * are used. Names containing spaces come back as their last word, and
 * formats without a permission string (DOS, bare names) are treated as files.
 */

import type { Entry } from '../types/index.js';

/**
 * True when the listing line describes a directory
 */
export function classify(line: string): boolean {
  return line.startsWith('d');
}

/**
 * Last whitespace-separated token of the line; `''` for blank lines
 */
export function extractName(line: string): string {
  const tokens = line.trim().split(/\s+/);
  return tokens[tokens.length - 1];
}

export function parseEntry(line: string): Entry {
  return {
    name: extractName(line),
    isDirectory: classify(line),
  };
}

/**
 * Split raw listing text into lines, dropping trailing empty strings.
 *
 * Whitespace-only lines are kept so callers see raw line positions.
 */
export function splitListing(text: string): string[] {
  const lines = text.split('\n');
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
