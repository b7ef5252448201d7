/**
 * Source context lookup for review comments.
 *
 * Reads the file a comment points at and returns the lines around the
 * commented line. Any failure yields an empty window so the comment can
 * still be rendered.
 *
 * @module context-reader
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ContextReadError, errorMessage } from './errors.ts';
import * as log from './logging.ts';

export interface ContextLine {
  /** 1-based line number */
  lineNumber: number;
  text: string;
}

export interface ReadContextOptions {
  /** Directory relative paths resolve against (default: process.cwd()) */
  baseDir?: string;
}

export const DEFAULT_WINDOW_SIZE = 2;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as lines. `\r\n`, `\r` and `\n` all end a line, and a trailing
 * line ending does not produce an extra empty line.
 *
 * @throws ContextReadError when the file cannot be read or is not valid UTF-8
 */
export function readSourceLines(filePath: string): string[] {
  let content: string;
  try {
    content = utf8.decode(readFileSync(filePath));
  } catch (err) {
    throw new ContextReadError(filePath, errorMessage(err), { cause: err });
  }

  if (content === '') {
    return [];
  }

  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Return up to `windowSize` lines either side of `line`, clamped to the file.
 *
 * Returns an empty array for file-level comments (line null or < 1), lines
 * past the end of the file, and files that are missing or unreadable.
 *
 * @example
 * ```typescript
 * readContext('src/main.py', 10);
 * // [{ lineNumber: 8, text: ... }, ..., { lineNumber: 12, text: ... }]
 * ```
 */
export function readContext(
  filePath: string,
  line: number | null,
  windowSize: number = DEFAULT_WINDOW_SIZE,
  options: ReadContextOptions = {}
): ContextLine[] {
  if (line === null || line < 1) {
    return [];
  }

  const absPath = resolve(options.baseDir ?? process.cwd(), filePath);
  log.debug(`Reading file: ${absPath}`);

  if (!existsSync(absPath)) {
    log.debug(`File not found: ${absPath}`);
    return [];
  }

  let lines: string[];
  try {
    lines = readSourceLines(absPath);
  } catch (err) {
    if (err instanceof ContextReadError) {
      log.debug(err.message);
      return [];
    }
    throw err;
  }

  const span = Math.max(0, Math.floor(windowSize));
  if (line - span > lines.length) {
    log.debug(`Line ${line} is past the end of ${absPath} (${lines.length} lines)`);
    return [];
  }

  const first = Math.max(1, line - span);
  const last = Math.min(lines.length, line + span);

  const window: ContextLine[] = [];
  for (let n = first; n <= last; n++) {
    window.push({ lineNumber: n, text: lines[n - 1] });
  }
  return window;
}
