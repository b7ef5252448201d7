/**
 * Tests for context-reader.ts
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ContextReadError } from './errors.ts';
import { readContext, readSourceLines } from './context-reader.ts';

let dir: string;

function lines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join('\n') + '\n';
}

describe('context-reader', () => {
  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'context-reader-test-'));
    writeFileSync(join(dir, 'ten.txt'), lines(10));
    writeFileSync(join(dir, 'crlf.txt'), 'one\r\ntwo\r\nthree\r\n');
    writeFileSync(join(dir, 'mixed.txt'), 'one\rtwo\nthree');
    writeFileSync(join(dir, 'empty.txt'), '');
    writeFileSync(join(dir, 'latin1.txt'), Buffer.from([0x61, 0x0a, 0xe9, 0x0a]));
    mkdirSync(join(dir, 'subdir'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('readContext', () => {
    it('returns two lines either side of the target by default', () => {
      const window = readContext('ten.txt', 5, undefined, { baseDir: dir });
      assert.deepEqual(window, [
        { lineNumber: 3, text: 'line 3' },
        { lineNumber: 4, text: 'line 4' },
        { lineNumber: 5, text: 'line 5' },
        { lineNumber: 6, text: 'line 6' },
        { lineNumber: 7, text: 'line 7' },
      ]);
    });

    it('truncates the window at the start of the file', () => {
      const window = readContext('ten.txt', 1, 2, { baseDir: dir });
      assert.deepEqual(
        window.map((l) => l.lineNumber),
        [1, 2, 3]
      );
    });

    it('truncates the window at the end of the file', () => {
      const window = readContext('ten.txt', 9, 3, { baseDir: dir });
      assert.deepEqual(
        window.map((l) => l.lineNumber),
        [6, 7, 8, 9, 10]
      );
    });

    it('never returns more than 2 * windowSize + 1 lines', () => {
      for (const size of [0, 1, 2, 4, 20]) {
        for (const target of [1, 5, 10]) {
          const window = readContext('ten.txt', target, size, { baseDir: dir });
          assert.ok(window.length <= 2 * size + 1);
          assert.ok(window.every((l) => l.lineNumber >= 1 && l.lineNumber <= 10));
        }
      }
    });

    it('returns only the target line for a zero window', () => {
      assert.deepEqual(readContext('ten.txt', 4, 0, { baseDir: dir }), [
        { lineNumber: 4, text: 'line 4' },
      ]);
    });

    it('accepts absolute paths', () => {
      const window = readContext(join(dir, 'ten.txt'), 10, 1);
      assert.deepEqual(
        window.map((l) => l.text),
        ['line 9', 'line 10']
      );
    });

    it('returns an empty window for a missing file', () => {
      assert.deepEqual(readContext('nope.py', 3, 2, { baseDir: dir }), []);
    });

    it('returns an empty window for file-level comments', () => {
      assert.deepEqual(readContext('ten.txt', null, 2, { baseDir: dir }), []);
      assert.deepEqual(readContext('ten.txt', 0, 2, { baseDir: dir }), []);
    });

    it('shows the last lines for a target just past the end', () => {
      assert.deepEqual(
        readContext('ten.txt', 12, 2, { baseDir: dir }).map((l) => l.lineNumber),
        [10]
      );
    });

    it('returns an empty window when the window does not reach the file', () => {
      assert.deepEqual(readContext('ten.txt', 13, 2, { baseDir: dir }), []);
      assert.deepEqual(readContext('empty.txt', 1, 2, { baseDir: dir }), []);
    });

    it('returns an empty window when the file is not valid UTF-8', () => {
      assert.deepEqual(readContext('latin1.txt', 1, 2, { baseDir: dir }), []);
    });

    it('returns an empty window when the path is a directory', () => {
      assert.deepEqual(readContext('subdir', 1, 2, { baseDir: dir }), []);
    });

    it('counts CRLF line endings as single line breaks', () => {
      assert.deepEqual(readContext('crlf.txt', 2, 5, { baseDir: dir }), [
        { lineNumber: 1, text: 'one' },
        { lineNumber: 2, text: 'two' },
        { lineNumber: 3, text: 'three' },
      ]);
    });
  });

  describe('readSourceLines', () => {
    it('splits on every kind of line ending', () => {
      assert.deepEqual(readSourceLines(join(dir, 'mixed.txt')), ['one', 'two', 'three']);
    });

    it('drops the empty line after a trailing newline', () => {
      assert.equal(readSourceLines(join(dir, 'ten.txt')).length, 10);
    });

    it('throws ContextReadError for invalid UTF-8', () => {
      assert.throws(
        () => readSourceLines(join(dir, 'latin1.txt')),
        (err: unknown) => err instanceof ContextReadError && err.filePath === join(dir, 'latin1.txt')
      );
    });
  });
});
