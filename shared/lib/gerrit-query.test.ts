/**
 * Tests for gerrit-query.ts
 *
 * The SSH runner is replaced with a stub; nothing leaves the process.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FetchError, MalformedInputError } from './errors.ts';
import type { GerritConfig } from './gerrit-config.ts';
import {
  buildQueryCommand,
  defaultSaveFilename,
  fetchFromGerrit,
  loadReviewInput,
  normalizeChangeId,
  type CommandRunner,
} from './gerrit-query.ts';

const config: GerritConfig = { host: 'gerrit.example.com', port: '29418', user: 'testuser' };

const PAYLOAD = '{"number": 1, "subject": "s"}\n{"type":"stats","rowCount":1}\n';

describe('normalizeChangeId', () => {
  it('adds the change: prefix', () => {
    assert.equal(normalizeChangeId('12345'), 'change:12345');
  });

  it('keeps an existing prefix', () => {
    assert.equal(normalizeChangeId('change:12345'), 'change:12345');
  });
});

describe('buildQueryCommand', () => {
  it('builds the full ssh query command', () => {
    assert.deepEqual(buildQueryCommand(config, 'change:12345'), [
      'ssh', '-p', '29418', 'testuser@gerrit.example.com', 'gerrit',
      'query', '--format=JSON', '--patch-sets', '--files', '--comments',
      'change:12345',
    ]);
  });

  it('leaves out switched-off sections', () => {
    assert.deepEqual(
      buildQueryCommand(config, 'status:open', { format: 'TEXT', files: false, patchSets: false }),
      [
        'ssh', '-p', '29418', 'testuser@gerrit.example.com', 'gerrit',
        'query', '--format=TEXT', '--comments', 'status:open',
      ]
    );
  });
});

describe('fetchFromGerrit', () => {
  it('runs ssh once and returns stdout', () => {
    const calls: string[][] = [];
    const run: CommandRunner = (command, args) => {
      calls.push([command, ...args]);
      return PAYLOAD;
    };

    assert.equal(fetchFromGerrit('change:1', { config, run }), PAYLOAD);
    assert.equal(calls.length, 1);
    assert.equal(calls[0][0], 'ssh');
    assert.equal(calls[0].at(-1), 'change:1');
  });

  it('wraps a failing query with its stderr', () => {
    const run: CommandRunner = () => {
      throw Object.assign(new Error('Command failed'), {
        status: 255,
        stderr: 'Permission denied (publickey).\n',
      });
    };

    assert.throws(
      () => fetchFromGerrit('change:1', { config, run }),
      (err: unknown) =>
        err instanceof FetchError &&
        err.message === 'Gerrit query failed: Permission denied (publickey).' &&
        err.stderr === 'Permission denied (publickey).'
    );
  });

  it('wraps a runner that cannot start', () => {
    const run: CommandRunner = () => {
      throw new Error('spawnSync ssh ENOENT');
    };

    assert.throws(
      () => fetchFromGerrit('change:1', { config, run }),
      (err: unknown) =>
        err instanceof FetchError && err.message === 'Failed to run Gerrit query: spawnSync ssh ENOENT'
    );
  });
});

describe('defaultSaveFilename', () => {
  it('names change queries after the change number', () => {
    assert.equal(defaultSaveFilename('change:12345'), 'review-12345.json');
  });

  it('timestamps free-form queries', () => {
    const now = new Date(2024, 2, 7, 9, 5, 3);
    assert.equal(defaultSaveFilename('status:open', now), 'query-20240307_090503.json');
  });
});

describe('loadReviewInput', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'gerrit-query-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const noFetch = (): string => {
    throw new Error('fetch should not be called');
  };

  it('reads a file first', () => {
    const file = join(dir, 'review.json');
    writeFileSync(file, PAYLOAD);
    assert.equal(
      loadReviewInput({ file, changeId: '1' }, { fetch: noFetch, readStdin: () => 'stdin' }),
      PAYLOAD
    );
  });

  it('throws MalformedInputError for an unreadable file', () => {
    assert.throws(
      () => loadReviewInput({ file: join(dir, 'missing.json') }, { fetch: noFetch }),
      (err: unknown) => err instanceof MalformedInputError && err.message.startsWith('Cannot read ')
    );
  });

  it('fetches a normalized change id', () => {
    const queries: string[] = [];
    const content = loadReviewInput(
      { changeId: '12345' },
      {
        fetch: (query) => {
          queries.push(query);
          return PAYLOAD;
        },
      }
    );
    assert.equal(content, PAYLOAD);
    assert.deepEqual(queries, ['change:12345']);
  });

  it('fetches a free-form query unchanged', () => {
    const queries: string[] = [];
    loadReviewInput(
      { query: 'status:open project:x' },
      {
        fetch: (query) => {
          queries.push(query);
          return PAYLOAD;
        },
      }
    );
    assert.deepEqual(queries, ['status:open project:x']);
  });

  it('saves fetched JSON to the requested file', () => {
    const output = join(dir, 'saved.json');
    loadReviewInput({ changeId: '7', save: true, output }, { fetch: () => PAYLOAD });
    assert.equal(readFileSync(output, 'utf-8'), PAYLOAD);
  });

  it('does not save unless asked', () => {
    const output = join(dir, 'saved.json');
    loadReviewInput({ changeId: '7', output }, { fetch: () => PAYLOAD });
    assert.equal(existsSync(output), false);
  });

  it('falls back to stdin', () => {
    assert.equal(loadReviewInput({}, { fetch: noFetch, readStdin: () => PAYLOAD }), PAYLOAD);
  });

  it('returns an empty string when stdin is a terminal', () => {
    assert.equal(loadReviewInput({}, { fetch: noFetch, readStdin: () => null }), '');
  });
});
