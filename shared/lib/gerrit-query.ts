/**
 * Fetching Gerrit review JSON: from a file, standard input, or
 * `gerrit query` over SSH.
 *
 * @module gerrit-query
 */

import { execFileSync } from 'node:child_process';
import { readFileSync, writeFileSync } from 'node:fs';
import { isatty } from 'node:tty';
import { FetchError, MalformedInputError, errorMessage } from './errors.ts';
import { loadGerritConfig, type GerritConfig } from './gerrit-config.ts';
import * as log from './logging.ts';
import { formatCommand } from './shell-utils.ts';

// ────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────

export interface QueryCommandOptions {
  /** Output format passed to --format (default: JSON) */
  format?: 'JSON' | 'TEXT';
  /** Include patch sets (default: true) */
  patchSets?: boolean;
  /** Include file lists (default: true) */
  files?: boolean;
  /** Include comments (default: true) */
  comments?: boolean;
}

/** Runs a program with arguments and returns its stdout. */
export type CommandRunner = (command: string, args: string[]) => string;

export interface FetchOptions {
  /** Connection config (default: loadGerritConfig()) */
  config?: GerritConfig;
  run?: CommandRunner;
}

export interface InputSource {
  file?: string;
  changeId?: string;
  query?: string;
  /** Write fetched JSON to disk */
  save?: boolean;
  /** Filename for --save (default: defaultSaveFilename()) */
  output?: string;
}

export interface LoadInputDeps {
  fetch?: (query: string) => string;
  /** Returns piped input, or null when stdin is a terminal */
  readStdin?: () => string | null;
  now?: () => Date;
}

// ────────────────────────────────────────────────────────────────
// Command building
// ────────────────────────────────────────────────────────────────

/**
 * Ensure a change id carries the `change:` operator.
 *
 * @example
 * ```typescript
 * normalizeChangeId('12345');        // 'change:12345'
 * normalizeChangeId('change:12345'); // 'change:12345'
 * ```
 */
export function normalizeChangeId(changeId: string): string {
  return changeId.startsWith('change:') ? changeId : `change:${changeId}`;
}

export function buildSshBase(config: GerritConfig): string[] {
  return ['ssh', '-p', config.port, `${config.user}@${config.host}`, 'gerrit'];
}

/**
 * Build the argument vector for `gerrit query`.
 */
export function buildQueryCommand(
  config: GerritConfig,
  query: string,
  options: QueryCommandOptions = {}
): string[] {
  const command = [...buildSshBase(config), 'query', `--format=${options.format ?? 'JSON'}`];

  if (options.patchSets ?? true) command.push('--patch-sets');
  if (options.files ?? true) command.push('--files');
  if (options.comments ?? true) command.push('--comments');

  command.push(query);
  return command;
}

// ────────────────────────────────────────────────────────────────
// Execution
// ────────────────────────────────────────────────────────────────

export const runCommand: CommandRunner = (command, args) =>
  execFileSync(command, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 64 * 1024 * 1024,
  });

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return '';
}

/**
 * Run `gerrit query` once over SSH and return its raw output.
 *
 * @throws FetchError when ssh cannot be started or exits non-zero
 * @throws ConfigError when no connection config is available
 */
export function fetchFromGerrit(query: string, options: FetchOptions = {}): string {
  const config = options.config ?? loadGerritConfig();
  const run = options.run ?? runCommand;
  const [program, ...args] = buildQueryCommand(config, query);

  log.debug(`Running: ${formatCommand([program, ...args])}`);

  try {
    return run(program, args);
  } catch (err) {
    const stderr = stderrOf(err);
    if (stderr) {
      throw new FetchError(`Gerrit query failed: ${stderr}`, stderr, { cause: err });
    }
    throw new FetchError(`Failed to run Gerrit query: ${errorMessage(err)}`, '', { cause: err });
  }
}

// ────────────────────────────────────────────────────────────────
// Input loading
// ────────────────────────────────────────────────────────────────

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Default filename for saved query output: `review-<n>.json` for change
 * queries, `query-<YYYYMMDD_HHMMSS>.json` otherwise.
 */
export function defaultSaveFilename(query: string, now: Date = new Date()): string {
  if (query.startsWith('change:')) {
    return `review-${query.slice('change:'.length)}.json`;
  }

  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `query-${date}_${time}.json`;
}

/**
 * Read all of standard input. Goes through fd 0 directly rather than
 * process.stdin, which would switch a pipe to non-blocking mode.
 */
export function readStdin(): string | null {
  if (isatty(0)) {
    return null;
  }
  try {
    return readFileSync(0, 'utf-8');
  } catch (err) {
    throw new MalformedInputError(`Cannot read standard input: ${errorMessage(err)}`, { cause: err });
  }
}

function fetchAndSave(
  query: string,
  source: InputSource,
  deps: Required<LoadInputDeps>
): string {
  const content = deps.fetch(query);

  if (source.save) {
    const filename = source.output || defaultSaveFilename(query, deps.now());
    writeFileSync(filename, content, 'utf-8');
    log.info(`Saved JSON to: ${filename}`);
  }

  return content;
}

/**
 * Load review JSON from the first available source: file, change id,
 * query, then standard input.
 *
 * @returns Raw JSON text (empty when nothing was provided)
 * @throws MalformedInputError when the file cannot be read
 */
export function loadReviewInput(source: InputSource, deps: LoadInputDeps = {}): string {
  const resolved: Required<LoadInputDeps> = {
    fetch: deps.fetch ?? ((query) => fetchFromGerrit(query)),
    readStdin: deps.readStdin ?? readStdin,
    now: deps.now ?? (() => new Date()),
  };

  if (source.file) {
    log.debug(`Loading review from file: ${source.file}`);
    try {
      return readFileSync(source.file, 'utf-8');
    } catch (err) {
      throw new MalformedInputError(`Cannot read ${source.file}: ${errorMessage(err)}`, { cause: err });
    }
  }

  if (source.changeId) {
    log.debug(`Fetching change ID: ${source.changeId}`);
    return fetchAndSave(normalizeChangeId(source.changeId), source, resolved);
  }

  if (source.query) {
    log.debug(`Fetching query: ${source.query}`);
    return fetchAndSave(source.query, source, resolved);
  }

  log.debug('Reading from stdin');
  return resolved.readStdin() ?? '';
}
