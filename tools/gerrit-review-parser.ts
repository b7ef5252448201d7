#!/usr/bin/env -S npx tsx

/**
 * Gerrit Review Parser
 *
 * Fetches or reads Gerrit review JSON and prints the inline comments with
 * the surrounding source lines, or as JSON for scripts and CI.
 *
 * Usage:
 *   npx tsx tools/gerrit-review-parser.ts <command> [options]
 *
 * Commands:
 *   parse          Parse review JSON and display comments
 *   setup          Configure the Gerrit connection interactively
 *   config show    Show the effective configuration and where it came from
 *
 * Examples:
 *   npx tsx tools/gerrit-review-parser.ts parse --changeid 12345
 *   npx tsx tools/gerrit-review-parser.ts parse --file review.json --unresolved-only
 *   npx tsx tools/gerrit-review-parser.ts parse --query "status:open project:myproject" --save
 *   ssh -p 29418 gerrit.example.com gerrit query --format=JSON --comments 12345 \
 *     | npx tsx tools/gerrit-review-parser.ts parse --json
 */

import dotenv from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';
import { ConfigError, GerritReviewError, errorMessage } from '../shared/lib/errors.ts';
import {
  DEFAULT_SSH_PORT,
  getConfigPath,
  loadGerritConfig,
  resolveGerritConfig,
  saveGerritConfig,
  validatePort,
} from '../shared/lib/gerrit-config.ts';
import {
  buildQueryCommand,
  loadReviewInput,
  normalizeChangeId,
} from '../shared/lib/gerrit-query.ts';
import * as log from '../shared/lib/logging.ts';
import { parseReview } from '../shared/lib/review-model.ts';
import { render, type RenderMode } from '../shared/lib/review-renderer.ts';
import { formatCommand } from '../shared/lib/shell-utils.ts';

dotenv.config({ quiet: true });

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROG = 'gerrit-review-parser';

// ────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────

interface ParseArgs {
  file?: string;
  changeId?: string;
  query?: string;
  save: boolean;
  output?: string;
  unresolvedOnly: boolean;
  json: boolean;
  dryRun: boolean;
  debug: boolean;
  help: boolean;
}

class UsageError extends Error {}

// ────────────────────────────────────────────────────────────────
// Help & Version
// ────────────────────────────────────────────────────────────────

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '..', 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

function showHelp(): void {
  console.log(`
${PROG} — Parse Gerrit review JSON and display comments with file context

Usage:
  ${PROG} <command> [options]

Commands:
  parse          Parse review JSON and display comments
  setup          Configure Gerrit connection settings interactively
  config show    Display current configuration settings
  help           Show this help message
  version        Show version

Options:
  --help, -h     Show this help message
  --version, -V  Show version

Run "${PROG} parse --help" for parse options.
`);
}

function showParseHelp(): void {
  console.log(`
Usage:
  ${PROG} parse [options]

Input (first one given wins; otherwise JSON is read from stdin):
  --file, -f <path>        Path to Gerrit review JSON file
  --changeid, -c <id>      Gerrit change ID to fetch and parse
  --query, -q <query>      Gerrit query string to fetch and parse

Options:
  --save, -s               Save fetched JSON to file
  --output, -o <path>      Custom output filename (use with --save)
  --unresolved-only, -u    Show only unresolved comments
  --json                   Output as JSON for machine processing
  --dry-run                Show SSH command without executing
  --debug                  Enable debug output
  --help, -h               Show this help message

Examples:
  ${PROG} parse --changeid 12345
  ${PROG} parse --file review.json --unresolved-only
  ${PROG} parse --query "status:open project:myproject" --save
  ${PROG} parse --changeid 12345 --dry-run
`);
}

// ────────────────────────────────────────────────────────────────
// Argument Parsing
// ────────────────────────────────────────────────────────────────

function parseArgs(argv: string[]): ParseArgs {
  const args: ParseArgs = {
    save: false,
    unresolvedOnly: false,
    json: false,
    dryRun: false,
    debug: false,
    help: false,
  };

  const value = (i: number, flag: string): string => {
    const next = argv[i + 1];
    // Values may start with '-': Gerrit negates query operators that way
    if (next === undefined) {
      throw new UsageError(`Option ${flag} requires a value`);
    }
    return next;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--file' || arg === '-f') {
      args.file = value(i++, arg);
    } else if (arg === '--changeid' || arg === '-c') {
      args.changeId = value(i++, arg);
    } else if (arg === '--query' || arg === '-q') {
      args.query = value(i++, arg);
    } else if (arg === '--output' || arg === '-o') {
      args.output = value(i++, arg);
    } else if (arg === '--save' || arg === '-s') {
      args.save = true;
    } else if (arg === '--unresolved-only' || arg === '-u') {
      args.unresolvedOnly = true;
    } else if (arg === '--json') {
      args.json = true;
    } else if (arg === '--dry-run') {
      args.dryRun = true;
    } else if (arg === '--debug') {
      args.debug = true;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

// ────────────────────────────────────────────────────────────────
// Commands
// ────────────────────────────────────────────────────────────────

function handleDryRun(args: ParseArgs): void {
  const query = args.changeId ? normalizeChangeId(args.changeId) : args.query ?? '';
  const command = formatCommand(buildQueryCommand(loadGerritConfig(), query));

  if (args.json) {
    console.log(JSON.stringify({ dryRun: true, command }, null, 2));
  } else {
    console.log(`[DRY-RUN] Would execute: ${command}`);
  }
}

function runParse(argv: string[]): number {
  const args = parseArgs(argv);
  if (args.help) {
    showParseHelp();
    return 0;
  }

  if (args.debug) {
    log.setDebug(true);
  }

  if (args.dryRun && args.file) {
    log.warn('--dry-run has no effect when reading from file');
  } else if (args.dryRun && (args.changeId || args.query)) {
    handleDryRun(args);
    return 0;
  }

  const content = loadReviewInput({
    file: args.file,
    changeId: args.changeId,
    query: args.query,
    save: args.save,
    output: args.output,
  });

  if (!content.trim()) {
    log.error('No input provided');
    return 1;
  }

  const review = parseReview(content);
  log.debug(`Project: ${review.project}, Change: ${review.changeNumber}`);

  const mode: RenderMode = args.json ? 'json' : 'text';
  const output = render(review, mode, { unresolvedOnly: args.unresolvedOnly });
  console.log(typeof output === 'string' ? output : JSON.stringify(output, null, 2));
  return 0;
}

async function runSetup(): Promise<number> {
  console.log('Gerrit Review Parser - Configuration Setup');
  console.log('='.repeat(50));
  console.log();

  const rl = createInterface({ input: process.stdin });
  const lines = rl[Symbol.asyncIterator]();

  const ask = async (question: string, fallback?: string): Promise<string> => {
    process.stdout.write(fallback ? `${question} [${fallback}]: ` : `${question}: `);
    const next = await lines.next();
    if (next.done) {
      throw new ConfigError('Setup aborted: no input');
    }
    const answer = next.value.trim();
    return answer === '' && fallback !== undefined ? fallback : answer;
  };

  try {
    const host = await ask('Gerrit host (e.g., gerrit.example.com)');
    if (!host) {
      console.error('Error: Host cannot be empty');
      return 1;
    }

    const port = await ask('Gerrit SSH port', DEFAULT_SSH_PORT);
    const portError = validatePort(port);
    if (portError) {
      console.error(`Error: ${portError}`);
      return 1;
    }

    const user = await ask('Gerrit username');
    if (!user) {
      console.error('Error: Username cannot be empty');
      return 1;
    }

    let configPath: string;
    try {
      configPath = saveGerritConfig({ host, port, user });
    } catch (err) {
      console.error(`Error saving configuration: ${errorMessage(err)}`);
      return 1;
    }

    console.log();
    console.log('Configuration saved successfully!');
    console.log(`Config file: ${configPath}`);
    return 0;
  } finally {
    rl.close();
  }
}

function runConfig(argv: string[]): number {
  const [subcommand] = argv;
  if (subcommand !== 'show') {
    throw new UsageError(
      subcommand ? `Unknown config command: ${subcommand}` : 'Usage: config show'
    );
  }

  const { config, sources } = resolveGerritConfig();

  console.log('Current Gerrit Configuration');
  console.log('='.repeat(50));
  console.log();
  console.log(`Host:     ${config.host} (from ${sources.host})`);
  console.log(`Port:     ${config.port} (from ${sources.port})`);
  console.log(`User:     ${config.user} (from ${sources.user})`);
  console.log();

  if (Object.values(sources).includes('file')) {
    console.log(`Config file: ${getConfigPath()}`);
  }
  return 0;
}

// ────────────────────────────────────────────────────────────────
// Main Entry Point
// ────────────────────────────────────────────────────────────────

async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        showHelp();
        return 0;
      case 'version':
      case '--version':
      case '-V':
        console.log(`${PROG} v${readVersion()}`);
        return 0;
      case 'parse':
        return runParse(rest);
      case 'setup':
        return await runSetup();
      case 'config':
        return runConfig(rest);
      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Run "${PROG} help" for usage.`);
        return 1;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
    } else if (err instanceof GerritReviewError) {
      log.error(err.message);
    } else {
      throw err;
    }
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error(errorMessage(err));
    process.exitCode = 1;
  }
);
