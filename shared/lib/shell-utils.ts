/**
 * Shell quoting for commands shown to the user (dry runs, debug output).
 *
 * Commands themselves run through execFileSync with an argument vector, so
 * nothing here is needed for execution.
 */

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Escape a string for safe use as a shell argument.
 *
 * Uses single-quote escaping. Embedded single quotes close the quote, add an
 * escaped quote and reopen it.
 *
 * @example
 * ```typescript
 * escapeShellArg("status:open project:my'proj");
 * // 'status:open project:my'\''proj'
 * ```
 */
export function escapeShellArg(arg: string): string {
  if (arg === '') {
    return "''";
  }

  return "'" + arg.replace(/'/g, "'\\''") + "'";
}

/**
 * Join an argument vector into a command line that can be pasted into a
 * shell. Arguments made only of safe characters are left unquoted.
 *
 * @example
 * ```typescript
 * formatCommand(['ssh', '-p', '29418', 'gerrit', 'query', 'status:open project:x']);
 * // ssh -p 29418 gerrit query 'status:open project:x'
 * ```
 */
export function formatCommand(argv: readonly string[]): string {
  return argv.map((arg) => (SAFE_ARG.test(arg) ? arg : escapeShellArg(arg))).join(' ');
}
