/**
 * Console logging for the CLI tools.
 *
 * Everything here writes to stderr so that stdout carries only the rendered
 * review. Debug lines are printed when enabled with setDebug() or when
 * GERRIT_REVIEW_DEBUG is set to 1/true.
 */

let debugEnabled =
  process.env.GERRIT_REVIEW_DEBUG === '1' || process.env.GERRIT_REVIEW_DEBUG === 'true';

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function debug(message: string): void {
  if (debugEnabled) {
    console.error(`[DEBUG] ${message}`);
  }
}

export function info(message: string): void {
  console.error(`[INFO] ${message}`);
}

export function warn(message: string): void {
  console.error(`[WARNING] ${message}`);
}

export function error(message: string): void {
  console.error(`[ERROR] ${message}`);
}
