/**
 * ANSI color codes and diagnostic output on stderr
 */

export const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
} as const;

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, len: number): string {
  if (str.length <= len) {
    return str;
  }
  return str.slice(0, len) + '...';
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const hours = Math.floor(totalSeconds / 3600);
  const mins = Math.floor((totalSeconds % 3600) / 60);
  const secs = Math.round(totalSeconds % 60);
  if (hours > 0) {
    return `${hours}h${mins}m${secs}s`;
  }
  return `${mins}m${secs}s`;
}

const PREFIX = `${colors.magenta}[TALELOOM]${colors.reset}`;

/**
 * Print an informational message (stderr keeps stdout for the story)
 */
export function printInfo(message: string): void {
  console.error(`${PREFIX} ${message}`);
}

export function printWarning(message: string): void {
  console.error(`${PREFIX} ${colors.yellow}${message}${colors.reset}`);
}

/**
 * Print a fatal error
 */
export function printError(message: string): void {
  console.error(`${PREFIX} ${colors.red}${message}${colors.reset}`);
}
