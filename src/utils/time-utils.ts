/**
 * Format an elapsed time in milliseconds for logs
 *
 * @example
 * ```ts
 * formatElapsed(95_000); // "1m 35s"
 * ```
 */
export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  if (seconds > 0) {
    return `${seconds}s`;
  }
  return `${ms}ms`;
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}
