import { AccessDeniedError, TransientFetchError } from '../errors/custom-errors.js';

const BLOCKED_PATTERNS = [/HTTP Error 403/i, /\bForbidden\b/i, /HTTP Error 429/i, /Sign in to confirm you.re not a bot/i];

const UNAVAILABLE_PATTERNS = [
  /Video unavailable/i,
  /Private video/i,
  /This video is private/i,
  /has been removed/i,
  /not available in your country/i,
  /geo.?restrict/i,
  /HTTP Error 404/i,
  /Unsupported URL/i,
  /members-only/i,
];

/**
 * Map engine output to the error taxonomy
 *
 * Forbidden/rate-limited responses are "blocked" (worth another format);
 * private, removed and geo-restricted content is "unavailable" (terminal);
 * anything else is transient. Only "ERROR:" lines are matched: progress
 * lines and the command line carry titles and URLs.
 */
export function classifyEngineFailure(output: string, url: string): AccessDeniedError | TransientFetchError {
  const summary = summarizeEngineOutput(output);
  const errors = errorLines(output).join('\n');

  if (UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(errors))) {
    return new AccessDeniedError(`Content is unavailable, private, or restricted: ${summary}`, url, 'unavailable');
  }

  if (BLOCKED_PATTERNS.some((pattern) => pattern.test(errors))) {
    return new AccessDeniedError(`Server blocked the request: ${summary}`, url, 'blocked');
  }

  return new TransientFetchError(`Engine failed: ${summary}`, url);
}

function nonEmptyLines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

function errorLines(output: string): string[] {
  return nonEmptyLines(output).filter((line) => line.startsWith('ERROR:'));
}

/**
 * First "ERROR:" line of the engine output, or its last non-empty line
 */
export function summarizeEngineOutput(output: string, maxLength = 200): string {
  const lines = nonEmptyLines(output);
  const summary = errorLines(output)[0] ?? lines.at(-1) ?? 'no output';
  return summary.length > maxLength ? `${summary.slice(0, maxLength)}…` : summary;
}
