import { TaskError, TransientError, UnknownError } from './taxonomy.js';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Order matters: the first matching pattern wins.
const ERROR_CLASSIFICATIONS: Array<{ pattern: RegExp; sessionInvalid: boolean }> = [
  { pattern: /(browser|target|page|context).*(closed|crashed)|has been closed/i, sessionInvalid: true },
  { pattern: /session.?(expired|invalid)|not.?logged.?in/i, sessionInvalid: true },
  { pattern: /timeout|timed out/i, sessionInvalid: false },
  { pattern: /ECONNREFUSED|ECONNRESET|ETIMEDOUT|EPIPE|EAI_AGAIN|socket hang up/i, sessionInvalid: false },
  { pattern: /net::ERR_|disconnected|connection (lost|reset|closed)/i, sessionInvalid: false },
];

/**
 * Map anything thrown during an attempt onto the taxonomy. TaskErrors pass
 * through unchanged; everything else becomes a TransientError when it looks
 * like a timing/connectivity problem, or an UnknownError otherwise.
 */
export function classifyError(err: unknown): TaskError {
  if (err instanceof TaskError) {
    return err;
  }

  const message = errorMessage(err);
  for (const { pattern, sessionInvalid } of ERROR_CLASSIFICATIONS) {
    if (pattern.test(message)) {
      return new TransientError(message, { sessionInvalid, cause: err });
    }
  }

  return new UnknownError(message, { cause: err });
}
