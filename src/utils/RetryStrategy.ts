export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  onRetry?: (attempt: number, delayMs: number, error: Error) => void;
}

// Transient conditions seen while Postgres or the network is still coming up
const RETRYABLE_SNIPPETS = [
  'timeout',
  'econnrefused',
  'etimedout',
  'econnreset',
  'enotfound',
  'connection terminated',
  'the database system is starting up',
  'too many clients',
];

const RETRYABLE_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNRESET', '57P03', '53300']);

export function isRetryable(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if ('code' in error && typeof error.code === 'string' && RETRYABLE_CODES.has(error.code)) {
    return true;
  }

  const message = error.message.toLowerCase();
  return RETRYABLE_SNIPPETS.some((snippet) => message.includes(snippet));
}

export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxRetries = options.maxRetries ?? 3;
  const initialDelayMs = options.initialDelayMs ?? 100;
  const maxDelayMs = options.maxDelayMs ?? 5000;
  const backoffMultiplier = options.backoffMultiplier ?? 2;

  let delay = initialDelayMs;
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      attempt += 1;
      const normalized = error instanceof Error ? error : new Error(String(error));
      if (attempt > maxRetries || !isRetryable(normalized)) {
        throw normalized;
      }

      options.onRetry?.(attempt, delay, normalized);
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }
}
