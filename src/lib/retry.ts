const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'timed out',
  'timeout',
  'socket hang up',
  'fetch failed',
  'service unavailable',
];

export class TimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

function readNumberField(value: unknown, key: 'status' | 'statusCode'): number | null {
  if (typeof value !== 'object' || value === null || !(key in value)) return null;
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : null;
}

function getStatusCode(error: unknown): number | null {
  const top = readNumberField(error, 'status') ?? readNumberField(error, 'statusCode');
  if (top != null) return top;
  if (typeof error === 'object' && error !== null && 'response' in error) {
    return readNumberField(Reflect.get(error, 'response'), 'status');
  }
  return null;
}

function getErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

export function isTransientError(error: unknown): boolean {
  const status = getStatusCode(error);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(error);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = (error instanceof Error ? error.message : String(error)).toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Status text embedded in message ("Request failed with status 503")
  return /\b(408|425|429|500|502|503|504)\b/.test(msg);
}

/**
 * Races `fn` against a timer. The timer is always cleared so no handle
 * outlives the call.
 */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, label = 'operation'): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  /** Per-attempt timeout. Omit to let attempts run unbounded. */
  timeoutMs?: number;
  label?: string;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Runs `fn` with exponential backoff (jittered) on transient failures.
 * The last error is rethrown once attempts are exhausted or a failure is
 * classified as permanent.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const isRetryable = options?.isRetryable ?? isTransientError;
  const timeoutMs = options?.timeoutMs;
  const label = options?.label ?? 'operation';

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return timeoutMs ? await withTimeout(fn, timeoutMs, label) : await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !isRetryable(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const delay = baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error(`${label} failed`);
}
