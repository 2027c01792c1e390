export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function parseRetryAfterMs(h: string | null): number | undefined {
  if (!h) return undefined;
  const s = Number(h);
  if (Number.isFinite(s) && s > 0) return Math.round(s * 1000);
  return undefined;
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

export function backoffMs(baseDelayMs: number, attempt: number): number {
  return Math.round(baseDelayMs * Math.pow(2, attempt) * (0.9 + Math.random() * 0.2));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? '');
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'EAI_AGAIN', 'ENOTFOUND', 'UND_ERR_SOCKET']);

/**
 * Looks at the structured fields HTTP clients attach (`status` on Octokit's RequestError,
 * `code` on socket errors, possibly under `cause`), never at free-form message text.
 */
export function isTransientError(err: unknown): boolean {
  if (!isRecord(err)) return false;
  const { status, code, cause } = err;
  if (typeof status === 'number') return isRetryableStatus(status);
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) return true;
  return cause !== undefined && cause !== err && isTransientError(cause);
}

export type RetryOptions = {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

export async function withRetries<T>(
  fn: () => Promise<T>,
  { maxAttempts = 3, baseDelayMs = 1000, maxDelayMs = 30_000, onRetry }: RetryOptions = {}
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(attempt < maxAttempts) || !isTransientError(err)) throw err;
      const delayMs = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
      onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export type TokenUsage = {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
};

function finite(x: unknown): number | undefined {
  return typeof x === 'number' && Number.isFinite(x) ? x : undefined;
}

export function readUsage(data: unknown, keys: { input: string; output: string; total: string }): TokenUsage | undefined {
  const u = isRecord(data) ? data.usage : undefined;
  if (!isRecord(u)) return undefined;

  const inputTokens = finite(u[keys.input]);
  const outputTokens = finite(u[keys.output]);
  const totalTokens = finite(u[keys.total]);

  if (inputTokens || outputTokens || totalTokens) return { inputTokens, outputTokens, totalTokens };
  return undefined;
}
