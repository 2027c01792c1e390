import {
  backoffMs,
  isRecord,
  isRetryableStatus,
  parseRetryAfterMs,
  readUsage,
  sleep,
  type TokenUsage,
} from './retry.js';

export const GITHUB_MODELS_URL = 'https://models.github.ai/inference/chat/completions';
export const DEFAULT_GITHUB_MODEL = 'openai/gpt-4o-mini';

export type GithubModelsChatRequest = {
  token: string;
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant' | 'developer'; content: string }>;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
};

export type GithubModelsResult = {
  text: string;
  usage?: TokenUsage;
  raw: unknown;
};

function extractText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.choices)) return '';
  const first: unknown = data.choices[0];
  const message = isRecord(first) ? first.message : undefined;
  const t = isRecord(message) ? message.content : undefined;
  if (typeof t === 'string' && t.trim()) return t;
  return '';
}

export async function callGithubModels(
  {
    token,
    model,
    messages,
    timeoutMs = 120_000,
    maxRetries = 3,
    retryBaseDelayMs = 1000,
  }: GithubModelsChatRequest
): Promise<GithubModelsResult> {
  let lastErr: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);

    try {
      const resp = await fetch(GITHUB_MODELS_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
        },
        body: JSON.stringify({ model, messages }),
        signal: ac.signal,
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => '');
        const err = new Error(
          `GitHub Models API error: ${resp.status} ${resp.statusText}${text ? `\n${text}` : ''}`
        );

        if (attempt < maxRetries && isRetryableStatus(resp.status)) {
          const retryAfterMs = parseRetryAfterMs(resp.headers.get('retry-after'));
          await sleep(retryAfterMs ?? backoffMs(retryBaseDelayMs, attempt));
          continue;
        }

        // non-retryable: surface as-is
        lastErr = err;
        break;
      }

      const data: unknown = await resp.json();
      const text = extractText(data);
      return {
        text: text || JSON.stringify(data, null, 2),
        usage: readUsage(data, { input: 'prompt_tokens', output: 'completion_tokens', total: 'total_tokens' }),
        raw: data,
      };
    } catch (e) {
      const isAbort = e instanceof Error && e.name === 'AbortError';
      lastErr = isAbort ? new Error(`GitHub Models request timed out after ${timeoutMs}ms`) : e;
      if (attempt < maxRetries) {
        await sleep(backoffMs(retryBaseDelayMs, attempt));
        continue;
      }
    } finally {
      clearTimeout(t);
    }
  }

  throw lastErr ?? new Error('GitHub Models request failed');
}
