import {
  backoffMs,
  isRecord,
  isRetryableStatus,
  parseRetryAfterMs,
  readUsage,
  sleep,
  type TokenUsage,
} from './retry.js';

export const OPENAI_RESPONSES_URL = 'https://api.openai.com/v1/responses';

export type OpenAIRequest = {
  apiKey: string;
  model: string;
  prompt: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
};

export type OpenAIResult = {
  text: string;
  usage?: TokenUsage;
  raw: unknown;
};

function contentText(item: unknown): string {
  if (!isRecord(item) || !Array.isArray(item.content)) return '';
  return item.content
    .map((c: unknown) => (isRecord(c) && typeof c.text === 'string' ? c.text : ''))
    .join('');
}

function extractOutputText(data: unknown): string {
  if (!isRecord(data)) return '';
  if (typeof data.output_text === 'string' && data.output_text.trim()) return data.output_text;

  const output: unknown[] = Array.isArray(data.output) ? data.output : [];
  const parts = output.map(contentText).filter((s) => s.trim());

  if (parts.length) return parts.join('\n');
  return '';
}

export async function callOpenAI(
  { apiKey, model, prompt, timeoutMs = 120_000, maxRetries = 3, retryBaseDelayMs = 1000 }: OpenAIRequest
): Promise<OpenAIResult> {
  let lastErr: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    const ac = new AbortController();
    const t = setTimeout(() => ac.abort(), timeoutMs);

    try {
      const resp = await fetch(OPENAI_RESPONSES_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          input: prompt,
        }),
        signal: ac.signal,
      });

      if (!resp.ok) {
        const text = await resp.text().catch(() => '');
        const err = new Error(`OpenAI API error: ${resp.status} ${resp.statusText}${text ? `\n${text}` : ''}`);

        if (attempt < maxRetries && isRetryableStatus(resp.status)) {
          const retryAfterMs = parseRetryAfterMs(resp.headers.get('retry-after'));
          await sleep(retryAfterMs ?? backoffMs(retryBaseDelayMs, attempt));
          continue;
        }

        lastErr = err;
        break;
      }

      const data: unknown = await resp.json();
      const text = extractOutputText(data);
      return {
        text: text || JSON.stringify(data, null, 2),
        usage: readUsage(data, { input: 'input_tokens', output: 'output_tokens', total: 'total_tokens' }),
        raw: data,
      };
    } catch (e) {
      const isAbort = e instanceof Error && e.name === 'AbortError';
      lastErr = isAbort ? new Error(`OpenAI request timed out after ${timeoutMs}ms`) : e;
      if (attempt < maxRetries) {
        // Abort could be a transient network issue; treat it as retryable.
        await sleep(backoffMs(retryBaseDelayMs, attempt));
        continue;
      }
    } finally {
      clearTimeout(t);
    }
  }

  throw lastErr ?? new Error('OpenAI request failed');
}
