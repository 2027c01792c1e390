import { callOpenAI } from './openai.js';
import { callGithubModels, DEFAULT_GITHUB_MODEL } from './github-models.js';
import type { TokenUsage } from './retry.js';

export type LLMProvider = 'openai' | 'github-models';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['github-models', 'openai'];

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  'github-models': DEFAULT_GITHUB_MODEL,
  openai: 'gpt-4o-mini',
};

export function parseProvider(s: string | undefined): LLMProvider {
  const v = (s || 'github-models').trim().toLowerCase();
  const found = LLM_PROVIDERS.find((p) => p === v);
  if (!found) throw new Error(`Unknown provider: ${s}`);
  return found;
}

export type LLMMessage = {
  role: 'system' | 'user' | 'assistant' | 'developer';
  content: string;
};

export type LLMRequest = {
  provider: LLMProvider;
  model: string;
  prompt?: string; // convenience
  messages?: LLMMessage[];

  // auth
  openaiApiKey?: string;
  githubToken?: string;

  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
};

export type LLMUsage = TokenUsage;

export type LLMResult = {
  text: string;
  usage?: LLMUsage;
  raw: unknown;
};

export async function callLLM(req: LLMRequest): Promise<LLMResult> {
  const { timeoutMs, maxRetries, retryBaseDelayMs } = req;

  if (req.provider === 'openai') {
    if (!req.openaiApiKey) throw new Error('openaiApiKey is required for provider=openai');

    const prompt =
      req.prompt ??
      (req.messages
        ? req.messages
            .map((m) => `${m.role.toUpperCase()}:\n${m.content}`)
            .join('\n\n')
        : undefined);

    if (!prompt) throw new Error('Either prompt or messages is required for provider=openai');

    return callOpenAI({
      apiKey: req.openaiApiKey,
      model: req.model,
      prompt,
      timeoutMs,
      maxRetries,
      retryBaseDelayMs,
    });
  }

  if (!req.githubToken) throw new Error('githubToken is required for provider=github-models');

  const messages: LLMMessage[] | undefined =
    req.messages ?? (req.prompt ? [{ role: 'user', content: req.prompt }] : undefined);

  if (!messages) throw new Error('Either messages or prompt is required for provider=github-models');

  return callGithubModels({
    token: req.githubToken,
    model: req.model,
    messages,
    timeoutMs,
    maxRetries,
    retryBaseDelayMs,
  });
}
