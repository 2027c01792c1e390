import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@actions/core', () => ({
  warning: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../lib/llm.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../lib/llm.js')>()),
  callLLM: vi.fn(),
}));

import * as core from '@actions/core';
import { parseMode, runCoach, type LLMConfig } from '../coach/critique.js';
import { buildCritiquePrompt, buildRewritePrompt } from '../coach/prompts.js';
import { callLLM } from '../lib/llm.js';

const llm: LLMConfig = { provider: 'github-models', model: 'openai/gpt-4o-mini', githubToken: 'test-token' };
const TEXT = 'I think I am a good engineer.';

describe('prompts', () => {
  it('builds the resume critique prompt', () => {
    expect(buildCritiquePrompt('resume', 'My text')).toBe(
      'Act as a resume reviewer.\nProvide:\n- Critique\n- Top 3 Action items\n---\nMy text'
    );
  });

  it('builds the LinkedIn critique prompt', () => {
    expect(buildCritiquePrompt('linkedin', 'About me')).toBe(
      "Act as an expert LinkedIn reviewer ('PitchSpark').\nAnalyze this 'About' section:\n- Critique section\n- Top 3 Action items\n---\nAbout me"
    );
  });

  it('builds the rewrite prompt', () => {
    expect(buildRewritePrompt('Hi')).toBe(
      "Rewrite this LinkedIn 'About' in 3 styles:\n1. Concise & Punchy\n2. Story-Driven\n3. Keyword-Optimized\n---\nHi"
    );
  });
});

describe('runCoach', () => {
  beforeEach(() => {
    vi.mocked(callLLM).mockReset();
    vi.mocked(core.warning).mockReset();
  });

  it('scores without calling a model in offline mode', async () => {
    const r = await runCoach({ text: TEXT, kind: 'linkedin', mode: 'offline' });

    expect(callLLM).not.toHaveBeenCalled();
    expect(r.analysis.score).toBe(15);
    expect(r.analysis.suggestions).toEqual(["Found: 'i think'. Try a more confident phrase."]);
    expect(r.critique).toBeNull();
    expect(r.rewrites).toBeNull();
    expect(r.model).toBeUndefined();
  });

  it('requests a critique in analyze mode', async () => {
    vi.mocked(callLLM).mockResolvedValueOnce({ text: 'Looks solid.', usage: { totalTokens: 42 }, raw: {} });

    const r = await runCoach({ text: TEXT, kind: 'resume', mode: 'analyze', llm });

    expect(r.critique).toBe('Looks solid.');
    expect(r.rewrites).toBeNull();
    expect(r.model).toBe('github-models:openai/gpt-4o-mini');
    expect(r.usage).toEqual({ critique: { totalTokens: 42 } });
    expect(callLLM).toHaveBeenCalledWith(
      expect.objectContaining({
        provider: 'github-models',
        model: 'openai/gpt-4o-mini',
        githubToken: 'test-token',
        prompt: buildCritiquePrompt('resume', TEXT),
      })
    );
  });

  it('requests both critique and rewrites', async () => {
    vi.mocked(callLLM)
      .mockResolvedValueOnce({ text: 'Critique', raw: {} })
      .mockResolvedValueOnce({ text: 'Rewrites', raw: {} });

    const r = await runCoach({ text: TEXT, kind: 'linkedin', mode: 'both', llm });

    expect(r.critique).toBe('Critique');
    expect(r.rewrites).toBe('Rewrites');
    expect(vi.mocked(callLLM).mock.calls.map(([req]) => req.prompt)).toEqual([
      buildCritiquePrompt('linkedin', TEXT),
      buildRewritePrompt(TEXT),
    ]);
  });

  it('keeps the score when the model call fails', async () => {
    vi.mocked(callLLM).mockRejectedValueOnce(new Error('GitHub Models API error: 401 Unauthorized'));

    const r = await runCoach({ text: TEXT, kind: 'linkedin', mode: 'analyze', llm });

    expect(r.critique).toBeNull();
    expect(r.analysis.score).toBe(15);
    expect(core.warning).toHaveBeenCalledWith(
      'AI critique failed (github-models:openai/gpt-4o-mini): GitHub Models API error: 401 Unauthorized'
    );
  });

  it('needs an LLM config unless offline', async () => {
    await expect(runCoach({ text: TEXT, kind: 'linkedin', mode: 'rewrite' })).rejects.toThrow(
      'An LLM configuration is required for mode=rewrite'
    );
  });
});

describe('parseMode', () => {
  it('defaults to analyze', () => {
    expect(parseMode('')).toBe('analyze');
    expect(parseMode(undefined)).toBe('analyze');
  });

  it('rejects unknown modes', () => {
    expect(() => parseMode('loud')).toThrow('Unknown mode: loud (expected analyze, rewrite, both, offline)');
  });
});
