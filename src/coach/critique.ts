import * as core from '@actions/core';

import { callLLM, type LLMProvider, type LLMUsage } from '../lib/llm.js';
import { errorMessage } from '../lib/retry.js';
import type { TextKind } from '../lib/text-source.js';
import { analyzeTextDetailed, type DetailedAnalysis } from '../scoring/index.js';
import { buildCritiquePrompt, buildRewritePrompt } from './prompts.js';

export type CoachMode = 'analyze' | 'rewrite' | 'both' | 'offline';

const COACH_MODES: readonly CoachMode[] = ['analyze', 'rewrite', 'both', 'offline'];

export function parseMode(s: string | undefined): CoachMode {
  const v = (s || 'analyze').trim().toLowerCase();
  const found = COACH_MODES.find((m) => m === v);
  if (!found) throw new Error(`Unknown mode: ${s} (expected ${COACH_MODES.join(', ')})`);
  return found;
}

export type LLMConfig = {
  provider: LLMProvider;
  model: string;
  githubToken?: string;
  openaiApiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
};

export type CoachRequest = {
  text: string;
  kind: TextKind;
  mode: CoachMode;
  llm?: LLMConfig;
};

export type CoachResult = {
  kind: TextKind;
  mode: CoachMode;
  analysis: DetailedAnalysis;
  critique: string | null;
  rewrites: string | null;
  model?: string;
  usage: Record<string, LLMUsage | undefined>;
};

async function ask(
  label: string,
  prompt: string,
  cfg: LLMConfig,
  usage: Record<string, LLMUsage | undefined>
): Promise<string | null> {
  try {
    const r = await callLLM({
      provider: cfg.provider,
      model: cfg.model,
      prompt,
      githubToken: cfg.githubToken,
      openaiApiKey: cfg.openaiApiKey,
      timeoutMs: cfg.timeoutMs ?? 120_000,
      maxRetries: cfg.maxRetries ?? 3,
      retryBaseDelayMs: cfg.retryBaseDelayMs,
    });
    usage[label] = r.usage;
    return r.text;
  } catch (e) {
    // The score stands on its own; the prose is optional.
    core.warning(`AI ${label} failed (${cfg.provider}:${cfg.model}): ${errorMessage(e)}`);
    return null;
  }
}

export function requestCritique(
  text: string,
  kind: TextKind,
  cfg: LLMConfig,
  usage: Record<string, LLMUsage | undefined> = {}
): Promise<string | null> {
  return ask('critique', buildCritiquePrompt(kind, text), cfg, usage);
}

export function requestRewrites(
  text: string,
  cfg: LLMConfig,
  usage: Record<string, LLMUsage | undefined> = {}
): Promise<string | null> {
  return ask('rewrite', buildRewritePrompt(text), cfg, usage);
}

export async function runCoach(req: CoachRequest): Promise<CoachResult> {
  const analysis = analyzeTextDetailed(req.text);
  const usage: Record<string, LLMUsage | undefined> = {};

  if (req.mode === 'offline') {
    return { kind: req.kind, mode: req.mode, analysis, critique: null, rewrites: null, usage };
  }

  const llm = req.llm;
  if (!llm) throw new Error(`An LLM configuration is required for mode=${req.mode}`);

  core.debug(`PitchSpark: score ${analysis.score}, ${analysis.suggestions.length} suggestion(s)`);

  const critique =
    req.mode === 'analyze' || req.mode === 'both' ? await requestCritique(req.text, req.kind, llm, usage) : null;
  const rewrites = req.mode === 'rewrite' || req.mode === 'both' ? await requestRewrites(req.text, llm, usage) : null;

  return {
    kind: req.kind,
    mode: req.mode,
    analysis,
    critique,
    rewrites,
    model: `${llm.provider}:${llm.model}`,
    usage,
  };
}
