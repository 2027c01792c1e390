import { findWeakPhrases, renderSuggestions, safeMatchWeakPhrases } from './matcher.js';
import type { PhraseMatch } from './matcher.js';
import { scoreBreakdown, textLength, type ScoreBreakdown } from './score.js';

export type Analysis = {
  score: number;
  suggestions: string[];
};

export type DetailedAnalysis = Analysis & {
  matches: PhraseMatch[];
  breakdown: ScoreBreakdown;
  length: number;
};

export function analyzeText(text: string | null | undefined): Analysis {
  const suggestions = findWeakPhrases(text);
  return { score: scoreBreakdown(suggestions.length, text).score, suggestions };
}

export function analyzeTextDetailed(text: string | null | undefined): DetailedAnalysis {
  const matches = safeMatchWeakPhrases(text);
  const suggestions = renderSuggestions(matches);

  const breakdown = scoreBreakdown(suggestions.length, text);
  return { score: breakdown.score, suggestions, matches, breakdown, length: textLength(text) };
}
