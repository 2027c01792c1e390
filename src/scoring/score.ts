import { SCORE_KEYWORDS } from './rules.js';

export const BASE_SCORE = 50;
export const PHRASE_PENALTY = 15;
export const SHORT_TEXT_CHARS = 150;
export const LONG_TEXT_CHARS = 500;
export const LENGTH_ADJUSTMENT = 20;
export const KEYWORD_BONUS = 10;

export type ScoreInput = {
  suggestionCount: number;
  length: number;
  keywords: Record<string, boolean>;
};

export type ScoreBreakdown = {
  base: number;
  phrasePenalty: number;
  lengthAdjustment: number;
  keywordBonus: number;
  matchedKeywords: string[];
  raw: number;
  score: number;
};

function clampScore(n: number): number {
  return Math.max(0, Math.min(100, n));
}

// Code points, not UTF-16 units.
export function textLength(text: string | null | undefined): number {
  return text ? Array.from(text).length : 0;
}

export function toScoreInput(suggestionCount: number, text: string | null | undefined): ScoreInput {
  const lower = (text ?? '').toLowerCase();
  return {
    suggestionCount: Math.max(0, Math.floor(suggestionCount)),
    length: textLength(text),
    keywords: Object.fromEntries(SCORE_KEYWORDS.map((k) => [k, lower.includes(k)])),
  };
}

export function scoreFromInput(input: ScoreInput): ScoreBreakdown {
  const phrasePenalty = -PHRASE_PENALTY * input.suggestionCount;

  let lengthAdjustment = 0;
  if (input.length < SHORT_TEXT_CHARS) lengthAdjustment = -LENGTH_ADJUSTMENT;
  else if (input.length > LONG_TEXT_CHARS) lengthAdjustment = LENGTH_ADJUSTMENT;

  const matchedKeywords = Object.entries(input.keywords)
    .filter(([, present]) => present)
    .map(([k]) => k);
  const keywordBonus = KEYWORD_BONUS * matchedKeywords.length;

  const raw = BASE_SCORE + phrasePenalty + lengthAdjustment + keywordBonus;

  return {
    base: BASE_SCORE,
    phrasePenalty,
    lengthAdjustment,
    keywordBonus,
    matchedKeywords,
    raw,
    score: clampScore(raw),
  };
}

export function scoreBreakdown(suggestionCount: number, text: string | null | undefined): ScoreBreakdown {
  return scoreFromInput(toScoreInput(suggestionCount, text));
}

export function calculateScore(suggestions: readonly string[], text: string | null | undefined): number {
  return scoreBreakdown(suggestions.length, text).score;
}
