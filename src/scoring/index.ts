export { analyzeText, analyzeTextDetailed } from './analyze.js';
export type { Analysis, DetailedAnalysis } from './analyze.js';
export {
  findWeakPhrases,
  matchWeakPhrases,
  safeMatchWeakPhrases,
  renderSuggestion,
  renderSuggestions,
} from './matcher.js';
export type { PhraseMatch } from './matcher.js';
export { calculateScore, scoreBreakdown, scoreFromInput, toScoreInput, textLength } from './score.js';
export type { ScoreBreakdown, ScoreInput } from './score.js';
export { WEAK_PHRASE_RULES, SCORE_KEYWORDS, literal, lemma } from './rules.js';
export type { TokenPredicate, WeakPhraseRule, WeakPhraseCategory } from './rules.js';
export { tokenize, baseForm, TokenizeError } from './tokenize.js';
export type { Token } from './tokenize.js';
