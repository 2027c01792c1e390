import { baseForm } from './tokenize.js';

export type TokenPredicate =
  | { kind: 'literal'; value: string }
  | { kind: 'lemma'; value: string };

export type WeakPhraseCategory = 'self-doubt' | 'weak-verb' | 'passive-ownership';

export type WeakPhraseRule = {
  id: string;
  category: WeakPhraseCategory;
  pattern: readonly TokenPredicate[];
  advice: string;
};

// Tokens are compared by their lowercase and base forms, so predicates are stored that way too.
export const literal = (value: string): TokenPredicate => ({ kind: 'literal', value: value.toLowerCase() });
export const lemma = (value: string): TokenPredicate => ({ kind: 'lemma', value: baseForm(value) });

function defineRules(rules: WeakPhraseRule[]): readonly WeakPhraseRule[] {
  return Object.freeze(
    rules.map((r) => Object.freeze({ ...r, pattern: Object.freeze(r.pattern.map((p) => Object.freeze(p))) }))
  );
}

// Order matters: suggestions are reported in this order.
export const WEAK_PHRASE_RULES = defineRules([
  {
    id: 'i-think',
    category: 'self-doubt',
    pattern: [literal('i'), literal('think')],
    advice: 'Try a more confident phrase.',
  },
  {
    id: 'i-believe',
    category: 'self-doubt',
    pattern: [literal('i'), literal('believe')],
    advice: 'Use a stronger, assertive tone.',
  },
  {
    id: 'helped-with',
    category: 'weak-verb',
    pattern: [literal('helped'), lemma('with')],
    advice: "Use stronger verbs like 'Assisted', 'Supported', or 'Contributed to'.",
  },
  {
    id: 'responsible-for',
    category: 'passive-ownership',
    pattern: [literal('responsible'), literal('for')],
    advice: "Use action verbs like 'Managed', 'Owned', or 'Led'.",
  },
]);

export const SCORE_KEYWORDS: readonly string[] = Object.freeze(['data', 'software', 'python']);
