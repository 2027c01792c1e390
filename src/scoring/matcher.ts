import { tokenize, type Token } from './tokenize.js';
import { WEAK_PHRASE_RULES, type TokenPredicate, type WeakPhraseRule } from './rules.js';

export type PhraseMatch = {
  rule: WeakPhraseRule;
  phrase: string;
  start: number;
  end: number;
};

function tokenMatches(token: Token, p: TokenPredicate): boolean {
  return p.kind === 'literal' ? token.lower === p.value : token.lemma === p.value;
}

function matchesAt(tokens: Token[], i: number, pattern: readonly TokenPredicate[]): boolean {
  if (!pattern.length || i + pattern.length > tokens.length) return false;
  return pattern.every((p, k) => {
    const t = tokens[i + k];
    return t !== undefined && tokenMatches(t, p);
  });
}

export function renderSuggestion(m: PhraseMatch): string {
  return `Found: '${m.phrase}'. ${m.rule.advice}`;
}

/**
 * First occurrence of each rule, in catalog order. Throws whatever the tokenizer throws;
 * use {@link safeMatchWeakPhrases} when a failure should just mean "no findings".
 */
export function matchWeakPhrases(
  text: string | null | undefined,
  rules: readonly WeakPhraseRule[] = WEAK_PHRASE_RULES
): PhraseMatch[] {
  if (!text) return [];
  const tokens = tokenize(text);
  const out: PhraseMatch[] = [];

  for (const rule of rules) {
    for (let i = 0; i < tokens.length; i++) {
      if (!matchesAt(tokens, i, rule.pattern)) continue;
      const span = tokens.slice(i, i + rule.pattern.length);
      const first = span[0];
      const last = span[span.length - 1];
      if (!first || !last) break;
      out.push({
        rule,
        phrase: span.map((t) => t.lower).join(' '),
        start: first.start,
        end: last.end,
      });
      break;
    }
  }

  return out;
}

export function renderSuggestions(matches: readonly PhraseMatch[]): string[] {
  return [...new Set(matches.map(renderSuggestion))];
}

export function findWeakPhrases(
  text: string | null | undefined,
  rules: readonly WeakPhraseRule[] = WEAK_PHRASE_RULES
): string[] {
  return renderSuggestions(safeMatchWeakPhrases(text, rules));
}

export function safeMatchWeakPhrases(
  text: string | null | undefined,
  rules: readonly WeakPhraseRule[] = WEAK_PHRASE_RULES
): PhraseMatch[] {
  try {
    return matchWeakPhrases(text, rules);
  } catch {
    // advisory only
    return [];
  }
}
