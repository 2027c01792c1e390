import { describe, expect, it } from 'vitest';
import { analyzeText, analyzeTextDetailed } from '../scoring/analyze.js';
import { renderSuggestion } from '../scoring/matcher.js';

describe('analyzeText', () => {
  it('handles empty text', () => {
    expect(analyzeText('')).toEqual({ score: 30, suggestions: [] });
    expect(analyzeText(null)).toEqual({ score: 30, suggestions: [] });
  });

  it('clamps a short text full of weak phrases to 0', () => {
    const result = analyzeText('I think I helped with the project and I was responsible for sales.');
    expect(result.suggestions).toEqual([
      "Found: 'i think'. Try a more confident phrase.",
      "Found: 'helped with'. Use stronger verbs like 'Assisted', 'Supported', or 'Contributed to'.",
      "Found: 'responsible for'. Use action verbs like 'Managed', 'Owned', or 'Led'.",
    ]);
    expect(result.score).toBe(0);
  });

  it('rewards long text with keywords', () => {
    const text = 'data software ' + 'x'.repeat(586);
    expect(text.length).toBe(600);
    expect(analyzeText(text)).toEqual({ score: 90, suggestions: [] });
  });

  it('is deterministic', () => {
    const text = 'I believe in python. ' + 'y'.repeat(300);
    expect(analyzeText(text)).toEqual(analyzeText(text));
  });
});

describe('analyzeTextDetailed', () => {
  it('includes matches and breakdown', () => {
    const detailed = analyzeTextDetailed('I think I helped with the project and I was responsible for sales.');
    expect(detailed.matches.map((m) => m.rule.id)).toEqual(['i-think', 'helped-with', 'responsible-for']);
    expect(detailed.length).toBe(66);
    expect(detailed.breakdown.raw).toBe(-15);
    expect(detailed.score).toBe(0);
  });

  it('derives suggestions from the same matches it returns', () => {
    const text = 'I believe I was responsible for hiring. I believe it.';
    const detailed = analyzeTextDetailed(text);
    expect(detailed.suggestions).toEqual(detailed.matches.map(renderSuggestion));
    expect(detailed.suggestions).toEqual(analyzeText(text).suggestions);
  });

  it('has no matches for malformed text', () => {
    const detailed = analyzeTextDetailed('I think \uD800');
    expect(detailed.suggestions).toEqual([]);
    expect(detailed.matches).toEqual([]);
    expect(detailed.score).toBe(30);
  });
});
