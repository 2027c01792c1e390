import { describe, expect, it } from 'vitest';
import type { CoachResult } from '../coach/critique.js';
import { renderReport, REPORT_MARKER } from '../coach/report.js';
import { analyzeTextDetailed } from '../scoring/analyze.js';

function result(text: string, extra: Partial<CoachResult> = {}): CoachResult {
  return {
    kind: 'linkedin',
    mode: 'offline',
    analysis: analyzeTextDetailed(text),
    critique: null,
    rewrites: null,
    usage: {},
    ...extra,
  };
}

describe('renderReport', () => {
  it('renders score, breakdown and suggestions', () => {
    expect(renderReport(result('I think I love data.'))).toBe(
      [
        REPORT_MARKER,
        '## ⚡ PitchSpark LinkedIn Profile Analysis',
        '',
        '**Score: 25 / 100**',
        '',
        '| Signal | Points |',
        '| --- | --- |',
        '| Base | 50 |',
        '| Weak phrases (1) | -15 |',
        '| Length (20 chars) | -20 |',
        '| Keywords (data) | +10 |',
        '',
        '### 💡 Keyword Suggestions',
        '',
        "- Found: 'i think'. Try a more confident phrase.",
      ].join('\n')
    );
  });

  it('includes model prose and the model name', () => {
    const md = renderReport(
      result('x'.repeat(200), {
        kind: 'resume',
        mode: 'both',
        critique: '  Strong opener.  \n',
        rewrites: '1. Punchy version',
        model: 'github-models:openai/gpt-4o-mini',
      })
    );
    const lines = md.split('\n');

    expect(lines[1]).toBe('## ⚡ PitchSpark Resume Analysis');
    expect(lines).toContain('| Length (200 chars) | 0 |');
    expect(lines).toContain('| Keywords (none) | 0 |');
    expect(lines.slice(lines.indexOf('### Your AI-Powered Analysis ✨'), lines.indexOf('### AI Rewrites ✨'))).toEqual([
      '### Your AI-Powered Analysis ✨',
      '',
      'Strong opener.',
      '',
    ]);
    expect(lines.slice(lines.indexOf('### 💡 Keyword Suggestions'))).toEqual([
      '### 💡 Keyword Suggestions',
      '',
      '- (none)',
      '',
      '<sub>Model: github-models:openai/gpt-4o-mini</sub>',
    ]);
  });
});
