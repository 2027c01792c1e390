import type { CoachResult } from './critique.js';

export const REPORT_MARKER = '<!-- pitchspark -->';

function signed(n: number): string {
  return n > 0 ? `+${n}` : String(n);
}

export function renderReport(result: CoachResult): string {
  const { analysis } = result;
  const b = analysis.breakdown;

  const lines: string[] = [];
  lines.push(REPORT_MARKER);
  lines.push(`## ⚡ PitchSpark ${result.kind === 'resume' ? 'Resume' : 'LinkedIn Profile'} Analysis`);
  lines.push('');
  lines.push(`**Score: ${analysis.score} / 100**`);
  lines.push('');

  lines.push('| Signal | Points |');
  lines.push('| --- | --- |');
  lines.push(`| Base | ${b.base} |`);
  lines.push(`| Weak phrases (${analysis.suggestions.length}) | ${signed(b.phrasePenalty)} |`);
  lines.push(`| Length (${analysis.length} chars) | ${signed(b.lengthAdjustment)} |`);
  lines.push(
    `| Keywords (${b.matchedKeywords.length ? b.matchedKeywords.join(', ') : 'none'}) | ${signed(b.keywordBonus)} |`
  );
  lines.push('');

  if (result.critique) {
    lines.push('### Your AI-Powered Analysis ✨');
    lines.push('');
    lines.push(result.critique.trim());
    lines.push('');
  }

  if (result.rewrites) {
    lines.push('### AI Rewrites ✨');
    lines.push('');
    lines.push(result.rewrites.trim());
    lines.push('');
  }

  lines.push('### 💡 Keyword Suggestions');
  lines.push('');
  if (!analysis.suggestions.length) lines.push('- (none)');
  for (const s of analysis.suggestions) lines.push(`- ${s}`);

  if (result.model) {
    lines.push('');
    lines.push(`<sub>Model: ${result.model}</sub>`);
  }

  return lines.join('\n');
}
