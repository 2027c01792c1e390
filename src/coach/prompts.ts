import type { TextKind } from '../lib/text-source.js';

export const REWRITE_STYLES = ['Concise & Punchy', 'Story-Driven', 'Keyword-Optimized'] as const;

export function buildCritiquePrompt(kind: TextKind, text: string): string {
  const head = (() => {
    switch (kind) {
      case 'linkedin':
        return [
          "Act as an expert LinkedIn reviewer ('PitchSpark').",
          "Analyze this 'About' section:",
          '- Critique section',
          '- Top 3 Action items',
        ];
      case 'resume':
        return ['Act as a resume reviewer.', 'Provide:', '- Critique', '- Top 3 Action items'];
    }
  })();

  return `${head.join('\n')}\n---\n${text}`;
}

export function buildRewritePrompt(text: string): string {
  const styles = REWRITE_STYLES.map((s, i) => `${i + 1}. ${s}`);
  return `Rewrite this LinkedIn 'About' in ${REWRITE_STYLES.length} styles:\n${styles.join('\n')}\n---\n${text}`;
}
