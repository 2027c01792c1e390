export type Token = {
  value: string;
  lower: string;
  lemma: string;
  start: number;
  end: number;
};

export class TokenizeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenizeError';
  }
}

const WORD_RE = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;
const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function undouble(stem: string): string {
  const n = stem.length;
  if (n >= 3 && stem[n - 1] === stem[n - 2] && !/[aeiouls]/.test(stem[n - 1] ?? '')) {
    return stem.slice(0, -1);
  }
  return stem;
}

// Suffix stripping only; good enough for "helped"/"helping"/"helps" -> "help".
export function baseForm(word: string): string {
  const w = word.toLowerCase();
  if (w.length > 4 && w.endsWith('ies')) return w.slice(0, -3) + 'y';
  if (w.length > 5 && w.endsWith('ing')) return undouble(w.slice(0, -3));
  if (w.length > 4 && w.endsWith('ed')) return undouble(w.slice(0, -2));
  if (w.length > 4 && /(?:ss|sh|ch|x|z)es$/.test(w)) return w.slice(0, -2);
  if (w.length > 3 && w.endsWith('s') && !/(?:ss|us|is)$/.test(w)) return w.slice(0, -1);
  return w;
}

export function tokenize(text: string): Token[] {
  if (LONE_SURROGATE_RE.test(text)) {
    throw new TokenizeError('Text contains an unpaired UTF-16 surrogate');
  }

  const out: Token[] = [];
  for (const m of text.matchAll(WORD_RE)) {
    const value = m[0];
    const start = m.index ?? 0;
    const lower = value.toLowerCase();
    out.push({ value, lower, lemma: baseForm(lower), start, end: start + value.length });
  }
  return out;
}
