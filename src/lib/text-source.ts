import fs from 'node:fs/promises';
import path from 'node:path';

import { extractPdfText } from './pdf.js';
import { errorMessage } from './retry.js';

export type TextKind = 'linkedin' | 'resume';

export type LoadedText = {
  text: string;
  source: string;
  kind: TextKind;
};

const PLAIN_TEXT_EXTENSIONS = new Set(['', '.txt', '.md', '.markdown']);

export function isPdfPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.pdf';
}

export function parseKind(s: string | undefined, fallback: TextKind): TextKind {
  const v = (s || '').trim().toLowerCase();
  if (!v) return fallback;
  if (v === 'linkedin' || v === 'resume') return v;
  throw new Error(`Unknown text kind: ${s} (expected linkedin or resume)`);
}

export async function loadTextFile(filePath: string, kind?: TextKind): Promise<LoadedText> {
  const ext = path.extname(filePath).toLowerCase();
  const pdf = isPdfPath(filePath);
  if (!pdf && !PLAIN_TEXT_EXTENSIONS.has(ext)) {
    throw new Error(`Unsupported file type: ${ext}`);
  }

  let text: string;
  try {
    text = pdf ? await extractPdfText(await fs.readFile(filePath)) : await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new Error(`Could not read ${filePath}: ${errorMessage(e)}`);
  }

  return { text, source: filePath, kind: kind ?? (pdf ? 'resume' : 'linkedin') };
}
