import { createRequire } from 'node:module';
import type pdfParseFn from 'pdf-parse';

const require = createRequire(import.meta.url);

type PdfParse = typeof pdfParseFn;

// The package entry runs a self-test when it has no parent module (always the case under ESM),
// so load the implementation file directly.
let pdfParse: PdfParse | undefined;

function loadPdfParse(): PdfParse {
  if (!pdfParse) {
    const loaded: PdfParse = require('pdf-parse/lib/pdf-parse.js');
    pdfParse = loaded;
  }
  return pdfParse;
}

export async function extractPdfText(data: Buffer): Promise<string> {
  const parse = loadPdfParse();
  const result = await parse(data);
  return result.text.trim();
}
