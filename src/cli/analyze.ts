#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';

import { runCoach } from '../coach/critique.js';
import { renderReport } from '../coach/report.js';
import { getArg, hasFlag, llmConfigFromEnv, readInputText } from './args.js';

async function main() {
  const input = await readInputText();
  const offline = hasFlag('offline');
  const llm = offline ? undefined : llmConfigFromEnv();

  const result = await runCoach({ text: input.text, kind: input.kind, mode: offline ? 'offline' : 'analyze', llm });

  if (hasFlag('json')) {
    console.log(JSON.stringify({ score: result.analysis.score, suggestions: result.analysis.suggestions }, null, 2));
  } else {
    console.log(renderReport(result));
  }

  const outDir = getArg('out');
  if (outDir) {
    fs.mkdirSync(outDir, { recursive: true });
    const stamp = new Date().toISOString().replace(/[:.]/g, '-');
    const mdPath = path.join(outDir, `pitchspark-${stamp}.md`);
    fs.writeFileSync(mdPath, renderReport(result), 'utf8');
    console.error(`Wrote ${mdPath}`);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
