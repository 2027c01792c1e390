#!/usr/bin/env node
import { requestRewrites } from '../coach/critique.js';
import { llmConfigFromEnv, readInputText } from './args.js';

async function main() {
  const input = await readInputText();
  const rewrites = await requestRewrites(input.text, llmConfigFromEnv());
  if (!rewrites) throw new Error('No rewrites returned by the model');
  console.log(rewrites);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
