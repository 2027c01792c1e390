import { DEFAULT_MODELS, parseProvider } from '../lib/llm.js';
import type { LLMConfig } from '../coach/critique.js';
import { loadTextFile, parseKind, type LoadedText } from '../lib/text-source.js';

export function getArg(name: string, argv: string[] = process.argv): string | undefined {
  const idx = argv.indexOf(`--${name}`);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

export function hasFlag(name: string, argv: string[] = process.argv): boolean {
  return argv.includes(`--${name}`);
}

export async function readInputText(argv: string[] = process.argv): Promise<LoadedText> {
  const kindArg = getArg('kind', argv);
  const inline = getArg('text', argv);
  if (inline !== undefined) {
    return { text: inline, source: '--text', kind: parseKind(kindArg, 'linkedin') };
  }

  const file = getArg('file', argv);
  if (!file) throw new Error('Missing --file <path> or --text <text>');
  return loadTextFile(file, kindArg ? parseKind(kindArg, 'linkedin') : undefined);
}

export function llmConfigFromEnv(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): LLMConfig {
  const provider = parseProvider(getArg('provider', argv));
  const model = getArg('model', argv) || DEFAULT_MODELS[provider];

  if (provider === 'openai') {
    const openaiApiKey = env.OPENAI_API_KEY;
    if (!openaiApiKey) throw new Error('Missing OPENAI_API_KEY');
    return { provider, model, openaiApiKey };
  }

  const githubToken = env.GITHUB_PAT || env.GITHUB_TOKEN;
  if (!githubToken) throw new Error('Missing GITHUB_PAT (or GITHUB_TOKEN)');
  return { provider, model, githubToken };
}
