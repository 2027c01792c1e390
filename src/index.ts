import * as core from '@actions/core';
import * as github from '@actions/github';

import fs from 'node:fs/promises';
import path from 'node:path';

import { parseMode, runCoach, type CoachResult, type LLMConfig } from './coach/critique.js';
import { upsertReportComment } from './coach/comments.js';
import { renderReport } from './coach/report.js';
import { DEFAULT_MODELS, parseProvider } from './lib/llm.js';
import { errorMessage, withRetries } from './lib/retry.js';
import { loadTextFile, parseKind, type TextKind } from './lib/text-source.js';

function pullRequestFromContext(): { number: number; body: string } | undefined {
  const ctx = github.context;
  if (ctx.eventName !== 'pull_request' && ctx.eventName !== 'pull_request_target') return undefined;
  const pr = ctx.payload.pull_request;
  if (!pr) return undefined;
  return { number: pr.number, body: typeof pr.body === 'string' ? pr.body : '' };
}

async function resolveText(kindInput: string): Promise<{ text: string; source: string; kind: TextKind } | undefined> {
  const inline = core.getInput('text');
  if (inline.trim()) return { text: inline, source: 'input', kind: parseKind(kindInput, 'linkedin') };

  const file = core.getInput('text_file');
  if (file) {
    const workspace = process.env.GITHUB_WORKSPACE || process.cwd();
    const abs = path.isAbsolute(file) ? file : path.join(workspace, file);
    const loaded = await loadTextFile(abs, kindInput ? parseKind(kindInput, 'linkedin') : undefined);
    return { ...loaded, source: file };
  }

  const pr = pullRequestFromContext();
  if (pr?.body.trim()) return { text: pr.body, source: `pull request #${pr.number}`, kind: parseKind(kindInput, 'linkedin') };

  return undefined;
}

async function writeOutputs(params: { outputDir: string; reportMarkdown: string; result: CoachResult; source: string }) {
  const workspace = process.env.GITHUB_WORKSPACE || process.cwd();
  const outDirAbs = path.isAbsolute(params.outputDir)
    ? params.outputDir
    : path.join(workspace, params.outputDir);

  await fs.mkdir(outDirAbs, { recursive: true });

  const reportPath = path.join(outDirAbs, 'report.md');
  const resultPath = path.join(outDirAbs, 'result.json');

  const { analysis } = params.result;
  const json = {
    schemaVersion: 1,
    source: params.source,
    kind: params.result.kind,
    mode: params.result.mode,
    score: analysis.score,
    suggestions: analysis.suggestions,
    breakdown: analysis.breakdown,
    length: analysis.length,
    model: params.result.model,
    usage: params.result.usage,
    createdAt: new Date().toISOString(),
  };

  await Promise.all([
    fs.writeFile(reportPath, params.reportMarkdown, 'utf8'),
    fs.writeFile(resultPath, JSON.stringify(json, null, 2), 'utf8'),
  ]);

  core.setOutput('report_path', path.relative(workspace, reportPath));
}

async function run() {
  const ghToken = core.getInput('github_token') || process.env.GITHUB_TOKEN || process.env.GITHUB_PAT;

  const provider = parseProvider(core.getInput('llm_provider'));
  const model = core.getInput('model') || DEFAULT_MODELS[provider];
  const openaiApiKey = core.getInput('openai_api_key') || process.env.OPENAI_API_KEY;

  const mode = parseMode(core.getInput('mode'));
  const kindInput = core.getInput('kind');
  const minScore = Number(core.getInput('min_score') || '0');
  const comment = (core.getInput('comment') || 'true').toLowerCase() !== 'false';

  const outputDir = core.getInput('output_dir') || '.pitchspark';
  const writeFiles = (core.getInput('write_files') || 'true').toLowerCase() !== 'false';

  if (!Number.isFinite(minScore)) throw new Error(`min_score must be a number (got ${core.getInput('min_score')})`);

  const input = await resolveText(kindInput);
  if (!input) {
    core.info('Skipping: no text, text_file or pull request body to analyze.');
    return;
  }

  let llm: LLMConfig | undefined;
  if (mode !== 'offline') {
    if (provider === 'github-models' && !ghToken) {
      throw new Error('GitHub token is missing (github_token input / GITHUB_TOKEN env)');
    }
    if (provider === 'openai' && !openaiApiKey) {
      throw new Error('OpenAI API key is missing (openai_api_key input / OPENAI_API_KEY env)');
    }
    llm = { provider, model, githubToken: ghToken, openaiApiKey, timeoutMs: 240_000, maxRetries: 3 };
  }

  core.info(`Analyzing ${input.kind} text from ${input.source} (${input.text.length} chars, mode=${mode})`);

  const result = await runCoach({ text: input.text, kind: input.kind, mode, llm });
  const reportMarkdown = renderReport(result);
  const { score, suggestions } = result.analysis;

  core.info(`Score: ${score} / 100`);
  for (const s of suggestions) core.info(`Suggestion: ${s}`);

  const pr = pullRequestFromContext();
  if (comment && pr) {
    if (!ghToken) {
      core.warning('Not commenting: GitHub token is missing.');
    } else {
      const { owner, repo } = github.context.repo;
      const octokit = github.getOctokit(ghToken);
      const how = await withRetries(
        () =>
          upsertReportComment(octokit.rest.issues, {
            owner,
            repo,
            issueNumber: pr.number,
            body: reportMarkdown,
          }),
        {
          maxAttempts: Number(process.env.PITCHSPARK_RETRIES ?? 3),
          onRetry: (err, attempt, delayMs) =>
            core.warning(`Transient GitHub API error (attempt ${attempt}). Retrying in ${delayMs}ms: ${errorMessage(err)}`),
        }
      );
      core.info(how === 'updated' ? 'Updated existing PR comment.' : 'Posted PR comment.');
    }
  }

  core.setOutput('score', String(score));
  core.setOutput('suggestions', JSON.stringify(suggestions));
  core.setOutput('report_markdown', reportMarkdown);

  if (writeFiles) {
    await writeOutputs({ outputDir, reportMarkdown, result, source: input.source });
  }

  await core.summary
    .addHeading('PitchSpark')
    .addRaw(`Score: ${score} / 100\n\nSource: ${input.source}\n`)
    .addRaw(writeFiles ? `\nWrote outputs to: ${outputDir}\n` : '')
    .write();

  if (score < minScore) {
    core.setFailed(`Score ${score} is below min_score ${minScore}.`);
  }
}

(async () => {
  try {
    await run();
  } catch (err) {
    core.setFailed(err instanceof Error ? err.stack ?? err.message : String(err));
  }
})().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
