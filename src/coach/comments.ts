import { REPORT_MARKER } from './report.js';

type RepoRef = { owner: string; repo: string };

// The subset of octokit.rest.issues used here.
export interface IssueCommentsApi {
  listComments(params: RepoRef & { issue_number: number; per_page?: number; page?: number }): Promise<{
    data: Array<{ id: number; body?: string | null }>;
  }>;
  createComment(params: RepoRef & { issue_number: number; body: string }): Promise<unknown>;
  updateComment(params: RepoRef & { comment_id: number; body: string }): Promise<unknown>;
}

export type UpsertCommentParams = RepoRef & {
  issueNumber: number;
  body: string;
  marker?: string;
};

async function findMarkedComment(api: IssueCommentsApi, p: UpsertCommentParams, marker: string) {
  for (let page = 1; ; page++) {
    const res = await api.listComments({
      owner: p.owner,
      repo: p.repo,
      issue_number: p.issueNumber,
      per_page: 100,
      page,
    });
    const found = res.data.find((c) => typeof c.body === 'string' && c.body.includes(marker));
    if (found) return found;
    if (res.data.length < 100) return undefined;
  }
}

// Update the existing report comment rather than adding a new one on every run.
export async function upsertReportComment(
  api: IssueCommentsApi,
  p: UpsertCommentParams
): Promise<'created' | 'updated'> {
  const marker = p.marker ?? REPORT_MARKER;
  const existing = await findMarkedComment(api, p, marker);

  if (existing) {
    await api.updateComment({ owner: p.owner, repo: p.repo, comment_id: existing.id, body: p.body });
    return 'updated';
  }

  await api.createComment({ owner: p.owner, repo: p.repo, issue_number: p.issueNumber, body: p.body });
  return 'created';
}
