import { describe, expect, it, vi } from 'vitest';
import { upsertReportComment, type IssueCommentsApi } from '../coach/comments.js';
import { REPORT_MARKER } from '../coach/report.js';

function fakeApi(pages: Array<Array<{ id: number; body?: string | null }>>) {
  const listComments = vi.fn(async ({ page = 1 }: { page?: number }) => ({ data: pages[page - 1] ?? [] }));
  const createComment = vi.fn(async () => ({}));
  const updateComment = vi.fn(async () => ({}));
  const api: IssueCommentsApi = { listComments, createComment, updateComment };
  return { api, listComments, createComment, updateComment };
}

const target = { owner: 'acme', repo: 'profile', issueNumber: 7, body: `${REPORT_MARKER}\nnew report` };

describe('upsertReportComment', () => {
  it('updates the comment that carries the marker', async () => {
    const f = fakeApi([[{ id: 1, body: 'lgtm' }, { id: 2, body: `${REPORT_MARKER}\nold report` }]]);

    await expect(upsertReportComment(f.api, target)).resolves.toBe('updated');
    expect(f.updateComment).toHaveBeenCalledWith({ owner: 'acme', repo: 'profile', comment_id: 2, body: target.body });
    expect(f.createComment).not.toHaveBeenCalled();
  });

  it('creates a comment when none carries the marker', async () => {
    const f = fakeApi([[{ id: 1, body: 'lgtm' }, { id: 3, body: null }]]);

    await expect(upsertReportComment(f.api, target)).resolves.toBe('created');
    expect(f.createComment).toHaveBeenCalledWith({ owner: 'acme', repo: 'profile', issue_number: 7, body: target.body });
    expect(f.updateComment).not.toHaveBeenCalled();
  });

  it('looks past the first page', async () => {
    const firstPage = Array.from({ length: 100 }, (_, i) => ({ id: i + 1, body: 'noise' }));
    const f = fakeApi([firstPage, [{ id: 500, body: `${REPORT_MARKER}\nold` }]]);

    await expect(upsertReportComment(f.api, target)).resolves.toBe('updated');
    expect(f.listComments).toHaveBeenCalledTimes(2);
    expect(f.updateComment).toHaveBeenCalledWith(expect.objectContaining({ comment_id: 500 }));
  });
});
