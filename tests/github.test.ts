import { describe, it, expect } from 'vitest';
import {
  checkRepository,
  fetchIssueComments,
  fetchPRMetadata,
  fetchReviewComments,
  fetchReviews,
  listPullRequests,
} from '../src/github.js';
import { FakeGitHub, rawComment, rawPR, rawReview, rawReviewComment } from './fake-github.js';

const ref = { owner: 'octocat', repo: 'hello-world', prNumber: 42 };
const BASE = '/repos/octocat/hello-world';

describe('fetchPRMetadata', () => {
  it('returns normalized metadata', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42`, rawPR(42, { draft: true }));

    const result = await fetchPRMetadata(fake, ref);

    expect(result).toEqual({
      ok: true,
      value: {
        number: 42,
        title: 'PR 42',
        author: 'alice',
        createdAt: '2024-03-01T10:00:00Z',
        updatedAt: '2024-03-02T10:00:00Z',
        state: 'open',
        body: 'Description of PR 42',
        url: 'https://github.com/octocat/hello-world/pull/42',
        draft: true,
        mergedAt: null,
        baseBranch: 'main',
        headBranch: 'feature-42',
      },
    });
  });

  it('defaults body to empty string when null', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42`, rawPR(42, { body: null }));

    const result = await fetchPRMetadata(fake, ref);

    expect(result.ok && result.value.body).toBe('');
  });

  it('defaults author to unknown when user is null', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42`, rawPR(42, { user: null }));

    const result = await fetchPRMetadata(fake, ref);

    expect(result.ok && result.value.author).toBe('unknown');
  });

  it('keeps mergedAt for merged PRs', async () => {
    const fake = new FakeGitHub().route(
      `${BASE}/pulls/42`,
      rawPR(42, { state: 'closed', merged_at: '2024-03-05T09:00:00Z' }),
    );

    const result = await fetchPRMetadata(fake, ref);

    expect(result.ok && result.value.mergedAt).toBe('2024-03-05T09:00:00Z');
  });

  it('returns NotFound for a PR that does not exist', async () => {
    const result = await fetchPRMetadata(new FakeGitHub(), ref);

    expect(result).toEqual({ ok: false, error: { kind: 'NotFound', status: 404, message: 'Not Found' } });
  });

  it('returns InvalidResponse when the payload has the wrong shape', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42`, rawPR(42, { number: 'forty-two' }));

    const result = await fetchPRMetadata(fake, ref);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('InvalidResponse');
    expect(result.error.message).toMatch(/^\/repos\/octocat\/hello-world\/pulls\/42 item 0 at number: /);
  });

  it('URL-encodes owner and repository', async () => {
    const fake = new FakeGitHub().route('/repos/my%20org/repo%23x/pulls/42', rawPR(42));

    const result = await fetchPRMetadata(fake, { owner: 'my org', repo: 'repo#x', prNumber: 42 });

    expect(result.ok).toBe(true);
    expect(fake.calls[0].path).toBe('/repos/my%20org/repo%23x/pulls/42');
  });
});

describe('fetchIssueComments', () => {
  it('collects every page in order', async () => {
    const fake = new FakeGitHub().route(`${BASE}/issues/42/comments`, [1, 2, 3, 4, 5].map((id) => rawComment(id)));

    const result = await fetchIssueComments(fake, ref, { perPage: 2 });

    expect(result.ok && result.value.map((c) => c.id)).toEqual([1, 2, 3, 4, 5]);
    expect(fake.calls).toHaveLength(3);
  });

  it('normalizes each comment', async () => {
    const fake = new FakeGitHub().route(`${BASE}/issues/42/comments`, [rawComment(7)]);

    const result = await fetchIssueComments(fake, ref);

    expect(result).toEqual({
      ok: true,
      value: [
        {
          id: 7,
          author: 'bob',
          createdAt: '2024-03-01T11:00:07Z',
          body: 'Comment 7',
          url: 'https://github.com/octocat/hello-world/pull/1#issuecomment-7',
        },
      ],
    });
  });

  it('returns an empty list for a PR without comments', async () => {
    const fake = new FakeGitHub().route(`${BASE}/issues/42/comments`, []);

    expect(await fetchIssueComments(fake, ref)).toEqual({ ok: true, value: [] });
  });

  it('fails the whole endpoint on one malformed item', async () => {
    const fake = new FakeGitHub().route(`${BASE}/issues/42/comments`, [rawComment(1), { body: 'no id' }]);

    const result = await fetchIssueComments(fake, ref);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('InvalidResponse');
    expect(result.error.message).toMatch(/^\/repos\/octocat\/hello-world\/issues\/42\/comments item 1 at id: /);
  });
});

describe('fetchReviews', () => {
  it('maps submitted_at to createdAt', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42/reviews`, [rawReview(3, { state: 'APPROVED', body: '' })]);

    const result = await fetchReviews(fake, ref);

    expect(result).toEqual({
      ok: true,
      value: [{ id: 3, author: 'carol', createdAt: '2024-03-01T12:00:00Z', state: 'APPROVED', body: '' }],
    });
  });

  it('leaves createdAt null for a pending review', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42/reviews`, [
      rawReview(4, { state: 'PENDING', submitted_at: undefined }),
    ]);

    const result = await fetchReviews(fake, ref);

    expect(result.ok && result.value[0].createdAt).toBeNull();
  });

  it('rejects an unknown review state', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42/reviews`, [rawReview(5, { state: 'LGTM' })]);

    const result = await fetchReviews(fake, ref);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('InvalidResponse');
    expect(result.error.message).toMatch(/item 0 at state: /);
  });
});

describe('fetchReviewComments', () => {
  it('keeps file anchors and reply links', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42/comments`, [
      rawReviewComment(10),
      rawReviewComment(11, { line: null, in_reply_to_id: 10 }),
    ]);

    const result = await fetchReviewComments(fake, ref);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0]).toEqual({
      id: 10,
      author: 'dave',
      createdAt: '2024-03-01T13:00:00Z',
      body: 'Inline 10',
      path: 'src/index.ts',
      line: 1,
      inReplyToId: null,
      url: 'https://github.com/octocat/hello-world/pull/1#discussion_r10',
    });
    expect(result.value[1].line).toBeNull();
    expect(result.value[1].inReplyToId).toBe(10);
  });

  it('propagates a server error', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls/42/comments`, () => ({
      status: 500,
      headers: {},
      body: { message: 'Internal Server Error' },
    }));

    const result = await fetchReviewComments(fake, ref);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'ServerError', status: 500, message: 'Internal Server Error' },
    });
  });
});

describe('listPullRequests', () => {
  it('asks for the most recently updated PRs of the given state', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls`, [rawPR(3), rawPR(2)]);

    const pages: unknown[] = [];
    for await (const page of listPullRequests(fake, ref, { scope: 'open' })) {
      pages.push(page);
    }

    expect(fake.calls[0].query).toEqual({
      state: 'open',
      sort: 'updated',
      direction: 'desc',
      page: 1,
      per_page: 100,
    });
    expect(pages).toEqual([
      {
        ok: true,
        value: [
          { number: 3, title: 'PR 3', state: 'open', updatedAt: '2024-03-02T10:00:00Z' },
          { number: 2, title: 'PR 2', state: 'open', updatedAt: '2024-03-02T10:00:00Z' },
        ],
      },
    ]);
  });

  it('defaults to every state', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls`, []);

    for await (const page of listPullRequests(fake, ref)) {
      expect(page.ok).toBe(true);
    }

    expect(fake.calls[0].query.state).toBe('all');
  });

  it('yields one page at a time', async () => {
    const fake = new FakeGitHub().route(`${BASE}/pulls`, [5, 4, 3, 2, 1].map((n) => rawPR(n)));

    const pages = listPullRequests(fake, ref, { perPage: 2 });
    const first = await pages.next();

    expect(first.done).toBe(false);
    expect(fake.calls).toHaveLength(1);
  });
});

describe('checkRepository', () => {
  const repo = { owner: 'octocat', repo: 'hello-world' };

  it('returns the repository when it resolves', async () => {
    const fake = new FakeGitHub().route(BASE, { full_name: 'octocat/hello-world' });

    expect(await checkRepository(fake, repo)).toEqual({ ok: true, value: repo });
    expect(fake.calls).toEqual([{ path: BASE, query: {} }]);
  });

  it('returns NotFound for a missing repository', async () => {
    expect(await checkRepository(new FakeGitHub(), repo)).toEqual({
      ok: false,
      error: { kind: 'NotFound', status: 404, message: 'Not Found' },
    });
  });
});
