import { z } from 'zod';
import { REVIEW_STATES } from './types.js';
import type { Comment, PRMetadata, PullRequestSummary, Review, ReviewComment } from './types.js';

/**
 * Raw GitHub REST payloads. Only the fields prscribe reads are declared;
 * everything else GitHub sends is stripped. Fields GitHub may omit or null
 * are `nullish` and get explicit defaults in the normalizers below.
 */

/** `user` is null for deleted accounts */
const UserSchema = z.object({ login: z.string() }).nullish();

const BranchRefSchema = z.object({ ref: z.string() }).nullish();

export const RawPullRequestSchema = z.object({
  number: z.number().int().positive(),
  title: z.string().nullish(),
  user: UserSchema,
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  state: z.string().nullish(),
  body: z.string().nullish(),
  html_url: z.string().nullish(),
  draft: z.boolean().nullish(),
  merged_at: z.string().nullish(),
  base: BranchRefSchema,
  head: BranchRefSchema,
});

export const RawIssueCommentSchema = z.object({
  id: z.number().int(),
  user: UserSchema,
  created_at: z.string().nullish(),
  body: z.string().nullish(),
  html_url: z.string().nullish(),
});

export const RawReviewSchema = z.object({
  id: z.number().int(),
  user: UserSchema,
  submitted_at: z.string().nullish(),
  state: z.enum(REVIEW_STATES),
  body: z.string().nullish(),
});

export const RawReviewCommentSchema = z.object({
  id: z.number().int(),
  user: UserSchema,
  created_at: z.string().nullish(),
  body: z.string().nullish(),
  path: z.string().nullish(),
  line: z.number().int().nullish(),
  in_reply_to_id: z.number().int().nullish(),
  html_url: z.string().nullish(),
});

export type RawPullRequest = z.infer<typeof RawPullRequestSchema>;
export type RawIssueComment = z.infer<typeof RawIssueCommentSchema>;
export type RawReview = z.infer<typeof RawReviewSchema>;
export type RawReviewComment = z.infer<typeof RawReviewCommentSchema>;

function authorOf(user: { login: string } | null | undefined): string {
  return user?.login ?? 'unknown';
}

export function toPRMetadata(pr: RawPullRequest): PRMetadata {
  return {
    number: pr.number,
    title: pr.title ?? '',
    author: authorOf(pr.user),
    createdAt: pr.created_at ?? '',
    updatedAt: pr.updated_at ?? '',
    state: pr.state ?? '',
    body: pr.body ?? '',
    url: pr.html_url ?? '',
    draft: pr.draft ?? false,
    mergedAt: pr.merged_at ?? null,
    baseBranch: pr.base?.ref ?? '',
    headBranch: pr.head?.ref ?? '',
  };
}

export function toPullRequestSummary(pr: RawPullRequest): PullRequestSummary {
  return {
    number: pr.number,
    title: pr.title ?? '',
    state: pr.state ?? '',
    updatedAt: pr.updated_at ?? '',
  };
}

export function toComment(comment: RawIssueComment): Comment {
  return {
    id: comment.id,
    author: authorOf(comment.user),
    createdAt: comment.created_at ?? '',
    body: comment.body ?? '',
    url: comment.html_url ?? '',
  };
}

export function toReview(review: RawReview): Review {
  return {
    id: review.id,
    author: authorOf(review.user),
    createdAt: review.submitted_at ?? null,
    state: review.state,
    body: review.body ?? '',
  };
}

export function toReviewComment(comment: RawReviewComment): ReviewComment {
  return {
    id: comment.id,
    author: authorOf(comment.user),
    createdAt: comment.created_at ?? '',
    body: comment.body ?? '',
    path: comment.path ?? '',
    line: comment.line ?? null,
    inReplyToId: comment.in_reply_to_id ?? null,
    url: comment.html_url ?? '',
  };
}
