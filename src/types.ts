/** Repository coordinates */
export interface RepoRef {
  owner: string;
  repo: string;
}

/** Parsed components from a GitHub PR URL, or a PR addressed by number */
export interface ParsedPR extends RepoRef {
  prNumber: number;
}

/** PR description and header fields */
export interface PRMetadata {
  number: number;
  title: string;
  author: string;
  createdAt: string;
  updatedAt: string;
  state: string;
  body: string;
  url: string;
  draft: boolean;
  mergedAt: string | null;
  baseBranch: string;
  headBranch: string;
}

/** A top-level comment on the PR conversation tab */
export interface Comment {
  id: number;
  author: string;
  createdAt: string;
  body: string;
  url: string;
}

export const REVIEW_STATES = [
  'APPROVED',
  'CHANGES_REQUESTED',
  'COMMENTED',
  'DISMISSED',
  'PENDING',
] as const;

export type ReviewState = (typeof REVIEW_STATES)[number];

/** A review verdict. `createdAt` is null while the review is still pending. */
export interface Review {
  id: number;
  author: string;
  createdAt: string | null;
  state: ReviewState;
  body: string;
}

/** An inline comment anchored to a file (and usually a line) in the diff */
export interface ReviewComment {
  id: number;
  author: string;
  createdAt: string;
  body: string;
  path: string;
  line: number | null;
  inReplyToId: number | null;
  url: string;
}

/** The complete conversation of one pull request */
export interface ConversationRecord {
  prNumber: number;
  metadata: PRMetadata;
  comments: Comment[];
  reviews: Review[];
  reviewComments: ReviewComment[];
}

export type ConversationSection = 'metadata' | 'comments' | 'reviews' | 'reviewComments';

/** One entry from the repository PR listing */
export interface PullRequestSummary {
  number: number;
  title: string;
  state: string;
  updatedAt: string;
}

/** PR state filter used by latest-N discovery */
export type PRScope = 'open' | 'closed' | 'all';

export type OutputFormat = 'md' | 'json';
