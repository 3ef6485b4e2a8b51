import { err, ok, type ApiError, type Result } from './errors.js';
import {
  fetchIssueComments,
  fetchPRMetadata,
  fetchReviewComments,
  fetchReviews,
  type FetchOptions,
} from './github.js';
import type { Transport } from './transport.js';
import type { Comment, ConversationRecord, ConversationSection, ParsedPR, PRMetadata, Review, ReviewComment } from './types.js';

/** Which part of the conversation failed, and how */
export interface SectionFailure {
  section: ConversationSection;
  error: ApiError;
}

export interface AssembleOptions extends FetchOptions {
  /** Run the four fetches concurrently (default) or one after another. */
  parallel?: boolean;
}

async function fetchSequentially(
  transport: Transport,
  ref: ParsedPR,
  options: FetchOptions,
): Promise<Result<ConversationRecord, SectionFailure>> {
  const metadata = await fetchPRMetadata(transport, ref, options);
  if (!metadata.ok) return err({ section: 'metadata', error: metadata.error });

  const comments = await fetchIssueComments(transport, ref, options);
  if (!comments.ok) return err({ section: 'comments', error: comments.error });

  const reviews = await fetchReviews(transport, ref, options);
  if (!reviews.ok) return err({ section: 'reviews', error: reviews.error });

  const reviewComments = await fetchReviewComments(transport, ref, options);
  if (!reviewComments.ok) return err({ section: 'reviewComments', error: reviewComments.error });

  return ok(buildRecord(ref, metadata.value, comments.value, reviews.value, reviewComments.value));
}

function settledValue<T>(outcome: PromiseSettledResult<T>): T {
  if (outcome.status === 'rejected') throw outcome.reason;
  return outcome.value;
}

async function fetchConcurrently(
  transport: Transport,
  ref: ParsedPR,
  options: FetchOptions,
): Promise<Result<ConversationRecord, SectionFailure>> {
  // Every request settles before a thrown fault surfaces.
  const settled = await Promise.allSettled([
    fetchPRMetadata(transport, ref, options),
    fetchIssueComments(transport, ref, options),
    fetchReviews(transport, ref, options),
    fetchReviewComments(transport, ref, options),
  ]);

  // Fixed section order, so the reported failure does not depend on which
  // request finished first.
  const metadata = settledValue(settled[0]);
  const comments = settledValue(settled[1]);
  const reviews = settledValue(settled[2]);
  const reviewComments = settledValue(settled[3]);

  if (!metadata.ok) return err({ section: 'metadata', error: metadata.error });
  if (!comments.ok) return err({ section: 'comments', error: comments.error });
  if (!reviews.ok) return err({ section: 'reviews', error: reviews.error });
  if (!reviewComments.ok) return err({ section: 'reviewComments', error: reviewComments.error });

  return ok(buildRecord(ref, metadata.value, comments.value, reviews.value, reviewComments.value));
}

function buildRecord(
  ref: ParsedPR,
  metadata: PRMetadata,
  comments: Comment[],
  reviews: Review[],
  reviewComments: ReviewComment[],
): ConversationRecord {
  return { prNumber: ref.prNumber, metadata, comments, reviews, reviewComments };
}

/**
 * Fetch and merge the full conversation of one PR.
 *
 * All-or-nothing: if any of the four endpoints fails, the result is that
 * failure and no record is produced. Items keep the order GitHub returned
 * them in; timestamps are passed through as GitHub formats them.
 *
 * Transport faults (network, timeout) are thrown, not returned.
 */
export async function assembleConversation(
  transport: Transport,
  ref: ParsedPR,
  options: AssembleOptions = {},
): Promise<Result<ConversationRecord, SectionFailure>> {
  const { parallel = true, ...fetchOptions } = options;
  return parallel
    ? fetchConcurrently(transport, ref, fetchOptions)
    : fetchSequentially(transport, ref, fetchOptions);
}
