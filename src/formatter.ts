import type { ConversationRecord, Review, ReviewComment } from './types.js';

function reviewHeading(review: Review): string {
  return `### ${review.author} - ${review.createdAt ?? 'pending'}\n`;
}

function reviewCommentHeading(comment: ReviewComment): string {
  const reply = comment.inReplyToId !== null ? ` (reply to ${comment.inReplyToId})` : '';
  return `### ${comment.author} - ${comment.createdAt}${reply}\n`;
}

/**
 * Render a conversation as a Markdown document.
 *
 * Structure:
 *   # PR #{number}: {title}
 *   Author / Created / Updated / State (and URL when known)
 *   ## Description      (omitted when the PR has no body)
 *   ## Comments         (omitted when empty; same for the sections below)
 *   ## Reviews
 *   ## Review Comments
 */
export function formatConversationMarkdown(record: ConversationRecord): string {
  const { metadata } = record;
  const md: string[] = [];

  md.push(`# PR #${record.prNumber}: ${metadata.title}\n`);
  md.push(`**Author:** ${metadata.author}`);
  md.push(`**Created:** ${metadata.createdAt}`);
  md.push(`**Updated:** ${metadata.updatedAt}`);
  if (metadata.url) {
    md.push(`**URL:** ${metadata.url}`);
  }
  md.push(`**State:** ${metadata.state}\n`);

  if (metadata.body) {
    md.push('## Description\n');
    md.push(`${metadata.body}\n`);
  }

  if (record.comments.length > 0) {
    md.push('## Comments\n');
    for (const comment of record.comments) {
      md.push(`### ${comment.author} - ${comment.createdAt}\n`);
      md.push(`${comment.body}\n`);
    }
  }

  if (record.reviews.length > 0) {
    md.push('## Reviews\n');
    for (const review of record.reviews) {
      md.push(reviewHeading(review));
      md.push(`**State:** ${review.state}\n`);
      if (review.body) {
        md.push(`${review.body}\n`);
      }
    }
  }

  if (record.reviewComments.length > 0) {
    md.push('## Review Comments\n');
    for (const comment of record.reviewComments) {
      md.push(reviewCommentHeading(comment));
      md.push(`**Path:** ${comment.path}`);
      md.push(`**Line:** ${comment.line ?? 'outdated'}\n`);
      md.push(`${comment.body}\n`);
    }
  }

  return md.join('\n');
}

export function formatConversationJson(record: ConversationRecord): string {
  return JSON.stringify(record, null, 2) + '\n';
}
