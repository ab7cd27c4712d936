import { RawItem } from "@/types";
import { Comment, Submission } from "snoowrap";

const authorName = (author: { name?: string } | null | undefined): string =>
  author?.name || "[deleted]";

/**
 * Maps a Snoowrap Submission object to a raw post item
 * @param submission - The Snoowrap Submission object containing Reddit post data
 * @returns A RawItem with the post's text and engagement
 */
export const mapSubmissionToRawItem = (submission: Submission): RawItem => {
  return {
    id: submission.id,
    kind: "post",
    title: submission.title,
    body: submission.selftext || "",
    author: authorName(submission.author),
    subreddit: submission.subreddit.display_name,
    score: submission.score,
    numComments: submission.num_comments,
    createdUtc: submission.created_utc,
    permalink: submission.permalink,
  };
};

/**
 * Maps a Snoowrap Comment object to a raw comment item
 * @param comment - The Snoowrap Comment object
 * @returns A RawItem without title or comment count
 */
export const mapCommentToRawItem = (comment: Comment): RawItem => {
  return {
    id: comment.id,
    kind: "comment",
    title: null,
    body: comment.body || "",
    author: authorName(comment.author),
    subreddit: comment.subreddit.display_name,
    score: comment.score,
    numComments: null,
    createdUtc: comment.created_utc,
    permalink: comment.permalink,
  };
};

/**
 * Flattens an already-fetched comment tree breadth first, top-level comments
 * before their replies, and keeps at most `limit` comments.
 */
export const flattenComments = (
  comments: readonly Comment[],
  limit: number
): Comment[] => {
  const flat: Comment[] = [];
  const queue: Comment[] = [...comments];
  while (queue.length > 0 && flat.length < limit) {
    const comment = queue.shift();
    if (!comment) break;
    flat.push(comment);
    if (Array.isArray(comment.replies)) queue.push(...comment.replies);
  }
  return flat;
};
