import { InvalidInputError } from "./errors";

const POST_ID = /^[a-z0-9]{2,12}$/i;

/**
 * Extracts the submission id from a full Reddit URL or a permalink, e.g.
 * `https://www.reddit.com/r/SaaS/comments/1abc2d/some_title/` or
 * `/r/SaaS/comments/1abc2d/`.
 */
export function extractPostId(postUrl: string): string {
  const trimmed = postUrl.trim();
  const marker = "/comments/";
  const at = trimmed.indexOf(marker);
  if (at < 0) {
    throw new InvalidInputError("Invalid Reddit post URL", [
      `"${trimmed}" does not contain ${marker}<id>`,
    ]);
  }

  const id = trimmed.slice(at + marker.length).split(/[/?#]/)[0] ?? "";
  if (!POST_ID.test(id)) {
    throw new InvalidInputError("Invalid Reddit post URL", [
      `"${id}" is not a valid post id`,
    ]);
  }
  return id.toLowerCase();
}
