/**
 * Prerelease channel derivation.
 *
 * Non-main branches publish prereleases whose channel is derived from the
 * branch name:
 *
 *   feature/foo-Bar/baz   →  foo-bar
 *   hotfix                →  hotfix
 *   feat/My_Branch!/x     →  mybranch
 *
 * The name is lowercased; when it has the shape `<anything>/<segment>/<rest>`
 * the segment is used (the match is greedy, so with several slashes it is
 * the last segment that is still followed by one); finally every character
 * outside `[a-z0-9.-]` is dropped. Nothing is validated: a name such as
 * `a//b` yields an empty channel.
 */

const NESTED_SEGMENT_RE = /^.*\/([^/]*)\/.*$/;
const DISALLOWED_CHANNEL_CHARS_RE = /[^a-z0-9.-]/g;

/**
 * Pick the branch segment a channel is named after (before sanitizing).
 */
export function channelSegment(branch: string): string {
  const lowered = branch.toLowerCase();
  const match = NESTED_SEGMENT_RE.exec(lowered);
  return match ? match[1] : lowered;
}

export function sanitizeChannel(value: string): string {
  return value.replace(DISALLOWED_CHANNEL_CHARS_RE, "");
}

export function deriveChannel(branch: string): string {
  return sanitizeChannel(channelSegment(branch));
}
