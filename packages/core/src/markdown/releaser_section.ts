/**
 * The machine-owned part of a release PR body.
 *
 * Everything between the two markers belongs to the release tooling; any
 * text outside them was written by humans and is preserved as is.
 */

export const RELEASER_START = '<!-- Releaser:start -->';
export const RELEASER_END = '<!-- Releaser:end -->';

export function getReleaserSection(body: string): string {
  const start = body.indexOf(RELEASER_START);
  const end = body.indexOf(RELEASER_END);
  if (start === -1 || end === -1) {
    return '';
  }
  return body.slice(start + RELEASER_START.length, end).trim();
}

export function patchReleaserSection(body: string, text: string): string {
  const start = body.indexOf(RELEASER_START);
  const end = body.indexOf(RELEASER_END);
  if (start === -1 || end === -1) {
    return `${RELEASER_START}\n${text}\n${RELEASER_END}\n${body}`;
  }
  return `${body.slice(0, start)}${RELEASER_START}\n${text}\n${RELEASER_END}\n${body.slice(end + RELEASER_END.length)}`;
}
