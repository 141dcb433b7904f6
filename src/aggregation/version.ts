/**
 * Reduces a tag name to its digits, dot-separated:
 *   release-0-0-1  →  0.0.1
 *   v0.3.0         →  0.3.0
 */
export function normalizeVersion(tag: string): string {
  return tag.replace(/[^0-9]+/g, ' ').trim().replace(/ /g, '.');
}

/** Splits stdin content (e.g. `git tag` output) into ordered tag names. */
export function parseTagList(input: string): string[] {
  return input
    .split('\n')
    .map(line => line.trim())
    .filter(Boolean);
}
