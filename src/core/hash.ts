/**
 * Content hashing used to detect requirement edits made without
 * regenerating the footer hash.
 */

import { createHash } from 'crypto';

/**
 * Number of hex characters kept from the digest.
 */
export const HASH_LENGTH = 8;

export const HASH_VALUE_PATTERN = /^[0-9a-fA-F]{8}$/;

/**
 * Normalize body text: unify line endings, strip trailing whitespace,
 * drop leading/trailing blank lines and collapse blank runs.
 */
export function normalizeBody(body: string): string {
  const lines = body.replace(/\r\n?/g, '\n').split('\n').map((l) => l.trimEnd());

  while (lines.length > 0 && lines[0] === '') lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();

  const result: string[] = [];
  for (const line of lines) {
    if (line === '' && result[result.length - 1] === '') continue;
    result.push(line);
  }
  return result.join('\n');
}

/**
 * Normalize one assertion into `{label}. {text}` on a single line.
 */
export function normalizeAssertion(label: string, text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return `${label}. ${flat}`;
}

/**
 * Hash of a requirement's title, body and assertions (in file order).
 */
export function computeContentHash(
  title: string,
  body: string,
  assertions: readonly { label: string; text: string }[]
): string {
  const content = [
    title.trim(),
    normalizeBody(body),
    ...assertions.map((a) => normalizeAssertion(a.label, a.text)),
  ].join('\n');

  return createHash('sha256').update(content, 'utf8').digest('hex').slice(0, HASH_LENGTH);
}
