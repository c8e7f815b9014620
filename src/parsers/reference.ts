import { InvalidReferenceError } from '../errors.js';

const STATUS_URL_RE = /^(?:https?:\/\/)?(?:www\.|mobile\.)?(?:x|twitter)\.com\/(?:i|[a-zA-Z0-9_]+)\/status(?:es)?\/(\d+)/;

/**
 * Resolve a post reference to its canonical numeric id.
 * Accepts a bare id or an x.com / twitter.com status URL.
 */
export function parsePostReference(input: string): string {
  const trimmed = input.trim();
  if (/^\d+$/.test(trimmed)) return trimmed;

  const match = trimmed.match(STATUS_URL_RE);
  if (match) return match[1];

  throw new InvalidReferenceError(input);
}
