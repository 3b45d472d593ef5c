/**
 * Tag metadata
 *
 * Maps a tag identifier to the name that is emitted and to whether the tag is
 * void (never closed, never given children).
 */

import { InvalidArgumentError } from '../common/errors';

export interface TagMetadata {
  /** Canonical tag name as rendered */
  readonly name: string;
  /** Void tags render no closing tag and accept no children */
  readonly void: boolean;
}

// HTML5 void elements that don't have closing tags
export const VOID_ELEMENTS: ReadonlySet<string> = new Set([
  'area',
  'base',
  'br',
  'col',
  'embed',
  'hr',
  'img',
  'input',
  'link',
  'meta',
  'param',
  'source',
  'track',
  'wbr',
]);

// Identifiers that render under another tag name
const TAG_ALIASES = new Map<string, string>([['paragraph', 'p']]);

const metadataCache = new Map<string, TagMetadata>();
const MAX_METADATA_CACHE_SIZE = 512;

/**
 * Look up the metadata for a tag identifier. Identifiers are case-insensitive;
 * declarations such as `!DOCTYPE html` are kept verbatim and are always void.
 */
export function getTagMetadata(tag: string): TagMetadata {
  const cached = metadataCache.get(tag);
  if (cached) return cached;

  const trimmed = tag.trim();
  if (!trimmed) {
    throw new InvalidArgumentError('A tag name cannot be empty.');
  }

  let meta: TagMetadata;
  if (trimmed.startsWith('!')) {
    meta = { name: trimmed, void: true };
  } else {
    const lower = trimmed.toLowerCase();
    const name = TAG_ALIASES.get(lower) ?? lower;
    meta = { name, void: VOID_ELEMENTS.has(name) };
  }

  if (metadataCache.size < MAX_METADATA_CACHE_SIZE) metadataCache.set(tag, meta);
  return meta;
}

export function isVoidTag(tag: string): boolean {
  return getTagMetadata(tag).void;
}
