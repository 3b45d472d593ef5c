/**
 * Markup escaping
 *
 * Text escaping is cached for short strings, since the same labels tend to
 * repeat across a document. The cache is bounded and can be cleared between
 * renders in long-running processes.
 */

const escapeCache = new Map<string, string>();
const MAX_CACHE_SIZE = 256;
const MAX_CACHED_LENGTH = 64;

const TEXT_ESCAPE_TEST_RE = /[&<>]/;
const TEXT_ESCAPE_RE = /[&<>]/g;
const ATTR_ESCAPE_TEST_RE = /[&"'<>]/;
const ATTR_ESCAPE_RE = /[&"'<>]/g;

function mapTextEscape(ch: string): string {
  switch (ch) {
    case '&':
      return '&amp;';
    case '<':
      return '&lt;';
    default:
      return '&gt;';
  }
}

function mapAttrEscape(ch: string): string {
  switch (ch) {
    case '&':
      return '&amp;';
    case '"':
      return '&quot;';
    case "'":
      return '&#x27;';
    case '<':
      return '&lt;';
    default:
      return '&gt;';
  }
}

/**
 * Clear the escape cache.
 */
export function clearEscapeCache(): void {
  escapeCache.clear();
}

/** Current number of cached text escapes */
export function escapeCacheSize(): number {
  return escapeCache.size;
}

/**
 * Escape `&`, `<` and `>` in text content
 */
export function escapeText(text: string): string {
  const useCache = text.length <= MAX_CACHED_LENGTH;
  if (useCache) {
    const cached = escapeCache.get(text);
    if (cached !== undefined) return cached;
  }

  const result = TEXT_ESCAPE_TEST_RE.test(text)
    ? text.replace(TEXT_ESCAPE_RE, mapTextEscape)
    : text;

  if (useCache && escapeCache.size < MAX_CACHE_SIZE) {
    escapeCache.set(text, result);
  }
  return result;
}

/**
 * Escape `&`, quotes, `<` and `>` in attribute values
 */
export function escapeAttr(value: string): string {
  if (!ATTR_ESCAPE_TEST_RE.test(value)) return value;
  return value.replace(ATTR_ESCAPE_RE, mapAttrEscape);
}
