/**
 * Attribute-name normalization
 *
 * Keyword-style keys (`class_`, `data_row`, `acceptCharset`) are turned into
 * canonical HTML attribute names here, once, before anything reaches an
 * element's attribute map.
 */

import { InvalidArgumentError } from '../common/errors';

const NAME_ALIASES = new Map<string, string>([
  ['className', 'class'],
  ['htmlFor', 'for'],
]);

const NAME_CACHE = new Map<string, string>();
const MAX_NAME_CACHE_SIZE = 512;

const CSS_PROP_CACHE = new Map<string, string>();
const MAX_CSS_PROP_CACHE_SIZE = 512;

const EDGE_UNDERSCORES_RE = /^_+|_+$/g;
const CAMEL_BOUNDARY_RE = /([a-z0-9])([A-Z])/g;
const EDGE_DASHES_RE = /^-+|-+$/g;

/**
 * Convert a keyword-form key into its canonical attribute name.
 *
 * @example
 * ```ts
 * normalizeAttributeName('class_');        // 'class'
 * normalizeAttributeName('data_row');      // 'data-row'
 * normalizeAttributeName('acceptCharset'); // 'accept-charset'
 * ```
 */
export function normalizeAttributeName(key: string): string {
  const cached = NAME_CACHE.get(key);
  if (cached !== undefined) return cached;

  let name = key.trim().replace(EDGE_UNDERSCORES_RE, '');
  name = NAME_ALIASES.get(name) ?? name;
  name = name
    .replace(CAMEL_BOUNDARY_RE, '$1-$2')
    .replace(/_/g, '-')
    .toLowerCase()
    .replace(EDGE_DASHES_RE, '');

  if (!name) {
    throw new InvalidArgumentError(
      `'${key}' does not name an attribute.`
    );
  }

  if (NAME_CACHE.size < MAX_NAME_CACHE_SIZE) NAME_CACHE.set(key, name);
  return name;
}

/** camelCase / snake_case style key -> CSS property name */
export function cssPropertyName(key: string): string {
  const cached = CSS_PROP_CACHE.get(key);
  if (cached !== undefined) return cached;
  const prop = key
    .replace(/[A-Z]/g, (m) => `-${m.toLowerCase()}`)
    .replace(/_/g, '-');
  if (CSS_PROP_CACHE.size < MAX_CSS_PROP_CACHE_SIZE) {
    CSS_PROP_CACHE.set(key, prop);
  }
  return prop;
}
