/**
 * Attribute rendering
 */

import type { AttributeValue } from '../attributes/attribute';
import { escapeAttr } from './escape';

/**
 * How a presence-only attribute is written:
 * - `short`: `required`
 * - `empty`: `required=""`
 * - `repeated`: `required="required"`
 */
export type BooleanAttributeStyle = 'short' | 'empty' | 'repeated';

export function renderAttribute(
  name: string,
  value: AttributeValue,
  booleanStyle: BooleanAttributeStyle = 'short'
): string {
  if (value !== true) return `${name}="${escapeAttr(value)}"`;
  switch (booleanStyle) {
    case 'short':
      return name;
    case 'empty':
      return `${name}=""`;
    case 'repeated':
      return `${name}="${name}"`;
  }
}

/**
 * Render an attribute list in insertion order. Each entry is preceded by a
 * single space so the result can be appended straight after the tag name.
 */
export function renderAttrs(
  attributes: Iterable<{ readonly name: string; readonly value: AttributeValue }>,
  booleanStyle: BooleanAttributeStyle = 'short'
): string {
  let result = '';
  for (const attr of attributes) {
    result += ` ${renderAttribute(attr.name, attr.value, booleanStyle)}`;
  }
  return result;
}
