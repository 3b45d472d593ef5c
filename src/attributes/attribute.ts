/**
 * Attribute model
 *
 * An attribute is a canonical name plus either a string value or `true`
 * (presence only). Names are expected to be normalized already; see
 * `normalizeAttributeName` for the keyword-form boundary.
 */

import { TypeMismatchError, describeValue } from '../common/errors';
import { getScopeStack } from '../scope/stack';
import { renderAttribute } from '../render/attrs';

export type AttributeValue = string | true;

/** What callers may hand over as an attribute value */
export type AttributeInput = string | number | true;

export function toAttributeValue(name: string, value: unknown): AttributeValue {
  if (value === true) return true;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw new TypeMismatchError(
    `Attribute '${name}' takes a string, a finite number or true. Got ${describeValue(value)}.`
  );
}

function terminateDeclarations(css: string): string {
  const trimmed = css.trim();
  if (!trimmed || trimmed.endsWith(';')) return trimmed;
  return `${trimmed};`;
}

/**
 * Merge rule used when an attribute is added under a name that already
 * exists:
 * - `style` concatenates declarations, each terminated by `;`
 * - any other valued attribute joins values with a single space
 * - a presence flag merged with a value yields the value
 */
export function mergeAttributeValues(
  name: string,
  prev: AttributeValue,
  next: AttributeValue
): AttributeValue {
  if (prev === true) return next;
  if (next === true) return prev;
  if (name === 'style') {
    return terminateDeclarations(prev) + terminateDeclarations(next);
  }
  if (!prev) return next;
  if (!next) return prev;
  return `${prev} ${next}`;
}

export class Attribute {
  readonly name: string;
  private _value: AttributeValue;

  constructor(name: string, value: AttributeInput = true) {
    this.name = name;
    this._value = toAttributeValue(name, value);
    getScopeStack().register(this);
  }

  get value(): AttributeValue {
    return this._value;
  }

  set value(value: AttributeInput) {
    this._value = toAttributeValue(this.name, value);
  }

  get isBoolean(): boolean {
    return this._value === true;
  }

  /** Fold a later value for the same name into this one */
  merge(other: Attribute | AttributeInput): this {
    const next =
      other instanceof Attribute
        ? other.value
        : toAttributeValue(this.name, other);
    this._value = mergeAttributeValues(this.name, this._value, next);
    return this;
  }

  equals(other: Attribute): boolean {
    return this.name === other.name && this._value === other._value;
  }

  clone(): Attribute {
    return new Attribute(this.name, this._value);
  }

  toString(): string {
    return renderAttribute(this.name, this._value);
  }
}
