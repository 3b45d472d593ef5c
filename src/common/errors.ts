/**
 * Common call contracts: error types raised by tree operations
 *
 * Every failure is reported synchronously at the point of the operation, and
 * the operation leaves the target node as it was.
 */

export type MarkupErrorCode =
  | 'INVALID_ARGUMENT'
  | 'OUT_OF_BOUNDS'
  | 'NOT_FOUND'
  | 'TYPE_MISMATCH';

export class MarkupError extends Error {
  readonly code: MarkupErrorCode;
  constructor(code: MarkupErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'MarkupError';
    Object.setPrototypeOf(this, MarkupError.prototype);
  }
}

/** Unrecognized argument shape, non-positive repeat count, illegal composition */
export class InvalidArgumentError extends MarkupError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/** Integer index outside the child sequence */
export class OutOfBoundsError extends MarkupError {
  readonly index: number;
  readonly length: number;
  constructor(index: number, length: number) {
    super(
      'OUT_OF_BOUNDS',
      `Index ${index} is out of range for ${length} child node${length === 1 ? '' : 's'}.`
    );
    this.index = index;
    this.length = length;
    this.name = 'OutOfBoundsError';
    Object.setPrototypeOf(this, OutOfBoundsError.prototype);
  }
}

/** Key access for an attribute the element does not have */
export class NotFoundError extends MarkupError {
  readonly key: string;
  constructor(key: string) {
    super('NOT_FOUND', `Attribute '${key}' does not exist in element.`);
    this.key = key;
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** Value of the wrong kind for the slot it is assigned to */
export class TypeMismatchError extends MarkupError {
  constructor(message: string) {
    super('TYPE_MISMATCH', message);
    this.name = 'TypeMismatchError';
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

/** Short description of a runtime value for error messages */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  return typeof value;
}
