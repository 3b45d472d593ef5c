import { describe, it, expect } from 'vitest';
import {
  Class,
  Container,
  Div,
  Em,
  Hr,
  InvalidArgumentError,
  Li,
  P,
  Strong,
  TypeMismatchError,
  structurallyEqual,
} from '../../src/index';
import { asElement, compact } from '../helpers/tree';

describe('operators (PLUS)', () => {
  it('should render in operand order', () => {
    const em = Em('emphasized');
    const strong = Strong('strong');

    expect(String(em.plus(strong))).toBe(
      '<em>\n  emphasized\n</em>\n<strong>\n  strong\n</strong>'
    );
    expect(String(strong.plus(em))).toBe(
      '<strong>\n  strong\n</strong>\n<em>\n  emphasized\n</em>'
    );
    expect(String(em.plus(Hr()))).toBe('<em>\n  emphasized\n</em>\n<hr>');
  });

  it('should append into the left operand given it is a container', () => {
    const group = new Container(P('1'));

    const result = group.plus(P('2'));

    expect(result).toBe(group);
    expect(compact(result)).toBe('<p>1</p><p>2</p>');
  });

  it('should prepend into the right operand given it is a container', () => {
    const group = new Container(P('2'));

    const result = P('1').plus(group);

    expect(result).toBe(group);
    expect(compact(result)).toBe('<p>1</p><p>2</p>');
  });

  it('should stay one level deep given a chain', () => {
    const chain = P('a').plus(P('b')).plus(P('c'));

    expect(chain.length).toBe(3);
    expect(chain.children.every((child) => child.kind === 'element')).toBe(true);
  });

  it('should wrap strings as text given a string operand', () => {
    expect(compact(P('a').plus('tail'))).toBe('<p>a</p>tail');
  });

  it('should throw type-mismatch given an unsupported operand', () => {
    const p = P('a');
    expect(() => Reflect.apply(p.plus, p, [{}])).toThrow(TypeMismatchError);
    expect(p.parent).toBeNull();
  });
});

describe('operators (TIMES)', () => {
  it('should hold count structurally equal copies', () => {
    const item = Li('x', Class('row'));

    const copies = item.times(3);

    expect(copies.length).toBe(3);
    for (const copy of copies.children) {
      expect(copy).not.toBe(item);
      expect(structurallyEqual(copy, item)).toBe(true);
    }
    expect(item.parent).toBeNull();
  });

  it('should copy attributes independently', () => {
    const copies = Div(Class('a')).times(2);

    asElement(copies.get(0)).set('class', 'b');

    expect(asElement(copies.get(1)).get('class')).toBe('a');
  });

  it('should render the repeated element', () => {
    expect(String(Strong('strong').times(2))).toBe(
      '<strong>\n  strong\n</strong>\n<strong>\n  strong\n</strong>'
    );
  });

  it('should throw invalid-argument given a count below one', () => {
    expect(() => P('a').times(0)).toThrow(InvalidArgumentError);
    expect(() => P('a').times(-2)).toThrow('Repeat count must be positive. Got -2.');
  });

  it('should throw type-mismatch given a count that is not an integer', () => {
    expect(() => P('a').times(2.5)).toThrow(
      'Repeat count must be an integer. Got 2.5.'
    );
    expect(() => P('a').times(Number.NaN)).toThrow(TypeMismatchError);
  });
});
