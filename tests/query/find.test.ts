import { describe, it, expect } from 'vitest';
import {
  Class,
  Comment,
  ConditionalComment,
  Container,
  Div,
  H1,
  Id,
  Li,
  P,
  Span,
  Text,
  Ul,
  find,
  matches,
  structurallyEqual,
  toQuery,
} from '../../src/index';
import { asText } from '../helpers/tree';

function buildTree() {
  return Div(
    Id('root'),
    H1('Title'),
    P('First paragraph', Class('lead')),
    P('Second paragraph'),
    Ul(Li('one'), Li('two'))
  );
}

describe('find (SUBSTRING)', () => {
  it('should return every text node containing the string in document order', () => {
    const found = buildTree().find('paragraph');

    expect(found.map((node) => asText(node).content)).toEqual([
      'First paragraph',
      'Second paragraph',
    ]);
  });

  it('should return nothing given no match', () => {
    expect(buildTree().find('missing')).toEqual([]);
  });
});

describe('find (NODE PATTERN)', () => {
  it('should match by tag alone given a childless pattern', () => {
    const tree = buildTree();

    expect(tree.find(P())).toEqual([tree.get(1), tree.get(2)]);
  });

  it('should include the root given it matches', () => {
    const tree = buildTree();

    expect(tree.find(Div())).toEqual([tree]);
  });

  it('should match attributes partially', () => {
    const tree = buildTree();

    expect(tree.find(P(Class('lead')))).toEqual([tree.get(1)]);
    expect(tree.find(Div(Id('other')))).toEqual([]);
  });

  it('should require equal children given a pattern with children', () => {
    const tree = buildTree();

    expect(tree.find(P('Second paragraph'))).toEqual([tree.get(2)]);
    expect(tree.find(P('Second'))).toEqual([]);
  });

  it('should match exact content given a text pattern', () => {
    const tree = buildTree();

    const [one] = tree.find(new Text('one'));

    expect(asText(one).content).toBe('one');
    expect(one.parent?.kind).toBe('element');
  });
});

describe('find (QUERY)', () => {
  it('should return every text node given an empty text query', () => {
    const found = buildTree().find({ kind: 'text' });

    expect(found.map((node) => asText(node).content)).toEqual([
      'Title',
      'First paragraph',
      'Second paragraph',
      'one',
      'two',
    ]);
  });

  it('should normalize tag and attribute names', () => {
    const tree = buildTree();

    expect(find(tree, { kind: 'element', tag: 'LI' })).toHaveLength(2);
    expect(
      find(tree, { kind: 'element', tag: 'p', attributes: { class_: 'lead' } })
    ).toEqual([tree.get(1)]);
  });

  it('should filter comments by condition', () => {
    const tree = Div(new Comment('note'), ConditionalComment('IE 8', 'legacy'));

    expect(tree.find({ kind: 'comment' })).toHaveLength(2);
    expect(tree.find({ kind: 'comment', condition: 'IE 8' })).toEqual([
      tree.get(1),
    ]);
  });

  it('should find containers', () => {
    const group = new Container(P('a'));

    expect(group.find({ kind: 'container' })).toEqual([group]);
    expect(group.find({ kind: 'container', children: [] })).toEqual([]);
  });
});

describe('find (HELPERS)', () => {
  it('should set children only given a pattern that has them', () => {
    expect(toQuery(P())).toEqual({ kind: 'element', tag: 'p', attributes: {} });
    expect(toQuery(new Comment())).toEqual({ kind: 'comment' });
    expect(toQuery('x')).toEqual({ kind: 'substring', text: 'x' });

    const query = toQuery(P('x', Class('c')));
    expect(query.kind === 'element' && query.children?.length).toBe(1);
  });

  it('should compare attribute sets regardless of order', () => {
    expect(
      structurallyEqual(
        Div({ id: 'a', title: 'b' }, P('x')),
        Div({ title: 'b', id: 'a' }, P('x'))
      )
    ).toBe(true);
    expect(structurallyEqual(P('a'), P('b'))).toBe(false);
    expect(structurallyEqual(P('a'), Span('a'))).toBe(false);
    expect(structurallyEqual(P('a'), P('a', Class('x')))).toBe(false);
  });

  it('should test a single node given matches', () => {
    expect(matches(new Text('xyz'), 'y')).toBe(true);
    expect(matches(P('xyz'), 'y')).toBe(false);
  });
});
