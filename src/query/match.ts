/**
 * Structural search over a markup tree
 *
 * Queries are plain data. A node can stand in for a query; it is converted
 * with `toQuery`, which keeps its tag, attributes and (when present) its
 * children.
 */

import type { AttributeValue } from '../attributes/attribute';
import { normalizeAttributeName } from '../attributes/normalize';
import type { MarkupNode } from '../tree/nodes';
import { getTagMetadata } from '../tags/metadata';

export interface SubstringQuery {
  readonly kind: 'substring';
  readonly text: string;
}

export interface TextQuery {
  readonly kind: 'text';
  /** Missing or empty matches every text node */
  readonly content?: string;
}

export interface ElementQuery {
  readonly kind: 'element';
  readonly tag: string;
  /** Partial: listed attributes must be present with an equal value */
  readonly attributes?: Readonly<Record<string, AttributeValue>>;
  /** Exact: the candidate's children must structurally equal these */
  readonly children?: readonly MarkupNode[];
}

export interface CommentQuery {
  readonly kind: 'comment';
  readonly condition?: string;
  readonly children?: readonly MarkupNode[];
}

export interface ContainerQuery {
  readonly kind: 'container';
  readonly children?: readonly MarkupNode[];
}

export type Query =
  | SubstringQuery
  | TextQuery
  | ElementQuery
  | CommentQuery
  | ContainerQuery;

export type QueryInput = Query | MarkupNode | string;

type Predicate = (node: MarkupNode) => boolean;

export function toQuery(pattern: MarkupNode | string): Query {
  if (typeof pattern === 'string') return { kind: 'substring', text: pattern };
  switch (pattern.kind) {
    case 'text':
      return { kind: 'text', content: pattern.content };
    case 'element': {
      const attributes: Record<string, AttributeValue> = {};
      for (const attr of pattern.attributes.values()) {
        attributes[attr.name] = attr.value;
      }
      return {
        kind: 'element',
        tag: pattern.tag,
        attributes,
        ...childrenOf(pattern.children),
      };
    }
    case 'comment':
      return {
        kind: 'comment',
        ...(pattern.condition ? { condition: pattern.condition } : {}),
        ...childrenOf(pattern.children),
      };
    case 'container':
      return { kind: 'container', ...childrenOf(pattern.children) };
  }
}

function childrenOf(children: readonly MarkupNode[]): {
  children?: readonly MarkupNode[];
} {
  return children.length > 0 ? { children: [...children] } : {};
}

function sameChildren(
  a: readonly MarkupNode[],
  b: readonly MarkupNode[]
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!structurallyEqual(a[i], b[i])) return false;
  }
  return true;
}

/** Deep equality of kind, tag, condition, attribute set, text and children */
export function structurallyEqual(a: MarkupNode, b: MarkupNode): boolean {
  if (a === b) return true;
  switch (a.kind) {
    case 'text':
      return b.kind === 'text' && a.content === b.content;
    case 'element': {
      if (b.kind !== 'element' || a.tag !== b.tag) return false;
      if (a.attributes.size !== b.attributes.size) return false;
      for (const [name, attr] of a.attributes) {
        if (b.attributes.get(name)?.value !== attr.value) return false;
      }
      return sameChildren(a.children, b.children);
    }
    case 'comment':
      return (
        b.kind === 'comment' &&
        (a.condition ?? '') === (b.condition ?? '') &&
        sameChildren(a.children, b.children)
      );
    case 'container':
      return b.kind === 'container' && sameChildren(a.children, b.children);
  }
}

function compile(query: Query): Predicate {
  switch (query.kind) {
    case 'substring': {
      const { text } = query;
      return (node) => node.kind === 'text' && node.content.includes(text);
    }

    case 'text': {
      const { content } = query;
      if (!content) return (node) => node.kind === 'text';
      return (node) => node.kind === 'text' && node.content === content;
    }

    case 'element': {
      const tag = getTagMetadata(query.tag).name;
      const wanted = Object.entries(query.attributes ?? {}).map(
        ([name, value]): [string, AttributeValue] => [
          normalizeAttributeName(name),
          value,
        ]
      );
      const { children } = query;
      return (node) => {
        if (node.kind !== 'element' || node.tag !== tag) return false;
        for (const [name, value] of wanted) {
          if (node.attributes.get(name)?.value !== value) return false;
        }
        return !children || sameChildren(node.children, children);
      };
    }

    case 'comment': {
      const { condition, children } = query;
      return (node) =>
        node.kind === 'comment' &&
        (condition === undefined || node.condition === condition) &&
        (!children || sameChildren(node.children, children));
    }

    case 'container': {
      const { children } = query;
      return (node) =>
        node.kind === 'container' &&
        (!children || sameChildren(node.children, children));
    }
  }
}

export function matches(node: MarkupNode, query: QueryInput): boolean {
  return compile(normalizeQuery(query))(node);
}

function normalizeQuery(input: QueryInput): Query {
  if (typeof input === 'string' || 'clone' in input) return toQuery(input);
  return input;
}

/** Pre-order search from `root` (inclusive); results are in document order */
export function find(root: MarkupNode, query: QueryInput): MarkupNode[] {
  const test = compile(normalizeQuery(query));
  const found: MarkupNode[] = [];
  const walk = (node: MarkupNode): void => {
    if (test(node)) found.push(node);
    if (node.kind === 'text') return;
    for (const child of node.children) walk(child);
  };
  walk(root);
  return found;
}
