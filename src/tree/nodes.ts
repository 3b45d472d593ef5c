/**
 * Markup tree: node variants and the composition protocol
 *
 * INVARIANTS:
 * - A node has at most one parent; attaching it elsewhere detaches it first
 * - The tree is acyclic: a node is never attached to itself or a descendant
 * - An element never holds two attributes with the same name
 * - Every mutation validates its whole input before it changes anything
 */

import {
  Attribute,
  toAttributeValue,
  type AttributeInput,
  type AttributeValue,
} from '../attributes/attribute';
import { normalizeAttributeName } from '../attributes/normalize';
import {
  InvalidArgumentError,
  NotFoundError,
  OutOfBoundsError,
  TypeMismatchError,
  describeValue,
} from '../common/errors';
import { invariant } from '../dev/invariant';
import { find as findMatches, type QueryInput } from '../query/match';
import { render as renderNode, type RenderOptions } from '../render/serialize';
import { getScopeStack } from '../scope/stack';
import { getTagMetadata } from '../tags/metadata';

export type NodeKind = 'element' | 'text' | 'comment' | 'container';

export type MarkupNode = Element | Text | Comment | Container;

/** Keyword-style attributes: `{ id: 'main', class_: 'wide', hidden: true }` */
export type AttributeProps = {
  readonly [name: string]: AttributeInput | Attribute | false | null | undefined;
};

/**
 * Anything a constructor or `add` accepts. Arrays are flattened; `false`,
 * `null` and `undefined` are skipped so conditional children read naturally.
 */
export type ComposeArg =
  | MarkupNode
  | Attribute
  | string
  | number
  | AttributeProps
  | readonly ComposeArg[]
  | false
  | null
  | undefined;

/** Value accepted by index assignment */
export type ChildInput = MarkupNode | string | number;

type Step =
  | { readonly type: 'node'; readonly node: MarkupNode }
  | { readonly type: 'text'; readonly content: string }
  | {
      readonly type: 'attribute';
      readonly name: string;
      readonly value: AttributeValue;
      readonly source?: Attribute;
    };

const parents = new WeakMap<TreeNode, CompositeNode>();

function isMarkupNode(value: unknown): value is MarkupNode {
  return (
    value instanceof Element ||
    value instanceof Text ||
    value instanceof Comment ||
    value instanceof Container
  );
}

function narrow(node: TreeNode): MarkupNode {
  invariant(isMarkupNode(node), 'Unknown node variant', {
    kind: node.kind,
  });
  return node;
}

function isArgList(arg: ComposeArg): arg is readonly ComposeArg[] {
  return Array.isArray(arg);
}

function isAttributeProps(arg: ComposeArg): arg is AttributeProps {
  if (typeof arg !== 'object' || arg === null) return false;
  const proto: unknown = Object.getPrototypeOf(arg);
  return proto === Object.prototype || proto === null;
}

function isOperand(value: unknown): value is ChildInput {
  return (
    isMarkupNode(value) || typeof value === 'string' || typeof value === 'number'
  );
}

export abstract class TreeNode {
  abstract readonly kind: NodeKind;

  get parent(): CompositeNode | null {
    return parents.get(this) ?? null;
  }

  /** Detach from the current parent, if any */
  remove(): this {
    this.parent?.removeChild(this);
    return this;
  }

  /**
   * Sibling merge (`a + b`). Returns a Container holding both operands; when
   * either side already is a Container the other side joins it instead.
   */
  plus(other: ChildInput): Container {
    if (!isOperand(other)) {
      throw new TypeMismatchError(
        `Cannot combine a ${this.kind} node with ${describeValue(other)}.`
      );
    }
    const self = narrow(this);
    if (self instanceof Container) return self.add(other);
    if (other instanceof Container) return other.insert(0, self);
    return new Container(self, other);
  }

  /**
   * Replication (`node * n`). Returns a Container of `count` independent deep
   * copies. The node itself serves as the template and is not attached.
   */
  times(count: number): Container {
    if (typeof count !== 'number' || !Number.isInteger(count)) {
      throw new TypeMismatchError(
        `Repeat count must be an integer. Got ${typeof count === 'number' ? count : describeValue(count)}.`
      );
    }
    if (count <= 0) {
      throw new InvalidArgumentError(
        `Repeat count must be positive. Got ${count}.`
      );
    }
    const self = narrow(this);
    getScopeStack().claim(self);
    const copies: MarkupNode[] = [];
    for (let i = 0; i < count; i++) copies.push(self.clone());
    return new Container(copies);
  }

  /** Matching nodes in document order, this node included */
  find(query: QueryInput): MarkupNode[] {
    return findMatches(narrow(this), query);
  }

  display(options?: RenderOptions): string {
    return renderNode(narrow(this), options);
  }

  toString(): string {
    return this.display();
  }

  abstract clone(): MarkupNode;
}

export class Text extends TreeNode {
  readonly kind = 'text' as const;
  private _content: string;

  constructor(content: string | number | Text | null | undefined = '') {
    super();
    this._content = Text.toContent(content);
    const stack = getScopeStack();
    if (content instanceof Text) stack.claim(content);
    stack.register(this);
  }

  private static toContent(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Text) return value.content;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    throw new TypeMismatchError(
      `A text node holds strings and numbers only. Got ${describeValue(value)}.`
    );
  }

  get content(): string {
    return this._content;
  }

  set content(value: string) {
    this._content = Text.toContent(value);
  }

  get length(): number {
    return this._content.length;
  }

  /** Append more text onto this node */
  add(...parts: Array<string | number | Text>): this {
    const pieces = parts.map((part) => Text.toContent(part));
    const stack = getScopeStack();
    for (const part of parts) {
      if (part instanceof Text) stack.claim(part);
    }
    this._content += pieces.join('');
    return this;
  }

  clone(): Text {
    return new Text(this._content);
  }
}

export abstract class CompositeNode extends TreeNode {
  private readonly nodes: MarkupNode[] = [];

  get children(): readonly MarkupNode[] {
    return this.nodes;
  }

  get length(): number {
    return this.nodes.length;
  }

  indexOf(node: TreeNode): number {
    return this.nodes.findIndex((child) => child === node);
  }

  /** Attach children and attributes; see `ComposeArg` for accepted shapes */
  add(...args: ComposeArg[]): this {
    this.append(args);
    return this;
  }

  /**
   * Like `add`, but children go in before the child at `index`. `length`
   * appends; a negative index counts from the end as in `get`.
   */
  insert(index: number, ...args: ComposeArg[]): this {
    const length = this.nodes.length;
    const at = index < 0 ? length + index : index;
    if (!Number.isInteger(index) || at < 0 || at > length) {
      throw new OutOfBoundsError(index, length);
    }
    this.append(args, at);
    return this;
  }

  get(index: number): MarkupNode {
    return this.nodes[this.resolveIndex(index)];
  }

  set(index: number, value: ChildInput): this {
    this.replaceChild(index, value);
    return this;
  }

  /** Remove the child at `index`; later children shift down */
  delete(index: number): MarkupNode {
    const at = this.resolveIndex(index);
    const [removed] = this.nodes.splice(at, 1);
    parents.delete(removed);
    return removed;
  }

  removeChild(node: TreeNode): boolean {
    const at = this.indexOf(node);
    if (at === -1) return false;
    this.delete(at);
    return true;
  }

  protected get childrenAllowed(): boolean {
    return true;
  }

  protected get attributesAllowed(): boolean {
    return false;
  }

  protected abstract describe(): string;

  protected mergeAttribute(name: string, _value: AttributeValue): void {
    invariant(false, `${this.describe()} received attribute '${name}'`);
  }

  protected append(args: readonly ComposeArg[], at?: number): void {
    const steps: Step[] = [];
    for (const arg of args) this.plan(arg, steps);
    this.apply(steps, at);
  }

  protected replaceChild(index: number, value: unknown): void {
    const at = this.resolveIndex(index);
    if (value instanceof Attribute) {
      throw new TypeMismatchError(
        `Attribute '${value.name}' cannot be assigned to a child slot; use a string key.`
      );
    }
    if (!isOperand(value)) {
      throw new TypeMismatchError(
        `A child slot takes a node, string or number. Got ${describeValue(value)}.`
      );
    }
    if (isMarkupNode(value)) this.assertAttachable(value);

    const old = this.nodes[at];
    if (old === value) return;
    const node = isMarkupNode(value) ? value : new Text(value);

    getScopeStack().claim(node);
    this.detach(node);
    const position = this.nodes.indexOf(old);
    this.nodes[position] = node;
    parents.delete(old);
    parents.set(node, this);
  }

  protected cloneChildrenInto(copy: CompositeNode): void {
    copy.apply(
      this.nodes.map((child): Step => ({ type: 'node', node: child.clone() }))
    );
  }

  private resolveIndex(index: number): number {
    if (typeof index !== 'number' || !Number.isInteger(index)) {
      throw new TypeMismatchError(
        `Child index must be an integer. Got ${describeValue(index)}.`
      );
    }
    const resolved = index < 0 ? this.nodes.length + index : index;
    if (resolved < 0 || resolved >= this.nodes.length) {
      throw new OutOfBoundsError(index, this.nodes.length);
    }
    return resolved;
  }

  private assertAttachable(node: MarkupNode): void {
    if (!this.childrenAllowed) {
      throw new InvalidArgumentError(
        `${this.describe()} is a void element and cannot contain child nodes.`
      );
    }
    for (let cur: TreeNode | null = this; cur; cur = cur.parent) {
      if (cur === node) {
        throw new InvalidArgumentError(
          `Cannot attach a ${node.kind} node inside itself.`
        );
      }
    }
  }

  private plan(arg: ComposeArg, steps: Step[]): void {
    if (arg === null || arg === undefined || arg === false) return;

    if (isArgList(arg)) {
      for (const item of arg) this.plan(item, steps);
      return;
    }

    if (isMarkupNode(arg)) {
      this.assertAttachable(arg);
      steps.push({ type: 'node', node: arg });
      return;
    }

    if (typeof arg === 'string' || typeof arg === 'number') {
      if (!this.childrenAllowed) {
        throw new InvalidArgumentError(
          `${this.describe()} is a void element and cannot contain text.`
        );
      }
      steps.push({ type: 'text', content: String(arg) });
      return;
    }

    if (arg instanceof Attribute) {
      this.assertAttributesAllowed(arg.name);
      steps.push({
        type: 'attribute',
        name: arg.name,
        value: arg.value,
        source: arg,
      });
      return;
    }

    if (isAttributeProps(arg)) {
      for (const [key, value] of Object.entries(arg)) {
        if (value === false || value === null || value === undefined) continue;
        const name = normalizeAttributeName(key);
        this.assertAttributesAllowed(name);
        if (value instanceof Attribute) {
          steps.push({ type: 'attribute', name, value: value.value, source: value });
        } else {
          steps.push({ type: 'attribute', name, value: toAttributeValue(name, value) });
        }
      }
      return;
    }

    throw new InvalidArgumentError(
      `Cannot compose ${describeValue(arg)} into ${this.describe()}.`
    );
  }

  private assertAttributesAllowed(name: string): void {
    if (!this.attributesAllowed) {
      throw new InvalidArgumentError(
        `${this.describe()} cannot hold attributes (got '${name}').`
      );
    }
  }

  private apply(steps: readonly Step[], at?: number): void {
    const stack = getScopeStack();
    let anchor: MarkupNode | undefined =
      at === undefined ? undefined : this.nodes[at];

    for (const step of steps) {
      if (step.type === 'attribute') {
        if (step.source) stack.claim(step.source);
        this.mergeAttribute(step.name, step.value);
        continue;
      }

      const node = step.type === 'text' ? new Text(step.content) : step.node;
      stack.claim(node);
      if (node === anchor) anchor = this.nodes[this.nodes.indexOf(node) + 1];
      this.detach(node);
      const position = anchor ? this.nodes.indexOf(anchor) : this.nodes.length;
      this.nodes.splice(position, 0, node);
      parents.set(node, this);
    }
  }

  private detach(node: MarkupNode): void {
    const parent = parents.get(node);
    if (!parent) return;
    const at = parent.nodes.indexOf(node);
    if (at !== -1) parent.nodes.splice(at, 1);
    parents.delete(node);
  }
}

export class Element extends CompositeNode {
  readonly kind = 'element' as const;
  /** Canonical tag name as rendered */
  readonly tag: string;
  readonly isVoid: boolean;
  private readonly attrs = new Map<string, Attribute>();

  constructor(tag: string, ...args: ComposeArg[]) {
    super();
    const meta = getTagMetadata(tag);
    this.tag = meta.name;
    this.isVoid = meta.void;
    this.append(args);
    getScopeStack().register(this);
  }

  get attributes(): ReadonlyMap<string, Attribute> {
    return this.attrs;
  }

  has(name: string): boolean {
    return this.attrs.has(normalizeAttributeName(name));
  }

  getAttribute(name: string): Attribute | undefined {
    return this.attrs.get(normalizeAttributeName(name));
  }

  get(index: number): MarkupNode;
  get(name: string): AttributeValue;
  get(key: number | string): MarkupNode | AttributeValue {
    if (typeof key !== 'string') return super.get(key);
    const name = normalizeAttributeName(key);
    const attr = this.attrs.get(name);
    if (!attr) throw new NotFoundError(name);
    return attr.value;
  }

  /**
   * Index keys replace a child. String keys create or overwrite an attribute;
   * `false`, `null` and `undefined` remove it.
   */
  set(index: number, value: ChildInput): this;
  set(
    name: string,
    value: AttributeInput | Attribute | false | null | undefined
  ): this;
  set(
    key: number | string,
    value: ChildInput | AttributeInput | Attribute | false | null | undefined
  ): this {
    if (typeof key === 'string') {
      this.setAttribute(key, value);
    } else {
      this.replaceChild(key, value);
    }
    return this;
  }

  delete(index: number): MarkupNode;
  delete(name: string): boolean;
  delete(key: number | string): MarkupNode | boolean {
    if (typeof key !== 'string') return super.delete(key);
    return this.attrs.delete(normalizeAttributeName(key));
  }

  /**
   * Run `fn` with this element as the open scope.
   *
   * @example
   * ```ts
   * const p = P('Text').within(() => {
   *   Class('lead');
   *   Span('span', Id('span_id'));
   * });
   * ```
   */
  within(fn: (element: this) => void): this {
    getScopeStack().run([this], () => fn(this));
    return this;
  }

  clone(): Element {
    const copy = new Element(this.tag);
    for (const attr of this.attrs.values()) {
      copy.mergeAttribute(attr.name, attr.value);
    }
    this.cloneChildrenInto(copy);
    return copy;
  }

  protected get childrenAllowed(): boolean {
    return !this.isVoid;
  }

  protected get attributesAllowed(): boolean {
    return true;
  }

  protected describe(): string {
    return `<${this.tag}>`;
  }

  protected mergeAttribute(name: string, value: AttributeValue): void {
    const existing = this.attrs.get(name);
    if (existing) {
      existing.merge(value);
      return;
    }
    this.putAttribute(name, value);
  }

  private setAttribute(key: string, value: unknown): void {
    const name = normalizeAttributeName(key);
    if (value === false || value === null || value === undefined) {
      this.attrs.delete(name);
      return;
    }
    if (value instanceof TreeNode) {
      throw new TypeMismatchError(
        `Attribute '${name}' cannot hold a ${value.kind} node.`
      );
    }
    if (value instanceof Attribute) {
      getScopeStack().claim(value);
      this.putAttribute(name, value.value);
      return;
    }
    this.putAttribute(name, toAttributeValue(name, value));
  }

  private putAttribute(name: string, value: AttributeValue): void {
    const attr = new Attribute(name, value);
    getScopeStack().claim(attr);
    this.attrs.set(name, attr);
  }
}

/** Untagged grouping of siblings; renders only its children */
export class Container extends CompositeNode {
  readonly kind = 'container' as const;

  constructor(...args: ComposeArg[]) {
    super();
    this.append(args);
    getScopeStack().register(this);
  }

  clone(): Container {
    const copy = new Container();
    this.cloneChildrenInto(copy);
    return copy;
  }

  protected describe(): string {
    return 'Container';
  }
}

/** `<!-- ... -->`, or a conditional comment when `condition` is set */
export class Comment extends CompositeNode {
  readonly kind = 'comment' as const;
  condition: string | undefined;

  constructor(...args: ComposeArg[]) {
    super();
    this.condition = undefined;
    this.append(args);
    getScopeStack().register(this);
  }

  clone(): Comment {
    const copy = new Comment();
    copy.condition = this.condition;
    this.cloneChildrenInto(copy);
    return copy;
  }

  protected describe(): string {
    return 'Comment';
  }
}

/** `<!--[if condition]> ... <![endif]-->` */
export function ConditionalComment(
  condition: string,
  ...content: ComposeArg[]
): Comment {
  const comment = new Comment(...content);
  comment.condition = condition;
  return comment;
}
