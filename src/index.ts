/**
 * tagtree: build HTML as an in-memory tree, query it, render it to text
 *
 * @example
 * ```ts
 * import { Div, H1, P, Class } from 'tagtree';
 *
 * Div(H1('Title'), P('Paragraph'), Class('container')).display();
 * ```
 */

// Tree model
export {
  TreeNode,
  CompositeNode,
  Element,
  Text,
  Comment,
  Container,
  ConditionalComment,
} from './tree/nodes';
export type {
  NodeKind,
  MarkupNode,
  ComposeArg,
  ChildInput,
  AttributeProps,
} from './tree/nodes';

// Attributes
export {
  Attribute,
  mergeAttributeValues,
  toAttributeValue,
} from './attributes/attribute';
export type { AttributeValue, AttributeInput } from './attributes/attribute';
export * from './attributes/factories';
export {
  normalizeAttributeName,
  cssPropertyName,
} from './attributes/normalize';

// Tags
export * from './tags/factories';
export { Table, HeaderTable, tableRows } from './tags/table';
export type {
  TableCell,
  TableData,
  HeaderOption,
  TableOptions,
} from './tags/table';
export {
  Document,
  Doctype,
  DoctypeDeclaration,
  DEFAULT_DOCUMENT_TITLE,
} from './tags/document';
export { getTagMetadata, isVoidTag, VOID_ELEMENTS } from './tags/metadata';
export type { TagMetadata } from './tags/metadata';

// Scoped construction
export {
  ScopeStack,
  getScopeStack,
  withScopeStack,
  scope,
} from './scope/stack';
export type { Scoped, ScopeFrame } from './scope/stack';

// Rendering
export {
  render,
  renderToSink,
  renderToStream,
  resolveRenderOptions,
  DEFAULT_RENDER_OPTIONS,
} from './render/serialize';
export type {
  RenderOptions,
  ResolvedRenderOptions,
  StreamRenderOptions,
} from './render/serialize';
export type { BooleanAttributeStyle } from './render/attrs';
export { StringSink, StreamSink } from './render/sink';
export type { RenderSink } from './render/sink';
export { escapeText, escapeAttr, clearEscapeCache } from './render/escape';

// Query
export { find, matches, toQuery, structurallyEqual } from './query/match';
export type {
  Query,
  QueryInput,
  SubstringQuery,
  TextQuery,
  ElementQuery,
  CommentQuery,
  ContainerQuery,
} from './query/match';

// Errors
export {
  MarkupError,
  InvalidArgumentError,
  OutOfBoundsError,
  NotFoundError,
  TypeMismatchError,
} from './common/errors';
export type { MarkupErrorCode } from './common/errors';
